/**
 * Delegation Checkpoint Index.
 *
 * Each delegate has an append-only series of (timestamp, position IDs)
 * snapshots; the latest one is the set currently delegated to it. At most one
 * snapshot per delegate per timestamp: a second change in the same instant
 * fails with FLASH_PROTECTION instead of being merged.
 */

import { pushCheckpoint, upperLookup } from '../checkpoints';
import { EscrowState } from './serviceTypes';
import { votingPowerAt } from './positionLedger';

/** Active delegate of `account`; an account that never delegated votes for itself */
export function delegateOf(state: EscrowState, account: string): string {
  return state.delegates.get(account) ?? account;
}

export function currentDelegateSet(state: EscrowState, delegatee: string): number[] {
  const series = state.delegateCheckpoints.get(delegatee);
  return series && series.length > 0 ? [...series[series.length - 1].value] : [];
}

export function delegateSetAt(state: EscrowState, delegatee: string, timestamp: number): number[] {
  const series = state.delegateCheckpoints.get(delegatee);
  if (!series) return [];
  return [...(upperLookup(series, timestamp) ?? [])];
}

function pushDelegateSet(
  state: EscrowState,
  delegatee: string,
  now: number,
  update: (ids: Set<number>) => void
): void {
  const ids = new Set(currentDelegateSet(state, delegatee));
  update(ids);
  const series = state.delegateCheckpoints.get(delegatee) ?? [];
  pushCheckpoint(series, now, [...ids].sort((a, b) => a - b), 'reject');
  state.delegateCheckpoints.set(delegatee, series);
}

/**
 * Move `ids` from one delegate's set to another's with one snapshot per
 * side. `undefined` stands for "no delegate" (mint or burn).
 */
export function moveDelegatedPositions(
  state: EscrowState,
  from: string | undefined,
  to: string | undefined,
  ids: number[],
  now: number
): void {
  if (from === to || ids.length === 0) {
    return;
  }
  if (from !== undefined) {
    pushDelegateSet(state, from, now, set => ids.forEach(id => set.delete(id)));
  }
  if (to !== undefined) {
    pushDelegateSet(state, to, now, set => ids.forEach(id => set.add(id)));
  }
}

/**
 * Point `account`'s votes at `delegatee`, carrying every position it owns.
 * Returns the previous delegate.
 */
export function setDelegate(
  state: EscrowState,
  account: string,
  delegatee: string,
  now: number
): string {
  const previous = delegateOf(state, account);
  state.delegates.set(account, delegatee);
  moveDelegatedPositions(state, previous, delegatee, state.ownerTokens.get(account) ?? [], now);
  return previous;
}

/**
 * Sum of voting power delegated to `account` at `timestamp`, skipping
 * non-voting positions.
 */
export function cumulativeVotes(state: EscrowState, account: string, timestamp: number): bigint {
  let votes = 0n;
  for (const id of delegateSetAt(state, account, timestamp)) {
    if (state.nonVoting.get(id)) {
      continue;
    }
    votes += votingPowerAt(state, id, timestamp);
  }
  return votes;
}
