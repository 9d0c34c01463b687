/**
 * Position Ledger: per-position point history and the checkpoint routine
 * every balance or end-time mutation funnels through.
 */

import { LockedBalance, Point, iMAXTIME } from '../types';
import { clampZero, toInt128 } from '../fixedPoint';
import { EscrowState } from './serviceTypes';
import { advanceGlobalPoint, commitGlobalPoint, copyPoint, slopeChangeAt } from './pointHistory';

/**
 * A position's (bias, slope) at `now` for a given locked balance.
 * Expired or empty locks have neither.
 */
export function lockPoint(locked: LockedBalance, now: number): { bias: bigint; slope: bigint } {
  if (locked.end > now && locked.amount > 0n) {
    const slope = locked.amount / iMAXTIME;
    return { slope, bias: slope * BigInt(locked.end - now) };
  }
  return { bias: 0n, slope: 0n };
}

export interface CheckpointInput {
  /** Position being changed; `undefined` for the global heartbeat */
  positionId?: number;
  oldLocked: LockedBalance;
  newLocked: LockedBalance;
  /** Non-voting positions keep a user history but stay out of the aggregate */
  voting: boolean;
  now: number;
  blockNumber: number;
}

/**
 * Record the change from `oldLocked` to `newLocked`:
 *
 * 1. derive old/new per-position (bias, slope)
 * 2. replay the global point to `now`
 * 3. apply the position's delta to the aggregate
 * 4. reschedule the slope changes at the old and new end times
 * 5. append the position's new user point
 */
export function checkpoint(state: EscrowState, input: CheckpointInput): void {
  const { positionId, oldLocked, newLocked, now, blockNumber } = input;
  const isPosition = positionId !== undefined;

  let uOld = { bias: 0n, slope: 0n };
  let uNew = { bias: 0n, slope: 0n };
  let oldDslope = 0n;
  let newDslope = 0n;

  if (isPosition) {
    toInt128(newLocked.amount);
    uOld = lockPoint(oldLocked, now);
    uNew = lockPoint(newLocked, now);

    oldDslope = slopeChangeAt(state, oldLocked.end);
    if (newLocked.end !== 0) {
      newDslope = newLocked.end === oldLocked.end ? oldDslope : slopeChangeAt(state, newLocked.end);
    }
  }

  const { lastPoint, epoch } = advanceGlobalPoint(state, now, blockNumber);
  const affectsAggregate = isPosition && input.voting;

  if (affectsAggregate) {
    lastPoint.slope = clampZero(lastPoint.slope + (uNew.slope - uOld.slope));
    lastPoint.bias = clampZero(lastPoint.bias + (uNew.bias - uOld.bias));
  }

  commitGlobalPoint(state, lastPoint, epoch);

  if (!isPosition) {
    return;
  }

  if (affectsAggregate) {
    if (oldLocked.end > now) {
      // cancel the old slope leaving at the old end
      oldDslope += uOld.slope;
      if (newLocked.end === oldLocked.end) {
        oldDslope -= uNew.slope;
      }
      state.slopeChanges.set(oldLocked.end, oldDslope);
    }

    if (newLocked.end > now && newLocked.end !== oldLocked.end) {
      newDslope -= uNew.slope;
      state.slopeChanges.set(newLocked.end, newDslope);
    }
  }

  appendUserPoint(state, positionId, {
    bias: uNew.bias,
    slope: uNew.slope,
    ts: now,
    blk: blockNumber,
  });
}

/**
 * Append a point to a position's history. A second point in the same
 * instant replaces the latest one.
 */
function appendUserPoint(state: EscrowState, positionId: number, point: Point): void {
  const history = state.userPointHistory.get(positionId) ?? [{ bias: 0n, slope: 0n, ts: 0, blk: 0 }];
  let userEpoch = state.userPointEpoch.get(positionId) ?? 0;

  if (userEpoch !== 0 && history[userEpoch].ts === point.ts) {
    history[userEpoch] = point;
  } else {
    userEpoch += 1;
    history[userEpoch] = point;
  }

  state.userPointHistory.set(positionId, history);
  state.userPointEpoch.set(positionId, userEpoch);
}

/**
 * Latest user epoch whose point is at or before `timestamp`, or 0.
 */
export function findPastUserPointIndex(
  state: EscrowState,
  positionId: number,
  timestamp: number
): number {
  const userEpoch = state.userPointEpoch.get(positionId) ?? 0;
  const history = state.userPointHistory.get(positionId);
  if (userEpoch === 0 || !history) return 0;
  if (history[userEpoch].ts <= timestamp) return userEpoch;
  if (history[1].ts > timestamp) return 0;

  let lower = 1;
  let upper = userEpoch;
  while (upper > lower) {
    const center = upper - Math.floor((upper - lower) / 2);
    const point = history[center];
    if (point.ts === timestamp) {
      return center;
    }
    if (point.ts < timestamp) {
      lower = center;
    } else {
      upper = center - 1;
    }
  }
  return lower;
}

/**
 * Voting power of a position at `timestamp`, floored at 0.
 */
export function votingPowerAt(state: EscrowState, positionId: number, timestamp: number): bigint {
  const userEpoch = findPastUserPointIndex(state, positionId, timestamp);
  if (userEpoch === 0) return 0n;
  const history = state.userPointHistory.get(positionId);
  if (!history) return 0n;
  const point = history[userEpoch];
  return clampZero(point.bias - point.slope * BigInt(timestamp - point.ts));
}

export function userPointAt(state: EscrowState, positionId: number, userEpoch: number): Point | undefined {
  const point = state.userPointHistory.get(positionId)?.[userEpoch];
  return point ? copyPoint(point) : undefined;
}
