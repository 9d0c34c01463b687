/**
 * Shared fixtures for engine tests: a manual clock, an in-process token,
 * node properties, and an escrow optionally wired to a reward engine.
 */

import { WEEK } from '../types';
import { toTokenUnits } from '../fixedPoint';
import { LedgerError, isLedgerError } from '../errors';
import { IFungibleAsset, InMemoryNodeProperties, InMemoryToken, ManualClock } from '../collaborators';
import { VotingEscrow } from './votingEscrow';
import { Rewards } from './rewardsService';
import { DEFAULT_MAX_EMISSION_RATE, EscrowSettings, defaultEscrowSettings } from './serviceTypes';

/** A week-aligned midnight (2023-08-31T00:00:00Z) */
export const T0 = 2800 * WEEK;

export const GOVERNOR = 'governor';
export const TREASURY = 'treasury';
export const CUSTODY = 'escrow-custody';
export const POOL = 'reward-pool';

export interface Harness {
  clock: ManualClock;
  token: InMemoryToken;
  nodes: InMemoryNodeProperties;
  escrow: VotingEscrow;
  rewards?: Rewards;
  /** Mint `tokens` to `account` and approve custody to pull them */
  fund(account: string, tokens: number): void;
}

export interface HarnessOptions {
  withRewards?: boolean;
  settings?: Partial<EscrowSettings>;
  token?: InMemoryToken;
}

export function createHarness(options: HarnessOptions = {}): Harness {
  const clock = new ManualClock(T0);
  const token = options.token ?? new InMemoryToken();
  const nodes = new InMemoryNodeProperties();
  const escrow = new VotingEscrow({
    token,
    clock,
    nodeProperties: nodes,
    settings: defaultEscrowSettings({
      governor: GOVERNOR,
      treasury: TREASURY,
      custodyAccount: CUSTODY,
      ...options.settings,
    }),
  });

  let rewards: Rewards | undefined;
  if (options.withRewards) {
    rewards = new Rewards({
      escrow,
      token,
      clock,
      nodeProperties: nodes,
      settings: { governor: GOVERNOR, poolAccount: POOL, maxEmissionRate: DEFAULT_MAX_EMISSION_RATE },
    });
    escrow.setRewards(GOVERNOR, rewards);
  }

  const fund = (account: string, tokens: number): void => {
    const amount = toTokenUnits(tokens);
    token.mint(account, amount);
    token.approve(account, CUSTODY, token.allowance(account, CUSTODY) + amount);
  };

  return { clock, token, nodes, escrow, rewards, fund };
}

/** Run `fn` and return the LedgerError it throws; fails if it returns. */
export function catchLedgerError(fn: () => unknown): LedgerError {
  try {
    fn();
  } catch (err) {
    if (isLedgerError(err)) return err;
    throw err;
  }
  throw new Error('Expected a LedgerError to be thrown');
}

/**
 * Token whose transferFrom runs `onTransfer` first, to simulate an asset
 * ledger calling back into the escrow mid-transfer.
 */
export class CallbackToken extends InMemoryToken implements IFungibleAsset {
  onTransfer?: () => void;

  transferFrom(spender: string, from: string, to: string, amount: bigint): boolean {
    const hook = this.onTransfer;
    this.onTransfer = undefined;
    hook?.();
    return super.transferFrom(spender, from, to, amount);
  }
}
