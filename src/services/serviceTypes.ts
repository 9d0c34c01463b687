import { Checkpoint, DEFAULT_MAX_REPLAY_WEEKS, LockedBalance, Point } from '../types';
import { TOKEN_UNITS } from '../fixedPoint';

// ---------------------------------------------------------------------------
// Escrow state container
// ---------------------------------------------------------------------------

/**
 * Everything the escrow owns. Plain maps and arrays only, so the whole
 * container can be cloned for atomic rollback and serialized for storage.
 */
export interface EscrowState {
  /** Last position ID minted (IDs start at 1) */
  tokenId: number;
  /** Total amount under lock */
  supply: bigint;

  locked: Map<number, LockedBalance>;
  owners: Map<number, string>;
  ownerTokens: Map<string, number[]>;
  approvals: Map<number, string>;
  operatorApprovals: Map<string, string[]>;
  /** Immutable per-position flag; kept after the position is destroyed */
  nonVoting: Map<number, boolean>;
  createdAt: Map<number, number>;
  /** Timestamp of the last mint/transfer/merge/split touching a position */
  structuralChange: Map<number, number>;

  /** Global point history, index = epoch; index 0 is the genesis point */
  epoch: number;
  pointHistory: Point[];
  /** Per-position point history, index = user epoch; index 0 is unused */
  userPointEpoch: Map<number, number>;
  userPointHistory: Map<number, Point[]>;
  slopeChanges: Map<number, bigint>;

  delegates: Map<string, string>;
  delegateCheckpoints: Map<string, Checkpoint<number[]>[]>;
  nonces: Map<string, number>;

  settings: EscrowSettings;
  events: LedgerEvent[];
}

export interface EscrowSettings {
  governor: string;
  treasury: string;
  /** Account holding locked funds in the asset ledger */
  custodyAccount: string;
  liquidationsEnabled: boolean;
  liquidationPenaltyNumerator: bigint;
  liquidationPenaltyDenominator: bigint;
  minimumLock: bigint;
  maxReplayWeeks: number;
  baseURI: string;
}

export const DEFAULT_LIQUIDATION_PENALTY_NUMERATOR = 50_000n;
export const DEFAULT_LIQUIDATION_PENALTY_DENOMINATOR = 100_000n;

export function defaultEscrowSettings(
  overrides: Partial<EscrowSettings> & Pick<EscrowSettings, 'governor' | 'custodyAccount'>
): EscrowSettings {
  return {
    treasury: overrides.governor,
    liquidationsEnabled: false,
    liquidationPenaltyNumerator: DEFAULT_LIQUIDATION_PENALTY_NUMERATOR,
    liquidationPenaltyDenominator: DEFAULT_LIQUIDATION_PENALTY_DENOMINATOR,
    minimumLock: TOKEN_UNITS,
    maxReplayWeeks: DEFAULT_MAX_REPLAY_WEEKS,
    baseURI: '',
    ...overrides,
  };
}

export function createEmptyEscrowState(
  settings: EscrowSettings,
  genesis: { ts: number; blk: number }
): EscrowState {
  return {
    tokenId: 0,
    supply: 0n,
    locked: new Map(),
    owners: new Map(),
    ownerTokens: new Map(),
    approvals: new Map(),
    operatorApprovals: new Map(),
    nonVoting: new Map(),
    createdAt: new Map(),
    structuralChange: new Map(),
    epoch: 0,
    pointHistory: [{ bias: 0n, slope: 0n, ts: genesis.ts, blk: genesis.blk }],
    userPointEpoch: new Map(),
    userPointHistory: new Map(),
    slopeChanges: new Map(),
    delegates: new Map(),
    delegateCheckpoints: new Map(),
    nonces: new Map(),
    settings,
    events: [],
  };
}

// ---------------------------------------------------------------------------
// Rewards state container
// ---------------------------------------------------------------------------

export interface RewardsState {
  /** Midnight of the day the engine was created */
  genesis: number;
  latestMidnight: number;
  /** Last settled midnight per position */
  lastClaim: Map<number, number>;

  baseEmissionRate: Checkpoint<bigint>[];
  nodeEmissionRate: Checkpoint<bigint>[];
  nodeRewardThreshold: Checkpoint<bigint>[];

  settings: RewardsSettings;
  events: LedgerEvent[];
}

export interface RewardsSettings {
  governor: string;
  /** Account funding payouts in the asset ledger */
  poolAccount: string;
  /** Ceiling for either emission rate (per day, scaled by 1e18) */
  maxEmissionRate: bigint;
}

/** 1% of voting power per day */
export const DEFAULT_MAX_EMISSION_RATE = 10n ** 16n;

export function createEmptyRewardsState(settings: RewardsSettings, genesis: number): RewardsState {
  return {
    genesis,
    latestMidnight: genesis,
    lastClaim: new Map(),
    baseEmissionRate: [],
    nodeEmissionRate: [],
    nodeRewardThreshold: [],
    settings,
    events: [],
  };
}

// ---------------------------------------------------------------------------
// Events
// ---------------------------------------------------------------------------

export type LedgerEventType =
  | 'DEPOSIT'
  | 'WITHDRAW'
  | 'LIQUIDATE'
  | 'MERGE'
  | 'SPLIT'
  | 'SUPPLY'
  | 'TRANSFER'
  | 'APPROVAL'
  | 'APPROVAL_FOR_ALL'
  | 'DELEGATE_CHANGED'
  | 'SETTINGS_CHANGED'
  | 'CLAIM'
  | 'BASE_EMISSION_RATE_CHANGE'
  | 'NODE_EMISSION_RATE_CHANGE'
  | 'NODE_REWARD_THRESHOLD_CHANGE'
  | 'REWARD_WITHDRAWAL';

/**
 * Observability record for every state change. Amounts in `details` are
 * decimal strings so the entry is JSON-safe.
 */
export interface LedgerEvent {
  eventType: LedgerEventType;
  timestamp: number;
  blk: number;
  accountId?: string;
  positionId?: number;
  details: Record<string, string | number | boolean>;
}

// ---------------------------------------------------------------------------
// Cross-engine views
// ---------------------------------------------------------------------------

/**
 * What the reward engine needs from the escrow.
 */
export interface IVotingPowerSource {
  votingPowerOf(positionId: number, timestamp?: number): bigint;
  ownerOf(positionId: number): string | undefined;
  createdAt(positionId: number): number | undefined;
  depositFor(caller: string, positionId: number, amount: bigint): void;
}

export interface LiquidationResult {
  returned: bigint;
  penalty: bigint;
}
