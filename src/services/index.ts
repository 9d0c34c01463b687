// Service types
export {
  EscrowState,
  EscrowSettings,
  RewardsState,
  RewardsSettings,
  LedgerEvent,
  LedgerEventType,
  IVotingPowerSource,
  LiquidationResult,
  DEFAULT_LIQUIDATION_PENALTY_NUMERATOR,
  DEFAULT_LIQUIDATION_PENALTY_DENOMINATOR,
  DEFAULT_MAX_EMISSION_RATE,
  defaultEscrowSettings,
  createEmptyEscrowState,
  createEmptyRewardsState,
} from './serviceTypes';

// Point history & position ledger
export { totalPowerAt, supplyAt, findPastGlobalPointIndex } from './pointHistory';
export { checkpoint, lockPoint, votingPowerAt, findPastUserPointIndex } from './positionLedger';

// Delegation index
export {
  delegateOf,
  currentDelegateSet,
  delegateSetAt,
  cumulativeVotes,
} from './delegationService';

// Engines
export {
  VotingEscrow,
  VotingEscrowOptions,
  CreateLockParams,
  DelegateBySigParams,
  GovernanceChanges,
} from './votingEscrow';
export { Rewards, RewardsOptions, RateSeries } from './rewardsService';

// Guards
export { StateGuard, GuardedState, requireGovernor } from './stateGuard';
