import { IClock, InMemoryNodeProperties, InMemoryToken, SystemClock } from '../collaborators';
import { VotingEscrow } from '../services/votingEscrow';
import { Rewards } from '../services/rewardsService';
import { defaultEscrowSettings } from '../services/serviceTypes';
import { ILedgerStore, LedgerSnapshot } from '../persistence/interfaces';
import { ServiceConfig } from './config';

/**
 * API state container for the HTTP server
 */
export interface ApiState {
  config: ServiceConfig;
  clock: IClock;

  // Collaborators
  token: InMemoryToken;
  nodeProperties: InMemoryNodeProperties;

  // Engines
  escrow: VotingEscrow;
  rewards: Rewards;

  // Registered accounts: address → hex Ed25519 public key
  accounts: Map<string, string>;

  store: ILedgerStore;
}

export interface CreateApiStateOptions {
  config: ServiceConfig;
  store: ILedgerStore;
  clock?: IClock;
  /** Saved state to resume from */
  snapshot?: LedgerSnapshot;
}

/**
 * Create API state, wiring the escrow and reward engines to each other
 * and to the in-process collaborators.
 */
export function createApiState(options: CreateApiStateOptions): ApiState {
  const { config, store, snapshot } = options;
  const clock = options.clock ?? new SystemClock();

  const token = new InMemoryToken();
  const nodeProperties = new InMemoryNodeProperties();
  if (snapshot) {
    token.restore(snapshot.token);
    nodeProperties.restore(snapshot.nodes);
  }

  const escrow = new VotingEscrow({
    token,
    clock,
    nodeProperties,
    state: snapshot?.escrow,
    settings: defaultEscrowSettings({
      governor: config.governor,
      treasury: config.treasury,
      custodyAccount: config.custodyAccount,
      liquidationsEnabled: config.liquidationsEnabled,
      liquidationPenaltyNumerator: config.liquidationPenaltyNumerator,
      liquidationPenaltyDenominator: config.liquidationPenaltyDenominator,
      minimumLock: config.minLockAmount,
      maxReplayWeeks: config.maxReplayWeeks,
      baseURI: config.baseURI,
    }),
  });

  const rewards = new Rewards({
    escrow,
    token,
    clock,
    nodeProperties,
    state: snapshot?.rewards,
    settings: {
      governor: config.governor,
      poolAccount: config.rewardPoolAccount,
      maxEmissionRate: config.maxEmissionRate,
    },
  });
  escrow.setRewards(escrow.settings.governor, rewards);

  return {
    config,
    clock,
    token,
    nodeProperties,
    escrow,
    rewards,
    accounts: snapshot ? new Map(snapshot.accounts) : new Map(),
    store,
  };
}

export function snapshotApiState(state: ApiState): LedgerSnapshot {
  return {
    escrow: state.escrow.exportState(),
    rewards: state.rewards.exportState(),
    token: state.token.snapshot(),
    nodes: state.nodeProperties.snapshot(),
    accounts: new Map(state.accounts),
  };
}

/**
 * Save the whole ledger. Called after every successful mutation. If the
 * store refuses the save, the in-memory ledger is reloaded from what the
 * store last kept before the error is rethrown.
 */
export async function persistApiState(state: ApiState): Promise<void> {
  try {
    await state.store.save(snapshotApiState(state));
  } catch (err) {
    await reloadApiState(state);
    throw err;
  }
}

async function reloadApiState(state: ApiState): Promise<void> {
  const snapshot = await state.store.load();
  const reloaded = createApiState({
    config: state.config,
    store: state.store,
    clock: state.clock,
    snapshot,
  });
  state.token = reloaded.token;
  state.nodeProperties = reloaded.nodeProperties;
  state.escrow = reloaded.escrow;
  state.rewards = reloaded.rewards;
  state.accounts = reloaded.accounts;
}

/**
 * Global heartbeat: replay the aggregate point to now and roll the reward
 * engine's latest midnight forward, then persist.
 */
export async function runHeartbeat(state: ApiState): Promise<{ epoch: number; latestMidnight: number }> {
  state.escrow.checkpoint();
  const latestMidnight = state.rewards.updateLatestMidnight();
  await persistApiState(state);
  return { epoch: state.escrow.epoch, latestMidnight };
}
