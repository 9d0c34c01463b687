/**
 * Service configuration from environment variables.
 * Every value has a default; malformed values fail at startup.
 */

import { DEFAULT_MAX_REPLAY_WEEKS } from '../types';
import { TOKEN_UNITS, toTokenUnits } from '../fixedPoint';
import {
  DEFAULT_LIQUIDATION_PENALTY_DENOMINATOR,
  DEFAULT_LIQUIDATION_PENALTY_NUMERATOR,
  DEFAULT_MAX_EMISSION_RATE,
} from '../services/serviceTypes';
import type { StoreBackend } from '../persistence';

export interface SchedulerConfig {
  enabled: boolean;
  heartbeatCron: string; // e.g. '5 0 * * *' (00:05 UTC)
  timezone: string; // e.g. 'UTC'
}

export interface ServiceConfig {
  port: number;
  storeBackend: StoreBackend;
  dbPath?: string;
  adminKey: string;

  governor: string;
  treasury: string;
  custodyAccount: string;
  rewardPoolAccount: string;

  minLockAmount: bigint;
  liquidationsEnabled: boolean;
  liquidationPenaltyNumerator: bigint;
  liquidationPenaltyDenominator: bigint;
  maxReplayWeeks: number;
  maxEmissionRate: bigint;
  baseURI: string;

  scheduler: SchedulerConfig;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): ServiceConfig {
  const governor = env.GOVERNOR_ADDRESS || 'governor';

  const storeBackend = env.STORE_BACKEND || 'sqlite';
  if (storeBackend !== 'sqlite' && storeBackend !== 'memory') {
    throw new Error(`Invalid STORE_BACKEND: ${storeBackend} (expected sqlite or memory)`);
  }

  const numerator = readBigInt(env, 'LIQUIDATION_PENALTY_NUMERATOR', DEFAULT_LIQUIDATION_PENALTY_NUMERATOR);
  const denominator = readBigInt(
    env,
    'LIQUIDATION_PENALTY_DENOMINATOR',
    DEFAULT_LIQUIDATION_PENALTY_DENOMINATOR
  );
  if (denominator === 0n || numerator > denominator) {
    throw new Error(`Invalid liquidation penalty: ${numerator}/${denominator}`);
  }

  const maxReplayWeeks = readInt(env, 'MAX_REPLAY_WEEKS', DEFAULT_MAX_REPLAY_WEEKS);
  if (maxReplayWeeks < 1) {
    throw new Error(`Invalid MAX_REPLAY_WEEKS: ${maxReplayWeeks}`);
  }

  return {
    port: readInt(env, 'PORT', 3000),
    storeBackend,
    dbPath: env.DB_PATH || undefined,
    adminKey: env.ADMIN_KEY || 'test-admin-key',

    governor,
    treasury: env.TREASURY_ADDRESS || governor,
    custodyAccount: env.CUSTODY_ACCOUNT || 'escrow-custody',
    rewardPoolAccount: env.REWARD_POOL_ACCOUNT || 'reward-pool',

    minLockAmount: env.MIN_LOCK_AMOUNT ? readTokens(env, 'MIN_LOCK_AMOUNT') : TOKEN_UNITS,
    liquidationsEnabled: env.LIQUIDATIONS_ENABLED === 'true',
    liquidationPenaltyNumerator: numerator,
    liquidationPenaltyDenominator: denominator,
    maxReplayWeeks,
    maxEmissionRate: readBigInt(env, 'MAX_EMISSION_RATE', DEFAULT_MAX_EMISSION_RATE),
    baseURI: env.BASE_URI || '',

    scheduler: {
      enabled: env.SCHEDULER_ENABLED === 'true',
      heartbeatCron: env.HEARTBEAT_CRON || '5 0 * * *',
      timezone: env.SCHEDULER_TIMEZONE || 'UTC',
    },
  };
}

function readInt(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (!raw) return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new Error(`Invalid ${name}: ${raw} (expected a non-negative integer)`);
  }
  return parseInt(raw, 10);
}

function readBigInt(env: NodeJS.ProcessEnv, name: string, fallback: bigint): bigint {
  const raw = env[name];
  if (!raw) return fallback;
  if (!/^\d+$/.test(raw)) {
    throw new Error(`Invalid ${name}: ${raw} (expected a non-negative integer)`);
  }
  return BigInt(raw);
}

/** Decimal token amount, e.g. "1" or "0.5" */
function readTokens(env: NodeJS.ProcessEnv, name: string): bigint {
  const raw = env[name] ?? '';
  try {
    return toTokenUnits(raw);
  } catch {
    throw new Error(`Invalid ${name}: ${raw} (expected a decimal token amount)`);
  }
}
