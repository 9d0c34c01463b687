import { loadConfig } from '../config';
import { toTokenUnits } from '../../fixedPoint';

describe('loadConfig', () => {
  it('should apply defaults for an empty environment', () => {
    const config = loadConfig({});

    expect(config.port).toBe(3000);
    expect(config.storeBackend).toBe('sqlite');
    expect(config.dbPath).toBeUndefined();
    expect(config.adminKey).toBe('test-admin-key');
    expect(config.governor).toBe('governor');
    expect(config.treasury).toBe('governor');
    expect(config.custodyAccount).toBe('escrow-custody');
    expect(config.rewardPoolAccount).toBe('reward-pool');
    expect(config.minLockAmount).toBe(toTokenUnits(1));
    expect(config.liquidationsEnabled).toBe(false);
    expect(config.liquidationPenaltyNumerator).toBe(50_000n);
    expect(config.liquidationPenaltyDenominator).toBe(100_000n);
    expect(config.maxReplayWeeks).toBe(255);
    expect(config.maxEmissionRate).toBe(10n ** 16n);
    expect(config.scheduler).toEqual({ enabled: false, heartbeatCron: '5 0 * * *', timezone: 'UTC' });
  });

  it('should read overrides', () => {
    const config = loadConfig({
      PORT: '8080',
      STORE_BACKEND: 'memory',
      GOVERNOR_ADDRESS: 'gov',
      TREASURY_ADDRESS: 'vault',
      MIN_LOCK_AMOUNT: '0.5',
      LIQUIDATIONS_ENABLED: 'true',
      LIQUIDATION_PENALTY_NUMERATOR: '1',
      LIQUIDATION_PENALTY_DENOMINATOR: '4',
      SCHEDULER_ENABLED: 'true',
      HEARTBEAT_CRON: '0 * * * *',
    });

    expect(config.port).toBe(8080);
    expect(config.storeBackend).toBe('memory');
    expect(config.governor).toBe('gov');
    expect(config.treasury).toBe('vault');
    expect(config.minLockAmount).toBe(toTokenUnits('0.5'));
    expect(config.liquidationsEnabled).toBe(true);
    expect(config.liquidationPenaltyNumerator).toBe(1n);
    expect(config.liquidationPenaltyDenominator).toBe(4n);
    expect(config.scheduler.enabled).toBe(true);
    expect(config.scheduler.heartbeatCron).toBe('0 * * * *');
  });

  it('should fail on malformed values', () => {
    expect(() => loadConfig({ PORT: 'eighty' })).toThrow('Invalid PORT: eighty');
    expect(() => loadConfig({ STORE_BACKEND: 'postgres' })).toThrow('Invalid STORE_BACKEND: postgres');
    expect(() => loadConfig({ MIN_LOCK_AMOUNT: 'lots' })).toThrow('Invalid MIN_LOCK_AMOUNT: lots');
    expect(() => loadConfig({ MAX_REPLAY_WEEKS: '0' })).toThrow('Invalid MAX_REPLAY_WEEKS: 0');
  });

  it('should reject a penalty above 100%', () => {
    expect(() =>
      loadConfig({ LIQUIDATION_PENALTY_NUMERATOR: '5', LIQUIDATION_PENALTY_DENOMINATOR: '4' })
    ).toThrow('Invalid liquidation penalty: 5/4');
  });
});
