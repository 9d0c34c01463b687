import { MULTIPLIER, ONE_DAY, WEEK } from '../types';
import { toTokenUnits } from '../fixedPoint';
import { ErrorCodes } from '../errors';
import { Rewards } from './rewardsService';
import { CUSTODY, GOVERNOR, Harness, POOL, T0, catchLedgerError, createHarness } from './testHelpers';

const AMOUNT = toTokenUnits(1000);
const BASE_RATE = 10n ** 15n; // 0.1% of voting power per day
const NODE_RATE = 2n * 10n ** 15n;

describe('Rewards', () => {
  let h: Harness;
  let rewards: Rewards;

  /** Sum of power * rate / 1e18 over the given midnights */
  function owedFor(days: number[], rate: (day: number) => bigint): bigint {
    return days.reduce(
      (total, day) => total + (h.escrow.votingPowerOf(1, day) * rate(day)) / MULTIPLIER,
      0n
    );
  }

  beforeEach(() => {
    h = createHarness({ withRewards: true });
    if (!h.rewards) throw new Error('harness built without rewards');
    rewards = h.rewards;
    h.fund('alice', 10_000);
    rewards.setBaseEmissionRate(GOVERNOR, BASE_RATE);
  });

  describe('accrual', () => {
    it('should start the engine at the midnight it was created', () => {
      expect(rewards.genesis).toBe(T0);
      expect(rewards.latestMidnight).toBe(T0);
    });

    it('should accrue the base rate for each elapsed midnight', () => {
      h.escrow.createLock({ caller: 'alice', amount: AMOUNT, duration: 52 * WEEK });
      h.clock.advance(2 * ONE_DAY + 3600);

      const expected = owedFor([T0 + ONE_DAY, T0 + 2 * ONE_DAY], () => BASE_RATE);
      expect(expected).toBeGreaterThan(0n);
      expect(rewards.unclaimedRewards(1)).toBe(expected);
    });

    it('should owe nothing before the first midnight', () => {
      h.escrow.createLock({ caller: 'alice', amount: AMOUNT, duration: 52 * WEEK });
      h.clock.advance(ONE_DAY - 1);

      expect(rewards.unclaimedRewards(1)).toBe(0n);
    });

    it('should owe nothing to an unknown position', () => {
      expect(rewards.unclaimedRewards(42)).toBe(0n);
    });

    it('should add the node rate scaled by quality', () => {
      rewards.setNodeEmissionRate(GOVERNOR, NODE_RATE);
      h.escrow.createLock({ caller: 'alice', amount: AMOUNT, duration: 52 * WEEK });
      h.nodes.setNodeQuality(1, 5, T0);
      h.clock.advance(2 * ONE_DAY);

      const expected = owedFor(
        [T0 + ONE_DAY, T0 + 2 * ONE_DAY],
        () => BASE_RATE + (5n * NODE_RATE) / 10n
      );
      expect(rewards.unclaimedRewards(1)).toBe(expected);
    });

    it('should ignore node quality below the power threshold', () => {
      rewards.setNodeEmissionRate(GOVERNOR, NODE_RATE);
      rewards.setNodeRewardThreshold(GOVERNOR, toTokenUnits(10_000));
      h.escrow.createLock({ caller: 'alice', amount: AMOUNT, duration: 52 * WEEK });
      h.nodes.setNodeQuality(1, 10, T0);
      h.clock.advance(2 * ONE_DAY);

      const expected = owedFor([T0 + ONE_DAY, T0 + 2 * ONE_DAY], () => BASE_RATE);
      expect(rewards.unclaimedRewards(1)).toBe(expected);
    });

    it('should use the rate in force on each day', () => {
      h.escrow.createLock({ caller: 'alice', amount: AMOUNT, duration: 52 * WEEK });
      h.clock.advance(ONE_DAY + 60);
      rewards.setBaseEmissionRate(GOVERNOR, 2n * BASE_RATE);
      h.clock.advance(ONE_DAY);

      const expected = owedFor([T0 + ONE_DAY, T0 + 2 * ONE_DAY], day =>
        day === T0 + ONE_DAY ? BASE_RATE : 2n * BASE_RATE
      );
      expect(rewards.unclaimedRewards(1)).toBe(expected);
    });

    it('should stop at the first day the power reaches zero', () => {
      h.escrow.createLock({ caller: 'alice', amount: AMOUNT, duration: WEEK });
      h.clock.advance(10 * ONE_DAY);

      const days = [1, 2, 3, 4, 5, 6].map(k => T0 + k * ONE_DAY);
      expect(rewards.unclaimedRewards(1)).toBe(owedFor(days, () => BASE_RATE));
    });

    it('should grow day by day while the lock has power', () => {
      h.escrow.createLock({ caller: 'alice', amount: AMOUNT, duration: 4 * WEEK });
      let previous = rewards.unclaimedRewards(1);
      for (let day = 1; day <= 27; day++) {
        h.clock.setTime(T0 + day * ONE_DAY + 60);
        const owed = rewards.unclaimedRewards(1);
        expect(owed).toBeGreaterThan(previous);
        previous = owed;
      }

      h.clock.setTime(T0 + 40 * ONE_DAY);
      expect(rewards.unclaimedRewards(1)).toBe(previous);
    });

    it('should pay nothing after the zero-power day once settled past it', () => {
      h.token.mint(POOL, toTokenUnits(1_000));
      h.escrow.createLock({ caller: 'alice', amount: AMOUNT, duration: WEEK });
      h.clock.setTime(T0 + 3 * ONE_DAY + 60);
      const first = rewards.claimRewards('alice', 1, 'alice');
      h.clock.setTime(T0 + 10 * ONE_DAY);
      const second = rewards.claimRewards('alice', 1, 'alice');

      expect(first).toBe(owedFor([1, 2, 3].map(k => T0 + k * ONE_DAY), () => BASE_RATE));
      expect(second).toBe(owedFor([4, 5, 6].map(k => T0 + k * ONE_DAY), () => BASE_RATE));
      expect(catchLedgerError(() => rewards.claimRewards('alice', 1, 'alice')).code).toBe(
        ErrorCodes.NO_UNCLAIMED_REWARDS
      );
    });

    it('should count from the creation midnight for a late position', () => {
      h.clock.advance(ONE_DAY + 5 * 3600);
      h.escrow.createLock({ caller: 'alice', amount: AMOUNT, duration: 52 * WEEK });
      h.clock.advance(2 * ONE_DAY);

      const expected = owedFor([T0 + 2 * ONE_DAY, T0 + 3 * ONE_DAY], () => BASE_RATE);
      expect(rewards.unclaimedRewards(1)).toBe(expected);
    });
  });

  describe('claimRewards', () => {
    beforeEach(() => {
      h.escrow.createLock({ caller: 'alice', amount: AMOUNT, duration: 52 * WEEK });
      h.clock.advance(2 * ONE_DAY + 3600);
    });

    it('should pay the owner from the pool and settle to the latest midnight', () => {
      h.token.mint(POOL, toTokenUnits(1_000));
      const owed = rewards.unclaimedRewards(1);

      expect(rewards.claimRewards('alice', 1, 'alice')).toBe(owed);

      expect(h.token.balanceOf('alice')).toBe(toTokenUnits(9_000) + owed);
      expect(h.token.balanceOf(POOL)).toBe(toTokenUnits(1_000) - owed);
      expect(rewards.lastClaim(1)).toBe(T0 + 2 * ONE_DAY);
      expect(rewards.latestMidnight).toBe(T0 + 2 * ONE_DAY);
      expect(rewards.unclaimedRewards(1)).toBe(0n);
      expect(rewards.events().map(e => e.eventType)).toEqual(['BASE_EMISSION_RATE_CHANGE', 'CLAIM']);
    });

    it('should send the payout to another recipient', () => {
      h.token.mint(POOL, toTokenUnits(1_000));
      const owed = rewards.claimRewards('alice', 1, 'bob');
      expect(h.token.balanceOf('bob')).toBe(owed);
    });

    it('should reject a second claim with nothing new', () => {
      h.token.mint(POOL, toTokenUnits(1_000));
      rewards.claimRewards('alice', 1, 'alice');

      expect(catchLedgerError(() => rewards.claimRewards('alice', 1, 'alice')).code).toBe(
        ErrorCodes.NO_UNCLAIMED_REWARDS
      );
    });

    it('should reject a caller who does not own the position', () => {
      expect(catchLedgerError(() => rewards.claimRewards('bob', 1, 'bob')).code).toBe(
        ErrorCodes.NOT_OWNER
      );
      expect(catchLedgerError(() => rewards.claimRewards('bob', 9, 'bob')).code).toBe(
        ErrorCodes.NO_LOCK_FOUND
      );
    });

    it('should leave nothing settled when the pool is short', () => {
      const err = catchLedgerError(() => rewards.claimRewards('alice', 1, 'alice'));

      expect(err.code).toBe(ErrorCodes.INSUFFICIENT_CONTRACT_BALANCE);
      expect(rewards.lastClaim(1)).toBeUndefined();
      expect(rewards.unclaimedRewards(1)).toBeGreaterThan(0n);
    });

    it('should pay the same total in two claims as in one', () => {
      h.token.mint(POOL, toTokenUnits(1_000));
      const first = rewards.claimRewards('alice', 1, 'alice');
      h.clock.setTime(T0 + 7 * ONE_DAY + 3600);
      const second = rewards.claimRewards('alice', 1, 'alice');

      const days = [1, 2, 3, 4, 5, 6, 7].map(k => T0 + k * ONE_DAY);
      expect(first).toBe(owedFor(days.slice(0, 2), () => BASE_RATE));
      expect(first + second).toBe(owedFor(days, () => BASE_RATE));
    });

    it('should block lock changes until rewards are claimed', () => {
      expect(catchLedgerError(() => h.escrow.increaseAmount('alice', 1, AMOUNT)).code).toBe(
        ErrorCodes.UNCLAIMED_REWARDS
      );

      h.token.mint(POOL, toTokenUnits(1_000));
      rewards.claimRewards('alice', 1, 'alice');
      h.escrow.increaseAmount('alice', 1, AMOUNT);
      expect(h.escrow.locked(1).amount).toBe(2n * AMOUNT);
    });
  });

  describe('compoundLockRewards', () => {
    it('should lock the owed amount into the same position', () => {
      h.escrow.createLock({ caller: 'alice', amount: AMOUNT, duration: 52 * WEEK });
      h.clock.advance(2 * ONE_DAY);
      h.token.mint(POOL, toTokenUnits(1_000));
      h.token.approve(POOL, CUSTODY, toTokenUnits(1_000));
      const owed = rewards.unclaimedRewards(1);

      expect(rewards.compoundLockRewards('alice', 1)).toBe(owed);

      expect(h.escrow.locked(1).amount).toBe(AMOUNT + owed);
      expect(h.escrow.supply()).toBe(AMOUNT + owed);
      expect(h.token.balanceOf(CUSTODY)).toBe(AMOUNT + owed);
      expect(h.token.balanceOf('alice')).toBe(toTokenUnits(9_000));
      expect(rewards.unclaimedRewards(1)).toBe(0n);
    });
  });

  describe('emission parameters', () => {
    it('should record rate history and report the old value', () => {
      h.clock.advance(ONE_DAY);
      rewards.setBaseEmissionRate(GOVERNOR, 3n * BASE_RATE);

      expect(rewards.baseEmissionRateAt(T0)).toBe(BASE_RATE);
      expect(rewards.baseEmissionRate()).toBe(3n * BASE_RATE);
      const last = rewards.events()[rewards.events().length - 1];
      expect(last.eventType).toBe('BASE_EMISSION_RATE_CHANGE');
      expect(last.details).toEqual({
        oldValue: BASE_RATE.toString(),
        newValue: (3n * BASE_RATE).toString(),
      });
    });

    it('should replace a rate set twice in the same instant', () => {
      rewards.setBaseEmissionRate(GOVERNOR, 2n * BASE_RATE);
      expect(rewards.baseEmissionRateAt(T0)).toBe(2n * BASE_RATE);
    });

    it('should reject a rate above the ceiling', () => {
      expect(catchLedgerError(() => rewards.setNodeEmissionRate(GOVERNOR, 10n ** 16n + 1n)).code).toBe(
        ErrorCodes.EMISSION_RATE_CHANGE_TOO_HIGH
      );
      expect(rewards.nodeEmissionRate()).toBe(0n);
    });

    it('should set several rates at once', () => {
      h.clock.advance(60);
      rewards.setEmissionParameters(GOVERNOR, {
        baseEmissionRate: 2n * BASE_RATE,
        nodeEmissionRate: NODE_RATE,
        nodeRewardThreshold: 500n,
      });

      expect(rewards.baseEmissionRate()).toBe(2n * BASE_RATE);
      expect(rewards.nodeEmissionRate()).toBe(NODE_RATE);
      expect(rewards.nodeRewardThreshold()).toBe(500n);
      expect(rewards.events().map(e => e.eventType)).toEqual([
        'BASE_EMISSION_RATE_CHANGE',
        'BASE_EMISSION_RATE_CHANGE',
        'NODE_EMISSION_RATE_CHANGE',
        'NODE_REWARD_THRESHOLD_CHANGE',
      ]);
    });

    it('should leave every rate unchanged when one of a batch is rejected', () => {
      h.clock.advance(60);
      const err = catchLedgerError(() =>
        rewards.setEmissionParameters(GOVERNOR, {
          baseEmissionRate: 12_345n,
          nodeEmissionRate: 10n ** 17n,
        })
      );

      expect(err.code).toBe(ErrorCodes.EMISSION_RATE_CHANGE_TOO_HIGH);
      expect(rewards.baseEmissionRate()).toBe(BASE_RATE);
      expect(rewards.nodeEmissionRate()).toBe(0n);
      expect(rewards.events().map(e => e.eventType)).toEqual(['BASE_EMISSION_RATE_CHANGE']);
    });

    it('should only let the governor change rates', () => {
      expect(catchLedgerError(() => rewards.setBaseEmissionRate('alice', 1n)).code).toBe(
        ErrorCodes.NOT_GOVERNOR
      );
      expect(rewards.baseEmissionRate()).toBe(BASE_RATE);
    });

    it('should roll the latest midnight forward', () => {
      h.clock.advance(2 * ONE_DAY + 3600);
      expect(rewards.updateLatestMidnight()).toBe(T0 + 2 * ONE_DAY);
      expect(rewards.latestMidnight).toBe(T0 + 2 * ONE_DAY);
    });
  });

  describe('withdrawToken', () => {
    it('should let the governor recover pool funds', () => {
      h.token.mint(POOL, toTokenUnits(100));
      rewards.withdrawToken(GOVERNOR, 'treasury', toTokenUnits(40));

      expect(h.token.balanceOf('treasury')).toBe(toTokenUnits(40));
      expect(h.token.balanceOf(POOL)).toBe(toTokenUnits(60));
    });

    it('should reject withdrawing more than the pool holds', () => {
      h.token.mint(POOL, toTokenUnits(100));
      expect(
        catchLedgerError(() => rewards.withdrawToken(GOVERNOR, 'treasury', toTokenUnits(101))).code
      ).toBe(ErrorCodes.INSUFFICIENT_CONTRACT_BALANCE);
    });
  });
});
