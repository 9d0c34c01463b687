/**
 * Reward Accrual Engine
 *
 * Rewards are settled per position in whole days. For each midnight since
 * the last settlement the position's historical voting power is multiplied by
 * the emission rates in force that day:
 *
 *   power * (baseRate + quality * nodeRate / 10) / 1e18
 *
 * where `quality` is the attached node's 0..10 score, counted only while the
 * position's power meets the node reward threshold. Rates, the threshold and
 * quality are all step functions, hence the day-by-day walk.
 */

import { Checkpoint, MAXTIME, MULTIPLIER, ONE_DAY, floorToMidnight } from '../types';
import { toUint256 } from '../fixedPoint';
import { ErrorCodes, LedgerError } from '../errors';
import { pushCheckpoint, upperLookup } from '../checkpoints';
import { IClock, IFungibleAsset, INodeProperties, IRewardsOracle } from '../collaborators';
import {
  IVotingPowerSource,
  LedgerEvent,
  LedgerEventType,
  RewardsSettings,
  RewardsState,
  createEmptyRewardsState,
} from './serviceTypes';
import { StateGuard, requireGovernor } from './stateGuard';

export interface RewardsOptions {
  escrow: IVotingPowerSource;
  token: IFungibleAsset;
  clock: IClock;
  settings: RewardsSettings;
  nodeProperties?: INodeProperties;
  /** Previously persisted state to resume from */
  state?: RewardsState;
}

export type RateSeries = 'baseEmissionRate' | 'nodeEmissionRate' | 'nodeRewardThreshold';

const RATE_SERIES: RateSeries[] = ['baseEmissionRate', 'nodeEmissionRate', 'nodeRewardThreshold'];

const RATE_EVENTS: Record<RateSeries, LedgerEventType> = {
  baseEmissionRate: 'BASE_EMISSION_RATE_CHANGE',
  nodeEmissionRate: 'NODE_EMISSION_RATE_CHANGE',
  nodeRewardThreshold: 'NODE_REWARD_THRESHOLD_CHANGE',
};

export class Rewards implements IRewardsOracle {
  private state: RewardsState;
  private readonly guard = new StateGuard<RewardsState>(
    () => this.state,
    state => {
      this.state = state;
    }
  );
  private readonly escrow: IVotingPowerSource;
  private readonly token: IFungibleAsset;
  private readonly clock: IClock;
  private nodeProperties?: INodeProperties;

  constructor(options: RewardsOptions) {
    this.escrow = options.escrow;
    this.token = options.token;
    this.clock = options.clock;
    this.nodeProperties = options.nodeProperties;
    this.state =
      options.state ??
      createEmptyRewardsState(options.settings, floorToMidnight(options.clock.now()));
  }

  // ---------------------------------------------------------------------------
  // Accrual
  // ---------------------------------------------------------------------------

  /** Amount owed to a position up to the latest midnight. Read-only. */
  unclaimedRewards(positionId: number): bigint {
    return this.accrue(positionId);
  }

  /**
   * Pay everything owed to `recipient`. Only the position owner may claim.
   * Returns the amount paid.
   */
  claimRewards(caller: string, positionId: number, recipient: string): bigint {
    return this.guard.nonReentrant(() =>
      this.guard.mutate(() => {
        this.requireOwner(caller, positionId);
        if (!recipient) {
          throw new LedgerError(ErrorCodes.ZERO_ADDRESS, 'Recipient is required');
        }
        const owed = this.settle(positionId);

        if (!this.token.transfer(this.state.settings.poolAccount, recipient, owed)) {
          throw new LedgerError(
            ErrorCodes.TRANSFER_FAILED,
            `Reward transfer of ${owed} to ${recipient} failed`,
            { recipient, amount: owed.toString() }
          );
        }

        this.emit('CLAIM', {
          accountId: caller,
          positionId,
          details: { recipient, amount: owed.toString(), compounded: false },
        });
        return owed;
      })
    );
  }

  /**
   * Settle what a position is owed and lock it into the same position.
   * The pool account must have approved the escrow's custody account.
   */
  compoundLockRewards(caller: string, positionId: number): bigint {
    return this.guard.nonReentrant(() =>
      this.guard.mutate(() => {
        this.requireOwner(caller, positionId);
        const owed = this.settle(positionId);

        this.escrow.depositFor(this.state.settings.poolAccount, positionId, owed);

        this.emit('CLAIM', {
          accountId: caller,
          positionId,
          details: { recipient: caller, amount: owed.toString(), compounded: true },
        });
        return owed;
      })
    );
  }

  /** Advance the latest settled midnight to today. */
  updateLatestMidnight(): number {
    const midnight = floorToMidnight(this.clock.now());
    if (midnight > this.state.latestMidnight) {
      this.state.latestMidnight = midnight;
    }
    return this.state.latestMidnight;
  }

  get genesis(): number {
    return this.state.genesis;
  }

  get latestMidnight(): number {
    return this.state.latestMidnight;
  }

  lastClaim(positionId: number): number | undefined {
    return this.state.lastClaim.get(positionId);
  }

  // ---------------------------------------------------------------------------
  // Emission parameters
  // ---------------------------------------------------------------------------

  setBaseEmissionRate(caller: string, rate: bigint): void {
    this.setRate(caller, 'baseEmissionRate', rate);
  }

  setNodeEmissionRate(caller: string, rate: bigint): void {
    this.setRate(caller, 'nodeEmissionRate', rate);
  }

  setNodeRewardThreshold(caller: string, threshold: bigint): void {
    this.setRate(caller, 'nodeRewardThreshold', threshold);
  }

  /** Set any subset of the three series in one step; a rejected value leaves all of them unchanged. */
  setEmissionParameters(caller: string, changes: Partial<Record<RateSeries, bigint>>): void {
    this.guard.mutate(() => {
      for (const series of RATE_SERIES) {
        const value = changes[series];
        if (value !== undefined) this.setRate(caller, series, value);
      }
    });
  }

  baseEmissionRateAt(timestamp: number): bigint {
    return this.rateAt('baseEmissionRate', timestamp);
  }

  nodeEmissionRateAt(timestamp: number): bigint {
    return this.rateAt('nodeEmissionRate', timestamp);
  }

  nodeRewardThresholdAt(timestamp: number): bigint {
    return this.rateAt('nodeRewardThreshold', timestamp);
  }

  baseEmissionRate(): bigint {
    return this.baseEmissionRateAt(this.clock.now());
  }

  nodeEmissionRate(): bigint {
    return this.nodeEmissionRateAt(this.clock.now());
  }

  nodeRewardThreshold(): bigint {
    return this.nodeRewardThresholdAt(this.clock.now());
  }

  // ---------------------------------------------------------------------------
  // Governance
  // ---------------------------------------------------------------------------

  setNodeProperties(caller: string, nodeProperties: INodeProperties): void {
    requireGovernor(this.state, caller);
    this.nodeProperties = nodeProperties;
  }

  setGovernor(caller: string, governor: string): void {
    this.guard.mutate(() => {
      requireGovernor(this.state, caller);
      this.state.settings = { ...this.state.settings, governor };
      this.emit('SETTINGS_CHANGED', { accountId: caller, details: { governor } });
    });
  }

  /** Recover funds from the reward pool. */
  withdrawToken(caller: string, to: string, amount: bigint): void {
    this.guard.nonReentrant(() =>
      this.guard.mutate(() => {
        requireGovernor(this.state, caller);
        const pool = this.state.settings.poolAccount;
        this.requirePoolBalance(toUint256(amount));
        if (!this.token.transfer(pool, to, amount)) {
          throw new LedgerError(
            ErrorCodes.TRANSFER_FAILED,
            `Withdrawal of ${amount} to ${to} failed`,
            { to, amount: amount.toString() }
          );
        }
        this.emit('REWARD_WITHDRAWAL', {
          accountId: caller,
          details: { to, amount: amount.toString() },
        });
      })
    );
  }

  get settings(): RewardsSettings {
    return { ...this.state.settings };
  }

  events(): LedgerEvent[] {
    return [...this.state.events];
  }

  /** Deep copy of the full state, for persistence */
  exportState(): RewardsState {
    return structuredClone(this.state);
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  /**
   * Walk each midnight after the last settlement up to today's midnight.
   * The first settlement of a position starts from the midnight of its
   * creation, never from genesis. Accrual stops at the first day power drops
   * to zero after being positive, and after at most MAXTIME of elapsed time.
   */
  private accrue(positionId: number): bigint {
    const createdAt = this.escrow.createdAt(positionId);
    if (createdAt === undefined) {
      return 0n;
    }
    const latest = floorToMidnight(this.clock.now());
    const last = this.state.lastClaim.get(positionId) ?? floorToMidnight(createdAt);

    let total = 0n;
    let previousPower = this.escrow.votingPowerOf(positionId, last);

    for (let day = last + ONE_DAY; day <= latest; day += ONE_DAY) {
      const power = this.escrow.votingPowerOf(positionId, day);
      if (power === 0n && previousPower !== 0n) {
        break;
      }
      if (day - last > MAXTIME) {
        break;
      }

      let quality = 0;
      if (this.nodeProperties && power >= this.nodeRewardThresholdAt(day)) {
        quality = this.nodeProperties.nodeQualityOf(positionId, day);
      }

      const rate =
        this.baseEmissionRateAt(day) + (BigInt(quality) * this.nodeEmissionRateAt(day)) / 10n;
      total += (power * rate) / MULTIPLIER;
      previousPower = power;
    }

    return total;
  }

  /** Compute what is owed, check the pool covers it, and mark it settled. */
  private settle(positionId: number): bigint {
    const owed = this.accrue(positionId);
    if (owed === 0n) {
      throw new LedgerError(
        ErrorCodes.NO_UNCLAIMED_REWARDS,
        `Position ${positionId} has no unclaimed rewards`,
        { positionId }
      );
    }
    this.requirePoolBalance(owed);

    const midnight = this.updateLatestMidnight();
    this.state.lastClaim.set(positionId, midnight);
    return owed;
  }

  private setRate(caller: string, series: RateSeries, value: bigint): void {
    this.guard.mutate(() => {
      requireGovernor(this.state, caller);
      toUint256(value);
      if (series !== 'nodeRewardThreshold' && value > this.state.settings.maxEmissionRate) {
        throw new LedgerError(
          ErrorCodes.EMISSION_RATE_CHANGE_TOO_HIGH,
          `Emission rate ${value} exceeds the ceiling ${this.state.settings.maxEmissionRate}`,
          { rate: value.toString(), max: this.state.settings.maxEmissionRate.toString() }
        );
      }
      const checkpoints: Checkpoint<bigint>[] = this.state[series];
      const previous = pushCheckpoint(checkpoints, this.clock.now(), value, 'replace') ?? 0n;
      this.emit(RATE_EVENTS[series], {
        accountId: caller,
        details: { oldValue: previous.toString(), newValue: value.toString() },
      });
    });
  }

  private rateAt(series: RateSeries, timestamp: number): bigint {
    return upperLookup(this.state[series], timestamp) ?? 0n;
  }

  private requireOwner(caller: string, positionId: number): void {
    const owner = this.escrow.ownerOf(positionId);
    if (owner === undefined) {
      throw new LedgerError(ErrorCodes.NO_LOCK_FOUND, `Position ${positionId} does not exist`, {
        positionId,
      });
    }
    if (owner !== caller) {
      throw new LedgerError(ErrorCodes.NOT_OWNER, `${caller} does not own position ${positionId}`, {
        caller,
        positionId,
      });
    }
  }

  private requirePoolBalance(amount: bigint): void {
    const balance = this.token.balanceOf(this.state.settings.poolAccount);
    if (balance < amount) {
      throw new LedgerError(
        ErrorCodes.INSUFFICIENT_CONTRACT_BALANCE,
        `Reward pool holds ${balance}, needs ${amount}`,
        { balance: balance.toString(), required: amount.toString() }
      );
    }
  }

  private emit(
    eventType: LedgerEventType,
    fields: Pick<LedgerEvent, 'details'> & Partial<Pick<LedgerEvent, 'accountId' | 'positionId'>>
  ): void {
    this.state.events.push({
      eventType,
      timestamp: this.clock.now(),
      blk: this.clock.blockNumber(),
      ...fields,
    });
  }
}
