/**
 * ve-ledger - Core Types
 */

/** Seconds in one week; lock end times are always a multiple of this */
export const WEEK = 7 * 86400;

/** Seconds in one day; reward settlement granularity */
export const ONE_DAY = 86400;

/** Maximum lock duration: 4 years */
export const MAXTIME = 4 * 365 * 86400;
export const iMAXTIME = BigInt(MAXTIME);

/** 1e18 scaling factor (block interpolation, emission rates) */
export const MULTIPLIER = 10n ** 18n;

/** Default bound on weekly steps replayed by a single checkpoint (~5 years) */
export const DEFAULT_MAX_REPLAY_WEEKS = 255;

/**
 * Tags carried by DEPOSIT events so that every path that changes a lock
 * can be told apart downstream.
 */
export enum DepositType {
  DEPOSIT_FOR = 'DEPOSIT_FOR',
  CREATE_LOCK = 'CREATE_LOCK',
  INCREASE_LOCK_AMOUNT = 'INCREASE_LOCK_AMOUNT',
  INCREASE_UNLOCK_TIME = 'INCREASE_UNLOCK_TIME',
  MERGE = 'MERGE',
  SPLIT = 'SPLIT',
}

/**
 * Locked amount and unlock time of a position.
 * `end` is 0 once the position is withdrawn or liquidated.
 */
export interface LockedBalance {
  amount: bigint; // signed, range-checked to int128
  end: number;
}

/**
 * A (bias, slope) sample. `bias` is voting power at `ts`, `slope` the rate
 * it decays per second. `blk` is the block height the sample belongs to.
 */
export interface Point {
  bias: bigint;
  slope: bigint;
  ts: number;
  blk: number;
}

/** One entry of a timestamp-keyed checkpoint series */
export interface Checkpoint<V> {
  key: number;
  value: V;
}

export function emptyLockedBalance(): LockedBalance {
  return { amount: 0n, end: 0 };
}

export function floorToWeek(t: number): number {
  return Math.floor(t / WEEK) * WEEK;
}

export function floorToMidnight(t: number): number {
  return t - (t % ONE_DAY);
}
