/**
 * Point History Ledger and Slope-Change Schedule.
 *
 * The global point history is replayed forward one week at a time from the
 * last recorded point, applying the slope changes scheduled at each week
 * boundary. Bias and slope are clamped at zero on every step because integer
 * truncation in per-position slopes can push the aggregate slightly below
 * zero. The replay is bounded by `maxReplayWeeks`: if a gap is longer, the
 * aggregate lags behind until further checkpoints catch it up.
 */

import { MULTIPLIER, Point, WEEK, floorToWeek } from '../types';
import { clampZero } from '../fixedPoint';
import { EscrowState } from './serviceTypes';

export function copyPoint(point: Point): Point {
  return { bias: point.bias, slope: point.slope, ts: point.ts, blk: point.blk };
}

export function slopeChangeAt(state: EscrowState, timestamp: number): bigint {
  return state.slopeChanges.get(timestamp) ?? 0n;
}

/**
 * Replay the global point from the latest epoch up to `now`, recording one
 * point per week boundary crossed. Returns the point at `now` and the epoch
 * it belongs to; neither is stored yet (see `commitGlobalPoint`).
 */
export function advanceGlobalPoint(
  state: EscrowState,
  now: number,
  blockNumber: number
): { lastPoint: Point; epoch: number } {
  let epoch = state.epoch;
  const lastPoint = copyPoint(state.pointHistory[epoch]);
  const initialLastPoint = copyPoint(lastPoint);
  let lastCheckpoint = lastPoint.ts;

  let blockSlope = 0n;
  if (now > lastPoint.ts) {
    blockSlope = (MULTIPLIER * BigInt(blockNumber - lastPoint.blk)) / BigInt(now - lastPoint.ts);
  }

  let tI = floorToWeek(lastCheckpoint);
  for (let i = 0; i < state.settings.maxReplayWeeks; i++) {
    tI += WEEK;
    let dSlope = 0n;
    if (tI > now) {
      tI = now;
    } else {
      dSlope = slopeChangeAt(state, tI);
    }
    lastPoint.bias = clampZero(lastPoint.bias - lastPoint.slope * BigInt(tI - lastCheckpoint));
    lastPoint.slope = clampZero(lastPoint.slope + dSlope);
    lastCheckpoint = tI;
    lastPoint.ts = tI;
    lastPoint.blk =
      initialLastPoint.blk +
      Number((blockSlope * BigInt(tI - initialLastPoint.ts)) / MULTIPLIER);
    epoch += 1;
    if (tI === now) {
      lastPoint.blk = blockNumber;
      break;
    }
    state.pointHistory[epoch] = copyPoint(lastPoint);
  }

  return { lastPoint, epoch };
}

/**
 * Store the point produced by `advanceGlobalPoint`. A point carrying the
 * same timestamp as the previous epoch overwrites it, so repeated
 * checkpoints within one instant leave a single entry.
 */
export function commitGlobalPoint(state: EscrowState, lastPoint: Point, epoch: number): void {
  if (epoch !== 1 && state.pointHistory[epoch - 1].ts === lastPoint.ts) {
    state.pointHistory[epoch - 1] = copyPoint(lastPoint);
  } else {
    state.epoch = epoch;
    state.pointHistory[epoch] = copyPoint(lastPoint);
  }
}

/**
 * Latest global epoch whose point is at or before `timestamp`, or 0.
 */
export function findPastGlobalPointIndex(state: EscrowState, timestamp: number): number {
  const epoch = state.epoch;
  if (epoch === 0) return 0;
  if (state.pointHistory[epoch].ts <= timestamp) return epoch;
  if (state.pointHistory[1].ts > timestamp) return 0;

  let lower = 1;
  let upper = epoch;
  while (upper > lower) {
    const center = upper - Math.floor((upper - lower) / 2);
    const point = state.pointHistory[center];
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
 * Aggregate bias at `timestamp`, simulated forward from `point` with the
 * same weekly steps and clamping as the checkpoint replay. Read-only.
 */
export function supplyAt(state: EscrowState, point: Point, timestamp: number): bigint {
  const lastPoint = copyPoint(point);
  let tI = floorToWeek(lastPoint.ts);
  for (let i = 0; i < state.settings.maxReplayWeeks; i++) {
    tI += WEEK;
    let dSlope = 0n;
    if (tI > timestamp) {
      tI = timestamp;
    } else {
      dSlope = slopeChangeAt(state, tI);
    }
    lastPoint.bias = clampZero(lastPoint.bias - lastPoint.slope * BigInt(tI - lastPoint.ts));
    if (tI === timestamp) {
      break;
    }
    lastPoint.slope = clampZero(lastPoint.slope + dSlope);
    lastPoint.ts = tI;
  }
  return lastPoint.bias;
}

/**
 * Aggregate voting power at `timestamp`.
 */
export function totalPowerAt(state: EscrowState, timestamp: number): bigint {
  const epoch = findPastGlobalPointIndex(state, timestamp);
  if (epoch === 0) return 0n;
  return supplyAt(state, state.pointHistory[epoch], timestamp);
}
