/**
 * Append-only, timestamp-keyed checkpoint series.
 *
 * A series is a plain array of { key, value } ordered by key, so it can be
 * cloned and serialized with the rest of the ledger state. Lookups binary
 * search for the latest entry at or before a timestamp. Writes must be
 * monotonic: a key older than the last entry always fails. A second write at
 * the last key depends on the series' policy:
 *
 *  - 'replace': the last value is overwritten (emission-rate style series)
 *  - 'reject':  the write fails (delegation sets)
 */

import { Checkpoint } from './types';
import { ErrorCodes, LedgerError } from './errors';

export type DuplicateKeyPolicy = 'replace' | 'reject';

/**
 * Append (or, under 'replace', overwrite) the value at `key`.
 * Returns the previous latest value.
 */
export function pushCheckpoint<V>(
  series: Checkpoint<V>[],
  key: number,
  value: V,
  policy: DuplicateKeyPolicy
): V | undefined {
  const last = latestCheckpoint(series);

  if (last) {
    if (key < last.key) {
      throw new LedgerError(
        ErrorCodes.CHECKPOINT_UNORDERED_INSERTION,
        `Checkpoint at ${key} is older than latest checkpoint ${last.key}`,
        { key, latest: last.key }
      );
    }
    if (key === last.key) {
      if (policy === 'reject') {
        throw new LedgerError(
          ErrorCodes.FLASH_PROTECTION,
          `A checkpoint already exists at ${key}`,
          { key }
        );
      }
      series[series.length - 1] = { key, value };
      return last.value;
    }
  }

  series.push({ key, value });
  return last?.value;
}

/** Value of the latest checkpoint with key <= `key` */
export function upperLookup<V>(series: Checkpoint<V>[], key: number): V | undefined {
  const index = upperBinaryLookup(series, key);
  return index === 0 ? undefined : series[index - 1].value;
}

export function latestCheckpoint<V>(series: Checkpoint<V>[]): Checkpoint<V> | undefined {
  return series.length > 0 ? series[series.length - 1] : undefined;
}

/** Index of the first entry whose key is strictly greater than `key` */
function upperBinaryLookup<V>(series: Checkpoint<V>[], key: number): number {
  let low = 0;
  let high = series.length;
  while (low < high) {
    const mid = (low + high) >>> 1;
    if (series[mid].key > key) {
      high = mid;
    } else {
      low = mid + 1;
    }
  }
  return high;
}
