/**
 * Request parsing and error responses shared by the routers.
 */

import type { Response } from 'express';
import { isLedgerError } from '../errors';
import { toTokenUnits } from '../fixedPoint';
import { ErrorCode, ErrorCodes, LEDGER_ERROR_STATUS } from './types';

export function sendError(res: Response, status: number, error: string, code: ErrorCode): void {
  res.status(status).json({ success: false, error, code });
}

/**
 * Reply for a failed engine call. LedgerErrors map to their status; anything
 * else is logged and reported as a 500.
 */
export function handleRouteError(res: Response, err: unknown): void {
  if (isLedgerError(err)) {
    res.status(LEDGER_ERROR_STATUS[err.code]).json({
      success: false,
      error: err.message,
      code: err.code,
      details: err.details,
    });
    return;
  }
  console.error('Unhandled error:', err);
  sendError(res, 500, 'Internal server error', ErrorCodes.INTERNAL_ERROR);
}

/** Decimal token amount ("1000", "12.5") or whole-token number → base units */
export function parseTokenAmount(value: unknown): bigint | undefined {
  if (typeof value !== 'string' && typeof value !== 'number') return undefined;
  try {
    return toTokenUnits(value);
  } catch {
    return undefined;
  }
}

/** Integer string of raw base units or 1e18-scaled rates */
export function parseUnits(value: unknown): bigint | undefined {
  if (typeof value === 'string' && /^\d+$/.test(value)) return BigInt(value);
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) return BigInt(value);
  return undefined;
}

export function parseNonNegativeInt(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isSafeInteger(value) && value >= 0) return value;
  if (typeof value === 'string' && /^\d+$/.test(value)) {
    const parsed = parseInt(value, 10);
    return Number.isSafeInteger(parsed) ? parsed : undefined;
  }
  return undefined;
}

export function parsePositionId(raw: unknown): number | undefined {
  const id = parseNonNegativeInt(raw);
  return id !== undefined && id > 0 ? id : undefined;
}

/** Optional `?t=` query: absent means `fallback`, malformed means undefined */
export function parseTimestampQuery(raw: unknown, fallback: number): number | undefined {
  if (raw === undefined) return fallback;
  return parseNonNegativeInt(raw);
}

/** Validate accountId format: 1-64 chars, no control characters */
export function isValidAccountId(id: unknown): id is string {
  return typeof id === 'string' && id.length >= 1 && id.length <= 64 && !/[\x00-\x1f]/.test(id);
}
