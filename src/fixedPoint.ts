/**
 * Fixed-Point Arithmetic for Deterministic Token Calculations
 *
 * Token amounts are bigint base units with 18 decimals
 * (1 token = 1,000,000,000,000,000,000 units). Every narrowing into a
 * fixed-width field goes through a checked cast that reports the offending
 * value instead of wrapping.
 */

import { ErrorCodes, LedgerError } from './errors';

export const TOKEN_DECIMALS = 18;

/** Base units per token */
export const TOKEN_UNITS = 10n ** BigInt(TOKEN_DECIMALS);

const INT128_MAX = (1n << 127n) - 1n;
const INT128_MIN = -(1n << 127n);
const UINT48_MAX = (1 << 24) * (1 << 24) - 1;
const UINT256_MAX = (1n << 256n) - 1n;

/**
 * Convert a whole or decimal token amount to base units.
 *
 * Accepts a number (whole tokens only, to stay exact) or a decimal string
 * such as "12.5".
 *
 * @throws Error on negative, non-finite or over-precise input
 */
export function toTokenUnits(tokens: number | string): bigint {
  if (typeof tokens === 'number') {
    if (!Number.isSafeInteger(tokens) || tokens < 0) {
      throw new Error(`Token amount must be a non-negative whole number: ${tokens}`);
    }
    return BigInt(tokens) * TOKEN_UNITS;
  }

  const match = /^(\d+)(?:\.(\d+))?$/.exec(tokens.trim());
  if (!match) {
    throw new Error(`Invalid token amount: ${tokens}`);
  }
  const whole = match[1];
  const fraction = match[2] ?? '';
  if (fraction.length > TOKEN_DECIMALS) {
    throw new Error(`Token amount has more than ${TOKEN_DECIMALS} decimals: ${tokens}`);
  }
  return BigInt(whole) * TOKEN_UNITS + BigInt(fraction.padEnd(TOKEN_DECIMALS, '0') || '0');
}

/**
 * Convert base units to a floating-point token amount. Lossy; for display
 * and approximate assertions only.
 */
export function toTokens(units: bigint): number {
  return Number(units) / Number(TOKEN_UNITS);
}

/**
 * Whole tokens contained in `units`, truncated toward zero.
 */
export function wholeTokens(units: bigint): bigint {
  return units / TOKEN_UNITS;
}

/**
 * Format base units as an exact decimal string.
 *
 * @param decimals Fraction digits to keep (truncated, default 18)
 */
export function formatTokens(units: bigint, decimals: number = TOKEN_DECIMALS): string {
  const negative = units < 0n;
  const abs = negative ? -units : units;
  const whole = abs / TOKEN_UNITS;
  const fraction = (abs % TOKEN_UNITS).toString().padStart(TOKEN_DECIMALS, '0').slice(0, decimals);
  const body = decimals > 0 ? `${whole}.${fraction}` : whole.toString();
  return negative ? `-${body}` : body;
}

/**
 * Narrow to a signed 128-bit value.
 * @throws LedgerError(ARITHMETIC_OVERFLOW) with the offending value
 */
export function toInt128(value: bigint): bigint {
  if (value > INT128_MAX || value < INT128_MIN) {
    throw new LedgerError(
      ErrorCodes.ARITHMETIC_OVERFLOW,
      `Value doesn't fit in 128 bits: ${value}`,
      { bits: 128, value: value.toString() }
    );
  }
  return value;
}

/**
 * Narrow to an unsigned 48-bit timestamp.
 * @throws LedgerError(ARITHMETIC_OVERFLOW) with the offending value
 */
export function toUint48(value: number): number {
  if (!Number.isInteger(value) || value < 0 || value > UINT48_MAX) {
    throw new LedgerError(
      ErrorCodes.ARITHMETIC_OVERFLOW,
      `Value doesn't fit in 48 bits: ${value}`,
      { bits: 48, value }
    );
  }
  return value;
}

/**
 * Check an unsigned 256-bit amount (anything crossing the asset ledger).
 */
export function toUint256(value: bigint): bigint {
  if (value < 0n || value > UINT256_MAX) {
    throw new LedgerError(
      ErrorCodes.ARITHMETIC_OVERFLOW,
      `Value doesn't fit in unsigned 256 bits: ${value}`,
      { bits: 256, value: value.toString() }
    );
  }
  return value;
}

/**
 * floor(a * b / denominator)
 */
export function mulDiv(a: bigint, b: bigint, denominator: bigint): bigint {
  if (denominator === 0n) {
    throw new LedgerError(ErrorCodes.ARITHMETIC_OVERFLOW, 'Division by zero');
  }
  return (a * b) / denominator;
}

/**
 * Clamp a signed value at zero.
 */
export function clampZero(value: bigint): bigint {
  return value < 0n ? 0n : value;
}
