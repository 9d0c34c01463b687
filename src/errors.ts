/**
 * Ledger error taxonomy.
 *
 * Every failure raised by the escrow, delegation and reward engines is a
 * LedgerError whose `code` tells callers apart "not authorized" from "wrong
 * state" from "arithmetic overflow". The HTTP layer maps codes to statuses.
 */

export const ErrorCodes = {
  // authorization
  NOT_AUTHORIZED: 'NOT_AUTHORIZED',
  NOT_OWNER: 'NOT_OWNER',
  NOT_GOVERNOR: 'NOT_GOVERNOR',
  // lock state
  NO_LOCK_FOUND: 'NO_LOCK_FOUND',
  LOCK_EXPIRED: 'LOCK_EXPIRED',
  LOCK_NOT_EXPIRED: 'LOCK_NOT_EXPIRED',
  LOCK_DURATION_NOT_IN_FUTURE: 'LOCK_DURATION_NOT_IN_FUTURE',
  LOCK_DURATION_TOO_LONG: 'LOCK_DURATION_TOO_LONG',
  ZERO_AMOUNT: 'ZERO_AMOUNT',
  AMOUNT_TOO_SMALL: 'AMOUNT_TOO_SMALL',
  AMOUNT_TOO_BIG: 'AMOUNT_TOO_BIG',
  SAME_POSITION: 'SAME_POSITION',
  DIFFERENT_OWNERS: 'DIFFERENT_OWNERS',
  DIFFERENT_VOTING_FLAGS: 'DIFFERENT_VOTING_FLAGS',
  ATTACHED: 'ATTACHED',
  UNCLAIMED_REWARDS: 'UNCLAIMED_REWARDS',
  FLASH_PROTECTION: 'FLASH_PROTECTION',
  LIQUIDATIONS_DISABLED: 'LIQUIDATIONS_DISABLED',
  ZERO_PENALTY: 'ZERO_PENALTY',
  ZERO_ADDRESS: 'ZERO_ADDRESS',
  // execution
  REENTRANT_CALL: 'REENTRANT_CALL',
  TRANSFER_FAILED: 'TRANSFER_FAILED',
  ARITHMETIC_OVERFLOW: 'ARITHMETIC_OVERFLOW',
  INVARIANT_VIOLATION: 'INVARIANT_VIOLATION',
  CHECKPOINT_UNORDERED_INSERTION: 'CHECKPOINT_UNORDERED_INSERTION',
  // delegation
  INVALID_SIGNATURE: 'INVALID_SIGNATURE',
  SIGNATURE_EXPIRED: 'SIGNATURE_EXPIRED',
  INVALID_NONCE: 'INVALID_NONCE',
  // rewards
  NO_UNCLAIMED_REWARDS: 'NO_UNCLAIMED_REWARDS',
  INSUFFICIENT_CONTRACT_BALANCE: 'INSUFFICIENT_CONTRACT_BALANCE',
  EMISSION_RATE_CHANGE_TOO_HIGH: 'EMISSION_RATE_CHANGE_TOO_HIGH',
  INVALID_QUALITY: 'INVALID_QUALITY',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export class LedgerError extends Error {
  constructor(
    public readonly code: ErrorCode,
    message: string,
    public readonly details: Record<string, unknown> = {}
  ) {
    super(message);
    this.name = 'LedgerError';
  }
}

export function isLedgerError(err: unknown): err is LedgerError {
  return err instanceof LedgerError;
}

/**
 * Raise INVARIANT_VIOLATION. These indicate a modeling bug, never a user
 * error, and are not meant to be caught and repaired.
 */
export function invariant(condition: boolean, message: string): asserts condition {
  if (!condition) {
    throw new LedgerError(ErrorCodes.INVARIANT_VIOLATION, `Invariant violated: ${message}`);
  }
}
