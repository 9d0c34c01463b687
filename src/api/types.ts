import { ErrorCode as LedgerErrorCode } from '../errors';

// ============================================================================
// Error Codes
// ============================================================================

/**
 * Codes raised by the HTTP layer itself. Engine failures carry the
 * LedgerError code instead.
 */
export const ErrorCodes = {
  INVALID_REQUEST: 'INVALID_REQUEST',
  MISSING_ACCOUNT_ID: 'MISSING_ACCOUNT_ID',
  ACCOUNT_NOT_FOUND: 'ACCOUNT_NOT_FOUND',
  DUPLICATE_ACCOUNT: 'DUPLICATE_ACCOUNT',
  INVALID_PUBLIC_KEY: 'INVALID_PUBLIC_KEY',
  INVALID_SIGNATURE: 'INVALID_SIGNATURE',
  MISSING_ADMIN_KEY: 'MISSING_ADMIN_KEY',
  INVALID_ADMIN_KEY: 'INVALID_ADMIN_KEY',
  INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

export interface ErrorResponse {
  success: false;
  error: string;
  code: ErrorCode | LedgerErrorCode;
  details?: Record<string, unknown>;
}

/**
 * HTTP status per engine error code: 401 auth, 403 not authorized,
 * 404 not found, 409 wrong state, 422 arithmetic or validation,
 * 500 broken invariant.
 */
export const LEDGER_ERROR_STATUS: Record<LedgerErrorCode, number> = {
  NOT_AUTHORIZED: 403,
  NOT_OWNER: 403,
  NOT_GOVERNOR: 403,
  NO_LOCK_FOUND: 404,
  LOCK_EXPIRED: 409,
  LOCK_NOT_EXPIRED: 409,
  LOCK_DURATION_NOT_IN_FUTURE: 422,
  LOCK_DURATION_TOO_LONG: 422,
  ZERO_AMOUNT: 422,
  AMOUNT_TOO_SMALL: 422,
  AMOUNT_TOO_BIG: 422,
  SAME_POSITION: 409,
  DIFFERENT_OWNERS: 409,
  DIFFERENT_VOTING_FLAGS: 409,
  ATTACHED: 409,
  UNCLAIMED_REWARDS: 409,
  FLASH_PROTECTION: 409,
  LIQUIDATIONS_DISABLED: 409,
  ZERO_PENALTY: 422,
  ZERO_ADDRESS: 422,
  REENTRANT_CALL: 409,
  TRANSFER_FAILED: 409,
  ARITHMETIC_OVERFLOW: 422,
  INVARIANT_VIOLATION: 500,
  CHECKPOINT_UNORDERED_INSERTION: 409,
  INVALID_SIGNATURE: 401,
  SIGNATURE_EXPIRED: 401,
  INVALID_NONCE: 409,
  NO_UNCLAIMED_REWARDS: 409,
  INSUFFICIENT_CONTRACT_BALANCE: 409,
  EMISSION_RATE_CHANGE_TOO_HIGH: 422,
  INVALID_QUALITY: 422,
};

// ============================================================================
// Request Authentication
// ============================================================================

/** Fields every signed account request carries in its body */
export interface SignedRequest {
  accountId: string;
  timestamp: string; // ISO 8601
  signature: string; // hex Ed25519 over "VE:v1:{accountId}:{timestamp}"
}

// ============================================================================
// Accounts
// ============================================================================

export interface RegisterAccountRequest {
  publicKey: string; // hex SPKI DER Ed25519 key
}

export interface RegisterAccountResponse {
  success: true;
  accountId: string;
}

export interface AccountResponse {
  success: true;
  accountId: string;
  registered: boolean;
  balance: string;
  positions: number[];
  delegate: string;
  votes: string;
  nonce: number;
}

// ============================================================================
// Locks
// ============================================================================

export interface CreateLockRequest extends SignedRequest {
  amount: string; // decimal tokens, e.g. "1000" or "12.5"
  duration: number; // seconds
  recipient?: string;
  voting?: boolean;
}

export interface LockResponse {
  success: true;
  positionId: number;
  owner: string | null;
  amount: string; // base units
  end: number;
  votingPower: string; // base units
  nonVoting: boolean;
  createdAt: number | null;
  userPointEpoch: number;
  tokenURI: string | null;
}

export interface LiquidationResponse {
  success: true;
  positionId: number;
  returned: string;
  penalty: string;
}

// ============================================================================
// Votes
// ============================================================================

export interface VotesResponse {
  success: true;
  accountId: string;
  timestamp: number;
  delegate: string;
  votes: string;
  delegatedPositions: number[];
}

export interface DelegateBySigRequest {
  publicKey: string;
  delegatee: string;
  nonce: number;
  expiry: number;
  signature: string;
}

// ============================================================================
// Rewards
// ============================================================================

export interface UnclaimedRewardsResponse {
  success: true;
  positionId: number;
  unclaimed: string;
  lastClaim: number | null;
}

export interface RatesResponse {
  success: true;
  genesis: number;
  latestMidnight: number;
  baseEmissionRate: string;
  nodeEmissionRate: string;
  nodeRewardThreshold: string;
}

// ============================================================================
// Admin
// ============================================================================

export interface HeartbeatResponse {
  success: true;
  epoch: number;
  latestMidnight: number;
  totalPower: string;
}
