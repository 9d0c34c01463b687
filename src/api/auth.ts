/**
 * Signature-based account authentication.
 *
 * Accounts prove identity by signing a canonical message with their Ed25519
 * secret key. The server verifies against the registered public key. No
 * shared secrets are stored server-side.
 *
 * Message format: "VE:v1:{accountId}:{isoTimestamp}"
 * Timestamp window: ±30 seconds (prevents replay attacks)
 */

import type { Response } from 'express';
import { buildRequestMessage, verify } from '../crypto';
import { ErrorCodes } from './types';

export const AUTH_WINDOW_MS = 30_000; // ±30 seconds

/**
 * Verify an account's request signature. Sends an HTTP error response and
 * returns false if verification fails; returns true on success.
 */
export function verifyAccountAuth(
  accounts: Map<string, string>,
  accountId: unknown,
  timestamp: unknown,
  signatureHex: unknown,
  res: Response,
  nowMs: number = Date.now()
): accountId is string {
  if (typeof accountId !== 'string' || !accountId) {
    res.status(400).json({
      success: false,
      error: 'Missing accountId',
      code: ErrorCodes.MISSING_ACCOUNT_ID,
    });
    return false;
  }

  if (typeof timestamp !== 'string' || typeof signatureHex !== 'string' || !timestamp || !signatureHex) {
    res.status(401).json({
      success: false,
      error: 'Missing timestamp or signature',
      code: ErrorCodes.INVALID_SIGNATURE,
    });
    return false;
  }

  const ts = new Date(timestamp).getTime();
  if (isNaN(ts) || Math.abs(nowMs - ts) > AUTH_WINDOW_MS) {
    res.status(401).json({
      success: false,
      error: 'Timestamp expired or invalid (±30s window)',
      code: ErrorCodes.INVALID_SIGNATURE,
    });
    return false;
  }

  const publicKeyHex = accounts.get(accountId);
  if (!publicKeyHex) {
    res.status(404).json({
      success: false,
      error: `Account not found: ${accountId}`,
      code: ErrorCodes.ACCOUNT_NOT_FOUND,
    });
    return false;
  }

  if (!verify(buildRequestMessage(accountId, timestamp), signatureHex, publicKeyHex)) {
    res.status(401).json({
      success: false,
      error: 'Invalid signature',
      code: ErrorCodes.INVALID_SIGNATURE,
    });
    return false;
  }

  return true;
}
