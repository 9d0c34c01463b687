import { Router, Request, Response } from 'express';
import { ApiState, persistApiState } from '../state';
import { AccountResponse, ErrorCodes, RegisterAccountRequest } from '../types';
import { deriveAddress, isEd25519PublicKey } from '../../crypto';
import { handleRouteError, isValidAccountId, parseNonNegativeInt, sendError } from '../http';

/**
 * Create router for account registration and lookup
 */
export function createAccountsRouter(state: ApiState): Router {
  const router = Router();

  /**
   * POST /accounts/register
   * Register an Ed25519 public key; the account address derives from it
   */
  router.post('/register', async (req: Request, res: Response) => {
    const body = req.body as Partial<RegisterAccountRequest>;
    const publicKey = typeof body.publicKey === 'string' ? body.publicKey.toLowerCase() : '';

    if (!isEd25519PublicKey(publicKey)) {
      sendError(res, 400, 'publicKey must be a hex SPKI Ed25519 key', ErrorCodes.INVALID_PUBLIC_KEY);
      return;
    }

    const accountId = deriveAddress(publicKey);
    if (state.accounts.has(accountId)) {
      sendError(res, 409, `Account already registered: ${accountId}`, ErrorCodes.DUPLICATE_ACCOUNT);
      return;
    }

    state.accounts.set(accountId, publicKey);
    try {
      await persistApiState(state);
    } catch (err) {
      handleRouteError(res, err);
      return;
    }

    res.status(201).json({ success: true, accountId });
  });

  /**
   * GET /accounts/:accountId
   * Balance, positions and voting summary of an account
   */
  router.get('/:accountId', (req: Request, res: Response) => {
    const accountId = req.params.accountId;
    if (!isValidAccountId(accountId)) {
      sendError(res, 400, 'Invalid accountId', ErrorCodes.MISSING_ACCOUNT_ID);
      return;
    }

    const response: AccountResponse = {
      success: true,
      accountId,
      registered: state.accounts.has(accountId),
      balance: state.token.balanceOf(accountId).toString(),
      positions: state.escrow.tokensOfOwner(accountId),
      delegate: state.escrow.delegates(accountId),
      votes: state.escrow.getVotes(accountId).toString(),
      nonce: state.escrow.nonces(accountId),
    };
    res.status(200).json(response);
  });

  /**
   * GET /accounts/:accountId/events?limit=N
   * Most recent ledger events involving the account
   */
  router.get('/:accountId/events', async (req: Request, res: Response) => {
    const accountId = req.params.accountId;
    if (!isValidAccountId(accountId)) {
      sendError(res, 400, 'Invalid accountId', ErrorCodes.MISSING_ACCOUNT_ID);
      return;
    }
    const limit = Math.min(Math.max(parseNonNegativeInt(req.query.limit) ?? 50, 1), 500);

    try {
      const events = await state.store.queryEvents({ accountId, limit });
      res.status(200).json({ success: true, accountId, events });
    } catch (err) {
      handleRouteError(res, err);
    }
  });

  return router;
}
