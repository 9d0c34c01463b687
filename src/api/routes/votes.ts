import { Router, Request, Response } from 'express';
import { ApiState, persistApiState } from '../state';
import { DelegateBySigRequest, ErrorCodes, SignedRequest, VotesResponse } from '../types';
import { verifyAccountAuth } from '../auth';
import {
  handleRouteError,
  isValidAccountId,
  parseNonNegativeInt,
  parseTimestampQuery,
  sendError,
} from '../http';

/**
 * Create router for voting power and delegation
 */
export function createVotesRouter(state: ApiState): Router {
  const router = Router();

  /**
   * GET /votes/supply?t=TIMESTAMP
   * Aggregate voting power of all voting positions
   */
  router.get('/supply', (req: Request, res: Response) => {
    const timestamp = parseTimestampQuery(req.query.t, state.clock.now());
    if (timestamp === undefined) {
      sendError(res, 400, 'Invalid timestamp', ErrorCodes.INVALID_REQUEST);
      return;
    }
    res.status(200).json({
      success: true,
      timestamp,
      totalPower: state.escrow.getPastTotalSupply(timestamp).toString(),
      locked: state.escrow.supply().toString(),
      epoch: state.escrow.epoch,
    });
  });

  /**
   * POST /votes/delegate
   * Route the caller's votes to `delegatee` ("" delegates to self)
   */
  router.post('/delegate', async (req: Request, res: Response) => {
    const body = req.body as Partial<SignedRequest & { delegatee: string }>;
    if (!verifyAccountAuth(state.accounts, body.accountId, body.timestamp, body.signature, res)) return;
    const delegatee = body.delegatee ?? '';
    if (delegatee !== '' && !isValidAccountId(delegatee)) {
      sendError(res, 400, 'Invalid delegatee', ErrorCodes.INVALID_REQUEST);
      return;
    }

    try {
      state.escrow.delegate(body.accountId, delegatee);
      await persistApiState(state);
      res.status(200).json({
        success: true,
        accountId: body.accountId,
        delegate: state.escrow.delegates(body.accountId),
      });
    } catch (err) {
      handleRouteError(res, err);
    }
  });

  /**
   * POST /votes/delegate-by-sig
   * Delegate on behalf of a key holder who signed
   * "VE:v1:delegate:{delegatee}:{nonce}:{expiry}"
   */
  router.post('/delegate-by-sig', async (req: Request, res: Response) => {
    const body = req.body as Partial<DelegateBySigRequest>;
    const nonce = parseNonNegativeInt(body.nonce);
    const expiry = parseNonNegativeInt(body.expiry);
    if (
      typeof body.publicKey !== 'string' ||
      typeof body.signature !== 'string' ||
      typeof body.delegatee !== 'string' ||
      nonce === undefined ||
      expiry === undefined
    ) {
      sendError(
        res,
        400,
        'publicKey, delegatee, nonce, expiry and signature are required',
        ErrorCodes.INVALID_REQUEST
      );
      return;
    }

    try {
      state.escrow.delegateBySig({
        publicKey: body.publicKey.toLowerCase(),
        delegatee: body.delegatee,
        nonce,
        expiry,
        signature: body.signature,
      });
      await persistApiState(state);
      res.status(200).json({ success: true });
    } catch (err) {
      handleRouteError(res, err);
    }
  });

  /**
   * GET /votes/:accountId?t=TIMESTAMP
   * Votes delegated to an account and the set of positions behind them
   */
  router.get('/:accountId', (req: Request, res: Response) => {
    const accountId = req.params.accountId;
    const timestamp = parseTimestampQuery(req.query.t, state.clock.now());
    if (!isValidAccountId(accountId) || timestamp === undefined) {
      sendError(res, 400, 'Invalid accountId or timestamp', ErrorCodes.INVALID_REQUEST);
      return;
    }
    const response: VotesResponse = {
      success: true,
      accountId,
      timestamp,
      delegate: state.escrow.delegates(accountId),
      votes: state.escrow.getPastVotes(accountId, timestamp).toString(),
      delegatedPositions: state.escrow.delegateSetAt(accountId, timestamp),
    };
    res.status(200).json(response);
  });

  return router;
}
