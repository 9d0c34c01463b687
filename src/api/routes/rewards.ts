import { Router, Request, Response } from 'express';
import { ApiState, persistApiState } from '../state';
import { ErrorCodes, RatesResponse, SignedRequest, UnclaimedRewardsResponse } from '../types';
import { verifyAccountAuth } from '../auth';
import { handleRouteError, isValidAccountId, parsePositionId, sendError } from '../http';

/**
 * Create router for reward accrual, claims and emission rates
 */
export function createRewardsRouter(state: ApiState): Router {
  const router = Router();

  /**
   * GET /rewards/rates
   * Emission parameters in force now
   */
  router.get('/rates', (_req: Request, res: Response) => {
    const response: RatesResponse = {
      success: true,
      genesis: state.rewards.genesis,
      latestMidnight: state.rewards.latestMidnight,
      baseEmissionRate: state.rewards.baseEmissionRate().toString(),
      nodeEmissionRate: state.rewards.nodeEmissionRate().toString(),
      nodeRewardThreshold: state.rewards.nodeRewardThreshold().toString(),
    };
    res.status(200).json(response);
  });

  /**
   * GET /rewards/:id
   * Rewards a position has accrued since its last claim
   */
  router.get('/:id', (req: Request, res: Response) => {
    const positionId = parsePositionId(req.params.id);
    if (positionId === undefined) {
      sendError(res, 400, 'Invalid position id', ErrorCodes.INVALID_REQUEST);
      return;
    }
    try {
      const response: UnclaimedRewardsResponse = {
        success: true,
        positionId,
        unclaimed: state.rewards.unclaimedRewards(positionId).toString(),
        lastClaim: state.rewards.lastClaim(positionId) ?? null,
      };
      res.status(200).json(response);
    } catch (err) {
      handleRouteError(res, err);
    }
  });

  /**
   * POST /rewards/:id/claim
   * Pay accrued rewards to `recipient` (defaults to the caller)
   */
  router.post('/:id/claim', async (req: Request, res: Response) => {
    const body = req.body as Partial<SignedRequest & { recipient: string }>;
    if (!verifyAccountAuth(state.accounts, body.accountId, body.timestamp, body.signature, res)) return;
    const positionId = parsePositionId(req.params.id);
    const recipient = body.recipient ?? body.accountId;
    if (positionId === undefined || !isValidAccountId(recipient)) {
      sendError(res, 400, 'Invalid position id or recipient', ErrorCodes.INVALID_REQUEST);
      return;
    }

    try {
      const amount = state.rewards.claimRewards(body.accountId, positionId, recipient);
      await persistApiState(state);
      res.status(200).json({ success: true, positionId, recipient, amount: amount.toString() });
    } catch (err) {
      handleRouteError(res, err);
    }
  });

  /**
   * POST /rewards/:id/compound
   * Lock accrued rewards into the same position
   */
  router.post('/:id/compound', async (req: Request, res: Response) => {
    const body = req.body as Partial<SignedRequest>;
    if (!verifyAccountAuth(state.accounts, body.accountId, body.timestamp, body.signature, res)) return;
    const positionId = parsePositionId(req.params.id);
    if (positionId === undefined) {
      sendError(res, 400, 'Invalid position id', ErrorCodes.INVALID_REQUEST);
      return;
    }

    try {
      const amount = state.rewards.compoundLockRewards(body.accountId, positionId);
      await persistApiState(state);
      res.status(200).json({
        success: true,
        positionId,
        amount: amount.toString(),
        locked: state.escrow.locked(positionId).amount.toString(),
      });
    } catch (err) {
      handleRouteError(res, err);
    }
  });

  return router;
}
