import { Router, Request, Response } from 'express';
import { ApiState, persistApiState, runHeartbeat } from '../state';
import { ErrorCodes, HeartbeatResponse } from '../types';
import { requireAdminKey } from '../middleware/adminAuth';
import {
  handleRouteError,
  isValidAccountId,
  parseNonNegativeInt,
  parsePositionId,
  parseTokenAmount,
  parseUnits,
  sendError,
} from '../http';

/**
 * Create router for admin endpoints. The operator holding the admin key acts
 * as the governor of both engines.
 */
export function createAdminRouter(state: ApiState): Router {
  const router = Router();

  router.use(requireAdminKey(state.config.adminKey));

  /**
   * POST /admin/checkpoint
   * Global heartbeat
   */
  router.post('/checkpoint', async (_req: Request, res: Response) => {
    try {
      const { epoch, latestMidnight } = await runHeartbeat(state);
      const response: HeartbeatResponse = {
        success: true,
        epoch,
        latestMidnight,
        totalPower: state.escrow.totalPowerAt().toString(),
      };
      res.status(200).json(response);
    } catch (err) {
      handleRouteError(res, err);
    }
  });

  /**
   * POST /admin/mint
   * Credit tokens in the in-process asset ledger
   */
  router.post('/mint', async (req: Request, res: Response) => {
    const { to, amount: rawAmount } = req.body as { to?: unknown; amount?: unknown };
    const amount = parseTokenAmount(rawAmount);
    if (!isValidAccountId(to) || amount === undefined) {
      sendError(res, 400, 'to and amount are required', ErrorCodes.INVALID_REQUEST);
      return;
    }
    try {
      state.token.mint(to, amount);
      await persistApiState(state);
      res.status(200).json({ success: true, to, amount: amount.toString(), balance: state.token.balanceOf(to).toString() });
    } catch (err) {
      handleRouteError(res, err);
    }
  });

  /**
   * POST /admin/reward-pool/approve
   * Let the escrow pull compounded rewards from the pool
   */
  router.post('/reward-pool/approve', async (req: Request, res: Response) => {
    const amount = parseTokenAmount((req.body as { amount?: unknown }).amount);
    if (amount === undefined) {
      sendError(res, 400, 'amount is required', ErrorCodes.INVALID_REQUEST);
      return;
    }
    try {
      state.token.approve(state.config.rewardPoolAccount, state.config.custodyAccount, amount);
      await persistApiState(state);
      res.status(200).json({ success: true, amount: amount.toString() });
    } catch (err) {
      handleRouteError(res, err);
    }
  });

  /**
   * POST /admin/settings
   * Escrow governance: any subset of liquidationsEnabled, penalty
   * {numerator, denominator}, minimumLock (tokens), treasury
   */
  router.post('/settings', async (req: Request, res: Response) => {
    const body = req.body as {
      liquidationsEnabled?: unknown;
      penalty?: { numerator?: unknown; denominator?: unknown };
      minimumLock?: unknown;
      treasury?: unknown;
    };
    const governor = state.escrow.settings.governor;

    const numerator = body.penalty ? parseUnits(body.penalty.numerator) : undefined;
    const denominator = body.penalty ? parseUnits(body.penalty.denominator) : undefined;
    const minimumLock = body.minimumLock !== undefined ? parseTokenAmount(body.minimumLock) : undefined;
    if (
      (body.liquidationsEnabled !== undefined && typeof body.liquidationsEnabled !== 'boolean') ||
      (body.penalty !== undefined && (numerator === undefined || denominator === undefined)) ||
      (body.minimumLock !== undefined && minimumLock === undefined) ||
      (body.treasury !== undefined && !isValidAccountId(body.treasury))
    ) {
      sendError(res, 400, 'Invalid settings', ErrorCodes.INVALID_REQUEST);
      return;
    }

    try {
      state.escrow.updateGovernanceSettings(governor, {
        liquidationsEnabled:
          typeof body.liquidationsEnabled === 'boolean' ? body.liquidationsEnabled : undefined,
        penalty:
          numerator !== undefined && denominator !== undefined ? { numerator, denominator } : undefined,
        minimumLock,
        treasury: isValidAccountId(body.treasury) ? body.treasury : undefined,
      });
      await persistApiState(state);

      const settings = state.escrow.settings;
      res.status(200).json({
        success: true,
        settings: {
          governor: settings.governor,
          treasury: settings.treasury,
          liquidationsEnabled: settings.liquidationsEnabled,
          liquidationPenaltyNumerator: settings.liquidationPenaltyNumerator.toString(),
          liquidationPenaltyDenominator: settings.liquidationPenaltyDenominator.toString(),
          minimumLock: settings.minimumLock.toString(),
        },
      });
    } catch (err) {
      handleRouteError(res, err);
    }
  });

  /**
   * POST /admin/rewards/rates
   * Any subset of baseEmissionRate, nodeEmissionRate, nodeRewardThreshold
   * (integer strings; rates scaled by 1e18 per day)
   */
  router.post('/rewards/rates', async (req: Request, res: Response) => {
    const body = req.body as {
      baseEmissionRate?: unknown;
      nodeEmissionRate?: unknown;
      nodeRewardThreshold?: unknown;
    };
    const base = body.baseEmissionRate !== undefined ? parseUnits(body.baseEmissionRate) : undefined;
    const node = body.nodeEmissionRate !== undefined ? parseUnits(body.nodeEmissionRate) : undefined;
    const threshold =
      body.nodeRewardThreshold !== undefined ? parseUnits(body.nodeRewardThreshold) : undefined;
    if (
      (body.baseEmissionRate !== undefined && base === undefined) ||
      (body.nodeEmissionRate !== undefined && node === undefined) ||
      (body.nodeRewardThreshold !== undefined && threshold === undefined)
    ) {
      sendError(res, 400, 'Rates must be non-negative integer strings', ErrorCodes.INVALID_REQUEST);
      return;
    }

    const governor = state.rewards.settings.governor;
    try {
      state.rewards.setEmissionParameters(governor, {
        baseEmissionRate: base,
        nodeEmissionRate: node,
        nodeRewardThreshold: threshold,
      });
      await persistApiState(state);
      res.status(200).json({
        success: true,
        baseEmissionRate: state.rewards.baseEmissionRate().toString(),
        nodeEmissionRate: state.rewards.nodeEmissionRate().toString(),
        nodeRewardThreshold: state.rewards.nodeRewardThreshold().toString(),
      });
    } catch (err) {
      handleRouteError(res, err);
    }
  });

  /**
   * POST /admin/rewards/withdraw
   * Recover funds from the reward pool
   */
  router.post('/rewards/withdraw', async (req: Request, res: Response) => {
    const { to, amount: rawAmount } = req.body as { to?: unknown; amount?: unknown };
    const amount = parseTokenAmount(rawAmount);
    if (!isValidAccountId(to) || amount === undefined) {
      sendError(res, 400, 'to and amount are required', ErrorCodes.INVALID_REQUEST);
      return;
    }
    try {
      state.rewards.withdrawToken(state.rewards.settings.governor, to, amount);
      await persistApiState(state);
      res.status(200).json({ success: true, to, amount: amount.toString() });
    } catch (err) {
      handleRouteError(res, err);
    }
  });

  /**
   * POST /admin/nodes/:id
   * Set node attachment and/or quality (0..10, effective now) of a position
   */
  router.post('/nodes/:id', async (req: Request, res: Response) => {
    const positionId = parsePositionId(req.params.id);
    const body = req.body as { attached?: unknown; quality?: unknown };
    const quality = body.quality !== undefined ? parseNonNegativeInt(body.quality) : undefined;
    if (
      positionId === undefined ||
      (body.attached !== undefined && typeof body.attached !== 'boolean') ||
      (body.quality !== undefined && quality === undefined)
    ) {
      sendError(res, 400, 'Invalid position id, attached or quality', ErrorCodes.INVALID_REQUEST);
      return;
    }

    try {
      if (typeof body.attached === 'boolean') {
        state.nodeProperties.setAttached(positionId, body.attached);
      }
      if (quality !== undefined) {
        state.nodeProperties.setNodeQuality(positionId, quality, state.clock.now());
      }
      await persistApiState(state);
      res.status(200).json({
        success: true,
        positionId,
        attached: state.nodeProperties.isAttached(positionId),
        quality: state.nodeProperties.nodeQualityOf(positionId, state.clock.now()),
      });
    } catch (err) {
      handleRouteError(res, err);
    }
  });

  return router;
}
