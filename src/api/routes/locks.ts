import { Router, Request, Response } from 'express';
import { ApiState, persistApiState } from '../state';
import { CreateLockRequest, ErrorCodes, LiquidationResponse, LockResponse, SignedRequest } from '../types';
import { verifyAccountAuth } from '../auth';
import { ErrorCodes as LedgerErrorCodes } from '../../errors';
import {
  handleRouteError,
  isValidAccountId,
  parseNonNegativeInt,
  parsePositionId,
  parseTimestampQuery,
  parseTokenAmount,
  sendError,
} from '../http';

type LockActionBody = Partial<
  SignedRequest & {
    amount: string;
    duration: number;
    from: number;
    to: string;
    approved: string | boolean;
    operator: string;
  }
>;

/**
 * Create router for lock lifecycle and position queries
 */
export function createLocksRouter(state: ApiState): Router {
  const router = Router();

  /**
   * Authenticate a signed lock action and resolve the `:id` param.
   * Sends the error response and returns undefined on failure.
   */
  function authenticate(
    req: Request,
    res: Response
  ): { accountId: string; positionId: number; body: LockActionBody } | undefined {
    const body = req.body as LockActionBody;
    if (!verifyAccountAuth(state.accounts, body.accountId, body.timestamp, body.signature, res)) {
      return undefined;
    }
    const positionId = parsePositionId(req.params.id);
    if (positionId === undefined) {
      sendError(res, 400, 'Invalid position id', ErrorCodes.INVALID_REQUEST);
      return undefined;
    }
    return { accountId: body.accountId, positionId, body };
  }

  function describe(positionId: number): LockResponse {
    const locked = state.escrow.locked(positionId);
    const owner = state.escrow.ownerOf(positionId);
    return {
      success: true,
      positionId,
      owner: owner ?? null,
      amount: locked.amount.toString(),
      end: locked.end,
      votingPower: state.escrow.votingPowerOf(positionId).toString(),
      nonVoting: state.escrow.isNonVoting(positionId),
      createdAt: state.escrow.createdAt(positionId) ?? null,
      userPointEpoch: state.escrow.userPointEpoch(positionId),
      tokenURI: owner !== undefined ? state.escrow.tokenURI(positionId) : null,
    };
  }

  /**
   * POST /locks
   * Lock tokens into a new position
   */
  router.post('/', async (req: Request, res: Response) => {
    const body = req.body as Partial<CreateLockRequest>;
    if (!verifyAccountAuth(state.accounts, body.accountId, body.timestamp, body.signature, res)) return;
    const accountId = body.accountId;

    const amount = parseTokenAmount(body.amount);
    const duration = parseNonNegativeInt(body.duration);
    if (amount === undefined || duration === undefined) {
      sendError(res, 400, 'amount and duration are required', ErrorCodes.INVALID_REQUEST);
      return;
    }
    if (body.recipient !== undefined && !isValidAccountId(body.recipient)) {
      sendError(res, 400, 'Invalid recipient', ErrorCodes.INVALID_REQUEST);
      return;
    }

    try {
      const positionId = state.escrow.createLock({
        caller: accountId,
        amount,
        duration,
        recipient: body.recipient,
        voting: body.voting !== false,
      });
      await persistApiState(state);
      res.status(201).json(describe(positionId));
    } catch (err) {
      handleRouteError(res, err);
    }
  });

  /**
   * POST /locks/operators
   * Approve or revoke an operator over all of the caller's positions
   */
  router.post('/operators', async (req: Request, res: Response) => {
    const body = req.body as LockActionBody;
    if (!verifyAccountAuth(state.accounts, body.accountId, body.timestamp, body.signature, res)) return;
    if (!isValidAccountId(body.operator) || typeof body.approved !== 'boolean') {
      sendError(res, 400, 'operator and approved are required', ErrorCodes.INVALID_REQUEST);
      return;
    }

    try {
      state.escrow.setApprovalForAll(body.accountId, body.operator, body.approved);
      await persistApiState(state);
      res.status(200).json({ success: true, operator: body.operator, approved: body.approved });
    } catch (err) {
      handleRouteError(res, err);
    }
  });

  /**
   * GET /locks/:id
   */
  router.get('/:id', (req: Request, res: Response) => {
    const positionId = parsePositionId(req.params.id);
    if (positionId === undefined) {
      sendError(res, 400, 'Invalid position id', ErrorCodes.INVALID_REQUEST);
      return;
    }
    if (state.escrow.createdAt(positionId) === undefined) {
      res.status(404).json({
        success: false,
        error: `Position ${positionId} does not exist`,
        code: LedgerErrorCodes.NO_LOCK_FOUND,
      });
      return;
    }
    res.status(200).json(describe(positionId));
  });

  /**
   * GET /locks/:id/power?t=TIMESTAMP
   * Voting power at a point in time (defaults to now)
   */
  router.get('/:id/power', (req: Request, res: Response) => {
    const positionId = parsePositionId(req.params.id);
    const timestamp = parseTimestampQuery(req.query.t, state.clock.now());
    if (positionId === undefined || timestamp === undefined) {
      sendError(res, 400, 'Invalid position id or timestamp', ErrorCodes.INVALID_REQUEST);
      return;
    }
    res.status(200).json({
      success: true,
      positionId,
      timestamp,
      votingPower: state.escrow.votingPowerOf(positionId, timestamp).toString(),
    });
  });

  /**
   * POST /locks/:id/deposit
   * Top up any unexpired position (the caller pays)
   */
  router.post('/:id/deposit', async (req: Request, res: Response) => {
    const auth = authenticate(req, res);
    if (!auth) return;
    const amount = parseTokenAmount(auth.body.amount);
    if (amount === undefined) {
      sendError(res, 400, 'amount is required', ErrorCodes.INVALID_REQUEST);
      return;
    }
    try {
      state.escrow.depositFor(auth.accountId, auth.positionId, amount);
      await persistApiState(state);
      res.status(200).json(describe(auth.positionId));
    } catch (err) {
      handleRouteError(res, err);
    }
  });

  /**
   * POST /locks/:id/increase-amount
   */
  router.post('/:id/increase-amount', async (req: Request, res: Response) => {
    const auth = authenticate(req, res);
    if (!auth) return;
    const amount = parseTokenAmount(auth.body.amount);
    if (amount === undefined) {
      sendError(res, 400, 'amount is required', ErrorCodes.INVALID_REQUEST);
      return;
    }
    try {
      state.escrow.increaseAmount(auth.accountId, auth.positionId, amount);
      await persistApiState(state);
      res.status(200).json(describe(auth.positionId));
    } catch (err) {
      handleRouteError(res, err);
    }
  });

  /**
   * POST /locks/:id/extend
   * Push the unlock time to now + duration (rounded down to a week)
   */
  router.post('/:id/extend', async (req: Request, res: Response) => {
    const auth = authenticate(req, res);
    if (!auth) return;
    const duration = parseNonNegativeInt(auth.body.duration);
    if (duration === undefined) {
      sendError(res, 400, 'duration is required', ErrorCodes.INVALID_REQUEST);
      return;
    }
    try {
      state.escrow.increaseUnlockTime(auth.accountId, auth.positionId, duration);
      await persistApiState(state);
      res.status(200).json(describe(auth.positionId));
    } catch (err) {
      handleRouteError(res, err);
    }
  });

  /**
   * POST /locks/:id/merge
   * Fold position `from` into `:id`
   */
  router.post('/:id/merge', async (req: Request, res: Response) => {
    const auth = authenticate(req, res);
    if (!auth) return;
    const from = parsePositionId(auth.body.from);
    if (from === undefined) {
      sendError(res, 400, 'from is required', ErrorCodes.INVALID_REQUEST);
      return;
    }
    try {
      state.escrow.merge(auth.accountId, from, auth.positionId);
      await persistApiState(state);
      res.status(200).json(describe(auth.positionId));
    } catch (err) {
      handleRouteError(res, err);
    }
  });

  /**
   * POST /locks/:id/split
   * Carve `amount` out into a new position
   */
  router.post('/:id/split', async (req: Request, res: Response) => {
    const auth = authenticate(req, res);
    if (!auth) return;
    const amount = parseTokenAmount(auth.body.amount);
    if (amount === undefined) {
      sendError(res, 400, 'amount is required', ErrorCodes.INVALID_REQUEST);
      return;
    }
    try {
      const newId = state.escrow.split(auth.accountId, auth.positionId, amount);
      await persistApiState(state);
      res.status(201).json({
        success: true,
        original: describe(auth.positionId),
        created: describe(newId),
      });
    } catch (err) {
      handleRouteError(res, err);
    }
  });

  /**
   * POST /locks/:id/withdraw
   */
  router.post('/:id/withdraw', async (req: Request, res: Response) => {
    const auth = authenticate(req, res);
    if (!auth) return;
    try {
      const returned = state.escrow.withdraw(auth.accountId, auth.positionId);
      await persistApiState(state);
      res.status(200).json({ success: true, positionId: auth.positionId, returned: returned.toString() });
    } catch (err) {
      handleRouteError(res, err);
    }
  });

  /**
   * POST /locks/:id/liquidate
   */
  router.post('/:id/liquidate', async (req: Request, res: Response) => {
    const auth = authenticate(req, res);
    if (!auth) return;
    try {
      const result = state.escrow.liquidate(auth.accountId, auth.positionId);
      await persistApiState(state);
      const response: LiquidationResponse = {
        success: true,
        positionId: auth.positionId,
        returned: result.returned.toString(),
        penalty: result.penalty.toString(),
      };
      res.status(200).json(response);
    } catch (err) {
      handleRouteError(res, err);
    }
  });

  /**
   * POST /locks/:id/transfer
   */
  router.post('/:id/transfer', async (req: Request, res: Response) => {
    const auth = authenticate(req, res);
    if (!auth) return;
    const to = auth.body.to;
    if (!isValidAccountId(to)) {
      sendError(res, 400, 'to is required', ErrorCodes.INVALID_REQUEST);
      return;
    }
    const from = state.escrow.ownerOf(auth.positionId) ?? auth.accountId;
    try {
      state.escrow.transferFrom(auth.accountId, from, to, auth.positionId);
      await persistApiState(state);
      res.status(200).json(describe(auth.positionId));
    } catch (err) {
      handleRouteError(res, err);
    }
  });

  /**
   * POST /locks/:id/approve
   * Approve a single spender for the position ("" clears it)
   */
  router.post('/:id/approve', async (req: Request, res: Response) => {
    const auth = authenticate(req, res);
    if (!auth) return;
    const approved = auth.body.approved;
    if (typeof approved !== 'string' || (approved !== '' && !isValidAccountId(approved))) {
      sendError(res, 400, 'approved must be an account id or ""', ErrorCodes.INVALID_REQUEST);
      return;
    }
    try {
      state.escrow.approve(auth.accountId, approved, auth.positionId);
      await persistApiState(state);
      res.status(200).json({ success: true, positionId: auth.positionId, approved });
    } catch (err) {
      handleRouteError(res, err);
    }
  });

  return router;
}
