import { Router, Request, Response } from 'express';
import { ApiState, persistApiState } from '../state';
import { ErrorCodes, SignedRequest } from '../types';
import { verifyAccountAuth } from '../auth';
import { handleRouteError, isValidAccountId, parseTokenAmount, sendError } from '../http';

interface ApproveRequest extends SignedRequest {
  amount: string;
  /** Defaults to the escrow custody account */
  spender?: string;
}

interface TransferRequest extends SignedRequest {
  to: string;
  amount: string;
}

/**
 * Create router for the underlying asset ledger
 */
export function createTokenRouter(state: ApiState): Router {
  const router = Router();

  /**
   * GET /token
   * Token metadata and total supply
   */
  router.get('/', (_req: Request, res: Response) => {
    res.status(200).json({
      success: true,
      name: state.token.name,
      symbol: state.token.symbol,
      decimals: state.token.decimals,
      totalSupply: state.token.totalSupply().toString(),
      custodyAccount: state.config.custodyAccount,
      rewardPoolAccount: state.config.rewardPoolAccount,
    });
  });

  /**
   * GET /token/balance/:accountId
   */
  router.get('/balance/:accountId', (req: Request, res: Response) => {
    const accountId = req.params.accountId;
    if (!isValidAccountId(accountId)) {
      sendError(res, 400, 'Invalid accountId', ErrorCodes.MISSING_ACCOUNT_ID);
      return;
    }
    res.status(200).json({
      success: true,
      accountId,
      balance: state.token.balanceOf(accountId).toString(),
      custodyAllowance: state.token.allowance(accountId, state.config.custodyAccount).toString(),
    });
  });

  /**
   * POST /token/approve
   * Allow the escrow (or another spender) to pull tokens
   */
  router.post('/approve', async (req: Request, res: Response) => {
    const body = req.body as Partial<ApproveRequest>;
    if (!verifyAccountAuth(state.accounts, body.accountId, body.timestamp, body.signature, res)) return;
    const accountId = body.accountId;

    const amount = parseTokenAmount(body.amount);
    if (amount === undefined) {
      sendError(res, 400, 'amount must be a decimal token amount', ErrorCodes.INVALID_REQUEST);
      return;
    }
    const spender = body.spender ?? state.config.custodyAccount;
    if (!isValidAccountId(spender)) {
      sendError(res, 400, 'Invalid spender', ErrorCodes.INVALID_REQUEST);
      return;
    }

    try {
      state.token.approve(accountId, spender, amount);
      await persistApiState(state);
      res.status(200).json({ success: true, owner: accountId, spender, amount: amount.toString() });
    } catch (err) {
      handleRouteError(res, err);
    }
  });

  /**
   * POST /token/transfer
   */
  router.post('/transfer', async (req: Request, res: Response) => {
    const body = req.body as Partial<TransferRequest>;
    if (!verifyAccountAuth(state.accounts, body.accountId, body.timestamp, body.signature, res)) return;
    const accountId = body.accountId;

    const amount = parseTokenAmount(body.amount);
    if (amount === undefined || !isValidAccountId(body.to)) {
      sendError(res, 400, 'to and amount are required', ErrorCodes.INVALID_REQUEST);
      return;
    }
    if (!state.token.transfer(accountId, body.to, amount)) {
      sendError(res, 409, `Insufficient balance for ${accountId}`, ErrorCodes.INVALID_REQUEST);
      return;
    }

    try {
      await persistApiState(state);
      res.status(200).json({
        success: true,
        from: accountId,
        to: body.to,
        amount: amount.toString(),
      });
    } catch (err) {
      handleRouteError(res, err);
    }
  });

  return router;
}
