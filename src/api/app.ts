import express, { Express, Request, Response, NextFunction } from 'express';
import { ApiState } from './state';
import { createAccountsRouter } from './routes/accounts';
import { createTokenRouter } from './routes/token';
import { createLocksRouter } from './routes/locks';
import { createVotesRouter } from './routes/votes';
import { createRewardsRouter } from './routes/rewards';
import { createAdminRouter } from './routes/admin';
import { ErrorCodes } from './types';

/**
 * Create an Express app with all routes configured
 */
export function createApp(state: ApiState): Express {
  const app = express();

  // Parse JSON bodies
  app.use(express.json());

  // Health check endpoint
  app.get('/health', (_req: Request, res: Response) => {
    res.json({
      status: 'ok',
      now: state.clock.now(),
      epoch: state.escrow.epoch,
      supply: state.escrow.supply().toString(),
      totalPower: state.escrow.totalPowerAt().toString(),
      latestMidnight: state.rewards.latestMidnight,
      accounts: state.accounts.size,
    });
  });

  // Mount routes
  app.use('/accounts', createAccountsRouter(state));
  app.use('/token', createTokenRouter(state));
  app.use('/locks', createLocksRouter(state));
  app.use('/votes', createVotesRouter(state));
  app.use('/rewards', createRewardsRouter(state));
  app.use('/admin', createAdminRouter(state));

  // Global error handler
  app.use((err: Error, _req: Request, res: Response, _next: NextFunction) => {
    console.error('Unhandled error:', err);
    res.status(500).json({
      success: false,
      error: 'Internal server error',
      code: ErrorCodes.INTERNAL_ERROR,
    });
  });

  return app;
}
