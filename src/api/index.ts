// API Types
export * from './types';

// Configuration
export { ServiceConfig, SchedulerConfig, loadConfig } from './config';

// API State
export {
  ApiState,
  CreateApiStateOptions,
  createApiState,
  snapshotApiState,
  persistApiState,
  runHeartbeat,
} from './state';
export { restoreApiState } from './restore';

// Express App
export { createApp } from './app';
export { HeartbeatScheduler } from './scheduler';

// Auth
export { verifyAccountAuth, AUTH_WINDOW_MS } from './auth';
export { requireAdminKey } from './middleware/adminAuth';

// Routes
export { createAccountsRouter } from './routes/accounts';
export { createTokenRouter } from './routes/token';
export { createLocksRouter } from './routes/locks';
export { createVotesRouter } from './routes/votes';
export { createRewardsRouter } from './routes/rewards';
export { createAdminRouter } from './routes/admin';
