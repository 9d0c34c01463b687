import { createApp } from './app';
import { loadConfig } from './config';
import { restoreApiState } from './restore';
import { HeartbeatScheduler } from './scheduler';
import { createLedgerStore } from '../persistence';
import { formatTokens } from '../fixedPoint';

async function main() {
  const config = loadConfig();
  const store = createLedgerStore(config.storeBackend, config.dbPath);

  const state = await restoreApiState(config, store);
  console.log(
    `State restored: epoch ${state.escrow.epoch}, supply ${formatTokens(state.escrow.supply())}, ` +
    `${state.accounts.size} accounts`
  );

  const app = createApp(state);

  let scheduler: HeartbeatScheduler | undefined;
  if (config.scheduler.enabled) {
    scheduler = new HeartbeatScheduler(state, config.scheduler);
    scheduler.start();
  }

  const server = app.listen(config.port, () => {
    console.log(`Ledger API server running on port ${config.port}`);
    console.log(`Store backend: ${config.storeBackend}`);
    console.log(`Admin key: ${process.env.ADMIN_KEY ? '[SET]' : 'test-admin-key (default)'}`);
    console.log(`Governor: ${config.governor}, treasury: ${config.treasury}`);
    if (scheduler) console.log('Heartbeat scheduler: enabled');
    console.log(`Health check: http://localhost:${config.port}/health`);
  });

  // Graceful shutdown
  const shutdown = () => {
    console.log('Shutting down...');
    scheduler?.stop();
    server.close(() => {
      store.close();
      console.log('Server stopped.');
      process.exit(0);
    });
  };
  process.on('SIGINT', shutdown);
  process.on('SIGTERM', shutdown);
}

main().catch(err => {
  console.error('Startup failed:', err);
  process.exit(1);
});
