/**
 * Restore API state from the ledger store after server restart.
 */

import { IClock } from '../collaborators';
import { ILedgerStore } from '../persistence/interfaces';
import { ApiState, createApiState } from './state';
import { ServiceConfig } from './config';

export async function restoreApiState(
  config: ServiceConfig,
  store: ILedgerStore,
  clock?: IClock
): Promise<ApiState> {
  const snapshot = await store.load();
  return createApiState({ config, store, clock, snapshot });
}
