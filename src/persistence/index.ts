// Storage interfaces
export { ILedgerStore, LedgerSnapshot, EventQuery } from './interfaces';

// In-memory store
export { InMemoryLedgerStore, mergeEventLogs, applyEventQuery } from './inMemoryStores';

// SQLite store
export { SqliteLedgerStore, createSqliteLedgerStore, openDatabase } from './sqlite';

import { ILedgerStore } from './interfaces';
import { InMemoryLedgerStore } from './inMemoryStores';
import { createSqliteLedgerStore } from './sqlite';

export type StoreBackend = 'sqlite' | 'memory';

export function createLedgerStore(backend: StoreBackend, dbPath?: string): ILedgerStore {
  return backend === 'sqlite' ? createSqliteLedgerStore(dbPath) : new InMemoryLedgerStore();
}
