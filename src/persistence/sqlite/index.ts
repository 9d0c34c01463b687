export { openDatabase } from './database';
export { SqliteKvStore } from './kvStore';
export { SqliteLedgerStore } from './SqliteLedgerStore';
export {
  serializeEscrowSettings,
  deserializeEscrowSettings,
  serializeRewardsSettings,
  deserializeRewardsSettings,
} from './stateSerializer';

import { openDatabase } from './database';
import { SqliteLedgerStore } from './SqliteLedgerStore';

export function createSqliteLedgerStore(dbPath?: string): SqliteLedgerStore {
  return new SqliteLedgerStore(openDatabase(dbPath));
}
