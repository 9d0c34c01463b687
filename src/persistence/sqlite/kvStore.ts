/**
 * Simple key-value store backed by SQLite.
 * Used for the scalar parts of engine state: counters, settings, genesis.
 */

import type Database from 'better-sqlite3';
import { EscrowMeta, RewardsMeta } from './stateSerializer';

export class SqliteKvStore {
  private stmtGet;
  private stmtSet;
  private stmtDelete;

  constructor(db: Database.Database) {
    this.stmtGet = db.prepare('SELECT value FROM kv_store WHERE key = ?');
    this.stmtSet = db.prepare('INSERT OR REPLACE INTO kv_store (key, value) VALUES (?, ?)');
    this.stmtDelete = db.prepare('DELETE FROM kv_store WHERE key = ?');
  }

  get(key: string): string | undefined {
    const row = this.stmtGet.get(key) as { value: string } | undefined;
    return row?.value;
  }

  set(key: string, value: string): void {
    this.stmtSet.run(key, value);
  }

  delete(key: string): void {
    this.stmtDelete.run(key);
  }

  getJSON<T>(key: string): T | undefined {
    const raw = this.get(key);
    return raw != null ? JSON.parse(raw) as T : undefined;
  }

  setJSON(key: string, value: unknown): void {
    this.set(key, JSON.stringify(value));
  }

  // ── Convenience methods for engine state ────────────────────────

  saveEscrowMeta(meta: EscrowMeta): void {
    this.setJSON('escrow', meta);
  }

  loadEscrowMeta(): EscrowMeta | undefined {
    return this.getJSON('escrow');
  }

  saveRewardsMeta(meta: RewardsMeta): void {
    this.setJSON('rewards', meta);
  }

  loadRewardsMeta(): RewardsMeta | undefined {
    return this.getJSON('rewards');
  }

  saveTokenSupply(totalSupply: bigint): void {
    this.set('tokenSupply', totalSupply.toString());
  }

  loadTokenSupply(): bigint {
    return BigInt(this.get('tokenSupply') ?? '0');
  }
}
