/**
 * SQLite database initialization.
 * Opens the database, enables WAL mode, and runs schema migrations.
 *
 * Amounts are TEXT-encoded bigints; timestamps are INTEGER seconds.
 */

import Database from 'better-sqlite3';
import * as path from 'path';
import * as fs from 'fs';

const SCHEMA_SQL = `
-- kv_store (scalar engine state and settings)
CREATE TABLE IF NOT EXISTS kv_store (
  key   TEXT PRIMARY KEY,
  value TEXT NOT NULL
);

-- positions, keyed by ID; owner is NULL once withdrawn, liquidated or merged away
CREATE TABLE IF NOT EXISTS positions (
  position_id       INTEGER PRIMARY KEY,
  owner             TEXT,
  amount            TEXT NOT NULL,
  end_ts            INTEGER NOT NULL,
  non_voting        INTEGER NOT NULL,
  created_at        INTEGER NOT NULL,
  structural_change INTEGER,
  approved          TEXT,
  user_point_epoch  INTEGER NOT NULL DEFAULT 0
);
CREATE INDEX IF NOT EXISTS idx_positions_owner ON positions(owner);

-- global point history, keyed by epoch
CREATE TABLE IF NOT EXISTS global_points (
  epoch INTEGER PRIMARY KEY,
  bias  TEXT NOT NULL,
  slope TEXT NOT NULL,
  ts    INTEGER NOT NULL,
  blk   INTEGER NOT NULL
);

-- slope-change schedule, keyed by week boundary
CREATE TABLE IF NOT EXISTS slope_changes (
  ts     INTEGER PRIMARY KEY,
  dslope TEXT NOT NULL
);

-- per-position point history
CREATE TABLE IF NOT EXISTS user_points (
  position_id INTEGER NOT NULL,
  user_epoch  INTEGER NOT NULL,
  bias        TEXT NOT NULL,
  slope       TEXT NOT NULL,
  ts          INTEGER NOT NULL,
  blk         INTEGER NOT NULL,
  PRIMARY KEY (position_id, user_epoch)
);

-- delegation checkpoints: position ID set per delegate over time
CREATE TABLE IF NOT EXISTS delegation_checkpoints (
  delegatee        TEXT NOT NULL,
  checkpoint_index INTEGER NOT NULL,
  ts               INTEGER NOT NULL,
  position_ids     TEXT NOT NULL,
  PRIMARY KEY (delegatee, checkpoint_index)
);

CREATE TABLE IF NOT EXISTS delegates (
  account_id TEXT PRIMARY KEY,
  delegatee  TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS nonces (
  account_id TEXT PRIMARY KEY,
  nonce      INTEGER NOT NULL
);

CREATE TABLE IF NOT EXISTS operator_approvals (
  id       INTEGER PRIMARY KEY AUTOINCREMENT,
  owner    TEXT NOT NULL,
  operator TEXT NOT NULL
);

-- reward settlement marker per position
CREATE TABLE IF NOT EXISTS reward_claims (
  position_id INTEGER PRIMARY KEY,
  last_claim  INTEGER NOT NULL
);

-- emission rate / threshold series
CREATE TABLE IF NOT EXISTS rate_checkpoints (
  series           TEXT NOT NULL,
  checkpoint_index INTEGER NOT NULL,
  ts               INTEGER NOT NULL,
  value            TEXT NOT NULL,
  PRIMARY KEY (series, checkpoint_index)
);

-- in-process asset ledger
CREATE TABLE IF NOT EXISTS token_balances (
  account_id TEXT PRIMARY KEY,
  balance    TEXT NOT NULL
);

CREATE TABLE IF NOT EXISTS token_allowances (
  owner   TEXT NOT NULL,
  spender TEXT NOT NULL,
  amount  TEXT NOT NULL,
  PRIMARY KEY (owner, spender)
);

-- node properties
CREATE TABLE IF NOT EXISTS node_attachments (
  position_id INTEGER PRIMARY KEY
);

CREATE TABLE IF NOT EXISTS node_quality (
  position_id      INTEGER NOT NULL,
  checkpoint_index INTEGER NOT NULL,
  ts               INTEGER NOT NULL,
  quality          INTEGER NOT NULL,
  PRIMARY KEY (position_id, checkpoint_index)
);

-- registered accounts (address -> Ed25519 public key)
CREATE TABLE IF NOT EXISTS accounts (
  account_id TEXT PRIMARY KEY,
  public_key TEXT NOT NULL
);

-- append-only event log of both engines
CREATE TABLE IF NOT EXISTS events (
  id          INTEGER PRIMARY KEY AUTOINCREMENT,
  source      TEXT NOT NULL,
  log_index   INTEGER NOT NULL,
  event_type  TEXT NOT NULL,
  timestamp   INTEGER NOT NULL,
  blk         INTEGER NOT NULL,
  account_id  TEXT,
  position_id INTEGER,
  details     TEXT NOT NULL,
  UNIQUE (source, log_index)
);
CREATE INDEX IF NOT EXISTS idx_events_type ON events(event_type);
CREATE INDEX IF NOT EXISTS idx_events_account ON events(account_id);
CREATE INDEX IF NOT EXISTS idx_events_position ON events(position_id);
`;

export function openDatabase(dbPath?: string): Database.Database {
  const resolvedPath = dbPath ?? path.join(process.cwd(), 'data', 've-ledger.db');

  if (resolvedPath !== ':memory:') {
    const dir = path.dirname(resolvedPath);
    if (!fs.existsSync(dir)) {
      fs.mkdirSync(dir, { recursive: true });
    }
  }

  const db = new Database(resolvedPath);

  // WAL mode for better concurrent read performance
  db.pragma('journal_mode = WAL');
  db.pragma('foreign_keys = ON');

  db.exec(SCHEMA_SQL);

  return db;
}
