/**
 * SQLite ledger store. Each save runs in one transaction and writes only
 * what differs from the previous save: rows are compared against the values
 * last written, history series are rewritten from their last saved entry on,
 * and the event log only receives entries it has not seen yet.
 */

import type Database from 'better-sqlite3';
import { Checkpoint, Point } from '../../types';
import {
  EscrowSettings,
  EscrowState,
  LedgerEvent,
  RewardsSettings,
  RewardsState,
} from '../../services/serviceTypes';
import { NodePropertiesSnapshot, TokenSnapshot } from '../../collaborators';
import { EventQuery, ILedgerStore, LedgerSnapshot } from '../interfaces';
import { SqliteKvStore } from './kvStore';
import {
  EventRow,
  deserializeEscrowSettings,
  deserializeRewardsSettings,
  eventToRow,
  rowToEvent,
  serializeEscrowSettings,
  serializeRewardsSettings,
} from './stateSerializer';

type EventSource = 'escrow' | 'rewards';
type RateSeries = 'baseEmissionRate' | 'nodeEmissionRate' | 'nodeRewardThreshold';
const RATE_SERIES: RateSeries[] = ['baseEmissionRate', 'nodeEmissionRate', 'nodeRewardThreshold'];

interface PositionRow {
  position_id: number;
  owner: string | null;
  amount: string;
  end_ts: number;
  non_voting: number;
  created_at: number;
  structural_change: number | null;
  approved: string | null;
  user_point_epoch: number;
}

interface PointRow {
  bias: string;
  slope: string;
  ts: number;
  blk: number;
}

export class SqliteLedgerStore implements ILedgerStore {
  private kv: SqliteKvStore;
  private stmt: Record<string, Database.Statement>;
  private saveTxn: (snapshot: LedgerSnapshot) => void;
  /** Serialized row values as last committed, by row key */
  private written = new Map<string, string>();
  /** Row values written by the transaction in progress */
  private pending = new Map<string, string>();

  constructor(private db: Database.Database) {
    this.kv = new SqliteKvStore(db);
    this.stmt = {
      upsertPosition: db.prepare(
        `INSERT OR REPLACE INTO positions
           (position_id, owner, amount, end_ts, non_voting, created_at, structural_change, approved, user_point_epoch)
         VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`
      ),
      upsertGlobalPoint: db.prepare(
        'INSERT OR REPLACE INTO global_points (epoch, bias, slope, ts, blk) VALUES (?, ?, ?, ?, ?)'
      ),
      upsertSlopeChange: db.prepare('INSERT OR REPLACE INTO slope_changes (ts, dslope) VALUES (?, ?)'),
      upsertUserPoint: db.prepare(
        `INSERT OR REPLACE INTO user_points (position_id, user_epoch, bias, slope, ts, blk)
         VALUES (?, ?, ?, ?, ?, ?)`
      ),
      upsertDelegation: db.prepare(
        `INSERT OR REPLACE INTO delegation_checkpoints (delegatee, checkpoint_index, ts, position_ids)
         VALUES (?, ?, ?, ?)`
      ),
      upsertDelegate: db.prepare('INSERT OR REPLACE INTO delegates (account_id, delegatee) VALUES (?, ?)'),
      upsertNonce: db.prepare('INSERT OR REPLACE INTO nonces (account_id, nonce) VALUES (?, ?)'),
      clearOperators: db.prepare('DELETE FROM operator_approvals'),
      insertOperator: db.prepare('INSERT INTO operator_approvals (owner, operator) VALUES (?, ?)'),
      upsertClaim: db.prepare('INSERT OR REPLACE INTO reward_claims (position_id, last_claim) VALUES (?, ?)'),
      upsertRate: db.prepare(
        `INSERT OR REPLACE INTO rate_checkpoints (series, checkpoint_index, ts, value)
         VALUES (?, ?, ?, ?)`
      ),
      upsertBalance: db.prepare('INSERT OR REPLACE INTO token_balances (account_id, balance) VALUES (?, ?)'),
      upsertAllowance: db.prepare(
        'INSERT OR REPLACE INTO token_allowances (owner, spender, amount) VALUES (?, ?, ?)'
      ),
      clearAttachments: db.prepare('DELETE FROM node_attachments'),
      insertAttachment: db.prepare('INSERT INTO node_attachments (position_id) VALUES (?)'),
      upsertQuality: db.prepare(
        `INSERT OR REPLACE INTO node_quality (position_id, checkpoint_index, ts, quality)
         VALUES (?, ?, ?, ?)`
      ),
      upsertAccount: db.prepare('INSERT OR REPLACE INTO accounts (account_id, public_key) VALUES (?, ?)'),
      countEvents: db.prepare('SELECT COUNT(*) AS count FROM events WHERE source = ?'),
      insertEvent: db.prepare(
        `INSERT INTO events (source, log_index, event_type, timestamp, blk, account_id, position_id, details)
         VALUES (@source, @logIndex, @event_type, @timestamp, @blk, @account_id, @position_id, @details)`
      ),

      allPositions: db.prepare('SELECT * FROM positions ORDER BY position_id'),
      allGlobalPoints: db.prepare('SELECT bias, slope, ts, blk FROM global_points ORDER BY epoch'),
      allSlopeChanges: db.prepare('SELECT ts, dslope FROM slope_changes ORDER BY ts'),
      allUserPoints: db.prepare(
        'SELECT position_id, user_epoch, bias, slope, ts, blk FROM user_points ORDER BY position_id, user_epoch'
      ),
      allDelegations: db.prepare(
        'SELECT delegatee, ts, position_ids FROM delegation_checkpoints ORDER BY delegatee, checkpoint_index'
      ),
      allDelegates: db.prepare('SELECT account_id, delegatee FROM delegates'),
      allNonces: db.prepare('SELECT account_id, nonce FROM nonces'),
      allOperators: db.prepare('SELECT owner, operator FROM operator_approvals ORDER BY id'),
      allClaims: db.prepare('SELECT position_id, last_claim FROM reward_claims'),
      allRates: db.prepare('SELECT ts, value FROM rate_checkpoints WHERE series = ? ORDER BY checkpoint_index'),
      allBalances: db.prepare('SELECT account_id, balance FROM token_balances'),
      allAllowances: db.prepare('SELECT owner, spender, amount FROM token_allowances'),
      allAttachments: db.prepare('SELECT position_id FROM node_attachments ORDER BY position_id'),
      allQuality: db.prepare(
        'SELECT position_id, ts, quality FROM node_quality ORDER BY position_id, checkpoint_index'
      ),
      allAccounts: db.prepare('SELECT account_id, public_key FROM accounts'),
      eventsBySource: db.prepare(
        `SELECT event_type, timestamp, blk, account_id, position_id, details
         FROM events WHERE source = ? ORDER BY log_index`
      ),
    };

    this.saveTxn = db.transaction((snapshot: LedgerSnapshot) => {
      this.writeEscrow(snapshot.escrow);
      this.writeRewards(snapshot.rewards);
      this.writeToken(snapshot.token);
      this.writeNodes(snapshot.nodes);
      for (const [accountId, publicKey] of snapshot.accounts) {
        this.upsert(this.stmt.upsertAccount, `account:${accountId}`, [accountId, publicKey]);
      }
      this.appendEvents('escrow', snapshot.escrow.events);
      this.appendEvents('rewards', snapshot.rewards.events);
    });
  }

  async save(snapshot: LedgerSnapshot): Promise<void> {
    try {
      this.saveTxn(snapshot);
    } catch (err) {
      this.pending.clear();
      throw err;
    }
    for (const [key, value] of this.pending) {
      this.written.set(key, value);
    }
    this.pending.clear();
  }

  async load(): Promise<LedgerSnapshot | undefined> {
    const escrowMeta = this.kv.loadEscrowMeta();
    const rewardsMeta = this.kv.loadRewardsMeta();
    if (!escrowMeta || !rewardsMeta) {
      return undefined;
    }

    const accounts = new Map<string, string>();
    for (const row of this.stmt.allAccounts.all() as Array<{ account_id: string; public_key: string }>) {
      accounts.set(row.account_id, row.public_key);
    }

    const escrow = this.readEscrow(deserializeEscrowSettings(escrowMeta.settings));
    escrow.tokenId = escrowMeta.tokenId;
    escrow.supply = BigInt(escrowMeta.supply);
    escrow.epoch = escrowMeta.epoch;

    const rewards = this.readRewards(deserializeRewardsSettings(rewardsMeta.settings));
    rewards.genesis = rewardsMeta.genesis;
    rewards.latestMidnight = rewardsMeta.latestMidnight;

    return {
      escrow,
      rewards,
      token: this.readToken(),
      nodes: this.readNodes(),
      accounts,
    };
  }

  async queryEvents(query: EventQuery): Promise<LedgerEvent[]> {
    const clauses: string[] = [];
    const params: Array<string | number> = [];
    if (query.eventType) {
      clauses.push('event_type = ?');
      params.push(query.eventType);
    }
    if (query.accountId) {
      clauses.push('account_id = ?');
      params.push(query.accountId);
    }
    if (query.positionId !== undefined) {
      clauses.push('position_id = ?');
      params.push(query.positionId);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const limit = query.limit !== undefined ? 'LIMIT ?' : '';
    if (query.limit !== undefined) params.push(query.limit);

    const rows = this.db
      .prepare(
        `SELECT event_type, timestamp, blk, account_id, position_id, details FROM events ${where}
         ORDER BY timestamp DESC, CASE source WHEN 'rewards' THEN 0 ELSE 1 END, log_index DESC ${limit}`
      )
      .all(...params) as EventRow[];
    return rows.map(rowToEvent);
  }

  close(): void {
    this.db.close();
  }

  // ── Write ────────────────────────────────────────────────────────

  private writeEscrow(state: EscrowState): void {
    const meta = {
      tokenId: state.tokenId,
      supply: state.supply.toString(),
      epoch: state.epoch,
      settings: serializeEscrowSettings(state.settings),
    };
    if (this.changed('meta:escrow', JSON.stringify(meta))) {
      this.kv.saveEscrowMeta(meta);
    }

    for (const [id, nonVoting] of state.nonVoting) {
      const locked = state.locked.get(id) ?? { amount: 0n, end: 0 };
      this.upsert(this.stmt.upsertPosition, `position:${id}`, [
        id,
        state.owners.get(id) ?? null,
        locked.amount.toString(),
        locked.end,
        nonVoting ? 1 : 0,
        state.createdAt.get(id) ?? 0,
        state.structuralChange.get(id) ?? null,
        state.approvals.get(id) ?? null,
        state.userPointEpoch.get(id) ?? 0,
      ]);
    }

    this.writeSeries(this.stmt.upsertGlobalPoint, 'globalPoint', state.pointHistory, (p, epoch) => [
      epoch,
      p.bias.toString(),
      p.slope.toString(),
      p.ts,
      p.blk,
    ]);
    for (const [ts, dslope] of state.slopeChanges) {
      this.upsert(this.stmt.upsertSlopeChange, `slope:${ts}`, [ts, dslope.toString()]);
    }
    for (const [id, history] of state.userPointHistory) {
      this.writeSeries(
        this.stmt.upsertUserPoint,
        `userPoint:${id}`,
        history,
        (p, userEpoch) => [id, userEpoch, p.bias.toString(), p.slope.toString(), p.ts, p.blk],
        1
      );
    }
    for (const [delegatee, series] of state.delegateCheckpoints) {
      this.writeSeries(this.stmt.upsertDelegation, `delegation:${delegatee}`, series, (c, index) => [
        delegatee,
        index,
        c.key,
        JSON.stringify(c.value),
      ]);
    }
    for (const [account, delegatee] of state.delegates) {
      this.upsert(this.stmt.upsertDelegate, `delegate:${account}`, [account, delegatee]);
    }
    for (const [account, nonce] of state.nonces) {
      this.upsert(this.stmt.upsertNonce, `nonce:${account}`, [account, nonce]);
    }
    const operators = Array.from(state.operatorApprovals.entries());
    if (this.changed('operators', JSON.stringify(operators))) {
      this.stmt.clearOperators.run();
      for (const [owner, approved] of operators) {
        for (const operator of approved) {
          this.stmt.insertOperator.run(owner, operator);
        }
      }
    }
  }

  private writeRewards(state: RewardsState): void {
    const meta = {
      genesis: state.genesis,
      latestMidnight: state.latestMidnight,
      settings: serializeRewardsSettings(state.settings),
    };
    if (this.changed('meta:rewards', JSON.stringify(meta))) {
      this.kv.saveRewardsMeta(meta);
    }
    for (const [id, lastClaim] of state.lastClaim) {
      this.upsert(this.stmt.upsertClaim, `claim:${id}`, [id, lastClaim]);
    }
    for (const series of RATE_SERIES) {
      this.writeSeries(this.stmt.upsertRate, `rate:${series}`, state[series], (c, index) => [
        series,
        index,
        c.key,
        c.value.toString(),
      ]);
    }
  }

  private writeToken(token: TokenSnapshot): void {
    if (this.changed('meta:tokenSupply', token.totalSupply.toString())) {
      this.kv.saveTokenSupply(token.totalSupply);
    }
    for (const [account, balance] of token.balances) {
      this.upsert(this.stmt.upsertBalance, `balance:${account}`, [account, balance.toString()]);
    }
    for (const [owner, spender, amount] of token.allowances) {
      this.upsert(this.stmt.upsertAllowance, `allowance:${owner}:${spender}`, [
        owner,
        spender,
        amount.toString(),
      ]);
    }
  }

  private writeNodes(nodes: NodePropertiesSnapshot): void {
    if (this.changed('attachments', JSON.stringify(nodes.attached))) {
      this.stmt.clearAttachments.run();
      for (const id of nodes.attached) {
        this.stmt.insertAttachment.run(id);
      }
    }
    for (const [id, series] of nodes.quality) {
      this.writeSeries(this.stmt.upsertQuality, `quality:${id}`, series, (c, index) => [
        id,
        index,
        c.key,
        c.value,
      ]);
    }
  }

  private appendEvents(source: EventSource, events: LedgerEvent[]): void {
    const { count } = this.stmt.countEvents.get(source) as { count: number };
    for (let i = count; i < events.length; i++) {
      this.stmt.insertEvent.run({ source, logIndex: i, ...eventToRow(events[i]) });
    }
  }

  /** True, and the value recorded for commit, when `key` last held something else */
  private changed(key: string, value: string): boolean {
    if ((this.pending.get(key) ?? this.written.get(key)) === value) {
      return false;
    }
    this.pending.set(key, value);
    return true;
  }

  private upsert(statement: Database.Statement, key: string, params: Array<string | number | null>): void {
    if (this.changed(key, JSON.stringify(params))) {
      statement.run(...params);
    }
  }

  /**
   * Write an append-mostly series from its last saved entry on. That entry
   * is compared again since a same-instant update replaces it in place.
   */
  private writeSeries<T>(
    statement: Database.Statement,
    key: string,
    series: T[],
    toParams: (entry: T, index: number) => Array<string | number | null>,
    first = 0
  ): void {
    const lengthKey = `length:${key}`;
    const saved = Number(this.pending.get(lengthKey) ?? this.written.get(lengthKey) ?? 0);
    this.changed(lengthKey, String(series.length));
    for (let index = Math.max(first, saved - 1); index < series.length; index++) {
      this.upsert(statement, `${key}:${index}`, toParams(series[index], index));
    }
  }

  // ── Read ─────────────────────────────────────────────────────────

  private readEscrow(settings: EscrowSettings): EscrowState {
    const state: EscrowState = {
      tokenId: 0,
      supply: 0n,
      locked: new Map(),
      owners: new Map(),
      ownerTokens: new Map(),
      approvals: new Map(),
      operatorApprovals: new Map(),
      nonVoting: new Map(),
      createdAt: new Map(),
      structuralChange: new Map(),
      epoch: 0,
      pointHistory: [],
      userPointEpoch: new Map(),
      userPointHistory: new Map(),
      slopeChanges: new Map(),
      delegates: new Map(),
      delegateCheckpoints: new Map(),
      nonces: new Map(),
      settings,
      events: this.readEvents('escrow'),
    };

    for (const row of this.stmt.allPositions.all() as PositionRow[]) {
      const id = row.position_id;
      state.locked.set(id, { amount: BigInt(row.amount), end: row.end_ts });
      state.nonVoting.set(id, row.non_voting === 1);
      state.createdAt.set(id, row.created_at);
      if (row.owner !== null) {
        state.owners.set(id, row.owner);
        const owned = state.ownerTokens.get(row.owner) ?? [];
        owned.push(id);
        state.ownerTokens.set(row.owner, owned);
      }
      if (row.structural_change !== null) state.structuralChange.set(id, row.structural_change);
      if (row.approved !== null) state.approvals.set(id, row.approved);
      if (row.user_point_epoch > 0) state.userPointEpoch.set(id, row.user_point_epoch);
    }

    state.pointHistory = (this.stmt.allGlobalPoints.all() as PointRow[]).map(rowToPoint);

    for (const row of this.stmt.allSlopeChanges.all() as Array<{ ts: number; dslope: string }>) {
      state.slopeChanges.set(row.ts, BigInt(row.dslope));
    }

    type UserPointRow = PointRow & { position_id: number; user_epoch: number };
    for (const row of this.stmt.allUserPoints.all() as UserPointRow[]) {
      const history = state.userPointHistory.get(row.position_id) ?? [
        { bias: 0n, slope: 0n, ts: 0, blk: 0 },
      ];
      history[row.user_epoch] = rowToPoint(row);
      state.userPointHistory.set(row.position_id, history);
    }

    type DelegationRow = { delegatee: string; ts: number; position_ids: string };
    for (const row of this.stmt.allDelegations.all() as DelegationRow[]) {
      const series: Checkpoint<number[]>[] = state.delegateCheckpoints.get(row.delegatee) ?? [];
      series.push({ key: row.ts, value: JSON.parse(row.position_ids) });
      state.delegateCheckpoints.set(row.delegatee, series);
    }

    for (const row of this.stmt.allDelegates.all() as Array<{ account_id: string; delegatee: string }>) {
      state.delegates.set(row.account_id, row.delegatee);
    }
    for (const row of this.stmt.allNonces.all() as Array<{ account_id: string; nonce: number }>) {
      state.nonces.set(row.account_id, row.nonce);
    }
    for (const row of this.stmt.allOperators.all() as Array<{ owner: string; operator: string }>) {
      const operators = state.operatorApprovals.get(row.owner) ?? [];
      operators.push(row.operator);
      state.operatorApprovals.set(row.owner, operators);
    }

    return state;
  }

  private readRewards(settings: RewardsSettings): RewardsState {
    const state: RewardsState = {
      genesis: 0,
      latestMidnight: 0,
      lastClaim: new Map(),
      baseEmissionRate: [],
      nodeEmissionRate: [],
      nodeRewardThreshold: [],
      settings,
      events: this.readEvents('rewards'),
    };
    for (const row of this.stmt.allClaims.all() as Array<{ position_id: number; last_claim: number }>) {
      state.lastClaim.set(row.position_id, row.last_claim);
    }
    for (const series of RATE_SERIES) {
      const rows = this.stmt.allRates.all(series) as Array<{ ts: number; value: string }>;
      state[series] = rows.map(row => ({ key: row.ts, value: BigInt(row.value) }));
    }
    return state;
  }

  private readToken(): TokenSnapshot {
    const balances = this.stmt.allBalances.all() as Array<{ account_id: string; balance: string }>;
    const allowances = this.stmt.allAllowances.all() as Array<{ owner: string; spender: string; amount: string }>;
    return {
      totalSupply: this.kv.loadTokenSupply(),
      balances: balances.map((row): [string, bigint] => [row.account_id, BigInt(row.balance)]),
      allowances: allowances.map((row): [string, string, bigint] => [
        row.owner,
        row.spender,
        BigInt(row.amount),
      ]),
    };
  }

  private readNodes(): NodePropertiesSnapshot {
    const attached = (this.stmt.allAttachments.all() as Array<{ position_id: number }>).map(
      row => row.position_id
    );
    const quality = new Map<number, Checkpoint<number>[]>();
    type QualityRow = { position_id: number; ts: number; quality: number };
    for (const row of this.stmt.allQuality.all() as QualityRow[]) {
      const series = quality.get(row.position_id) ?? [];
      series.push({ key: row.ts, value: row.quality });
      quality.set(row.position_id, series);
    }
    return { attached, quality: Array.from(quality.entries()) };
  }

  private readEvents(source: EventSource): LedgerEvent[] {
    return (this.stmt.eventsBySource.all(source) as EventRow[]).map(rowToEvent);
  }
}

function rowToPoint(row: PointRow): Point {
  return { bias: BigInt(row.bias), slope: BigInt(row.slope), ts: row.ts, blk: row.blk };
}
