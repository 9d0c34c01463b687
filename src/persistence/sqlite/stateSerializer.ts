/**
 * JSON shapes for the parts of the ledger kept in kv_store.
 * bigint -> decimal string so JSON.stringify round-trips.
 */

import { EscrowSettings, LedgerEvent, RewardsSettings } from '../../services/serviceTypes';

// ── Serializable shapes ────────────────────────────────────────────

export interface SerializedEscrowSettings {
  governor: string;
  treasury: string;
  custodyAccount: string;
  liquidationsEnabled: boolean;
  liquidationPenaltyNumerator: string;
  liquidationPenaltyDenominator: string;
  minimumLock: string;
  maxReplayWeeks: number;
  baseURI: string;
}

export interface SerializedRewardsSettings {
  governor: string;
  poolAccount: string;
  maxEmissionRate: string;
}

export interface EscrowMeta {
  tokenId: number;
  supply: string;
  epoch: number;
  settings: SerializedEscrowSettings;
}

export interface RewardsMeta {
  genesis: number;
  latestMidnight: number;
  settings: SerializedRewardsSettings;
}

// ── Settings ───────────────────────────────────────────────────────

export function serializeEscrowSettings(s: EscrowSettings): SerializedEscrowSettings {
  return {
    ...s,
    liquidationPenaltyNumerator: s.liquidationPenaltyNumerator.toString(),
    liquidationPenaltyDenominator: s.liquidationPenaltyDenominator.toString(),
    minimumLock: s.minimumLock.toString(),
  };
}

export function deserializeEscrowSettings(s: SerializedEscrowSettings): EscrowSettings {
  return {
    ...s,
    liquidationPenaltyNumerator: BigInt(s.liquidationPenaltyNumerator),
    liquidationPenaltyDenominator: BigInt(s.liquidationPenaltyDenominator),
    minimumLock: BigInt(s.minimumLock),
  };
}

export function serializeRewardsSettings(s: RewardsSettings): SerializedRewardsSettings {
  return { ...s, maxEmissionRate: s.maxEmissionRate.toString() };
}

export function deserializeRewardsSettings(s: SerializedRewardsSettings): RewardsSettings {
  return { ...s, maxEmissionRate: BigInt(s.maxEmissionRate) };
}

// ── Events ─────────────────────────────────────────────────────────

export interface EventRow {
  event_type: string;
  timestamp: number;
  blk: number;
  account_id: string | null;
  position_id: number | null;
  details: string;
}

export function eventToRow(e: LedgerEvent): EventRow {
  return {
    event_type: e.eventType,
    timestamp: e.timestamp,
    blk: e.blk,
    account_id: e.accountId ?? null,
    position_id: e.positionId ?? null,
    details: JSON.stringify(e.details),
  };
}

export function rowToEvent(row: EventRow): LedgerEvent {
  const event: LedgerEvent = {
    eventType: row.event_type as LedgerEvent['eventType'],
    timestamp: row.timestamp,
    blk: row.blk,
    details: JSON.parse(row.details),
  };
  if (row.account_id !== null) event.accountId = row.account_id;
  if (row.position_id !== null) event.positionId = row.position_id;
  return event;
}
