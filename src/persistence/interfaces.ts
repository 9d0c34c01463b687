import { EscrowState, LedgerEvent, LedgerEventType, RewardsState } from '../services/serviceTypes';
import { NodePropertiesSnapshot, TokenSnapshot } from '../collaborators';

/**
 * Everything the service needs to resume after a restart.
 */
export interface LedgerSnapshot {
  escrow: EscrowState;
  rewards: RewardsState;
  token: TokenSnapshot;
  nodes: NodePropertiesSnapshot;
  /** Registered account address -> hex Ed25519 public key */
  accounts: Map<string, string>;
}

export interface EventQuery {
  eventType?: LedgerEventType;
  accountId?: string;
  positionId?: number;
  /** Most recent first, at most this many */
  limit?: number;
}

export interface ILedgerStore {
  /** Persist the full snapshot. Saving is all-or-nothing. */
  save(snapshot: LedgerSnapshot): Promise<void>;
  load(): Promise<LedgerSnapshot | undefined>;
  /** Query the append-only event log of both engines */
  queryEvents(query: EventQuery): Promise<LedgerEvent[]>;
  close(): void;
}
