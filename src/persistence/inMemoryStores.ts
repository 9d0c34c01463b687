import { EventQuery, ILedgerStore, LedgerSnapshot } from './interfaces';
import { LedgerEvent } from '../services/serviceTypes';

/**
 * Process-local store. Saves are deep copies so later mutation of the
 * live state never leaks into what was saved.
 */
export class InMemoryLedgerStore implements ILedgerStore {
  private snapshot: LedgerSnapshot | undefined;

  async save(snapshot: LedgerSnapshot): Promise<void> {
    this.snapshot = structuredClone(snapshot);
  }

  async load(): Promise<LedgerSnapshot | undefined> {
    return this.snapshot ? structuredClone(this.snapshot) : undefined;
  }

  async queryEvents(query: EventQuery): Promise<LedgerEvent[]> {
    if (!this.snapshot) return [];
    const all = mergeEventLogs(this.snapshot.escrow.events, this.snapshot.rewards.events);
    return applyEventQuery(all, query);
  }

  close(): void {
    this.snapshot = undefined;
  }
}

/** Interleave two logs by timestamp, escrow entries first on ties */
export function mergeEventLogs(escrow: LedgerEvent[], rewards: LedgerEvent[]): LedgerEvent[] {
  const merged: LedgerEvent[] = [];
  let i = 0;
  let j = 0;
  while (i < escrow.length || j < rewards.length) {
    if (j >= rewards.length || (i < escrow.length && escrow[i].timestamp <= rewards[j].timestamp)) {
      merged.push(escrow[i++]);
    } else {
      merged.push(rewards[j++]);
    }
  }
  return merged;
}

export function applyEventQuery(events: LedgerEvent[], query: EventQuery): LedgerEvent[] {
  const filtered = events.filter(e => {
    if (query.eventType && e.eventType !== query.eventType) return false;
    if (query.accountId && e.accountId !== query.accountId) return false;
    if (query.positionId !== undefined && e.positionId !== query.positionId) return false;
    return true;
  });
  filtered.reverse();
  return query.limit !== undefined ? filtered.slice(0, query.limit) : filtered;
}
