/**
 * Shared guards for the ledger engines: governor check, all-or-nothing
 * mutation and a re-entrancy lock.
 */

import { ErrorCodes, LedgerError } from '../errors';
import { LedgerEvent } from './serviceTypes';

export interface GuardedState {
  settings: { governor: string };
  events: LedgerEvent[];
}

export function requireGovernor(state: GuardedState, caller: string): void {
  if (caller !== state.settings.governor) {
    throw new LedgerError(ErrorCodes.NOT_GOVERNOR, `${caller} is not the governor`);
  }
}

export class StateGuard<S extends GuardedState> {
  private entered = false;

  constructor(
    private readonly read: () => S,
    private readonly write: (state: S) => void
  ) {}

  /**
   * Run `fn` against the engine state and restore the state if it throws.
   * The event log is append-only, so it stays out of the copy and is cut
   * back to its earlier length instead.
   */
  mutate<T>(fn: () => T): T {
    const state = this.read();
    const events = state.events;
    const mark = events.length;
    const snapshot = structuredClone({ ...state, events: [] });
    try {
      return fn();
    } catch (err) {
      events.length = mark;
      this.write({ ...snapshot, events });
      throw err;
    }
  }

  nonReentrant<T>(fn: () => T): T {
    if (this.entered) {
      throw new LedgerError(ErrorCodes.REENTRANT_CALL, 'Reentrant call');
    }
    this.entered = true;
    try {
      return fn();
    } finally {
      this.entered = false;
    }
  }
}
