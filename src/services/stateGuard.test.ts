import { ErrorCodes, LedgerError } from '../errors';
import { LedgerEvent } from './serviceTypes';
import { StateGuard, requireGovernor } from './stateGuard';
import { catchLedgerError } from './testHelpers';

interface CounterState {
  settings: { governor: string };
  events: LedgerEvent[];
  count: number;
  history: number[];
}

function settingsEvent(timestamp: number): LedgerEvent {
  return { eventType: 'SETTINGS_CHANGED', timestamp, blk: timestamp, details: {} };
}

describe('StateGuard', () => {
  let state: CounterState;
  let guard: StateGuard<CounterState>;

  beforeEach(() => {
    state = { settings: { governor: 'governor' }, events: [], count: 0, history: [] };
    guard = new StateGuard<CounterState>(
      () => state,
      next => {
        state = next;
      }
    );
  });

  describe('mutate', () => {
    it('should keep the changes of a call that returns', () => {
      const result = guard.mutate(() => {
        state.count += 1;
        state.history.push(1);
        state.events.push(settingsEvent(1));
        return state.count;
      });

      expect(result).toBe(1);
      expect(state.count).toBe(1);
      expect(state.history).toEqual([1]);
      expect(state.events).toHaveLength(1);
    });

    it('should restore the state and cut the event log back when the call throws', () => {
      state.events.push(settingsEvent(1));
      const log = state.events;

      expect(() =>
        guard.mutate(() => {
          state.count = 7;
          state.history.push(7);
          state.events.push(settingsEvent(2), settingsEvent(3));
          throw new LedgerError(ErrorCodes.ZERO_AMOUNT, 'nothing to do');
        })
      ).toThrow('nothing to do');

      expect(state.count).toBe(0);
      expect(state.history).toEqual([]);
      expect(state.events).toBe(log);
      expect(state.events.map(e => e.timestamp)).toEqual([1]);
    });

    it('should undo a nested call without losing the outer changes', () => {
      guard.mutate(() => {
        state.count = 1;
        state.events.push(settingsEvent(1));
        try {
          guard.mutate(() => {
            state.count = 2;
            state.events.push(settingsEvent(2));
            throw new Error('inner');
          });
        } catch (err) {
          expect(err).toEqual(new Error('inner'));
        }
        state.history.push(state.count);
      });

      expect(state.count).toBe(1);
      expect(state.history).toEqual([1]);
      expect(state.events.map(e => e.timestamp)).toEqual([1]);
    });
  });

  describe('nonReentrant', () => {
    it('should reject a call made from inside a guarded call', () => {
      const err = catchLedgerError(() => guard.nonReentrant(() => guard.nonReentrant(() => 1)));
      expect(err.code).toBe(ErrorCodes.REENTRANT_CALL);
    });

    it('should release the lock after a failure', () => {
      expect(() =>
        guard.nonReentrant(() => {
          throw new Error('boom');
        })
      ).toThrow('boom');

      expect(guard.nonReentrant(() => 'again')).toBe('again');
    });
  });

  describe('requireGovernor', () => {
    it('should accept the governor and reject anyone else', () => {
      expect(() => requireGovernor(state, 'governor')).not.toThrow();
      expect(catchLedgerError(() => requireGovernor(state, 'alice')).code).toBe(ErrorCodes.NOT_GOVERNOR);
    });
  });
});
