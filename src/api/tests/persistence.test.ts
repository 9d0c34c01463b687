import request from 'supertest';
import type { Express } from 'express';
import { ManualClock } from '../../collaborators';
import { toTokenUnits } from '../../fixedPoint';
import { InMemoryLedgerStore } from '../../persistence';
import { LedgerSnapshot } from '../../persistence/interfaces';
import { WEEK } from '../../types';
import { createApp } from '../app';
import { loadConfig } from '../config';
import { ApiState, createApiState } from '../state';
import { ErrorCodes } from '../types';
import { ADMIN_KEY, T0, TestAccount, registerAccount, signRequest } from './helpers';

/** In-memory store that can be told to refuse saves */
class FlakyStore extends InMemoryLedgerStore {
  failing = false;

  async save(snapshot: LedgerSnapshot): Promise<void> {
    if (this.failing) {
      throw new Error('disk full');
    }
    await super.save(snapshot);
  }
}

describe('persisting after a mutation', () => {
  let store: FlakyStore;
  let clock: ManualClock;
  let state: ApiState;
  let app: Express;
  let alice: TestAccount;
  let errorSpy: jest.SpyInstance;

  beforeEach(async () => {
    store = new FlakyStore();
    clock = new ManualClock(T0);
    state = createApiState({
      config: loadConfig({ STORE_BACKEND: 'memory', ADMIN_KEY }),
      store,
      clock,
    });
    app = createApp(state);
    alice = await registerAccount(app, 1000);
    await request(app)
      .post('/locks')
      .send({ ...signRequest(alice), amount: '600', duration: 52 * WEEK })
      .expect(201);
    clock.advance(1);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    errorSpy.mockRestore();
  });

  it('should put the ledger back to the saved state when the save fails', async () => {
    store.failing = true;

    const response = await request(app)
      .post('/locks')
      .send({ ...signRequest(alice), amount: '300', duration: 52 * WEEK });

    expect(response.status).toBe(500);
    expect(response.body.code).toBe(ErrorCodes.INTERNAL_ERROR);
    expect(state.escrow.supply()).toBe(toTokenUnits(600));
    expect(state.escrow.ownerOf(2)).toBeUndefined();
    expect(state.escrow.tokensOfOwner(alice.accountId)).toEqual([1]);
    expect(state.token.balanceOf(alice.accountId)).toBe(toTokenUnits(400));
    expect(state.accounts.has(alice.accountId)).toBe(true);
  });

  it('should accept the same request once the store recovers', async () => {
    store.failing = true;
    await request(app)
      .post('/locks')
      .send({ ...signRequest(alice), amount: '300', duration: 52 * WEEK })
      .expect(500);
    store.failing = false;

    const response = await request(app)
      .post('/locks')
      .send({ ...signRequest(alice), amount: '300', duration: 52 * WEEK });

    expect(response.status).toBe(201);
    expect(state.escrow.ownerOf(2)).toBe(alice.accountId);
    expect(state.escrow.supply()).toBe(toTokenUnits(900));
    const saved = await store.load();
    expect(saved?.escrow.supply).toBe(toTokenUnits(900));
  });
});
