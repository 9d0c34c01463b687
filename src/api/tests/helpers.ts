/**
 * Test helpers for signature-based account authentication.
 *
 * Generates real Ed25519 keypairs and derives addresses exactly as the
 * production code does.
 */

import request from 'supertest';
import type { Express } from 'express';
import { buildRequestMessage, deriveAddress, generateKeyPair, sign } from '../../crypto';
import { ManualClock } from '../../collaborators';
import { InMemoryLedgerStore } from '../../persistence';
import { WEEK } from '../../types';
import { createApp } from '../app';
import { loadConfig } from '../config';
import { ApiState, createApiState } from '../state';

export const ADMIN_KEY = 'test-admin-key';

/** A week-aligned midnight */
export const T0 = 2800 * WEEK;

export interface TestAccount {
  accountId: string;
  publicKeyHex: string;
  secretKeyHex: string;
}

export interface TestServer {
  state: ApiState;
  app: Express;
  clock: ManualClock;
}

export function createTestServer(env: NodeJS.ProcessEnv = {}): TestServer {
  const clock = new ManualClock(T0);
  const state = createApiState({
    config: loadConfig({ STORE_BACKEND: 'memory', ADMIN_KEY, ...env }),
    store: new InMemoryLedgerStore(),
    clock,
  });
  return { state, app: createApp(state), clock };
}

export function makeTestAccount(): TestAccount {
  const { publicKey, secretKey } = generateKeyPair();
  return { accountId: deriveAddress(publicKey), publicKeyHex: publicKey, secretKeyHex: secretKey };
}

/**
 * Sign a request with the current wall-clock time.
 * Message format: "VE:v1:{accountId}:{isoTimestamp}"
 */
export function signRequest(account: TestAccount): { accountId: string; timestamp: string; signature: string } {
  const timestamp = new Date().toISOString();
  const signature = sign(buildRequestMessage(account.accountId, timestamp), account.secretKeyHex);
  return { accountId: account.accountId, timestamp, signature };
}

/** Register a fresh account and optionally fund it through the admin mint */
export async function registerAccount(app: Express, tokens?: number): Promise<TestAccount> {
  const account = makeTestAccount();
  await request(app).post('/accounts/register').send({ publicKey: account.publicKeyHex }).expect(201);
  if (tokens !== undefined) {
    await request(app)
      .post('/admin/mint')
      .set('X-Admin-Key', ADMIN_KEY)
      .send({ to: account.accountId, amount: String(tokens) })
      .expect(200);
    await request(app)
      .post('/token/approve')
      .send({ ...signRequest(account), amount: String(tokens) })
      .expect(200);
  }
  return account;
}
