import request from 'supertest';
import { ErrorCodes } from '../types';
import { buildRequestMessage, sign } from '../../crypto';
import { toTokenUnits } from '../../fixedPoint';
import { TestServer, createTestServer, makeTestAccount, registerAccount, signRequest, ADMIN_KEY } from './helpers';

describe('/accounts endpoints', () => {
  let server: TestServer;

  beforeEach(() => {
    server = createTestServer();
  });

  describe('POST /accounts/register', () => {
    it('should register a key under its derived address', async () => {
      const account = makeTestAccount();

      const response = await request(server.app)
        .post('/accounts/register')
        .send({ publicKey: account.publicKeyHex });

      expect(response.status).toBe(201);
      expect(response.body).toEqual({ success: true, accountId: account.accountId });
      expect(response.body.accountId).toMatch(/^ve[0-9a-f]{40}$/);
      expect(server.state.accounts.get(account.accountId)).toBe(account.publicKeyHex);
    });

    it('should reject a key that is not Ed25519', async () => {
      const response = await request(server.app).post('/accounts/register').send({ publicKey: 'abcd' });

      expect(response.status).toBe(400);
      expect(response.body.code).toBe(ErrorCodes.INVALID_PUBLIC_KEY);
    });

    it('should reject a second registration of the same key', async () => {
      const account = makeTestAccount();
      await request(server.app).post('/accounts/register').send({ publicKey: account.publicKeyHex });

      const response = await request(server.app)
        .post('/accounts/register')
        .send({ publicKey: account.publicKeyHex });

      expect(response.status).toBe(409);
      expect(response.body.code).toBe(ErrorCodes.DUPLICATE_ACCOUNT);
    });

    it('should persist the registration', async () => {
      const account = makeTestAccount();
      await request(server.app).post('/accounts/register').send({ publicKey: account.publicKeyHex });

      const saved = await server.state.store.load();
      expect(saved?.accounts.get(account.accountId)).toBe(account.publicKeyHex);
    });
  });

  describe('GET /accounts/:accountId', () => {
    it('should summarise balance, positions and votes', async () => {
      const alice = await registerAccount(server.app, 1000);
      await request(server.app)
        .post('/locks')
        .send({ ...signRequest(alice), amount: '400', duration: 52 * 604800 })
        .expect(201);

      const response = await request(server.app).get(`/accounts/${alice.accountId}`);

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        success: true,
        accountId: alice.accountId,
        registered: true,
        balance: toTokenUnits(600).toString(),
        positions: [1],
        delegate: alice.accountId,
        votes: server.state.escrow.votingPowerOf(1).toString(),
        nonce: 0,
      });
    });

    it('should describe an unknown account as empty', async () => {
      const response = await request(server.app).get('/accounts/nobody');

      expect(response.status).toBe(200);
      expect(response.body.registered).toBe(false);
      expect(response.body.balance).toBe('0');
      expect(response.body.positions).toEqual([]);
      expect(response.body.delegate).toBe('nobody');
    });
  });

  describe('GET /accounts/:accountId/events', () => {
    it('should list the account events newest first', async () => {
      const alice = await registerAccount(server.app, 1000);
      await request(server.app)
        .post('/locks')
        .send({ ...signRequest(alice), amount: '400', duration: 52 * 604800 })
        .expect(201);

      const response = await request(server.app).get(`/accounts/${alice.accountId}/events`);

      expect(response.status).toBe(200);
      expect(response.body.events.map((e: { eventType: string }) => e.eventType)).toEqual([
        'DEPOSIT',
        'TRANSFER',
      ]);
    });

    it('should honour the limit', async () => {
      const alice = await registerAccount(server.app, 1000);
      await request(server.app)
        .post('/locks')
        .send({ ...signRequest(alice), amount: '400', duration: 52 * 604800 })
        .expect(201);

      const response = await request(server.app).get(`/accounts/${alice.accountId}/events?limit=1`);

      expect(response.body.events).toHaveLength(1);
      expect(response.body.events[0].eventType).toBe('DEPOSIT');
    });
  });

  describe('request signatures', () => {
    it('should reject a request without an accountId', async () => {
      const response = await request(server.app).post('/token/approve').send({ amount: '1' });

      expect(response.status).toBe(400);
      expect(response.body.code).toBe(ErrorCodes.MISSING_ACCOUNT_ID);
    });

    it('should reject a request without a signature', async () => {
      const alice = await registerAccount(server.app);
      const response = await request(server.app)
        .post('/token/approve')
        .send({ accountId: alice.accountId, amount: '1' });

      expect(response.status).toBe(401);
      expect(response.body.code).toBe(ErrorCodes.INVALID_SIGNATURE);
    });

    it('should reject a timestamp outside the window', async () => {
      const alice = await registerAccount(server.app);
      const timestamp = new Date(Date.now() - 60_000).toISOString();
      const signature = sign(buildRequestMessage(alice.accountId, timestamp), alice.secretKeyHex);

      const response = await request(server.app)
        .post('/token/approve')
        .send({ accountId: alice.accountId, timestamp, signature, amount: '1' });

      expect(response.status).toBe(401);
      expect(response.body.error).toBe('Timestamp expired or invalid (±30s window)');
    });

    it('should reject an unregistered account', async () => {
      const stranger = makeTestAccount();
      const response = await request(server.app)
        .post('/token/approve')
        .send({ ...signRequest(stranger), amount: '1' });

      expect(response.status).toBe(404);
      expect(response.body.code).toBe(ErrorCodes.ACCOUNT_NOT_FOUND);
    });

    it('should reject a signature made with another key', async () => {
      const alice = await registerAccount(server.app);
      const mallory = makeTestAccount();
      const forged = signRequest({ ...mallory, accountId: alice.accountId });

      const response = await request(server.app)
        .post('/token/approve')
        .send({ ...forged, amount: '1' });

      expect(response.status).toBe(401);
      expect(response.body.error).toBe('Invalid signature');
    });
  });

  describe('/token', () => {
    it('should report metadata and supply', async () => {
      const alice = await registerAccount(server.app, 250);

      const response = await request(server.app).get('/token');

      expect(response.status).toBe(200);
      expect(response.body.totalSupply).toBe(toTokenUnits(250).toString());
      expect(response.body.custodyAccount).toBe('escrow-custody');
      expect(response.body.rewardPoolAccount).toBe('reward-pool');

      const balance = await request(server.app).get(`/token/balance/${alice.accountId}`);
      expect(balance.body.balance).toBe(toTokenUnits(250).toString());
      expect(balance.body.custodyAllowance).toBe(toTokenUnits(250).toString());
    });

    it('should transfer between accounts', async () => {
      const alice = await registerAccount(server.app, 100);

      const response = await request(server.app)
        .post('/token/transfer')
        .send({ ...signRequest(alice), to: 'bob', amount: '30.5' });

      expect(response.status).toBe(200);
      expect(response.body.amount).toBe(toTokenUnits('30.5').toString());
      expect(server.state.token.balanceOf('bob')).toBe(toTokenUnits('30.5'));
      expect(server.state.token.balanceOf(alice.accountId)).toBe(toTokenUnits('69.5'));
    });

    it('should reject a transfer beyond the balance', async () => {
      const alice = await registerAccount(server.app, 10);

      const response = await request(server.app)
        .post('/token/transfer')
        .send({ ...signRequest(alice), to: 'bob', amount: '11' });

      expect(response.status).toBe(409);
      expect(server.state.token.balanceOf(alice.accountId)).toBe(toTokenUnits(10));
    });

    it('should only mint with the admin key', async () => {
      const response = await request(server.app).post('/admin/mint').send({ to: 'bob', amount: '1' });
      expect(response.status).toBe(401);

      const wrong = await request(server.app)
        .post('/admin/mint')
        .set('X-Admin-Key', `${ADMIN_KEY}-wrong`)
        .send({ to: 'bob', amount: '1' });
      expect(wrong.status).toBe(401);
      expect(server.state.token.balanceOf('bob')).toBe(0n);
    });
  });
});
