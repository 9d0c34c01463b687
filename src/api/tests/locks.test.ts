import request from 'supertest';
import { ErrorCodes } from '../types';
import { ErrorCodes as LedgerErrorCodes } from '../../errors';
import { toTokenUnits } from '../../fixedPoint';
import { WEEK } from '../../types';
import { ADMIN_KEY, T0, TestAccount, TestServer, createTestServer, registerAccount, signRequest } from './helpers';

describe('/locks endpoints', () => {
  let server: TestServer;
  let alice: TestAccount;

  async function createLock(amount: string, duration: number): Promise<number> {
    const response = await request(server.app)
      .post('/locks')
      .send({ ...signRequest(alice), amount, duration })
      .expect(201);
    return response.body.positionId;
  }

  beforeEach(async () => {
    server = createTestServer();
    alice = await registerAccount(server.app, 10_000);
  });

  describe('POST /locks', () => {
    it('should lock tokens into a new position', async () => {
      const response = await request(server.app)
        .post('/locks')
        .send({ ...signRequest(alice), amount: '1000', duration: 4 * 365 * 86400 });

      expect(response.status).toBe(201);
      expect(response.body).toEqual({
        success: true,
        positionId: 1,
        owner: alice.accountId,
        amount: toTokenUnits(1000).toString(),
        end: T0 + 208 * WEEK,
        votingPower: '997260273972584294400',
        nonVoting: false,
        createdAt: T0,
        userPointEpoch: 1,
        tokenURI: '1',
      });
      expect(server.state.token.balanceOf(alice.accountId)).toBe(toTokenUnits(9_000));
      expect(server.state.token.balanceOf('escrow-custody')).toBe(toTokenUnits(1000));
    });

    it('should create a non-voting position for another recipient', async () => {
      const response = await request(server.app)
        .post('/locks')
        .send({ ...signRequest(alice), amount: '10', duration: 4 * WEEK, recipient: 'bob', voting: false });

      expect(response.status).toBe(201);
      expect(response.body.owner).toBe('bob');
      expect(response.body.nonVoting).toBe(true);
      expect(server.state.escrow.totalPowerAt()).toBe(0n);
    });

    it('should reject a missing duration', async () => {
      const response = await request(server.app)
        .post('/locks')
        .send({ ...signRequest(alice), amount: '10' });

      expect(response.status).toBe(400);
      expect(response.body.code).toBe(ErrorCodes.INVALID_REQUEST);
    });

    it('should map engine errors to their status', async () => {
      const tooLong = await request(server.app)
        .post('/locks')
        .send({ ...signRequest(alice), amount: '10', duration: 5 * 365 * 86400 });
      expect(tooLong.status).toBe(422);
      expect(tooLong.body.code).toBe(LedgerErrorCodes.LOCK_DURATION_TOO_LONG);

      const tooSmall = await request(server.app)
        .post('/locks')
        .send({ ...signRequest(alice), amount: '0.5', duration: 4 * WEEK });
      expect(tooSmall.status).toBe(422);
      expect(tooSmall.body.code).toBe(LedgerErrorCodes.AMOUNT_TOO_SMALL);
      expect(tooSmall.body.details).toEqual({
        amount: toTokenUnits('0.5').toString(),
        minimum: toTokenUnits(1).toString(),
      });
    });

    it('should fail the transfer of unapproved tokens and keep nothing', async () => {
      const response = await request(server.app)
        .post('/locks')
        .send({ ...signRequest(alice), amount: '20000', duration: 4 * WEEK });

      expect(response.status).toBe(409);
      expect(response.body.code).toBe(LedgerErrorCodes.TRANSFER_FAILED);
      expect(server.state.escrow.supply()).toBe(0n);
      expect(server.state.escrow.tokensOfOwner(alice.accountId)).toEqual([]);
    });
  });

  describe('GET /locks/:id', () => {
    it('should 404 an unknown position', async () => {
      const response = await request(server.app).get('/locks/7');

      expect(response.status).toBe(404);
      expect(response.body.code).toBe(LedgerErrorCodes.NO_LOCK_FOUND);
    });

    it('should 400 a malformed id', async () => {
      const response = await request(server.app).get('/locks/abc');
      expect(response.status).toBe(400);
    });

    it('should report historical power', async () => {
      await createLock('1000', 52 * WEEK);
      server.clock.advance(10 * WEEK);

      const response = await request(server.app).get(`/locks/1/power?t=${T0}`);

      expect(response.status).toBe(200);
      expect(response.body.timestamp).toBe(T0);
      expect(response.body.votingPower).toBe(server.state.escrow.votingPowerOf(1, T0).toString());

      const now = await request(server.app).get('/locks/1/power');
      expect(now.body.timestamp).toBe(T0 + 10 * WEEK);
      expect(BigInt(now.body.votingPower)).toBeLessThan(BigInt(response.body.votingPower));
    });
  });

  describe('lock changes', () => {
    beforeEach(async () => {
      await createLock('1000', 52 * WEEK);
      server.clock.advance(1);
    });

    it('should increase the amount', async () => {
      const response = await request(server.app)
        .post('/locks/1/increase-amount')
        .send({ ...signRequest(alice), amount: '500' });

      expect(response.status).toBe(200);
      expect(response.body.amount).toBe(toTokenUnits(1500).toString());
      expect(response.body.userPointEpoch).toBe(2);
    });

    it('should let anyone deposit for a position', async () => {
      const bob = await registerAccount(server.app, 100);

      const response = await request(server.app)
        .post('/locks/1/deposit')
        .send({ ...signRequest(bob), amount: '100' });

      expect(response.status).toBe(200);
      expect(response.body.owner).toBe(alice.accountId);
      expect(response.body.amount).toBe(toTokenUnits(1100).toString());
      expect(server.state.token.balanceOf(bob.accountId)).toBe(0n);
    });

    it('should extend the unlock time', async () => {
      const response = await request(server.app)
        .post('/locks/1/extend')
        .send({ ...signRequest(alice), duration: 104 * WEEK });

      expect(response.status).toBe(200);
      expect(response.body.end).toBe(T0 + 104 * WEEK);
    });

    it('should refuse changes from a stranger', async () => {
      const bob = await registerAccount(server.app, 100);

      const response = await request(server.app)
        .post('/locks/1/increase-amount')
        .send({ ...signRequest(bob), amount: '1' });

      expect(response.status).toBe(403);
      expect(response.body.code).toBe(LedgerErrorCodes.NOT_AUTHORIZED);
    });

    it('should split a position in two', async () => {
      const response = await request(server.app)
        .post('/locks/1/split')
        .send({ ...signRequest(alice), amount: '400' });

      expect(response.status).toBe(201);
      expect(response.body.original.amount).toBe(toTokenUnits(600).toString());
      expect(response.body.created.positionId).toBe(2);
      expect(response.body.created.amount).toBe(toTokenUnits(400).toString());
      expect(response.body.created.end).toBe(response.body.original.end);
      expect(server.state.escrow.supply()).toBe(toTokenUnits(1000));
    });

    it('should merge one position into another', async () => {
      await createLock('500', 26 * WEEK);
      server.clock.advance(1);

      const response = await request(server.app)
        .post('/locks/1/merge')
        .send({ ...signRequest(alice), from: 2 });

      expect(response.status).toBe(200);
      expect(response.body.amount).toBe(toTokenUnits(1500).toString());
      expect(server.state.escrow.ownerOf(2)).toBeUndefined();
      expect(server.state.escrow.tokensOfOwner(alice.accountId)).toEqual([1]);
    });

    it('should reject merging a position into itself', async () => {
      const response = await request(server.app)
        .post('/locks/1/merge')
        .send({ ...signRequest(alice), from: 1 });

      expect(response.status).toBe(409);
      expect(response.body.code).toBe(LedgerErrorCodes.SAME_POSITION);
    });

    it('should transfer the position and its votes', async () => {
      const response = await request(server.app)
        .post('/locks/1/transfer')
        .send({ ...signRequest(alice), to: 'bob' });

      expect(response.status).toBe(200);
      expect(response.body.owner).toBe('bob');
      expect(server.state.escrow.getVotes('bob')).toBe(server.state.escrow.votingPowerOf(1));
      expect(server.state.escrow.getVotes(alice.accountId)).toBe(0n);
    });

    it('should let an approved spender transfer', async () => {
      const bob = await registerAccount(server.app);
      await request(server.app)
        .post('/locks/1/approve')
        .send({ ...signRequest(alice), approved: bob.accountId })
        .expect(200);

      const response = await request(server.app)
        .post('/locks/1/transfer')
        .send({ ...signRequest(bob), to: bob.accountId });

      expect(response.status).toBe(200);
      expect(response.body.owner).toBe(bob.accountId);
      expect(server.state.escrow.getApproved(1)).toBeUndefined();
    });

    it('should let an operator act on all positions', async () => {
      const bob = await registerAccount(server.app);
      const approval = await request(server.app)
        .post('/locks/operators')
        .send({ ...signRequest(alice), operator: bob.accountId, approved: true });
      expect(approval.body).toEqual({ success: true, operator: bob.accountId, approved: true });

      const response = await request(server.app)
        .post('/locks/1/extend')
        .send({ ...signRequest(bob), duration: 100 * WEEK });

      expect(response.status).toBe(200);
      expect(response.body.end).toBe(T0 + 100 * WEEK);
    });
  });

  describe('exits', () => {
    it('should withdraw once the lock has expired', async () => {
      await createLock('1000', WEEK);

      const early = await request(server.app)
        .post('/locks/1/withdraw')
        .send(signRequest(alice));
      expect(early.status).toBe(409);
      expect(early.body.code).toBe(LedgerErrorCodes.LOCK_NOT_EXPIRED);

      server.clock.advance(WEEK);
      const response = await request(server.app)
        .post('/locks/1/withdraw')
        .send(signRequest(alice));

      expect(response.status).toBe(200);
      expect(response.body).toEqual({ success: true, positionId: 1, returned: toTokenUnits(1000).toString() });
      expect(server.state.token.balanceOf(alice.accountId)).toBe(toTokenUnits(10_000));
      expect(server.state.escrow.ownerOf(1)).toBeUndefined();
    });

    it('should liquidate once the governor enables it', async () => {
      await createLock('1000', 52 * WEEK);
      server.clock.advance(1);

      const disabled = await request(server.app)
        .post('/locks/1/liquidate')
        .send(signRequest(alice));
      expect(disabled.status).toBe(409);
      expect(disabled.body.code).toBe(LedgerErrorCodes.LIQUIDATIONS_DISABLED);

      await request(server.app)
        .post('/admin/settings')
        .set('X-Admin-Key', ADMIN_KEY)
        .send({ liquidationsEnabled: true })
        .expect(200);

      const power = server.state.escrow.votingPowerOf(1);
      const penalty = (power * 50_000n) / 100_000n;
      const response = await request(server.app)
        .post('/locks/1/liquidate')
        .send(signRequest(alice));

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        success: true,
        positionId: 1,
        returned: (toTokenUnits(1000) - penalty).toString(),
        penalty: penalty.toString(),
      });
      expect(server.state.token.balanceOf('governor')).toBe(penalty);
    });
  });
});
