import request from 'supertest';

import { stakingOperationsTotal } from '../../src/observability/metrics';
import { CUSTODY, SECONDS_PER_YEAR as YEAR, TestApp, bearer, createTestApp } from '../helpers';

describe('Staking API', () => {
  let ctx: TestApp;

  beforeEach(() => {
    ctx = createTestApp();
    ctx.assets.inner.fund('alice', 1_000_000n);
    ctx.assets.inner.fund(CUSTODY, 100_000n);
  });

  const deposit = (amount: unknown, participantId = 'alice') =>
    request(ctx.app)
      .post('/staking/deposit')
      .set('Authorization', bearer(participantId))
      .send({ amount });

  describe('authentication', () => {
    it('should reject mutations without a token', async () => {
      const response = await request(ctx.app).post('/staking/deposit').send({ amount: '100' });

      expect(response.status).toBe(401);
      expect(response.body.success).toBe(false);
      expect(response.body.error.code).toBe(1001);
    });

    it('should reject an invalid token', async () => {
      const response = await request(ctx.app)
        .post('/staking/claim')
        .set('Authorization', 'Bearer not-a-token');

      expect(response.status).toBe(401);
      expect(response.body.error.code).toBe(1002);
    });

    it('should allow reads without a token', async () => {
      const response = await request(ctx.app).get('/staking/positions/alice/pending-reward');

      expect(response.status).toBe(200);
    });
  });

  describe('full lifecycle', () => {
    it('should deposit, accrue, withdraw and claim', async () => {
      const deposited = await deposit('1000000');

      expect(deposited.status).toBe(200);
      expect(deposited.body).toEqual({
        success: true,
        data: {
          participantId: 'alice',
          amount: '1000000',
          position: { principal: '1000000', accruedReward: '0', lastSettledAt: 0 },
        },
      });

      ctx.clock.now = YEAR;

      const pending = await request(ctx.app).get('/staking/positions/alice/pending-reward');
      expect(pending.body.data).toEqual({
        participantId: 'alice',
        pendingReward: '100000',
        asOf: YEAR,
      });

      const withdrawn = await request(ctx.app)
        .post('/staking/withdraw')
        .set('Authorization', bearer('alice'))
        .send({ amount: 400000 });

      expect(withdrawn.status).toBe(200);
      expect(withdrawn.body.data.position).toEqual({
        principal: '600000',
        accruedReward: '100000',
        lastSettledAt: YEAR,
      });

      const claimed = await request(ctx.app)
        .post('/staking/claim')
        .set('Authorization', bearer('alice'));

      expect(claimed.status).toBe(200);
      expect(claimed.body.data).toEqual({
        participantId: 'alice',
        reward: '100000',
        position: { principal: '600000', accruedReward: '0', lastSettledAt: YEAR },
      });

      expect(ctx.assets.inner.balanceOf('alice')).toBe(500_000n);
      expect(ctx.events.list()).toHaveLength(3);
    });
  });

  describe('POST /staking/deposit', () => {
    it('should reject a zero amount', async () => {
      const response = await deposit('0');

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe(2002);
    });

    it('should reject a malformed amount', async () => {
      const response = await deposit('-5');

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe(2001);
      expect(response.body.error.details).toEqual({
        amount: ['Amount must be a non-negative integer (decimal string or safe integer)'],
      });
    });

    it('should reject a missing amount', async () => {
      const response = await request(ctx.app)
        .post('/staking/deposit')
        .set('Authorization', bearer('alice'))
        .send({});

      expect(response.status).toBe(400);
      expect(response.body.error.details).toEqual({ amount: ['Amount is required'] });
    });

    it('should reject a malformed JSON body', async () => {
      const response = await request(ctx.app)
        .post('/staking/deposit')
        .set('Authorization', bearer('alice'))
        .set('Content-Type', 'application/json')
        .send('{"amount":');

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe(2001);
    });

    it('should report a failed transfer as 422', async () => {
      const response = await deposit('100', 'bob');

      expect(response.status).toBe(422);
      expect(response.body.error).toMatchObject({
        code: 3003,
        message: 'Asset transfer failed: INSUFFICIENT_BALANCE',
      });
    });

    it('should reject an invalid idempotency key', async () => {
      const response = await request(ctx.app)
        .post('/staking/deposit')
        .set('Authorization', bearer('alice'))
        .set('X-Idempotency-Key', 'not valid!')
        .send({ amount: '100' });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe(2003);
      expect(await ctx.store.load('alice')).toBeNull();
    });

    it('should surface a clock regression as a server error', async () => {
      ctx.clock.now = 100;
      await deposit('100');

      ctx.clock.now = 50;
      const response = await deposit('100');

      expect(response.status).toBe(500);
      expect(response.body.error.code).toBe(5006);
    });

    it('should count successful operations', async () => {
      await deposit('100');

      const { values } = await stakingOperationsTotal.get();
      expect(values).toEqual([
        expect.objectContaining({
          value: 1,
          labels: expect.objectContaining({ operation: 'deposit', outcome: 'success' }),
        }),
      ]);
    });
  });

  describe('POST /staking/withdraw', () => {
    it('should reject more than the staked principal', async () => {
      await deposit('100');

      const response = await request(ctx.app)
        .post('/staking/withdraw')
        .set('Authorization', bearer('alice'))
        .send({ amount: '101' });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe(3001);
    });

    it('should act only on the caller position', async () => {
      await deposit('100');

      const response = await request(ctx.app)
        .post('/staking/withdraw')
        .set('Authorization', bearer('mallory'))
        .send({ amount: '100' });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe(3001);
    });
  });

  describe('POST /staking/claim', () => {
    it('should reject when no reward has accrued', async () => {
      await deposit('1000');

      const response = await request(ctx.app)
        .post('/staking/claim')
        .set('Authorization', bearer('alice'));

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe(3002);
    });
  });

  describe('GET /staking/positions/:participantId', () => {
    it('should return the position with pending reward', async () => {
      await deposit('1000000');
      ctx.clock.now = YEAR / 2;

      const response = await request(ctx.app).get('/staking/positions/alice');

      expect(response.status).toBe(200);
      expect(response.body.data.position).toEqual({
        participantId: 'alice',
        principal: '1000000',
        accruedReward: '0',
        lastSettledAt: 0,
        pendingReward: '50000',
        asOf: YEAR / 2,
      });
    });

    it('should return an empty position for an unknown participant', async () => {
      ctx.clock.now = 7;

      const response = await request(ctx.app).get('/staking/positions/nobody');

      expect(response.body.data.position).toEqual({
        participantId: 'nobody',
        principal: '0',
        accruedReward: '0',
        lastSettledAt: 7,
        pendingReward: '0',
        asOf: 7,
      });
    });

    it('should validate the participant ID', async () => {
      const response = await request(ctx.app).get('/staking/positions/bad%20id');

      expect(response.status).toBe(400);
      expect(response.body.error.details).toEqual({
        participantId: ['Participant ID contains invalid characters'],
      });
    });
  });

  describe('GET /staking/config', () => {
    it('should return the rate parameters', async () => {
      const response = await request(ctx.app).get('/staking/config');

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        success: true,
        data: { rateBps: 1000, secondsPerYear: YEAR, bpsDenominator: 10000 },
      });
    });
  });
});
