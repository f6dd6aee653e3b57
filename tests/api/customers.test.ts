import { describe, it, expect, vi } from 'vitest';
import request from 'supertest';
import app from '../../src/app';
import { apiHarness, SERVICE_HEADERS } from '../_fakes/apiHarness';
import { yookassaPayment } from '../_fakes/webhooks';

vi.mock('../../src/services', async () => {
  const { apiHarness: harness } = await import('../_fakes/apiHarness');
  return { getServices: () => harness.services };
});

const register = (body: Record<string, unknown>) =>
  request(app).post('/api/customers').set(SERVICE_HEADERS).send(body);

describe('customers and referrals over HTTP', () => {
  let orderId = '';

  it('registers buyers and fixes the referrer on first contact', async () => {
    const referrer = await register({ userId: '2002', username: 'ref_user' });
    expect(referrer.status).toBe(201);
    expect(referrer.body.data).toMatchObject({
      created: true,
      customer: { userId: '2002', username: 'ref_user', referredBy: null },
    });

    const buyer = await register({ userId: '1001', referredBy: '2002' });
    expect(buyer.status).toBe(201);
    expect(buyer.body.data.customer.referredBy).toBe('2002');

    const again = await register({ userId: '1001', referredBy: '3003' });
    expect(again.status).toBe(200);
    expect(again.body.data.created).toBe(false);
    expect(again.body.data.customer.referredBy).toBe('2002');
  });

  it('credits the referrer when the referred buyer pays', async () => {
    const order = await apiHarness.openOrder({ buyerId: '1001' });
    orderId = order.orderId;
    const delivery = yookassaPayment({ paymentId: 'pay-400', orderId, value: '10.00' });
    const paid = await request(app).post('/webhooks/yookassa').set(delivery.headers).send(delivery.body.toString());
    expect(paid.body.outcome).toBe('processed');

    const balance = await request(app).get('/api/referrals/2002/balance').set(SERVICE_HEADERS);
    expect(balance.status).toBe(200);
    expect(balance.body.data).toEqual({ userId: '2002', balance: 1, currency: 'RUB' });

    const stats = await request(app).get('/api/referrals/2002/stats').set(SERVICE_HEADERS);
    expect(stats.body.data).toEqual({ userId: '2002', currency: 'RUB', referredCount: 1, lifetimeEarned: 1, withdrawn: 0, balance: 1 });
  });

  it('lists the buyer orders and keys', async () => {
    const orders = await request(app).get('/api/customers/1001/orders').set(SERVICE_HEADERS);
    expect(orders.status).toBe(200);
    expect(orders.body.data.orders).toHaveLength(1);
    expect(orders.body.data.orders[0]).toMatchObject({ orderId, state: 'fulfilled' });

    const credentials = await request(app).get('/api/customers/1001/credentials').set(SERVICE_HEADERS);
    expect(credentials.body.data.credentials).toHaveLength(1);
    expect(credentials.body.data.credentials[0]).toMatchObject({
      orderId,
      hostId: 'de-1',
      expiresAt: '2026-03-31T12:00:00.000Z',
      revokedAt: null,
    });
  });

  it('refuses a withdrawal above the balance', async () => {
    const res = await request(app).post('/api/referrals/2002/withdrawals').set(SERVICE_HEADERS).send({ amount: 5 });

    expect(res.status).toBe(422);
    expect(res.body).toEqual({
      success: false,
      code: 'WITHDRAWAL_REJECTED',
      message: 'Insufficient referral balance: 1 RUB available',
    });
  });

  it('validates the withdrawal amount', async () => {
    const res = await request(app).post('/api/referrals/2002/withdrawals').set(SERVICE_HEADERS).send({ amount: 'abc' });

    expect(res.status).toBe(400);
    expect(res.body.message).toBe('amount: amount must be a positive number');
  });

  it('records a withdrawal and lowers the balance', async () => {
    const res = await request(app).post('/api/referrals/2002/withdrawals').set(SERVICE_HEADERS).send({ amount: 0.5 });

    expect(res.status).toBe(201);
    expect(res.body.data.withdrawal).toMatchObject({ userId: '2002', amount: 0.5, status: 'requested' });

    const balance = await request(app).get('/api/referrals/2002/balance').set(SERVICE_HEADERS);
    expect(balance.body.data.balance).toBe(0.5);
  });
});
