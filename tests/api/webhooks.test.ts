import { describe, it, expect, vi } from 'vitest';
import request from 'supertest';
import app from '../../src/app';
import { apiHarness, bearer, SERVICE_HEADERS } from '../_fakes/apiHarness';
import { yookassaPayment } from '../_fakes/webhooks';

vi.mock('../../src/services', async () => {
  const { apiHarness: harness } = await import('../_fakes/apiHarness');
  return { getServices: () => harness.services };
});

describe('POST /webhooks/:provider', () => {
  it('fulfils the order and acknowledges a redelivery without a second credential', async () => {
    const order = await apiHarness.openOrder({ buyerId: '5001' });
    const delivery = yookassaPayment({ paymentId: 'pay-100', orderId: order.orderId, value: '10.00' });

    const first = await request(app).post('/webhooks/yookassa').set(delivery.headers).send(delivery.body.toString());
    expect(first.status).toBe(200);
    expect(first.body).toEqual({ success: true, outcome: 'processed', eventId: expect.any(String) });

    const second = await request(app).post('/webhooks/yookassa').set(delivery.headers).send(delivery.body.toString());
    expect(second.status).toBe(200);
    expect(second.body).toEqual({ success: true, outcome: 'duplicate', eventId: first.body.eventId });

    const view = await request(app).get(`/api/orders/${order.orderId}`).set(SERVICE_HEADERS);
    expect(view.status).toBe(200);
    expect(view.body.data.order.state).toBe('fulfilled');
    expect(view.body.data.order.result.expiresAt).toBe('2026-03-31T12:00:00.000Z');
    expect(apiHarness.host().calls).toHaveLength(1);
  });

  it('answers 401 to a delivery with the wrong credentials', async () => {
    const order = await apiHarness.openOrder({ buyerId: '5002' });
    const delivery = yookassaPayment({ paymentId: 'pay-101', orderId: order.orderId, value: '10.00' });

    const res = await request(app)
      .post('/webhooks/yookassa')
      .set({ ...delivery.headers, authorization: 'Basic d3Jvbmc6d3Jvbmc=' })
      .send(delivery.body.toString());

    expect(res.status).toBe(401);
    expect(res.body).toEqual({ success: false, outcome: 'rejected', eventId: expect.any(String) });
    expect((await apiHarness.repos.orders.findById(order.orderId))?.state).toBe('awaiting_payment');
  });

  it('answers 404 for a provider it does not know', async () => {
    const res = await request(app).post('/webhooks/paypal').set('content-type', 'application/json').send('{}');

    expect(res.status).toBe(404);
    expect(res.body).toEqual({ success: false, outcome: 'unknown_provider', eventId: null });
  });

  it('answers 400 to a body that is not JSON', async () => {
    const delivery = yookassaPayment({ paymentId: 'pay-102', orderId: null, value: '1.00' });

    const res = await request(app).post('/webhooks/yookassa').set(delivery.headers).send('not json');

    expect(res.status).toBe(400);
    expect(res.body.outcome).toBe('malformed');
  });

  it('holds an underpayment for review and acknowledges it', async () => {
    const order = await apiHarness.openOrder({ buyerId: '5003' });
    const delivery = yookassaPayment({ paymentId: 'pay-103', orderId: order.orderId, value: '9.50' });

    const res = await request(app).post('/webhooks/yookassa').set(delivery.headers).send(delivery.body.toString());

    expect(res.status).toBe(200);
    expect(res.body.outcome).toBe('held');
    const reviews = await request(app)
      .get('/api/admin/review-items')
      .query({ kind: 'amount_mismatch', orderId: order.orderId })
      .set(bearer('viewer'));
    expect(reviews.status).toBe(200);
    expect(reviews.body.data.items).toHaveLength(1);
    expect(reviews.body.data.items[0].details).toEqual({
      expected: { amount: 10, currency: 'RUB' },
      received: { amount: 9.5, currency: 'RUB' },
    });
  });

  it('lists stored events by status for operators', async () => {
    const res = await request(app)
      .get('/api/admin/payment-events')
      .query({ provider: 'yookassa', status: 'processed' })
      .set(bearer('viewer'));

    expect(res.status).toBe(200);
    expect(res.body.data.events).toHaveLength(1);
    expect(res.body.data.events[0].providerTxId).toBe('pay-100');
    expect(res.body.data.events[0].amount).toBe(10);
  });
});
