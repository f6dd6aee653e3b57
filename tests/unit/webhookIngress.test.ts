import { describe, it, expect, vi } from 'vitest';
import { buildHarness } from '../_fakes/harness';
import { cryptobotPayment, heleketPayment, tonBatch, tonTransfer, yookassaPayment } from '../_fakes/webhooks';

describe('WebhookIngressService', () => {
  it('fulfills once when the same payment is delivered twice', async () => {
    const harness = buildHarness();
    const order = await harness.openOrder();
    const delivery = yookassaPayment({ paymentId: 'tx-001', orderId: order.orderId, value: '10.00' });

    const first = await harness.services.ingress.ingest('yookassa', delivery.body, delivery.headers);
    const second = await harness.services.ingress.ingest('yookassa', delivery.body, delivery.headers);

    expect(first).toMatchObject({ httpStatus: 200, outcome: 'processed', orderId: order.orderId });
    expect(second).toMatchObject({ httpStatus: 200, outcome: 'duplicate', eventId: first.eventId });

    const stored = await harness.repos.orders.findById(order.orderId);
    expect(stored?.state).toBe('fulfilled');
    expect(stored?.payment.providerTxId).toBe('tx-001');
    expect(harness.repos.paymentEvents.rows.size).toBe(1);
    expect(harness.repos.paymentEvents.byKey('yookassa', 'tx-001')?.status).toBe('processed');
    expect(harness.repos.provisioningRecords.rows).toHaveLength(1);
    expect(harness.host().calls).toHaveLength(1);
    expect(harness.notifier.kinds()).toEqual(['credential_issued']);
  });

  it('fulfills once when duplicate deliveries race', async () => {
    const harness = buildHarness();
    const order = await harness.openOrder();
    const delivery = yookassaPayment({ paymentId: 'tx-002', orderId: order.orderId, value: '10.00' });

    const results = await Promise.all([
      harness.services.ingress.ingest('yookassa', delivery.body, delivery.headers),
      harness.services.ingress.ingest('yookassa', delivery.body, delivery.headers),
    ]);

    expect(results.map(result => result.outcome).sort()).toEqual(['duplicate', 'processed']);
    expect(results.every(result => result.httpStatus === 200)).toBe(true);
    expect(harness.repos.provisioningRecords.rows).toHaveLength(1);
    expect(harness.host().calls).toHaveLength(1);
  });

  it('rejects a delivery with bad credentials and leaves the order unpaid', async () => {
    const harness = buildHarness();
    const order = await harness.openOrder();
    const delivery = yookassaPayment({ paymentId: 'tx-003', orderId: order.orderId, value: '10.00' });

    const result = await harness.services.ingress.ingest('yookassa', delivery.body, {
      authorization: `Basic ${Buffer.from('shop-1:wrong').toString('base64')}`,
    });

    expect(result).toMatchObject({ httpStatus: 401, outcome: 'rejected' });
    const [event] = [...harness.repos.paymentEvents.rows.values()];
    expect(event.status).toBe('rejected');
    expect(event.providerTxId.startsWith('unverified:')).toBe(true);
    expect(event.lastError).toBe('signature verification failed');
    expect((await harness.repos.orders.findById(order.orderId))?.state).toBe('awaiting_payment');
  });

  it('answers 404 for an unknown provider without storing anything', async () => {
    const harness = buildHarness();

    const result = await harness.services.ingress.ingest('paypal', Buffer.from('{}'), {});

    expect(result).toEqual({ httpStatus: 404, outcome: 'unknown_provider', eventId: null, orderId: null });
    expect(harness.repos.paymentEvents.rows.size).toBe(0);
  });

  it('answers 400 for an authenticated but unreadable payload', async () => {
    const harness = buildHarness();
    const { headers } = yookassaPayment({ paymentId: 'x', orderId: null, value: '1.00' });

    const result = await harness.services.ingress.ingest('yookassa', Buffer.from('not json'), headers);

    expect(result).toMatchObject({ httpStatus: 400, outcome: 'malformed' });
    const [event] = [...harness.repos.paymentEvents.rows.values()];
    expect(event.status).toBe('rejected');
    expect(event.providerTxId.startsWith('malformed:')).toBe(true);
  });

  it('records non-payment notifications as ignored', async () => {
    const harness = buildHarness();
    const order = await harness.openOrder();
    const delivery = yookassaPayment({
      paymentId: 'tx-004',
      orderId: order.orderId,
      value: '10.00',
      event: 'payment.waiting_for_capture',
      status: 'waiting_for_capture',
    });

    const result = await harness.services.ingress.ingest('yookassa', delivery.body, delivery.headers);

    expect(result).toMatchObject({ httpStatus: 200, outcome: 'ignored' });
    expect(harness.repos.paymentEvents.byKey('yookassa', 'payment.waiting_for_capture:tx-004')?.status).toBe('ignored');
    expect((await harness.repos.orders.findById(order.orderId))?.state).toBe('awaiting_payment');
  });

  it('holds a payment without a matching order for review', async () => {
    const harness = buildHarness();
    const delivery = yookassaPayment({ paymentId: 'tx-005', orderId: null, value: '10.00' });

    const result = await harness.services.ingress.ingest('yookassa', delivery.body, delivery.headers);

    expect(result).toMatchObject({ httpStatus: 200, outcome: 'orphaned' });
    expect(harness.repos.paymentEvents.byKey('yookassa', 'tx-005')?.status).toBe('orphaned');
    expect(harness.repos.reviewItems.rows).toHaveLength(1);
    expect(harness.repos.reviewItems.rows[0]).toMatchObject({
      kind: 'orphaned_payment',
      subject: 'yookassa:tx-005',
      status: 'open',
    });
  });

  it('treats an order id that does not exist as an orphan', async () => {
    const harness = buildHarness();
    const delivery = yookassaPayment({
      paymentId: 'tx-006',
      orderId: '00000000-0000-4000-8000-000000000000',
      value: '10.00',
    });

    const result = await harness.services.ingress.ingest('yookassa', delivery.body, delivery.headers);

    expect(result.outcome).toBe('orphaned');
    expect(harness.repos.reviewItems.rows[0].kind).toBe('orphaned_payment');
  });

  it('holds an underpayment for review and keeps the order awaiting payment', async () => {
    const harness = buildHarness();
    const order = await harness.openOrder();
    const delivery = yookassaPayment({ paymentId: 'tx-007', orderId: order.orderId, value: '9.50' });

    const result = await harness.services.ingress.ingest('yookassa', delivery.body, delivery.headers);

    expect(result).toMatchObject({ httpStatus: 200, outcome: 'held', orderId: order.orderId });
    expect(harness.repos.paymentEvents.byKey('yookassa', 'tx-007')?.status).toBe('review');
    expect(harness.repos.reviewItems.rows.map(item => item.kind)).toEqual(['amount_mismatch']);
    expect(harness.repos.reviewItems.rows[0].details).toEqual({
      expected: { amount: 10, currency: 'RUB' },
      received: { amount: 9.5, currency: 'RUB' },
    });
    expect((await harness.repos.orders.findById(order.orderId))?.state).toBe('awaiting_payment');
    expect(harness.host().calls).toHaveLength(0);
  });

  it('holds a payment in another currency', async () => {
    const harness = buildHarness();
    const order = await harness.openOrder({ provider: 'cryptobot' });
    const delivery = cryptobotPayment({ invoiceId: 11, orderId: order.orderId, amount: '10', asset: 'USDT' });

    const result = await harness.services.ingress.ingest('cryptobot', delivery.body, delivery.headers);

    expect(result.outcome).toBe('held');
    expect((await harness.repos.orders.findById(order.orderId))?.state).toBe('awaiting_payment');
  });

  it('holds a second payment for an order that is already paid', async () => {
    const harness = buildHarness();
    const order = await harness.openOrder();
    const paid = yookassaPayment({ paymentId: 'tx-008', orderId: order.orderId, value: '10.00' });
    const again = yookassaPayment({ paymentId: 'tx-009', orderId: order.orderId, value: '10.00' });

    await harness.services.ingress.ingest('yookassa', paid.body, paid.headers);
    const result = await harness.services.ingress.ingest('yookassa', again.body, again.headers);

    expect(result).toMatchObject({ httpStatus: 200, outcome: 'held' });
    expect(harness.repos.reviewItems.rows.map(item => item.kind)).toEqual(['duplicate_payment']);
    expect(harness.repos.provisioningRecords.rows).toHaveLength(1);
  });

  it('holds a payment that arrives after the order expired', async () => {
    const harness = buildHarness();
    const order = await harness.openOrder();
    await harness.services.stateMachine.expire(order.orderId, 'payment timeout', false);
    const delivery = yookassaPayment({ paymentId: 'tx-010', orderId: order.orderId, value: '10.00' });

    const result = await harness.services.ingress.ingest('yookassa', delivery.body, delivery.headers);

    expect(result.outcome).toBe('held');
    expect(harness.repos.reviewItems.rows[0]).toMatchObject({ kind: 'late_payment', orderId: order.orderId });
    expect((await harness.repos.orders.findById(order.orderId))?.state).toBe('expired');
  });

  it('asks the provider to retry on an internal failure and completes on redelivery', async () => {
    const harness = buildHarness();
    const order = await harness.openOrder();
    const delivery = yookassaPayment({ paymentId: 'tx-011', orderId: order.orderId, value: '10.00' });
    vi.spyOn(harness.services.stateMachine, 'confirmPayment').mockRejectedValueOnce(new Error('store unavailable'));

    const failed = await harness.services.ingress.ingest('yookassa', delivery.body, delivery.headers);

    expect(failed).toMatchObject({ httpStatus: 500, outcome: 'retry' });
    const pending = harness.repos.paymentEvents.byKey('yookassa', 'tx-011');
    expect(pending).toMatchObject({ status: 'received', attempts: 1, lastError: 'store unavailable' });

    const retried = await harness.services.ingress.ingest('yookassa', delivery.body, delivery.headers);

    expect(retried).toMatchObject({ httpStatus: 200, outcome: 'processed', eventId: failed.eventId });
    expect((await harness.repos.orders.findById(order.orderId))?.state).toBe('fulfilled');
  });

  it('re-drives a stored event that was never processed', async () => {
    const harness = buildHarness();
    const order = await harness.openOrder();
    const delivery = yookassaPayment({ paymentId: 'tx-012', orderId: order.orderId, value: '10.00' });
    vi.spyOn(harness.services.stateMachine, 'confirmPayment').mockRejectedValueOnce(new Error('store unavailable'));
    await harness.services.ingress.ingest('yookassa', delivery.body, delivery.headers);

    const report = await harness.services.sweeper.runOnce();

    expect(report?.redriven).toBe(1);
    expect(harness.repos.paymentEvents.byKey('yookassa', 'tx-012')?.status).toBe('processed');
    expect((await harness.repos.orders.findById(order.orderId))?.state).toBe('fulfilled');
  });

  it('confirms signed crypto invoices', async () => {
    const harness = buildHarness();
    const viaBot = await harness.openOrder({ provider: 'cryptobot' });
    const viaHeleket = await harness.openOrder({ provider: 'heleket' });
    const bot = cryptobotPayment({ invoiceId: 21, orderId: viaBot.orderId, amount: '10', asset: 'RUB' });
    const heleket = heleketPayment({ uuid: 'h-21', orderId: viaHeleket.orderId, amount: '10.00', currency: 'RUB' });

    const botResult = await harness.services.ingress.ingest('cryptobot', bot.body, bot.headers);
    const heleketResult = await harness.services.ingress.ingest('heleket', heleket.body, heleket.headers);

    expect(botResult.outcome).toBe('processed');
    expect(heleketResult.outcome).toBe('processed');
    expect(harness.repos.provisioningRecords.rows).toHaveLength(2);
  });

  it('matches a TON transfer without comment by its amount', async () => {
    const harness = buildHarness();
    const order = await harness.openOrder({ provider: null });
    await harness.services.orders.beginPayment(order.orderId, { provider: 'ton', expectedAmount: 2, expectedCurrency: 'ton' });
    const delivery = tonTransfer({ txHash: 'ton-1', nanotons: '2000000000', utime: 1772366400 });

    const result = await harness.services.ingress.ingest('ton', delivery.body, delivery.headers);

    expect(result).toMatchObject({ outcome: 'processed', orderId: order.orderId });
  });

  it('settles a TON payment delivered as a transaction list', async () => {
    const harness = buildHarness();
    const order = await harness.openOrder({ provider: null });
    await harness.services.orders.beginPayment(order.orderId, { provider: 'ton', expectedAmount: 2, expectedCurrency: 'ton' });
    const delivery = tonBatch({
      txId: 'ton-batch-1',
      txs: [{ hash: 'ton-2', nanotons: '2000000000', comment: order.orderId, utime: 1772366400 }],
    });

    const result = await harness.services.ingress.ingest('ton', delivery.body, delivery.headers);

    expect(result).toMatchObject({ httpStatus: 200, outcome: 'processed', orderId: order.orderId });
    expect((await harness.repos.orders.findById(order.orderId))?.state).toBe('fulfilled');
    expect((await harness.repos.orders.findById(order.orderId))?.payment.providerTxId).toBe('ton-2');
  });

  it('answers 400 to a signed TON delivery without transactions', async () => {
    const harness = buildHarness();
    const delivery = tonBatch({ txId: 'ton-batch-2' });

    const result = await harness.services.ingress.ingest('ton', delivery.body, delivery.headers);

    expect(result).toMatchObject({ httpStatus: 400, outcome: 'malformed' });
  });

  it('lists stored events by status', async () => {
    const harness = buildHarness();
    const orphan = yookassaPayment({ paymentId: 'tx-013', orderId: null, value: '1.00' });
    await harness.services.ingress.ingest('yookassa', orphan.body, orphan.headers);

    const events = await harness.services.ingress.listEvents({ status: 'orphaned' });

    expect(events.map(event => event.providerTxId)).toEqual(['tx-013']);
    expect(await harness.services.ingress.listEvents({ status: 'processed' })).toEqual([]);
  });
});
