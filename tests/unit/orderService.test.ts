import { describe, it, expect } from 'vitest';
import { idempotencyKeyFor } from '../../src/services/orders/orderService';
import type { Order } from '../../src/types/domain';
import { sha256Hex } from '../../src/utils/crypto';
import {
  HostUnavailableError,
  InvalidTransitionError,
  NotFoundError,
  OrderNotFoundError,
  UnknownHostError,
  ValidationError,
} from '../../src/utils/errors';
import { testHost } from '../_fakes/fakeHosts';
import { buildHarness, type Harness } from '../_fakes/harness';

const DAY_MS = 24 * 60 * 60 * 1000;

const pay = (harness: Harness, order: Order, providerTxId: string) =>
  harness.services.stateMachine.confirmPayment(order.orderId, {
    provider: 'yookassa',
    providerTxId,
    amount: order.payment.expectedAmount,
    currency: 'RUB',
    paymentEventId: null,
  });

describe('OrderService', () => {
  describe('createOrder', () => {
    it('returns the same order for the same purchase nonce', async () => {
      const harness = buildHarness();
      const input = { buyerId: '1001', hostId: 'de-1', planId: 'm1', nonce: 'n-1' };

      const first = await harness.services.orders.createOrder(input);
      const second = await harness.services.orders.createOrder(input);
      const other = await harness.services.orders.createOrder({ ...input, nonce: 'n-2' });

      expect(first.created).toBe(true);
      expect(second).toEqual({ order: first.order, created: false });
      expect(other.order.orderId).not.toBe(first.order.orderId);
      expect(first.order.idempotencyKey).toBe(sha256Hex('1001|m1|de-1|n-1'));
      expect(idempotencyKeyFor(input)).toBe(first.order.idempotencyKey);
    });

    it('snapshots the plan and opens a payment window', async () => {
      const harness = buildHarness({ settings: { paymentTimeoutMinutes: 15 } });

      const { order } = await harness.services.orders.createOrder({
        buyerId: '1001',
        hostId: 'de-1',
        planId: 'm3',
        nonce: 'n-1',
      });

      expect(order).toMatchObject({
        state: 'created',
        kind: 'new',
        renewal: null,
        plan: { planId: 'm3', name: '3 months', durationDays: 90, price: 25, currency: 'RUB' },
        payment: { provider: null, expectedAmount: 25, expectedCurrency: 'RUB' },
        provisioning: { phase: 'idle', attempts: 0 },
      });
      expect(order.expiresAt.toISOString()).toBe('2026-03-01T12:15:00.000Z');
    });

    it('refuses unknown hosts and plans', async () => {
      const harness = buildHarness();
      const base = { buyerId: '1001', hostId: 'de-1', planId: 'm1', nonce: 'n-1' };

      await expect(harness.services.orders.createOrder({ ...base, hostId: 'xx-9' })).rejects.toBeInstanceOf(
        UnknownHostError
      );
      await expect(harness.services.orders.createOrder({ ...base, planId: 'y1' })).rejects.toBeInstanceOf(
        ValidationError
      );
    });

    it('refuses new orders for a host out of rotation', async () => {
      const harness = buildHarness();
      harness.services.hosts.markUnhealthy('de-1', 'login refused');

      await expect(
        harness.services.orders.createOrder({ buyerId: '1001', hostId: 'de-1', planId: 'm1', nonce: 'n-1' })
      ).rejects.toBeInstanceOf(HostUnavailableError);
    });
  });

  describe('beginPayment', () => {
    it('records the provider quote and waits for payment', async () => {
      const harness = buildHarness();
      const order = await harness.openOrder({ provider: null });

      const quoted = await harness.services.orders.beginPayment(order.orderId, {
        provider: 'cryptobot',
        invoiceRef: 'inv-7',
        expectedAmount: 0.11,
        expectedCurrency: 'usdt',
      });

      expect(quoted.state).toBe('awaiting_payment');
      expect(quoted.payment).toMatchObject({
        provider: 'cryptobot',
        invoiceRef: 'inv-7',
        expectedAmount: 0.11,
        expectedCurrency: 'USDT',
      });
    });

    it('lets the buyer switch provider before paying', async () => {
      const harness = buildHarness();
      const order = await harness.openOrder();

      const switched = await harness.services.orders.beginPayment(order.orderId, { provider: 'heleket' });

      expect(switched.state).toBe('awaiting_payment');
      expect(switched.payment.provider).toBe('heleket');
      expect(switched.history).toHaveLength(1);
    });

    it('refuses paid orders, bad amounts and unknown orders', async () => {
      const harness = buildHarness();
      const paid = await harness.openOrder();
      await pay(harness, paid, 'tx-1');
      const open = await harness.openOrder({ provider: null });

      await expect(harness.services.orders.beginPayment(paid.orderId, { provider: 'ton' })).rejects.toBeInstanceOf(
        InvalidTransitionError
      );
      await expect(
        harness.services.orders.beginPayment(open.orderId, { provider: 'ton', expectedAmount: 0 })
      ).rejects.toBeInstanceOf(ValidationError);
      await expect(
        harness.services.orders.beginPayment('00000000-0000-4000-8000-000000000000', { provider: 'ton' })
      ).rejects.toBeInstanceOf(OrderNotFoundError);
    });
  });

  describe('renewals', () => {
    const fulfilledPurchase = async (harness: Harness): Promise<Order> => {
      const order = await harness.openOrder();
      await pay(harness, order, `tx-${order.orderId}`);
      harness.clock.advance(DAY_MS);
      return order;
    };

    it('extends the original credential instead of issuing a new one', async () => {
      const harness = buildHarness();
      const source = await fulfilledPurchase(harness);
      const sourceRecord = await harness.repos.provisioningRecords.findLiveByOrder(source.orderId);

      const { order: renewal } = await harness.services.orders.createOrder({
        buyerId: '1001',
        hostId: 'de-1',
        planId: 'm1',
        nonce: 'renew-1',
        renewsOrderId: source.orderId,
      });
      expect(renewal.kind).toBe('renewal');
      expect(renewal.renewal).toEqual({
        sourceOrderId: source.orderId,
        credentialId: sourceRecord?.remoteCredentialId,
        email: sourceRecord?.email,
        expiresAt: new Date('2026-03-31T12:00:00.000Z'),
      });

      await harness.services.orders.beginPayment(renewal.orderId, { provider: 'yookassa' });
      await pay(harness, renewal, 'tx-renew-1');

      const fulfilled = await harness.services.orders.getOrder(renewal.orderId);
      expect(fulfilled.state).toBe('fulfilled');
      expect(fulfilled.result?.expiresAt.toISOString()).toBe('2026-04-30T12:00:00.000Z');
      expect(harness.host().remote.size).toBe(1);

      const extended = await harness.repos.provisioningRecords.findLiveByOrder(source.orderId);
      expect(extended?.expiresAt.toISOString()).toBe('2026-04-30T12:00:00.000Z');
      expect(extended?.lastRenewalAt?.toISOString()).toBe('2026-03-02T12:00:00.000Z');

      const credentials = await harness.services.orders.listCredentials('1001');
      expect(credentials.map(record => [record.orderId, record.renewalOf])).toEqual([
        [renewal.orderId, source.orderId],
        [source.orderId, null],
      ]);
      expect(harness.notifier.sent.at(-1)?.message.split('\n')[0]).toBe('✅ Your VPN key for <b>1 month</b> is extended.');
    });

    it('applies every paid renewal when two are provisioned at the same time', async () => {
      const harness = buildHarness();
      const source = await fulfilledPurchase(harness);
      const renewals: Order[] = [];
      for (const nonce of ['renew-1', 'renew-2']) {
        const { order } = await harness.services.orders.createOrder({
          buyerId: '1001',
          hostId: 'de-1',
          planId: 'm1',
          nonce,
          renewsOrderId: source.orderId,
        });
        renewals.push(await harness.services.orders.beginPayment(order.orderId, { provider: 'yookassa' }));
      }

      let open: () => void = () => undefined;
      harness.host().gate = new Promise<void>(resolve => {
        open = resolve;
      });
      const paid = Promise.all(renewals.map((renewal, index) => pay(harness, renewal, `tx-renew-${index}`)));
      await new Promise<void>(resolve => setImmediate(resolve));
      const callsWhileGated = harness.host().calls.length;
      open();
      await paid;

      expect(callsWhileGated).toBe(1);
      const states = await Promise.all(renewals.map(async renewal => (await harness.services.orders.getOrder(renewal.orderId)).state));
      expect(states).toEqual(['fulfilled', 'fulfilled']);
      const extended = await harness.repos.provisioningRecords.findLiveByOrder(source.orderId);
      expect(extended?.expiresAt.toISOString()).toBe('2026-05-30T12:00:00.000Z');
      expect(harness.host().remote.size).toBe(1);
    });

    it('points a renewal of a renewal at the original purchase', async () => {
      const harness = buildHarness();
      const source = await fulfilledPurchase(harness);
      const { order: first } = await harness.services.orders.createOrder({
        buyerId: '1001',
        hostId: 'de-1',
        planId: 'm1',
        nonce: 'renew-1',
        renewsOrderId: source.orderId,
      });
      await harness.services.orders.beginPayment(first.orderId, { provider: 'yookassa' });
      await pay(harness, first, 'tx-renew-1');

      const { order: second } = await harness.services.orders.createOrder({
        buyerId: '1001',
        hostId: 'de-1',
        planId: 'm1',
        nonce: 'renew-2',
        renewsOrderId: first.orderId,
      });

      expect(second.renewal?.sourceOrderId).toBe(source.orderId);
      expect(second.renewal?.expiresAt.toISOString()).toBe('2026-04-30T12:00:00.000Z');
    });

    it("refuses to renew another buyer's credential or across hosts", async () => {
      const harness = buildHarness({ hosts: [testHost(), testHost({ id: 'nl-1' })] });
      const source = await fulfilledPurchase(harness);
      const base = { hostId: 'de-1', planId: 'm1', nonce: 'renew-1', renewsOrderId: source.orderId };

      await expect(harness.services.orders.createOrder({ ...base, buyerId: '1002' })).rejects.toBeInstanceOf(
        NotFoundError
      );
      await expect(
        harness.services.orders.createOrder({ ...base, buyerId: '1001', hostId: 'nl-1' })
      ).rejects.toThrow(`Credential of order ${source.orderId} lives on host de-1`);
    });

    it('refuses to renew a refunded purchase', async () => {
      const harness = buildHarness();
      const source = await fulfilledPurchase(harness);
      await harness.services.orders.refundOrder(source.orderId, 'chargeback');

      await expect(
        harness.services.orders.createOrder({
          buyerId: '1001',
          hostId: 'de-1',
          planId: 'm1',
          nonce: 'renew-1',
          renewsOrderId: source.orderId,
        })
      ).rejects.toThrow(`No active credential for order ${source.orderId}`);
    });
  });

  it('lists the orders of a buyer newest first', async () => {
    const harness = buildHarness();
    const first = await harness.openOrder();
    harness.clock.advance(1000);
    const second = await harness.openOrder();
    await harness.openOrder({ buyerId: '1002' });

    const orders = await harness.services.orders.listOrders({ buyerId: '1001' });

    expect(orders.map(order => order.orderId)).toEqual([second.orderId, first.orderId]);
  });
});
