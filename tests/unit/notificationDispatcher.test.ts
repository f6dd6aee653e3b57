import { describe, it, expect, vi } from 'vitest';
import { TelegramNotifier } from '../../src/services/notifications/chatNotifier';
import { NotificationDispatcher, escapeHtml } from '../../src/services/notifications/notificationDispatcher';
import type { FetchLike } from '../../src/services/provisioning/types';
import type { Order } from '../../src/types/domain';
import { RecordingNotifier } from '../_fakes/fakeNotifier';
import { buildHarness } from '../_fakes/harness';

const fulfilledOrder = async (): Promise<Order> => {
  const harness = buildHarness();
  const order = await harness.openOrder();
  return {
    ...order,
    state: 'fulfilled',
    notificationPending: true,
    notificationKind: 'credential_issued',
    result: {
      credentialId: 'c-1',
      email: 'u1001@vpn.test',
      connectionString: 'vless://c-1@de-1.test:443?type=tcp&security=reality',
      expiresAt: new Date('2026-03-31T12:00:00.000Z'),
    },
  };
};

describe('escapeHtml', () => {
  it('escapes the characters Telegram HTML parses', () => {
    expect(escapeHtml('<b>&</b>')).toBe('&lt;b&gt;&amp;&lt;/b&gt;');
  });
});

describe('NotificationDispatcher', () => {
  it('renders the issued credential', async () => {
    const order = await fulfilledOrder();
    const dispatcher = new NotificationDispatcher(new RecordingNotifier(), '@help');

    const outgoing = dispatcher.buildOrderMessage(order);

    expect(outgoing?.message).toBe(
      [
        '✅ Your VPN key for <b>1 month</b> is ready.',
        '',
        '<code>vless://c-1@de-1.test:443?type=tcp&amp;security=reality</code>',
        '',
        'Valid until: 2026-03-31 12:00 UTC',
        `Order: <code>${order.orderId}</code>`,
      ].join('\n')
    );
    expect(outgoing?.payload).toEqual({
      kind: 'credential_issued',
      orderId: order.orderId,
      credentialId: 'c-1',
      expiresAt: '2026-03-31T12:00:00.000Z',
    });
  });

  it('says extended for renewals', async () => {
    const order = await fulfilledOrder();
    const dispatcher = new NotificationDispatcher(new RecordingNotifier(), '@help');

    const outgoing = dispatcher.buildOrderMessage({ ...order, kind: 'renewal' });

    expect(outgoing?.message.split('\n')[0]).toBe('✅ Your VPN key for <b>1 month</b> is extended.');
  });

  it('renders failure, expiry and refund messages', async () => {
    const order = await fulfilledOrder();
    const dispatcher = new NotificationDispatcher(new RecordingNotifier(), '@help');

    expect(dispatcher.buildOrderMessage({ ...order, notificationKind: 'provisioning_failed' })?.message).toBe(
      [
        '⚠️ We received your payment for <b>1 month</b>, but could not issue the key.',
        'The order is flagged for a refund and an operator has been notified.',
        `Contact @help and quote order <code>${order.orderId}</code>.`,
      ].join('\n')
    );
    expect(dispatcher.buildOrderMessage({ ...order, notificationKind: 'order_expired' })?.message).toBe(
      `⌛ Order <code>${order.orderId}</code> for <b>1 month</b> expired before payment arrived. Start a new purchase any time.`
    );
    expect(dispatcher.buildOrderMessage({ ...order, notificationKind: 'order_refunded' })?.payload).toEqual({
      kind: 'order_refunded',
      orderId: order.orderId,
    });
    expect(dispatcher.buildOrderMessage({ ...order, notificationKind: null })).toBeNull();
  });

  it('reports whether the message went out', async () => {
    const order = await fulfilledOrder();
    const notifier = new RecordingNotifier();
    const dispatcher = new NotificationDispatcher(notifier, '@help');

    notifier.failures = 1;
    await expect(dispatcher.dispatch(order)).resolves.toBe('failed');
    await expect(dispatcher.dispatch(order)).resolves.toBe('sent');
    await expect(dispatcher.dispatch({ ...order, notificationPending: false })).resolves.toBe('not_pending');
    await expect(dispatcher.dispatch({ ...order, result: null })).resolves.toBe('unrenderable');

    expect(notifier.sent).toHaveLength(1);
    expect(notifier.sent[0].buyerId).toBe('1001');
  });

  it('swallows referral notification failures', async () => {
    const notifier = new RecordingNotifier();
    notifier.failures = 1;
    const dispatcher = new NotificationDispatcher(notifier, '@help');
    const credit = {
      creditKey: 'percentage:o-1',
      referrerId: '2002',
      referredUserId: '1001',
      sourceOrderId: 'o-1',
      amount: 1,
      currency: 'RUB',
      kind: 'percentage' as const,
      createdAt: new Date('2026-03-01T12:00:00.000Z'),
    };

    await expect(dispatcher.referralCredited(credit)).resolves.toBeUndefined();
    await dispatcher.referralCredited(credit);

    expect(notifier.sent[0].message).toBe('🎁 You earned 1.00 RUB from a referral purchase.');
  });
});

describe('TelegramNotifier', () => {
  it('posts sendMessage with HTML parse mode', async () => {
    const fetchImpl = vi.fn(async (_input: string, _init?: RequestInit) => new Response('{"ok":true}'));
    const notifier = new TelegramNotifier({ botToken: 'test-bot-token', apiBaseUrl: 'https://api.telegram.test/' }, fetchImpl);

    await notifier.notify('1001', '<b>hi</b>', { kind: 'order_expired', orderId: 'o-1' });

    expect(fetchImpl).toHaveBeenCalledTimes(1);
    const [url, init] = fetchImpl.mock.calls[0];
    expect(url).toBe('https://api.telegram.test/bottest-bot-token/sendMessage');
    expect(init?.method).toBe('POST');
    expect(JSON.parse(String(init?.body))).toEqual({
      chat_id: '1001',
      text: '<b>hi</b>',
      parse_mode: 'HTML',
      disable_web_page_preview: true,
    });
  });

  it('rejects when the Bot API refuses the message', async () => {
    const fetchImpl: FetchLike = async () => new Response('Forbidden: bot was blocked by the user', { status: 403 });
    const notifier = new TelegramNotifier({ botToken: 'test-bot-token', apiBaseUrl: 'https://api.telegram.test' }, fetchImpl);

    await expect(notifier.notify('1001', 'hi', { kind: 'order_expired' })).rejects.toThrow(
      'Telegram sendMessage returned 403: Forbidden: bot was blocked by the user'
    );
  });

  it('rejects without a bot token', async () => {
    const notifier = new TelegramNotifier({ botToken: '', apiBaseUrl: 'https://api.telegram.test' });

    await expect(notifier.notify('1001', 'hi', { kind: 'order_expired' })).rejects.toThrow(
      'TELEGRAM_BOT_TOKEN is not configured'
    );
  });
});
