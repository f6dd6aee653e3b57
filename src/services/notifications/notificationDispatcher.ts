import { NOTIFICATION_KINDS } from '../../config/constants';
import type { Order, ProvisioningRecord, ReferralCredit } from '../../types/domain';
import { logger } from '../../utils/logger';
import { errorMessage } from '../../utils/errors';
import type { ChatNotifier, NotificationPayload } from './chatNotifier';

export type DispatchOutcome = 'sent' | 'failed' | 'unrenderable' | 'not_pending';

export interface OutgoingMessage {
  message: string;
  payload: NotificationPayload;
}

export const escapeHtml = (value: string): string =>
  value.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');

const formatDate = (date: Date): string => date.toISOString().slice(0, 16).replace('T', ' ') + ' UTC';

const formatMoney = (amount: number, currency: string): string => `${amount.toFixed(2)} ${currency}`;

const plural = (count: number, unit: string): string => `${count} ${unit}${count === 1 ? '' : 's'}`;

export const formatWithin = (hours: number): string =>
  hours % 24 === 0 ? plural(hours / 24, 'day') : plural(hours, 'hour');

/**
 * Turns pending order notifications into chat messages. What happens to the
 * order's `notificationPending` flag after a send is up to the caller.
 */
export class NotificationDispatcher {
  constructor(
    private readonly notifier: ChatNotifier,
    private readonly supportContact: string
  ) {}

  buildOrderMessage(order: Order): OutgoingMessage | null {
    const plan = escapeHtml(order.plan.name);
    const orderRef = `<code>${order.orderId}</code>`;

    switch (order.notificationKind) {
      case NOTIFICATION_KINDS.CREDENTIAL_ISSUED: {
        if (!order.result) {
          return null;
        }
        const verb = order.kind === 'renewal' ? 'extended' : 'ready';
        return {
          message: [
            `✅ Your VPN key for <b>${plan}</b> is ${verb}.`,
            '',
            `<code>${escapeHtml(order.result.connectionString)}</code>`,
            '',
            `Valid until: ${formatDate(order.result.expiresAt)}`,
            `Order: ${orderRef}`,
          ].join('\n'),
          payload: {
            kind: NOTIFICATION_KINDS.CREDENTIAL_ISSUED,
            orderId: order.orderId,
            credentialId: order.result.credentialId,
            expiresAt: order.result.expiresAt.toISOString(),
          },
        };
      }
      case NOTIFICATION_KINDS.PROVISIONING_FAILED:
        return {
          message: [
            `⚠️ We received your payment for <b>${plan}</b>, but could not issue the key.`,
            'The order is flagged for a refund and an operator has been notified.',
            `Contact ${escapeHtml(this.supportContact)} and quote order ${orderRef}.`,
          ].join('\n'),
          payload: { kind: NOTIFICATION_KINDS.PROVISIONING_FAILED, orderId: order.orderId },
        };
      case NOTIFICATION_KINDS.ORDER_EXPIRED:
        return {
          message: `⌛ Order ${orderRef} for <b>${plan}</b> expired before payment arrived. Start a new purchase any time.`,
          payload: { kind: NOTIFICATION_KINDS.ORDER_EXPIRED, orderId: order.orderId },
        };
      case NOTIFICATION_KINDS.ORDER_REFUNDED:
        return {
          message: `↩️ Order ${orderRef} for <b>${plan}</b> has been refunded.`,
          payload: { kind: NOTIFICATION_KINDS.ORDER_REFUNDED, orderId: order.orderId },
        };
      default:
        return null;
    }
  }

  async dispatch(order: Order): Promise<DispatchOutcome> {
    if (!order.notificationPending) {
      return 'not_pending';
    }
    const outgoing = this.buildOrderMessage(order);
    if (!outgoing) {
      logger.error('Order has a pending notification that cannot be rendered', {
        orderId: order.orderId,
        kind: order.notificationKind,
      });
      return 'unrenderable';
    }

    try {
      await this.notifier.notify(order.buyerId, outgoing.message, outgoing.payload);
      logger.info('Buyer notified', { orderId: order.orderId, kind: outgoing.payload.kind });
      return 'sent';
    } catch (error) {
      logger.warn('Buyer notification failed', {
        orderId: order.orderId,
        kind: outgoing.payload.kind,
        attempt: order.notificationAttempts + 1,
        error: errorMessage(error),
      });
      return 'failed';
    }
  }

  buildExpiryReminder(record: ProvisioningRecord, markHours: number): OutgoingMessage {
    return {
      message: [
        `⏰ Your VPN key expires within ${formatWithin(markHours)}, on ${formatDate(record.expiresAt)}.`,
        'Renew it to stay connected.',
        `Order: <code>${record.orderId}</code>`,
      ].join('\n'),
      payload: {
        kind: NOTIFICATION_KINDS.CREDENTIAL_EXPIRING,
        orderId: record.orderId,
        credentialId: record.remoteCredentialId,
        expiresAt: record.expiresAt.toISOString(),
      },
    };
  }

  /** Reminders are sent at most once per mark; a failed one is logged and not retried. */
  async credentialExpiring(record: ProvisioningRecord, markHours: number): Promise<boolean> {
    const outgoing = this.buildExpiryReminder(record, markHours);
    try {
      await this.notifier.notify(record.buyerId, outgoing.message, outgoing.payload);
      logger.info('Expiry reminder sent', { orderId: record.orderId, markHours });
      return true;
    } catch (error) {
      logger.warn('Expiry reminder failed', {
        orderId: record.orderId,
        markHours,
        error: errorMessage(error),
      });
      return false;
    }
  }

  async referralCredited(credit: ReferralCredit): Promise<void> {
    try {
      await this.notifier.notify(
        credit.referrerId,
        `🎁 You earned ${formatMoney(credit.amount, credit.currency)} from a referral purchase.`,
        { kind: 'referral_credited', orderId: credit.sourceOrderId ?? undefined, amount: credit.amount }
      );
    } catch (error) {
      logger.warn('Referral credit notification failed', {
        referrerId: credit.referrerId,
        creditKey: credit.creditKey,
        error: errorMessage(error),
      });
    }
  }
}
