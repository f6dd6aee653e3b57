import { v4 as uuidv4 } from 'uuid';
import {
  NOTIFICATION_KINDS,
  ORDER_STATES,
  REVIEW_KINDS,
  type NotificationKind,
  type PaymentProvider,
} from '../../config/constants';
import type { OrderPatch, OrderRepository, ProvisioningRecordRepository } from '../../repositories/types';
import type { Clock, Order, ProvisioningResult } from '../../types/domain';
import {
  AmountMismatchError,
  ConflictError,
  HostAuthFailedError,
  HostError,
  HostUnreachableError,
  InvalidTransitionError,
  OrderNotFoundError,
  errorMessage,
} from '../../utils/errors';
import { logger } from '../../utils/logger';
import { amountsMatch, sameCurrency } from '../../utils/money';
import type { OrderLock } from '../locks/orderLockService';
import type { ProvisioningClient } from '../provisioning/hostProvisioningClient';
import { computeTargetExpiry } from '../provisioning/credentialSpec';
import type { NotificationDispatcher } from '../notifications/notificationDispatcher';
import type { ReviewQueueService } from '../review/reviewQueueService';
import { isPaid, OPEN_ORDER_STATES } from './orderStates';

export interface PaymentConfirmation {
  provider: PaymentProvider;
  providerTxId: string;
  amount: number;
  currency: string;
  paymentEventId: string | null;
}

export type ConfirmOutcome = 'confirmed' | 'already_confirmed' | 'duplicate_payment' | 'late_payment';

export interface ProvisioningSettings {
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
  attemptLeaseMs: number;
}

export interface NotificationRetrySettings {
  /** Failed sends after which the notification is handed to an operator. */
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
}

export interface StateMachineSettings {
  amountTolerance: number;
  provisioning: ProvisioningSettings;
  notifications: NotificationRetrySettings;
}

export interface ReferralSettler {
  settle(order: Order): Promise<unknown>;
}

export interface OrderStateMachineDeps {
  orders: OrderRepository;
  provisioningRecords: ProvisioningRecordRepository;
  lock: OrderLock;
  hosts: ProvisioningClient;
  referrals: ReferralSettler;
  notifications: NotificationDispatcher;
  reviews: ReviewQueueService;
  clock: Clock;
  settings: StateMachineSettings;
}

/** Delay before retry number `attempt + 1`: doubles per attempt, capped. */
export const backoffDelay = (
  attempt: number,
  settings: Pick<ProvisioningSettings, 'backoffBaseMs' | 'backoffMaxMs'>
): number =>
  Math.min(settings.backoffBaseMs * 2 ** Math.max(attempt - 1, 0), settings.backoffMaxMs);

const S = ORDER_STATES;

const queueNotification = (kind: NotificationKind): OrderPatch => ({
  notificationPending: true,
  notificationKind: kind,
  notificationAttempts: 0,
  nextNotifyAt: null,
});

/**
 * Owns every order transition. Each one runs under the order lock and is
 * written as a single conditional update on the expected current state, with
 * the side-effect intent it triggers in the same document.
 */
export class OrderStateMachine {
  constructor(private readonly deps: OrderStateMachineDeps) {}

  /**
   * Records a provider payment against the order and, on success, runs the
   * first provisioning attempt before returning.
   * @throws OrderNotFoundError
   * @throws AmountMismatchError when amount or currency differ; the order stays unpaid
   */
  async confirmPayment(orderId: string, payment: PaymentConfirmation): Promise<ConfirmOutcome> {
    const outcome = await this.deps.lock.withOrderLock(orderId, () => this.recordPayment(orderId, payment));

    if (outcome === 'confirmed') {
      try {
        await this.provision(orderId);
      } catch (error) {
        // Payment stays confirmed; the provisioning sweep picks the order up
        logger.error('Provisioning after payment confirmation failed', { orderId, error: errorMessage(error) });
      }
    }
    return outcome;
  }

  /**
   * Runs one provisioning attempt if the order is due for one.
   * @returns the order as left by the attempt, or null when it does not exist
   */
  async provision(orderId: string): Promise<Order | null> {
    const order = await this.deps.lock.withOrderLock(orderId, () => this.attemptProvisioning(orderId));
    if (order && (order.settlementPending || order.notificationPending)) {
      await this.runSideEffects(orderId);
    }
    return order;
  }

  /**
   * Closes an unpaid order. Returns `expired: false` with the current order
   * when it is no longer open.
   */
  async expire(orderId: string, reason: string, notifyBuyer: boolean): Promise<{ order: Order; expired: boolean }> {
    const result = await this.deps.lock.withOrderLock(orderId, async () => {
      const order = await this.requireOrder(orderId);
      if (!OPEN_ORDER_STATES.includes(order.state)) {
        return { order, expired: false };
      }

      const expired = await this.deps.orders.compareAndSet(
        orderId,
        { states: OPEN_ORDER_STATES },
        {
          transition: { from: order.state, to: S.EXPIRED },
          reason,
          at: this.deps.clock(),
          set: notifyBuyer ? queueNotification(NOTIFICATION_KINDS.ORDER_EXPIRED) : {},
        }
      );
      if (!expired) {
        return { order: await this.requireOrder(orderId), expired: false };
      }
      logger.info('Order expired', { orderId, reason });
      return { order: expired, expired: true };
    });

    if (result.expired && notifyBuyer) {
      await this.runSideEffects(orderId);
    }
    return result;
  }

  /**
   * Operator refund. A fulfilled order moves to `refunded` and its credential
   * is revoked on the host; a failed order only records that the refund was issued.
   */
  async refund(orderId: string, note: string): Promise<Order> {
    const refunded = await this.deps.lock.withOrderLock(orderId, async () => {
      const order = await this.requireOrder(orderId);
      const now = this.deps.clock();

      if (order.state === S.REFUNDED || (order.state === S.FAILED && order.refundIssuedAt)) {
        return order;
      }
      if (order.state === S.FAILED) {
        const updated = await this.deps.orders.compareAndSet(
          orderId,
          { states: [S.FAILED] },
          { reason: note, at: now, set: { refundIssuedAt: now, refundEligible: false } }
        );
        return updated ?? this.requireOrder(orderId);
      }
      if (order.state !== S.FULFILLED) {
        throw new InvalidTransitionError(orderId, order.state, S.REFUNDED);
      }

      const updated = await this.deps.orders.compareAndSet(
        orderId,
        { states: [S.FULFILLED] },
        {
          transition: { from: S.FULFILLED, to: S.REFUNDED },
          reason: note,
          at: now,
          set: {
            refundIssuedAt: now,
            ...queueNotification(NOTIFICATION_KINDS.ORDER_REFUNDED),
          },
        }
      );
      if (!updated) {
        throw new ConflictError(`Order ${orderId} changed while being refunded`);
      }

      await this.revokeCredential(updated);
      logger.info('Order refunded', { orderId });
      return updated;
    });

    if (refunded.notificationPending) {
      await this.runSideEffects(orderId);
    }
    return (await this.deps.orders.findById(orderId)) ?? refunded;
  }

  /**
   * Best-effort referral settlement and buyer notification. Flags are cleared
   * only after success, so the sweep retries whatever is left. A notification
   * that keeps failing is retried with backoff and then handed to an operator.
   */
  async runSideEffects(orderId: string): Promise<void> {
    await this.deps.lock.withOrderLock(orderId, async () => {
      const order = await this.deps.orders.findById(orderId);
      if (!order) {
        return;
      }

      if (order.settlementPending && order.state === S.FULFILLED) {
        try {
          await this.deps.referrals.settle(order);
          await this.deps.orders.compareAndSet(
            orderId,
            { states: [S.FULFILLED] },
            { reason: 'referral settled', at: this.deps.clock(), set: { settlementPending: false } }
          );
        } catch (error) {
          logger.warn('Referral settlement failed, will retry', { orderId, error: errorMessage(error) });
        }
      }

      const now = this.deps.clock();
      if (order.notificationPending && (!order.nextNotifyAt || order.nextNotifyAt.getTime() <= now.getTime())) {
        await this.deliverNotification(order);
      }
    });
  }

  private async deliverNotification(order: Order): Promise<void> {
    const { orderId } = order;
    const outcome = await this.deps.notifications.dispatch(order);
    if (outcome === 'not_pending') {
      return;
    }

    const now = this.deps.clock();
    const guard = { states: [order.state] };
    if (outcome === 'sent') {
      await this.deps.orders.compareAndSet(orderId, guard, {
        reason: 'buyer notified',
        at: now,
        set: { notificationPending: false, notificationAttempts: 0, nextNotifyAt: null },
      });
      return;
    }

    const attempts = order.notificationAttempts + 1;
    const settings = this.deps.settings.notifications;
    if (outcome === 'failed' && attempts < settings.maxAttempts) {
      await this.deps.orders.compareAndSet(orderId, guard, {
        reason: `notification attempt ${attempts} failed`,
        at: now,
        set: { notificationAttempts: attempts, nextNotifyAt: new Date(now.getTime() + backoffDelay(attempts, settings)) },
      });
      return;
    }

    const reason = outcome === 'unrenderable' ? 'message cannot be rendered' : `${attempts} delivery attempts failed`;
    await this.deps.reviews.open({
      kind: REVIEW_KINDS.NOTIFICATION_FAILED,
      subject: `${orderId}:${order.notificationKind ?? 'none'}`,
      orderId,
      details: { buyerId: order.buyerId, notificationKind: order.notificationKind, attempts, reason },
    });
    await this.deps.orders.compareAndSet(orderId, guard, {
      reason: 'buyer notification abandoned',
      at: now,
      set: { notificationPending: false, notificationAttempts: attempts, nextNotifyAt: null },
    });
    logger.error('Buyer notification handed to an operator', {
      orderId,
      kind: order.notificationKind,
      attempts,
      reason,
    });
  }

  private async recordPayment(orderId: string, payment: PaymentConfirmation): Promise<ConfirmOutcome> {
    let order = await this.requireOrder(orderId);

    if (isPaid(order.state)) {
      return this.outcomeForPaidOrder(order, payment);
    }
    if (order.state === S.EXPIRED) {
      await this.deps.reviews.open({
        kind: REVIEW_KINDS.LATE_PAYMENT,
        subject: `${payment.provider}:${payment.providerTxId}`,
        orderId,
        paymentEventId: payment.paymentEventId,
        details: { amount: payment.amount, currency: payment.currency, refundCandidate: true },
      });
      logger.warn('Payment received for an expired order', { orderId, providerTxId: payment.providerTxId });
      return 'late_payment';
    }

    const now = this.deps.clock();
    if (order.state === S.CREATED) {
      const moved = await this.deps.orders.compareAndSet(
        orderId,
        { states: [S.CREATED] },
        { transition: { from: S.CREATED, to: S.AWAITING_PAYMENT }, reason: 'payment notification received', at: now }
      );
      order = moved ?? (await this.requireOrder(orderId));
    }

    const expected = { amount: order.payment.expectedAmount, currency: order.payment.expectedCurrency };
    const matches =
      sameCurrency(expected.currency, payment.currency) &&
      amountsMatch(expected.amount, payment.amount, this.deps.settings.amountTolerance);
    if (!matches) {
      await this.deps.reviews.open({
        kind: REVIEW_KINDS.AMOUNT_MISMATCH,
        subject: `${payment.provider}:${payment.providerTxId}`,
        orderId,
        paymentEventId: payment.paymentEventId,
        details: { expected, received: { amount: payment.amount, currency: payment.currency } },
      });
      throw new AmountMismatchError(orderId, expected, { amount: payment.amount, currency: payment.currency });
    }

    const confirmed = await this.deps.orders.compareAndSet(
      orderId,
      { states: [S.AWAITING_PAYMENT] },
      {
        transition: { from: S.AWAITING_PAYMENT, to: S.PAYMENT_CONFIRMED },
        reason: `payment ${payment.provider}:${payment.providerTxId}`,
        at: now,
        set: {
          payment: {
            ...order.payment,
            provider: payment.provider,
            providerTxId: payment.providerTxId,
            paidAmount: payment.amount,
            paymentEventId: payment.paymentEventId,
            confirmedAt: now,
          },
          provisioning: { ...order.provisioning, phase: 'idle', nextAttemptAt: now },
        },
      }
    );

    if (!confirmed) {
      const current = await this.requireOrder(orderId);
      if (isPaid(current.state)) {
        return this.outcomeForPaidOrder(current, payment);
      }
      throw new ConflictError(`Order ${orderId} changed while confirming payment (state: ${current.state})`);
    }

    logger.info('Payment confirmed', {
      orderId,
      provider: payment.provider,
      providerTxId: payment.providerTxId,
      amount: payment.amount,
    });
    return 'confirmed';
  }

  private async outcomeForPaidOrder(order: Order, payment: PaymentConfirmation): Promise<ConfirmOutcome> {
    if (order.payment.provider === payment.provider && order.payment.providerTxId === payment.providerTxId) {
      return 'already_confirmed';
    }

    await this.deps.reviews.open({
      kind: REVIEW_KINDS.DUPLICATE_PAYMENT,
      subject: `${payment.provider}:${payment.providerTxId}`,
      orderId: order.orderId,
      paymentEventId: payment.paymentEventId,
      details: {
        amount: payment.amount,
        currency: payment.currency,
        confirmedTxId: order.payment.providerTxId,
        refundCandidate: true,
      },
    });
    logger.warn('Second payment for an already paid order', {
      orderId: order.orderId,
      providerTxId: payment.providerTxId,
    });
    return 'duplicate_payment';
  }

  private async attemptProvisioning(orderId: string): Promise<Order | null> {
    const order = await this.deps.orders.findById(orderId);
    if (!order || (order.state !== S.PAYMENT_CONFIRMED && order.state !== S.PROVISIONING)) {
      return order;
    }

    const now = this.deps.clock();
    const { provisioning } = order;
    if (provisioning.nextAttemptAt && provisioning.nextAttemptAt.getTime() > now.getTime()) {
      return order;
    }

    const { maxAttempts } = this.deps.settings.provisioning;
    if (order.state === S.PROVISIONING && provisioning.attempts >= maxAttempts) {
      // Leases of crashed attempts used up the budget
      return this.failOrder(
        order,
        new HostUnreachableError(order.hostId, provisioning.lastError ?? 'Provisioning attempts exhausted')
      );
    }

    const { renewal } = order;
    if (renewal) {
      // Renewals of one credential extend it one after another, each from the expiry the last one left
      return this.deps.lock.withOrderLock(renewal.sourceOrderId, async () => {
        const source = await this.deps.provisioningRecords.findLiveByOrder(renewal.sourceOrderId);
        return this.runAttempt(order, now, computeTargetExpiry(order, now, source?.expiresAt ?? null));
      });
    }
    return this.runAttempt(order, now, provisioning.targetExpiresAt ?? computeTargetExpiry(order, now));
  }

  private async runAttempt(order: Order, now: Date, targetExpiresAt: Date): Promise<Order | null> {
    const { orderId, provisioning } = order;
    const attempt = provisioning.attempts + 1;
    const claimed = await this.deps.orders.compareAndSet(
      orderId,
      { states: [S.PAYMENT_CONFIRMED, S.PROVISIONING], attempts: provisioning.attempts, dueBy: now },
      {
        transition: order.state === S.PAYMENT_CONFIRMED ? { from: S.PAYMENT_CONFIRMED, to: S.PROVISIONING } : undefined,
        reason: `provisioning attempt ${attempt}`,
        at: now,
        set: {
          provisioning: {
            ...provisioning,
            phase: 'in_flight',
            attempts: attempt,
            nextAttemptAt: new Date(now.getTime() + this.deps.settings.provisioning.attemptLeaseMs),
            targetExpiresAt,
          },
        },
      }
    );
    if (!claimed) {
      return this.deps.orders.findById(orderId);
    }

    logger.info('Provisioning attempt started', { orderId, hostId: order.hostId, attempt });
    let result: ProvisioningResult;
    try {
      result = await this.deps.hosts.issueCredential(claimed);
    } catch (error) {
      return this.handleProvisioningFailure(claimed, error);
    }
    // A failure from here on leaves the lease to expire; the retry finds the credential already issued
    return this.completeProvisioning(claimed, result);
  }

  private async completeProvisioning(order: Order, result: ProvisioningResult): Promise<Order> {
    const now = this.deps.clock();

    await this.deps.provisioningRecords.upsertForOrder({
      recordId: uuidv4(),
      orderId: order.orderId,
      buyerId: order.buyerId,
      hostId: order.hostId,
      remoteCredentialId: result.credentialId,
      email: result.email,
      connectionString: result.connectionString,
      issuedAt: now,
      expiresAt: result.expiresAt,
      lastRenewalAt: null,
      renewalOf: order.renewal?.sourceOrderId ?? null,
      revokedAt: null,
      remindersSent: [],
      // Renewals extend the purchase record, which carries the reminders
      nextReminderAt: order.renewal ? null : now,
    });
    if (order.renewal) {
      await this.deps.provisioningRecords.extendExpiry(order.renewal.sourceOrderId, result.expiresAt, now);
    }

    const fulfilled = await this.deps.orders.compareAndSet(
      order.orderId,
      { states: [S.PROVISIONING], attempts: order.provisioning.attempts },
      {
        transition: { from: S.PROVISIONING, to: S.FULFILLED },
        reason: 'credential issued',
        at: now,
        set: {
          result,
          provisioning: {
            ...order.provisioning,
            phase: 'done',
            nextAttemptAt: null,
            lastError: null,
            lastErrorCode: null,
          },
          settlementPending: true,
          ...queueNotification(NOTIFICATION_KINDS.CREDENTIAL_ISSUED),
        },
      }
    );
    if (!fulfilled) {
      logger.warn('Order changed while its credential was being issued', { orderId: order.orderId });
      return this.requireOrder(order.orderId);
    }

    logger.info('Order fulfilled', { orderId: order.orderId, attempts: order.provisioning.attempts });
    return fulfilled;
  }

  private async handleProvisioningFailure(order: Order, error: unknown): Promise<Order> {
    const hostError = error instanceof HostError ? error : new HostUnreachableError(order.hostId, errorMessage(error));
    const { attempts } = order.provisioning;
    const settings = this.deps.settings.provisioning;

    if (!hostError.retryable || attempts >= settings.maxAttempts) {
      return this.failOrder(order, hostError);
    }

    const now = this.deps.clock();
    const delay = backoffDelay(attempts, settings);
    const scheduled = await this.deps.orders.compareAndSet(
      order.orderId,
      { states: [S.PROVISIONING], attempts },
      {
        reason: `attempt ${attempts} failed`,
        at: now,
        set: {
          provisioning: {
            ...order.provisioning,
            phase: 'retry_scheduled',
            nextAttemptAt: new Date(now.getTime() + delay),
            lastError: hostError.message,
            lastErrorCode: hostError.code,
          },
        },
      }
    );

    logger.warn('Provisioning attempt failed, retry scheduled', {
      orderId: order.orderId,
      hostId: order.hostId,
      attempt: attempts,
      retryInMs: delay,
      error: hostError.message,
    });
    return scheduled ?? this.requireOrder(order.orderId);
  }

  private async failOrder(order: Order, error: HostError): Promise<Order> {
    const now = this.deps.clock();
    const failed = await this.deps.orders.compareAndSet(
      order.orderId,
      { states: [S.PROVISIONING], attempts: order.provisioning.attempts },
      {
        transition: { from: S.PROVISIONING, to: S.FAILED },
        reason: `${error.code}: ${error.message}`,
        at: now,
        set: {
          provisioning: {
            ...order.provisioning,
            phase: 'exhausted',
            nextAttemptAt: null,
            lastError: error.message,
            lastErrorCode: error.code,
          },
          refundEligible: true,
          failureReason: error.message,
          ...queueNotification(NOTIFICATION_KINDS.PROVISIONING_FAILED),
        },
      }
    );
    if (!failed) {
      return this.requireOrder(order.orderId);
    }

    logger.error('Order failed, refund required', {
      orderId: order.orderId,
      hostId: order.hostId,
      attempts: order.provisioning.attempts,
      code: error.code,
      error: error.message,
    });

    await this.deps.reviews.open({
      kind: REVIEW_KINDS.PROVISIONING_FAILED,
      subject: order.orderId,
      orderId: order.orderId,
      details: {
        hostId: order.hostId,
        attempts: order.provisioning.attempts,
        code: error.code,
        error: error.message,
        refundEligible: true,
      },
    });
    if (error instanceof HostAuthFailedError) {
      await this.deps.reviews.open({
        kind: REVIEW_KINDS.HOST_AUTH_FAILED,
        subject: order.hostId,
        details: { hostId: order.hostId, error: error.message },
      });
    }
    return failed;
  }

  private async revokeCredential(order: Order): Promise<void> {
    const record = await this.deps.provisioningRecords.findLiveByOrder(order.orderId);
    if (!record) {
      return;
    }

    const now = this.deps.clock();
    if (record.renewalOf) {
      // The remote credential belongs to the purchase that was extended
      await this.deps.provisioningRecords.markRevoked(order.orderId, now);
      return;
    }

    try {
      await this.deps.hosts.revokeCredential(record);
      await this.deps.provisioningRecords.markRevoked(order.orderId, now);
    } catch (error) {
      await this.deps.reviews.open({
        kind: REVIEW_KINDS.REVOKE_FAILED,
        subject: order.orderId,
        orderId: order.orderId,
        details: { hostId: record.hostId, credentialId: record.remoteCredentialId, error: errorMessage(error) },
      });
    }
  }

  private async requireOrder(orderId: string): Promise<Order> {
    const order = await this.deps.orders.findById(orderId);
    if (!order) {
      throw new OrderNotFoundError(orderId);
    }
    return order;
  }
}
