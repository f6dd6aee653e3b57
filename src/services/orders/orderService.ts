import { v4 as uuidv4 } from 'uuid';
import { ORDER_STATES, type PaymentProvider } from '../../config/constants';
import type { HostConfig } from '../../config/hosts';
import type { OrderListFilter, OrderRepository, ProvisioningRecordRepository } from '../../repositories/types';
import type { Clock, Order, PlanSnapshot, ProvisioningRecord, RenewalTarget } from '../../types/domain';
import {
  HostUnavailableError,
  InvalidTransitionError,
  NotFoundError,
  OrderNotCancellableError,
  OrderNotFoundError,
  UnknownHostError,
  ValidationError,
  isDuplicateKeyError,
} from '../../utils/errors';
import { sha256Hex } from '../../utils/crypto';
import { logger } from '../../utils/logger';
import { roundMoney } from '../../utils/money';
import type { OrderLock } from '../locks/orderLockService';
import type { OrderStateMachine } from './orderStateMachine';

export interface CreateOrderInput {
  buyerId: string;
  hostId: string;
  planId: string;
  /** Client-chosen; the same nonce for the same purchase returns the same order. */
  nonce: string;
  /** Order whose credential this purchase extends. */
  renewsOrderId?: string | null;
}

export interface BeginPaymentInput {
  provider: PaymentProvider;
  invoiceRef?: string | null;
  /** Provider quote when it differs from the plan price (e.g. converted to TON). */
  expectedAmount?: number;
  expectedCurrency?: string;
}

/** Host catalogue the order service needs. */
export interface HostCatalog {
  getHost(hostId: string): HostConfig | null;
  findPlan(hostId: string, planId: string): PlanSnapshot | null;
  isHealthy(hostId: string): boolean;
}

export interface DiscountPolicy {
  referredDiscountPercent(buyerId: string): Promise<number>;
}

export interface OrderServiceDeps {
  orders: OrderRepository;
  provisioningRecords: ProvisioningRecordRepository;
  lock: OrderLock;
  hosts: HostCatalog;
  discounts: DiscountPolicy;
  stateMachine: OrderStateMachine;
  clock: Clock;
  paymentTimeoutMinutes: number;
}

export const idempotencyKeyFor = (
  input: Pick<CreateOrderInput, 'buyerId' | 'planId' | 'hostId' | 'nonce'>
): string => sha256Hex(`${input.buyerId}|${input.planId}|${input.hostId}|${input.nonce}`);

/**
 * Bot-facing order operations. Transitions triggered by payments, sweeps and
 * refunds go through the state machine; this service only opens orders and
 * records checkout details.
 */
export class OrderService {
  constructor(private readonly deps: OrderServiceDeps) {}

  async createOrder(input: CreateOrderInput): Promise<{ order: Order; created: boolean }> {
    const idempotencyKey = idempotencyKeyFor(input);
    const existing = await this.deps.orders.findByIdempotencyKey(idempotencyKey);
    if (existing) {
      return { order: existing, created: false };
    }

    const host = this.deps.hosts.getHost(input.hostId);
    if (!host) {
      throw new UnknownHostError(input.hostId);
    }
    if (!this.deps.hosts.isHealthy(input.hostId)) {
      throw new HostUnavailableError(input.hostId);
    }
    const plan = this.deps.hosts.findPlan(input.hostId, input.planId);
    if (!plan) {
      throw new ValidationError(`Unknown plan ${input.planId} on host ${input.hostId}`);
    }

    const renewal = input.renewsOrderId ? await this.renewalTarget(input) : null;
    const percent = await this.deps.discounts.referredDiscountPercent(input.buyerId);
    const discountAmount = roundMoney((plan.price * percent) / 100);

    const now = this.deps.clock();
    const order: Order = {
      orderId: uuidv4(),
      buyerId: input.buyerId,
      hostId: input.hostId,
      plan: { ...plan },
      kind: renewal ? 'renewal' : 'new',
      renewal,
      state: ORDER_STATES.CREATED,
      idempotencyKey,
      discount: { percent, amount: discountAmount },
      payment: {
        provider: null,
        invoiceRef: null,
        expectedAmount: roundMoney(plan.price - discountAmount),
        expectedCurrency: plan.currency,
        providerTxId: null,
        paidAmount: null,
        paymentEventId: null,
        confirmedAt: null,
      },
      provisioning: {
        phase: 'idle',
        attempts: 0,
        nextAttemptAt: null,
        targetExpiresAt: null,
        lastError: null,
        lastErrorCode: null,
      },
      result: null,
      settlementPending: false,
      notificationPending: false,
      notificationKind: null,
      notificationAttempts: 0,
      nextNotifyAt: null,
      refundEligible: false,
      refundIssuedAt: null,
      failureReason: null,
      expiresAt: new Date(now.getTime() + this.deps.paymentTimeoutMinutes * 60 * 1000),
      history: [],
      createdAt: now,
      updatedAt: now,
    };

    try {
      await this.deps.orders.insert(order);
    } catch (error) {
      if (!isDuplicateKeyError(error)) {
        throw error;
      }
      // Lost a race against the same submission
      const winner = await this.deps.orders.findByIdempotencyKey(idempotencyKey);
      if (!winner) {
        throw error;
      }
      return { order: winner, created: false };
    }

    logger.info('Order created', {
      orderId: order.orderId,
      buyerId: order.buyerId,
      hostId: order.hostId,
      planId: plan.planId,
      kind: order.kind,
    });
    return { order, created: true };
  }

  /** Records the provider quote and moves a new order to `awaiting_payment`. */
  async beginPayment(orderId: string, input: BeginPaymentInput): Promise<Order> {
    return this.deps.lock.withOrderLock(orderId, async () => {
      const order = await this.getOrder(orderId);
      if (order.state !== ORDER_STATES.CREATED && order.state !== ORDER_STATES.AWAITING_PAYMENT) {
        throw new InvalidTransitionError(orderId, order.state, ORDER_STATES.AWAITING_PAYMENT);
      }
      if (input.expectedAmount !== undefined && !(input.expectedAmount > 0)) {
        throw new ValidationError('expectedAmount must be positive');
      }

      const updated = await this.deps.orders.compareAndSet(
        orderId,
        { states: [order.state] },
        {
          transition:
            order.state === ORDER_STATES.CREATED
              ? { from: ORDER_STATES.CREATED, to: ORDER_STATES.AWAITING_PAYMENT }
              : undefined,
          reason: `checkout via ${input.provider}`,
          at: this.deps.clock(),
          set: {
            payment: {
              ...order.payment,
              provider: input.provider,
              invoiceRef: input.invoiceRef ?? null,
              expectedAmount: input.expectedAmount ?? order.payment.expectedAmount,
              expectedCurrency: input.expectedCurrency?.toUpperCase() ?? order.payment.expectedCurrency,
            },
          },
        }
      );
      if (!updated) {
        throw new InvalidTransitionError(orderId, order.state, ORDER_STATES.AWAITING_PAYMENT);
      }

      logger.info('Checkout started', { orderId, provider: input.provider, invoiceRef: input.invoiceRef ?? null });
      return updated;
    });
  }

  /** Buyer cancellation; allowed only before payment is confirmed. */
  async cancelOrder(orderId: string, reason: string): Promise<Order> {
    const { order, expired } = await this.deps.stateMachine.expire(orderId, `cancelled: ${reason}`, false);
    if (!expired && order.state !== ORDER_STATES.EXPIRED) {
      throw new OrderNotCancellableError(orderId, order.state);
    }
    return order;
  }

  refundOrder(orderId: string, note: string): Promise<Order> {
    return this.deps.stateMachine.refund(orderId, note);
  }

  async getOrder(orderId: string): Promise<Order> {
    const order = await this.deps.orders.findById(orderId);
    if (!order) {
      throw new OrderNotFoundError(orderId);
    }
    return order;
  }

  listOrders(filter: OrderListFilter): Promise<Order[]> {
    return this.deps.orders.list(filter);
  }

  /** Credentials the buyer holds, newest first, including revoked ones. */
  listCredentials(buyerId: string): Promise<ProvisioningRecord[]> {
    return this.deps.provisioningRecords.listByBuyer(buyerId);
  }

  private async renewalTarget(input: CreateOrderInput): Promise<RenewalTarget> {
    let sourceOrderId = input.renewsOrderId ?? '';
    let record = await this.deps.provisioningRecords.findLiveByOrder(sourceOrderId);
    if (record?.renewalOf) {
      // Renewals always extend the original purchase's record
      sourceOrderId = record.renewalOf;
      record = await this.deps.provisioningRecords.findLiveByOrder(sourceOrderId);
    }
    if (!record || record.buyerId !== input.buyerId) {
      throw new NotFoundError(`No active credential for order ${sourceOrderId}`);
    }
    if (record.hostId !== input.hostId) {
      throw new ValidationError(`Credential of order ${sourceOrderId} lives on host ${record.hostId}`);
    }
    return {
      sourceOrderId,
      credentialId: record.remoteCredentialId,
      email: record.email,
      expiresAt: record.expiresAt,
    };
  }
}
