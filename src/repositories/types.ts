import type { OrderState, PaymentProvider, ReviewKind, ReviewStatus } from '../config/constants';
import type {
  Customer,
  Order,
  PaymentEvent,
  ProvisioningRecord,
  ReferralCredit,
  ReferralWithdrawal,
  ReviewItem,
} from '../types/domain';

/**
 * Persistence contracts of the fulfillment pipeline.
 *
 * The state machine only talks to these interfaces; MongoDB implementations live
 * next to them and in-memory ones back the tests.
 */

export type MutableOrderField =
  | 'payment'
  | 'provisioning'
  | 'result'
  | 'settlementPending'
  | 'notificationPending'
  | 'notificationKind'
  | 'notificationAttempts'
  | 'nextNotifyAt'
  | 'refundEligible'
  | 'refundIssuedAt'
  | 'failureReason';

export type OrderPatch = Partial<Pick<Order, MutableOrderField>>;

/** Preconditions of a conditional order update. All given fields must hold. */
export interface OrderGuard {
  states: readonly OrderState[];
  /** `provisioning.attempts` must equal this value. */
  attempts?: number;
  /** `provisioning.nextAttemptAt` must be at or before this time. */
  dueBy?: Date;
}

export interface OrderChange {
  /** State move recorded in the order history; `from` is added to the guard. */
  transition?: { from: OrderState; to: OrderState };
  reason: string;
  at: Date;
  set?: OrderPatch;
}

export interface OrderListFilter {
  state?: OrderState;
  buyerId?: string;
  limit?: number;
  skip?: number;
}

export interface PaymentCandidateQuery {
  provider: PaymentProvider;
  amount: number;
  tolerance: number;
  at: Date;
}

export interface OrderRepository {
  /** Rejects with a duplicate-key error when the idempotency key is taken. */
  insert(order: Order): Promise<Order>;
  findById(orderId: string): Promise<Order | null>;
  findByIdempotencyKey(idempotencyKey: string): Promise<Order | null>;
  /**
   * Single-document compare-and-set: applies `change` only if the order still
   * satisfies `guard`, and returns the updated order, or null when it did not.
   */
  compareAndSet(orderId: string, guard: OrderGuard, change: OrderChange): Promise<Order | null>;
  /** Open orders quoted for `provider` whose amount and payment window match. */
  findPaymentCandidates(query: PaymentCandidateQuery): Promise<Order[]>;
  findExpirable(now: Date, limit: number): Promise<Order[]>;
  findProvisioningDue(now: Date, limit: number): Promise<Order[]>;
  findSettlementPending(limit: number): Promise<Order[]>;
  /** Pending notifications due by `now`, those waiting longest first. */
  findNotificationPending(now: Date, limit: number): Promise<Order[]>;
  list(filter: OrderListFilter): Promise<Order[]>;
}

export type PaymentEventPatch = Partial<Pick<PaymentEvent, 'status' | 'orderId' | 'lastError' | 'processedAt'>>;

export interface PaymentEventListFilter {
  status?: PaymentEvent['status'];
  provider?: PaymentProvider;
  limit?: number;
}

export interface PaymentEventRepository {
  /** Insert keyed by (provider, providerTxId); returns the stored record either way. */
  insertIfAbsent(event: PaymentEvent): Promise<{ event: PaymentEvent; created: boolean }>;
  findById(eventId: string): Promise<PaymentEvent | null>;
  update(eventId: string, patch: PaymentEventPatch, incrementAttempts?: boolean): Promise<PaymentEvent | null>;
  findUnprocessed(receivedBefore: Date, limit: number): Promise<PaymentEvent[]>;
  list(filter: PaymentEventListFilter): Promise<PaymentEvent[]>;
}

export interface ProvisioningRecordRepository {
  /** Creates the live record of an order, or returns the one already there. */
  upsertForOrder(record: ProvisioningRecord): Promise<ProvisioningRecord>;
  findLiveByOrder(orderId: string): Promise<ProvisioningRecord | null>;
  extendExpiry(orderId: string, expiresAt: Date, renewedAt: Date): Promise<ProvisioningRecord | null>;
  markRevoked(orderId: string, revokedAt: Date): Promise<ProvisioningRecord | null>;
  listByBuyer(buyerId: string): Promise<ProvisioningRecord[]>;
  /** Live purchase records whose reminder check is due, oldest first. */
  findReminderDue(now: Date, limit: number): Promise<ProvisioningRecord[]>;
  /**
   * Moves the reminder schedule of a live record, but only while its
   * `nextReminderAt` is still `expectedNextAt`. Null when someone else moved it.
   */
  claimReminder(recordId: string, expectedNextAt: Date, patch: ReminderPatch): Promise<ProvisioningRecord | null>;
}

export interface ReminderPatch {
  remindersSent: number[];
  nextReminderAt: Date | null;
}

export interface ReferralCreditFilter {
  referrerId?: string;
  sourceOrderId?: string;
  limit?: number;
}

export interface ReferralRepository {
  /** Returns false when a credit with the same key already exists. */
  insertCredit(credit: ReferralCredit): Promise<boolean>;
  listCredits(filter: ReferralCreditFilter): Promise<ReferralCredit[]>;
  /** Total of the referrer's credits in `currency`. */
  sumCredits(referrerId: string, currency: string): Promise<number>;
  insertWithdrawal(withdrawal: ReferralWithdrawal): Promise<ReferralWithdrawal>;
  /** Total of withdrawals in `currency` that are not rejected. */
  sumWithdrawals(userId: string, currency: string): Promise<number>;
}

export interface CustomerRepository {
  /** First registration wins; an existing customer keeps its referrer. */
  registerIfAbsent(customer: Customer): Promise<{ customer: Customer; created: boolean }>;
  findById(userId: string): Promise<Customer | null>;
  countReferredBy(userId: string): Promise<number>;
}

export interface ReviewItemFilter {
  status?: ReviewStatus;
  kind?: ReviewKind;
  orderId?: string;
  limit?: number;
}

export interface ReviewItemRepository {
  openIfAbsent(item: ReviewItem): Promise<{ item: ReviewItem; created: boolean }>;
  list(filter: ReviewItemFilter): Promise<ReviewItem[]>;
  resolve(reviewId: string, note: string, resolvedAt: Date): Promise<ReviewItem | null>;
}

export interface Repositories {
  orders: OrderRepository;
  paymentEvents: PaymentEventRepository;
  provisioningRecords: ProvisioningRecordRepository;
  referrals: ReferralRepository;
  customers: CustomerRepository;
  reviewItems: ReviewItemRepository;
}
