import type {
  NotificationKind,
  OrderState,
  PaymentEventStatus,
  PaymentProvider,
  ReferralCreditKind,
  ReviewKind,
  ReviewStatus,
  WithdrawalStatus,
} from '../config/constants';

export interface PlanSnapshot {
  planId: string;
  name: string;
  durationDays: number;
  price: number;
  currency: string;
}

export interface OrderPayment {
  provider: PaymentProvider | null;
  invoiceRef: string | null;
  expectedAmount: number;
  expectedCurrency: string;
  providerTxId: string | null;
  paidAmount: number | null;
  paymentEventId: string | null;
  confirmedAt: Date | null;
}

export type ProvisioningPhase = 'idle' | 'in_flight' | 'retry_scheduled' | 'done' | 'exhausted';

export interface ProvisioningProgress {
  phase: ProvisioningPhase;
  attempts: number;
  /** Due time of the next attempt; while in flight, the lease expiry. */
  nextAttemptAt: Date | null;
  /**
   * Fixed on the first attempt so that every retry asks the host for the same
   * expiry. Renewals recompute it from the credential's live expiry on each attempt.
   */
  targetExpiresAt: Date | null;
  lastError: string | null;
  lastErrorCode: string | null;
}

export interface ProvisioningResult {
  credentialId: string;
  email: string;
  connectionString: string;
  expiresAt: Date;
}

export interface RenewalTarget {
  sourceOrderId: string;
  credentialId: string;
  email: string;
  expiresAt: Date;
}

export interface StateChange {
  from: OrderState;
  to: OrderState;
  at: Date;
  reason: string;
}

export interface Order {
  orderId: string;
  buyerId: string;
  hostId: string;
  plan: PlanSnapshot;
  kind: 'new' | 'renewal';
  renewal: RenewalTarget | null;
  state: OrderState;
  idempotencyKey: string;
  discount: { percent: number; amount: number };
  payment: OrderPayment;
  provisioning: ProvisioningProgress;
  result: ProvisioningResult | null;
  settlementPending: boolean;
  notificationPending: boolean;
  notificationKind: NotificationKind | null;
  /** Failed sends of the pending notification; reset when a new one is queued. */
  notificationAttempts: number;
  nextNotifyAt: Date | null;
  refundEligible: boolean;
  refundIssuedAt: Date | null;
  failureReason: string | null;
  /** Payment deadline; after it the expiry sweep closes the order. */
  expiresAt: Date;
  history: StateChange[];
  createdAt: Date;
  updatedAt: Date;
}

export interface PaymentEvent {
  eventId: string;
  provider: PaymentProvider;
  providerTxId: string;
  amount: number | null;
  currency: string | null;
  payloadHash: string;
  rawPayload: string;
  status: PaymentEventStatus;
  orderId: string | null;
  attempts: number;
  lastError: string | null;
  receivedAt: Date;
  processedAt: Date | null;
}

export interface ProvisioningRecord {
  recordId: string;
  orderId: string;
  buyerId: string;
  hostId: string;
  remoteCredentialId: string;
  email: string;
  connectionString: string;
  issuedAt: Date;
  expiresAt: Date;
  lastRenewalAt: Date | null;
  renewalOf: string | null;
  revokedAt: Date | null;
  /** Expiry reminder marks, in hours before expiry, already handled for the current expiry. */
  remindersSent: number[];
  /** When the reminder sweep looks at this record next; null once nothing is left to send. */
  nextReminderAt: Date | null;
}

export interface ReferralCredit {
  creditKey: string;
  referrerId: string;
  referredUserId: string;
  sourceOrderId: string | null;
  amount: number;
  currency: string;
  kind: ReferralCreditKind;
  createdAt: Date;
}

export interface ReferralWithdrawal {
  withdrawalId: string;
  userId: string;
  amount: number;
  currency: string;
  status: WithdrawalStatus;
  requestedAt: Date;
}

export interface Customer {
  userId: string;
  username: string | null;
  referredBy: string | null;
  registeredAt: Date;
}

export interface ReviewItem {
  reviewId: string;
  kind: ReviewKind;
  /** Dedup key: one item per kind and subject. */
  subject: string;
  orderId: string | null;
  paymentEventId: string | null;
  details: Record<string, unknown>;
  status: ReviewStatus;
  resolutionNote: string | null;
  createdAt: Date;
  resolvedAt: Date | null;
}

export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
