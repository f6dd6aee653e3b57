// Operator roles
export const USER_ROLES = {
  ADMIN: 'admin',
  VIEWER: 'viewer',
} as const;

export type UserRole = (typeof USER_ROLES)[keyof typeof USER_ROLES];

// Order lifecycle
export const ORDER_STATES = {
  CREATED: 'created',
  AWAITING_PAYMENT: 'awaiting_payment',
  PAYMENT_CONFIRMED: 'payment_confirmed',
  PROVISIONING: 'provisioning',
  FULFILLED: 'fulfilled',
  EXPIRED: 'expired',
  FAILED: 'failed',
  REFUNDED: 'refunded',
} as const;

export type OrderState = (typeof ORDER_STATES)[keyof typeof ORDER_STATES];

export const ORDER_STATE_VALUES: readonly OrderState[] = Object.values(ORDER_STATES);

// Payment providers
export const PAYMENT_PROVIDERS = {
  YOOKASSA: 'yookassa',
  CRYPTOBOT: 'cryptobot',
  HELEKET: 'heleket',
  TON: 'ton',
} as const;

export type PaymentProvider = (typeof PAYMENT_PROVIDERS)[keyof typeof PAYMENT_PROVIDERS];

export const PAYMENT_PROVIDER_VALUES: readonly PaymentProvider[] = Object.values(PAYMENT_PROVIDERS);

export const isPaymentProvider = (value: string): value is PaymentProvider =>
  PAYMENT_PROVIDER_VALUES.some(provider => provider === value);

// Payment event status
export const PAYMENT_EVENT_STATUS = {
  RECEIVED: 'received',
  PROCESSED: 'processed',
  REJECTED: 'rejected',
  ORPHANED: 'orphaned',
  IGNORED: 'ignored',
  REVIEW: 'review',
} as const;

export type PaymentEventStatus = (typeof PAYMENT_EVENT_STATUS)[keyof typeof PAYMENT_EVENT_STATUS];

export const PAYMENT_EVENT_STATUS_VALUES: readonly PaymentEventStatus[] = Object.values(PAYMENT_EVENT_STATUS);

// Host panel types
export const HOST_TYPES = {
  XUI: 'xui',
  REMNAWAVE: 'remnawave',
} as const;

export type HostType = (typeof HOST_TYPES)[keyof typeof HOST_TYPES];

// Referral credit kinds
export const REFERRAL_CREDIT_KINDS = {
  PERCENTAGE: 'percentage',
  FIXED_PER_PURCHASE: 'fixed_per_purchase',
  SIGNUP_BONUS: 'signup_bonus',
} as const;

export type ReferralCreditKind = (typeof REFERRAL_CREDIT_KINDS)[keyof typeof REFERRAL_CREDIT_KINDS];

export const WITHDRAWAL_STATUS = {
  REQUESTED: 'requested',
  PAID: 'paid',
  REJECTED: 'rejected',
} as const;

export type WithdrawalStatus = (typeof WITHDRAWAL_STATUS)[keyof typeof WITHDRAWAL_STATUS];

// Operator review queue
export const REVIEW_KINDS = {
  ORPHANED_PAYMENT: 'orphaned_payment',
  AMOUNT_MISMATCH: 'amount_mismatch',
  LATE_PAYMENT: 'late_payment',
  DUPLICATE_PAYMENT: 'duplicate_payment',
  PROVISIONING_FAILED: 'provisioning_failed',
  HOST_AUTH_FAILED: 'host_auth_failed',
  REVOKE_FAILED: 'revoke_failed',
  NOTIFICATION_FAILED: 'notification_failed',
} as const;

export type ReviewKind = (typeof REVIEW_KINDS)[keyof typeof REVIEW_KINDS];

export const REVIEW_KIND_VALUES: readonly ReviewKind[] = Object.values(REVIEW_KINDS);

export const REVIEW_STATUS = {
  OPEN: 'open',
  RESOLVED: 'resolved',
} as const;

export type ReviewStatus = (typeof REVIEW_STATUS)[keyof typeof REVIEW_STATUS];

export const REVIEW_STATUS_VALUES: readonly ReviewStatus[] = Object.values(REVIEW_STATUS);

// Buyer-facing notifications
export const NOTIFICATION_KINDS = {
  CREDENTIAL_ISSUED: 'credential_issued',
  PROVISIONING_FAILED: 'provisioning_failed',
  ORDER_EXPIRED: 'order_expired',
  ORDER_REFUNDED: 'order_refunded',
  CREDENTIAL_EXPIRING: 'credential_expiring',
} as const;

export type NotificationKind = (typeof NOTIFICATION_KINDS)[keyof typeof NOTIFICATION_KINDS];

// UUID v5 namespace for panel client ids derived from order idempotency keys
export const CREDENTIAL_NAMESPACE = '6f1c2a8e-3b7d-4e59-9a0c-5d2e8f4b1c73';
