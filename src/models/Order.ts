import mongoose, { Document, Schema } from 'mongoose';
import { NOTIFICATION_KINDS, ORDER_STATE_VALUES, ORDER_STATES, PAYMENT_PROVIDER_VALUES } from '../config/constants';
import type { Order, PlanSnapshot, ProvisioningResult, RenewalTarget, StateChange } from '../types/domain';

export interface IOrder extends Order, Document {}

const planSchema = new Schema<PlanSnapshot>(
  {
    planId: { type: String, required: true },
    name: { type: String, required: true },
    durationDays: { type: Number, required: true, min: 1 },
    price: { type: Number, required: true, min: 0 },
    currency: { type: String, required: true, uppercase: true },
  },
  { _id: false }
);

const renewalSchema = new Schema<RenewalTarget>(
  {
    sourceOrderId: { type: String, required: true },
    credentialId: { type: String, required: true },
    email: { type: String, required: true },
    expiresAt: { type: Date, required: true },
  },
  { _id: false }
);

const resultSchema = new Schema<ProvisioningResult>(
  {
    credentialId: { type: String, required: true },
    email: { type: String, required: true },
    connectionString: { type: String, required: true },
    expiresAt: { type: Date, required: true },
  },
  { _id: false }
);

const stateChangeSchema = new Schema<StateChange>(
  {
    from: { type: String, enum: ORDER_STATE_VALUES, required: true },
    to: { type: String, enum: ORDER_STATE_VALUES, required: true },
    at: { type: Date, required: true },
    reason: { type: String, required: true },
  },
  { _id: false }
);

const orderSchema = new Schema<IOrder>(
  {
    orderId: {
      type: String,
      required: true,
      unique: true,
      immutable: true,
    },
    buyerId: {
      type: String,
      required: true,
      index: true,
    },
    hostId: {
      type: String,
      required: true,
    },
    plan: {
      type: planSchema,
      required: true,
    },
    kind: {
      type: String,
      enum: ['new', 'renewal'],
      default: 'new',
    },
    renewal: {
      type: renewalSchema,
      default: null,
    },
    state: {
      type: String,
      enum: ORDER_STATE_VALUES,
      required: true,
      default: ORDER_STATES.CREATED,
    },
    idempotencyKey: {
      type: String,
      required: true,
      unique: true,
      immutable: true,
    },
    discount: {
      percent: { type: Number, default: 0 },
      amount: { type: Number, default: 0 },
    },
    payment: {
      provider: { type: String, enum: [...PAYMENT_PROVIDER_VALUES, null], default: null },
      invoiceRef: { type: String, default: null },
      expectedAmount: { type: Number, required: true },
      expectedCurrency: { type: String, required: true, uppercase: true },
      providerTxId: { type: String, default: null },
      paidAmount: { type: Number, default: null },
      paymentEventId: { type: String, default: null },
      confirmedAt: { type: Date, default: null },
    },
    provisioning: {
      phase: {
        type: String,
        enum: ['idle', 'in_flight', 'retry_scheduled', 'done', 'exhausted'],
        default: 'idle',
      },
      attempts: { type: Number, default: 0 },
      nextAttemptAt: { type: Date, default: null },
      targetExpiresAt: { type: Date, default: null },
      lastError: { type: String, default: null },
      lastErrorCode: { type: String, default: null },
    },
    result: {
      type: resultSchema,
      default: null,
    },
    settlementPending: {
      type: Boolean,
      default: false,
    },
    notificationPending: {
      type: Boolean,
      default: false,
    },
    notificationKind: {
      type: String,
      enum: [...Object.values(NOTIFICATION_KINDS), null],
      default: null,
    },
    notificationAttempts: {
      type: Number,
      default: 0,
    },
    nextNotifyAt: {
      type: Date,
      default: null,
    },
    refundEligible: {
      type: Boolean,
      default: false,
    },
    refundIssuedAt: {
      type: Date,
      default: null,
    },
    failureReason: {
      type: String,
      default: null,
    },
    expiresAt: {
      type: Date,
      required: true,
    },
    history: {
      type: [stateChangeSchema],
      default: [],
    },
  },
  {
    timestamps: true,
  }
);

// Sweep queries
orderSchema.index({ state: 1, expiresAt: 1 });
orderSchema.index({ state: 1, 'provisioning.nextAttemptAt': 1 });
orderSchema.index({ settlementPending: 1, state: 1 });
orderSchema.index({ notificationPending: 1, nextNotifyAt: 1 });
// Amount + time correlation for payments without an embedded order reference
orderSchema.index({ 'payment.provider': 1, state: 1, 'payment.expectedAmount': 1 });
orderSchema.index({ buyerId: 1, createdAt: -1 });

export const OrderModel = mongoose.model<IOrder>('Order', orderSchema);
