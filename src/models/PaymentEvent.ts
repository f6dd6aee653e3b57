import mongoose, { Document, Schema } from 'mongoose';
import { PAYMENT_EVENT_STATUS, PAYMENT_PROVIDER_VALUES } from '../config/constants';
import type { PaymentEvent } from '../types/domain';

export interface IPaymentEvent extends PaymentEvent, Document {}

const paymentEventSchema = new Schema<IPaymentEvent>(
  {
    eventId: {
      type: String,
      required: true,
      unique: true,
    },
    provider: {
      type: String,
      enum: PAYMENT_PROVIDER_VALUES,
      required: true,
    },
    providerTxId: {
      type: String,
      required: true,
    },
    amount: {
      type: Number,
      default: null,
    },
    currency: {
      type: String,
      default: null,
      uppercase: true,
    },
    payloadHash: {
      type: String,
      required: true,
      index: true,
    },
    // Stored verbatim for re-drive and audit
    rawPayload: {
      type: String,
      required: true,
    },
    status: {
      type: String,
      enum: Object.values(PAYMENT_EVENT_STATUS),
      required: true,
      default: PAYMENT_EVENT_STATUS.RECEIVED,
    },
    orderId: {
      type: String,
      default: null,
      index: true,
    },
    attempts: {
      type: Number,
      default: 0,
    },
    lastError: {
      type: String,
      default: null,
    },
    receivedAt: {
      type: Date,
      required: true,
      default: Date.now,
    },
    processedAt: {
      type: Date,
      default: null,
    },
  },
  {
    timestamps: true,
  }
);

// One durable record per provider transaction, however many times it is delivered
paymentEventSchema.index({ provider: 1, providerTxId: 1 }, { unique: true });
paymentEventSchema.index({ status: 1, receivedAt: 1 });

export const PaymentEventModel = mongoose.model<IPaymentEvent>('PaymentEvent', paymentEventSchema);
