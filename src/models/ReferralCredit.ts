import mongoose, { Document, Schema } from 'mongoose';
import { REFERRAL_CREDIT_KINDS } from '../config/constants';
import type { ReferralCredit } from '../types/domain';

export interface IReferralCredit extends ReferralCredit, Document {}

const referralCreditSchema = new Schema<IReferralCredit>(
  {
    // "<kind>:<orderId>" or "signup_bonus:<referredUserId>"
    creditKey: {
      type: String,
      required: true,
      unique: true,
      immutable: true,
    },
    referrerId: {
      type: String,
      required: true,
      index: true,
    },
    referredUserId: {
      type: String,
      required: true,
    },
    sourceOrderId: {
      type: String,
      default: null,
      index: true,
    },
    amount: {
      type: Number,
      required: true,
      min: 0,
    },
    currency: {
      type: String,
      required: true,
      uppercase: true,
    },
    kind: {
      type: String,
      enum: Object.values(REFERRAL_CREDIT_KINDS),
      required: true,
    },
    createdAt: {
      type: Date,
      required: true,
      default: Date.now,
    },
  },
  {
    // Ledger entries are append-only
    timestamps: false,
  }
);

referralCreditSchema.index({ referrerId: 1, createdAt: -1 });
referralCreditSchema.index({ referrerId: 1, currency: 1 });

export const ReferralCreditModel = mongoose.model<IReferralCredit>('ReferralCredit', referralCreditSchema);
