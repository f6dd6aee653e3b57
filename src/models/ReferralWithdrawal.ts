import mongoose, { Document, Schema } from 'mongoose';
import { WITHDRAWAL_STATUS } from '../config/constants';
import type { ReferralWithdrawal } from '../types/domain';

export interface IReferralWithdrawal extends ReferralWithdrawal, Document {}

const referralWithdrawalSchema = new Schema<IReferralWithdrawal>(
  {
    withdrawalId: {
      type: String,
      required: true,
      unique: true,
    },
    userId: {
      type: String,
      required: true,
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
    status: {
      type: String,
      enum: Object.values(WITHDRAWAL_STATUS),
      default: WITHDRAWAL_STATUS.REQUESTED,
    },
    requestedAt: {
      type: Date,
      required: true,
      default: Date.now,
    },
  },
  {
    timestamps: true,
  }
);

export const ReferralWithdrawalModel = mongoose.model<IReferralWithdrawal>(
  'ReferralWithdrawal',
  referralWithdrawalSchema
);
