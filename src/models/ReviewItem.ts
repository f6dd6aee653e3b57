import mongoose, { Document, Schema } from 'mongoose';
import { REVIEW_KIND_VALUES, REVIEW_STATUS } from '../config/constants';
import type { ReviewItem } from '../types/domain';

export interface IReviewItem extends ReviewItem, Document {}

const reviewItemSchema = new Schema<IReviewItem>(
  {
    reviewId: {
      type: String,
      required: true,
      unique: true,
    },
    kind: {
      type: String,
      enum: REVIEW_KIND_VALUES,
      required: true,
    },
    subject: {
      type: String,
      required: true,
    },
    orderId: {
      type: String,
      default: null,
      index: true,
    },
    paymentEventId: {
      type: String,
      default: null,
    },
    details: {
      type: Schema.Types.Mixed,
      default: {},
    },
    status: {
      type: String,
      enum: Object.values(REVIEW_STATUS),
      default: REVIEW_STATUS.OPEN,
    },
    resolutionNote: {
      type: String,
      default: null,
    },
    createdAt: {
      type: Date,
      required: true,
      default: Date.now,
    },
    resolvedAt: {
      type: Date,
      default: null,
    },
  },
  {
    timestamps: false,
  }
);

reviewItemSchema.index({ kind: 1, subject: 1 }, { unique: true });
reviewItemSchema.index({ status: 1, createdAt: -1 });

export const ReviewItemModel = mongoose.model<IReviewItem>('ReviewItem', reviewItemSchema);
