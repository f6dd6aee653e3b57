import type { FilterQuery } from 'mongoose';
import { ReviewItemModel, type IReviewItem } from '../models';
import { REVIEW_STATUS } from '../config/constants';
import { isDuplicateKeyError } from '../utils/errors';
import type { ReviewItem } from '../types/domain';
import type { ReviewItemFilter, ReviewItemRepository } from './types';

const LEAN_PROJECTION = { _id: 0, __v: 0 } as const;

export class MongoReviewItemRepository implements ReviewItemRepository {
  async openIfAbsent(item: ReviewItem): Promise<{ item: ReviewItem; created: boolean }> {
    const key = { kind: item.kind, subject: item.subject };

    try {
      const existing = await ReviewItemModel.findOneAndUpdate(
        key,
        { $setOnInsert: item },
        { upsert: true, new: false, projection: LEAN_PROJECTION }
      )
        .lean<ReviewItem | null>()
        .exec();
      return existing ? { item: existing, created: false } : { item, created: true };
    } catch (error) {
      if (!isDuplicateKeyError(error)) {
        throw error;
      }
      const winner = await ReviewItemModel.findOne(key, LEAN_PROJECTION).lean<ReviewItem | null>().exec();
      if (!winner) {
        throw error;
      }
      return { item: winner, created: false };
    }
  }

  async list(filter: ReviewItemFilter): Promise<ReviewItem[]> {
    const query: FilterQuery<IReviewItem> = {};
    if (filter.status) {
      query.status = filter.status;
    }
    if (filter.kind) {
      query.kind = filter.kind;
    }
    if (filter.orderId) {
      query.orderId = filter.orderId;
    }

    return ReviewItemModel.find(query, LEAN_PROJECTION)
      .sort({ createdAt: -1 })
      .limit(filter.limit ?? 50)
      .lean<ReviewItem[]>()
      .exec();
  }

  async resolve(reviewId: string, note: string, resolvedAt: Date): Promise<ReviewItem | null> {
    return ReviewItemModel.findOneAndUpdate(
      { reviewId, status: REVIEW_STATUS.OPEN },
      { $set: { status: REVIEW_STATUS.RESOLVED, resolutionNote: note, resolvedAt } },
      { new: true, projection: LEAN_PROJECTION }
    )
      .lean<ReviewItem | null>()
      .exec();
  }
}

export const reviewItemRepository = new MongoReviewItemRepository();
