import { v4 as uuidv4 } from 'uuid';
import { REVIEW_STATUS, type ReviewKind } from '../../config/constants';
import type { ReviewItemFilter, ReviewItemRepository } from '../../repositories/types';
import type { Clock, ReviewItem } from '../../types/domain';
import { NotFoundError } from '../../utils/errors';
import { logger } from '../../utils/logger';

export interface ReviewItemInput {
  kind: ReviewKind;
  /** Repeated detections with the same kind and subject share one item. */
  subject: string;
  orderId?: string | null;
  paymentEventId?: string | null;
  details?: Record<string, unknown>;
}

/**
 * Operator queue for anomalies that are never resolved automatically:
 * orphaned or mismatched payments, late and duplicate payments, failed
 * provisioning, refused host credentials and buyer messages that never went out.
 */
export class ReviewQueueService {
  constructor(
    private readonly items: ReviewItemRepository,
    private readonly clock: Clock
  ) {}

  async open(input: ReviewItemInput): Promise<ReviewItem> {
    const { item, created } = await this.items.openIfAbsent({
      reviewId: uuidv4(),
      kind: input.kind,
      subject: input.subject,
      orderId: input.orderId ?? null,
      paymentEventId: input.paymentEventId ?? null,
      details: input.details ?? {},
      status: REVIEW_STATUS.OPEN,
      resolutionNote: null,
      createdAt: this.clock(),
      resolvedAt: null,
    });

    if (created) {
      logger.warn('Review item opened', {
        reviewId: item.reviewId,
        kind: item.kind,
        subject: item.subject,
        orderId: item.orderId,
      });
    }
    return item;
  }

  list(filter: ReviewItemFilter): Promise<ReviewItem[]> {
    return this.items.list(filter);
  }

  async resolve(reviewId: string, note: string): Promise<ReviewItem> {
    const item = await this.items.resolve(reviewId, note, this.clock());
    if (!item) {
      throw new NotFoundError(`Review item ${reviewId} not found`);
    }
    logger.info('Review item resolved', { reviewId, kind: item.kind });
    return item;
  }
}
