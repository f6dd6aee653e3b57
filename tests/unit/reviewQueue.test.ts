import { describe, it, expect } from 'vitest';
import { ReviewQueueService } from '../../src/services/review/reviewQueueService';
import { NotFoundError } from '../../src/utils/errors';
import { ManualClock } from '../_fakes/clock';
import { MemoryReviewItemRepository } from '../_fakes/memoryRepositories';

const setup = () => {
  const repo = new MemoryReviewItemRepository();
  const clock = new ManualClock();
  return { repo, clock, reviews: new ReviewQueueService(repo, clock.now) };
};

describe('ReviewQueueService', () => {
  it('keeps one item per kind and subject', async () => {
    const { repo, reviews } = setup();

    const first = await reviews.open({ kind: 'orphaned_payment', subject: 'ton:abc', details: { amount: 1 } });
    const again = await reviews.open({ kind: 'orphaned_payment', subject: 'ton:abc', details: { amount: 2 } });
    await reviews.open({ kind: 'late_payment', subject: 'ton:abc' });

    expect(again.reviewId).toBe(first.reviewId);
    expect(again.details).toEqual({ amount: 1 });
    expect(repo.rows.map(row => row.kind)).toEqual(['orphaned_payment', 'late_payment']);
  });

  it('fills defaults for optional fields', async () => {
    const { reviews } = setup();

    const item = await reviews.open({ kind: 'host_auth_failed', subject: 'de-1' });

    expect(item).toMatchObject({
      orderId: null,
      paymentEventId: null,
      details: {},
      status: 'open',
      resolutionNote: null,
      resolvedAt: null,
      createdAt: new Date('2026-03-01T12:00:00.000Z'),
    });
  });

  it('resolves an open item once', async () => {
    const { reviews, clock } = setup();
    const item = await reviews.open({ kind: 'amount_mismatch', subject: 'yookassa:tx-1', orderId: 'order-1' });
    clock.advance(60_000);

    const resolved = await reviews.resolve(item.reviewId, 'refunded');

    expect(resolved).toMatchObject({
      status: 'resolved',
      resolutionNote: 'refunded',
      resolvedAt: new Date('2026-03-01T12:01:00.000Z'),
    });
    expect(await reviews.list({ status: 'open' })).toEqual([]);
    await expect(reviews.resolve(item.reviewId, 'again')).rejects.toBeInstanceOf(NotFoundError);
  });
});
