import type { FilterQuery, UpdateQuery } from 'mongoose';
import { PaymentEventModel, type IPaymentEvent } from '../models';
import { PAYMENT_EVENT_STATUS } from '../config/constants';
import { isDuplicateKeyError } from '../utils/errors';
import type { PaymentEvent } from '../types/domain';
import type { PaymentEventListFilter, PaymentEventPatch, PaymentEventRepository } from './types';

const LEAN_PROJECTION = { _id: 0, __v: 0, createdAt: 0, updatedAt: 0 } as const;

export class MongoPaymentEventRepository implements PaymentEventRepository {
  async insertIfAbsent(event: PaymentEvent): Promise<{ event: PaymentEvent; created: boolean }> {
    const key = { provider: event.provider, providerTxId: event.providerTxId };

    try {
      // `new: false` yields the pre-existing document, or null when this call inserted it
      const existing = await PaymentEventModel.findOneAndUpdate(
        key,
        { $setOnInsert: event },
        { upsert: true, new: false, projection: LEAN_PROJECTION }
      )
        .lean<PaymentEvent | null>()
        .exec();

      return existing ? { event: existing, created: false } : { event, created: true };
    } catch (error) {
      // Two concurrent upserts on the same key: the loser reads the winner's record
      if (!isDuplicateKeyError(error)) {
        throw error;
      }
      const winner = await PaymentEventModel.findOne(key, LEAN_PROJECTION).lean<PaymentEvent | null>().exec();
      if (!winner) {
        throw error;
      }
      return { event: winner, created: false };
    }
  }

  async findById(eventId: string): Promise<PaymentEvent | null> {
    return PaymentEventModel.findOne({ eventId }, LEAN_PROJECTION).lean<PaymentEvent | null>().exec();
  }

  async update(eventId: string, patch: PaymentEventPatch, incrementAttempts = false): Promise<PaymentEvent | null> {
    const update: UpdateQuery<IPaymentEvent> = { $set: { ...patch } };
    if (incrementAttempts) {
      update.$inc = { attempts: 1 };
    }

    return PaymentEventModel.findOneAndUpdate({ eventId }, update, { new: true, projection: LEAN_PROJECTION })
      .lean<PaymentEvent | null>()
      .exec();
  }

  async findUnprocessed(receivedBefore: Date, limit: number): Promise<PaymentEvent[]> {
    return PaymentEventModel.find(
      { status: PAYMENT_EVENT_STATUS.RECEIVED, receivedAt: { $lte: receivedBefore } },
      LEAN_PROJECTION
    )
      .sort({ receivedAt: 1 })
      .limit(limit)
      .lean<PaymentEvent[]>()
      .exec();
  }

  async list(filter: PaymentEventListFilter): Promise<PaymentEvent[]> {
    const query: FilterQuery<IPaymentEvent> = {};
    if (filter.status) {
      query.status = filter.status;
    }
    if (filter.provider) {
      query.provider = filter.provider;
    }

    return PaymentEventModel.find(query, LEAN_PROJECTION)
      .sort({ receivedAt: -1 })
      .limit(filter.limit ?? 50)
      .lean<PaymentEvent[]>()
      .exec();
  }
}

export const paymentEventRepository = new MongoPaymentEventRepository();
