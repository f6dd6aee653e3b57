import { ProvisioningRecordModel } from '../models';
import { isDuplicateKeyError } from '../utils/errors';
import type { ProvisioningRecord } from '../types/domain';
import type { ProvisioningRecordRepository, ReminderPatch } from './types';

const LEAN_PROJECTION = { _id: 0, __v: 0, createdAt: 0, updatedAt: 0 } as const;

export class MongoProvisioningRecordRepository implements ProvisioningRecordRepository {
  async upsertForOrder(record: ProvisioningRecord): Promise<ProvisioningRecord> {
    const live = { orderId: record.orderId, revokedAt: null };

    try {
      const stored = await ProvisioningRecordModel.findOneAndUpdate(
        live,
        { $setOnInsert: record },
        { upsert: true, new: true, projection: LEAN_PROJECTION }
      )
        .lean<ProvisioningRecord | null>()
        .exec();
      return stored ?? record;
    } catch (error) {
      if (!isDuplicateKeyError(error)) {
        throw error;
      }
      const winner = await this.findLiveByOrder(record.orderId);
      if (!winner) {
        throw error;
      }
      return winner;
    }
  }

  async findLiveByOrder(orderId: string): Promise<ProvisioningRecord | null> {
    return ProvisioningRecordModel.findOne({ orderId, revokedAt: null }, LEAN_PROJECTION)
      .lean<ProvisioningRecord | null>()
      .exec();
  }

  async extendExpiry(orderId: string, expiresAt: Date, renewedAt: Date): Promise<ProvisioningRecord | null> {
    return ProvisioningRecordModel.findOneAndUpdate(
      // Expiry only moves forward
      { orderId, revokedAt: null, expiresAt: { $lt: expiresAt } },
      // A new expiry starts a new reminder cycle
      { $set: { expiresAt, lastRenewalAt: renewedAt, remindersSent: [], nextReminderAt: renewedAt } },
      { new: true, projection: LEAN_PROJECTION }
    )
      .lean<ProvisioningRecord | null>()
      .exec();
  }

  async markRevoked(orderId: string, revokedAt: Date): Promise<ProvisioningRecord | null> {
    return ProvisioningRecordModel.findOneAndUpdate(
      { orderId, revokedAt: null },
      { $set: { revokedAt } },
      { new: true, projection: LEAN_PROJECTION }
    )
      .lean<ProvisioningRecord | null>()
      .exec();
  }

  async listByBuyer(buyerId: string): Promise<ProvisioningRecord[]> {
    return ProvisioningRecordModel.find({ buyerId }, LEAN_PROJECTION)
      .sort({ issuedAt: -1 })
      .lean<ProvisioningRecord[]>()
      .exec();
  }

  async findReminderDue(now: Date, limit: number): Promise<ProvisioningRecord[]> {
    return ProvisioningRecordModel.find(
      { revokedAt: null, renewalOf: null, nextReminderAt: { $ne: null, $lte: now } },
      LEAN_PROJECTION
    )
      .sort({ nextReminderAt: 1 })
      .limit(limit)
      .lean<ProvisioningRecord[]>()
      .exec();
  }

  async claimReminder(recordId: string, expectedNextAt: Date, patch: ReminderPatch): Promise<ProvisioningRecord | null> {
    return ProvisioningRecordModel.findOneAndUpdate(
      { recordId, revokedAt: null, nextReminderAt: expectedNextAt },
      { $set: patch },
      { new: true, projection: LEAN_PROJECTION }
    )
      .lean<ProvisioningRecord | null>()
      .exec();
  }
}

export const provisioningRecordRepository = new MongoProvisioningRecordRepository();
