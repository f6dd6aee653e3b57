import mongoose, { Document, Schema } from 'mongoose';
import type { ProvisioningRecord } from '../types/domain';

export interface IProvisioningRecord extends ProvisioningRecord, Document {}

const provisioningRecordSchema = new Schema<IProvisioningRecord>(
  {
    recordId: {
      type: String,
      required: true,
      unique: true,
    },
    orderId: {
      type: String,
      required: true,
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
    remoteCredentialId: {
      type: String,
      required: true,
    },
    email: {
      type: String,
      required: true,
    },
    connectionString: {
      type: String,
      required: true,
    },
    issuedAt: {
      type: Date,
      required: true,
    },
    expiresAt: {
      type: Date,
      required: true,
    },
    lastRenewalAt: {
      type: Date,
      default: null,
    },
    renewalOf: {
      type: String,
      default: null,
    },
    revokedAt: {
      type: Date,
      default: null,
    },
    remindersSent: {
      type: [Number],
      default: [],
    },
    nextReminderAt: {
      type: Date,
      default: null,
    },
  },
  {
    timestamps: true,
  }
);

// At most one live record per order
provisioningRecordSchema.index(
  { orderId: 1 },
  { unique: true, partialFilterExpression: { revokedAt: { $type: 'null' } } }
);
provisioningRecordSchema.index({ hostId: 1, remoteCredentialId: 1 });
provisioningRecordSchema.index({ nextReminderAt: 1 }, { partialFilterExpression: { revokedAt: { $type: 'null' } } });

export const ProvisioningRecordModel = mongoose.model<IProvisioningRecord>(
  'ProvisioningRecord',
  provisioningRecordSchema
);
