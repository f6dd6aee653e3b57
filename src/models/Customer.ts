import mongoose, { Document, Schema } from 'mongoose';
import type { Customer } from '../types/domain';

export interface ICustomer extends Customer, Document {}

const customerSchema = new Schema<ICustomer>(
  {
    // Chat id assigned by the messenger
    userId: {
      type: String,
      required: true,
      unique: true,
    },
    username: {
      type: String,
      default: null,
    },
    referredBy: {
      type: String,
      default: null,
      index: true,
    },
    registeredAt: {
      type: Date,
      required: true,
      default: Date.now,
    },
  },
  {
    timestamps: true,
  }
);

export const CustomerModel = mongoose.model<ICustomer>('Customer', customerSchema);
