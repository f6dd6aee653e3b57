import { CustomerModel } from '../models';
import { isDuplicateKeyError } from '../utils/errors';
import type { Customer } from '../types/domain';
import type { CustomerRepository } from './types';

const LEAN_PROJECTION = { _id: 0, __v: 0, createdAt: 0, updatedAt: 0 } as const;

export class MongoCustomerRepository implements CustomerRepository {
  async registerIfAbsent(customer: Customer): Promise<{ customer: Customer; created: boolean }> {
    try {
      const existing = await CustomerModel.findOneAndUpdate(
        { userId: customer.userId },
        { $setOnInsert: customer },
        { upsert: true, new: false, projection: LEAN_PROJECTION }
      )
        .lean<Customer | null>()
        .exec();
      return existing ? { customer: existing, created: false } : { customer, created: true };
    } catch (error) {
      if (!isDuplicateKeyError(error)) {
        throw error;
      }
      const winner = await this.findById(customer.userId);
      if (!winner) {
        throw error;
      }
      return { customer: winner, created: false };
    }
  }

  async findById(userId: string): Promise<Customer | null> {
    return CustomerModel.findOne({ userId }, LEAN_PROJECTION).lean<Customer | null>().exec();
  }

  async countReferredBy(userId: string): Promise<number> {
    return CustomerModel.countDocuments({ referredBy: userId }).exec();
  }
}

export const customerRepository = new MongoCustomerRepository();
