import type { FilterQuery } from 'mongoose';
import { ReferralCreditModel, ReferralWithdrawalModel, type IReferralCredit } from '../models';
import { WITHDRAWAL_STATUS } from '../config/constants';
import { isDuplicateKeyError } from '../utils/errors';
import { roundMoney } from '../utils/money';
import type { ReferralCredit, ReferralWithdrawal } from '../types/domain';
import type { ReferralCreditFilter, ReferralRepository } from './types';

const LEAN_PROJECTION = { _id: 0, __v: 0 } as const;

export class MongoReferralRepository implements ReferralRepository {
  async insertCredit(credit: ReferralCredit): Promise<boolean> {
    try {
      await ReferralCreditModel.create(credit);
      return true;
    } catch (error) {
      if (isDuplicateKeyError(error)) {
        return false;
      }
      throw error;
    }
  }

  async listCredits(filter: ReferralCreditFilter): Promise<ReferralCredit[]> {
    const query: FilterQuery<IReferralCredit> = {};
    if (filter.referrerId) {
      query.referrerId = filter.referrerId;
    }
    if (filter.sourceOrderId) {
      query.sourceOrderId = filter.sourceOrderId;
    }

    return ReferralCreditModel.find(query, LEAN_PROJECTION)
      .sort({ createdAt: -1 })
      .limit(filter.limit ?? 100)
      .lean<ReferralCredit[]>()
      .exec();
  }

  async sumCredits(referrerId: string, currency: string): Promise<number> {
    const [row] = await ReferralCreditModel.aggregate<{ total: number }>([
      { $match: { referrerId, currency: currency.toUpperCase() } },
      { $group: { _id: null, total: { $sum: '$amount' } } },
    ]);
    return roundMoney(row?.total ?? 0);
  }

  async insertWithdrawal(withdrawal: ReferralWithdrawal): Promise<ReferralWithdrawal> {
    await ReferralWithdrawalModel.create(withdrawal);
    return withdrawal;
  }

  async sumWithdrawals(userId: string, currency: string): Promise<number> {
    const [row] = await ReferralWithdrawalModel.aggregate<{ total: number }>([
      { $match: { userId, currency: currency.toUpperCase(), status: { $ne: WITHDRAWAL_STATUS.REJECTED } } },
      { $group: { _id: null, total: { $sum: '$amount' } } },
    ]);
    return roundMoney(row?.total ?? 0);
  }
}

export const referralRepository = new MongoReferralRepository();
