import { v4 as uuidv4 } from 'uuid';
import { REFERRAL_CREDIT_KINDS, WITHDRAWAL_STATUS, type ReferralCreditKind } from '../../config/constants';
import type { CustomerRepository, ReferralCreditFilter, ReferralRepository } from '../../repositories/types';
import type { Clock, Customer, Order, ReferralCredit, ReferralWithdrawal } from '../../types/domain';
import { WithdrawalError } from '../../utils/errors';
import { logger } from '../../utils/logger';
import { roundMoney, sameCurrency } from '../../utils/money';
import type { OrderLock } from '../locks/orderLockService';

export interface ReferralSettings {
  enabled: boolean;
  /** Every credit, balance and withdrawal is kept in this currency. */
  currency: string;
  /** Percent of the order amount; 0 disables the rule. */
  percentage: number;
  fixedPurchaseAmount: number;
  signupBonusAmount: number;
  referredDiscountPercent: number;
  minimumWithdrawal: number;
}

export interface ReferralCreditListener {
  referralCredited(credit: ReferralCredit): Promise<void>;
}

export interface ReferralBalance {
  userId: string;
  balance: number;
  currency: string;
}

export interface ReferralStats {
  userId: string;
  currency: string;
  referredCount: number;
  lifetimeEarned: number;
  withdrawn: number;
  balance: number;
}

export interface RegisterCustomerInput {
  userId: string;
  username?: string | null;
  referredBy?: string | null;
}

export const creditKeyFor = (kind: ReferralCreditKind, order: Pick<Order, 'orderId' | 'buyerId'>): string =>
  kind === REFERRAL_CREDIT_KINDS.SIGNUP_BONUS ? `${kind}:${order.buyerId}` : `${kind}:${order.orderId}`;

/** Amount the buyer was charged in the store currency, after any discount. */
export const orderAmount = (order: Order): number => roundMoney(order.plan.price - order.discount.amount);

export class ReferralLedgerService {
  private readonly currency: string;

  constructor(
    private readonly referrals: ReferralRepository,
    private readonly customers: CustomerRepository,
    private readonly settings: ReferralSettings,
    private readonly clock: Clock,
    /** Keyed by user id; must be shared by every process that takes withdrawals. */
    private readonly withdrawalLock: OrderLock,
    private readonly listener: ReferralCreditListener | null = null
  ) {
    this.currency = settings.currency.trim().toUpperCase();
  }

  /**
   * The referrer is fixed by the first registration; self-referrals and
   * unknown referrers are dropped.
   */
  async registerCustomer(input: RegisterCustomerInput): Promise<{ customer: Customer; created: boolean }> {
    let referredBy = input.referredBy ?? null;
    if (referredBy === input.userId) {
      referredBy = null;
    }
    if (referredBy && !(await this.customers.findById(referredBy))) {
      logger.info('Ignoring unknown referrer', { userId: input.userId, referredBy });
      referredBy = null;
    }

    const result = await this.customers.registerIfAbsent({
      userId: input.userId,
      username: input.username ?? null,
      referredBy,
      registeredAt: this.clock(),
    });
    if (result.created) {
      logger.info('Customer registered', { userId: input.userId, referred: referredBy !== null });
    }
    return result;
  }

  /**
   * Applies every enabled rule once per order. Safe to call again for the same
   * order: credits are keyed and a repeated insert is a no-op. The percentage
   * rule only applies to orders priced in the ledger currency; fixed amounts
   * are configured in it.
   * @returns the credits created by this call
   */
  async settle(order: Order): Promise<ReferralCredit[]> {
    if (!this.settings.enabled) {
      return [];
    }

    const buyer = await this.customers.findById(order.buyerId);
    const referrerId = buyer?.referredBy ?? null;
    if (!referrerId || referrerId === order.buyerId) {
      return [];
    }

    const inLedgerCurrency = sameCurrency(order.plan.currency, this.currency);
    if (!inLedgerCurrency && this.settings.percentage > 0) {
      logger.warn('Percentage referral credit skipped for an order outside the ledger currency', {
        orderId: order.orderId,
        currency: order.plan.currency,
        ledgerCurrency: this.currency,
      });
    }

    const percentage = inLedgerCurrency ? roundMoney((orderAmount(order) * this.settings.percentage) / 100) : 0;
    const rules: Array<{ kind: ReferralCreditKind; amount: number }> = [
      { kind: REFERRAL_CREDIT_KINDS.PERCENTAGE, amount: percentage },
      { kind: REFERRAL_CREDIT_KINDS.FIXED_PER_PURCHASE, amount: roundMoney(this.settings.fixedPurchaseAmount) },
      { kind: REFERRAL_CREDIT_KINDS.SIGNUP_BONUS, amount: roundMoney(this.settings.signupBonusAmount) },
    ];

    const created: ReferralCredit[] = [];
    for (const rule of rules) {
      if (rule.amount <= 0) {
        continue;
      }
      const credit: ReferralCredit = {
        creditKey: creditKeyFor(rule.kind, order),
        referrerId,
        referredUserId: order.buyerId,
        sourceOrderId: order.orderId,
        amount: rule.amount,
        currency: this.currency,
        kind: rule.kind,
        createdAt: this.clock(),
      };
      if (await this.referrals.insertCredit(credit)) {
        created.push(credit);
        logger.info('Referral credit recorded', {
          creditKey: credit.creditKey,
          referrerId,
          amount: credit.amount,
        });
      }
    }

    if (this.listener) {
      for (const credit of created) {
        await this.listener.referralCredited(credit);
      }
    }
    return created;
  }

  async getBalance(userId: string): Promise<ReferralBalance> {
    const [earned, withdrawn] = await Promise.all([
      this.referrals.sumCredits(userId, this.currency),
      this.referrals.sumWithdrawals(userId, this.currency),
    ]);
    return { userId, balance: roundMoney(earned - withdrawn), currency: this.currency };
  }

  listCredits(filter: ReferralCreditFilter): Promise<ReferralCredit[]> {
    return this.referrals.listCredits(filter);
  }

  async getReferralStats(userId: string): Promise<ReferralStats> {
    const [referredCount, earned, withdrawn] = await Promise.all([
      this.customers.countReferredBy(userId),
      this.referrals.sumCredits(userId, this.currency),
      this.referrals.sumWithdrawals(userId, this.currency),
    ]);
    return {
      userId,
      currency: this.currency,
      referredCount,
      lifetimeEarned: earned,
      withdrawn,
      balance: roundMoney(earned - withdrawn),
    };
  }

  /** Withdrawals of one user run under the withdrawal lock so the balance check cannot be raced. */
  async requestWithdrawal(userId: string, requested: number): Promise<ReferralWithdrawal> {
    const amount = roundMoney(requested);
    if (!(amount > 0)) {
      throw new WithdrawalError('Withdrawal amount must be positive');
    }
    if (this.settings.minimumWithdrawal > 0 && amount < this.settings.minimumWithdrawal) {
      throw new WithdrawalError(`Minimum withdrawal is ${this.settings.minimumWithdrawal}`);
    }

    return this.withdrawalLock.withOrderLock(userId, async () => {
      const { balance } = await this.getBalance(userId);
      if (amount > balance) {
        throw new WithdrawalError(`Insufficient referral balance: ${balance} ${this.currency} available`);
      }

      const withdrawal = await this.referrals.insertWithdrawal({
        withdrawalId: uuidv4(),
        userId,
        amount,
        currency: this.currency,
        status: WITHDRAWAL_STATUS.REQUESTED,
        requestedAt: this.clock(),
      });
      logger.info('Referral withdrawal requested', {
        userId,
        amount,
        currency: this.currency,
        withdrawalId: withdrawal.withdrawalId,
      });
      return withdrawal;
    });
  }

  /** Discount a referred buyer gets on new orders; 0 when the hook is off. */
  async referredDiscountPercent(buyerId: string): Promise<number> {
    const percent = this.settings.referredDiscountPercent;
    if (!this.settings.enabled || percent <= 0) {
      return 0;
    }
    const buyer = await this.customers.findById(buyerId);
    return buyer?.referredBy ? Math.min(percent, 100) : 0;
  }
}
