import { Request, Response, NextFunction } from 'express';
import { body, matchedData } from 'express-validator';
import { getServices } from '../services';
import { optionalNumber } from '../utils/requestData';
import { ValidationError } from '../utils/errors';
import { userIdParam } from './customerController';

export class ReferralController {
  /**
   * GET /api/referrals/:userId/balance
   */
  getBalance = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const balance = await getServices().referrals.getBalance(req.params.userId);
      res.json({ success: true, data: balance });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/referrals/:userId/stats
   */
  getStats = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const stats = await getServices().referrals.getReferralStats(req.params.userId);
      res.json({ success: true, data: stats });
    } catch (error) {
      next(error);
    }
  };

  /**
   * POST /api/referrals/:userId/withdrawals
   */
  requestWithdrawal = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const amount = optionalNumber(matchedData(req), 'amount');
      if (amount === undefined) {
        throw new ValidationError('amount is required');
      }
      const withdrawal = await getServices().referrals.requestWithdrawal(req.params.userId, amount);
      res.status(201).json({ success: true, data: { withdrawal } });
    } catch (error) {
      next(error);
    }
  };
}

export const referralController = new ReferralController();

export const referralLookupValidation = [userIdParam];

export const withdrawalValidation = [
  userIdParam,
  body('amount').isFloat({ gt: 0 }).withMessage('amount must be a positive number').toFloat(),
];
