import { Request, Response, NextFunction } from 'express';
import { body, matchedData, param } from 'express-validator';
import { getServices } from '../services';
import { optionalString, requireString } from '../utils/requestData';

export class CustomerController {
  /**
   * Register a buyer the first time the bot sees them; the referrer is fixed then
   * POST /api/customers
   */
  register = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const data = matchedData(req);
      const { customer, created } = await getServices().referrals.registerCustomer({
        userId: requireString(data, 'userId'),
        username: optionalString(data, 'username') ?? null,
        referredBy: optionalString(data, 'referredBy') ?? null,
      });
      res.status(created ? 201 : 200).json({ success: true, data: { customer, created } });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/customers/:userId/orders
   */
  listOrders = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const orders = await getServices().orders.listOrders({ buyerId: req.params.userId, limit: 50 });
      res.json({ success: true, data: { orders } });
    } catch (error) {
      next(error);
    }
  };

  /**
   * Keys the buyer holds ("my keys" in the bot)
   * GET /api/customers/:userId/credentials
   */
  listCredentials = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const credentials = await getServices().orders.listCredentials(req.params.userId);
      res.json({ success: true, data: { credentials } });
    } catch (error) {
      next(error);
    }
  };
}

export const customerController = new CustomerController();

export const userIdParam = param('userId').isString().trim().notEmpty().withMessage('userId is required');

export const registerCustomerValidation = [
  body('userId').isString().trim().notEmpty().withMessage('userId is required'),
  body('username').optional({ values: 'null' }).isString().trim().isLength({ max: 64 }),
  body('referredBy').optional({ values: 'null' }).isString().trim().notEmpty(),
];

export const customerLookupValidation = [userIdParam];
