import { Request, Response, NextFunction } from 'express';
import { body, matchedData, param } from 'express-validator';
import { PAYMENT_PROVIDER_VALUES } from '../config/constants';
import { getServices } from '../services';
import { optionalNumber, optionalString, requireEnum, requireString } from '../utils/requestData';

export class OrderController {
  /**
   * Open an order (idempotent per buyer, plan, host and nonce)
   * POST /api/orders
   */
  create = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const data = matchedData(req);
      const { order, created } = await getServices().orders.createOrder({
        buyerId: requireString(data, 'buyerId'),
        hostId: requireString(data, 'hostId'),
        planId: requireString(data, 'planId'),
        nonce: requireString(data, 'nonce'),
        renewsOrderId: optionalString(data, 'renewsOrderId') ?? null,
      });

      res.status(created ? 201 : 200).json({
        success: true,
        data: { order, created },
      });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/orders/:orderId
   */
  get = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const order = await getServices().orders.getOrder(req.params.orderId);
      res.json({ success: true, data: { order } });
    } catch (error) {
      next(error);
    }
  };

  /**
   * Record the checkout the bot opened with a provider
   * POST /api/orders/:orderId/payment
   */
  beginPayment = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const data = matchedData(req);
      const order = await getServices().orders.beginPayment(req.params.orderId, {
        provider: requireEnum(data, 'provider', PAYMENT_PROVIDER_VALUES),
        invoiceRef: optionalString(data, 'invoiceRef') ?? null,
        expectedAmount: optionalNumber(data, 'expectedAmount'),
        expectedCurrency: optionalString(data, 'expectedCurrency'),
      });
      res.json({ success: true, data: { order } });
    } catch (error) {
      next(error);
    }
  };

  /**
   * POST /api/orders/:orderId/cancel
   */
  cancel = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const data = matchedData(req);
      const order = await getServices().orders.cancelOrder(
        req.params.orderId,
        optionalString(data, 'reason') ?? 'buyer request'
      );
      res.json({ success: true, message: 'Order cancelled', data: { order } });
    } catch (error) {
      next(error);
    }
  };
}

export const orderController = new OrderController();

const orderIdParam = param('orderId').isUUID().withMessage('orderId must be a UUID');

export const createOrderValidation = [
  body('buyerId').isString().trim().notEmpty().withMessage('buyerId is required'),
  body('hostId').isString().trim().notEmpty().withMessage('hostId is required'),
  body('planId').isString().trim().notEmpty().withMessage('planId is required'),
  body('nonce')
    .isString()
    .trim()
    .isLength({ min: 1, max: 128 })
    .withMessage('nonce must be 1-128 characters'),
  body('renewsOrderId').optional({ values: 'null' }).isUUID().withMessage('renewsOrderId must be a UUID'),
];

export const getOrderValidation = [orderIdParam];

export const beginPaymentValidation = [
  orderIdParam,
  body('provider')
    .isIn([...PAYMENT_PROVIDER_VALUES])
    .withMessage(`provider must be one of: ${PAYMENT_PROVIDER_VALUES.join(', ')}`),
  body('invoiceRef').optional({ values: 'null' }).isString().trim().isLength({ max: 200 }),
  body('expectedAmount')
    .optional()
    .isFloat({ gt: 0 })
    .withMessage('expectedAmount must be a positive number')
    .toFloat(),
  body('expectedCurrency')
    .optional()
    .isString()
    .trim()
    .isLength({ min: 2, max: 10 })
    .withMessage('expectedCurrency must be a currency code'),
];

export const cancelOrderValidation = [orderIdParam, body('reason').optional().isString().trim().isLength({ max: 200 })];
