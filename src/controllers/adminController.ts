import { Request, Response, NextFunction } from 'express';
import { body, matchedData, param, query } from 'express-validator';
import {
  ORDER_STATE_VALUES,
  PAYMENT_EVENT_STATUS_VALUES,
  PAYMENT_PROVIDER_VALUES,
  REVIEW_KIND_VALUES,
  REVIEW_STATUS_VALUES,
} from '../config/constants';
import { getServices } from '../services';
import { NotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';
import { optionalEnum, optionalNumber, optionalString, requireString } from '../utils/requestData';

/**
 * Operator API: read views over orders, payment events and the review queue,
 * plus the manual actions the pipeline never takes on its own.
 */
export class AdminController {
  /**
   * GET /api/admin/orders?state=&buyerId=&limit=&skip=
   */
  listOrders = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const data = matchedData(req);
      const orders = await getServices().orders.listOrders({
        state: optionalEnum(data, 'state', ORDER_STATE_VALUES),
        buyerId: optionalString(data, 'buyerId'),
        limit: optionalNumber(data, 'limit'),
        skip: optionalNumber(data, 'skip'),
      });
      res.json({ success: true, data: { orders } });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/admin/orders/:orderId
   */
  getOrder = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const order = await getServices().orders.getOrder(req.params.orderId);
      res.json({ success: true, data: { order } });
    } catch (error) {
      next(error);
    }
  };

  /**
   * POST /api/admin/orders/:orderId/refund
   */
  refundOrder = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const note = requireString(matchedData(req), 'note');
      const order = await getServices().orders.refundOrder(req.params.orderId, note);
      logger.info('Refund recorded by operator', { orderId: order.orderId, operatorId: req.operator?.operatorId });
      res.json({ success: true, data: { order } });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/admin/payment-events?status=&provider=&limit=
   */
  listPaymentEvents = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const data = matchedData(req);
      const events = await getServices().ingress.listEvents({
        status: optionalEnum(data, 'status', PAYMENT_EVENT_STATUS_VALUES),
        provider: optionalEnum(data, 'provider', PAYMENT_PROVIDER_VALUES),
        limit: optionalNumber(data, 'limit'),
      });
      res.json({ success: true, data: { events } });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/admin/review-items?status=&kind=&orderId=&limit=
   */
  listReviewItems = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const data = matchedData(req);
      const items = await getServices().reviews.list({
        status: optionalEnum(data, 'status', REVIEW_STATUS_VALUES),
        kind: optionalEnum(data, 'kind', REVIEW_KIND_VALUES),
        orderId: optionalString(data, 'orderId'),
        limit: optionalNumber(data, 'limit'),
      });
      res.json({ success: true, data: { items } });
    } catch (error) {
      next(error);
    }
  };

  /**
   * POST /api/admin/review-items/:reviewId/resolve
   */
  resolveReviewItem = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const note = requireString(matchedData(req), 'note');
      const item = await getServices().reviews.resolve(req.params.reviewId, note);
      res.json({ success: true, data: { item } });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/admin/referrals/:userId/credits
   */
  listReferralCredits = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const data = matchedData(req);
      const credits = await getServices().referrals.listCredits({
        referrerId: req.params.userId,
        limit: optionalNumber(data, 'limit'),
      });
      res.json({ success: true, data: { credits } });
    } catch (error) {
      next(error);
    }
  };

  /**
   * GET /api/admin/hosts
   */
  listHosts = (req: Request, res: Response): void => {
    res.json({ success: true, data: { hosts: getServices().hosts.listHosts() } });
  };

  /**
   * Clear the unhealthy flag after the panel credentials were fixed
   * POST /api/admin/hosts/:hostId/healthy
   */
  markHostHealthy = (req: Request, res: Response, next: NextFunction): void => {
    const { hostId } = req.params;
    if (!getServices().hosts.markHealthy(hostId)) {
      next(new NotFoundError(`Host ${hostId} not found`));
      return;
    }
    logger.info('Host cleared by operator', { hostId, operatorId: req.operator?.operatorId });
    res.json({ success: true, message: `Host ${hostId} accepts orders again` });
  };

  /**
   * Run one recovery sweep now
   * POST /api/admin/sweeps/run
   */
  runSweep = async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      const report = await getServices().sweeper.runOnce();
      res.json({ success: true, data: { ran: report !== null, report } });
    } catch (error) {
      next(error);
    }
  };
}

export const adminController = new AdminController();

const limitQuery = query('limit').optional().isInt({ min: 1, max: 500 }).withMessage('limit must be 1-500').toInt();

export const listOrdersValidation = [
  query('state').optional().isIn([...ORDER_STATE_VALUES]).withMessage('Unknown order state'),
  query('buyerId').optional().isString().trim(),
  limitQuery,
  query('skip').optional().isInt({ min: 0 }).toInt(),
];

export const orderIdValidation = [param('orderId').isUUID().withMessage('orderId must be a UUID')];

export const refundValidation = [
  ...orderIdValidation,
  body('note').isString().trim().notEmpty().withMessage('note is required'),
];

export const listPaymentEventsValidation = [
  query('status').optional().isIn([...PAYMENT_EVENT_STATUS_VALUES]).withMessage('Unknown event status'),
  query('provider').optional().isIn([...PAYMENT_PROVIDER_VALUES]).withMessage('Unknown provider'),
  limitQuery,
];

export const listReviewItemsValidation = [
  query('status').optional().isIn([...REVIEW_STATUS_VALUES]).withMessage('Unknown review status'),
  query('kind').optional().isIn([...REVIEW_KIND_VALUES]).withMessage('Unknown review kind'),
  query('orderId').optional().isUUID(),
  limitQuery,
];

export const resolveReviewValidation = [
  param('reviewId').isUUID().withMessage('reviewId must be a UUID'),
  body('note').isString().trim().notEmpty().withMessage('note is required'),
];

export const listCreditsValidation = [param('userId').isString().trim().notEmpty(), limitQuery];
