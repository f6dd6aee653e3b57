import { Router } from 'express';
import {
  adminController,
  listOrdersValidation,
  orderIdValidation,
  refundValidation,
  listPaymentEventsValidation,
  listReviewItemsValidation,
  resolveReviewValidation,
  listCreditsValidation,
} from '../controllers/adminController';
import { authenticate, authorize } from '../middleware/auth';
import { adminLimiter } from '../middleware/rateLimit';
import { runValidations } from '../middleware/validator';
import { USER_ROLES } from '../config/constants';

const router = Router();

// All routes require an operator token
router.use(adminLimiter);
router.use(authenticate);

// Read views are open to viewers
router.get('/orders', authorize(USER_ROLES.ADMIN, USER_ROLES.VIEWER), runValidations(listOrdersValidation), adminController.listOrders);
router.get('/orders/:orderId', authorize(USER_ROLES.ADMIN, USER_ROLES.VIEWER), runValidations(orderIdValidation), adminController.getOrder);
router.get(
  '/payment-events',
  authorize(USER_ROLES.ADMIN, USER_ROLES.VIEWER),
  runValidations(listPaymentEventsValidation),
  adminController.listPaymentEvents
);
router.get(
  '/review-items',
  authorize(USER_ROLES.ADMIN, USER_ROLES.VIEWER),
  runValidations(listReviewItemsValidation),
  adminController.listReviewItems
);
router.get(
  '/referrals/:userId/credits',
  authorize(USER_ROLES.ADMIN, USER_ROLES.VIEWER),
  runValidations(listCreditsValidation),
  adminController.listReferralCredits
);
router.get('/hosts', authorize(USER_ROLES.ADMIN, USER_ROLES.VIEWER), adminController.listHosts);

// Actions
router.post('/orders/:orderId/refund', authorize(USER_ROLES.ADMIN), runValidations(refundValidation), adminController.refundOrder);
router.post(
  '/review-items/:reviewId/resolve',
  authorize(USER_ROLES.ADMIN),
  runValidations(resolveReviewValidation),
  adminController.resolveReviewItem
);
router.post('/hosts/:hostId/healthy', authorize(USER_ROLES.ADMIN), adminController.markHostHealthy);
router.post('/sweeps/run', authorize(USER_ROLES.ADMIN), adminController.runSweep);

export default router;
