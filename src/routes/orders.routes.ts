import { Router } from 'express';
import {
  orderController,
  createOrderValidation,
  getOrderValidation,
  beginPaymentValidation,
  cancelOrderValidation,
} from '../controllers/orderController';
import { authenticateService } from '../middleware/serviceAuth';
import { runValidations } from '../middleware/validator';

const router = Router();

// Bot collaborator only
router.use(authenticateService);

router.post('/', runValidations(createOrderValidation), orderController.create);
router.get('/:orderId', runValidations(getOrderValidation), orderController.get);
router.post('/:orderId/payment', runValidations(beginPaymentValidation), orderController.beginPayment);
router.post('/:orderId/cancel', runValidations(cancelOrderValidation), orderController.cancel);

export default router;
