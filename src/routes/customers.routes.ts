import { Router } from 'express';
import {
  customerController,
  registerCustomerValidation,
  customerLookupValidation,
} from '../controllers/customerController';
import { authenticateService } from '../middleware/serviceAuth';
import { runValidations } from '../middleware/validator';

const router = Router();

router.use(authenticateService);

router.post('/', runValidations(registerCustomerValidation), customerController.register);
router.get('/:userId/orders', runValidations(customerLookupValidation), customerController.listOrders);
router.get('/:userId/credentials', runValidations(customerLookupValidation), customerController.listCredentials);

export default router;
