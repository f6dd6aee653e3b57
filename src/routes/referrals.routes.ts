import { Router } from 'express';
import {
  referralController,
  referralLookupValidation,
  withdrawalValidation,
} from '../controllers/referralController';
import { authenticateService } from '../middleware/serviceAuth';
import { runValidations } from '../middleware/validator';

const router = Router();

router.use(authenticateService);

router.get('/:userId/balance', runValidations(referralLookupValidation), referralController.getBalance);
router.get('/:userId/stats', runValidations(referralLookupValidation), referralController.getStats);
router.post('/:userId/withdrawals', runValidations(withdrawalValidation), referralController.requestWithdrawal);

export default router;
