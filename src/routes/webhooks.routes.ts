import express, { Router } from 'express';
import { webhookController } from '../controllers/webhookController';
import { webhookLimiter } from '../middleware/rateLimit';

const router = Router();

/**
 * POST /webhooks/:provider
 * Mounted before the JSON body parser: signatures cover the raw bytes.
 * Providers: yookassa, cryptobot, heleket, ton.
 */
router.post('/:provider', webhookLimiter, express.raw({ type: () => true, limit: '1mb' }), webhookController.receive);

export default router;
