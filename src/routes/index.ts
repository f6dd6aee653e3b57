import { Router } from 'express';
import customerRoutes from './customers.routes';
import orderRoutes from './orders.routes';
import referralRoutes from './referrals.routes';
import adminRoutes from './admin.routes';
import { apiLimiter } from '../middleware/rateLimit';

const router = Router();

// Admin routes carry their own limiter
router.use('/admin', adminRoutes);

router.use(apiLimiter);

// Bot-facing API
router.use('/customers', customerRoutes);
router.use('/orders', orderRoutes);
router.use('/referrals', referralRoutes);

export default router;
