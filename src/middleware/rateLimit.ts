import rateLimit from 'express-rate-limit';
import { config } from '../config/env';

// Rate limiting is off in development and tests
const isRelaxed = config.nodeEnv === 'development' || config.nodeEnv === 'test';

// Bot and admin API
export const apiLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 300,
  message: { success: false, message: 'Too many requests, please try again later.' },
  standardHeaders: true,
  legacyHeaders: false,
  skip: () => isRelaxed,
});

// Payment providers retry in bursts
export const webhookLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 1200,
  message: { success: false, message: 'Too many webhook deliveries, please slow down.' },
  standardHeaders: true,
  legacyHeaders: false,
  skip: () => isRelaxed,
});

// Operator endpoints
export const adminLimiter = rateLimit({
  windowMs: 15 * 60 * 1000,
  max: 200,
  message: { success: false, message: 'Too many admin requests, please try again later.' },
  standardHeaders: true,
  legacyHeaders: false,
  skip: () => isRelaxed,
});
