import { Request, Response, NextFunction } from 'express';
import { config } from '../config/env';
import { ForbiddenError, UnauthorizedError } from '../utils/errors';
import { safeEqual } from '../utils/crypto';
import { logger } from '../utils/logger';

export const SERVICE_TOKEN_HEADER = 'x-service-token';

/**
 * Shared-secret check for the chat-bot collaborator. With no `SERVICE_TOKEN`
 * configured every call is refused.
 */
export const authenticateService = (req: Request, res: Response, next: NextFunction): void => {
  if (!config.serviceToken) {
    logger.error('Bot API called but SERVICE_TOKEN is not configured');
    next(new ForbiddenError('Service access is not configured'));
    return;
  }

  const header = req.headers[SERVICE_TOKEN_HEADER];
  const token = Array.isArray(header) ? header[0] : header;
  if (!token || token.trim() === '') {
    next(new UnauthorizedError('Service token required'));
    return;
  }

  if (!safeEqual(token, config.serviceToken)) {
    logger.warn('Invalid service token attempted', { path: req.path, ip: req.ip });
    next(new UnauthorizedError('Invalid service token'));
    return;
  }

  next();
};
