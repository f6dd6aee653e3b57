import { Request, Response, NextFunction } from 'express';
import { AppError, isDuplicateKeyError } from '../utils/errors';
import { logger } from '../utils/logger';
import { config } from '../config/env';

const isBodyParseError = (err: Error): boolean => err instanceof SyntaxError && 'body' in err;

export const errorHandler = (err: Error, req: Request, res: Response, next: NextFunction): void => {
  if (res.headersSent) {
    next(err);
    return;
  }

  // Handle known errors
  if (err instanceof AppError) {
    const meta = { code: err.code, message: err.message, path: req.path, method: req.method };
    if (err.statusCode >= 500) {
      logger.error('Request failed', meta);
    } else {
      logger.warn('Request failed', meta);
    }
    res.status(err.statusCode).json({
      success: false,
      code: err.code,
      message: err.message.substring(0, 200),
    });
    return;
  }

  if (isBodyParseError(err)) {
    res.status(400).json({
      success: false,
      code: 'INVALID_JSON',
      message: 'Invalid JSON in request body',
    });
    return;
  }

  // Handle Mongoose duplicate key errors
  if (isDuplicateKeyError(err)) {
    res.status(409).json({
      success: false,
      code: 'CONFLICT',
      message: 'Resource already exists',
    });
    return;
  }

  logger.error('Unhandled error:', {
    message: err.message,
    stack: err.stack,
    path: req.path,
    method: req.method,
    ip: req.ip,
  });

  const message = config.nodeEnv === 'production' ? 'Internal server error' : err.message || 'Internal server error';
  res.status(500).json({
    success: false,
    code: 'INTERNAL_ERROR',
    message: message.substring(0, 200),
  });
};

// 404 handler
export const notFoundHandler = (req: Request, res: Response): void => {
  res.status(404).json({
    success: false,
    code: 'NOT_FOUND',
    message: `Route ${req.method} ${req.path} not found`,
  });
};
