import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';
import { config } from '../config/env';
import { USER_ROLES, type UserRole } from '../config/constants';
import { UnauthorizedError, ForbiddenError } from '../utils/errors';

const isUserRole = (value: unknown): value is UserRole =>
  Object.values(USER_ROLES).some(role => role === value);

export const signOperatorToken = (operatorId: string, role: UserRole, expiresIn = config.jwt.expiresIn): string =>
  jwt.sign({ role }, config.jwt.secret, { subject: operatorId, expiresIn });

/** Operator JWT for the admin API. Operators live outside this service, so nothing is looked up. */
export const authenticate = (req: Request, res: Response, next: NextFunction): void => {
  const authHeader = req.headers.authorization;

  if (!authHeader || !authHeader.startsWith('Bearer ')) {
    next(new UnauthorizedError('No token provided'));
    return;
  }

  const token = authHeader.substring(7);
  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, config.jwt.secret);
  } catch {
    next(new UnauthorizedError('Invalid or expired token'));
    return;
  }

  if (typeof decoded === 'string' || !decoded.sub || !isUserRole(decoded.role)) {
    next(new UnauthorizedError('Malformed token'));
    return;
  }

  req.operator = { operatorId: decoded.sub, role: decoded.role };
  next();
};

// Role-based authorization
export const authorize = (...roles: UserRole[]) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!req.operator) {
      next(new UnauthorizedError('Authentication required'));
      return;
    }

    if (!roles.includes(req.operator.role)) {
      next(new ForbiddenError('Insufficient permissions'));
      return;
    }

    next();
  };
};
