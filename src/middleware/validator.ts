import { Request, Response, NextFunction } from 'express';
import { validationResult, ValidationChain } from 'express-validator';
import { ValidationError } from '../utils/errors';

// Middleware to check validation results
export const validate = (req: Request, res: Response, next: NextFunction): void => {
  const errors = validationResult(req).array({ onlyFirstError: true });

  if (errors.length > 0) {
    const first = errors[0];
    const field = first.type === 'field' ? `${first.path}: ` : '';
    next(new ValidationError(`${field}${String(first.msg)}`));
    return;
  }

  next();
};

// Helper to run validations
export const runValidations = (validations: ValidationChain[]) => {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    try {
      await Promise.all(validations.map(validation => validation.run(req)));
      validate(req, res, next);
    } catch (error) {
      next(error);
    }
  };
};
