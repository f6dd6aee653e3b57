import type { UserRole } from '../config/constants';

export interface OperatorIdentity {
  operatorId: string;
  role: UserRole;
}

// Extend Express Request interface
declare global {
  namespace Express {
    interface Request {
      operator?: OperatorIdentity;
    }
  }
}

// This file must be treated as a module
export {};
