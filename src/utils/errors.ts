export class AppError extends Error {
  public readonly statusCode: number;
  public readonly code: string;
  public readonly isOperational: boolean;

  constructor(message: string, statusCode = 500, code = 'INTERNAL_ERROR', isOperational = true) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class ValidationError extends AppError {
  constructor(message = 'Validation failed') {
    super(message, 400, 'VALIDATION_ERROR');
  }
}

export class UnauthorizedError extends AppError {
  constructor(message = 'Unauthorized') {
    super(message, 401, 'UNAUTHORIZED');
  }
}

export class ForbiddenError extends AppError {
  constructor(message = 'Forbidden') {
    super(message, 403, 'FORBIDDEN');
  }
}

export class NotFoundError extends AppError {
  constructor(message = 'Resource not found') {
    super(message, 404, 'NOT_FOUND');
  }
}

export class ConflictError extends AppError {
  constructor(message = 'Conflict') {
    super(message, 409, 'CONFLICT');
  }
}

// ---------------------------------------------------------------------------
// Order pipeline
// ---------------------------------------------------------------------------

export class OrderNotFoundError extends AppError {
  constructor(public readonly orderId: string) {
    super(`Order ${orderId} not found`, 404, 'ORDER_NOT_FOUND');
  }
}

export class AmountMismatchError extends AppError {
  constructor(
    public readonly orderId: string,
    public readonly expected: { amount: number; currency: string },
    public readonly received: { amount: number; currency: string }
  ) {
    super(
      `Payment for order ${orderId} does not match: expected ${expected.amount} ${expected.currency}, received ${received.amount} ${received.currency}`,
      422,
      'AMOUNT_MISMATCH'
    );
  }
}

export class InvalidTransitionError extends AppError {
  constructor(orderId: string, from: string, to: string) {
    super(`Order ${orderId} cannot move from ${from} to ${to}`, 409, 'INVALID_TRANSITION');
  }
}

export class OrderNotCancellableError extends AppError {
  constructor(orderId: string, state: string) {
    super(`Order ${orderId} can no longer be cancelled (state: ${state})`, 409, 'ORDER_NOT_CANCELLABLE');
  }
}

/** Another transition holds the order; the caller may retry. */
export class OrderLockTimeoutError extends AppError {
  constructor(orderId: string) {
    super(`Timed out waiting for the lock on order ${orderId}`, 503, 'ORDER_LOCKED');
  }
}

export class MalformedPayloadError extends AppError {
  constructor(message: string) {
    super(message, 400, 'MALFORMED_PAYLOAD');
  }
}

// ---------------------------------------------------------------------------
// Hosts
// ---------------------------------------------------------------------------

export type HostErrorCode = 'HOST_UNREACHABLE' | 'HOST_REJECTED' | 'HOST_AUTH_FAILED';

export abstract class HostError extends AppError {
  abstract readonly retryable: boolean;

  constructor(
    public readonly hostId: string,
    message: string,
    code: HostErrorCode
  ) {
    super(message, 502, code);
  }
}

/** Network failure, timeout, 5xx or throttling. Retryable. */
export class HostUnreachableError extends HostError {
  readonly retryable = true;

  constructor(hostId: string, message: string) {
    super(hostId, message, 'HOST_UNREACHABLE');
  }
}

/** The panel refused the request (invalid plan, quota). Needs an operator. */
export class HostRejectedError extends HostError {
  readonly retryable = false;

  constructor(hostId: string, message: string) {
    super(hostId, message, 'HOST_REJECTED');
  }
}

/** Credentials were refused; the host is flagged unhealthy. */
export class HostAuthFailedError extends HostError {
  readonly retryable = false;

  constructor(hostId: string, message: string) {
    super(hostId, message, 'HOST_AUTH_FAILED');
  }
}

export class UnknownHostError extends AppError {
  constructor(hostId: string) {
    super(`Unknown host ${hostId}`, 400, 'UNKNOWN_HOST');
  }
}

export class HostUnavailableError extends AppError {
  constructor(hostId: string) {
    super(`Host ${hostId} is not accepting new orders`, 409, 'HOST_UNAVAILABLE');
  }
}

// ---------------------------------------------------------------------------
// Referrals
// ---------------------------------------------------------------------------

export class WithdrawalError extends AppError {
  constructor(message: string) {
    super(message, 422, 'WITHDRAWAL_REJECTED');
  }
}

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const isDuplicateKeyError = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === 11000;
