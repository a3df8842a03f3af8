/**
 * Error taxonomy of the engine. Services throw these; the HTTP
 * layer turns them into responses via their statusCode.
 */

export abstract class AppError extends Error {
  abstract readonly statusCode: number;
  abstract readonly code: string;
  readonly details: unknown;

  constructor(message: string, details: unknown = null) {
    super(message);
    this.name = new.target.name;
    this.details = details;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Bad or inconsistent input: unknown references, non-positive
 * quantities, duplicate serials, overpayment, item kind mismatch.
 */
export class ValidationError extends AppError {
  readonly statusCode = 400;
  readonly code = 'VALIDATION_ERROR';
}

export class AuthenticationError extends AppError {
  readonly statusCode = 401;
  readonly code = 'UNAUTHORIZED';
}

export class NotFoundError extends AppError {
  readonly statusCode = 404;
  readonly code = 'NOT_FOUND';

  constructor(resource: string, id: string) {
    super(`${resource} not found: ${id}`, { resource, id });
  }
}

/** The target exists but its stage or status forbids the operation. */
export class StateViolationError extends AppError {
  readonly statusCode = 409;
  readonly code = 'STATE_VIOLATION';
}

export interface StockShortfall {
  item_id: string;
  item_name?: string;
  required: number;
  available: number;
  shortfall: number;
}

export class InsufficientStockError extends AppError {
  readonly statusCode = 422;
  readonly code = 'INSUFFICIENT_STOCK';
  readonly shortfalls: StockShortfall[];

  constructor(message: string, shortfalls: StockShortfall[]) {
    super(message, shortfalls);
    this.shortfalls = shortfalls;
  }
}

/** Store-level failure: exhausted id generation, constraint violations. */
export class IntegrityError extends AppError {
  readonly statusCode = 500;
  readonly code = 'INTEGRITY_ERROR';
}

export function isAppError(err: unknown): err is AppError {
  return err instanceof AppError;
}
