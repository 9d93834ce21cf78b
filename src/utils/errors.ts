/**
 * Error taxonomy
 *
 * Every error the core raises on purpose is one of these. The API error
 * handler maps them to status codes; anything else is a 500.
 */

export class ValidationError extends Error {
  readonly code: string = 'validation_error';
  readonly statusCode: number = 400;

  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** Action attempted on a document in the wrong lifecycle state */
export class StateError extends Error {
  readonly code: string = 'state_error';
  readonly statusCode: number = 409;

  constructor(message: string) {
    super(message);
    this.name = 'StateError';
  }
}

export class NotFoundError extends Error {
  readonly code: string = 'not_found';
  readonly statusCode: number = 404;

  constructor(message: string = 'Resource not found') {
    super(message);
    this.name = 'NotFoundError';
  }
}

/** Another writer holds the lock or moved the watermark */
export class ConflictError extends Error {
  readonly code: string = 'conflict';
  readonly statusCode: number = 409;

  constructor(message: string = 'Resource conflict') {
    super(message);
    this.name = 'ConflictError';
  }
}

export type EligibilityReason =
  | 'no_active_intakes'
  | 'none_in_range'
  | 'all_already_billed'
  | 'no_match';

export class BillingEligibilityError extends Error {
  readonly code: string = 'billing_eligibility';
  readonly statusCode: number = 422;

  constructor(readonly reason: EligibilityReason, message: string) {
    super(message);
    this.name = 'BillingEligibilityError';
  }
}

/** No income account could be resolved for an invoice line */
export class ResolutionError extends Error {
  readonly code: string = 'resolution_error';
  readonly statusCode: number = 422;

  constructor(message: string) {
    super(message);
    this.name = 'ResolutionError';
  }
}

export class StockError extends Error {
  readonly code: string = 'stock_error';
  readonly statusCode: number = 409;

  constructor(message: string) {
    super(message);
    this.name = 'StockError';
  }
}

export type WarehouseError =
  | ValidationError
  | StateError
  | NotFoundError
  | ConflictError
  | BillingEligibilityError
  | ResolutionError
  | StockError;

export function isWarehouseError(err: unknown): err is WarehouseError {
  return (
    err instanceof ValidationError ||
    err instanceof StateError ||
    err instanceof NotFoundError ||
    err instanceof ConflictError ||
    err instanceof BillingEligibilityError ||
    err instanceof ResolutionError ||
    err instanceof StockError
  );
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
