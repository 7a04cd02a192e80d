/**
 * Application error types.
 * Each error type maps to a specific HTTP status code and a stable error code the
 * client can branch on.
 */

export class AppError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly statusCode: number,
    public readonly details?: unknown
  ) {
    super(message);
    this.name = this.constructor.name;
    Error.captureStackTrace(this, this.constructor);
  }
}

/**
 * Dangling or inactive reference: missing month, unknown or retired account/card,
 * unknown category (422 Unprocessable Entity)
 */
export class ReferentialIntegrityError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'REFERENTIAL_INTEGRITY', 422, details);
  }
}

/**
 * Write attempted against a closed month (409 Conflict)
 */
export class ClosedMonthError extends AppError {
  constructor(month: string, message = `Month ${month} is closed`) {
    super(message, 'CLOSED_MONTH', 409, { month });
  }
}

/**
 * Closing a month while an earlier month is still open (409 Conflict)
 */
export class OutOfOrderCloseError extends AppError {
  constructor(month: string, openEarlierMonths: string[]) {
    super(
      `Cannot close ${month} before ${openEarlierMonths.join(', ')}`,
      'OUT_OF_ORDER_CLOSE',
      409,
      { month, openEarlierMonths }
    );
  }
}

/**
 * Retiring a bank account that still holds money or has card statements in flight
 * (409 Conflict)
 */
export class UnsettledAccountError extends AppError {
  constructor(
    public readonly accountId: number,
    message: string,
    details?: Record<string, unknown>
  ) {
    super(message, 'UNSETTLED_ACCOUNT', 409, { accountId, ...details });
  }
}

/**
 * Malformed or missing credit-card statement cycle (400 Bad Request)
 */
export class InvalidCycleConfigError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'INVALID_CYCLE_CONFIG', 400, details);
  }
}

/**
 * Recurring transactions of the month have not all been generated (409 Conflict)
 */
export class CloseNotReadyError extends AppError {
  constructor(month: string, missing: string[]) {
    super(
      `Month ${month} is missing ${missing.length} recurring transaction(s)`,
      'CLOSE_NOT_READY',
      409,
      { month, missing }
    );
  }
}

/**
 * Two simultaneously active objectives for the same category/subcategory (409 Conflict)
 */
export class DuplicateObjectiveError extends AppError {
  constructor(category: string, subcategory: string | null) {
    super(
      subcategory
        ? `An active objective already exists for ${category} / ${subcategory}`
        : `An active objective already exists for ${category}`,
      'DUPLICATE_OBJECTIVE',
      409,
      { category, subcategory }
    );
  }
}

/**
 * Database operation errors (500 Internal Server Error)
 */
export class DatabaseError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'DATABASE_ERROR', 500, details);
  }
}

/**
 * Validation errors from user input (400 Bad Request)
 */
export class ValidationError extends AppError {
  constructor(message: string, details?: unknown) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

/**
 * Resource not found errors (404 Not Found)
 */
export class NotFoundError extends AppError {
  constructor(resource: string, id: string | number) {
    super(`${resource} with id ${id} not found`, 'NOT_FOUND', 404, { resource, id });
  }
}

/**
 * Type guard to check if error is an AppError
 */
export function isAppError(error: unknown): error is AppError {
  return error instanceof AppError;
}
