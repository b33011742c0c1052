/**
 * Base application error with HTTP status code and internal code.
 */
export class AppError extends Error {
  statusCode: number;

  code: string;

  /**
   * Constructs an AppError.
   * @param message Human readable message.
   * @param statusCode HTTP status code to send.
   * @param code Internal error identifier.
   */
  constructor(message: string, statusCode: number, code: string) {
    super(message);
    this.name = new.target.name;
    this.statusCode = statusCode;
    this.code = code;
  }
}

/**
 * Error used when a book, borrow record, user or override cannot be located.
 */
export class NotFoundError extends AppError {
  /**
   * Constructs a NotFoundError.
   * @param message Error message.
   */
  constructor(message: string) {
    super(message, 404, 'NOT_FOUND');
  }
}

/**
 * Error used when a request carries no valid credentials.
 */
export class UnauthorizedError extends AppError {
  /**
   * Constructs a UnauthorizedError.
   * @param message Error message.
   */
  constructor(message: string) {
    super(message, 401, 'UNAUTHORIZED');
  }
}

/**
 * Error used when a permission is missing or an ownership check fails.
 */
export class ForbiddenError extends AppError {
  /**
   * Constructs a ForbiddenError.
   * @param message Error message.
   */
  constructor(message: string) {
    super(message, 403, 'FORBIDDEN');
  }
}

/**
 * Error used for malformed input such as a bad ISBN or permission token.
 */
export class ValidationError extends AppError {
  /**
   * Constructs a ValidationError.
   * @param message Error message.
   */
  constructor(message: string) {
    super(message, 400, 'INVALID');
  }
}

/**
 * Error used for conflicting state: ISBN title/author mismatch, duplicate email,
 * duplicate override.
 */
export class ConflictError extends AppError {
  /**
   * Constructs a ConflictError.
   * @param message Error message.
   */
  constructor(message: string) {
    super(message, 409, 'CONFLICT');
  }
}

/**
 * Error used when a borrow targets a copy that is already lent out.
 */
export class NotAvailableError extends AppError {
  /**
   * Constructs a NotAvailableError.
   * @param message Error message.
   */
  constructor(message: string) {
    super(message, 409, 'NOT_AVAILABLE');
  }
}

/**
 * Error used when a borrow record has already been closed.
 */
export class AlreadyReturnedError extends AppError {
  /**
   * Constructs a AlreadyReturnedError.
   * @param message Error message.
   */
  constructor(message: string) {
    super(message, 409, 'ALREADY_RETURNED');
  }
}

/**
 * Error used when the store lock could not be taken within the busy timeout.
 * Callers may retry.
 */
export class TransientError extends AppError {
  /**
   * Constructs a TransientError.
   * @param message Error message.
   */
  constructor(message: string) {
    super(message, 503, 'TRANSIENT');
  }
}

/**
 * Error used when a client exceeds rate limits.
 */
export class TooManyRequestsError extends AppError {
  /**
   * Constructs a TooManyRequestsError.
   * @param message Error message.
   */
  constructor(message: string) {
    super(message, 429, 'TOO_MANY_REQUESTS');
  }
}
