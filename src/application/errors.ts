/**
 * Application-level errors, mapped to HTTP statuses by the error handler.
 */
export class ApplicationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Unknown record, or a record owned by someone else. The two cases are
 * indistinguishable to the caller.
 */
export class NotFoundError extends ApplicationError {
  constructor(message = 'Resource not found') {
    super(message);
  }
}

/**
 * Bad credentials, or a missing, invalid or expired token.
 */
export class UnauthorizedError extends ApplicationError {
  constructor(message = 'Unauthorized') {
    super(message);
  }
}

export class ConflictError extends ApplicationError {
  constructor(message = 'Conflict') {
    super(message);
  }
}
