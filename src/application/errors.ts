/**
 * Application-level errors for HTTP layer mapping.
 * These extend Error and are used for consistent error handling.
 */
export interface ValidationIssue {
  path: string;
  message: string;
}

export class ValidationError extends Error {
  constructor(
    public readonly issues: ValidationIssue[],
    message = 'Validation failed'
  ) {
    super(message);
    this.name = 'ValidationError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class NotFoundError extends Error {
  constructor(message = 'Resource not found') {
    super(message);
    this.name = 'NotFoundError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class UnauthorizedError extends Error {
  constructor(message = 'Unauthorized') {
    super(message);
    this.name = 'UnauthorizedError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Bad credentials or an inactive account. Always carries the same message
 * so callers cannot tell which check failed.
 */
export class AuthError extends UnauthorizedError {
  constructor() {
    super('Invalid username or password');
    this.name = 'AuthError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export type ConflictField = 'username' | 'email';

export class ConflictError extends Error {
  constructor(
    message = 'Conflict',
    public readonly field?: ConflictField
  ) {
    super(message);
    this.name = 'ConflictError';
    Object.setPrototypeOf(this, new.target.prototype);
  }
}
