/**
 * Base application error class for consistent error handling.
 *
 * Every failure the ticket layer surfaces to its caller is one of the
 * subclasses below, so a caller can branch on `code` (or `instanceof`)
 * without inspecting driver-specific errors.
 */
export class AppError extends Error {
  public readonly code: string;
  public readonly details?: Record<string, unknown>;

  constructor(code: string, message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    this.code = code;
    this.details = details;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/** A required field is missing or empty. */
export class ValidationError extends AppError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super('VALIDATION_ERROR', `Validation failed: ${issues.join(', ')}`, { issues });
    this.issues = issues;
  }
}

/**
 * The store rejected a write: a CHECK constraint on an enum column, a foreign
 * key pointing at a missing ticket, a NOT NULL column left empty.
 */
export class ConstraintViolationError extends AppError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super('CONSTRAINT_VIOLATION', message, details, options);
  }
}

/** Connection or I/O failure. The operation was aborted and nothing was written. */
export class StorageUnavailableError extends AppError {
  constructor(message: string, details?: Record<string, unknown>, options?: ErrorOptions) {
    super('STORAGE_UNAVAILABLE', message, details, options);
  }
}

export class ConfigurationError extends AppError {
  constructor(issues: string[]) {
    super('CONFIGURATION_ERROR', `Invalid configuration: ${issues.join('; ')}`, { issues });
  }
}
