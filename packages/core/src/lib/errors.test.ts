import { describe, expect, it } from 'vitest';
import {
  AppError,
  ConfigurationError,
  ConstraintViolationError,
  StorageUnavailableError,
  ValidationError,
} from './errors';

describe('error taxonomy', () => {
  it('lists every failing field of a validation error', () => {
    const error = new ValidationError(['title: Title is required', 'body: Comment body is required']);

    expect(error).toBeInstanceOf(AppError);
    expect(error.code).toBe('VALIDATION_ERROR');
    expect(error.name).toBe('ValidationError');
    expect(error.issues).toEqual(['title: Title is required', 'body: Comment body is required']);
    expect(error.message).toBe('Validation failed: title: Title is required, body: Comment body is required');
  });

  it('keeps the driver error as cause of a constraint violation', () => {
    const cause = new Error('FOREIGN KEY constraint failed');
    const error = new ConstraintViolationError('Foreign key violation', { constraint: 'foreign_key' }, { cause });

    expect(error.code).toBe('CONSTRAINT_VIOLATION');
    expect(error.details).toEqual({ constraint: 'foreign_key' });
    expect(error.cause).toBe(cause);
  });

  it('gives storage and configuration failures their own codes', () => {
    expect(new StorageUnavailableError('unable to open database file').code).toBe('STORAGE_UNAVAILABLE');
    expect(new ConfigurationError(['DB_PORT: Expected number']).code).toBe('CONFIGURATION_ERROR');
  });
});
