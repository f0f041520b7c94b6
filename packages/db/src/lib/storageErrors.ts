import { AppError, ConstraintViolationError, StorageUnavailableError } from '@ticketdesk/core';

export type ConstraintKind = 'check' | 'foreign_key' | 'not_null' | 'unique' | 'other';

const SQLITE_UNAVAILABLE_PREFIXES = [
  'SQLITE_CANTOPEN',
  'SQLITE_IOERR',
  'SQLITE_NOTADB',
  'SQLITE_CORRUPT',
  'SQLITE_FULL',
  'SQLITE_READONLY',
  'SQLITE_PERM',
];

const NETWORK_ERROR_CODES = ['ECONNREFUSED', 'ECONNRESET', 'ENOTFOUND', 'ETIMEDOUT', 'EHOSTUNREACH', 'EPIPE'];

// SQLITE_BUSY_*, SQLITE_LOCKED_*, PostgreSQL deadlock and serialization failure
const TRANSIENT_PREFIXES = ['SQLITE_BUSY', 'SQLITE_LOCKED', '40P01', '40001'];

export function storageErrorCode(error: unknown): string | undefined {
  if (typeof error === 'object' && error !== null && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}

function isConstraintCode(code: string): boolean {
  // SQLSTATE class 23: integrity constraint violation
  return code.startsWith('SQLITE_CONSTRAINT') || /^23\d{3}$/.test(code);
}

function isUnavailableCode(code: string): boolean {
  return (
    SQLITE_UNAVAILABLE_PREFIXES.some((prefix) => code.startsWith(prefix)) ||
    NETWORK_ERROR_CODES.includes(code) ||
    // SQLSTATE class 08: connection exception; 57P0x: server shutting down
    /^08[0-9A-Z]{3}$/.test(code) ||
    /^57P0\d$/.test(code)
  );
}

export function constraintKind(code: string): ConstraintKind {
  switch (code) {
    case 'SQLITE_CONSTRAINT_CHECK':
    case '23514':
      return 'check';
    case 'SQLITE_CONSTRAINT_FOREIGNKEY':
    case '23503':
      return 'foreign_key';
    case 'SQLITE_CONSTRAINT_NOTNULL':
    case '23502':
      return 'not_null';
    case 'SQLITE_CONSTRAINT_UNIQUE':
    case 'SQLITE_CONSTRAINT_PRIMARYKEY':
    case '23505':
      return 'unique';
    default:
      return 'other';
  }
}

/**
 * Maps a driver error onto the application taxonomy. Errors that are neither
 * constraint nor availability failures come back unchanged.
 */
export function translateStorageError(error: unknown): unknown {
  if (error instanceof AppError) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const code = storageErrorCode(error);

  if (code && isConstraintCode(code)) {
    return new ConstraintViolationError(
      `Storage constraint violated: ${message}`,
      { code, constraint: constraintKind(code) },
      { cause: error }
    );
  }

  if (error instanceof Error && error.name === 'KnexTimeoutError') {
    return new StorageUnavailableError(`Storage unavailable: ${message}`, { code: 'POOL_TIMEOUT' }, { cause: error });
  }

  if (code && isUnavailableCode(code)) {
    return new StorageUnavailableError(`Storage unavailable: ${message}`, { code }, { cause: error });
  }

  return error;
}

export function isTransientStorageError(error: unknown): boolean {
  const code = storageErrorCode(error);
  return code !== undefined && TRANSIENT_PREFIXES.some((prefix) => code.startsWith(prefix));
}
