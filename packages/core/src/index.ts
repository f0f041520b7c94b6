/**
 * @ticketdesk/core
 *
 * Shared infrastructure: logging, configuration, error taxonomy, clock and
 * retry helpers.
 */

// Logger
export { default as logger, createLogger, buildTransports, fileTransportOptions, levels } from './lib/logger';
export type { Logger } from './lib/logger';

// Configuration
export { loadConfig, getConfig, resetConfigCache, LOG_LEVELS } from './lib/config';
export type {
  AppConfig,
  DatabaseConfig,
  SqliteDatabaseConfig,
  PostgresDatabaseConfig,
  LoggingConfig,
  LogLevel,
} from './lib/config';

// Errors
export {
  AppError,
  ValidationError,
  ConstraintViolationError,
  StorageUnavailableError,
  ConfigurationError,
} from './lib/errors';

// Time
export { formatUtcTimestamp, systemClock, monotonicClock } from './lib/dateTimeUtils';
export type { Clock } from './lib/dateTimeUtils';

// Retry
export { withRetry } from './lib/retry';
