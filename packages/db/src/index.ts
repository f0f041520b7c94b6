/**
 * @ticketdesk/db
 *
 * Storage infrastructure: Knex configuration, the shared connection, schema
 * initialization and translation of driver errors.
 */

// Knex Configuration
export { getKnexConfig, enableForeignKeys, setUtcTimeZone } from './lib/knexfile';

// Connection Management
export { createConnection } from './lib/connection';

// Schema
export { initializeSchema, TICKETS_TABLE, COMMENTS_TABLE, TICKET_INDEXES } from './lib/schema';

// Error translation
export {
  translateStorageError,
  isTransientStorageError,
  storageErrorCode,
  constraintKind,
} from './lib/storageErrors';
export type { ConstraintKind } from './lib/storageErrors';
