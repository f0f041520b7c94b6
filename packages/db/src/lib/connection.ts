import knex, { type Knex } from 'knex';
import { logger, type DatabaseConfig } from '@ticketdesk/core';
import { getKnexConfig } from './knexfile';

function describeConfig(config: DatabaseConfig): Record<string, unknown> {
  if (config.client === 'better-sqlite3') {
    return { client: config.client, filename: config.filename };
  }

  return {
    client: config.client,
    connection: config.connectionString
      ? '[REDACTED]'
      : {
          host: config.host,
          port: config.port,
          database: config.database,
          user: config.user,
          password: config.password ? '[REDACTED]' : undefined,
        },
    pool: config.pool,
  };
}

/** Opens a new handle. The caller owns it and must `destroy()` it. */
export function createConnection(config: DatabaseConfig): Knex {
  logger.info('[db/connection] Database configuration', describeConfig(config));
  return knex(getKnexConfig(config));
}
