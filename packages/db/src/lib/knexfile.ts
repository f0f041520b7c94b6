/**
 * @ticketdesk/db - Knex Configuration
 *
 * Builds the Knex configuration for the configured store: a SQLite file
 * through better-sqlite3 (default) or PostgreSQL through pg.
 */

import type { Knex } from 'knex';
import type { DatabaseConfig, PostgresDatabaseConfig } from '@ticketdesk/core';

type Done<T> = (err: Error | null, connection: T) => void;

interface SqliteRawConnection {
  pragma(source: string): unknown;
}

interface PgRawConnection {
  query(sql: string, callback: (err: Error | null) => void): void;
}

/**
 * SQLite leaves foreign keys off per connection, so the cascade from
 * `comments` to `tickets` only holds once this pragma has run.
 */
export function enableForeignKeys(conn: SqliteRawConnection, done: Done<SqliteRawConnection>): void {
  try {
    conn.pragma('foreign_keys = ON');
    done(null, conn);
  } catch (error) {
    done(error instanceof Error ? error : new Error(String(error)), conn);
  }
}

export function setUtcTimeZone(conn: PgRawConnection, done: Done<PgRawConnection>): void {
  conn.query("SET TIME ZONE 'UTC'", (err) => {
    done(err, conn);
  });
}

function pgConnection(config: PostgresDatabaseConfig): string | Knex.PgConnectionConfig {
  if (config.connectionString) {
    return config.connectionString;
  }

  return {
    host: config.host,
    port: config.port,
    user: config.user,
    password: config.password,
    database: config.database,
  };
}

export function getKnexConfig(config: DatabaseConfig): Knex.Config {
  if (config.client === 'better-sqlite3') {
    return {
      client: 'better-sqlite3',
      connection: { filename: config.filename },
      useNullAsDefault: true,
      // better-sqlite3 handles are synchronous and not safe for concurrent use:
      // a single pooled connection serializes every query.
      pool: {
        min: 1,
        max: 1,
        afterCreate: enableForeignKeys,
      },
    };
  }

  return {
    client: 'pg',
    connection: pgConnection(config),
    pool: {
      min: config.pool.min,
      max: config.pool.max,
      idleTimeoutMillis: 30000,
      createTimeoutMillis: 3000,
      acquireTimeoutMillis: 10000,
      afterCreate: setUtcTimeZone,
    },
  };
}
