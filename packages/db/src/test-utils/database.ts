import type { Knex } from 'knex';
import { createConnection } from '../lib/connection';
import { initializeSchema } from '../lib/schema';

/**
 * In-memory SQLite store with the schema applied. Each call returns an
 * isolated database; destroy it in `afterEach`.
 */
export async function createTestDatabase(): Promise<Knex> {
  const db = createConnection({ client: 'better-sqlite3', filename: ':memory:' });
  await initializeSchema(db);
  return db;
}
