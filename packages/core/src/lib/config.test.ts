import { afterEach, describe, expect, it } from 'vitest';
import { getConfig, loadConfig, resetConfigCache } from './config';
import { ConfigurationError } from './errors';

describe('loadConfig', () => {
  afterEach(() => {
    resetConfigCache();
  });

  it('defaults to a SQLite file and console logging', () => {
    const config = loadConfig({});

    expect(config.nodeEnv).toBe('production');
    expect(config.database).toEqual({ client: 'better-sqlite3', filename: 'tickets.db' });
    expect(config.logging.level).toBe('info');
    expect(config.logging.file).toEqual({ enabled: false, dir: './logs' });
    expect(config.logging.external.enabled).toBe(false);
  });

  it('builds a PostgreSQL configuration from DB_* variables', () => {
    const config = loadConfig({
      TICKETS_DB_CLIENT: 'pg',
      DB_HOST: 'db-host',
      DB_PORT: '5439',
      DB_USER: 'app_user',
      DB_PASSWORD: 'test-password',
      DB_NAME: 'tickets_db',
      DB_POOL_MAX: '8',
    });

    expect(config.database).toEqual({
      client: 'pg',
      connectionString: undefined,
      host: 'db-host',
      port: 5439,
      user: 'app_user',
      password: 'test-password',
      database: 'tickets_db',
      pool: { min: 0, max: 8 },
    });
  });

  it('keeps DATABASE_URL for PostgreSQL', () => {
    const config = loadConfig({ TICKETS_DB_CLIENT: 'pg', DATABASE_URL: 'postgres://localhost/tickets' });

    expect(config.database.client).toBe('pg');
    if (config.database.client === 'pg') {
      expect(config.database.connectionString).toBe('postgres://localhost/tickets');
    }
  });

  it('rejects an unknown storage client', () => {
    expect(() => loadConfig({ TICKETS_DB_CLIENT: 'mysql' })).toThrow(ConfigurationError);
  });

  it('reports every invalid variable', () => {
    try {
      loadConfig({ TICKETS_DB_CLIENT: 'mysql', DB_PORT: 'not-a-port' });
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigurationError);
      if (error instanceof ConfigurationError) {
        const issues = error.details?.issues;
        expect(Array.isArray(issues)).toBe(true);
        expect(error.message).toContain('TICKETS_DB_CLIENT:');
        expect(error.message).toContain('DB_PORT:');
      }
    }
  });

  it('requires a host when external logging is enabled', () => {
    expect(() => loadConfig({ LOG_ENABLED_EXTERNAL_LOGGING: 'true' })).toThrow(
      'Invalid configuration: LOG_EXTERNAL_HTTP_HOST: Required when LOG_ENABLED_EXTERNAL_LOGGING is true'
    );
  });

  it('rejects a pool minimum above the maximum', () => {
    expect(() => loadConfig({ DB_POOL_MIN: '6', DB_POOL_MAX: '2' })).toThrow(
      'DB_POOL_MIN: Must not exceed DB_POOL_MAX'
    );
  });

  it('caches the process-wide configuration', () => {
    const first = getConfig();
    const second = getConfig();

    expect(second).toBe(first);

    resetConfigCache();
    expect(getConfig()).not.toBe(first);
  });
});
