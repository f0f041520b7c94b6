import dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './errors';

export const LOG_LEVELS = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'trace', 'system'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export interface SqliteDatabaseConfig {
  client: 'better-sqlite3';
  filename: string;
}

export interface PostgresDatabaseConfig {
  client: 'pg';
  connectionString?: string;
  host: string;
  port: number;
  user: string;
  password?: string;
  database: string;
  pool: { min: number; max: number };
}

export type DatabaseConfig = SqliteDatabaseConfig | PostgresDatabaseConfig;

export interface LoggingConfig {
  level: LogLevel;
  file: {
    enabled: boolean;
    dir: string;
  };
  external: {
    enabled: boolean;
    host?: string;
    port?: number;
    path: string;
    level: LogLevel;
    token?: string;
  };
}

export interface AppConfig {
  nodeEnv: string;
  database: DatabaseConfig;
  logging: LoggingConfig;
}

const flag = z
  .enum(['true', 'false', '1', '0'])
  .optional()
  .transform((value) => value === 'true' || value === '1');

const envSchema = z
  .object({
    NODE_ENV: z.string().optional(),

    TICKETS_DB_CLIENT: z.enum(['better-sqlite3', 'pg']).default('better-sqlite3'),
    TICKETS_DB_FILE: z.string().min(1).default('tickets.db'),

    DATABASE_URL: z.string().min(1).optional(),
    DB_HOST: z.string().min(1).default('localhost'),
    DB_PORT: z.coerce.number().int().positive().default(5432),
    DB_USER: z.string().min(1).default('postgres'),
    DB_PASSWORD: z.string().optional(),
    DB_NAME: z.string().min(1).default('tickets'),
    DB_POOL_MIN: z.coerce.number().int().min(0).default(0),
    DB_POOL_MAX: z.coerce.number().int().min(1).default(5),

    LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),
    LOG_ENABLED_FILE_LOGGING: flag,
    LOG_DIR_PATH: z.string().min(1).default('./logs'),
    LOG_ENABLED_EXTERNAL_LOGGING: flag,
    LOG_EXTERNAL_HTTP_HOST: z.string().min(1).optional(),
    LOG_EXTERNAL_HTTP_PORT: z.coerce.number().int().positive().optional(),
    LOG_EXTERNAL_HTTP_PATH: z.string().min(1).default('/'),
    LOG_EXTERNAL_HTTP_LEVEL: z.enum(LOG_LEVELS).default('info'),
    LOG_EXTERNAL_HTTP_TOKEN: z.string().min(1).optional(),
  })
  .superRefine((env, ctx) => {
    if (env.LOG_ENABLED_EXTERNAL_LOGGING && !env.LOG_EXTERNAL_HTTP_HOST) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['LOG_EXTERNAL_HTTP_HOST'],
        message: 'Required when LOG_ENABLED_EXTERNAL_LOGGING is true',
      });
    }
    if (env.DB_POOL_MIN > env.DB_POOL_MAX) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['DB_POOL_MIN'],
        message: 'Must not exceed DB_POOL_MAX',
      });
    }
  });

/**
 * Parses and validates runtime configuration from an environment map.
 * Pure: reads nothing but its argument.
 */
export function loadConfig(source: NodeJS.ProcessEnv): AppConfig {
  const result = envSchema.safeParse(source);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const env = result.data;
  const database: DatabaseConfig =
    env.TICKETS_DB_CLIENT === 'pg'
      ? {
          client: 'pg',
          connectionString: env.DATABASE_URL,
          host: env.DB_HOST,
          port: env.DB_PORT,
          user: env.DB_USER,
          password: env.DB_PASSWORD,
          database: env.DB_NAME,
          pool: { min: env.DB_POOL_MIN, max: env.DB_POOL_MAX },
        }
      : { client: 'better-sqlite3', filename: env.TICKETS_DB_FILE };

  return {
    nodeEnv: env.NODE_ENV ?? 'production',
    database,
    logging: {
      level: env.LOG_LEVEL,
      file: {
        enabled: env.LOG_ENABLED_FILE_LOGGING,
        dir: env.LOG_DIR_PATH.replace(/\/$/, ''),
      },
      external: {
        enabled: env.LOG_ENABLED_EXTERNAL_LOGGING,
        host: env.LOG_EXTERNAL_HTTP_HOST,
        port: env.LOG_EXTERNAL_HTTP_PORT,
        path: env.LOG_EXTERNAL_HTTP_PATH,
        level: env.LOG_EXTERNAL_HTTP_LEVEL,
        token: env.LOG_EXTERNAL_HTTP_TOKEN,
      },
    },
  };
}

let cachedConfig: AppConfig | null = null;

/** Process-wide configuration: `.env` merged into `process.env`, validated once. */
export function getConfig(): AppConfig {
  if (!cachedConfig) {
    dotenv.config();
    cachedConfig = loadConfig(process.env);
  }
  return cachedConfig;
}

export function resetConfigCache(): void {
  cachedConfig = null;
}
