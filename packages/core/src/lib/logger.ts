/**
 * @ticketdesk/core - Logger
 *
 * Centralized logging utility, backed by Winston. A console transport is
 * always present; rotating files and an HTTP collector are switched on
 * through the LOG_* environment variables (see ./config).
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { getConfig, type LoggingConfig, type LogLevel } from './config';

// Custom log levels
export const levels: Record<LogLevel, number> = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  verbose: 4,
  debug: 5,
  trace: 6,
  system: 7,
};

export function fileTransportOptions(config: LoggingConfig): DailyRotateFile.DailyRotateFileTransportOptions[] {
  const common = {
    datePattern: 'YYYY-MM-DD',
    maxSize: '20m',
    maxFiles: '14d',
  };

  return [
    { ...common, filename: `${config.file.dir}/combined-%DATE%.log` },
    { ...common, filename: `${config.file.dir}/error-%DATE%.log`, level: 'error' },
  ];
}

export function buildTransports(config: LoggingConfig): winston.transport[] {
  const transports: winston.transport[] = [
    new winston.transports.Console({
      format: winston.format.combine(winston.format.colorize(), winston.format.simple()),
    }),
  ];

  if (config.external.enabled && config.external.host) {
    transports.push(
      new winston.transports.Http({
        host: config.external.host,
        port: config.external.port,
        path: config.external.path,
        level: config.external.level,
        headers: config.external.token ? { Authorization: `Bearer ${config.external.token}` } : undefined,
      })
    );
  }

  if (config.file.enabled) {
    for (const options of fileTransportOptions(config)) {
      transports.push(new DailyRotateFile(options));
    }
  }

  return transports;
}

export function createLogger(config: LoggingConfig): winston.Logger {
  return winston.createLogger({
    levels,
    level: config.level,
    format: winston.format.combine(
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ),
    transports: buildTransports(config),
  });
}

let internalLogger: winston.Logger | null = null;

const getLogger = (): winston.Logger => {
  if (!internalLogger) {
    internalLogger = createLogger(getConfig().logging);
  }
  return internalLogger;
};

type LogMeta = Record<string, unknown> | Error;

const toMeta = (meta: LogMeta): Record<string, unknown> =>
  meta instanceof Error ? { error: meta.message, name: meta.name, stack: meta.stack } : meta;

const write = (level: LogLevel, msg: string, meta?: LogMeta): void => {
  if (meta === undefined) {
    getLogger().log(level, msg);
  } else {
    getLogger().log(level, msg, toMeta(meta));
  }
};

const logger = {
  error: (msg: string, meta?: LogMeta) => write('error', msg, meta),
  warn: (msg: string, meta?: LogMeta) => write('warn', msg, meta),
  info: (msg: string, meta?: LogMeta) => write('info', msg, meta),
  http: (msg: string, meta?: LogMeta) => write('http', msg, meta),
  verbose: (msg: string, meta?: LogMeta) => write('verbose', msg, meta),
  debug: (msg: string, meta?: LogMeta) => write('debug', msg, meta),
  trace: (msg: string, meta?: LogMeta) => write('trace', msg, meta),
  system: (msg: string, meta?: LogMeta) => write('system', msg, meta),
};

export type Logger = typeof logger;

export default logger;
