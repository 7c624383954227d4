/**
 * Logging Utility
 *
 * Centralized logging using Winston for structured, level-based logging.
 */

import winston from 'winston';
import path from 'path';
import config from '../config/env';

// Define log levels
const levels = {
  error: 0,
  warn: 1,
  info: 2,
  http: 3,
  debug: 4,
};

export type LogLevel = keyof typeof levels;

const colors = {
  error: 'red',
  warn: 'yellow',
  info: 'green',
  http: 'magenta',
  debug: 'white',
};

winston.addColors(colors);

const SENSITIVE_KEYS = ['password', 'token', 'secret', 'key', 'authorization', 'apikey'];

/**
 * Deep copy with sensitive keys masked; circular references become "[Circular]"
 */
export function redactSensitive(value: unknown, seen: WeakSet<object> = new WeakSet()): unknown {
  if (!value || typeof value !== 'object') return value;
  if (seen.has(value)) return '[Circular]';
  seen.add(value);

  if (value instanceof Error) {
    return { name: value.name, message: value.message, stack: value.stack };
  }
  if (Array.isArray(value)) return value.map(item => redactSensitive(item, seen));

  const result: Record<string, unknown> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (SENSITIVE_KEYS.some(k => key.toLowerCase().includes(k))) {
      result[key] = '***REDACTED***';
    } else {
      result[key] = redactSensitive(entry, seen);
    }
  }
  return result;
}

// Redaction format for secrets. Mutates only string-keyed props so winston's symbol keys survive.
const redactSecrets = winston.format((info) => {
  for (const key of Object.keys(info)) {
    if (key === 'level' || key === 'message') continue;
    if (SENSITIVE_KEYS.some(k => key.toLowerCase().includes(k))) {
      info[key] = '***REDACTED***';
    } else {
      info[key] = redactSensitive(info[key]);
    }
  }
  return info;
});

const logFormat = winston.format.combine(
  redactSecrets(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  winston.format.printf(
    (info) => `${info.timestamp} ${info.level}: ${info.message}`
  )
);

const consoleFormat = winston.format.combine(
  redactSecrets(),
  winston.format.colorize({ all: true }),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss:ms' }),
  winston.format.printf(
    (info) => `${info.timestamp} ${info.level}: ${info.message}`
  )
);

const logger = winston.createLogger({
  level: config.logLevel,
  levels,
  format: logFormat,
  transports: [
    new winston.transports.Console({
      format: consoleFormat,
    }),
  ],
  exitOnError: false
});

if (config.enableFileLogging) {
  const logDir = config.logDir;

  logger.add(
    new winston.transports.File({
      filename: path.join(logDir, 'error.log'),
      level: 'error',
    })
  );

  logger.add(
    new winston.transports.File({
      filename: path.join(logDir, 'all.log'),
    })
  );
}

logger.debug(`Logger initialized at level: ${config.logLevel}`, {
  environment: config.env
});

function logWithContext(level: LogLevel, message: string, meta: Record<string, unknown> = {}): void {
  logger.log(level, message, meta);
}

export interface LoggerInterface {
  debug: (message: string, ...meta: unknown[]) => void;
  info: (message: string, ...meta: unknown[]) => void;
  warn: (message: string, ...meta: unknown[]) => void;
  error: (message: string, ...meta: unknown[]) => void;
  debugWithContext: (message: string, meta?: Record<string, unknown>) => void;
  infoWithContext: (message: string, meta?: Record<string, unknown>) => void;
  warnWithContext: (message: string, meta?: Record<string, unknown>) => void;
  errorWithContext: (message: string, meta?: Record<string, unknown>) => void;
  logger: winston.Logger;
}

const loggerExport: LoggerInterface = {
  debug: logger.debug.bind(logger),
  info: logger.info.bind(logger),
  warn: logger.warn.bind(logger),
  error: logger.error.bind(logger),

  debugWithContext: (message: string, meta?: Record<string, unknown>) => logWithContext('debug', message, meta),
  infoWithContext: (message: string, meta?: Record<string, unknown>) => logWithContext('info', message, meta),
  warnWithContext: (message: string, meta?: Record<string, unknown>) => logWithContext('warn', message, meta),
  errorWithContext: (message: string, meta?: Record<string, unknown>) => logWithContext('error', message, meta),

  logger
};

export default loggerExport;
