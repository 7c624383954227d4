/**
 * Centralized Configuration File
 *
 * Single Source of Truth for all application configuration.
 * Consolidates environment variables and constants.
 */

import path from 'path';
import logger from '../utils/logger';
import { TIME } from '../utils/constants';

/**
 * Configuration object
 * All environment variables and constants centralized here
 */
export const config = {
  // Environment
  env: process.env.NODE_ENV || 'development',
  isProduction: process.env.NODE_ENV === 'production',
  isDevelopment: process.env.NODE_ENV !== 'production',

  // Server Configuration
  server: {
    port: parseInt(process.env.PORT || '3000', 10),
    host: process.env.HOST || '0.0.0.0',
    trustProxy: process.env.TRUST_PROXY !== 'false',
  },

  // Logging Configuration
  logging: {
    level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'info' : 'debug'),
    enableFileLogging: process.env.ENABLE_FILE_LOGGING === 'true',
    logDir: process.env.LOG_DIR || path.join(__dirname, '..', 'logs'),
  },

  // Request Limits
  limits: {
    jsonBodySize: process.env.JSON_BODY_SIZE_LIMIT || '100kb',
    // Longest phrase accepted by /api/parse-date
    maxPhraseLength: parseInt(process.env.MAX_PHRASE_LENGTH || '200', 10),
  },

  // Feature Flags
  features: {
    // Rate Limiting configuration
    rateLimit: {
      api: {
        max: parseInt(process.env.RATE_LIMIT_API_MAX || '100', 10),
        windowMs: 15 * TIME.MINUTE,
      },
    },
  },
};

/**
 * Validate critical configuration on startup
 * @throws {Error} If critical config is invalid
 */
export function validateConfig(): void {
  const errors: string[] = [];

  if (!Number.isInteger(config.server.port) || config.server.port <= 0 || config.server.port > 65535) {
    errors.push(`PORT must be a valid TCP port (got ${process.env.PORT})`);
  }

  if (!Number.isInteger(config.limits.maxPhraseLength) || config.limits.maxPhraseLength <= 0) {
    errors.push(`MAX_PHRASE_LENGTH must be a positive integer (got ${process.env.MAX_PHRASE_LENGTH})`);
  }

  if (!Number.isInteger(config.features.rateLimit.api.max) || config.features.rateLimit.api.max <= 0) {
    errors.push(`RATE_LIMIT_API_MAX must be a positive integer (got ${process.env.RATE_LIMIT_API_MAX})`);
  }

  if (config.logging.enableFileLogging && !process.env.LOG_DIR) {
    logger.warn('⚠️ ENABLE_FILE_LOGGING is on without LOG_DIR, using default directory', {
      logDir: config.logging.logDir,
      service: 'datephrase-server'
    });
  }

  // Throw if critical errors found
  if (errors.length > 0) {
    throw new Error(`Configuration validation failed:\n${errors.join('\n')}`);
  }
}

/**
 * Get configuration value by path (e.g., 'limits.maxPhraseLength')
 * @param configPath - Dot-separated path to config value
 * @param defaultValue - Default value if path not found
 * @returns Config value or default
 */
export function get(configPath: string, defaultValue: unknown = undefined): unknown {
  const keys = configPath.split('.');
  let value: unknown = config;

  for (const key of keys) {
    if (value && typeof value === 'object' && key in value) {
      value = Reflect.get(value, key);
    } else {
      return defaultValue;
    }
  }

  return value;
}

export default config;
