/**
 * Rate Limiting Middleware
 *
 * Protects the parsing API from abuse. Uses express-rate-limit keyed by client IP.
 */

import rateLimit, { RateLimitRequestHandler, ipKeyGenerator } from 'express-rate-limit';
import { Request, Response } from 'express';
import logger from '../utils/logger';
import { config } from '../config';
import { TIME } from '../utils/constants';

const RATE_LIMIT_CONFIG = {
  API: {
    windowMs: config.features.rateLimit.api.windowMs,
    defaultMax: 100
  }
} as const;

const RATE_LIMIT_MESSAGE = 'Too many requests. Please try again in a few minutes.';

/**
 * Key generator for rate limiting.
 * Uses ipKeyGenerator so IPv6 clients are bucketed by subnet.
 */
export function generateKey(req: Request): string {
  const ip = req.ip || req.socket?.remoteAddress || 'unknown';
  return ipKeyGenerator(ip);
}

/**
 * Creates a standardized rate limit handler
 * @param errorMessage - Message returned to the client
 * @param retryAfterSeconds - Retry after time in seconds
 * @param logMessage - Log message prefix
 */
export function createRateLimitHandler(
  errorMessage: string,
  retryAfterSeconds: number,
  logMessage: string
) {
  return (req: Request, res: Response): void => {
    logger.warn(`⚠️ ${logMessage}`, {
      ip: req.ip,
      path: req.path,
      method: req.method
    });

    res.status(429).json({
      error: errorMessage,
      retryAfter: retryAfterSeconds
    });
  };
}

/**
 * Standard rate limiter for API endpoints
 */
export const apiLimiter: RateLimitRequestHandler = rateLimit({
  windowMs: RATE_LIMIT_CONFIG.API.windowMs,
  max: config.features.rateLimit.api.max || RATE_LIMIT_CONFIG.API.defaultMax,
  message: {
    error: RATE_LIMIT_MESSAGE,
    retryAfter: '15 minutes'
  },
  standardHeaders: true, // Return rate limit info in the `RateLimit-*` headers
  legacyHeaders: false, // Disable the `X-RateLimit-*` headers
  keyGenerator: generateKey,
  handler: createRateLimitHandler(
    RATE_LIMIT_MESSAGE,
    RATE_LIMIT_CONFIG.API.windowMs / TIME.SECOND,
    'Rate limit exceeded'
  )
});
