/**
 * =============================================================================
 * RATE LIMITER MIDDLEWARE
 * =============================================================================
 *
 * Global per-IP limit on the API. The autocomplete endpoint has its own,
 * much tighter throttle (see geocoding.routes.ts) because every call there
 * reaches the public Nominatim server.
 *
 * Uses express-rate-limit's in-memory store; behind a load balancer each
 * instance counts on its own.
 * =============================================================================
 */

import rateLimit, { RateLimitRequestHandler } from 'express-rate-limit';
import { ErrorCode } from '../../core/constants';

export interface RateLimiterOptions {
  windowMs: number;
  maxRequests: number;
}

/**
 * Default rate limiter for all API routes
 */
export function createRateLimiter(options: RateLimiterOptions): RateLimitRequestHandler {
  return rateLimit({
    windowMs: options.windowMs,
    limit: options.maxRequests,
    message: {
      success: false,
      error: {
        code: ErrorCode.RATE_LIMIT_EXCEEDED,
        message: 'Too many requests. Please try again later.'
      }
    },
    standardHeaders: true,
    legacyHeaders: false
  });
}
