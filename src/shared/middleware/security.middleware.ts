/**
 * =============================================================================
 * SECURITY MIDDLEWARE
 * =============================================================================
 *
 * - Request IDs for tracing a quote through the logs
 * - Helmet headers (the API serves JSON only)
 * - Query parameter pollution guard
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import helmet from 'helmet';
import { v4 as uuidv4 } from 'uuid';

const REQUEST_ID_PATTERN = /^[\w-]{1,64}$/;

/**
 * Generate and attach request ID for tracking.
 * A well-formed incoming X-Request-ID is kept; anything else is replaced.
 */
export function requestIdMiddleware(
  req: Request,
  res: Response,
  next: NextFunction
): void {
  const incoming = req.get('x-request-id')?.trim();
  const requestId = incoming && REQUEST_ID_PATTERN.test(incoming) ? incoming : uuidv4();

  req.headers['x-request-id'] = requestId;
  res.setHeader('X-Request-ID', requestId);

  next();
}

/**
 * Security headers using Helmet
 */
export const securityHeaders = helmet({
  contentSecurityPolicy: {
    directives: {
      defaultSrc: ["'none'"],
      frameAncestors: ["'none'"],
    },
  },
  crossOriginResourcePolicy: { policy: 'cross-origin' },
  frameguard: { action: 'deny' },
  hidePoweredBy: true,
  hsts: {
    maxAge: 31536000, // 1 year
    includeSubDomains: true,
  },
  noSniff: true,
  referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
});

/**
 * Prevent parameter pollution: ?q=a&q=b keeps only the first value
 */
export function preventParamPollution(
  req: Request,
  _res: Response,
  next: NextFunction
): void {
  for (const [key, value] of Object.entries(req.query)) {
    if (Array.isArray(value)) {
      req.query[key] = value[0];
    }
  }
  next();
}
