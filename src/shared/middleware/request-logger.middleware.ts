/**
 * =============================================================================
 * REQUEST LOGGER MIDDLEWARE
 * =============================================================================
 *
 * One log line per request, written when the response finishes.
 *
 * - 5xx -> error, 4xx -> warn, everything else -> info
 * - Probe traffic under /health only goes to debug
 * - Requests slower than SLOW_REQUEST_MS are flagged; a quote waits on two
 *   geocoder calls and a routing call, so this is where upstream latency shows
 * - Request bodies are never logged (they carry customer addresses) and
 *   credential-like query parameters are masked
 * =============================================================================
 */

import { Request, Response, NextFunction } from 'express';
import { logger } from '../services/logger.service';

const SLOW_REQUEST_MS = 5000;

const SENSITIVE_PARAMS = ['token', 'key', 'secret', 'password'];

export function maskQueryParams(query: Record<string, unknown>): Record<string, unknown> {
  return Object.fromEntries(
    Object.entries(query).map(([key, value]) => {
      const lowered = key.toLowerCase();
      return [key, SENSITIVE_PARAMS.some(param => lowered.includes(param)) ? '[MASKED]' : value];
    })
  );
}

export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const started = process.hrtime.bigint();

  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - started) / 1e6;
    const entry = {
      requestId: req.get('x-request-id'),
      method: req.method,
      path: req.originalUrl.split('?')[0],
      status: res.statusCode,
      durationMs: Math.round(durationMs),
      ip: req.ip,
      ...(Object.keys(req.query).length > 0 && { query: maskQueryParams(req.query) }),
      ...(durationMs > SLOW_REQUEST_MS && { slow: true })
    };
    const line = `${req.method} ${entry.path} ${res.statusCode}`;

    if (res.statusCode >= 500) {
      logger.error(line, entry);
    } else if (res.statusCode >= 400) {
      logger.warn(line, entry);
    } else if (req.path.startsWith('/health')) {
      logger.debug(line, entry);
    } else {
      logger.info(line, entry);
    }
  });

  next();
}
