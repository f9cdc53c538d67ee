/**
 * =============================================================================
 * GEOCODING ROUTES - Address Autocomplete
 * =============================================================================
 *
 * ENDPOINTS:
 * - GET /api/v1/geocoding/search?q=  - suggestions for the address form
 * - GET /api/v1/geocoding/status     - geocoder backend and circuit state
 *
 * The autocomplete endpoint is deliberately forgiving: the form calls it on
 * every keystroke, so short queries and upstream failures answer with an
 * empty list instead of an error.
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { ApiResponse } from '../../core/responses/ApiResponse';
import { RateLimitError, errorMessage } from '../../core/errors/AppError';
import {
  AUTOCOMPLETE_MAX_RESULTS,
  AUTOCOMPLETE_THROTTLE_MS,
  HTTP_STATUS,
  MIN_AUTOCOMPLETE_QUERY_LENGTH
} from '../../core/constants';
import { CircuitBreaker } from '../../shared/resilience/circuit-breaker';
import { asyncHandler } from '../../shared/middleware/error.middleware';
import { logger } from '../../shared/services/logger.service';
import { validateSchema } from '../../shared/utils/validation.utils';
import { Geocoder, placeSearchQuerySchema } from './geocoding.schema';

// =============================================================================
// PER-CLIENT THROTTLE
// =============================================================================

/**
 * At most one call per interval per client key.
 * Stale entries are pruned once the map grows past `maxEntries`.
 */
export class ClientThrottle {
  private lastSeen = new Map<string, number>();

  constructor(
    private readonly intervalMs: number,
    private readonly maxEntries: number = 10000
  ) {}

  tryAcquire(key: string, now: number = Date.now()): boolean {
    const last = this.lastSeen.get(key);
    if (last !== undefined && now - last < this.intervalMs) {
      return false;
    }

    if (this.lastSeen.size >= this.maxEntries) {
      this.prune(now);
    }
    this.lastSeen.set(key, now);
    return true;
  }

  private prune(now: number): void {
    for (const [key, time] of this.lastSeen.entries()) {
      if (now - time >= this.intervalMs) {
        this.lastSeen.delete(key);
      }
    }
  }
}

// =============================================================================
// ROUTES
// =============================================================================

export interface GeocodingRouteDeps {
  geocoder: Geocoder;
  breaker: CircuitBreaker;
  provider: string;
  throttle?: ClientThrottle;
}

export function createGeocodingRoutes(deps: GeocodingRouteDeps): Router {
  const router = Router();
  const throttle = deps.throttle ?? new ClientThrottle(AUTOCOMPLETE_THROTTLE_MS);

  /**
   * GET /api/v1/geocoding/search?q=Vitosha
   *
   * Response:
   * {
   *   "success": true,
   *   "data": [
   *     { "placeId": "123", "label": "Vitosha, Sofia, Bulgaria", "latitude": 42.56, "longitude": 23.28 }
   *   ]
   * }
   */
  router.get('/search', asyncHandler(async (req: Request, res: Response) => {
    const clientKey = req.ip ?? 'unknown';
    if (!throttle.tryAcquire(clientKey)) {
      const error = new RateLimitError('Autocomplete is limited to one request per second', 1);
      res.status(HTTP_STATUS.TOO_MANY_REQUESTS).json({ ...error.toJSON(), data: [] });
      return;
    }

    const { q, limit } = validateSchema(placeSearchQuerySchema, req.query);

    if (q.length < MIN_AUTOCOMPLETE_QUERY_LENGTH) {
      ApiResponse.success(res, []);
      return;
    }

    try {
      const suggestions = await deps.geocoder.search(q, limit ?? AUTOCOMPLETE_MAX_RESULTS);
      logger.debug(`Place search: "${q}" returned ${suggestions.length} results`);
      ApiResponse.success(res, suggestions);
    } catch (error) {
      logger.warn(`Place search failed, answering with no suggestions: ${errorMessage(error)}`);
      ApiResponse.success(res, []);
    }
  }));

  /**
   * GET /api/v1/geocoding/status
   */
  router.get('/status', (_req: Request, res: Response) => {
    ApiResponse.success(res, {
      provider: deps.provider,
      circuit: deps.breaker.getStats()
    });
  });

  return router;
}
