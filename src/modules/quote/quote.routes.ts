/**
 * =============================================================================
 * QUOTE ROUTES
 * =============================================================================
 *
 * POST /api/v1/quotes
 *
 * Request:
 * {
 *   "pickupAddress": "bul. Vitosha 1, Sofia",
 *   "dropoffAddress": "ul. Knyaz Aleksandar I 10, Plovdiv",
 *   "size": "m",
 *   "includeGeometry": false
 * }
 *
 * Response:
 * {
 *   "success": true,
 *   "data": {
 *     "pickup": { "latitude": 42.6977, "longitude": 23.3219 },
 *     "dropoff": { "latitude": 42.1354, "longitude": 24.7453 },
 *     "distanceKm": 95,
 *     "size": "M",
 *     "price": 153.2
 *   }
 * }
 *
 * Failures are rendered by the error middleware:
 * 400 VALIDATION_ERROR / INVALID_INPUT, 404 ADDRESS_NOT_FOUND,
 * 422 NO_ROUTE_FOUND, 502 GEOCODE_SERVICE_ERROR / ROUTE_SERVICE_ERROR.
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { ApiResponse } from '../../core/responses/ApiResponse';
import { asyncHandler } from '../../shared/middleware/error.middleware';
import { validateRequest } from '../../shared/utils/validation.utils';
import { QuoteRequest, quoteRequestSchema } from './quote.schema';
import { QuoteResolver } from './quote.service';

export interface QuoteRouteDeps {
  resolver: QuoteResolver;
}

export function createQuoteRoutes(deps: QuoteRouteDeps): Router {
  const router = Router();

  router.post('/', validateRequest(quoteRequestSchema), asyncHandler(async (req: Request, res: Response) => {
    const { pickupAddress, dropoffAddress, size, includeGeometry }: QuoteRequest = req.body;

    const quote = await deps.resolver.resolve(pickupAddress, dropoffAddress, size, { includeGeometry });

    ApiResponse.success(res, quote);
  }));

  return router;
}
