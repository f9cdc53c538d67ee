/**
 * =============================================================================
 * ROUTING ROUTES
 * =============================================================================
 *
 * GET /api/v1/routing/route?o_lat=42.6977&o_lon=23.3219&d_lat=42.1354&d_lon=24.7453&geometry=true
 *
 * Response:
 * {
 *   "success": true,
 *   "data": {
 *     "distanceKm": 145.31,
 *     "durationMinutes": 101,
 *     "geometry": [[42.6977, 23.3219], ...],
 *     "source": "osrm"
 *   }
 * }
 *
 * Used by the front end to draw the route on its map.
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { ApiResponse } from '../../core/responses/ApiResponse';
import { asyncHandler } from '../../shared/middleware/error.middleware';
import { validateSchema } from '../../shared/utils/validation.utils';
import { RouteProvider, routeQuerySchema } from './routing.schema';

export interface RoutingRouteDeps {
  routeProvider: RouteProvider;
}

export function createRoutingRoutes(deps: RoutingRouteDeps): Router {
  const router = Router();

  router.get('/route', asyncHandler(async (req: Request, res: Response) => {
    const query = validateSchema(routeQuerySchema, req.query);

    const result = await deps.routeProvider.route(
      { latitude: query.o_lat, longitude: query.o_lon },
      { latitude: query.d_lat, longitude: query.d_lon },
      { includeGeometry: query.geometry }
    );

    ApiResponse.success(res, result);
  }));

  return router;
}
