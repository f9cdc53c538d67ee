/**
 * =============================================================================
 * PRICING ROUTES
 * =============================================================================
 *
 * POST /api/v1/pricing/estimate  { "distanceKm": 95, "size": "M" }
 *   -> price breakdown without geocoding or routing
 * GET  /api/v1/pricing/config
 *   -> current base fee, rate and size multipliers
 * =============================================================================
 */

import { Router, Request, Response } from 'express';
import { ApiResponse } from '../../core/responses/ApiResponse';
import { validateRequest } from '../../shared/utils/validation.utils';
import { PriceEstimateRequest, priceEstimateSchema } from './pricing.schema';
import { PricingService } from './pricing.service';

export interface PricingRouteDeps {
  pricing: PricingService;
}

export function createPricingRoutes(deps: PricingRouteDeps): Router {
  const router = Router();

  router.post('/estimate', validateRequest(priceEstimateSchema), (req: Request, res: Response) => {
    const { distanceKm, size }: PriceEstimateRequest = req.body;
    ApiResponse.success(res, deps.pricing.breakdown(distanceKm, size));
  });

  router.get('/config', (_req: Request, res: Response) => {
    ApiResponse.success(res, deps.pricing.getConfig());
  });

  return router;
}
