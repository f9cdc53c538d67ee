/**
 * =============================================================================
 * PRICING MODULE - SCHEMA
 * =============================================================================
 *
 * FORMULA:
 *   price = baseFee + distanceKm * ratePerKm * sizeMultiplier[size]
 *
 * The multiplier scales only the distance charge; the base fee is the same
 * for every size class.
 * =============================================================================
 */

import { z } from 'zod';
import { SizeClass } from '../../core/constants';
import { sizeClassSchema } from '../../shared/utils/validation.utils';

// =============================================================================
// CONFIGURATION
// =============================================================================

export const pricingConfigSchema = z.object({
  baseFee: z.number().finite().nonnegative('Base fee must not be negative'),
  ratePerKm: z.number().finite().nonnegative('Rate per km must not be negative'),
  sizeMultiplier: z.object({
    S: z.number().finite().positive(),
    M: z.number().finite().positive(),
    L: z.number().finite().positive()
  })
});

export type PricingConfig = z.infer<typeof pricingConfigSchema>;

export const DEFAULT_PRICING_CONFIG: PricingConfig = {
  baseFee: 5.0,
  ratePerKm: 1.2,
  sizeMultiplier: { S: 1.0, M: 1.3, L: 1.6 }
};

// =============================================================================
// RESPONSES
// =============================================================================

export interface PriceBreakdown {
  distanceKm: number;
  size: SizeClass;
  baseFee: number;
  ratePerKm: number;
  sizeMultiplier: number;
  /** distanceKm * ratePerKm * sizeMultiplier, 2 decimals */
  distanceCharge: number;
  /** Same value priceFor returns */
  total: number;
}

// =============================================================================
// REQUEST SCHEMAS
// =============================================================================

/**
 * POST /api/v1/pricing/estimate
 */
export const priceEstimateSchema = z.object({
  distanceKm: z.number({
    required_error: 'Distance is required',
    invalid_type_error: 'Distance must be a number'
  }).finite().nonnegative('Distance must not be negative').max(20000, 'Distance cannot exceed 20000 km'),
  size: sizeClassSchema
});

export type PriceEstimateRequest = z.infer<typeof priceEstimateSchema>;
