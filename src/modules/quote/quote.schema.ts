/**
 * =============================================================================
 * QUOTE MODULE - SCHEMA
 * =============================================================================
 *
 * A Quote is created per request, frozen, returned and forgotten. Nothing
 * here is persisted.
 * =============================================================================
 */

import { z } from 'zod';
import { SizeClass } from '../../core/constants';
import { addressSchema, sizeClassSchema } from '../../shared/utils/validation.utils';
import type { Coordinate } from '../geocoding/geocoding.schema';
import type { LatLng } from '../routing/routing.schema';

export interface Quote {
  readonly pickup: Readonly<Coordinate>;
  readonly dropoff: Readonly<Coordinate>;
  readonly distanceKm: number;
  readonly size: SizeClass;
  readonly price: number;
  /** Route polyline, only when requested */
  readonly geometry?: ReadonlyArray<LatLng>;
}

export interface ResolveOptions {
  includeGeometry?: boolean;
}

/**
 * POST /api/v1/quotes
 */
export const quoteRequestSchema = z.object({
  pickupAddress: addressSchema,
  dropoffAddress: addressSchema,
  size: sizeClassSchema,
  includeGeometry: z.boolean().optional().default(false)
});

export type QuoteRequest = z.infer<typeof quoteRequestSchema>;
