/**
 * =============================================================================
 * GEOCODING MODULE - SCHEMAS & TYPES
 * =============================================================================
 *
 * KEY CONCEPTS:
 * - Coordinate: WGS-84 point, latitude first
 * - Geocoder: anything that turns free text into a Coordinate
 * - PlaceSuggestion: one autocomplete entry for the address form
 *
 * Nominatim answers with lat/lon as strings; the response schema below
 * converts and range-checks them so callers only ever see numbers.
 * =============================================================================
 */

import { z } from 'zod';

export interface Coordinate {
  latitude: number;
  longitude: number;
}

export interface PlaceSuggestion {
  placeId: string;
  label: string;
  latitude: number;
  longitude: number;
  importance?: number;
}

/**
 * Resolves addresses. Implementations throw GeocodeServiceError on
 * network/timeout/malformed responses and return null when nothing matched.
 */
export interface Geocoder {
  geocode(address: string): Promise<Coordinate | null>;
  search(query: string, limit: number): Promise<PlaceSuggestion[]>;
}

// =============================================================================
// CACHED VALUES
// =============================================================================

export const coordinateSchema: z.ZodType<Coordinate> = z.object({
  latitude: z.number().finite().min(-90).max(90),
  longitude: z.number().finite().min(-180).max(180)
});

export const placeSuggestionsSchema: z.ZodType<PlaceSuggestion[]> = z.array(z.object({
  placeId: z.string(),
  label: z.string(),
  latitude: z.number().finite().min(-90).max(90),
  longitude: z.number().finite().min(-180).max(180),
  importance: z.number().finite().optional()
}));

// =============================================================================
// NOMINATIM RESPONSE
// =============================================================================

const numericString = z.union([z.string().trim().min(1), z.number()]).transform(Number);

export const nominatimPlaceSchema = z.object({
  place_id: z.union([z.number(), z.string()]).transform(String),
  display_name: z.string(),
  lat: numericString.pipe(z.number().finite().min(-90).max(90)),
  lon: numericString.pipe(z.number().finite().min(-180).max(180)),
  importance: z.number().finite().optional()
});

export const nominatimSearchResponseSchema = z.array(nominatimPlaceSchema);

export type NominatimPlace = z.infer<typeof nominatimPlaceSchema>;

// =============================================================================
// HTTP
// =============================================================================

export const placeSearchQuerySchema = z.object({
  q: z.string().trim().max(200).default(''),
  limit: z.coerce.number().int().min(1).max(10).optional()
});
