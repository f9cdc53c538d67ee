/**
 * =============================================================================
 * ROUTING MODULE - SCHEMAS & TYPES
 * =============================================================================
 *
 * KEY CONCEPTS:
 * - RouteProvider: anything that measures travel distance between two points
 * - RouteResult: distance in km (2 decimals), optional duration and polyline
 * - Geometry is always [latitude, longitude] pairs, whatever order the
 *   upstream service uses
 *
 * EXAMPLE:
 *   Sofia (42.6977, 23.3219) -> Plovdiv (42.1354, 24.7453)
 *   { distanceKm: 145.31, durationMinutes: 101, source: 'osrm' }
 * =============================================================================
 */

import { z } from 'zod';
import { latitudeSchema, longitudeSchema, booleanQuerySchema } from '../../shared/utils/validation.utils';
import type { Coordinate } from '../geocoding/geocoding.schema';

export type RouteSource = 'ors' | 'osrm' | 'haversine';

export type LatLng = [number, number];

export interface RouteResult {
  distanceKm: number;
  durationMinutes?: number;
  geometry?: LatLng[];
  source: RouteSource;
}

export interface RouteOptions {
  includeGeometry?: boolean;
}

/**
 * Measures a route. Implementations throw NoRouteFoundError when the
 * service answered that no route exists, RouteServiceError otherwise.
 */
export interface RouteProvider {
  readonly name: string;
  route(from: Coordinate, to: Coordinate, options?: RouteOptions): Promise<RouteResult>;
}

/** Shape of a cached RouteResult */
export const routeResultSchema: z.ZodType<RouteResult> = z.object({
  distanceKm: z.number().finite().nonnegative(),
  durationMinutes: z.number().finite().nonnegative().optional(),
  geometry: z.array(z.tuple([z.number(), z.number()])).optional(),
  source: z.enum(['ors', 'osrm', 'haversine'])
});

// =============================================================================
// UPSTREAM RESPONSES
// =============================================================================

/** GeoJSON positions are [longitude, latitude] */
const lngLatSchema = z.tuple([z.number(), z.number()]).rest(z.number());

const lineStringSchema = z.object({
  type: z.literal('LineString'),
  coordinates: z.array(lngLatSchema)
});

export const osrmRouteResponseSchema = z.object({
  code: z.string(),
  message: z.string().optional(),
  routes: z.array(z.object({
    distance: z.number().finite().nonnegative(),
    duration: z.number().finite().nonnegative().optional(),
    geometry: lineStringSchema.optional()
  })).default([])
});

export const orsDirectionsResponseSchema = z.object({
  features: z.array(z.object({
    properties: z.object({
      summary: z.object({
        // ORS leaves out zero values, e.g. for identical start and end
        distance: z.number().finite().nonnegative().default(0),
        duration: z.number().finite().nonnegative().default(0)
      })
    }),
    geometry: lineStringSchema.optional()
  }))
});

/** Error bodies of both services, used to tell "no route" from an outage */
export const osrmErrorBodySchema = z.object({ code: z.string() });
export const orsErrorBodySchema = z.object({
  error: z.object({ code: z.number() })
});

// =============================================================================
// HTTP
// =============================================================================

export const routeQuerySchema = z.object({
  o_lat: latitudeSchema,
  o_lon: longitudeSchema,
  d_lat: latitudeSchema,
  d_lon: longitudeSchema,
  geometry: booleanQuerySchema
});

// =============================================================================
// HELPERS
// =============================================================================

/**
 * "lon,lat" at 6 decimals (about 0.1 m), never in exponent notation:
 * `${1e-7}` is "1e-7", which neither service parses
 */
export function lonLatParam(c: Coordinate): string {
  const fixed = (v: number): string => String(Number(v.toFixed(6)));
  return `${fixed(c.longitude)},${fixed(c.latitude)}`;
}

export function toLatLngPath(coordinates: ReadonlyArray<readonly [number, number, ...number[]]>): LatLng[] {
  return coordinates.map(([lon, lat]): LatLng => [lat, lon]);
}
