/**
 * =============================================================================
 * OSRM ROUTE PROVIDER
 * =============================================================================
 *
 * Driving distance from an OSRM server (the public demo server by default,
 * no API key). OSRM reports "NoRoute" when the points are not connected by
 * road and "NoSegment" when a point cannot be snapped to any road; both are
 * answered with NoRouteFoundError.
 * =============================================================================
 */

import { NoRouteFoundError, RouteServiceError, errorMessage } from '../../core/errors/AppError';
import { CircuitBreaker } from '../../shared/resilience/circuit-breaker';
import { logger } from '../../shared/services/logger.service';
import { roundTo } from '../../shared/utils/geospatial.utils';
import { FetchFn, HttpStatusError, buildUrl, getJson } from '../../shared/utils/http.utils';
import type { Coordinate } from '../geocoding/geocoding.schema';
import {
  RouteOptions,
  RouteProvider,
  RouteResult,
  osrmErrorBodySchema,
  osrmRouteResponseSchema,
  lonLatParam,
  toLatLngPath
} from './routing.schema';

const NO_ROUTE_CODES = new Set(['NoRoute', 'NoSegment']);

export interface OsrmRouteProviderOptions {
  baseUrl: string;
  profile?: string;
}

export class OsrmRouteProvider implements RouteProvider {
  readonly name = 'osrm';

  constructor(
    private readonly options: OsrmRouteProviderOptions,
    private readonly breaker: CircuitBreaker,
    private readonly fetchFn: FetchFn = fetch
  ) {}

  async route(from: Coordinate, to: Coordinate, options: RouteOptions = {}): Promise<RouteResult> {
    const profile = this.options.profile ?? 'driving';
    const path = `route/v1/${profile}/${lonLatParam(from)};${lonLatParam(to)}`;
    const url = buildUrl(
      this.options.baseUrl,
      path,
      options.includeGeometry ? { overview: 'full', geometries: 'geojson' } : { overview: 'false' }
    );

    let body: unknown;
    try {
      body = await this.breaker.execute(signal => getJson(this.fetchFn, url, { signal }));
    } catch (error) {
      if (error instanceof HttpStatusError && isNoRouteBody(error.body)) {
        throw new NoRouteFoundError(undefined, { provider: this.name });
      }
      logger.error(`OSRM request failed: ${errorMessage(error)}`);
      throw new RouteServiceError('Routing service unavailable', { provider: this.name, reason: errorMessage(error) });
    }

    const parsed = osrmRouteResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new RouteServiceError('Routing service returned a malformed response', { provider: this.name });
    }

    const { code, routes } = parsed.data;
    if (NO_ROUTE_CODES.has(code)) {
      throw new NoRouteFoundError(undefined, { provider: this.name });
    }
    if (code !== 'Ok') {
      throw new RouteServiceError(`Routing service answered ${code}`, { provider: this.name });
    }

    const [best] = routes;
    if (!best) {
      throw new NoRouteFoundError(undefined, { provider: this.name });
    }

    const distanceKm = roundTo(best.distance / 1000, 2);
    logger.debug(`🛣️ OSRM route: ${distanceKm} km`);

    return {
      distanceKm,
      ...(best.duration !== undefined && { durationMinutes: Math.round(best.duration / 60) }),
      ...(options.includeGeometry && best.geometry && { geometry: toLatLngPath(best.geometry.coordinates) }),
      source: 'osrm'
    };
  }
}

function isNoRouteBody(body: unknown): boolean {
  const parsed = osrmErrorBodySchema.safeParse(body);
  return parsed.success && NO_ROUTE_CODES.has(parsed.data.code);
}
