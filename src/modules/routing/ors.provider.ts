/**
 * =============================================================================
 * OPENROUTESERVICE ROUTE PROVIDER
 * =============================================================================
 *
 * Driving distance from the OpenRouteService directions API. Needs an API
 * key; the composition root leaves this provider out when none is set.
 *
 * ORS error codes 2009 (route not found) and 2010 (point not routable)
 * mean there is no road route, everything else is a service failure.
 * =============================================================================
 */

import { NoRouteFoundError, RouteServiceError, errorMessage } from '../../core/errors/AppError';
import { CircuitBreaker } from '../../shared/resilience/circuit-breaker';
import { logger } from '../../shared/services/logger.service';
import { roundTo } from '../../shared/utils/geospatial.utils';
import { FetchFn, HttpStatusError, buildUrl, getJson, redactUrl } from '../../shared/utils/http.utils';
import type { Coordinate } from '../geocoding/geocoding.schema';
import {
  RouteOptions,
  RouteProvider,
  RouteResult,
  orsDirectionsResponseSchema,
  orsErrorBodySchema,
  lonLatParam,
  toLatLngPath
} from './routing.schema';

const NO_ROUTE_ERROR_CODES = new Set([2009, 2010]);

export interface OrsRouteProviderOptions {
  baseUrl: string;
  apiKey: string;
  profile?: string;
}

export class OrsRouteProvider implements RouteProvider {
  readonly name = 'ors';

  constructor(
    private readonly options: OrsRouteProviderOptions,
    private readonly breaker: CircuitBreaker,
    private readonly fetchFn: FetchFn = fetch
  ) {}

  async route(from: Coordinate, to: Coordinate, options: RouteOptions = {}): Promise<RouteResult> {
    const profile = this.options.profile ?? 'driving-car';
    const url = buildUrl(this.options.baseUrl, `v2/directions/${profile}`, {
      api_key: this.options.apiKey,
      start: lonLatParam(from),
      end: lonLatParam(to)
    });

    let body: unknown;
    try {
      body = await this.breaker.execute(signal => getJson(this.fetchFn, url, { signal }));
    } catch (error) {
      if (error instanceof HttpStatusError && isNoRouteBody(error.body)) {
        throw new NoRouteFoundError(undefined, { provider: this.name });
      }
      logger.error(`ORS request failed: ${errorMessage(error)}`, { url: redactUrl(url) });
      throw new RouteServiceError('Routing service unavailable', { provider: this.name, reason: errorMessage(error) });
    }

    const parsed = orsDirectionsResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new RouteServiceError('Routing service returned a malformed response', { provider: this.name });
    }

    const [feature] = parsed.data.features;
    if (!feature) {
      throw new NoRouteFoundError(undefined, { provider: this.name });
    }

    const { distance, duration } = feature.properties.summary;
    const distanceKm = roundTo(distance / 1000, 2);
    logger.debug(`🛣️ ORS route: ${distanceKm} km`);

    return {
      distanceKm,
      durationMinutes: Math.round(duration / 60),
      ...(options.includeGeometry && feature.geometry && { geometry: toLatLngPath(feature.geometry.coordinates) }),
      source: 'ors'
    };
  }
}

function isNoRouteBody(body: unknown): boolean {
  const parsed = orsErrorBodySchema.safeParse(body);
  return parsed.success && NO_ROUTE_ERROR_CODES.has(parsed.data.error.code);
}
