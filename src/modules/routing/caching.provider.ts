/**
 * RouteProvider decorator backed by the shared cache.
 *
 * Keys use coordinates rounded to 5 decimals (about 1 m). Straight-line
 * results are never stored, so a routing outage does not outlive itself in
 * the cache.
 */

import { CacheService } from '../../shared/services/cache.service';
import { logger } from '../../shared/services/logger.service';
import type { Coordinate } from '../geocoding/geocoding.schema';
import { RouteOptions, RouteProvider, RouteResult, routeResultSchema } from './routing.schema';

export function routeCacheKey(from: Coordinate, to: Coordinate, includeGeometry: boolean): string {
  const point = (c: Coordinate): string => `${c.latitude.toFixed(5)},${c.longitude.toFixed(5)}`;
  return `route:${point(from)};${point(to)}:${includeGeometry ? 'full' : 'distance'}`;
}

export class CachingRouteProvider implements RouteProvider {
  readonly name: string;

  constructor(
    private readonly inner: RouteProvider,
    private readonly cache: CacheService,
    private readonly ttlSeconds: number
  ) {
    this.name = inner.name;
  }

  async route(from: Coordinate, to: Coordinate, options: RouteOptions = {}): Promise<RouteResult> {
    const key = routeCacheKey(from, to, options.includeGeometry === true);

    const cached = await this.cache.get(key, routeResultSchema);
    if (cached) {
      logger.debug(`📍 Route cache HIT: ${cached.distanceKm} km`);
      return cached;
    }

    const result = await this.inner.route(from, to, options);
    if (result.source !== 'haversine') {
      await this.cache.set(key, result, this.ttlSeconds);
    }
    return result;
  }
}
