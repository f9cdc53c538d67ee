/**
 * Geocoder decorator that remembers successful lookups.
 *
 * Keys are the trimmed, lower-cased text, so "Sofia " and "sofia" share an
 * entry. Misses are not stored: a newly mapped address is found on the
 * next request instead of after the TTL.
 */

import { CacheService } from '../../shared/services/cache.service';
import { logger } from '../../shared/services/logger.service';
import {
  Coordinate,
  Geocoder,
  PlaceSuggestion,
  coordinateSchema,
  placeSuggestionsSchema
} from './geocoding.schema';

export function normalizeAddress(address: string): string {
  return address.trim().replace(/\s+/g, ' ').toLowerCase();
}

export class CachingGeocoder implements Geocoder {
  constructor(
    private readonly inner: Geocoder,
    private readonly cache: CacheService,
    private readonly ttlSeconds: number
  ) {}

  async geocode(address: string): Promise<Coordinate | null> {
    const key = `geocode:${normalizeAddress(address)}`;

    const cached = await this.cache.get(key, coordinateSchema);
    if (cached) {
      logger.debug(`📍 Geocode cache HIT: ${address}`);
      return cached;
    }

    const result = await this.inner.geocode(address);
    if (result) {
      await this.cache.set(key, result, this.ttlSeconds);
    }
    return result;
  }

  async search(query: string, limit: number): Promise<PlaceSuggestion[]> {
    const key = `search:${limit}:${normalizeAddress(query)}`;

    const cached = await this.cache.get(key, placeSuggestionsSchema);
    if (cached) return cached;

    const results = await this.inner.search(query, limit);
    if (results.length > 0) {
      await this.cache.set(key, results, this.ttlSeconds);
    }
    return results;
  }
}
