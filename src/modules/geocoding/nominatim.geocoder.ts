/**
 * =============================================================================
 * NOMINATIM GEOCODER - OpenStreetMap Address Search
 * =============================================================================
 *
 * Keyless geocoding against a Nominatim server (the public one by default).
 *
 * USAGE POLICY:
 * - Every request carries an identifying User-Agent
 * - Autocomplete callers are throttled to 1 request/second per client
 *   (see geocoding.routes.ts)
 *
 * MULTIPLE MATCHES:
 * Up to `candidateLimit` candidates are requested and the one with the
 * highest `importance` wins. Equal importance keeps Nominatim's own order,
 * so the first of the tied candidates is used. A candidate without an
 * importance score ranks below any scored one.
 * =============================================================================
 */

import { GeocodeServiceError, errorMessage } from '../../core/errors/AppError';
import { CircuitBreaker } from '../../shared/resilience/circuit-breaker';
import { logger } from '../../shared/services/logger.service';
import { FetchFn, buildUrl, getJson } from '../../shared/utils/http.utils';
import {
  Coordinate,
  Geocoder,
  NominatimPlace,
  PlaceSuggestion,
  nominatimSearchResponseSchema
} from './geocoding.schema';

export interface NominatimGeocoderOptions {
  baseUrl: string;
  userAgent: string;
  /** Comma-separated ISO codes, e.g. "bg" */
  countryCodes?: string;
  /** Appended to every query, e.g. "Bulgaria" */
  countrySuffix?: string;
  candidateLimit: number;
}

export class NominatimGeocoder implements Geocoder {
  constructor(
    private readonly options: NominatimGeocoderOptions,
    private readonly breaker: CircuitBreaker,
    private readonly fetchFn: FetchFn = fetch
  ) {}

  async geocode(address: string): Promise<Coordinate | null> {
    const candidates = await this.lookup(address, this.options.candidateLimit);

    const best = pickCandidate(candidates);
    if (!best) {
      logger.info('Geocoder found no match', { address });
      return null;
    }

    logger.debug(`📍 Geocoded "${address}" -> ${best.lat},${best.lon} (${candidates.length} candidates)`);
    return { latitude: best.lat, longitude: best.lon };
  }

  async search(query: string, limit: number): Promise<PlaceSuggestion[]> {
    const places = await this.lookup(query, limit);

    return places.map(place => ({
      placeId: place.place_id,
      label: place.display_name,
      latitude: place.lat,
      longitude: place.lon,
      ...(place.importance !== undefined && { importance: place.importance })
    }));
  }

  private async lookup(text: string, limit: number): Promise<NominatimPlace[]> {
    const suffix = this.options.countrySuffix?.trim();
    const url = buildUrl(this.options.baseUrl, 'search', {
      q: suffix ? `${text}, ${suffix}` : text,
      format: 'jsonv2',
      limit,
      countrycodes: this.options.countryCodes
    });

    let body: unknown;
    try {
      body = await this.breaker.execute(signal =>
        getJson(this.fetchFn, url, {
          headers: { 'User-Agent': this.options.userAgent },
          signal
        })
      );
    } catch (error) {
      logger.error(`Nominatim request failed: ${errorMessage(error)}`);
      throw new GeocodeServiceError('Geocoding service unavailable', { reason: errorMessage(error) });
    }

    const parsed = nominatimSearchResponseSchema.safeParse(body);
    if (!parsed.success) {
      logger.error('Nominatim returned an unexpected payload', { issues: parsed.error.issues.length });
      throw new GeocodeServiceError('Geocoding service returned a malformed response');
    }

    return parsed.data;
  }
}

/**
 * Highest importance wins; ties (and unscored candidates) keep service order
 */
export function pickCandidate(candidates: NominatimPlace[]): NominatimPlace | null {
  let best: NominatimPlace | null = null;
  for (const candidate of candidates) {
    if (!best || rank(candidate) > rank(best)) {
      best = candidate;
    }
  }
  return best;
}

function rank(place: NominatimPlace): number {
  return place.importance ?? Number.NEGATIVE_INFINITY;
}
