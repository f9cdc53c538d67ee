/**
 * =============================================================================
 * TEST FAKES - In-process stand-ins for the map services
 * =============================================================================
 */

import { FetchFn, FetchInit, FetchResponse } from '../../shared/utils/http.utils';
import { Coordinate, Geocoder, PlaceSuggestion } from '../../modules/geocoding/geocoding.schema';
import { RouteOptions, RouteProvider, RouteResult } from '../../modules/routing/routing.schema';

export function jsonResponse(body: unknown, status: number = 200): FetchResponse {
  return {
    ok: status >= 200 && status < 300,
    status,
    json: async () => body
  };
}

export interface RecordedRequest {
  url: URL;
  init: FetchInit;
}

/**
 * fetch stand-in that records every request and answers through `handler`
 */
export function fakeFetch(handler: (url: URL) => FetchResponse | Promise<FetchResponse>): {
  fetchFn: FetchFn;
  requests: RecordedRequest[];
} {
  const requests: RecordedRequest[] = [];
  const fetchFn: FetchFn = async (url, init) => {
    const parsed = new URL(url);
    requests.push({ url: parsed, init });
    return handler(parsed);
  };
  return { fetchFn, requests };
}

/**
 * Geocoder answering from a fixed table; unknown addresses have no match
 */
export class StubGeocoder implements Geocoder {
  readonly calls: string[] = [];

  constructor(private readonly table: Record<string, Coordinate | Error>) {}

  async geocode(address: string): Promise<Coordinate | null> {
    this.calls.push(address);
    const entry = this.table[address];
    if (entry instanceof Error) throw entry;
    return entry ?? null;
  }

  async search(query: string, limit: number): Promise<PlaceSuggestion[]> {
    this.calls.push(query);
    const entry = this.table[query];
    if (entry instanceof Error) throw entry;
    if (!entry) return [];
    return [{ placeId: '1', label: query, ...entry }].slice(0, limit);
  }
}

/**
 * Route provider returning a fixed result or throwing a fixed error
 */
export class StubRouteProvider implements RouteProvider {
  readonly calls: Array<{ from: Coordinate; to: Coordinate; options?: RouteOptions }> = [];

  constructor(
    readonly name: string,
    private readonly outcome: RouteResult | Error
  ) {}

  async route(from: Coordinate, to: Coordinate, options?: RouteOptions): Promise<RouteResult> {
    this.calls.push({ from, to, options });
    if (this.outcome instanceof Error) throw this.outcome;
    return this.outcome;
  }
}

// =============================================================================
// SHARED FIXTURES
// =============================================================================

export const SOFIA: Coordinate = { latitude: 42.6977, longitude: 23.3219 };
export const PLOVDIV: Coordinate = { latitude: 42.1354, longitude: 24.7453 };

export const TEST_PRICING = {
  baseFee: 5.0,
  ratePerKm: 1.2,
  sizeMultiplier: { S: 1.0, M: 1.3, L: 1.6 }
};
