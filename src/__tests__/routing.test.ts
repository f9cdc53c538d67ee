/**
 * =============================================================================
 * ROUTING - Providers, fallback chain and cache
 * =============================================================================
 */

import { OsrmRouteProvider } from '../modules/routing/osrm.provider';
import { OrsRouteProvider } from '../modules/routing/ors.provider';
import { HaversineRouteProvider } from '../modules/routing/haversine.provider';
import { FallbackRouteProvider } from '../modules/routing/fallback.provider';
import { CachingRouteProvider, routeCacheKey } from '../modules/routing/caching.provider';
import { CircuitBreaker, CircuitState } from '../shared/resilience/circuit-breaker';
import { isUpstreamFailure } from '../shared/utils/http.utils';
import { NoRouteFoundError, RouteServiceError } from '../core/errors/AppError';
import { createMemoryCache } from '../container';
import { PLOVDIV, SOFIA, StubRouteProvider, fakeFetch, jsonResponse } from './helpers/fakes';

// =============================================================================
// MOCK SETUP
// =============================================================================

jest.mock('../shared/services/logger.service', () => ({
  logger: {
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    debug: jest.fn(),
  },
}));

// =============================================================================
// HELPERS
// =============================================================================

function newBreaker(name: string): CircuitBreaker {
  return new CircuitBreaker({ name, requestTimeout: 1000, isFailure: isUpstreamFailure });
}

const OSRM_OK = {
  code: 'Ok',
  routes: [{
    distance: 95000,
    duration: 3960,
    geometry: {
      type: 'LineString',
      coordinates: [[23.3219, 42.6977], [24.0, 42.4], [24.7453, 42.1354]]
    }
  }]
};

// =============================================================================
// OSRM
// =============================================================================

describe('OsrmRouteProvider', () => {
  it('requests driving distance with lon,lat ordering and no overview', async () => {
    const { fetchFn, requests } = fakeFetch(() => jsonResponse(OSRM_OK));
    const provider = new OsrmRouteProvider({ baseUrl: 'http://osrm.test' }, newBreaker('osrm'), fetchFn);

    const result = await provider.route(SOFIA, PLOVDIV);

    expect(requests[0]?.url.pathname).toBe('/route/v1/driving/23.3219,42.6977;24.7453,42.1354');
    expect(requests[0]?.url.searchParams.get('overview')).toBe('false');
    expect(result).toEqual({ distanceKm: 95, durationMinutes: 66, source: 'osrm' });
  });

  it('writes tiny and long coordinates in fixed notation', async () => {
    const { fetchFn, requests } = fakeFetch(() => jsonResponse(OSRM_OK));
    const provider = new OsrmRouteProvider({ baseUrl: 'http://osrm.test' }, newBreaker('osrm'), fetchFn);

    await provider.route({ latitude: 1e-7, longitude: -0.0000004 }, { latitude: 42.13541234, longitude: 24.7453 });

    expect(requests[0]?.url.pathname).toBe('/route/v1/driving/0,0;24.7453,42.135412');
  });

  it('returns the route polyline as [lat, lon] pairs when asked', async () => {
    const { fetchFn, requests } = fakeFetch(() => jsonResponse(OSRM_OK));
    const provider = new OsrmRouteProvider({ baseUrl: 'http://osrm.test' }, newBreaker('osrm'), fetchFn);

    const result = await provider.route(SOFIA, PLOVDIV, { includeGeometry: true });

    expect(requests[0]?.url.searchParams.get('overview')).toBe('full');
    expect(requests[0]?.url.searchParams.get('geometries')).toBe('geojson');
    expect(result.geometry).toEqual([[42.6977, 23.3219], [42.4, 24.0], [42.1354, 24.7453]]);
  });

  it('rounds the distance to two decimals', async () => {
    const { fetchFn } = fakeFetch(() => jsonResponse({ code: 'Ok', routes: [{ distance: 145306.7, duration: 6060 }] }));
    const provider = new OsrmRouteProvider({ baseUrl: 'http://osrm.test' }, newBreaker('osrm'), fetchFn);

    await expect(provider.route(SOFIA, PLOVDIV)).resolves.toMatchObject({ distanceKm: 145.31, durationMinutes: 101 });
  });

  it('reports NoRoute in an error response as NoRouteFoundError', async () => {
    const { fetchFn } = fakeFetch(() => jsonResponse({ code: 'NoRoute', message: 'Impossible route' }, 400));
    const breaker = newBreaker('osrm');
    const provider = new OsrmRouteProvider({ baseUrl: 'http://osrm.test' }, breaker, fetchFn);

    await expect(provider.route(SOFIA, PLOVDIV)).rejects.toBeInstanceOf(NoRouteFoundError);
    expect(breaker.getStats().failures).toBe(0);
  });

  it('reports NoSegment in a successful response as NoRouteFoundError', async () => {
    const { fetchFn } = fakeFetch(() => jsonResponse({ code: 'NoSegment' }));
    const provider = new OsrmRouteProvider({ baseUrl: 'http://osrm.test' }, newBreaker('osrm'), fetchFn);

    await expect(provider.route(SOFIA, PLOVDIV)).rejects.toBeInstanceOf(NoRouteFoundError);
  });

  it('reports a server error as RouteServiceError', async () => {
    const { fetchFn } = fakeFetch(() => jsonResponse({ message: 'busy' }, 502));
    const breaker = newBreaker('osrm');
    const provider = new OsrmRouteProvider({ baseUrl: 'http://osrm.test' }, breaker, fetchFn);

    await expect(provider.route(SOFIA, PLOVDIV)).rejects.toBeInstanceOf(RouteServiceError);
    expect(breaker.getStats().failures).toBe(1);
  });

  it('reports an unexpected status code as RouteServiceError', async () => {
    const { fetchFn } = fakeFetch(() => jsonResponse({ code: 'TooBig' }));
    const provider = new OsrmRouteProvider({ baseUrl: 'http://osrm.test' }, newBreaker('osrm'), fetchFn);

    await expect(provider.route(SOFIA, PLOVDIV)).rejects.toThrow('Routing service answered TooBig');
  });

  it('reports a malformed payload as RouteServiceError', async () => {
    const { fetchFn } = fakeFetch(() => jsonResponse({ routes: 'none' }));
    const provider = new OsrmRouteProvider({ baseUrl: 'http://osrm.test' }, newBreaker('osrm'), fetchFn);

    await expect(provider.route(SOFIA, PLOVDIV)).rejects.toBeInstanceOf(RouteServiceError);
  });
});

// =============================================================================
// OPENROUTESERVICE
// =============================================================================

describe('OrsRouteProvider', () => {
  const ORS_OK = {
    features: [{
      properties: { summary: { distance: 95000, duration: 3960 } },
      geometry: { type: 'LineString', coordinates: [[23.3219, 42.6977], [24.7453, 42.1354]] }
    }]
  };

  it('sends the key and lon,lat endpoints', async () => {
    const { fetchFn, requests } = fakeFetch(() => jsonResponse(ORS_OK));
    const provider = new OrsRouteProvider(
      { baseUrl: 'http://ors.test', apiKey: 'test-key' },
      newBreaker('ors'),
      fetchFn
    );

    const result = await provider.route(SOFIA, PLOVDIV);

    const url = requests[0]?.url;
    expect(url?.pathname).toBe('/v2/directions/driving-car');
    expect(url?.searchParams.get('api_key')).toBe('test-key');
    expect(url?.searchParams.get('start')).toBe('23.3219,42.6977');
    expect(url?.searchParams.get('end')).toBe('24.7453,42.1354');
    expect(result).toEqual({ distanceKm: 95, durationMinutes: 66, source: 'ors' });
  });

  it('returns geometry only when asked', async () => {
    const { fetchFn } = fakeFetch(() => jsonResponse(ORS_OK));
    const provider = new OrsRouteProvider({ baseUrl: 'http://ors.test', apiKey: 'test-key' }, newBreaker('ors'), fetchFn);

    const result = await provider.route(SOFIA, PLOVDIV, { includeGeometry: true });

    expect(result.geometry).toEqual([[42.6977, 23.3219], [42.1354, 24.7453]]);
  });

  it('treats a zero-length summary as a 0 km route', async () => {
    const { fetchFn } = fakeFetch(() => jsonResponse({ features: [{ properties: { summary: {} } }] }));
    const provider = new OrsRouteProvider({ baseUrl: 'http://ors.test', apiKey: 'test-key' }, newBreaker('ors'), fetchFn);

    await expect(provider.route(SOFIA, SOFIA)).resolves.toEqual({ distanceKm: 0, durationMinutes: 0, source: 'ors' });
  });

  it.each([2009, 2010])('maps ORS error %p to NoRouteFoundError', async (code) => {
    const { fetchFn } = fakeFetch(() => jsonResponse({ error: { code, message: 'no route' } }, 404));
    const provider = new OrsRouteProvider({ baseUrl: 'http://ors.test', apiKey: 'test-key' }, newBreaker('ors'), fetchFn);

    await expect(provider.route(SOFIA, PLOVDIV)).rejects.toBeInstanceOf(NoRouteFoundError);
  });

  it('maps other failures to RouteServiceError', async () => {
    const { fetchFn } = fakeFetch(() => jsonResponse({ error: { code: 2099 } }, 500));
    const provider = new OrsRouteProvider({ baseUrl: 'http://ors.test', apiKey: 'test-key' }, newBreaker('ors'), fetchFn);

    await expect(provider.route(SOFIA, PLOVDIV)).rejects.toMatchObject({
      code: 'ROUTE_SERVICE_ERROR',
      details: { provider: 'ors', reason: 'Upstream responded with HTTP 500' }
    });
  });

  it('treats an empty feature list as no route', async () => {
    const { fetchFn } = fakeFetch(() => jsonResponse({ features: [] }));
    const provider = new OrsRouteProvider({ baseUrl: 'http://ors.test', apiKey: 'test-key' }, newBreaker('ors'), fetchFn);

    await expect(provider.route(SOFIA, PLOVDIV)).rejects.toBeInstanceOf(NoRouteFoundError);
  });
});

// =============================================================================
// HAVERSINE
// =============================================================================

describe('HaversineRouteProvider', () => {
  const provider = new HaversineRouteProvider();

  it('measures the great-circle distance', async () => {
    const result = await provider.route(SOFIA, PLOVDIV);

    expect(result.source).toBe('haversine');
    expect(result.distanceKm).toBeGreaterThan(120);
    expect(result.distanceKm).toBeLessThan(140);
    expect(result.geometry).toBeUndefined();
  });

  it('gives 0 km for the same point', async () => {
    await expect(provider.route(SOFIA, SOFIA)).resolves.toEqual({ distanceKm: 0, source: 'haversine' });
  });

  it('draws a straight segment as geometry', async () => {
    const result = await provider.route(SOFIA, PLOVDIV, { includeGeometry: true });

    expect(result.geometry).toEqual([[42.6977, 23.3219], [42.1354, 24.7453]]);
  });
});

// =============================================================================
// FALLBACK CHAIN
// =============================================================================

describe('FallbackRouteProvider', () => {
  const ok = { distanceKm: 95, source: 'osrm' as const };

  it('needs at least one provider', () => {
    expect(() => new FallbackRouteProvider([])).toThrow('FallbackRouteProvider needs at least one provider');
  });

  it('names itself after the chain', () => {
    const chain = new FallbackRouteProvider([
      new StubRouteProvider('ors', ok),
      new StubRouteProvider('osrm', ok)
    ]);

    expect(chain.name).toBe('ors>osrm');
  });

  it('uses the first provider that answers', async () => {
    const first = new StubRouteProvider('ors', ok);
    const second = new StubRouteProvider('osrm', ok);

    await expect(new FallbackRouteProvider([first, second]).route(SOFIA, PLOVDIV)).resolves.toEqual(ok);
    expect(second.calls).toHaveLength(0);
  });

  it('moves on after a service failure', async () => {
    const first = new StubRouteProvider('ors', new RouteServiceError('down'));
    const second = new StubRouteProvider('osrm', ok);

    await expect(new FallbackRouteProvider([first, second]).route(SOFIA, PLOVDIV)).resolves.toEqual(ok);
    expect(first.calls).toHaveLength(1);
    expect(second.calls).toHaveLength(1);
  });

  it('stops at NoRouteFoundError', async () => {
    const first = new StubRouteProvider('ors', new NoRouteFoundError());
    const second = new StubRouteProvider('osrm', ok);

    await expect(new FallbackRouteProvider([first, second]).route(SOFIA, PLOVDIV)).rejects.toBeInstanceOf(NoRouteFoundError);
    expect(second.calls).toHaveLength(0);
  });

  it('throws the last failure when every provider fails', async () => {
    const last = new RouteServiceError('osrm down');
    const chain = new FallbackRouteProvider([
      new StubRouteProvider('ors', new RouteServiceError('ors down')),
      new StubRouteProvider('osrm', last)
    ]);

    await expect(chain.route(SOFIA, PLOVDIV)).rejects.toBe(last);
  });

  it('wraps unexpected errors as RouteServiceError', async () => {
    const chain = new FallbackRouteProvider([new StubRouteProvider('osrm', new TypeError('boom'))]);

    await expect(chain.route(SOFIA, PLOVDIV)).rejects.toMatchObject({
      code: 'ROUTE_SERVICE_ERROR',
      details: { provider: 'osrm', reason: 'boom' }
    });
  });

  it('passes route options through', async () => {
    const only = new StubRouteProvider('osrm', ok);

    await new FallbackRouteProvider([only]).route(SOFIA, PLOVDIV, { includeGeometry: true });

    expect(only.calls[0]?.options).toEqual({ includeGeometry: true });
  });
});

// =============================================================================
// CACHE
// =============================================================================

describe('CachingRouteProvider', () => {
  it('keys by rounded coordinates and geometry flag', () => {
    expect(routeCacheKey(SOFIA, PLOVDIV, false)).toBe('route:42.69770,23.32190;42.13540,24.74530:distance');
    expect(routeCacheKey(SOFIA, PLOVDIV, true)).toBe('route:42.69770,23.32190;42.13540,24.74530:full');
  });

  it('serves a repeated route from the cache', async () => {
    const inner = new StubRouteProvider('osrm', { distanceKm: 95, source: 'osrm' });
    const cache = createMemoryCache();
    const provider = new CachingRouteProvider(inner, cache, 60);

    await provider.route(SOFIA, PLOVDIV);
    await expect(provider.route(SOFIA, PLOVDIV)).resolves.toEqual({ distanceKm: 95, source: 'osrm' });

    expect(inner.calls).toHaveLength(1);
    await cache.close();
  });

  it('never stores straight-line results', async () => {
    const inner = new StubRouteProvider('haversine', { distanceKm: 131.2, source: 'haversine' });
    const cache = createMemoryCache();
    const provider = new CachingRouteProvider(inner, cache, 60);

    await provider.route(SOFIA, PLOVDIV);
    await provider.route(SOFIA, PLOVDIV);

    expect(inner.calls).toHaveLength(2);
    await cache.close();
  });

  it('ignores a cached entry that is not a route result', async () => {
    const inner = new StubRouteProvider('osrm', { distanceKm: 95, source: 'osrm' });
    const cache = createMemoryCache();
    const provider = new CachingRouteProvider(inner, cache, 60);
    await cache.set(routeCacheKey(SOFIA, PLOVDIV, false), { distance: 95000 });

    await expect(provider.route(SOFIA, PLOVDIV)).resolves.toEqual({ distanceKm: 95, source: 'osrm' });

    expect(inner.calls).toHaveLength(1);
    await cache.close();
  });
});

// =============================================================================
// CIRCUIT BREAKER
// =============================================================================

describe('CircuitBreaker', () => {
  it('aborts and rejects a call that outlives the timeout', async () => {
    const breaker = new CircuitBreaker({ name: 'slow', requestTimeout: 20 });
    const seen: { signal?: AbortSignal } = {};

    const call = breaker.execute(signal => {
      seen.signal = signal;
      return new Promise<string>((_resolve, reject) => {
        signal.addEventListener('abort', () => reject(new Error('aborted')));
      });
    });

    await expect(call).rejects.toThrow("Circuit breaker 'slow' request timed out after 20ms");
    expect(seen.signal?.aborted).toBe(true);
  });

  it('opens after the failure threshold and stops calling through', async () => {
    const breaker = new CircuitBreaker({ name: 'flaky', failureThreshold: 2, resetTimeout: 60000 });
    const fn = jest.fn(async () => {
      throw new Error('down');
    });

    await expect(breaker.execute(fn)).rejects.toThrow('down');
    await expect(breaker.execute(fn)).rejects.toThrow('down');
    await expect(breaker.execute(fn)).rejects.toThrow("Circuit breaker 'flaky' is OPEN - service unavailable");

    expect(fn).toHaveBeenCalledTimes(2);
    expect(breaker.getState()).toBe(CircuitState.OPEN);
  });

  it('closes again after a successful trial call', async () => {
    const breaker = new CircuitBreaker({ name: 'recovering', failureThreshold: 1, successThreshold: 1, resetTimeout: 0 });

    await expect(breaker.execute(async () => { throw new Error('down'); })).rejects.toThrow('down');
    expect(breaker.getState()).toBe(CircuitState.OPEN);

    await expect(breaker.execute(async () => 'ok')).resolves.toBe('ok');
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
  });

  it('ignores errors the isFailure filter rejects', async () => {
    const breaker = new CircuitBreaker({
      name: 'filtered',
      failureThreshold: 1,
      isFailure: (error) => !(error instanceof NoRouteFoundError)
    });

    await expect(breaker.execute(async () => { throw new NoRouteFoundError(); })).rejects.toBeInstanceOf(NoRouteFoundError);
    expect(breaker.getState()).toBe(CircuitState.CLOSED);
  });
});
