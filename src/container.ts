/**
 * =============================================================================
 * COMPOSITION ROOT
 * =============================================================================
 *
 * Builds every collaborator once, from configuration:
 *
 *   CachingGeocoder ─> NominatimGeocoder ─> [breaker: nominatim]
 *   CachingRouteProvider ─> FallbackRouteProvider
 *                             ├─ OrsRouteProvider   (only with ORS_API_KEY)
 *                             ├─ OsrmRouteProvider
 *                             └─ HaversineRouteProvider (only with ROUTING_HAVERSINE_FALLBACK)
 *   PricingService(config.pricing)
 *   QuoteResolver({ geocoder, routeProvider, pricing })
 *
 * Tests pass their own fetch stand-in and cache.
 * =============================================================================
 */

import type { AppConfig } from './config/environment';
import { CircuitBreaker, CircuitBreakerRegistry } from './shared/resilience/circuit-breaker';
import { CacheService, InMemoryCache, createCacheService } from './shared/services/cache.service';
import { logger } from './shared/services/logger.service';
import { FetchFn, isUpstreamFailure } from './shared/utils/http.utils';
import { CachingGeocoder, Geocoder, NominatimGeocoder } from './modules/geocoding';
import {
  CachingRouteProvider,
  FallbackRouteProvider,
  HaversineRouteProvider,
  OrsRouteProvider,
  OsrmRouteProvider,
  RouteProvider
} from './modules/routing';
import { PricingService } from './modules/pricing/pricing.service';
import { QuoteResolver } from './modules/quote/quote.service';

export interface Container {
  cache: CacheService;
  breakers: CircuitBreakerRegistry;
  geocoderBreaker: CircuitBreaker;
  geocoder: Geocoder;
  routeProvider: RouteProvider;
  pricing: PricingService;
  resolver: QuoteResolver;
}

export interface ContainerOverrides {
  fetchFn?: FetchFn;
  cache?: CacheService;
}

export function createContainer(cfg: AppConfig, overrides: ContainerOverrides = {}): Container {
  const fetchFn = overrides.fetchFn ?? fetch;
  const cache = overrides.cache ?? createCacheService({
    redisEnabled: cfg.redis.enabled,
    redisUrl: cfg.redis.url
  });
  const breakers = new CircuitBreakerRegistry();

  // Geocoding
  const geocoderBreaker = breakers.register(new CircuitBreaker({
    name: 'nominatim',
    failureThreshold: 5,
    resetTimeout: 30000,
    requestTimeout: cfg.geocoder.timeoutMs
  }));

  const geocoder = new CachingGeocoder(
    new NominatimGeocoder(
      {
        baseUrl: cfg.geocoder.baseUrl,
        userAgent: cfg.geocoder.userAgent,
        countryCodes: cfg.geocoder.countryCodes,
        countrySuffix: cfg.geocoder.countrySuffix,
        candidateLimit: cfg.geocoder.candidateLimit
      },
      geocoderBreaker,
      fetchFn
    ),
    cache,
    cfg.cache.geocodeTtlSeconds
  );

  // Routing
  const providers: RouteProvider[] = [];

  if (cfg.routing.orsApiKey) {
    providers.push(new OrsRouteProvider(
      { baseUrl: cfg.routing.orsBaseUrl, apiKey: cfg.routing.orsApiKey },
      breakers.register(new CircuitBreaker({
        name: 'ors',
        requestTimeout: cfg.routing.timeoutMs,
        isFailure: isUpstreamFailure
      })),
      fetchFn
    ));
  }

  providers.push(new OsrmRouteProvider(
    { baseUrl: cfg.routing.osrmBaseUrl },
    breakers.register(new CircuitBreaker({
      name: 'osrm',
      requestTimeout: cfg.routing.timeoutMs,
      isFailure: isUpstreamFailure
    })),
    fetchFn
  ));

  if (cfg.routing.haversineFallback) {
    providers.push(new HaversineRouteProvider());
  }

  const routeProvider = new CachingRouteProvider(
    new FallbackRouteProvider(providers),
    cache,
    cfg.cache.routeTtlSeconds
  );

  logger.info(`Routing chain: ${routeProvider.name}`);

  // Pricing & quoting
  const pricing = new PricingService({
    baseFee: cfg.pricing.baseFee,
    ratePerKm: cfg.pricing.ratePerKm,
    sizeMultiplier: { ...cfg.pricing.sizeMultiplier }
  });

  const resolver = new QuoteResolver({ geocoder, routeProvider, pricing });

  return { cache, breakers, geocoderBreaker, geocoder, routeProvider, pricing, resolver };
}

/**
 * In-memory cache for tests and one-off scripts
 */
export function createMemoryCache(): CacheService {
  return new CacheService(new InMemoryCache());
}
