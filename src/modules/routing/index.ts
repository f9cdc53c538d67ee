/**
 * =============================================================================
 * ROUTING MODULE
 * =============================================================================
 *
 * Measures travel distance between two coordinates:
 * - OrsRouteProvider / OsrmRouteProvider call the road routing services
 * - HaversineRouteProvider is the optional straight-line last resort
 * - FallbackRouteProvider chains them, CachingRouteProvider remembers results
 * =============================================================================
 */

export * from './routing.schema';
export * from './ors.provider';
export * from './osrm.provider';
export * from './haversine.provider';
export * from './fallback.provider';
export * from './caching.provider';
export * from './routing.routes';
