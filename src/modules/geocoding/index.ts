/**
 * =============================================================================
 * GEOCODING MODULE
 * =============================================================================
 *
 * Turns free-text addresses into coordinates:
 * - NominatimGeocoder talks to OpenStreetMap Nominatim
 * - CachingGeocoder keeps successful lookups in the shared cache
 * - geocoding.routes exposes autocomplete for the address form
 * =============================================================================
 */

export * from './geocoding.schema';
export * from './nominatim.geocoder';
export * from './caching.geocoder';
export * from './geocoding.routes';
