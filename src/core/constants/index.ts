/**
 * =============================================================================
 * CORE CONSTANTS - Single Source of Truth
 * =============================================================================
 *
 * All application-wide constants in one place.
 *
 * BENEFITS:
 * - No magic strings/numbers scattered in code
 * - Type safety with enums and const tuples
 * =============================================================================
 */

// =============================================================================
// PARCEL SIZE CLASSES
// =============================================================================

/**
 * Declared parcel size classes, each mapped to a price multiplier
 */
export const SIZE_CLASSES = ['S', 'M', 'L'] as const;

export type SizeClass = typeof SIZE_CLASSES[number];

export function isSizeClass(value: unknown): value is SizeClass {
  return typeof value === 'string' && (SIZE_CLASSES as readonly string[]).includes(value);
}

// =============================================================================
// API
// =============================================================================

export const API_VERSION = 'v1';
export const API_PREFIX = `/api/${API_VERSION}`;

// =============================================================================
// HTTP STATUS CODES
// =============================================================================

export const HTTP_STATUS = {
  OK: 200,
  BAD_REQUEST: 400,
  NOT_FOUND: 404,
  PAYLOAD_TOO_LARGE: 413,
  UNSUPPORTED_MEDIA_TYPE: 415,
  UNPROCESSABLE: 422,
  TOO_MANY_REQUESTS: 429,
  INTERNAL_ERROR: 500,
  BAD_GATEWAY: 502
} as const;

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Machine-readable error codes returned in `error.code`
 */
export enum ErrorCode {
  // Validation
  VALIDATION_ERROR = 'VALIDATION_ERROR',
  INVALID_INPUT = 'INVALID_INPUT',
  PAYLOAD_TOO_LARGE = 'PAYLOAD_TOO_LARGE',
  UNSUPPORTED_MEDIA_TYPE = 'UNSUPPORTED_MEDIA_TYPE',

  // Geocoding
  ADDRESS_NOT_FOUND = 'ADDRESS_NOT_FOUND',
  GEOCODE_SERVICE_ERROR = 'GEOCODE_SERVICE_ERROR',

  // Routing
  NO_ROUTE_FOUND = 'NO_ROUTE_FOUND',
  ROUTE_SERVICE_ERROR = 'ROUTE_SERVICE_ERROR',

  // System
  NOT_FOUND = 'NOT_FOUND',
  RATE_LIMIT_EXCEEDED = 'RATE_LIMIT_EXCEEDED',
  INTERNAL_ERROR = 'INTERNAL_ERROR'
}

// =============================================================================
// GEO
// =============================================================================

/**
 * Autocomplete: queries shorter than this return no suggestions
 */
export const MIN_AUTOCOMPLETE_QUERY_LENGTH = 3;

/**
 * Autocomplete: one lookup per client per interval (Nominatim usage policy)
 */
export const AUTOCOMPLETE_THROTTLE_MS = 1000;

export const AUTOCOMPLETE_MAX_RESULTS = 6;
