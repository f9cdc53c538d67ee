/**
 * =============================================================================
 * ENVIRONMENT CONFIGURATION
 * =============================================================================
 *
 * Centralized configuration loaded from environment variables.
 * All config access goes through this file - no direct process.env usage elsewhere.
 *
 * SECURITY:
 * - No secrets are logged or exposed in error messages
 * - The OpenRouteService key is optional; without it ORS is skipped
 *
 * FOR BACKEND DEVELOPERS:
 * - Add new config here, not scattered across the codebase
 * - Use getOptional() for values with sensible defaults
 * - Pricing overrides are read here over DEFAULT_PRICING_CONFIG and handed to
 *   PricingService at startup
 * =============================================================================
 */

import dotenv from 'dotenv';
import { DEFAULT_PRICING_CONFIG } from '../modules/pricing/pricing.schema';

// Load .env file
dotenv.config();

// =============================================================================
// HELPER FUNCTIONS
// =============================================================================

/**
 * Get optional environment variable with default
 */
function getOptional(key: string, defaultValue: string): string {
  return process.env[key] || defaultValue;
}

/**
 * Get boolean environment variable
 */
function getBoolean(key: string, defaultValue: boolean): boolean {
  const value = process.env[key];
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

/**
 * Get integer environment variable
 */
function getNumber(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Get decimal environment variable (prices, multipliers)
 */
function getFloat(key: string, defaultValue: number): number {
  const value = process.env[key];
  if (!value) return defaultValue;
  const parsed = parseFloat(value);
  return isNaN(parsed) ? defaultValue : parsed;
}

/**
 * Parse CORS origins from comma-separated string
 */
function parseCorsOrigins(value: string): string | string[] {
  if (value === '*') return '*';
  return value.split(',').map(origin => origin.trim()).filter(Boolean);
}

// =============================================================================
// CONFIGURATION OBJECT
// =============================================================================

const nodeEnv = getOptional('NODE_ENV', 'development');

/**
 * Application configuration object
 * All configuration is validated at startup
 */
export const config = {
  // Server
  nodeEnv,
  port: getNumber('PORT', 3000),
  host: getOptional('HOST', '0.0.0.0'),
  version: getOptional('npm_package_version', '1.0.0'),
  // Set when running behind a load balancer so req.ip is the client address
  trustProxy: getBoolean('TRUST_PROXY', false),

  // Redis (optional shared cache for geocoding/route results)
  redis: {
    enabled: getBoolean('REDIS_ENABLED', false),
    url: getOptional('REDIS_URL', 'redis://localhost:6379'),
  },

  // Geocoding - OpenStreetMap Nominatim (keyless, needs an identifying User-Agent)
  geocoder: {
    baseUrl: getOptional('GEOCODER_BASE_URL', 'https://nominatim.openstreetmap.org'),
    userAgent: getOptional('GEOCODER_USER_AGENT', 'ParcelQuote/1.0 (contact: ops@example.com)'),
    countryCodes: getOptional('GEOCODER_COUNTRY_CODES', ''),
    countrySuffix: getOptional('GEOCODER_COUNTRY_SUFFIX', ''),
    timeoutMs: getNumber('GEOCODER_TIMEOUT_MS', 10000),
    candidateLimit: getNumber('GEOCODER_CANDIDATE_LIMIT', 5),
  },

  // Routing - ORS (keyed) -> OSRM (public demo) -> optional Haversine
  routing: {
    orsApiKey: getOptional('ORS_API_KEY', ''),
    orsBaseUrl: getOptional('ORS_BASE_URL', 'https://api.openrouteservice.org'),
    osrmBaseUrl: getOptional('OSRM_BASE_URL', 'https://router.project-osrm.org'),
    timeoutMs: getNumber('ROUTING_TIMEOUT_MS', 12000),
    haversineFallback: getBoolean('ROUTING_HAVERSINE_FALLBACK', false),
  },

  // Pricing: price = baseFee + distanceKm * ratePerKm * sizeMultiplier[size]
  pricing: {
    baseFee: getFloat('PRICING_BASE_FEE', DEFAULT_PRICING_CONFIG.baseFee),
    ratePerKm: getFloat('PRICING_RATE_PER_KM', DEFAULT_PRICING_CONFIG.ratePerKm),
    sizeMultiplier: {
      S: getFloat('PRICING_SIZE_MULTIPLIER_S', DEFAULT_PRICING_CONFIG.sizeMultiplier.S),
      M: getFloat('PRICING_SIZE_MULTIPLIER_M', DEFAULT_PRICING_CONFIG.sizeMultiplier.M),
      L: getFloat('PRICING_SIZE_MULTIPLIER_L', DEFAULT_PRICING_CONFIG.sizeMultiplier.L),
    },
  },

  // Cache TTLs
  cache: {
    geocodeTtlSeconds: getNumber('GEOCODE_CACHE_TTL_SECONDS', 24 * 60 * 60), // addresses are stable
    routeTtlSeconds: getNumber('ROUTE_CACHE_TTL_SECONDS', 60 * 60),
  },

  // Rate Limiting
  rateLimit: {
    windowMs: getNumber('RATE_LIMIT_WINDOW_MS', 15 * 60 * 1000), // 15 minutes
    maxRequests: getNumber('RATE_LIMIT_MAX_REQUESTS', 300),
  },

  // Logging
  logLevel: getOptional('LOG_LEVEL', nodeEnv === 'test' ? 'warn' : 'debug'),

  // CORS - Parsed into array for production
  cors: {
    origin: parseCorsOrigins(getOptional('CORS_ORIGIN', '*')),
  },

  // Helpers
  isProduction: nodeEnv === 'production',
  isDevelopment: nodeEnv === 'development',
  isTest: nodeEnv === 'test',
} as const;

export type AppConfig = typeof config;

// =============================================================================
// STARTUP VALIDATION
// =============================================================================

/**
 * Validate configuration at startup
 * Fails fast if critical config is missing
 */
function validateConfig(): void {
  const warnings: string[] = [];
  const errors: string[] = [];

  if (config.isProduction) {
    // CORS must not be wildcard in production
    if (config.cors.origin === '*') {
      warnings.push('CORS_ORIGIN is set to "*" - this should be restricted in production');
    }

    // The public OSRM demo server is not meant for production traffic
    if (!config.routing.orsApiKey) {
      warnings.push('ORS_API_KEY is not set - routing relies on the public OSRM demo server');
    }

    // Nominatim usage policy requires a real contact in the User-Agent
    if (config.geocoder.userAgent.includes('example.com')) {
      warnings.push('GEOCODER_USER_AGENT still uses the placeholder contact address');
    }
  }

  if (config.pricing.baseFee < 0 || config.pricing.ratePerKm < 0) {
    errors.push('PRICING_BASE_FEE and PRICING_RATE_PER_KM must not be negative');
  }

  // Log warnings
  if (warnings.length > 0) {
    console.warn('\n⚠️  Configuration Warnings:');
    warnings.forEach(w => console.warn(`   - ${w}`));
    console.warn('');
  }

  // Throw on errors
  if (errors.length > 0) {
    throw new Error(`Configuration Errors:\n${errors.map(e => `  - ${e}`).join('\n')}`);
  }
}

// Run validation
validateConfig();
