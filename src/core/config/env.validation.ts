/**
 * =============================================================================
 * ENVIRONMENT VALIDATION
 * =============================================================================
 *
 * Validates environment variables at startup.
 * Fails fast if configuration is invalid - better than runtime errors.
 *
 * USAGE:
 * ```typescript
 * // At application startup (server.ts)
 * validateAndLogEnvironment(); // Exits in production if invalid
 * ```
 * =============================================================================
 */

import { logger } from '../../shared/services/logger.service';
import { DEFAULT_PRICING_CONFIG } from '../../modules/pricing/pricing.schema';

/**
 * Environment variable definition
 */
interface EnvVar {
  name: string;
  required: boolean;
  default?: string;
  validator?: (value: string) => boolean;
  description: string;
  secret?: boolean;
}

const isPositiveInt = (v: string): boolean => /^\d+$/.test(v) && parseInt(v, 10) > 0;
const isNonNegativeDecimal = (v: string): boolean => /^\d+(\.\d+)?$/.test(v);
const isPositiveDecimal = (v: string): boolean => isNonNegativeDecimal(v) && parseFloat(v) > 0;
const isBooleanString = (v: string): boolean => ['true', 'false'].includes(v);
const isHttpUrl = (v: string): boolean => /^https?:\/\/\S+$/.test(v);

/**
 * All environment variables with their requirements
 */
const ENV_VARS: EnvVar[] = [
  // ==========================================================================
  // SERVER
  // ==========================================================================
  {
    name: 'NODE_ENV',
    required: false,
    default: 'development',
    validator: (v) => ['development', 'staging', 'production', 'test'].includes(v),
    description: 'Application environment'
  },
  {
    name: 'PORT',
    required: false,
    default: '3000',
    validator: (v) => isPositiveInt(v) && parseInt(v, 10) < 65536,
    description: 'Server port number'
  },
  {
    name: 'TRUST_PROXY',
    required: false,
    default: 'false',
    validator: isBooleanString,
    description: 'Trust X-Forwarded-For from a load balancer'
  },
  {
    name: 'LOG_LEVEL',
    required: false,
    validator: (v) => ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'].includes(v),
    description: 'Logging level'
  },

  // ==========================================================================
  // GEOCODING
  // ==========================================================================
  {
    name: 'GEOCODER_BASE_URL',
    required: false,
    default: 'https://nominatim.openstreetmap.org',
    validator: isHttpUrl,
    description: 'Nominatim-compatible geocoding endpoint'
  },
  {
    name: 'GEOCODER_USER_AGENT',
    required: false,
    description: 'Identifying User-Agent sent to the geocoder'
  },
  {
    name: 'GEOCODER_COUNTRY_CODES',
    required: false,
    validator: (v) => /^[a-z]{2}(,[a-z]{2})*$/.test(v),
    description: 'ISO 3166-1 alpha-2 codes restricting geocoding results'
  },
  {
    name: 'GEOCODER_TIMEOUT_MS',
    required: false,
    default: '10000',
    validator: isPositiveInt,
    description: 'Timeout per geocoding request (ms)'
  },

  // ==========================================================================
  // ROUTING
  // ==========================================================================
  {
    name: 'ORS_API_KEY',
    required: false,
    secret: true,
    description: 'OpenRouteService API key (optional, enables ORS routing)'
  },
  {
    name: 'OSRM_BASE_URL',
    required: false,
    default: 'https://router.project-osrm.org',
    validator: isHttpUrl,
    description: 'OSRM routing endpoint'
  },
  {
    name: 'ROUTING_TIMEOUT_MS',
    required: false,
    default: '12000',
    validator: isPositiveInt,
    description: 'Timeout per routing request (ms)'
  },
  {
    name: 'ROUTING_HAVERSINE_FALLBACK',
    required: false,
    default: 'false',
    validator: isBooleanString,
    description: 'Use straight-line distance when every routing service fails'
  },

  // ==========================================================================
  // PRICING
  // ==========================================================================
  {
    name: 'PRICING_BASE_FEE',
    required: false,
    default: String(DEFAULT_PRICING_CONFIG.baseFee),
    validator: isNonNegativeDecimal,
    description: 'Fixed fee added to every quote'
  },
  {
    name: 'PRICING_RATE_PER_KM',
    required: false,
    default: String(DEFAULT_PRICING_CONFIG.ratePerKm),
    validator: isNonNegativeDecimal,
    description: 'Price per travelled kilometre'
  },
  {
    name: 'PRICING_SIZE_MULTIPLIER_S',
    required: false,
    default: String(DEFAULT_PRICING_CONFIG.sizeMultiplier.S),
    validator: isPositiveDecimal,
    description: 'Distance charge multiplier for size S'
  },
  {
    name: 'PRICING_SIZE_MULTIPLIER_M',
    required: false,
    default: String(DEFAULT_PRICING_CONFIG.sizeMultiplier.M),
    validator: isPositiveDecimal,
    description: 'Distance charge multiplier for size M'
  },
  {
    name: 'PRICING_SIZE_MULTIPLIER_L',
    required: false,
    default: String(DEFAULT_PRICING_CONFIG.sizeMultiplier.L),
    validator: isPositiveDecimal,
    description: 'Distance charge multiplier for size L'
  },

  // ==========================================================================
  // CACHE / RATE LIMITING
  // ==========================================================================
  {
    name: 'REDIS_ENABLED',
    required: false,
    default: 'false',
    validator: isBooleanString,
    description: 'Use Redis for the geocoding/route cache'
  },
  {
    name: 'REDIS_URL',
    required: false,
    secret: true,
    description: 'Redis connection string'
  },
  {
    name: 'RATE_LIMIT_WINDOW_MS',
    required: false,
    default: '900000',
    validator: isPositiveInt,
    description: 'Rate limit window in milliseconds'
  },
  {
    name: 'RATE_LIMIT_MAX_REQUESTS',
    required: false,
    default: '300',
    validator: isPositiveInt,
    description: 'Maximum requests per window'
  }
];

/**
 * Validation result
 */
export interface ValidationResult {
  valid: boolean;
  errors: string[];
  warnings: string[];
  loaded: Record<string, string>;
}

/**
 * Validate all environment variables
 */
export function validateEnvironment(env: NodeJS.ProcessEnv = process.env): ValidationResult {
  const result: ValidationResult = {
    valid: true,
    errors: [],
    warnings: [],
    loaded: {}
  };

  const isProduction = env.NODE_ENV === 'production';

  for (const envVar of ENV_VARS) {
    const value = env[envVar.name];

    if (envVar.required && !value) {
      result.valid = false;
      result.errors.push(`Missing required environment variable: ${envVar.name} - ${envVar.description}`);
      continue;
    }

    const finalValue = value || envVar.default;
    if (!finalValue) continue;

    if (envVar.validator && !envVar.validator(finalValue)) {
      result.valid = false;
      result.errors.push(`Invalid value for ${envVar.name}: "${envVar.secret ? '***' : finalValue}" - ${envVar.description}`);
      continue;
    }

    result.loaded[envVar.name] = envVar.secret ? '***' : finalValue;
  }

  if (isProduction && env.REDIS_ENABLED !== 'true') {
    result.warnings.push('REDIS_ENABLED should be true in production so instances share the geocoding cache');
  }

  if (env.REDIS_ENABLED === 'true' && !env.REDIS_URL) {
    result.warnings.push('REDIS_ENABLED is true but REDIS_URL is not set - using redis://localhost:6379');
  }

  return result;
}

/**
 * Validate and log results at startup
 * Exits process if validation fails in production
 */
export function validateAndLogEnvironment(): void {
  const result = validateEnvironment();
  const isProduction = process.env.NODE_ENV === 'production';

  result.errors.forEach(error => logger.error(`Environment validation error: ${error}`));
  result.warnings.forEach(warning => logger.warn(`Environment validation warning: ${warning}`));

  if (result.valid) {
    logger.info('✅ Environment validation passed', {
      mode: process.env.NODE_ENV || 'development',
      port: result.loaded.PORT,
      redis: result.loaded.REDIS_ENABLED === 'true' ? 'enabled' : 'disabled',
      ors: process.env.ORS_API_KEY ? 'enabled' : 'disabled',
    });
  }

  if (!result.valid && isProduction) {
    logger.error('Environment validation failed in production. Exiting.');
    process.exit(1);
  }
}
