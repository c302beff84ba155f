/**
 * =============================================================================
 * ENVIRONMENT VALIDATION
 * =============================================================================
 *
 * Validates all environment variables at startup.
 * Fails fast if configuration is invalid - better than runtime errors.
 *
 * USAGE:
 * ```typescript
 * // At application startup (server.ts)
 * validateAndLogEnvironment(); // Throws if invalid
 * ```
 * =============================================================================
 */

import { logger } from '../../shared/services/logger.service';

/**
 * Environment variable definition
 */
interface EnvVar {
  name: string;
  required: boolean;
  default?: string;
  validator?: (value: string) => boolean;
  description: string;
}

const isPositiveInt = (v: string): boolean => /^\d+$/.test(v) && parseInt(v, 10) > 0;
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

  // ==========================================================================
  // LOOKUP PROVIDERS
  // ==========================================================================
  {
    name: 'ORS_API_KEY',
    required: false, // Only required in production
    description: 'OpenRouteService API key for driving directions'
  },
  {
    name: 'ORS_BASE_URL',
    required: false,
    default: 'https://api.openrouteservice.org',
    validator: isHttpUrl,
    description: 'OpenRouteService base URL'
  },
  {
    name: 'NOMINATIM_BASE_URL',
    required: false,
    default: 'https://nominatim.openstreetmap.org',
    validator: isHttpUrl,
    description: 'Nominatim geocoder base URL'
  },
  {
    name: 'LOOKUP_TIMEOUT_MS',
    required: false,
    default: '10000',
    validator: isPositiveInt,
    description: 'Timeout for geocoding and routing requests in milliseconds'
  },

  // ==========================================================================
  // REDIS CACHE
  // ==========================================================================
  {
    name: 'REDIS_ENABLED',
    required: false,
    default: 'false',
    validator: (v) => ['true', 'false'].includes(v),
    description: 'Enable Redis caching of lookups'
  },

  // ==========================================================================
  // RATE LIMITING
  // ==========================================================================
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
    default: '100',
    validator: isPositiveInt,
    description: 'Maximum requests per window'
  },

  // ==========================================================================
  // LOGGING
  // ==========================================================================
  {
    name: 'LOG_LEVEL',
    required: false,
    default: 'debug',
    validator: (v) => ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'].includes(v),
    description: 'Logging level'
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

    if (isProduction) {
      // Routing cannot work without a key
      if (envVar.name === 'ORS_API_KEY' && !value) {
        result.valid = false;
        result.errors.push('ORS_API_KEY is required in production');
      }

      if (envVar.name === 'REDIS_ENABLED' && value !== 'true') {
        result.warnings.push('REDIS_ENABLED should be true in production to share lookup cache');
      }
    }

    const finalValue = value || envVar.default;
    if (finalValue) {
      if (envVar.validator && !envVar.validator(finalValue)) {
        result.valid = false;
        result.errors.push(`Invalid value for ${envVar.name}: "${finalValue}" - ${envVar.description}`);
        continue;
      }

      // Never expose secrets in the loaded summary
      result.loaded[envVar.name] = envVar.name.endsWith('_KEY') ? '[REDACTED]' : finalValue;
    }
  }

  return result;
}

/**
 * Validate and log the environment, throwing when it is unusable
 */
export function validateAndLogEnvironment(env: NodeJS.ProcessEnv = process.env): ValidationResult {
  const result = validateEnvironment(env);

  result.errors.forEach(error => {
    logger.error(`Environment validation error: ${error}`);
  });

  result.warnings.forEach(warning => {
    logger.warn(`Environment validation warning: ${warning}`);
  });

  if (!result.valid) {
    throw new Error(`Environment validation failed:\n${result.errors.map(e => `  - ${e}`).join('\n')}`);
  }

  logger.info('✅ Environment validation passed', {
    mode: env.NODE_ENV || 'development',
    redis: env.REDIS_ENABLED === 'true' ? 'enabled' : 'disabled',
  });

  return result;
}
