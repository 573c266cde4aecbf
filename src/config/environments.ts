/**
 * Environment Configuration
 *
 * Central place for environment detection and environment-specific values.
 * Use these flags and values throughout the app to avoid hardcoding environments.
 *
 * Usage:
 *   import { isProduction, MONGODB_URI, CATALOG_CONFIG } from './environments';
 */

// =============================================================================
// ENVIRONMENT FLAGS
// =============================================================================

/**
 * Current environment from NODE_ENV
 * Defaults to 'development' if not set
 */
export const NODE_ENV = process.env.NODE_ENV || 'development';

export const isProduction = NODE_ENV === 'production';
export const isDevelopment = NODE_ENV === 'development';
export const isTest = NODE_ENV === 'test';

const intFromEnv = (name: string, fallback: number): number => {
  const raw = process.env[name];
  if (!raw) return fallback;
  const parsed = parseInt(raw, 10);
  return Number.isNaN(parsed) ? fallback : parsed;
};

// =============================================================================
// DATABASE CONFIGURATION
// =============================================================================

export const MONGODB_URI = isTest
  ? process.env.MONGODB_URI || 'mongodb://localhost:27018/subsidy-test'
  : process.env.MONGODB_URI || 'mongodb://localhost:27017/subsidy';

/**
 * MongoDB connection pool settings
 */
export const MONGODB_CONFIG = {
  maxPoolSize: isProduction ? 50 : 10,
  minPoolSize: isProduction ? 5 : 2,
  serverSelectionTimeoutMS: isProduction ? 10000 : 5000,
};

// =============================================================================
// REDIS CONFIGURATION
// =============================================================================

export const REDIS_HOST = process.env.REDIS_HOST || 'localhost';

export const REDIS_PORT = intFromEnv('REDIS_PORT', isTest ? 6380 : 6379);

/**
 * Redis password (production only)
 */
export const REDIS_PASSWORD = isProduction ? process.env.REDIS_PASSWORD || undefined : undefined;

export const REDIS_CONFIG = {
  connectionName: process.env.REDIS_CONNECTION_NAME || 'subsidy-api',
  // Reconnect attempts before the shared client gives up
  maxConnectRetries: intFromEnv('REDIS_CONNECT_RETRIES', 3),
  maxRetryDelayMs: intFromEnv('REDIS_MAX_RETRY_DELAY_MS', 3000),
};

// =============================================================================
// JWT / AUTHENTICATION CONFIGURATION
// =============================================================================

/**
 * Tokens are issued by the identity provider; this service only verifies them.
 * Required in production (see validateProductionEnv).
 */
export const JWT_CONFIG = {
  secret: isProduction
    ? process.env.JWT_SECRET || ''
    : process.env.JWT_SECRET || 'dev-secret-do-not-use-in-production',
  issuer: process.env.JWT_ISSUER || undefined,
};

// =============================================================================
// RATE LIMITING CONFIGURATION
// =============================================================================

export const RATE_LIMIT_CONFIG = {
  disabled: process.env.RATE_LIMIT_DISABLED === 'true',

  global: {
    windowMs: intFromEnv('RATE_LIMIT_WINDOW_MS', 900000), // 15 minutes
    maxRequests: isTest ? 10000 : intFromEnv('RATE_LIMIT_MAX_REQUESTS', isProduction ? 300 : 1000),
  },

  // Redemption writes (per caller)
  redemption: {
    windowMs: intFromEnv('REDEMPTION_RATE_LIMIT_WINDOW_MS', 60000), // 1 minute
    maxRequests: isTest ? 10000 : intFromEnv('REDEMPTION_RATE_LIMIT_MAX', isProduction ? 60 : 600),
  },
};

// =============================================================================
// EXTERNAL SERVICES
// =============================================================================

/**
 * Enterprise catalog (pricing oracle)
 */
export const CATALOG_CONFIG = {
  baseUrl: process.env.CATALOG_API_URL || 'http://localhost:18160',
  apiToken: process.env.CATALOG_API_TOKEN || undefined,
  timeoutMs: intFromEnv('CATALOG_TIMEOUT_MS', 5000),
};

/**
 * Enrollment provisioner
 */
export const ENROLLMENT_CONFIG = {
  baseUrl: process.env.ENROLLMENT_API_URL || 'http://localhost:18000',
  apiToken: process.env.ENROLLMENT_API_TOKEN || undefined,
  timeoutMs: intFromEnv('ENROLLMENT_TIMEOUT_MS', 10000),
};

// =============================================================================
// PRICING / CACHING
// =============================================================================

export const PRICING_CONFIG = {
  // Entries kept by the in-process price cache
  cacheMaxEntries: intFromEnv('PRICE_CACHE_MAX_ENTRIES', 64),
  // TTL for the content-metadata HTTP response cache
  contentMetadataCacheSeconds: intFromEnv('CONTENT_METADATA_CACHE_SECONDS', 60),
};

// =============================================================================
// RECONCILIATION
// =============================================================================

export const RECONCILIATION_CONFIG = {
  attempts: intFromEnv('RECONCILIATION_ATTEMPTS', 5),
  backoffMs: intFromEnv('RECONCILIATION_BACKOFF_MS', 2000),
  concurrency: intFromEnv('RECONCILIATION_CONCURRENCY', 2),
};

// =============================================================================
// API / LOGGING / TELEMETRY
// =============================================================================

export const API_CONFIG = {
  bodyLimit: process.env.API_BODY_LIMIT || '10kb',
  port: intFromEnv('PORT', 18280),
  corsOrigins: (process.env.CORS_ORIGINS || 'http://localhost:2000').split(','),
};

export const LOG_CONFIG = {
  level: process.env.LOG_LEVEL || (isProduction ? 'info' : isTest ? 'silent' : 'debug'),
  prettyPrint: isDevelopment,
};

export const OTEL_CONFIG = {
  enabled: isProduction || process.env.OTEL_ENABLED === 'true',
  serviceName: process.env.OTEL_SERVICE_NAME || 'subsidy-api',
  exporterEndpoint: process.env.OTEL_EXPORTER_OTLP_ENDPOINT || 'http://localhost:4318/v1/traces',
};

// =============================================================================
// VALIDATION
// =============================================================================

/**
 * Validate required production environment variables
 */
export const validateProductionEnv = (): void => {
  if (!isProduction) return;

  const required = [
    'JWT_SECRET',
    'MONGODB_URI',
    'REDIS_HOST',
    'CATALOG_API_URL',
    'ENROLLMENT_API_URL',
  ];

  const missing = required.filter((key) => !process.env[key]);

  if (missing.length > 0) {
    throw new Error(`Missing required environment variables for production: ${missing.join(', ')}`);
  }

  if (JWT_CONFIG.secret.length < 32) {
    throw new Error('JWT_SECRET must be at least 32 characters in production');
  }
};

export const getEnvironmentInfo = () => ({
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  mongoHost: MONGODB_URI.split('@').pop()?.split('/')[0] || 'localhost', // Don't leak credentials
  redisHost: REDIS_HOST,
  catalogUrl: CATALOG_CONFIG.baseUrl,
});
