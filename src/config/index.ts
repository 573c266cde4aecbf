import dotenv from 'dotenv';

// Load environment variables first
dotenv.config();

import {
  NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,
  MONGODB_URI,
  MONGODB_CONFIG,
  REDIS_HOST,
  REDIS_PORT,
  REDIS_PASSWORD,
  REDIS_CONFIG,
  JWT_CONFIG,
  RATE_LIMIT_CONFIG,
  CATALOG_CONFIG,
  ENROLLMENT_CONFIG,
  PRICING_CONFIG,
  RECONCILIATION_CONFIG,
  API_CONFIG,
  LOG_CONFIG,
  OTEL_CONFIG,
  validateProductionEnv,
} from './environments';

export * from './environments';

if (isProduction) {
  validateProductionEnv();
}

/**
 * Main application configuration object
 *
 * For individual values you can also import directly from './environments'
 */
export const config = {
  nodeEnv: NODE_ENV,
  isProduction,
  isDevelopment,
  isTest,

  port: API_CONFIG.port,

  mongodb: {
    uri: MONGODB_URI,
    ...MONGODB_CONFIG,
  },

  redis: {
    host: REDIS_HOST,
    port: REDIS_PORT,
    password: REDIS_PASSWORD,
    ...REDIS_CONFIG,
  },

  jwt: JWT_CONFIG,

  api: {
    bodyLimit: API_CONFIG.bodyLimit,
    corsOrigins: API_CONFIG.corsOrigins,
  },

  rateLimit: RATE_LIMIT_CONFIG,

  catalog: CATALOG_CONFIG,
  enrollment: ENROLLMENT_CONFIG,
  pricing: PRICING_CONFIG,
  reconciliation: RECONCILIATION_CONFIG,

  logging: LOG_CONFIG,
  otel: OTEL_CONFIG,
};
