import { Registry, Counter, Histogram, collectDefaultMetrics } from 'prom-client';

import { config } from '../config';

/**
 * Prometheus metrics registry
 */
export const registry = new Registry();
registry.setDefaultLabels({ service: 'subsidy' });

if (!config.isTest) {
  collectDefaultMetrics({ register: registry });
}

// ============================================
// HTTP Metrics
// ============================================

export const httpRequestsTotal = new Counter({
  name: 'http_requests_total',
  help: 'Total HTTP requests',
  labelNames: ['method', 'path', 'status'] as const,
  registers: [registry],
});

export const httpRequestDuration = new Histogram({
  name: 'http_request_duration_seconds',
  help: 'HTTP request duration in seconds',
  labelNames: ['method', 'path', 'status'] as const,
  buckets: [0.01, 0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10],
  registers: [registry],
});

// ============================================
// Redemption Metrics
// ============================================

/**
 * Redemption attempts by outcome: created | existing | not_redeemable | failed
 */
export const redemptionsTotal = new Counter({
  name: 'redemptions_total',
  help: 'Redemption attempts by outcome',
  labelNames: ['outcome'] as const,
  registers: [registry],
});

export const redemptionDuration = new Histogram({
  name: 'redemption_duration_seconds',
  help: 'Time spent in redeem() including pricing and provisioning',
  buckets: [0.05, 0.1, 0.25, 0.5, 1, 2, 5, 10, 30],
  registers: [registry],
});

/**
 * Rollbacks of pending transactions by result: success | noop | failed
 */
export const rollbacksTotal = new Counter({
  name: 'redemption_rollbacks_total',
  help: 'Rollbacks of pending ledger transactions',
  labelNames: ['result'] as const,
  registers: [registry],
});

// ============================================
// Pricing Metrics
// ============================================

/**
 * Price lookups by result: hit | miss | not_found | transport_error
 */
export const priceLookupsTotal = new Counter({
  name: 'price_lookups_total',
  help: 'Content price lookups',
  labelNames: ['result'] as const,
  registers: [registry],
});

// ============================================
// Queue Metrics
// ============================================

/**
 * Reconciliation jobs by status: deleted | failed | already_resolved | error
 */
export const reconciliationJobsTotal = new Counter({
  name: 'reconciliation_jobs_total',
  help: 'Reconciliation jobs by status',
  labelNames: ['status'] as const,
  registers: [registry],
});

export const getMetrics = async (): Promise<string> => {
  return registry.metrics();
};

export const getMetricsContentType = (): string => {
  return registry.contentType;
};
