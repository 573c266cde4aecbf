/**
 * BullMQ settings for the reconciliation queue
 */

import { ConnectionOptions, DefaultJobOptions } from 'bullmq';

import { config } from '../config';

export const queueConnection: ConnectionOptions = {
  host: config.redis.host,
  port: config.redis.port,
  password: config.redis.password,
  connectionName: `${config.redis.connectionName}-reconciliation`,
  maxRetriesPerRequest: null, // Required for BullMQ workers
};

/**
 * Queue and job names may not contain ':', BullMQ uses it in its Redis keys
 */
export const RECONCILIATION_QUEUE = {
  name: 'subsidy-reconciliation',
  jobName: 'reconcile-pending-transaction',
  concurrency: config.reconciliation.concurrency,
} as const;

/**
 * Completed jobs are kept for a day as an audit trail. Failed jobs are never
 * removed: each one is a pending debit that still needs an operator.
 */
export const reconciliationJobOptions: DefaultJobOptions = {
  attempts: config.reconciliation.attempts,
  backoff: {
    type: 'exponential',
    delay: config.reconciliation.backoffMs,
  },
  removeOnComplete: { age: 24 * 60 * 60 },
  removeOnFail: false,
};
