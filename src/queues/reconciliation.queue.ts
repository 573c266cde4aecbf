/**
 * Reconciliation Queue
 *
 * Pending ledger transactions whose rollback failed are handed to this queue
 * so a worker can void them once storage is reachable again.
 */

import { Queue } from 'bullmq';

import { logger } from '../observability';

import { queueConnection, reconciliationJobOptions, RECONCILIATION_QUEUE } from './queue.config';

export interface ReconciliationJobData {
  transactionId: string;
  subsidyId: string;
  reason: string;
  requestedAt: string;
}

/**
 * deleted: the pending row was removed
 * failed: the row could not be removed and was marked failed instead
 * already_resolved: the row was gone or no longer pending
 */
export interface ReconciliationJobResult {
  outcome: 'deleted' | 'failed' | 'already_resolved';
}

export interface ReconciliationScheduler {
  schedule(data: ReconciliationJobData): Promise<void>;
}

let reconciliationQueue: Queue<ReconciliationJobData, ReconciliationJobResult> | null = null;

export function getReconciliationQueue(): Queue<ReconciliationJobData, ReconciliationJobResult> {
  if (!reconciliationQueue) {
    reconciliationQueue = new Queue<ReconciliationJobData, ReconciliationJobResult>(RECONCILIATION_QUEUE.name, {
      connection: queueConnection,
      defaultJobOptions: reconciliationJobOptions,
    });
    logger.info('Reconciliation queue initialized');
  }
  return reconciliationQueue;
}

/**
 * Enqueues one job per transaction; the transaction id doubles as the job id
 * so repeated scheduling for the same row is collapsed by BullMQ.
 */
export class BullReconciliationScheduler implements ReconciliationScheduler {
  async schedule(data: ReconciliationJobData): Promise<void> {
    const job = await getReconciliationQueue().add(RECONCILIATION_QUEUE.jobName, data, {
      jobId: data.transactionId,
    });
    logger.warn(
      { jobId: job.id, transactionId: data.transactionId, subsidyId: data.subsidyId },
      'Reconciliation job scheduled'
    );
  }
}

export async function closeReconciliationQueue(): Promise<void> {
  if (reconciliationQueue) {
    await reconciliationQueue.close();
    reconciliationQueue = null;
    logger.info('Reconciliation queue closed');
  }
}

export async function getReconciliationQueueStats(): Promise<{
  waiting: number;
  active: number;
  completed: number;
  failed: number;
  delayed: number;
}> {
  const queue = getReconciliationQueue();
  const [waiting, active, completed, failed, delayed] = await Promise.all([
    queue.getWaitingCount(),
    queue.getActiveCount(),
    queue.getCompletedCount(),
    queue.getFailedCount(),
    queue.getDelayedCount(),
  ]);
  return { waiting, active, completed, failed, delayed };
}
