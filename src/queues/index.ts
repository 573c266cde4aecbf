/**
 * Queue Module Exports
 */

export { queueConnection, reconciliationJobOptions, RECONCILIATION_QUEUE } from './queue.config';

export {
  ReconciliationJobData,
  ReconciliationJobResult,
  ReconciliationScheduler,
  BullReconciliationScheduler,
  getReconciliationQueue,
  closeReconciliationQueue,
  getReconciliationQueueStats,
} from './reconciliation.queue';

export {
  reconcilePendingTransaction,
  startReconciliationWorker,
  stopReconciliationWorker,
  isReconciliationWorkerRunning,
} from './workers/reconciliation.worker';
