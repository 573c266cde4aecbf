/**
 * Reconciliation Worker
 *
 * Voids pending ledger transactions left behind by a failed rollback. The row
 * is deleted when possible; on the last attempt a row that still cannot be
 * deleted is marked failed so it stops looking in-flight.
 */

import { Worker, Job } from 'bullmq';

import { createServiceLogger, reconciliationJobsTotal } from '../../observability';
import { LedgerRepository } from '../../services/ledger/ledger.repository';
import { isTerminalState } from '../../services/ledger/transaction.state';
import { TransactionState } from '../../types/ledger';
import { ReconciliationJobData, ReconciliationJobResult } from '../reconciliation.queue';
import { queueConnection, RECONCILIATION_QUEUE } from '../queue.config';

const log = createServiceLogger('reconciliation-worker');

let reconciliationWorker: Worker<ReconciliationJobData, ReconciliationJobResult> | null = null;

export async function reconcilePendingTransaction(
  ledger: LedgerRepository,
  data: ReconciliationJobData,
  finalAttempt: boolean
): Promise<ReconciliationJobResult> {
  const transaction = await ledger.findTransaction(data.transactionId);
  if (!transaction || isTerminalState(transaction.state)) {
    return { outcome: 'already_resolved' };
  }

  try {
    const deleted = await ledger.deletePendingTransaction(data.transactionId);
    return { outcome: deleted ? 'deleted' : 'already_resolved' };
  } catch (error) {
    if (!finalAttempt) {
      throw error;
    }

    log.error({ transactionId: data.transactionId, err: error }, 'Could not delete pending transaction, marking failed');
    const failed = await ledger.applyCommand(data.transactionId, TransactionState.PENDING, {
      type: 'fail',
      reason: data.reason,
    });
    return { outcome: failed ? 'failed' : 'already_resolved' };
  }
}

function setupWorkerEvents(worker: Worker<ReconciliationJobData, ReconciliationJobResult>): void {
  worker.on('completed', (job, result) => {
    reconciliationJobsTotal.inc({ status: result.outcome });
    log.info({ jobId: job.id, transactionId: job.data.transactionId, outcome: result.outcome }, 'Reconciliation job completed');
  });

  worker.on('failed', (job, err) => {
    reconciliationJobsTotal.inc({ status: 'error' });
    if (!job) return;
    log.error(
      { jobId: job.id, transactionId: job.data.transactionId, attempts: job.attemptsMade, err: err.message },
      'Reconciliation job failed'
    );
  });

  worker.on('error', (err) => {
    log.error({ err }, 'Reconciliation worker error');
  });
}

export function startReconciliationWorker(
  ledger: LedgerRepository
): Worker<ReconciliationJobData, ReconciliationJobResult> {
  if (reconciliationWorker) {
    return reconciliationWorker;
  }

  const processJob = async (
    job: Job<ReconciliationJobData, ReconciliationJobResult>
  ): Promise<ReconciliationJobResult> => {
    const maxAttempts = job.opts.attempts ?? 1;
    return reconcilePendingTransaction(ledger, job.data, job.attemptsMade + 1 >= maxAttempts);
  };

  reconciliationWorker = new Worker<ReconciliationJobData, ReconciliationJobResult>(
    RECONCILIATION_QUEUE.name,
    processJob,
    {
      connection: queueConnection,
      concurrency: RECONCILIATION_QUEUE.concurrency,
    }
  );

  setupWorkerEvents(reconciliationWorker);
  log.info('Reconciliation worker started');

  return reconciliationWorker;
}

export async function stopReconciliationWorker(): Promise<void> {
  if (reconciliationWorker) {
    await reconciliationWorker.close();
    reconciliationWorker = null;
    log.info('Reconciliation worker stopped');
  }
}

export function isReconciliationWorkerRunning(): boolean {
  return reconciliationWorker !== null && !reconciliationWorker.closing;
}
