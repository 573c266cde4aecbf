/**
 * Redemption Engine
 *
 * Spends a subsidy's balance on content for a learner. A redemption is a
 * pending ledger debit, an enrollment with the provisioner, then a commit of
 * the debit against the enrollment reference. Any failure after the debit is
 * written removes the pending row again, so callers never observe a
 * half-finished redemption.
 */

import { ApiError } from '../../middlewares/errorHandler';
import {
  addLogContext,
  createServiceLogger,
  redemptionDuration,
  redemptionsTotal,
  rollbacksTotal,
  traceRedemptionStep,
} from '../../observability';
import { ReconciliationScheduler } from '../../queues/reconciliation.queue';
import {
  ENROLLMENT_REFERENCE_TYPE,
  LedgerTransactionRecord,
  SubsidyRecord,
  TransactionState,
} from '../../types/ledger';
import { EnrollmentProvisioner } from '../enrollment/enrollment.client';
import { createIdempotencyKeyForTransaction, ledgerIdempotencyKeyForSubsidy } from '../ledger/ledger.idempotency';
import { CreateTransactionOutcome, LedgerRepository } from '../ledger/ledger.repository';
import { isTerminalState, validateTransition } from '../ledger/transaction.state';
import { PricingResolver, pricingErrorToApiError } from '../pricing/pricing.service';

const log = createServiceLogger('redemption');

export interface RedeemRequest {
  learnerId: number;
  contentKey: string;
  policyId: string;
  idempotencyKey?: string;
}

/**
 * `transaction` is null only when the subsidy cannot cover the content
 */
export interface RedeemOutcome {
  transaction: LedgerTransactionRecord | null;
  created: boolean;
}

export interface Redeemability {
  redeemable: boolean;
  price: number;
}

export interface TransactionDetails {
  lmsUserId?: number | null;
  contentKey?: string | null;
  subsidyAccessPolicyUuid?: string | null;
  metadata?: Record<string, unknown>;
}

export interface RedemptionDependencies {
  ledger: LedgerRepository;
  pricing: PricingResolver;
  provisioner: EnrollmentProvisioner;
  reconciliation: ReconciliationScheduler;
}

export class RedemptionService {
  private readonly ledger: LedgerRepository;
  private readonly pricing: PricingResolver;
  private readonly provisioner: EnrollmentProvisioner;
  private readonly reconciliation: ReconciliationScheduler;

  constructor(deps: RedemptionDependencies) {
    this.ledger = deps.ledger;
    this.pricing = deps.pricing;
    this.provisioner = deps.provisioner;
    this.reconciliation = deps.reconciliation;
  }

  async currentBalance(subsidy: SubsidyRecord): Promise<number> {
    return this.ledger.balance(subsidy.ledgerId);
  }

  /**
   * Price in minor units; throws CONTENT_NOT_FOUND or UPSTREAM_ERROR
   */
  async priceForContent(subsidy: SubsidyRecord, contentKey: string): Promise<number> {
    const result = await this.pricing.priceForContent(subsidy.enterpriseCustomerUuid, contentKey);
    if (!result.ok) {
      throw pricingErrorToApiError(result.error, contentKey);
    }
    return result.price;
  }

  /**
   * Redeemable when the balance covers the price, inclusive
   */
  async isRedeemable(subsidy: SubsidyRecord, contentKey: string): Promise<Redeemability> {
    const [price, balance] = await Promise.all([
      this.priceForContent(subsidy, contentKey),
      this.currentBalance(subsidy),
    ]);
    return { redeemable: balance >= price, price };
  }

  /**
   * The committed redemption for (learner, content), if any. Pending rows
   * are in flight and do not count.
   */
  async getRedemption(
    subsidy: SubsidyRecord,
    learnerId: number,
    contentKey: string
  ): Promise<LedgerTransactionRecord | null> {
    return this.ledger.findCommittedTransaction(subsidy.ledgerId, learnerId, contentKey);
  }

  async redeem(subsidy: SubsidyRecord, request: RedeemRequest): Promise<RedeemOutcome> {
    const { learnerId, contentKey, policyId } = request;
    const endTimer = redemptionDuration.startTimer();
    addLogContext({ subsidyId: subsidy.subsidyId, learnerId, contentKey });

    try {
      const existing = await this.getRedemption(subsidy, learnerId, contentKey);
      if (existing) {
        redemptionsTotal.inc({ outcome: 'existing' });
        return { transaction: existing, created: false };
      }

      const { redeemable, price } = await traceRedemptionStep(subsidy.subsidyId, 'price', () =>
        this.isRedeemable(subsidy, contentKey)
      );
      if (!redeemable) {
        log.info({ learnerId, contentKey, price }, 'Subsidy balance does not cover content');
        redemptionsTotal.inc({ outcome: 'not_redeemable' });
        return { transaction: null, created: false };
      }

      const quantity = -price;
      const idempotencyKey =
        request.idempotencyKey ??
        createIdempotencyKeyForTransaction(ledgerIdempotencyKeyForSubsidy(subsidy.subsidyId), quantity, {
          lmsUserId: learnerId,
          contentKey,
          subsidyAccessPolicyUuid: policyId,
        });

      const { transaction, created } = await traceRedemptionStep(subsidy.subsidyId, 'create', () =>
        this.createTransaction(subsidy, idempotencyKey, quantity, {
          lmsUserId: learnerId,
          contentKey,
          subsidyAccessPolicyUuid: policyId,
        })
      );
      addLogContext({ transactionId: transaction.transactionId });

      // Another request owns this key; it finishes or rolls back on its own
      if (!created) {
        if (transaction.lmsUserId !== learnerId || transaction.contentKey !== contentKey) {
          throw ApiError.idempotencyConflict(idempotencyKey);
        }
        redemptionsTotal.inc({ outcome: 'existing' });
        return { transaction, created: false };
      }

      const committed = await this.fulfill(subsidy, learnerId, contentKey, transaction);
      redemptionsTotal.inc({ outcome: 'created' });
      log.info(
        { learnerId, contentKey, transactionId: committed.transactionId, quantity },
        'Redemption committed'
      );
      return { transaction: committed, created: true };
    } catch (error) {
      redemptionsTotal.inc({ outcome: 'failed' });
      throw error;
    } finally {
      endTimer();
    }
  }

  async createTransaction(
    subsidy: SubsidyRecord,
    idempotencyKey: string,
    quantity: number,
    details: TransactionDetails = {}
  ): Promise<CreateTransactionOutcome> {
    return this.ledger.createTransaction({
      ledgerId: subsidy.ledgerId,
      idempotencyKey,
      quantity,
      lmsUserId: details.lmsUserId ?? null,
      contentKey: details.contentKey ?? null,
      subsidyAccessPolicyUuid: details.subsidyAccessPolicyUuid ?? null,
      metadata: details.metadata,
    });
  }

  /**
   * Move a pending transaction to committed, recording what it paid for.
   * A reference id needs a reference type; that is checked before any write.
   */
  async commitTransaction(
    transaction: LedgerTransactionRecord,
    referenceId?: string | null,
    referenceType?: string | null
  ): Promise<LedgerTransactionRecord> {
    if (referenceId && !referenceType) {
      throw ApiError.invalidArgument('Cannot update a transaction with a reference_id and no reference_type');
    }

    validateTransition(transaction.state, TransactionState.COMMITTED, transaction.transactionId);

    const updated = await this.ledger.applyCommand(transaction.transactionId, TransactionState.PENDING, {
      type: 'commit',
      referenceId: referenceId ?? null,
      referenceType: referenceType ?? null,
    });
    if (updated) {
      return updated;
    }

    // The row moved on (or disappeared) since the snapshot was taken
    const current = await this.ledger.findTransaction(transaction.transactionId);
    if (!current) {
      throw ApiError.notFound('Transaction');
    }
    validateTransition(current.state, TransactionState.COMMITTED, current.transactionId);
    throw ApiError.invalidTransition(`Transaction ${current.transactionId} changed while committing`);
  }

  /**
   * Remove a pending transaction. Committed rows are refused; a row that is
   * already gone resolves to false.
   */
  async rollbackTransaction(transaction: LedgerTransactionRecord): Promise<boolean> {
    if (isTerminalState(transaction.state)) {
      throw ApiError.invalidTransition(
        `Cannot roll back transaction ${transaction.transactionId} in state ${transaction.state}`
      );
    }

    const deleted = await this.ledger.deletePendingTransaction(transaction.transactionId);
    rollbacksTotal.inc({ result: deleted ? 'success' : 'noop' });
    return deleted;
  }

  private async fulfill(
    subsidy: SubsidyRecord,
    learnerId: number,
    contentKey: string,
    transaction: LedgerTransactionRecord
  ): Promise<LedgerTransactionRecord> {
    try {
      const referenceId = await traceRedemptionStep(subsidy.subsidyId, 'enroll', () =>
        this.provisioner.enroll(learnerId, contentKey, transaction)
      );
      return await traceRedemptionStep(subsidy.subsidyId, 'commit', () =>
        this.commitTransaction(transaction, referenceId, ENROLLMENT_REFERENCE_TYPE)
      );
    } catch (error) {
      log.warn(
        { transactionId: transaction.transactionId, err: error instanceof Error ? error.message : String(error) },
        'Redemption failed after ledger write, rolling back'
      );
      await this.rollbackOrReconcile(subsidy, transaction, error);
      throw error;
    }
  }

  /**
   * Best-effort rollback for the failure path. The caller re-raises the
   * original error whatever happens here.
   */
  private async rollbackOrReconcile(
    subsidy: SubsidyRecord,
    transaction: LedgerTransactionRecord,
    cause: unknown
  ): Promise<void> {
    try {
      await traceRedemptionStep(subsidy.subsidyId, 'rollback', () => this.rollbackTransaction(transaction));
      return;
    } catch (rollbackError) {
      rollbacksTotal.inc({ result: 'failed' });
      log.error(
        { transactionId: transaction.transactionId, err: rollbackError },
        'Rollback failed, scheduling reconciliation'
      );
    }

    try {
      await this.reconciliation.schedule({
        transactionId: transaction.transactionId,
        subsidyId: subsidy.subsidyId,
        reason: cause instanceof Error ? cause.message : String(cause),
        requestedAt: new Date().toISOString(),
      });
    } catch (scheduleError) {
      log.error(
        { transactionId: transaction.transactionId, err: scheduleError },
        'Could not schedule reconciliation; pending transaction needs manual cleanup'
      );
    }
  }
}
