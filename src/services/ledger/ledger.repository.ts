import { v4 as uuid } from 'uuid';

import { Ledger, ILedger, LedgerTransaction, ILedgerTransaction } from '../../models';
import {
  LedgerRecord,
  LedgerTransactionRecord,
  TransactionState,
  UnitChoice,
} from '../../types/ledger';

import { voidedKeySuffix } from './ledger.idempotency';

export interface CreateLedgerInput {
  idempotencyKey: string;
  unit: UnitChoice;
  metadata?: Record<string, unknown>;
}

export interface CreateTransactionInput {
  ledgerId: string;
  idempotencyKey: string;
  quantity: number;
  state?: TransactionState;
  lmsUserId?: number | null;
  contentKey?: string | null;
  subsidyAccessPolicyUuid?: string | null;
  metadata?: Record<string, unknown>;
}

/**
 * `created` is false when the idempotency key already existed and the stored
 * row was returned instead
 */
export interface CreateTransactionOutcome {
  transaction: LedgerTransactionRecord;
  created: boolean;
}

export interface TransactionFilter {
  lmsUserId?: number;
  contentKey?: string;
  state?: TransactionState;
}

export interface Page {
  limit: number;
  offset: number;
}

export interface TransactionPage {
  transactions: LedgerTransactionRecord[];
  total: number;
}

/**
 * State change handed to storage as one conditional update
 */
export type TransactionCommand =
  | { type: 'commit'; referenceId: string | null; referenceType: string | null }
  | { type: 'fail'; reason: string };

/**
 * Ledger storage boundary.
 *
 * `createTransaction` must be a single atomic insert-or-fetch on
 * (ledger, idempotency key); `applyCommand` must only match a row still in
 * `expectedState`. Failing a row releases its idempotency key.
 */
export interface LedgerRepository {
  getOrCreateLedger(input: CreateLedgerInput): Promise<LedgerRecord>;
  createTransaction(input: CreateTransactionInput): Promise<CreateTransactionOutcome>;
  findTransaction(transactionId: string): Promise<LedgerTransactionRecord | null>;
  findTransactions(ledgerId: string, filter: TransactionFilter, page: Page): Promise<TransactionPage>;
  findCommittedTransaction(
    ledgerId: string,
    lmsUserId: number,
    contentKey: string
  ): Promise<LedgerTransactionRecord | null>;
  applyCommand(
    transactionId: string,
    expectedState: TransactionState,
    command: TransactionCommand
  ): Promise<LedgerTransactionRecord | null>;
  deletePendingTransaction(transactionId: string): Promise<boolean>;
  balance(ledgerId: string): Promise<number>;
}

const DUPLICATE_KEY_CODE = 11000;

export const isDuplicateKeyError = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === DUPLICATE_KEY_CODE;

export const toLedgerRecord = (doc: ILedger): LedgerRecord => ({
  ledgerId: doc.ledgerId,
  idempotencyKey: doc.idempotencyKey,
  unit: doc.unit,
  metadata: doc.metadata ?? {},
  createdAt: doc.createdAt,
});

export const toTransactionRecord = (doc: ILedgerTransaction): LedgerTransactionRecord =>
  Object.freeze({
    transactionId: doc.transactionId,
    ledgerId: doc.ledgerId,
    idempotencyKey: doc.idempotencyKey,
    quantity: doc.quantity,
    state: doc.state,
    referenceId: doc.referenceId ?? null,
    referenceType: doc.referenceType ?? null,
    lmsUserId: doc.lmsUserId ?? null,
    contentKey: doc.contentKey ?? null,
    subsidyAccessPolicyUuid: doc.subsidyAccessPolicyUuid ?? null,
    metadata: { ...(doc.metadata ?? {}) },
    createdAt: doc.createdAt,
    updatedAt: doc.updatedAt,
  });

const buildQuery = (ledgerId: string, filter: TransactionFilter): Record<string, unknown> => {
  const query: Record<string, unknown> = { ledgerId };
  if (filter.lmsUserId !== undefined) query.lmsUserId = filter.lmsUserId;
  if (filter.contentKey !== undefined) query.contentKey = filter.contentKey;
  if (filter.state !== undefined) query.state = filter.state;
  return query;
};

/**
 * MongoDB implementation; uniqueness comes from the index on
 * `Ledger.idempotencyKey` and the compound `(ledgerId, idempotencyKey)` index
 * on `LedgerTransaction`
 */
export class MongoLedgerRepository implements LedgerRepository {
  async getOrCreateLedger(input: CreateLedgerInput): Promise<LedgerRecord> {
    const existing = await Ledger.findOne({ idempotencyKey: input.idempotencyKey });
    if (existing) {
      return toLedgerRecord(existing);
    }

    try {
      const ledger = await Ledger.create({
        ledgerId: uuid(),
        idempotencyKey: input.idempotencyKey,
        unit: input.unit,
        metadata: input.metadata ?? {},
      });
      return toLedgerRecord(ledger);
    } catch (error) {
      if (!isDuplicateKeyError(error)) throw error;
      const raced = await Ledger.findOne({ idempotencyKey: input.idempotencyKey });
      if (!raced) throw error;
      return toLedgerRecord(raced);
    }
  }

  async createTransaction(input: CreateTransactionInput): Promise<CreateTransactionOutcome> {
    try {
      const doc = await LedgerTransaction.create({
        transactionId: uuid(),
        ledgerId: input.ledgerId,
        idempotencyKey: input.idempotencyKey,
        quantity: input.quantity,
        state: input.state ?? TransactionState.PENDING,
        lmsUserId: input.lmsUserId ?? null,
        contentKey: input.contentKey ?? null,
        subsidyAccessPolicyUuid: input.subsidyAccessPolicyUuid ?? null,
        metadata: input.metadata ?? {},
      });
      return { transaction: toTransactionRecord(doc), created: true };
    } catch (error) {
      if (!isDuplicateKeyError(error)) throw error;

      const existing = await LedgerTransaction.findOne({
        ledgerId: input.ledgerId,
        idempotencyKey: input.idempotencyKey,
      });
      // The conflicting row was rolled back between our insert and this read
      if (!existing) throw error;
      return { transaction: toTransactionRecord(existing), created: false };
    }
  }

  async findTransaction(transactionId: string): Promise<LedgerTransactionRecord | null> {
    const doc = await LedgerTransaction.findOne({ transactionId });
    return doc ? toTransactionRecord(doc) : null;
  }

  async findTransactions(ledgerId: string, filter: TransactionFilter, page: Page): Promise<TransactionPage> {
    const query = buildQuery(ledgerId, filter);

    const [docs, total] = await Promise.all([
      LedgerTransaction.find(query).sort({ createdAt: -1 }).skip(page.offset).limit(page.limit),
      LedgerTransaction.countDocuments(query),
    ]);

    return { transactions: docs.map(toTransactionRecord), total };
  }

  async findCommittedTransaction(
    ledgerId: string,
    lmsUserId: number,
    contentKey: string
  ): Promise<LedgerTransactionRecord | null> {
    const doc = await LedgerTransaction.findOne({
      ledgerId,
      lmsUserId,
      contentKey,
      state: TransactionState.COMMITTED,
    }).sort({ createdAt: 1 });
    return doc ? toTransactionRecord(doc) : null;
  }

  async applyCommand(
    transactionId: string,
    expectedState: TransactionState,
    command: TransactionCommand
  ): Promise<LedgerTransactionRecord | null> {
    const filter = { transactionId, state: expectedState };

    if (command.type === 'commit') {
      const doc = await LedgerTransaction.findOneAndUpdate(
        filter,
        {
          $set: {
            state: TransactionState.COMMITTED,
            referenceId: command.referenceId,
            referenceType: command.referenceType,
          },
        },
        { new: true }
      );
      return doc ? toTransactionRecord(doc) : null;
    }

    // The key moves aside so a retry of the same redemption can claim it
    const current = await LedgerTransaction.findOne(filter);
    if (!current) {
      return null;
    }

    const doc = await LedgerTransaction.findOneAndUpdate(
      { ...filter, idempotencyKey: current.idempotencyKey },
      {
        $set: {
          state: TransactionState.FAILED,
          idempotencyKey: `${current.idempotencyKey}${voidedKeySuffix(transactionId)}`,
          'metadata.failureReason': command.reason,
        },
      },
      { new: true }
    );
    return doc ? toTransactionRecord(doc) : null;
  }

  async deletePendingTransaction(transactionId: string): Promise<boolean> {
    const result = await LedgerTransaction.deleteOne({ transactionId, state: TransactionState.PENDING });
    return result.deletedCount === 1;
  }

  async balance(ledgerId: string): Promise<number> {
    const [result] = await LedgerTransaction.aggregate<{ total: number }>([
      { $match: { ledgerId, state: TransactionState.COMMITTED } },
      { $group: { _id: null, total: { $sum: '$quantity' } } },
    ]);
    return result?.total ?? 0;
  }
}
