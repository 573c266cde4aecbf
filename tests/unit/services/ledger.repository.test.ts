/**
 * Mongo ledger repository unit tests
 *
 * Models are mocked; these tests pin down the queries the repository issues
 * and its handling of duplicate-key races.
 */

const mockLedger = {
  findOne: jest.fn(),
  create: jest.fn(),
};

const mockLedgerTransaction = {
  create: jest.fn(),
  findOne: jest.fn(),
  find: jest.fn(),
  countDocuments: jest.fn(),
  findOneAndUpdate: jest.fn(),
  deleteOne: jest.fn(),
  aggregate: jest.fn(),
};

jest.mock('../../../src/models', () => ({
  Ledger: mockLedger,
  LedgerTransaction: mockLedgerTransaction,
}));

jest.mock('uuid', () => ({
  v4: jest.fn().mockReturnValue('generated-uuid'),
}));

import { MongoLedgerRepository, isDuplicateKeyError } from '../../../src/services/ledger/ledger.repository';
import { TransactionState, UnitChoice } from '../../../src/types/ledger';

const duplicateKeyError = Object.assign(new Error('E11000 duplicate key error'), { code: 11000 });

const transactionDoc = (overrides: Record<string, unknown> = {}) => ({
  transactionId: 'txn-1',
  ledgerId: 'ledger-1',
  idempotencyKey: 'key-1',
  quantity: -14900,
  state: TransactionState.PENDING,
  referenceId: null,
  referenceType: null,
  lmsUserId: 7,
  contentKey: 'DemoX+Intro101',
  subsidyAccessPolicyUuid: 'policy-1',
  metadata: {},
  createdAt: new Date('2024-01-01T00:00:00Z'),
  updatedAt: new Date('2024-01-01T00:00:00Z'),
  ...overrides,
});

describe('MongoLedgerRepository', () => {
  const repository = new MongoLedgerRepository();

  describe('isDuplicateKeyError', () => {
    it('should recognise Mongo duplicate key errors', () => {
      expect(isDuplicateKeyError(duplicateKeyError)).toBe(true);
      expect(isDuplicateKeyError(new Error('other'))).toBe(false);
      expect(isDuplicateKeyError(null)).toBe(false);
    });
  });

  describe('getOrCreateLedger', () => {
    it('should return an existing ledger without creating', async () => {
      mockLedger.findOne.mockResolvedValueOnce({
        ledgerId: 'ledger-1',
        idempotencyKey: 'ledger-for-subsidy-s1',
        unit: UnitChoice.USD_CENTS,
        metadata: {},
        createdAt: new Date('2024-01-01T00:00:00Z'),
      });

      const ledger = await repository.getOrCreateLedger({
        idempotencyKey: 'ledger-for-subsidy-s1',
        unit: UnitChoice.USD_CENTS,
      });

      expect(ledger.ledgerId).toBe('ledger-1');
      expect(mockLedger.create).not.toHaveBeenCalled();
    });

    it('should fall back to the winner when a concurrent create races', async () => {
      mockLedger.findOne.mockResolvedValueOnce(null).mockResolvedValueOnce({
        ledgerId: 'ledger-winner',
        idempotencyKey: 'ledger-for-subsidy-s1',
        unit: UnitChoice.USD_CENTS,
        metadata: {},
        createdAt: new Date('2024-01-01T00:00:00Z'),
      });
      mockLedger.create.mockRejectedValueOnce(duplicateKeyError);

      const ledger = await repository.getOrCreateLedger({
        idempotencyKey: 'ledger-for-subsidy-s1',
        unit: UnitChoice.USD_CENTS,
      });

      expect(ledger.ledgerId).toBe('ledger-winner');
    });
  });

  describe('createTransaction', () => {
    const input = {
      ledgerId: 'ledger-1',
      idempotencyKey: 'key-1',
      quantity: -14900,
      lmsUserId: 7,
      contentKey: 'DemoX+Intro101',
      subsidyAccessPolicyUuid: 'policy-1',
    };

    it('should insert a pending row and report it as created', async () => {
      mockLedgerTransaction.create.mockResolvedValueOnce(transactionDoc({ transactionId: 'generated-uuid' }));

      const outcome = await repository.createTransaction(input);

      expect(mockLedgerTransaction.create).toHaveBeenCalledWith({
        transactionId: 'generated-uuid',
        ledgerId: 'ledger-1',
        idempotencyKey: 'key-1',
        quantity: -14900,
        state: TransactionState.PENDING,
        lmsUserId: 7,
        contentKey: 'DemoX+Intro101',
        subsidyAccessPolicyUuid: 'policy-1',
        metadata: {},
      });
      expect(outcome.created).toBe(true);
      expect(outcome.transaction.transactionId).toBe('generated-uuid');
      expect(Object.isFrozen(outcome.transaction)).toBe(true);
    });

    it('should return the existing row of the same ledger when the idempotency key collides', async () => {
      mockLedgerTransaction.create.mockRejectedValueOnce(duplicateKeyError);
      mockLedgerTransaction.findOne.mockResolvedValueOnce(transactionDoc({ transactionId: 'txn-existing' }));

      const outcome = await repository.createTransaction(input);

      expect(mockLedgerTransaction.findOne).toHaveBeenCalledWith({ ledgerId: 'ledger-1', idempotencyKey: 'key-1' });
      expect(outcome).toEqual({
        transaction: expect.objectContaining({ transactionId: 'txn-existing' }),
        created: false,
      });
    });

    it('should rethrow the duplicate key error when the conflicting row is gone', async () => {
      mockLedgerTransaction.create.mockRejectedValueOnce(duplicateKeyError);
      mockLedgerTransaction.findOne.mockResolvedValueOnce(null);

      await expect(repository.createTransaction(input)).rejects.toBe(duplicateKeyError);
    });

    it('should rethrow other errors', async () => {
      const failure = new Error('connection reset');
      mockLedgerTransaction.create.mockRejectedValueOnce(failure);

      await expect(repository.createTransaction(input)).rejects.toBe(failure);
      expect(mockLedgerTransaction.findOne).not.toHaveBeenCalled();
    });
  });

  describe('findCommittedTransaction', () => {
    it('should only match committed rows for the learner and content', async () => {
      const sort = jest.fn().mockResolvedValue(null);
      mockLedgerTransaction.findOne.mockReturnValueOnce({ sort });

      await expect(repository.findCommittedTransaction('ledger-1', 7, 'DemoX+Intro101')).resolves.toBeNull();
      expect(mockLedgerTransaction.findOne).toHaveBeenCalledWith({
        ledgerId: 'ledger-1',
        lmsUserId: 7,
        contentKey: 'DemoX+Intro101',
        state: TransactionState.COMMITTED,
      });
      expect(sort).toHaveBeenCalledWith({ createdAt: 1 });
    });
  });

  describe('findTransactions', () => {
    it('should apply filters and pagination', async () => {
      const limit = jest.fn().mockResolvedValue([transactionDoc()]);
      const skip = jest.fn().mockReturnValue({ limit });
      const sort = jest.fn().mockReturnValue({ skip });
      mockLedgerTransaction.find.mockReturnValueOnce({ sort });
      mockLedgerTransaction.countDocuments.mockResolvedValueOnce(3);

      const page = await repository.findTransactions(
        'ledger-1',
        { lmsUserId: 7, state: TransactionState.COMMITTED },
        { limit: 1, offset: 2 }
      );

      const expectedQuery = { ledgerId: 'ledger-1', lmsUserId: 7, state: TransactionState.COMMITTED };
      expect(mockLedgerTransaction.find).toHaveBeenCalledWith(expectedQuery);
      expect(mockLedgerTransaction.countDocuments).toHaveBeenCalledWith(expectedQuery);
      expect(sort).toHaveBeenCalledWith({ createdAt: -1 });
      expect(skip).toHaveBeenCalledWith(2);
      expect(limit).toHaveBeenCalledWith(1);
      expect(page.total).toBe(3);
      expect(page.transactions).toHaveLength(1);
    });
  });

  describe('applyCommand', () => {
    it('should commit only while the row is in the expected state', async () => {
      mockLedgerTransaction.findOneAndUpdate.mockResolvedValueOnce(
        transactionDoc({ state: TransactionState.COMMITTED, referenceId: 'ref-1', referenceType: 'ref-type' })
      );

      const updated = await repository.applyCommand('txn-1', TransactionState.PENDING, {
        type: 'commit',
        referenceId: 'ref-1',
        referenceType: 'ref-type',
      });

      expect(mockLedgerTransaction.findOneAndUpdate).toHaveBeenCalledWith(
        { transactionId: 'txn-1', state: TransactionState.PENDING },
        { $set: { state: TransactionState.COMMITTED, referenceId: 'ref-1', referenceType: 'ref-type' } },
        { new: true }
      );
      expect(updated?.state).toBe(TransactionState.COMMITTED);
    });

    it('should record the reason and release the key when failing a row', async () => {
      mockLedgerTransaction.findOne.mockResolvedValueOnce(transactionDoc());
      mockLedgerTransaction.findOneAndUpdate.mockResolvedValueOnce(
        transactionDoc({ state: TransactionState.FAILED, idempotencyKey: 'key-1-void-txn-1' })
      );

      const updated = await repository.applyCommand('txn-1', TransactionState.PENDING, {
        type: 'fail',
        reason: 'enrollment timed out',
      });

      expect(mockLedgerTransaction.findOne).toHaveBeenCalledWith({
        transactionId: 'txn-1',
        state: TransactionState.PENDING,
      });
      expect(mockLedgerTransaction.findOneAndUpdate).toHaveBeenCalledWith(
        { transactionId: 'txn-1', state: TransactionState.PENDING, idempotencyKey: 'key-1' },
        {
          $set: {
            state: TransactionState.FAILED,
            idempotencyKey: 'key-1-void-txn-1',
            'metadata.failureReason': 'enrollment timed out',
          },
        },
        { new: true }
      );
      expect(updated).toMatchObject({ state: TransactionState.FAILED, idempotencyKey: 'key-1-void-txn-1' });
    });

    it('should not fail a row that is no longer in the expected state', async () => {
      mockLedgerTransaction.findOne.mockResolvedValueOnce(null);

      const updated = await repository.applyCommand('txn-1', TransactionState.PENDING, {
        type: 'fail',
        reason: 'enrollment timed out',
      });

      expect(updated).toBeNull();
      expect(mockLedgerTransaction.findOneAndUpdate).not.toHaveBeenCalled();
    });
  });

  describe('deletePendingTransaction', () => {
    it('should delete only pending rows', async () => {
      mockLedgerTransaction.deleteOne.mockResolvedValueOnce({ deletedCount: 1 });

      await expect(repository.deletePendingTransaction('txn-1')).resolves.toBe(true);
      expect(mockLedgerTransaction.deleteOne).toHaveBeenCalledWith({
        transactionId: 'txn-1',
        state: TransactionState.PENDING,
      });
    });

    it('should report false when nothing matched', async () => {
      mockLedgerTransaction.deleteOne.mockResolvedValueOnce({ deletedCount: 0 });

      await expect(repository.deletePendingTransaction('txn-1')).resolves.toBe(false);
    });
  });

  describe('balance', () => {
    it('should sum committed quantities', async () => {
      mockLedgerTransaction.aggregate.mockResolvedValueOnce([{ total: 5100 }]);

      await expect(repository.balance('ledger-1')).resolves.toBe(5100);
      expect(mockLedgerTransaction.aggregate).toHaveBeenCalledWith([
        { $match: { ledgerId: 'ledger-1', state: TransactionState.COMMITTED } },
        { $group: { _id: null, total: { $sum: '$quantity' } } },
      ]);
    });

    it('should be zero for a ledger without committed rows', async () => {
      mockLedgerTransaction.aggregate.mockResolvedValueOnce([]);

      await expect(repository.balance('ledger-1')).resolves.toBe(0);
    });
  });
});
