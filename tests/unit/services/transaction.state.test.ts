/**
 * Unit tests for the ledger transaction state machine
 *
 * Pure functions; no mocking required.
 */

import {
  isTerminalState,
  isValidTransition,
  validateTransition,
} from '../../../src/services/ledger/transaction.state';
import { ApiError } from '../../../src/middlewares/errorHandler';
import { ErrorCode } from '../../../src/types/errors';
import { TransactionState } from '../../../src/types/ledger';

describe('Ledger transaction state machine', () => {
  describe('isValidTransition', () => {
    it('should allow pending to committed', () => {
      expect(isValidTransition(TransactionState.PENDING, TransactionState.COMMITTED)).toBe(true);
    });

    it('should allow pending to failed', () => {
      expect(isValidTransition(TransactionState.PENDING, TransactionState.FAILED)).toBe(true);
    });

    it('should not allow leaving committed', () => {
      expect(isValidTransition(TransactionState.COMMITTED, TransactionState.PENDING)).toBe(false);
      expect(isValidTransition(TransactionState.COMMITTED, TransactionState.FAILED)).toBe(false);
      expect(isValidTransition(TransactionState.COMMITTED, TransactionState.COMMITTED)).toBe(false);
    });

    it('should not allow leaving failed', () => {
      expect(isValidTransition(TransactionState.FAILED, TransactionState.COMMITTED)).toBe(false);
    });
  });

  describe('validateTransition', () => {
    it('should not throw for a valid transition', () => {
      expect(() => validateTransition(TransactionState.PENDING, TransactionState.COMMITTED, 'txn-1')).not.toThrow();
    });

    it('should throw INVALID_STATE_TRANSITION with a 409', () => {
      expect.assertions(3);
      try {
        validateTransition(TransactionState.COMMITTED, TransactionState.COMMITTED, 'txn-1');
      } catch (error) {
        expect(error).toBeInstanceOf(ApiError);
        expect(error).toMatchObject({ errorCode: ErrorCode.INVALID_STATE_TRANSITION, statusCode: 409 });
        expect(error).toHaveProperty(
          'message',
          'Invalid state transition from committed to committed for transaction txn-1'
        );
      }
    });
  });

  describe('isTerminalState', () => {
    it('should treat committed and failed as terminal', () => {
      expect(isTerminalState(TransactionState.COMMITTED)).toBe(true);
      expect(isTerminalState(TransactionState.FAILED)).toBe(true);
      expect(isTerminalState(TransactionState.PENDING)).toBe(false);
    });
  });
});
