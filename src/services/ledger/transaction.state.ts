import { TransactionState } from '../../types/ledger';
import { ApiError } from '../../middlewares/errorHandler';

/**
 * Valid state transitions for a ledger transaction
 *
 * State Machine:
 *   PENDING ──(provisioned & committed)──► COMMITTED
 *      │
 *      └──(reconciliation gave up)──────► FAILED
 *
 * A rolled-back PENDING row is deleted rather than transitioned, which frees
 * its idempotency key for the next attempt.
 */
const validTransitions: Record<TransactionState, readonly TransactionState[]> = {
  [TransactionState.PENDING]: [TransactionState.COMMITTED, TransactionState.FAILED],
  [TransactionState.COMMITTED]: [],
  [TransactionState.FAILED]: [],
};

export function isValidTransition(currentState: TransactionState, nextState: TransactionState): boolean {
  return validTransitions[currentState].includes(nextState);
}

/**
 * Throws INVALID_STATE_TRANSITION if the move is not allowed
 */
export function validateTransition(
  currentState: TransactionState,
  nextState: TransactionState,
  transactionId: string
): void {
  if (!isValidTransition(currentState, nextState)) {
    throw ApiError.invalidTransition(
      `Invalid state transition from ${currentState} to ${nextState} for transaction ${transactionId}`
    );
  }
}

export function isTerminalState(state: TransactionState): boolean {
  return validTransitions[state].length === 0;
}
