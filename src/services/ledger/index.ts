/**
 * Ledger Module
 *
 * Append-only record of a subsidy's debits and credits. Only committed
 * transactions count toward the balance.
 */

export {
  LedgerRepository,
  MongoLedgerRepository,
  CreateLedgerInput,
  CreateTransactionInput,
  CreateTransactionOutcome,
  TransactionCommand,
  TransactionFilter,
  TransactionPage,
  Page,
  isDuplicateKeyError,
} from './ledger.repository';

export {
  RedemptionKeyParts,
  ledgerIdempotencyKeyForSubsidy,
  initialDepositIdempotencyKey,
  createIdempotencyKeyForTransaction,
  voidedKeySuffix,
} from './ledger.idempotency';

export { isValidTransition, validateTransition, isTerminalState } from './transaction.state';
