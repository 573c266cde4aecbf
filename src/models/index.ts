export { Subsidy, ISubsidy } from './Subsidy';
export { Ledger, ILedger } from './Ledger';
export { LedgerTransaction, ILedgerTransaction } from './LedgerTransaction';
