/**
 * Ledger and subsidy domain types shared by models, repositories and services.
 *
 * Records are plain snapshots; storage hands out new ones on every change.
 */

export enum TransactionState {
  PENDING = 'pending',
  COMMITTED = 'committed',
  FAILED = 'failed',
}

export enum UnitChoice {
  USD_CENTS = 'usd_cents',
  SEATS = 'seats',
  JPY = 'jpy',
}

export enum SubsidyReferenceType {
  OPPORTUNITY_PRODUCT_ID = 'opportunity_product_id',
}

/**
 * reference_type stamped on a transaction committed against an enrollment
 */
export const ENROLLMENT_REFERENCE_TYPE = 'enterprise_fulfillment_source_uuid';

export interface LedgerRecord {
  ledgerId: string;
  idempotencyKey: string;
  unit: UnitChoice;
  metadata: Record<string, unknown>;
  createdAt: Date;
}

export interface LedgerTransactionRecord {
  transactionId: string;
  ledgerId: string;
  idempotencyKey: string;
  quantity: number;
  state: TransactionState;
  referenceId: string | null;
  referenceType: string | null;
  lmsUserId: number | null;
  contentKey: string | null;
  subsidyAccessPolicyUuid: string | null;
  metadata: Record<string, unknown>;
  createdAt: Date;
  updatedAt: Date;
}

export interface SubsidyRecord {
  subsidyId: string;
  title: string | null;
  startingBalance: number;
  ledgerId: string;
  unit: UnitChoice;
  referenceId: string | null;
  referenceType: SubsidyReferenceType;
  enterpriseCustomerUuid: string;
  internalOnly: boolean;
  activeDatetime: Date | null;
  expirationDatetime: Date | null;
  createdAt: Date;
  updatedAt: Date;
}
