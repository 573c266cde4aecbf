import { LedgerTransactionRecord, SubsidyRecord } from '../../types/ledger';

import { isSubsidyActive } from './subsidy.service';

export interface TransactionView {
  transactionId: string;
  ledgerId: string;
  idempotencyKey: string;
  quantity: number;
  state: string;
  referenceId: string | null;
  referenceType: string | null;
  lmsUserId: number | null;
  contentKey: string | null;
  subsidyAccessPolicyUuid: string | null;
  metadata: Record<string, unknown>;
  createdAt: string;
  updatedAt: string;
}

export interface SubsidyView {
  subsidyId: string;
  title: string | null;
  enterpriseCustomerUuid: string;
  ledgerId: string;
  unit: string;
  startingBalance: number;
  currentBalance: number;
  referenceId: string | null;
  referenceType: string;
  internalOnly: boolean;
  activeDatetime: string | null;
  expirationDatetime: string | null;
  isActive: boolean;
  createdAt: string;
}

export const toTransactionView = (transaction: LedgerTransactionRecord): TransactionView => ({
  transactionId: transaction.transactionId,
  ledgerId: transaction.ledgerId,
  idempotencyKey: transaction.idempotencyKey,
  quantity: transaction.quantity,
  state: transaction.state,
  referenceId: transaction.referenceId,
  referenceType: transaction.referenceType,
  lmsUserId: transaction.lmsUserId,
  contentKey: transaction.contentKey,
  subsidyAccessPolicyUuid: transaction.subsidyAccessPolicyUuid,
  metadata: transaction.metadata,
  createdAt: transaction.createdAt.toISOString(),
  updatedAt: transaction.updatedAt.toISOString(),
});

export const toSubsidyView = (subsidy: SubsidyRecord, currentBalance: number, now: Date = new Date()): SubsidyView => ({
  subsidyId: subsidy.subsidyId,
  title: subsidy.title,
  enterpriseCustomerUuid: subsidy.enterpriseCustomerUuid,
  ledgerId: subsidy.ledgerId,
  unit: subsidy.unit,
  startingBalance: subsidy.startingBalance,
  currentBalance,
  referenceId: subsidy.referenceId,
  referenceType: subsidy.referenceType,
  internalOnly: subsidy.internalOnly,
  activeDatetime: subsidy.activeDatetime ? subsidy.activeDatetime.toISOString() : null,
  expirationDatetime: subsidy.expirationDatetime ? subsidy.expirationDatetime.toISOString() : null,
  isActive: isSubsidyActive(subsidy, now),
  createdAt: subsidy.createdAt.toISOString(),
});
