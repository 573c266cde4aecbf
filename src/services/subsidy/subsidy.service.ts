import { v4 as uuid } from 'uuid';

import { ApiError } from '../../middlewares/errorHandler';
import { createServiceLogger } from '../../observability';
import {
  SubsidyRecord,
  SubsidyReferenceType,
  TransactionState,
  UnitChoice,
} from '../../types/ledger';
import { initialDepositIdempotencyKey, ledgerIdempotencyKeyForSubsidy } from '../ledger/ledger.idempotency';
import { LedgerRepository, Page, TransactionFilter, TransactionPage } from '../ledger/ledger.repository';

import { SubsidyRepository } from './subsidy.repository';

const log = createServiceLogger('subsidy');

export interface CreateSubsidyDTO {
  enterpriseCustomerUuid: string;
  startingBalance: number;
  title?: string | null;
  unit?: UnitChoice;
  referenceId?: string | null;
  referenceType?: SubsidyReferenceType;
  internalOnly?: boolean;
  activeDatetime?: Date | null;
  expirationDatetime?: Date | null;
}

export const MAX_PAGE_SIZE = 100;

/**
 * Active when now falls inside [activeDatetime, expirationDatetime]; an open
 * end on either side is unbounded
 */
export const isSubsidyActive = (subsidy: SubsidyRecord, now: Date = new Date()): boolean => {
  if (subsidy.activeDatetime && now < subsidy.activeDatetime) return false;
  if (subsidy.expirationDatetime && now > subsidy.expirationDatetime) return false;
  return true;
};

export interface SubsidyDependencies {
  subsidies: SubsidyRepository;
  ledger: LedgerRepository;
}

export class SubsidyService {
  private readonly subsidies: SubsidyRepository;
  private readonly ledger: LedgerRepository;

  constructor(deps: SubsidyDependencies) {
    this.subsidies = deps.subsidies;
    this.ledger = deps.ledger;
  }

  /**
   * Create a subsidy with its ledger. A positive starting balance is
   * recorded as a committed deposit so the ledger balance is the sum of its
   * committed rows.
   */
  async createSubsidy(dto: CreateSubsidyDTO): Promise<SubsidyRecord> {
    if (!Number.isInteger(dto.startingBalance) || dto.startingBalance < 0) {
      throw ApiError.validationError('Starting balance must be a non-negative integer');
    }
    if (dto.activeDatetime && dto.expirationDatetime && dto.expirationDatetime <= dto.activeDatetime) {
      throw ApiError.validationError('Expiration must be after activation');
    }

    const subsidyId = uuid();
    const unit = dto.unit ?? UnitChoice.USD_CENTS;
    const ledgerKey = ledgerIdempotencyKeyForSubsidy(subsidyId);

    const ledger = await this.ledger.getOrCreateLedger({
      idempotencyKey: ledgerKey,
      unit,
      metadata: { subsidyId },
    });

    if (dto.startingBalance > 0) {
      await this.ledger.createTransaction({
        ledgerId: ledger.ledgerId,
        idempotencyKey: initialDepositIdempotencyKey(ledgerKey),
        quantity: dto.startingBalance,
        state: TransactionState.COMMITTED,
        metadata: { initial: true },
      });
    }

    const subsidy = await this.subsidies.create({
      subsidyId,
      title: dto.title ?? null,
      startingBalance: dto.startingBalance,
      ledgerId: ledger.ledgerId,
      unit,
      referenceId: dto.referenceId ?? null,
      referenceType: dto.referenceType ?? SubsidyReferenceType.OPPORTUNITY_PRODUCT_ID,
      enterpriseCustomerUuid: dto.enterpriseCustomerUuid,
      internalOnly: dto.internalOnly ?? false,
      activeDatetime: dto.activeDatetime ?? null,
      expirationDatetime: dto.expirationDatetime ?? null,
    });

    log.info(
      { subsidyId, ledgerId: ledger.ledgerId, startingBalance: dto.startingBalance, unit },
      'Subsidy created'
    );
    return subsidy;
  }

  async getSubsidy(subsidyId: string): Promise<SubsidyRecord> {
    const subsidy = await this.subsidies.findById(subsidyId);
    if (!subsidy) {
      throw ApiError.notFound('Subsidy');
    }
    return subsidy;
  }

  async listSubsidiesForCustomer(enterpriseCustomerUuid: string): Promise<SubsidyRecord[]> {
    return this.subsidies.findByCustomer(enterpriseCustomerUuid);
  }

  async listTransactions(
    subsidy: SubsidyRecord,
    filter: TransactionFilter = {},
    page: Partial<Page> = {}
  ): Promise<TransactionPage> {
    return this.ledger.findTransactions(subsidy.ledgerId, filter, {
      limit: Math.min(page.limit ?? 20, MAX_PAGE_SIZE),
      offset: page.offset ?? 0,
    });
  }
}
