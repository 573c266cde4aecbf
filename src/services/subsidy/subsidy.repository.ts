import { Subsidy, ISubsidy } from '../../models';
import { SubsidyRecord, SubsidyReferenceType, UnitChoice } from '../../types/ledger';

export interface CreateSubsidyInput {
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
}

export interface SubsidyRepository {
  create(input: CreateSubsidyInput): Promise<SubsidyRecord>;
  findById(subsidyId: string): Promise<SubsidyRecord | null>;
  findByCustomer(enterpriseCustomerUuid: string): Promise<SubsidyRecord[]>;
}

export const toSubsidyRecord = (doc: ISubsidy): SubsidyRecord => ({
  subsidyId: doc.subsidyId,
  title: doc.title ?? null,
  startingBalance: doc.startingBalance,
  ledgerId: doc.ledgerId,
  unit: doc.unit,
  referenceId: doc.referenceId ?? null,
  referenceType: doc.referenceType,
  enterpriseCustomerUuid: doc.enterpriseCustomerUuid,
  internalOnly: doc.internalOnly,
  activeDatetime: doc.activeDatetime ?? null,
  expirationDatetime: doc.expirationDatetime ?? null,
  createdAt: doc.createdAt,
  updatedAt: doc.updatedAt,
});

export class MongoSubsidyRepository implements SubsidyRepository {
  async create(input: CreateSubsidyInput): Promise<SubsidyRecord> {
    const doc = await Subsidy.create(input);
    return toSubsidyRecord(doc);
  }

  async findById(subsidyId: string): Promise<SubsidyRecord | null> {
    const doc = await Subsidy.findOne({ subsidyId });
    return doc ? toSubsidyRecord(doc) : null;
  }

  async findByCustomer(enterpriseCustomerUuid: string): Promise<SubsidyRecord[]> {
    const docs = await Subsidy.find({ enterpriseCustomerUuid }).sort({ createdAt: -1 });
    return docs.map(toSubsidyRecord);
  }
}
