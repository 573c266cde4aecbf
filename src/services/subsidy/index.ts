export { SubsidyService, CreateSubsidyDTO, isSubsidyActive, MAX_PAGE_SIZE } from './subsidy.service';
export {
  RedemptionService,
  RedeemRequest,
  RedeemOutcome,
  Redeemability,
  RedemptionDependencies,
} from './redemption.service';
export { SubsidyRepository, MongoSubsidyRepository } from './subsidy.repository';
export { SubsidyController } from './subsidy.controller';
export { createSubsidyRouter } from './subsidy.routes';
export { toSubsidyView, toTransactionView } from './subsidy.dto';
