/**
 * Service wiring
 *
 * Builds the services the HTTP layer needs from their storage and upstream
 * collaborators. Tests pass in-process stand-ins for the collaborators.
 */

import { BullReconciliationScheduler, ReconciliationScheduler } from './queues';
import { EnrollmentProvisioner, EnterpriseEnrollmentClient } from './services/enrollment';
import { LedgerRepository, MongoLedgerRepository } from './services/ledger';
import { ContentMetadataSource, ContentSummary, EnterpriseCatalogClient, PriceCache, PricingResolver } from './services/pricing';
import { MongoSubsidyRepository, RedemptionService, SubsidyRepository, SubsidyService } from './services/subsidy';

export interface ServiceDependencies {
  ledger: LedgerRepository;
  subsidies: SubsidyRepository;
  catalog: ContentMetadataSource;
  provisioner: EnrollmentProvisioner;
  reconciliation: ReconciliationScheduler;
  priceCache?: PriceCache<ContentSummary>;
}

export interface AppServices {
  ledger: LedgerRepository;
  pricing: PricingResolver;
  subsidyService: SubsidyService;
  redemptionService: RedemptionService;
}

export const createDefaultDependencies = (): ServiceDependencies => ({
  ledger: new MongoLedgerRepository(),
  subsidies: new MongoSubsidyRepository(),
  catalog: new EnterpriseCatalogClient(),
  provisioner: new EnterpriseEnrollmentClient(),
  reconciliation: new BullReconciliationScheduler(),
});

export const buildServices = (deps: ServiceDependencies): AppServices => {
  const pricing = new PricingResolver(deps.catalog, deps.priceCache);

  return {
    ledger: deps.ledger,
    pricing,
    subsidyService: new SubsidyService({ subsidies: deps.subsidies, ledger: deps.ledger }),
    redemptionService: new RedemptionService({
      ledger: deps.ledger,
      pricing,
      provisioner: deps.provisioner,
      reconciliation: deps.reconciliation,
    }),
  };
};
