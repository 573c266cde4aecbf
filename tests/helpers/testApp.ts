import { Application } from 'express';

import { createApp } from '../../src/app';
import { AppServices, buildServices } from '../../src/container';
import { PriceCache } from '../../src/services/pricing/price.cache';
import { ContentSummary } from '../../src/services/pricing/pricing.types';

import { FakeCatalog, FakeProvisioner, RecordingScheduler } from './fakes';
import { InMemoryLedgerRepository } from './inMemoryLedger';
import { InMemorySubsidyRepository } from './inMemorySubsidies';

export interface TestContext {
  app: Application;
  services: AppServices;
  ledger: InMemoryLedgerRepository;
  subsidies: InMemorySubsidyRepository;
  catalog: FakeCatalog;
  provisioner: FakeProvisioner;
  scheduler: RecordingScheduler;
}

/**
 * Application wired to in-process collaborators; nothing leaves the process
 */
export const createTestContext = (): TestContext => {
  const ledger = new InMemoryLedgerRepository();
  const subsidies = new InMemorySubsidyRepository();
  const catalog = new FakeCatalog();
  const provisioner = new FakeProvisioner();
  const scheduler = new RecordingScheduler();

  const services = buildServices({
    ledger,
    subsidies,
    catalog,
    provisioner,
    reconciliation: scheduler,
    priceCache: new PriceCache<ContentSummary>(16),
  });

  return {
    app: createApp(services),
    services,
    ledger,
    subsidies,
    catalog,
    provisioner,
    scheduler,
  };
};
