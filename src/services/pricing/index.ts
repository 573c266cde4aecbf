export * from './pricing.types';
export {
  parseContentMetadata,
  modeForContent,
  productSourceFor,
  listedPriceFor,
  toMinorUnits,
  priceForContent,
  summaryDataForContent,
} from './content-metadata.api';
export { PriceCache } from './price.cache';
export { ContentMetadataSource, EnterpriseCatalogClient } from './catalog.client';
export { PricingResolver, pricingErrorToApiError } from './pricing.service';
export { ContentMetadataController, toContentMetadataView } from './content-metadata.controller';
export { createContentMetadataRouter } from './content-metadata.routes';
