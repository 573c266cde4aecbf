/**
 * Pricing Resolver
 *
 * Turns catalog metadata into an integer price in minor units for a
 * (customer, content) pair. Successful summaries are cached; failures never are.
 */

import { config } from '../../config';
import { ErrorCode } from '../../types/errors';
import { ApiError } from '../../middlewares/errorHandler';
import { createServiceLogger, priceLookupsTotal } from '../../observability';

import { ContentMetadataSource } from './catalog.client';
import { summaryDataForContent } from './content-metadata.api';
import { PriceCache } from './price.cache';
import { ContentSummary, PriceResult, PricingError, SummaryResult } from './pricing.types';

const log = createServiceLogger('pricing');

export class PricingResolver {
  private readonly cache: PriceCache<ContentSummary>;

  constructor(
    private readonly catalog: ContentMetadataSource,
    cache?: PriceCache<ContentSummary>
  ) {
    this.cache = cache ?? new PriceCache<ContentSummary>(config.pricing.cacheMaxEntries);
  }

  async contentSummary(enterpriseCustomerUuid: string, contentKey: string): Promise<SummaryResult> {
    const cached = this.cache.get(enterpriseCustomerUuid, contentKey);
    if (cached) {
      priceLookupsTotal.inc({ result: 'hit' });
      return { ok: true, summary: cached };
    }

    const fetched = await this.catalog.getContentMetadata(enterpriseCustomerUuid, contentKey);
    if (!fetched.ok) {
      this.recordFailure(fetched.error);
      return fetched;
    }

    const summary = summaryDataForContent(contentKey, fetched.metadata);
    if (!summary) {
      log.info({ enterpriseCustomerUuid, contentKey }, 'Content has no price for its mode');
      const error: PricingError = { kind: 'NOT_FOUND', reason: 'PRICE_NOT_FOUND' };
      this.recordFailure(error);
      return { ok: false, error };
    }

    priceLookupsTotal.inc({ result: 'miss' });
    this.cache.set(enterpriseCustomerUuid, contentKey, summary);
    return { ok: true, summary };
  }

  async priceForContent(enterpriseCustomerUuid: string, contentKey: string): Promise<PriceResult> {
    const result = await this.contentSummary(enterpriseCustomerUuid, contentKey);
    return result.ok ? { ok: true, price: result.summary.contentPrice } : result;
  }

  invalidate(enterpriseCustomerUuid: string, contentKey: string): void {
    this.cache.invalidate(enterpriseCustomerUuid, contentKey);
  }

  clearCache(): void {
    this.cache.clear();
  }

  private recordFailure(error: PricingError): void {
    priceLookupsTotal.inc({ result: error.kind === 'NOT_FOUND' ? 'not_found' : 'transport_error' });
  }
}

/**
 * Map a pricing failure onto the API error the HTTP layer reports
 */
export const pricingErrorToApiError = (error: PricingError, contentKey: string): ApiError => {
  if (error.kind === 'NOT_FOUND') {
    return ApiError.contentNotFound(contentKey);
  }
  return ApiError.upstream(
    ErrorCode.UPSTREAM_ERROR,
    `Could not fetch content metadata for ${contentKey}: ${error.detail}`,
    error.status
  );
};
