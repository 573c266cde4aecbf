/**
 * Enterprise Catalog Client
 *
 * Fetches content metadata for a customer from the catalog service. Failures
 * come back as values so the resolver can tell "not in the catalog" apart
 * from "the catalog could not be reached".
 */

import axios, { AxiosInstance } from 'axios';

import { config } from '../../config';
import { createServiceLogger } from '../../observability';

import { parseContentMetadata } from './content-metadata.api';
import { CatalogResult } from './pricing.types';

const log = createServiceLogger('catalog-client');

export interface ContentMetadataSource {
  getContentMetadata(enterpriseCustomerUuid: string, contentIdentifier: string): Promise<CatalogResult>;
}

export const createCatalogHttpClient = (): AxiosInstance =>
  axios.create({
    baseURL: config.catalog.baseUrl,
    timeout: config.catalog.timeoutMs,
    headers: {
      'Content-Type': 'application/json',
      ...(config.catalog.apiToken && { Authorization: `Bearer ${config.catalog.apiToken}` }),
    },
  });

export class EnterpriseCatalogClient implements ContentMetadataSource {
  constructor(private readonly http: AxiosInstance = createCatalogHttpClient()) {}

  static contentMetadataPath(enterpriseCustomerUuid: string, contentIdentifier: string): string {
    return (
      `/api/v1/enterprise-customer/${encodeURIComponent(enterpriseCustomerUuid)}` +
      `/content-metadata/${encodeURIComponent(contentIdentifier)}/`
    );
  }

  async getContentMetadata(enterpriseCustomerUuid: string, contentIdentifier: string): Promise<CatalogResult> {
    const path = EnterpriseCatalogClient.contentMetadataPath(enterpriseCustomerUuid, contentIdentifier);

    try {
      const response = await this.http.get<unknown>(path);
      const metadata = parseContentMetadata(response.data);
      if (!metadata) {
        log.warn({ enterpriseCustomerUuid, contentIdentifier }, 'Catalog returned a malformed payload');
        return {
          ok: false,
          error: { kind: 'TRANSPORT', status: response.status, detail: 'Malformed content metadata payload' },
        };
      }
      return { ok: true, metadata };
    } catch (error) {
      if (!axios.isAxiosError(error)) {
        throw error;
      }

      const status = error.response?.status;
      if (status === 404) {
        return { ok: false, error: { kind: 'NOT_FOUND', reason: 'CONTENT_NOT_FOUND' } };
      }

      log.warn(
        { enterpriseCustomerUuid, contentIdentifier, status, err: error.message },
        'Catalog content metadata request failed'
      );
      return { ok: false, error: { kind: 'TRANSPORT', status, detail: error.message } };
    }
  }
}
