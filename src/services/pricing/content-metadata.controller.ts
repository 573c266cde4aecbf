import { Response, NextFunction } from 'express';

import { AuthRequest } from '../../auth';
import { ApiError } from '../../middlewares/errorHandler';
import { queryString } from '../../utils/request';

import { PricingResolver, pricingErrorToApiError } from './pricing.service';
import { ContentSummary } from './pricing.types';

/**
 * Wire shape of the content summary; field names follow the catalog's
 */
export interface ContentMetadataView {
  content_uuid: string | null;
  content_key: string | null;
  course_run_key: string | null;
  source: string;
  content_price: number;
}

export const toContentMetadataView = (summary: ContentSummary): ContentMetadataView => ({
  content_uuid: summary.contentUuid,
  content_key: summary.contentKey,
  course_run_key: summary.courseRunKey,
  source: summary.source,
  content_price: summary.contentPrice,
});

export class ContentMetadataController {
  constructor(private readonly pricing: PricingResolver) {}

  /**
   * GET /content-metadata/:contentIdentifier?enterprise_customer_uuid=
   */
  async get(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const { contentIdentifier } = req.params;
      const enterpriseCustomerUuid = queryString(req, 'enterprise_customer_uuid');
      if (!enterpriseCustomerUuid) {
        throw ApiError.validationError('enterprise_customer_uuid is required');
      }

      const result = await this.pricing.contentSummary(enterpriseCustomerUuid, contentIdentifier);
      if (!result.ok) {
        throw pricingErrorToApiError(result.error, contentIdentifier);
      }

      res.status(200).json({
        success: true,
        data: toContentMetadataView(result.summary),
      });
    } catch (error) {
      next(error);
    }
  }
}
