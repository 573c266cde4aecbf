import { Router, Request, Response, NextFunction } from 'express';

import { authMiddleware, requirePermission, Permission } from '../../auth';
import { config } from '../../config';
import { cacheResponse } from '../../middlewares/responseCache';
import { validateRequest } from '../../middlewares/validateRequest';
import { queryString } from '../../utils/request';

import { ContentMetadataController } from './content-metadata.controller';
import { contentMetadataValidation } from './content-metadata.validation';

const customerFromQuery = (req: Request): string | undefined => queryString(req, 'enterprise_customer_uuid');

export const createContentMetadataRouter = (controller: ContentMetadataController): Router => {
  const router = Router();

  router.use(authMiddleware);

  // GET /content-metadata/:contentIdentifier - Price and source for a customer
  router.get(
    '/:contentIdentifier',
    contentMetadataValidation,
    validateRequest,
    requirePermission(Permission.READ_CONTENT_METADATA, customerFromQuery),
    cacheResponse(config.pricing.contentMetadataCacheSeconds, (req) => {
      const customer = customerFromQuery(req);
      return customer ? `content-metadata:${customer}:${req.params.contentIdentifier}` : null;
    }),
    (req: Request, res: Response, next: NextFunction) => controller.get(req, res, next)
  );

  return router;
};
