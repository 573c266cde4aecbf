import { Router, Request, Response, NextFunction } from 'express';

import { authMiddleware } from '../../auth';
import { validateIdempotencyKey } from '../../middlewares/idempotency';
import { redemptionLimiter } from '../../middlewares/rateLimiter';
import { validateRequest } from '../../middlewares/validateRequest';

import { SubsidyController } from './subsidy.controller';
import {
  canRedeemValidation,
  createSubsidyValidation,
  getRedemptionValidation,
  getSubsidyValidation,
  listSubsidiesValidation,
  listTransactionsValidation,
  redeemValidation,
} from './subsidy.validation';

export const createSubsidyRouter = (controller: SubsidyController): Router => {
  const router = Router();

  // All subsidy routes require authentication
  router.use(authMiddleware);

  // POST /subsidies - Create a subsidy with its ledger
  router.post(
    '/',
    createSubsidyValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.create(req, res, next)
  );

  // GET /subsidies - List a customer's subsidies
  router.get(
    '/',
    listSubsidiesValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.list(req, res, next)
  );

  // GET /subsidies/:subsidyId - Subsidy with current balance
  router.get(
    '/:subsidyId',
    getSubsidyValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.get(req, res, next)
  );

  // GET /subsidies/:subsidyId/can-redeem - Balance check for content
  router.get(
    '/:subsidyId/can-redeem',
    canRedeemValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.canRedeem(req, res, next)
  );

  // GET /subsidies/:subsidyId/redemption - Committed redemption lookup
  router.get(
    '/:subsidyId/redemption',
    getRedemptionValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.getRedemption(req, res, next)
  );

  // POST /subsidies/:subsidyId/redemptions - Redeem for a learner
  router.post(
    '/:subsidyId/redemptions',
    redemptionLimiter,
    validateIdempotencyKey,
    redeemValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.redeem(req, res, next)
  );

  // GET /subsidies/:subsidyId/transactions - Ledger transactions, filtered
  router.get(
    '/:subsidyId/transactions',
    listTransactionsValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.listTransactions(req, res, next)
  );

  return router;
};
