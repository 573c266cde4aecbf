import { Response, NextFunction } from 'express';

import { AuthRequest, ensureAuthorized, Permission } from '../../auth';
import { ApiError } from '../../middlewares/errorHandler';
import { idempotencyKeyFrom } from '../../middlewares/idempotency';
import { SubsidyReferenceType, TransactionState, UnitChoice } from '../../types/ledger';
import {
  bodyOf,
  booleanField,
  dateField,
  intField,
  isEnumValue,
  queryInt,
  queryString,
  stringField,
} from '../../utils/request';

import { toSubsidyView, toTransactionView } from './subsidy.dto';
import { RedemptionService } from './redemption.service';
import { SubsidyService } from './subsidy.service';

export class SubsidyController {
  constructor(
    private readonly subsidyService: SubsidyService,
    private readonly redemptionService: RedemptionService
  ) {}

  /**
   * Create a subsidy and its ledger
   * POST /subsidies
   */
  async create(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const body = bodyOf(req);
      const enterpriseCustomerUuid = stringField(body, 'enterpriseCustomerUuid');
      const startingBalance = intField(body, 'startingBalance');
      if (!enterpriseCustomerUuid || startingBalance === undefined) {
        throw ApiError.validationError('enterpriseCustomerUuid and startingBalance are required');
      }

      ensureAuthorized(req.user, Permission.CREATE_SUBSIDY, enterpriseCustomerUuid);

      const { unit, referenceType } = body;

      const subsidy = await this.subsidyService.createSubsidy({
        enterpriseCustomerUuid,
        startingBalance,
        title: stringField(body, 'title') ?? null,
        unit: isEnumValue(UnitChoice, unit) ? unit : undefined,
        referenceId: stringField(body, 'referenceId') ?? null,
        referenceType: isEnumValue(SubsidyReferenceType, referenceType) ? referenceType : undefined,
        internalOnly: booleanField(body, 'internalOnly'),
        activeDatetime: dateField(body, 'activeDatetime'),
        expirationDatetime: dateField(body, 'expirationDatetime'),
      });

      const balance = await this.redemptionService.currentBalance(subsidy);

      res.status(201).json({
        success: true,
        data: { subsidy: toSubsidyView(subsidy, balance) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * List a customer's subsidies
   * GET /subsidies?enterpriseCustomerUuid=
   */
  async list(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const enterpriseCustomerUuid = queryString(req, 'enterpriseCustomerUuid');
      if (!enterpriseCustomerUuid) {
        throw ApiError.validationError('enterpriseCustomerUuid is required');
      }
      ensureAuthorized(req.user, Permission.READ_SUBSIDY, enterpriseCustomerUuid);

      const subsidies = await this.subsidyService.listSubsidiesForCustomer(enterpriseCustomerUuid);
      const views = await Promise.all(
        subsidies.map(async (subsidy) => toSubsidyView(subsidy, await this.redemptionService.currentBalance(subsidy)))
      );

      res.status(200).json({
        success: true,
        data: { subsidies: views },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /subsidies/:subsidyId
   */
  async get(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const subsidy = await this.subsidyService.getSubsidy(req.params.subsidyId);
      ensureAuthorized(req.user, Permission.READ_SUBSIDY, subsidy.enterpriseCustomerUuid);

      const balance = await this.redemptionService.currentBalance(subsidy);

      res.status(200).json({
        success: true,
        data: { subsidy: toSubsidyView(subsidy, balance) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Whether the balance covers the content's price
   * GET /subsidies/:subsidyId/can-redeem?contentKey=
   */
  async canRedeem(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const subsidy = await this.subsidyService.getSubsidy(req.params.subsidyId);
      ensureAuthorized(req.user, Permission.READ_SUBSIDY, subsidy.enterpriseCustomerUuid);

      const contentKey = queryString(req, 'contentKey');
      if (!contentKey) {
        throw ApiError.validationError('contentKey is required');
      }

      const { redeemable, price } = await this.redemptionService.isRedeemable(subsidy, contentKey);

      res.status(200).json({
        success: true,
        data: { contentKey, redeemable, price },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * The committed redemption for a learner and content
   * GET /subsidies/:subsidyId/redemption?learnerId=&contentKey=
   */
  async getRedemption(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const subsidy = await this.subsidyService.getSubsidy(req.params.subsidyId);
      ensureAuthorized(req.user, Permission.READ_TRANSACTIONS, subsidy.enterpriseCustomerUuid);

      const learnerId = queryInt(req, 'learnerId');
      const contentKey = queryString(req, 'contentKey');
      if (learnerId === undefined || !contentKey) {
        throw ApiError.validationError('learnerId and contentKey are required');
      }

      const redemption = await this.redemptionService.getRedemption(subsidy, learnerId, contentKey);
      if (!redemption) {
        throw ApiError.notFound('Redemption');
      }

      res.status(200).json({
        success: true,
        data: { transaction: toTransactionView(redemption) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Redeem the subsidy for a learner
   * POST /subsidies/:subsidyId/redemptions
   */
  async redeem(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const subsidy = await this.subsidyService.getSubsidy(req.params.subsidyId);
      ensureAuthorized(req.user, Permission.REDEEM, subsidy.enterpriseCustomerUuid);

      const body = bodyOf(req);
      const learnerId = intField(body, 'learnerId');
      const contentKey = stringField(body, 'contentKey');
      const policyId = stringField(body, 'policyId');
      if (learnerId === undefined || !contentKey || !policyId) {
        throw ApiError.validationError('learnerId, contentKey and policyId are required');
      }

      const outcome = await this.redemptionService.redeem(subsidy, {
        learnerId,
        contentKey,
        policyId,
        idempotencyKey: idempotencyKeyFrom(req),
      });

      res.status(outcome.created ? 201 : 200).json({
        success: true,
        data: {
          transaction: outcome.transaction ? toTransactionView(outcome.transaction) : null,
          created: outcome.created,
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /subsidies/:subsidyId/transactions
   */
  async listTransactions(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const subsidy = await this.subsidyService.getSubsidy(req.params.subsidyId);
      ensureAuthorized(req.user, Permission.READ_TRANSACTIONS, subsidy.enterpriseCustomerUuid);

      const state = queryString(req, 'state');
      const limit = queryInt(req, 'limit') ?? 20;
      const offset = queryInt(req, 'offset') ?? 0;

      const { transactions, total } = await this.subsidyService.listTransactions(
        subsidy,
        {
          lmsUserId: queryInt(req, 'lmsUserId'),
          contentKey: queryString(req, 'contentKey'),
          state: isEnumValue(TransactionState, state) ? state : undefined,
        },
        { limit, offset }
      );

      res.status(200).json({
        success: true,
        data: {
          transactions: transactions.map(toTransactionView),
          pagination: {
            total,
            limit,
            offset,
            hasMore: offset + transactions.length < total,
          },
        },
      });
    } catch (error) {
      next(error);
    }
  }
}
