import { body, param, query } from 'express-validator';

import { IDEMPOTENCY_KEY_PATTERN, IDEMPOTENCY_KEY_RULE } from '../../middlewares/idempotency';
import { SubsidyReferenceType, TransactionState, UnitChoice } from '../../types/ledger';

const subsidyIdParam = param('subsidyId')
  .isUUID()
  .withMessage('Subsidy ID must be a UUID');

const contentKeyQuery = query('contentKey')
  .notEmpty()
  .withMessage('contentKey is required')
  .isString()
  .isLength({ max: 255 })
  .withMessage('contentKey must be at most 255 characters');

export const createSubsidyValidation = [
  body('enterpriseCustomerUuid')
    .notEmpty()
    .withMessage('enterpriseCustomerUuid is required')
    .isUUID()
    .withMessage('enterpriseCustomerUuid must be a UUID'),
  body('startingBalance')
    .notEmpty()
    .withMessage('startingBalance is required')
    .isInt({ min: 0 })
    .withMessage('startingBalance must be a non-negative integer'),
  body('title').optional({ values: 'null' }).isString().isLength({ max: 255 }),
  body('unit')
    .optional()
    .isIn(Object.values(UnitChoice))
    .withMessage(`unit must be one of: ${Object.values(UnitChoice).join(', ')}`),
  body('referenceId').optional({ values: 'null' }).isString().isLength({ max: 255 }),
  body('referenceType')
    .optional()
    .isIn(Object.values(SubsidyReferenceType))
    .withMessage(`referenceType must be one of: ${Object.values(SubsidyReferenceType).join(', ')}`),
  body('internalOnly').optional().isBoolean({ strict: true }).withMessage('internalOnly must be a boolean'),
  body('activeDatetime').optional({ values: 'null' }).isISO8601().withMessage('activeDatetime must be ISO 8601'),
  body('expirationDatetime')
    .optional({ values: 'null' })
    .isISO8601()
    .withMessage('expirationDatetime must be ISO 8601'),
];

export const listSubsidiesValidation = [
  query('enterpriseCustomerUuid')
    .notEmpty()
    .withMessage('enterpriseCustomerUuid is required')
    .isUUID()
    .withMessage('enterpriseCustomerUuid must be a UUID'),
];

export const getSubsidyValidation = [subsidyIdParam];

export const canRedeemValidation = [subsidyIdParam, contentKeyQuery];

export const getRedemptionValidation = [
  subsidyIdParam,
  contentKeyQuery,
  query('learnerId')
    .notEmpty()
    .withMessage('learnerId is required')
    .isInt({ min: 1 })
    .withMessage('learnerId must be a positive integer'),
];

export const redeemValidation = [
  subsidyIdParam,
  body('learnerId')
    .notEmpty()
    .withMessage('learnerId is required')
    .isInt({ min: 1 })
    .withMessage('learnerId must be a positive integer'),
  body('contentKey')
    .notEmpty()
    .withMessage('contentKey is required')
    .isString()
    .isLength({ max: 255 })
    .withMessage('contentKey must be at most 255 characters'),
  body('policyId')
    .notEmpty()
    .withMessage('policyId is required')
    .isUUID()
    .withMessage('policyId must be a UUID'),
  body('idempotencyKey')
    .optional()
    .isString()
    .withMessage('Idempotency key must be a string')
    .matches(IDEMPOTENCY_KEY_PATTERN)
    .withMessage(IDEMPOTENCY_KEY_RULE),
];

export const listTransactionsValidation = [
  subsidyIdParam,
  query('lmsUserId').optional().isInt({ min: 1 }).withMessage('lmsUserId must be a positive integer'),
  query('contentKey').optional().isString().isLength({ min: 1, max: 255 }),
  query('state')
    .optional()
    .isIn(Object.values(TransactionState))
    .withMessage(`state must be one of: ${Object.values(TransactionState).join(', ')}`),
  query('limit').optional().isInt({ min: 1, max: 100 }).withMessage('Limit must be between 1 and 100'),
  query('offset').optional().isInt({ min: 0 }).withMessage('Offset must be non-negative'),
];
