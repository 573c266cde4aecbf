import { param, query } from 'express-validator';

export const contentMetadataValidation = [
  param('contentIdentifier')
    .notEmpty()
    .withMessage('Content identifier is required')
    .isLength({ max: 255 })
    .withMessage('Content identifier must be at most 255 characters'),
  query('enterprise_customer_uuid')
    .notEmpty()
    .withMessage('enterprise_customer_uuid is required')
    .isUUID()
    .withMessage('enterprise_customer_uuid must be a UUID'),
];
