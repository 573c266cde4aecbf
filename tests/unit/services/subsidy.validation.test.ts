/**
 * Unit tests for Subsidy Validation
 *
 * Runs the express-validator chains of the subsidy and redemption endpoints
 * against plain request objects.
 */

import { ValidationChain, validationResult } from 'express-validator';

import {
  createSubsidyValidation,
  getRedemptionValidation,
  listTransactionsValidation,
  redeemValidation,
} from '../../../src/services/subsidy/subsidy.validation';

interface RequestParts {
  body?: Record<string, unknown>;
  params?: Record<string, string>;
  query?: Record<string, string>;
}

const SUBSIDY_ID = '3f2504e0-4f89-41d3-9a0c-0305e82c3301';
const CUSTOMER = '11111111-2222-4333-8444-555555555555';
const POLICY = 'c0ffee00-1111-4222-8333-444455556666';

// Helper to run validation and collect the messages for one field
const messagesFor = async (validations: ValidationChain[], parts: RequestParts, field: string): Promise<unknown[]> => {
  const req = { body: {}, params: { subsidyId: SUBSIDY_ID }, query: {}, ...parts };

  for (const validation of validations) {
    await validation.run(req);
  }

  return validationResult(req)
    .array()
    .flatMap((error) => (error.type === 'field' && error.path === field ? [error.msg] : []));
};

describe('Subsidy Validation', () => {
  describe('redeemValidation', () => {
    const validBody = { learnerId: 7, contentKey: 'DemoX+Intro101', policyId: POLICY };

    it('should pass a complete redemption request', async () => {
      const req = { body: validBody, params: { subsidyId: SUBSIDY_ID }, query: {} };
      for (const validation of redeemValidation) {
        await validation.run(req);
      }

      expect(validationResult(req).isEmpty()).toBe(true);
    });

    it('should reject a subsidy id that is not a UUID', async () => {
      const messages = await messagesFor(redeemValidation, { body: validBody, params: { subsidyId: '42' } }, 'subsidyId');

      expect(messages).toEqual(['Subsidy ID must be a UUID']);
    });

    it('should reject a learner id below 1', async () => {
      const messages = await messagesFor(redeemValidation, { body: { ...validBody, learnerId: 0 } }, 'learnerId');

      expect(messages).toEqual(['learnerId must be a positive integer']);
    });

    it('should require a content key', async () => {
      const messages = await messagesFor(redeemValidation, { body: { learnerId: 7, policyId: POLICY } }, 'contentKey');

      expect(messages).toContain('contentKey is required');
    });

    it('should reject a policy id that is not a UUID', async () => {
      const messages = await messagesFor(redeemValidation, { body: { ...validBody, policyId: 'policy-1' } }, 'policyId');

      expect(messages).toEqual(['policyId must be a UUID']);
    });

    describe('idempotencyKey field (optional)', () => {
      it('should pass when the key is not provided', async () => {
        await expect(messagesFor(redeemValidation, { body: validBody }, 'idempotencyKey')).resolves.toHaveLength(0);
      });

      it('should accept letters, digits, dashes and underscores', async () => {
        const messages = await messagesFor(redeemValidation, { body: { ...validBody, idempotencyKey: 'order_2024-01' } }, 'idempotencyKey');

        expect(messages).toHaveLength(0);
      });

      it.each(['order #1', 'semi;colon', 'x'.repeat(65)])('should reject %p with the header rule', async (key) => {
        const messages = await messagesFor(redeemValidation, { body: { ...validBody, idempotencyKey: key } }, 'idempotencyKey');

        expect(messages).toEqual(['Must be 1-64 letters, digits, dashes or underscores']);
      });
    });
  });

  describe('createSubsidyValidation', () => {
    it('should pass a minimal subsidy', async () => {
      const messages = await messagesFor(
        createSubsidyValidation,
        { body: { enterpriseCustomerUuid: CUSTOMER, startingBalance: 20000 } },
        'startingBalance'
      );

      expect(messages).toHaveLength(0);
    });

    it('should reject a negative starting balance', async () => {
      const messages = await messagesFor(
        createSubsidyValidation,
        { body: { enterpriseCustomerUuid: CUSTOMER, startingBalance: -1 } },
        'startingBalance'
      );

      expect(messages).toEqual(['startingBalance must be a non-negative integer']);
    });

    it('should reject a non-boolean internalOnly', async () => {
      const messages = await messagesFor(
        createSubsidyValidation,
        { body: { enterpriseCustomerUuid: CUSTOMER, startingBalance: 100, internalOnly: 'yes' } },
        'internalOnly'
      );

      expect(messages).toEqual(['internalOnly must be a boolean']);
    });

    it('should reject an unknown unit', async () => {
      const messages = await messagesFor(
        createSubsidyValidation,
        { body: { enterpriseCustomerUuid: CUSTOMER, startingBalance: 100, unit: 'euros' } },
        'unit'
      );

      expect(messages).toHaveLength(1);
    });
  });

  describe('getRedemptionValidation', () => {
    it('should require the learner id', async () => {
      const messages = await messagesFor(getRedemptionValidation, { query: { contentKey: 'DemoX+Intro101' } }, 'learnerId');

      expect(messages).toContain('learnerId is required');
    });
  });

  describe('listTransactionsValidation', () => {
    it('should cap the page size at 100', async () => {
      const messages = await messagesFor(listTransactionsValidation, { query: { limit: '101' } }, 'limit');

      expect(messages).toEqual(['Limit must be between 1 and 100']);
    });

    it('should reject a negative offset', async () => {
      const messages = await messagesFor(listTransactionsValidation, { query: { offset: '-1' } }, 'offset');

      expect(messages).toEqual(['Offset must be non-negative']);
    });

    it('should reject an unknown state', async () => {
      const messages = await messagesFor(listTransactionsValidation, { query: { state: 'void' } }, 'state');

      expect(messages).toEqual(['state must be one of: pending, committed, failed']);
    });
  });
});
