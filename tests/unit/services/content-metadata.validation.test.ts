/**
 * Unit tests for Content Metadata Validation
 */

import { validationResult } from 'express-validator';

import { contentMetadataValidation } from '../../../src/services/pricing/content-metadata.validation';

const CUSTOMER = '11111111-2222-4333-8444-555555555555';

const messagesFor = async (contentIdentifier: string, query: Record<string, string>, field: string): Promise<unknown[]> => {
  const req = { body: {}, params: { contentIdentifier }, query };

  for (const validation of contentMetadataValidation) {
    await validation.run(req);
  }

  return validationResult(req)
    .array()
    .flatMap((error) => (error.type === 'field' && error.path === field ? [error.msg] : []));
};

describe('Content Metadata Validation', () => {
  it('should pass a content key with a customer uuid', async () => {
    const req = { body: {}, params: { contentIdentifier: 'DemoX+Intro101' }, query: { enterprise_customer_uuid: CUSTOMER } };
    for (const validation of contentMetadataValidation) {
      await validation.run(req);
    }

    expect(validationResult(req).isEmpty()).toBe(true);
  });

  it('should require the enterprise customer uuid', async () => {
    const messages = await messagesFor('DemoX+Intro101', {}, 'enterprise_customer_uuid');

    expect(messages).toContain('enterprise_customer_uuid is required');
  });

  it('should reject an enterprise customer uuid that is not a UUID', async () => {
    const messages = await messagesFor('DemoX+Intro101', { enterprise_customer_uuid: 'acme' }, 'enterprise_customer_uuid');

    expect(messages).toEqual(['enterprise_customer_uuid must be a UUID']);
  });

  it('should reject a content identifier longer than 255 characters', async () => {
    const messages = await messagesFor('c'.repeat(256), { enterprise_customer_uuid: CUSTOMER }, 'contentIdentifier');

    expect(messages).toEqual(['Content identifier must be at most 255 characters']);
  });
});
