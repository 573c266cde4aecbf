import { SubsidyRole } from '../../../src/auth';
import { ApiError } from '../../../src/middlewares/errorHandler';
import { ErrorCode } from '../../../src/types/errors';
import { ENROLLMENT_REFERENCE_TYPE, TransactionState } from '../../../src/types/ledger';
import { createTestContext, TestContext } from '../../helpers/testApp';
import { authenticatedRequest, signToken } from '../../helpers/testAuth';

const CUSTOMER = '11111111-2222-4333-8444-555555555555';
const POLICY = 'c0ffee00-1111-4222-8333-444455556666';
const COURSE = 'DemoX+Intro101';

describe('Redemptions API', () => {
  let ctx: TestContext;
  let operatorToken: string;
  let subsidyId: string;

  const client = () => authenticatedRequest(ctx.app, operatorToken);

  const redeem = (body: Record<string, unknown> = {}) =>
    client()
      .post(`/api/v1/subsidies/${subsidyId}/redemptions`)
      .send({ learnerId: 7, contentKey: COURSE, policyId: POLICY, ...body });

  const balance = async (): Promise<number> => {
    const response = await client().get(`/api/v1/subsidies/${subsidyId}`);
    return response.body.data.subsidy.currentBalance;
  };

  beforeEach(async () => {
    ctx = createTestContext();
    ctx.catalog.register(CUSTOMER, COURSE, 'verifiedCourse');
    ctx.catalog.register(CUSTOMER, 'ExecEd+Strategy300', 'premiumExecEdCourse');
    operatorToken = signToken('operator-1', [{ role: SubsidyRole.OPERATOR, context: CUSTOMER }]);

    const created = await client()
      .post('/api/v1/subsidies')
      .send({ enterpriseCustomerUuid: CUSTOMER, startingBalance: 20000 });
    subsidyId = created.body.data.subsidy.subsidyId;
  });

  describe('GET /can-redeem', () => {
    it('should report redeemable content with its price', async () => {
      const response = await client()
        .get(`/api/v1/subsidies/${subsidyId}/can-redeem`)
        .query({ contentKey: COURSE });

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({ contentKey: COURSE, redeemable: true, price: 14900 });
    });

    it('should report content the balance cannot cover', async () => {
      const response = await client()
        .get(`/api/v1/subsidies/${subsidyId}/can-redeem`)
        .query({ contentKey: 'ExecEd+Strategy300' });

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({ contentKey: 'ExecEd+Strategy300', redeemable: false, price: 210000 });
    });

    it('should answer 404 for unpriced content', async () => {
      const response = await client()
        .get(`/api/v1/subsidies/${subsidyId}/can-redeem`)
        .query({ contentKey: 'Missing+Course' });

      expect(response.status).toBe(404);
      expect(response.body.error.code).toBe(ErrorCode.CONTENT_NOT_FOUND);
    });
  });

  describe('POST /redemptions', () => {
    it('should redeem, enroll and debit the subsidy', async () => {
      const response = await redeem();

      expect(response.status).toBe(201);
      expect(response.body.data.created).toBe(true);
      expect(response.body.data.transaction).toMatchObject({
        quantity: -14900,
        state: TransactionState.COMMITTED,
        lmsUserId: 7,
        contentKey: COURSE,
        subsidyAccessPolicyUuid: POLICY,
        referenceType: ENROLLMENT_REFERENCE_TYPE,
      });
      expect(ctx.provisioner.enrollments).toHaveLength(1);
      await expect(balance()).resolves.toBe(5100);
    });

    it('should return the existing redemption with 200 on repeat', async () => {
      const first = await redeem();
      const second = await redeem();

      expect(second.status).toBe(200);
      expect(second.body.data).toEqual({ transaction: first.body.data.transaction, created: false });
      await expect(balance()).resolves.toBe(5100);
    });

    it('should answer 200 with no transaction when the balance is short', async () => {
      const response = await redeem({ contentKey: 'ExecEd+Strategy300' });

      expect(response.status).toBe(200);
      expect(response.body.data).toEqual({ transaction: null, created: false });
      await expect(balance()).resolves.toBe(20000);
    });

    it('should surface enrollment failures and leave the balance untouched', async () => {
      ctx.provisioner.failNext(ApiError.upstream(ErrorCode.ENROLLMENT_ERROR, 'Could not enroll learner 7 in DemoX+Intro101'));

      const response = await redeem();

      expect(response.status).toBe(502);
      expect(response.body.error.code).toBe(ErrorCode.ENROLLMENT_ERROR);
      await expect(balance()).resolves.toBe(20000);
      expect(ctx.ledger.all().filter((txn) => txn.state === TransactionState.PENDING)).toHaveLength(0);
    });

    it('should take the idempotency key from the header', async () => {
      const response = await redeem().set('X-Idempotency-Key', 'redeem-header-key');

      expect(response.status).toBe(201);
      expect(response.body.data.transaction.idempotencyKey).toBe('redeem-header-key');
    });

    it('should prefer the idempotency key in the body', async () => {
      const response = await redeem({ idempotencyKey: 'redeem-body-key' }).set('X-Idempotency-Key', 'redeem-header-key');

      expect(response.body.data.transaction.idempotencyKey).toBe('redeem-body-key');
    });

    it('should reject a malformed idempotency key in the body', async () => {
      const response = await redeem({ idempotencyKey: 'order #1' });

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe(ErrorCode.VALIDATION_ERROR);
      expect(ctx.provisioner.enrollments).toHaveLength(0);
    });

    it('should answer 409 when a key is reused for another learner', async () => {
      await redeem({ idempotencyKey: 'order-1' });

      const response = await redeem({ learnerId: 8, idempotencyKey: 'order-1' });

      expect(response.status).toBe(409);
      expect(response.body.error.code).toBe(ErrorCode.IDEMPOTENCY_KEY_CONFLICT);
      expect(ctx.provisioner.enrollments).toHaveLength(1);
      await expect(balance()).resolves.toBe(5100);
    });

    it('should reject a malformed idempotency header', async () => {
      const response = await redeem().set('X-Idempotency-Key', 'not a valid key');

      expect(response.status).toBe(400);
      expect(response.body.error.code).toBe(ErrorCode.VALIDATION_ERROR);
      expect(ctx.provisioner.enrollments).toHaveLength(0);
    });

    it('should validate the request body', async () => {
      const response = await redeem({ learnerId: 0, policyId: 'not-a-uuid' });

      expect(response.status).toBe(400);
      expect(response.body.error.details).toEqual({
        learnerId: ['learnerId must be a positive integer'],
        policyId: ['policyId must be a UUID'],
      });
    });

    it('should require the redeem permission', async () => {
      const adminToken = signToken('admin-1', [{ role: SubsidyRole.ADMIN, context: CUSTOMER }]);

      const response = await authenticatedRequest(ctx.app, adminToken)
        .post(`/api/v1/subsidies/${subsidyId}/redemptions`)
        .send({ learnerId: 7, contentKey: COURSE, policyId: POLICY });

      expect(response.status).toBe(403);
      expect(ctx.provisioner.enrollments).toHaveLength(0);
    });
  });

  describe('GET /redemption', () => {
    it('should find a committed redemption', async () => {
      const redeemed = await redeem();

      const response = await client()
        .get(`/api/v1/subsidies/${subsidyId}/redemption`)
        .query({ learnerId: 7, contentKey: COURSE });

      expect(response.status).toBe(200);
      expect(response.body.data.transaction).toEqual(redeemed.body.data.transaction);
    });

    it('should answer 404 when the learner has not redeemed the content', async () => {
      const response = await client()
        .get(`/api/v1/subsidies/${subsidyId}/redemption`)
        .query({ learnerId: 8, contentKey: COURSE });

      expect(response.status).toBe(404);
      expect(response.body.error.code).toBe(ErrorCode.REDEMPTION_NOT_FOUND);
    });
  });
});
