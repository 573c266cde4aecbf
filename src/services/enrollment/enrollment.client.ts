/**
 * Enrollment Provisioner
 *
 * Grants a learner access to content in the LMS and returns the reference
 * id of the fulfillment record. Requests carry the ledger transaction id so
 * the provider can deduplicate retries and link back to the ledger.
 */

import axios, { AxiosInstance } from 'axios';

import { config } from '../../config';
import { ApiError } from '../../middlewares/errorHandler';
import { createServiceLogger } from '../../observability';
import { ENROLLMENT_REFERENCE_TYPE, LedgerTransactionRecord } from '../../types/ledger';
import { ErrorCode } from '../../types/errors';

const log = createServiceLogger('enrollment-client');

export interface EnrollmentProvisioner {
  /**
   * Resolves to the fulfillment reference id; rejects when access could not
   * be granted (including timeouts).
   */
  enroll(lmsUserId: number, contentKey: string, transaction: LedgerTransactionRecord): Promise<string>;
}

export const ENROLLMENT_PATH = '/enterprise/api/v1/enterprise-customer/fulfill-learner-enrollment/';

export const createEnrollmentHttpClient = (): AxiosInstance =>
  axios.create({
    baseURL: config.enrollment.baseUrl,
    timeout: config.enrollment.timeoutMs,
    headers: {
      'Content-Type': 'application/json',
      ...(config.enrollment.apiToken && { Authorization: `Bearer ${config.enrollment.apiToken}` }),
    },
  });

const referenceFrom = (payload: unknown): string | null => {
  if (typeof payload !== 'object' || payload === null || !(ENROLLMENT_REFERENCE_TYPE in payload)) {
    return null;
  }
  const reference: unknown = Reflect.get(payload, ENROLLMENT_REFERENCE_TYPE);
  return typeof reference === 'string' && reference !== '' ? reference : null;
};

export class EnterpriseEnrollmentClient implements EnrollmentProvisioner {
  constructor(private readonly http: AxiosInstance = createEnrollmentHttpClient()) {}

  async enroll(lmsUserId: number, contentKey: string, transaction: LedgerTransactionRecord): Promise<string> {
    try {
      const response = await this.http.post<unknown>(ENROLLMENT_PATH, {
        lms_user_id: lmsUserId,
        content_key: contentKey,
        transaction_id: transaction.transactionId,
      });

      const reference = referenceFrom(response.data);
      if (!reference) {
        throw ApiError.upstream(
          ErrorCode.ENROLLMENT_ERROR,
          `Enrollment response for ${contentKey} carried no ${ENROLLMENT_REFERENCE_TYPE}`
        );
      }

      log.info({ lmsUserId, contentKey, transactionId: transaction.transactionId }, 'Learner enrolled');
      return reference;
    } catch (error) {
      if (!axios.isAxiosError(error)) {
        throw error;
      }

      log.warn(
        { lmsUserId, contentKey, transactionId: transaction.transactionId, status: error.response?.status },
        `Enrollment request failed: ${error.message}`
      );
      throw ApiError.upstream(
        ErrorCode.ENROLLMENT_ERROR,
        `Could not enroll learner ${lmsUserId} in ${contentKey}: ${error.message}`,
        error.response?.status,
        error
      );
    }
  }
}
