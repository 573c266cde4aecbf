import crypto from 'crypto';

/**
 * Inputs that identify one redemption attempt
 */
export interface RedemptionKeyParts {
  lmsUserId: number;
  contentKey: string;
  subsidyAccessPolicyUuid: string;
}

/**
 * Idempotency key for the ledger owned by a subsidy
 */
export const ledgerIdempotencyKeyForSubsidy = (subsidyId: string): string =>
  `ledger-for-subsidy-${subsidyId}`;

/**
 * Key for the initial deposit transaction of a ledger
 */
export const initialDepositIdempotencyKey = (ledgerIdempotencyKey: string): string =>
  `${ledgerIdempotencyKey}-initial-deposit`;

/**
 * Serialize with keys sorted so the same inputs always hash the same way
 */
const canonicalize = (metadata: Record<string, string | number>): string =>
  JSON.stringify(
    Object.keys(metadata)
      .sort()
      .map((key) => [key, metadata[key]])
  );

/**
 * Deterministic idempotency key for a transaction:
 * `<ledger key>-<quantity>-<sha256 of the sorted metadata>`.
 *
 * Identical retries or concurrent requests collide on this key at the storage
 * layer instead of producing a second row.
 */
export const createIdempotencyKeyForTransaction = (
  ledgerIdempotencyKey: string,
  quantity: number,
  parts: RedemptionKeyParts
): string => {
  const digest = crypto
    .createHash('sha256')
    .update(
      canonicalize({
        content_key: parts.contentKey,
        lms_user_id: parts.lmsUserId,
        subsidy_access_policy_uuid: parts.subsidyAccessPolicyUuid,
      })
    )
    .digest('hex');

  return `${ledgerIdempotencyKey}-${quantity}-${digest}`;
};

/**
 * Suffix appended to the key of a row that is marked failed, so the original
 * key is free for the next attempt
 */
export const voidedKeySuffix = (transactionId: string): string => `-void-${transactionId}`;
