/**
 * Redemption idempotency keys
 *
 * A caller can pin a redemption to its own key, either as `idempotencyKey` in
 * the body or in the X-Idempotency-Key header. The body wins when both are set.
 * Without either, the engine derives a key from the redemption itself.
 */

import { Request, Response, NextFunction } from 'express';

import { ApiError } from './errorHandler';

export const IDEMPOTENCY_HEADER = 'x-idempotency-key';

export const IDEMPOTENCY_KEY_PATTERN = /^[a-zA-Z0-9_-]{1,64}$/;
export const IDEMPOTENCY_KEY_RULE = 'Must be 1-64 letters, digits, dashes or underscores';

const headerKey = (req: Request): string | undefined => {
  const value = req.headers[IDEMPOTENCY_HEADER];
  return typeof value === 'string' && value !== '' ? value : undefined;
};

const bodyKey = (req: Request): string | undefined => {
  const body: unknown = req.body;
  if (typeof body !== 'object' || body === null || !('idempotencyKey' in body)) {
    return undefined;
  }
  const value = body.idempotencyKey;
  return typeof value === 'string' && value !== '' ? value : undefined;
};

export const idempotencyKeyFrom = (req: Request): string | undefined => bodyKey(req) ?? headerKey(req);

/**
 * Rejects a malformed header before the redemption runs. Body keys are held
 * to the same pattern by the route's express-validator chain.
 */
export const validateIdempotencyKey = (req: Request, _res: Response, next: NextFunction): void => {
  const key = headerKey(req);

  if (key !== undefined && !IDEMPOTENCY_KEY_PATTERN.test(key)) {
    next(
      ApiError.validationError('Invalid idempotency key header', {
        [IDEMPOTENCY_HEADER]: [IDEMPOTENCY_KEY_RULE],
      })
    );
    return;
  }

  next();
};
