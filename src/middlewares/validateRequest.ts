import { Request, Response, NextFunction } from 'express';
import { validationResult } from 'express-validator';

import { ApiError } from './errorHandler';

/**
 * Collects express-validator errors into `{ field: [messages] }` and fails
 * the request with a VALIDATION_ERROR
 */
export const validateRequest = (req: Request, _res: Response, next: NextFunction): void => {
  const result = validationResult(req);

  if (result.isEmpty()) {
    next();
    return;
  }

  const validationErrors = result.array().reduce<Record<string, string[]>>((acc, err) => {
    const field = err.type === 'field' ? err.path : err.type;
    acc[field] = [...(acc[field] ?? []), String(err.msg)];
    return acc;
  }, {});

  next(ApiError.validationError('Validation failed', validationErrors));
};
