import { Response, NextFunction } from 'express';

import { ApiError } from '../middlewares/errorHandler';
import { addLogContext } from '../observability';

import { authService } from './auth.service';
import { AuthRequest, AuthUser } from './auth.types';
import { authorize, Permission } from './permissions';

export const authMiddleware = (req: AuthRequest, _res: Response, next: NextFunction): void => {
  try {
    const authHeader = req.headers.authorization;

    if (!authHeader) {
      throw ApiError.unauthorized('No authorization header provided');
    }

    if (!authHeader.startsWith('Bearer ')) {
      throw ApiError.unauthorized('Invalid authorization format. Use: Bearer <token>');
    }

    const token = authHeader.substring(7);

    if (!token) {
      throw ApiError.unauthorized('No token provided');
    }

    req.user = authService.verifyToken(token);
    addLogContext({ userId: req.user.userId });
    next();
  } catch (error) {
    next(error);
  }
};

/**
 * Throw FORBIDDEN unless the caller holds `permission` for the customer
 */
export const ensureAuthorized = (
  user: AuthUser | undefined,
  permission: Permission,
  customerId: string
): void => {
  const decision = authorize(user, permission, customerId);
  if (!decision.allowed) {
    throw ApiError.forbidden(decision.reason);
  }
};

/**
 * Route-level check for endpoints whose customer context comes from the request
 * itself (query string or params). A missing context is left to validation.
 */
export const requirePermission =
  (permission: Permission, resolveCustomerId: (req: AuthRequest) => string | undefined) =>
  (req: AuthRequest, _res: Response, next: NextFunction): void => {
    const customerId = resolveCustomerId(req);
    if (!customerId) {
      next();
      return;
    }

    try {
      ensureAuthorized(req.user, permission, customerId);
      next();
    } catch (error) {
      next(error);
    }
  };
