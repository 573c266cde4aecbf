import jwt, { JsonWebTokenError, TokenExpiredError } from 'jsonwebtoken';

import { config } from '../config';
import { ApiError } from '../middlewares/errorHandler';

import { AuthUser, JWTPayload, RoleAssignment, SubsidyRole } from './auth.types';

const knownRoles = new Set<string>(Object.values(SubsidyRole));

const isRecord = (value: unknown): value is Record<string, unknown> =>
  typeof value === 'object' && value !== null;

const isRoleAssignment = (value: unknown): value is RoleAssignment =>
  isRecord(value) &&
  typeof value.role === 'string' &&
  knownRoles.has(value.role) &&
  typeof value.context === 'string';

/**
 * Parse the `roles` claim; entries that are not `{ role, context }` with a
 * known role are dropped
 */
export const parseRoles = (claim: unknown): RoleAssignment[] =>
  Array.isArray(claim) ? claim.filter(isRoleAssignment) : [];

export class AuthService {
  constructor(
    private readonly secret: string = config.jwt.secret,
    private readonly issuer: string | undefined = config.jwt.issuer
  ) {}

  /**
   * Verify a bearer token issued by the identity provider
   */
  verifyToken(token: string): AuthUser {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.secret, this.issuer ? { issuer: this.issuer } : {});
    } catch (error) {
      if (error instanceof TokenExpiredError) {
        throw ApiError.tokenExpired();
      }
      if (error instanceof JsonWebTokenError) {
        throw ApiError.invalidToken(error.message);
      }
      throw error;
    }

    if (typeof decoded === 'string' || typeof decoded.sub !== 'string') {
      throw ApiError.invalidToken('Token has no subject');
    }

    const payload: JWTPayload = {
      sub: decoded.sub,
      email: typeof decoded.email === 'string' ? decoded.email : undefined,
      roles: decoded.roles,
    };

    return {
      userId: payload.sub,
      email: payload.email,
      roles: parseRoles(payload.roles),
    };
  }
}

export const authService = new AuthService();
