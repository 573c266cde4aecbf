import { Request } from 'express';

/**
 * Roles a caller can hold, each scoped to an enterprise customer (or `*`)
 */
export enum SubsidyRole {
  ADMIN = 'enterprise_subsidy_admin',
  LEARNER = 'enterprise_subsidy_learner',
  OPERATOR = 'enterprise_subsidy_operator',
}

/**
 * Context value granting a role across every customer
 */
export const ALL_ACCESS_CONTEXT = '*';

export interface RoleAssignment {
  role: SubsidyRole;
  context: string;
}

/**
 * Authenticated caller, as decoded from the bearer token
 */
export interface AuthUser {
  userId: string;
  email?: string;
  roles: RoleAssignment[];
}

export interface JWTPayload {
  sub: string;
  email?: string;
  roles?: unknown;
  iat?: number;
  exp?: number;
}

declare global {
  namespace Express {
    interface Request {
      user?: AuthUser;
    }
  }
}

export interface AuthRequest extends Request {
  user?: AuthUser;
}
