export { authService, AuthService, parseRoles } from './auth.service';
export { authMiddleware, ensureAuthorized, requirePermission } from './auth.middleware';
export { authorize, roleGrants, Permission, AuthorizationDecision } from './permissions';
export { AuthRequest, AuthUser, RoleAssignment, SubsidyRole, ALL_ACCESS_CONTEXT } from './auth.types';
