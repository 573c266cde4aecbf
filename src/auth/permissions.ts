import { AuthUser, ALL_ACCESS_CONTEXT, SubsidyRole } from './auth.types';

export enum Permission {
  READ_CONTENT_METADATA = 'subsidy.can_read_content_metadata',
  READ_SUBSIDY = 'subsidy.can_read_subsidy',
  READ_TRANSACTIONS = 'subsidy.can_read_transactions',
  REDEEM = 'subsidy.can_redeem',
  CREATE_SUBSIDY = 'subsidy.can_create_subsidy',
}

const rolePermissions: Record<SubsidyRole, readonly Permission[]> = {
  [SubsidyRole.LEARNER]: [Permission.READ_CONTENT_METADATA],
  [SubsidyRole.ADMIN]: [Permission.READ_CONTENT_METADATA, Permission.READ_SUBSIDY, Permission.READ_TRANSACTIONS],
  [SubsidyRole.OPERATOR]: [
    Permission.READ_CONTENT_METADATA,
    Permission.READ_SUBSIDY,
    Permission.READ_TRANSACTIONS,
    Permission.REDEEM,
    Permission.CREATE_SUBSIDY,
  ],
};

export type AuthorizationDecision =
  | { allowed: true; role: SubsidyRole }
  | { allowed: false; reason: string };

export const roleGrants = (role: SubsidyRole, permission: Permission): boolean =>
  rolePermissions[role].includes(permission);

/**
 * Decide whether `user` holds `permission` for the given customer.
 *
 * A role assignment applies when its context is the customer id or `*`.
 */
export const authorize = (
  user: AuthUser | undefined,
  permission: Permission,
  customerId: string
): AuthorizationDecision => {
  if (!user) {
    return { allowed: false, reason: 'Not authenticated' };
  }

  const match = user.roles.find(
    ({ role, context }) =>
      (context === ALL_ACCESS_CONTEXT || context === customerId) && roleGrants(role, permission)
  );

  if (!match) {
    return { allowed: false, reason: `Missing ${permission} for customer ${customerId}` };
  }

  return { allowed: true, role: match.role };
};
