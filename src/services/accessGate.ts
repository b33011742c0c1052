import { ForbiddenError } from '../utils/errors';
import { allPermissions, orderPermissions, Permission, resolvePermissions, ROLE_PERMISSIONS } from '../utils/permissions';
import type { AuthenticatedUser, BorrowRecord, PermissionOverride, PermissionReport } from '../types/domain';

type Subject = Pick<AuthenticatedUser, 'id' | 'role' | 'isSuperuser'> & {
  overrides: readonly PermissionOverride[];
};

/**
 * Effective permissions for a user. Superusers bypass the resolver.
 * @param user User with role, superuser flag and overrides.
 */
export function effectivePermissions(user: Subject): Set<Permission> {
  return user.isSuperuser ? allPermissions() : resolvePermissions(user.role, user.overrides);
}

/**
 * Checks a single permission.
 * @param user Requesting user.
 * @param permission Permission token to check.
 * @returns Whether the user holds it.
 */
export function authorize(user: Subject, permission: Permission): boolean {
  return effectivePermissions(user).has(permission);
}

/**
 * Requires every listed permission.
 * @param user Requesting user.
 * @param permissions Required tokens.
 * @throws {ForbiddenError} Listing the missing tokens.
 */
export function assertAuthorized(user: Subject, ...permissions: Permission[]): void {
  const granted = effectivePermissions(user);
  const missing = permissions.filter((permission) => !granted.has(permission));
  if (missing.length > 0) {
    throw new ForbiddenError(`Missing required permissions: ${missing.join(', ')}`);
  }
}

/**
 * Requires at least one of the listed permissions.
 * @param user Requesting user.
 * @param permissions Acceptable tokens.
 * @throws {ForbiddenError} When none is held.
 */
export function assertAnyAuthorized(user: Subject, ...permissions: Permission[]): void {
  const granted = effectivePermissions(user);
  if (!permissions.some((permission) => granted.has(permission))) {
    throw new ForbiddenError(`Requires one of: ${permissions.join(', ')}`);
  }
}

/**
 * Requires the superuser flag.
 * @param user Requesting user.
 * @throws {ForbiddenError} For everyone else.
 */
export function assertSuperuser(user: Pick<AuthenticatedUser, 'isSuperuser'>): void {
  if (!user.isSuperuser) {
    throw new ForbiddenError("The user doesn't have enough privileges");
  }
}

/**
 * Ownership rule for returns: `borrows:return` alone is not enough, the
 * requester must be the borrower. Call after the record is known to exist.
 * @param user Requesting user.
 * @param record Existing borrow record.
 * @throws {ForbiddenError} When the static grant or ownership is missing.
 */
export function assertCanReturn(user: Subject, record: BorrowRecord): void {
  assertAuthorized(user, 'borrows:return');
  if (record.borrowerId !== user.id) {
    throw new ForbiddenError('You can only return books that you borrowed');
  }
}

/**
 * Read rule for one borrow record: `borrows:read_all`, or `borrows:read` on
 * one's own record.
 * @param user Requesting user.
 * @param record Existing borrow record.
 * @throws {ForbiddenError} When neither applies.
 */
export function assertCanViewBorrow(user: Subject, record: BorrowRecord): void {
  const granted = effectivePermissions(user);
  if (granted.has('borrows:read_all')) return;
  if (granted.has('borrows:read') && record.borrowerId === user.id) return;
  throw new ForbiddenError('You can only view your own borrow records');
}

/**
 * Permission reports are visible to their subject and to superusers.
 * @param user Requesting user.
 * @param targetUserId Subject of the report.
 * @throws {ForbiddenError} For anyone else.
 */
export function assertCanViewPermissions(user: Pick<AuthenticatedUser, 'id' | 'isSuperuser'>, targetUserId: string): void {
  if (user.id !== targetUserId && !user.isSuperuser) {
    throw new ForbiddenError('You can only view your own permissions');
  }
}

/**
 * Three-part introspection report: role defaults, overrides, effective set.
 * @param user Subject of the report.
 */
export function buildPermissionReport(user: Subject): PermissionReport {
  return {
    userId: user.id,
    role: user.role,
    isSuperuser: user.isSuperuser,
    rolePermissions: orderPermissions(ROLE_PERMISSIONS[user.role]),
    overrides: [...user.overrides],
    effectivePermissions: orderPermissions(effectivePermissions(user))
  };
}
