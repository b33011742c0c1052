import { findUserById } from '../repositories/userRepository';
import {
  createOverride,
  deleteOverride,
  findOverrideById,
  findMatchingOverride,
  listOverridesForUser
} from '../repositories/overrideRepository';
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors';
import { info } from '../utils/logger';
import { hasTokenShape, isPermission, PermissionEffect } from '../utils/permissions';
import type { AuthenticatedUser, PermissionOverride, PermissionReport, User } from '../types/domain';
import { assertCanViewPermissions, buildPermissionReport } from './accessGate';

function requireUser(userId: string): User {
  const user = findUserById(userId);
  if (!user) {
    throw new NotFoundError('User not found');
  }
  return user;
}

/**
 * Builds the permission report for a user. The visibility rule is checked
 * before existence, so strangers learn nothing about other ids.
 * @param userId Subject of the report.
 * @param requester Authenticated requester.
 * @returns Promise resolving to role defaults, overrides and effective set.
 * @throws {ForbiddenError} When the requester is neither the subject nor a superuser.
 * @throws {NotFoundError} When the subject does not exist.
 */
export async function getPermissionReport(userId: string, requester: AuthenticatedUser): Promise<PermissionReport> {
  assertCanViewPermissions(requester, userId);
  const user = requireUser(userId);
  return buildPermissionReport({ ...user, overrides: listOverridesForUser(user.id) });
}

/**
 * Lists a user's overrides.
 * @param userId Owner of the overrides.
 * @returns Promise resolving to the overrides, oldest first.
 */
export async function getOverrides(userId: string): Promise<PermissionOverride[]> {
  requireUser(userId);
  return listOverridesForUser(userId);
}

/**
 * Grants or revokes one permission for one user. An allow and a deny for
 * the same token may coexist; the deny wins at resolution.
 * @param userId Owner of the new override.
 * @param permission Token in `resource:action` form.
 * @param effect `allow` or `deny`.
 * @returns Promise resolving to the stored override.
 * @throws {ValidationError} When the token is malformed or unknown.
 * @throws {ConflictError} When the same token and effect are already stored.
 */
export async function addOverride(
  userId: string,
  permission: string,
  effect: PermissionEffect
): Promise<PermissionOverride> {
  if (!hasTokenShape(permission)) {
    throw new ValidationError(`Permission '${permission}' must have the form resource:action`);
  }
  if (!isPermission(permission)) {
    throw new ValidationError(`Unknown permission '${permission}'`);
  }
  requireUser(userId);
  if (findMatchingOverride(userId, permission, effect)) {
    throw new ConflictError(`User already has a ${effect} override for '${permission}'`);
  }

  const override = createOverride({ userId, permission, effect });
  info('Permission override added', { userId, permission, effect });
  return override;
}

/**
 * Removes an override. An id that belongs to a different user is reported
 * as missing.
 * @param userId Owner named in the request.
 * @param overrideId Override to remove.
 * @returns Promise resolving to the removed override.
 * @throws {NotFoundError} When the override is missing or owned by someone else.
 */
export async function removeOverride(userId: string, overrideId: string): Promise<PermissionOverride> {
  const override = findOverrideById(overrideId);
  if (!override || override.userId !== userId || !deleteOverride(overrideId)) {
    throw new NotFoundError('Permission override not found');
  }
  info('Permission override removed', { userId, permission: override.permission, effect: override.effect });
  return override;
}
