import {
  createUser,
  findUserByEmail,
  findUserById,
  listUsers,
  updateUser,
  UserFilter
} from '../repositories/userRepository';
import { hashPassword, verifyPassword } from '../utils/password';
import { isUniqueViolation } from '../utils/db';
import { getConfig } from '../utils/config';
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors';
import { info } from '../utils/logger';
import type { Page } from '../utils/response';
import type { Role } from '../utils/permissions';
import type { AuthenticatedUser, PublicUser, User } from '../types/domain';
import { assertAuthorized } from './accessGate';
import { stripSensitive } from './authService';

const EMAIL_TAKEN = 'The user with this email already exists in the system';

function assertEmailFree(email: string, ownerId?: string): void {
  const holder = findUserByEmail(email);
  if (holder && holder.id !== ownerId) {
    throw new ConflictError(EMAIL_TAKEN);
  }
}

function applyUpdate(userId: string, changes: Parameters<typeof updateUser>[1]): User {
  try {
    const updated = updateUser(userId, changes);
    if (!updated) {
      throw new NotFoundError('User not found');
    }
    return updated;
  } catch (err) {
    if (isUniqueViolation(err)) {
      throw new ConflictError(EMAIL_TAKEN);
    }
    throw err;
  }
}

/**
 * Updates the requester's own profile.
 * @param userId Authenticated user.
 * @param payload New email and/or full name.
 * @returns Promise resolving to the sanitized user.
 * @throws {ConflictError} When the new email belongs to someone else.
 */
export async function updateMe(
  userId: string,
  payload: { email?: string; fullName?: string | null }
): Promise<PublicUser> {
  if (payload.email !== undefined) {
    assertEmailFree(payload.email, userId);
  }
  return stripSensitive(applyUpdate(userId, payload));
}

/**
 * Changes the requester's password after checking the current one.
 * @param userId Authenticated user.
 * @param currentPassword Password the user holds now.
 * @param newPassword Replacement password.
 * @throws {ValidationError} When the current password is wrong or unchanged.
 */
export async function changePassword(userId: string, currentPassword: string, newPassword: string): Promise<void> {
  const user = findUserById(userId);
  if (!user) {
    throw new NotFoundError('User not found');
  }
  if (!(await verifyPassword(currentPassword, user.hashedPassword))) {
    throw new ValidationError('Incorrect password');
  }
  if (currentPassword === newPassword) {
    throw new ValidationError('New password cannot be the same as the current one');
  }

  applyUpdate(userId, { hashedPassword: await hashPassword(newPassword) });
  info('Password changed', { userId });
}

/**
 * Lists users.
 * @param filter Search, role, activity and paging.
 * @returns Promise resolving to one page of sanitized users.
 */
export async function getUsers(filter: UserFilter): Promise<Page<PublicUser>> {
  const { rows, count } = listUsers(filter);
  return { items: rows.map(stripSensitive), count, skip: filter.skip, limit: filter.limit };
}

/**
 * Creates a user with any role and flags.
 * @param payload New account details.
 * @returns Promise resolving to the sanitized user.
 * @throws {ConflictError} When the email is taken.
 */
export async function createAccount(payload: {
  email: string;
  password: string;
  fullName?: string;
  role: Role;
  isSuperuser: boolean;
  isActive: boolean;
}): Promise<PublicUser> {
  assertEmailFree(payload.email);
  const hashedPassword = await hashPassword(payload.password);

  try {
    const user = createUser({
      email: payload.email,
      hashedPassword,
      fullName: payload.fullName ?? null,
      role: payload.role,
      isSuperuser: payload.isSuperuser,
      isActive: payload.isActive
    });
    info('User created', { userId: user.id, role: user.role, isSuperuser: user.isSuperuser });
    return stripSensitive(user);
  } catch (err) {
    if (isUniqueViolation(err)) {
      throw new ConflictError(EMAIL_TAKEN);
    }
    throw err;
  }
}

/**
 * Retrieves a user. Visible to the user themself, to holders of
 * `users:read` and to superusers.
 * @param userId Target user.
 * @param requester Authenticated requester.
 * @returns Promise resolving to the sanitized user.
 * @throws {ForbiddenError} When the requester may not see other users.
 * @throws {NotFoundError} When the user does not exist.
 */
export async function getUser(userId: string, requester: AuthenticatedUser): Promise<PublicUser> {
  if (userId !== requester.id) {
    assertAuthorized(requester, 'users:read');
  }
  const user = findUserById(userId);
  if (!user) {
    throw new NotFoundError('User not found');
  }
  return stripSensitive(user);
}

/**
 * Updates any user's account fields.
 * @param userId Target user.
 * @param payload Fields to change; a password is re-hashed.
 * @returns Promise resolving to the sanitized user.
 * @throws {NotFoundError} When the user does not exist.
 * @throws {ConflictError} When the new email is taken.
 */
export async function updateAccount(
  userId: string,
  payload: {
    email?: string;
    password?: string;
    fullName?: string | null;
    role?: Role;
    isSuperuser?: boolean;
    isActive?: boolean;
  }
): Promise<PublicUser> {
  if (!findUserById(userId)) {
    throw new NotFoundError('User not found');
  }
  if (payload.email !== undefined) {
    assertEmailFree(payload.email, userId);
  }

  const { password, ...rest } = payload;
  const hashedPassword = password !== undefined ? await hashPassword(password) : undefined;
  const updated = applyUpdate(userId, { ...rest, hashedPassword });
  info('User updated', { userId, fields: Object.keys(payload) });
  return stripSensitive(updated);
}

/**
 * Creates the configured first superuser when no account holds that email.
 * @returns Promise resolving to true when a user was created.
 */
export async function ensureFirstSuperuser(): Promise<boolean> {
  const { firstSuperuser } = getConfig();
  if (!firstSuperuser) {
    info('FIRST_SUPERUSER not configured, skipping seed');
    return false;
  }
  if (findUserByEmail(firstSuperuser.email)) {
    info('Superuser already exists, skipping seed');
    return false;
  }

  await createAccount({
    email: firstSuperuser.email,
    password: firstSuperuser.password,
    role: 'librarian',
    isSuperuser: true,
    isActive: true
  });
  info(`Superuser ${firstSuperuser.email} created`);
  return true;
}
