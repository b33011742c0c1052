import { createUser, findUserByEmail, findUserById } from '../repositories/userRepository';
import { listOverridesForUser } from '../repositories/overrideRepository';
import { hashPassword, verifyPassword } from '../utils/password';
import { JwtPayload, signToken, verifyToken } from '../utils/jwt';
import { isUniqueViolation } from '../utils/db';
import { ConflictError, ForbiddenError, NotFoundError, UnauthorizedError } from '../utils/errors';
import { debug, info } from '../utils/logger';
import type { AuthenticatedUser, PublicUser, User } from '../types/domain';

/**
 * Removes the password hash from a user object.
 * @param user User record from persistence.
 * @returns Sanitized user.
 */
export function stripSensitive(user: User): PublicUser {
  const { hashedPassword: _hashedPassword, ...rest } = user;
  return rest;
}

/**
 * Registers a new member-level user.
 * @param payload Signup details.
 * @returns Promise resolving to the sanitized user.
 * @throws {ConflictError} When the email is already registered.
 */
export async function signup(payload: {
  email: string;
  password: string;
  fullName?: string;
}): Promise<PublicUser> {
  if (findUserByEmail(payload.email)) {
    throw new ConflictError('The user with this email already exists in the system');
  }

  const hashedPassword = await hashPassword(payload.password);
  try {
    const user = createUser({
      email: payload.email,
      hashedPassword,
      fullName: payload.fullName ?? null,
      role: 'member',
      isSuperuser: false,
      isActive: true
    });
    info('Member signed up', { userId: user.id });
    return stripSensitive(user);
  } catch (err) {
    // The email may have been taken while the password was hashing.
    if (isUniqueViolation(err)) {
      throw new ConflictError('The user with this email already exists in the system');
    }
    throw err;
  }
}

/**
 * Authenticates a user by email and password.
 * @param email Login email, matched case-insensitively.
 * @param password Plaintext password.
 * @returns JWT token and sanitized user.
 * @throws {UnauthorizedError} When credentials are invalid.
 * @throws {ForbiddenError} When the account is deactivated.
 */
export async function login(
  email: string,
  password: string
): Promise<{ token: string; tokenType: 'bearer'; user: PublicUser }> {
  const user = findUserByEmail(email);
  const valid = await verifyPassword(password, user ? user.hashedPassword : null);
  if (!user || !valid) {
    throw new UnauthorizedError('Incorrect email or password');
  }
  if (!user.isActive) {
    throw new ForbiddenError('Inactive user');
  }

  const token = signToken({ userId: user.id, role: user.role });
  return { token, tokenType: 'bearer', user: stripSensitive(user) };
}

/**
 * Turns a bearer token into the identity the core works with: the stored
 * user, their overrides and flags as they are now.
 * @param token Raw JWT.
 * @returns Promise resolving to the authenticated user.
 * @throws {UnauthorizedError} When the token or its user is invalid.
 * @throws {ForbiddenError} When the account is deactivated.
 */
export async function authenticateToken(token: string): Promise<AuthenticatedUser> {
  let payload: JwtPayload | null;
  try {
    payload = verifyToken(token);
  } catch (err) {
    debug('Rejected bearer token', { reason: err instanceof Error ? err.message : String(err) });
    payload = null;
  }
  if (!payload) {
    throw new UnauthorizedError('Could not validate credentials');
  }

  const user = findUserById(payload.userId);
  if (!user) {
    throw new UnauthorizedError('Could not validate credentials');
  }
  if (!user.isActive) {
    throw new ForbiddenError('Inactive user');
  }

  return {
    id: user.id,
    email: user.email,
    role: user.role,
    isSuperuser: user.isSuperuser,
    isActive: user.isActive,
    overrides: listOverridesForUser(user.id)
  };
}

/**
 * Retrieves the authenticated user's profile.
 * @param userId Identifier of the authenticated user.
 * @returns Promise resolving to the sanitized user.
 * @throws {NotFoundError} When user is not found.
 */
export async function getProfile(userId: string): Promise<PublicUser> {
  const user = findUserById(userId);
  if (!user) {
    throw new NotFoundError('User not found');
  }
  return stripSensitive(user);
}
