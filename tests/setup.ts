import request from 'supertest';
import { createApp } from '../src/app';
import { closeDatabase, getDb } from '../src/utils/db';
import { hashPassword } from '../src/utils/password';
import { signToken } from '../src/utils/jwt';
import { createUser } from '../src/repositories/userRepository';
import { createOverride, listOverridesForUser } from '../src/repositories/overrideRepository';
import type { PermissionEffect, Role } from '../src/utils/permissions';
import type { AuthenticatedUser, User } from '../src/types/domain';

export const app = createApp();

export const DEFAULT_PASSWORD = 'Password123!';

/**
 * Hard reset of every table, children first to satisfy FK constraints.
 */
export function resetDatabase(): void {
  getDb().exec(`
    DELETE FROM borrow_records;
    DELETE FROM books;
    DELETE FROM permission_overrides;
    DELETE FROM users;
  `);
}

type SeedOptions = {
  role?: Role;
  isSuperuser?: boolean;
  isActive?: boolean;
  overrides?: Array<[string, PermissionEffect]>;
};

/**
 * Inserts a user straight into the store and signs a token for them.
 */
export async function seedUser(email: string, options: SeedOptions = {}): Promise<{ user: User; token: string }> {
  const user = createUser({
    email,
    hashedPassword: await hashPassword(DEFAULT_PASSWORD),
    fullName: null,
    role: options.role ?? 'member',
    isSuperuser: options.isSuperuser ?? false,
    isActive: options.isActive ?? true
  });
  for (const [permission, effect] of options.overrides ?? []) {
    createOverride({ userId: user.id, permission, effect });
  }
  return { user, token: signToken({ userId: user.id, role: user.role }) };
}

/**
 * Identity as the auth middleware would build it, for service-level tests.
 */
export function asAuthenticated(user: User): AuthenticatedUser {
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
 * Registers a book copy over HTTP and returns its id.
 */
export async function createBookAs(
  token: string,
  book: { isbn: string; title: string; author: string }
): Promise<string> {
  const res = await request(app).post('/books').set('Authorization', `Bearer ${token}`).send(book);
  if (res.status !== 201) {
    throw new Error(`createBookAs: failed. Status=${res.status} Body=${JSON.stringify(res.body)}`);
  }
  return res.body.data.id;
}

afterAll(() => {
  closeDatabase();
});
