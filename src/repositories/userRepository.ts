import { randomUUID } from 'crypto';
import { getDb } from '../utils/db';
import { isRole, Role } from '../utils/permissions';
import type { SortDirection, User } from '../types/domain';

type UserRow = {
  id: string;
  email: string;
  full_name: string | null;
  hashed_password: string;
  role: string;
  is_superuser: number;
  is_active: number;
  created_at: string;
};

const SORT_COLUMNS = {
  email: 'email',
  role: 'role',
  isActive: 'is_active',
  createdAt: 'created_at'
} as const;

export type UserSortField = keyof typeof SORT_COLUMNS;

export type UserFilter = {
  search?: string;
  role?: Role;
  isActive?: boolean;
  sortField: UserSortField;
  direction: SortDirection;
  skip: number;
  limit: number;
};

function toUser(row: UserRow): User {
  if (!isRole(row.role)) {
    throw new Error(`Unknown role '${row.role}' stored for user ${row.id}`);
  }
  return {
    id: row.id,
    email: row.email,
    fullName: row.full_name,
    hashedPassword: row.hashed_password,
    role: row.role,
    isSuperuser: row.is_superuser === 1,
    isActive: row.is_active === 1,
    createdAt: row.created_at
  };
}

/**
 * Finds a user by email. Emails are stored lower-cased.
 * @param email Email address to search.
 * @returns User or null.
 */
export function findUserByEmail(email: string): User | null {
  const row = getDb()
    .prepare<[string], UserRow>('SELECT * FROM users WHERE email = ?')
    .get(email.toLowerCase());
  return row ? toUser(row) : null;
}

/**
 * Finds a user by primary key.
 * @param userId User identifier.
 * @returns User or null.
 */
export function findUserById(userId: string): User | null {
  const row = getDb().prepare<[string], UserRow>('SELECT * FROM users WHERE id = ?').get(userId);
  return row ? toUser(row) : null;
}

/**
 * Persists a new user.
 * @param data User creation payload.
 * @returns Created user.
 */
export function createUser(data: {
  email: string;
  hashedPassword: string;
  fullName?: string | null;
  role: Role;
  isSuperuser: boolean;
  isActive: boolean;
}): User {
  const user: User = {
    id: randomUUID(),
    email: data.email.toLowerCase(),
    fullName: data.fullName ?? null,
    hashedPassword: data.hashedPassword,
    role: data.role,
    isSuperuser: data.isSuperuser,
    isActive: data.isActive,
    createdAt: new Date().toISOString()
  };

  getDb()
    .prepare(
      `INSERT INTO users (id, email, full_name, hashed_password, role, is_superuser, is_active, created_at)
       VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
    )
    .run(
      user.id,
      user.email,
      user.fullName,
      user.hashedPassword,
      user.role,
      user.isSuperuser ? 1 : 0,
      user.isActive ? 1 : 0,
      user.createdAt
    );
  return user;
}

/**
 * Applies a partial update to a user.
 * @param userId Identifier of the user to update.
 * @param changes Fields to overwrite; undefined fields are left as is.
 * @returns Updated user, or null when no row matched.
 */
export function updateUser(
  userId: string,
  changes: Partial<Pick<User, 'email' | 'fullName' | 'hashedPassword' | 'role' | 'isSuperuser' | 'isActive'>>
): User | null {
  const assignments: string[] = [];
  const params: Array<string | number | null> = [];

  if (changes.email !== undefined) {
    assignments.push('email = ?');
    params.push(changes.email.toLowerCase());
  }
  if (changes.fullName !== undefined) {
    assignments.push('full_name = ?');
    params.push(changes.fullName);
  }
  if (changes.hashedPassword !== undefined) {
    assignments.push('hashed_password = ?');
    params.push(changes.hashedPassword);
  }
  if (changes.role !== undefined) {
    assignments.push('role = ?');
    params.push(changes.role);
  }
  if (changes.isSuperuser !== undefined) {
    assignments.push('is_superuser = ?');
    params.push(changes.isSuperuser ? 1 : 0);
  }
  if (changes.isActive !== undefined) {
    assignments.push('is_active = ?');
    params.push(changes.isActive ? 1 : 0);
  }

  if (assignments.length > 0) {
    getDb()
      .prepare(`UPDATE users SET ${assignments.join(', ')} WHERE id = ?`)
      .run(...params, userId);
  }
  return findUserById(userId);
}

/**
 * Lists users matching the filter, one page at a time.
 * @param filter Search, role and activity filters plus paging.
 * @returns Page rows and the total number of matches.
 */
export function listUsers(filter: UserFilter): { rows: User[]; count: number } {
  const conditions: string[] = [];
  const params: Array<string | number> = [];

  if (filter.search) {
    conditions.push('email LIKE ?');
    params.push(`%${filter.search}%`);
  }
  if (filter.role) {
    conditions.push('role = ?');
    params.push(filter.role);
  }
  if (filter.isActive !== undefined) {
    conditions.push('is_active = ?');
    params.push(filter.isActive ? 1 : 0);
  }

  const where = conditions.length > 0 ? `WHERE ${conditions.join(' AND ')}` : '';
  const db = getDb();
  const total = db
    .prepare<unknown[], { total: number }>(`SELECT COUNT(*) AS total FROM users ${where}`)
    .get(...params);
  const rows = db
    .prepare<unknown[], UserRow>(
      `SELECT * FROM users ${where}
       ORDER BY ${SORT_COLUMNS[filter.sortField]} ${filter.direction.toUpperCase()}, id ASC
       LIMIT ? OFFSET ?`
    )
    .all(...params, filter.limit, filter.skip);

  return { rows: rows.map(toUser), count: total?.total ?? 0 };
}
