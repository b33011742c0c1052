import { randomUUID } from 'crypto';
import { getDb } from '../utils/db';
import type { PermissionEffect } from '../utils/permissions';
import type { PermissionOverride } from '../types/domain';

type OverrideRow = {
  id: string;
  user_id: string;
  permission: string;
  effect: string;
  created_at: string;
};

function toOverride(row: OverrideRow): PermissionOverride {
  if (row.effect !== 'allow' && row.effect !== 'deny') {
    throw new Error(`Unknown effect '${row.effect}' stored for override ${row.id}`);
  }
  return {
    id: row.id,
    userId: row.user_id,
    permission: row.permission,
    effect: row.effect,
    createdAt: row.created_at
  };
}

/**
 * Lists a user's overrides, oldest first.
 * @param userId Owner of the overrides.
 * @returns Overrides for the user.
 */
export function listOverridesForUser(userId: string): PermissionOverride[] {
  return getDb()
    .prepare<[string], OverrideRow>(
      'SELECT * FROM permission_overrides WHERE user_id = ? ORDER BY created_at ASC, id ASC'
    )
    .all(userId)
    .map(toOverride);
}

/**
 * Finds an override by identifier.
 * @param overrideId Override identifier.
 * @returns Override or null.
 */
export function findOverrideById(overrideId: string): PermissionOverride | null {
  const row = getDb()
    .prepare<[string], OverrideRow>('SELECT * FROM permission_overrides WHERE id = ?')
    .get(overrideId);
  return row ? toOverride(row) : null;
}

/**
 * Finds an override a user already has for a token with the given effect.
 * @param userId Owner of the override.
 * @param permission Permission token.
 * @param effect Effect to match.
 * @returns Override or null.
 */
export function findMatchingOverride(
  userId: string,
  permission: string,
  effect: PermissionEffect
): PermissionOverride | null {
  const row = getDb()
    .prepare<[string, string, string], OverrideRow>(
      'SELECT * FROM permission_overrides WHERE user_id = ? AND permission = ? AND effect = ? LIMIT 1'
    )
    .get(userId, permission, effect);
  return row ? toOverride(row) : null;
}

/**
 * Persists an override.
 * @param data Owner, token and effect.
 * @returns Created override.
 */
export function createOverride(data: {
  userId: string;
  permission: string;
  effect: PermissionEffect;
}): PermissionOverride {
  const override: PermissionOverride = {
    id: randomUUID(),
    userId: data.userId,
    permission: data.permission,
    effect: data.effect,
    createdAt: new Date().toISOString()
  };
  getDb()
    .prepare(
      'INSERT INTO permission_overrides (id, user_id, permission, effect, created_at) VALUES (?, ?, ?, ?, ?)'
    )
    .run(override.id, override.userId, override.permission, override.effect, override.createdAt);
  return override;
}

/**
 * Deletes an override.
 * @param overrideId Override identifier.
 * @returns True when a row was removed.
 */
export function deleteOverride(overrideId: string): boolean {
  const result = getDb().prepare('DELETE FROM permission_overrides WHERE id = ?').run(overrideId);
  return result.changes > 0;
}
