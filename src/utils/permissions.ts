/**
 * Permission tokens, role defaults and the override merge.
 *
 * Tokens follow `resource:action`. Role defaults are frozen at load time and
 * shared read-only by every request.
 */

export const PERMISSIONS = [
  'books:create',
  'books:read',
  'books:update',
  'books:delete',
  'borrows:create',
  'borrows:return',
  'borrows:read',
  'borrows:read_all',
  'users:read',
  'users:manage'
] as const;

export type Permission = (typeof PERMISSIONS)[number];

export const ROLES = ['member', 'librarian'] as const;

export type Role = (typeof ROLES)[number];

export const EFFECTS = ['allow', 'deny'] as const;

export type PermissionEffect = (typeof EFFECTS)[number];

/** Shape every override needs for resolution; persisted overrides carry more. */
export type OverrideRule = {
  permission: string;
  effect: PermissionEffect;
};

export const ROLE_PERMISSIONS: Readonly<Record<Role, ReadonlySet<Permission>>> = Object.freeze({
  librarian: new Set<Permission>([
    'books:create',
    'books:read',
    'books:update',
    'books:delete',
    'borrows:read',
    'borrows:read_all',
    'users:read'
  ]),
  member: new Set<Permission>(['books:read', 'borrows:create', 'borrows:return', 'borrows:read'])
});

const KNOWN = new Set<string>(PERMISSIONS);

const TOKEN_SHAPE = /^[a-z][a-z_]*:[a-z][a-z_]*$/;

/**
 * Type guard for known permission tokens.
 * @param token Candidate token.
 */
export function isPermission(token: string): token is Permission {
  return KNOWN.has(token);
}

/**
 * Checks the `namespace:action` shape without checking the token is known.
 * @param token Candidate token.
 */
export function hasTokenShape(token: string): boolean {
  return TOKEN_SHAPE.test(token);
}

/**
 * Type guard for role identifiers.
 * @param value Candidate role.
 */
export function isRole(value: string): value is Role {
  return value === 'member' || value === 'librarian';
}

/**
 * Merges a role's defaults with a user's overrides.
 *
 * Allows are added first, denies removed last, so a deny wins over any
 * number of allows for the same token regardless of order. Unknown tokens
 * are ignored.
 * @param role Role supplying the default set.
 * @param overrides User overrides in any order.
 * @returns Effective permission set.
 */
export function resolvePermissions(role: Role, overrides: readonly OverrideRule[]): Set<Permission> {
  const allows = new Set<Permission>();
  const denies = new Set<Permission>();

  for (const override of overrides) {
    if (!isPermission(override.permission)) continue;
    if (override.effect === 'allow') {
      allows.add(override.permission);
    } else {
      denies.add(override.permission);
    }
  }

  const effective = new Set<Permission>(ROLE_PERMISSIONS[role]);
  allows.forEach((permission) => effective.add(permission));
  denies.forEach((permission) => effective.delete(permission));
  return effective;
}

/**
 * Every known permission; what a superuser holds.
 */
export function allPermissions(): Set<Permission> {
  return new Set<Permission>(PERMISSIONS);
}

/**
 * Sorts tokens in declaration order for stable output.
 * @param permissions Set to order.
 */
export function orderPermissions(permissions: Iterable<Permission>): Permission[] {
  const present = new Set(permissions);
  return PERMISSIONS.filter((permission) => present.has(permission));
}
