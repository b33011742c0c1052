import {
  allPermissions,
  hasTokenShape,
  isPermission,
  orderPermissions,
  resolvePermissions,
  ROLE_PERMISSIONS
} from '../src/utils/permissions';

describe('permission resolution', () => {
  test('role defaults apply when there are no overrides', () => {
    expect(orderPermissions(resolvePermissions('member', []))).toEqual([
      'books:read',
      'borrows:create',
      'borrows:return',
      'borrows:read'
    ]);
    expect(orderPermissions(resolvePermissions('librarian', []))).toEqual([
      'books:create',
      'books:read',
      'books:update',
      'books:delete',
      'borrows:read',
      'borrows:read_all',
      'users:read'
    ]);
  });

  test('allow adds a token outside the role defaults', () => {
    const effective = resolvePermissions('member', [{ permission: 'books:create', effect: 'allow' }]);
    expect(effective.has('books:create')).toBe(true);
  });

  test('deny removes a role default', () => {
    const effective = resolvePermissions('librarian', [{ permission: 'books:delete', effect: 'deny' }]);
    expect(effective.has('books:delete')).toBe(false);
    expect(effective.has('books:update')).toBe(true);
  });

  test('deny wins over an allow for the same token in either order', () => {
    const allowFirst = resolvePermissions('member', [
      { permission: 'books:create', effect: 'allow' },
      { permission: 'books:create', effect: 'deny' }
    ]);
    const denyFirst = resolvePermissions('member', [
      { permission: 'books:create', effect: 'deny' },
      { permission: 'books:create', effect: 'allow' }
    ]);
    expect(allowFirst.has('books:create')).toBe(false);
    expect(denyFirst.has('books:create')).toBe(false);
  });

  test('unknown tokens are ignored', () => {
    const effective = resolvePermissions('member', [{ permission: 'shelves:dust', effect: 'allow' }]);
    expect(orderPermissions(effective)).toEqual(orderPermissions(ROLE_PERMISSIONS.member));
  });

  test('resolution does not mutate the shared role defaults', () => {
    resolvePermissions('member', [{ permission: 'books:read', effect: 'deny' }]);
    expect(ROLE_PERMISSIONS.member.has('books:read')).toBe(true);
  });

  test('allPermissions covers every known token', () => {
    expect(allPermissions().size).toBe(10);
    expect(allPermissions().has('users:manage')).toBe(true);
  });
});

describe('permission tokens', () => {
  test('isPermission accepts only known tokens', () => {
    expect(isPermission('borrows:read_all')).toBe(true);
    expect(isPermission('borrows:steal')).toBe(false);
  });

  test('hasTokenShape checks the resource:action form', () => {
    expect(hasTokenShape('books:create')).toBe(true);
    expect(hasTokenShape('shelves:dust')).toBe(true);
    expect(hasTokenShape('books')).toBe(false);
    expect(hasTokenShape('Books:Create')).toBe(false);
    expect(hasTokenShape('books:create:all')).toBe(false);
  });
});
