import type { PermissionEffect, Permission, Role } from '../utils/permissions';

export type User = {
  id: string;
  email: string;
  fullName: string | null;
  hashedPassword: string;
  role: Role;
  isSuperuser: boolean;
  isActive: boolean;
  createdAt: string;
};

/** User as returned over the API. */
export type PublicUser = Omit<User, 'hashedPassword'>;

export type PermissionOverride = {
  id: string;
  userId: string;
  permission: string;
  effect: PermissionEffect;
  createdAt: string;
};

export type Book = {
  id: string;
  isbn: string;
  title: string;
  author: string;
  isAvailable: boolean;
  createdAt: string;
};

export type BorrowRecord = {
  id: string;
  bookId: string;
  borrowerId: string;
  borrowedAt: string;
  returnedAt: string | null;
};

/** Identity handed to the core by the authentication layer. */
export type AuthenticatedUser = {
  id: string;
  email: string;
  role: Role;
  isSuperuser: boolean;
  isActive: boolean;
  overrides: PermissionOverride[];
};

export type PermissionReport = {
  userId: string;
  role: Role;
  isSuperuser: boolean;
  rolePermissions: Permission[];
  overrides: PermissionOverride[];
  effectivePermissions: Permission[];
};

export type SortDirection = 'asc' | 'desc';
