import { Request, Response, NextFunction } from 'express';
import { assertAnyAuthorized, assertAuthorized, assertSuperuser } from '../services/accessGate';
import type { Permission } from '../utils/permissions';
import { currentUser } from './auth';

/**
 * Middleware factory enforcing that the requester holds every listed permission.
 * @param permissions Required permission tokens.
 * @returns Express middleware that consults the access gate.
 * @throws {ForbiddenError} When any permission is missing.
 */
export function requirePermission(...permissions: Permission[]) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    assertAuthorized(currentUser(req), ...permissions);
    next();
  };
}

/**
 * Middleware factory enforcing that the requester holds at least one permission.
 * @param permissions Acceptable permission tokens.
 * @returns Express middleware that consults the access gate.
 */
export function requireAnyPermission(...permissions: Permission[]) {
  return (req: Request, _res: Response, next: NextFunction): void => {
    assertAnyAuthorized(currentUser(req), ...permissions);
    next();
  };
}

/**
 * Middleware restricting a route to superusers.
 * @param req Express request.
 * @param _res Express response (unused).
 * @param next Express next function.
 */
export function requireSuperuser(req: Request, _res: Response, next: NextFunction): void {
  assertSuperuser(currentUser(req));
  next();
}
