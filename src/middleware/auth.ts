import { Request, Response, NextFunction } from 'express';
import { authenticateToken } from '../services/authService';
import { UnauthorizedError } from '../utils/errors';
import type { AuthenticatedUser } from '../types/domain';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      user?: AuthenticatedUser;
    }
  }
}

/**
 * Middleware that validates JWT bearer tokens and attaches the stored user,
 * with their current overrides, to the request.
 * @param req Express request with Authorization header.
 * @param _res Express response (unused).
 * @param next Express next function.
 * @returns Promise resolving once next has been called.
 */
export async function authenticate(req: Request, _res: Response, next: NextFunction): Promise<void> {
  try {
    const header = req.headers.authorization;
    if (!header?.startsWith('Bearer ')) {
      throw new UnauthorizedError('Missing or invalid Authorization header');
    }
    req.user = await authenticateToken(header.slice('Bearer '.length).trim());
    next();
  } catch (error) {
    next(error);
  }
}

/**
 * Reads the user attached by `authenticate`.
 * @param req Express request.
 * @returns Authenticated user.
 * @throws {UnauthorizedError} When the route was mounted without `authenticate`.
 */
export function currentUser(req: Request): AuthenticatedUser {
  if (!req.user) {
    throw new UnauthorizedError('Not authenticated');
  }
  return req.user;
}
