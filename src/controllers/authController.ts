import { Request, Response, NextFunction } from 'express';
import { getProfile, login, signup } from '../services/authService';
import { currentUser } from '../middleware/auth';
import { parseRequest } from '../middleware/validate';
import { loginSchema, signupSchema } from '../validation/auth.schema';
import { sendSuccess } from '../utils/response';

/**
 * Handles public member registration.
 * @param req Express request containing registration payload.
 * @param res Express response.
 * @param next Express next handler.
 * @returns Promise resolving when response is sent.
 */
export async function register(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { body } = parseRequest(signupSchema, req);
    const user = await signup(body);
    sendSuccess(res, user, 201);
  } catch (error) {
    next(error);
  }
}

/**
 * Handles user login flow.
 * @param req Express request containing login payload.
 * @param res Express response.
 * @param next Express next handler.
 * @returns Promise resolving when response is sent.
 */
export async function loginUser(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { body } = parseRequest(loginSchema, req);
    const result = await login(body.email, body.password);
    sendSuccess(res, result);
  } catch (error) {
    next(error);
  }
}

/**
 * Returns authenticated user's profile information.
 * @param req Express request containing user context.
 * @param res Express response.
 * @param next Express next handler.
 * @returns Promise resolving when response is sent.
 */
export async function me(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const result = await getProfile(currentUser(req).id);
    sendSuccess(res, result);
  } catch (error) {
    next(error);
  }
}
