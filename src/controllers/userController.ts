import { Request, Response, NextFunction } from 'express';
import {
  changePassword,
  createAccount,
  getUser,
  getUsers,
  updateAccount,
  updateMe
} from '../services/userService';
import { currentUser } from '../middleware/auth';
import { parseRequest } from '../middleware/validate';
import {
  changePasswordSchema,
  createUserSchema,
  listUsersSchema,
  updateMeSchema,
  updateUserSchema,
  userIdSchema
} from '../validation/user.schema';
import { sendSuccess } from '../utils/response';

/**
 * Updates the requester's own profile.
 * @param req Express request containing profile changes.
 * @param res Express response.
 * @param next Express next handler.
 * @returns Promise resolving when response is sent.
 */
export async function updateOwnProfile(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { body } = parseRequest(updateMeSchema, req);
    const user = await updateMe(currentUser(req).id, body);
    sendSuccess(res, user);
  } catch (error) {
    next(error);
  }
}

/**
 * Changes the requester's password.
 * @param req Express request containing current and new password.
 * @param res Express response.
 * @param next Express next handler.
 * @returns Promise resolving when response is sent.
 */
export async function updateOwnPassword(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { body } = parseRequest(changePasswordSchema, req);
    await changePassword(currentUser(req).id, body.currentPassword, body.newPassword);
    sendSuccess(res, { message: 'Password updated successfully' });
  } catch (error) {
    next(error);
  }
}

/**
 * Lists users.
 * @param req Express request containing listing query.
 * @param res Express response.
 * @param next Express next handler.
 * @returns Promise resolving when response is sent.
 */
export async function listAllUsers(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { query } = parseRequest(listUsersSchema, req);
    const page = await getUsers({
      search: query.search,
      role: query.role,
      isActive: query.isActive,
      sortField: query.sort.field,
      direction: query.sort.direction,
      skip: query.skip,
      limit: query.limit
    });
    sendSuccess(res, page);
  } catch (error) {
    next(error);
  }
}

/**
 * Creates a user account.
 * @param req Express request containing account payload.
 * @param res Express response.
 * @param next Express next handler.
 * @returns Promise resolving when response is sent.
 */
export async function createUserAccount(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { body } = parseRequest(createUserSchema, req);
    const user = await createAccount(body);
    sendSuccess(res, user, 201);
  } catch (error) {
    next(error);
  }
}

/**
 * Retrieves one user.
 * @param req Express request containing user id path param.
 * @param res Express response.
 * @param next Express next handler.
 * @returns Promise resolving when response is sent.
 */
export async function getUserById(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { params } = parseRequest(userIdSchema, req);
    const user = await getUser(params.userId, currentUser(req));
    sendSuccess(res, user);
  } catch (error) {
    next(error);
  }
}

/**
 * Updates one user.
 * @param req Express request containing user id and changes.
 * @param res Express response.
 * @param next Express next handler.
 * @returns Promise resolving when response is sent.
 */
export async function updateUserAccount(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { params, body } = parseRequest(updateUserSchema, req);
    const user = await updateAccount(params.userId, body);
    sendSuccess(res, user);
  } catch (error) {
    next(error);
  }
}
