import { Request, Response, NextFunction } from 'express';
import { addOverride, getOverrides, getPermissionReport, removeOverride } from '../services/permissionService';
import { currentUser } from '../middleware/auth';
import { parseRequest } from '../middleware/validate';
import { createOverrideSchema, overrideIdSchema, userIdSchema } from '../validation/user.schema';
import { sendSuccess } from '../utils/response';

/**
 * Returns a user's permission report.
 * @param req Express request containing user id path param.
 * @param res Express response.
 * @param next Express next handler.
 * @returns Promise resolving when response is sent.
 */
export async function getUserPermissions(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { params } = parseRequest(userIdSchema, req);
    const report = await getPermissionReport(params.userId, currentUser(req));
    sendSuccess(res, report);
  } catch (error) {
    next(error);
  }
}

/**
 * Lists a user's permission overrides.
 * @param req Express request containing user id path param.
 * @param res Express response.
 * @param next Express next handler.
 * @returns Promise resolving when response is sent.
 */
export async function listUserOverrides(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { params } = parseRequest(userIdSchema, req);
    sendSuccess(res, await getOverrides(params.userId));
  } catch (error) {
    next(error);
  }
}

/**
 * Adds a permission override.
 * @param req Express request containing user id and override payload.
 * @param res Express response.
 * @param next Express next handler.
 * @returns Promise resolving when response is sent.
 */
export async function createUserOverride(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { params, body } = parseRequest(createOverrideSchema, req);
    const override = await addOverride(params.userId, body.permission, body.effect);
    sendSuccess(res, override, 201);
  } catch (error) {
    next(error);
  }
}

/**
 * Removes a permission override.
 * @param req Express request containing user and override ids.
 * @param res Express response.
 * @param next Express next handler.
 * @returns Promise resolving when response is sent.
 */
export async function deleteUserOverride(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { params } = parseRequest(overrideIdSchema, req);
    const override = await removeOverride(params.userId, params.overrideId);
    sendSuccess(res, override);
  } catch (error) {
    next(error);
  }
}
