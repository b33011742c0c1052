import { NextFunction, Request, Response } from 'express';
import { AppError, TransientError, ValidationError } from '../utils/errors';
import { isBusyError } from '../utils/db';
import { sendError } from '../utils/response';
import { debug, error as logError, warn } from '../utils/logger';

function isMalformedJson(err: Error): boolean {
  return err instanceof SyntaxError && 'type' in err && err.type === 'entity.parse.failed';
}

/**
 * Express error handler producing consistent API responses.
 * @param err Error thrown in the request pipeline.
 * @param req Express request.
 * @param res Express response.
 * @param _next Express next function.
 * @returns Response with standardized error body.
 */
export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction) {
  if (err instanceof AppError) {
    debug('Handled application error', { code: err.code, message: err.message });
    return sendError(res, err);
  }

  if (isMalformedJson(err)) {
    return sendError(res, new ValidationError('Malformed JSON body'));
  }

  // A lock wait that timed out outside `atomically`, e.g. the bearer-user lookup.
  if (isBusyError(err)) {
    warn(`Store busy on ${req.method} ${req.originalUrl}`);
    return sendError(res, new TransientError('Store is busy; retry later'));
  }

  logError(`Unhandled error on ${req.method} ${req.originalUrl}`, err);
  return sendError(res, new AppError('Unexpected error', 500, 'INTERNAL_ERROR'));
}
