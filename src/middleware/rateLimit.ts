import rateLimit from 'express-rate-limit';
import { Request, Response, NextFunction } from 'express';
import { TooManyRequestsError } from '../utils/errors';
import { getConfig } from '../utils/config';

/**
 * Rate limiter for the credential endpoints, converting rejections to
 * AppError. Window and budget come from config; when limiting is disabled
 * the middleware passes every request through.
 * @param message Error message to surface when limited.
 * @returns Express middleware enforcing rate limits.
 */
export function authRateLimiter(message = 'Too many attempts, please try again later') {
  const { enabled, windowMs, max } = getConfig().rateLimit;
  if (!enabled) {
    return (_req: Request, _res: Response, next: NextFunction): void => next();
  }

  return rateLimit({
    windowMs,
    limit: max,
    standardHeaders: true,
    legacyHeaders: false,
    handler: (_req: Request, _res: Response, next: NextFunction) => {
      next(new TooManyRequestsError(message));
    }
  });
}
