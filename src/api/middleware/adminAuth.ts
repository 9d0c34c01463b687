import { Request, Response, NextFunction, RequestHandler } from 'express';
import { ErrorCodes } from '../types';

const ADMIN_KEY_HEADER = 'x-admin-key';

/**
 * Middleware validating the X-Admin-Key header against `expectedKey`
 */
export function requireAdminKey(expectedKey: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const providedKey = req.header(ADMIN_KEY_HEADER);

    if (!providedKey) {
      res.status(401).json({
        success: false,
        error: 'Missing X-Admin-Key header',
        code: ErrorCodes.MISSING_ADMIN_KEY,
      });
      return;
    }

    if (providedKey !== expectedKey) {
      res.status(401).json({
        success: false,
        error: 'Invalid admin key',
        code: ErrorCodes.INVALID_ADMIN_KEY,
      });
      return;
    }

    next();
  };
}
