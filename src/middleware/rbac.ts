import { Request, Response, NextFunction } from 'express';
import { Role } from '../utils/constants.js';
import { AppError, ErrorCode } from '../utils/appError.js';

/**
 * RBAC middleware factory. Must run after `authenticate`.
 */
export const authorize = (...allowedRoles: Role[]) => {
  return (req: Request, _res: Response, next: NextFunction): void => {
    if (!req.user) {
      next(AppError.unauthorized('Authentication required'));
      return;
    }

    if (!allowedRoles.includes(req.user.role)) {
      next(
        AppError.forbidden(
          `Access denied. Required roles: ${allowedRoles.join(', ')}`,
          ErrorCode.FORBIDDEN,
        ),
      );
      return;
    }

    next();
  };
};
