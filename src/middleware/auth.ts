import { Request, Response, NextFunction } from 'express';
import { repositories } from '../repositories/index.js';
import { verifyAccessToken } from '../modules/auth/auth.tokens.js';
import { cacheUser, getCachedUser, type AuthUser } from '../services/userCache.service.js';
import { AppError, ErrorCode } from '../utils/appError.js';
import { logger } from '../utils/logger.js';

// Extend Express Request
declare global {
  namespace Express {
    interface Request {
      user?: AuthUser;
    }
  }
}

function bearerToken(req: Request): string | undefined {
  const header = req.headers.authorization;
  if (!header?.startsWith('Bearer ')) return undefined;
  const token = header.slice('Bearer '.length).trim();
  return token || undefined;
}

async function resolveUser(token: string): Promise<AuthUser> {
  const claims = verifyAccessToken(token);

  const cached = await getCachedUser(claims.sub);
  if (cached) return cached;

  const user = await repositories().users.findById(claims.sub);
  if (!user) {
    throw AppError.unauthorized('Could not validate credentials', ErrorCode.TOKEN_INVALID);
  }
  return cacheUser(user);
}

/**
 * Authenticate user via the Authorization: Bearer header.
 */
export const authenticate = async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
  try {
    const token = bearerToken(req);
    if (!token) {
      throw AppError.unauthorized('Not authenticated', ErrorCode.UNAUTHORIZED);
    }

    req.user = await resolveUser(token);
    next();
  } catch (error) {
    next(error);
  }
};

/**
 * Optional authentication — sets req.user if a valid token is present, but doesn't block.
 * Runs ahead of the global rate limiter so limits are keyed per account.
 */
export const optionalAuth = async (req: Request, _res: Response, next: NextFunction): Promise<void> => {
  const token = bearerToken(req);
  if (token) {
    try {
      req.user = await resolveUser(token);
    } catch (error) {
      logger.debug('Ignoring invalid bearer token on optional route', {
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }
  next();
};

/**
 * The authenticated user of a request that passed `authenticate`.
 */
export function requireUser(req: Request): AuthUser {
  if (!req.user) {
    throw AppError.unauthorized('Not authenticated');
  }
  return req.user;
}
