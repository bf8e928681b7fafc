import rateLimit from 'express-rate-limit';
import type { ClientRateLimitInfo, Options, Store } from 'express-rate-limit';
import type { Request } from 'express';
import { getCache } from '../services/cache.service.js';
import { CacheKeys } from '../utils/constants.js';

/**
 * express-rate-limit store over the active CacheStore, so counters live in
 * Redis when it is connected and in process memory otherwise.
 */
export class CacheRateLimitStore implements Store {
  windowMs = 60 * 1000;
  readonly prefix: string;

  constructor(name: string) {
    this.prefix = CacheKeys.rateLimit(name);
  }

  init(options: Options): void {
    this.windowMs = options.windowMs;
  }

  async increment(key: string): Promise<ClientRateLimitInfo> {
    const { count, resetAt } = await getCache().increment(this.prefix + key, this.windowMs);
    return { totalHits: count, resetTime: resetAt };
  }

  async decrement(key: string): Promise<void> {
    await getCache().decrement(this.prefix + key);
  }

  async resetKey(key: string): Promise<void> {
    await getCache().del(this.prefix + key);
  }
}

// Authenticated callers are limited per account, anonymous ones per address
const keyByUserOrIp = (req: Request): string => req.user?.id ?? req.ip ?? 'unknown';

function limiter(name: string, max: number, message: string) {
  return rateLimit({
    windowMs: 60 * 1000, // 1 minute
    max,
    standardHeaders: true,
    legacyHeaders: false,
    keyGenerator: keyByUserOrIp,
    store: new CacheRateLimitStore(name),
    message: {
      success: false,
      error: {
        code: 'RATE_LIMITED',
        message,
      },
    },
  });
}

export const apiLimiter = limiter('api', 100, 'Too many requests. Please slow down.');

export const authLimiter = limiter(
  'auth',
  5,
  'Too many authentication attempts. Please try again in 1 minute.',
);

export const emailLimiter = limiter('email', 3, 'Too many email requests. Please wait 1 minute.');

export const profileLimiter = limiter('profile', 5, 'Too many profile requests. Please try again shortly.');
