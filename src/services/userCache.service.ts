import { z } from 'zod';
import { env } from '../config/env.js';
import type { UserRecord } from '../repositories/index.js';
import { CacheKeys, Role } from '../utils/constants.js';
import { logger } from '../utils/logger.js';
import { getCache } from './cache.service.js';

// Shape kept in the cache and returned by the API. Never includes the password hash.
const authUserSchema = z.object({
  id: z.string(),
  email: z.string(),
  role: z.nativeEnum(Role),
  isVerified: z.boolean(),
  avatarUrl: z.string().nullable(),
});

export type AuthUser = z.infer<typeof authUserSchema>;

export function toAuthUser(user: UserRecord): AuthUser {
  return {
    id: user.id,
    email: user.email,
    role: user.role,
    isVerified: user.isVerified,
    avatarUrl: user.avatarUrl,
  };
}

export async function cacheUser(user: UserRecord | AuthUser): Promise<AuthUser> {
  const entry: AuthUser = {
    id: user.id,
    email: user.email,
    role: user.role,
    isVerified: user.isVerified,
    avatarUrl: user.avatarUrl,
  };
  await getCache().set(
    CacheKeys.user(entry.id),
    JSON.stringify(entry),
    env.ACCESS_TOKEN_EXPIRE_MINUTES * 60,
  );
  return entry;
}

export async function getCachedUser(userId: string): Promise<AuthUser | null> {
  const raw = await getCache().get(CacheKeys.user(userId));
  if (!raw) return null;

  let value: unknown;
  try {
    value = JSON.parse(raw);
  } catch (error) {
    logger.warn('Dropping unreadable user cache entry', {
      userId,
      error: error instanceof Error ? error.message : String(error),
    });
    await invalidateUser(userId);
    return null;
  }

  const parsed = authUserSchema.safeParse(value);
  if (!parsed.success) {
    await invalidateUser(userId);
    return null;
  }
  return parsed.data;
}

export async function invalidateUser(userId: string): Promise<void> {
  await getCache().del(CacheKeys.user(userId));
}
