import { setRepositories } from '../repositories/index.js';
import type { UserRecord } from '../repositories/index.js';
import { MemoryCacheStore, setCache } from '../services/cache.service.js';
import { createAccessToken, hashPassword } from '../modules/auth/auth.tokens.js';
import { Role } from '../utils/constants.js';
import { createMemoryRepositories, type MemoryRepositories } from './memoryRepositories.js';

export const TEST_PASSWORD = 'secret123';

/**
 * Fresh in-memory repositories and cache, so rate-limit counters and cached
 * users never leak between tests.
 */
export function resetState(): { repos: MemoryRepositories; cache: MemoryCacheStore } {
  const repos = createMemoryRepositories();
  const cache = new MemoryCacheStore();
  setRepositories(repos);
  setCache(cache);
  return { repos, cache };
}

export async function createUser(
  repos: MemoryRepositories,
  overrides: { email?: string; password?: string; role?: Role; isVerified?: boolean } = {},
): Promise<UserRecord> {
  return repos.users.create({
    email: overrides.email ?? 'alice@example.com',
    password: await hashPassword(overrides.password ?? TEST_PASSWORD),
    role: overrides.role ?? Role.USER,
    isVerified: overrides.isVerified ?? true,
  });
}

export function bearer(user: Pick<UserRecord, 'id' | 'email' | 'role'>): string {
  return `Bearer ${createAccessToken(user)}`;
}
