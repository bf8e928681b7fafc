import { beforeEach, describe, expect, it } from 'vitest';
import { MemoryCacheStore, setCache } from './cache.service.js';
import { cacheUser, getCachedUser, invalidateUser } from './userCache.service.js';
import type { UserWithPassword } from '../repositories/index.js';
import { Role } from '../utils/constants.js';

const user: UserWithPassword = {
  id: 'user-1',
  email: 'alice@example.com',
  password: 'hashed-password',
  role: Role.USER,
  isVerified: true,
  avatarUrl: null,
  createdAt: new Date('2024-01-01T00:00:00Z'),
  updatedAt: new Date('2024-01-01T00:00:00Z'),
};

describe('user cache', () => {
  let now: number;
  let store: MemoryCacheStore;

  beforeEach(() => {
    now = 0;
    store = new MemoryCacheStore(() => now);
    setCache(store);
  });

  it('stores the public fields only', async () => {
    await cacheUser(user);

    const raw = await store.get('user:user-1');
    expect(raw).not.toBeNull();
    expect(JSON.parse(raw ?? '')).toEqual({
      id: 'user-1',
      email: 'alice@example.com',
      role: 'user',
      isVerified: true,
      avatarUrl: null,
    });
  });

  it('reads back a cached user', async () => {
    await cacheUser(user);
    expect(await getCachedUser('user-1')).toEqual({
      id: 'user-1',
      email: 'alice@example.com',
      role: Role.USER,
      isVerified: true,
      avatarUrl: null,
    });
  });

  it('expires with the access token lifetime', async () => {
    await cacheUser(user);

    now = 30 * 60 * 1000 - 1;
    expect(await getCachedUser('user-1')).not.toBeNull();

    now = 30 * 60 * 1000;
    expect(await getCachedUser('user-1')).toBeNull();
  });

  it('drops entries that do not parse', async () => {
    await store.set('user:user-1', '{not json', 60);
    expect(await getCachedUser('user-1')).toBeNull();
    expect(await store.get('user:user-1')).toBeNull();

    await store.set('user:user-1', JSON.stringify({ id: 'user-1', role: 'owner' }), 60);
    expect(await getCachedUser('user-1')).toBeNull();
    expect(await store.get('user:user-1')).toBeNull();
  });

  it('invalidates on demand', async () => {
    await cacheUser(user);
    await invalidateUser('user-1');
    expect(await getCachedUser('user-1')).toBeNull();
  });
});
