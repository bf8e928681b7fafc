import { beforeEach, describe, expect, it } from 'vitest';
import { MemoryCacheStore, getCache, initCache, setCache } from './cache.service.js';

describe('MemoryCacheStore', () => {
  let now: number;
  let store: MemoryCacheStore;

  beforeEach(() => {
    now = 1_000_000;
    store = new MemoryCacheStore(() => now);
  });

  it('returns values until their TTL elapses', async () => {
    await store.set('greeting', 'hello', 10);

    now += 9_999;
    expect(await store.get('greeting')).toBe('hello');

    now += 1;
    expect(await store.get('greeting')).toBeNull();
    expect(store.size).toBe(0);
  });

  it('keeps values without a TTL', async () => {
    await store.set('forever', 'yes');
    now += 365 * 24 * 60 * 60 * 1000;
    expect(await store.get('forever')).toBe('yes');
  });

  it('deletes keys', async () => {
    await store.set('k', 'v', 60);
    await store.del('k');
    expect(await store.get('k')).toBeNull();
  });

  it('counts hits inside a fixed window and restarts after it', async () => {
    const first = await store.increment('hits', 60_000);
    expect(first).toEqual({ count: 1, resetAt: new Date(1_060_000) });

    now += 30_000;
    const second = await store.increment('hits', 60_000);
    expect(second).toEqual({ count: 2, resetAt: new Date(1_060_000) });

    now += 30_000;
    const third = await store.increment('hits', 60_000);
    expect(third).toEqual({ count: 1, resetAt: new Date(1_120_000) });
  });

  it('decrements an existing counter and ignores missing ones', async () => {
    await store.increment('hits', 60_000);
    await store.increment('hits', 60_000);
    await store.decrement('hits');
    expect(await store.get('hits')).toBe('1');

    await store.decrement('missing');
    expect(await store.get('missing')).toBeNull();
  });
});

describe('initCache', () => {
  it('keeps the in-memory store when REDIS_URL is empty', async () => {
    const memory = new MemoryCacheStore();
    setCache(memory);

    const active = await initCache();

    expect(active).toBe(memory);
    expect(getCache().backend).toBe('memory');
  });
});
