import { env } from '../config/env.js';
import { connectRedis, type RedisClient } from '../config/redis.js';
import { logger } from '../utils/logger.js';

export interface CounterResult {
  count: number;
  resetAt: Date;
}

export interface CacheStore {
  readonly backend: 'redis' | 'memory';
  get(key: string): Promise<string | null>;
  set(key: string, value: string, ttlSeconds?: number): Promise<void>;
  del(key: string): Promise<void>;
  /** Increments a fixed-window counter, starting the window on first hit. */
  increment(key: string, windowMs: number): Promise<CounterResult>;
  decrement(key: string): Promise<void>;
  close(): Promise<void>;
}

// ── In-memory store ──

interface MemoryEntry {
  value: string;
  expiresAt: number | null;
}

/**
 * Process-local store used when Redis is not configured or unreachable.
 * Expired entries are dropped lazily on access.
 */
export class MemoryCacheStore implements CacheStore {
  readonly backend = 'memory' as const;
  private readonly entries = new Map<string, MemoryEntry>();

  constructor(private readonly now: () => number = Date.now) {}

  private live(key: string): MemoryEntry | null {
    const entry = this.entries.get(key);
    if (!entry) return null;
    if (entry.expiresAt !== null && entry.expiresAt <= this.now()) {
      this.entries.delete(key);
      return null;
    }
    return entry;
  }

  async get(key: string): Promise<string | null> {
    return this.live(key)?.value ?? null;
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    const expiresAt = ttlSeconds && ttlSeconds > 0 ? this.now() + ttlSeconds * 1000 : null;
    this.entries.set(key, { value, expiresAt });
  }

  async del(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async increment(key: string, windowMs: number): Promise<CounterResult> {
    const entry = this.live(key);
    if (!entry || entry.expiresAt === null) {
      const resetAt = this.now() + windowMs;
      this.entries.set(key, { value: '1', expiresAt: resetAt });
      return { count: 1, resetAt: new Date(resetAt) };
    }
    const count = Number.parseInt(entry.value, 10) + 1;
    entry.value = String(count);
    return { count, resetAt: new Date(entry.expiresAt) };
  }

  async decrement(key: string): Promise<void> {
    const entry = this.live(key);
    if (!entry) return;
    const count = Number.parseInt(entry.value, 10);
    if (count > 0) entry.value = String(count - 1);
  }

  async close(): Promise<void> {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

// ── Redis store ──

export class RedisCacheStore implements CacheStore {
  readonly backend = 'redis' as const;

  constructor(private readonly client: RedisClient) {}

  async get(key: string): Promise<string | null> {
    return this.client.get(key);
  }

  async set(key: string, value: string, ttlSeconds?: number): Promise<void> {
    if (ttlSeconds && ttlSeconds > 0) {
      await this.client.set(key, value, { EX: Math.ceil(ttlSeconds) });
    } else {
      await this.client.set(key, value);
    }
  }

  async del(key: string): Promise<void> {
    await this.client.del(key);
  }

  async increment(key: string, windowMs: number): Promise<CounterResult> {
    const count = await this.client.incr(key);
    if (count === 1) {
      await this.client.pExpire(key, windowMs);
    }
    let ttl = await this.client.pTTL(key);
    // A crash between INCR and PEXPIRE leaves a counter without expiry
    if (ttl < 0) {
      await this.client.pExpire(key, windowMs);
      ttl = windowMs;
    }
    return { count, resetAt: new Date(Date.now() + ttl) };
  }

  async decrement(key: string): Promise<void> {
    const exists = await this.client.exists(key);
    if (exists) await this.client.decr(key);
  }

  async close(): Promise<void> {
    if (this.client.isOpen) {
      await this.client.quit();
    }
  }
}

// ── Active store ──

let active: CacheStore = new MemoryCacheStore();

/**
 * Connect to Redis when configured, otherwise (or on failure) keep the
 * in-memory store.
 */
export async function initCache(): Promise<CacheStore> {
  if (!env.REDIS_URL) {
    logger.warn('REDIS_URL not set, using in-memory cache');
    return active;
  }

  try {
    const client = await connectRedis(env.REDIS_URL);
    active = new RedisCacheStore(client);
    logger.info('Redis cache connected');
  } catch (error) {
    logger.warn('Redis unavailable, falling back to in-memory cache', {
      error: error instanceof Error ? error.message : String(error),
    });
  }
  return active;
}

export function getCache(): CacheStore {
  return active;
}

export function setCache(store: CacheStore): void {
  active = store;
}

export async function closeCache(): Promise<void> {
  await active.close();
  logger.info('Cache connection closed');
}
