import { createClient } from 'redis';
import { logger } from '../utils/logger.js';

export type RedisClient = ReturnType<typeof createClient>;

const MAX_INITIAL_RETRIES = 3;
const CONNECT_TIMEOUT_MS = 5_000;

/**
 * Connect a Redis client. The first connection gives up after a few retries so
 * callers can fall back to the in-memory cache; once connected, reconnects are
 * retried indefinitely.
 */
export async function connectRedis(url: string): Promise<RedisClient> {
  let everConnected = false;

  const client = createClient({
    url,
    socket: {
      connectTimeout: CONNECT_TIMEOUT_MS,
      reconnectStrategy: (retries) => {
        if (!everConnected && retries >= MAX_INITIAL_RETRIES) {
          return new Error(`Redis unreachable after ${retries} retries`);
        }
        return Math.min(retries * 200, 2_000);
      },
    },
  });

  client.on('error', (err: Error) => {
    logger.error('Redis client error', { error: err.message });
  });
  client.on('reconnecting', () => {
    logger.warn('Redis reconnecting...');
  });
  client.on('ready', () => {
    everConnected = true;
  });

  await client.connect();
  await client.ping();
  return client;
}
