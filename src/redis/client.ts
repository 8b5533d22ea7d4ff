/**
 * Redis Client Module
 *
 * Run summaries are cached here and upload payloads wait here for their
 * job. While Redis is down cache reads return their fallback, cache writes
 * are dropped and uploads fail, but syncs still reconcile.
 */

import Redis from 'ioredis';
import { env } from '../config';
import { logger } from '../utils';

// Give up after three reconnect attempts (100ms, 200ms, 300ms)
const MAX_RECONNECT_ATTEMPTS = 3;

let client: Redis | null = null;
let ready = false;

const errorText = (error: unknown): string => (error instanceof Error ? error.message : String(error));

function connect(): Redis {
  const redis = new Redis({
    host: env.REDIS_HOST,
    port: env.REDIS_PORT,
    lazyConnect: true,
    maxRetriesPerRequest: 1,
    retryStrategy: (times) => (times > MAX_RECONNECT_ATTEMPTS ? null : times * 100),
  });

  redis.on('ready', () => {
    ready = true;
    logger.info(`📦 Redis connected at ${env.REDIS_HOST}:${env.REDIS_PORT}`);
  });
  redis.on('error', (error: Error) => {
    ready = false;
    logger.warn(`Redis error (run cache disabled): ${error.message}`);
  });
  redis.on('end', () => {
    ready = false;
    logger.debug('Redis connection ended');
  });

  redis.connect().catch((error: unknown) => {
    ready = false;
    logger.warn(`Redis unreachable, run summaries will not be cached: ${errorText(error)}`);
  });

  return redis;
}

/**
 * The shared client, created and connected on first use.
 */
export function getRedisClient(): Redis {
  client ??= connect();
  return client;
}

/**
 * The shared client for callers that cannot work without Redis.
 *
 * @throws Error when the connection is not ready
 */
export function requireRedisClient(): Redis {
  const redis = getRedisClient();
  if (!ready) {
    throw new Error(`Redis is not connected (${env.REDIS_HOST}:${env.REDIS_PORT})`);
  }
  return redis;
}

/**
 * Closes the connection during shutdown. Safe to call when never connected.
 */
export async function disconnectRedis(): Promise<void> {
  if (!client) {
    return;
  }
  const closing = client;
  client = null;
  ready = false;

  try {
    await closing.quit();
    logger.info('Redis disconnected');
  } catch (error) {
    logger.warn(`Redis disconnect failed: ${errorText(error)}`);
  }
}

type Attempt<T> = { ok: true; value: T } | { ok: false };

async function attempt<T>(operation: (redis: Redis) => Promise<T>, label: string): Promise<Attempt<T>> {
  const redis = getRedisClient();
  if (!ready) {
    logger.debug(`${label}: Redis not ready, skipped`);
    return { ok: false };
  }

  try {
    return { ok: true, value: await operation(redis) };
  } catch (error) {
    logger.warn(`${label} failed: ${errorText(error)}`);
    return { ok: false };
  }
}

/**
 * Runs a read, returning `fallback` when Redis is not ready or the read fails.
 */
export async function safeRedisOperation<T>(
  operation: (redis: Redis) => Promise<T>,
  fallback: T,
  label = 'Redis read'
): Promise<T> {
  const result = await attempt(operation, label);
  return result.ok ? result.value : fallback;
}

/**
 * Runs a write; dropped when Redis is not ready, failures are logged.
 */
export async function safeRedisWrite(
  operation: (redis: Redis) => Promise<unknown>,
  label = 'Redis write'
): Promise<void> {
  await attempt(operation, label);
}
