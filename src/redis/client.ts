/**
 * Redis Client Module
 *
 * Provides a singleton Redis client with GRACEFUL DEGRADATION.
 *
 * - Redis is OPTIONAL and off unless REDIS_ENABLED=true
 * - The application works the same without it, only slower
 * - Redis errors are logged, never thrown
 *
 * SQLite remains the SOURCE OF TRUTH.
 */

import Redis from 'ioredis';
import { env } from '../config';
import { logger } from '../utils';

const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : 'Unknown error';

// ============================================
// Configuration
// ============================================

interface RedisConfig {
  host: string;
  port: number;
  maxRetriesPerRequest: number;
  retryStrategy: (times: number) => number | null;
  lazyConnect: boolean;
}

function getRedisConfig(): RedisConfig {
  return {
    host: env.REDIS_HOST,
    port: env.REDIS_PORT,
    // Limit retries to avoid blocking
    maxRetriesPerRequest: 1,
    // Exponential backoff: 100ms, 200ms, 300ms, then give up
    retryStrategy: (times: number) => (times > 3 ? null : Math.min(times * 100, 400)),
    // Connect on first use
    lazyConnect: true,
  };
}

// ============================================
// Client State
// ============================================

let redisClient: Redis | null = null;
let isConnected = false;
let connectionAttempted = false;

function createRedisClient(): Redis | null {
  try {
    const client = new Redis(getRedisConfig());

    client.on('connect', () => {
      isConnected = true;
      logger.info('📦 Redis connected successfully');
    });

    client.on('ready', () => {
      isConnected = true;
      logger.debug('Redis client ready');
    });

    client.on('error', (error: Error) => {
      logger.warn(`Redis error (non-fatal): ${error.message}`);
      isConnected = false;
    });

    client.on('close', () => {
      isConnected = false;
      logger.debug('Redis connection closed');
    });

    client.on('end', () => {
      isConnected = false;
      logger.debug('Redis connection ended');
    });

    return client;
  } catch (error) {
    logger.warn(`Failed to create Redis client (non-fatal): ${errorMessage(error)}`);
    return null;
  }
}

export function isRedisEnabled(): boolean {
  return env.REDIS_ENABLED;
}

/**
 * Gets the Redis client, creating it on first call.
 *
 * @returns Redis client, or null when Redis is disabled or unavailable
 */
export function getRedisClient(): Redis | null {
  if (!isRedisEnabled()) {
    return null;
  }

  if (!connectionAttempted) {
    connectionAttempted = true;
    redisClient = createRedisClient();

    redisClient?.connect().catch((error: unknown) => {
      logger.warn(`Redis initial connection failed (non-fatal): ${errorMessage(error)}`);
      isConnected = false;
    });
  }

  return redisClient;
}

export function isRedisAvailable(): boolean {
  return isConnected && redisClient !== null;
}

/**
 * Safely disconnects from Redis. Call during shutdown.
 */
export async function disconnectRedis(): Promise<void> {
  if (!redisClient) {
    return;
  }

  try {
    await redisClient.quit();
    logger.info('Redis disconnected');
  } catch (error) {
    logger.warn(`Redis disconnect error (non-fatal): ${errorMessage(error)}`);
  } finally {
    redisClient = null;
    isConnected = false;
    connectionAttempted = false;
  }
}

// ============================================
// Safe Redis Operations
// ============================================

/**
 * Runs a Redis operation, returning `fallback` when Redis is disabled,
 * disconnected or the operation fails.
 */
export async function safeRedisOperation<T>(
  operation: (client: Redis) => Promise<T>,
  fallback: T,
  operationName = 'Redis operation'
): Promise<T> {
  const client = getRedisClient();

  if (!client || !isConnected) {
    logger.debug(`${operationName}: Redis unavailable, using fallback`);
    return fallback;
  }

  try {
    return await operation(client);
  } catch (error) {
    logger.warn(`${operationName} failed (non-fatal): ${errorMessage(error)}`);
    return fallback;
  }
}

/**
 * Fire-and-forget variant of `safeRedisOperation` for cache writes.
 */
export async function safeRedisWrite(
  operation: (client: Redis) => Promise<unknown>,
  operationName = 'Redis write'
): Promise<void> {
  await safeRedisOperation(
    async (client) => {
      await operation(client);
    },
    undefined,
    operationName
  );
}

export default {
  getRedisClient,
  isRedisEnabled,
  isRedisAvailable,
  disconnectRedis,
  safeRedisOperation,
  safeRedisWrite,
};
