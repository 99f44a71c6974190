/**
 * Redis Module
 *
 * Redis is an OPTIONAL cache for status reports. The application works
 * without it; SQLite remains the source of truth.
 */

// Client exports
export {
  getRedisClient,
  isRedisEnabled,
  isRedisAvailable,
  disconnectRedis,
  safeRedisOperation,
  safeRedisWrite,
} from './client';

// Status cache exports
export { getStatusWithCache, invalidateStatusCache, getStatusCacheKey } from './statusCache';
