/**
 * Reconciliation Status Cache
 *
 * READ-THROUGH cache for monthly status reports.
 *
 * - Reports are recomputed from SQLite on a miss
 * - Any match decision in a month invalidates that month's key
 * - Without Redis every call goes straight to the database
 *
 * KEY FORMAT: reconciliation:status:{YYYY}-{MM}
 * TTL: STATUS_CACHE_TTL_SECONDS (default 5 minutes)
 */

import { env } from '../config';
import { safeRedisOperation, safeRedisWrite } from './client';

const CACHE_KEY_PREFIX = 'reconciliation:status:';

export function getStatusCacheKey(year: number, month: number): string {
  return `${CACHE_KEY_PREFIX}${year}-${String(month).padStart(2, '0')}`;
}

/**
 * Returns the cached report, or the one `compute` builds (which is then cached).
 *
 * @param parse - Validates the cached JSON; returning null counts as a miss
 */
export async function getStatusWithCache<T>(
  year: number,
  month: number,
  compute: () => Promise<T>,
  parse: (cached: unknown) => T | null
): Promise<T> {
  const cacheKey = getStatusCacheKey(year, month);

  const cached = await safeRedisOperation(
    async (client) => {
      const raw = await client.get(cacheKey);
      if (!raw) {
        return null;
      }
      try {
        return parse(JSON.parse(raw));
      } catch {
        // Invalid JSON - treat as cache miss
        return null;
      }
    },
    null,
    `Status cache GET (${cacheKey})`
  );

  if (cached !== null) {
    return cached;
  }

  const report = await compute();

  await safeRedisWrite(async (client) => {
    await client.setex(cacheKey, env.STATUS_CACHE_TTL_SECONDS, JSON.stringify(report));
  }, `Status cache SET (${cacheKey})`);

  return report;
}

export async function invalidateStatusCache(year: number, month: number): Promise<void> {
  const cacheKey = getStatusCacheKey(year, month);

  await safeRedisWrite(async (client) => {
    await client.del(cacheKey);
  }, `Status cache INVALIDATE (${cacheKey})`);
}
