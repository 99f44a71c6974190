/**
 * Tests for Redis Client
 *
 * REDIS_ENABLED is false under test, so no connection is ever attempted.
 */

import {
  disconnectRedis,
  getRedisClient,
  isRedisAvailable,
  isRedisEnabled,
  safeRedisOperation,
  safeRedisWrite,
} from '../../src/redis/client';

describe('Redis Client', () => {
  describe('when disabled', () => {
    it('should report Redis as disabled', () => {
      expect(isRedisEnabled()).toBe(false);
    });

    it('should not create a client', () => {
      expect(getRedisClient()).toBeNull();
    });

    it('should not be available', () => {
      expect(isRedisAvailable()).toBe(false);
    });

    it('should disconnect without a client', async () => {
      await expect(disconnectRedis()).resolves.toBeUndefined();
    });
  });

  describe('safeRedisOperation', () => {
    it('should return the fallback without running the operation', async () => {
      const operation = jest.fn(async () => 'cached');

      const result = await safeRedisOperation(operation, 'fallback', 'test read');

      expect(result).toBe('fallback');
      expect(operation).not.toHaveBeenCalled();
    });
  });

  describe('safeRedisWrite', () => {
    it('should skip the write', async () => {
      const operation = jest.fn(async () => undefined);

      await safeRedisWrite(operation, 'test write');

      expect(operation).not.toHaveBeenCalled();
    });
  });
});
