import { HealthCheckResponse } from '../types';
import { env } from '../config';
import { checkDatabaseHealth } from '../database/connection';
import { isRedisAvailable, isRedisEnabled } from '../redis/client';

/**
 * Health check service
 */
export class HealthService {
  private readonly startTime: number;
  private readonly version: string;

  constructor() {
    this.startTime = Date.now();
    this.version = process.env.npm_package_version || '1.0.0';
  }

  /**
   * Get health status. The service is unhealthy once SQLite stops answering.
   */
  getHealthStatus(): HealthCheckResponse {
    const database = checkDatabaseHealth().status;
    return {
      status: database === 'up' ? 'healthy' : 'unhealthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      environment: env.NODE_ENV,
      version: this.version,
      database,
    };
  }

  /**
   * Check if the service is ready.
   * Redis only counts when it is enabled.
   */
  async checkReadiness(): Promise<{ ready: boolean; checks: Record<string, boolean> }> {
    const checks: Record<string, boolean> = {
      server: true,
      database: checkDatabaseHealth().status === 'up',
    };

    if (isRedisEnabled()) {
      checks.redis = isRedisAvailable();
    }

    const ready = Object.values(checks).every((check) => check);

    return { ready, checks };
  }
}

// Singleton instance
export const healthService = new HealthService();

export default healthService;
