import { Request, Response } from 'express';
import { healthService } from '../services';
import { sendSuccess, sendError, asyncHandler } from '../utils';

/**
 * Health check controller
 */
export class HealthController {
  /**
   * GET /health
   * Process status plus a ping of the SQLite store
   */
  getHealth = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    const health = healthService.getHealthStatus();

    if (health.status === 'healthy') {
      sendSuccess(res, health, 'Reconciliation service is healthy');
    } else {
      sendError(res, 'Reconciliation store is unavailable', 503);
    }
  });

  /**
   * GET /health/ready
   * Ready once the match store (and the status cache, when enabled) answers
   */
  getReadiness = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    const { ready, checks } = await healthService.checkReadiness();

    if (ready) {
      sendSuccess(res, { ready, checks }, 'Service is ready');
      return;
    }

    const unavailable = Object.entries(checks)
      .filter(([, ok]) => !ok)
      .map(([name]) => name);
    sendError(res, `Service is not ready: ${unavailable.join(', ')} unavailable`, 503);
  });

  /**
   * GET /health/live
   */
  getLiveness = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    sendSuccess(res, { alive: true }, 'Service is alive');
  });
}

export const healthController = new HealthController();

export default healthController;
