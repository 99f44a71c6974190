import { Router } from 'express';
import { healthController } from '../controllers';

const router = Router();

/**
 * @route   GET /health
 * @desc    Process status and SQLite ping (503 when the store is down)
 * @access  Public
 */
router.get('/', healthController.getHealth);

/**
 * @route   GET /health/ready
 * @desc    Readiness of SQLite, and of Redis when REDIS_ENABLED is set
 * @access  Public
 */
router.get('/ready', healthController.getReadiness);

/**
 * @route   GET /health/live
 * @desc    Liveness check (no dependency checks)
 * @access  Public
 */
router.get('/live', healthController.getLiveness);

export default router;

