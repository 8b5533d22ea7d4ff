import { Router } from 'express';
import { HealthController } from '../controllers';
import type { HealthService } from '../services';

export const createHealthRouter = (healthService: HealthService): Router => {
  const router = Router();
  const healthController = new HealthController(healthService);

  /**
   * @route   GET /health
   * @desc    Basic health check
   * @access  Public
   */
  router.get('/', healthController.getHealth);

  /**
   * @route   GET /health/ready
   * @desc    Readiness check (database reachable)
   * @access  Public
   */
  router.get('/ready', healthController.getReadiness);

  /**
   * @route   GET /health/live
   * @desc    Liveness check
   * @access  Public
   */
  router.get('/live', healthController.getLiveness);

  return router;
};

export default createHealthRouter;
