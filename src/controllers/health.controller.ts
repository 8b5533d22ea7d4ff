import { Request, Response } from 'express';
import type { HealthService } from '../services';
import { sendSuccess, sendError, asyncHandler } from '../utils';

/**
 * Health check controller
 */
export class HealthController {
  constructor(private readonly healthService: HealthService) {}

  /**
   * GET /health
   * Basic health check endpoint
   */
  getHealth = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    sendSuccess(res, this.healthService.getHealthStatus(), 'Service is healthy');
  });

  /**
   * GET /health/ready
   * Readiness check endpoint (checks dependencies)
   */
  getReadiness = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    const { ready, checks } = await this.healthService.checkReadiness();

    if (ready) {
      sendSuccess(res, { ready, checks }, 'Service is ready');
    } else {
      sendError(res, 'Service is not ready', 503);
    }
  });

  /**
   * GET /health/live
   * Liveness check endpoint
   */
  getLiveness = asyncHandler(async (_req: Request, res: Response): Promise<void> => {
    sendSuccess(res, { alive: true }, 'Service is alive');
  });
}

export default HealthController;
