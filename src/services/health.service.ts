import { HealthCheckResponse } from '../types';
import { env } from '../config';
import { logger } from '../utils';

export type DependencyCheck = () => Promise<boolean>;

/**
 * Health check service
 */
export class HealthService {
  private readonly startTime: number;
  private readonly version: string;

  /**
   * @param checks - Named dependency probes run by the readiness check
   */
  constructor(private readonly checks: Record<string, DependencyCheck> = {}) {
    this.startTime = Date.now();
    this.version = process.env.npm_package_version || '1.0.0';
  }

  getHealthStatus(): HealthCheckResponse {
    return {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: Math.floor((Date.now() - this.startTime) / 1000),
      environment: env.NODE_ENV,
      version: this.version,
    };
  }

  /**
   * Runs every dependency probe; ready only when all pass
   */
  async checkReadiness(): Promise<{ ready: boolean; checks: Record<string, boolean> }> {
    const results: Record<string, boolean> = { server: true };

    for (const [name, check] of Object.entries(this.checks)) {
      results[name] = await check().catch((error: unknown) => {
        logger.warn(`Readiness check "${name}" threw: ${error instanceof Error ? error.message : String(error)}`);
        return false;
      });
    }

    const ready = Object.values(results).every(Boolean);

    return { ready, checks: results };
  }
}

export default HealthService;
