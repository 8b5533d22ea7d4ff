import { HealthService } from '../../src/services/health.service';

describe('HealthService', () => {
  let healthService: HealthService;

  beforeEach(() => {
    healthService = new HealthService();
  });

  describe('getHealthStatus', () => {
    it('should return health status with all required fields', () => {
      const status = healthService.getHealthStatus();

      expect(status).toHaveProperty('status', 'healthy');
      expect(status).toHaveProperty('timestamp');
      expect(status).toHaveProperty('uptime');
      expect(status).toHaveProperty('environment');
      expect(status).toHaveProperty('version');
    });

    it('should return a valid ISO timestamp', () => {
      const status = healthService.getHealthStatus();

      expect(new Date(status.timestamp).toISOString()).toBe(status.timestamp);
    });

    it('should return non-negative uptime', () => {
      const status = healthService.getHealthStatus();

      expect(status.uptime).toBeGreaterThanOrEqual(0);
    });

    it('should return version string', () => {
      const status = healthService.getHealthStatus();

      expect(typeof status.version).toBe('string');
      expect(status.version.length).toBeGreaterThan(0);
    });
  });

  describe('checkReadiness', () => {
    it('should include server check', async () => {
      const result = await healthService.checkReadiness();

      expect(result).toEqual({ ready: true, checks: { server: true } });
    });

    it('should run every dependency check', async () => {
      const service = new HealthService({
        database: async () => true,
        storage: async () => true,
      });

      const result = await service.checkReadiness();

      expect(result).toEqual({ ready: true, checks: { server: true, database: true, storage: true } });
    });

    it('should not be ready when a check fails', async () => {
      const service = new HealthService({ database: async () => false });

      const result = await service.checkReadiness();

      expect(result.ready).toBe(false);
      expect(result.checks.database).toBe(false);
    });

    it('should treat a throwing check as failed', async () => {
      const service = new HealthService({
        database: () => Promise.reject(new Error('connection refused')),
      });

      const result = await service.checkReadiness();

      expect(result).toEqual({ ready: false, checks: { server: true, database: false } });
    });
  });
});
