/**
 * Health Service
 * Aggregates dependency checks for the health endpoints and background jobs
 */

import { APP_VERSION, SERVICE_NAME } from '../../config/constants';
import { RateLimitManager } from '../../lib/rate-limit/rate-limit.manager';
import { BasicHealth, DependencyCheck, DependencyChecks, DependencyReport, DetailedHealth, HealthProbe } from './health.types';

export interface HealthServiceDeps {
  redis: HealthProbe;
  limiter?: RateLimitManager;
}

export class HealthService {
  constructor(private readonly deps: HealthServiceDeps) {}

  basic(): BasicHealth {
    return {
      status: 'healthy',
      service: SERVICE_NAME,
      version: APP_VERSION,
    };
  }

  async checkDependencies(): Promise<DependencyReport> {
    const checks = await this.inspectDependencies();
    return {
      redis: checks.redis.status,
    };
  }

  /**
   * Dependency statuses along with the reason for each failure
   */
  async inspectDependencies(): Promise<DependencyChecks> {
    return {
      redis: await this.probe(this.deps.redis),
    };
  }

  async detailed(): Promise<DetailedHealth> {
    const dependencies = await this.checkDependencies();
    const healthy = Object.values(dependencies).every(status => status === 'healthy');

    return {
      status: healthy ? 'healthy' : 'unhealthy',
      service: SERVICE_NAME,
      version: APP_VERSION,
      timestamp: new Date().toISOString(),
      dependencies,
      rateLimiter: this.deps.limiter ? this.deps.limiter.getStats() : null,
    };
  }

  private async probe(probe: HealthProbe): Promise<DependencyCheck> {
    try {
      if (await probe.healthCheck()) {
        return { status: 'healthy' };
      }
      return { status: 'unhealthy', error: 'health check returned false' };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      console.warn(`Dependency health check failed: ${message}`);
      return { status: 'unhealthy', error: message };
    }
  }
}
