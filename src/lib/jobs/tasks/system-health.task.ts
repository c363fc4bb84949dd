/**
 * System Health Task
 * Periodic self-check of the worker and its dependencies
 */

import { HealthService } from '../../../modules/health/health.service';
import { DependencyStatus } from '../../../modules/health/health.types';
import { JobDefinition } from '../job.types';

export const SYSTEM_HEALTH_JOB = 'system-health';

export interface SystemHealthReport {
  status: 'healthy' | 'degraded';
  timestamp: string;
  environment: string;
  worker: 'operational';
  redis: DependencyStatus;
  redisError?: string;
}

export function createSystemHealthTask(
  healthService: HealthService,
  environment: string,
  intervalMs: number
): JobDefinition<SystemHealthReport> {
  return {
    name: SYSTEM_HEALTH_JOB,
    intervalMs,
    runOnStart: true,
    run: async () => {
      const { redis } = await healthService.inspectDependencies();
      const report: SystemHealthReport = {
        status: redis.status === 'healthy' ? 'healthy' : 'degraded',
        timestamp: new Date().toISOString(),
        environment,
        worker: 'operational',
        redis: redis.status,
      };
      if (redis.error !== undefined) {
        report.redisError = redis.error;
      }

      if (report.status === 'healthy') {
        console.log(`System health check completed: ${report.status}`);
      } else {
        console.warn(`System health check completed: ${report.status} (redis: ${report.redis})`);
      }
      return report;
    },
  };
}
