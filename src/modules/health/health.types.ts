/**
 * Health Types
 */

import { RateLimitStats } from '../../lib/rate-limit/rate-limit.types';

export type DependencyStatus = 'healthy' | 'unhealthy';

/**
 * Anything that can answer a liveness ping (RedisConnection)
 */
export interface HealthProbe {
  healthCheck(): Promise<boolean>;
}

export interface DependencyReport {
  redis: DependencyStatus;
}

export interface DependencyCheck {
  status: DependencyStatus;
  error?: string;
}

export type DependencyChecks = { [K in keyof DependencyReport]: DependencyCheck };

export interface BasicHealth {
  status: 'healthy';
  service: string;
  version: string;
}

export interface DetailedHealth {
  status: DependencyStatus;
  service: string;
  version: string;
  timestamp: string;
  dependencies: DependencyReport;
  rateLimiter: RateLimitStats | null;
}
