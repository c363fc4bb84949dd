/**
 * Rate Limit Purge Task
 * Drops expired client windows so the limiter's map stays bounded
 */

import { RateLimitManager, nowInSeconds } from '../../rate-limit/rate-limit.manager';
import { JobDefinition } from '../job.types';

export const RATE_LIMIT_PURGE_JOB = 'rate-limit-purge';

export interface PurgeReport {
  purged: number;
  activeClients: number;
}

export function createRateLimitPurgeTask(
  limiter: RateLimitManager,
  intervalMs: number,
  clock: () => number = nowInSeconds
): JobDefinition<PurgeReport> {
  return {
    name: RATE_LIMIT_PURGE_JOB,
    intervalMs,
    run: () => {
      const purged = limiter.purge(clock());
      const activeClients = limiter.getStats().activeClients;
      if (purged > 0) {
        console.log(`🧹 Rate limiter purged ${purged} expired window(s), ${activeClients} active`);
      }
      return { purged, activeClients };
    },
  };
}
