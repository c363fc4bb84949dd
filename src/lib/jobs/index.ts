/**
 * Background Jobs
 * Main export file for the job scheduler and its tasks
 */

export * from './job.types';
export * from './job.scheduler';
export * from './tasks/system-health.task';
export * from './tasks/rate-limit-purge.task';
export * from './tasks/system-metrics.task';
