/**
 * Job Types
 * Type definitions for the background job scheduler
 */

// setInterval clamps anything above this to 1ms
export const MAX_INTERVAL_MS = 2 ** 31 - 1;

export interface JobDefinition<TResult = unknown> {
  name: string;
  intervalMs: number;
  run: () => Promise<TResult> | TResult;
  runOnStart?: boolean;            // Run once immediately when the scheduler starts
}

export enum JobRunStatus {
  SUCCESS = 'success',
  FAILED = 'failed',
  SKIPPED = 'skipped',             // Previous run still in progress
}

export interface JobRunResult {
  name: string;
  status: JobRunStatus;
  startedAt: string;
  durationMs: number;
  result?: unknown;
  error?: string;
}

export interface JobStats {
  name: string;
  intervalMs: number;
  runs: number;
  failures: number;
  running: boolean;
  lastRun?: JobRunResult;
}
