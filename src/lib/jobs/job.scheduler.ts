/**
 * Job Scheduler
 * Runs registered jobs on fixed intervals inside the API process
 */

import { JobDefinition, JobRunResult, JobRunStatus, JobStats, MAX_INTERVAL_MS } from './job.types';

interface JobState {
  definition: JobDefinition;
  timer?: NodeJS.Timeout;
  running: boolean;
  runs: number;
  failures: number;
  lastRun?: JobRunResult;
}

export class JobScheduler {
  private jobs: Map<string, JobState> = new Map();
  private started = false;

  register<TResult>(definition: JobDefinition<TResult>): void {
    if (this.jobs.has(definition.name)) {
      throw new Error(`Job already registered: ${definition.name}`);
    }
    if (!Number.isFinite(definition.intervalMs) || definition.intervalMs <= 0) {
      throw new RangeError(`Job ${definition.name} needs a positive interval, got ${definition.intervalMs}`);
    }
    if (definition.intervalMs > MAX_INTERVAL_MS) {
      throw new RangeError(
        `Job ${definition.name} interval ${definition.intervalMs}ms exceeds the ${MAX_INTERVAL_MS}ms timer limit`
      );
    }

    const state: JobState = { definition, running: false, runs: 0, failures: 0 };
    this.jobs.set(definition.name, state);

    if (this.started) {
      this.schedule(state);
    }
  }

  start(): void {
    if (this.started) {
      return;
    }
    this.started = true;

    for (const state of this.jobs.values()) {
      this.schedule(state);
    }
    console.log(`⏱️  Job scheduler started (${this.jobs.size} job(s))`);
  }

  stop(): void {
    for (const state of this.jobs.values()) {
      if (state.timer) {
        clearInterval(state.timer);
        state.timer = undefined;
      }
    }
    if (this.started) {
      console.log('⏱️  Job scheduler stopped');
    }
    this.started = false;
  }

  isRunning(): boolean {
    return this.started;
  }

  /**
   * Run a job immediately. Overlapping runs of the same job are skipped.
   */
  async runNow(name: string): Promise<JobRunResult> {
    const state = this.jobs.get(name);
    if (!state) {
      throw new Error(`Unknown job: ${name}`);
    }

    const startedAt = Date.now();

    if (state.running) {
      return {
        name,
        status: JobRunStatus.SKIPPED,
        startedAt: new Date(startedAt).toISOString(),
        durationMs: 0,
      };
    }

    state.running = true;
    let outcome: JobRunResult;

    try {
      const result = await state.definition.run();
      outcome = {
        name,
        status: JobRunStatus.SUCCESS,
        startedAt: new Date(startedAt).toISOString(),
        durationMs: Date.now() - startedAt,
        result,
      };
    } catch (error) {
      state.failures++;
      const message = error instanceof Error ? error.message : String(error);
      console.error(`❌ Job ${name} failed: ${message}`);
      outcome = {
        name,
        status: JobRunStatus.FAILED,
        startedAt: new Date(startedAt).toISOString(),
        durationMs: Date.now() - startedAt,
        error: message,
      };
    } finally {
      state.running = false;
    }

    state.runs++;
    state.lastRun = outcome;
    return outcome;
  }

  getStats(): JobStats[] {
    return Array.from(this.jobs.values()).map(state => ({
      name: state.definition.name,
      intervalMs: state.definition.intervalMs,
      runs: state.runs,
      failures: state.failures,
      running: state.running,
      lastRun: state.lastRun,
    }));
  }

  private schedule(state: JobState): void {
    const { name, intervalMs, runOnStart } = state.definition;

    const tick = (): void => {
      this.runNow(name).catch((error: unknown) => {
        console.error(`❌ Job ${name} could not be dispatched:`, error);
      });
    };

    state.timer = setInterval(tick, intervalMs);
    // Scheduled jobs never keep the process alive on their own
    state.timer.unref();

    if (runOnStart) {
      tick();
    }
  }
}
