/**
 * Job Scheduler Tests
 */

import { JobScheduler } from '../job.scheduler';
import { JobRunStatus } from '../job.types';
import { silenceConsole } from '../../../__tests__/helpers/mocks';

describe('JobScheduler', () => {
  let scheduler: JobScheduler;

  silenceConsole();

  beforeEach(() => {
    scheduler = new JobScheduler();
  });

  afterEach(() => {
    scheduler.stop();
    jest.useRealTimers();
  });

  describe('register', () => {
    it('should refuse duplicate names', () => {
      scheduler.register({ name: 'job', intervalMs: 1000, run: () => 1 });

      expect(() => scheduler.register({ name: 'job', intervalMs: 1000, run: () => 2 })).toThrow(
        'Job already registered: job'
      );
    });

    it('should refuse non-positive intervals', () => {
      expect(() => scheduler.register({ name: 'job', intervalMs: 0, run: () => 1 })).toThrow(RangeError);
    });

    it('should refuse intervals setInterval cannot hold', () => {
      expect(() => scheduler.register({ name: 'slow', intervalMs: 3e9, run: () => 1 })).toThrow(
        'Job slow interval 3000000000ms exceeds the 2147483647ms timer limit'
      );
      expect(() => scheduler.register({ name: 'max', intervalMs: 2 ** 31 - 1, run: () => 1 })).not.toThrow();
    });
  });

  describe('runNow', () => {
    it('should record a successful run', async () => {
      scheduler.register({ name: 'answer', intervalMs: 1000, run: async () => 42 });

      const result = await scheduler.runNow('answer');

      expect(result).toMatchObject({ name: 'answer', status: JobRunStatus.SUCCESS, result: 42 });
      expect(scheduler.getStats()).toEqual([
        { name: 'answer', intervalMs: 1000, runs: 1, failures: 0, running: false, lastRun: result },
      ]);
    });

    it('should record a failed run without throwing', async () => {
      scheduler.register({
        name: 'broken',
        intervalMs: 1000,
        run: async () => {
          throw new Error('redis down');
        },
      });

      const result = await scheduler.runNow('broken');

      expect(result).toMatchObject({ status: JobRunStatus.FAILED, error: 'redis down' });
      expect(scheduler.getStats()[0]).toMatchObject({ runs: 1, failures: 1 });
    });

    it('should skip a run while the previous one is still in progress', async () => {
      let release: () => void = () => undefined;
      const gate = new Promise<void>(resolve => {
        release = resolve;
      });
      const run = jest.fn(() => gate);
      scheduler.register({ name: 'slow', intervalMs: 1000, run });

      const first = scheduler.runNow('slow');
      const second = await scheduler.runNow('slow');
      release();

      expect(second.status).toBe(JobRunStatus.SKIPPED);
      expect((await first).status).toBe(JobRunStatus.SUCCESS);
      expect(run).toHaveBeenCalledTimes(1);
    });

    it('should reject unknown job names', async () => {
      await expect(scheduler.runNow('missing')).rejects.toThrow('Unknown job: missing');
    });
  });

  describe('start/stop', () => {
    it('should run jobs on their interval until stopped', async () => {
      jest.useFakeTimers();
      const run = jest.fn(() => 'ok');
      scheduler.register({ name: 'tick', intervalMs: 1000, run });

      scheduler.start();
      expect(scheduler.isRunning()).toBe(true);
      await jest.advanceTimersByTimeAsync(3000);
      expect(run).toHaveBeenCalledTimes(3);

      scheduler.stop();
      await jest.advanceTimersByTimeAsync(3000);
      expect(run).toHaveBeenCalledTimes(3);
      expect(scheduler.isRunning()).toBe(false);
    });

    it('should run immediately when runOnStart is set', () => {
      jest.useFakeTimers();
      const run = jest.fn(() => 'ok');
      scheduler.register({ name: 'eager', intervalMs: 1000, run, runOnStart: true });

      scheduler.start();

      expect(run).toHaveBeenCalledTimes(1);
    });

    it('should schedule jobs registered after start', async () => {
      jest.useFakeTimers();
      scheduler.start();
      const run = jest.fn(() => 'ok');
      scheduler.register({ name: 'late', intervalMs: 500, run });

      await jest.advanceTimersByTimeAsync(1000);

      expect(run).toHaveBeenCalledTimes(2);
    });
  });
});
