import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { JobLock, jobSummary } from './jobStatus';
import {
  DEFAULT_RETRY_POLICY,
  getAbandonedRuns,
  getJobDefinitions,
  registerJob,
  retryDelayMs,
  runWithRetry,
  stopScheduler,
  type RetryPolicy
} from './scheduler';

const policy: RetryPolicy = { retryAttempts: 3, retryBackoffMs: 1000, timeoutMs: 0 };

beforeEach(() => {
  vi.spyOn(console, 'log').mockImplementation(() => undefined);
  vi.spyOn(console, 'warn').mockImplementation(() => undefined);
  vi.spyOn(console, 'error').mockImplementation(() => undefined);
});

afterEach(() => {
  stopScheduler();
});

describe('runWithRetry', () => {
  it('retries with geometrically growing delays until the task succeeds', async () => {
    const task = vi
      .fn<[], Promise<string>>()
      .mockRejectedValueOnce(new Error('db down'))
      .mockRejectedValueOnce(new Error('db down'))
      .mockResolvedValue('done');
    const sleep = vi.fn(async (_ms: number) => undefined);

    await expect(runWithRetry('flaky', task, policy, sleep)).resolves.toBe('done');
    expect(task).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
  });

  it('abandons the cycle once retries are exhausted', async () => {
    const task = vi.fn(() => Promise.reject(new Error('db down')));
    const sleep = vi.fn(async (_ms: number) => undefined);

    await expect(runWithRetry('broken', task, { ...policy, retryAttempts: 2 }, sleep)).resolves.toBeNull();
    expect(task).toHaveBeenCalledTimes(3);
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([1000, 2000]);
    expect(getAbandonedRuns().at(-1)).toMatchObject({ job: 'broken', attempts: 3, error: 'db down', timedOut: false });
  });

  it('bounds each attempt with the timeout', async () => {
    const task = () => new Promise<string>(() => undefined);

    await expect(runWithRetry('stuck', task, { retryAttempts: 0, retryBackoffMs: 0, timeoutMs: 5 })).resolves.toBeNull();
    expect(getAbandonedRuns().at(-1)).toMatchObject({ job: 'stuck', error: 'Job "stuck" timed out after 5ms', timedOut: true });
  });

  it('counts a retry that finds the timed-out attempt still holding the lock as a failure', async () => {
    const lock = new JobLock('generate-forecasts', 'Forecast generation');
    let started = 0;
    const slowFailure = () =>
      lock.run(async () => {
        started += 1;
        await new Promise((resolve) => setTimeout(resolve, 50));
        throw new Error('db down');
      });
    const sleep = vi.fn(async (_ms: number) => undefined);

    const result = await runWithRetry(
      'slow-failure',
      slowFailure,
      { retryAttempts: 2, retryBackoffMs: 0, timeoutMs: 10 },
      sleep
    );

    expect(result).toBeNull();
    expect(started).toBe(1);
    expect(sleep).toHaveBeenCalledTimes(2);
    expect(getAbandonedRuns().at(-1)).toMatchObject({
      job: 'slow-failure',
      attempts: 3,
      error: 'Job "slow-failure" is still running from an earlier attempt',
      timedOut: false
    });
    await vi.waitFor(() => expect(lock.status().isRunning).toBe(false));
  });

  it('accepts a skip on the first attempt when a previous cycle is still running', async () => {
    const lock = new JobLock('generate-alerts', 'Alert generation');
    let release: () => void = () => undefined;
    const previousCycle = lock.run(async () => {
      await new Promise<void>((resolve) => {
        release = resolve;
      });
      return jobSummary('generate-alerts', { succeeded: 1, failed: 0 }, new Date());
    });

    const nextCycle = () => lock.run(async () => jobSummary('generate-alerts', { succeeded: 0, failed: 0 }, new Date()));

    const result = await runWithRetry('overlap', nextCycle, policy);

    expect(result).toMatchObject({ status: 'skipped', details: { reason: 'already running' } });
    release();
    await expect(previousCycle).resolves.toMatchObject({ status: 'success', succeeded: 1 });
  });

  it('doubles the default ten-minute base per attempt', () => {
    expect(retryDelayMs(DEFAULT_RETRY_POLICY, 0)).toBe(600_000);
    expect(retryDelayMs(DEFAULT_RETRY_POLICY, 2)).toBe(2_400_000);
  });
});

describe('job registration', () => {
  it('lists registered jobs with their schedules', () => {
    registerJob('demo', '0 2 * * *', async () => 'ran', { enabled: false });

    expect(getJobDefinitions()).toEqual([{ name: 'demo', schedule: '0 2 * * *', enabled: false }]);
  });

  it('ignores duplicate names and rejects invalid cron expressions', () => {
    registerJob('demo', '0 2 * * *', async () => undefined, { enabled: false });
    registerJob('demo', '0 3 * * *', async () => undefined, { enabled: false });

    expect(getJobDefinitions()).toHaveLength(1);
    expect(() => registerJob('bad', 'every day', async () => undefined)).toThrow(
      'Invalid cron expression for job "bad": every day'
    );
  });
});
