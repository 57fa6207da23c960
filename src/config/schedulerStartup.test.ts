import { describe, expect, it } from 'vitest';
import { resolveSchedulerStartupMode } from './schedulerStartup';

describe('resolveSchedulerStartupMode', () => {
  it('keeps the scheduler off unless in-process jobs are requested', () => {
    expect(resolveSchedulerStartupMode({ env: {}, nodeEnv: 'production' })).toEqual({
      runInProcessJobs: false,
      schedulerEnabled: false
    });
  });

  it('requires ENABLE_SCHEDULER in development', () => {
    expect(
      resolveSchedulerStartupMode({ env: { RUN_INPROCESS_JOBS: 'true' }, nodeEnv: 'development' })
    ).toEqual({ runInProcessJobs: true, schedulerEnabled: false });
    expect(
      resolveSchedulerStartupMode({
        env: { RUN_INPROCESS_JOBS: '1', ENABLE_SCHEDULER: 'yes' },
        nodeEnv: 'development'
      })
    ).toEqual({ runInProcessJobs: true, schedulerEnabled: true });
  });

  it('always schedules outside development once in-process jobs are on', () => {
    expect(
      resolveSchedulerStartupMode({ env: { RUN_INPROCESS_JOBS: 'on' }, nodeEnv: 'production' })
    ).toEqual({ runInProcessJobs: true, schedulerEnabled: true });
  });
});
