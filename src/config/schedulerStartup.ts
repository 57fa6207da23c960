import { parseBoolean } from './forecasting';

type SchedulerStartupOptions = {
  env?: NodeJS.ProcessEnv;
  nodeEnv?: string;
};

export type SchedulerStartupMode = {
  runInProcessJobs: boolean;
  schedulerEnabled: boolean;
};

/**
 * Decides whether the API process should also run the cron scheduler.
 *
 * In-process jobs are opt-in (`RUN_INPROCESS_JOBS`). Outside development they
 * are then always scheduled; in development `ENABLE_SCHEDULER` must be set too
 * so a local API does not start pulling weather data on boot. Deployments that
 * run `worker.ts` leave both off and let bullmq own the schedule.
 */
export function resolveSchedulerStartupMode(options: SchedulerStartupOptions = {}): SchedulerStartupMode {
  const env = options.env ?? process.env;
  const nodeEnv = options.nodeEnv ?? env.NODE_ENV ?? 'development';
  const runInProcessJobs = parseBoolean(env.RUN_INPROCESS_JOBS, false);

  if (!runInProcessJobs) {
    return { runInProcessJobs, schedulerEnabled: false };
  }

  if (nodeEnv === 'development') {
    return { runInProcessJobs, schedulerEnabled: parseBoolean(env.ENABLE_SCHEDULER, false) };
  }

  return { runInProcessJobs, schedulerEnabled: true };
}
