import cron, { ScheduledTask } from 'node-cron';
import { sleep as defaultSleep, type Sleep } from '../lib/integrationClient';
import { errorMessage } from '../lib/stageResult';
import { isTimeoutError, withTimeout } from '../lib/timeouts';
import { isAlreadyRunning } from './jobStatus';

/**
 * Job scheduler for automated tasks
 * Uses node-cron for in-process scheduling (no external dependencies)
 *
 * Note: Jobs run in UTC timezone
 * For horizontal scaling across multiple instances, run worker.ts instead (bullmq)
 */

export type RetryPolicy = {
  /** Retries after the first attempt. */
  retryAttempts: number;
  /** Delay before retry n (0-based) is retryBackoffMs * 2^n. */
  retryBackoffMs: number;
  /** Per-attempt bound; 0 disables it. */
  timeoutMs: number;
};

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  retryAttempts: 3,
  retryBackoffMs: 10 * 60 * 1000,
  timeoutMs: 45 * 60 * 1000
};

type JobDefinition = {
  name: string;
  schedule: string; // Cron expression
  task: () => Promise<unknown>;
  enabled: boolean;
  retryPolicy: RetryPolicy;
};

export type AbandonedRun = {
  job: string;
  attempts: number;
  error: string;
  timedOut: boolean;
  abandonedAt: string;
};

const MAX_ABANDONED_RUNS = 50;

const jobs = new Map<string, ScheduledTask>();
const jobDefinitions: JobDefinition[] = [];
const abandonedRuns: AbandonedRun[] = [];

export function retryDelayMs(policy: RetryPolicy, attempt: number): number {
  return policy.retryBackoffMs * 2 ** attempt;
}

/**
 * Runs `task` until it succeeds or the retry budget is spent. An exhausted
 * run is abandoned for this cycle: logged, recorded, and resolved as null.
 * A timed-out attempt keeps its job lock, so a retry that finds the job still
 * running counts as another failed attempt rather than a skip.
 */
export async function runWithRetry<T>(
  name: string,
  task: () => Promise<T>,
  policy: RetryPolicy,
  sleep: Sleep = defaultSleep
): Promise<T | null> {
  for (let attempt = 0; ; attempt += 1) {
    try {
      const result = await withTimeout(task(), policy.timeoutMs, `Job "${name}"`);
      if (attempt > 0 && isAlreadyRunning(result)) {
        throw new Error(`Job "${name}" is still running from an earlier attempt`);
      }
      return result;
    } catch (error) {
      if (attempt >= policy.retryAttempts) {
        console.error(`❌ Job "${name}" abandoned after ${attempt + 1} attempts: ${errorMessage(error)}`);
        recordAbandonedRun({
          job: name,
          attempts: attempt + 1,
          error: errorMessage(error),
          timedOut: isTimeoutError(error),
          abandonedAt: new Date().toISOString()
        });
        return null;
      }
      const delay = retryDelayMs(policy, attempt);
      console.warn(`⚠️  Job "${name}" attempt ${attempt + 1} failed, retrying in ${delay}ms: ${errorMessage(error)}`);
      await sleep(delay);
    }
  }
}

function recordAbandonedRun(run: AbandonedRun): void {
  abandonedRuns.push(run);
  if (abandonedRuns.length > MAX_ABANDONED_RUNS) {
    abandonedRuns.splice(0, abandonedRuns.length - MAX_ABANDONED_RUNS);
  }
}

/**
 * Most recent runs that exhausted their retries, oldest first.
 */
export function getAbandonedRuns(): AbandonedRun[] {
  return [...abandonedRuns];
}

type RegisterJobOptions = {
  enabled?: boolean;
  retryPolicy?: RetryPolicy;
};

/**
 * Register a scheduled job
 *
 * @param name - Unique job identifier
 * @param schedule - Cron expression (runs in UTC)
 * @param task - Async function to execute
 */
export function registerJob(
  name: string,
  schedule: string,
  task: () => Promise<unknown>,
  options: RegisterJobOptions = {}
): void {
  if (jobDefinitions.some((definition) => definition.name === name)) {
    console.warn(`⚠️  Job "${name}" already registered, skipping`);
    return;
  }

  if (!cron.validate(schedule)) {
    throw new Error(`Invalid cron expression for job "${name}": ${schedule}`);
  }

  const enabled = options.enabled ?? true;
  const retryPolicy = options.retryPolicy ?? DEFAULT_RETRY_POLICY;
  jobDefinitions.push({ name, schedule, enabled, task, retryPolicy });

  if (!enabled) {
    console.log(`📅 Job "${name}" registered but disabled`);
    return;
  }

  const scheduledTask = cron.schedule(
    schedule,
    async () => {
      console.log(`🚀 Starting job: ${name}`);
      const startTime = Date.now();
      const result = await runWithRetry(name, task, retryPolicy);
      if (result !== null) {
        console.log(`✅ Job "${name}" completed in ${Date.now() - startTime}ms`);
      }
    },
    {
      scheduled: false,
      timezone: 'UTC'
    }
  );

  jobs.set(name, scheduledTask);
  console.log(`📅 Job "${name}" scheduled: ${schedule} (UTC)`);
}

/**
 * Start all registered jobs
 */
export function startScheduler(): void {
  console.log(`\n🕐 Starting job scheduler (${jobs.size} jobs)`);

  for (const task of jobs.values()) {
    task.start();
  }

  if (jobs.size === 0) {
    console.log('   No jobs registered');
  }
}

/**
 * Stop all scheduled jobs and forget their registrations
 */
export function stopScheduler(): void {
  console.log('\n🛑 Stopping job scheduler');

  for (const [name, task] of jobs.entries()) {
    task.stop();
    console.log(`   Stopped: ${name}`);
  }

  jobs.clear();
  jobDefinitions.length = 0;
}

export function getJobDefinitions(): Array<Pick<JobDefinition, 'name' | 'schedule' | 'enabled'>> {
  return jobDefinitions.map(({ name, schedule, enabled }) => ({ name, schedule, enabled }));
}
