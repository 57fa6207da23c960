import { Worker, type JobsOptions } from 'bullmq';
import type { JobScheduleConfig } from '../config/forecasting';
import type { JobContext } from '../jobs/context';
import { isAlreadyRunning, type JobRunSummary } from '../jobs/jobStatus';
import { findJob, FORECASTING_JOBS } from '../jobs/registry';
import { withTimeout } from '../lib/timeouts';
import { getQueueConnection } from './connection';
import { getQueue, QUEUE_NAMES, queueFor, type QueueName } from './queues';

export function repeatableJobOptions(cronPattern: string, config: JobScheduleConfig): JobsOptions {
  return {
    repeat: { pattern: cronPattern, tz: 'UTC' },
    // bullmq counts the first run as an attempt.
    attempts: config.retryAttempts + 1,
    backoff: { type: 'exponential', delay: config.retryBackoffMs },
    removeOnComplete: true,
    removeOnFail: 100
  };
}

export async function registerRepeatableJobs(config: JobScheduleConfig): Promise<void> {
  for (const job of FORECASTING_JOBS) {
    const pattern = config.crons[job.cronKey];
    await getQueue(queueFor(job.name)).add(job.name, {}, repeatableJobOptions(pattern, config));
    console.log(`📅 Repeatable job "${job.name}" registered: ${pattern} (UTC)`);
  }
}

/**
 * Runs one delivery of a repeatable job. A redelivery (`attemptsMade > 0`) that
 * finds an earlier timed-out attempt still holding the lock fails, so bullmq
 * keeps retrying instead of recording a skip as completed.
 */
export async function runQueuedJob(
  context: JobContext,
  config: JobScheduleConfig,
  name: string,
  attemptsMade: number
): Promise<JobRunSummary> {
  const job = findJob(name);
  if (!job) {
    throw new Error(`Unknown forecasting job: ${name}`);
  }
  const result = await withTimeout(job.run(context), config.jobTimeoutMs, `Job "${name}"`);
  if (attemptsMade > 0 && isAlreadyRunning(result)) {
    throw new Error(`Job "${name}" is still running from an earlier attempt`);
  }
  return result;
}

export type WorkerConcurrency = Record<QueueName, number>;

export function startWorkers(
  context: JobContext,
  config: JobScheduleConfig,
  concurrency: WorkerConcurrency = { [QUEUE_NAMES.collection]: 1, [QUEUE_NAMES.batch]: 1 }
) {
  const connection = getQueueConnection();

  const workers = Object.values(QUEUE_NAMES).map((queueName) => {
    const worker = new Worker(
      queueName,
      async (bullJob) => runQueuedJob(context, config, bullJob.name, bullJob.attemptsMade),
      { connection, concurrency: concurrency[queueName] }
    );
    worker.on('failed', (bullJob, err) => {
      console.error(
        `❌ Job "${bullJob?.name ?? 'unknown'}" failed (attempt ${bullJob?.attemptsMade ?? 0}): ${err.message}`
      );
    });
    worker.on('completed', (bullJob) => {
      console.log(`✅ Job "${bullJob.name}" completed`);
    });
    return worker;
  });

  return workers;
}
