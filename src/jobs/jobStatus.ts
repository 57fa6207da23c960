import { errorMessage } from '../lib/stageResult';

export const JOB_NAMES = [
  'collect-weather',
  'collect-trends',
  'update-festival-calendar',
  'generate-forecasts',
  'calculate-accuracy',
  'generate-alerts',
  'train-models'
] as const;

export type JobName = (typeof JOB_NAMES)[number];

export function isJobName(value: string): value is JobName {
  return JOB_NAMES.some((name) => name === value);
}

export type JobRunSummary = {
  job: JobName;
  succeeded: number;
  failed: number;
  timestamp: string;
  status: 'success' | 'skipped';
  details?: Record<string, unknown>;
};

export type JobStatus = {
  job: JobName;
  isRunning: boolean;
  lastRunTime: Date | null;
  lastRunDuration: number | null;
  lastResult: JobRunSummary | null;
  lastError: string | null;
};

export function jobSummary(
  job: JobName,
  counts: { succeeded: number; failed: number },
  now: Date,
  details?: Record<string, unknown>
): JobRunSummary {
  return {
    job,
    succeeded: counts.succeeded,
    failed: counts.failed,
    timestamp: now.toISOString(),
    status: 'success',
    ...(details ? { details } : {})
  };
}

export function skippedSummary(job: JobName, now: Date, reason: string): JobRunSummary {
  return { job, succeeded: 0, failed: 0, timestamp: now.toISOString(), status: 'skipped', details: { reason } };
}

export const ALREADY_RUNNING = 'already running';

/** True for the summary a JobLock returns while an earlier run still holds it. */
export function isAlreadyRunning(result: unknown): boolean {
  if (typeof result !== 'object' || result === null) return false;
  if (!('status' in result) || result.status !== 'skipped') return false;
  if (!('details' in result) || typeof result.details !== 'object' || result.details === null) return false;
  return 'reason' in result.details && result.details.reason === ALREADY_RUNNING;
}

/**
 * In-memory lock preventing overlapping runs of one job within a process,
 * plus the last run's timing and outcome.
 */
export class JobLock {
  private isRunning = false;
  private lastRunTime: Date | null = null;
  private lastRunDuration: number | null = null;
  private lastResult: JobRunSummary | null = null;
  private lastError: string | null = null;

  constructor(
    readonly job: JobName,
    private readonly label: string
  ) {}

  async run(task: () => Promise<JobRunSummary>, now: () => Date = () => new Date()): Promise<JobRunSummary> {
    if (this.isRunning) {
      console.warn(`⚠️  ${this.label} already running, skipping`);
      return skippedSummary(this.job, now(), ALREADY_RUNNING);
    }

    this.isRunning = true;
    const startTime = Date.now();

    try {
      const result = await task();
      this.lastRunTime = new Date();
      this.lastRunDuration = Date.now() - startTime;
      this.lastResult = result;
      this.lastError = null;
      console.log(
        `✅ ${this.label} finished in ${this.lastRunDuration}ms: ${result.succeeded} succeeded, ${result.failed} failed`
      );
      return result;
    } catch (error) {
      this.lastError = errorMessage(error);
      console.error(`❌ ${this.label} failed:`, error);
      throw error;
    } finally {
      this.isRunning = false;
    }
  }

  status(): JobStatus {
    return {
      job: this.job,
      isRunning: this.isRunning,
      lastRunTime: this.lastRunTime,
      lastRunDuration: this.lastRunDuration,
      lastResult: this.lastResult,
      lastError: this.lastError
    };
  }
}
