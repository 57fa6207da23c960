import { addIsoDays, toIsoDate } from '../lib/dates';
import { jobClock, type JobContext } from './context';
import { JobLock, jobSummary, type JobRunSummary } from './jobStatus';

const lock = new JobLock('calculate-accuracy', 'Accuracy calculation');

/**
 * Attach yesterday's realized sales to yesterday's forecasts and write
 * accuracy records. Runs daily at 03:00 UTC.
 */
export async function calculateAccuracy(context: JobContext): Promise<JobRunSummary> {
  const now = jobClock(context);

  return lock.run(async () => {
    const yesterday = addIsoDays(toIsoDate(now()), -1);
    console.log(`📊 Reconciling forecasts for ${yesterday}...`);

    const result = await context.accuracy.reconcile(yesterday);

    return jobSummary('calculate-accuracy', { succeeded: result.recordsWritten, failed: result.failed }, now(), {
      forecastDate: result.forecastDate,
      actualsAttached: result.actualsAttached
    });
  }, now);
}

export function getAccuracyCalculationStatus() {
  return lock.status();
}
