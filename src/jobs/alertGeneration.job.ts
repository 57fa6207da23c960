import type { AlertTransition } from '../domains/forecasting';
import { errorMessage } from '../lib/stageResult';
import { jobClock, type JobContext } from './context';
import { JobLock, jobSummary, type JobRunSummary } from './jobStatus';

const lock = new JobLock('generate-alerts', 'Alert generation');

type ActionCounts = Record<AlertTransition['action'], number>;

/**
 * Forecast the next page of active SKUs and open, update or resolve each
 * SKU's inventory alert. Runs daily at 04:00 UTC.
 */
export async function generateAlerts(context: JobContext): Promise<JobRunSummary> {
  const now = jobClock(context);

  return lock.run(async () => {
    const { alertBatchSize, alertHorizonDays } = context.forecasting;
    const skus = await context.cursors.nextPage('generate-alerts', context.store, alertBatchSize);
    const actions: ActionCounts = { opened: 0, updated: 0, resolved: 0, unchanged: 0, skipped: 0 };
    let succeeded = 0;
    let failed = 0;

    console.log(`📊 Evaluating alerts for ${skus.length} SKUs...`);

    for (const sku of skus) {
      try {
        const result = await context.forecasts.forecast(sku, alertHorizonDays);
        const transition = await context.alerts.applyForecast(result);
        actions[transition.action] += 1;
        succeeded += 1;
      } catch (error) {
        console.warn(`⚠️  Alert evaluation for ${sku} failed: ${errorMessage(error)}`);
        failed += 1;
      }
    }

    return jobSummary('generate-alerts', { succeeded, failed }, now(), { skus: skus.length, ...actions });
  }, now);
}

export function getAlertGenerationStatus() {
  return lock.status();
}
