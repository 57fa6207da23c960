import { toForecastRows } from '../domains/forecasting';
import { errorMessage } from '../lib/stageResult';
import { jobClock, type JobContext } from './context';
import { JobLock, jobSummary, type JobRunSummary } from './jobStatus';

const lock = new JobLock('generate-forecasts', 'Forecast generation');

/**
 * Forecast the next page of active SKUs and persist one row per forecast day.
 *
 * Runs daily at 02:00 UTC. The page comes from the stored cursor, so a catalog
 * larger than `FORECAST_BATCH_SIZE` is covered over consecutive runs. A failure
 * reading the page propagates to the scheduler's retry policy.
 */
export async function generateForecasts(context: JobContext): Promise<JobRunSummary> {
  const now = jobClock(context);

  return lock.run(async () => {
    const { forecastBatchSize, defaultHorizonDays } = context.forecasting;
    const skus = await context.cursors.nextPage('generate-forecasts', context.store, forecastBatchSize);
    let succeeded = 0;
    let failed = 0;
    let degraded = 0;
    let rowsWritten = 0;

    console.log(`📊 Generating ${defaultHorizonDays}-day forecasts for ${skus.length} SKUs...`);

    for (const sku of skus) {
      try {
        const result = await context.forecasts.forecast(sku, defaultHorizonDays);
        const rows = toForecastRows(result);
        await context.store.saveForecasts(rows);
        rowsWritten += rows.length;
        if (result.degraded) degraded += 1;
        succeeded += 1;
      } catch (error) {
        console.warn(`⚠️  Forecast for ${sku} failed: ${errorMessage(error)}`);
        failed += 1;
      }
    }

    return jobSummary('generate-forecasts', { succeeded, failed }, now(), { skus: skus.length, degraded, rowsWritten });
  }, now);
}

export function getForecastGenerationStatus() {
  return lock.status();
}
