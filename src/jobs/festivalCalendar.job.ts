import { festivalsInRange } from '../domains/forecasting/multipliers';
import type { FestivalSignalPayload } from '../domains/forecasting/signals';
import { calendarParts, toIsoDate } from '../lib/dates';
import { errorMessage } from '../lib/stageResult';
import { jobClock, type JobContext } from './context';
import { JobLock, jobSummary, type JobRunSummary } from './jobStatus';

const lock = new JobLock('update-festival-calendar', 'Festival calendar update');

export const FESTIVAL_SOURCE = 'static-data';

/**
 * Reload reference data from disk (refreshing the cached copy), upsert a
 * `festival` signal for every festival dated this year or next, and drop
 * cached forecasts computed from the previous calendar.
 * Runs monthly on the 1st at 00:00 UTC.
 */
export async function updateFestivalCalendar(context: JobContext): Promise<JobRunSummary> {
  const now = jobClock(context);

  return lock.run(async () => {
    const data = await context.referenceData.reload();
    const { year } = calendarParts(toIsoDate(now()));
    const occurrences = festivalsInRange(data, `${year}-01-01`, `${year + 1}-12-31`);
    let succeeded = 0;
    let failed = 0;

    console.log(`📊 Syncing ${occurrences.length} festival dates (reference data ${data.version})...`);

    for (const occurrence of occurrences) {
      const payload: FestivalSignalPayload = {
        name: occurrence.name,
        type: occurrence.type,
        region: occurrence.region,
        impactWindowDays: occurrence.impactWindowDays,
        impactCategories: occurrence.impactCategories,
        referenceVersion: data.version
      };
      try {
        await context.store.upsertSignal({
          signalType: 'festival',
          locationCode: occurrence.region,
          productCode: occurrence.name,
          signalDate: occurrence.date,
          value: occurrence.demandMultiplier,
          payload,
          source: FESTIVAL_SOURCE
        });
        succeeded += 1;
      } catch (error) {
        console.error(`❌ Storing festival ${occurrence.name} (${occurrence.date}) failed: ${errorMessage(error)}`);
        failed += 1;
      }
    }

    const forecastsInvalidated = await context.forecasts.clearCache();
    console.log(`🔧 Dropped ${forecastsInvalidated} cached forecasts`);

    return jobSummary('update-festival-calendar', { succeeded, failed }, now(), {
      referenceVersion: data.version,
      sources: data.sources,
      forecastsInvalidated
    });
  }, now);
}

export function getFestivalCalendarStatus() {
  return lock.status();
}
