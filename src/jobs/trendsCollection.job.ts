import { toIsoDate } from '../lib/dates';
import { errorMessage } from '../lib/stageResult';
import { collectCategoryTrend, toTrendSignal } from '../services/trends.service';
import { jobClock, type JobContext } from './context';
import { JobLock, jobSummary, skippedSummary, type JobRunSummary } from './jobStatus';

const lock = new JobLock('collect-trends', 'Trends collection');

/**
 * Collect search interest per product category and store one `trends` signal
 * per category. Runs weekly on Sunday at 07:00 UTC.
 */
export async function collectTrends(context: JobContext): Promise<JobRunSummary> {
  const now = jobClock(context);

  return lock.run(async () => {
    if (!context.providers.trendsApiUrl) {
      console.warn('⚠️  TRENDS_API_URL is not set, skipping trends collection');
      return skippedSummary('collect-trends', now(), 'trends endpoint not configured');
    }

    const collectedOn = toIsoDate(now());
    const categories = Object.entries(context.trendKeywords);
    let succeeded = 0;
    let failed = 0;

    console.log(`📊 Collecting trends for ${categories.length} categories...`);

    for (const [category, keywords] of categories) {
      try {
        const payload = await collectCategoryTrend(
          context.trends,
          category,
          keywords,
          context.providers.trendsTimeframe
        );
        if (!payload) {
          console.warn(`⚠️  No trends data for ${category}`);
          failed += 1;
          continue;
        }
        await context.store.upsertSignal(toTrendSignal(payload, collectedOn));
        succeeded += 1;
      } catch (error) {
        console.error(`❌ Storing trends for ${category} failed: ${errorMessage(error)}`);
        failed += 1;
      }
    }

    return jobSummary('collect-trends', { succeeded, failed }, now());
  }, now);
}

export function getTrendsCollectionStatus() {
  return lock.status();
}
