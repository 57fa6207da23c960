import { addIsoDays, toIsoDate, type IsoDate } from '../../lib/dates';
import { mean, roundTo } from '../../lib/numbers';
import { errorMessage } from '../../lib/stageResult';
import { MULTIPLICATIVE_MODEL_TYPE } from './composer';
import type { ForecastStore } from './store';
import type { AccuracyRecord } from './types';

export type AccuracyMetrics = {
  absoluteError: number;
  percentageError: number;
  squaredError: number;
};

/** Percentage error is 100 when nothing was predicted. */
export function computeAccuracyMetrics(predicted: number, actual: number): AccuracyMetrics {
  const absoluteError = Math.abs(actual - predicted);
  return {
    absoluteError,
    percentageError: predicted === 0 ? 100 : roundTo((absoluteError / predicted) * 100, 4),
    squaredError: absoluteError ** 2
  };
}

export type AggregateMetrics = {
  count: number;
  mape: number;
  mae: number;
  rmse: number;
};

export type AccuracyAggregate = {
  overall: AggregateMetrics;
  byModel: Record<string, AggregateMetrics>;
};

function aggregateMetrics(records: readonly AccuracyRecord[]): AggregateMetrics {
  return {
    count: records.length,
    mape: roundTo(mean(records.map((record) => record.percentageError)), 2),
    mae: roundTo(mean(records.map((record) => record.absoluteError)), 2),
    rmse: roundTo(Math.sqrt(mean(records.map((record) => record.squaredError))), 2)
  };
}

export function aggregateAccuracy(
  records: readonly AccuracyRecord[],
  defaultModelType: string = MULTIPLICATIVE_MODEL_TYPE
): AccuracyAggregate {
  if (records.length === 0) {
    const empty = aggregateMetrics([]);
    return { overall: empty, byModel: { [defaultModelType]: empty } };
  }

  const grouped = new Map<string, AccuracyRecord[]>();
  for (const record of records) {
    const bucket = grouped.get(record.modelType) ?? [];
    bucket.push(record);
    grouped.set(record.modelType, bucket);
  }

  const byModel: Record<string, AggregateMetrics> = {};
  for (const [modelType, group] of [...grouped.entries()].sort(([a], [b]) => a.localeCompare(b))) {
    byModel[modelType] = aggregateMetrics(group);
  }
  return { overall: aggregateMetrics(records), byModel };
}

export type ReconcileResult = {
  forecastDate: IsoDate;
  actualsAttached: number;
  recordsWritten: number;
  failed: number;
};

export type AccuracySummary = AccuracyAggregate & {
  windowDays: number;
  since: IsoDate;
};

export type AccuracyServiceOptions = {
  batchSize: number;
  defaultModelType: string;
  clock?: () => Date;
};

export class AccuracyService {
  private readonly clock: () => Date;

  constructor(
    private readonly store: ForecastStore,
    private readonly options: AccuracyServiceOptions
  ) {
    this.clock = options.clock ?? (() => new Date());
  }

  /**
   * Copies realized sales onto the forecasts for `forecastDate` and records
   * one accuracy row per forecast that now has an actual. Store failures
   * reading the batch propagate; a failed record write is counted.
   */
  async reconcile(forecastDate: IsoDate): Promise<ReconcileResult> {
    const actualsAttached = await this.store.attachActuals(forecastDate);
    const rows = await this.store.listForecastsWithActuals(forecastDate, this.options.batchSize);
    const metricDate = toIsoDate(this.clock());

    let recordsWritten = 0;
    let failed = 0;
    for (const row of rows) {
      if (row.actualQuantity === null) continue;
      try {
        await this.store.upsertAccuracy({
          sku: row.sku,
          forecastDate: row.forecastDate,
          daysAhead: row.daysAhead,
          modelType: row.modelType,
          modelVersion: row.modelVersion,
          metricDate,
          predictedQuantity: row.predictedQuantity,
          actualQuantity: row.actualQuantity,
          ...computeAccuracyMetrics(row.predictedQuantity, row.actualQuantity)
        });
        recordsWritten += 1;
      } catch (error) {
        failed += 1;
        console.warn(`⚠️  Accuracy record for ${row.sku} on ${row.forecastDate} failed: ${errorMessage(error)}`);
      }
    }

    return { forecastDate, actualsAttached, recordsWritten, failed };
  }

  async getSummary(windowDays = 30): Promise<AccuracySummary> {
    const since = addIsoDays(toIsoDate(this.clock()), -windowDays);
    const records = await this.store.listAccuracy(since);
    return {
      windowDays,
      since,
      ...aggregateAccuracy(records, this.options.defaultModelType)
    };
  }
}
