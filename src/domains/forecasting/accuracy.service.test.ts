import { describe, expect, it, vi } from 'vitest';
import { MemoryForecastStore } from '../../test/memoryForecastStore';
import { AccuracyService, aggregateAccuracy, computeAccuracyMetrics } from './accuracy.service';
import type { AccuracyRecord, DemandForecastRow } from './types';

const NOW = new Date('2026-03-10T12:00:00.000Z');

function record(overrides: Partial<AccuracyRecord>): AccuracyRecord {
  return {
    sku: 'SKU-1',
    forecastDate: '2026-03-08',
    daysAhead: 1,
    modelType: 'multiplicative',
    modelVersion: '1.0.0',
    metricDate: '2026-03-09',
    predictedQuantity: 10,
    actualQuantity: 8,
    absoluteError: 2,
    percentageError: 20,
    squaredError: 4,
    ...overrides
  };
}

function forecastRow(overrides: Partial<DemandForecastRow>): DemandForecastRow {
  return {
    runId: 'run-1',
    sku: 'SKU-1',
    forecastDate: '2026-03-09',
    daysAhead: 1,
    predictedQuantity: 10,
    lowerBound: 5,
    upperBound: 15,
    modelType: 'multiplicative',
    modelVersion: '1.0.0',
    factors: [],
    degraded: false,
    generatedAt: '2026-03-08T02:00:00.000Z',
    actualQuantity: null,
    ...overrides
  };
}

describe('computeAccuracyMetrics', () => {
  it('scores an over-forecast', () => {
    expect(computeAccuracyMetrics(10, 8)).toEqual({ absoluteError: 2, percentageError: 20, squaredError: 4 });
  });

  it('reports 100 percent when nothing was predicted', () => {
    expect(computeAccuracyMetrics(0, 5)).toEqual({ absoluteError: 5, percentageError: 100, squaredError: 25 });
  });
});

describe('aggregateAccuracy', () => {
  it('computes MAPE, MAE and RMSE overall and per model', () => {
    const aggregate = aggregateAccuracy([
      record({}),
      record({ daysAhead: 2, absoluteError: 1, percentageError: 10, squaredError: 1 }),
      record({ modelType: 'seasonal-naive', absoluteError: 5, percentageError: 50, squaredError: 25 })
    ]);

    expect(aggregate.overall).toEqual({ count: 3, mape: 26.67, mae: 2.67, rmse: 3.16 });
    expect(aggregate.byModel).toEqual({
      multiplicative: { count: 2, mape: 15, mae: 1.5, rmse: 1.58 },
      'seasonal-naive': { count: 1, mape: 50, mae: 5, rmse: 5 }
    });
  });

  it('returns a zeroed placeholder for the default model without records', () => {
    const zero = { count: 0, mape: 0, mae: 0, rmse: 0 };
    expect(aggregateAccuracy([])).toEqual({ overall: zero, byModel: { multiplicative: zero } });
  });
});

describe('AccuracyService', () => {
  function seeded(): MemoryForecastStore {
    const store = new MemoryForecastStore().addSales('SKU-1', [['2026-03-09', 8]]).addSales('SKU-2', [['2026-03-09', 5]]);
    store.forecasts.push(
      forecastRow({}),
      forecastRow({ runId: 'run-0', predictedQuantity: 20, generatedAt: '2026-03-07T02:00:00.000Z' }),
      forecastRow({ runId: 'run-0', daysAhead: 2, predictedQuantity: 12, generatedAt: '2026-03-07T02:00:00.000Z' }),
      forecastRow({ sku: 'SKU-2', predictedQuantity: 0 }),
      forecastRow({ sku: 'SKU-3', predictedQuantity: 4 })
    );
    return store;
  }

  const options = { batchSize: 100, defaultModelType: 'multiplicative', clock: () => NOW };

  it('attaches actuals and records accuracy for the latest forecast per horizon', async () => {
    const store = seeded();

    const result = await new AccuracyService(store, options).reconcile('2026-03-09');

    expect(result).toEqual({ forecastDate: '2026-03-09', actualsAttached: 4, recordsWritten: 3, failed: 0 });
    expect([...store.accuracy.values()].map((entry) => [entry.sku, entry.daysAhead, entry.predictedQuantity, entry.percentageError])).toEqual([
      ['SKU-1', 1, 10, 20],
      ['SKU-1', 2, 12, 33.3333],
      ['SKU-2', 1, 0, 100]
    ]);
    expect(store.accuracy.get('SKU-1|2026-03-09|1|multiplicative')?.metricDate).toBe('2026-03-10');
  });

  it('is idempotent across reruns', async () => {
    const store = seeded();
    const service = new AccuracyService(store, options);

    await service.reconcile('2026-03-09');
    await service.reconcile('2026-03-09');

    expect(store.accuracy.size).toBe(3);
  });

  it('counts failed record writes', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const store = seeded().failOn('upsertAccuracy');

    const result = await new AccuracyService(store, options).reconcile('2026-03-09');

    expect(result).toMatchObject({ recordsWritten: 0, failed: 3 });
  });

  it('propagates store failures reading the batch', async () => {
    const store = seeded().failOn('attachActuals');
    await expect(new AccuracyService(store, options).reconcile('2026-03-09')).rejects.toThrow('attachActuals unavailable');
  });

  it('summarizes records inside the window', async () => {
    const store = new MemoryForecastStore();
    await store.upsertAccuracy(record({ forecastDate: '2026-03-01', absoluteError: 9, percentageError: 90, squaredError: 81 }));
    await store.upsertAccuracy(record({ forecastDate: '2026-03-08' }));

    const summary = await new AccuracyService(store, options).getSummary(7);

    expect(summary).toEqual({
      windowDays: 7,
      since: '2026-03-03',
      overall: { count: 1, mape: 20, mae: 2, rmse: 2 },
      byModel: { multiplicative: { count: 1, mape: 20, mae: 2, rmse: 2 } }
    });
  });
});
