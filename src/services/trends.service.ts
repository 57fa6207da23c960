import { z } from 'zod';
import { salesTrend } from '../domains/forecasting/features.service';
import { ANY_LOCATION, type TrendSignalPayload } from '../domains/forecasting/signals';
import type { ExternalSignal } from '../domains/forecasting/types';
import type { IsoDate } from '../lib/dates';
import { mean, roundTo } from '../lib/numbers';
import {
  fetchJson,
  type CircuitBreaker,
  type RateLimiter,
  type RetryOptions,
  type Sleep
} from '../lib/integrationClient';
import type { CacheStore } from '../lib/redis';

export const TRENDS_SOURCE = 'trends-api';
export const MAX_KEYWORDS_PER_REQUEST = 5;
const TREND_DIRECTION_THRESHOLD = 0.05;

/** Relative search interest (0-100) per keyword on one date. */
export type TrendPoint = {
  date: IsoDate;
  values: Record<string, number>;
};

export interface TrendsProvider {
  /** Date-ordered series, or null when unconfigured or unavailable. */
  fetchTrendSeries(keywords: string[], timeframe: string): Promise<TrendPoint[] | null>;
}

const trendSeriesSchema = z.object({
  points: z.array(
    z.object({
      date: z.string().regex(/^\d{4}-\d{2}-\d{2}/),
      values: z.record(z.number())
    })
  )
});

export type HttpTrendsProviderOptions = {
  apiUrl: string | null;
  geo: string;
  cache: CacheStore;
  cacheTtlSeconds: number;
  timeoutMs: number;
  retry: RetryOptions;
  rateLimiter?: RateLimiter;
  circuitBreaker?: CircuitBreaker;
  fetchImpl?: typeof fetch;
  sleep?: Sleep;
};

/**
 * Search-interest client for an HTTP endpoint answering
 * `GET ?keywords=a,b&timeframe=today 3-m&geo=IN` with `{ points: [{ date, values }] }`.
 */
export class HttpTrendsProvider implements TrendsProvider {
  constructor(private readonly options: HttpTrendsProviderOptions) {}

  async fetchTrendSeries(keywords: string[], timeframe: string): Promise<TrendPoint[] | null> {
    if (!this.options.apiUrl) return null;

    const batch = keywords.slice(0, MAX_KEYWORDS_PER_REQUEST);
    if (batch.length === 0) return [];

    const cacheKey = `trends:interest:${[...batch].sort().join(':')}:${timeframe}`;
    const cached = await this.options.cache.get<TrendPoint[]>(cacheKey);
    if (cached) return cached;

    const search = new URLSearchParams({ keywords: batch.join(','), timeframe, geo: this.options.geo });
    const body = await fetchJson(`${this.options.apiUrl}?${search.toString()}`, trendSeriesSchema, 'Trends API', {
      timeoutMs: this.options.timeoutMs,
      retry: this.options.retry,
      rateLimiter: this.options.rateLimiter,
      circuitBreaker: this.options.circuitBreaker,
      fetchImpl: this.options.fetchImpl,
      sleep: this.options.sleep
    });
    if (!body) return null;

    const points = body.points
      .map((point) => ({ date: point.date.slice(0, 10), values: point.values }))
      .sort((a, b) => a.date.localeCompare(b.date));
    await this.options.cache.set(cacheKey, points, this.options.cacheTtlSeconds);
    return points;
  }
}

/** Merges keyword batches into one date-ordered series. */
export function mergeTrendSeries(series: readonly TrendPoint[][]): TrendPoint[] {
  const byDate = new Map<IsoDate, Record<string, number>>();
  for (const points of series) {
    for (const point of points) {
      byDate.set(point.date, { ...(byDate.get(point.date) ?? {}), ...point.values });
    }
  }
  return [...byDate.entries()]
    .sort(([a], [b]) => a.localeCompare(b))
    .map(([date, values]) => ({ date, values }));
}

export type TrendSummary = {
  score: number;
  direction: TrendSignalPayload['direction'];
  points: number;
};

/**
 * Score is the mean interest across keywords at the latest point; direction
 * compares the halves of the per-date mean series with a ±5% threshold.
 */
export function summarizeTrend(points: readonly TrendPoint[]): TrendSummary | null {
  const latest = points[points.length - 1];
  if (!latest) return null;

  const perDate = points.map((point) => mean(Object.values(point.values)));
  return {
    score: roundTo(mean(Object.values(latest.values)), 2),
    direction: salesTrend(perDate, TREND_DIRECTION_THRESHOLD),
    points: points.length
  };
}

export async function collectCategoryTrend(
  provider: TrendsProvider,
  category: string,
  keywords: string[],
  timeframe: string
): Promise<TrendSignalPayload | null> {
  const batches: TrendPoint[][] = [];
  for (let index = 0; index < keywords.length; index += MAX_KEYWORDS_PER_REQUEST) {
    const series = await provider.fetchTrendSeries(keywords.slice(index, index + MAX_KEYWORDS_PER_REQUEST), timeframe);
    if (series) batches.push(series);
  }

  const summary = summarizeTrend(mergeTrendSeries(batches));
  if (!summary) return null;
  return { category: category.toLowerCase(), keywords, ...summary };
}

export function toTrendSignal(payload: TrendSignalPayload, collectedOn: IsoDate): ExternalSignal {
  return {
    signalType: 'trends',
    locationCode: ANY_LOCATION,
    productCode: payload.category,
    signalDate: collectedOn,
    value: payload.score,
    payload,
    source: TRENDS_SOURCE
  };
}
