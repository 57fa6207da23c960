import { v4 as uuidv4 } from 'uuid';
import { addIsoDays, toIsoDate, type IsoDate } from '../../lib/dates';
import { mean, roundTo, sum } from '../../lib/numbers';
import type { CacheStore } from '../../lib/redis';
import { errorMessage, settle } from '../../lib/stageResult';
import type { ComposerRegistry, DemandComposer } from './composer';
import type { ForecastStore } from './store';
import type { DailyForecast, DemandForecastRow, FeatureAssembly, FeatureOptions, FeatureRecord, ForecastResult } from './types';

export interface FeatureSource {
  assembleFeatures(sku: string, forecastDate: IsoDate, options?: FeatureOptions): Promise<FeatureAssembly>;
}

export type ForecastEngineConfig = {
  defaultHorizonDays: number;
  defaultBaselineDemand: number;
  baselineWindowDays: number;
  reorderCoverDays: number;
  reorderSafetyMargin: number;
  fallbackHorizonDays: number;
  forecastCacheTtlSeconds: number;
};

export type ForecastServiceDeps = {
  store: ForecastStore;
  cache: CacheStore;
  features: FeatureSource;
  composers: ComposerRegistry;
  config: ForecastEngineConfig;
  clock?: () => Date;
  newRunId?: () => string;
};

export const NO_STOCKOUT = 999;
const MAX_HORIZON_DAYS = 365;

const SAFE_DAY = {
  predictedQuantity: 10,
  lowerBound: 5,
  upperBound: 15
};

export function confidenceBand(predicted: number): { lowerBound: number; upperBound: number } {
  const width = Math.max(Math.round(predicted * 0.2), 5);
  return {
    lowerBound: Math.max(predicted - width, 0),
    upperBound: predicted + width
  };
}

export function influencingFactors(features: FeatureRecord): string[] {
  const factors: string[] = [];
  if (features.isFestivalWeek === 1 && features.festivalName) {
    factors.push(`Festival: ${features.festivalName}`);
  }
  if (features.salesTrend7d === 'increasing') {
    factors.push('Increasing sales trend');
  }
  if (features.temperature !== null && features.temperatureImpact !== 1) {
    factors.push(`Temperature: ${roundTo(features.temperature, 1)}°C`);
  }
  return factors;
}

/** First day offset whose cumulative demand covers current stock; 999 when none. */
export function daysUntilStockout(forecasts: readonly DailyForecast[], currentStock: number | null): number {
  if (currentStock === null) return NO_STOCKOUT;
  let cumulative = 0;
  for (const day of forecasts) {
    cumulative += day.predictedQuantity;
    if (cumulative >= currentStock) return day.daysAhead;
  }
  return NO_STOCKOUT;
}

export function recommendedReorderQuantity(
  forecasts: readonly DailyForecast[],
  coverDays: number,
  safetyMargin: number
): number {
  const covered = forecasts.slice(0, coverDays).map((day) => day.predictedQuantity);
  return Math.round(sum(covered) * (1 + safetyMargin));
}

export const FORECAST_CACHE_PREFIX = 'forecast:';

export function forecastCacheKey(sku: string, horizonDays: number, modelType: string, options: FeatureOptions): string {
  const flag = (value: boolean | undefined) => (value ?? true ? '1' : '0');
  const featureFlags = `e${flag(options.includeExternal)}w${flag(options.includeWeather)}t${flag(options.includeTrends)}`;
  return `${FORECAST_CACHE_PREFIX}${sku}:${horizonDays}:${modelType}:${featureFlags}`;
}

export function toForecastRows(result: ForecastResult): DemandForecastRow[] {
  return result.forecasts.map((day) => ({
    runId: result.runId,
    sku: result.sku,
    forecastDate: day.forecastDate,
    daysAhead: day.daysAhead,
    predictedQuantity: day.predictedQuantity,
    lowerBound: day.lowerBound,
    upperBound: day.upperBound,
    modelType: result.modelType,
    modelVersion: result.modelVersion,
    factors: day.factors,
    degraded: day.degraded,
    generatedAt: result.generatedAt,
    actualQuantity: null
  }));
}

function safeDay(asOfDate: IsoDate, daysAhead: number): DailyForecast {
  return {
    forecastDate: addIsoDays(asOfDate, daysAhead),
    daysAhead,
    ...SAFE_DAY,
    combinedMultiplier: 1,
    factors: [],
    degraded: true
  };
}

/**
 * Produces dated point forecasts for a SKU from a trailing-sales baseline and
 * the configured demand composer, plus the stockout day and reorder quantity
 * derived from them. Results are cached unless degraded.
 */
export class ForecastService {
  private readonly clock: () => Date;
  private readonly newRunId: () => string;

  constructor(private readonly deps: ForecastServiceDeps) {
    this.clock = deps.clock ?? (() => new Date());
    this.newRunId = deps.newRunId ?? uuidv4;
  }

  async forecast(
    sku: string,
    horizonDays: number = this.deps.config.defaultHorizonDays,
    modelType?: string,
    options: FeatureOptions = {}
  ): Promise<ForecastResult> {
    if (!Number.isInteger(horizonDays) || horizonDays < 1 || horizonDays > MAX_HORIZON_DAYS) {
      throw new Error(`INVALID_HORIZON_DAYS: ${horizonDays}`);
    }

    const composer = this.deps.composers.resolve(modelType);
    const cacheKey = forecastCacheKey(sku, horizonDays, composer.modelType, options);

    const cached = await this.readCache(cacheKey);
    if (cached) return cached;

    const now = this.clock();
    const asOfDate = toIsoDate(now);

    const baseline = await settle(
      `baseline for ${sku}`,
      () => this.estimateBaseline(sku, asOfDate),
      () => this.deps.config.defaultBaselineDemand
    );
    const stock = await settle(`current stock for ${sku}`, () => this.deps.store.getCurrentStock(sku), () => null);

    const horizon = await this.forecastDays(sku, asOfDate, horizonDays, baseline.value, composer, options);
    const horizonFailed = horizon.failedDays === horizonDays;
    let forecasts = horizon.days;
    if (horizonFailed) {
      console.error(`❌ Every forecast day failed for ${sku}, emitting safe defaults`);
      const fallbackDays = Math.min(horizonDays, this.deps.config.fallbackHorizonDays);
      forecasts = Array.from({ length: fallbackDays }, (_, index) => safeDay(asOfDate, index + 1));
    }

    const result: ForecastResult = {
      sku,
      runId: this.newRunId(),
      generatedAt: now.toISOString(),
      asOfDate,
      modelType: composer.modelType,
      modelVersion: composer.modelVersion,
      horizonDays,
      baselineDemand: roundTo(baseline.value, 2),
      currentStock: stock.value,
      forecasts,
      totalPredictedDemand: sum(forecasts.map((day) => day.predictedQuantity)),
      daysUntilStockout: daysUntilStockout(forecasts, stock.value),
      recommendedReorderQuantity: recommendedReorderQuantity(
        forecasts,
        this.deps.config.reorderCoverDays,
        this.deps.config.reorderSafetyMargin
      ),
      degraded: horizonFailed || baseline.degraded || stock.degraded || forecasts.some((day) => day.degraded)
    };

    if (!result.degraded) {
      await this.writeCache(cacheKey, result);
    }
    return result;
  }

  /** Mean of recorded daily sales over the window before `asOfDate`. */
  async estimateBaseline(sku: string, asOfDate: IsoDate): Promise<number> {
    const windowDays = this.deps.config.baselineWindowDays;
    const rows = await this.deps.store.getDailySales(sku, addIsoDays(asOfDate, -windowDays), addIsoDays(asOfDate, -1));
    if (rows.length === 0) return this.deps.config.defaultBaselineDemand;
    return mean(rows.map((row) => row.quantity));
  }

  private async forecastDays(
    sku: string,
    asOfDate: IsoDate,
    horizonDays: number,
    baseline: number,
    composer: DemandComposer,
    options: FeatureOptions
  ): Promise<{ days: DailyForecast[]; failedDays: number }> {
    const days: DailyForecast[] = [];
    let failedDays = 0;
    for (let daysAhead = 1; daysAhead <= horizonDays; daysAhead += 1) {
      try {
        const forecastDate = addIsoDays(asOfDate, daysAhead);
        const features = await this.deps.features.assembleFeatures(sku, forecastDate, options);
        const predictedQuantity = composer.predict(baseline, features.value);
        days.push({
          forecastDate,
          daysAhead,
          predictedQuantity,
          ...confidenceBand(predictedQuantity),
          combinedMultiplier: roundTo(composer.combineMultipliers(features.value), 4),
          factors: influencingFactors(features.value),
          degraded: features.degraded
        });
      } catch (error) {
        console.warn(`⚠️  Forecast for ${sku} day +${daysAhead} failed, using safe default: ${errorMessage(error)}`);
        failedDays += 1;
        days.push(safeDay(asOfDate, daysAhead));
      }
    }
    return { days, failedDays };
  }

  /** Drops every cached forecast, e.g. after reference data changed. */
  async clearCache(): Promise<number> {
    return this.deps.cache.invalidate(FORECAST_CACHE_PREFIX);
  }

  private async readCache(key: string): Promise<ForecastResult | null> {
    try {
      return await this.deps.cache.get<ForecastResult>(key);
    } catch (error) {
      console.warn(`⚠️  Forecast cache read failed: ${errorMessage(error)}`);
      return null;
    }
  }

  private async writeCache(key: string, result: ForecastResult): Promise<void> {
    try {
      await this.deps.cache.set(key, result, this.deps.config.forecastCacheTtlSeconds);
    } catch (error) {
      console.warn(`⚠️  Forecast cache write failed: ${errorMessage(error)}`);
    }
  }
}
