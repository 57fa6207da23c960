import {
  addIsoDays,
  calendarParts,
  diffIsoDays,
  isoWeekOfYear,
  mondayBasedWeekday,
  type IsoDate
} from '../../lib/dates';
import { mean, roundTo, sampleStdDev } from '../../lib/numbers';
import { computed, settle, type StageResult } from '../../lib/stageResult';
import {
  categorySeasonalMultiplier,
  dayOfWeekMultiplier,
  describeWeatherCode,
  festivalProximity,
  lifecycleStage,
  monthMultiplier,
  NO_FESTIVAL,
  seasonForMonth,
  temperatureMultiplier,
  weatherMultiplier
} from './multipliers';
import { DEFAULT_REFERENCE_DATA, type ReferenceData, type ReferenceDataProvider } from './referenceData';
import { locationCode, trendSignalPayloadSchema, weatherSignalPayloadSchema } from './signals';
import type { ForecastStore } from './store';
import type {
  FeatureAssembly,
  FeatureGroup,
  FeatureOptions,
  FeatureRecord,
  FestivalFeatures,
  HistoricalFeatures,
  LifecycleFeatures,
  SalesTrend,
  SeasonalFeatures,
  SkuProfile,
  TemporalFeatures,
  TrendFeatures,
  WeatherFeatures
} from './types';

export const TEMPORAL_DEFAULTS: TemporalFeatures = {
  dayOfWeek: 0,
  dayOfMonth: 0,
  month: 0,
  quarter: 0,
  weekOfYear: 0,
  isWeekend: 0,
  isMonthEnd: 0,
  isMonthStart: 0,
  isQuarterEnd: 0,
  dayOfWeekMultiplier: 1,
  monthMultiplier: 1
};

export const SEASONAL_DEFAULTS: SeasonalFeatures = {
  season: 'unknown',
  seasonalMultiplier: 1
};

export const FESTIVAL_DEFAULTS: FestivalFeatures = { ...NO_FESTIVAL };

export const LIFECYCLE_DEFAULTS: LifecycleFeatures = {
  daysSinceLaunch: 999,
  lifecycleStage: 'unknown',
  lifecycleMultiplier: 1
};

export const HISTORICAL_DEFAULTS: HistoricalFeatures = {
  avgDailySales7d: 0,
  avgDailySales30d: 0,
  avgDailySales90d: 0,
  salesTrend7d: 'stable',
  salesVolatility7d: 0,
  daysSinceLastSale: 999,
  stockoutOccurred: 0
};

export const WEATHER_DEFAULTS: WeatherFeatures = {
  temperature: null,
  humidity: null,
  precipitation: null,
  weatherCode: null,
  weatherDescription: null,
  temperatureImpact: 1,
  weatherImpact: 1,
  hasWeatherData: false
};

export const TREND_DEFAULTS: TrendFeatures = {
  trendScore: 50,
  trendDirection: 'stable',
  hasTrendData: false
};

export const DEFAULT_FEATURES: FeatureRecord = {
  ...TEMPORAL_DEFAULTS,
  ...SEASONAL_DEFAULTS,
  ...FESTIVAL_DEFAULTS,
  ...LIFECYCLE_DEFAULTS,
  ...HISTORICAL_DEFAULTS,
  ...WEATHER_DEFAULTS,
  ...TREND_DEFAULTS
};

const HISTORY_DAYS = 90;
const TREND_THRESHOLD = 0.1;

/**
 * Labels a date-ordered series by comparing the mean of its second half
 * (`values[floor(n / 2)..]`) with the mean of its first half.
 */
export function salesTrend(values: readonly number[], threshold = TREND_THRESHOLD): SalesTrend {
  const mid = Math.floor(values.length / 2);
  const firstHalf = mean(values.slice(0, mid));
  const secondHalf = mean(values.slice(mid));
  if (firstHalf === 0) return 'stable';
  const change = (secondHalf - firstHalf) / firstHalf;
  if (change > threshold) return 'increasing';
  if (change < -threshold) return 'decreasing';
  return 'stable';
}

/** Date-derived temporal fields with neutral multipliers. */
function calendarFeatures(date: IsoDate): TemporalFeatures {
  const { month, day } = calendarParts(date);
  const weekday = mondayBasedWeekday(date);
  return {
    dayOfWeek: weekday,
    dayOfMonth: day,
    month,
    quarter: Math.ceil(month / 3),
    weekOfYear: isoWeekOfYear(date),
    isWeekend: weekday >= 5 ? 1 : 0,
    isMonthEnd: day >= 25 ? 1 : 0,
    isMonthStart: day <= 5 ? 1 : 0,
    isQuarterEnd: month % 3 === 0 && day >= 25 ? 1 : 0,
    dayOfWeekMultiplier: 1,
    monthMultiplier: 1
  };
}

export function temporalFeatures(data: ReferenceData, date: IsoDate): TemporalFeatures {
  const calendar = calendarFeatures(date);
  return {
    ...calendar,
    dayOfWeekMultiplier: dayOfWeekMultiplier(data, calendar.dayOfWeek),
    monthMultiplier: monthMultiplier(data, calendar.month)
  };
}

/**
 * Fallback for a failed temporal group: the calendar fields still describe the
 * requested date, only the multipliers go neutral. An unparseable date gets
 * TEMPORAL_DEFAULTS.
 */
export function temporalFallback(date: IsoDate): TemporalFeatures {
  try {
    return calendarFeatures(date);
  } catch {
    return TEMPORAL_DEFAULTS;
  }
}

export type FeatureAssemblerOptions = {
  weatherLocation: string;
  festivalLookaheadDays: number;
};

/**
 * Builds the feature record for one SKU and date. Each group is computed on its
 * own; a group that fails contributes its defaults and is listed in
 * `degradedGroups`.
 */
export class FeatureAssembler {
  constructor(
    private readonly store: ForecastStore,
    private readonly referenceData: ReferenceDataProvider,
    private readonly options: FeatureAssemblerOptions
  ) {}

  async assembleFeatures(sku: string, forecastDate: IsoDate, options: FeatureOptions = {}): Promise<FeatureAssembly> {
    const includeExternal = options.includeExternal ?? true;
    const includeWeather = options.includeWeather ?? true;
    const includeTrends = options.includeTrends ?? true;

    const reference = await settle('reference data', () => this.referenceData.getReferenceData(), () => DEFAULT_REFERENCE_DATA);
    const data = reference.value;

    let profilePromise: Promise<SkuProfile | null> | null = null;
    const loadProfile = () => {
      profilePromise ??= this.store.getSkuProfile(sku);
      return profilePromise;
    };

    const label = (group: FeatureGroup) => `${group} features for ${sku} on ${forecastDate}`;

    const [temporal, seasonal, festival, lifecycle, historical, weather, trends] = await Promise.all([
      settle(label('temporal'), () => temporalFeatures(data, forecastDate), () => temporalFallback(forecastDate)),
      settle(label('seasonal'), () => this.seasonal(data, forecastDate, loadProfile), () => SEASONAL_DEFAULTS),
      includeExternal
        ? settle(
            label('festival'),
            (): FestivalFeatures => festivalProximity(data, forecastDate, this.options.festivalLookaheadDays),
            () => FESTIVAL_DEFAULTS
          )
        : Promise.resolve(notRequested(FESTIVAL_DEFAULTS)),
      settle(label('lifecycle'), () => this.lifecycle(data, forecastDate, loadProfile), () => LIFECYCLE_DEFAULTS),
      settle(label('historical'), () => this.historical(sku, forecastDate), () => HISTORICAL_DEFAULTS),
      includeWeather
        ? settle(label('weather'), () => this.weather(data, forecastDate), () => WEATHER_DEFAULTS)
        : Promise.resolve(notRequested(WEATHER_DEFAULTS)),
      includeTrends
        ? settle(label('trends'), () => this.trends(forecastDate, loadProfile), () => TREND_DEFAULTS)
        : Promise.resolve(notRequested(TREND_DEFAULTS))
    ]);

    const results: Array<[FeatureGroup, StageResult<unknown>]> = [
      ['temporal', temporal],
      ['seasonal', seasonal],
      ['festival', festival],
      ['lifecycle', lifecycle],
      ['historical', historical],
      ['weather', weather],
      ['trends', trends]
    ];
    const degradedGroups = results.filter(([, result]) => result.degraded).map(([group]) => group);

    return {
      sku,
      forecastDate,
      value: {
        ...temporal.value,
        ...seasonal.value,
        ...festival.value,
        ...lifecycle.value,
        ...historical.value,
        ...weather.value,
        ...trends.value
      },
      degraded: reference.degraded || degradedGroups.length > 0,
      degradedGroups
    };
  }

  private async seasonal(
    data: ReferenceData,
    date: IsoDate,
    loadProfile: () => Promise<SkuProfile | null>
  ): Promise<SeasonalFeatures> {
    const { month } = calendarParts(date);
    const profile = await loadProfile();
    return {
      season: seasonForMonth(data, month) ?? SEASONAL_DEFAULTS.season,
      seasonalMultiplier: categorySeasonalMultiplier(data, profile?.category ?? null, month)
    };
  }

  private async lifecycle(
    data: ReferenceData,
    date: IsoDate,
    loadProfile: () => Promise<SkuProfile | null>
  ): Promise<LifecycleFeatures> {
    const profile = await loadProfile();
    if (!profile?.launchedOn) return LIFECYCLE_DEFAULTS;
    const daysSinceLaunch = Math.max(0, diffIsoDays(date, profile.launchedOn));
    const stage = lifecycleStage(data, daysSinceLaunch);
    return {
      daysSinceLaunch,
      lifecycleStage: stage.stage,
      lifecycleMultiplier: stage.multiplier
    };
  }

  private async historical(sku: string, date: IsoDate): Promise<HistoricalFeatures> {
    const lastDay = addIsoDays(date, -1);
    const rows = await this.store.getDailySales(sku, addIsoDays(date, -HISTORY_DAYS), lastDay);
    const ordered = [...rows].sort((a, b) => a.saleDate.localeCompare(b.saleDate));
    const windowOf = (days: number) => {
      const start = addIsoDays(date, -days);
      return ordered.filter((row) => row.saleDate >= start).map((row) => row.quantity);
    };

    const week = windowOf(7);
    const lastSale = [...ordered].reverse().find((row) => row.quantity > 0);

    return {
      avgDailySales7d: roundTo(mean(week), 2),
      avgDailySales30d: roundTo(mean(windowOf(30)), 2),
      avgDailySales90d: roundTo(mean(windowOf(HISTORY_DAYS)), 2),
      salesTrend7d: salesTrend(week),
      salesVolatility7d: roundTo(sampleStdDev(week), 2),
      daysSinceLastSale: lastSale ? diffIsoDays(lastDay, lastSale.saleDate) : 999,
      stockoutOccurred: week.some((quantity) => quantity === 0) ? 1 : 0
    };
  }

  private async weather(data: ReferenceData, date: IsoDate): Promise<WeatherFeatures> {
    const location = locationCode(this.options.weatherLocation);
    const signal =
      (await this.store.findSignal({ signalType: 'weather', signalDate: date, locationCode: location })) ??
      (await this.store.findSignal({ signalType: 'weather_forecast', signalDate: date, locationCode: location }));
    if (!signal) return WEATHER_DEFAULTS;

    const payload = weatherSignalPayloadSchema.parse(signal.payload);
    const temperature = payload.temperature ?? signal.value;
    const description =
      payload.description ?? (payload.weatherCode !== null ? describeWeatherCode(payload.weatherCode) : null);

    return {
      temperature,
      humidity: payload.humidity,
      precipitation: payload.precipitation,
      weatherCode: payload.weatherCode,
      weatherDescription: description,
      temperatureImpact: temperature !== null ? temperatureMultiplier(data, temperature) : 1,
      weatherImpact: description ? weatherMultiplier(data, description) : 1,
      hasWeatherData: true
    };
  }

  private async trends(date: IsoDate, loadProfile: () => Promise<SkuProfile | null>): Promise<TrendFeatures> {
    const profile = await loadProfile();
    if (!profile?.category) return TREND_DEFAULTS;

    const signal = await this.store.findLatestSignal({
      signalType: 'trends',
      productCode: profile.category.toLowerCase(),
      onOrBefore: date
    });
    if (!signal) return TREND_DEFAULTS;

    const payload = trendSignalPayloadSchema.parse(signal.payload);
    return {
      trendScore: roundTo(payload.score, 2),
      trendDirection: payload.direction,
      hasTrendData: true
    };
  }
}

// Excluded groups are not failures.
function notRequested<T>(defaults: T): StageResult<T> {
  return computed(defaults);
}
