import path from 'node:path';

type Env = NodeJS.ProcessEnv;

export function parseNumber(value: string | undefined, fallback: number): number {
  if (value === undefined || value === null || value.trim() === '') return fallback;
  const parsed = Number(value);
  return Number.isNaN(parsed) ? fallback : parsed;
}

export function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  const normalized = value.trim().toLowerCase();
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true;
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false;
  return fallback;
}

function parseList(value: string | undefined, fallback: string[]): string[] {
  if (!value || value.trim() === '') return fallback;
  return value
    .split(',')
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}

export type ForecastingConfig = {
  referenceDataDir: string;
  defaultHorizonDays: number;
  defaultModelType: string;
  defaultBaselineDemand: number;
  baselineWindowDays: number;
  reorderCoverDays: number;
  reorderSafetyMargin: number;
  fallbackHorizonDays: number;
  forecastCacheTtlSeconds: number;
  referenceDataTtlSeconds: number;
  festivalLookaheadDays: number;
  weatherLocation: string;
  alertHorizonDays: number;
  forecastBatchSize: number;
  alertBatchSize: number;
  accuracyBatchSize: number;
  defaultUnitPrice: number;
};

export function getForecastingConfig(env: Env = process.env): ForecastingConfig {
  return {
    referenceDataDir: path.resolve(env.REFERENCE_DATA_DIR ?? path.join(process.cwd(), 'data')),
    defaultHorizonDays: parseNumber(env.FORECAST_HORIZON_DAYS, 30),
    defaultModelType: env.FORECAST_MODEL_TYPE ?? 'multiplicative',
    defaultBaselineDemand: parseNumber(env.FORECAST_DEFAULT_BASELINE, 10),
    baselineWindowDays: parseNumber(env.FORECAST_BASELINE_WINDOW_DAYS, 30),
    reorderCoverDays: parseNumber(env.REORDER_COVER_DAYS, 30),
    reorderSafetyMargin: parseNumber(env.REORDER_SAFETY_MARGIN, 0.3),
    fallbackHorizonDays: parseNumber(env.FORECAST_FALLBACK_HORIZON_DAYS, 7),
    forecastCacheTtlSeconds: parseNumber(env.FORECAST_CACHE_TTL_SECONDS, 21_600),
    referenceDataTtlSeconds: parseNumber(env.REFERENCE_DATA_TTL_SECONDS, 86_400),
    festivalLookaheadDays: parseNumber(env.FESTIVAL_LOOKAHEAD_DAYS, 60),
    weatherLocation: env.FORECAST_WEATHER_LOCATION ?? 'Mumbai',
    alertHorizonDays: parseNumber(env.ALERT_HORIZON_DAYS, 30),
    forecastBatchSize: parseNumber(env.FORECAST_BATCH_SIZE, 1000),
    alertBatchSize: parseNumber(env.ALERT_BATCH_SIZE, 500),
    accuracyBatchSize: parseNumber(env.ACCURACY_BATCH_SIZE, 1000),
    defaultUnitPrice: parseNumber(env.DEFAULT_UNIT_PRICE, 100)
  };
}

export type WeatherLocationConfig = {
  name: string;
  region: string;
};

export const DEFAULT_WEATHER_LOCATIONS: WeatherLocationConfig[] = [
  { name: 'Mumbai', region: 'west' },
  { name: 'Delhi', region: 'north' },
  { name: 'Bangalore', region: 'south' },
  { name: 'Chennai', region: 'south' },
  { name: 'Kolkata', region: 'east' },
  { name: 'Hyderabad', region: 'south' },
  { name: 'Pune', region: 'west' },
  { name: 'Ahmedabad', region: 'west' }
];

export const DEFAULT_TREND_KEYWORDS: Record<string, string[]> = {
  toys: ['kids toys', 'baby toys', 'educational toys', 'outdoor games'],
  clothing: ['baby clothes', 'kids clothing', 'children dress', 'kids wear'],
  books: ['children books', 'kids books', 'story books'],
  games: ['board games', 'puzzle games', 'card games'],
  outdoor: ['outdoor toys', 'bicycles kids', 'sports equipment'],
  educational: ['learning toys', 'educational games', 'building blocks']
};

export type ProviderConfig = {
  weatherLocations: string[];
  weatherCountry: string;
  weatherTimezone: string;
  weatherTimeoutMs: number;
  weatherMinIntervalMs: number;
  weatherForecastDays: number;
  geocodeTtlSeconds: number;
  trendsApiUrl: string | null;
  trendsGeo: string;
  trendsTimeframe: string;
  trendsTimeoutMs: number;
  trendsMinIntervalMs: number;
  trendsCacheTtlSeconds: number;
  providerRetries: number;
  providerRetryBaseMs: number;
};

export function getProviderConfig(env: Env = process.env): ProviderConfig {
  return {
    weatherLocations: parseList(
      env.WEATHER_LOCATIONS,
      DEFAULT_WEATHER_LOCATIONS.map((location) => location.name)
    ),
    weatherCountry: env.WEATHER_COUNTRY ?? 'India',
    weatherTimezone: env.WEATHER_TIMEZONE ?? 'Asia/Kolkata',
    weatherTimeoutMs: parseNumber(env.WEATHER_TIMEOUT_MS, 15_000),
    weatherMinIntervalMs: parseNumber(env.WEATHER_MIN_INTERVAL_MS, 1000),
    weatherForecastDays: parseNumber(env.WEATHER_FORECAST_DAYS, 7),
    geocodeTtlSeconds: parseNumber(env.GEOCODE_TTL_SECONDS, 86_400 * 30),
    trendsApiUrl: env.TRENDS_API_URL && env.TRENDS_API_URL.trim() !== '' ? env.TRENDS_API_URL.trim() : null,
    trendsGeo: env.TRENDS_GEO ?? 'IN',
    trendsTimeframe: env.TRENDS_TIMEFRAME ?? 'today 3-m',
    trendsTimeoutMs: parseNumber(env.TRENDS_TIMEOUT_MS, 15_000),
    trendsMinIntervalMs: parseNumber(env.TRENDS_MIN_INTERVAL_MS, 3000),
    trendsCacheTtlSeconds: parseNumber(env.TRENDS_CACHE_TTL_SECONDS, 86_400 * 7),
    providerRetries: parseNumber(env.PROVIDER_RETRIES, 2),
    providerRetryBaseMs: parseNumber(env.PROVIDER_RETRY_BASE_MS, 5000)
  };
}

export type JobScheduleConfig = {
  crons: {
    collectWeather: string;
    collectTrends: string;
    updateFestivalCalendar: string;
    generateForecasts: string;
    calculateAccuracy: string;
    generateAlerts: string;
    trainModels: string;
  };
  retryAttempts: number;
  retryBackoffMs: number;
  jobTimeoutMs: number;
};

export function getJobScheduleConfig(env: Env = process.env): JobScheduleConfig {
  return {
    crons: {
      collectWeather: env.COLLECT_WEATHER_CRON ?? '0 6 * * *',
      collectTrends: env.COLLECT_TRENDS_CRON ?? '0 7 * * 0',
      updateFestivalCalendar: env.FESTIVAL_CALENDAR_CRON ?? '0 0 1 * *',
      generateForecasts: env.GENERATE_FORECASTS_CRON ?? '0 2 * * *',
      calculateAccuracy: env.CALCULATE_ACCURACY_CRON ?? '0 3 * * *',
      generateAlerts: env.GENERATE_ALERTS_CRON ?? '0 4 * * *',
      trainModels: env.TRAIN_MODELS_CRON ?? '0 22 * * 0'
    },
    retryAttempts: parseNumber(env.JOB_RETRY_ATTEMPTS, 3),
    retryBackoffMs: parseNumber(env.JOB_RETRY_BACKOFF_MS, 10 * 60 * 1000),
    jobTimeoutMs: parseNumber(env.JOB_TIMEOUT_MS, 45 * 60 * 1000)
  };
}
