import {
  DEFAULT_TREND_KEYWORDS,
  getForecastingConfig,
  getJobScheduleConfig,
  getProviderConfig,
  type JobScheduleConfig,
  type ProviderConfig
} from './config/forecasting';
import { query } from './db';
import {
  AccuracyService,
  AlertService,
  ComposerRegistry,
  FeatureAssembler,
  FileReferenceDataProvider,
  ForecastService,
  PgForecastStore,
  type FeatureSource
} from './domains/forecasting';
import type { JobContext } from './jobs/context';
import { SkuCursorStore } from './jobs/skuCursor';
import { CircuitBreaker, RateLimiter, type RetryOptions } from './lib/integrationClient';
import { CacheAdapter, type CacheStats } from './lib/redis';
import { HttpTrendsProvider } from './services/trends.service';
import { OpenMeteoWeatherProvider } from './services/weather.service';

/** Everything the HTTP layer and the jobs share. */
export type AppServices = JobContext & {
  features: FeatureSource;
  cache: { getStats(): CacheStats };
  schedule: JobScheduleConfig;
  checkDatabase: () => Promise<void>;
};

export type Container = AppServices & {
  cache: CacheAdapter;
};

function providerRetry(config: ProviderConfig): RetryOptions {
  return {
    retries: config.providerRetries,
    baseDelayMs: config.providerRetryBaseMs,
    maxDelayMs: config.providerRetryBaseMs * 8,
    jitterMs: 1000
  };
}

export function buildContainer(env: NodeJS.ProcessEnv = process.env): Container {
  const forecasting = getForecastingConfig(env);
  const providers = getProviderConfig(env);
  const schedule = getJobScheduleConfig(env);

  const cache = new CacheAdapter({ redisUrl: env.REDIS_URL ?? null });
  const store = new PgForecastStore();
  const referenceData = new FileReferenceDataProvider({
    dir: forecasting.referenceDataDir,
    cache,
    ttlSeconds: forecasting.referenceDataTtlSeconds
  });
  const features = new FeatureAssembler(store, referenceData, {
    weatherLocation: forecasting.weatherLocation,
    festivalLookaheadDays: forecasting.festivalLookaheadDays
  });
  const forecasts = new ForecastService({
    store,
    cache,
    features,
    composers: new ComposerRegistry(undefined, forecasting.defaultModelType),
    config: forecasting
  });

  const weather = new OpenMeteoWeatherProvider({
    cache,
    country: providers.weatherCountry,
    timezone: providers.weatherTimezone,
    timeoutMs: providers.weatherTimeoutMs,
    geocodeTtlSeconds: providers.geocodeTtlSeconds,
    retry: providerRetry(providers),
    rateLimiter: new RateLimiter(providers.weatherMinIntervalMs),
    circuitBreaker: new CircuitBreaker({ failureThreshold: 5, resetTimeoutMs: 60_000 })
  });
  const trends = new HttpTrendsProvider({
    apiUrl: providers.trendsApiUrl,
    geo: providers.trendsGeo,
    cache,
    cacheTtlSeconds: providers.trendsCacheTtlSeconds,
    timeoutMs: providers.trendsTimeoutMs,
    retry: providerRetry(providers),
    rateLimiter: new RateLimiter(providers.trendsMinIntervalMs),
    circuitBreaker: new CircuitBreaker({ failureThreshold: 3, resetTimeoutMs: 5 * 60_000 })
  });

  return {
    store,
    referenceData,
    features,
    forecasts,
    alerts: new AlertService(store, { defaultUnitPrice: forecasting.defaultUnitPrice }),
    accuracy: new AccuracyService(store, {
      batchSize: forecasting.accuracyBatchSize,
      defaultModelType: forecasting.defaultModelType
    }),
    weather,
    trends,
    cursors: new SkuCursorStore(cache),
    forecasting,
    providers,
    trendKeywords: DEFAULT_TREND_KEYWORDS,
    cache,
    schedule,
    checkDatabase: async () => {
      await query('SELECT 1');
    }
  };
}

let container: Container | null = null;

export function getContainer(): Container {
  if (!container) {
    container = buildContainer();
  }
  return container;
}
