import type { ForecastingConfig, ProviderConfig } from '../config/forecasting';
import type {
  AccuracyService,
  AlertService,
  ForecastService,
  ForecastStore,
  ReferenceDataProvider
} from '../domains/forecasting';
import type { TrendsProvider } from '../services/trends.service';
import type { WeatherProvider } from '../services/weather.service';
import type { SkuCursorStore } from './skuCursor';

/** Everything a job needs; built once by the container, replaced by fakes in tests. */
export type JobContext = {
  store: ForecastStore;
  referenceData: ReferenceDataProvider;
  forecasts: ForecastService;
  alerts: AlertService;
  accuracy: AccuracyService;
  weather: WeatherProvider;
  trends: TrendsProvider;
  cursors: SkuCursorStore;
  forecasting: ForecastingConfig;
  providers: ProviderConfig;
  trendKeywords: Record<string, string[]>;
  clock?: () => Date;
};

export function jobClock(context: JobContext): () => Date {
  return context.clock ?? (() => new Date());
}
