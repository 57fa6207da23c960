import type { IsoDate } from '../../lib/dates';

export type SalesTrend = 'increasing' | 'decreasing' | 'stable';

export type FeatureGroup =
  | 'temporal'
  | 'seasonal'
  | 'festival'
  | 'lifecycle'
  | 'historical'
  | 'weather'
  | 'trends';

export const FEATURE_GROUPS: readonly FeatureGroup[] = [
  'temporal',
  'seasonal',
  'festival',
  'lifecycle',
  'historical',
  'weather',
  'trends'
];

export type TemporalFeatures = {
  dayOfWeek: number;
  dayOfMonth: number;
  month: number;
  quarter: number;
  weekOfYear: number;
  isWeekend: 0 | 1;
  isMonthEnd: 0 | 1;
  isMonthStart: 0 | 1;
  isQuarterEnd: 0 | 1;
  dayOfWeekMultiplier: number;
  monthMultiplier: number;
};

export type SeasonalFeatures = {
  season: string;
  seasonalMultiplier: number;
};

export type FestivalFeatures = {
  isFestivalWeek: 0 | 1;
  festivalName: string | null;
  festivalMultiplier: number;
  daysToFestival: number;
  festivalImpactWindow: number;
};

export type LifecycleFeatures = {
  daysSinceLaunch: number;
  lifecycleStage: string;
  lifecycleMultiplier: number;
};

export type HistoricalFeatures = {
  avgDailySales7d: number;
  avgDailySales30d: number;
  avgDailySales90d: number;
  salesTrend7d: SalesTrend;
  salesVolatility7d: number;
  daysSinceLastSale: number;
  stockoutOccurred: 0 | 1;
};

export type WeatherFeatures = {
  temperature: number | null;
  humidity: number | null;
  precipitation: number | null;
  weatherCode: number | null;
  weatherDescription: string | null;
  temperatureImpact: number;
  weatherImpact: number;
  hasWeatherData: boolean;
};

export type TrendFeatures = {
  trendScore: number;
  trendDirection: SalesTrend;
  hasTrendData: boolean;
};

export type FeatureRecord = Readonly<
  TemporalFeatures &
    SeasonalFeatures &
    FestivalFeatures &
    LifecycleFeatures &
    HistoricalFeatures &
    WeatherFeatures &
    TrendFeatures
>;

export type FeatureOptions = {
  includeExternal?: boolean;
  includeWeather?: boolean;
  includeTrends?: boolean;
};

export type FeatureAssembly = {
  sku: string;
  forecastDate: IsoDate;
  value: FeatureRecord;
  degraded: boolean;
  degradedGroups: FeatureGroup[];
};

export type DailyForecast = {
  forecastDate: IsoDate;
  daysAhead: number;
  predictedQuantity: number;
  lowerBound: number;
  upperBound: number;
  combinedMultiplier: number;
  factors: string[];
  degraded: boolean;
};

export type ForecastResult = {
  sku: string;
  runId: string;
  generatedAt: string;
  asOfDate: IsoDate;
  modelType: string;
  modelVersion: string;
  horizonDays: number;
  baselineDemand: number;
  currentStock: number | null;
  forecasts: DailyForecast[];
  totalPredictedDemand: number;
  daysUntilStockout: number;
  recommendedReorderQuantity: number;
  degraded: boolean;
};

export type DemandForecastRow = {
  runId: string;
  sku: string;
  forecastDate: IsoDate;
  daysAhead: number;
  predictedQuantity: number;
  lowerBound: number;
  upperBound: number;
  modelType: string;
  modelVersion: string;
  factors: string[];
  degraded: boolean;
  generatedAt: string;
  actualQuantity: number | null;
};

export type AlertSeverity = 'info' | 'warning' | 'critical';
export type AlertType = 'low_stock' | 'stockout_warning';
export type AlertStatus = 'active' | 'acknowledged' | 'resolved';

export type InventoryAlert = {
  id: string;
  sku: string;
  alertType: AlertType;
  severity: AlertSeverity;
  status: AlertStatus;
  currentStock: number;
  predictedDailyDemand: number;
  daysUntilStockout: number;
  recommendedReorderQuantity: number;
  createdAt: string;
  updatedAt: string;
  resolvedAt: string | null;
};

export type AccuracyRecord = {
  sku: string;
  forecastDate: IsoDate;
  daysAhead: number;
  modelType: string;
  modelVersion: string;
  metricDate: IsoDate;
  predictedQuantity: number;
  actualQuantity: number;
  absoluteError: number;
  percentageError: number;
  squaredError: number;
};

export type SkuProfile = {
  sku: string;
  category: string | null;
  launchedOn: IsoDate | null;
  unitPrice: number | null;
  isActive: boolean;
};

export type DailySales = {
  sku: string;
  saleDate: IsoDate;
  quantity: number;
};

export type SignalType = 'weather' | 'weather_forecast' | 'trends' | 'festival';

export type ExternalSignal = {
  signalType: SignalType;
  locationCode: string;
  productCode: string;
  signalDate: IsoDate;
  value: number | null;
  payload: Record<string, unknown>;
  source: string;
};
