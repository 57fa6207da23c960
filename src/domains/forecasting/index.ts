export * from './types';
export type { AlertUpsert, ForecastStore, LatestSignalLookup, SignalLookup, SkuPage } from './store';
export {
  DEFAULT_REFERENCE_DATA,
  describeReferenceData,
  FileReferenceDataProvider,
  StaticReferenceDataProvider,
  type ReferenceData,
  type ReferenceDataInfo,
  type ReferenceDataProvider
} from './referenceData';
export { FeatureAssembler, salesTrend, type FeatureAssemblerOptions } from './features.service';
export { ComposerRegistry, MultiplicativeComposer, type DemandComposer } from './composer';
export { ForecastService, toForecastRows, type FeatureSource, type ForecastEngineConfig } from './forecast.service';
export {
  AlertService,
  alertInputsFromForecast,
  evaluateAlert,
  type AlertTransition,
  type RecommendationSummary
} from './alerts.service';
export {
  AccuracyService,
  aggregateAccuracy,
  computeAccuracyMetrics,
  type AccuracySummary,
  type ReconcileResult
} from './accuracy.service';
export { PgForecastStore } from './internal/pgForecastStore';
