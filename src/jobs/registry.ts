import type { JobScheduleConfig } from '../config/forecasting';
import { calculateAccuracy, getAccuracyCalculationStatus } from './accuracyCalculation.job';
import { generateAlerts, getAlertGenerationStatus } from './alertGeneration.job';
import type { JobContext } from './context';
import { getFestivalCalendarStatus, updateFestivalCalendar } from './festivalCalendar.job';
import { generateForecasts, getForecastGenerationStatus } from './forecastGeneration.job';
import type { JobName, JobRunSummary, JobStatus } from './jobStatus';
import { getModelTrainingStatus, trainModels } from './modelTraining.job';
import { registerJob, type RetryPolicy } from './scheduler';
import { collectTrends, getTrendsCollectionStatus } from './trendsCollection.job';
import { collectWeather, getWeatherCollectionStatus } from './weatherCollection.job';

export type ForecastingJob = {
  name: JobName;
  description: string;
  cronKey: keyof JobScheduleConfig['crons'];
  run: (context: JobContext) => Promise<JobRunSummary>;
  status: () => JobStatus;
};

export const FORECASTING_JOBS: readonly ForecastingJob[] = [
  {
    name: 'collect-weather',
    description: 'Collect current weather and daily forecasts per location',
    cronKey: 'collectWeather',
    run: collectWeather,
    status: getWeatherCollectionStatus
  },
  {
    name: 'collect-trends',
    description: 'Collect search interest per product category',
    cronKey: 'collectTrends',
    run: collectTrends,
    status: getTrendsCollectionStatus
  },
  {
    name: 'update-festival-calendar',
    description: 'Reload reference data and sync festival signals',
    cronKey: 'updateFestivalCalendar',
    run: updateFestivalCalendar,
    status: getFestivalCalendarStatus
  },
  {
    name: 'generate-forecasts',
    description: 'Forecast the next page of active SKUs',
    cronKey: 'generateForecasts',
    run: generateForecasts,
    status: getForecastGenerationStatus
  },
  {
    name: 'calculate-accuracy',
    description: "Reconcile yesterday's forecasts against realized sales",
    cronKey: 'calculateAccuracy',
    run: calculateAccuracy,
    status: getAccuracyCalculationStatus
  },
  {
    name: 'generate-alerts',
    description: 'Open, update or resolve inventory alerts',
    cronKey: 'generateAlerts',
    run: generateAlerts,
    status: getAlertGenerationStatus
  },
  {
    name: 'train-models',
    description: 'Placeholder for model training',
    cronKey: 'trainModels',
    run: trainModels,
    status: getModelTrainingStatus
  }
];

export function findJob(name: string): ForecastingJob | null {
  return FORECASTING_JOBS.find((job) => job.name === name) ?? null;
}

export function jobStatuses(): JobStatus[] {
  return FORECASTING_JOBS.map((job) => job.status());
}

export function retryPolicyFrom(config: JobScheduleConfig): RetryPolicy {
  return {
    retryAttempts: config.retryAttempts,
    retryBackoffMs: config.retryBackoffMs,
    timeoutMs: config.jobTimeoutMs
  };
}

/** Registers every forecasting job with the in-process cron scheduler. */
export function registerForecastingJobs(context: JobContext, config: JobScheduleConfig): void {
  const policy = retryPolicyFrom(config);
  for (const job of FORECASTING_JOBS) {
    registerJob(job.name, config.crons[job.cronKey], () => job.run(context), { retryPolicy: policy });
  }
}
