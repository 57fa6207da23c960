import { toIsoDate } from '../lib/dates';
import { errorMessage } from '../lib/stageResult';
import { collectForLocation, toWeatherSignals } from '../services/weather.service';
import { jobClock, type JobContext } from './context';
import { JobLock, jobSummary, type JobRunSummary } from './jobStatus';

const lock = new JobLock('collect-weather', 'Weather collection');

/**
 * Collect current conditions and the daily forecast for each configured
 * location and store them as `weather` / `weather_forecast` signals.
 *
 * Runs daily at 06:00 UTC. A location that cannot be geocoded or fetched is
 * counted as failed; the run carries on with the next one.
 */
export async function collectWeather(context: JobContext): Promise<JobRunSummary> {
  const now = jobClock(context);

  return lock.run(async () => {
    const { weatherLocations, weatherForecastDays } = context.providers;
    const observedOn = toIsoDate(now());
    let succeeded = 0;
    let failed = 0;
    let signalsWritten = 0;

    console.log(`📊 Collecting weather for ${weatherLocations.length} locations...`);

    for (const name of weatherLocations) {
      try {
        const weather = await collectForLocation(context.weather, name, weatherForecastDays);
        if (!weather) {
          console.warn(`⚠️  No weather data for ${name}`);
          failed += 1;
          continue;
        }

        for (const signal of toWeatherSignals(name, weather, observedOn)) {
          await context.store.upsertSignal(signal);
          signalsWritten += 1;
        }
        succeeded += 1;
      } catch (error) {
        console.error(`❌ Storing weather for ${name} failed: ${errorMessage(error)}`);
        failed += 1;
      }
    }

    return jobSummary('collect-weather', { succeeded, failed }, now(), { signalsWritten });
  }, now);
}

export function getWeatherCollectionStatus() {
  return lock.status();
}
