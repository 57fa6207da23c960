import { z } from 'zod';
import { describeWeatherCode } from '../domains/forecasting/multipliers';
import { ANY_PRODUCT, locationCode, type WeatherSignalPayload } from '../domains/forecasting/signals';
import type { ExternalSignal } from '../domains/forecasting/types';
import type { IsoDate } from '../lib/dates';
import {
  fetchJson,
  type CircuitBreaker,
  type RateLimiter,
  type ResilientFetchOptions,
  type RetryOptions,
  type Sleep
} from '../lib/integrationClient';
import type { CacheStore } from '../lib/redis';
import { errorMessage } from '../lib/stageResult';

export const OPEN_METEO_GEOCODING_URL = 'https://geocoding-api.open-meteo.com/v1/search';
export const OPEN_METEO_FORECAST_URL = 'https://api.open-meteo.com/v1/forecast';
export const WEATHER_SOURCE = 'open-meteo';
const MAX_FORECAST_DAYS = 16;

export type GeoLocation = {
  name: string;
  latitude: number;
  longitude: number;
  country: string | null;
  admin1: string | null;
  timezone: string | null;
};

export type CurrentWeather = {
  observedAt: string | null;
  temperature: number | null;
  apparentTemperature: number | null;
  humidity: number | null;
  precipitation: number | null;
  weatherCode: number;
  description: string;
  windSpeed: number | null;
  windDirection: number | null;
};

export type DailyWeatherForecast = {
  date: IsoDate;
  temperatureMax: number | null;
  temperatureMin: number | null;
  temperatureAvg: number | null;
  precipitation: number | null;
  weatherCode: number;
  description: string;
  windSpeedMax: number | null;
};

/** Every method resolves to null when the upstream is unavailable. */
export interface WeatherProvider {
  geocode(name: string): Promise<GeoLocation | null>;
  fetchCurrentWeather(latitude: number, longitude: number): Promise<CurrentWeather | null>;
  fetchForecast(latitude: number, longitude: number, days: number): Promise<DailyWeatherForecast[] | null>;
}

const optionalNumber = z.number().nullable().optional();

const geocodingResponseSchema = z.object({
  results: z
    .array(
      z.object({
        name: z.string(),
        latitude: z.number(),
        longitude: z.number(),
        country: z.string().optional(),
        admin1: z.string().optional(),
        timezone: z.string().optional()
      })
    )
    .optional()
});

const currentResponseSchema = z.object({
  current: z
    .object({
      time: z.string().optional(),
      temperature_2m: optionalNumber,
      relative_humidity_2m: optionalNumber,
      apparent_temperature: optionalNumber,
      precipitation: optionalNumber,
      weather_code: optionalNumber,
      wind_speed_10m: optionalNumber,
      wind_direction_10m: optionalNumber
    })
    .optional()
});

const dailySeries = z.array(z.number().nullable()).default([]);

const dailyResponseSchema = z.object({
  daily: z
    .object({
      time: z.array(z.string()),
      temperature_2m_max: dailySeries,
      temperature_2m_min: dailySeries,
      precipitation_sum: dailySeries,
      weather_code: dailySeries,
      wind_speed_10m_max: dailySeries
    })
    .optional()
});

export type OpenMeteoOptions = {
  cache: CacheStore;
  country: string;
  timezone: string;
  timeoutMs: number;
  geocodeTtlSeconds: number;
  retry: RetryOptions;
  rateLimiter?: RateLimiter;
  circuitBreaker?: CircuitBreaker;
  fetchImpl?: typeof fetch;
  sleep?: Sleep;
};

function buildUrl(base: string, params: Record<string, string | number>): string {
  const search = new URLSearchParams();
  for (const [key, value] of Object.entries(params)) {
    search.set(key, String(value));
  }
  return `${base}?${search.toString()}`;
}

function averageOrNull(a: number | null, b: number | null): number | null {
  return a !== null && b !== null ? (a + b) / 2 : null;
}

/**
 * Open-Meteo geocoding and forecast client. Free and keyless; calls share a
 * rate limiter so a collection run stays under the public request budget.
 */
export class OpenMeteoWeatherProvider implements WeatherProvider {
  constructor(private readonly options: OpenMeteoOptions) {}

  private get fetchOptions(): Partial<ResilientFetchOptions> {
    return {
      timeoutMs: this.options.timeoutMs,
      retry: this.options.retry,
      rateLimiter: this.options.rateLimiter,
      circuitBreaker: this.options.circuitBreaker,
      fetchImpl: this.options.fetchImpl,
      sleep: this.options.sleep
    };
  }

  async geocode(name: string): Promise<GeoLocation | null> {
    const cacheKey = `weather:geocode:${name.trim().toLowerCase()}`;
    const cached = await this.options.cache.get<GeoLocation>(cacheKey);
    if (cached) return cached;

    const url = buildUrl(OPEN_METEO_GEOCODING_URL, {
      name,
      country: this.options.country,
      count: 1,
      language: 'en'
    });
    const body = await fetchJson(url, geocodingResponseSchema, `Geocoding ${name}`, this.fetchOptions);
    const match = body?.results?.[0];
    if (!match) return null;

    const location: GeoLocation = {
      name: match.name,
      latitude: match.latitude,
      longitude: match.longitude,
      country: match.country ?? null,
      admin1: match.admin1 ?? null,
      timezone: match.timezone ?? null
    };
    await this.options.cache.set(cacheKey, location, this.options.geocodeTtlSeconds);
    return location;
  }

  async fetchCurrentWeather(latitude: number, longitude: number): Promise<CurrentWeather | null> {
    const url = buildUrl(OPEN_METEO_FORECAST_URL, {
      latitude,
      longitude,
      current: [
        'temperature_2m',
        'relative_humidity_2m',
        'apparent_temperature',
        'precipitation',
        'weather_code',
        'wind_speed_10m',
        'wind_direction_10m'
      ].join(','),
      timezone: this.options.timezone
    });
    const body = await fetchJson(url, currentResponseSchema, 'Current weather', this.fetchOptions);
    const current = body?.current;
    if (!current) return null;

    const weatherCode = current.weather_code ?? 0;
    return {
      observedAt: current.time ?? null,
      temperature: current.temperature_2m ?? null,
      apparentTemperature: current.apparent_temperature ?? null,
      humidity: current.relative_humidity_2m ?? null,
      precipitation: current.precipitation ?? null,
      weatherCode,
      description: describeWeatherCode(weatherCode),
      windSpeed: current.wind_speed_10m ?? null,
      windDirection: current.wind_direction_10m ?? null
    };
  }

  async fetchForecast(latitude: number, longitude: number, days: number): Promise<DailyWeatherForecast[] | null> {
    const url = buildUrl(OPEN_METEO_FORECAST_URL, {
      latitude,
      longitude,
      daily: ['temperature_2m_max', 'temperature_2m_min', 'precipitation_sum', 'weather_code', 'wind_speed_10m_max'].join(
        ','
      ),
      timezone: this.options.timezone,
      forecast_days: Math.max(1, Math.min(days, MAX_FORECAST_DAYS))
    });
    const body = await fetchJson(url, dailyResponseSchema, 'Weather forecast', this.fetchOptions);
    const daily = body?.daily;
    if (!daily) return null;

    return daily.time.map((date, index) => {
      const temperatureMax = daily.temperature_2m_max[index] ?? null;
      const temperatureMin = daily.temperature_2m_min[index] ?? null;
      const weatherCode = daily.weather_code[index] ?? 0;
      return {
        date,
        temperatureMax,
        temperatureMin,
        temperatureAvg: averageOrNull(temperatureMax, temperatureMin),
        precipitation: daily.precipitation_sum[index] ?? null,
        weatherCode,
        description: describeWeatherCode(weatherCode),
        windSpeedMax: daily.wind_speed_10m_max[index] ?? null
      };
    });
  }
}

export type LocationWeather = {
  location: GeoLocation;
  current: CurrentWeather | null;
  forecast: DailyWeatherForecast[] | null;
};

/**
 * Geocodes a place and fetches its current conditions and daily forecast.
 * null when the place cannot be resolved or neither request succeeds.
 */
export async function collectForLocation(
  provider: WeatherProvider,
  name: string,
  forecastDays: number
): Promise<LocationWeather | null> {
  const location = await provider.geocode(name);
  if (!location) {
    console.warn(`⚠️  Could not geocode location: ${name}`);
    return null;
  }

  const [current, forecast] = await Promise.all([
    provider.fetchCurrentWeather(location.latitude, location.longitude).catch((error: unknown) => {
      console.warn(`⚠️  Current weather for ${name} failed: ${errorMessage(error)}`);
      return null;
    }),
    provider.fetchForecast(location.latitude, location.longitude, forecastDays).catch((error: unknown) => {
      console.warn(`⚠️  Weather forecast for ${name} failed: ${errorMessage(error)}`);
      return null;
    })
  ]);

  if (!current && !forecast) return null;
  return { location, current, forecast };
}

/**
 * `weather` row for today's observation plus one `weather_forecast` row per
 * forecast day, keyed by the configured place name.
 */
export function toWeatherSignals(placeName: string, weather: LocationWeather, observedOn: IsoDate): ExternalSignal[] {
  const code = locationCode(placeName);
  const base = {
    location: weather.location.name,
    latitude: weather.location.latitude,
    longitude: weather.location.longitude
  };
  const signals: ExternalSignal[] = [];

  if (weather.current) {
    const payload: WeatherSignalPayload = {
      ...base,
      temperature: weather.current.temperature,
      temperatureMax: null,
      temperatureMin: null,
      humidity: weather.current.humidity,
      precipitation: weather.current.precipitation,
      weatherCode: weather.current.weatherCode,
      description: weather.current.description
    };
    signals.push({
      signalType: 'weather',
      locationCode: code,
      productCode: ANY_PRODUCT,
      signalDate: observedOn,
      value: weather.current.temperature,
      payload,
      source: WEATHER_SOURCE
    });
  }

  for (const day of weather.forecast ?? []) {
    const payload: WeatherSignalPayload = {
      ...base,
      temperature: day.temperatureAvg,
      temperatureMax: day.temperatureMax,
      temperatureMin: day.temperatureMin,
      humidity: null,
      precipitation: day.precipitation,
      weatherCode: day.weatherCode,
      description: day.description
    };
    signals.push({
      signalType: 'weather_forecast',
      locationCode: code,
      productCode: ANY_PRODUCT,
      signalDate: day.date,
      value: day.temperatureAvg,
      payload,
      source: WEATHER_SOURCE
    });
  }

  return signals;
}
