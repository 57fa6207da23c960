import path from 'node:path';
import { describe, expect, it } from 'vitest';
import { getForecastingConfig, getJobScheduleConfig, getProviderConfig, parseBoolean, parseNumber } from './forecasting';

describe('config parsing', () => {
  it('falls back on blank or non-numeric values', () => {
    expect(parseNumber(undefined, 7)).toBe(7);
    expect(parseNumber('  ', 7)).toBe(7);
    expect(parseNumber('abc', 7)).toBe(7);
    expect(parseNumber('0.25', 7)).toBe(0.25);
  });

  it('reads boolean flags', () => {
    expect(parseBoolean('TRUE', false)).toBe(true);
    expect(parseBoolean('off', true)).toBe(false);
    expect(parseBoolean('maybe', true)).toBe(true);
  });

  it('uses the documented forecasting defaults', () => {
    const config = getForecastingConfig({});
    expect(config.defaultBaselineDemand).toBe(10);
    expect(config.forecastCacheTtlSeconds).toBe(21_600);
    expect(config.referenceDataTtlSeconds).toBe(86_400);
    expect(config.reorderSafetyMargin).toBe(0.3);
    expect(config.defaultUnitPrice).toBe(100);
    expect(config.referenceDataDir).toBe(path.resolve(process.cwd(), 'data'));
  });

  it('reads provider overrides', () => {
    const config = getProviderConfig({ WEATHER_LOCATIONS: 'Pune, Delhi ,', TRENDS_API_URL: ' ' });
    expect(config.weatherLocations).toEqual(['Pune', 'Delhi']);
    expect(config.trendsApiUrl).toBeNull();
    expect(config.geocodeTtlSeconds).toBe(2_592_000);
  });

  it('defaults job retries to three attempts ten minutes apart', () => {
    const config = getJobScheduleConfig({});
    expect(config.retryAttempts).toBe(3);
    expect(config.retryBackoffMs).toBe(600_000);
    expect(config.crons.generateForecasts).toBe('0 2 * * *');
  });
});
