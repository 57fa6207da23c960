import { describe, expect, it } from 'vitest';
import { festival, NEUTRAL_REFERENCE_DATA, SAMPLE_REFERENCE_DATA, withPatterns } from '../../test/fixtures';
import {
  categorySeasonalMultiplier,
  dayOfWeekMultiplier,
  describeWeatherCode,
  festivalProximity,
  festivalsInRange,
  lifecycleStage,
  monthMultiplier,
  seasonForMonth,
  temperatureBucket,
  temperatureMultiplier,
  weatherMultiplier
} from './multipliers';

describe('calendar multipliers', () => {
  it('reads the day-of-week table with Monday as 0', () => {
    expect(dayOfWeekMultiplier(SAMPLE_REFERENCE_DATA, 0)).toBe(0.9);
    expect(dayOfWeekMultiplier(SAMPLE_REFERENCE_DATA, 5)).toBe(1.3);
    expect(dayOfWeekMultiplier(SAMPLE_REFERENCE_DATA, 9)).toBe(1);
  });

  it('treats zero, negative and missing table values as neutral', () => {
    const data = withPatterns({ dayOfWeek: { monday: 0, tuesday: -2 }, months: { '4': Number.NaN } });
    expect(dayOfWeekMultiplier(data, 0)).toBe(1);
    expect(dayOfWeekMultiplier(data, 1)).toBe(1);
    expect(dayOfWeekMultiplier(data, 2)).toBe(1);
    expect(monthMultiplier(data, 4)).toBe(1);
  });

  it('reads month multipliers by month number', () => {
    expect(monthMultiplier(SAMPLE_REFERENCE_DATA, 11)).toBe(1.3);
    expect(monthMultiplier(SAMPLE_REFERENCE_DATA, 3)).toBe(1);
    expect(monthMultiplier(SAMPLE_REFERENCE_DATA, 13)).toBe(1);
  });

  it('maps months to seasons and categories to seasonal multipliers', () => {
    expect(seasonForMonth(SAMPLE_REFERENCE_DATA, 10)).toBe('autumn');
    expect(seasonForMonth(NEUTRAL_REFERENCE_DATA, 10)).toBeNull();
    expect(categorySeasonalMultiplier(SAMPLE_REFERENCE_DATA, 'Toys', 12)).toBe(1.2);
    expect(categorySeasonalMultiplier(SAMPLE_REFERENCE_DATA, 'toys', 5)).toBe(0.9);
    expect(categorySeasonalMultiplier(SAMPLE_REFERENCE_DATA, 'books', 12)).toBe(1);
    expect(categorySeasonalMultiplier(SAMPLE_REFERENCE_DATA, null, 12)).toBe(1);
  });
});

describe('temperature multiplier', () => {
  it('uses lower-bound inclusive buckets', () => {
    expect(temperatureBucket(9.99)).toBe('below_10');
    expect(temperatureBucket(10)).toBe('10_to_15');
    expect(temperatureBucket(34.9)).toBe('30_to_35');
    expect(temperatureBucket(40)).toBe('above_40');
  });

  it('looks up the bucket multiplier', () => {
    expect(temperatureMultiplier(SAMPLE_REFERENCE_DATA, 9.99)).toBe(0.8);
    expect(temperatureMultiplier(SAMPLE_REFERENCE_DATA, 10)).toBe(0.9);
    expect(temperatureMultiplier(SAMPLE_REFERENCE_DATA, 32)).toBe(1.1);
    expect(temperatureMultiplier(SAMPLE_REFERENCE_DATA, Number.NaN)).toBe(1);
    expect(temperatureMultiplier(NEUTRAL_REFERENCE_DATA, 45)).toBe(1);
  });
});

describe('weather multiplier', () => {
  it('matches the first impact key contained in the normalized description', () => {
    expect(weatherMultiplier(SAMPLE_REFERENCE_DATA, 'Heavy_Rain showers')).toBe(0.7);
    expect(weatherMultiplier(SAMPLE_REFERENCE_DATA, 'Slight rain')).toBe(0.85);
    expect(weatherMultiplier(SAMPLE_REFERENCE_DATA, 'Clear sky')).toBe(1.05);
  });

  it('is neutral when nothing matches', () => {
    expect(weatherMultiplier(SAMPLE_REFERENCE_DATA, 'Overcast')).toBe(1);
    expect(weatherMultiplier(SAMPLE_REFERENCE_DATA, '')).toBe(1);
  });

  it('describes weather codes', () => {
    expect(describeWeatherCode(61)).toBe('Slight rain');
    expect(describeWeatherCode(42)).toBe('Unknown');
  });
});

describe('lifecycleStage', () => {
  it('picks the first phase containing the age', () => {
    expect(lifecycleStage(SAMPLE_REFERENCE_DATA, 0)).toEqual({ stage: 'launch', multiplier: 0.8 });
    expect(lifecycleStage(SAMPLE_REFERENCE_DATA, 30)).toEqual({ stage: 'launch', multiplier: 0.8 });
    expect(lifecycleStage(SAMPLE_REFERENCE_DATA, 31)).toEqual({ stage: 'growth', multiplier: 1.3 });
    expect(lifecycleStage(SAMPLE_REFERENCE_DATA, 5000)).toEqual({ stage: 'decline', multiplier: 0.7 });
  });

  it('is unknown and neutral without phases', () => {
    expect(lifecycleStage(NEUTRAL_REFERENCE_DATA, 100)).toEqual({ stage: 'unknown', multiplier: 1 });
  });
});

describe('festivals', () => {
  it('lists occurrences in range across years, ordered by date', () => {
    const occurrences = festivalsInRange(SAMPLE_REFERENCE_DATA, '2026-03-01', '2027-03-31');
    expect(occurrences.map((entry) => `${entry.name}@${entry.date}`)).toEqual([
      'Holi@2026-03-04',
      'Diwali@2026-11-08',
      'Holi@2027-03-22'
    ]);
  });

  it('skips dates that are not real calendar days', () => {
    const data = withPatterns({}, [festival({ name: 'Leap', dates: { '2026': '2026-02-30' } })]);
    expect(festivalsInRange(data, '2026-01-01', '2026-12-31')).toEqual([]);
  });

  it('marks a festival week within the impact window', () => {
    expect(festivalProximity(SAMPLE_REFERENCE_DATA, '2026-11-03', 60)).toEqual({
      isFestivalWeek: 1,
      festivalName: 'Diwali',
      festivalMultiplier: 1.8,
      daysToFestival: 5,
      festivalImpactWindow: 7
    });
  });

  it('still counts days after the festival inside the window', () => {
    const proximity = festivalProximity(SAMPLE_REFERENCE_DATA, '2026-11-12', 60);
    expect(proximity.isFestivalWeek).toBe(1);
    expect(proximity.daysToFestival).toBe(-4);
  });

  it('reports the next festival when outside every window', () => {
    expect(festivalProximity(SAMPLE_REFERENCE_DATA, '2026-10-20', 60)).toEqual({
      isFestivalWeek: 0,
      festivalName: null,
      festivalMultiplier: 1,
      daysToFestival: 19,
      festivalImpactWindow: 0
    });
  });

  it('uses 999 when no festival falls within the lookahead', () => {
    expect(festivalProximity(SAMPLE_REFERENCE_DATA, '2026-06-01', 60).daysToFestival).toBe(999);
  });

  it('breaks distance ties in favour of the earlier date', () => {
    const data = withPatterns({}, [
      festival({ name: 'Later', impactWindowDays: 5, dates: { '2026': '2026-05-13' } }),
      festival({ name: 'Earlier', impactWindowDays: 5, dates: { '2026': '2026-05-07' } })
    ]);
    const proximity = festivalProximity(data, '2026-05-10', 60);
    expect(proximity.festivalName).toBe('Earlier');
    expect(proximity.daysToFestival).toBe(-3);
  });
});
