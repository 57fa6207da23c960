import { addIsoDays, calendarParts, diffIsoDays, isIsoDate, type IsoDate } from '../../lib/dates';
import { isPositiveFinite } from '../../lib/numbers';
import { errorMessage } from '../../lib/stageResult';
import type { ReferenceData } from './referenceData';

// Every lookup here returns a finite positive multiplier and never throws:
// anything unexpected, including a zero or negative table value, reads as 1.0.

export const NEUTRAL_MULTIPLIER = 1.0;

function guarded(label: string, compute: () => number | undefined): number {
  try {
    const value = compute();
    return isPositiveFinite(value) ? value : NEUTRAL_MULTIPLIER;
  } catch (error) {
    console.warn(`⚠️  ${label} multiplier lookup failed: ${errorMessage(error)}`);
    return NEUTRAL_MULTIPLIER;
  }
}

const WEEKDAY_NAMES = ['monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday', 'sunday'] as const;

/** `weekday`: 0 = Monday … 6 = Sunday. */
export function dayOfWeekMultiplier(data: ReferenceData, weekday: number): number {
  return guarded('day-of-week', () => {
    const name = WEEKDAY_NAMES[weekday];
    return name ? data.patterns.dayOfWeek[name] : undefined;
  });
}

export function monthMultiplier(data: ReferenceData, month: number): number {
  return guarded('month', () => (month >= 1 && month <= 12 ? data.patterns.months[String(month)] : undefined));
}

export function seasonForMonth(data: ReferenceData, month: number): string | null {
  for (const [season, info] of Object.entries(data.patterns.seasons)) {
    if (info.months.includes(month)) return season;
  }
  return null;
}

export function categorySeasonalMultiplier(data: ReferenceData, category: string | null, month: number): number {
  return guarded('seasonal', () => {
    const season = seasonForMonth(data, month);
    if (!season || !category) return undefined;
    return data.patterns.seasons[season]?.categoryMultipliers[category.toLowerCase()];
  });
}

export type TemperatureBucket =
  | 'below_10'
  | '10_to_15'
  | '15_to_20'
  | '20_to_25'
  | '25_to_30'
  | '30_to_35'
  | '35_to_40'
  | 'above_40';

export function temperatureBucket(celsius: number): TemperatureBucket {
  if (celsius < 10) return 'below_10';
  if (celsius < 15) return '10_to_15';
  if (celsius < 20) return '15_to_20';
  if (celsius < 25) return '20_to_25';
  if (celsius < 30) return '25_to_30';
  if (celsius < 35) return '30_to_35';
  if (celsius < 40) return '35_to_40';
  return 'above_40';
}

export function temperatureMultiplier(data: ReferenceData, celsius: number): number {
  return guarded('temperature', () =>
    Number.isFinite(celsius) ? data.patterns.temperatureImpact[temperatureBucket(celsius)] : undefined
  );
}

export function normalizeWeatherDescription(description: string): string {
  return description.toLowerCase().replace(/_/g, ' ').trim();
}

/**
 * First impact key (in table order) contained in the description wins.
 */
export function weatherMultiplier(data: ReferenceData, description: string): number {
  return guarded('weather', () => {
    const normalized = normalizeWeatherDescription(description);
    if (!normalized) return undefined;
    for (const [key, multiplier] of Object.entries(data.patterns.weatherImpact)) {
      if (normalized.includes(normalizeWeatherDescription(key))) return multiplier;
    }
    return undefined;
  });
}

/** WMO weather interpretation codes as reported by Open-Meteo. */
export const WEATHER_CODE_DESCRIPTIONS: Record<number, string> = {
  0: 'Clear sky',
  1: 'Mainly clear',
  2: 'Partly cloudy',
  3: 'Overcast',
  45: 'Foggy',
  48: 'Depositing rime fog',
  51: 'Light drizzle',
  53: 'Moderate drizzle',
  55: 'Dense drizzle',
  61: 'Slight rain',
  63: 'Moderate rain',
  65: 'Heavy rain',
  71: 'Slight snow',
  73: 'Moderate snow',
  75: 'Heavy snow',
  77: 'Snow grains',
  80: 'Slight rain showers',
  81: 'Moderate rain showers',
  82: 'Violent rain showers',
  85: 'Slight snow showers',
  86: 'Heavy snow showers',
  95: 'Thunderstorm',
  96: 'Thunderstorm with slight hail',
  99: 'Thunderstorm with heavy hail'
};

export function describeWeatherCode(code: number): string {
  return WEATHER_CODE_DESCRIPTIONS[code] ?? 'Unknown';
}

export type LifecycleStage = {
  stage: string;
  multiplier: number;
};

export function lifecycleStage(data: ReferenceData, daysSinceLaunch: number): LifecycleStage {
  try {
    const days = Math.max(0, Math.floor(daysSinceLaunch));
    const phase = data.patterns.lifecyclePhases.find(
      (candidate) => days >= candidate.minDays && days <= (candidate.maxDays ?? Number.POSITIVE_INFINITY)
    );
    if (!phase) return { stage: 'unknown', multiplier: NEUTRAL_MULTIPLIER };
    return {
      stage: phase.name,
      multiplier: isPositiveFinite(phase.demandMultiplier) ? phase.demandMultiplier : NEUTRAL_MULTIPLIER
    };
  } catch (error) {
    console.warn(`⚠️  lifecycle multiplier lookup failed: ${errorMessage(error)}`);
    return { stage: 'unknown', multiplier: NEUTRAL_MULTIPLIER };
  }
}

export type FestivalOccurrence = {
  name: string;
  date: IsoDate;
  type: string;
  region: string;
  demandMultiplier: number;
  impactWindowDays: number;
  impactCategories: string[];
  sourceIndex: number;
};

/**
 * Festival occurrences dated within [from, to], ordered by date then by their
 * position in the calendar.
 */
export function festivalsInRange(data: ReferenceData, from: IsoDate, to: IsoDate): FestivalOccurrence[] {
  try {
    const startYear = calendarParts(from).year;
    const endYear = calendarParts(to).year;
    const occurrences: FestivalOccurrence[] = [];

    data.festivals.forEach((festival, sourceIndex) => {
      for (let year = startYear; year <= endYear; year += 1) {
        const date = festival.dates[String(year)];
        if (!date || !isIsoDate(date)) continue;
        if (date < from || date > to) continue;
        occurrences.push({
          name: festival.name,
          date,
          type: festival.type,
          region: festival.region,
          demandMultiplier: festival.demandMultiplier,
          impactWindowDays: festival.impactWindowDays,
          impactCategories: festival.impactCategories,
          sourceIndex
        });
      }
    });

    return occurrences.sort((a, b) => a.date.localeCompare(b.date) || a.sourceIndex - b.sourceIndex);
  } catch (error) {
    console.warn(`⚠️  festival calendar scan failed: ${errorMessage(error)}`);
    return [];
  }
}

export type FestivalProximity = {
  isFestivalWeek: 0 | 1;
  festivalName: string | null;
  festivalMultiplier: number;
  daysToFestival: number;
  festivalImpactWindow: number;
};

export const NO_FESTIVAL: FestivalProximity = {
  isFestivalWeek: 0,
  festivalName: null,
  festivalMultiplier: NEUTRAL_MULTIPLIER,
  daysToFestival: 999,
  festivalImpactWindow: 0
};

/**
 * Looks `lookaheadDays` forward (and back by each festival's own impact
 * window) from `date`. The date is in a festival week when it lies within
 * ±impactWindowDays of an occurrence; the nearest such occurrence wins, ties
 * going to the earlier date and then to calendar order.
 */
export function festivalProximity(data: ReferenceData, date: IsoDate, lookaheadDays: number): FestivalProximity {
  try {
    const maxWindow = data.festivals.reduce((max, festival) => Math.max(max, festival.impactWindowDays), 0);
    const candidates = festivalsInRange(data, addIsoDays(date, -maxWindow), addIsoDays(date, lookaheadDays))
      .map((occurrence) => ({ occurrence, daysDiff: diffIsoDays(occurrence.date, date) }))
      .filter(({ occurrence, daysDiff }) => daysDiff >= -occurrence.impactWindowDays)
      .sort(
        (a, b) =>
          Math.abs(a.daysDiff) - Math.abs(b.daysDiff) ||
          a.daysDiff - b.daysDiff ||
          a.occurrence.sourceIndex - b.occurrence.sourceIndex
      );

    const active = candidates.find(({ occurrence, daysDiff }) => Math.abs(daysDiff) <= occurrence.impactWindowDays);
    if (active) {
      return {
        isFestivalWeek: 1,
        festivalName: active.occurrence.name,
        festivalMultiplier: isPositiveFinite(active.occurrence.demandMultiplier)
          ? active.occurrence.demandMultiplier
          : NEUTRAL_MULTIPLIER,
        daysToFestival: active.daysDiff,
        festivalImpactWindow: active.occurrence.impactWindowDays
      };
    }

    const upcoming = candidates.filter(({ daysDiff }) => daysDiff > 0).map(({ daysDiff }) => daysDiff);
    return {
      ...NO_FESTIVAL,
      daysToFestival: upcoming.length > 0 ? Math.min(...upcoming) : NO_FESTIVAL.daysToFestival
    };
  } catch (error) {
    console.warn(`⚠️  festival proximity lookup failed: ${errorMessage(error)}`);
    return NO_FESTIVAL;
  }
}
