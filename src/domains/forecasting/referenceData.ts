import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import type { CacheStore } from '../../lib/redis';
import { errorMessage } from '../../lib/stageResult';

const isoDateString = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Use ISO date format YYYY-MM-DD');

export const festivalSchema = z.object({
  name: z.string().min(1),
  type: z.string().default('regional'),
  region: z.string().default('all'),
  demandMultiplier: z.number().positive().default(1),
  impactWindowDays: z.number().int().nonnegative().default(7),
  dates: z.record(z.string().regex(/^\d{4}$/), isoDateString).default({}),
  impactCategories: z.array(z.string()).default([])
});

export const festivalCalendarSchema = z.object({
  version: z.string().min(1),
  festivals: z.array(festivalSchema)
});

const lifecyclePhaseSchema = z.object({
  name: z.string().min(1),
  minDays: z.number().int().nonnegative(),
  maxDays: z.number().int().nonnegative().nullable(),
  demandMultiplier: z.number()
});

export const seasonalPatternsSchema = z.object({
  version: z.string().min(1),
  seasons: z.record(
    z.object({
      months: z.array(z.number().int().min(1).max(12)),
      categoryMultipliers: z.record(z.number()).default({})
    })
  ),
  dayOfWeek: z.record(z.number()).default({}),
  months: z.record(z.number()).default({}),
  weatherImpact: z.record(z.number()).default({}),
  temperatureImpact: z.record(z.number()).default({}),
  lifecyclePhases: z.array(lifecyclePhaseSchema).default([])
});

export type Festival = z.infer<typeof festivalSchema>;
export type FestivalCalendar = z.infer<typeof festivalCalendarSchema>;
export type LifecyclePhase = z.infer<typeof lifecyclePhaseSchema>;
export type SeasonalPatterns = z.infer<typeof seasonalPatternsSchema>;

export type DataSource = 'file' | 'default' | 'static';

export const referenceDataSchema = z.object({
  version: z.string(),
  sources: z.object({
    festivals: z.enum(['file', 'default', 'static']),
    patterns: z.enum(['file', 'default', 'static'])
  }),
  festivals: z.array(festivalSchema),
  patterns: seasonalPatternsSchema
});

export type ReferenceData = z.infer<typeof referenceDataSchema>;

export const DEFAULT_FESTIVAL_CALENDAR: FestivalCalendar = {
  version: 'builtin-1',
  festivals: [
    {
      name: 'Diwali',
      type: 'major',
      region: 'all',
      demandMultiplier: 1.8,
      impactWindowDays: 14,
      dates: {},
      impactCategories: ['toys', 'clothing', 'gifts']
    }
  ]
};

export const DEFAULT_SEASONAL_PATTERNS: SeasonalPatterns = {
  version: 'builtin-1',
  seasons: {
    winter: { months: [11, 12, 1, 2], categoryMultipliers: {} },
    summer: { months: [3, 4, 5, 6], categoryMultipliers: {} },
    monsoon: { months: [7, 8, 9], categoryMultipliers: {} },
    spring: { months: [10], categoryMultipliers: {} }
  },
  dayOfWeek: {
    monday: 1.0,
    tuesday: 1.0,
    wednesday: 1.0,
    thursday: 1.0,
    friday: 1.1,
    saturday: 1.2,
    sunday: 1.1
  },
  months: {},
  weatherImpact: {},
  temperatureImpact: {},
  lifecyclePhases: [
    { name: 'launch', minDays: 0, maxDays: 30, demandMultiplier: 0.8 },
    { name: 'growth', minDays: 31, maxDays: 180, demandMultiplier: 1.3 },
    { name: 'mature', minDays: 181, maxDays: 730, demandMultiplier: 1.0 },
    { name: 'decline', minDays: 731, maxDays: null, demandMultiplier: 0.7 }
  ]
};

export function buildReferenceData(
  calendar: FestivalCalendar,
  patterns: SeasonalPatterns,
  sources: ReferenceData['sources']
): ReferenceData {
  return {
    version: `${calendar.version}+${patterns.version}`,
    sources,
    festivals: calendar.festivals,
    patterns
  };
}

export const DEFAULT_REFERENCE_DATA: ReferenceData = buildReferenceData(
  DEFAULT_FESTIVAL_CALENDAR,
  DEFAULT_SEASONAL_PATTERNS,
  { festivals: 'default', patterns: 'default' }
);

export type ReferenceDataInfo = {
  version: string;
  sources: ReferenceData['sources'];
  festivalsCount: number;
  seasonsCount: number;
};

export function describeReferenceData(data: ReferenceData): ReferenceDataInfo {
  return {
    version: data.version,
    sources: data.sources,
    festivalsCount: data.festivals.length,
    seasonsCount: Object.keys(data.patterns.seasons).length
  };
}

export interface ReferenceDataProvider {
  /** Never rejects; falls back to the builtin dataset. */
  getReferenceData(): Promise<ReferenceData>;
  /** Re-reads the source, bypassing any cache. Never rejects. */
  reload(): Promise<ReferenceData>;
}

/**
 * Fixed dataset, for tests and for callers that load reference data themselves.
 */
export class StaticReferenceDataProvider implements ReferenceDataProvider {
  constructor(private readonly data: ReferenceData) {}

  async getReferenceData(): Promise<ReferenceData> {
    return this.data;
  }

  async reload(): Promise<ReferenceData> {
    return this.data;
  }
}

export const FESTIVALS_FILE = 'festivals.json';
export const SEASONAL_PATTERNS_FILE = 'seasonal_patterns.json';
const CACHE_KEY = 'reference-data:v1';

export type FileReferenceDataProviderOptions = {
  dir: string;
  cache: CacheStore;
  ttlSeconds: number;
  readText?: (filePath: string) => Promise<string>;
};

/**
 * Reads the festival calendar and seasonal pattern table from JSON files and
 * keeps the parsed result in the shared cache.
 */
export class FileReferenceDataProvider implements ReferenceDataProvider {
  private readonly readText: (filePath: string) => Promise<string>;

  constructor(private readonly options: FileReferenceDataProviderOptions) {
    this.readText = options.readText ?? ((filePath) => readFile(filePath, 'utf-8'));
  }

  async getReferenceData(): Promise<ReferenceData> {
    try {
      const cached = await this.options.cache.get<unknown>(CACHE_KEY);
      if (cached !== null) {
        const parsed = referenceDataSchema.safeParse(cached);
        if (parsed.success) return parsed.data;
        console.warn('⚠️  Cached reference data is malformed, reloading');
      }
    } catch (error) {
      console.warn(`⚠️  Reference data cache read failed: ${errorMessage(error)}`);
    }
    return this.reload();
  }

  async reload(): Promise<ReferenceData> {
    const [calendar, patterns] = await Promise.all([
      this.loadFile(FESTIVALS_FILE, festivalCalendarSchema, DEFAULT_FESTIVAL_CALENDAR),
      this.loadFile(SEASONAL_PATTERNS_FILE, seasonalPatternsSchema, DEFAULT_SEASONAL_PATTERNS)
    ]);

    const data = buildReferenceData(calendar.value, patterns.value, {
      festivals: calendar.source,
      patterns: patterns.source
    });

    try {
      await this.options.cache.set(CACHE_KEY, data, this.options.ttlSeconds);
    } catch (error) {
      console.warn(`⚠️  Reference data cache write failed: ${errorMessage(error)}`);
    }
    return data;
  }

  private async loadFile<S extends z.ZodTypeAny>(
    fileName: string,
    schema: S,
    defaults: z.infer<S>
  ): Promise<{ value: z.infer<S>; source: DataSource }> {
    const filePath = path.join(this.options.dir, fileName);
    try {
      const raw: unknown = JSON.parse(await this.readText(filePath));
      const parsed = schema.safeParse(raw);
      if (!parsed.success) {
        console.warn(`⚠️  ${fileName} failed validation, using builtin defaults: ${parsed.error.issues[0]?.message}`);
        return { value: defaults, source: 'default' };
      }
      return { value: parsed.data, source: 'file' };
    } catch (error) {
      console.warn(`⚠️  Could not load ${fileName}, using builtin defaults: ${errorMessage(error)}`);
      return { value: defaults, source: 'default' };
    }
  }
}
