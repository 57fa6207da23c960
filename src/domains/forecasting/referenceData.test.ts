import path from 'node:path';
import { describe, expect, it, vi } from 'vitest';
import { CacheAdapter } from '../../lib/redis';
import {
  DEFAULT_REFERENCE_DATA,
  describeReferenceData,
  FESTIVALS_FILE,
  FileReferenceDataProvider,
  SEASONAL_PATTERNS_FILE
} from './referenceData';

const calendarJson = JSON.stringify({
  version: 'cal-7',
  festivals: [
    {
      name: 'Harvest Fair',
      demandMultiplier: 1.25,
      impactWindowDays: 4,
      dates: { '2026': '2026-09-18' }
    }
  ]
});

const patternsJson = JSON.stringify({
  version: 'pat-3',
  seasons: { cool: { months: [12, 1, 2], categoryMultipliers: { toys: 1.1 } } },
  dayOfWeek: { saturday: 1.4 }
});

function fileReader(files: Record<string, string>) {
  return vi.fn(async (filePath: string) => {
    const content = files[path.basename(filePath)];
    if (content === undefined) {
      throw new Error(`ENOENT: no such file, open '${filePath}'`);
    }
    return content;
  });
}

function provider(readText: (filePath: string) => Promise<string>, cache = new CacheAdapter()) {
  return new FileReferenceDataProvider({ dir: '/srv/reference', cache, ttlSeconds: 86_400, readText });
}

describe('FileReferenceDataProvider', () => {
  it('loads and validates both files', async () => {
    const readText = fileReader({ [FESTIVALS_FILE]: calendarJson, [SEASONAL_PATTERNS_FILE]: patternsJson });

    const data = await provider(readText).getReferenceData();

    expect(readText).toHaveBeenCalledWith(path.join('/srv/reference', FESTIVALS_FILE));
    expect(data.version).toBe('cal-7+pat-3');
    expect(data.sources).toEqual({ festivals: 'file', patterns: 'file' });
    expect(data.festivals[0]).toEqual({
      name: 'Harvest Fair',
      type: 'regional',
      region: 'all',
      demandMultiplier: 1.25,
      impactWindowDays: 4,
      dates: { '2026': '2026-09-18' },
      impactCategories: []
    });
    expect(data.patterns.dayOfWeek).toEqual({ saturday: 1.4 });
    expect(data.patterns.lifecyclePhases).toEqual([]);
  });

  it('falls back per file when one is missing', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const readText = fileReader({ [SEASONAL_PATTERNS_FILE]: patternsJson });

    const data = await provider(readText).getReferenceData();

    expect(data.sources).toEqual({ festivals: 'default', patterns: 'file' });
    expect(data.festivals.map((entry) => entry.name)).toEqual(['Diwali']);
    expect(data.version).toBe('builtin-1+pat-3');
  });

  it('falls back when a file fails validation or parsing', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const readText = fileReader({
      [FESTIVALS_FILE]: JSON.stringify({ version: 'bad', festivals: [{ name: 'X', demandMultiplier: -1 }] }),
      [SEASONAL_PATTERNS_FILE]: '{ not json'
    });

    const data = await provider(readText).getReferenceData();

    expect(data).toEqual(DEFAULT_REFERENCE_DATA);
  });

  it('serves later reads from the cache until reloaded', async () => {
    const readText = fileReader({ [FESTIVALS_FILE]: calendarJson, [SEASONAL_PATTERNS_FILE]: patternsJson });
    const subject = provider(readText);

    await subject.getReferenceData();
    await subject.getReferenceData();
    expect(readText).toHaveBeenCalledTimes(2);

    await subject.reload();
    expect(readText).toHaveBeenCalledTimes(4);
  });

  it('reloads when the cached value is malformed', async () => {
    vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const cache = new CacheAdapter();
    await cache.set('reference-data:v1', { version: 7 }, 60);
    const readText = fileReader({ [FESTIVALS_FILE]: calendarJson, [SEASONAL_PATTERNS_FILE]: patternsJson });

    const data = await provider(readText, cache).getReferenceData();

    expect(data.version).toBe('cal-7+pat-3');
    expect(readText).toHaveBeenCalledTimes(2);
  });

  it('accepts the bundled data files', async () => {
    const subject = new FileReferenceDataProvider({
      dir: path.resolve(__dirname, '../../../data'),
      cache: new CacheAdapter(),
      ttlSeconds: 60
    });

    const data = await subject.getReferenceData();

    expect(data.sources).toEqual({ festivals: 'file', patterns: 'file' });
    expect(data.festivals.length).toBeGreaterThan(5);
    expect(Object.keys(data.patterns.seasons)).toEqual(['winter', 'summer', 'monsoon', 'autumn']);
  });
});

describe('describeReferenceData', () => {
  it('summarizes the builtin dataset', () => {
    expect(describeReferenceData(DEFAULT_REFERENCE_DATA)).toEqual({
      version: 'builtin-1+builtin-1',
      sources: { festivals: 'default', patterns: 'default' },
      festivalsCount: 1,
      seasonsCount: 4
    });
  });
});
