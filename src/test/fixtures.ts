import { buildReferenceData, type Festival, type ReferenceData, type SeasonalPatterns } from '../domains/forecasting/referenceData';

export const NEUTRAL_PATTERNS: SeasonalPatterns = {
  version: 'test-neutral',
  seasons: {},
  dayOfWeek: {},
  months: {},
  weatherImpact: {},
  temperatureImpact: {},
  lifecyclePhases: []
};

export const NEUTRAL_REFERENCE_DATA: ReferenceData = buildReferenceData(
  { version: 'test-neutral', festivals: [] },
  NEUTRAL_PATTERNS,
  { festivals: 'static', patterns: 'static' }
);

export function festival(overrides: Partial<Festival> & { name: string }): Festival {
  return {
    type: 'major',
    region: 'all',
    demandMultiplier: 1.5,
    impactWindowDays: 7,
    dates: {},
    impactCategories: [],
    ...overrides
  };
}

export const SAMPLE_PATTERNS: SeasonalPatterns = {
  version: 'test-1',
  seasons: {
    winter: { months: [11, 12, 1, 2], categoryMultipliers: { toys: 1.2, clothing: 1.4 } },
    summer: { months: [3, 4, 5, 6], categoryMultipliers: { outdoor: 1.3, toys: 0.9 } },
    monsoon: { months: [7, 8, 9], categoryMultipliers: { toys: 1.1 } },
    autumn: { months: [10], categoryMultipliers: {} }
  },
  dayOfWeek: {
    monday: 0.9,
    tuesday: 0.9,
    wednesday: 1.0,
    thursday: 1.0,
    friday: 1.1,
    saturday: 1.3,
    sunday: 1.2
  },
  months: { '10': 1.15, '11': 1.3 },
  weatherImpact: { 'heavy rain': 0.7, rain: 0.85, thunderstorm: 0.6, clear: 1.05 },
  temperatureImpact: {
    below_10: 0.8,
    '10_to_15': 0.9,
    '15_to_20': 1.0,
    '20_to_25': 1.0,
    '25_to_30': 1.05,
    '30_to_35': 1.1,
    '35_to_40': 0.9,
    above_40: 0.8
  },
  lifecyclePhases: [
    { name: 'launch', minDays: 0, maxDays: 30, demandMultiplier: 0.8 },
    { name: 'growth', minDays: 31, maxDays: 180, demandMultiplier: 1.3 },
    { name: 'mature', minDays: 181, maxDays: 730, demandMultiplier: 1.0 },
    { name: 'decline', minDays: 731, maxDays: null, demandMultiplier: 0.7 }
  ]
};

export const SAMPLE_FESTIVALS: Festival[] = [
  festival({
    name: 'Diwali',
    demandMultiplier: 1.8,
    impactWindowDays: 7,
    dates: { '2026': '2026-11-08', '2027': '2027-10-29' },
    impactCategories: ['toys', 'gifts']
  }),
  festival({
    name: 'Holi',
    demandMultiplier: 1.3,
    impactWindowDays: 3,
    dates: { '2026': '2026-03-04', '2027': '2027-03-22' },
    impactCategories: ['toys']
  })
];

export const SAMPLE_REFERENCE_DATA: ReferenceData = buildReferenceData(
  { version: 'test-1', festivals: SAMPLE_FESTIVALS },
  SAMPLE_PATTERNS,
  { festivals: 'static', patterns: 'static' }
);

export function withPatterns(overrides: Partial<SeasonalPatterns>, festivals: Festival[] = []): ReferenceData {
  return buildReferenceData(
    { version: 'test-override', festivals },
    { ...NEUTRAL_PATTERNS, ...overrides },
    { festivals: 'static', patterns: 'static' }
  );
}
