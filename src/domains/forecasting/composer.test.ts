import { describe, expect, it, vi } from 'vitest';
import { ComposerRegistry, MultiplicativeComposer, type DemandComposer } from './composer';
import { DEFAULT_FEATURES } from './features.service';
import type { FeatureRecord } from './types';

const composer = new MultiplicativeComposer();

function features(overrides: Partial<FeatureRecord>): FeatureRecord {
  return { ...DEFAULT_FEATURES, ...overrides };
}

describe('MultiplicativeComposer', () => {
  it('is neutral for default features', () => {
    expect(composer.combineMultipliers(DEFAULT_FEATURES)).toBe(1);
    expect(composer.predict(12.4, DEFAULT_FEATURES)).toBe(12);
  });

  it('never predicts below one unit', () => {
    expect(composer.predict(0.2, DEFAULT_FEATURES)).toBe(1);
    expect(composer.predict(0, DEFAULT_FEATURES)).toBe(1);
    expect(composer.predict(Number.NaN, DEFAULT_FEATURES)).toBe(1);
  });

  it('applies the festival multiplier only during a festival week', () => {
    expect(composer.combineMultipliers(features({ festivalMultiplier: 1.8, isFestivalWeek: 0 }))).toBe(1);
    expect(
      composer.combineMultipliers(features({ festivalMultiplier: 1.8, isFestivalWeek: 1, seasonalMultiplier: 1.2 }))
    ).toBeCloseTo(2.16, 10);
  });

  it('multiplies every contributing factor', () => {
    const record = features({
      seasonalMultiplier: 1.2,
      dayOfWeekMultiplier: 1.1,
      monthMultiplier: 1.3,
      lifecycleMultiplier: 0.8,
      temperatureImpact: 1.05,
      weatherImpact: 0.85
    });
    expect(composer.combineMultipliers(record)).toBeCloseTo(1.2 * 1.1 * 1.3 * 0.8 * 1.05 * 0.85, 10);
    expect(composer.predict(20, record)).toBe(25);
  });

  it('skips zero, negative and non-finite multipliers', () => {
    const record = features({
      seasonalMultiplier: 0,
      weatherImpact: -1,
      temperatureImpact: Number.NaN,
      monthMultiplier: Number.POSITIVE_INFINITY,
      dayOfWeekMultiplier: 1.1
    });
    expect(composer.combineMultipliers(record)).toBe(1.1);
  });
});

describe('ComposerRegistry', () => {
  const seasonalNaive: DemandComposer = {
    modelType: 'seasonal-naive',
    modelVersion: '0.1.0',
    combineMultipliers: () => 1,
    predict: (baseline) => Math.max(Math.round(baseline), 1)
  };

  it('resolves registered model types and the default', () => {
    const registry = new ComposerRegistry([new MultiplicativeComposer(), seasonalNaive]);
    expect(registry.resolve('seasonal-naive')).toBe(seasonalNaive);
    expect(registry.resolve().modelType).toBe('multiplicative');
    expect(registry.modelTypes()).toEqual(['multiplicative', 'seasonal-naive']);
  });

  it('falls back to the default composer for unknown types', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const registry = new ComposerRegistry();

    expect(registry.resolve('prophet').modelType).toBe('multiplicative');
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('registers the multiplicative composer when the default type is missing', () => {
    const registry = new ComposerRegistry([seasonalNaive], 'lstm');
    expect(registry.resolve().modelType).toBe('multiplicative');
  });
});
