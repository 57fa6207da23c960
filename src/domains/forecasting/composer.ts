import { isPositiveFinite } from '../../lib/numbers';
import type { FeatureRecord } from './types';

/**
 * Turns a baseline daily demand and a feature record into a point forecast.
 * Implementations are looked up by `modelType`.
 */
export interface DemandComposer {
  readonly modelType: string;
  readonly modelVersion: string;
  combineMultipliers(features: FeatureRecord): number;
  predict(baseline: number, features: FeatureRecord): number;
}

export const MULTIPLICATIVE_MODEL_TYPE = 'multiplicative';

export class MultiplicativeComposer implements DemandComposer {
  readonly modelType = MULTIPLICATIVE_MODEL_TYPE;
  readonly modelVersion = '1.0.0';

  combineMultipliers(features: FeatureRecord): number {
    const multipliers = [
      features.seasonalMultiplier,
      features.isFestivalWeek === 1 ? features.festivalMultiplier : 1,
      features.dayOfWeekMultiplier,
      features.monthMultiplier,
      features.lifecycleMultiplier,
      features.temperatureImpact,
      features.weatherImpact
    ];
    // Missing, zero, negative and non-finite values count as 1.0.
    return multipliers.reduce<number>((combined, value) => (isPositiveFinite(value) ? combined * value : combined), 1);
  }

  predict(baseline: number, features: FeatureRecord): number {
    const base = isPositiveFinite(baseline) ? baseline : 0;
    return Math.max(Math.round(base * this.combineMultipliers(features)), 1);
  }
}

export class ComposerRegistry {
  private readonly composers = new Map<string, DemandComposer>();

  constructor(
    composers: DemandComposer[] = [new MultiplicativeComposer()],
    private readonly defaultModelType: string = MULTIPLICATIVE_MODEL_TYPE
  ) {
    for (const composer of composers) {
      this.register(composer);
    }
    if (!this.composers.has(defaultModelType)) {
      this.register(new MultiplicativeComposer());
      this.defaultModelType = MULTIPLICATIVE_MODEL_TYPE;
    }
  }

  register(composer: DemandComposer): void {
    this.composers.set(composer.modelType, composer);
  }

  /** Unknown model types fall back to the default composer. */
  resolve(modelType?: string): DemandComposer {
    const requested = modelType ?? this.defaultModelType;
    const composer = this.composers.get(requested);
    if (composer) return composer;

    console.warn(`⚠️  Unknown model type "${requested}", using ${this.defaultModelType}`);
    const fallbackComposer = this.composers.get(this.defaultModelType);
    if (!fallbackComposer) {
      throw new Error(`COMPOSER_NOT_REGISTERED: ${this.defaultModelType}`);
    }
    return fallbackComposer;
  }

  modelTypes(): string[] {
    return [...this.composers.keys()].sort();
  }
}
