import { ConfigurationError } from './errors';
import { SEVERITY_TIERS } from './types';
import type { SeverityMetric, SeverityTier } from './types';

export const DEFAULT_BOUNDARIES: Record<SeverityMetric, readonly number[]> = {
  'per-area': [30, 50, 80],
  'per-unit': [2000, 4000, 6000]
};

export interface TierRange {
  tier: SeverityTier;
  min: number | null;
  max: number | null;
}

export function tierRank(tier: SeverityTier): number {
  return SEVERITY_TIERS.indexOf(tier);
}

export function compareTiers(a: SeverityTier, b: SeverityTier): number {
  return tierRank(a) - tierRank(b);
}

/**
 * Tier i covers [boundaries[i - 1], boundaries[i]). The lowest tier has no lower
 * bound and the top tier has no upper bound.
 */
export class SeverityClassifier {
  private readonly boundaries: readonly number[];

  constructor(boundaries: readonly number[]) {
    if (boundaries.length !== SEVERITY_TIERS.length - 1) {
      throw new ConfigurationError(
        `Expected ${SEVERITY_TIERS.length - 1} severity boundaries, got ${boundaries.length}`
      );
    }
    boundaries.forEach((boundary, index) => {
      if (!Number.isFinite(boundary)) {
        throw new ConfigurationError(`Severity boundary ${boundary} is not a finite number`);
      }
      if (index > 0 && boundary <= boundaries[index - 1]) {
        throw new ConfigurationError(`Severity boundaries must increase: ${boundaries.join(', ')}`);
      }
    });
    this.boundaries = [...boundaries];
  }

  public static forMetric(metric: SeverityMetric, overrides: Partial<Record<SeverityMetric, readonly number[]>> = {}): SeverityClassifier {
    return new SeverityClassifier(overrides[metric] ?? DEFAULT_BOUNDARIES[metric]);
  }

  public classify(metric: number | null | undefined): SeverityTier | null {
    if (metric === null || metric === undefined || Number.isNaN(metric)) return null;
    let index = 0;
    while (index < this.boundaries.length && metric >= this.boundaries[index]) index++;
    return SEVERITY_TIERS[index];
  }

  public legend(): TierRange[] {
    return SEVERITY_TIERS.map((tier, index) => ({
      tier,
      min: index === 0 ? null : this.boundaries[index - 1],
      max: index < this.boundaries.length ? this.boundaries[index] : null
    }));
  }
}
