import { describe, it, expect } from 'vitest';
import { ConfigurationError } from '../src/core/errors';
import { SeverityClassifier, compareTiers, tierRank } from '../src/core/severity';

describe('SeverityClassifier', () => {
  const classifier = new SeverityClassifier([30, 50, 80]);

  it('returns no tier for absent metrics', () => {
    expect(classifier.classify(null)).toBeNull();
    expect(classifier.classify(undefined)).toBeNull();
    expect(classifier.classify(Number.NaN)).toBeNull();
  });

  it('includes the lower bound and excludes the upper bound', () => {
    expect(classifier.classify(-5)).toBe('low');
    expect(classifier.classify(29.99)).toBe('low');
    expect(classifier.classify(30)).toBe('medium');
    expect(classifier.classify(49.9)).toBe('medium');
    expect(classifier.classify(50)).toBe('high');
    expect(classifier.classify(80)).toBe('critical');
    expect(classifier.classify(1e9)).toBe('critical');
  });

  it('is monotonic in the metric', () => {
    const values = [-100, 0, 12, 30, 31, 49.999, 50, 65, 79.9, 80, 500];
    const ranks = values.map(value => {
      const tier = classifier.classify(value);
      return tier === null ? -1 : tierRank(tier);
    });
    for (let i = 1; i < ranks.length; i++) {
      expect(ranks[i]).toBeGreaterThanOrEqual(ranks[i - 1]);
    }
  });

  it('rejects boundary tables that are not strictly increasing', () => {
    expect(() => new SeverityClassifier([50, 30, 80])).toThrow(ConfigurationError);
    expect(() => new SeverityClassifier([30, 30, 80])).toThrow(ConfigurationError);
    expect(() => new SeverityClassifier([30, 50])).toThrow(ConfigurationError);
    expect(() => new SeverityClassifier([30, Number.NaN, 80])).toThrow(ConfigurationError);
  });

  it('describes its ranges', () => {
    expect(classifier.legend()).toEqual([
      { tier: 'low', min: null, max: 30 },
      { tier: 'medium', min: 30, max: 50 },
      { tier: 'high', min: 50, max: 80 },
      { tier: 'critical', min: 80, max: null }
    ]);
  });

  it('uses per-unit defaults', () => {
    expect(SeverityClassifier.forMetric('per-unit').classify(4000)).toBe('high');
    expect(SeverityClassifier.forMetric('per-area', { 'per-area': [1, 2, 3] }).classify(2.5)).toBe('high');
  });
});

describe('compareTiers', () => {
  it('orders tiers from low to critical', () => {
    expect(compareTiers('low', 'critical')).toBeLessThan(0);
    expect(compareTiers('high', 'medium')).toBeGreaterThan(0);
    expect(compareTiers('medium', 'medium')).toBe(0);
  });
});
