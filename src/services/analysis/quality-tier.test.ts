import { describe, expect, it } from 'vitest';

import { DEFAULT_ANALYSIS_CONFIG } from '../../lib/config-parser';
import { pathConfidence, selectQualityTier, tierConfidence } from './quality-tier';

const { thresholds, confidence } = DEFAULT_ANALYSIS_CONFIG;

describe('selectQualityTier', () => {
  it('maps participating counts of a five-agent registry to tiers', () => {
    expect([0, 1, 2, 3, 4, 5].map((n) => selectQualityTier(n, 5, thresholds))).toEqual([
      'degraded',
      'degraded',
      'basic',
      'basic',
      'good',
      'excellent',
    ]);
  });

  it('honours configured good and excellent minimums', () => {
    const custom = { quorum: 2, goodMinAgents: 3, excellentMinAgents: 4 };

    expect(selectQualityTier(3, 5, custom)).toBe('good');
    expect(selectQualityTier(4, 5, custom)).toBe('excellent');
  });

  it('is monotonic in the participating count', () => {
    const order = ['degraded', 'basic', 'good', 'excellent'];
    const ranks = [0, 1, 2, 3, 4, 5].map((n) => order.indexOf(selectQualityTier(n, 5, thresholds)));

    expect(ranks).toEqual([...ranks].sort((a, b) => a - b));
  });
});

describe('confidence', () => {
  it('gives synthesized insights the tier confidence', () => {
    expect(tierConfidence('excellent', confidence)).toBe(95);
    expect(tierConfidence('good', confidence)).toBe(88);
    expect(pathConfidence('synthesis', 'basic', confidence)).toBe(80);
  });

  it('keeps fallback paths below basic', () => {
    expect(pathConfidence('single-agent', 'excellent', confidence)).toBe(70);
    expect(pathConfidence('rule-based', 'degraded', confidence)).toBe(65);
    expect(
      pathConfidence('single-agent', 'degraded', { ...confidence, singleAgent: 90 })
    ).toBe(79);
  });
});
