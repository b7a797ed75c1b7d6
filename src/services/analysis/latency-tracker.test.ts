import { describe, expect, it } from 'vitest';

import { LatencyTracker, classifyLatencyTier } from './latency-tracker';

describe('classifyLatencyTier', () => {
  it('uses inclusive upper bounds', () => {
    expect(classifyLatencyTier(5_000)).toBe('fast');
    expect(classifyLatencyTier(5_001)).toBe('normal');
    expect(classifyLatencyTier(13_000)).toBe('normal');
    expect(classifyLatencyTier(25_000)).toBe('slow');
    expect(classifyLatencyTier(30_000)).toBe('very_slow');
  });
});

describe('LatencyTracker', () => {
  it('aggregates calls per agent', () => {
    const tracker = new LatencyTracker();

    tracker.record('PerformanceAnalyst', 1_000, 'succeeded');
    tracker.record('PerformanceAnalyst', 3_001, 'failed');
    tracker.record('PerformanceAnalyst', 30_000, 'timed-out');

    expect(tracker.getStats().PerformanceAnalyst).toEqual({
      calls: 3,
      succeeded: 1,
      failed: 1,
      timedOut: 1,
      avgMs: 11_334,
      maxMs: 30_000,
      lastMs: 30_000,
      lastTier: 'very_slow',
      tiers: { fast: 2, normal: 0, slow: 0, very_slow: 1 },
    });
  });

  it('returns copies and can be reset', () => {
    const tracker = new LatencyTracker();
    tracker.record('CostOptimizer', 100, 'succeeded');

    const snapshot = tracker.getStats();
    snapshot.CostOptimizer.tiers.fast = 99;

    expect(tracker.getStats().CostOptimizer.tiers.fast).toBe(1);

    tracker.reset();
    expect(tracker.getStats()).toEqual({});
  });
});
