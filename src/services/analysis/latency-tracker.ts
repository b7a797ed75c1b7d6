import type { AgentStatus } from './types';

export type LatencyTier = 'fast' | 'normal' | 'slow' | 'very_slow';

export interface AgentLatencyStats {
  calls: number;
  succeeded: number;
  failed: number;
  timedOut: number;
  avgMs: number;
  maxMs: number;
  lastMs: number;
  lastTier: LatencyTier;
  tiers: Record<LatencyTier, number>;
}

interface LatencyThresholds {
  fast: number;
  normal: number;
  slow: number;
}

/** Full-narrative LLM calls; tuned for local models */
const DEFAULT_THRESHOLDS: LatencyThresholds = {
  fast: 5_000,
  normal: 13_000,
  slow: 25_000,
};

export function classifyLatencyTier(
  durationMs: number,
  thresholds: LatencyThresholds = DEFAULT_THRESHOLDS
): LatencyTier {
  if (durationMs <= thresholds.fast) return 'fast';
  if (durationMs <= thresholds.normal) return 'normal';
  if (durationMs <= thresholds.slow) return 'slow';
  return 'very_slow';
}

/**
 * Per-agent latency bookkeeping. Observability only; nothing in the
 * pipeline reads these numbers back.
 */
export class LatencyTracker {
  private readonly stats = new Map<string, AgentLatencyStats & { totalMs: number }>();

  constructor(private readonly thresholds: LatencyThresholds = DEFAULT_THRESHOLDS) {}

  record(agent: string, durationMs: number, status: AgentStatus): LatencyTier {
    const tier = classifyLatencyTier(durationMs, this.thresholds);
    const current = this.stats.get(agent) ?? {
      calls: 0,
      succeeded: 0,
      failed: 0,
      timedOut: 0,
      avgMs: 0,
      maxMs: 0,
      lastMs: 0,
      lastTier: tier,
      totalMs: 0,
      tiers: { fast: 0, normal: 0, slow: 0, very_slow: 0 },
    };

    current.calls++;
    current.totalMs += durationMs;
    current.avgMs = Math.round(current.totalMs / current.calls);
    current.maxMs = Math.max(current.maxMs, durationMs);
    current.lastMs = durationMs;
    current.lastTier = tier;
    current.tiers[tier]++;
    if (status === 'succeeded') current.succeeded++;
    else if (status === 'failed') current.failed++;
    else current.timedOut++;

    this.stats.set(agent, current);
    return tier;
  }

  getStats(): Record<string, AgentLatencyStats> {
    const result: Record<string, AgentLatencyStats> = {};
    for (const [agent, { totalMs: _totalMs, ...stats }] of this.stats) {
      result[agent] = { ...stats, tiers: { ...stats.tiers } };
    }
    return result;
  }

  reset(): void {
    this.stats.clear();
  }
}
