import type {
  ConsolidationPath,
  QualityThresholds,
  QualityTier,
  TierConfidence,
} from './types';

/**
 * Tier by number of successful agents. Monotonic in `participating`.
 */
export function selectQualityTier(
  participating: number,
  totalProfiles: number,
  thresholds: QualityThresholds
): QualityTier {
  const excellentMin = thresholds.excellentMinAgents ?? totalProfiles;

  if (participating >= excellentMin && participating > 0) return 'excellent';
  if (participating >= thresholds.goodMinAgents) return 'good';
  if (participating >= thresholds.quorum) return 'basic';
  return 'degraded';
}

export function tierConfidence(tier: QualityTier, confidence: TierConfidence): number {
  switch (tier) {
    case 'excellent':
      return confidence.excellent;
    case 'good':
      return confidence.good;
    case 'basic':
      return confidence.basic;
    case 'degraded':
      return confidence.degradedCap;
  }
}

/**
 * Confidence for an Insight produced on `path`. Fallback paths never reach
 * the `basic` level.
 */
export function pathConfidence(
  path: ConsolidationPath,
  tier: QualityTier,
  confidence: TierConfidence
): number {
  if (path === 'synthesis') return tierConfidence(tier, confidence);

  const base = path === 'single-agent' ? confidence.singleAgent : confidence.ruleBased;
  return Math.min(base, confidence.degradedCap);
}
