/**
 * Consensus Scorer
 *
 * score = clamp(avgConfidence + roleDiversity * diversityBonus
 *               + avgSeverityWeight * severityBonus, 0, 100)
 *
 * Pure; rounded to one decimal so equal inputs print equal scores.
 */

import type { AgentRole, Insight, ScoringWeights } from './types';

export interface ConsensusScorerOptions {
  weights: ScoringWeights;
  totalRoles: number;
  roleOf: (agent: string) => AgentRole | undefined;
}

export type ConsensusScorer = (insights: readonly Insight[]) => number;

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

export function scoreConsensus(
  insights: readonly Insight[],
  { weights, totalRoles, roleOf }: ConsensusScorerOptions
): number {
  if (insights.length === 0) return 0;

  let confidenceSum = 0;
  let severitySum = 0;
  const roles = new Set<AgentRole>();

  for (const insight of insights) {
    confidenceSum += insight.confidence;
    severitySum += weights.severity[insight.severity];
    for (const agent of insight.contributingAgents) {
      const role = roleOf(agent);
      if (role) roles.add(role);
    }
  }

  const avgConfidence = confidenceSum / insights.length;
  const diversity = totalRoles > 0 ? roles.size / totalRoles : 0;
  const avgSeverity = severitySum / insights.length;

  const raw =
    avgConfidence + diversity * weights.diversityBonus + avgSeverity * weights.severityBonus;

  return Math.round(clamp(raw, 0, 100) * 10) / 10;
}

export function createConsensusScorer(options: ConsensusScorerOptions): ConsensusScorer {
  return (insights) => scoreConsensus(insights, options);
}
