/**
 * Action Plan
 *
 * Operator-facing checklist derived from a ConsolidatedResult. Not cached
 * with the result; recomputed per response.
 */

import type { ConsolidatedResult, Insight, Severity } from './types';

export interface ActionPlan {
  recommendations: string[];
  nextSteps: string[];
}

const MAX_RECOMMENDATIONS = 10;
const PER_SEVERITY_LIMIT = 3;

const STANDING_RECOMMENDATIONS = [
  'Re-run the analysis after each change to confirm its effect',
  'Alert on saturation as well as utilization for every resource',
];

const STANDING_NEXT_STEPS = [
  'Implement monitoring for identified metrics',
  'Schedule follow-up analysis in 24 hours',
  'Create implementation roadmap for recommendations',
];

function plural(count: number, word: string): string {
  return `${count} ${word}${count === 1 ? '' : 's'}`;
}

function actionsFor(insights: readonly Insight[], severity: Severity): string[] {
  return insights
    .filter((insight) => insight.severity === severity)
    .slice(0, PER_SEVERITY_LIMIT)
    .map((insight) => insight.immediateAction.trim())
    .filter(Boolean);
}

function dedupe(items: string[]): string[] {
  const seen = new Set<string>();
  return items.filter((item) => {
    const key = item.toLowerCase();
    if (seen.has(key)) return false;
    seen.add(key);
    return true;
  });
}

export function buildActionPlan(result: ConsolidatedResult): ActionPlan {
  const { insights } = result;
  const critical = insights.filter((insight) => insight.severity === 'critical').length;
  const high = insights.filter((insight) => insight.severity === 'high').length;

  const recommendations = dedupe([
    ...actionsFor(insights, 'critical'),
    ...actionsFor(insights, 'high'),
    ...STANDING_RECOMMENDATIONS,
  ]).slice(0, MAX_RECOMMENDATIONS);

  const nextSteps: string[] = [];
  if (critical > 0) {
    nextSteps.push(`Address ${plural(critical, 'critical issue')} immediately`);
  }
  if (high > 0) {
    nextSteps.push(`Plan fixes for ${plural(high, 'high-priority finding')} this week`);
  }
  nextSteps.push(...STANDING_NEXT_STEPS);

  return { recommendations, nextSteps };
}
