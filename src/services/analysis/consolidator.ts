/**
 * Consolidator
 *
 * successes → Insight[] with a quality tier.
 *
 * Paths:
 * - n = 0: rule-based USE analysis, no LLM call
 * - 0 < n < quorum: single best agent, narrative segmented heuristically
 * - n ≥ quorum: one synthesis call, retried once, then single best agent
 *
 * Never rejects for LLM or parse failures; the rule-based path is the floor.
 */

import { logger as rootLogger, type Logger } from '../../lib/logger';
import { withTimeout } from '../../lib/with-timeout';
import type { AnalysisContext } from '../../types/analysis-context';
import type { LlmClient } from '../llm/llm-client';
import type { AgentRegistry } from './agents/agent-registry';
import { ConsolidationParseError, getErrorMessage } from './errors';
import { segmentNarrative } from './narrative-segmenter';
import { pathConfidence, selectQualityTier } from './quality-tier';
import { DEFAULT_USE_THRESHOLDS, analyzeUse, type UseThresholds } from './rule-based-analyzer';
import { parseSynthesisOutput, renderSynthesisPrompt } from './synthesis-schema';
import type {
  AgentResponse,
  AnalysisConfig,
  ConsolidationPath,
  Insight,
  QualityTier,
  Severity,
} from './types';

export interface ConsolidationOutcome {
  readonly insights: readonly Insight[];
  readonly qualityTier: QualityTier;
  readonly path: ConsolidationPath;
  /** Synthesis calls issued, 0–2 */
  readonly synthesisAttempts: number;
}

export interface ConsolidatorOptions {
  llm: LlmClient;
  registry: AgentRegistry;
  config: Pick<AnalysisConfig, 'thresholds' | 'confidence' | 'synthesisTimeoutMs'>;
  useThresholds?: UseThresholds;
  logger?: Logger;
}

const MAX_SYNTHESIS_ATTEMPTS = 2;

// ============================================================================
// 1. Merge & Order
// ============================================================================

const SEVERITY_RANK: Record<Severity, number> = {
  critical: 5,
  high: 4,
  medium: 3,
  low: 2,
  info: 1,
};

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function mergeKey(insight: Insight): string {
  return [insight.component.trim().toLowerCase(), insight.title.trim().toLowerCase()].join('\u0000');
}

function sharesContributor(a: Insight, b: Insight): boolean {
  return a.contributingAgents.some((agent) => b.contributingAgents.includes(agent));
}

/**
 * Same severity, or one agent backing both: the pair is one finding.
 * Different severities from disjoint agents stay apart.
 */
function sameFinding(a: Insight, b: Insight): boolean {
  return a.severity === b.severity || sharesContributor(a, b);
}

/**
 * The higher severity keeps its text (the earlier one on a tie);
 * contributors are unioned and confidence is the max.
 */
function collapse(kept: Insight, other: Insight): Insight {
  const base = SEVERITY_RANK[other.severity] > SEVERITY_RANK[kept.severity] ? other : kept;
  return {
    ...base,
    confidence: Math.max(kept.confidence, other.confidence),
    contributingAgents: [
      ...new Set([...kept.contributingAgents, ...other.contributingAgents]),
    ].sort(compareText),
  };
}

/**
 * Merge Insights describing the same (component, title), compared
 * case-insensitively.
 */
export function mergeInsights(insights: readonly Insight[]): Insight[] {
  const groups = new Map<string, Insight[]>();

  for (const insight of insights) {
    const key = mergeKey(insight);
    const group = groups.get(key) ?? [];
    groups.set(key, group);

    // A collapse can raise severity or widen contributors, so re-scan until stable.
    let current = insight;
    let index = group.findIndex((other) => sameFinding(other, current));
    while (index !== -1) {
      const [other] = group.splice(index, 1);
      current = collapse(other, current);
      index = group.findIndex((candidate) => sameFinding(candidate, current));
    }
    group.push(current);
  }

  return [...groups.values()].flat();
}

/**
 * Severity descending, then strongest contributing agent, then component,
 * then title. Independent of input order.
 */
export function rankInsights(
  insights: readonly Insight[],
  weightOf: (agent: string) => number
): Insight[] {
  const topWeight = (insight: Insight) =>
    insight.contributingAgents.reduce((max, agent) => Math.max(max, weightOf(agent)), 0);

  return [...insights].sort(
    (a, b) =>
      SEVERITY_RANK[b.severity] - SEVERITY_RANK[a.severity] ||
      topWeight(b) - topWeight(a) ||
      compareText(a.component, b.component) ||
      compareText(a.title, b.title)
  );
}

/**
 * Agents whose narrative names the component as a word, for items the
 * synthesis left unattributed.
 */
export function mentioning(successes: readonly AgentResponse[], component: string): string[] {
  const term = component.trim().toLowerCase();
  if (term === '') return [];
  const escaped = term.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  const pattern = new RegExp(`(^|[^a-z0-9])${escaped}($|[^a-z0-9])`);
  return successes
    .filter((response) => pattern.test(response.narrative.toLowerCase()))
    .map((response) => response.agent);
}

// ============================================================================
// 2. Consolidator
// ============================================================================

export class Consolidator {
  private readonly llm: LlmClient;
  private readonly registry: AgentRegistry;
  private readonly config: ConsolidatorOptions['config'];
  private readonly useThresholds: UseThresholds;
  private readonly logger: Logger;

  constructor(options: ConsolidatorOptions) {
    this.llm = options.llm;
    this.registry = options.registry;
    this.config = options.config;
    this.useThresholds = options.useThresholds ?? DEFAULT_USE_THRESHOLDS;
    this.logger = options.logger ?? rootLogger;
  }

  async consolidate(
    successes: readonly AgentResponse[],
    context: AnalysisContext,
    log: Logger = this.logger
  ): Promise<ConsolidationOutcome> {
    const participating = successes.length;
    const qualityTier = selectQualityTier(
      participating,
      this.registry.profiles.length,
      this.config.thresholds
    );

    if (participating === 0) {
      log.warn('[Consolidator] No agent answered, using rule-based analysis');
      return this.finish(this.ruleBased(context, qualityTier), qualityTier, 'rule-based', 0);
    }

    let synthesisAttempts = 0;
    if (participating >= this.config.thresholds.quorum) {
      const prompt = renderSynthesisPrompt(successes, context);

      while (synthesisAttempts < MAX_SYNTHESIS_ATTEMPTS) {
        synthesisAttempts++;
        try {
          const insights = await this.synthesize(prompt, successes, qualityTier);
          log.info(
            `[Consolidator] Synthesis produced ${insights.length} insights on attempt ${synthesisAttempts}`
          );
          return this.finish(insights, qualityTier, 'synthesis', synthesisAttempts);
        } catch (error) {
          const detail =
            error instanceof ConsolidationParseError && error.issues.length > 0
              ? ` (${error.issues.slice(0, 3).join('; ')})`
              : '';
          log.warn(
            `[Consolidator] Synthesis attempt ${synthesisAttempts} failed: ${getErrorMessage(error)}${detail}`
          );
        }
      }
    } else {
      log.info(
        `[Consolidator] ${participating} of ${this.config.thresholds.quorum} agents needed for synthesis, using single best agent`
      );
    }

    return this.finish(
      this.singleBestAgent(successes, qualityTier),
      qualityTier,
      'single-agent',
      synthesisAttempts
    );
  }

  private finish(
    insights: Insight[],
    qualityTier: QualityTier,
    path: ConsolidationPath,
    synthesisAttempts: number
  ): ConsolidationOutcome {
    const ranked = rankInsights(mergeInsights(insights), this.registry.weightOf).map((insight) =>
      Object.freeze({ ...insight, contributingAgents: Object.freeze([...insight.contributingAgents]) })
    );

    return Object.freeze({
      insights: Object.freeze(ranked),
      qualityTier,
      path,
      synthesisAttempts,
    });
  }

  private async synthesize(
    prompt: string,
    successes: readonly AgentResponse[],
    qualityTier: QualityTier
  ): Promise<Insight[]> {
    const controller = new AbortController();
    const raw = await withTimeout(
      this.llm.call(prompt, { signal: controller.signal }),
      this.config.synthesisTimeoutMs,
      (ms) => new Error(`Synthesis call timed out after ${ms}ms`),
      controller
    );

    const known = new Set(successes.map((response) => response.agent));
    const confidence = pathConfidence('synthesis', qualityTier, this.config.confidence);

    return parseSynthesisOutput(raw).map((item): Insight => {
      const named = item.contributing_agents.filter((agent) => known.has(agent));
      return {
        title: item.title,
        component: item.component,
        severity: item.severity,
        observation: item.observation,
        rootCause: item.root_cause,
        immediateAction: item.immediate_action,
        confidence,
        contributingAgents: [
          ...new Set(named.length > 0 ? named : mentioning(successes, item.component)),
        ].sort(compareText),
        source: 'synthesis',
      };
    });
  }

  /**
   * Highest weight wins; ties go to the lexicographically smaller name.
   */
  private singleBestAgent(successes: readonly AgentResponse[], qualityTier: QualityTier): Insight[] {
    const best = [...successes].sort(
      (a, b) =>
        this.registry.weightOf(b.agent) - this.registry.weightOf(a.agent) ||
        compareText(a.agent, b.agent)
    )[0];

    const segment = segmentNarrative(best);
    return [
      {
        ...segment,
        confidence: pathConfidence('single-agent', qualityTier, this.config.confidence),
        contributingAgents: [best.agent],
        source: 'single-agent',
      },
    ];
  }

  private ruleBased(context: AnalysisContext, qualityTier: QualityTier): Insight[] {
    const confidence = pathConfidence('rule-based', qualityTier, this.config.confidence);
    return analyzeUse(context, this.useThresholds).map((finding): Insight => ({
      ...finding,
      confidence,
      contributingAgents: [],
      source: 'rule-based',
    }));
  }
}
