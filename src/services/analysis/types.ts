/**
 * Analysis Orchestration Types
 *
 * Shared shapes for the dispatch → collect → consolidate → score pipeline.
 */

// ============================================================================
// 1. Agents
// ============================================================================

export const AGENT_ROLES = [
  'performance',
  'infrastructure',
  'security',
  'cost',
  'reliability',
] as const;

export type AgentRole = (typeof AGENT_ROLES)[number];

export interface AgentProfile {
  readonly name: string;
  readonly role: AgentRole;
  /** Persona template; `{{context}}` is replaced by the rendered metrics */
  readonly instructions: string;
  /** Relative weight used for single-agent selection and ordering */
  readonly weight: number;
}

export type AgentStatus = 'succeeded' | 'failed' | 'timed-out';

export type AgentErrorKind =
  | 'AgentTimeout'
  | 'AgentNetworkError'
  | 'AgentMalformedResponse';

export interface AgentResponse {
  readonly agent: string;
  readonly role: AgentRole;
  readonly narrative: string;
  readonly durationMs: number;
  readonly status: AgentStatus;
  readonly failureReason?: string;
  readonly errorKind?: AgentErrorKind;
}

// ============================================================================
// 2. Insights & Results
// ============================================================================

export const SEVERITIES = ['critical', 'high', 'medium', 'low', 'info'] as const;

export type Severity = (typeof SEVERITIES)[number];

export type InsightSource = 'synthesis' | 'single-agent' | 'rule-based';

export interface Insight {
  readonly title: string;
  readonly component: string;
  readonly severity: Severity;
  readonly observation: string;
  readonly rootCause: string;
  readonly immediateAction: string;
  /** 0–100 */
  readonly confidence: number;
  readonly contributingAgents: readonly string[];
  readonly source: InsightSource;
}

export type QualityTier = 'excellent' | 'good' | 'basic' | 'degraded';

export type ConsolidationPath = 'synthesis' | 'single-agent' | 'rule-based';

export interface ConsolidatedResult {
  readonly insights: readonly Insight[];
  readonly participatingAgents: number;
  readonly consensusScore: number;
  readonly qualityTier: QualityTier;
  /** Wall-clock duration of the pipeline run, in ms */
  readonly executionTime: number;
}

// ============================================================================
// 3. Configuration
// ============================================================================

export type SeverityWeights = Readonly<Record<Severity, number>>;

export interface QualityThresholds {
  /** Minimum successes before a synthesis call is attempted */
  quorum: number;
  /** Minimum successes for `good`; defaults to 4 */
  goodMinAgents: number;
  /** Minimum successes for `excellent`; undefined means every profile */
  excellentMinAgents?: number;
}

export interface TierConfidence {
  excellent: number;
  good: number;
  basic: number;
  /** Ceiling for single-agent and rule-based Insights, below `basic` */
  degradedCap: number;
  singleAgent: number;
  ruleBased: number;
}

export interface ScoringWeights {
  severity: SeverityWeights;
  diversityBonus: number;
  severityBonus: number;
}

export interface AnalysisConfig {
  agentTimeoutMs: number;
  globalDeadlineMs: number;
  synthesisTimeoutMs: number;
  thresholds: QualityThresholds;
  confidence: TierConfidence;
  scoring: ScoringWeights;
  cache: {
    ttlMs: number;
    maxSize: number;
  };
  history: {
    /** Completed runs kept for insight queries */
    maxSessions: number;
  };
}
