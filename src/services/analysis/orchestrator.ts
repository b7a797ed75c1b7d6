/**
 * Performance Analysis Orchestrator
 *
 * validate → cache.getOrRun(context, runPipeline)
 * runPipeline: dispatch → collect → consolidate → score → record in history
 *
 * Built once at startup by `createOrchestrator`; per-agent and synthesis
 * failures end up in the result's tier, never as a rejection.
 */

import { logger as rootLogger, type Logger } from '../../lib/logger';
import {
  safeCreateAnalysisContext,
  type AnalysisContext,
} from '../../types/analysis-context';
import type { LlmClient } from '../llm/llm-client';
import { createAgentRegistry, type AgentRegistry } from './agents/agent-registry';
import { AnalysisHistory, UNNAMED_HOST } from './analysis-history';
import { createConsensusScorer, type ConsensusScorer } from './consensus-scorer';
import { Consolidator } from './consolidator';
import { AgentDispatcher } from './dispatcher';
import { ConfigurationError, InvalidAnalysisContextError } from './errors';
import type { AgentLatencyStats } from './latency-tracker';
import { collectResponses } from './response-collector';
import {
  SingleFlightCache,
  type CacheStatus,
  type RunMeta,
  type SingleFlightCacheStats,
} from './single-flight-cache';
import type {
  AgentProfile,
  AgentStatus,
  AnalysisConfig,
  ConsolidatedResult,
  ConsolidationPath,
} from './types';

// ============================================================================
// 1. Types
// ============================================================================

export interface AgentOutcomeSummary {
  agent: string;
  status: AgentStatus;
  durationMs: number;
  failureReason?: string;
}

/** What one pipeline run leaves in the cache */
export interface AnalysisRun {
  readonly result: ConsolidatedResult;
  readonly path: ConsolidationPath;
  readonly synthesisAttempts: number;
  readonly agents: readonly AgentOutcomeSummary[];
}

export interface AnalysisRunOutcome extends AnalysisRun {
  readonly cache: CacheStatus;
  readonly fingerprint: string;
}

export interface OrchestratorStats {
  cache: SingleFlightCacheStats;
  latency: Record<string, AgentLatencyStats>;
  history: { sessions: number; maxSessions: number };
}

export interface OrchestratorOptions {
  profiles?: readonly AgentProfile[];
  logger?: Logger;
  /** Clock for cache expiry and session timestamps */
  now?: () => number;
}

interface OrchestratorParts {
  config: AnalysisConfig;
  registry: AgentRegistry;
  dispatcher: AgentDispatcher;
  consolidator: Consolidator;
  scorer: ConsensusScorer;
  cache: SingleFlightCache<AnalysisRun>;
  history: AnalysisHistory;
  now: () => number;
  logger: Logger;
}

// ============================================================================
// 2. Orchestrator
// ============================================================================

export class PerformanceAnalysisOrchestrator {
  private readonly config: AnalysisConfig;
  private readonly registry: AgentRegistry;
  private readonly dispatcher: AgentDispatcher;
  private readonly consolidator: Consolidator;
  private readonly scorer: ConsensusScorer;
  private readonly cache: SingleFlightCache<AnalysisRun>;
  private readonly now: () => number;
  private readonly logger: Logger;
  /** Completed runs, for insight queries */
  readonly history: AnalysisHistory;

  constructor(parts: OrchestratorParts) {
    this.config = parts.config;
    this.registry = parts.registry;
    this.dispatcher = parts.dispatcher;
    this.consolidator = parts.consolidator;
    this.scorer = parts.scorer;
    this.cache = parts.cache;
    this.history = parts.history;
    this.now = parts.now;
    this.logger = parts.logger;
  }

  /**
   * @throws InvalidAnalysisContextError when `input` is not a valid snapshot
   */
  async analyze(input: unknown): Promise<ConsolidatedResult> {
    const outcome = await this.analyzeDetailed(input);
    return outcome.result;
  }

  async analyzeDetailed(input: unknown): Promise<AnalysisRunOutcome> {
    const parsed = safeCreateAnalysisContext(input);
    if (!parsed.success) {
      throw new InvalidAnalysisContextError(parsed.issues);
    }

    const context = parsed.context;
    const { value, status, fingerprint } = await this.cache.getOrRunDetailed(context, (meta) =>
      this.runPipeline(context, meta)
    );

    return { ...value, cache: status, fingerprint };
  }

  private async runPipeline(context: AnalysisContext, meta: RunMeta): Promise<AnalysisRun> {
    const log = this.logger.child({ fingerprint: meta.fingerprint.slice(0, 12), runId: meta.runId });
    const startedAt = Date.now();
    log.info(`[Orchestrator] Run ${meta.runId} started for ${context.hostname ?? 'unnamed host'}`);

    const responses = await this.dispatcher.dispatch(
      context,
      this.registry.profiles,
      this.config.globalDeadlineMs,
      log
    );
    const collected = collectResponses(responses);
    const outcome = await this.consolidator.consolidate(collected.successes, context, log);

    const result: ConsolidatedResult = Object.freeze({
      insights: outcome.insights,
      participatingAgents: collected.participatingCount,
      consensusScore: this.scorer(outcome.insights),
      qualityTier: outcome.qualityTier,
      executionTime: Date.now() - startedAt,
    });

    log.info(
      {
        participatingAgents: result.participatingAgents,
        failed: collected.failures.length,
        timedOut: collected.timeouts.length,
        qualityTier: result.qualityTier,
        path: outcome.path,
        consensusScore: result.consensusScore,
        executionTime: result.executionTime,
      },
      `[Orchestrator] Run ${meta.runId} finished with ${result.insights.length} insights`
    );

    this.history.record({
      sessionId: `${meta.fingerprint.slice(0, 12)}-${meta.runId}`,
      hostname: context.hostname ?? UNNAMED_HOST,
      fingerprint: meta.fingerprint,
      snapshotAt: context.timestamp,
      completedAt: new Date(this.now()).toISOString(),
      result,
    });

    return Object.freeze({
      result,
      path: outcome.path,
      synthesisAttempts: outcome.synthesisAttempts,
      agents: Object.freeze(
        responses.map(
          (response): AgentOutcomeSummary => ({
            agent: response.agent,
            status: response.status,
            durationMs: response.durationMs,
            ...(response.failureReason ? { failureReason: response.failureReason } : {}),
          })
        )
      ),
    });
  }

  getStats(): OrchestratorStats {
    return {
      cache: this.cache.getStats(),
      latency: this.dispatcher.latency.getStats(),
      history: { sessions: this.history.size, maxSessions: this.config.history.maxSessions },
    };
  }

  clearCache(): void {
    this.cache.clear();
    this.logger.info('[Orchestrator] Result cache cleared');
  }
}

// ============================================================================
// 3. Factory
// ============================================================================

function validateConfig(config: AnalysisConfig, profileCount: number): void {
  const { quorum, goodMinAgents, excellentMinAgents } = config.thresholds;

  if (quorum < 1) {
    throw new ConfigurationError(`Quorum must be at least 1, got ${quorum}`);
  }
  if (quorum > profileCount) {
    throw new ConfigurationError(
      `Quorum (${quorum}) exceeds the number of agent profiles (${profileCount})`
    );
  }
  if (goodMinAgents < quorum) {
    throw new ConfigurationError(
      `goodMinAgents (${goodMinAgents}) must not be below the quorum (${quorum})`
    );
  }
  if (excellentMinAgents !== undefined) {
    if (excellentMinAgents > profileCount) {
      throw new ConfigurationError(
        `excellentMinAgents (${excellentMinAgents}) exceeds the number of agent profiles (${profileCount})`
      );
    }
    if (excellentMinAgents < goodMinAgents) {
      throw new ConfigurationError(
        `excellentMinAgents (${excellentMinAgents}) must not be below goodMinAgents (${goodMinAgents})`
      );
    }
  }
  for (const [name, value] of [
    ['history.maxSessions', config.history.maxSessions],
    ['agentTimeoutMs', config.agentTimeoutMs],
    ['globalDeadlineMs', config.globalDeadlineMs],
    ['synthesisTimeoutMs', config.synthesisTimeoutMs],
  ] as const) {
    if (!(value > 0)) {
      throw new ConfigurationError(`${name} must be positive, got ${value}`);
    }
  }
}

/**
 * Wire every stage once.
 *
 * @throws ConfigurationError for an empty or inconsistent registry or thresholds
 */
export function createOrchestrator(
  config: AnalysisConfig,
  llm: LlmClient,
  options: OrchestratorOptions = {}
): PerformanceAnalysisOrchestrator {
  const registry = createAgentRegistry(options.profiles);
  validateConfig(config, registry.profiles.length);

  const log = options.logger ?? rootLogger;

  log.info(
    `[Orchestrator] ${registry.profiles.length} agents, quorum ${config.thresholds.quorum}, deadline ${config.globalDeadlineMs}ms`
  );

  return new PerformanceAnalysisOrchestrator({
    config,
    registry,
    dispatcher: new AgentDispatcher({ llm, agentTimeoutMs: config.agentTimeoutMs, logger: log }),
    consolidator: new Consolidator({ llm, registry, config, logger: log }),
    scorer: createConsensusScorer({
      weights: config.scoring,
      totalRoles: registry.totalRoles,
      roleOf: registry.roleOf,
    }),
    cache: new SingleFlightCache<AnalysisRun>({
      ttlMs: config.cache.ttlMs,
      maxSize: config.cache.maxSize,
      now: options.now,
      logger: log,
    }),
    history: new AnalysisHistory(config.history.maxSessions),
    now: options.now ?? Date.now,
    logger: log,
  });
}
