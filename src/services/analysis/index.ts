/**
 * Analysis Module
 *
 * Process-wide orchestrator built from environment configuration, plus the
 * public types used by routes and scripts.
 */

import { createChildLogger } from '../../lib/logger';
import { getAnalysisConfig, getLlmConfig } from '../../lib/config-parser';
import { AiSdkLlmClient } from '../llm/ai-sdk-llm-client';
import { getAnalysisModel } from '../llm/model-provider';
import { createOrchestrator, type PerformanceAnalysisOrchestrator } from './orchestrator';

export { buildActionPlan, type ActionPlan } from './action-plan';
export type {
  AnalysisHistory,
  AnalysisSession,
  HostInsight,
  InsightQuery,
  InsightSummary,
} from './analysis-history';
export { InvalidAnalysisContextError, ConfigurationError } from './errors';
export {
  createOrchestrator,
  PerformanceAnalysisOrchestrator,
  type AnalysisRunOutcome,
  type OrchestratorStats,
} from './orchestrator';
export type { ConsolidatedResult, Insight, QualityTier } from './types';

let instance: PerformanceAnalysisOrchestrator | null = null;

/**
 * Lazily wired singleton. Configuration errors surface on first use.
 */
export function getAnalysisOrchestrator(): PerformanceAnalysisOrchestrator {
  if (instance) return instance;

  const llmConfig = getLlmConfig();
  const llm = new AiSdkLlmClient({ model: getAnalysisModel(llmConfig), config: llmConfig });
  instance = createOrchestrator(getAnalysisConfig(), llm, {
    logger: createChildLogger({ module: 'analysis' }),
  });
  return instance;
}

export function resetAnalysisOrchestrator(): void {
  instance = null;
}
