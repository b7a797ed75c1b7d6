/**
 * Environment Configuration Parser
 *
 * Reads process.env once, validates with zod and caches the result.
 * Invalid values raise ConfigurationError at startup, never per request.
 */

import { z } from 'zod';
import { ConfigurationError } from '../services/analysis/errors';
import type { AnalysisConfig, Severity, SeverityWeights } from '../services/analysis/types';

// ============================================================================
// 1. Defaults
// ============================================================================

export const DEFAULT_SEVERITY_WEIGHTS: SeverityWeights = {
  critical: 1.5,
  high: 1.2,
  medium: 1.0,
  low: 0.8,
  info: 0.5,
};

export const DEFAULT_ANALYSIS_CONFIG: AnalysisConfig = {
  agentTimeoutMs: 30_000,
  globalDeadlineMs: 45_000,
  synthesisTimeoutMs: 30_000,
  thresholds: {
    quorum: 2,
    goodMinAgents: 4,
    excellentMinAgents: undefined,
  },
  confidence: {
    excellent: 95,
    good: 88,
    basic: 80,
    degradedCap: 79,
    singleAgent: 70,
    ruleBased: 65,
  },
  scoring: {
    severity: DEFAULT_SEVERITY_WEIGHTS,
    diversityBonus: 15,
    severityBonus: 10,
  },
  cache: {
    ttlMs: 300_000,
    maxSize: 500,
  },
  history: {
    maxSessions: 50,
  },
};

// ============================================================================
// 2. Schemas
// ============================================================================

function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

function intVar(defaultValue: number, min = 1) {
  return z.preprocess(blankToUndefined, z.coerce.number().int().min(min).default(defaultValue));
}

function optionalIntVar(min = 1) {
  return z.preprocess(blankToUndefined, z.coerce.number().int().min(min).optional());
}

function numberVar(defaultValue: number, min = 0) {
  return z.preprocess(blankToUndefined, z.coerce.number().finite().min(min).default(defaultValue));
}

const weight = z.number().finite().min(0).optional();

const severityWeightsSchema = z
  .object({
    critical: weight,
    high: weight,
    medium: weight,
    low: weight,
    info: weight,
  })
  .strict();

const severityWeightsVar = z.preprocess((value) => {
  const raw = blankToUndefined(value);
  if (typeof raw !== 'string') return raw;
  try {
    return JSON.parse(raw);
  } catch {
    return raw;
  }
}, severityWeightsSchema.optional());

const analysisEnvSchema = z.object({
  ANALYSIS_AGENT_TIMEOUT_MS: intVar(DEFAULT_ANALYSIS_CONFIG.agentTimeoutMs),
  ANALYSIS_GLOBAL_DEADLINE_MS: intVar(DEFAULT_ANALYSIS_CONFIG.globalDeadlineMs),
  ANALYSIS_SYNTHESIS_TIMEOUT_MS: intVar(DEFAULT_ANALYSIS_CONFIG.synthesisTimeoutMs),
  ANALYSIS_QUORUM: intVar(DEFAULT_ANALYSIS_CONFIG.thresholds.quorum),
  ANALYSIS_GOOD_MIN_AGENTS: intVar(DEFAULT_ANALYSIS_CONFIG.thresholds.goodMinAgents),
  ANALYSIS_EXCELLENT_MIN_AGENTS: optionalIntVar(),
  ANALYSIS_CACHE_TTL_MS: intVar(DEFAULT_ANALYSIS_CONFIG.cache.ttlMs),
  ANALYSIS_CACHE_MAX_SIZE: intVar(DEFAULT_ANALYSIS_CONFIG.cache.maxSize),
  ANALYSIS_HISTORY_SIZE: intVar(DEFAULT_ANALYSIS_CONFIG.history.maxSessions),
  ANALYSIS_SEVERITY_WEIGHTS: severityWeightsVar,
  ANALYSIS_DIVERSITY_BONUS_WEIGHT: numberVar(DEFAULT_ANALYSIS_CONFIG.scoring.diversityBonus),
  ANALYSIS_SEVERITY_BONUS_WEIGHT: numberVar(DEFAULT_ANALYSIS_CONFIG.scoring.severityBonus),
});

const llmEnvSchema = z.object({
  LLM_BASE_URL: z.preprocess(
    blankToUndefined,
    z.string().url().default('http://localhost:11434/v1')
  ),
  LLM_API_KEY: z.preprocess(blankToUndefined, z.string().default('ollama')),
  LLM_MODEL: z.preprocess(blankToUndefined, z.string().min(1).default('llama3.1')),
  LLM_TEMPERATURE: numberVar(0.7),
  LLM_MAX_OUTPUT_TOKENS: intVar(1024),
});

const serverEnvSchema = z.object({
  PORT: intVar(8080),
  API_SECRET: z.preprocess(blankToUndefined, z.string().min(8).optional()),
  ALLOWED_ORIGINS: z.preprocess(blankToUndefined, z.string().optional()),
});

export interface LlmConfig {
  baseUrl: string;
  apiKey: string;
  model: string;
  temperature: number;
  maxOutputTokens: number;
}

export interface ServerConfig {
  port: number;
  apiSecret: string | null;
  allowedOrigins: string[];
}

// ============================================================================
// 3. Cached accessors
// ============================================================================

let analysisConfigCache: AnalysisConfig | null = null;
let llmConfigCache: LlmConfig | null = null;
let serverConfigCache: ServerConfig | null = null;

function mergeSeverityWeights(
  overrides: Partial<Record<Severity, number>> = {}
): SeverityWeights {
  const base = DEFAULT_SEVERITY_WEIGHTS;
  return {
    critical: overrides.critical ?? base.critical,
    high: overrides.high ?? base.high,
    medium: overrides.medium ?? base.medium,
    low: overrides.low ?? base.low,
    info: overrides.info ?? base.info,
  };
}

function parseEnv<T extends z.ZodTypeAny>(schema: T, section: string): z.output<T> {
  const parsed = schema.safeParse(process.env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigurationError(`Invalid ${section} configuration: ${issues}`);
  }
  return parsed.data;
}

export function getAnalysisConfig(): AnalysisConfig {
  if (analysisConfigCache) return analysisConfigCache;

  const env = parseEnv(analysisEnvSchema, 'analysis');
  const defaults = DEFAULT_ANALYSIS_CONFIG;

  analysisConfigCache = {
    agentTimeoutMs: env.ANALYSIS_AGENT_TIMEOUT_MS,
    globalDeadlineMs: env.ANALYSIS_GLOBAL_DEADLINE_MS,
    synthesisTimeoutMs: env.ANALYSIS_SYNTHESIS_TIMEOUT_MS,
    thresholds: {
      quorum: env.ANALYSIS_QUORUM,
      goodMinAgents: env.ANALYSIS_GOOD_MIN_AGENTS,
      excellentMinAgents: env.ANALYSIS_EXCELLENT_MIN_AGENTS,
    },
    confidence: { ...defaults.confidence },
    scoring: {
      severity: mergeSeverityWeights(env.ANALYSIS_SEVERITY_WEIGHTS),
      diversityBonus: env.ANALYSIS_DIVERSITY_BONUS_WEIGHT,
      severityBonus: env.ANALYSIS_SEVERITY_BONUS_WEIGHT,
    },
    cache: {
      ttlMs: env.ANALYSIS_CACHE_TTL_MS,
      maxSize: env.ANALYSIS_CACHE_MAX_SIZE,
    },
    history: {
      maxSessions: env.ANALYSIS_HISTORY_SIZE,
    },
  };

  return analysisConfigCache;
}

export function getLlmConfig(): LlmConfig {
  if (llmConfigCache) return llmConfigCache;

  const env = parseEnv(llmEnvSchema, 'LLM');
  llmConfigCache = {
    baseUrl: env.LLM_BASE_URL,
    apiKey: env.LLM_API_KEY,
    model: env.LLM_MODEL,
    temperature: env.LLM_TEMPERATURE,
    maxOutputTokens: env.LLM_MAX_OUTPUT_TOKENS,
  };
  return llmConfigCache;
}

export function getServerConfig(): ServerConfig {
  if (serverConfigCache) return serverConfigCache;

  const env = parseEnv(serverEnvSchema, 'server');
  serverConfigCache = {
    port: env.PORT,
    apiSecret: env.API_SECRET ?? null,
    allowedOrigins: env.ALLOWED_ORIGINS
      ? env.ALLOWED_ORIGINS.split(',').map((origin) => origin.trim()).filter(Boolean)
      : [],
  };
  return serverConfigCache;
}

/**
 * Non-secret view of the active configuration for /health.
 */
export function getConfigStatus() {
  const llm = getLlmConfig();
  const analysis = getAnalysisConfig();

  return {
    llm: {
      baseUrl: llm.baseUrl,
      model: llm.model,
      apiKeyConfigured: llm.apiKey.length > 0,
    },
    analysis: {
      agentTimeoutMs: analysis.agentTimeoutMs,
      globalDeadlineMs: analysis.globalDeadlineMs,
      quorum: analysis.thresholds.quorum,
      goodMinAgents: analysis.thresholds.goodMinAgents,
      cacheTtlMs: analysis.cache.ttlMs,
    },
    apiSecretConfigured: getServerConfig().apiSecret !== null,
  };
}

export function clearConfigCache(): void {
  analysisConfigCache = null;
  llmConfigCache = null;
  serverConfigCache = null;
}
