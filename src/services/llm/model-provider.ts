import { createOpenAI } from '@ai-sdk/openai';
import type { LanguageModel } from 'ai';
import { getLlmConfig, type LlmConfig } from '../../lib/config-parser';

/**
 * OpenAI-compatible chat model (OpenAI, Ollama, vLLM, LM Studio, ...).
 * The provider is created lazily and reused for the process lifetime.
 */
let provider: ReturnType<typeof createOpenAI> | null = null;
let providerKey: string | null = null;

function getProvider(config: LlmConfig): ReturnType<typeof createOpenAI> {
  const key = `${config.baseUrl}|${config.apiKey}`;
  if (provider && providerKey === key) return provider;

  provider = createOpenAI({
    baseURL: config.baseUrl,
    apiKey: config.apiKey,
    name: 'analysis-llm',
  });
  providerKey = key;
  return provider;
}

export function getAnalysisModel(config: LlmConfig = getLlmConfig()): LanguageModel {
  return getProvider(config).chat(config.model);
}

export function resetModelProvider(): void {
  provider = null;
  providerKey = null;
}
