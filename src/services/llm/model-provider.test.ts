import { beforeEach, describe, expect, it, vi } from 'vitest';

const { createOpenAIMock } = vi.hoisted(() => ({
  createOpenAIMock: vi.fn((settings: { baseURL: string }) => ({
    chat: (modelId: string) => ({ provider: settings.baseURL, modelId }),
  })),
}));

vi.mock('@ai-sdk/openai', () => ({ createOpenAI: createOpenAIMock }));

import type { LlmConfig } from '../../lib/config-parser';
import { getAnalysisModel, resetModelProvider } from './model-provider';

const config: LlmConfig = {
  baseUrl: 'http://localhost:11434/v1',
  apiKey: 'test-key',
  model: 'llama3.1',
  temperature: 0.7,
  maxOutputTokens: 1024,
};

describe('getAnalysisModel', () => {
  beforeEach(() => {
    resetModelProvider();
    createOpenAIMock.mockClear();
  });

  it('creates an OpenAI-compatible chat model for the configured endpoint', () => {
    const model = getAnalysisModel(config);

    expect(createOpenAIMock).toHaveBeenCalledWith({
      baseURL: 'http://localhost:11434/v1',
      apiKey: 'test-key',
      name: 'analysis-llm',
    });
    expect(model).toEqual({ provider: 'http://localhost:11434/v1', modelId: 'llama3.1' });
  });

  it('reuses the provider for the same endpoint and key', () => {
    getAnalysisModel(config);
    getAnalysisModel({ ...config, model: 'qwen2.5' });

    expect(createOpenAIMock).toHaveBeenCalledTimes(1);
  });

  it('creates a new provider when the endpoint changes', () => {
    getAnalysisModel(config);
    getAnalysisModel({ ...config, baseUrl: 'http://llm.internal:8000/v1' });

    expect(createOpenAIMock).toHaveBeenCalledTimes(2);
  });
});
