/**
 * AI SDK adapter for the LlmClient port.
 *
 * One `generateText` call per prompt, guarded by the shared circuit breaker
 * for the configured endpoint. Errors are mapped onto the port's two failure
 * types; retries are left to the AI SDK's own `maxRetries`.
 */

import { generateText, type LanguageModel } from 'ai';
import { logger } from '../../lib/logger';
import type { LlmConfig } from '../../lib/config-parser';
import {
  CircuitOpenError,
  CircuitTimeoutError,
  getCircuitBreaker,
  type CircuitBreaker,
} from '../resilience/circuit-breaker';
import { LlmNetworkError, LlmTimeoutError, type LlmCallOptions, type LlmClient } from './llm-client';

export interface AiSdkLlmClientOptions {
  model: LanguageModel;
  config: Pick<LlmConfig, 'baseUrl' | 'model' | 'temperature' | 'maxOutputTokens'>;
  /** Retries inside the SDK for transient HTTP failures (default 1) */
  maxRetries?: number;
  breaker?: CircuitBreaker;
}

function isAbortError(error: unknown): error is Error {
  return error instanceof Error && (error.name === 'AbortError' || error.name === 'TimeoutError');
}

export class AiSdkLlmClient implements LlmClient {
  private readonly breaker: CircuitBreaker;

  constructor(private readonly options: AiSdkLlmClientOptions) {
    this.breaker =
      options.breaker ?? getCircuitBreaker(`llm:${options.config.baseUrl}#${options.config.model}`);
  }

  async call(prompt: string, callOptions: LlmCallOptions = {}): Promise<string> {
    const { model, config, maxRetries = 1 } = this.options;
    const controller = new AbortController();
    const onAbort = () => controller.abort();
    callOptions.signal?.addEventListener('abort', onAbort, { once: true });

    try {
      const result = await this.breaker.execute(
        () =>
          generateText({
            model,
            prompt,
            temperature: config.temperature,
            maxOutputTokens: config.maxOutputTokens,
            maxRetries,
            abortSignal: controller.signal,
          }),
        controller
      );
      return result.text;
    } catch (error) {
      if (error instanceof CircuitTimeoutError || isAbortError(error)) {
        throw new LlmTimeoutError(`LLM call to ${config.model} did not complete: ${error.message}`);
      }
      if (error instanceof CircuitOpenError) {
        throw new LlmNetworkError(error.message, error);
      }

      const message = error instanceof Error ? error.message : String(error);
      logger.debug(`[LLM] ${config.model} call failed: ${message}`);
      throw new LlmNetworkError(message, error);
    } finally {
      callOptions.signal?.removeEventListener('abort', onAbort);
    }
  }
}
