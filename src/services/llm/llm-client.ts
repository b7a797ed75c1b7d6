/**
 * Language model port.
 *
 * The orchestration core only needs "prompt in, text out". Transport,
 * authentication and model selection live in the adapter.
 */

export interface LlmCallOptions {
  /** Aborted when the caller stops waiting; adapters may ignore it */
  signal?: AbortSignal;
}

export interface LlmClient {
  call(prompt: string, options?: LlmCallOptions): Promise<string>;
}

export class LlmNetworkError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'LlmNetworkError';
  }
}

export class LlmTimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'LlmTimeoutError';
  }
}
