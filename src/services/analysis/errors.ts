import type { AgentErrorKind } from './types';

/**
 * Per-agent failures. Recorded on the AgentResponse, never thrown past the
 * dispatcher.
 */
export abstract class AgentError extends Error {
  abstract readonly kind: AgentErrorKind;

  constructor(
    message: string,
    public readonly agent: string
  ) {
    super(message);
  }
}

export class AgentTimeoutError extends AgentError {
  readonly kind = 'AgentTimeout' as const;

  constructor(agent: string, public readonly timeoutMs: number) {
    super(`Agent ${agent} timed out after ${timeoutMs}ms`, agent);
    this.name = 'AgentTimeoutError';
  }
}

export class AgentNetworkError extends AgentError {
  readonly kind = 'AgentNetworkError' as const;

  constructor(agent: string, reason: string) {
    super(`Agent ${agent} call failed: ${reason}`, agent);
    this.name = 'AgentNetworkError';
  }
}

export class AgentMalformedResponseError extends AgentError {
  readonly kind = 'AgentMalformedResponse' as const;

  constructor(agent: string, reason: string) {
    super(`Agent ${agent} returned a malformed response: ${reason}`, agent);
    this.name = 'AgentMalformedResponseError';
  }
}

/**
 * Synthesis output could not be read into the Insight schema.
 */
export class ConsolidationParseError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ConsolidationParseError';
  }
}

/**
 * Metrics snapshot rejected by the context schema. Raised before any agent
 * is dispatched.
 */
export class InvalidAnalysisContextError extends Error {
  constructor(public readonly issues: string[]) {
    super(`Invalid analysis context: ${issues.slice(0, 3).join('; ')}`);
    this.name = 'InvalidAnalysisContextError';
  }
}

/**
 * Invalid setup detected while wiring the engine. The only error class that
 * is meant to stop the process, and only at startup.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
