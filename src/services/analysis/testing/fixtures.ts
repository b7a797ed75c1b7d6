/**
 * Shared test fixtures: metrics snapshots, responses and a scripted LLM.
 */

import {
  createAnalysisContext,
  type AnalysisContext,
  type AnalysisContextInput,
} from '../../../types/analysis-context';
import type { LlmCallOptions, LlmClient } from '../../llm/llm-client';
import type { AgentResponse, AgentRole } from '../types';

export function buildContextInput(overrides: Partial<AnalysisContextInput> = {}): AnalysisContextInput {
  return {
    timestamp: '2026-03-01T10:00:00.000Z',
    hostname: 'web-01',
    resources: {
      cpu: { utilization: 35, saturation: 0, errors: 0 },
      memory: { utilization: 50, saturation: 0, errors: 0 },
      disk: { utilization: 40, saturation: 0, errors: 0 },
      network: { utilization: 20, saturation: 0, errors: 0 },
    },
    loadAverage: [1, 0.8, 0.5],
    cpuCount: 4,
    processCount: 180,
    ...overrides,
  };
}

export function buildContext(overrides: Partial<AnalysisContextInput> = {}): AnalysisContext {
  return createAnalysisContext(buildContextInput(overrides));
}

export function succeeded(agent: string, role: AgentRole, narrative: string): AgentResponse {
  return { agent, role, narrative, durationMs: 100, status: 'succeeded' };
}

export function failed(agent: string, role: AgentRole, reason = 'connection refused'): AgentResponse {
  return {
    agent,
    role,
    narrative: '',
    durationMs: 50,
    status: 'failed',
    failureReason: reason,
    errorKind: 'AgentNetworkError',
  };
}

export function timedOut(agent: string, role: AgentRole, durationMs = 30_000): AgentResponse {
  return {
    agent,
    role,
    narrative: '',
    durationMs,
    status: 'timed-out',
    failureReason: `Agent ${agent} timed out after ${durationMs}ms`,
    errorKind: 'AgentTimeout',
  };
}

type ScriptedReply = string | Error | ((prompt: string, options: LlmCallOptions) => Promise<string>);

/**
 * LlmClient that answers from a queue of replies and records every prompt.
 * An empty queue answers with `fallback`.
 */
export class ScriptedLlmClient implements LlmClient {
  readonly prompts: string[] = [];
  private readonly replies: ScriptedReply[];

  constructor(
    replies: ScriptedReply[] = [],
    private readonly fallback: ScriptedReply = ''
  ) {
    this.replies = [...replies];
  }

  get callCount(): number {
    return this.prompts.length;
  }

  async call(prompt: string, options: LlmCallOptions = {}): Promise<string> {
    this.prompts.push(prompt);
    const reply = this.replies.length > 0 ? this.replies.shift() : this.fallback;
    if (reply === undefined) return '';
    if (reply instanceof Error) throw reply;
    if (typeof reply === 'function') return reply(prompt, options);
    return reply;
  }
}
