/**
 * Agent Dispatcher
 *
 * Fans one prompt per profile out to the LLM in parallel and returns one
 * AgentResponse per profile, in profile order.
 *
 * - Per-agent timeout is clamped to what is left of the global deadline
 * - A failing agent never aborts its siblings
 * - Agents still pending at the deadline are reported as `timed-out`; their
 *   late answers are logged and dropped
 * - No retries here
 */

import { logger as rootLogger, type Logger } from '../../lib/logger';
import { withTimeout } from '../../lib/with-timeout';
import type { AnalysisContext } from '../../types/analysis-context';
import { LlmTimeoutError, type LlmClient } from '../llm/llm-client';
import { renderAgentPrompt } from './agents/agent-registry';
import {
  AgentError,
  AgentMalformedResponseError,
  AgentNetworkError,
  AgentTimeoutError,
  getErrorMessage,
} from './errors';
import { LatencyTracker } from './latency-tracker';
import type { AgentProfile, AgentResponse } from './types';

export interface AgentDispatcherOptions {
  llm: LlmClient;
  agentTimeoutMs: number;
  latency?: LatencyTracker;
  logger?: Logger;
}

export class AgentDispatcher {
  readonly latency: LatencyTracker;
  private readonly llm: LlmClient;
  private readonly agentTimeoutMs: number;
  private readonly logger: Logger;

  constructor(options: AgentDispatcherOptions) {
    this.llm = options.llm;
    this.agentTimeoutMs = options.agentTimeoutMs;
    this.latency = options.latency ?? new LatencyTracker();
    this.logger = options.logger ?? rootLogger;
  }

  async dispatch(
    context: AnalysisContext,
    profiles: readonly AgentProfile[],
    globalDeadlineMs: number,
    log: Logger = this.logger
  ): Promise<AgentResponse[]> {
    const startedAt = Date.now();
    const slots: (AgentResponse | undefined)[] = profiles.map(() => undefined);
    const controllers = profiles.map(() => new AbortController());
    let closed = false;

    const tasks = profiles.map(async (profile, index) => {
      const remaining = globalDeadlineMs - (Date.now() - startedAt);
      const timeoutMs = Math.max(0, Math.min(this.agentTimeoutMs, remaining));
      const response = await this.callAgent(profile, context, timeoutMs, controllers[index]);

      if (closed) {
        log.debug(
          `[Dispatcher] Late ${response.status} result from ${profile.name} after ${response.durationMs}ms discarded`
        );
        return;
      }
      slots[index] = response;
    });

    let deadlineTimer: ReturnType<typeof setTimeout> | undefined;
    const deadline = new Promise<void>((resolve) => {
      deadlineTimer = setTimeout(resolve, Math.max(0, globalDeadlineMs));
    });

    try {
      await Promise.race([Promise.all(tasks), deadline]);
    } finally {
      if (deadlineTimer !== undefined) clearTimeout(deadlineTimer);
      closed = true;
    }

    const elapsed = Date.now() - startedAt;
    const responses = profiles.map((profile, index): AgentResponse => {
      const response = slots[index];
      if (response) return response;

      controllers[index].abort();
      return {
        agent: profile.name,
        role: profile.role,
        narrative: '',
        durationMs: elapsed,
        status: 'timed-out',
        failureReason: `Global deadline of ${globalDeadlineMs}ms elapsed`,
        errorKind: 'AgentTimeout',
      };
    });

    for (const response of responses) {
      const tier = this.latency.record(response.agent, response.durationMs, response.status);
      if (response.status !== 'succeeded') {
        log.warn(`[Dispatcher] ${response.agent} ${response.status}: ${response.failureReason}`);
      } else if (tier === 'slow' || tier === 'very_slow') {
        log.info(`[Dispatcher] ${response.agent} answered slowly (${response.durationMs}ms)`);
      }
    }

    return responses;
  }

  /**
   * Never rejects: every outcome becomes an AgentResponse.
   */
  private async callAgent(
    profile: AgentProfile,
    context: AnalysisContext,
    timeoutMs: number,
    controller: AbortController
  ): Promise<AgentResponse> {
    const startedAt = Date.now();
    const base = { agent: profile.name, role: profile.role } as const;

    try {
      const prompt = renderAgentPrompt(profile, context);
      const narrative = await withTimeout(
        this.llm.call(prompt, { signal: controller.signal }),
        timeoutMs,
        (ms) => new AgentTimeoutError(profile.name, ms),
        controller
      );

      if (typeof narrative !== 'string' || narrative.trim() === '') {
        throw new AgentMalformedResponseError(profile.name, 'empty answer');
      }

      return {
        ...base,
        narrative: narrative.trim(),
        durationMs: Date.now() - startedAt,
        status: 'succeeded',
      };
    } catch (error) {
      const agentError = toAgentError(profile.name, timeoutMs, error);
      return {
        ...base,
        narrative: '',
        durationMs: Date.now() - startedAt,
        status: agentError.kind === 'AgentTimeout' ? 'timed-out' : 'failed',
        failureReason: agentError.message,
        errorKind: agentError.kind,
      };
    }
  }
}

function toAgentError(agent: string, timeoutMs: number, error: unknown): AgentError {
  if (error instanceof AgentError) return error;
  if (error instanceof LlmTimeoutError) return new AgentTimeoutError(agent, timeoutMs);
  return new AgentNetworkError(agent, getErrorMessage(error));
}
