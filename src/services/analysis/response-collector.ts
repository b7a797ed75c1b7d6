import type { AgentResponse } from './types';

export interface CollectedResponses {
  readonly successes: readonly AgentResponse[];
  readonly failures: readonly AgentResponse[];
  readonly timeouts: readonly AgentResponse[];
  /** Equals `successes.length` */
  readonly participatingCount: number;
}

const byAgentName = (a: AgentResponse, b: AgentResponse) =>
  a.agent < b.agent ? -1 : a.agent > b.agent ? 1 : 0;

/**
 * Partition dispatcher output by status. Pure and order-insensitive: every
 * bucket is sorted by agent name.
 */
export function collectResponses(responses: readonly AgentResponse[]): CollectedResponses {
  const successes: AgentResponse[] = [];
  const failures: AgentResponse[] = [];
  const timeouts: AgentResponse[] = [];

  for (const response of responses) {
    switch (response.status) {
      case 'succeeded':
        successes.push(response);
        break;
      case 'failed':
        failures.push(response);
        break;
      case 'timed-out':
        timeouts.push(response);
        break;
    }
  }

  successes.sort(byAgentName);
  failures.sort(byAgentName);
  timeouts.sort(byAgentName);

  return {
    successes,
    failures,
    timeouts,
    participatingCount: successes.length,
  };
}
