import { describe, expect, it } from 'vitest';

import { ConsolidationParseError } from './errors';
import {
  extractJsonPayload,
  parseSynthesisOutput,
  renderSynthesisPrompt,
} from './synthesis-schema';
import { buildContext, succeeded } from './testing/fixtures';

const insight = {
  title: 'CPU saturation',
  component: 'CPU',
  severity: 'HIGH',
  observation: 'CPU at 95% with 85% saturation',
  root_cause: 'Batch job contention',
  immediate_action: 'Throttle the batch job',
  contributing_agents: ['PerformanceAnalyst'],
};

describe('extractJsonPayload', () => {
  it('unwraps fenced JSON', () => {
    expect(extractJsonPayload('Here you go:\n```json\n{"insights":[]}\n```\nThanks')).toBe(
      '{"insights":[]}'
    );
  });

  it('trims prose around a bare object', () => {
    expect(extractJsonPayload('Sure! {"a":{"b":1}} hope this helps')).toBe('{"a":{"b":1}}');
  });

  it('keeps a top-level array when it comes first', () => {
    expect(extractJsonPayload('Result: [{"x":1}]')).toBe('[{"x":1}]');
  });

  it('returns the text unchanged when there is no JSON', () => {
    expect(extractJsonPayload('  no json here ')).toBe('no json here');
  });
});

describe('parseSynthesisOutput', () => {
  it('normalizes severity and component case', () => {
    const [parsed] = parseSynthesisOutput(JSON.stringify({ insights: [insight] }));

    expect(parsed).toEqual({
      title: 'CPU saturation',
      component: 'cpu',
      severity: 'high',
      observation: 'CPU at 95% with 85% saturation',
      root_cause: 'Batch job contention',
      immediate_action: 'Throttle the batch job',
      contributing_agents: ['PerformanceAnalyst'],
    });
  });

  it('accepts a bare array and defaults contributing agents', () => {
    const { contributing_agents: _omitted, ...withoutAgents } = insight;
    const parsed = parseSynthesisOutput(`[${JSON.stringify(withoutAgents)}]`);

    expect(parsed[0].contributing_agents).toEqual([]);
  });

  it('reports missing required fields with their path', () => {
    const { root_cause: _omitted, ...incomplete } = insight;

    try {
      parseSynthesisOutput(JSON.stringify({ insights: [incomplete] }));
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConsolidationParseError);
      expect(error).toHaveProperty('issues', ['insights.0.root_cause: Required']);
    }
  });

  it('rejects unknown keys, unknown severities and empty lists', () => {
    expect(() =>
      parseSynthesisOutput(JSON.stringify({ insights: [{ ...insight, extra: 1 }] }))
    ).toThrow(ConsolidationParseError);
    expect(() =>
      parseSynthesisOutput(JSON.stringify({ insights: [{ ...insight, severity: 'urgent' }] }))
    ).toThrow(ConsolidationParseError);
    expect(() => parseSynthesisOutput('{"insights":[]}')).toThrow(ConsolidationParseError);
  });

  it('rejects text that is not JSON', () => {
    expect(() => parseSynthesisOutput('The CPU is busy.')).toThrow(
      /^Synthesis response is not valid JSON/
    );
  });
});

describe('renderSynthesisPrompt', () => {
  it('lists every narrative under its agent heading', () => {
    const prompt = renderSynthesisPrompt(
      [
        succeeded('CostOptimizer', 'cost', 'Disk is oversized.'),
        succeeded('PerformanceAnalyst', 'performance', 'CPU is saturated.'),
      ],
      buildContext()
    );

    expect(prompt).toContain('### CostOptimizer (cost)\nDisk is oversized.');
    expect(prompt).toContain('### PerformanceAnalyst (performance)\nCPU is saturated.');
    expect(prompt).toContain('severity is one of: critical, high, medium, low, info');
  });
});
