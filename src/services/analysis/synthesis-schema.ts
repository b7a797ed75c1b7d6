/**
 * Synthesis call: prompt, JSON extraction and strict schema parsing.
 */

import { z } from 'zod';
import { renderContext } from './agents/agent-registry';
import type { AnalysisContext } from '../../types/analysis-context';
import { ConsolidationParseError } from './errors';
import { SEVERITIES, type AgentResponse } from './types';

// ============================================================================
// 1. Schema
// ============================================================================

const text = z.string().trim().min(1);

export const synthesizedInsightSchema = z
  .object({
    title: text,
    component: text.transform((value) => value.toLowerCase()),
    severity: z.preprocess(
      (value) => (typeof value === 'string' ? value.trim().toLowerCase() : value),
      z.enum(SEVERITIES)
    ),
    observation: text,
    root_cause: text,
    immediate_action: text,
    contributing_agents: z.array(z.string().trim().min(1)).default([]),
  })
  .strict();

export const synthesisOutputSchema = z
  .object({
    insights: z.array(synthesizedInsightSchema).min(1),
  })
  .strict();

export type SynthesizedInsight = z.infer<typeof synthesizedInsightSchema>;

// ============================================================================
// 2. Prompt
// ============================================================================

export function renderSynthesisPrompt(
  successes: readonly AgentResponse[],
  context: AnalysisContext
): string {
  const narratives = successes
    .map((response) => `### ${response.agent} (${response.role})\n${response.narrative}`)
    .join('\n\n');

  return `You merge findings from independent performance specialists into one ranked list.

## Metrics snapshot
${renderContext(context)}

## Specialist findings
${narratives}

## Output
Return only a JSON object, no prose and no code fences:
{"insights":[{"title":"...","component":"cpu","severity":"high","observation":"...","root_cause":"...","immediate_action":"...","contributing_agents":["AgentName"]}]}

Rules:
- severity is one of: ${SEVERITIES.join(', ')}
- merge findings that describe the same problem and list every agent that reported it
- contributing_agents only contains names from the headings above
- do not include findings that no specialist reported`;
}

// ============================================================================
// 3. Parsing
// ============================================================================

/**
 * Strip code fences and surrounding prose, keeping the outermost JSON value.
 */
export function extractJsonPayload(raw: string): string {
  const trimmed = raw.trim();
  const fencedMatch = trimmed.match(/```(?:json)?\s*([\s\S]*?)```/i);
  const candidate = fencedMatch ? fencedMatch[1].trim() : trimmed;

  const objectStart = candidate.indexOf('{');
  const arrayStart = candidate.indexOf('[');
  const useArray = arrayStart !== -1 && (objectStart === -1 || arrayStart < objectStart);
  const start = useArray ? arrayStart : objectStart;
  if (start === -1) return candidate;

  const end = candidate.lastIndexOf(useArray ? ']' : '}');
  if (end <= start) return candidate.substring(start).trim();

  return candidate.substring(start, end + 1).trim();
}

/**
 * Parse a synthesis answer. A bare array is accepted as the insight list.
 *
 * @throws ConsolidationParseError when the text is not JSON or fails the schema
 */
export function parseSynthesisOutput(raw: string): SynthesizedInsight[] {
  const payload = extractJsonPayload(raw);
  if (!payload) {
    throw new ConsolidationParseError('Empty synthesis response');
  }

  let json: unknown;
  try {
    json = JSON.parse(payload);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConsolidationParseError(`Synthesis response is not valid JSON: ${reason}`);
  }

  const parsed = synthesisOutputSchema.safeParse(Array.isArray(json) ? { insights: json } : json);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(
      (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
    );
    throw new ConsolidationParseError('Synthesis response failed schema validation', issues);
  }

  return parsed.data.insights;
}
