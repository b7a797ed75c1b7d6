/**
 * Narrative Segmenter
 *
 * Turns one agent's free-text answer into Insight fields without an LLM.
 * Labelled lines (`Title:`, `Severity:` ...) win; anything missing is
 * filled from keyword heuristics over the whole text.
 */

import { SEVERITIES, type AgentResponse, type AgentRole, type Severity } from './types';

export interface SegmentedNarrative {
  title: string;
  component: string;
  severity: Severity;
  observation: string;
  rootCause: string;
  immediateAction: string;
}

type Field = keyof SegmentedNarrative;

const LABELS: ReadonlyArray<[RegExp, Field]> = [
  [/^title$/, 'title'],
  [/^(component|resource)$/, 'component'],
  [/^(severity|priority)$/, 'severity'],
  [/^(observation|finding|evidence)$/, 'observation'],
  [/^(root[ _-]?cause|cause)$/, 'rootCause'],
  [/^(immediate[ _-]?action|action|recommendation)$/, 'immediateAction'],
];

// "**Root cause:** text", "- Severity: high", "## Title: CPU saturation"
const LABELLED_LINE = /^[\s>#*_-]*([A-Za-z][A-Za-z _-]{1,30}?)[*_\s]*:[*_\s]*(.*)$/;

const COMPONENT_KEYWORDS: ReadonlyArray<[RegExp, string]> = [
  [/\b(cpu|load average|run queue|context switch)/i, 'cpu'],
  [/\b(memory|ram|swap|oom)/i, 'memory'],
  [/\b(disk|i\/o|iops|storage|filesystem)/i, 'disk'],
  [/\b(network|bandwidth|packet|nic|latency)/i, 'network'],
];

const ROLE_COMPONENT: Record<AgentRole, string> = {
  performance: 'system',
  infrastructure: 'system',
  security: 'security',
  cost: 'cost',
  reliability: 'system',
};

const ACTION_HINT =
  /^(check|review|investigate|increase|reduce|scale|add|remove|restart|tune|limit|enable|disable|monitor|identify|optimi[sz]e|upgrade|move|set|consider)\b/i;

const MAX_TITLE_LENGTH = 80;

function matchField(label: string): Field | undefined {
  const normalized = label.trim().toLowerCase();
  return LABELS.find(([pattern]) => pattern.test(normalized))?.[1];
}

function stripMarkup(line: string): string {
  return line.replace(/^[\s>#*_-]+/, '').replace(/[*_`]+/g, '').trim();
}

function truncate(value: string, max: number): string {
  return value.length <= max ? value : `${value.slice(0, max - 3).trimEnd()}...`;
}

function parseSeverity(value: string): Severity | undefined {
  const lower = value.toLowerCase();
  return SEVERITIES.find((severity) => lower.includes(severity));
}

function inferSeverity(text: string): Severity {
  const lower = text.toLowerCase();
  if (/\b(critical|outage|exhausted|severe)\b/.test(lower)) return 'critical';
  if (/\b(high|saturat\w*|bottleneck|degrad\w*)\b/.test(lower)) return 'high';
  if (/\b(medium|moderate|elevated|warning)\b/.test(lower)) return 'medium';
  if (/\b(low|minor)\b/.test(lower)) return 'low';
  return 'info';
}

function inferComponent(text: string, role: AgentRole): string {
  return COMPONENT_KEYWORDS.find(([pattern]) => pattern.test(text))?.[1] ?? ROLE_COMPONENT[role];
}

/**
 * Label-driven extraction with keyword fallbacks. Continuation lines after
 * a label are appended to that label's value.
 */
export function segmentNarrative(response: Pick<AgentResponse, 'agent' | 'role' | 'narrative'>): SegmentedNarrative {
  const labelled: Partial<Record<Field, string>> = {};
  const unlabelled: string[] = [];
  let current: Field | undefined;

  for (const rawLine of response.narrative.split(/\r?\n/)) {
    if (rawLine.trim() === '') {
      current = undefined;
      continue;
    }

    const match = rawLine.match(LABELLED_LINE);
    const field = match ? matchField(match[1]) : undefined;
    if (match && field) {
      const value = stripMarkup(match[2]);
      labelled[field] = labelled[field] ? `${labelled[field]} ${value}`.trim() : value;
      current = field;
      continue;
    }

    const line = stripMarkup(rawLine);
    if (!line) continue;
    if (current) {
      labelled[current] = `${labelled[current] ?? ''} ${line}`.trim();
    } else {
      unlabelled.push(line);
    }
  }

  const text = response.narrative;
  const severity =
    (labelled.severity ? parseSeverity(labelled.severity) : undefined) ?? inferSeverity(text);
  const actionLine = unlabelled.find((line) => ACTION_HINT.test(line));
  const title = truncate(
    labelled.title || unlabelled[0] || `Finding from ${response.agent}`,
    MAX_TITLE_LENGTH
  );

  return {
    title,
    component: (labelled.component || inferComponent(text, response.role)).toLowerCase(),
    severity,
    observation: labelled.observation || unlabelled.join(' ') || title,
    rootCause: labelled.rootCause || 'Not identified by the agent',
    immediateAction:
      labelled.immediateAction || actionLine || `Review the full analysis from ${response.agent}`,
  };
}
