/**
 * Agent Registry
 *
 * Immutable set of specialist profiles, validated once at startup.
 *
 * Architecture:
 * - Personas: imported from ./instructions/
 * - Prompt: persona + rendered metrics block + shared answer layout
 * - Weights: used by the consolidator for single-agent selection and ordering
 */

import type { AnalysisContext } from '../../../types/analysis-context';
import { RESOURCE_NAMES } from '../../../types/analysis-context';
import { ConfigurationError } from '../errors';
import { AGENT_ROLES, type AgentProfile, type AgentRole } from '../types';
import {
  ANSWER_LAYOUT_INSTRUCTIONS,
  COST_INSTRUCTIONS,
  INFRASTRUCTURE_INSTRUCTIONS,
  PERFORMANCE_INSTRUCTIONS,
  RELIABILITY_INSTRUCTIONS,
  SECURITY_INSTRUCTIONS,
} from './instructions';

// ============================================================================
// 1. Default Profiles
// ============================================================================

export const DEFAULT_AGENT_PROFILES: readonly AgentProfile[] = [
  {
    name: 'PerformanceAnalyst',
    role: 'performance',
    instructions: PERFORMANCE_INSTRUCTIONS,
    weight: 1.0,
  },
  {
    name: 'ReliabilityEngineer',
    role: 'reliability',
    instructions: RELIABILITY_INSTRUCTIONS,
    weight: 0.9,
  },
  {
    name: 'InfrastructureExpert',
    role: 'infrastructure',
    instructions: INFRASTRUCTURE_INSTRUCTIONS,
    weight: 0.85,
  },
  {
    name: 'SecurityAnalyst',
    role: 'security',
    instructions: SECURITY_INSTRUCTIONS,
    weight: 0.75,
  },
  {
    name: 'CostOptimizer',
    role: 'cost',
    instructions: COST_INSTRUCTIONS,
    weight: 0.7,
  },
];

// ============================================================================
// 2. Registry
// ============================================================================

export interface AgentRegistry {
  readonly profiles: readonly AgentProfile[];
  /** Number of distinct roles among the profiles */
  readonly totalRoles: number;
  roleOf(name: string): AgentRole | undefined;
  /** 0 for unknown agents */
  weightOf(name: string): number;
}

const KNOWN_ROLES: ReadonlySet<string> = new Set(AGENT_ROLES);

function validateProfile(profile: AgentProfile, index: number): void {
  const label = profile.name ? `"${profile.name}"` : `#${index}`;

  if (!profile.name || profile.name.trim() === '') {
    throw new ConfigurationError(`Agent profile ${label} has an empty name`);
  }
  if (!KNOWN_ROLES.has(profile.role)) {
    throw new ConfigurationError(`Agent profile ${label} has unknown role "${profile.role}"`);
  }
  if (!Number.isFinite(profile.weight) || profile.weight <= 0) {
    throw new ConfigurationError(
      `Agent profile ${label} must have a positive weight (got ${profile.weight})`
    );
  }
  if (profile.instructions.trim() === '') {
    throw new ConfigurationError(`Agent profile ${label} has empty instructions`);
  }
}

export function createAgentRegistry(
  profiles: readonly AgentProfile[] = DEFAULT_AGENT_PROFILES
): AgentRegistry {
  if (profiles.length === 0) {
    throw new ConfigurationError('Agent registry requires at least one profile');
  }

  const byName = new Map<string, AgentProfile>();
  profiles.forEach((profile, index) => {
    validateProfile(profile, index);
    if (byName.has(profile.name)) {
      throw new ConfigurationError(`Duplicate agent profile name "${profile.name}"`);
    }
    byName.set(profile.name, Object.freeze({ ...profile }));
  });

  const frozen = Object.freeze([...byName.values()]);
  const totalRoles = new Set(frozen.map((profile) => profile.role)).size;

  return Object.freeze({
    profiles: frozen,
    totalRoles,
    roleOf: (name: string) => byName.get(name)?.role,
    weightOf: (name: string) => byName.get(name)?.weight ?? 0,
  });
}

// ============================================================================
// 3. Prompt Rendering
// ============================================================================

const CONTEXT_PLACEHOLDER = '{{context}}';

function pct(value: number): string {
  return `${value.toFixed(1)}%`;
}

/**
 * Plain-text metrics block shared by every agent prompt.
 */
export function renderContext(context: AnalysisContext): string {
  const lines: string[] = [`timestamp: ${context.timestamp}`];
  if (context.hostname) lines.push(`host: ${context.hostname}`);

  for (const name of RESOURCE_NAMES) {
    const metrics = context.resources[name];
    lines.push(
      `${name}: utilization ${pct(metrics.utilization)}, saturation ${pct(metrics.saturation)}, errors ${metrics.errors}`
    );
  }

  const [load1, load5, load15] = context.loadAverage;
  lines.push(
    `load average: ${load1.toFixed(2)} / ${load5.toFixed(2)} / ${load15.toFixed(2)} (${context.cpuCount} CPUs)`
  );
  lines.push(`processes: ${context.processCount}`);

  for (const [resource, devices] of Object.entries(context.breakdowns ?? {})) {
    const rendered = Object.entries(devices)
      .map(([device, value]) => `${device} ${pct(value)}`)
      .join(', ');
    if (rendered) lines.push(`${resource} devices: ${rendered}`);
  }

  const counters = Object.entries(context.counters ?? {});
  if (counters.length > 0) {
    lines.push(`counters: ${counters.map(([key, value]) => `${key}=${value}`).join(', ')}`);
  }

  return lines.join('\n');
}

export function renderAgentPrompt(profile: AgentProfile, context: AnalysisContext): string {
  const metrics = renderContext(context);
  const persona = profile.instructions.includes(CONTEXT_PLACEHOLDER)
    ? profile.instructions.split(CONTEXT_PLACEHOLDER).join(metrics)
    : `${profile.instructions}\n\n## Metrics snapshot\n${metrics}`;

  return `${persona}\n\n${ANSWER_LAYOUT_INSTRUCTIONS}`;
}
