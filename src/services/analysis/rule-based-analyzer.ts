/**
 * Rule-based USE analysis.
 *
 * Terminal fallback when no agent answered: plain threshold checks over the
 * snapshot. Pure, synchronous, and always returns at least one finding.
 */

import { RESOURCE_NAMES, type AnalysisContext, type ResourceName } from '../../types/analysis-context';
import type { Severity } from './types';

export interface Threshold {
  warning: number;
  critical: number;
}

export interface UseThresholds {
  resources: Record<ResourceName, Threshold>;
  /** 1-minute load average per CPU above which the run queue is saturated */
  loadPerCpu: number;
  processCount: number;
}

export const DEFAULT_USE_THRESHOLDS: UseThresholds = {
  resources: {
    cpu: { warning: 70, critical: 90 },
    memory: { warning: 80, critical: 95 },
    disk: { warning: 60, critical: 85 },
    network: { warning: 70, critical: 90 },
  },
  loadPerCpu: 2,
  processCount: 500,
};

export interface RuleFinding {
  title: string;
  component: string;
  severity: Severity;
  observation: string;
  rootCause: string;
  immediateAction: string;
}

const LABEL: Record<ResourceName, string> = {
  cpu: 'CPU',
  memory: 'Memory',
  disk: 'Disk',
  network: 'Network',
};

const ACTIONS: Record<ResourceName, { utilization: string; saturation: string; errors: string }> = {
  cpu: {
    utilization: 'Identify the top CPU consumers and scale out or optimize hot paths',
    saturation: 'Reduce concurrency or add CPU capacity to drain the run queue',
    errors: 'Check kernel logs for machine check or throttling events',
  },
  memory: {
    utilization: 'Find the largest resident processes and check them for leaks',
    saturation: 'Stop swapping by freeing memory or adding RAM',
    errors: 'Check kernel logs for OOM kills and ECC errors',
  },
  disk: {
    utilization: 'Find the busiest devices and move or archive heavy I/O',
    saturation: 'Reduce queued I/O or move the workload to faster storage',
    errors: 'Check device health (SMART) and filesystem error counters',
  },
  network: {
    utilization: 'Identify top talkers and review bandwidth limits',
    saturation: 'Apply traffic shaping or add bandwidth for queued packets',
    errors: 'Check interface error and drop counters, cabling and driver versions',
  },
};

const fmt = (value: number) => `${Number.isInteger(value) ? value : value.toFixed(1)}%`;

function levelFor(value: number, threshold: Threshold): Severity | null {
  if (value >= threshold.critical) return 'critical';
  if (value >= threshold.warning) return 'high';
  return null;
}

function analyzeResource(
  name: ResourceName,
  context: AnalysisContext,
  threshold: Threshold
): RuleFinding[] {
  const findings: RuleFinding[] = [];
  const { utilization, saturation, errors } = context.resources[name];
  const label = LABEL[name];

  const utilizationLevel = levelFor(utilization, threshold);
  if (utilizationLevel) {
    findings.push({
      title: `${utilizationLevel === 'critical' ? 'Critical' : 'High'} ${label} utilization`,
      component: name,
      severity: utilizationLevel,
      observation: `${label} utilization is ${fmt(utilization)} (warning ${threshold.warning}%, critical ${threshold.critical}%)`,
      rootCause: `${label} demand is ${utilizationLevel === 'critical' ? 'at' : 'approaching'} capacity`,
      immediateAction: ACTIONS[name].utilization,
    });
  }

  const saturationLevel = levelFor(saturation, threshold);
  if (saturationLevel) {
    findings.push({
      title: `${label} saturation`,
      component: name,
      severity: saturationLevel,
      observation: `${label} saturation is ${fmt(saturation)}, work is queueing`,
      rootCause: `More ${label.toLowerCase()} work is arriving than can be served`,
      immediateAction: ACTIONS[name].saturation,
    });
  }

  if (errors > 0) {
    findings.push({
      title: `${label} errors`,
      component: name,
      severity: 'medium',
      observation: `${errors} ${label.toLowerCase()} error event${errors === 1 ? '' : 's'} in the sampling interval`,
      rootCause: `${label} reported errors; cause not determinable from counters alone`,
      immediateAction: ACTIONS[name].errors,
    });
  }

  for (const [device, value] of Object.entries(context.breakdowns?.[name] ?? {})) {
    if (value >= threshold.critical) {
      findings.push({
        title: `Critical ${label.toLowerCase()} utilization on ${device}`,
        component: name,
        severity: 'critical',
        observation: `${label} ${device} utilization is ${fmt(value)}`,
        rootCause: `${device} is at capacity`,
        immediateAction: ACTIONS[name].utilization,
      });
    }
  }

  return findings;
}

export function analyzeUse(
  context: AnalysisContext,
  thresholds: UseThresholds = DEFAULT_USE_THRESHOLDS
): RuleFinding[] {
  const findings = RESOURCE_NAMES.flatMap((name) =>
    analyzeResource(name, context, thresholds.resources[name])
  );

  const loadPerCpu = context.loadAverage[0] / context.cpuCount;
  if (loadPerCpu > thresholds.loadPerCpu) {
    findings.push({
      title: 'Run queue saturation',
      component: 'cpu',
      severity: 'high',
      observation: `1-minute load average ${context.loadAverage[0].toFixed(2)} is ${loadPerCpu.toFixed(2)} per CPU across ${context.cpuCount} CPUs`,
      rootCause: 'More runnable threads than CPUs can schedule',
      immediateAction: ACTIONS.cpu.saturation,
    });
  }

  if (context.processCount > thresholds.processCount) {
    findings.push({
      title: 'High process count',
      component: 'system',
      severity: 'medium',
      observation: `${context.processCount} processes running (threshold ${thresholds.processCount})`,
      rootCause: 'Process churn or leaked workers',
      immediateAction: 'List processes by parent and look for runaway forks or orphaned workers',
    });
  }

  if (findings.length === 0) {
    findings.push({
      title: 'All resources within normal range',
      component: 'system',
      severity: 'info',
      observation: RESOURCE_NAMES.map(
        (name) => `${name} ${fmt(context.resources[name].utilization)}`
      ).join(', '),
      rootCause: 'No USE threshold exceeded',
      immediateAction: 'No action needed; keep monitoring',
    });
  }

  return findings;
}
