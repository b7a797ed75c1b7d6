/**
 * AnalysisContext: immutable host metrics snapshot fed to one analysis run.
 *
 * The producer (collector, exporter, dashboard) is outside this service;
 * anything posted is validated against `analysisContextSchema` and frozen.
 */

import { z } from 'zod';

const percent = z.number().finite().min(0).max(100);

export const resourceMetricsSchema = z
  .object({
    /** Busy time / capacity used, in percent */
    utilization: percent,
    /** Queued work beyond capacity, in percent */
    saturation: percent.default(0),
    /** Error events observed during the sampling interval */
    errors: z.number().finite().min(0).default(0),
  })
  .strict();

export const RESOURCE_NAMES = ['cpu', 'memory', 'disk', 'network'] as const;

export type ResourceName = (typeof RESOURCE_NAMES)[number];

export const analysisContextSchema = z
  .object({
    timestamp: z.string().datetime({ offset: true }),
    hostname: z.string().min(1).optional(),
    resources: z
      .object({
        cpu: resourceMetricsSchema,
        memory: resourceMetricsSchema,
        disk: resourceMetricsSchema,
        network: resourceMetricsSchema,
      })
      .strict(),
    /** Per-device utilization, e.g. `{ disk: { sda: 91 } }` */
    breakdowns: z.record(z.string(), z.record(z.string(), percent)).optional(),
    loadAverage: z.tuple([
      z.number().finite().min(0),
      z.number().finite().min(0),
      z.number().finite().min(0),
    ]),
    cpuCount: z.number().int().positive(),
    processCount: z.number().int().min(0),
    /** Free-form counters such as uptime days or context switches */
    counters: z.record(z.string(), z.number().finite()).optional(),
  })
  .strict();

export type ResourceMetrics = Readonly<z.infer<typeof resourceMetricsSchema>>;

type DeepReadonly<T> = T extends (infer U)[]
  ? ReadonlyArray<DeepReadonly<U>>
  : T extends object
    ? { readonly [K in keyof T]: DeepReadonly<T[K]> }
    : T;

export type AnalysisContextInput = z.input<typeof analysisContextSchema>;
export type AnalysisContext = DeepReadonly<z.infer<typeof analysisContextSchema>>;

function deepFreeze<T>(value: T): T {
  if (typeof value === 'object' && value !== null && !Object.isFrozen(value)) {
    for (const nested of Object.values(value)) {
      deepFreeze(nested);
    }
    Object.freeze(value);
  }
  return value;
}

/**
 * Validate raw input and return a deep-frozen context.
 * Throws the zod error unchanged so the HTTP layer can report issues.
 */
export function createAnalysisContext(input: unknown): AnalysisContext {
  return deepFreeze(analysisContextSchema.parse(input));
}

export function safeCreateAnalysisContext(
  input: unknown
): { success: true; context: AnalysisContext } | { success: false; issues: string[] } {
  const parsed = analysisContextSchema.safeParse(input);
  if (!parsed.success) {
    return {
      success: false,
      issues: parsed.error.issues.map(
        (issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`
      ),
    };
  }
  return { success: true, context: deepFreeze(parsed.data) };
}
