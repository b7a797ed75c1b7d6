/**
 * Analysis Routes
 *
 * POST   /          run (or reuse) a multi-agent analysis of one snapshot
 * GET    /latest    most recent completed analysis (?hostname=)
 * GET    /insights  current insights (?severity=&component=&hostname=&limit=)
 * GET    /critical  current critical insights (?hostname=)
 * GET    /summary   insight counts by severity and component (?hostname=)
 * GET    /stats     cache, agent latency and circuit breaker state
 * DELETE /cache     drop cached results
 * POST   /circuits/reset  close every LLM circuit breaker
 */

import { Hono } from 'hono';
import type { Context } from 'hono';
import { z } from 'zod';
import { logger } from '../lib/logger';
import { handleApiError, handleValidationError, jsonSuccess } from '../lib/error-handler';
import {
  buildActionPlan,
  getAnalysisOrchestrator,
  type PerformanceAnalysisOrchestrator,
} from '../services/analysis';
import { SEVERITIES } from '../services/analysis/types';
import { getAllCircuitStats, resetAllCircuitBreakers } from '../services/resilience/circuit-breaker';

const blankToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const hostQuerySchema = z.object({
  hostname: z.preprocess(blankToUndefined, z.string().trim().optional()),
});

const insightQuerySchema = hostQuerySchema.extend({
  severity: z.preprocess(
    (value) => (typeof value === 'string' ? blankToUndefined(value.trim().toLowerCase()) : value),
    z.enum(SEVERITIES).optional()
  ),
  component: z.preprocess(blankToUndefined, z.string().trim().optional()),
  limit: z.preprocess(blankToUndefined, z.coerce.number().int().min(1).max(1000).default(100)),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
}

export function createAnalysisRouter(
  resolveOrchestrator: () => PerformanceAnalysisOrchestrator = getAnalysisOrchestrator
): Hono {
  const router = new Hono();

  router.post('/', async (c: Context) => {
    let body: unknown;
    try {
      body = await c.req.json<unknown>();
    } catch {
      return handleValidationError(c, 'Request body must be a JSON metrics snapshot');
    }

    try {
      const outcome = await resolveOrchestrator().analyzeDetailed(body);
      logger.info(
        `[Analysis] ${outcome.cache} ${outcome.fingerprint.slice(0, 12)}: ${outcome.result.qualityTier}, score ${outcome.result.consensusScore}`
      );

      return jsonSuccess(c, {
        result: outcome.result,
        actionPlan: buildActionPlan(outcome.result),
        meta: {
          cache: outcome.cache,
          fingerprint: outcome.fingerprint,
          path: outcome.path,
          synthesisAttempts: outcome.synthesisAttempts,
          agents: outcome.agents,
        },
      });
    } catch (error) {
      return handleApiError(c, error, 'POST /api/analysis');
    }
  });

  router.get('/latest', (c: Context) => {
    const query = hostQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      return handleValidationError(c, 'Invalid query', formatIssues(query.error));
    }

    try {
      const session = resolveOrchestrator().history.latest(query.data.hostname);
      if (!session) {
        return jsonSuccess(c, { session: null, message: 'No analysis has completed yet' });
      }
      return jsonSuccess(c, { session, actionPlan: buildActionPlan(session.result) });
    } catch (error) {
      return handleApiError(c, error, 'GET /api/analysis/latest');
    }
  });

  router.get('/insights', (c: Context) => {
    const query = insightQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      return handleValidationError(c, 'Invalid insight query', formatIssues(query.error));
    }

    try {
      const insights = resolveOrchestrator().history.findInsights(query.data);
      return jsonSuccess(c, { total: insights.length, insights });
    } catch (error) {
      return handleApiError(c, error, 'GET /api/analysis/insights');
    }
  });

  router.get('/critical', (c: Context) => {
    const query = hostQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      return handleValidationError(c, 'Invalid query', formatIssues(query.error));
    }

    try {
      const insights = resolveOrchestrator().history.critical(query.data.hostname);
      return jsonSuccess(c, { total: insights.length, insights });
    } catch (error) {
      return handleApiError(c, error, 'GET /api/analysis/critical');
    }
  });

  router.get('/summary', (c: Context) => {
    const query = hostQuerySchema.safeParse(c.req.query());
    if (!query.success) {
      return handleValidationError(c, 'Invalid query', formatIssues(query.error));
    }

    try {
      return jsonSuccess(c, { summary: resolveOrchestrator().history.summary(query.data.hostname) });
    } catch (error) {
      return handleApiError(c, error, 'GET /api/analysis/summary');
    }
  });

  router.get('/stats', (c: Context) => {
    try {
      return jsonSuccess(c, {
        ...resolveOrchestrator().getStats(),
        circuits: getAllCircuitStats(),
      });
    } catch (error) {
      return handleApiError(c, error, 'GET /api/analysis/stats');
    }
  });

  router.delete('/cache', (c: Context) => {
    try {
      resolveOrchestrator().clearCache();
      return jsonSuccess(c, { message: 'Analysis cache cleared' });
    } catch (error) {
      return handleApiError(c, error, 'DELETE /api/analysis/cache');
    }
  });

  router.post('/circuits/reset', (c: Context) => {
    resetAllCircuitBreakers();
    return jsonSuccess(c, { message: 'All circuit breakers reset' });
  });

  return router;
}

export const analysisRouter = createAnalysisRouter();
