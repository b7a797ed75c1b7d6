import { describe, expect, it, vi } from 'vitest';

vi.mock('../lib/logger', () => {
  const mockLogger = {
    warn: vi.fn(),
    error: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
    child: () => mockLogger,
  };
  return { logger: mockLogger, createChildLogger: () => mockLogger };
});

import { DEFAULT_ANALYSIS_CONFIG } from '../lib/config-parser';
import { ConfigurationError, createOrchestrator } from '../services/analysis';
import { ScriptedLlmClient, buildContextInput } from '../services/analysis/testing/fixtures';
import { createAnalysisRouter } from './analysis';

const synthesis = JSON.stringify({
  insights: [
    {
      title: 'Disk nearly full',
      component: 'disk',
      severity: 'critical',
      observation: '/var at 97%',
      root_cause: 'Log rotation disabled',
      immediate_action: 'Rotate and compress logs under /var/log',
      contributing_agents: ['PerformanceAnalyst', 'ReliabilityEngineer'],
    },
  ],
});

function setup() {
  const llm = new ScriptedLlmClient([], 'Title: Disk nearly full\nSeverity: critical');
  const config = { ...DEFAULT_ANALYSIS_CONFIG, agentTimeoutMs: 100, globalDeadlineMs: 200 };
  const orchestrator = createOrchestrator(config, {
    call: (prompt, options) =>
      prompt.startsWith('You merge findings') ? Promise.resolve(synthesis) : llm.call(prompt, options),
  });
  return { router: createAnalysisRouter(() => orchestrator), llm };
}

function post(router: ReturnType<typeof createAnalysisRouter>, body: string) {
  return router.request('/', {
    method: 'POST',
    headers: { 'Content-Type': 'application/json' },
    body,
  });
}

describe('analysis routes', () => {
  it('returns the result, an action plan and run metadata', async () => {
    const { router } = setup();

    const res = await post(router, JSON.stringify(buildContextInput()));

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      success: true,
      result: {
        qualityTier: 'excellent',
        participatingAgents: 5,
        insights: [{ title: 'Disk nearly full', severity: 'critical', confidence: 95 }],
      },
      actionPlan: {
        recommendations: expect.arrayContaining(['Rotate and compress logs under /var/log']),
        nextSteps: expect.arrayContaining(['Address 1 critical issue immediately']),
      },
      meta: {
        cache: 'miss',
        path: 'synthesis',
        synthesisAttempts: 1,
        agents: expect.arrayContaining([
          expect.objectContaining({ agent: 'CostOptimizer', status: 'succeeded' }),
        ]),
      },
    });
  });

  it('serves a repeated snapshot from cache', async () => {
    const { router, llm } = setup();
    const snapshot = JSON.stringify(buildContextInput());

    await post(router, snapshot);
    const res = await post(router, snapshot);

    expect(await res.json()).toMatchObject({ meta: { cache: 'hit' } });
    expect(llm.callCount).toBe(5);
  });

  it('rejects a body that is not JSON', async () => {
    const { router } = setup();

    const res = await post(router, 'cpu=95');

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({ code: 'VALIDATION_ERROR' });
  });

  it('reports schema issues for an invalid snapshot', async () => {
    const { router, llm } = setup();

    const res = await post(router, JSON.stringify({ ...buildContextInput(), cpuCount: 0 }));

    expect(res.status).toBe(400);
    expect(await res.json()).toMatchObject({
      code: 'VALIDATION_ERROR',
      details: ['cpuCount: Number must be greater than 0'],
    });
    expect(llm.callCount).toBe(0);
  });

  it('reports that no analysis has completed yet', async () => {
    const { router } = setup();

    const res = await router.request('/latest');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      success: true,
      session: null,
      message: 'No analysis has completed yet',
    });
  });

  it('returns the latest completed analysis with its action plan', async () => {
    const { router } = setup();
    await post(router, JSON.stringify(buildContextInput()));

    const res = await router.request('/latest?hostname=web-01');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      session: {
        hostname: 'web-01',
        snapshotAt: '2026-03-01T10:00:00.000Z',
        result: { qualityTier: 'excellent', participatingAgents: 5 },
      },
      actionPlan: {
        recommendations: expect.arrayContaining(['Rotate and compress logs under /var/log']),
      },
    });
  });

  it('queries current insights by severity and component', async () => {
    const { router } = setup();
    await post(router, JSON.stringify(buildContextInput()));

    const matching = await router.request('/insights?severity=CRITICAL&component=disk');
    const empty = await router.request('/insights?severity=high');

    expect(await matching.json()).toMatchObject({
      total: 1,
      insights: [{ title: 'Disk nearly full', hostname: 'web-01', severity: 'critical' }],
    });
    expect(await empty.json()).toMatchObject({ total: 0, insights: [] });
  });

  it('rejects an unknown severity or an out-of-range limit', async () => {
    const { router } = setup();

    const badSeverity = await router.request('/insights?severity=urgent');
    const badLimit = await router.request('/insights?limit=0');

    expect(badSeverity.status).toBe(400);
    expect(await badSeverity.json()).toMatchObject({
      code: 'VALIDATION_ERROR',
      details: [expect.stringContaining('severity: Invalid enum value')],
    });
    expect(badLimit.status).toBe(400);
    expect(await badLimit.json()).toMatchObject({
      code: 'VALIDATION_ERROR',
      details: ['limit: Number must be greater than or equal to 1'],
    });
  });

  it('lists critical insights and summarises every host', async () => {
    const { router } = setup();
    await post(router, JSON.stringify(buildContextInput()));
    await post(router, JSON.stringify(buildContextInput({ hostname: 'db-01' })));

    const critical = await router.request('/critical?hostname=db-01');
    const summary = await router.request('/summary');

    expect(await critical.json()).toMatchObject({
      total: 1,
      insights: [{ title: 'Disk nearly full', hostname: 'db-01' }],
    });
    expect(await summary.json()).toMatchObject({
      summary: {
        totalInsights: 2,
        hosts: 2,
        sessions: 2,
        bySeverity: { critical: 2, high: 0, medium: 0, low: 0, info: 0 },
        byComponent: { disk: 2 },
        hasCriticalIssues: true,
      },
    });
  });

  it('exposes cache and latency stats', async () => {
    const { router } = setup();
    await post(router, JSON.stringify(buildContextInput()));

    const res = await router.request('/stats');

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({
      cache: { misses: 1, entries: 1 },
      latency: { PerformanceAnalyst: { calls: 1, succeeded: 1 } },
      history: { sessions: 1, maxSessions: 50 },
      circuits: expect.any(Object),
    });
  });

  it('clears the cache', async () => {
    const { router } = setup();
    const snapshot = JSON.stringify(buildContextInput());
    await post(router, snapshot);

    const cleared = await router.request('/cache', { method: 'DELETE' });
    const res = await post(router, snapshot);

    expect(cleared.status).toBe(200);
    expect(await res.json()).toMatchObject({ meta: { cache: 'miss' } });
  });

  it('resets circuit breakers', async () => {
    const { router } = setup();

    const res = await router.request('/circuits/reset', { method: 'POST' });

    expect(res.status).toBe(200);
    expect(await res.json()).toMatchObject({ success: true, message: 'All circuit breakers reset' });
  });

  it('reports configuration errors as 500', async () => {
    const router = createAnalysisRouter(() => {
      throw new ConfigurationError('Quorum (6) exceeds the number of agent profiles (5)');
    });

    const res = await post(router, JSON.stringify(buildContextInput()));

    expect(res.status).toBe(500);
    expect(await res.json()).toMatchObject({ code: 'CONFIG_ERROR' });
  });
});
