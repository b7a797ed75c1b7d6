import { describe, expect, it } from 'vitest';

import { AnalysisHistory, type AnalysisSession } from './analysis-history';
import type { Insight, Severity } from './types';

function insight(title: string, component: string, severity: Severity): Insight {
  return {
    title,
    component,
    severity,
    observation: `${title} observed`,
    rootCause: 'Unknown',
    immediateAction: 'Investigate',
    confidence: 88,
    contributingAgents: ['PerformanceAnalyst'],
    source: 'synthesis',
  };
}

function session(id: string, hostname: string, insights: Insight[]): AnalysisSession {
  return {
    sessionId: id,
    hostname,
    fingerprint: `fp-${id}`,
    snapshotAt: '2026-03-01T10:00:00.000Z',
    completedAt: '2026-03-01T10:01:00.000Z',
    result: {
      insights,
      participatingAgents: 4,
      consensusScore: 90,
      qualityTier: 'good',
      executionTime: 1200,
    },
  };
}

function seeded() {
  const history = new AnalysisHistory(10);
  history.record(session('s1', 'web-01', [insight('Old disk alert', 'disk', 'critical')]));
  history.record(
    session('s2', 'db-01', [
      insight('Disk nearly full', 'Disk', 'critical'),
      insight('Memory pressure', 'memory', 'medium'),
    ])
  );
  history.record(
    session('s3', 'web-01', [
      insight('CPU saturation', 'cpu', 'high'),
      insight('Swap in use', 'memory', 'low'),
    ])
  );
  return history;
}

describe('AnalysisHistory', () => {
  it('returns null before any run completes', () => {
    const history = new AnalysisHistory(5);

    expect(history.latest()).toBeNull();
    expect(history.findInsights()).toEqual([]);
    expect(history.summary()).toEqual({
      totalInsights: 0,
      hosts: 0,
      sessions: 0,
      bySeverity: { critical: 0, high: 0, medium: 0, low: 0, info: 0 },
      byComponent: {},
      hasCriticalIssues: false,
    });
  });

  it('keeps only the most recent sessions', () => {
    const history = new AnalysisHistory(2);

    history.record(session('s1', 'a', []));
    history.record(session('s2', 'b', []));
    history.record(session('s3', 'c', []));

    expect(history.size).toBe(2);
    expect(history.current().map((s) => s.sessionId)).toEqual(['s3', 's2']);
  });

  it('finds the latest session overall or for one host', () => {
    const history = seeded();

    expect(history.latest()?.sessionId).toBe('s3');
    expect(history.latest('db-01')?.sessionId).toBe('s2');
    expect(history.latest('cache-01')).toBeNull();
  });

  it('reads only the latest session of each host', () => {
    const history = seeded();

    expect(history.findInsights().map((i) => [i.hostname, i.title])).toEqual([
      ['web-01', 'CPU saturation'],
      ['web-01', 'Swap in use'],
      ['db-01', 'Disk nearly full'],
      ['db-01', 'Memory pressure'],
    ]);
  });

  it('filters by severity, component and host', () => {
    const history = seeded();

    expect(history.findInsights({ component: ' MEMORY ' }).map((i) => i.title)).toEqual([
      'Swap in use',
      'Memory pressure',
    ]);
    expect(history.findInsights({ severity: 'high' }).map((i) => i.sessionId)).toEqual(['s3']);
    expect(history.findInsights({ hostname: 'db-01', limit: 1 }).map((i) => i.title)).toEqual([
      'Disk nearly full',
    ]);
  });

  it('lists critical insights of the current sessions', () => {
    const history = seeded();

    expect(history.critical()).toEqual([
      {
        ...insight('Disk nearly full', 'Disk', 'critical'),
        hostname: 'db-01',
        sessionId: 's2',
        snapshotAt: '2026-03-01T10:00:00.000Z',
      },
    ]);
    expect(history.critical('web-01')).toEqual([]);
  });

  it('summarises counts by severity and component', () => {
    const history = seeded();

    expect(history.summary()).toEqual({
      totalInsights: 4,
      hosts: 2,
      sessions: 3,
      bySeverity: { critical: 1, high: 1, medium: 1, low: 1, info: 0 },
      byComponent: { cpu: 1, memory: 2, disk: 1 },
      hasCriticalIssues: true,
    });
    expect(history.summary('web-01')).toMatchObject({
      totalInsights: 2,
      hosts: 1,
      hasCriticalIssues: false,
    });
  });

  it('freezes recorded sessions and forgets them on clear', () => {
    const history = seeded();

    expect(Object.isFrozen(history.latest())).toBe(true);
    history.clear();
    expect(history.size).toBe(0);
  });
});
