/**
 * Analysis History
 *
 * Bounded in-process record of completed pipeline runs (sessions), oldest
 * dropped first. Insight queries read the current picture: the latest
 * session of each host, newest host first.
 */

import type { ConsolidatedResult, Insight, Severity } from './types';

// ============================================================================
// 1. Types
// ============================================================================

export const UNNAMED_HOST = 'unknown';

export interface AnalysisSession {
  /** `<fingerprint prefix>-<runId>` */
  readonly sessionId: string;
  readonly hostname: string;
  readonly fingerprint: string;
  /** Timestamp of the analysed snapshot */
  readonly snapshotAt: string;
  readonly completedAt: string;
  readonly result: ConsolidatedResult;
}

export interface HostInsight extends Insight {
  readonly hostname: string;
  readonly sessionId: string;
  readonly snapshotAt: string;
}

export interface InsightQuery {
  severity?: Severity;
  component?: string;
  hostname?: string;
  limit?: number;
}

export interface InsightSummary {
  totalInsights: number;
  hosts: number;
  sessions: number;
  bySeverity: Record<Severity, number>;
  byComponent: Record<string, number>;
  hasCriticalIssues: boolean;
}

// ============================================================================
// 2. History
// ============================================================================

export class AnalysisHistory {
  private sessions: AnalysisSession[] = [];

  constructor(private readonly maxSessions: number) {}

  get size(): number {
    return this.sessions.length;
  }

  record(session: AnalysisSession): void {
    this.sessions.push(Object.freeze(session));
    if (this.sessions.length > this.maxSessions) {
      this.sessions = this.sessions.slice(-this.maxSessions);
    }
  }

  /** Most recent session, optionally for one host */
  latest(hostname?: string): AnalysisSession | null {
    for (let index = this.sessions.length - 1; index >= 0; index--) {
      const session = this.sessions[index];
      if (hostname === undefined || session.hostname === hostname) return session;
    }
    return null;
  }

  /** Latest session per host, newest first */
  current(hostname?: string): AnalysisSession[] {
    if (hostname !== undefined) {
      const session = this.latest(hostname);
      return session ? [session] : [];
    }

    const seen = new Set<string>();
    const sessions: AnalysisSession[] = [];
    for (let index = this.sessions.length - 1; index >= 0; index--) {
      const session = this.sessions[index];
      if (seen.has(session.hostname)) continue;
      seen.add(session.hostname);
      sessions.push(session);
    }
    return sessions;
  }

  /**
   * Insights of the current sessions in ranked order. `component` matches
   * case-insensitively.
   */
  findInsights(query: InsightQuery = {}): HostInsight[] {
    const component = query.component?.trim().toLowerCase();

    const insights = this.current(query.hostname).flatMap((session) =>
      session.result.insights
        .filter(
          (insight) =>
            (query.severity === undefined || insight.severity === query.severity) &&
            (component === undefined || insight.component.toLowerCase() === component)
        )
        .map(
          (insight): HostInsight => ({
            ...insight,
            hostname: session.hostname,
            sessionId: session.sessionId,
            snapshotAt: session.snapshotAt,
          })
        )
    );

    return query.limit === undefined ? insights : insights.slice(0, query.limit);
  }

  critical(hostname?: string): HostInsight[] {
    return this.findInsights({ severity: 'critical', hostname });
  }

  summary(hostname?: string): InsightSummary {
    const current = this.current(hostname);
    const bySeverity: Record<Severity, number> = { critical: 0, high: 0, medium: 0, low: 0, info: 0 };
    const byComponent: Record<string, number> = {};
    let totalInsights = 0;

    for (const session of current) {
      for (const insight of session.result.insights) {
        totalInsights++;
        bySeverity[insight.severity]++;
        const component = insight.component.toLowerCase();
        byComponent[component] = (byComponent[component] ?? 0) + 1;
      }
    }

    return {
      totalInsights,
      hosts: current.length,
      sessions: this.sessions.length,
      bySeverity,
      byComponent,
      hasCriticalIssues: bySeverity.critical > 0,
    };
  }

  clear(): void {
    this.sessions = [];
  }
}
