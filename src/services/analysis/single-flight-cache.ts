/**
 * Single-Flight Result Cache
 *
 * - Fingerprint: SHA-256 of canonical (sorted-key) JSON
 * - Fresh entry: returned without running
 * - Run in flight: callers join the same promise
 * - Otherwise: exactly one run, stored on success
 *
 * Check-and-register is synchronous, so two callers can never both see
 * "nothing in flight" for the same fingerprint.
 */

import { createHash } from 'node:crypto';
import { logger as rootLogger, type Logger } from '../../lib/logger';

// ============================================================================
// 1. Types
// ============================================================================

export interface CacheEntry<T> {
  readonly fingerprint: string;
  readonly result: T;
  readonly createdAt: number;
  readonly ttlMs: number;
  readonly runId: number;
}

export type CacheStatus = 'hit' | 'miss' | 'join';

export interface SingleFlightResult<T> {
  value: T;
  status: CacheStatus;
  fingerprint: string;
}

export interface RunMeta {
  fingerprint: string;
  runId: number;
}

export interface SingleFlightCacheOptions {
  ttlMs: number;
  maxSize: number;
  now?: () => number;
  logger?: Logger;
}

export interface SingleFlightCacheStats {
  hits: number;
  misses: number;
  joins: number;
  evictions: number;
  entries: number;
  inFlight: number;
  hitRate: number;
}

interface InFlightRun<T> {
  runId: number;
  promise: Promise<T>;
}

// ============================================================================
// 2. Fingerprint
// ============================================================================

function canonicalize(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(canonicalize);
  if (typeof value === 'object' && value !== null) {
    const sorted: Record<string, unknown> = {};
    for (const key of Object.keys(value).sort()) {
      const child: unknown = Reflect.get(value, key);
      if (child !== undefined) sorted[key] = canonicalize(child);
    }
    return sorted;
  }
  return value;
}

/**
 * Stable hash: key order and `undefined` members do not change it.
 */
export function fingerprintOf(value: unknown): string {
  return createHash('sha256').update(JSON.stringify(canonicalize(value))).digest('hex');
}

// ============================================================================
// 3. Cache
// ============================================================================

export class SingleFlightCache<T> {
  private readonly entries = new Map<string, CacheEntry<T>>();
  private readonly inFlight = new Map<string, InFlightRun<T>>();
  /** Hits per stored fingerprint; entries themselves are never mutated */
  private readonly entryHits = new Map<string, number>();
  private readonly ttlMs: number;
  private readonly maxSize: number;
  private readonly now: () => number;
  private readonly logger: Logger;
  private lastRunId = 0;
  private hits = 0;
  private misses = 0;
  private joins = 0;
  private evictions = 0;

  constructor(options: SingleFlightCacheOptions) {
    this.ttlMs = options.ttlMs;
    this.maxSize = options.maxSize;
    this.now = options.now ?? Date.now;
    this.logger = options.logger ?? rootLogger;
  }

  getOrRun(key: unknown, runFn: (meta: RunMeta) => Promise<T>): Promise<T> {
    return this.getOrRunDetailed(key, runFn).then((outcome) => outcome.value);
  }

  /**
   * Same as `getOrRun`, also reporting how the value was obtained.
   */
  getOrRunDetailed(
    key: unknown,
    runFn: (meta: RunMeta) => Promise<T>
  ): Promise<SingleFlightResult<T>> {
    const fingerprint = fingerprintOf(key);
    const short = fingerprint.slice(0, 12);

    const entry = this.readFresh(fingerprint);
    if (entry) {
      this.entryHits.set(fingerprint, (this.entryHits.get(fingerprint) ?? 0) + 1);
      this.hits++;
      this.logger.debug(`[SingleFlight] HIT: ${short}`);
      return Promise.resolve({ value: entry.result, status: 'hit' as const, fingerprint });
    }

    const running = this.inFlight.get(fingerprint);
    if (running) {
      this.joins++;
      this.logger.debug(`[SingleFlight] JOIN: ${short} (run ${running.runId})`);
      return running.promise.then((value) => ({ value, status: 'join' as const, fingerprint }));
    }

    this.misses++;
    const runId = ++this.lastRunId;
    this.logger.debug(`[SingleFlight] MISS: ${short}, starting run ${runId}`);

    // Registered before runFn starts, so a synchronous throw still clears it.
    const promise = Promise.resolve()
      .then(() => runFn({ fingerprint, runId }))
      .then((result) => {
        this.store(fingerprint, runId, result);
        return result;
      });
    this.inFlight.set(fingerprint, { runId, promise });

    const release = () => {
      if (this.inFlight.get(fingerprint)?.runId === runId) {
        this.inFlight.delete(fingerprint);
      }
    };
    void promise.then(release, release);

    return promise.then((value) => ({ value, status: 'miss' as const, fingerprint }));
  }

  private readFresh(fingerprint: string): CacheEntry<T> | undefined {
    const entry = this.entries.get(fingerprint);
    if (!entry) return undefined;
    if (this.isExpired(entry)) {
      this.remove(fingerprint);
      return undefined;
    }
    return entry;
  }

  private isExpired(entry: CacheEntry<T>): boolean {
    return this.now() - entry.createdAt >= entry.ttlMs;
  }

  /**
   * Only a newer run may replace an existing entry.
   */
  private store(fingerprint: string, runId: number, result: T): void {
    const existing = this.entries.get(fingerprint);
    if (existing && existing.runId > runId) {
      this.logger.debug(
        `[SingleFlight] Run ${runId} finished after run ${existing.runId}, result not stored`
      );
      return;
    }

    if (!existing && this.entries.size >= this.maxSize) {
      this.evict();
    }

    this.entries.set(
      fingerprint,
      Object.freeze({ fingerprint, result, createdAt: this.now(), ttlMs: this.ttlMs, runId })
    );
    this.entryHits.set(fingerprint, 0);
  }

  private remove(fingerprint: string): boolean {
    this.entryHits.delete(fingerprint);
    return this.entries.delete(fingerprint);
  }

  /**
   * Expired entries first; if still full, the entry with the fewest hits
   * (oldest first among equals).
   */
  private evict(): void {
    for (const [key, entry] of this.entries) {
      if (this.isExpired(entry)) {
        this.remove(key);
        this.evictions++;
      }
    }

    while (this.entries.size >= this.maxSize) {
      let victim: string | null = null;
      let fewestHits = Infinity;
      for (const key of this.entries.keys()) {
        const hits = this.entryHits.get(key) ?? 0;
        if (hits < fewestHits) {
          fewestHits = hits;
          victim = key;
        }
      }
      if (victim === null) break;
      this.remove(victim);
      this.evictions++;
    }
  }

  /**
   * Fresh entry for `key`, without counting a hit.
   */
  peek(key: unknown): CacheEntry<T> | undefined {
    return this.readFresh(fingerprintOf(key));
  }

  invalidate(key: unknown): boolean {
    return this.remove(fingerprintOf(key));
  }

  /**
   * Drops entries and forgets in-flight runs; those runs still settle for
   * their own callers.
   */
  clear(): void {
    this.entries.clear();
    this.entryHits.clear();
    this.inFlight.clear();
    this.logger.info('[SingleFlight] Cache cleared');
  }

  getStats(): SingleFlightCacheStats {
    const lookups = this.hits + this.misses + this.joins;
    return {
      hits: this.hits,
      misses: this.misses,
      joins: this.joins,
      evictions: this.evictions,
      entries: this.entries.size,
      inFlight: this.inFlight.size,
      hitRate: lookups > 0 ? Math.round((this.hits / lookups) * 100) / 100 : 0,
    };
  }
}
