import { logger } from '../../lib/logger';
import { withTimeout } from '../../lib/with-timeout';

/**
 * Circuit Breaker
 *
 * Fails fast while the language model endpoint is unhealthy and probes it
 * again after a cool-down.
 *
 * States:
 * - CLOSED: calls pass through
 * - OPEN: calls are rejected immediately
 * - HALF_OPEN: a limited number of probe calls are allowed
 */

// ============================================================================
// 1. Types
// ============================================================================

export type CircuitState = 'CLOSED' | 'OPEN' | 'HALF_OPEN';

export interface CircuitBreakerConfig {
  /** Consecutive failures before opening (default 5) */
  failureThreshold: number;
  /** HALF_OPEN successes before closing again (default 2) */
  successThreshold: number;
  /** Time spent OPEN before probing, in ms (default 30s) */
  openDuration: number;
  /** Upper bound for a single call, in ms (default 60s) */
  timeout: number;
  name: string;
}

export interface CircuitStats {
  state: CircuitState;
  failures: number;
  successes: number;
  lastFailure?: Date;
  lastSuccess?: Date;
  totalCalls: number;
  totalFailures: number;
}

// ============================================================================
// 2. Errors
// ============================================================================

export class CircuitOpenError extends Error {
  constructor(
    message: string,
    public readonly retryAfter: number
  ) {
    super(message);
    this.name = 'CircuitOpenError';
  }
}

export class CircuitTimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CircuitTimeoutError';
  }
}

// ============================================================================
// 3. Implementation
// ============================================================================

export class CircuitBreaker {
  private state: CircuitState = 'CLOSED';
  private failures = 0;
  private successes = 0;
  private lastFailure?: Date;
  private lastSuccess?: Date;
  private openedAt?: Date;
  private totalCalls = 0;
  private totalFailures = 0;
  private readonly config: CircuitBreakerConfig;

  constructor(config: Partial<CircuitBreakerConfig> & { name: string }) {
    this.config = {
      failureThreshold: 5,
      successThreshold: 2,
      openDuration: 30_000,
      // Agent calls are cut by the dispatcher first (30s); this only bounds
      // calls made without an outer deadline.
      timeout: 60_000,
      ...config,
    };
  }

  /**
   * Run `fn` under breaker protection. The controller, when given, is aborted
   * if the breaker's own timeout fires.
   */
  async execute<T>(fn: () => Promise<T>, controller?: AbortController): Promise<T> {
    this.checkStateTransition();

    if (this.state === 'OPEN') {
      const waitTime = this.getWaitTime();
      throw new CircuitOpenError(
        `Circuit breaker ${this.config.name} is OPEN. Retry in ${waitTime}ms`,
        waitTime
      );
    }

    this.totalCalls++;

    try {
      const result = await withTimeout(
        fn(),
        this.config.timeout,
        (ms) => new CircuitTimeoutError(`Operation timed out after ${ms}ms`),
        controller
      );
      this.onSuccess();
      return result;
    } catch (error) {
      this.onFailure(error);
      throw error;
    }
  }

  isAllowed(): boolean {
    this.checkStateTransition();
    return this.state !== 'OPEN';
  }

  getStats(): CircuitStats {
    return {
      state: this.state,
      failures: this.failures,
      successes: this.successes,
      lastFailure: this.lastFailure,
      lastSuccess: this.lastSuccess,
      totalCalls: this.totalCalls,
      totalFailures: this.totalFailures,
    };
  }

  reset(): void {
    this.state = 'CLOSED';
    this.failures = 0;
    this.successes = 0;
    this.openedAt = undefined;
    logger.info(`[CircuitBreaker:${this.config.name}] Manually reset to CLOSED`);
  }

  private onSuccess(): void {
    this.lastSuccess = new Date();

    if (this.state === 'HALF_OPEN') {
      this.successes++;
      if (this.successes >= this.config.successThreshold) {
        this.transitionTo('CLOSED');
        this.failures = 0;
        this.successes = 0;
      }
    } else {
      this.failures = 0;
    }
  }

  private onFailure(error: unknown): void {
    this.failures++;
    this.totalFailures++;
    this.lastFailure = new Date();

    logger.warn(
      `[CircuitBreaker:${this.config.name}] Failure ${this.failures}/${this.config.failureThreshold}:`,
      error instanceof Error ? error.message : String(error)
    );

    if (this.state === 'HALF_OPEN') {
      this.transitionTo('OPEN');
      this.successes = 0;
    } else if (this.failures >= this.config.failureThreshold) {
      this.transitionTo('OPEN');
    }
  }

  private checkStateTransition(): void {
    if (this.state === 'OPEN' && this.openedAt) {
      const elapsed = Date.now() - this.openedAt.getTime();
      if (elapsed >= this.config.openDuration) {
        this.transitionTo('HALF_OPEN');
      }
    }
  }

  private transitionTo(newState: CircuitState): void {
    const oldState = this.state;
    this.state = newState;

    if (newState === 'OPEN') {
      this.openedAt = new Date();
    }

    logger.info(`[CircuitBreaker:${this.config.name}] ${oldState} → ${newState}`);
  }

  private getWaitTime(): number {
    if (!this.openedAt) return 0;
    const elapsed = Date.now() - this.openedAt.getTime();
    return Math.max(0, this.config.openDuration - elapsed);
  }
}

// ============================================================================
// 4. Registry
// ============================================================================

const circuitBreakers = new Map<string, CircuitBreaker>();

/**
 * One breaker per endpoint key; the config only applies on first creation.
 */
export function getCircuitBreaker(
  key: string,
  config?: Partial<CircuitBreakerConfig>
): CircuitBreaker {
  const existing = circuitBreakers.get(key);
  if (existing) return existing;

  const breaker = new CircuitBreaker({ ...config, name: key });
  circuitBreakers.set(key, breaker);
  return breaker;
}

export function getAllCircuitStats(): Record<string, CircuitStats> {
  const stats: Record<string, CircuitStats> = {};
  circuitBreakers.forEach((breaker, name) => {
    stats[name] = breaker.getStats();
  });
  return stats;
}

export function resetAllCircuitBreakers(): void {
  circuitBreakers.forEach((breaker) => breaker.reset());
}
