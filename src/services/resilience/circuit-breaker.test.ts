/**
 * Circuit Breaker Unit Tests
 *
 * CLOSED → OPEN → HALF_OPEN → CLOSED transitions with fake timers.
 */
import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import {
  CircuitBreaker,
  CircuitOpenError,
  CircuitTimeoutError,
  getCircuitBreaker,
  getAllCircuitStats,
  resetAllCircuitBreakers,
} from './circuit-breaker';

vi.mock('../../lib/logger', () => ({
  logger: {
    warn: vi.fn(),
    error: vi.fn(),
    info: vi.fn(),
    debug: vi.fn(),
  },
}));

async function tripOpen(cb: CircuitBreaker, times = 5): Promise<void> {
  for (let i = 0; i < times; i++) {
    await cb.execute(() => Promise.reject(new Error('fail'))).catch(() => undefined);
  }
}

describe('CircuitBreaker', () => {
  let cb: CircuitBreaker;

  beforeEach(() => {
    vi.useFakeTimers();
    cb = new CircuitBreaker({
      name: 'llm-test',
      failureThreshold: 5,
      successThreshold: 2,
      openDuration: 30_000,
      timeout: 5_000,
    });
  });

  afterEach(() => {
    vi.useRealTimers();
    resetAllCircuitBreakers();
  });

  describe('CLOSED state', () => {
    it('stays CLOSED on success', async () => {
      const result = await cb.execute(() => Promise.resolve('ok'));

      expect(result).toBe('ok');
      expect(cb.getStats().state).toBe('CLOSED');
      expect(cb.getStats().totalCalls).toBe(1);
    });

    it('resets the failure counter after a success', async () => {
      await tripOpen(cb, 4);
      expect(cb.getStats().failures).toBe(4);

      await cb.execute(() => Promise.resolve('ok'));
      expect(cb.getStats().failures).toBe(0);
      expect(cb.getStats().state).toBe('CLOSED');
    });
  });

  describe('CLOSED → OPEN', () => {
    it('opens after five consecutive failures', async () => {
      await tripOpen(cb);

      expect(cb.getStats().state).toBe('OPEN');
      expect(cb.getStats().totalFailures).toBe(5);
      expect(cb.isAllowed()).toBe(false);
    });

    it('rejects immediately with retryAfter while OPEN', async () => {
      await tripOpen(cb);

      const error = await cb.execute(() => Promise.resolve('ok')).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(CircuitOpenError);
      expect(error).toHaveProperty('retryAfter', 30_000);
    });
  });

  describe('OPEN → HALF_OPEN → CLOSED', () => {
    it('allows probes after the open duration', async () => {
      await tripOpen(cb);

      vi.advanceTimersByTime(29_000);
      expect(cb.isAllowed()).toBe(false);

      vi.advanceTimersByTime(1_000);
      expect(cb.isAllowed()).toBe(true);
    });

    it('closes after two successful probes', async () => {
      await tripOpen(cb);
      vi.advanceTimersByTime(30_000);

      await cb.execute(() => Promise.resolve('ok'));
      await cb.execute(() => Promise.resolve('ok'));

      expect(cb.getStats()).toMatchObject({ state: 'CLOSED', failures: 0, successes: 0 });
    });

    it('re-opens on a failed probe', async () => {
      await tripOpen(cb);
      vi.advanceTimersByTime(30_000);

      await cb.execute(() => Promise.reject(new Error('still down'))).catch(() => undefined);

      expect(cb.getStats().state).toBe('OPEN');
    });
  });

  describe('timeout', () => {
    it('rejects with CircuitTimeoutError and counts a failure', async () => {
      const slow = () =>
        new Promise<string>((resolve) => {
          setTimeout(() => resolve('late'), 10_000);
        });

      const promise = cb.execute(slow);
      vi.advanceTimersByTime(5_000);

      await expect(promise).rejects.toThrow(CircuitTimeoutError);
      expect(cb.getStats().failures).toBe(1);
    });

    it('aborts the supplied controller when the call times out', async () => {
      const controller = new AbortController();
      const promise = cb.execute(() => new Promise<string>(() => undefined), controller);

      vi.advanceTimersByTime(5_000);
      await promise.catch(() => undefined);

      expect(controller.signal.aborted).toBe(true);
    });
  });

  it('reset() returns to CLOSED and lets calls through', async () => {
    await tripOpen(cb);

    cb.reset();

    expect(cb.getStats().state).toBe('CLOSED');
    await expect(cb.execute(() => Promise.resolve('recovered'))).resolves.toBe('recovered');
  });
});

describe('getCircuitBreaker registry', () => {
  afterEach(() => {
    resetAllCircuitBreakers();
  });

  it('returns the same instance for the same key', () => {
    expect(getCircuitBreaker('llm:registry-a')).toBe(getCircuitBreaker('llm:registry-a'));
    expect(getCircuitBreaker('llm:registry-a')).not.toBe(getCircuitBreaker('llm:registry-b'));
  });

  it('reports stats for every registered breaker', () => {
    getCircuitBreaker('llm:stats-a');

    const stats = getAllCircuitStats();

    expect(stats['llm:stats-a'].state).toBe('CLOSED');
  });

  it('resetAllCircuitBreakers() closes open breakers', async () => {
    const breaker = getCircuitBreaker('llm:reset', { failureThreshold: 1 });
    await breaker.execute(() => Promise.reject(new Error('fail'))).catch(() => undefined);
    expect(breaker.getStats().state).toBe('OPEN');

    resetAllCircuitBreakers();

    expect(breaker.getStats().state).toBe('CLOSED');
  });
});
