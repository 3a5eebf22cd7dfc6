import { describe, it, expect, vi, beforeEach } from 'vitest';
import { CircuitBreakerManager } from '../circuit-breaker.js';
import { CircuitOpenError, InvalidRetryPolicyError, PermanentDeliveryError } from '../errors.js';
import { DEFAULT_RETRY_POLICY, RetryCoordinator, computeRetryDelay } from '../retry-coordinator.js';
import type { RetryPolicy } from '../types.js';
import { createManualClock, type ManualClock } from './helpers/manual-clock.js';

const TYPE = 42;

function policy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return { ...DEFAULT_RETRY_POLICY, ...overrides };
}

/** Attempt function that throws `failures` times, then succeeds. */
function failingTimes(failures: number) {
  let calls = 0;
  return vi.fn((_attempt: number) => {
    calls++;
    if (calls <= failures) throw new Error(`boom ${calls}`);
  });
}

describe('computeRetryDelay', () => {
  it('doubles the delay per attempt with exponential backoff', () => {
    const p = policy();
    expect([1, 2, 3].map((n) => computeRetryDelay(p, n))).toEqual([1000, 2000, 4000]);
  });

  it('caps the delay at maxDelayMs', () => {
    const p = policy({ maxDelayMs: 3000 });
    expect(computeRetryDelay(p, 3)).toBe(3000);
    expect(computeRetryDelay(p, 10)).toBe(3000);
  });

  it('grows linearly with linear backoff', () => {
    const p = policy({ backoffStrategy: 'linear', initialDelayMs: 500 });
    expect([1, 2, 3].map((n) => computeRetryDelay(p, n))).toEqual([500, 1000, 1500]);
  });

  it('keeps the initial delay with fixed backoff', () => {
    const p = policy({ backoffStrategy: 'fixed', initialDelayMs: 750 });
    expect([1, 2, 3].map((n) => computeRetryDelay(p, n))).toEqual([750, 750, 750]);
  });

  it('spreads the delay by up to jitterFactor in either direction', () => {
    const p = policy({ jitterFactor: 0.5 });
    expect(computeRetryDelay(p, 1, () => 0)).toBe(500);
    expect(computeRetryDelay(p, 1, () => 0.5)).toBe(1000);
    expect(computeRetryDelay(p, 1, () => 1)).toBe(1500);
  });

  it('returns zero for attempt numbers below one', () => {
    expect(computeRetryDelay(policy(), 0)).toBe(0);
  });
});

describe('RetryCoordinator', () => {
  let clock: ManualClock;
  let breaker: CircuitBreakerManager;
  let retry: RetryCoordinator;

  beforeEach(() => {
    clock = createManualClock();
    breaker = new CircuitBreakerManager({ now: clock.now });
    retry = new RetryCoordinator({ breaker, clock });
  });

  it('delivers on the first attempt without waiting', async () => {
    const attempt = vi.fn();

    const outcome = await retry.execute(TYPE, attempt);

    expect(outcome).toEqual({ status: 'delivered', attempts: 1 });
    expect(attempt).toHaveBeenCalledWith(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('runs the first attempt before execute() returns', async () => {
    let called = false;

    const pending = retry.execute(TYPE, () => {
      called = true;
    });

    expect(called).toBe(true);
    await pending;
  });

  it('retries with backoff until an attempt succeeds', async () => {
    const attempt = failingTimes(2);

    const outcome = await retry.execute(TYPE, attempt);

    expect(outcome).toEqual({ status: 'delivered', attempts: 3 });
    expect(clock.sleeps).toEqual([1000, 2000]);
    expect(retry.getStatistics()).toEqual({ attempts: 3, retries: 2, exhausted: 0, recovered: 1 });
  });

  it('gives up after maxAttempts and reports the last error', async () => {
    const attempt = failingTimes(Infinity);

    const outcome = await retry.execute(TYPE, attempt);

    expect(outcome.status).toBe('retries_exhausted');
    expect(outcome.attempts).toBe(3);
    if (outcome.status === 'retries_exhausted') {
      expect(outcome.error).toBeInstanceOf(Error);
      expect(outcome.error).toHaveProperty('message', 'boom 3');
    }
    expect(attempt.mock.calls.map(([n]) => n)).toEqual([1, 2, 3]);
    expect(clock.sleeps).toEqual([1000, 2000]);
    expect(retry.getStatistics().exhausted).toBe(1);
  });

  it('awaits async attempts and retries rejected ones', async () => {
    let calls = 0;
    const outcome = await retry.execute(TYPE, async () => {
      calls++;
      if (calls === 1) throw new Error('not yet');
    });

    expect(outcome).toEqual({ status: 'delivered', attempts: 2 });
  });

  it('stops at a PermanentDeliveryError', async () => {
    const attempt = vi.fn(() => {
      throw new PermanentDeliveryError('malformed payload');
    });

    const outcome = await retry.execute(TYPE, attempt);

    expect(outcome.status).toBe('non_retryable');
    expect(outcome.attempts).toBe(1);
    expect(attempt).toHaveBeenCalledTimes(1);
  });

  it('stops when the isRetryable predicate rejects the error', async () => {
    const picky = new RetryCoordinator({
      breaker,
      clock,
      isRetryable: (err) => !(err instanceof TypeError),
    });
    const attempt = vi.fn(() => {
      throw new TypeError('bad shape');
    });

    const outcome = await picky.execute(TYPE, attempt);

    expect(outcome.status).toBe('non_retryable');
    expect(attempt).toHaveBeenCalledTimes(1);
  });

  it('makes a single attempt when the policy is disabled', async () => {
    retry.setPolicy(TYPE, { enabled: false });
    const attempt = failingTimes(Infinity);

    const outcome = await retry.execute(TYPE, attempt);

    expect(outcome.status).toBe('retries_exhausted');
    expect(outcome.attempts).toBe(1);
    expect(clock.sleeps).toEqual([]);
  });

  it('reports every attempt to the circuit breaker and stops when it opens', async () => {
    breaker.configure(TYPE, { failureThreshold: 2 });
    retry.setPolicy(TYPE, { maxAttempts: 5 });
    const attempt = failingTimes(Infinity);

    const outcome = await retry.execute(TYPE, attempt);

    expect(outcome.status).toBe('circuit_open');
    expect(outcome.attempts).toBe(2);
    if (outcome.status === 'circuit_open') {
      expect(outcome.error).toBeInstanceOf(CircuitOpenError);
      expect(outcome.error.typeCode).toBe(TYPE);
    }
    expect(attempt).toHaveBeenCalledTimes(2);
    expect(breaker.getState(TYPE)).toBe('OPEN');
  });

  it('returns cancelled when the signal aborts between attempts', async () => {
    const controller = new AbortController();
    const attempt = vi.fn(() => {
      controller.abort();
      throw new Error('boom');
    });

    const outcome = await retry.execute(TYPE, attempt, { signal: controller.signal });

    expect(outcome.status).toBe('cancelled');
    expect(outcome.attempts).toBe(1);
    expect(attempt).toHaveBeenCalledTimes(1);
  });

  it('makes no attempt when the signal is already aborted', async () => {
    const controller = new AbortController();
    controller.abort();
    const attempt = vi.fn();

    const outcome = await retry.execute(TYPE, attempt, { signal: controller.signal });

    expect(outcome.status).toBe('cancelled');
    expect(outcome.attempts).toBe(0);
    expect(attempt).not.toHaveBeenCalled();
  });

  describe('policies', () => {
    it('fills unspecified fields from the default policy', () => {
      const merged = retry.setPolicy(7, { maxAttempts: 5 });

      expect(merged).toEqual({ ...DEFAULT_RETRY_POLICY, maxAttempts: 5 });
      expect(retry.policyFor(7).maxAttempts).toBe(5);
      expect(retry.policyFor(8).maxAttempts).toBe(3);
    });

    it('rejects a policy whose maxDelayMs is below initialDelayMs', () => {
      expect(() => retry.setPolicy(7, { maxDelayMs: 10 })).toThrow(InvalidRetryPolicyError);
      expect(() => retry.setPolicy(7, { maxDelayMs: 10 })).toThrow(
        'Invalid retry policy: maxDelayMs: maxDelayMs must be greater than or equal to initialDelayMs',
      );
    });

    it('rejects a policy with zero attempts', () => {
      expect(() => retry.setPolicy(7, { maxAttempts: 0 })).toThrow(InvalidRetryPolicyError);
      expect(retry.policyFor(7)).toEqual(DEFAULT_RETRY_POLICY);
    });

    it('applies updated defaults to types without an override', async () => {
      retry.updateDefaultPolicy({ maxAttempts: 2, initialDelayMs: 10 });

      const outcome = await retry.execute(TYPE, failingTimes(Infinity));

      expect(outcome.attempts).toBe(2);
      expect(clock.sleeps).toEqual([10]);
    });
  });
});
