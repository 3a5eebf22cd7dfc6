/**
 * Retry coordination for subscriber deliveries.
 *
 * Wraps a single subscriber delivery in the type's retry policy. Every
 * attempt is gated by the circuit breaker and reports its outcome back to
 * it, so a delivery that keeps failing can trip the breaker mid-retry.
 * Delays between attempts go through the injected {@link Clock} and only
 * suspend the delivery being retried.
 *
 * The first attempt always runs synchronously inside {@link RetryCoordinator.execute}:
 * nothing is awaited before it. Callers rely on this to inspect what the
 * first attempt returned before `execute` yields.
 *
 * @module bus/retry-coordinator
 */
import { RetryPolicySchema, type RetryPolicy } from '@signalpost/shared/bus-schemas';
import type { CircuitBreakerManager } from './circuit-breaker.js';
import { CircuitOpenError, InvalidRetryPolicyError, PermanentDeliveryError } from './errors.js';
import { isPromiseLike } from './lib/thenable.js';
import type { Clock } from './types.js';

/** One delivery attempt; `attempt` is 1-based. */
export type AttemptFn = (attempt: number) => unknown;

/** Decides whether a failure is worth another attempt. */
export type RetryablePredicate = (error: unknown) => boolean;

export type RetryOutcome =
  | { status: 'delivered'; attempts: number }
  | { status: 'retries_exhausted'; attempts: number; error: unknown }
  | { status: 'circuit_open'; attempts: number; error: CircuitOpenError }
  | { status: 'non_retryable'; attempts: number; error: unknown }
  | { status: 'cancelled'; attempts: number; error: unknown };

export interface ExecuteOptions {
  /** Checked before every attempt; an abort also cuts a pending delay short. */
  signal?: AbortSignal;
}

export interface RetryStatistics {
  /** Attempts started, first attempts included. */
  attempts: number;
  /** Attempts after the first. */
  retries: number;
  /** Deliveries that ran out of attempts. */
  exhausted: number;
  /** Deliveries that succeeded after at least one retry. */
  recovered: number;
}

export interface RetryCoordinatorOptions {
  breaker: CircuitBreakerManager;
  clock: Clock;
  /** Default policy applied to types without an override. */
  policy?: RetryPolicy;
  /** Source of randomness for jitter, in [0, 1). */
  random?: () => number;
  isRetryable?: RetryablePredicate;
}

const DEFAULT_RETRY_POLICY: RetryPolicy = RetryPolicySchema.parse({});

/**
 * Delay in ms to wait after attempt `attempt` failed, before the next one.
 *
 * Jitter spreads the capped delay uniformly by up to `jitterFactor` in
 * either direction and never goes below zero.
 */
export function computeRetryDelay(
  policy: RetryPolicy,
  attempt: number,
  random: () => number = Math.random,
): number {
  if (attempt <= 0) return 0;

  let delay: number;
  switch (policy.backoffStrategy) {
    case 'fixed':
      delay = policy.initialDelayMs;
      break;
    case 'linear':
      delay = policy.initialDelayMs * attempt;
      break;
    default:
      delay = policy.initialDelayMs * Math.pow(policy.backoffMultiplier, attempt - 1);
  }
  delay = Math.min(delay, policy.maxDelayMs);

  if (policy.jitterFactor > 0) {
    const range = delay * policy.jitterFactor;
    delay = Math.max(0, delay + (random() - 0.5) * 2 * range);
  }
  return Math.round(delay);
}

export class RetryCoordinator {
  private readonly breaker: CircuitBreakerManager;
  private readonly clock: Clock;
  private readonly random: () => number;
  private readonly isRetryable: RetryablePredicate;
  private defaultPolicy: RetryPolicy;
  private readonly policies = new Map<number, RetryPolicy>();
  private readonly stats: RetryStatistics = { attempts: 0, retries: 0, exhausted: 0, recovered: 0 };

  constructor(options: RetryCoordinatorOptions) {
    this.breaker = options.breaker;
    this.clock = options.clock;
    this.random = options.random ?? Math.random;
    this.isRetryable = options.isRetryable ?? (() => true);
    this.defaultPolicy = options.policy ?? DEFAULT_RETRY_POLICY;
  }

  /**
   * Override the retry policy for one message type.
   *
   * Unspecified fields come from the default policy.
   *
   * @throws {InvalidRetryPolicyError} If the merged policy is invalid.
   */
  setPolicy(typeCode: number, policy: Partial<RetryPolicy>): RetryPolicy {
    const merged = this.validate({ ...this.defaultPolicy, ...policy });
    this.policies.set(typeCode, merged);
    return merged;
  }

  /**
   * Replace fields of the default policy.
   *
   * @throws {InvalidRetryPolicyError} If the merged policy is invalid.
   */
  updateDefaultPolicy(policy: Partial<RetryPolicy>): RetryPolicy {
    this.defaultPolicy = this.validate({ ...this.defaultPolicy, ...policy });
    return this.defaultPolicy;
  }

  /** Effective policy for a type. */
  policyFor(typeCode: number): RetryPolicy {
    return this.policies.get(typeCode) ?? this.defaultPolicy;
  }

  /**
   * Run a delivery under the type's retry policy.
   *
   * Never rejects: every failure is reported through the outcome.
   */
  async execute(
    typeCode: number,
    attemptFn: AttemptFn,
    options: ExecuteOptions = {},
  ): Promise<RetryOutcome> {
    const policy = this.policyFor(typeCode);
    const maxAttempts = policy.enabled ? policy.maxAttempts : 1;
    const { signal } = options;
    let lastError: unknown;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      if (signal?.aborted) {
        return { status: 'cancelled', attempts: attempt - 1, error: signal.reason ?? lastError };
      }

      const gate = this.breaker.check(typeCode);
      if (!gate.allowed) {
        return {
          status: 'circuit_open',
          attempts: attempt - 1,
          error: new CircuitOpenError(typeCode, gate.state, gate.reason),
        };
      }

      this.stats.attempts++;
      if (attempt > 1) this.stats.retries++;

      try {
        const pending = attemptFn(attempt);
        if (isPromiseLike(pending)) await pending;
        this.breaker.recordSuccess(typeCode, gate.generation);
        if (attempt > 1) this.stats.recovered++;
        return { status: 'delivered', attempts: attempt };
      } catch (err) {
        lastError = err;
        this.breaker.recordFailure(typeCode, err, gate.generation);
      }

      if (lastError instanceof PermanentDeliveryError || !this.isRetryable(lastError)) {
        return { status: 'non_retryable', attempts: attempt, error: lastError };
      }

      if (attempt < maxAttempts) {
        await this.clock.sleep(computeRetryDelay(policy, attempt, this.random), signal);
      }
    }

    this.stats.exhausted++;
    return { status: 'retries_exhausted', attempts: maxAttempts, error: lastError };
  }

  getStatistics(): RetryStatistics {
    return { ...this.stats };
  }

  private validate(candidate: RetryPolicy): RetryPolicy {
    const result = RetryPolicySchema.safeParse(candidate);
    if (!result.success) {
      const detail = result.error.issues
        .map((issue) => `${issue.path.join('.') || 'policy'}: ${issue.message}`)
        .join('; ');
      throw new InvalidRetryPolicyError(detail);
    }
    return result.data;
  }
}

export { DEFAULT_RETRY_POLICY };
