/**
 * Per-message-type circuit breaker for delivery protection.
 *
 * Implements the standard three-state machine pattern:
 * CLOSED -> OPEN -> HALF_OPEN -> CLOSED
 *
 * Each message type maintains independent state. When consecutive failures
 * reach the threshold, the breaker trips OPEN, rejecting all deliveries
 * until the cooldown elapses. The OPEN -> HALF_OPEN edge is taken lazily by
 * the next {@link CircuitBreakerManager.check}, never by a timer. HALF_OPEN
 * admits a limited number of probe attempts to test recovery.
 *
 * @module bus/circuit-breaker
 */
import type {
  CircuitBreakerConfig,
  CircuitBreakerState,
  CircuitBreakerResult,
  CircuitState,
  CircuitTransitionEvent,
  CircuitTransitionReason,
} from './types.js';

const DEFAULT_CB_CONFIG: CircuitBreakerConfig = {
  enabled: true,
  failureThreshold: 5,
  cooldownMs: 30_000,
  halfOpenProbeCount: 1,
  successToClose: 2,
};

export interface CircuitBreakerOptions {
  /** Partial config overrides merged with defaults. */
  config?: Partial<CircuitBreakerConfig>;
  /** Time source in ms. Defaults to `Date.now`. */
  now?: () => number;
  /** Invoked synchronously on every state change. */
  onTransition?: (event: CircuitTransitionEvent) => void;
}

/**
 * Manages per-type circuit breaker state.
 *
 * Each type code gets an independent breaker that tracks consecutive
 * failures and transitions through CLOSED, OPEN, and HALF_OPEN states.
 */
export class CircuitBreakerManager {
  private breakers = new Map<number, CircuitBreakerState>();
  private overrides = new Map<number, Partial<CircuitBreakerConfig>>();
  private config: CircuitBreakerConfig;
  private readonly now: () => number;
  private readonly onTransition: (event: CircuitTransitionEvent) => void;

  constructor(options: CircuitBreakerOptions = {}) {
    this.config = { ...DEFAULT_CB_CONFIG, ...options.config };
    this.now = options.now ?? Date.now;
    this.onTransition = options.onTransition ?? (() => {});
  }

  /**
   * Check if a delivery attempt for a type is allowed.
   *
   * Takes the OPEN -> HALF_OPEN edge once the cooldown has elapsed, and
   * reserves a probe slot when the breaker is HALF_OPEN. Every allowed
   * check must be followed by {@link recordSuccess} or {@link recordFailure},
   * passing back the returned `generation`.
   */
  check(typeCode: number): CircuitBreakerResult {
    const config = this.configFor(typeCode);
    if (!config.enabled) {
      return { allowed: true, state: 'CLOSED', generation: this.breakers.get(typeCode)?.generation ?? 0 };
    }

    const breaker = this.getOrCreate(typeCode);

    if (breaker.state === 'OPEN') {
      const elapsed = this.now() - (breaker.openedAt ?? 0);
      if (elapsed < config.cooldownMs) {
        return {
          allowed: false,
          reason: `circuit open for message type ${typeCode}`,
          state: 'OPEN',
        };
      }
      breaker.halfOpenSuccesses = 0;
      breaker.probesInFlight = 0;
      this.transition(typeCode, breaker, 'HALF_OPEN', 'cooldown_elapsed');
    }

    if (breaker.state === 'HALF_OPEN') {
      if (breaker.probesInFlight >= config.halfOpenProbeCount) {
        return {
          allowed: false,
          reason: `circuit half-open for message type ${typeCode}: probe limit reached`,
          state: 'HALF_OPEN',
        };
      }
      breaker.probesInFlight++;
      return { allowed: true, state: 'HALF_OPEN', generation: breaker.generation };
    }

    return { allowed: true, state: 'CLOSED', generation: breaker.generation };
  }

  /**
   * Record a successful delivery attempt.
   *
   * In CLOSED state, resets the consecutive failure count.
   * In HALF_OPEN state, increments success count and transitions
   * to CLOSED once successToClose threshold is met. No effect while OPEN.
   *
   * @param generation - From the {@link check} that admitted the attempt.
   *   A success from an earlier generation is ignored. Omitted means current.
   */
  recordSuccess(typeCode: number, generation?: number): void {
    const breaker = this.breakers.get(typeCode);
    if (!breaker || this.isStale(breaker, generation)) return;

    switch (breaker.state) {
      case 'CLOSED':
        breaker.consecutiveFailures = 0;
        break;

      case 'HALF_OPEN':
        breaker.probesInFlight = Math.max(0, breaker.probesInFlight - 1);
        breaker.halfOpenSuccesses++;
        if (breaker.halfOpenSuccesses >= this.configFor(typeCode).successToClose) {
          breaker.consecutiveFailures = 0;
          breaker.openedAt = null;
          breaker.halfOpenSuccesses = 0;
          breaker.probesInFlight = 0;
          this.transition(typeCode, breaker, 'CLOSED', 'probe_succeeded');
        }
        break;

      case 'OPEN':
        break;
    }
  }

  /**
   * Record a failed delivery attempt.
   *
   * In CLOSED state, increments failure count and trips to OPEN
   * when failureThreshold is reached. In HALF_OPEN state,
   * immediately transitions back to OPEN and restarts the cooldown.
   *
   * @param _error - The failure, accepted for call-site symmetry; only the count matters.
   * @param generation - From the {@link check} that admitted the attempt.
   *   A failure from an earlier generation is ignored. Omitted means current.
   */
  recordFailure(typeCode: number, _error?: unknown, generation?: number): void {
    const config = this.configFor(typeCode);
    if (!config.enabled) return;

    const breaker = this.getOrCreate(typeCode);
    if (this.isStale(breaker, generation)) return;
    breaker.consecutiveFailures++;

    switch (breaker.state) {
      case 'CLOSED':
        if (breaker.consecutiveFailures >= config.failureThreshold) {
          breaker.openedAt = this.now();
          this.transition(typeCode, breaker, 'OPEN', 'failure_threshold');
        }
        break;

      case 'HALF_OPEN':
        breaker.openedAt = this.now();
        breaker.halfOpenSuccesses = 0;
        breaker.probesInFlight = 0;
        this.transition(typeCode, breaker, 'OPEN', 'probe_failed');
        breaker.consecutiveFailures = 0;
        break;

      case 'OPEN':
        break;
    }
  }

  /**
   * Whether deliveries for a type are currently blocked.
   *
   * Pure read: an OPEN breaker whose cooldown has elapsed reports `false`
   * without being moved to HALF_OPEN.
   */
  isOpen(typeCode: number): boolean {
    const breaker = this.breakers.get(typeCode);
    if (!breaker || breaker.state !== 'OPEN') return false;
    if (!this.configFor(typeCode).enabled) return false;
    return this.now() - (breaker.openedAt ?? 0) < this.configFor(typeCode).cooldownMs;
  }

  /** Stored state for a type; CLOSED for types with no breaker yet. */
  getState(typeCode: number): CircuitState {
    return this.breakers.get(typeCode)?.state ?? 'CLOSED';
  }

  /**
   * Get the current state of all circuit breakers.
   *
   * @returns A copy of the breaker state map; mutating it does not affect the manager.
   */
  getStates(): Map<number, CircuitBreakerState> {
    const copy = new Map<number, CircuitBreakerState>();
    for (const [typeCode, breaker] of this.breakers) {
      copy.set(typeCode, { ...breaker });
    }
    return copy;
  }

  /**
   * Force a breaker to CLOSED with zeroed counters.
   *
   * Intended for operator intervention. Emits a `manual_reset` transition
   * when the breaker was not already CLOSED.
   */
  reset(typeCode: number): void {
    const breaker = this.breakers.get(typeCode);
    if (!breaker) return;

    const wasClosed = breaker.state === 'CLOSED';
    breaker.consecutiveFailures = 0;
    breaker.openedAt = null;
    breaker.halfOpenSuccesses = 0;
    breaker.probesInFlight = 0;
    if (!wasClosed) {
      this.transition(typeCode, breaker, 'CLOSED', 'manual_reset');
    }
  }

  /** Override thresholds for a single type; unspecified fields fall back to the defaults. */
  configure(typeCode: number, config: Partial<CircuitBreakerConfig>): void {
    this.overrides.set(typeCode, { ...this.overrides.get(typeCode), ...config });
  }

  /**
   * Update default configuration for future checks.
   *
   * @param config - Partial config overrides merged with current config.
   */
  updateConfig(config: Partial<CircuitBreakerConfig>): void {
    this.config = { ...this.config, ...config };
  }

  /** Effective configuration for a type. */
  configFor(typeCode: number): CircuitBreakerConfig {
    const override = this.overrides.get(typeCode);
    return override ? { ...this.config, ...override } : this.config;
  }

  private transition(
    typeCode: number,
    breaker: CircuitBreakerState,
    to: CircuitState,
    reason: CircuitTransitionReason,
  ): void {
    const from = breaker.state;
    const timestamp = this.now();
    breaker.state = to;
    breaker.lastTransitionAt = timestamp;
    breaker.generation++;
    this.onTransition({
      typeCode,
      from,
      to,
      reason,
      consecutiveFailures: breaker.consecutiveFailures,
      timestamp,
    });
  }

  private isStale(breaker: CircuitBreakerState, generation: number | undefined): boolean {
    return generation !== undefined && generation !== breaker.generation;
  }

  private getOrCreate(typeCode: number): CircuitBreakerState {
    let breaker = this.breakers.get(typeCode);
    if (!breaker) {
      breaker = {
        state: 'CLOSED',
        consecutiveFailures: 0,
        openedAt: null,
        halfOpenSuccesses: 0,
        probesInFlight: 0,
        lastTransitionAt: this.now(),
        generation: 0,
      };
      this.breakers.set(typeCode, breaker);
    }
    return breaker;
  }
}

export { DEFAULT_CB_CONFIG };
