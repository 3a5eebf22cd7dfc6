/**
 * Internal type definitions for the @signalpost/bus package.
 *
 * All types used across bus modules are defined here to avoid
 * circular imports and provide a single source of truth.
 *
 * Config and snapshot types (CircuitBreakerConfig, RetryPolicy,
 * DeadLetterConfig, HealthConfig, BusStatistics, HealthReport) are imported
 * from @signalpost/shared/bus-schemas and re-exported to avoid drift.
 *
 * @module bus/types
 */
import type {
  BusMessage,
  MessagePriority,
  CircuitState,
  HealthStatus,
  CircuitBreakerConfig,
  RetryPolicy,
  DeadLetterConfig,
  HealthConfig,
  BusStatistics,
  TypeStatistics,
  HealthReport,
} from '@signalpost/shared/bus-schemas';

// --- Re-exported types (@signalpost/shared is the single source of truth) ---

export type {
  BusMessage,
  MessagePriority,
  CircuitState,
  HealthStatus,
  CircuitBreakerConfig,
  RetryPolicy,
  DeadLetterConfig,
  HealthConfig,
  BusStatistics,
  TypeStatistics,
  HealthReport,
};

// --- Core handler and utility types ---

export type MessageHandler = (message: BusMessage) => void | Promise<void>;
export type MessageFilter = (message: BusMessage) => boolean;
export type Unsubscribe = () => void;

/** Opaque token returned by `subscribe`, passed back to `unsubscribe`. */
export interface SubscriptionHandle {
  readonly id: string;
  readonly typeCode: number;
}

export interface SubscribeOptions {
  /** Only messages for which the predicate returns true are delivered. */
  filter?: MessageFilter;
  /** Messages below this priority are filtered out. */
  minPriority?: MessagePriority;
  /** Disabled subscriptions are skipped without counting as filtered. Default true. */
  enabled?: boolean;
}

/** A live subscriber as seen by the delivery path. Entries are frozen. */
export interface SubscriberEntry {
  readonly id: string;
  readonly typeCode: number;
  readonly scopeId: string | null;
  readonly handler: MessageHandler;
  readonly filter: MessageFilter | null;
  readonly minPriority: MessagePriority | null;
  readonly enabled: boolean;
  /** Monotonic creation sequence; delivery order within a type. */
  readonly sequence: number;
  readonly createdAt: string;
}

export interface SubscriptionInfo {
  id: string;
  typeCode: number;
  scopeId: string | null;
  enabled: boolean;
  createdAt: string;
}

export interface ScopeInfo {
  id: string;
  name: string | null;
  active: boolean;
  subscriptionCount: number;
  createdAt: string;
}

export interface MessageTypeInfo {
  typeCode: number;
  name: string;
  registeredAt: string;
}

// --- External collaborators ---

/** Time source and delay primitive, injectable for deterministic tests. */
export interface Clock {
  now(): number;
  /** Resolve after `ms`, or early (without rejecting) when `signal` aborts. */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

/** Sink for externalised counters and gauges. */
export interface MetricsRecorder {
  recordCounter(name: string, delta: number): void;
  recordGauge(name: string, value: number): void;
}

// --- Circuit Breaker ---

/** In-memory state for a single message type's circuit breaker. */
export interface CircuitBreakerState {
  state: CircuitState;
  /** Number of consecutive delivery failures in the current state. */
  consecutiveFailures: number;
  /** Timestamp (ms) when OPEN state was entered. Null when CLOSED. */
  openedAt: number | null;
  /** Consecutive successful probes in HALF_OPEN state. */
  halfOpenSuccesses: number;
  /** Trial attempts currently in flight while HALF_OPEN. */
  probesInFlight: number;
  /** Timestamp (ms) of the last state change. */
  lastTransitionAt: number;
  /** Incremented on every state change; outcomes admitted under an older generation are ignored. */
  generation: number;
}

/** Result of a per-type circuit breaker check. */
export interface CircuitBreakerResult {
  allowed: boolean;
  reason?: string;
  /** The current circuit state at the time of the check. */
  state: CircuitState;
  /** Breaker generation the attempt was admitted under. Pass it back when recording the outcome. */
  generation?: number;
}

export type CircuitTransitionReason =
  | 'failure_threshold'
  | 'cooldown_elapsed'
  | 'probe_succeeded'
  | 'probe_failed'
  | 'manual_reset';

export interface CircuitTransitionEvent {
  typeCode: number;
  from: CircuitState;
  to: CircuitState;
  reason: CircuitTransitionReason;
  consecutiveFailures: number;
  timestamp: number;
}

// --- Health ---

export interface HealthTransitionEvent {
  from: HealthStatus;
  to: HealthStatus;
  report: HealthReport;
  timestamp: number;
}

// --- Dead Letters ---

/** A delivery that exhausted its retries, held for inspection or replay. */
export interface FailedMessage {
  /** Entry identifier, distinct from the message id. */
  id: string;
  typeCode: number;
  message: BusMessage;
  /** The subscription whose delivery failed, when known. */
  subscriptionId: string | null;
  error: string;
  errorName: string;
  attemptCount: number;
  failedAt: string;
}

export interface FailureReasonCount {
  reason: string;
  count: number;
}

export interface DeadLetterStatistics {
  currentSize: number;
  capacityPerType: number;
  totalAdded: number;
  totalReplayed: number;
  totalEvicted: number;
  totalCleared: number;
  totalPurged: number;
  topFailureReasons: FailureReasonCount[];
}
