/**
 * @signalpost/bus -- In-process typed message bus.
 *
 * Provides per-type subscriptions with scopes, circuit breakers, retry
 * policies with backoff, a bounded dead letter store and aggregated
 * health reporting.
 *
 * @module bus
 */

// Main entry point
export { MessageBus } from './message-bus.js';
export type {
  MessageBusOptions,
  PublishOptions,
  PublishAsyncOptions,
  PublishResult,
  PublishWarning,
  NoSubscribersWarning,
  DeliveryFailure,
  BatchPublishResult,
  BatchPublishError,
  ReliabilityConfigUpdate,
} from './message-bus.js';

// Sub-modules (for advanced usage)
export { TypeRegistry } from './type-registry.js';
export { SubscriptionTable, SubscriptionScope } from './subscription-table.js';
export { CircuitBreakerManager, DEFAULT_CB_CONFIG } from './circuit-breaker.js';
export type { CircuitBreakerOptions } from './circuit-breaker.js';
export {
  RetryCoordinator,
  computeRetryDelay,
  DEFAULT_RETRY_POLICY,
} from './retry-coordinator.js';
export type {
  AttemptFn,
  RetryOutcome,
  RetryStatistics,
  RetryablePredicate,
  RetryCoordinatorOptions,
  ExecuteOptions,
} from './retry-coordinator.js';
export { DeadLetterStore } from './dead-letter-store.js';
export type { DeadLetterStoreOptions, ReplayResult } from './dead-letter-store.js';
export { BusStatisticsCollector } from './bus-statistics.js';
export type { CounterName } from './bus-statistics.js';
export { HealthAggregator } from './health-aggregator.js';
export type { HealthAggregatorOptions } from './health-aggregator.js';
export { TransitionEmitter } from './transition-emitter.js';
export type { CircuitTransitionListener, HealthTransitionListener } from './transition-emitter.js';
export { MessageFactory } from './message-factory.js';
export type { CreateMessageInput } from './message-factory.js';

// Configuration
export { loadBusConfig, parseBusEnv, resolveBusConfig } from './config-loader.js';
export type { BusEnv } from './config-loader.js';

// Defaults for injected collaborators
export { systemClock, noopMetrics } from './lib/clock.js';
export { createTaggedLogger } from './lib/logger.js';

// Errors
export {
  BusError,
  DuplicateTypeError,
  NotRegisteredError,
  CircuitOpenError,
  RetriesExhaustedError,
  SubscriberHandlerError,
  PermanentDeliveryError,
  DeadLetterNotFoundError,
  AllSubscribersFailedError,
  InvalidRetryPolicyError,
  BusConfigError,
  InvalidMessageError,
  ScopeDisposedError,
  BusClosedError,
} from './errors.js';
export type { BusErrorCode } from './errors.js';

// Types
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
  MessageHandler,
  MessageFilter,
  Unsubscribe,
  SubscriptionHandle,
  SubscribeOptions,
  SubscriberEntry,
  SubscriptionInfo,
  ScopeInfo,
  MessageTypeInfo,
  Clock,
  MetricsRecorder,
  CircuitBreakerState,
  CircuitBreakerResult,
  CircuitTransitionReason,
  CircuitTransitionEvent,
  HealthTransitionEvent,
  FailedMessage,
  FailureReasonCount,
  DeadLetterStatistics,
} from './types.js';
