/**
 * Main entry point for the Signalpost message bus.
 *
 * Composes the sub-modules (TypeRegistry, SubscriptionTable,
 * CircuitBreakerManager, RetryCoordinator, DeadLetterStore,
 * BusStatisticsCollector, HealthAggregator, TransitionEmitter) into a
 * single API surface.
 *
 * The publish pipeline validates the message, checks the type is
 * registered, consults the type's circuit breaker, snapshots the type's
 * subscribers and delivers to each of them in subscription order through
 * the retry coordinator. A failing subscriber never prevents delivery to
 * the next one; deliveries that give up land in the dead letter store.
 *
 * @module bus/message-bus
 */
import {
  BusMessageSchema,
  CircuitBreakerConfigSchema,
  DeadLetterConfigSchema,
  HealthConfigSchema,
  PRIORITY_RANK,
  type DeadLetterConfig,
} from '@signalpost/shared/bus-schemas';
import { BusConfigSchema, type BusConfig, type BusConfigInput } from '@signalpost/shared/config-schema';
import type { Logger } from '@signalpost/shared/logger';
import type { CircuitSnapshot } from '@signalpost/shared/monitoring-openapi';
import type { z } from 'zod';
import { BusStatisticsCollector, type CounterName } from './bus-statistics.js';
import { CircuitBreakerManager } from './circuit-breaker.js';
import { DeadLetterStore, type ReplayResult } from './dead-letter-store.js';
import {
  AllSubscribersFailedError,
  BusClosedError,
  BusConfigError,
  CircuitOpenError,
  InvalidMessageError,
  NotRegisteredError,
  RetriesExhaustedError,
  SubscriberHandlerError,
  describeError,
  type BusError,
} from './errors.js';
import { HealthAggregator } from './health-aggregator.js';
import { noopMetrics, systemClock } from './lib/clock.js';
import { createTaggedLogger, logContext, logError } from './lib/logger.js';
import { isPromiseLike } from './lib/thenable.js';
import { MessageFactory, type CreateMessageInput } from './message-factory.js';
import {
  RetryCoordinator,
  type RetryablePredicate,
  type RetryOutcome,
  type RetryStatistics,
} from './retry-coordinator.js';
import { SubscriptionScope, SubscriptionTable } from './subscription-table.js';
import { TransitionEmitter } from './transition-emitter.js';
import { TypeRegistry } from './type-registry.js';
import type {
  BusMessage,
  BusStatistics,
  CircuitBreakerConfig,
  CircuitState,
  CircuitTransitionEvent,
  Clock,
  DeadLetterStatistics,
  FailedMessage,
  HealthConfig,
  HealthReport,
  HealthStatus,
  HealthTransitionEvent,
  MessageHandler,
  MessageTypeInfo,
  MetricsRecorder,
  RetryPolicy,
  SubscribeOptions,
  SubscriberEntry,
  SubscriptionHandle,
  SubscriptionInfo,
  Unsubscribe,
} from './types.js';

// === Constants ===

/** Metric names for each statistics counter. */
const COUNTER_METRICS: Record<CounterName, string> = {
  published: 'bus.messages.published',
  delivered: 'bus.messages.delivered',
  failed: 'bus.messages.failed',
  filtered: 'bus.messages.filtered',
  deadLettered: 'bus.messages.dead_lettered',
  circuitRejected: 'bus.messages.circuit_rejected',
  cancelled: 'bus.messages.cancelled',
  noSubscribers: 'bus.messages.no_subscribers',
  retries: 'bus.messages.retries',
};

// === Types ===

export interface MessageBusOptions {
  /** Bus configuration; validated and defaulted with `BusConfigSchema`. */
  config?: BusConfigInput;
  /** Defaults to a consola logger tagged `bus` at the configured level. */
  logger?: Logger;
  metrics?: MetricsRecorder;
  clock?: Clock;
  /** Randomness for retry jitter, in [0, 1). */
  random?: () => number;
  /** Failures for which this returns false are not retried. */
  isRetryable?: RetryablePredicate;
}

export interface PublishOptions {
  /**
   * Throw {@link AllSubscribersFailedError} when every subscriber that was
   * attempted failed. Dispatched async deliveries count as not failed.
   */
  throwOnTotalFailure?: boolean;
}

export interface PublishAsyncOptions extends PublishOptions {
  /** Checked between subscribers and between retry attempts. */
  signal?: AbortSignal;
}

/** Non-fatal condition reported alongside a publish result. */
export interface NoSubscribersWarning {
  code: 'NO_SUBSCRIBERS';
  typeCode: number;
  message: string;
}

export type PublishWarning = NoSubscribersWarning;

/** A subscriber delivery that ended in the dead letter store. */
export interface DeliveryFailure {
  subscriptionId: string;
  status: 'retries_exhausted' | 'circuit_open' | 'non_retryable';
  attempts: number;
  /** `RetriesExhaustedError`, `CircuitOpenError` or `SubscriberHandlerError`; the handler's error is its `cause`. */
  error: BusError;
}

/** Result of a publish operation. */
export interface PublishResult {
  messageId: string;
  typeCode: number;
  /** Subscribers in the snapshot taken at publish time, disabled ones included. */
  subscriberCount: number;
  delivered: number;
  failed: number;
  /** Rejected by a priority threshold or filter predicate. */
  filtered: number;
  /** Disabled subscriptions passed over. */
  skipped: number;
  /** Async deliveries handed off to run independently; see {@link MessageBus.drain}. */
  dispatched: number;
  cancelled: number;
  failures: DeliveryFailure[];
  warnings: PublishWarning[];
  /** Set when the whole type was skipped because its circuit is open. */
  rejected: CircuitOpenError | null;
}

export interface BatchPublishError {
  index: number;
  messageId: string;
  error: unknown;
}

export interface BatchPublishResult {
  results: PublishResult[];
  errors: BatchPublishError[];
}

/** Reliability settings that can be changed while the bus is running. */
export interface ReliabilityConfigUpdate {
  circuitBreaker?: Partial<CircuitBreakerConfig>;
  retry?: Partial<RetryPolicy>;
  deadLetter?: Partial<DeadLetterConfig>;
  health?: Partial<HealthConfig>;
}

const CircuitBreakerUpdateSchema = CircuitBreakerConfigSchema.partial();
const DeadLetterUpdateSchema = DeadLetterConfigSchema.partial();
const HealthUpdateSchema = HealthConfigSchema.partial();

/** How a single subscriber delivery was settled. */
type Settled =
  | { kind: 'delivered' }
  | { kind: 'cancelled' }
  | { kind: 'failed'; failure: DeliveryFailure };

function formatIssues(error: z.ZodError): string {
  return error.issues.map((i) => `${i.path.join('.') || 'value'}: ${i.message}`).join('; ');
}

/** @throws {BusConfigError} If `value` does not match the schema. */
function parseUpdate<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, value: unknown): T {
  const parsed = schema.safeParse(value);
  if (!parsed.success) {
    throw new BusConfigError(formatIssues(parsed.error));
  }
  return parsed.data;
}

// === MessageBus ===

/**
 * In-process typed publish/subscribe bus with a reliability envelope.
 *
 * @example
 * ```ts
 * const bus = new MessageBus({ config: { version: 1, types: [{ typeCode: 42, name: 'OrderPlaced' }] } });
 *
 * const handle = bus.subscribe(42, (message) => {
 *   console.log('order', message.payload);
 * });
 *
 * const result = await bus.publish(bus.createMessage({ typeCode: 42, payload: { orderId: 'o-1' } }));
 *
 * bus.unsubscribe(handle);
 * await bus.close();
 * ```
 */
export class MessageBus {
  readonly config: BusConfig;

  private readonly logger: Logger;
  private readonly metrics: MetricsRecorder;
  private readonly clock: Clock;
  private readonly registry: TypeRegistry;
  private readonly subscriptions: SubscriptionTable;
  private readonly breaker: CircuitBreakerManager;
  private readonly retry: RetryCoordinator;
  private readonly deadLetters: DeadLetterStore;
  private readonly stats: BusStatisticsCollector;
  private readonly health: HealthAggregator;
  private readonly emitter: TransitionEmitter;
  private readonly messages: MessageFactory;
  private readonly inFlight = new Set<Promise<void>>();
  private closed = false;

  /**
   * @throws {BusConfigError} If the configuration is invalid.
   * @throws {DuplicateTypeError} If `config.types` declares conflicting types.
   */
  constructor(options: MessageBusOptions = {}) {
    const parsed = BusConfigSchema.safeParse(options.config ?? { version: 1 });
    if (!parsed.success) {
      throw new BusConfigError(formatIssues(parsed.error));
    }
    this.config = parsed.data;
    const { reliability } = this.config;

    this.clock = options.clock ?? systemClock;
    const now = (): number => this.clock.now();
    this.logger = options.logger ?? createTaggedLogger('bus', this.config.logging.level);
    this.metrics = options.metrics ?? noopMetrics;
    this.emitter = new TransitionEmitter(this.logger);

    this.registry = new TypeRegistry(now);
    this.subscriptions = new SubscriptionTable(now);
    this.breaker = new CircuitBreakerManager({
      config: reliability.circuitBreaker,
      now,
      onTransition: (event) => this.handleCircuitTransition(event),
    });
    this.retry = new RetryCoordinator({
      breaker: this.breaker,
      clock: this.clock,
      policy: reliability.retry,
      random: options.random,
      isRetryable: options.isRetryable,
    });
    this.deadLetters = new DeadLetterStore({
      capacityPerType: reliability.deadLetter.capacityPerType,
      now,
    });
    this.stats = new BusStatisticsCollector(now);
    this.health = new HealthAggregator({
      config: reliability.health,
      now,
      metrics: this.metrics,
      countSubscribers: (typeCode) => this.subscriptions.count(typeCode),
      onTransition: (event) => this.handleHealthTransition(event),
    });
    this.messages = new MessageFactory(now);

    for (const declaration of this.config.types) {
      this.registry.register(declaration.typeCode, declaration.name);
    }
  }

  // --- Publish ---

  /**
   * Publish a message to every subscriber of its type.
   *
   * Synchronous handlers run inline, retries included, and the returned
   * promise settles once they have all finished. A handler that returns a
   * promise is dispatched as an independent task and counted in
   * `dispatched`; its outcome reaches statistics, health and the dead
   * letter store when it settles.
   *
   * @throws {BusClosedError} If the bus has been closed.
   * @throws {InvalidMessageError} If the message does not match the envelope schema.
   * @throws {NotRegisteredError} If the type is unregistered and registration is required.
   * @throws {AllSubscribersFailedError} With `throwOnTotalFailure`, when every attempted subscriber failed.
   */
  async publish(message: BusMessage, options: PublishOptions = {}): Promise<PublishResult> {
    const admitted = this.admit(message);
    return this.dispatch(admitted, false, options);
  }

  /**
   * Publish a message and wait for every delivery, async handlers included.
   *
   * When `signal` aborts, the current delivery stops before its next
   * attempt and the subscribers not yet reached are counted as cancelled.
   * Cancelled deliveries are not dead-lettered.
   */
  async publishAsync(message: BusMessage, options: PublishAsyncOptions = {}): Promise<PublishResult> {
    const admitted = this.admit(message);
    return this.dispatch(admitted, true, options);
  }

  /**
   * Publish several messages one after another through {@link publishAsync}.
   *
   * A message that throws is recorded in `errors`; the rest of the batch
   * still goes out.
   */
  async publishBatch(
    messages: readonly BusMessage[],
    options: PublishAsyncOptions = {},
  ): Promise<BatchPublishResult> {
    this.assertOpen();
    const results: PublishResult[] = [];
    const errors: BatchPublishError[] = [];

    for (const [index, message] of messages.entries()) {
      try {
        results.push(await this.publishAsync(message, options));
      } catch (error) {
        errors.push({ index, messageId: message.id, error });
      }
    }
    return { results, errors };
  }

  /** Build a frozen message with a fresh ULID and the bus clock's timestamp. */
  createMessage<TPayload>(input: CreateMessageInput<TPayload>): BusMessage<TPayload> {
    return this.messages.create(input);
  }

  // --- Subscribe ---

  /**
   * Subscribe a handler to a message type.
   *
   * @throws {NotRegisteredError} If the type is unregistered and registration is required.
   */
  subscribe(typeCode: number, handler: MessageHandler, options?: SubscribeOptions): SubscriptionHandle {
    this.assertOpen();
    this.assertRegistered(typeCode);
    return this.subscriptions.subscribe(typeCode, handler, options);
  }

  /** @returns `false` when the subscription was already removed. */
  unsubscribe(handle: SubscriptionHandle): boolean {
    return this.subscriptions.unsubscribe(handle);
  }

  setSubscriptionEnabled(handle: SubscriptionHandle, enabled: boolean): boolean {
    return this.subscriptions.setEnabled(handle, enabled);
  }

  createScope(name?: string): SubscriptionScope {
    this.assertOpen();
    return this.subscriptions.createScope(name);
  }

  /**
   * Subscribe on behalf of a scope; the subscription ends when the scope is disposed.
   *
   * @throws {ScopeDisposedError} If the scope has been disposed.
   */
  subscribeInScope(
    scope: SubscriptionScope,
    typeCode: number,
    handler: MessageHandler,
    options?: SubscribeOptions,
  ): SubscriptionHandle {
    this.assertOpen();
    this.assertRegistered(typeCode);
    return this.subscriptions.subscribeInScope(scope, typeCode, handler, options);
  }

  /** @returns Subscriptions cancelled by this call; 0 when already disposed. */
  disposeScope(scope: SubscriptionScope): number {
    return this.subscriptions.disposeScope(scope);
  }

  /** Enabled subscribers for a type. */
  subscriberCount(typeCode: number): number {
    return this.subscriptions.count(typeCode);
  }

  listSubscriptions(): SubscriptionInfo[] {
    return this.subscriptions.listSubscriptions();
  }

  // --- Type Registry ---

  /** @throws {DuplicateTypeError} If the code or name is taken by a different type. */
  registerType(typeCode: number, name: string): MessageTypeInfo {
    return this.registry.register(typeCode, name);
  }

  /** @throws {NotRegisteredError} If the type is unknown. */
  lookupType(typeCode: number): string {
    return this.registry.lookup(typeCode);
  }

  listTypes(): MessageTypeInfo[] {
    return this.registry.list();
  }

  // --- Dead Letters ---

  listDeadLetters(typeCode: number, limit?: number): FailedMessage[] {
    return this.deadLetters.list(typeCode, limit);
  }

  listAllDeadLetters(limit?: number): FailedMessage[] {
    return this.deadLetters.listAll(limit);
  }

  /**
   * Remove a message's dead letters and hand the message back.
   *
   * The bus does not publish it again; pass `result.message` to
   * {@link publish} to do so.
   */
  replayDeadLetter(typeCode: number, messageId: string): ReplayResult {
    return this.deadLetters.replay(typeCode, messageId);
  }

  clearDeadLetters(typeCode?: number): number {
    return this.deadLetters.clear(typeCode);
  }

  purgeDeadLetters(maxAgeMs: number, typeCode?: number): number {
    return this.deadLetters.purgeOlderThan(maxAgeMs, typeCode);
  }

  /** Dead letters for one type, or across every type when omitted. */
  deadLetterCount(typeCode?: number): number {
    return typeCode === undefined ? this.deadLetters.totalSize : this.deadLetters.size(typeCode);
  }

  getDeadLetterStatistics(): DeadLetterStatistics {
    return this.deadLetters.getStatistics();
  }

  // --- Circuit Breakers ---

  getCircuitState(typeCode: number): CircuitState {
    return this.breaker.getState(typeCode);
  }

  /** One snapshot per type that has breaker state, ordered by type code. */
  getCircuitStates(): CircuitSnapshot[] {
    return [...this.breaker.getStates()]
      .map(([typeCode, state]) => ({
        typeCode,
        state: state.state,
        consecutiveFailures: state.consecutiveFailures,
        halfOpenSuccesses: state.halfOpenSuccesses,
        openedAt: state.openedAt,
      }))
      .sort((a, b) => a.typeCode - b.typeCode);
  }

  /** Force a type's circuit closed. */
  resetCircuit(typeCode: number): void {
    this.breaker.reset(typeCode);
  }

  /** @throws {BusConfigError} If the thresholds are invalid. */
  configureCircuitBreaker(typeCode: number, config: Partial<CircuitBreakerConfig>): void {
    this.breaker.configure(typeCode, parseUpdate(CircuitBreakerUpdateSchema, config));
  }

  // --- Retry ---

  /** @throws {InvalidRetryPolicyError} If the merged policy is invalid. */
  setRetryPolicy(typeCode: number, policy: Partial<RetryPolicy>): RetryPolicy {
    return this.retry.setPolicy(typeCode, policy);
  }

  getRetryStatistics(): RetryStatistics {
    return this.retry.getStatistics();
  }

  /**
   * Change reliability defaults while running.
   *
   * Every section is validated before any of them is applied.
   *
   * @throws {BusConfigError} If a circuit breaker, dead letter or health setting is invalid.
   * @throws {InvalidRetryPolicyError} If the merged retry policy is invalid.
   */
  updateReliabilityConfig(update: ReliabilityConfigUpdate): void {
    const circuitBreaker = update.circuitBreaker
      ? parseUpdate(CircuitBreakerUpdateSchema, update.circuitBreaker)
      : undefined;
    const deadLetter = update.deadLetter
      ? parseUpdate(DeadLetterUpdateSchema, update.deadLetter)
      : undefined;
    const health = update.health ? parseUpdate(HealthUpdateSchema, update.health) : undefined;

    if (update.retry) this.retry.updateDefaultPolicy(update.retry);
    if (circuitBreaker) this.breaker.updateConfig(circuitBreaker);
    if (deadLetter?.capacityPerType !== undefined) {
      this.deadLetters.setCapacity(deadLetter.capacityPerType);
    }
    if (health) this.health.updateConfig(health);
  }

  // --- Monitoring ---

  getStatistics(): BusStatistics {
    return this.stats.snapshot();
  }

  /** Status as of the last health check. */
  getHealthStatus(): HealthStatus {
    return this.health.getStatus();
  }

  checkHealth(): HealthReport {
    return this.health.checkHealth();
  }

  /** Report from the most recent health check, or `null` before the first one. */
  getHealthReport(): HealthReport | null {
    return this.health.getLastReport();
  }

  /** Zero every counter and drop the health samples. Subscriptions and dead letters are kept. */
  resetStatistics(): void {
    this.stats.reset();
    this.health.clearSamples();
    this.logger.info('MessageBus: statistics reset');
  }

  onCircuitTransition(listener: (event: CircuitTransitionEvent) => void): Unsubscribe {
    return this.emitter.onCircuitTransition(listener);
  }

  onHealthTransition(listener: (event: HealthTransitionEvent) => void): Unsubscribe {
    return this.emitter.onHealthTransition(listener);
  }

  // --- Lifecycle ---

  /** Start periodic health checks. */
  start(): void {
    this.assertOpen();
    this.health.start();
  }

  /** Wait for every dispatched async delivery, including ones dispatched while waiting. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.all([...this.inFlight]);
    }
  }

  /**
   * Stop health checks, wait for in-flight deliveries and drop all
   * subscriptions and transition listeners. Safe to call more than once.
   */
  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    this.health.stop();
    await this.drain();
    this.subscriptions.clear();
    this.emitter.removeAllListeners();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  // --- Private Helpers ---

  private assertOpen(): void {
    if (this.closed) throw new BusClosedError();
  }

  private assertRegistered(typeCode: number): void {
    if (this.config.requireRegisteredTypes && !this.registry.has(typeCode)) {
      throw new NotRegisteredError(typeCode);
    }
  }

  /** Run the checks that happen before anything is counted. */
  private admit(message: BusMessage): BusMessage {
    this.assertOpen();
    const parsed = BusMessageSchema.safeParse(message);
    if (!parsed.success) {
      throw new InvalidMessageError(formatIssues(parsed.error));
    }
    this.assertRegistered(message.typeCode);
    return Object.isFrozen(message) ? message : Object.freeze({ ...message });
  }

  /**
   * Fan a message out to its type's subscribers.
   *
   * @param awaitAsync - Wait for async handlers instead of dispatching them.
   */
  private async dispatch(
    message: BusMessage,
    awaitAsync: boolean,
    options: PublishAsyncOptions,
  ): Promise<PublishResult> {
    const { typeCode } = message;
    const signal = awaitAsync ? options.signal : undefined;
    const result: PublishResult = {
      messageId: message.id,
      typeCode,
      subscriberCount: 0,
      delivered: 0,
      failed: 0,
      filtered: 0,
      skipped: 0,
      dispatched: 0,
      cancelled: 0,
      failures: [],
      warnings: [],
      rejected: null,
    };

    this.count(typeCode, 'published');
    this.health.recordPublish(typeCode);

    if (this.breaker.isOpen(typeCode)) {
      result.rejected = new CircuitOpenError(typeCode, 'OPEN');
      this.count(typeCode, 'circuitRejected');
      this.logger.warn(
        `MessageBus: circuit open, message type ${typeCode} not delivered`,
        logContext(message.correlationId, { messageId: message.id }),
      );
      return result;
    }

    const subscribers = this.subscriptions.getSubscribers(typeCode);
    result.subscriberCount = subscribers.length;
    if (!subscribers.some((entry) => entry.enabled)) {
      this.count(typeCode, 'noSubscribers');
      result.warnings.push({
        code: 'NO_SUBSCRIBERS',
        typeCode,
        message: `No subscribers for message type ${typeCode}`,
      });
      this.logger.debug(
        `MessageBus: no subscribers for message type ${typeCode}`,
        logContext(message.correlationId, { messageId: message.id }),
      );
    }

    let attempted = 0;
    for (const [index, entry] of subscribers.entries()) {
      if (signal?.aborted) {
        const remaining = subscribers.slice(index).filter((candidate) => candidate.enabled).length;
        result.cancelled += remaining;
        this.count(typeCode, 'cancelled', remaining);
        break;
      }

      if (!entry.enabled) {
        result.skipped++;
        continue;
      }

      let accepted: boolean;
      try {
        accepted = this.accepts(entry, message);
      } catch (err) {
        attempted++;
        this.apply(
          result,
          this.settle(message, entry, { status: 'non_retryable', attempts: 0, error: err }, this.clock.now()),
        );
        continue;
      }
      if (!accepted) {
        result.filtered++;
        this.count(typeCode, 'filtered');
        continue;
      }

      attempted++;
      const startedAt = this.clock.now();
      const firstAttempt = { async: false };
      const run = this.retry.execute(
        typeCode,
        (attempt) => {
          const returned = entry.handler(message);
          if (attempt === 1 && isPromiseLike(returned)) firstAttempt.async = true;
          return returned;
        },
        { signal },
      );

      if (!awaitAsync && firstAttempt.async) {
        result.dispatched++;
        this.track(run.then((outcome) => this.settle(message, entry, outcome, startedAt)));
        continue;
      }

      this.apply(result, this.settle(message, entry, await run, startedAt));
    }

    if (
      options.throwOnTotalFailure &&
      attempted > 0 &&
      result.dispatched === 0 &&
      result.failed === attempted
    ) {
      throw new AllSubscribersFailedError(
        message.id,
        result.failures.map((failure) => failure.error),
      );
    }
    return result;
  }

  /** Priority threshold first, then the filter predicate. */
  private accepts(entry: SubscriberEntry, message: BusMessage): boolean {
    if (entry.minPriority && PRIORITY_RANK[message.priority] < PRIORITY_RANK[entry.minPriority]) {
      return false;
    }
    return entry.filter ? entry.filter(message) : true;
  }

  /** Account for a finished delivery in statistics, health and the dead letter store. */
  private settle(
    message: BusMessage,
    entry: SubscriberEntry,
    outcome: RetryOutcome,
    startedAt: number,
  ): Settled {
    const { typeCode } = message;
    this.count(typeCode, 'retries', Math.max(0, outcome.attempts - 1));

    if (outcome.status === 'cancelled') {
      this.count(typeCode, 'cancelled');
      return { kind: 'cancelled' };
    }

    const latencyMs = this.clock.now() - startedAt;
    this.stats.recordLatency(typeCode, latencyMs);

    if (outcome.status === 'delivered') {
      this.count(typeCode, 'delivered');
      this.health.recordDelivery(true, latencyMs);
      return { kind: 'delivered' };
    }

    this.count(typeCode, 'failed');
    if (outcome.status === 'circuit_open') this.count(typeCode, 'circuitRejected');
    this.health.recordDelivery(false, latencyMs);
    this.deadLetters.add(typeCode, message, outcome.error, outcome.attempts, entry.id);
    this.count(typeCode, 'deadLettered');
    this.logger.warn(
      `MessageBus: delivery to subscription ${entry.id} failed (${outcome.status})`,
      logContext(message.correlationId, {
        messageId: message.id,
        typeCode,
        attempts: outcome.attempts,
        error: describeError(outcome.error),
      }),
    );

    return {
      kind: 'failed',
      failure: {
        subscriptionId: entry.id,
        status: outcome.status,
        attempts: outcome.attempts,
        error: this.wrapFailure(typeCode, entry, outcome),
      },
    };
  }

  private wrapFailure(
    typeCode: number,
    entry: SubscriberEntry,
    outcome: Extract<RetryOutcome, { status: DeliveryFailure['status'] }>,
  ): BusError {
    switch (outcome.status) {
      case 'circuit_open':
        return outcome.error;
      case 'retries_exhausted':
        return new RetriesExhaustedError(typeCode, outcome.attempts, outcome.error);
      case 'non_retryable':
        return new SubscriberHandlerError(entry.id, outcome.error);
    }
  }

  private apply(result: PublishResult, settled: Settled): void {
    switch (settled.kind) {
      case 'delivered':
        result.delivered++;
        break;
      case 'cancelled':
        result.cancelled++;
        break;
      case 'failed':
        result.failed++;
        result.failures.push(settled.failure);
        break;
    }
  }

  /** Keep a dispatched delivery visible to {@link drain} until it settles. */
  private track(delivery: Promise<unknown>): void {
    const task: Promise<void> = delivery
      .then(() => undefined)
      .catch((err: unknown) => {
        this.logger.error('MessageBus: dispatched delivery could not be accounted', logError(err));
      })
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }

  private count(typeCode: number, counter: CounterName, delta = 1): void {
    if (delta <= 0) return;
    this.stats.increment(typeCode, counter, delta);
    this.metrics.recordCounter(COUNTER_METRICS[counter], delta);
  }

  private handleCircuitTransition(event: CircuitTransitionEvent): void {
    const line = `MessageBus: circuit for message type ${event.typeCode} ${event.from} -> ${event.to} (${event.reason})`;
    if (event.to === 'OPEN') {
      this.logger.warn(line, { consecutiveFailures: event.consecutiveFailures });
    } else {
      this.logger.info(line);
    }
    this.emitter.emitCircuitTransition(event);
  }

  private handleHealthTransition(event: HealthTransitionEvent): void {
    const line = `MessageBus: health ${event.from} -> ${event.to}`;
    if (event.to === 'healthy') {
      this.logger.info(line);
    } else {
      this.logger.warn(line, { reasons: event.report.reasons });
    }
    this.emitter.emitHealthTransition(event);
  }
}
