/**
 * Error classes for the message bus.
 *
 * Every error carries a machine-readable `code` for programmatic handling.
 * Configuration errors are thrown synchronously at setup time; delivery
 * errors are recorded and surfaced through publish results, statistics and
 * the dead-letter store instead of being thrown at the publisher.
 *
 * @module bus/errors
 */
import type { CircuitState } from './types.js';

/** Machine-readable error codes for bus operations. */
export type BusErrorCode =
  | 'DUPLICATE_TYPE'
  | 'NOT_REGISTERED'
  | 'CIRCUIT_OPEN'
  | 'RETRIES_EXHAUSTED'
  | 'SUBSCRIBER_HANDLER'
  | 'PERMANENT_DELIVERY'
  | 'DEAD_LETTER_NOT_FOUND'
  | 'ALL_SUBSCRIBERS_FAILED'
  | 'INVALID_RETRY_POLICY'
  | 'INVALID_CONFIG'
  | 'INVALID_MESSAGE'
  | 'SCOPE_DISPOSED'
  | 'BUS_CLOSED';

/** Base class for every error raised by the bus. */
export class BusError extends Error {
  constructor(
    message: string,
    public readonly code: BusErrorCode,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'BusError';
  }
}

export class DuplicateTypeError extends BusError {
  constructor(
    public readonly typeCode: number,
    public readonly typeName: string,
    existing: string,
  ) {
    super(`Message type ${typeCode} ("${typeName}") conflicts with ${existing}`, 'DUPLICATE_TYPE');
    this.name = 'DuplicateTypeError';
  }
}

export class NotRegisteredError extends BusError {
  constructor(public readonly typeCode: number) {
    super(`Message type ${typeCode} is not registered`, 'NOT_REGISTERED');
    this.name = 'NotRegisteredError';
  }
}

export class CircuitOpenError extends BusError {
  constructor(
    public readonly typeCode: number,
    public readonly state: CircuitState,
    reason?: string,
  ) {
    super(reason ?? `circuit open for message type ${typeCode}`, 'CIRCUIT_OPEN');
    this.name = 'CircuitOpenError';
  }
}

export class RetriesExhaustedError extends BusError {
  constructor(
    public readonly typeCode: number,
    public readonly attempts: number,
    lastError: unknown,
  ) {
    super(
      `Delivery of message type ${typeCode} failed after ${attempts} attempt(s): ${describeError(lastError)}`,
      'RETRIES_EXHAUSTED',
      { cause: lastError },
    );
    this.name = 'RetriesExhaustedError';
  }
}

/** Wraps a value thrown by a subscriber handler. */
export class SubscriberHandlerError extends BusError {
  constructor(
    public readonly subscriptionId: string,
    cause: unknown,
  ) {
    super(`Subscriber ${subscriptionId} failed: ${describeError(cause)}`, 'SUBSCRIBER_HANDLER', {
      cause,
    });
    this.name = 'SubscriberHandlerError';
  }
}

/**
 * Thrown by a handler to signal that retrying cannot succeed.
 *
 * The retry coordinator stops immediately and the message is dead-lettered.
 */
export class PermanentDeliveryError extends BusError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'PERMANENT_DELIVERY', options);
    this.name = 'PermanentDeliveryError';
  }
}

export class DeadLetterNotFoundError extends BusError {
  constructor(
    public readonly typeCode: number,
    public readonly messageId: string,
  ) {
    super(`No dead letter for message ${messageId} of type ${typeCode}`, 'DEAD_LETTER_NOT_FOUND');
    this.name = 'DeadLetterNotFoundError';
  }
}

/** Summary error for a publish whose every attempted subscriber failed. */
export class AllSubscribersFailedError extends BusError {
  constructor(
    public readonly messageId: string,
    public readonly errors: readonly unknown[],
  ) {
    super(
      `All ${errors.length} subscriber(s) failed for message ${messageId}`,
      'ALL_SUBSCRIBERS_FAILED',
    );
    this.name = 'AllSubscribersFailedError';
  }
}

export class InvalidRetryPolicyError extends BusError {
  constructor(detail: string) {
    super(`Invalid retry policy: ${detail}`, 'INVALID_RETRY_POLICY');
    this.name = 'InvalidRetryPolicyError';
  }
}

export class BusConfigError extends BusError {
  constructor(detail: string) {
    super(`Invalid bus configuration: ${detail}`, 'INVALID_CONFIG');
    this.name = 'BusConfigError';
  }
}

export class InvalidMessageError extends BusError {
  constructor(detail: string) {
    super(`Invalid message: ${detail}`, 'INVALID_MESSAGE');
    this.name = 'InvalidMessageError';
  }
}

export class ScopeDisposedError extends BusError {
  constructor(public readonly scopeId: string) {
    super(`Scope ${scopeId} has been disposed`, 'SCOPE_DISPOSED');
    this.name = 'ScopeDisposedError';
  }
}

export class BusClosedError extends BusError {
  constructor() {
    super('MessageBus has been closed', 'BUS_CLOSED');
    this.name = 'BusClosedError';
  }
}

/** Render any thrown value as a one-line description. */
export function describeError(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}

/** Name of the error class, or the typeof for non-Error throwables. */
export function errorName(err: unknown): string {
  if (err instanceof Error) return err.name;
  return typeof err;
}
