/**
 * Notifications for circuit breaker and health status changes.
 *
 * Kept apart from the bus's own publish/subscribe path so a monitoring
 * listener never competes with, or depends on, the delivery machinery it
 * observes. Listeners run synchronously in registration order; one that
 * throws is logged and the remaining listeners still run.
 *
 * @module bus/transition-emitter
 */
import { EventEmitter } from 'node:events';
import type { Logger } from '@signalpost/shared/logger';
import { logError } from './lib/logger.js';
import type { CircuitTransitionEvent, HealthTransitionEvent, Unsubscribe } from './types.js';

// === Constants ===

const CIRCUIT_EVENT = 'circuit';
const HEALTH_EVENT = 'health';

const MAX_LISTENERS = 100;

// === Types ===

export type CircuitTransitionListener = (event: CircuitTransitionEvent) => void;
export type HealthTransitionListener = (event: HealthTransitionEvent) => void;

// === TransitionEmitter ===

export class TransitionEmitter {
  private readonly ee = new EventEmitter();

  constructor(private readonly logger: Logger) {
    this.ee.setMaxListeners(MAX_LISTENERS);
  }

  onCircuitTransition(listener: CircuitTransitionListener): Unsubscribe {
    return this.listen(CIRCUIT_EVENT, listener);
  }

  onHealthTransition(listener: HealthTransitionListener): Unsubscribe {
    return this.listen(HEALTH_EVENT, listener);
  }

  emitCircuitTransition(event: CircuitTransitionEvent): void {
    this.ee.emit(CIRCUIT_EVENT, event);
  }

  emitHealthTransition(event: HealthTransitionEvent): void {
    this.ee.emit(HEALTH_EVENT, event);
  }

  get listenerCount(): number {
    return this.ee.listenerCount(CIRCUIT_EVENT) + this.ee.listenerCount(HEALTH_EVENT);
  }

  removeAllListeners(): void {
    this.ee.removeAllListeners();
  }

  private listen<T>(eventName: string, listener: (event: T) => void): Unsubscribe {
    const wrapped = (event: T): void => {
      try {
        listener(event);
      } catch (err) {
        this.logger.error(`TransitionEmitter: ${eventName} listener threw`, logError(err));
      }
    };
    this.ee.on(eventName, wrapped);
    return () => {
      this.ee.removeListener(eventName, wrapped);
    };
  }
}
