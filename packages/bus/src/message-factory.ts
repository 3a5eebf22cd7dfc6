import { monotonicFactory } from 'ulidx';
import type { BusMessage, MessagePriority } from './types.js';

export interface CreateMessageInput<TPayload> {
  typeCode: number;
  payload: TPayload;
  /** Free-text origin of the message. Default `'unknown'`. */
  source?: string;
  /** Default `'normal'`. */
  priority?: MessagePriority;
  correlationId?: string;
}

/** Builds frozen bus messages with ULID ids and clock-derived timestamps. */
export class MessageFactory {
  private readonly generateUlid = monotonicFactory();

  constructor(private readonly now: () => number = Date.now) {}

  create<TPayload>(input: CreateMessageInput<TPayload>): BusMessage<TPayload> {
    const timestamp = this.now();
    const message: BusMessage<TPayload> = {
      id: this.generateUlid(timestamp),
      createdAt: new Date(timestamp).toISOString(),
      typeCode: input.typeCode,
      source: input.source ?? 'unknown',
      priority: input.priority ?? 'normal',
      ...(input.correlationId !== undefined ? { correlationId: input.correlationId } : {}),
      payload: input.payload,
    };
    return Object.freeze(message);
  }
}
