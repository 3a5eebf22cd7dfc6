/**
 * Bounded in-memory dead letter store for the message bus.
 *
 * Holds deliveries that could not be completed (retries exhausted, circuit
 * opened mid-retry, permanent failure) so an operator can inspect them and
 * hand them back to a publisher. Each message type has its own FIFO buffer;
 * when a buffer is full the oldest entry is evicted to make room. Eviction
 * is counted, never reported as an error.
 *
 * Replay only removes entries and returns the failed message. Publishing
 * it again is the caller's decision.
 *
 * @module bus/dead-letter-store
 */
import { monotonicFactory } from 'ulidx';
import { DeadLetterNotFoundError, describeError, errorName } from './errors.js';
import type {
  BusMessage,
  DeadLetterStatistics,
  FailedMessage,
  FailureReasonCount,
} from './types.js';

// === Types ===

export interface DeadLetterStoreOptions {
  /** Maximum entries kept per message type. Default 1000. */
  capacityPerType?: number;
  /** Time source in ms. Defaults to `Date.now`. */
  now?: () => number;
}

/** Result of a replay operation. */
export type ReplayResult =
  | { ok: true; message: BusMessage; removed: number }
  | { ok: false; error: DeadLetterNotFoundError };

const DEFAULT_LIST_LIMIT = 100;
const TOP_REASON_COUNT = 5;

// === DeadLetterStore ===

/**
 * Per-type bounded dead letter buffers.
 *
 * @example
 * ```ts
 * const store = new DeadLetterStore({ capacityPerType: 500 });
 *
 * store.add(42, message, new Error('timeout'), 3, subscriptionId);
 * const recent = store.list(42, 10);
 *
 * const replay = store.replay(42, message.id);
 * if (replay.ok) await bus.publish(replay.message);
 * ```
 */
export class DeadLetterStore {
  private readonly generateUlid = monotonicFactory();
  private readonly buffers = new Map<number, FailedMessage[]>();
  private readonly now: () => number;
  private capacityPerType: number;

  private totalAdded = 0;
  private totalReplayed = 0;
  private totalEvicted = 0;
  private totalCleared = 0;
  private totalPurged = 0;

  constructor(options: DeadLetterStoreOptions = {}) {
    this.capacityPerType = options.capacityPerType ?? 1000;
    this.now = options.now ?? Date.now;
  }

  /**
   * Record a failed delivery.
   *
   * @param error - The last failure; stored as its message and class name.
   * @param attemptCount - Attempts made before giving up.
   * @param subscriptionId - The subscription whose delivery failed, when known.
   */
  add(
    typeCode: number,
    message: BusMessage,
    error: unknown,
    attemptCount: number,
    subscriptionId?: string,
  ): FailedMessage {
    const entry: FailedMessage = Object.freeze({
      id: this.generateUlid(),
      typeCode,
      message,
      subscriptionId: subscriptionId ?? null,
      error: describeError(error),
      errorName: errorName(error),
      attemptCount,
      failedAt: new Date(this.now()).toISOString(),
    });

    let buffer = this.buffers.get(typeCode);
    if (!buffer) {
      buffer = [];
      this.buffers.set(typeCode, buffer);
    }
    buffer.push(entry);
    this.totalAdded++;

    while (buffer.length > this.capacityPerType) {
      buffer.shift();
      this.totalEvicted++;
    }
    return entry;
  }

  /** Entries for one type, newest first. */
  list(typeCode: number, limit = DEFAULT_LIST_LIMIT): FailedMessage[] {
    const buffer = this.buffers.get(typeCode) ?? [];
    return buffer.slice(Math.max(0, buffer.length - Math.max(0, limit))).reverse();
  }

  /** Entries across all types, newest first. */
  listAll(limit = DEFAULT_LIST_LIMIT): FailedMessage[] {
    const all: FailedMessage[] = [];
    for (const buffer of this.buffers.values()) all.push(...buffer);
    // ULIDs from a monotonic factory sort in creation order.
    all.sort((a, b) => (a.id < b.id ? 1 : a.id > b.id ? -1 : 0));
    return all.slice(0, Math.max(0, limit));
  }

  /**
   * Remove every entry for a message and return the message.
   *
   * A message that failed for several subscribers has one entry per
   * subscriber; all of them are removed.
   */
  replay(typeCode: number, messageId: string): ReplayResult {
    const buffer = this.buffers.get(typeCode);
    const matches = buffer?.filter((entry) => entry.message.id === messageId) ?? [];
    const first = matches[0];
    if (!buffer || !first) {
      return { ok: false, error: new DeadLetterNotFoundError(typeCode, messageId) };
    }

    this.setBuffer(
      typeCode,
      buffer.filter((entry) => entry.message.id !== messageId),
    );
    this.totalReplayed += matches.length;
    return { ok: true, message: first.message, removed: matches.length };
  }

  /**
   * Drop entries for one type, or for every type when omitted.
   *
   * @returns Number of entries removed.
   */
  clear(typeCode?: number): number {
    let removed = 0;
    if (typeCode === undefined) {
      for (const buffer of this.buffers.values()) removed += buffer.length;
      this.buffers.clear();
    } else {
      removed = this.buffers.get(typeCode)?.length ?? 0;
      this.buffers.delete(typeCode);
    }
    this.totalCleared += removed;
    return removed;
  }

  /**
   * Remove entries older than `maxAgeMs`.
   *
   * @returns Number of entries purged.
   */
  purgeOlderThan(maxAgeMs: number, typeCode?: number): number {
    const cutoff = this.now() - maxAgeMs;
    const codes = typeCode === undefined ? [...this.buffers.keys()] : [typeCode];
    let purged = 0;

    for (const code of codes) {
      const buffer = this.buffers.get(code);
      if (!buffer) continue;
      const kept = buffer.filter((entry) => Date.parse(entry.failedAt) >= cutoff);
      purged += buffer.length - kept.length;
      this.setBuffer(code, kept);
    }

    this.totalPurged += purged;
    return purged;
  }

  size(typeCode: number): number {
    return this.buffers.get(typeCode)?.length ?? 0;
  }

  get totalSize(): number {
    let total = 0;
    for (const buffer of this.buffers.values()) total += buffer.length;
    return total;
  }

  /**
   * Change the per-type capacity. Buffers over the new limit lose their
   * oldest entries immediately.
   */
  setCapacity(capacityPerType: number): void {
    this.capacityPerType = capacityPerType;
    for (const buffer of this.buffers.values()) {
      while (buffer.length > capacityPerType) {
        buffer.shift();
        this.totalEvicted++;
      }
    }
  }

  getStatistics(): DeadLetterStatistics {
    return {
      currentSize: this.totalSize,
      capacityPerType: this.capacityPerType,
      totalAdded: this.totalAdded,
      totalReplayed: this.totalReplayed,
      totalEvicted: this.totalEvicted,
      totalCleared: this.totalCleared,
      totalPurged: this.totalPurged,
      topFailureReasons: this.topFailureReasons(),
    };
  }

  // === Private helpers ===

  /** Most frequent error descriptions among current entries, ties broken alphabetically. */
  private topFailureReasons(): FailureReasonCount[] {
    const counts = new Map<string, number>();
    for (const buffer of this.buffers.values()) {
      for (const entry of buffer) {
        counts.set(entry.error, (counts.get(entry.error) ?? 0) + 1);
      }
    }
    return [...counts.entries()]
      .map(([reason, count]) => ({ reason, count }))
      .sort((a, b) => b.count - a.count || a.reason.localeCompare(b.reason))
      .slice(0, TOP_REASON_COUNT);
  }

  private setBuffer(typeCode: number, entries: FailedMessage[]): void {
    if (entries.length === 0) {
      this.buffers.delete(typeCode);
    } else {
      this.buffers.set(typeCode, entries);
    }
  }
}
