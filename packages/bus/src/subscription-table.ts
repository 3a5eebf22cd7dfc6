/**
 * Per-type subscription table for the message bus.
 *
 * Subscribers register interest in a message type code, optionally with a
 * filter predicate and a minimum priority. Subscriptions may belong to a
 * scope, which cancels all of them at once when disposed.
 *
 * Each type's subscriber list is replaced wholesale on every mutation
 * (copy-on-write) and frozen, so {@link SubscriptionTable.getSubscribers}
 * hands out an immutable snapshot. A handler that subscribes or
 * unsubscribes while a message is being delivered changes the next
 * snapshot, never the one being iterated.
 *
 * @module bus/subscription-table
 */
import { monotonicFactory } from 'ulidx';
import { ScopeDisposedError } from './errors.js';
import type {
  MessageHandler,
  ScopeInfo,
  SubscribeOptions,
  SubscriberEntry,
  SubscriptionHandle,
  SubscriptionInfo,
} from './types.js';

/** Bookkeeping for a scope; `subscriptionIds` holds only live subscriptions. */
interface ScopeRecord {
  id: string;
  name: string | null;
  active: boolean;
  subscriptionIds: Set<string>;
  createdAt: string;
}

const EMPTY: readonly SubscriberEntry[] = Object.freeze([]);

/**
 * A named group of subscriptions with a shared lifetime.
 *
 * Obtained from {@link SubscriptionTable.createScope}; `active` and
 * `subscriptionCount` read through to the owning table.
 */
export class SubscriptionScope {
  constructor(
    readonly id: string,
    readonly name: string | null,
    private readonly table: SubscriptionTable,
  ) {}

  get active(): boolean {
    return this.table.getScope(this.id)?.active ?? false;
  }

  get subscriptionCount(): number {
    return this.table.getScope(this.id)?.subscriptionCount ?? 0;
  }
}

export class SubscriptionTable {
  /** ULID generator for subscription and scope IDs. Monotonic to guarantee ordering. */
  private readonly generateUlid = monotonicFactory();

  /** Subscription ID -> entry mapping. */
  private readonly entries = new Map<string, SubscriberEntry>();

  /** Type code -> frozen subscriber list in subscription order. */
  private readonly byType = new Map<number, readonly SubscriberEntry[]>();

  private readonly scopes = new Map<string, ScopeRecord>();
  private sequence = 0;

  constructor(private readonly now: () => number = Date.now) {}

  /**
   * Subscribe a handler to a message type.
   *
   * @returns A {@link SubscriptionHandle} to pass to {@link unsubscribe}
   */
  subscribe(
    typeCode: number,
    handler: MessageHandler,
    options: SubscribeOptions = {},
  ): SubscriptionHandle {
    return this.add(typeCode, handler, options, null);
  }

  /**
   * Subscribe a handler on behalf of a scope.
   *
   * @throws {ScopeDisposedError} If the scope is unknown or already disposed
   */
  subscribeInScope(
    scope: SubscriptionScope,
    typeCode: number,
    handler: MessageHandler,
    options: SubscribeOptions = {},
  ): SubscriptionHandle {
    const record = this.scopes.get(scope.id);
    if (!record || !record.active) {
      throw new ScopeDisposedError(scope.id);
    }
    const handle = this.add(typeCode, handler, options, record.id);
    record.subscriptionIds.add(handle.id);
    return handle;
  }

  /**
   * Remove a subscription.
   *
   * @returns `false` when the subscription was already removed
   */
  unsubscribe(handle: SubscriptionHandle): boolean {
    return this.remove(handle.id);
  }

  /** Enable or disable a subscription without removing it. */
  setEnabled(handle: SubscriptionHandle, enabled: boolean): boolean {
    const entry = this.entries.get(handle.id);
    if (!entry) return false;
    if (entry.enabled === enabled) return true;

    const updated: SubscriberEntry = Object.freeze({ ...entry, enabled });
    this.entries.set(entry.id, updated);
    this.replaceType(entry.typeCode, (list) =>
      list.map((candidate) => (candidate.id === entry.id ? updated : candidate)),
    );
    return true;
  }

  createScope(name?: string): SubscriptionScope {
    const id = this.generateUlid();
    this.scopes.set(id, {
      id,
      name: name ?? null,
      active: true,
      subscriptionIds: new Set(),
      createdAt: new Date(this.now()).toISOString(),
    });
    return new SubscriptionScope(id, name ?? null, this);
  }

  /**
   * Dispose a scope, cancelling every subscription created through it.
   *
   * The scope's record is dropped, so {@link getScope} no longer knows it.
   * Disposing an already-disposed scope does nothing.
   *
   * @returns The number of subscriptions cancelled by this call
   */
  disposeScope(scope: SubscriptionScope): number {
    const record = this.scopes.get(scope.id);
    if (!record || !record.active) return 0;

    record.active = false;
    let cancelled = 0;
    for (const id of [...record.subscriptionIds]) {
      if (this.remove(id)) cancelled++;
    }
    record.subscriptionIds.clear();
    this.scopes.delete(record.id);
    return cancelled;
  }

  getScope(id: string): ScopeInfo | undefined {
    const record = this.scopes.get(id);
    if (!record) return undefined;
    return {
      id: record.id,
      name: record.name,
      active: record.active,
      subscriptionCount: record.subscriptionIds.size,
      createdAt: record.createdAt,
    };
  }

  /**
   * Snapshot of a type's subscribers in subscription order.
   *
   * The returned array is frozen and never changes after it is handed out.
   */
  getSubscribers(typeCode: number): readonly SubscriberEntry[] {
    return this.byType.get(typeCode) ?? EMPTY;
  }

  /** Number of enabled subscribers for a type. */
  count(typeCode: number): number {
    let enabled = 0;
    for (const entry of this.getSubscribers(typeCode)) {
      if (entry.enabled) enabled++;
    }
    return enabled;
  }

  /**
   * List all active subscriptions.
   *
   * Returns metadata only; handler functions are not exposed.
   */
  listSubscriptions(): SubscriptionInfo[] {
    const result: SubscriptionInfo[] = [];
    for (const entry of this.entries.values()) {
      result.push({
        id: entry.id,
        typeCode: entry.typeCode,
        scopeId: entry.scopeId,
        enabled: entry.enabled,
        createdAt: entry.createdAt,
      });
    }
    return result;
  }

  /** Total number of live subscriptions across all types. */
  get size(): number {
    return this.entries.size;
  }

  /** Drop every subscription and every scope. */
  clear(): void {
    this.entries.clear();
    this.byType.clear();
    this.scopes.clear();
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private add(
    typeCode: number,
    handler: MessageHandler,
    options: SubscribeOptions,
    scopeId: string | null,
  ): SubscriptionHandle {
    const id = this.generateUlid();
    const entry: SubscriberEntry = Object.freeze({
      id,
      typeCode,
      scopeId,
      handler,
      filter: options.filter ?? null,
      minPriority: options.minPriority ?? null,
      enabled: options.enabled ?? true,
      sequence: this.sequence++,
      createdAt: new Date(this.now()).toISOString(),
    });

    this.entries.set(id, entry);
    this.replaceType(typeCode, (list) => [...list, entry]);

    return Object.freeze({ id, typeCode });
  }

  private remove(id: string): boolean {
    const entry = this.entries.get(id);
    if (!entry) return false;

    this.entries.delete(id);
    this.replaceType(entry.typeCode, (list) => list.filter((candidate) => candidate.id !== id));
    if (entry.scopeId) {
      this.scopes.get(entry.scopeId)?.subscriptionIds.delete(id);
    }
    return true;
  }

  private replaceType(
    typeCode: number,
    update: (list: readonly SubscriberEntry[]) => SubscriberEntry[],
  ): void {
    const next = update(this.getSubscribers(typeCode));
    if (next.length === 0) {
      this.byType.delete(typeCode);
    } else {
      this.byType.set(typeCode, Object.freeze(next));
    }
  }
}
