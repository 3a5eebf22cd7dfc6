/**
 * Publish and delivery counters for the message bus.
 *
 * Only the bus orchestrator mutates a collector. Readers get frozen
 * snapshots shaped like `BusStatisticsSchema`, so a snapshot taken before
 * a publish never changes afterwards.
 *
 * @module bus/bus-statistics
 */
import type { BusStatistics, TypeStatistics } from './types.js';

interface TypeCounters {
  published: number;
  delivered: number;
  failed: number;
  filtered: number;
  deadLettered: number;
  circuitRejected: number;
  cancelled: number;
  noSubscribers: number;
  retries: number;
  latencyTotalMs: number;
  latencySamples: number;
  maxLatencyMs: number;
  lastPublishedAt: number | null;
}

/** Counters that are plain increments, as opposed to latency aggregates. */
export type CounterName =
  | 'published'
  | 'delivered'
  | 'failed'
  | 'filtered'
  | 'deadLettered'
  | 'circuitRejected'
  | 'cancelled'
  | 'noSubscribers'
  | 'retries';

function emptyCounters(): TypeCounters {
  return {
    published: 0,
    delivered: 0,
    failed: 0,
    filtered: 0,
    deadLettered: 0,
    circuitRejected: 0,
    cancelled: 0,
    noSubscribers: 0,
    retries: 0,
    latencyTotalMs: 0,
    latencySamples: 0,
    maxLatencyMs: 0,
    lastPublishedAt: null,
  };
}

function average(total: number, samples: number): number {
  return samples === 0 ? 0 : total / samples;
}

export class BusStatisticsCollector {
  private readonly byType = new Map<number, TypeCounters>();

  constructor(private readonly now: () => number = Date.now) {}

  increment(typeCode: number, counter: CounterName, delta = 1): void {
    if (delta <= 0) return;
    const counters = this.countersFor(typeCode);
    counters[counter] += delta;
    if (counter === 'published') {
      counters.lastPublishedAt = this.now();
    }
  }

  /** Record how long a delivery took to reach its final outcome. */
  recordLatency(typeCode: number, latencyMs: number): void {
    const counters = this.countersFor(typeCode);
    const sample = Math.max(0, latencyMs);
    counters.latencyTotalMs += sample;
    counters.latencySamples++;
    counters.maxLatencyMs = Math.max(counters.maxLatencyMs, sample);
  }

  snapshot(): BusStatistics {
    const byType: TypeStatistics[] = [];
    let latencyTotal = 0;
    let latencySamples = 0;
    const totals = {
      totalPublished: 0,
      totalDelivered: 0,
      totalFailed: 0,
      totalFiltered: 0,
      totalDeadLettered: 0,
      totalCircuitRejected: 0,
      totalCancelled: 0,
      totalNoSubscribers: 0,
      totalRetries: 0,
      maxLatencyMs: 0,
    };

    const codes = [...this.byType.keys()].sort((a, b) => a - b);
    for (const typeCode of codes) {
      const c = this.countersFor(typeCode);
      byType.push(
        Object.freeze({
          typeCode,
          published: c.published,
          delivered: c.delivered,
          failed: c.failed,
          filtered: c.filtered,
          deadLettered: c.deadLettered,
          circuitRejected: c.circuitRejected,
          cancelled: c.cancelled,
          noSubscribers: c.noSubscribers,
          retries: c.retries,
          averageLatencyMs: average(c.latencyTotalMs, c.latencySamples),
          maxLatencyMs: c.maxLatencyMs,
          lastPublishedAt: c.lastPublishedAt === null ? null : new Date(c.lastPublishedAt).toISOString(),
        }),
      );

      totals.totalPublished += c.published;
      totals.totalDelivered += c.delivered;
      totals.totalFailed += c.failed;
      totals.totalFiltered += c.filtered;
      totals.totalDeadLettered += c.deadLettered;
      totals.totalCircuitRejected += c.circuitRejected;
      totals.totalCancelled += c.cancelled;
      totals.totalNoSubscribers += c.noSubscribers;
      totals.totalRetries += c.retries;
      totals.maxLatencyMs = Math.max(totals.maxLatencyMs, c.maxLatencyMs);
      latencyTotal += c.latencyTotalMs;
      latencySamples += c.latencySamples;
    }

    Object.freeze(byType);
    return Object.freeze({
      ...totals,
      averageLatencyMs: average(latencyTotal, latencySamples),
      byType,
      capturedAt: new Date(this.now()).toISOString(),
    });
  }

  reset(): void {
    this.byType.clear();
  }

  private countersFor(typeCode: number): TypeCounters {
    let counters = this.byType.get(typeCode);
    if (!counters) {
      counters = emptyCounters();
      this.byType.set(typeCode, counters);
    }
    return counters;
  }
}
