import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { HealthConfigSchema } from '@signalpost/shared/bus-schemas';
import { HealthAggregator } from '../health-aggregator.js';
import type { HealthConfig, HealthTransitionEvent, MetricsRecorder } from '../types.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

const START = Date.parse('2026-03-01T12:00:00.000Z');

let now: number;
let subscriberCounts: Map<number, number>;
let transitions: HealthTransitionEvent[];
let recordGauge: ReturnType<typeof vi.fn>;
let metrics: MetricsRecorder;

function createAggregator(config: Partial<HealthConfig> = {}): HealthAggregator {
  return new HealthAggregator({
    config: HealthConfigSchema.parse(config),
    now: () => now,
    metrics,
    countSubscribers: (typeCode) => subscriberCounts.get(typeCode) ?? 0,
    onTransition: (event) => transitions.push(event),
  });
}

function recordOutcomes(health: HealthAggregator, outcomes: boolean[], latencyMs = 5): void {
  for (const success of outcomes) health.recordDelivery(success, latencyMs);
}

beforeEach(() => {
  now = START;
  subscriberCounts = new Map();
  transitions = [];
  recordGauge = vi.fn();
  metrics = { recordCounter: vi.fn(), recordGauge };
});

describe('HealthAggregator', () => {
  it('is healthy with no samples', () => {
    const health = createAggregator();

    const report = health.checkHealth();

    expect(report).toEqual({
      status: 'healthy',
      previousStatus: 'healthy',
      errorRate: 0,
      averageLatencyMs: 0,
      delivered: 0,
      failed: 0,
      orphanedTypes: [],
      reasons: [],
      checkedAt: '2026-03-01T12:00:00.000Z',
    });
    expect(transitions).toEqual([]);
  });

  it('degrades when the error rate passes the degraded threshold', () => {
    const health = createAggregator();
    recordOutcomes(health, [true, true, true, false]);

    const report = health.checkHealth();

    expect(report.status).toBe('degraded');
    expect(report.errorRate).toBe(0.25);
    expect(report.reasons).toEqual(['error rate 25.0% above 10.0%']);
    expect(transitions).toHaveLength(1);
    expect(transitions[0]).toMatchObject({ from: 'healthy', to: 'degraded', timestamp: START });
  });

  it('becomes unhealthy when the error rate passes the unhealthy threshold', () => {
    const health = createAggregator();
    recordOutcomes(health, [true, false, false, false]);

    const report = health.checkHealth();

    expect(report.status).toBe('unhealthy');
    expect(report.reasons).toEqual(['error rate 75.0% above 50.0%']);
    expect(health.getStatus()).toBe('unhealthy');
  });

  it('degrades on high average latency', () => {
    const health = createAggregator();
    health.recordDelivery(true, 1000);
    health.recordDelivery(true, 2000);

    const report = health.checkHealth();

    expect(report.status).toBe('degraded');
    expect(report.averageLatencyMs).toBe(1500);
    expect(report.reasons).toEqual(['average latency 1500ms above 1000ms']);
  });

  it('reports published types without subscribers', () => {
    const health = createAggregator();
    subscriberCounts.set(7, 1);
    health.recordPublish(43);
    health.recordPublish(42);
    health.recordPublish(7);

    const report = health.checkHealth();

    expect(report.status).toBe('degraded');
    expect(report.orphanedTypes).toEqual([42, 43]);
    expect(report.reasons).toEqual(['no subscribers for published type(s) 42, 43']);
  });

  it('lists orphaned types without degrading when configured not to', () => {
    const health = createAggregator({ degradeOnOrphanedPublishers: false });
    health.recordPublish(42);

    const report = health.checkHealth();

    expect(report.status).toBe('healthy');
    expect(report.orphanedTypes).toEqual([42]);
  });

  it('drops samples that fall out of the window and reports the recovery', () => {
    const health = createAggregator({ windowMs: 10_000 });
    recordOutcomes(health, [false, false, true]);
    expect(health.checkHealth().status).toBe('unhealthy');

    now = START + 10_000;
    const report = health.checkHealth();

    expect(report.status).toBe('healthy');
    expect(report.previousStatus).toBe('unhealthy');
    expect(report.delivered + report.failed).toBe(0);
    expect(transitions.map((t) => `${t.from}->${t.to}`)).toEqual([
      'healthy->unhealthy',
      'unhealthy->healthy',
    ]);
  });

  it('keeps only the most recent maxSamples deliveries', () => {
    const health = createAggregator({ maxSamples: 2 });
    recordOutcomes(health, [false, true, true]);

    const report = health.checkHealth();

    expect(report.failed).toBe(0);
    expect(report.delivered).toBe(2);
  });

  it('does not report a transition when the status is unchanged', () => {
    const health = createAggregator();
    recordOutcomes(health, [false]);
    health.checkHealth();
    health.checkHealth();

    expect(transitions).toHaveLength(1);
  });

  it('publishes health gauges on every check', () => {
    const health = createAggregator();
    recordOutcomes(health, [true, false], 20);

    health.checkHealth();

    expect(recordGauge).toHaveBeenCalledWith('bus.health.status', 1);
    expect(recordGauge).toHaveBeenCalledWith('bus.health.error_rate', 0.5);
    expect(recordGauge).toHaveBeenCalledWith('bus.health.average_latency_ms', 20);
    expect(recordGauge).toHaveBeenCalledWith('bus.health.orphaned_types', 0);
  });

  it('applies updated thresholds on the next check', () => {
    const health = createAggregator();
    recordOutcomes(health, [true, true, true, false]);

    health.updateConfig({ degradedErrorRate: 0.3 });

    expect(health.checkHealth().status).toBe('healthy');
  });

  it('forgets samples on clearSamples but keeps the last report', () => {
    const health = createAggregator();
    recordOutcomes(health, [false, false]);
    health.recordPublish(42);
    const unhealthy = health.checkHealth();

    health.clearSamples();

    expect(health.getLastReport()).toBe(unhealthy);
    expect(health.checkHealth()).toMatchObject({
      status: 'healthy',
      previousStatus: 'unhealthy',
      delivered: 0,
      failed: 0,
      orphanedTypes: [],
    });
  });

  describe('periodic checks', () => {
    beforeEach(() => {
      vi.useFakeTimers();
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    it('checks on every interval until stopped', () => {
      const health = createAggregator({ checkIntervalMs: 1_000 });
      const check = vi.spyOn(health, 'checkHealth');

      health.start();
      health.start();
      vi.advanceTimersByTime(3_000);
      health.stop();
      vi.advanceTimersByTime(3_000);

      expect(check).toHaveBeenCalledTimes(3);
      expect(health.getLastReport()?.status).toBe('healthy');
    });
  });
});
