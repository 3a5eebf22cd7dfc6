/**
 * Rolling-window health evaluation for the message bus.
 *
 * The orchestrator feeds every final delivery outcome and every publish in;
 * {@link HealthAggregator.checkHealth} turns the samples still inside the
 * window into a {@link HealthReport}. Status is derived, never set:
 *
 * - `unhealthy` when the error rate exceeds `unhealthyErrorRate`
 * - `degraded` when the error rate exceeds `degradedErrorRate`, average
 *   latency exceeds `degradedLatencyMs`, or (with `degradeOnOrphanedPublishers`)
 *   a type published in the window has no enabled subscribers
 * - `healthy` otherwise
 *
 * A transition is reported only when the status differs from the last check.
 *
 * @module bus/health-aggregator
 */
import type {
  HealthConfig,
  HealthReport,
  HealthStatus,
  HealthTransitionEvent,
  MetricsRecorder,
} from './types.js';

interface DeliverySample {
  at: number;
  success: boolean;
  latencyMs: number;
}

interface PublishSample {
  at: number;
  typeCode: number;
}

export interface HealthAggregatorOptions {
  config: HealthConfig;
  now: () => number;
  metrics: MetricsRecorder;
  /** Enabled subscribers currently registered for a type. */
  countSubscribers: (typeCode: number) => number;
  onTransition?: (event: HealthTransitionEvent) => void;
}

const STATUS_GAUGE: Record<HealthStatus, number> = {
  healthy: 0,
  degraded: 1,
  unhealthy: 2,
};

function percent(rate: number): string {
  return `${(rate * 100).toFixed(1)}%`;
}

export class HealthAggregator {
  private config: HealthConfig;
  private readonly now: () => number;
  private readonly metrics: MetricsRecorder;
  private readonly countSubscribers: (typeCode: number) => number;
  private readonly onTransition: (event: HealthTransitionEvent) => void;

  private deliveries: DeliverySample[] = [];
  private publishes: PublishSample[] = [];
  private status: HealthStatus = 'healthy';
  private lastReport: HealthReport | null = null;
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(options: HealthAggregatorOptions) {
    this.config = options.config;
    this.now = options.now;
    this.metrics = options.metrics;
    this.countSubscribers = options.countSubscribers;
    this.onTransition = options.onTransition ?? (() => {});
  }

  recordDelivery(success: boolean, latencyMs: number): void {
    this.deliveries.push({ at: this.now(), success, latencyMs: Math.max(0, latencyMs) });
    if (this.deliveries.length > this.config.maxSamples) {
      this.deliveries.splice(0, this.deliveries.length - this.config.maxSamples);
    }
  }

  recordPublish(typeCode: number): void {
    this.publishes.push({ at: this.now(), typeCode });
    if (this.publishes.length > this.config.maxSamples) {
      this.publishes.splice(0, this.publishes.length - this.config.maxSamples);
    }
  }

  /** Evaluate the current window, publish gauges and report any status change. */
  checkHealth(): HealthReport {
    const timestamp = this.now();
    this.prune(timestamp);

    let delivered = 0;
    let failed = 0;
    let latencyTotal = 0;
    for (const sample of this.deliveries) {
      if (sample.success) delivered++;
      else failed++;
      latencyTotal += sample.latencyMs;
    }
    const samples = delivered + failed;
    const errorRate = samples === 0 ? 0 : failed / samples;
    const averageLatencyMs = samples === 0 ? 0 : latencyTotal / samples;
    const orphanedTypes = this.findOrphanedTypes();

    const { unhealthyErrorRate, degradedErrorRate, degradedLatencyMs } = this.config;
    const reasons: string[] = [];
    if (errorRate > unhealthyErrorRate) {
      reasons.push(`error rate ${percent(errorRate)} above ${percent(unhealthyErrorRate)}`);
    } else if (errorRate > degradedErrorRate) {
      reasons.push(`error rate ${percent(errorRate)} above ${percent(degradedErrorRate)}`);
    }
    if (averageLatencyMs > degradedLatencyMs) {
      reasons.push(`average latency ${Math.round(averageLatencyMs)}ms above ${degradedLatencyMs}ms`);
    }
    if (orphanedTypes.length > 0 && this.config.degradeOnOrphanedPublishers) {
      reasons.push(`no subscribers for published type(s) ${orphanedTypes.join(', ')}`);
    }

    let status: HealthStatus = 'healthy';
    if (errorRate > unhealthyErrorRate) status = 'unhealthy';
    else if (reasons.length > 0) status = 'degraded';

    const previousStatus = this.status;
    const report: HealthReport = {
      status,
      previousStatus,
      errorRate,
      averageLatencyMs,
      delivered,
      failed,
      orphanedTypes,
      reasons,
      checkedAt: new Date(timestamp).toISOString(),
    };
    this.status = status;
    this.lastReport = report;

    this.metrics.recordGauge('bus.health.status', STATUS_GAUGE[status]);
    this.metrics.recordGauge('bus.health.error_rate', errorRate);
    this.metrics.recordGauge('bus.health.average_latency_ms', averageLatencyMs);
    this.metrics.recordGauge('bus.health.orphaned_types', orphanedTypes.length);

    if (status !== previousStatus) {
      this.onTransition({ from: previousStatus, to: status, report, timestamp });
    }
    return report;
  }

  /** Status as of the last check. `healthy` before the first one. */
  getStatus(): HealthStatus {
    return this.status;
  }

  getLastReport(): HealthReport | null {
    return this.lastReport;
  }

  /** Drop every delivery and publish sample. Status and the last report stay until the next check. */
  clearSamples(): void {
    this.deliveries = [];
    this.publishes = [];
  }

  /** Start periodic checks every `checkIntervalMs`. Calling twice has no effect. */
  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => {
      this.checkHealth();
    }, this.config.checkIntervalMs);
    this.timer.unref();
  }

  stop(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }

  /** Replace thresholds. A running timer keeps its interval until restarted. */
  updateConfig(config: Partial<HealthConfig>): void {
    this.config = { ...this.config, ...config };
  }

  private prune(timestamp: number): void {
    const cutoff = timestamp - this.config.windowMs;
    this.deliveries = this.deliveries.filter((sample) => sample.at > cutoff);
    this.publishes = this.publishes.filter((sample) => sample.at > cutoff);
  }

  private findOrphanedTypes(): number[] {
    const published = new Set(this.publishes.map((sample) => sample.typeCode));
    return [...published]
      .filter((typeCode) => this.countSubscribers(typeCode) === 0)
      .sort((a, b) => a - b);
  }
}
