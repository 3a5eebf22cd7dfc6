/**
 * Zod schemas for the Signalpost message bus.
 *
 * Defines schemas for message envelopes, priorities, reliability
 * configuration (circuit breaker, retry, dead letter, health) and the
 * monitoring snapshots exposed to health-check endpoints. All schemas
 * include `.openapi()` metadata for OpenAPI generation.
 *
 * @module shared/bus-schemas
 */
import { z } from 'zod';
import { extendZodWithOpenApi } from '@asteasolutions/zod-to-openapi';

extendZodWithOpenApi(z);

// === Enums ===

export const MessagePrioritySchema = z
  .enum(['low', 'normal', 'high', 'critical'])
  .openapi('MessagePriority');

export type MessagePriority = z.infer<typeof MessagePrioritySchema>;

/** Ordinal rank of each priority; higher ranks are more urgent. */
export const PRIORITY_RANK: Record<MessagePriority, number> = {
  low: 0,
  normal: 1,
  high: 2,
  critical: 3,
};

export const CircuitStateSchema = z
  .enum(['CLOSED', 'OPEN', 'HALF_OPEN'])
  .openapi('CircuitState');

export type CircuitState = z.infer<typeof CircuitStateSchema>;

export const HealthStatusSchema = z
  .enum(['healthy', 'degraded', 'unhealthy'])
  .openapi('HealthStatus');

export type HealthStatus = z.infer<typeof HealthStatusSchema>;

export const BackoffStrategySchema = z
  .enum(['fixed', 'linear', 'exponential'])
  .openapi('BackoffStrategy');

export type BackoffStrategy = z.infer<typeof BackoffStrategySchema>;

// === Envelope ===

export const BusMessageSchema = z
  .object({
    id: z.string().min(1).describe('ULID message ID'),
    createdAt: z.string().datetime(),
    typeCode: z.number().int().min(0),
    source: z.string(),
    priority: MessagePrioritySchema,
    correlationId: z.string().min(1).optional(),
    payload: z.unknown(),
  })
  .openapi('BusMessage');

/**
 * An immutable message as carried by the bus.
 *
 * The payload is opaque to the bus; handlers narrow it themselves.
 */
export type BusMessage<TPayload = unknown> = Readonly<
  Omit<z.infer<typeof BusMessageSchema>, 'payload'> & { payload: TPayload }
>;

// === Reliability Config ===

export const CircuitBreakerConfigSchema = z
  .object({
    enabled: z.boolean().default(true),
    failureThreshold: z.number().int().min(1).default(5),
    cooldownMs: z.number().int().min(0).default(30_000),
    halfOpenProbeCount: z.number().int().min(1).default(1),
    successToClose: z.number().int().min(1).default(2),
  })
  .openapi('CircuitBreakerConfig');

export type CircuitBreakerConfig = z.infer<typeof CircuitBreakerConfigSchema>;

export const RetryPolicySchema = z
  .object({
    enabled: z.boolean().default(true),
    maxAttempts: z.number().int().min(1).default(3),
    initialDelayMs: z.number().int().min(0).default(1000),
    backoffMultiplier: z.number().min(1).default(2),
    maxDelayMs: z.number().int().min(0).default(300_000),
    backoffStrategy: BackoffStrategySchema.default('exponential'),
    jitterFactor: z.number().min(0).max(1).default(0),
  })
  .refine((policy) => policy.maxDelayMs >= policy.initialDelayMs, {
    message: 'maxDelayMs must be greater than or equal to initialDelayMs',
    path: ['maxDelayMs'],
  })
  .openapi('RetryPolicy');

export type RetryPolicy = z.infer<typeof RetryPolicySchema>;

export const DeadLetterConfigSchema = z
  .object({
    capacityPerType: z.number().int().min(1).default(1000),
  })
  .openapi('DeadLetterConfig');

export type DeadLetterConfig = z.infer<typeof DeadLetterConfigSchema>;

export const HealthConfigSchema = z
  .object({
    windowMs: z.number().int().min(1).default(60_000),
    maxSamples: z.number().int().min(1).default(10_000),
    checkIntervalMs: z.number().int().min(1).default(30_000),
    unhealthyErrorRate: z.number().min(0).max(1).default(0.5),
    degradedErrorRate: z.number().min(0).max(1).default(0.1),
    degradedLatencyMs: z.number().min(0).default(1000),
    degradeOnOrphanedPublishers: z.boolean().default(true),
  })
  .openapi('HealthConfig');

export type HealthConfig = z.infer<typeof HealthConfigSchema>;

export const ReliabilityConfigSchema = z
  .object({
    circuitBreaker: CircuitBreakerConfigSchema.default({}),
    retry: RetryPolicySchema.default({}),
    deadLetter: DeadLetterConfigSchema.default({}),
    health: HealthConfigSchema.default({}),
  })
  .openapi('ReliabilityConfig');

export type ReliabilityConfig = z.infer<typeof ReliabilityConfigSchema>;

// === Monitoring Snapshots ===

export const TypeStatisticsSchema = z
  .object({
    typeCode: z.number().int(),
    published: z.number().int().min(0),
    delivered: z.number().int().min(0),
    failed: z.number().int().min(0),
    filtered: z.number().int().min(0),
    deadLettered: z.number().int().min(0),
    circuitRejected: z.number().int().min(0),
    cancelled: z.number().int().min(0),
    noSubscribers: z.number().int().min(0),
    retries: z.number().int().min(0),
    averageLatencyMs: z.number().min(0),
    maxLatencyMs: z.number().min(0),
    lastPublishedAt: z.string().datetime().nullable(),
  })
  .openapi('TypeStatistics');

export type TypeStatistics = z.infer<typeof TypeStatisticsSchema>;

export const BusStatisticsSchema = z
  .object({
    totalPublished: z.number().int().min(0),
    totalDelivered: z.number().int().min(0),
    totalFailed: z.number().int().min(0),
    totalFiltered: z.number().int().min(0),
    totalDeadLettered: z.number().int().min(0),
    totalCircuitRejected: z.number().int().min(0),
    totalCancelled: z.number().int().min(0),
    totalNoSubscribers: z.number().int().min(0),
    totalRetries: z.number().int().min(0),
    averageLatencyMs: z.number().min(0),
    maxLatencyMs: z.number().min(0),
    byType: z.array(TypeStatisticsSchema),
    capturedAt: z.string().datetime(),
  })
  .openapi('BusStatistics');

export type BusStatistics = z.infer<typeof BusStatisticsSchema>;

export const HealthReportSchema = z
  .object({
    status: HealthStatusSchema,
    previousStatus: HealthStatusSchema,
    errorRate: z.number().min(0).max(1),
    averageLatencyMs: z.number().min(0),
    delivered: z.number().int().min(0),
    failed: z.number().int().min(0),
    orphanedTypes: z.array(z.number().int()),
    reasons: z.array(z.string()),
    checkedAt: z.string().datetime(),
  })
  .openapi('HealthReport');

export type HealthReport = z.infer<typeof HealthReportSchema>;
