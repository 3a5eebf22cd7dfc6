import { describe, it, expect } from 'vitest';
import {
  BusMessageSchema,
  PRIORITY_RANK,
  ReliabilityConfigSchema,
  RetryPolicySchema,
} from '../bus-schemas.js';
import { BUS_CONFIG_DEFAULTS, BusConfigSchema } from '../config-schema.js';

const baseMessage = {
  id: '01JNKQ8Z3V7R8E2X4Y6W0T9S1A',
  createdAt: '2026-03-01T12:00:00.000Z',
  typeCode: 42,
  source: 'checkout',
  priority: 'normal' as const,
  payload: { orderId: 'o-1' },
};

describe('BusMessageSchema', () => {
  it('accepts a well-formed message', () => {
    expect(BusMessageSchema.parse(baseMessage)).toEqual(baseMessage);
  });

  it('rejects an unknown priority', () => {
    expect(BusMessageSchema.safeParse({ ...baseMessage, priority: 'urgent' }).success).toBe(false);
  });

  it('rejects a negative type code', () => {
    expect(BusMessageSchema.safeParse({ ...baseMessage, typeCode: -1 }).success).toBe(false);
  });

  it('rejects an empty correlation id', () => {
    expect(BusMessageSchema.safeParse({ ...baseMessage, correlationId: '' }).success).toBe(false);
  });
});

describe('PRIORITY_RANK', () => {
  it('orders priorities from low to critical', () => {
    const ordered = (['critical', 'low', 'high', 'normal'] as const)
      .slice()
      .sort((a, b) => PRIORITY_RANK[a] - PRIORITY_RANK[b]);
    expect(ordered).toEqual(['low', 'normal', 'high', 'critical']);
  });
});

describe('RetryPolicySchema', () => {
  it('fills defaults', () => {
    expect(RetryPolicySchema.parse({})).toEqual({
      enabled: true,
      maxAttempts: 3,
      initialDelayMs: 1000,
      backoffMultiplier: 2,
      maxDelayMs: 300_000,
      backoffStrategy: 'exponential',
      jitterFactor: 0,
    });
  });

  it('rejects a maxDelayMs below initialDelayMs', () => {
    const result = RetryPolicySchema.safeParse({ initialDelayMs: 500, maxDelayMs: 100 });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.issues[0]?.path).toEqual(['maxDelayMs']);
    }
  });

  it('rejects a jitter factor above 1', () => {
    expect(RetryPolicySchema.safeParse({ jitterFactor: 1.5 }).success).toBe(false);
  });
});

describe('ReliabilityConfigSchema', () => {
  it('defaults every section', () => {
    const config = ReliabilityConfigSchema.parse({});
    expect(config.circuitBreaker.failureThreshold).toBe(5);
    expect(config.circuitBreaker.cooldownMs).toBe(30_000);
    expect(config.deadLetter.capacityPerType).toBe(1000);
    expect(config.health.unhealthyErrorRate).toBe(0.5);
  });
});

describe('BusConfigSchema', () => {
  it('requires version 1', () => {
    expect(BusConfigSchema.safeParse({ version: 2 }).success).toBe(false);
  });

  it('exposes defaults', () => {
    expect(BUS_CONFIG_DEFAULTS.instanceName).toBe('default');
    expect(BUS_CONFIG_DEFAULTS.requireRegisteredTypes).toBe(true);
    expect(BUS_CONFIG_DEFAULTS.logging.level).toBe('info');
    expect(BUS_CONFIG_DEFAULTS.types).toEqual([]);
  });
});
