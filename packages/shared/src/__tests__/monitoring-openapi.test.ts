import { describe, it, expect } from 'vitest';
import { CircuitSnapshotSchema, generateMonitoringOpenAPISpec } from '../monitoring-openapi.js';

describe('generateMonitoringOpenAPISpec', () => {
  it('produces an OpenAPI 3.1 document with the given version', () => {
    const doc = generateMonitoringOpenAPISpec('1.2.3');

    expect(doc.openapi).toBe('3.1.0');
    expect(doc.info.version).toBe('1.2.3');
    expect(doc.info.title).toBe('Signalpost Monitoring API');
  });

  it('describes every monitoring route', () => {
    const doc = generateMonitoringOpenAPISpec();

    expect(Object.keys(doc.paths ?? {}).sort()).toEqual([
      '/circuits',
      '/dead-letters/{typeCode}',
      '/health',
      '/statistics',
    ]);
  });

  it('registers the named snapshot schemas as components', () => {
    const schemas = generateMonitoringOpenAPISpec().components?.schemas ?? {};

    expect(schemas).toHaveProperty('HealthReport');
    expect(schemas).toHaveProperty('BusStatistics');
    expect(schemas).toHaveProperty('CircuitSnapshot');
    expect(schemas).toHaveProperty('DeadLetterSnapshot');
  });
});

describe('CircuitSnapshotSchema', () => {
  it('allows a null openedAt for closed circuits', () => {
    expect(
      CircuitSnapshotSchema.safeParse({
        typeCode: 42,
        state: 'CLOSED',
        consecutiveFailures: 0,
        halfOpenSuccesses: 0,
        openedAt: null,
      }).success,
    ).toBe(true);
  });
});
