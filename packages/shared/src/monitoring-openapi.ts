/**
 * OpenAPI 3.1.0 description of the bus monitoring surface.
 *
 * The bus core exposes statistics, health and dead-letter snapshots for an
 * external health-check endpoint to serve. Hosts mount that endpoint under
 * whatever prefix they like; this document describes the response bodies.
 *
 * @module shared/monitoring-openapi
 */
import { OpenAPIRegistry, OpenApiGeneratorV31 } from '@asteasolutions/zod-to-openapi';
import { z } from 'zod';
import {
  BusMessageSchema,
  BusStatisticsSchema,
  CircuitStateSchema,
  HealthReportSchema,
} from './bus-schemas.js';

const registry = new OpenAPIRegistry();

export const CircuitSnapshotSchema = z
  .object({
    typeCode: z.number().int(),
    state: CircuitStateSchema,
    consecutiveFailures: z.number().int().min(0),
    halfOpenSuccesses: z.number().int().min(0),
    openedAt: z.number().int().nullable().describe('Unix timestamp (ms) the breaker opened'),
  })
  .openapi('CircuitSnapshot');

export type CircuitSnapshot = z.infer<typeof CircuitSnapshotSchema>;

export const DeadLetterSnapshotSchema = z
  .object({
    id: z.string(),
    typeCode: z.number().int(),
    subscriptionId: z.string().nullable(),
    error: z.string(),
    errorName: z.string(),
    attemptCount: z.number().int().min(0),
    failedAt: z.string().datetime(),
    message: BusMessageSchema,
  })
  .openapi('DeadLetterSnapshot');

export type DeadLetterSnapshot = z.infer<typeof DeadLetterSnapshotSchema>;

registry.registerPath({
  method: 'get',
  path: '/health',
  tags: ['Monitoring'],
  summary: 'Aggregated bus health',
  responses: {
    200: {
      description: 'Most recent health evaluation',
      content: { 'application/json': { schema: HealthReportSchema } },
    },
  },
});

registry.registerPath({
  method: 'get',
  path: '/statistics',
  tags: ['Monitoring'],
  summary: 'Publish and delivery counters',
  responses: {
    200: {
      description: 'Statistics snapshot',
      content: { 'application/json': { schema: BusStatisticsSchema } },
    },
  },
});

registry.registerPath({
  method: 'get',
  path: '/circuits',
  tags: ['Monitoring'],
  summary: 'Per-type circuit breaker states',
  responses: {
    200: {
      description: 'One entry per message type that has breaker state',
      content: { 'application/json': { schema: z.array(CircuitSnapshotSchema) } },
    },
  },
});

registry.registerPath({
  method: 'get',
  path: '/dead-letters/{typeCode}',
  tags: ['Monitoring'],
  summary: 'Dead letters for a message type, newest first',
  request: {
    params: z.object({ typeCode: z.coerce.number().int().min(0) }),
  },
  responses: {
    200: {
      description: 'Dead-letter entries',
      content: { 'application/json': { schema: z.array(DeadLetterSnapshotSchema) } },
    },
  },
});

/**
 * Generate the OpenAPI document for the monitoring surface.
 *
 * @param version - Version string reported in the document's `info` block.
 */
export function generateMonitoringOpenAPISpec(version = '0.1.0') {
  const generator = new OpenApiGeneratorV31(registry.definitions);
  return generator.generateDocument({
    openapi: '3.1.0',
    info: {
      title: 'Signalpost Monitoring API',
      version,
      description: 'Health, statistics, circuit and dead-letter snapshots of a Signalpost bus.',
    },
  });
}
