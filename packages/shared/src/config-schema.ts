import { z } from 'zod';
import { ReliabilityConfigSchema } from './bus-schemas.js';

const LoggingConfigSchema = z.object({
  level: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).default('info'),
});

export type LogLevelName = z.infer<typeof LoggingConfigSchema>['level'];

/** A message type to register when the bus is constructed. */
export const MessageTypeDeclarationSchema = z.object({
  typeCode: z.number().int().min(0),
  name: z.string().min(1),
});

export type MessageTypeDeclaration = z.infer<typeof MessageTypeDeclarationSchema>;

export const BusConfigSchema = z.object({
  version: z.literal(1),
  instanceName: z.string().min(1).default('default'),
  requireRegisteredTypes: z.boolean().default(true),
  logging: LoggingConfigSchema.default(() => ({ level: 'info' as const })),
  reliability: ReliabilityConfigSchema.default({}),
  types: z.array(MessageTypeDeclarationSchema).default(() => []),
});

export type BusConfig = z.infer<typeof BusConfigSchema>;

/** Config accepted from callers, before defaults are applied. */
export type BusConfigInput = z.input<typeof BusConfigSchema>;

/** Maps log level names to numeric values for consola compatibility */
export const LOG_LEVEL_MAP: Record<LogLevelName, number> = {
  fatal: 0,
  error: 1,
  warn: 2,
  info: 3,
  debug: 4,
  trace: 5,
};

/** Defaults extracted from schema */
export const BUS_CONFIG_DEFAULTS: BusConfig = BusConfigSchema.parse({
  version: 1,
});
