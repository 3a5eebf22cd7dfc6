/**
 * Bus configuration from disk and environment.
 *
 * A config file is optional. When it is missing, unreadable, not JSON or
 * fails schema validation, the loader logs a warning and returns
 * {@link BUS_CONFIG_DEFAULTS}; a bad file never prevents the bus from
 * starting.
 *
 * @module bus/config-loader
 */
import fs from 'node:fs';
import { z } from 'zod';
import {
  BUS_CONFIG_DEFAULTS,
  BusConfigSchema,
  type BusConfig,
} from '@signalpost/shared/config-schema';
import type { Logger } from '@signalpost/shared/logger';
import { noopLogger } from '@signalpost/shared/logger';
import { BusConfigError } from './errors.js';
import { logError } from './lib/logger.js';

const busEnvSchema = z.object({
  /** Path to a JSON bus config file. */
  SIGNALPOST_CONFIG: z.string().min(1).optional(),
  SIGNALPOST_LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace']).optional(),
});

export type BusEnv = z.infer<typeof busEnvSchema>;

/**
 * Validate the bus's environment variables.
 *
 * @throws {BusConfigError} Listing every invalid variable.
 */
export function parseBusEnv(env: Record<string, string | undefined>): BusEnv {
  const result = busEnvSchema.safeParse(env);
  if (!result.success) {
    throw new BusConfigError(
      result.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`).join('; '),
    );
  }
  return result.data;
}

/** Read and validate a JSON config file, falling back to defaults. */
export function loadBusConfig(configPath: string, logger: Logger = noopLogger): BusConfig {
  let json: unknown;
  try {
    json = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
  } catch (err) {
    logger.warn(`Bus config at ${configPath} could not be read, using defaults`, logError(err));
    return BUS_CONFIG_DEFAULTS;
  }

  const parsed = BusConfigSchema.safeParse(json);
  if (!parsed.success) {
    logger.warn(`Bus config at ${configPath} is invalid, using defaults`, {
      issues: parsed.error.issues.map((i) => `${i.path.join('.')}: ${i.message}`),
    });
    return BUS_CONFIG_DEFAULTS;
  }
  return parsed.data;
}

/**
 * Resolve the effective config from environment variables.
 *
 * `SIGNALPOST_CONFIG` selects the file; `SIGNALPOST_LOG_LEVEL` overrides
 * the file's logging level.
 */
export function resolveBusConfig(
  env: Record<string, string | undefined>,
  logger: Logger = noopLogger,
): BusConfig {
  const parsedEnv = parseBusEnv(env);
  const config = parsedEnv.SIGNALPOST_CONFIG
    ? loadBusConfig(parsedEnv.SIGNALPOST_CONFIG, logger)
    : BUS_CONFIG_DEFAULTS;

  if (!parsedEnv.SIGNALPOST_LOG_LEVEL) return config;
  return { ...config, logging: { level: parsedEnv.SIGNALPOST_LOG_LEVEL } };
}
