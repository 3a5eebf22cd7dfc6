import { createConsola, type ConsolaInstance } from 'consola';
import { LOG_LEVEL_MAP, type LogLevelName } from '@signalpost/shared/config-schema';
import type { LogContext } from '@signalpost/shared/logger';

/**
 * Default logger factory for the bus, backed by consola.
 *
 * Callers embedding the bus usually inject their own {@link Logger}; this
 * is what a bus uses when none is given. Output goes to the console only.
 *
 * @module bus/lib/logger
 */

/** Create a consola logger at the given level with a consistent component tag. */
export function createTaggedLogger(tag: string, level: LogLevelName = 'info'): ConsolaInstance {
  return createConsola({ level: LOG_LEVEL_MAP[level] }).withTag(tag);
}

/** Extract structured error fields for consistent logging. */
export function logError(err: unknown): { error: string; stack?: string } {
  if (err instanceof Error) return { error: err.message, stack: err.stack };
  return { error: String(err) };
}

/** Build the structured context the bus attaches to every log line. */
export function logContext(
  correlationId: string | undefined,
  context: LogContext = {},
): LogContext {
  return correlationId ? { correlationId, ...context } : context;
}
