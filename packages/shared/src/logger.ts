/**
 * Logging contract shared by bus packages.
 *
 * Every line is a message plus an optional structured context. The bus puts
 * the message's correlation id in that context when one exists, so a host
 * logger can thread it through its own output. A consola instance satisfies
 * this interface as-is.
 *
 * @module shared/logger
 */

/** Structured fields attached to a log line. */
export type LogContext = Record<string, unknown>;

export type LogMethod = (message: string, context?: LogContext) => void;

export interface Logger {
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
}

/** Discards everything. Default for loaders that run before a logger exists. */
export const noopLogger: Logger = {
  debug: () => {},
  info: () => {},
  warn: () => {},
  error: () => {},
};
