import pino from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

export interface LoggerOptions {
  level: LevelWithSilent;
  name?: string;
}

/** Root logger for the process. Components derive children from it. */
export function createLogger(options: LoggerOptions): Logger {
  return pino({
    name: options.name ?? 'dispatchbot',
    level: options.level,
  });
}

/**
 * One-line description of an error, including its cause when present.
 */
export function describeError(err: unknown): string {
  if (!(err instanceof Error)) return String(err);
  if (err.cause instanceof Error) {
    return `${err.name}: ${err.message} (caused by ${err.cause.name}: ${err.cause.message})`;
  }
  return `${err.name}: ${err.message}`;
}

/**
 * Logs a caught fault at error level.
 *
 * With `verbose` the error goes through pino's `err` serializer (stack,
 * cause and own fields). Otherwise only `err_message` is attached.
 */
export function logFault(
  log: Logger,
  err: unknown,
  message: string,
  fields: Record<string, unknown> = {},
  verbose = false,
): void {
  if (verbose) {
    log.error({ ...fields, err }, message);
    return;
  }
  log.error({ ...fields, err_message: describeError(err) }, message);
}
