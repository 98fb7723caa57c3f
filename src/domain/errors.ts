/**
 * Error taxonomy of the runtime.
 *
 * Every error carries a stable `code` so callers and logs can match on
 * it without relying on class identity across module copies.
 */

export type BotErrorCode =
  | 'GET_EVENT_TIMEOUT'
  | 'INVALID_PRIORITY'
  | 'HANDLER_ALREADY_REGISTERED'
  | 'HANDLER_FAULT'
  | 'HANDLER_LOAD_FAILED'
  | 'ADAPTER_NOT_FOUND'
  | 'CONFIG_INVALID';

export class BotError extends Error {
  constructor(
    readonly code: BotErrorCode,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = 'BotError';
  }
}

/** No matching event arrived before the deadline or the try bound. */
export class GetEventTimeoutError extends BotError {
  constructor(
    readonly tries: number,
    readonly elapsedMs: number,
  ) {
    super('GET_EVENT_TIMEOUT', `No matching event after ${tries} tries in ${elapsedMs}ms`);
    this.name = 'GetEventTimeoutError';
  }
}

/** Rejected at registration time; never coerced. */
export class InvalidPriorityError extends BotError {
  constructor(
    readonly handlerName: string,
    readonly priority: unknown,
  ) {
    super(
      'INVALID_PRIORITY',
      `Handler "${handlerName}" has invalid priority ${String(priority)} (expected an integer >= 0)`,
    );
    this.name = 'InvalidPriorityError';
  }
}

export class HandlerAlreadyRegisteredError extends BotError {
  constructor(readonly handlerName: string) {
    super('HANDLER_ALREADY_REGISTERED', `Handler "${handlerName}" is already registered`);
    this.name = 'HandlerAlreadyRegisteredError';
  }
}

/**
 * A handler's predicate or body raised an unrecognised error.
 *
 * Built by the chain for logging only; it never propagates past the
 * handler that caused it.
 */
export class HandlerFault extends BotError {
  constructor(
    readonly handlerName: string,
    readonly priority: number,
    readonly event: string,
    cause: unknown,
  ) {
    super('HANDLER_FAULT', `Exception in handler "${handlerName}" while handling ${event}`, { cause });
    this.name = 'HandlerFault';
  }
}

export class HandlerLoadError extends BotError {
  constructor(
    readonly specifier: string,
    reason: string,
    cause?: unknown,
  ) {
    super('HANDLER_LOAD_FAILED', `Load handlers from module "${specifier}" failed: ${reason}`, { cause });
    this.name = 'HandlerLoadError';
  }
}

export class AdapterNotFoundError extends BotError {
  constructor(readonly adapterName: string) {
    super('ADAPTER_NOT_FOUND', `No adapter named "${adapterName}" is loaded`);
    this.name = 'AdapterNotFoundError';
  }
}

export class ConfigError extends BotError {
  constructor(
    readonly path: string,
    reason: string,
    cause?: unknown,
  ) {
    super('CONFIG_INVALID', `Invalid config file "${path}": ${reason}`, { cause });
    this.name = 'ConfigError';
  }
}
