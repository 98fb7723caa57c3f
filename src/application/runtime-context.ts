import { setMaxListeners } from 'node:events';
import type { Logger } from 'pino';

export interface RuntimeOptions {
  log: Logger;
  /** Log full stacks for handler and adapter faults instead of the message only. */
  verboseExceptionLog?: boolean | undefined;
}

/**
 * Process-wide state shared by every runtime component.
 *
 * Holds the shutdown flag, which is set once and never cleared. It is
 * exposed as an AbortSignal so blocked waiters can bail out, and as a
 * promise for the run loop. Every parked `get()` listens on the signal,
 * so it carries no listener limit.
 */
export class RuntimeContext {
  readonly log: Logger;
  readonly verboseExceptionLog: boolean;
  private readonly controller = new AbortController();
  private readonly shutdownPromise: Promise<void>;
  private shutdownReason: string | null = null;

  constructor(options: RuntimeOptions) {
    this.log = options.log;
    this.verboseExceptionLog = options.verboseExceptionLog ?? false;
    setMaxListeners(0, this.controller.signal);
    this.shutdownPromise = new Promise<void>((resolve) => {
      this.controller.signal.addEventListener('abort', () => resolve(), { once: true });
    });
  }

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  get isShuttingDown(): boolean {
    return this.controller.signal.aborted;
  }

  /** What triggered shutdown, if it has been requested. */
  get reason(): string | null {
    return this.shutdownReason;
  }

  /**
   * Requests shutdown. Returns true only for the call that set the flag.
   */
  shutdown(reason = 'shutdown requested'): boolean {
    if (this.controller.signal.aborted) return false;
    this.shutdownReason = reason;
    this.controller.abort(reason);
    return true;
  }

  /** Resolves once shutdown has been requested. */
  whenShutdown(): Promise<void> {
    return this.shutdownPromise;
  }
}
