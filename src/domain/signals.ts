/**
 * Control-flow signals a handler raises to steer the chain.
 *
 * They are not faults: the chain recognises them and never logs them
 * as errors. A handler may either throw one of these or return the
 * matching `ControlSignal` string from `run()`.
 */

export type ControlSignal = 'skip' | 'stop';

/** Abandon this handler only; the next handler in the tier still runs. */
export class SkipSignal extends Error {
  readonly signal = 'skip' as const;

  constructor() {
    super('Handler skipped');
    this.name = 'SkipSignal';
  }
}

/** Abandon the rest of the current tier; no later tier runs. */
export class StopSignal extends Error {
  readonly signal = 'stop' as const;

  constructor() {
    super('Event propagation stopped');
    this.name = 'StopSignal';
  }
}

/** Maps a thrown value to the signal it carries, if any. */
export function signalOf(err: unknown): ControlSignal | null {
  if (err instanceof SkipSignal) return 'skip';
  if (err instanceof StopSignal) return 'stop';
  return null;
}
