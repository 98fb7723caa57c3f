import type { Logger } from 'pino';
import type { BotEvent } from '../domain/index.js';
import { logFault } from '../infrastructure/logging/index.js';
import type { EventWaiters } from './event-waiters.js';
import type { HandlerChain } from './handler-chain.js';
import type { RuntimeContext } from './runtime-context.js';

export interface DeliverOptions {
  /** Whether `get()` callers may observe (and claim) the event. Default true. */
  allowGet?: boolean;
  /** Log receipt at info level. Default true. */
  logIt?: boolean;
}

/**
 * Entry point adapters hand events to.
 *
 * Two-phase claim protocol for get-eligible events:
 * 1. offer the event to every parked waiter and wait for their
 *    predicates to settle (claiming happens under the condition's lock);
 * 2. only an event nobody claimed is scheduled on the handler chain.
 *
 * Events with `allowGet: false` go straight to the chain.
 * Chains run in the background; `deliver()` never waits for them.
 */
export class EventDelivery<E extends BotEvent = BotEvent> {
  private readonly log: Logger;
  private readonly inFlight = new Set<Promise<void>>();

  constructor(
    private readonly context: RuntimeContext,
    private readonly waiters: EventWaiters<E>,
    private readonly chain: HandlerChain<E>,
  ) {
    this.log = context.log.child({ component: 'event-delivery' });
  }

  /** Number of handler chains still running. */
  get pending(): number {
    return this.inFlight.size;
  }

  async deliver(event: E, options: DeliverOptions = {}): Promise<void> {
    const { allowGet = true, logIt = true } = options;

    if (logIt) {
      this.log.info(
        { adapter: event.adapter.name, event: event.describe() },
        `Adapter ${event.adapter.name} received: ${event.describe()}`,
      );
    }

    if (this.context.isShuttingDown) {
      this.log.debug({ event: event.describe() }, 'Shutting down, event dropped');
      return;
    }

    if (!allowGet) {
      this.schedule(event, false);
      return;
    }

    const inspected = await this.waiters.offer(event);
    if (event.claimed) {
      this.log.debug({ event: event.describe(), inspected }, 'Event claimed by a waiter');
      return;
    }
    this.schedule(event, true);
  }

  /** Resolves once every chain scheduled so far (and any they lead to) has finished. */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled([...this.inFlight]);
    }
  }

  private schedule(event: E, respectClaim: boolean): void {
    const task: Promise<void> = this.chain
      .dispatch(event, { respectClaim })
      .then(
        () => undefined,
        (err: unknown) => {
          logFault(this.log, err, `Handler chain crashed for ${event.describe()}`, {}, this.context.verboseExceptionLog);
        },
      )
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }
}
