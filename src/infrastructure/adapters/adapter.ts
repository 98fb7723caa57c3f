import type { Logger } from 'pino';
import type { BotEvent, EventOrigin } from '../../domain/index.js';
import type { Bot } from '../../application/bot.js';
import type { DeliverOptions } from '../../application/event-delivery.js';
import { logFault } from '../logging/index.js';

/**
 * Base class for event sources.
 *
 * Lifecycle, driven by `Bot.run()`:
 * `startup()` → `run()` (until shutdown) → `shutdown()`.
 * The bot calls `run()` through `safeRun()`, which logs a failure
 * instead of rethrowing it.
 */
export abstract class Adapter<E extends BotEvent = BotEvent> implements EventOrigin {
  protected readonly log: Logger;

  constructor(
    readonly name: string,
    protected readonly bot: Bot<E>,
  ) {
    this.log = bot.context.log.child({ adapter: name });
  }

  async startup(): Promise<void> {}

  /** Produces events until the bot shuts down. */
  abstract run(): Promise<void>;

  async shutdown(): Promise<void> {}

  async safeRun(): Promise<void> {
    try {
      await this.run();
    } catch (err: unknown) {
      logFault(this.log, err, `Run adapter "${this.name}" failed`, { adapter: this.name }, this.bot.context.verboseExceptionLog);
    }
  }

  protected deliver(event: E, options?: DeliverOptions): Promise<void> {
    return this.bot.deliverEvent(event, options);
  }
}
