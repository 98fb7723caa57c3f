import type { BotEvent } from '../domain/index.js';
import { GetEventTimeoutError } from '../domain/index.js';
import type { BroadcastCondition } from './broadcast-condition.js';
import type { RuntimeContext } from './runtime-context.js';
import { getOptionsSchema } from './handler-schema.js';
import type { GetOptions } from './handler-schema.js';

export type EventPredicate<E extends BotEvent = BotEvent> = (event: E) => boolean | Promise<boolean>;

const WAIT_ABORTED = Symbol('wait-aborted');

/** Largest delay a single Node timer accepts. */
const MAX_TIMER_MS = 2_147_483_647;

const alwaysTrue = (): boolean => true;

/**
 * Calls `onExpire` once `deadline` (epoch ms) has passed. Deadlines beyond
 * a single timer's range are reached by re-arming.
 */
function scheduleDeadline(deadline: number, onExpire: () => void): () => void {
  let timer: NodeJS.Timeout | undefined;
  const arm = (): void => {
    const remaining = deadline - Date.now();
    if (remaining <= 0) {
      onExpire();
      return;
    }
    timer = setTimeout(arm, Math.min(remaining, MAX_TIMER_MS));
  };
  arm();
  return () => clearTimeout(timer);
}

/**
 * Ad-hoc waiters for "the next event that satisfies P".
 *
 * Built on the broadcast condition: each `get()` parks on it once and
 * stays parked until it matches, gives up or is aborted. Its predicate
 * runs in the condition's inspect step, so claiming happens under the
 * lock and before the delivery coordinator decides whether the handler
 * chain should see the event.
 */
export class EventWaiters<E extends BotEvent = BotEvent> {
  constructor(
    private readonly condition: BroadcastCondition<E>,
    private readonly context: RuntimeContext,
  ) {}

  /** Number of `get()` calls currently parked. */
  get parked(): number {
    return this.condition.size;
  }

  /**
   * Resolves with the next unclaimed event accepted by `predicate`, and
   * claims it.
   *
   * Resolves `undefined` when the runtime shuts down first. Rejects with
   * `GetEventTimeoutError` when the deadline passes or `maxTries` events
   * have been inspected without a match.
   */
  get<T extends E>(predicate: (event: E) => event is T, options?: GetOptions): Promise<T | undefined>;
  get(predicate?: EventPredicate<E>, options?: GetOptions): Promise<E | undefined>;
  async get(predicate: EventPredicate<E> = alwaysTrue, options: GetOptions = {}): Promise<E | undefined> {
    const { maxTries = 0, timeoutMs } = getOptionsSchema.parse(options);
    const shutdown = this.context.signal;
    if (shutdown.aborted) return undefined;

    const startedAt = Date.now();
    const controller = new AbortController();
    const abort = (): void => controller.abort(WAIT_ABORTED);
    shutdown.addEventListener('abort', abort, { once: true });
    const cancelDeadline = timeoutMs === undefined ? () => {} : scheduleDeadline(startedAt + timeoutMs, abort);
    let tries = 0;

    try {
      return await this.condition.wait({
        signal: controller.signal,
        inspect: async (candidate) => {
          if (!candidate.claimed && (await predicate(candidate)) && !controller.signal.aborted && candidate.claim()) {
            return 'accept';
          }
          tries++;
          if (maxTries > 0 && tries >= maxTries) {
            throw new GetEventTimeoutError(tries, Date.now() - startedAt);
          }
          return 'decline';
        },
      });
    } catch (err: unknown) {
      if (err !== WAIT_ABORTED) throw err;
      // Shutdown outranks timeout: a draining runtime is not a failure.
      if (shutdown.aborted) return undefined;
      throw new GetEventTimeoutError(tries, Date.now() - startedAt);
    } finally {
      cancelDeadline();
      shutdown.removeEventListener('abort', abort);
    }
  }

  /**
   * Offers an event to every parked waiter. Resolves once each has
   * inspected it; check `event.claimed` afterwards.
   */
  offer(event: E): Promise<number> {
    return this.condition.notify(event);
  }
}
