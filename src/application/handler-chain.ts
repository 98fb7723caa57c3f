import type { Logger } from 'pino';
import type { BotEvent } from '../domain/index.js';
import { HandlerFault, signalOf } from '../domain/index.js';
import { logFault } from '../infrastructure/logging/index.js';
import type { HandlerDescriptor, HandlerScope } from './handler.js';
import type { HandlerRegistry, HandlerTier } from './handler-registry.js';
import type { HookList } from './hooks.js';
import type { RuntimeContext } from './runtime-context.js';

/** Why a dispatch ended where it did. */
export type ChainStatus = 'claimed' | 'completed' | 'stopped' | 'blocked';

export interface ChainOutcome {
  readonly status: ChainStatus;
  /** Names of handlers whose `matches()` returned true, in invocation order. */
  readonly matched: readonly string[];
  /** Tier the dispatch ended on when stopped or blocked. */
  readonly lastPriority: number | null;
}

type HandlerResult =
  | { readonly kind: 'unmatched' }
  | { readonly kind: 'handled' }
  | { readonly kind: 'fault'; readonly matched: boolean }
  | { readonly kind: 'skip'; readonly matched: boolean }
  | { readonly kind: 'stop'; readonly matched: boolean };

type TierVerdict = 'continue' | 'stopped' | 'blocked';

export interface HandlerChainDeps<E extends BotEvent> {
  context: RuntimeContext;
  registry: HandlerRegistry<E>;
  preprocessors: HookList<[E]>;
  postprocessors: HookList<[E]>;
  scopeFor: (event: E, descriptor: HandlerDescriptor<E>) => HandlerScope<E>;
}

/**
 * Runs one event through the priority table.
 *
 * Preprocessing → tiers in ascending priority → postprocessing.
 * Handlers of one event run strictly one after another; concurrency
 * only exists between the chains of different events.
 *
 * Error boundaries:
 * - a handler fault is logged and treated as that handler failing alone;
 * - a hook or tier-level failure is logged at event level;
 * - nothing escapes `dispatch()`.
 */
export class HandlerChain<E extends BotEvent = BotEvent> {
  private readonly log: Logger;

  constructor(private readonly deps: HandlerChainDeps<E>) {
    this.log = deps.context.log.child({ component: 'handler-chain' });
  }

  /**
   * @param respectClaim skip the event entirely when a waiter already claimed it
   */
  async dispatch(event: E, options: { respectClaim: boolean }): Promise<ChainOutcome> {
    if (options.respectClaim && event.claimed) {
      this.log.debug({ event: event.describe() }, 'Event already claimed, handler chain skipped');
      return { status: 'claimed', matched: [], lastPriority: null };
    }

    const matched: string[] = [];
    let status: ChainStatus = 'completed';
    let lastPriority: number | null = null;

    try {
      await this.deps.preprocessors.runSerial(event);

      // Tiers registered after this point are not visible to this event.
      for (const tier of this.deps.registry.snapshot()) {
        this.log.debug({ priority: tier.priority }, 'Checking for matching handlers');
        try {
          const verdict = await this.runTier(event, tier, matched);
          if (verdict !== 'continue') {
            status = verdict;
            lastPriority = tier.priority;
            break;
          }
        } catch (err: unknown) {
          this.fault(err, `Exception in handling event ${event.describe()}`, { priority: tier.priority });
        }
      }
    } catch (err: unknown) {
      this.fault(err, `Exception in preprocessing event ${event.describe()}`);
    }

    try {
      await this.deps.postprocessors.runSerial(event);
    } catch (err: unknown) {
      this.fault(err, `Exception in postprocessing event ${event.describe()}`);
    }

    this.log.info({ event: event.describe(), status, matched }, 'Event finished');
    return { status, matched, lastPriority };
  }

  private async runTier(event: E, tier: HandlerTier<E>, matched: string[]): Promise<TierVerdict> {
    let verdict: TierVerdict = 'continue';

    for (const descriptor of tier.handlers) {
      const result = await this.runHandler(event, descriptor, tier.priority);
      const didMatch = result.kind === 'handled' || (result.kind !== 'unmatched' && result.matched);
      if (didMatch) matched.push(descriptor.name);

      if (result.kind === 'stop') return 'stopped';

      // A skip withdraws the handler, including its block.
      if (didMatch && descriptor.block && result.kind !== 'skip') {
        verdict = 'blocked';
      }
    }

    return verdict;
  }

  private async runHandler(
    event: E,
    descriptor: HandlerDescriptor<E>,
    priority: number,
  ): Promise<HandlerResult> {
    let matched = false;
    try {
      const handler = descriptor.create(this.deps.scopeFor(event, descriptor));
      matched = await handler.matches(event);
      if (!matched) return { kind: 'unmatched' };

      this.log.info({ handler: descriptor.name, priority }, `Event will be handled by "${descriptor.name}"`);
      const outcome = await handler.run(event);
      if (outcome === 'skip' || outcome === 'stop') {
        return { kind: outcome, matched };
      }
      return { kind: 'handled' };
    } catch (err: unknown) {
      const signal = signalOf(err);
      if (signal !== null) {
        return { kind: signal, matched };
      }

      const fault = new HandlerFault(descriptor.name, priority, event.describe(), err);
      this.fault(fault, fault.message, { handler: descriptor.name, priority, event: event.describe() });
      return { kind: 'fault', matched };
    }
  }

  private fault(err: unknown, message: string, fields: Record<string, unknown> = {}): void {
    logFault(this.log, err, message, fields, this.deps.context.verboseExceptionLog);
  }
}
