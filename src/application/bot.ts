import type { Logger } from 'pino';
import type { BotEvent } from '../domain/index.js';
import { AdapterNotFoundError } from '../domain/index.js';
import type { Adapter } from '../infrastructure/adapters/adapter.js';
import { logFault } from '../infrastructure/logging/index.js';
import { BroadcastCondition } from './broadcast-condition.js';
import { EventDelivery } from './event-delivery.js';
import type { DeliverOptions } from './event-delivery.js';
import { EventWaiters } from './event-waiters.js';
import type { EventPredicate } from './event-waiters.js';
import type { HandlerDescriptor, HandlerScope, HandlerState } from './handler.js';
import { HandlerChain } from './handler-chain.js';
import { HandlerRegistry } from './handler-registry.js';
import type { GetOptions } from './handler-schema.js';
import { HookList } from './hooks.js';
import type { Hook, Unsubscribe } from './hooks.js';
import { RuntimeContext } from './runtime-context.js';
import type { RuntimeOptions } from './runtime-context.js';

/**
 * The bot runtime.
 *
 * Wires the runtime context, handler registry, broadcast condition,
 * waiters, handler chain and delivery coordinator together, owns the
 * adapters and runs their lifecycle.
 */
export class Bot<E extends BotEvent = BotEvent> {
  readonly context: RuntimeContext;
  readonly handlers = new HandlerRegistry<E>();
  readonly log: Logger;
  /** Shared by every handler on this bot. */
  readonly globalState: HandlerState = new Map();

  private readonly handlerStates = new Map<string, HandlerState>();
  private readonly waiters: EventWaiters<E>;
  private readonly delivery: EventDelivery<E>;
  private readonly adapterList: Adapter<E>[] = [];

  private readonly botRunHooks = new HookList<[Bot<E>]>();
  private readonly botExitHooks = new HookList<[Bot<E>]>();
  private readonly adapterStartupHooks = new HookList<[Adapter<E>]>();
  private readonly adapterRunHooks = new HookList<[Adapter<E>]>();
  private readonly adapterShutdownHooks = new HookList<[Adapter<E>]>();
  private readonly preprocessors = new HookList<[E]>();
  private readonly postprocessors = new HookList<[E]>();

  constructor(options: RuntimeOptions | RuntimeContext) {
    this.context = options instanceof RuntimeContext ? options : new RuntimeContext(options);
    this.log = this.context.log.child({ component: 'bot' });

    this.waiters = new EventWaiters<E>(new BroadcastCondition<E>(), this.context);
    const chain = new HandlerChain<E>({
      context: this.context,
      registry: this.handlers,
      preprocessors: this.preprocessors,
      postprocessors: this.postprocessors,
      scopeFor: (event, descriptor) => this.scopeFor(event, descriptor),
    });
    this.delivery = new EventDelivery<E>(this.context, this.waiters, chain);
  }

  // --------------------------------------------------
  // Events
  // --------------------------------------------------

  /** Called by adapters for each event they produce, exactly once per event. */
  deliverEvent(event: E, options: DeliverOptions = {}): Promise<void> {
    return this.delivery.deliver(event, options);
  }

  /**
   * Waits for the next unclaimed event accepted by `predicate`.
   *
   * Resolves `undefined` if the bot shuts down first.
   */
  get<T extends E>(predicate: (event: E) => event is T, options?: GetOptions): Promise<T | undefined>;
  get(predicate?: EventPredicate<E>, options?: GetOptions): Promise<E | undefined>;
  get(predicate?: EventPredicate<E>, options?: GetOptions): Promise<E | undefined> {
    return this.waiters.get(predicate, options);
  }

  /** State kept for handlers registered under `name`, created on first use. */
  handlerState(name: string): HandlerState {
    let state = this.handlerStates.get(name);
    if (!state) {
      state = new Map();
      this.handlerStates.set(name, state);
    }
    return state;
  }

  /** Resolves when every handler chain started so far has finished. */
  drain(): Promise<void> {
    return this.delivery.drain();
  }

  // --------------------------------------------------
  // Lifecycle
  // --------------------------------------------------

  get isShuttingDown(): boolean {
    return this.context.isShuttingDown;
  }

  /** Sets the shutdown flag. Idempotent; true only for the call that set it. */
  shutdown(reason?: string): boolean {
    const first = this.context.shutdown(reason);
    if (first) {
      this.log.info({ reason: this.context.reason }, 'Stopping bot...');
    }
    return first;
  }

  /**
   * Starts every adapter, runs until `shutdown()`, then drains in-flight
   * handler chains and shuts the adapters down.
   */
  async run(): Promise<void> {
    this.log.info({ adapters: this.adapterList.map((a) => a.name), handlers: this.handlers.size }, 'Running bot...');
    await this.botRunHooks.runSerial(this);

    const running: Promise<void>[] = [];
    try {
      for (const adapter of this.adapterList) {
        await this.adapterStartupHooks.runSerial(adapter);
        try {
          await adapter.startup();
        } catch (err: unknown) {
          this.fault(err, `Startup adapter "${adapter.name}" failed`, { adapter: adapter.name });
        }
      }

      for (const adapter of this.adapterList) {
        await this.adapterRunHooks.runSerial(adapter);
        running.push(adapter.safeRun());
      }

      await this.context.whenShutdown();
      await this.drain();
    } finally {
      for (const adapter of this.adapterList) {
        await this.adapterShutdownHooks.runSerial(adapter);
        try {
          await adapter.shutdown();
        } catch (err: unknown) {
          this.fault(err, `Shutdown adapter "${adapter.name}" failed`, { adapter: adapter.name });
        }
      }
      await Promise.allSettled(running);
      await this.botExitHooks.runSerial(this);
      this.log.info('Bot stopped');
    }
  }

  // --------------------------------------------------
  // Adapters
  // --------------------------------------------------

  addAdapter(adapter: Adapter<E>): void {
    this.adapterList.push(adapter);
    this.log.info({ adapter: adapter.name }, `Succeeded to load adapter "${adapter.name}"`);
  }

  get adapters(): readonly Adapter<E>[] {
    return this.adapterList;
  }

  /** @throws AdapterNotFoundError */
  getAdapter(name: string): Adapter<E> {
    const adapter = this.adapterList.find((a) => a.name === name);
    if (!adapter) throw new AdapterNotFoundError(name);
    return adapter;
  }

  // --------------------------------------------------
  // Hooks: each returns a function that removes the hook
  // --------------------------------------------------

  onBotRun(hook: Hook<[Bot<E>]>): Unsubscribe {
    return this.botRunHooks.add(hook);
  }

  onBotExit(hook: Hook<[Bot<E>]>): Unsubscribe {
    return this.botExitHooks.add(hook);
  }

  onAdapterStartup(hook: Hook<[Adapter<E>]>): Unsubscribe {
    return this.adapterStartupHooks.add(hook);
  }

  onAdapterRun(hook: Hook<[Adapter<E>]>): Unsubscribe {
    return this.adapterRunHooks.add(hook);
  }

  onAdapterShutdown(hook: Hook<[Adapter<E>]>): Unsubscribe {
    return this.adapterShutdownHooks.add(hook);
  }

  onEventPreprocess(hook: Hook<[E]>): Unsubscribe {
    return this.preprocessors.add(hook);
  }

  onEventPostprocess(hook: Hook<[E]>): Unsubscribe {
    return this.postprocessors.add(hook);
  }

  private scopeFor(event: E, descriptor: HandlerDescriptor<E>): HandlerScope<E> {
    return {
      event,
      bot: this,
      log: this.context.log.child({ handler: descriptor.name }),
      state: this.handlerState(descriptor.name),
      globalState: this.globalState,
    };
  }

  private fault(err: unknown, message: string, fields: Record<string, unknown>): void {
    logFault(this.log, err, message, fields, this.context.verboseExceptionLog);
  }
}
