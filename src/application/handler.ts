import type { Logger } from 'pino';
import type { BotEvent } from '../domain/index.js';
import { SkipSignal, StopSignal } from '../domain/index.js';
import type { ControlSignal } from '../domain/index.js';
import type { Bot } from './bot.js';

/** What `run()` may return: nothing, or a control signal. */
export type HandlerOutcome = ControlSignal | void;

/**
 * A handler instance. One is created per (event, descriptor) pair and
 * thrown away afterwards, so instances never see concurrent events.
 */
export interface Handler<E extends BotEvent = BotEvent> {
  matches(event: E): boolean | Promise<boolean>;
  run(event: E): HandlerOutcome | Promise<HandlerOutcome>;
}

/** Mutable key/value state that outlives a single event. */
export type HandlerState = Map<string, unknown>;

/**
 * Everything a handler instance is built from.
 *
 * `state` belongs to the handler's name and persists across events and
 * re-registration under that name; `globalState` is shared by every
 * handler on the bot.
 */
export interface HandlerScope<E extends BotEvent = BotEvent> {
  readonly event: E;
  readonly bot: Bot<E>;
  readonly log: Logger;
  readonly state: HandlerState;
  readonly globalState: HandlerState;
}

/**
 * Registry entry: a handler factory plus its scheduling attributes.
 *
 * `priority` is a non-negative integer; lower tiers run first.
 * `block` stops later tiers once this handler has matched.
 */
export interface HandlerDescriptor<E extends BotEvent = BotEvent> {
  readonly name: string;
  readonly priority: number;
  readonly block: boolean;
  create(scope: HandlerScope<E>): Handler<E>;
}

export interface HandlerOptions {
  name?: string;
  priority?: number;
  block?: boolean;
}

/**
 * Base class for class-style handlers.
 *
 * @example
 * class Greeter extends BaseHandler<MessageEvent> {
 *   matches(event: MessageEvent) { return event.event_type === 'greet'; }
 *   async run() { this.log.info('hello'); }
 * }
 * bot.handlers.register(fromHandlerClass(Greeter, { priority: 1 }));
 */
export abstract class BaseHandler<E extends BotEvent = BotEvent> implements Handler<E> {
  constructor(protected readonly scope: HandlerScope<E>) {}

  get event(): E {
    return this.scope.event;
  }

  get bot(): Bot<E> {
    return this.scope.bot;
  }

  get log(): Logger {
    return this.scope.log;
  }

  get state(): HandlerState {
    return this.scope.state;
  }

  get globalState(): HandlerState {
    return this.scope.globalState;
  }

  abstract matches(event: E): boolean | Promise<boolean>;

  abstract run(event: E): HandlerOutcome | Promise<HandlerOutcome>;

  /** Abandon this handler; the rest of the tier still runs. */
  protected skip(): never {
    throw new SkipSignal();
  }

  /** Abandon the rest of the tier and every later tier. */
  protected stop(): never {
    throw new StopSignal();
  }
}

export type HandlerClass<E extends BotEvent = BotEvent> = new (scope: HandlerScope<E>) => Handler<E>;

export function fromHandlerClass<E extends BotEvent>(
  handlerClass: HandlerClass<E>,
  options: HandlerOptions = {},
): HandlerDescriptor<E> {
  return {
    name: options.name ?? handlerClass.name,
    priority: options.priority ?? 0,
    block: options.block ?? false,
    create: (scope) => new handlerClass(scope),
  };
}

/** Function-style handler definition. `matches` defaults to always true. */
export interface HandlerDefinition<E extends BotEvent = BotEvent> extends HandlerOptions {
  name: string;
  matches?: (event: E, scope: HandlerScope<E>) => boolean | Promise<boolean>;
  run: (event: E, scope: HandlerScope<E>) => HandlerOutcome | Promise<HandlerOutcome>;
}

export function defineHandler<E extends BotEvent = BotEvent>(
  definition: HandlerDefinition<E>,
): HandlerDescriptor<E> {
  const { matches, run } = definition;
  return {
    name: definition.name,
    priority: definition.priority ?? 0,
    block: definition.block ?? false,
    create: (scope) => ({
      matches: (event) => (matches ? matches(event, scope) : true),
      run: (event) => run(event, scope),
    }),
  };
}

/** Structural check used when handlers arrive from a dynamically loaded module. */
export function isHandlerDescriptor(value: unknown): value is HandlerDescriptor {
  if (typeof value !== 'object' || value === null) return false;
  return (
    'name' in value && typeof value.name === 'string'
    && 'priority' in value && typeof value.priority === 'number'
    && 'block' in value && typeof value.block === 'boolean'
    && 'create' in value && typeof value.create === 'function'
  );
}
