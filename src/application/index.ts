export { Bot } from './bot.js';
export { BroadcastCondition, Lock } from './broadcast-condition.js';
export type { InspectVerdict, WaitOptions } from './broadcast-condition.js';
export { EventWaiters } from './event-waiters.js';
export type { EventPredicate } from './event-waiters.js';
export { EventDelivery } from './event-delivery.js';
export type { DeliverOptions } from './event-delivery.js';
export { HandlerChain } from './handler-chain.js';
export type { ChainOutcome, ChainStatus, HandlerChainDeps } from './handler-chain.js';
export { HandlerRegistry } from './handler-registry.js';
export type { HandlerTier } from './handler-registry.js';
export { BaseHandler, defineHandler, fromHandlerClass, isHandlerDescriptor } from './handler.js';
export type {
  Handler,
  HandlerClass,
  HandlerDefinition,
  HandlerDescriptor,
  HandlerOptions,
  HandlerOutcome,
  HandlerScope,
  HandlerState,
} from './handler.js';
export { prioritySchema, getOptionsSchema } from './handler-schema.js';
export type { GetOptions } from './handler-schema.js';
export { HookList } from './hooks.js';
export type { Hook, Unsubscribe } from './hooks.js';
export { RuntimeContext } from './runtime-context.js';
export type { RuntimeOptions } from './runtime-context.js';
export { inboundEventSchema, inboundEventBatchSchema, toMessageEvent } from './event-schema.js';
export type { InboundEvent } from './event-schema.js';
