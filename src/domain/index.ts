export { BotEvent, MessageEvent } from './event.js';
export type { EventOrigin, EventPayload, EventMetadata, MessageEventData } from './event.js';
export { SkipSignal, StopSignal, signalOf } from './signals.js';
export type { ControlSignal } from './signals.js';
export {
  BotError,
  GetEventTimeoutError,
  InvalidPriorityError,
  HandlerAlreadyRegisteredError,
  HandlerFault,
  HandlerLoadError,
  AdapterNotFoundError,
  ConfigError,
} from './errors.js';
export type { BotErrorCode } from './errors.js';
