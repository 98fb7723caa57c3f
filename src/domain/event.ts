/**
 * Core domain types for the dispatchbot event model.
 *
 * These types define the canonical shape of an event as it flows
 * from an adapter through the handler chain and the waiters.
 * They carry no framework dependencies.
 */

/** Free-form key/value payload attached to every message event. */
export type EventPayload = Record<string, unknown>;

/** Optional metadata for routing, tracing, or enrichment. */
export type EventMetadata = Record<string, unknown>;

/** Whatever produced an event. Adapters implement this. */
export interface EventOrigin {
  readonly name: string;
}

/**
 * Base class of every event handed to the runtime.
 *
 * The only state the runtime ever changes is the claimed flag, which
 * goes from false to true exactly once: whichever consumer (a waiter or
 * the handler chain) commits to exclusive consumption first wins.
 */
export abstract class BotEvent<TOrigin extends EventOrigin = EventOrigin> {
  private claimedFlag = false;

  constructor(readonly adapter: TOrigin) {}

  get claimed(): boolean {
    return this.claimedFlag;
  }

  /** Marks the event as claimed. Returns false if it already was. */
  claim(): boolean {
    if (this.claimedFlag) return false;
    this.claimedFlag = true;
    return true;
  }

  /** Human-readable representation used in logs. */
  abstract describe(): string;

  toString(): string {
    return this.describe();
  }
}

/** Wire shape of a message event once validated at the adapter edge. */
export interface MessageEventData {
  readonly event_id: string;
  readonly event_type: string;
  readonly source: string;
  readonly timestamp: string; // ISO-8601
  readonly payload: EventPayload;
  readonly metadata: EventMetadata;
}

/**
 * Concrete event produced by the bundled adapters.
 *
 * `event_id` and `timestamp` are assigned at ingestion time if the
 * producer does not supply them.
 */
export class MessageEvent<TOrigin extends EventOrigin = EventOrigin>
  extends BotEvent<TOrigin>
  implements MessageEventData {
  readonly event_id: string;
  readonly event_type: string;
  readonly source: string;
  readonly timestamp: string;
  readonly payload: EventPayload;
  readonly metadata: EventMetadata;

  constructor(adapter: TOrigin, data: MessageEventData) {
    super(adapter);
    this.event_id = data.event_id;
    this.event_type = data.event_type;
    this.source = data.source;
    this.timestamp = data.timestamp;
    this.payload = data.payload;
    this.metadata = data.metadata;
  }

  describe(): string {
    return `MessageEvent(event_type=${this.event_type}, source=${this.source}, event_id=${this.event_id})`;
  }

  toJSON(): MessageEventData {
    return {
      event_id: this.event_id,
      event_type: this.event_type,
      source: this.source,
      timestamp: this.timestamp,
      payload: this.payload,
      metadata: this.metadata,
    };
  }
}
