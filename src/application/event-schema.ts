import { randomUUID } from 'node:crypto';
import { z } from 'zod';
import { MessageEvent } from '../domain/index.js';
import type { EventOrigin } from '../domain/index.js';

/**
 * Zod schema for validating a single inbound message event.
 *
 * - `event_id` and `timestamp` are optional; assigned at ingestion if absent.
 * - `payload` and `metadata` are open-ended objects so heterogeneous
 *   event types need no schema of their own.
 * - `allow_get: false` hides the event from `get()` waiters.
 */
export const inboundEventSchema = z.object({
  event_id: z.string().min(1).max(255).optional(),
  event_type: z.string().min(1).max(255),
  source: z.string().min(1).max(255),
  timestamp: z.string().datetime({ message: 'Must be a valid ISO-8601 datetime' }).optional(),
  payload: z.record(z.string(), z.unknown()).default({}),
  metadata: z.record(z.string(), z.unknown()).default({}),
  allow_get: z.boolean().default(true),
});

export type InboundEvent = z.infer<typeof inboundEventSchema>;

/** Batches are validated as a whole: one bad entry rejects all. */
export const inboundEventBatchSchema = z.array(inboundEventSchema).min(1, 'Batch must contain at least one event');

/** Builds the runtime event from validated input. */
export function toMessageEvent<O extends EventOrigin>(
  origin: O,
  input: InboundEvent,
  now: () => Date = () => new Date(),
): MessageEvent<O> {
  return new MessageEvent(origin, {
    event_id: input.event_id ?? randomUUID(),
    event_type: input.event_type,
    source: input.source,
    timestamp: input.timestamp ?? now().toISOString(),
    payload: input.payload,
    metadata: input.metadata,
  });
}
