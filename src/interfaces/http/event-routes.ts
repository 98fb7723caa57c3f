import fp from 'fastify-plugin';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';
import type { Logger } from 'pino';
import { inboundEventSchema, inboundEventBatchSchema, toMessageEvent } from '../../application/index.js';
import type { DeliverOptions } from '../../application/index.js';
import type { EventOrigin, MessageEvent } from '../../domain/index.js';

export interface HealthReport {
  status: 'ok' | 'stopping';
  handlers: number;
  adapters: string[];
}

export interface EventRoutesOptions {
  /** Recorded as the adapter of every event received through these routes. */
  origin: EventOrigin;
  deliver: (event: MessageEvent, options: DeliverOptions) => Promise<void>;
  health: () => HealthReport;
  log: Logger;
}

/**
 * Registers the inbound webhook routes.
 *
 * POST /events        single event
 * POST /events/batch  batch of events, delivered in order
 * GET  /health        runtime status
 */
async function eventRoutes(fastify: FastifyInstance, options: EventRoutesOptions): Promise<void> {
  const { origin, deliver, health, log } = options;

  /**
   * Single event.
   *
   * Validates → assigns event_id/timestamp if missing → delivers → 202.
   * Delivery returns once waiters have seen the event; the handler
   * chain keeps running after the response.
   */
  fastify.post(
    '/events',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = inboundEventSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const event = toMessageEvent(origin, parsed.data);
      await deliver(event, { allowGet: parsed.data.allow_get });

      return reply.status(202).send({
        status: 'accepted',
        event_id: event.event_id,
      });
    },
  );

  /**
   * Batch ingestion.
   *
   * Validates the full array up-front. On any validation failure the
   * entire batch is rejected, with no partial success.
   */
  fastify.post(
    '/events/batch',
    async (request: FastifyRequest, reply: FastifyReply) => {
      const parsed = inboundEventBatchSchema.safeParse(request.body);

      if (!parsed.success) {
        return reply.status(400).send({
          error: 'Validation failed',
          issues: parsed.error.issues,
        });
      }

      const eventIds: string[] = [];
      for (const input of parsed.data) {
        const event = toMessageEvent(origin, input);
        await deliver(event, { allowGet: input.allow_get });
        eventIds.push(event.event_id);
      }

      log.debug({ count: eventIds.length }, 'Batch delivered');

      return reply.status(202).send({
        status: 'accepted',
        count: eventIds.length,
        event_ids: eventIds,
      });
    },
  );

  fastify.get(
    '/health',
    async (_request: FastifyRequest, reply: FastifyReply) => {
      return reply.status(200).send(health());
    },
  );
}

export default fp(eventRoutes, {
  name: 'event-routes',
  fastify: '5.x',
});
