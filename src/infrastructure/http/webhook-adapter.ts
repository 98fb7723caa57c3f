import Fastify from 'fastify';
import type { FastifyInstance } from 'fastify';
import type { Bot } from '../../application/bot.js';
import type { MessageEvent } from '../../domain/index.js';
import eventRoutes from '../../interfaces/http/event-routes.js';
import type { HealthReport } from '../../interfaces/http/event-routes.js';
import { Adapter } from '../adapters/adapter.js';

export interface WebhookAdapterOptions {
  host: string;
  port: number;
  name?: string;
}

/**
 * Receives events over HTTP.
 *
 * The Fastify instance is built and its routes registered in
 * `startup()`, so tests can drive it with `app.inject()` without
 * listening on a port.
 */
export class WebhookAdapter extends Adapter<MessageEvent> {
  readonly app: FastifyInstance;
  private readonly host: string;
  private readonly port: number;

  constructor(bot: Bot<MessageEvent>, options: WebhookAdapterOptions) {
    super(options.name ?? 'webhook', bot);
    this.host = options.host;
    this.port = options.port;
    this.app = Fastify({ logger: false });
  }

  override async startup(): Promise<void> {
    await this.app.register(eventRoutes, {
      origin: this,
      deliver: (event, options) => this.deliver(event, options),
      health: () => this.health(),
      log: this.log,
    });
    await this.app.ready();
    this.log.info('Webhook routes ready');
  }

  async run(): Promise<void> {
    const address = await this.app.listen({ host: this.host, port: this.port });
    this.log.info({ address }, 'Webhook adapter listening');
    await this.bot.context.whenShutdown();
  }

  override async shutdown(): Promise<void> {
    await this.app.close();
    this.log.info('Webhook adapter closed');
  }

  health(): HealthReport {
    return {
      status: this.bot.isShuttingDown ? 'stopping' : 'ok',
      handlers: this.bot.handlers.size,
      adapters: this.bot.adapters.map((a) => a.name),
    };
  }
}
