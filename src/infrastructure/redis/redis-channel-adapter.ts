import Redis from 'ioredis';
import type { Bot } from '../../application/bot.js';
import { inboundEventSchema, toMessageEvent } from '../../application/event-schema.js';
import type { MessageEvent } from '../../domain/index.js';
import { Adapter } from '../adapters/adapter.js';
import { logFault } from '../logging/index.js';

export interface RedisChannelAdapterOptions {
  url: string;
  /** Pub/Sub channel events are read from. */
  channel: string;
  /** Pub/Sub channel `publish()` writes to. */
  replyChannel: string;
  name?: string;
  createClient?: (url: string) => Redis;
}

function defaultClient(url: string): Redis {
  return new Redis(url, {
    maxRetriesPerRequest: null,
    enableReadyCheck: true,
    lazyConnect: true,
  });
}

/**
 * Receives events from a Redis Pub/Sub channel.
 *
 * ioredis requires a dedicated connection for subscriber mode, so
 * replies go out through a second connection.
 * Malformed messages are logged and skipped.
 */
export class RedisChannelAdapter extends Adapter<MessageEvent> {
  readonly channel: string;
  readonly replyChannel: string;
  private readonly subscriber: Redis;
  private readonly publisher: Redis;

  constructor(bot: Bot<MessageEvent>, options: RedisChannelAdapterOptions) {
    super(options.name ?? 'redis', bot);
    this.channel = options.channel;
    this.replyChannel = options.replyChannel;
    const create = options.createClient ?? defaultClient;
    this.subscriber = create(options.url);
    this.publisher = create(options.url);
  }

  override async startup(): Promise<void> {
    await this.subscriber.connect();
    await this.publisher.connect();
    this.log.info('Redis connections established');
  }

  async run(): Promise<void> {
    this.subscriber.on('message', (channel: string, message: string) => {
      if (channel !== this.channel) return;
      this.handleMessage(message).catch((err: unknown) => {
        logFault(this.log, err, 'Failed to deliver channel message', { channel }, this.bot.context.verboseExceptionLog);
      });
    });

    await this.subscriber.subscribe(this.channel);
    this.log.info({ channel: this.channel }, 'Subscribed to event channel');

    await this.bot.context.whenShutdown();
  }

  /** Parses, validates and delivers one raw channel message. */
  async handleMessage(raw: string): Promise<void> {
    let body: unknown;
    try {
      body = JSON.parse(raw);
    } catch (err: unknown) {
      this.log.warn({ err, message: raw }, 'Failed to parse channel message');
      return;
    }

    const parsed = inboundEventSchema.safeParse(body);
    if (!parsed.success) {
      this.log.warn({ issues: parsed.error.issues }, 'Malformed channel message, skipping');
      return;
    }

    await this.deliver(toMessageEvent(this, parsed.data), { allowGet: parsed.data.allow_get });
  }

  /**
   * Publishes a reply on the reply channel.
   *
   * Best-effort: publish failures are logged, never thrown to the handler.
   * Returns the number of subscribers that received it, or 0 on failure.
   */
  async publish(payload: Record<string, unknown>): Promise<number> {
    try {
      const receivers = await this.publisher.publish(this.replyChannel, JSON.stringify(payload));
      this.log.debug({ channel: this.replyChannel, receivers }, 'Reply published');
      return receivers;
    } catch (err: unknown) {
      this.log.warn({ err, channel: this.replyChannel }, 'Failed to publish reply');
      return 0;
    }
  }

  override async shutdown(): Promise<void> {
    try {
      await this.subscriber.unsubscribe(this.channel);
    } catch (err: unknown) {
      this.log.warn({ err }, 'Unsubscribe failed');
    }
    for (const client of [this.subscriber, this.publisher]) {
      try {
        await client.quit();
      } catch (err: unknown) {
        this.log.warn({ err }, 'Redis quit failed');
      }
    }
    this.log.info('Redis adapter disconnected');
  }
}
