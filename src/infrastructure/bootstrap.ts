import type { Logger } from 'pino';
import { Bot } from '../application/bot.js';
import type { MessageEvent } from '../domain/index.js';
import type { BotConfig } from './config/config.js';
import { WebhookAdapter } from './http/webhook-adapter.js';
import { loadHandlerModule } from './loader/handler-loader.js';
import type { ModuleImporter } from './loader/handler-loader.js';
import { RedisChannelAdapter } from './redis/redis-channel-adapter.js';

/**
 * Builds a bot from configuration: enabled adapters first, then every
 * configured handler module, in order.
 */
export async function createBot(
  config: BotConfig,
  log: Logger,
  importer?: ModuleImporter,
): Promise<Bot<MessageEvent>> {
  const bot = new Bot<MessageEvent>({ log, verboseExceptionLog: config.verbose_exception_log });

  const { webhook, redis } = config.adapters;
  if (webhook.enabled) {
    bot.addAdapter(new WebhookAdapter(bot, { host: webhook.host, port: webhook.port }));
  }
  if (redis.enabled) {
    bot.addAdapter(
      new RedisChannelAdapter(bot, { url: redis.url, channel: redis.channel, replyChannel: redis.reply_channel }),
    );
  }

  for (const specifier of config.handlers) {
    await loadHandlerModule(bot, specifier, importer);
  }
  return bot;
}
