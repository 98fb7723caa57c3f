export * from './domain/index.js';
export * from './application/index.js';
export { Adapter } from './infrastructure/adapters/adapter.js';
export { WebhookAdapter } from './infrastructure/http/webhook-adapter.js';
export type { WebhookAdapterOptions } from './infrastructure/http/webhook-adapter.js';
export { RedisChannelAdapter } from './infrastructure/redis/redis-channel-adapter.js';
export type { RedisChannelAdapterOptions } from './infrastructure/redis/redis-channel-adapter.js';
export { default as eventRoutes } from './interfaces/http/event-routes.js';
export type { EventRoutesOptions, HealthReport } from './interfaces/http/event-routes.js';
export { botConfigSchema, loadBotConfig, DEFAULT_CONFIG_PATH } from './infrastructure/config/config.js';
export type { BotConfig } from './infrastructure/config/config.js';
export { createLogger, describeError, logFault } from './infrastructure/logging/index.js';
export type { LoggerOptions } from './infrastructure/logging/index.js';
export { loadHandlerModule, collectDescriptors, resolveSpecifier } from './infrastructure/loader/handler-loader.js';
export type { ModuleImporter } from './infrastructure/loader/handler-loader.js';
export { createBot } from './infrastructure/bootstrap.js';
