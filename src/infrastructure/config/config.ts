import { readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { z } from 'zod';
import { ConfigError } from '../../domain/index.js';

const logLevelSchema = z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']);

/**
 * Bot configuration file schema.
 *
 * Every key is optional; omitted keys take the defaults below.
 */
export const botConfigSchema = z.object({
  log_level: logLevelSchema.default('info'),
  verbose_exception_log: z.boolean().default(false),
  /** How long in-flight handler chains get after a shutdown signal. */
  shutdown_grace_ms: z.number().int().min(0).default(3000),
  /** Module specifiers loaded with `loadHandlerModule`. */
  handlers: z.array(z.string().min(1)).default([]),
  adapters: z
    .object({
      webhook: z
        .object({
          enabled: z.boolean().default(false),
          host: z.string().min(1).default('0.0.0.0'),
          port: z.number().int().min(0).max(65535).default(3000),
        })
        .default({}),
      redis: z
        .object({
          enabled: z.boolean().default(false),
          url: z.string().min(1).default('redis://localhost:6379'),
          channel: z.string().min(1).default('bot_events'),
          reply_channel: z.string().min(1).default('bot_replies'),
        })
        .default({}),
    })
    .default({}),
});

export type BotConfig = z.infer<typeof botConfigSchema>;

const envSchema = z.object({
  LOG_LEVEL: logLevelSchema.optional(),
  REDIS_URL: z.string().min(1).optional(),
  HOST: z.string().min(1).optional(),
  PORT: z.coerce.number().int().min(0).max(65535).optional(),
});

export const DEFAULT_CONFIG_PATH = 'config/bot.json';

function isMissingFile(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

function readConfigFile(path: string): unknown {
  let content: string;
  try {
    content = readFileSync(path, 'utf-8');
  } catch (err: unknown) {
    if (isMissingFile(err)) return {};
    throw new ConfigError(path, 'cannot be read', err);
  }

  try {
    return JSON.parse(content);
  } catch (err: unknown) {
    throw new ConfigError(path, 'not valid JSON', err);
  }
}

/**
 * Loads the bot configuration.
 *
 * Path resolution: explicit argument → `BOT_CONFIG` → `config/bot.json`.
 * A missing file yields the defaults. `LOG_LEVEL`, `REDIS_URL`, `HOST`
 * and `PORT` override the file.
 *
 * @throws ConfigError when the file or the environment is invalid.
 */
export function loadBotConfig(path?: string, env: NodeJS.ProcessEnv = process.env): BotConfig {
  const configPath = resolve(path ?? env['BOT_CONFIG'] ?? DEFAULT_CONFIG_PATH);

  const parsed = botConfigSchema.safeParse(readConfigFile(configPath));
  if (!parsed.success) {
    throw new ConfigError(configPath, parsed.error.issues.map(formatIssue).join('; '));
  }

  const overrides = envSchema.safeParse(env);
  if (!overrides.success) {
    throw new ConfigError(configPath, `environment: ${overrides.error.issues.map(formatIssue).join('; ')}`);
  }

  const config = parsed.data;
  const { LOG_LEVEL, REDIS_URL, HOST, PORT } = overrides.data;
  if (LOG_LEVEL !== undefined) config.log_level = LOG_LEVEL;
  if (REDIS_URL !== undefined) config.adapters.redis.url = REDIS_URL;
  if (HOST !== undefined) config.adapters.webhook.host = HOST;
  if (PORT !== undefined) config.adapters.webhook.port = PORT;
  return config;
}

function formatIssue(issue: z.ZodIssue): string {
  return issue.path.length > 0 ? `${issue.path.join('.')}: ${issue.message}` : issue.message;
}
