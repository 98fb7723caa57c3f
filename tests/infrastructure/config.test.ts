import { describe, it, expect, afterEach } from 'vitest';
import { writeFileSync, mkdirSync, rmSync } from 'node:fs';
import { join } from 'node:path';
import { loadBotConfig } from '../../src/infrastructure/config/config.js';
import { ConfigError } from '../../src/domain/index.js';

const TMP_DIR = join(process.cwd(), '.tmp-test-bot-config');

function writeTmpConfig(content: string): string {
  mkdirSync(TMP_DIR, { recursive: true });
  const path = join(TMP_DIR, 'bot.json');
  writeFileSync(path, content, 'utf-8');
  return path;
}

const DEFAULTS = {
  log_level: 'info',
  verbose_exception_log: false,
  shutdown_grace_ms: 3000,
  handlers: [],
  adapters: {
    webhook: { enabled: false, host: '0.0.0.0', port: 3000 },
    redis: { enabled: false, url: 'redis://localhost:6379', channel: 'bot_events', reply_channel: 'bot_replies' },
  },
};

describe('loadBotConfig', () => {
  afterEach(() => {
    rmSync(TMP_DIR, { recursive: true, force: true });
  });

  it('returns defaults when the file does not exist', () => {
    expect(loadBotConfig('/nonexistent/bot.json', {})).toEqual(DEFAULTS);
  });

  it('returns defaults for an empty object', () => {
    expect(loadBotConfig(writeTmpConfig('{}'), {})).toEqual(DEFAULTS);
  });

  it('merges file values over defaults', () => {
    const path = writeTmpConfig(JSON.stringify({
      verbose_exception_log: true,
      handlers: ['./handlers/echo.js'],
      adapters: { webhook: { enabled: true, port: 8080 } },
    }));

    const config = loadBotConfig(path, {});

    expect(config.verbose_exception_log).toBe(true);
    expect(config.handlers).toEqual(['./handlers/echo.js']);
    expect(config.adapters.webhook).toEqual({ enabled: true, host: '0.0.0.0', port: 8080 });
    expect(config.adapters.redis.enabled).toBe(false);
  });

  it('reads the path from BOT_CONFIG', () => {
    const path = writeTmpConfig(JSON.stringify({ log_level: 'debug' }));

    expect(loadBotConfig(undefined, { BOT_CONFIG: path }).log_level).toBe('debug');
  });

  it('applies environment overrides', () => {
    const config = loadBotConfig('/nonexistent/bot.json', {
      LOG_LEVEL: 'warn',
      REDIS_URL: 'redis://cache:6380',
      HOST: '127.0.0.1',
      PORT: '4000',
    });

    expect(config.log_level).toBe('warn');
    expect(config.adapters.redis.url).toBe('redis://cache:6380');
    expect(config.adapters.webhook.host).toBe('127.0.0.1');
    expect(config.adapters.webhook.port).toBe(4000);
  });

  it('throws ConfigError for invalid JSON', () => {
    const path = writeTmpConfig('{ not json');

    expect(() => loadBotConfig(path, {})).toThrow(ConfigError);
    expect(() => loadBotConfig(path, {})).toThrow(`Invalid config file "${path}": not valid JSON`);
  });

  it('throws ConfigError naming the offending keys', () => {
    const path = writeTmpConfig(JSON.stringify({ shutdown_grace_ms: -1, adapters: { webhook: { port: 'x' } } }));

    expect(() => loadBotConfig(path, {})).toThrow(
      `Invalid config file "${path}": shutdown_grace_ms: Number must be greater than or equal to 0; `
        + 'adapters.webhook.port: Expected number, received string',
    );
  });

  it('throws ConfigError for an invalid environment override', () => {
    expect(() => loadBotConfig('/nonexistent/bot.json', { LOG_LEVEL: 'loud' })).toThrow(ConfigError);
  });
});
