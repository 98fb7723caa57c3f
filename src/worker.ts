import { createBot } from './infrastructure/bootstrap.js';
import { loadBotConfig } from './infrastructure/config/config.js';
import { createLogger } from './infrastructure/logging/index.js';

/**
 * Bot process entry point.
 *
 * Loads config/bot.json (or $BOT_CONFIG), attaches the enabled adapters,
 * imports the configured handler modules and runs until SIGINT/SIGTERM.
 * A second signal, or a drain that outlasts `shutdown_grace_ms`, exits
 * immediately.
 */
async function main(): Promise<void> {
  const config = loadBotConfig();
  const log = createLogger({ level: config.log_level });
  const bot = await createBot(config, log);

  let signals = 0;
  const onSignal = (signal: NodeJS.Signals): void => {
    signals += 1;
    if (signals > 1) {
      log.warn({ signal }, 'Received second signal, forcing exit');
      process.exit(1);
    }
    bot.shutdown(`received ${signal}`);

    // Give in-flight handler chains a moment, then force exit
    setTimeout(() => {
      log.warn({ graceMs: config.shutdown_grace_ms }, 'Shutdown grace period elapsed, forcing exit');
      process.exit(1);
    }, config.shutdown_grace_ms).unref();
  };

  process.on('SIGINT', onSignal);
  process.on('SIGTERM', onSignal);

  await bot.run();
}

main().catch((err: unknown) => {
  console.error('Bot crashed', err);
  process.exit(1);
});
