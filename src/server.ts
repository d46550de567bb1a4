import 'dotenv/config';
import { FearGreedBot } from './bot.js';
import { ConfigMissingError, errorMessage } from './common/errors.js';
import { createLogger } from './common/logger.js';
import { type BotConfig, loadConfig } from './config/env.js';

function readConfig(): BotConfig {
  try {
    return loadConfig();
  } catch (err) {
    if (err instanceof ConfigMissingError) {
      process.stderr.write(`[feargreed-notifier] ${err.message}\n`);
      for (const issue of err.issues) {
        process.stderr.write(`  - ${issue}\n`);
      }
      process.exit(1);
    }
    throw err;
  }
}

async function main(): Promise<void> {
  const config = readConfig();
  const logger = createLogger(config.logLevel, config.nodeEnv);

  process.on('unhandledRejection', reason => {
    logger.error({ error: errorMessage(reason) }, 'Unhandled rejection');
  });

  const bot = new FearGreedBot(config, logger);

  let shuttingDown = false;
  const shutdown = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info({ signal }, 'Shutting down');
    try {
      await bot.stop();
      logger.info('Shutdown complete');
      process.exit(0);
    } catch (err) {
      logger.error({ error: errorMessage(err) }, 'Shutdown failed');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  await bot.start();
  logger.info(
    {
      mode: config.telegram.mode,
      port: config.http.port,
      timezone: config.schedule.timezone,
      scheduler: config.schedule.enabled,
    },
    'Fear & Greed notifier started'
  );
}

main().catch(err => {
  process.stderr.write(`[feargreed-notifier] Fatal error: ${errorMessage(err)}\n`);
  process.exit(1);
});
