/**
 * Logging with Pino - the bot token and webhook secret are redacted
 */

import pino from 'pino';

const redactPaths = [
  'token',
  'botToken',
  'webhookSecret',
  'config.telegram.botToken',
  'config.telegram.webhookSecret',
  'headers["x-telegram-bot-api-secret-token"]',
  'req.headers["x-telegram-bot-api-secret-token"]',
];

/**
 * Minimal logging surface the modules depend on. A pino logger satisfies it,
 * and so does a plain object of spies in tests.
 */
export interface Logger {
  info(obj: unknown, msg?: string): void;
  warn(obj: unknown, msg?: string): void;
  error(obj: unknown, msg?: string): void;
  debug(obj: unknown, msg?: string): void;
}

/**
 * Root logger; level and environment come from BotConfig. Pretty output in development.
 */
export function createLogger(level: string, nodeEnv: string): pino.Logger {
  return pino({
    level,
    redact: {
      paths: redactPaths,
      censor: '[REDACTED]',
    },
    transport:
      nodeEnv === 'development'
        ? {
            target: 'pino-pretty',
            options: {
              colorize: true,
              ignore: 'pid,hostname',
            },
          }
        : undefined,
  });
}

export function createChildLogger(name: string, parent: pino.Logger): pino.Logger {
  return parent.child({ module: name });
}
