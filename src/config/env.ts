/**
 * CONFIG — Environment
 *
 * Reads the environment once at startup, validates it
 * with zod and returns a frozen BotConfig. Nothing else in the codebase
 * touches process.env after this point.
 */

import cron from 'node-cron';
import { z } from 'zod';
import { ConfigMissingError } from '../common/errors.js';

export const CNN_GRAPHDATA_URL = 'https://production.dataviz.cnn.io/index/fearandgreed/graphdata';

const boolFromEnv = z
  .enum(['true', 'false', '1', '0'])
  .transform(v => v === 'true' || v === '1');

function isValidTimezone(tz: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: tz });
    return true;
  } catch {
    return false;
  }
}

const cronExpression = z.string().trim().refine(expr => cron.validate(expr), {
  message: 'must be a valid cron expression',
});

const EnvSchema = z
  .object({
    TELEGRAM_BOT_TOKEN: z.string({ required_error: 'is required' }).trim().min(1, 'is required'),
    TELEGRAM_CHAT_ID: z.string({ required_error: 'is required' }).trim().min(1, 'is required'),
    BOT_MODE: z.enum(['polling', 'webhook']).default('polling'),
    WEBHOOK_URL: z.string().url().optional(),
    WEBHOOK_SECRET: z
      .string()
      .regex(/^[A-Za-z0-9_-]{1,256}$/, 'may only contain A-Z, a-z, 0-9, _ and -')
      .optional(),
    HOST: z.string().default('0.0.0.0'),
    PORT: z.coerce.number().int().min(0).max(65535).default(8080),
    SCHEDULE_TIMEZONE: z.string().default('Asia/Taipei').refine(isValidTimezone, {
      message: 'must be an IANA timezone name',
    }),
    FEARGREED_CRON: cronExpression.default('0 8 * * *'),
    COMPONENTS_CRON: cronExpression.default('1 8 * * *'),
    SCHEDULER_ENABLED: boolFromEnv.default('true'),
    CHART_WINDOW_DAYS: z.coerce.number().int().positive().default(365),
    FNG_API_URL: z.string().url().default(CNN_GRAPHDATA_URL),
    UPSTREAM_TIMEOUT_MS: z.coerce.number().int().positive().default(15000),
    UPSTREAM_RETRIES: z.coerce.number().int().min(0).max(5).default(1),
    UPSTREAM_RETRY_DELAY_MS: z.coerce.number().int().min(0).default(1000),
    TELEGRAM_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
    POLL_TIMEOUT_SEC: z.coerce.number().int().min(1).max(50).default(30),
    POLL_ERROR_BACKOFF_MS: z.coerce.number().int().min(0).default(5000),
    LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
    NODE_ENV: z.string().default('production'),
  })
  .superRefine((env, ctx) => {
    if (env.BOT_MODE !== 'webhook') return;
    if (!env.WEBHOOK_URL) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['WEBHOOK_URL'], message: 'is required when BOT_MODE=webhook' });
    }
    if (!env.WEBHOOK_SECRET) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['WEBHOOK_SECRET'], message: 'is required when BOT_MODE=webhook' });
    }
  });

export type BotMode = 'polling' | 'webhook';

export interface BotConfig {
  readonly telegram: {
    readonly botToken: string;
    readonly defaultChatId: string;
    readonly mode: BotMode;
    readonly webhookUrl?: string;
    readonly webhookSecret?: string;
    readonly timeoutMs: number;
    readonly pollTimeoutSec: number;
    readonly pollErrorBackoffMs: number;
  };
  readonly http: {
    readonly host: string;
    readonly port: number;
  };
  readonly schedule: {
    readonly enabled: boolean;
    readonly timezone: string;
    readonly fearGreedCron: string;
    readonly componentsCron: string;
  };
  readonly upstream: {
    readonly url: string;
    readonly timeoutMs: number;
    readonly retries: number;
    readonly retryDelayMs: number;
  };
  readonly chart: {
    readonly windowDays: number;
  };
  readonly logLevel: string;
  readonly nodeEnv: string;
}

function deepFreeze<T extends object>(obj: T): Readonly<T> {
  for (const value of Object.values(obj)) {
    if (value && typeof value === 'object') deepFreeze(value);
  }
  return Object.freeze(obj);
}

/**
 * Build the bot configuration from an environment map.
 * Throws ConfigMissingError listing every offending variable.
 */
export function loadConfig(source: NodeJS.ProcessEnv = process.env): BotConfig {
  // Empty strings count as unset so that `FOO=` in .env falls back to defaults
  const cleaned = Object.fromEntries(
    Object.entries(source).filter(([, v]) => v !== undefined && v.trim() !== '')
  );

  const parsed = EnvSchema.safeParse(cleaned);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(i => `${i.path.join('.') || 'env'} ${i.message}`);
    throw new ConfigMissingError(issues);
  }

  const env = parsed.data;

  return deepFreeze({
    telegram: {
      botToken: env.TELEGRAM_BOT_TOKEN,
      defaultChatId: env.TELEGRAM_CHAT_ID,
      mode: env.BOT_MODE,
      webhookUrl: env.WEBHOOK_URL,
      webhookSecret: env.WEBHOOK_SECRET,
      timeoutMs: env.TELEGRAM_TIMEOUT_MS,
      pollTimeoutSec: env.POLL_TIMEOUT_SEC,
      pollErrorBackoffMs: env.POLL_ERROR_BACKOFF_MS,
    },
    http: {
      host: env.HOST,
      port: env.PORT,
    },
    schedule: {
      enabled: env.SCHEDULER_ENABLED,
      timezone: env.SCHEDULE_TIMEZONE,
      fearGreedCron: env.FEARGREED_CRON,
      componentsCron: env.COMPONENTS_CRON,
    },
    upstream: {
      url: env.FNG_API_URL,
      timeoutMs: env.UPSTREAM_TIMEOUT_MS,
      retries: env.UPSTREAM_RETRIES,
      retryDelayMs: env.UPSTREAM_RETRY_DELAY_MS,
    },
    chart: {
      windowDays: env.CHART_WINDOW_DAYS,
    },
    logLevel: env.LOG_LEVEL,
    nodeEnv: env.NODE_ENV,
  });
}
