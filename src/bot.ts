/**
 * BOT — Composition root
 *
 * Wires the clients, the command router, the inbound transport and the
 * scheduler from one frozen BotConfig. Dependencies can be swapped for
 * in-process stand-ins.
 */

import type { FastifyInstance } from 'fastify';
import type pino from 'pino';
import { buildApp } from './app.js';
import { ConfigMissingError, errorMessage } from './common/errors.js';
import { createChildLogger } from './common/logger.js';
import type { BotConfig } from './config/env.js';
import { SvgChartRenderer, type ChartRenderer } from './modules/chart/index.js';
import { BOT_COMMANDS, CommandRouter } from './modules/commands/index.js';
import { FearGreedClient, type FearGreedFetcher } from './modules/fear-greed/index.js';
import type { PipelineContext } from './modules/pipeline/index.js';
import { DailyScheduler, type ScheduleFn } from './modules/scheduler/index.js';
import { TelegramClient, TelegramPoller, type TelegramUpdate } from './modules/telegram/index.js';

export interface BotDeps {
  telegram?: TelegramClient;
  fetcher?: FearGreedFetcher;
  renderer?: ChartRenderer;
  schedule?: ScheduleFn;
}

export class FearGreedBot {
  private readonly config: BotConfig;
  private readonly logger: pino.Logger;
  private readonly telegram: TelegramClient;
  private readonly ctx: PipelineContext;
  private readonly scheduler: DailyScheduler;
  private app: FastifyInstance | null = null;
  private poller: TelegramPoller | null = null;
  private pollLoop: Promise<void> | null = null;

  constructor(config: BotConfig, logger: pino.Logger, deps: BotDeps = {}) {
    this.config = config;
    this.logger = logger;

    this.telegram =
      deps.telegram ??
      new TelegramClient({
        token: config.telegram.botToken,
        timeoutMs: config.telegram.timeoutMs,
        logger: createChildLogger('telegram', logger),
      });

    this.ctx = Object.freeze({
      config,
      fetcher:
        deps.fetcher ??
        new FearGreedClient({
          ...config.upstream,
          logger: createChildLogger('fear-greed', logger),
        }),
      renderer: deps.renderer ?? new SvgChartRenderer({ logger: createChildLogger('chart', logger) }),
      dispatcher: this.telegram,
      logger: createChildLogger('pipeline', logger),
    });

    this.scheduler = new DailyScheduler({ ctx: this.ctx, schedule: deps.schedule });
  }

  get context(): PipelineContext {
    return this.ctx;
  }

  async start(): Promise<FastifyInstance> {
    const { config, logger, telegram } = this;

    const identity = await telegram.getMe().catch(err => {
      logger.warn({ error: errorMessage(err) }, 'getMe failed, accepting every /cmd@mention');
      return undefined;
    });
    if (identity) {
      logger.info({ botId: identity.id, username: identity.username }, 'Bot identity resolved');
    }

    const router = new CommandRouter({ ctx: this.ctx, botUsername: identity?.username });
    const onUpdate = async (update: TelegramUpdate): Promise<void> => {
      await router.handleUpdate(update);
    };

    await telegram.setMyCommands(BOT_COMMANDS).catch(err => {
      logger.warn({ error: errorMessage(err) }, 'setMyCommands failed');
    });

    const webhook = config.telegram.mode === 'webhook' ? this.webhookSettings() : undefined;

    const app = await buildApp({
      logger,
      mode: config.telegram.mode,
      nodeEnv: config.nodeEnv,
      health: () => ({
        polling: this.poller?.isRunning ?? false,
        scheduler: {
          enabled: config.schedule.enabled,
          started: this.scheduler.isStarted,
          jobs: this.scheduler.getStatus(),
        },
      }),
      webhook: webhook && {
        secret: webhook.secret,
        onUpdate,
        logger: createChildLogger('webhook', logger),
      },
    });
    this.app = app;

    await app.listen({ port: config.http.port, host: config.http.host });

    if (webhook) {
      await telegram.setWebhook(webhook.url, webhook.secret);
      logger.info({ url: webhook.url }, 'Webhook registered');
    } else {
      await telegram.deleteWebhook().catch(err => {
        logger.warn({ error: errorMessage(err) }, 'deleteWebhook failed');
      });
      this.poller = new TelegramPoller({
        source: telegram,
        onUpdate,
        logger: createChildLogger('poller', logger),
        timeoutSec: config.telegram.pollTimeoutSec,
        errorBackoffMs: config.telegram.pollErrorBackoffMs,
      });
      this.pollLoop = this.poller.run().catch(err => {
        logger.error({ error: errorMessage(err) }, 'Poll loop crashed');
      });
    }

    if (config.schedule.enabled) {
      this.scheduler.start();
    } else {
      logger.info('Scheduler disabled');
    }

    return app;
  }

  async stop(): Promise<void> {
    this.scheduler.stop();

    if (this.poller) {
      await this.poller.stop();
      await this.pollLoop;
      this.poller = null;
      this.pollLoop = null;
    }

    if (this.app) {
      await this.app.close();
      this.app = null;
    }
  }

  private webhookSettings(): { url: string; secret: string } {
    const { webhookUrl, webhookSecret } = this.config.telegram;
    if (!webhookUrl || !webhookSecret) {
      throw new ConfigMissingError(['WEBHOOK_URL and WEBHOOK_SECRET are required when BOT_MODE=webhook']);
    }
    return { url: webhookUrl, secret: webhookSecret };
  }
}
