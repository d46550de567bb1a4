import Fastify, { type FastifyBaseLogger, type FastifyInstance } from 'fastify';
import type { BotMode } from './config/env.js';
import { registerTelegramWebhookRoutes, type TelegramWebhookOptions } from './modules/telegram/index.js';

export interface BuildAppOptions {
  logger: FastifyBaseLogger;
  mode: BotMode;
  nodeEnv: string;
  /** Extra fields merged into the /health body */
  health?: () => Record<string, unknown>;
  /** Registers POST /telegram/webhook when present */
  webhook?: TelegramWebhookOptions;
}

/**
 * Build Fastify Application
 */
export async function buildApp(opts: BuildAppOptions): Promise<FastifyInstance> {
  const app = Fastify({
    logger: opts.logger,
    trustProxy: true,
  });

  // Body parser rejections (bad JSON, oversized payload) keep their 4xx
  app.setErrorHandler((err, _req, reply) => {
    const statusCode = err.statusCode ?? 500;

    if (statusCode < 500) {
      app.log.warn({ statusCode, error: err.message }, 'Request rejected');
      return reply.status(statusCode).send({
        ok: false,
        error: 'BAD_REQUEST',
        message: err.message,
      });
    }

    app.log.error(err);
    return reply.status(500).send({
      ok: false,
      error: 'INTERNAL_ERROR',
      message: opts.nodeEnv === 'production' ? 'Internal server error' : err.message,
    });
  });

  // Not found handler
  app.setNotFoundHandler((_req, reply) => {
    reply.status(404).send({
      ok: false,
      error: 'NOT_FOUND',
      message: 'Route not found',
    });
  });

  app.get('/health', async () => ({
    ok: true,
    mode: opts.mode,
    uptimeSec: Math.round(process.uptime()),
    timestamp: new Date().toISOString(),
    ...opts.health?.(),
  }));

  if (opts.webhook) {
    await registerTelegramWebhookRoutes(app, opts.webhook);
  }

  return app;
}
