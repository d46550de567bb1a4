/**
 * TELEGRAM WEBHOOK ROUTES — HTTP Endpoints
 *
 * Telegram retries a webhook delivery until it gets a 2xx, so the route
 * answers as soon as the body is validated and handles the update in the
 * background.
 */

import { timingSafeEqual } from 'crypto';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { errorMessage } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import { type TelegramUpdate, TelegramUpdateSchema } from './telegram.types.js';

export const TELEGRAM_WEBHOOK_PATH = '/telegram/webhook';
export const SECRET_HEADER = 'x-telegram-bot-api-secret-token';

export interface TelegramWebhookOptions {
  secret: string;
  onUpdate: (update: TelegramUpdate) => Promise<void>;
  logger: Logger;
}

function secretMatches(expected: string, received: string | string[] | undefined): boolean {
  if (typeof received !== 'string') return false;
  const a = Buffer.from(expected);
  const b = Buffer.from(received);
  return a.length === b.length && timingSafeEqual(a, b);
}

export async function registerTelegramWebhookRoutes(
  app: FastifyInstance,
  opts: TelegramWebhookOptions
): Promise<void> {
  /**
   * POST /telegram/webhook
   */
  app.post(TELEGRAM_WEBHOOK_PATH, async (request: FastifyRequest, reply: FastifyReply) => {
    if (!secretMatches(opts.secret, request.headers[SECRET_HEADER])) {
      return reply.status(401).send({ ok: false, error: 'UNAUTHORIZED', message: 'Invalid secret token' });
    }

    const parsed = TelegramUpdateSchema.safeParse(request.body);
    if (!parsed.success) {
      return reply.status(400).send({ ok: false, error: 'VALIDATION_ERROR', message: 'Body is not a Telegram update' });
    }

    const update = parsed.data;
    opts.onUpdate(update).catch(err => {
      opts.logger.error({ updateId: update.update_id, error: errorMessage(err) }, 'Webhook update handler failed');
    });

    return reply.send({ ok: true });
  });
}
