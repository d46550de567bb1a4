/**
 * HTTP surface tests (Fastify inject, no socket)
 */

import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import pino from 'pino';
import { buildApp } from '../app.js';
import { SECRET_HEADER, TELEGRAM_WEBHOOK_PATH, type TelegramUpdate } from '../modules/telegram/index.js';

const silent = pino({ level: 'silent' });

const mockLogger = {
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
  debug: vi.fn(),
};

const update: TelegramUpdate = {
  update_id: 501,
  message: { message_id: 3, date: 1_700_000_000, chat: { id: 777, type: 'private' }, text: '/feargreed' },
};

describe('buildApp', () => {
  let app: FastifyInstance;

  afterEach(async () => {
    await app.close();
  });

  it('answers /health with mode and extra fields', async () => {
    app = await buildApp({
      logger: silent,
      mode: 'polling',
      nodeEnv: 'test',
      health: () => ({ scheduler: { enabled: true } }),
    });

    const res = await app.inject({ method: 'GET', url: '/health' });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toMatchObject({ ok: true, mode: 'polling', scheduler: { enabled: true } });
  });

  it('answers unknown routes with a JSON 404', async () => {
    app = await buildApp({ logger: silent, mode: 'polling', nodeEnv: 'test' });

    const res = await app.inject({ method: 'GET', url: '/nope' });

    expect(res.statusCode).toBe(404);
    expect(res.json()).toEqual({ ok: false, error: 'NOT_FOUND', message: 'Route not found' });
  });

  it('hides unknown error messages in production', async () => {
    app = await buildApp({ logger: silent, mode: 'polling', nodeEnv: 'production' });
    app.get('/boom', async () => {
      throw new Error('database connection lost');
    });

    const res = await app.inject({ method: 'GET', url: '/boom' });

    expect(res.statusCode).toBe(500);
    expect(res.json()).toEqual({ ok: false, error: 'INTERNAL_ERROR', message: 'Internal server error' });
  });

  it('does not expose the webhook route in polling mode', async () => {
    app = await buildApp({ logger: silent, mode: 'polling', nodeEnv: 'test' });

    const res = await app.inject({ method: 'POST', url: TELEGRAM_WEBHOOK_PATH, payload: update });

    expect(res.statusCode).toBe(404);
  });
});

describe('POST /telegram/webhook', () => {
  let app: FastifyInstance;
  const onUpdate = vi.fn(async (_update: TelegramUpdate) => undefined);

  beforeEach(async () => {
    vi.clearAllMocks();
    app = await buildApp({
      logger: silent,
      mode: 'webhook',
      nodeEnv: 'test',
      webhook: { secret: 'test-secret', onUpdate, logger: mockLogger },
    });
  });

  afterEach(async () => {
    await app.close();
  });

  it('rejects a request without the secret header', async () => {
    const res = await app.inject({ method: 'POST', url: TELEGRAM_WEBHOOK_PATH, payload: update });

    expect(res.statusCode).toBe(401);
    expect(res.json()).toEqual({ ok: false, error: 'UNAUTHORIZED', message: 'Invalid secret token' });
    expect(onUpdate).not.toHaveBeenCalled();
  });

  it('rejects a wrong secret', async () => {
    const res = await app.inject({
      method: 'POST',
      url: TELEGRAM_WEBHOOK_PATH,
      headers: { [SECRET_HEADER]: 'wrong-secret' },
      payload: update,
    });

    expect(res.statusCode).toBe(401);
    expect(onUpdate).not.toHaveBeenCalled();
  });

  it('rejects a body that is not an update', async () => {
    const res = await app.inject({
      method: 'POST',
      url: TELEGRAM_WEBHOOK_PATH,
      headers: { [SECRET_HEADER]: 'test-secret' },
      payload: { hello: 'world' },
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ ok: false, error: 'VALIDATION_ERROR' });
    expect(onUpdate).not.toHaveBeenCalled();
  });

  it('answers a body that is not JSON with a 400 envelope', async () => {
    const res = await app.inject({
      method: 'POST',
      url: TELEGRAM_WEBHOOK_PATH,
      headers: { [SECRET_HEADER]: 'test-secret', 'content-type': 'application/json' },
      payload: '{"update_id":',
    });

    expect(res.statusCode).toBe(400);
    expect(res.json()).toMatchObject({ ok: false, error: 'BAD_REQUEST' });
    expect(onUpdate).not.toHaveBeenCalled();
  });

  it('acknowledges a valid update and hands it to the handler', async () => {
    const res = await app.inject({
      method: 'POST',
      url: TELEGRAM_WEBHOOK_PATH,
      headers: { [SECRET_HEADER]: 'test-secret' },
      payload: update,
    });

    expect(res.statusCode).toBe(200);
    expect(res.json()).toEqual({ ok: true });
    expect(onUpdate).toHaveBeenCalledWith(update);
  });

  it('logs a failing handler without failing the request', async () => {
    onUpdate.mockRejectedValueOnce(new Error('pipeline blew up'));

    const res = await app.inject({
      method: 'POST',
      url: TELEGRAM_WEBHOOK_PATH,
      headers: { [SECRET_HEADER]: 'test-secret' },
      payload: update,
    });

    expect(res.statusCode).toBe(200);
    await vi.waitFor(() => {
      expect(mockLogger.error).toHaveBeenCalledWith(
        { updateId: 501, error: 'pipeline blew up' },
        'Webhook update handler failed'
      );
    });
  });
});
