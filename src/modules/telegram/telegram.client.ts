/**
 * TELEGRAM CLIENT
 * ===============
 *
 * Bot API over axios. One HTTP call per method invocation, no retries:
 * a rejected send surfaces as DeliveryFailedError and the caller logs it.
 */

import axios, { type AxiosInstance, type AxiosResponse } from 'axios';
import { z } from 'zod';
import { DeliveryFailedError, TelegramApiError, errorMessage } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import {
  type BotCommand,
  type BotIdentity,
  type ChatAction,
  type ChatId,
  type GetUpdatesParams,
  type MessageDispatcher,
  type SentMessage,
  type TelegramUpdate,
  type UpdateSource,
  TelegramUpdateSchema,
} from './telegram.types.js';

export const TELEGRAM_API = 'https://api.telegram.org';

export const MAX_TEXT_LENGTH = 4096;
export const MAX_CAPTION_LENGTH = 1024;

const EnvelopeSchema = z.object({
  ok: z.boolean(),
  result: z.unknown().optional(),
  description: z.string().optional(),
  error_code: z.number().optional(),
});

const SentMessageSchema = z.object({
  message_id: z.number(),
  chat: z.object({ id: z.number() }),
});

const BotIdentitySchema = z.object({
  id: z.number(),
  username: z.string().optional(),
});

const UpdateIdSchema = z.object({ update_id: z.number().int() });

export interface TelegramClientConfig {
  token: string;
  timeoutMs: number;
  logger: Logger;
  baseUrl?: string;
  /** Pre-built axios instance (tests pass one with a stub adapter) */
  http?: AxiosInstance;
}

export function truncate(text: string, max: number): string {
  return text.length > max ? `${text.slice(0, max - 1)}…` : text;
}

export class TelegramClient implements MessageDispatcher, UpdateSource {
  private readonly http: AxiosInstance;
  private readonly config: TelegramClientConfig;

  constructor(config: TelegramClientConfig) {
    this.config = config;
    this.http = config.http ?? axios.create({ timeout: config.timeoutMs });
  }

  // ═══════════════════════════════════════════════════════════════
  // DISPATCH
  // ═══════════════════════════════════════════════════════════════

  async sendText(chatId: ChatId, text: string): Promise<SentMessage> {
    if (!text.trim()) {
      throw new DeliveryFailedError('EMPTY_PAYLOAD', 'Refusing to send an empty message');
    }

    return this.deliver('sendMessage', chatId, {
      chat_id: chatId,
      text: truncate(text, MAX_TEXT_LENGTH),
      disable_web_page_preview: true,
    });
  }

  async sendPhoto(chatId: ChatId, image: Buffer, caption: string): Promise<SentMessage> {
    if (image.length === 0) {
      throw new DeliveryFailedError('EMPTY_PAYLOAD', 'Refusing to send an empty image');
    }

    const form = new FormData();
    form.append('chat_id', String(chatId));
    if (caption.trim()) {
      form.append('caption', truncate(caption, MAX_CAPTION_LENGTH));
    }
    form.append('photo', new Blob([new Uint8Array(image)], { type: 'image/png' }), 'chart.png');

    return this.deliver('sendPhoto', chatId, form);
  }

  /**
   * Best effort "uploading photo…" indicator. Never throws.
   */
  async sendChatAction(chatId: ChatId, action: ChatAction): Promise<boolean> {
    try {
      await this.call('sendChatAction', { chat_id: chatId, action }, z.boolean());
      return true;
    } catch (err) {
      this.config.logger.warn({ chatId, action, error: errorMessage(err) }, 'sendChatAction failed');
      return false;
    }
  }

  // ═══════════════════════════════════════════════════════════════
  // BOT PLUMBING
  // ═══════════════════════════════════════════════════════════════

  async getMe(): Promise<BotIdentity> {
    return this.call('getMe', {}, BotIdentitySchema);
  }

  async getUpdates(params: GetUpdatesParams): Promise<TelegramUpdate[]> {
    const raw = await this.call(
      'getUpdates',
      { offset: params.offset, timeout: params.timeoutSec, allowed_updates: ['message'] },
      z.array(z.unknown()),
      { timeoutMs: (params.timeoutSec + 10) * 1000, signal: params.signal }
    );

    const updates: TelegramUpdate[] = [];
    for (const item of raw) {
      const parsed = TelegramUpdateSchema.safeParse(item);
      if (parsed.success) {
        updates.push(parsed.data);
        continue;
      }
      // Keep the id so the offset still advances past an update we cannot read
      const idOnly = UpdateIdSchema.safeParse(item);
      if (idOnly.success) {
        this.config.logger.warn({ updateId: idOnly.data.update_id }, 'Skipping update with unexpected shape');
        updates.push({ update_id: idOnly.data.update_id });
      }
    }
    return updates;
  }

  async setWebhook(url: string, secretToken: string): Promise<void> {
    await this.call('setWebhook', { url, secret_token: secretToken, allowed_updates: ['message'] }, z.boolean());
  }

  async deleteWebhook(): Promise<void> {
    await this.call('deleteWebhook', { drop_pending_updates: false }, z.boolean());
  }

  async setMyCommands(commands: readonly BotCommand[]): Promise<void> {
    await this.call('setMyCommands', { commands }, z.boolean());
  }

  // ═══════════════════════════════════════════════════════════════
  // TRANSPORT
  // ═══════════════════════════════════════════════════════════════

  private async deliver(method: string, chatId: ChatId, payload: object | FormData): Promise<SentMessage> {
    try {
      const result = await this.call(method, payload, SentMessageSchema);
      this.config.logger.info({ method, chatId, messageId: result.message_id }, 'Telegram message delivered');
      return { messageId: result.message_id, chatId };
    } catch (err) {
      throw new DeliveryFailedError('REJECTED', `${method} to chat ${chatId} failed: ${errorMessage(err)}`, { cause: err });
    }
  }

  private async call<T>(
    method: string,
    payload: object | FormData,
    schema: z.ZodType<T>,
    opts: { timeoutMs?: number; signal?: AbortSignal } = {}
  ): Promise<T> {
    const url = `${this.config.baseUrl ?? TELEGRAM_API}/bot${this.config.token}/${method}`;
    let res: AxiosResponse<unknown>;

    try {
      res = await this.http.post<unknown>(url, payload, {
        timeout: opts.timeoutMs ?? this.config.timeoutMs,
        signal: opts.signal,
        validateStatus: () => true,
      });
    } catch (err) {
      throw new TelegramApiError(method, errorMessage(err), undefined, { cause: err });
    }

    const envelope = EnvelopeSchema.safeParse(res.data);
    if (!envelope.success) {
      throw new TelegramApiError(method, `unexpected response (HTTP ${res.status})`, res.status);
    }
    if (!envelope.data.ok) {
      throw new TelegramApiError(
        method,
        envelope.data.description ?? `HTTP ${res.status}`,
        envelope.data.error_code ?? res.status
      );
    }

    const result = schema.safeParse(envelope.data.result);
    if (!result.success) {
      throw new TelegramApiError(method, 'unexpected result shape', res.status);
    }
    return result.data;
  }
}
