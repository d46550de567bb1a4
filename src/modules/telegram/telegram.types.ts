/**
 * TELEGRAM — Types
 *
 * Only the slice of the Bot API the bot needs. Inbound updates are validated
 * with zod both for webhook bodies and getUpdates results.
 */

import { z } from 'zod';

export type ChatId = string | number;

// ═══════════════════════════════════════════════════════════════
// INBOUND
// ═══════════════════════════════════════════════════════════════

export const TelegramUserSchema = z.object({
  id: z.number(),
  is_bot: z.boolean().optional(),
  first_name: z.string().optional(),
  username: z.string().optional(),
});

export const TelegramChatSchema = z.object({
  id: z.number(),
  type: z.string(),
  title: z.string().optional(),
  username: z.string().optional(),
});

export const TelegramMessageSchema = z.object({
  message_id: z.number(),
  date: z.number(),
  chat: TelegramChatSchema,
  from: TelegramUserSchema.optional(),
  text: z.string().optional(),
});

export const TelegramUpdateSchema = z.object({
  update_id: z.number().int(),
  message: TelegramMessageSchema.optional(),
  edited_message: TelegramMessageSchema.optional(),
  channel_post: TelegramMessageSchema.optional(),
});

export type TelegramUser = z.infer<typeof TelegramUserSchema>;
export type TelegramChat = z.infer<typeof TelegramChatSchema>;
export type TelegramMessage = z.infer<typeof TelegramMessageSchema>;
export type TelegramUpdate = z.infer<typeof TelegramUpdateSchema>;

// ═══════════════════════════════════════════════════════════════
// OUTBOUND
// ═══════════════════════════════════════════════════════════════

export type ChatAction = 'typing' | 'upload_photo';

export interface BotCommand {
  command: string;
  description: string;
}

export interface SentMessage {
  messageId: number;
  chatId: ChatId;
}

export interface BotIdentity {
  id: number;
  username?: string;
}

/**
 * Outbound side used by the pipelines and the command handler.
 */
export interface MessageDispatcher {
  sendText(chatId: ChatId, text: string): Promise<SentMessage>;
  sendPhoto(chatId: ChatId, image: Buffer, caption: string): Promise<SentMessage>;
  sendChatAction(chatId: ChatId, action: ChatAction): Promise<boolean>;
}

export interface GetUpdatesParams {
  offset?: number;
  timeoutSec: number;
  signal?: AbortSignal;
}

/**
 * Inbound side used by the long-poll loop.
 */
export interface UpdateSource {
  getUpdates(params: GetUpdatesParams): Promise<TelegramUpdate[]>;
}
