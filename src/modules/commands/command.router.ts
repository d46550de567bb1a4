/**
 * COMMANDS — Router
 *
 * Maps inbound Telegram updates to pipeline runs. Replies always go to the
 * chat the command came from.
 */

import { errorMessage } from '../../common/errors.js';
import {
  USAGE_MESSAGE,
  runComponentsPipeline,
  runFearGreedPipeline,
  type Pipeline,
  type PipelineContext,
  type PipelineResult,
} from '../pipeline/index.js';
import type { BotCommand, ChatId, TelegramUpdate } from '../telegram/index.js';
import { isAddressedTo, parseCommand } from './command.parser.js';

export const BOT_COMMANDS: readonly BotCommand[] = [
  { command: 'feargreed', description: 'Current Fear & Greed Index with trend chart' },
  { command: 'components', description: 'Charts of the seven component indicators' },
  { command: 'help', description: 'Show usage' },
];

export type CommandOutcome =
  | { handled: false; reason: 'NO_TEXT' | 'NOT_A_COMMAND' | 'OTHER_BOT' | 'UNKNOWN_COMMAND' }
  | { handled: true; command: string; chatId: ChatId; result?: PipelineResult };

export interface CommandRouterOptions {
  ctx: PipelineContext;
  botUsername?: string;
  pipelines?: {
    feargreed?: Pipeline;
    components?: Pipeline;
  };
}

export class CommandRouter {
  private readonly ctx: PipelineContext;
  private readonly botUsername?: string;
  private readonly pipelines: Record<'feargreed' | 'components', Pipeline>;

  constructor(opts: CommandRouterOptions) {
    this.ctx = opts.ctx;
    this.botUsername = opts.botUsername;
    this.pipelines = {
      feargreed: opts.pipelines?.feargreed ?? runFearGreedPipeline,
      components: opts.pipelines?.components ?? runComponentsPipeline,
    };
  }

  async handleUpdate(update: TelegramUpdate): Promise<CommandOutcome> {
    const message = update.message ?? update.channel_post;
    if (!message?.text) {
      return { handled: false, reason: 'NO_TEXT' };
    }

    const command = parseCommand(message.text);
    if (!command) {
      return { handled: false, reason: 'NOT_A_COMMAND' };
    }
    if (!isAddressedTo(command, this.botUsername)) {
      return { handled: false, reason: 'OTHER_BOT' };
    }

    const chatId = message.chat.id;

    switch (command.name) {
      case 'start':
      case 'help':
        await this.reply(chatId, USAGE_MESSAGE);
        return { handled: true, command: command.name, chatId };

      case 'feargreed':
      case 'components': {
        const pipeline = this.pipelines[command.name];
        this.ctx.logger.info({ command: command.name, chatId, updateId: update.update_id }, 'Command received');
        const result = await pipeline(this.ctx, chatId, 'COMMAND');
        return { handled: true, command: command.name, chatId, result };
      }

      default:
        this.ctx.logger.debug({ command: command.name, chatId }, 'Ignoring unknown command');
        return { handled: false, reason: 'UNKNOWN_COMMAND' };
    }
  }

  private async reply(chatId: ChatId, text: string): Promise<void> {
    try {
      await this.ctx.dispatcher.sendText(chatId, text);
    } catch (err) {
      this.ctx.logger.error({ chatId, error: errorMessage(err) }, 'Reply could not be delivered');
    }
  }
}
