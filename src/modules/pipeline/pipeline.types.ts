/**
 * PIPELINE — Types
 */

import type { Logger } from '../../common/logger.js';
import type { BotConfig } from '../../config/env.js';
import type { ChartRenderer } from '../chart/index.js';
import type { FearGreedFetcher } from '../fear-greed/index.js';
import type { ChatId, MessageDispatcher } from '../telegram/index.js';

export type PipelineName = 'feargreed' | 'components';

export type PipelineTrigger = 'COMMAND' | 'SCHEDULE';

/**
 * Everything a pipeline run needs, built once at startup and shared
 * read-only by the command handler and the scheduler.
 */
export interface PipelineContext {
  readonly config: BotConfig;
  readonly fetcher: FearGreedFetcher;
  readonly renderer: ChartRenderer;
  readonly dispatcher: MessageDispatcher;
  readonly logger: Logger;
}

export interface PipelineResult {
  ok: boolean;
  runId: string;
  pipeline: PipelineName;
  trigger: PipelineTrigger;
  chatId: ChatId;
  durationMs: number;
  /** True when the photo (or, on failure, the error notice or score-only text) reached the chat */
  delivered: boolean;
  error?: {
    code: string;
    message: string;
  };
}

export interface PipelinePayload {
  image: Buffer;
  caption: string;
}

export type Pipeline = (ctx: PipelineContext, chatId: ChatId, trigger: PipelineTrigger) => Promise<PipelineResult>;
