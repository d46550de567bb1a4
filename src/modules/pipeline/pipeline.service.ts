/**
 * PIPELINE — Fetch → Render → Dispatch
 *
 * Shared by the command handler and the scheduler. A run never rejects:
 * pipeline errors turn into exactly one text in the chat and zero photos
 * (the score alone when only the chart failed), delivery failures are only
 * logged.
 */

import { v4 as uuid } from 'uuid';
import { AppError, DeliveryFailedError, RenderError, errorMessage } from '../../common/errors.js';
import type { FearGreedIndex, IndexReading } from '../fear-greed/index.js';
import type { ChatId } from '../telegram/index.js';
import {
  buildComponentsCaption,
  buildErrorNotice,
  buildIndexCaption,
  buildScoreOnlyMessage,
} from './pipeline.messages.js';
import type {
  PipelineContext,
  PipelineName,
  PipelinePayload,
  PipelineResult,
  PipelineTrigger,
} from './pipeline.types.js';

/**
 * Index history with the current reading appended when upstream has not
 * folded it into the series yet.
 */
export function trendSeries(history: readonly IndexReading[], current: IndexReading): IndexReading[] {
  const last = history[history.length - 1];
  if (last && last.timestamp >= current.timestamp) return [...history];
  return [...history, current];
}

export function runFearGreedPipeline(
  ctx: PipelineContext,
  chatId: ChatId,
  trigger: PipelineTrigger
): Promise<PipelineResult> {
  const windowDays = ctx.config.chart.windowDays;
  let fetched: FearGreedIndex | undefined;

  return runPipeline(
    ctx,
    'feargreed',
    chatId,
    trigger,
    async () => {
      const index = await ctx.fetcher.fetchIndex();
      fetched = index;
      const chart = await ctx.renderer.renderTrend(trendSeries(index.history, index.current), windowDays);
      return {
        image: chart.png,
        caption: buildIndexCaption(index, trigger, windowDays),
      };
    },
    err => (fetched && err instanceof RenderError ? buildScoreOnlyMessage(fetched, trigger) : undefined)
  );
}

export function runComponentsPipeline(
  ctx: PipelineContext,
  chatId: ChatId,
  trigger: PipelineTrigger
): Promise<PipelineResult> {
  const windowDays = ctx.config.chart.windowDays;

  return runPipeline(ctx, 'components', chatId, trigger, async () => {
    const set = await ctx.fetcher.fetchComponents();
    const chart = await ctx.renderer.renderComponents(set, windowDays);
    return {
      image: chart.png,
      caption: buildComponentsCaption(set, trigger, windowDays),
    };
  });
}

// ═══════════════════════════════════════════════════════════════
// RUNNER
// ═══════════════════════════════════════════════════════════════

function toErrorInfo(err: unknown): { code: string; message: string } {
  return {
    code: err instanceof AppError ? err.code : 'INTERNAL_ERROR',
    message: errorMessage(err),
  };
}

async function runPipeline(
  ctx: PipelineContext,
  pipeline: PipelineName,
  chatId: ChatId,
  trigger: PipelineTrigger,
  produce: () => Promise<PipelinePayload>,
  fallbackText?: (err: unknown) => string | undefined
): Promise<PipelineResult> {
  const { dispatcher, logger } = ctx;
  const runId = uuid();
  const startTime = Date.now();
  const base = { runId, pipeline, trigger, chatId };

  logger.info(base, 'Pipeline started');

  if (trigger === 'COMMAND') {
    await dispatcher.sendChatAction(chatId, 'upload_photo').catch(err => {
      logger.warn({ ...base, error: errorMessage(err) }, 'Chat action failed');
      return false;
    });
  }

  let payload: PipelinePayload;
  try {
    payload = await produce();
  } catch (err) {
    const error = toErrorInfo(err);
    logger.error({ ...base, error: error.message, code: error.code }, 'Pipeline failed');

    const fallback = fallbackText?.(err);
    let delivered = false;
    try {
      await dispatcher.sendText(chatId, fallback ?? buildErrorNotice(pipeline, trigger, err));
      delivered = true;
      if (fallback) logger.info(base, 'Sent score without chart');
    } catch (sendErr) {
      logger.error({ ...base, error: errorMessage(sendErr) }, 'Error notice could not be delivered');
    }

    return { ...base, ok: false, delivered, durationMs: Date.now() - startTime, error };
  }

  try {
    const sent = await dispatcher.sendPhoto(chatId, payload.image, payload.caption);
    const durationMs = Date.now() - startTime;
    logger.info({ ...base, messageId: sent.messageId, durationMs }, 'Pipeline finished');
    return { ...base, ok: true, delivered: true, durationMs };
  } catch (err) {
    const error = toErrorInfo(err);
    const reason = err instanceof DeliveryFailedError ? err.reason : undefined;
    logger.error({ ...base, error: error.message, reason }, 'Chart delivery failed');
    return { ...base, ok: false, delivered: false, durationMs: Date.now() - startTime, error };
  }
}
