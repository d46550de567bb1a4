/**
 * PIPELINE — Message texts
 *
 * Plain text only (no parse_mode), so nothing here needs escaping.
 */

import { AppError, MalformedResponseError, RenderError, UpstreamUnavailableError } from '../../common/errors.js';
import { COMPONENTS, classifyScore, isValidScore, type ComponentSet, type FearGreedIndex } from '../fear-greed/index.js';
import { windowLabel } from '../chart/index.js';
import type { PipelineName, PipelineTrigger } from './pipeline.types.js';

export const USAGE_MESSAGE = [
  'Hi! I post the CNN Fear & Greed Index.',
  '',
  '/feargreed - current index with its trend chart',
  '/components - charts of the seven component indicators',
  '/help - show this message',
].join('\n');

function heading(title: string, trigger: PipelineTrigger): string {
  return trigger === 'SCHEDULE' ? `${title} · Daily update` : title;
}

function previousLine(name: string, value: number | undefined): string | null {
  if (value === undefined || !isValidScore(value)) return null;
  return `${name}: ${value.toFixed(1)} (${classifyScore(value)})`;
}

function indexLines(index: FearGreedIndex, trigger: PipelineTrigger): string[] {
  const { current, previous, upstreamRating } = index;

  const lines: string[] = [
    heading('📊 CNN Fear & Greed Index', trigger),
    '',
    `Score: ${current.score.toFixed(1)}`,
    `Sentiment: ${current.label}`,
  ];
  if (upstreamRating && upstreamRating !== current.label) {
    lines.push(`CNN rating: ${upstreamRating}`);
  }

  const history = [
    previousLine('Previous close', previous.close),
    previousLine('1 week ago', previous.week),
    previousLine('1 month ago', previous.month),
    previousLine('1 year ago', previous.year),
  ].filter((l): l is string => l !== null);

  if (history.length > 0) {
    lines.push('', ...history);
  }
  return lines;
}

export function buildIndexCaption(index: FearGreedIndex, trigger: PipelineTrigger, windowDays: number): string {
  return [...indexLines(index, trigger), '', `Chart: ${windowLabel(windowDays).toLowerCase()}`].join('\n');
}

/** Sent instead of the photo when the score is known but the trend chart cannot be drawn. */
export function buildScoreOnlyMessage(index: FearGreedIndex, trigger: PipelineTrigger): string {
  return [...indexLines(index, trigger), '', 'Chart unavailable: not enough history to draw the trend.'].join('\n');
}

export function buildComponentsCaption(set: ComponentSet, trigger: PipelineTrigger, windowDays: number): string {
  const lines: string[] = [heading('📈 Fear & Greed components', trigger), ''];

  for (const series of set.series) {
    lines.push(`• ${series.title}: ${series.rating}`);
  }

  if (set.missing.length > 0) {
    const titles = set.missing.map(key => COMPONENTS.find(c => c.key === key)?.title ?? key);
    lines.push('', `No data for: ${titles.join(', ')}`);
  }

  lines.push('', `Charts: ${windowLabel(windowDays).toLowerCase()}`);
  return lines.join('\n');
}

const SUBJECTS: Record<PipelineName, string> = {
  feargreed: 'Fear & Greed update',
  components: 'Fear & Greed components update',
};

export function buildErrorNotice(pipeline: PipelineName, trigger: PipelineTrigger, err: unknown): string {
  const subject = trigger === 'SCHEDULE' ? `Scheduled ${SUBJECTS[pipeline]}` : SUBJECTS[pipeline];

  let reason: string;
  if (err instanceof UpstreamUnavailableError) {
    reason = 'the Fear & Greed data source could not be reached. Please try again later.';
  } else if (err instanceof MalformedResponseError) {
    reason = 'the Fear & Greed data source returned data in an unexpected format.';
  } else if (err instanceof RenderError) {
    reason = 'the chart could not be drawn from the data received.';
  } else {
    reason = 'an internal error occurred.';
  }

  const code = err instanceof AppError ? ` [${err.code}]` : '';
  return `⚠️ ${subject} failed: ${reason}${code}`;
}
