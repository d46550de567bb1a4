/**
 * FEAR & GREED — Upstream payload parsing
 *
 * Validates the graphdata JSON and turns it into IndexReading / ComponentSeries
 * values. Structural problems raise MalformedResponseError; individual history
 * points that do not look like {x, y} are skipped.
 */

import { z } from 'zod';
import { MalformedResponseError } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import { COMPONENTS } from './fear-greed.components.js';
import { formatRating, isValidScore, makeReading } from './fear-greed.labels.js';
import type {
  ComponentKey,
  ComponentSeries,
  ComponentSet,
  FearGreedIndex,
  IndexReading,
  PreviousReadings,
  SeriesPoint,
} from './fear-greed.types.js';

// ═══════════════════════════════════════════════════════════════
// SCHEMAS
// ═══════════════════════════════════════════════════════════════

const PointSchema = z.object({
  x: z.number().finite(),
  y: z.number().finite(),
  rating: z.string().nullish(),
});

const HistorySchema = z.object({
  score: z.number().finite().nullish(),
  rating: z.string().nullish(),
  data: z.array(z.unknown()),
});

const CurrentSchema = z.object({
  score: z.number({ required_error: 'score is required', invalid_type_error: 'score must be a number' }).finite(),
  rating: z.string().nullish(),
  timestamp: z.union([z.string(), z.number()]).nullish(),
  previous_close: z.number().nullish(),
  previous_1_week: z.number().nullish(),
  previous_1_month: z.number().nullish(),
  previous_1_year: z.number().nullish(),
});

const GraphDataSchema = z.object({
  fear_and_greed: CurrentSchema,
  fear_and_greed_historical: z.unknown().optional(),
});

export type GraphDataPayload = z.infer<typeof GraphDataSchema>;

function describeIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length ? issue.path.join('.') : 'body'}: ${issue.message}`)
    .join('; ');
}

// ═══════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════

function toTimestamp(value: string | number | null | undefined): number | null {
  if (value === null || value === undefined) return null;
  const ts = typeof value === 'number' ? value : Date.parse(value);
  return Number.isFinite(ts) ? ts : null;
}

function parsePoints(
  raw: unknown[],
  source: string,
  logger: Logger,
  accept: (value: number) => boolean = Number.isFinite
): SeriesPoint[] {
  const points: SeriesPoint[] = [];
  let skipped = 0;

  for (const item of raw) {
    const parsed = PointSchema.safeParse(item);
    if (!parsed.success || !accept(parsed.data.y)) {
      skipped++;
      continue;
    }
    points.push({ timestamp: parsed.data.x, value: parsed.data.y });
  }

  if (skipped > 0) {
    logger.warn({ source, skipped, kept: points.length }, 'Skipped history points with unexpected shape');
  }

  return points.sort((a, b) => a.timestamp - b.timestamp);
}

function optionalNumber(value: number | null | undefined): number | undefined {
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

// ═══════════════════════════════════════════════════════════════
// INDEX
// ═══════════════════════════════════════════════════════════════

/**
 * A missing or unusable history block yields an empty history; the current
 * score is still worth delivering without a chart.
 */
function parseIndexHistory(raw: unknown, logger: Logger): IndexReading[] {
  const parsed = HistorySchema.safeParse(raw);
  if (!parsed.success) {
    logger.warn(
      { source: 'fear_and_greed_historical', issues: describeIssues(parsed.error) },
      'Index history missing or malformed'
    );
    return [];
  }
  return parsePoints(parsed.data.data, 'fear_and_greed_historical', logger, isValidScore).map(p =>
    makeReading(p.timestamp, p.value)
  );
}

export function parseIndexPayload(body: unknown, logger: Logger, now: () => number = Date.now): FearGreedIndex {
  if (!body || typeof body !== 'object' || Array.isArray(body)) {
    throw new MalformedResponseError('Fear & Greed payload is not a JSON object');
  }

  const parsed = GraphDataSchema.safeParse(body);
  if (!parsed.success) {
    throw new MalformedResponseError(`Unexpected Fear & Greed payload: ${describeIssues(parsed.error)}`);
  }

  const { fear_and_greed: current, fear_and_greed_historical: historical } = parsed.data;

  if (!isValidScore(current.score)) {
    throw new MalformedResponseError(`Fear & Greed score out of range [0, 100]: ${current.score}`);
  }

  const history = parseIndexHistory(historical, logger);

  const lastHistoryTs = history.length > 0 ? history[history.length - 1].timestamp : null;
  const timestamp = toTimestamp(current.timestamp) ?? lastHistoryTs ?? now();

  const previous: PreviousReadings = {
    close: optionalNumber(current.previous_close),
    week: optionalNumber(current.previous_1_week),
    month: optionalNumber(current.previous_1_month),
    year: optionalNumber(current.previous_1_year),
  };

  const reading = makeReading(timestamp, current.score);

  return {
    current: reading,
    upstreamRating: current.rating ? formatRating(current.rating) : reading.label,
    previous,
    history,
  };
}

// ═══════════════════════════════════════════════════════════════
// COMPONENTS
// ═══════════════════════════════════════════════════════════════

export function parseComponentsPayload(body: unknown, logger: Logger): ComponentSet {
  if (!body || typeof body !== 'object' || Array.isArray(body)) {
    throw new MalformedResponseError('Fear & Greed payload is not a JSON object');
  }

  const fields = new Map<string, unknown>(Object.entries(body));
  const series: ComponentSeries[] = [];
  const missing: ComponentKey[] = [];

  for (const info of COMPONENTS) {
    const parsed = HistorySchema.safeParse(fields.get(info.key));
    if (!parsed.success) {
      logger.warn({ component: info.key, issues: describeIssues(parsed.error) }, 'Component missing or malformed');
      missing.push(info.key);
      continue;
    }

    const points = parsePoints(parsed.data.data, info.key, logger);
    if (points.length === 0) {
      logger.warn({ component: info.key }, 'Component has no usable history');
      missing.push(info.key);
      continue;
    }

    series.push({
      key: info.key,
      title: info.title,
      points,
      score: optionalNumber(parsed.data.score),
      rating: parsed.data.rating ? formatRating(parsed.data.rating) : 'Unknown',
    });
  }

  if (series.length === 0) {
    throw new MalformedResponseError('Fear & Greed payload contains none of the component series');
  }

  return { series, missing };
}
