/**
 * CHART RENDERER
 * ==============
 *
 * Turns index / component series into PNG charts:
 * 1. validate the input (2+ finite points per series)
 * 2. cut the trailing window, anchored at the newest point
 * 3. compose SVG
 * 4. rasterise with sharp
 *
 * Any failure surfaces as RenderError and only aborts the current pipeline run.
 */

import sharp from 'sharp';
import { RenderError, errorMessage } from '../../common/errors.js';
import type { Logger } from '../../common/logger.js';
import type { ComponentSet, IndexReading } from '../fear-greed/index.js';
import { trailingWindow } from './chart.scale.js';
import { buildComponentsSvg, buildTrendSvg } from './chart.svg.js';
import type { ChartRenderer, Rasterizer, RenderedChart, SvgDocument } from './chart.types.js';

export const rasterizeSvg: Rasterizer = svg => sharp(Buffer.from(svg, 'utf8')).png().toBuffer();

export interface SvgChartRendererOptions {
  logger?: Logger;
  rasterize?: Rasterizer;
}

function assertSeries(points: ReadonlyArray<{ timestamp: number }>, values: readonly number[], name: string): void {
  if (points.length < 2) {
    throw new RenderError(`${name}: at least 2 points are required, got ${points.length}`);
  }
  const badIndex = points.findIndex((p, i) => !Number.isFinite(p.timestamp) || !Number.isFinite(values[i]));
  if (badIndex !== -1) {
    throw new RenderError(`${name}: point ${badIndex} has a non-finite timestamp or value`);
  }
}

function assertWindow(windowDays: number): void {
  if (!Number.isFinite(windowDays) || windowDays <= 0) {
    throw new RenderError(`windowDays must be a positive number, got ${windowDays}`);
  }
}

export class SvgChartRenderer implements ChartRenderer {
  private readonly rasterize: Rasterizer;
  private readonly logger?: Logger;

  constructor(options: SvgChartRendererOptions = {}) {
    this.rasterize = options.rasterize ?? rasterizeSvg;
    this.logger = options.logger;
  }

  async renderTrend(series: readonly IndexReading[], windowDays: number): Promise<RenderedChart> {
    assertWindow(windowDays);
    assertSeries(series, series.map(r => r.score), 'Fear & Greed history');

    const windowed = trailingWindow(series, windowDays);
    return this.toPng(buildTrendSvg(windowed, windowDays), 'trend');
  }

  async renderComponents(set: ComponentSet, windowDays: number): Promise<RenderedChart> {
    assertWindow(windowDays);
    if (set.series.length === 0) {
      throw new RenderError('Component set is empty');
    }
    for (const s of set.series) {
      assertSeries(s.points, s.points.map(p => p.value), s.title);
    }

    const windowed: ComponentSet = {
      missing: set.missing,
      series: set.series.map(s => ({ ...s, points: trailingWindow(s.points, windowDays) })),
    };
    return this.toPng(buildComponentsSvg(windowed, windowDays), 'components');
  }

  private async toPng(doc: SvgDocument, kind: string): Promise<RenderedChart> {
    let png: Buffer;
    try {
      png = await this.rasterize(doc.svg);
    } catch (err) {
      throw new RenderError(`Failed to rasterise ${kind} chart: ${errorMessage(err)}`, { cause: err });
    }

    this.logger?.debug({ kind, bytes: png.length, width: doc.width, height: doc.height }, 'Chart rendered');
    return { png, width: doc.width, height: doc.height };
  }
}
