/**
 * CHART — Types
 */

import type { ComponentSet, IndexReading } from '../fear-greed/index.js';

export interface RenderedChart {
  png: Buffer;
  width: number;
  height: number;
}

export interface ChartRenderer {
  renderTrend(series: readonly IndexReading[], windowDays: number): Promise<RenderedChart>;
  renderComponents(set: ComponentSet, windowDays: number): Promise<RenderedChart>;
}

/** SVG document plus its pixel size, before rasterisation */
export interface SvgDocument {
  svg: string;
  width: number;
  height: number;
}

export interface PlotArea {
  x: number;
  y: number;
  width: number;
  height: number;
}

export interface TimeTick {
  timestamp: number;
  label: string;
}

export type Rasterizer = (svg: string) => Promise<Buffer>;
