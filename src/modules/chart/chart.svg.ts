/**
 * CHART — SVG composition
 *
 * Builds the trend chart (index + sentiment bands) and the component grid as
 * plain SVG strings. Coordinates are rounded to two decimals.
 */

import {
  COMPONENTS,
  SENTIMENT_BANDS,
  type ComponentSeries,
  type ComponentSet,
  type IndexReading,
} from '../fear-greed/index.js';
import {
  type LinearScale,
  formatValue,
  linearScale,
  paddedExtent,
  round,
  timeTicks,
  windowLabel,
} from './chart.scale.js';
import type { PlotArea, SvgDocument } from './chart.types.js';

const FONT = "DejaVu Sans, Arial, Helvetica, sans-serif";
const INDEX_LINE_COLOR = '#1f77b4';
const GRID_COLOR = '#d9d9d9';
const AXIS_COLOR = '#555555';
const BAND_THRESHOLDS = [25, 45, 55, 75];

const TREND_SIZE = { width: 1200, height: 600 };
const PANEL_SIZE = { width: 520, height: 280 };
const GRID_HEADER = 64;

export function escapeXml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&apos;');
}

// ═══════════════════════════════════════════════════════════════
// PRIMITIVES
// ═══════════════════════════════════════════════════════════════

interface TextOpts {
  size?: number;
  anchor?: 'start' | 'middle' | 'end';
  weight?: 'normal' | 'bold';
  fill?: string;
  rotate?: number;
}

function text(x: number, y: number, content: string, opts: TextOpts = {}): string {
  const { size = 12, anchor = 'start', weight = 'normal', fill = '#222222', rotate } = opts;
  const transform = rotate !== undefined ? ` transform="rotate(${rotate} ${round(x)} ${round(y)})"` : '';
  return (
    `<text x="${round(x)}" y="${round(y)}" font-family="${FONT}" font-size="${size}" ` +
    `font-weight="${weight}" text-anchor="${anchor}" fill="${fill}"${transform}>${escapeXml(content)}</text>`
  );
}

function line(x1: number, y1: number, x2: number, y2: number, stroke: string, width = 1, dash?: string): string {
  const dashAttr = dash ? ` stroke-dasharray="${dash}"` : '';
  return `<line x1="${round(x1)}" y1="${round(y1)}" x2="${round(x2)}" y2="${round(y2)}" stroke="${stroke}" stroke-width="${width}"${dashAttr}/>`;
}

function rect(x: number, y: number, width: number, height: number, fill: string, extra = ''): string {
  return `<rect x="${round(x)}" y="${round(y)}" width="${round(width)}" height="${round(height)}" fill="${fill}"${extra}/>`;
}

function polyline(points: Array<[number, number]>, stroke: string, width: number): string {
  const d = points.map(([x, y], i) => `${i === 0 ? 'M' : 'L'}${round(x)},${round(y)}`).join(' ');
  return `<path d="${d}" fill="none" stroke="${stroke}" stroke-width="${width}" stroke-linejoin="round" stroke-linecap="round"/>`;
}

function svgDocument(width: number, height: number, body: string[]): SvgDocument {
  const svg =
    `<svg xmlns="http://www.w3.org/2000/svg" width="${width}" height="${height}" viewBox="0 0 ${width} ${height}">` +
    rect(0, 0, width, height, '#ffffff') +
    body.join('') +
    '</svg>';
  return { svg, width, height };
}

function timeAxis(area: PlotArea, x: LinearScale, start: number, end: number, maxTicks: number, size: number): string[] {
  const parts: string[] = [];
  const bottom = area.y + area.height;

  for (const tick of timeTicks(start, end, maxTicks)) {
    const tx = x(tick.timestamp);
    parts.push(line(tx, area.y, tx, bottom, GRID_COLOR, 0.6));
    parts.push(line(tx, bottom, tx, bottom + 5, AXIS_COLOR));
    parts.push(text(tx, bottom + 8, tick.label, { size, anchor: 'end', rotate: -30, fill: AXIS_COLOR }));
  }
  return parts;
}

function frame(area: PlotArea): string {
  return rect(area.x, area.y, area.width, area.height, 'none', ` stroke="${AXIS_COLOR}" stroke-width="1"`);
}

// ═══════════════════════════════════════════════════════════════
// TREND CHART
// ═══════════════════════════════════════════════════════════════

/**
 * Index line over the window with the five sentiment bands shaded behind it
 * and the latest reading annotated. `points` must already be windowed.
 */
export function buildTrendSvg(points: readonly IndexReading[], windowDays: number): SvgDocument {
  const { width, height } = TREND_SIZE;
  const area: PlotArea = { x: 70, y: 60, width: width - 70 - 40, height: height - 60 - 90 };

  const start = points[0].timestamp;
  const end = points[points.length - 1].timestamp;
  const x = linearScale([start, end], [area.x, area.x + area.width]);
  const y = linearScale([0, 100], [area.y + area.height, area.y]);

  const body: string[] = [];

  body.push(
    text(width / 2, 36, `CNN Fear & Greed Index (${windowLabel(windowDays)})`, { size: 22, anchor: 'middle', weight: 'bold' })
  );

  for (const band of SENTIMENT_BANDS) {
    body.push(rect(area.x, y(band.max), area.width, y(band.min) - y(band.max), band.color, ' fill-opacity="0.3"'));
  }

  for (const value of [0, 20, 40, 60, 80, 100]) {
    body.push(line(area.x - 5, y(value), area.x, y(value), AXIS_COLOR));
    body.push(text(area.x - 9, y(value) + 4, String(value), { size: 12, anchor: 'end', fill: AXIS_COLOR }));
  }

  for (const threshold of BAND_THRESHOLDS) {
    body.push(line(area.x, y(threshold), area.x + area.width, y(threshold), '#808080', 0.8, '6 4'));
  }

  body.push(...timeAxis(area, x, start, end, 12, 12));

  body.push(polyline(points.map((p): [number, number] => [x(p.timestamp), y(p.score)]), INDEX_LINE_COLOR, 2));
  body.push(frame(area));

  // Latest value
  const last = points[points.length - 1];
  const lx = x(last.timestamp);
  const ly = y(last.score);
  body.push(`<circle cx="${round(lx)}" cy="${round(ly)}" r="5" fill="${INDEX_LINE_COLOR}" stroke="#ffffff" stroke-width="1.5"/>`);
  const labelY = last.score > 85 ? ly + 22 : ly - 12;
  body.push(text(lx - 8, labelY, `${last.score.toFixed(1)} (${last.label})`, { size: 14, anchor: 'end', weight: 'bold' }));

  // Axis titles
  body.push(text(area.x + area.width / 2, height - 12, 'Date', { size: 14, anchor: 'middle' }));
  body.push(text(20, area.y + area.height / 2, 'Index Value', { size: 14, anchor: 'middle', rotate: -90 }));

  body.push(...legend(area.x + 12, area.y + 12));

  return svgDocument(width, height, body);
}

function legend(x0: number, y0: number): string[] {
  const entries: Array<{ label: string; swatch: string }> = [
    { label: 'Fear & Greed Index', swatch: line(x0 + 10, y0 + 13, x0 + 32, y0 + 13, INDEX_LINE_COLOR, 2) },
    ...SENTIMENT_BANDS.map((band, i) => ({
      label: `${band.label} (${band.min}-${band.max})`,
      swatch: rect(x0 + 10, y0 + 7 + (i + 1) * 20, 22, 12, band.color, ' fill-opacity="0.5"'),
    })),
  ];

  const box = rect(x0, y0, 210, entries.length * 20 + 8, '#ffffff', ' fill-opacity="0.85" stroke="#bbbbbb" stroke-width="1"');
  const rows = entries.map((entry, i) => entry.swatch + text(x0 + 40, y0 + 18 + i * 20, entry.label, { size: 12 }));

  return [box, ...rows];
}

// ═══════════════════════════════════════════════════════════════
// COMPONENT GRID
// ═══════════════════════════════════════════════════════════════

export function gridShape(count: number): { cols: number; rows: number } {
  const cols = Math.max(1, Math.ceil(Math.sqrt(count)));
  return { cols, rows: Math.max(1, Math.ceil(count / cols)) };
}

/**
 * One panel per enumerated component, in enumeration order. Components the
 * set does not contain get a "No data" placeholder so the layout never shifts.
 * Series inside the set must already be windowed.
 */
export function buildComponentsSvg(set: ComponentSet, windowDays: number): SvgDocument {
  const { cols, rows } = gridShape(COMPONENTS.length);
  const width = cols * PANEL_SIZE.width;
  const height = GRID_HEADER + rows * PANEL_SIZE.height;
  const byKey = new Map(set.series.map(s => [s.key, s] as const));

  const body: string[] = [
    text(width / 2, 40, `CNN Fear & Greed Components (${windowLabel(windowDays)})`, { size: 24, anchor: 'middle', weight: 'bold' }),
  ];

  COMPONENTS.forEach((info, i) => {
    const panel: PlotArea = {
      x: (i % cols) * PANEL_SIZE.width,
      y: GRID_HEADER + Math.floor(i / cols) * PANEL_SIZE.height,
      width: PANEL_SIZE.width,
      height: PANEL_SIZE.height,
    };
    const series = byKey.get(info.key);
    body.push(...(series ? componentPanel(panel, series, info.color) : emptyPanel(panel, info.title)));
  });

  return svgDocument(width, height, body);
}

function componentPanel(panel: PlotArea, series: ComponentSeries, color: string): string[] {
  const area: PlotArea = {
    x: panel.x + 64,
    y: panel.y + 40,
    width: panel.width - 64 - 20,
    height: panel.height - 40 - 62,
  };
  const points = series.points;
  const start = points[0].timestamp;
  const end = points[points.length - 1].timestamp;
  const [lo, hi] = paddedExtent(points.map(p => p.value));
  const x = linearScale([start, end], [area.x, area.x + area.width]);
  const y = linearScale([lo, hi], [area.y + area.height, area.y]);

  const parts: string[] = [text(panel.x + panel.width / 2, panel.y + 24, series.title, { size: 15, anchor: 'middle', weight: 'bold' })];

  for (const value of [lo, (lo + hi) / 2, hi]) {
    parts.push(line(area.x, y(value), area.x + area.width, y(value), GRID_COLOR, 0.6));
    parts.push(text(area.x - 6, y(value) + 4, formatValue(value), { size: 10, anchor: 'end', fill: AXIS_COLOR }));
  }

  parts.push(...timeAxis(area, x, start, end, 6, 10));
  parts.push(polyline(points.map((p): [number, number] => [x(p.timestamp), y(p.value)]), color, 1.5));
  parts.push(frame(area));

  const last = points[points.length - 1];
  parts.push(`<circle cx="${round(x(last.timestamp))}" cy="${round(y(last.value))}" r="3.5" fill="${color}"/>`);
  parts.push(
    text(area.x + area.width - 4, area.y + 14, `${formatValue(last.value)} · ${series.rating}`, {
      size: 12,
      anchor: 'end',
      weight: 'bold',
      fill: color,
    })
  );

  return parts;
}

function emptyPanel(panel: PlotArea, title: string): string[] {
  const area: PlotArea = { x: panel.x + 64, y: panel.y + 40, width: panel.width - 84, height: panel.height - 102 };
  return [
    text(panel.x + panel.width / 2, panel.y + 24, title, { size: 15, anchor: 'middle', weight: 'bold' }),
    rect(area.x, area.y, area.width, area.height, '#f2f2f2', ` stroke="${GRID_COLOR}"`),
    text(area.x + area.width / 2, area.y + area.height / 2 + 5, 'No data', { size: 14, anchor: 'middle', fill: '#888888' }),
  ];
}
