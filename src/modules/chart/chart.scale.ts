/**
 * CHART — Scales, ticks and windowing
 *
 * Everything here is pure and UTC based so that identical series always
 * produce identical SVG.
 */

import type { TimeTick } from './chart.types.js';

export const DAY_MS = 86_400_000;

export type LinearScale = (value: number) => number;

export function linearScale(domain: [number, number], range: [number, number]): LinearScale {
  const [d0, d1] = domain;
  const [r0, r1] = range;
  const span = d1 - d0 || 1;
  return value => r0 + ((value - d0) / span) * (r1 - r0);
}

/**
 * Keep the points that fall within `windowDays` of the newest point.
 * Falls back to the last two points when the window would leave fewer.
 */
export function trailingWindow<T extends { timestamp: number }>(points: readonly T[], windowDays: number): T[] {
  const sorted = [...points].sort((a, b) => a.timestamp - b.timestamp);
  if (sorted.length < 2) return sorted;

  const newest = sorted[sorted.length - 1].timestamp;
  const cutoff = newest - windowDays * DAY_MS;
  const inWindow = sorted.filter(p => p.timestamp >= cutoff);

  return inWindow.length >= 2 ? inWindow : sorted.slice(-2);
}

export function formatDate(ts: number): string {
  return new Date(ts).toISOString().slice(0, 10);
}

export function formatValue(value: number): string {
  const abs = Math.abs(value);
  if (abs >= 1000) return value.toFixed(0);
  if (abs >= 10) return value.toFixed(1);
  return value.toFixed(2);
}

/**
 * Date ticks for the X axis: month starts when the span covers at least two
 * of them, otherwise evenly spaced day boundaries.
 */
export function timeTicks(start: number, end: number, maxTicks = 12): TimeTick[] {
  const months: number[] = [];
  const cursor = new Date(start);
  let month = Date.UTC(cursor.getUTCFullYear(), cursor.getUTCMonth(), 1);
  if (month < start) {
    month = Date.UTC(cursor.getUTCFullYear(), cursor.getUTCMonth() + 1, 1);
  }
  while (month <= end) {
    months.push(month);
    const d = new Date(month);
    month = Date.UTC(d.getUTCFullYear(), d.getUTCMonth() + 1, 1);
  }

  if (months.length >= 2) {
    const step = Math.ceil(months.length / maxTicks);
    return months.filter((_, i) => i % step === 0).map(ts => ({ timestamp: ts, label: formatDate(ts) }));
  }

  const firstDay = Math.ceil(start / DAY_MS) * DAY_MS;
  const spanDays = Math.max(1, Math.floor((end - firstDay) / DAY_MS));
  const stepDays = Math.max(1, Math.ceil(spanDays / 6));
  const ticks: TimeTick[] = [];
  for (let ts = firstDay; ts <= end; ts += stepDays * DAY_MS) {
    ticks.push({ timestamp: ts, label: formatDate(ts) });
  }
  return ticks;
}

function plural(n: number, unit: string): string {
  return `${n} ${unit}${n === 1 ? '' : 's'}`;
}

export function windowLabel(windowDays: number): string {
  if (windowDays === 365) return 'Last 12 Months';
  if (windowDays % 365 === 0) return `Last ${plural(windowDays / 365, 'Year')}`;
  if (windowDays % 30 === 0) return `Last ${plural(windowDays / 30, 'Month')}`;
  return `Last ${plural(windowDays, 'Day')}`;
}

/** Min/max of the values, padded by 5% so the line never touches the frame */
export function paddedExtent(values: readonly number[]): [number, number] {
  let min = Math.min(...values);
  let max = Math.max(...values);
  if (min === max) {
    min -= 1;
    max += 1;
  }
  const pad = (max - min) * 0.05;
  return [min - pad, max + pad];
}

export function round(n: number): number {
  return Math.round(n * 100) / 100;
}
