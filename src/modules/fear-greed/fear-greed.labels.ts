/**
 * FEAR & GREED — Sentiment bands
 *
 * Bands are half-open [min, max): a score sitting on a boundary belongs to
 * the upper band. The last band is closed at 100.
 */

import type { IndexReading, SentimentBand, SentimentLabel } from './fear-greed.types.js';

export const SENTIMENT_BANDS: readonly SentimentBand[] = [
  { label: 'Extreme Fear', min: 0, max: 25, color: '#d62728' },
  { label: 'Fear', min: 25, max: 45, color: '#ff7f0e' },
  { label: 'Neutral', min: 45, max: 55, color: '#bcbd22' },
  { label: 'Greed', min: 55, max: 75, color: '#2ca02c' },
  { label: 'Extreme Greed', min: 75, max: 100, color: '#17becf' },
];

export function isValidScore(score: number): boolean {
  return Number.isFinite(score) && score >= 0 && score <= 100;
}

export function bandFor(score: number): SentimentBand {
  if (!isValidScore(score)) {
    throw new RangeError(`Score out of range [0, 100]: ${score}`);
  }
  for (const band of SENTIMENT_BANDS) {
    if (score < band.max) return band;
  }
  return SENTIMENT_BANDS[SENTIMENT_BANDS.length - 1];
}

export function classifyScore(score: number): SentimentLabel {
  return bandFor(score).label;
}

export function makeReading(timestamp: number, score: number): IndexReading {
  return Object.freeze({ timestamp, score, label: classifyScore(score) });
}

/**
 * "extreme greed" / "EXTREME_GREED" -> "Extreme Greed"
 */
export function formatRating(rating: string): string {
  return rating
    .replace(/_/g, ' ')
    .trim()
    .split(/\s+/)
    .filter(Boolean)
    .map(word => word.charAt(0).toUpperCase() + word.slice(1).toLowerCase())
    .join(' ');
}
