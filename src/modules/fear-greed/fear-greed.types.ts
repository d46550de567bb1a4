/**
 * FEAR & GREED — Types
 */

// ═══════════════════════════════════════════════════════════════
// SENTIMENT
// ═══════════════════════════════════════════════════════════════

export const SENTIMENT_LABELS = ['Extreme Fear', 'Fear', 'Neutral', 'Greed', 'Extreme Greed'] as const;

export type SentimentLabel = (typeof SENTIMENT_LABELS)[number];

export interface SentimentBand {
  label: SentimentLabel;
  /** inclusive */
  min: number;
  /** exclusive, except for the last band which closes at 100 */
  max: number;
  color: string;
}

export interface IndexReading {
  readonly timestamp: number; // ms epoch
  readonly score: number;
  readonly label: SentimentLabel;
}

export interface PreviousReadings {
  close?: number;
  week?: number;
  month?: number;
  year?: number;
}

export interface FearGreedIndex {
  current: IndexReading;
  /** Upstream's own rating, title-cased ("extreme fear" -> "Extreme Fear") */
  upstreamRating: string;
  previous: PreviousReadings;
  /** Ascending by timestamp */
  history: IndexReading[];
}

// ═══════════════════════════════════════════════════════════════
// COMPONENTS
// ═══════════════════════════════════════════════════════════════

export type ComponentKey =
  | 'market_momentum_sp500'
  | 'stock_price_strength'
  | 'stock_price_breadth'
  | 'put_call_options'
  | 'market_volatility_vix'
  | 'junk_bond_demand'
  | 'safe_haven_demand';

export interface ComponentInfo {
  key: ComponentKey;
  title: string;
  color: string;
}

export interface SeriesPoint {
  readonly timestamp: number;
  readonly value: number;
}

export interface ComponentSeries {
  key: ComponentKey;
  title: string;
  /** Ascending by timestamp */
  points: SeriesPoint[];
  score?: number;
  rating: string;
}

export interface ComponentSet {
  series: ComponentSeries[];
  missing: ComponentKey[];
}

// ═══════════════════════════════════════════════════════════════
// FETCHER CONTRACT
// ═══════════════════════════════════════════════════════════════

export interface FearGreedFetcher {
  fetchIndex(): Promise<FearGreedIndex>;
  fetchComponents(): Promise<ComponentSet>;
}
