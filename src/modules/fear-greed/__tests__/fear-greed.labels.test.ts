/**
 * Sentiment band tests
 */

import { describe, it, expect } from 'vitest';
import { SENTIMENT_BANDS, bandFor, classifyScore, formatRating, makeReading } from '../fear-greed.labels.js';

describe('classifyScore', () => {
  it('maps scores below 25 to Extreme Fear', () => {
    expect(classifyScore(0)).toBe('Extreme Fear');
    expect(classifyScore(12.5)).toBe('Extreme Fear');
    expect(classifyScore(24.99)).toBe('Extreme Fear');
  });

  it('puts a boundary score in the upper band', () => {
    expect(classifyScore(25)).toBe('Fear');
    expect(classifyScore(45)).toBe('Neutral');
    expect(classifyScore(55)).toBe('Greed');
    expect(classifyScore(75)).toBe('Extreme Greed');
  });

  it('maps 100 to Extreme Greed', () => {
    expect(classifyScore(100)).toBe('Extreme Greed');
  });

  it('assigns every boundary to exactly one band', () => {
    for (const score of [0, 25, 45, 55, 75, 100]) {
      const matching = SENTIMENT_BANDS.filter(
        band => score >= band.min && (score < band.max || (band.max === 100 && score === 100))
      );
      expect(matching).toHaveLength(1);
      expect(matching[0]?.label).toBe(classifyScore(score));
    }
  });

  it('rejects scores outside [0, 100]', () => {
    expect(() => bandFor(-0.1)).toThrow(RangeError);
    expect(() => bandFor(100.1)).toThrow(RangeError);
    expect(() => bandFor(Number.NaN)).toThrow(RangeError);
  });
});

describe('makeReading', () => {
  it('derives the label and freezes the reading', () => {
    const reading = makeReading(1_700_000_000_000, 62);

    expect(reading).toEqual({ timestamp: 1_700_000_000_000, score: 62, label: 'Greed' });
    expect(Object.isFrozen(reading)).toBe(true);
  });
});

describe('formatRating', () => {
  it('title-cases upstream ratings', () => {
    expect(formatRating('extreme greed')).toBe('Extreme Greed');
    expect(formatRating('EXTREME_FEAR')).toBe('Extreme Fear');
    expect(formatRating('  neutral ')).toBe('Neutral');
  });
});
