import { describe, expect, it } from 'vitest';
import {
  LexiconSentimentScorer,
  SENTIMENT_METHOD,
  labelFor,
  scoreLexicon,
} from '../src/services/sentiment.js';

describe('scoreLexicon', () => {
  it('averages matched term weights onto -1..1', () => {
    expect(scoreLexicon('Bull market rally continues')).toEqual({ score: 1, matchedTerms: ['bull market', 'rally'] });
    expect(scoreLexicon('Fraud lawsuit filed').score).toBe(-1);
    expect(scoreLexicon('Growth slowdown').score).toBe(0);
    expect(scoreLexicon('Quarterly report published').score).toBe(0);
  });
});

describe('labelFor', () => {
  it('uses a neutral band around zero', () => {
    expect(labelFor(0.1)).toBe('neutral');
    expect(labelFor(0.11)).toBe('positive');
    expect(labelFor(-0.1)).toBe('neutral');
    expect(labelFor(-0.2)).toBe('negative');
  });
});

describe('LexiconSentimentScorer', () => {
  const scorer = new LexiconSentimentScorer(() => new Date('2025-03-10T12:00:00.000Z'));

  it('labels clearly bullish and bearish text', () => {
    const bullish = scorer.score('Great quarter as bullish rally lifts shares');
    const bearish = scorer.score('Terrible fraud lawsuit sparks crash fears');

    expect(bullish.label).toBe('positive');
    expect(bearish.label).toBe('negative');
    expect(bullish.method).toBe(SENTIMENT_METHOD);
    expect(bullish.scoredAt).toBe('2025-03-10T12:00:00.000Z');
  });

  it('keeps scores within -1..1', () => {
    const { score } = scorer.score('great great great excellent amazing bullish surge');
    expect(score).toBeLessThanOrEqual(1);
    expect(score).toBeGreaterThan(0.1);
  });
});
