import type { NewsDocument, PriceRecord, RawArticle, SentimentScore } from '../src/types.js';
import { addDays } from '../src/utils/date.js';

export const NOW = new Date('2025-03-10T12:00:00.000Z');
export const TODAY = '2025-03-10';

export function priceRow(ticker: string, date: string, close: number): PriceRecord {
  return { ticker, date, open: close, high: close, low: close, close, adjClose: null, volume: 1000 };
}

/** `count` consecutive daily rows ending on `end`, ascending; `closeAt(i)` gives the i-th close. */
export function series(
  ticker: string,
  end: string,
  count: number,
  closeAt: (i: number) => number = (i) => 100 + i,
): PriceRecord[] {
  return Array.from({ length: count }, (_, i) => priceRow(ticker, addDays(end, i - (count - 1)), closeAt(i)));
}

export function hoursAgo(hours: number): string {
  return new Date(NOW.getTime() - hours * 60 * 60 * 1000).toISOString();
}

export function sentiment(score: number, label: SentimentScore['label'], method = 'stored'): SentimentScore {
  return { score, label, method, scoredAt: '2025-03-01T00:00:00.000Z' };
}

export function article(providerId: string, hours: number, title: string, ticker = 'AAPL'): RawArticle {
  return {
    providerId,
    publishedAt: hoursAgo(hours),
    source: 'Example Wire',
    url: `https://news.example.com/${providerId}`,
    title,
    summary: '',
    tickers: ticker ? [ticker] : [],
  };
}

export function newsDoc(
  providerId: string,
  hours: number,
  opts: { title?: string; ticker?: string; sentiment?: SentimentScore } = {},
): NewsDocument {
  return {
    ...article(providerId, hours, opts.title ?? 'Apple shares climb', opts.ticker ?? 'AAPL'),
    sentiment: opts.sentiment ?? sentiment(0.2, 'positive'),
    ingestedAt: '2025-03-01T00:00:00.000Z',
  };
}
