/**
 * Shared types for Market Pulse
 */

export type Provenance = 'cached' | 'live' | 'cached-stale' | 'unavailable';

export type FetchDecision =
  | 'serve-cached'
  | 'fetch-live-and-store'
  | 'fetch-live-fallback-on-store-failure';

export type NewsFreshness = 'live' | 'cached-only';

export type SentimentLabel = 'positive' | 'negative' | 'neutral';

export interface Company {
  ticker: string;
  name: string;
  aliases: string[];
  sector: string;
  exclude: string[];
}

export interface PriceRecord {
  ticker: string;
  date: string; // YYYY-MM-DD (UTC trading date)
  open: number;
  high: number;
  low: number;
  close: number;
  adjClose: number | null;
  volume: number;
}

export type IndicatorKind = 'sma' | 'rsi';

export interface IndicatorSpec {
  kind: IndicatorKind;
  window: number;
}

export interface PricePoint extends PriceRecord {
  changePct: number | null;
  indicators: Record<string, number | null>;
}

/** Last `sessions` trading rows dated on or before `end`. */
export interface SessionWindow {
  end: string; // YYYY-MM-DD
  sessions: number;
}

export interface PriceSeriesQuery {
  ticker: string;
  days: number;
  endDate?: string; // YYYY-MM-DD; absent means latest
  indicators: IndicatorSpec[];
}

export interface NewsQuery {
  ticker?: string;
  freshness: NewsFreshness;
  limit?: number;
  sentiment?: SentimentLabel;
}

export interface SentimentScore {
  score: number; // -1..1
  label: SentimentLabel;
  method: string;
  scoredAt: string; // ISO-8601
}

/** Article as returned by a news provider, before sentiment is attached. */
export interface RawArticle {
  providerId: string;
  publishedAt: string; // ISO-8601
  source: string;
  url: string;
  title: string;
  summary: string;
  tickers: string[];
}

export interface NewsDocument extends RawArticle {
  sentiment: SentimentScore;
  ingestedAt: string; // ISO-8601
}

export interface Resolution<R> {
  records: R[];
  provenance: Provenance;
  decision: FetchDecision;
  persisted: boolean | null; // null when nothing was written
}

export interface PriceResolution {
  ticker: string;
  company: Company | null;
  provenance: Provenance;
  decision: FetchDecision;
  persisted: boolean | null;
  points: PricePoint[];
  latestClose: number | null;
  volatility: number | null; // annualized, percent
}

export interface SentimentSummary {
  positive: number;
  negative: number;
  neutral: number;
  averageScore: number | null;
}

export interface NewsResolution {
  ticker: string | null;
  provenance: Provenance;
  decision: FetchDecision;
  persisted: boolean | null;
  documents: NewsDocument[];
  sentimentSummary: SentimentSummary;
}
