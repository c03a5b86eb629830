import type { NewsSettings } from '../config.js';
import { findCompany } from '../constants/companies.js';
import { InvalidQueryError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import type {
  NewsDocument,
  NewsQuery,
  NewsResolution,
  RawArticle,
  SentimentLabel,
  SentimentSummary,
} from '../types.js';
import { daysBefore, hoursBefore } from '../utils/date.js';
import { isTickerSymbol, normalizeTicker, round4 } from '../utils/normalize.js';
import type { NewsStore } from '../stores/newsStore.js';
import { CacheAsideResolver, type CacheAsidePolicy } from './cacheAside.js';
import type { NewsProvider } from './newsapi.js';
import { evaluateTickerRelevance } from './relevance.js';
import type { SentimentScorer } from './sentiment.js';

interface NewsKey {
  ticker?: string;
  limit: number;
  sentiment?: SentimentLabel;
  now: Date;
}

export interface NewsResolverOptions {
  settings: NewsSettings;
  timeoutMs: number;
  scorer: SentimentScorer;
  now?: () => Date;
  logger?: Logger;
}

function publishedMs(doc: NewsDocument): number {
  return Date.parse(doc.publishedAt);
}

/**
 * Final shape of every news answer: newest first, sentiment filter, limit.
 */
export function finalizeDocuments(docs: NewsDocument[], limit: number, sentiment?: SentimentLabel): NewsDocument[] {
  return docs
    .filter((d) => !sentiment || d.sentiment.label === sentiment)
    .sort((a, b) => publishedMs(b) - publishedMs(a))
    .slice(0, limit);
}

/** Stored documents win over freshly fetched copies of the same article. */
export function mergeNewsDocuments(stored: NewsDocument[], fetched: NewsDocument[]): NewsDocument[] {
  const byId = new Map<string, NewsDocument>();
  for (const doc of fetched) byId.set(doc.providerId, doc);
  for (const doc of stored) byId.set(doc.providerId, doc);
  return Array.from(byId.values());
}

export function summarizeSentiment(docs: NewsDocument[]): SentimentSummary {
  const summary: SentimentSummary = { positive: 0, negative: 0, neutral: 0, averageScore: null };
  if (!docs.length) return summary;
  let total = 0;
  for (const doc of docs) {
    summary[doc.sentiment.label] += 1;
    total += doc.sentiment.score;
  }
  summary.averageScore = round4(total / docs.length);
  return summary;
}

export class NewsResolver {
  private readonly resolver: CacheAsideResolver<NewsKey, NewsDocument>;
  private readonly settings: NewsSettings;
  private readonly scorer: SentimentScorer;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(
    private readonly store: NewsStore,
    provider: NewsProvider,
    opts: NewsResolverOptions,
  ) {
    this.settings = opts.settings;
    this.scorer = opts.scorer;
    this.now = opts.now ?? (() => new Date());
    this.log = (opts.logger ?? rootLogger).child({ component: 'news-resolver' });

    const policy: CacheAsidePolicy<NewsKey, NewsDocument> = {
      // News degrades on every store failure.
      isTerminalReadError: () => false,
      fresh: (docs, key) => {
        const cutoff = hoursBefore(key.now, this.settings.stalenessHours).getTime();
        return docs.filter((d) => publishedMs(d) >= cutoff);
      },
      isSufficient: (fresh, key) => fresh.length >= Math.min(key.limit, this.settings.sufficientCount),
      // The lookback bounds what joins a live answer; fallbacks serve stored documents of any age.
      merge: (stored, fetched, key) => {
        const since = this.lookbackStart(key).getTime();
        const recent = stored.filter((d) => publishedMs(d) >= since);
        return finalizeDocuments(mergeNewsDocuments(recent, fetched), key.limit, key.sentiment);
      },
    };

    this.resolver = new CacheAsideResolver<NewsKey, NewsDocument>(
      {
        read: (key) =>
          store.queryRecent({
            ticker: key.ticker,
            limit: Math.max(key.limit, this.settings.fetchPageSize),
            sentiment: key.sentiment,
          }),
        write: (docs) => store.upsertByProviderId(docs),
      },
      {
        name: provider.name,
        fetch: async (key, { cached, signal }) => {
          const articles = await provider.fetchArticles(
            { ticker: key.ticker, limit: this.settings.fetchPageSize, since: this.lookbackStart(key) },
            { signal },
          );
          const relevant = this.relevantArticles(articles, key);
          const stored = await this.storedVersions(relevant, cached);
          return this.toDocuments(relevant, stored, key);
        },
      },
      policy,
      { timeoutMs: opts.timeoutMs, logger: this.log },
    );
  }

  /**
   * Recent news for a ticker (or the general market), database first.
   * Provider and store failures degrade to stored or empty results; only invalid input throws.
   */
  async resolveNewsQuery(query: NewsQuery): Promise<NewsResolution> {
    const key = this.toKey(query);
    const result = await this.resolver.resolve(key, { storeOnly: query.freshness === 'cached-only' });
    const documents = finalizeDocuments(result.records, key.limit, key.sentiment);

    this.log.info(
      {
        ticker: key.ticker ?? null,
        freshness: query.freshness,
        provenance: result.provenance,
        decision: result.decision,
        persisted: result.persisted,
        documents: documents.length,
      },
      'News query resolved',
    );

    return {
      ticker: key.ticker ?? null,
      provenance: result.provenance,
      decision: result.decision,
      persisted: result.persisted,
      documents,
      sentimentSummary: summarizeSentiment(documents),
    };
  }

  private toKey(query: NewsQuery): NewsKey {
    let ticker: string | undefined;
    if (query.ticker !== undefined && query.ticker.trim() !== '') {
      ticker = normalizeTicker(query.ticker);
      if (!isTickerSymbol(ticker)) throw new InvalidQueryError(`Invalid ticker: "${query.ticker}"`);
    }
    const limit = query.limit ?? this.settings.defaultLimit;
    if (!Number.isInteger(limit) || limit < 1 || limit > this.settings.maxLimit) {
      throw new InvalidQueryError(`limit must be an integer between 1 and ${this.settings.maxLimit}`);
    }
    return { ticker, limit, sentiment: query.sentiment, now: this.now() };
  }

  private lookbackStart(key: NewsKey): Date {
    return daysBefore(key.now, this.settings.lookbackDays);
  }

  private relevantArticles(articles: RawArticle[], key: NewsKey): RawArticle[] {
    if (!key.ticker) return articles;
    const ticker = key.ticker;
    const company = findCompany(ticker);
    const relevant = articles.filter((a) => evaluateTickerRelevance(a, ticker, company).relevant);
    const dropped = articles.length - relevant.length;
    if (dropped) this.log.debug({ ticker, dropped }, 'Dropped irrelevant articles');
    return relevant;
  }

  /**
   * Stored copies of the fetched articles. The query's own read only covers its ticker,
   * label and limit, so ids it did not return are looked up directly.
   */
  private async storedVersions(articles: RawArticle[], cached: NewsDocument[]): Promise<Map<string, NewsDocument>> {
    const stored = new Map(cached.map((d) => [d.providerId, d]));
    const missing = articles.map((a) => a.providerId).filter((id) => !stored.has(id));
    if (!missing.length) return stored;

    try {
      for (const doc of await this.store.findByProviderIds(missing)) stored.set(doc.providerId, doc);
    } catch (err) {
      // Unknown ids get scored; the insert-only write-through still keeps any stored sentiment.
      this.log.warn({ err, ids: missing.length }, 'Stored article lookup failed');
    }
    return stored;
  }

  /**
   * Stored articles come back as stored, with the query ticker added to their
   * associations; only articles never stored are scored.
   */
  private toDocuments(articles: RawArticle[], stored: Map<string, NewsDocument>, key: NewsKey): NewsDocument[] {
    const ingestedAt = key.now.toISOString();
    return articles.map((article) => {
      const existing = stored.get(article.providerId);
      if (existing) {
        return { ...existing, tickers: Array.from(new Set([...existing.tickers, ...article.tickers])) };
      }
      return { ...article, sentiment: this.scorer.score(`${article.title}. ${article.summary}`), ingestedAt };
    });
  }
}
