import { logger as rootLogger, type Logger } from '../logger.js';
import type { NewsQuery, NewsResolution, PriceResolution, PriceSeriesQuery } from '../types.js';
import { normalizeTicker } from '../utils/normalize.js';
import { indicatorKey } from './indicators.js';
import type { NewsResolver } from './newsResolver.js';
import type { PriceResolver } from './priceResolver.js';
import type { ResponseCache } from './responseCache.js';

export const NEWS_TAG = 'news';

export function priceTag(ticker: string): string {
  return `price:${ticker}`;
}

export function priceCacheKey(query: PriceSeriesQuery): string {
  const indicators = query.indicators.map(indicatorKey).sort().join(',');
  return `price:${normalizeTicker(query.ticker)}:${query.days}:${query.endDate ?? 'latest'}:${indicators}`;
}

export function newsCacheKey(query: NewsQuery): string {
  const ticker = query.ticker?.trim() ? normalizeTicker(query.ticker) : '*';
  return `news:${ticker}:${query.limit ?? 'default'}:${query.sentiment ?? 'all'}`;
}

export interface MarketDataCaches {
  prices?: ResponseCache<PriceResolution>;
  news?: ResponseCache<NewsResolution>;
}

/**
 * Query surface over the price and news resolvers with an optional response memo.
 * Only complete answers (`cached`, `live`) are memoized; a memo hit is reported as `cached`.
 */
export class MarketDataService {
  private readonly log: Logger;

  constructor(
    private readonly prices: PriceResolver,
    private readonly news: NewsResolver,
    private readonly caches: MarketDataCaches = {},
    logger?: Logger,
  ) {
    this.log = (logger ?? rootLogger).child({ component: 'market-data' });
  }

  async getPriceHistory(query: PriceSeriesQuery): Promise<PriceResolution> {
    const cache = this.caches.prices;
    const key = priceCacheKey(query);
    const hit = cache?.get(key);
    if (hit) {
      this.log.debug({ key }, 'Response cache hit');
      return { ...hit, provenance: 'cached', decision: 'serve-cached', persisted: null };
    }

    const result = await this.prices.resolvePriceQuery(query);
    if (cache) {
      if (result.persisted) {
        const dropped = cache.invalidateTag(priceTag(result.ticker));
        this.log.debug({ ticker: result.ticker, dropped }, 'Invalidated memoized price answers');
      }
      if (result.provenance === 'cached' || result.provenance === 'live') {
        cache.set(key, result, [priceTag(result.ticker)]);
      }
    }
    return result;
  }

  async getNews(query: NewsQuery): Promise<NewsResolution> {
    // cached-only bypasses the memo in both directions.
    if (query.freshness === 'cached-only') return this.news.resolveNewsQuery(query);

    const cache = this.caches.news;
    const key = newsCacheKey(query);
    const hit = cache?.get(key);
    if (hit) {
      this.log.debug({ key }, 'Response cache hit');
      return { ...hit, provenance: 'cached', decision: 'serve-cached', persisted: null };
    }

    const result = await this.news.resolveNewsQuery(query);
    if (cache) {
      if (result.persisted) {
        const dropped = cache.invalidateTag(NEWS_TAG);
        this.log.debug({ dropped }, 'Invalidated memoized news answers');
      }
      if (result.provenance === 'cached' || result.provenance === 'live') {
        cache.set(key, result, [NEWS_TAG]);
      }
    }
    return result;
  }
}
