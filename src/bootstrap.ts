import type { AppConfig } from './config.js';
import { COMPANIES } from './constants/companies.js';
import { logger } from './logger.js';
import { BudgetManager } from './services/budgetManager.js';
import { MarketDataService } from './services/marketData.js';
import { NewsApiClient } from './services/newsapi.js';
import { NewsResolver } from './services/newsResolver.js';
import { PriceResolver } from './services/priceResolver.js';
import { YahooChartClient } from './services/quotes.js';
import { TtlResponseCache } from './services/responseCache.js';
import { LexiconSentimentScorer } from './services/sentiment.js';
import { MemoryNewsStore, MemoryPriceStore } from './stores/memory.js';
import { MongoNewsStore, type NewsStore } from './stores/newsStore.js';
import { PgPriceStore, type PriceStore } from './stores/priceStore.js';
import type { NewsResolution, PriceResolution } from './types.js';

export interface MarketDataRuntime {
  service: MarketDataService;
  close(): Promise<void>;
}

async function createPriceStore(cfg: AppConfig): Promise<{ store: PriceStore; close: () => Promise<void> }> {
  if (!cfg.pgUri) {
    logger.warn('PG_URI not set, price rows are kept in memory');
    return { store: new MemoryPriceStore(), close: async () => undefined };
  }
  const store = PgPriceStore.fromUri(cfg.pgUri);
  await store.ensureSchema(COMPANIES);
  return { store, close: () => store.close() };
}

async function createNewsStore(cfg: AppConfig): Promise<{ store: NewsStore; close: () => Promise<void> }> {
  if (!cfg.mongo.uri) {
    logger.warn('MONGO_URI not set, news documents are kept in memory');
    return { store: new MemoryNewsStore(), close: async () => undefined };
  }
  const store = MongoNewsStore.fromUri(cfg.mongo.uri, cfg.mongo.database, cfg.mongo.newsCollection);
  await store.ensureIndexes();
  return { store, close: () => store.close() };
}

/**
 * Wire stores, providers, resolvers and response caches from configuration.
 */
export async function createMarketDataRuntime(cfg: AppConfig): Promise<MarketDataRuntime> {
  const prices = await createPriceStore(cfg);
  const news = await createNewsStore(cfg);

  const priceResolver = new PriceResolver(
    prices.store,
    new YahooChartClient(cfg.quoteApiBaseUrl, cfg.providerTimeoutMs),
    { settings: cfg.price, timeoutMs: cfg.providerTimeoutMs },
  );
  const newsResolver = new NewsResolver(
    news.store,
    new NewsApiClient({
      apiKey: cfg.newsApiKey,
      baseURL: cfg.newsApiBaseUrl,
      timeoutMs: cfg.providerTimeoutMs,
      budget: new BudgetManager(cfg.rateLimits),
    }),
    { settings: cfg.news, timeoutMs: cfg.providerTimeoutMs, scorer: new LexiconSentimentScorer() },
  );

  const service = new MarketDataService(priceResolver, newsResolver, {
    prices: new TtlResponseCache<PriceResolution>(cfg.responseCache),
    news: new TtlResponseCache<NewsResolution>(cfg.responseCache),
  });

  logger.info(
    { priceStore: cfg.pgUri ? 'postgres' : 'memory', newsStore: cfg.mongo.uri ? 'mongodb' : 'memory' },
    'Market data runtime ready',
  );

  return {
    service,
    close: async () => {
      await Promise.all([prices.close(), news.close()]);
    },
  };
}
