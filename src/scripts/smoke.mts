#!/usr/bin/env node
import axios from 'axios';
import { getConfig } from '../config.js';
import { NewsApiClient } from '../services/newsapi.js';
import { YahooChartClient } from '../services/quotes.js';
import { normalizeTicker } from '../utils/normalize.js';

async function main() {
  const ticker = normalizeTicker(process.argv[2] ?? 'AAPL');
  const cfg = getConfig();

  const quotes = new YahooChartClient(cfg.quoteApiBaseUrl, cfg.providerTimeoutMs);
  console.log('[SMOKE] Fetching price history for:', ticker);
  const rows = await quotes.fetchHistory(ticker, 20);
  console.log('[SMOKE] Rows fetched:', rows.length);
  console.log('[SMOKE] Latest:', rows.slice(-3));

  if (!cfg.newsApiKey) {
    console.log('[SMOKE] NEWS_API_KEY not set, skipping news');
    return;
  }
  const news = new NewsApiClient();
  const articles = await news.fetchArticles({ ticker, limit: 5 });
  console.log('[SMOKE] Articles fetched:', articles.length);
  console.log(
    '[SMOKE] Sample:',
    articles.slice(0, 3).map((a) => ({ publishedAt: a.publishedAt, source: a.source, title: a.title })),
  );
}

main().then(
  () => process.exit(0),
  (err: unknown) => {
    console.error('[SMOKE] Error:', err instanceof Error ? err.message : String(err));
    const cause = err instanceof Error ? err.cause : undefined;
    if (axios.isAxiosError(cause) && cause.response) {
      console.error('[SMOKE] HTTP status:', cause.response.status, cause.response.statusText ?? '');
      console.error('[SMOKE] Body snippet:', String(JSON.stringify(cause.response.data)).slice(0, 500));
    }
    process.exit(1);
  },
);
