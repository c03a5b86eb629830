import { createHash } from 'node:crypto';
import axios from 'axios';
import { z } from 'zod';
import { getConfig } from '../config.js';
import { GENERAL_MARKET_QUERY, findCompany } from '../constants/companies.js';
import { RateLimitedError, UnreachableError } from '../errors.js';
import { logger } from '../logger.js';
import type { RawArticle } from '../types.js';
import { cleanArticleText } from '../utils/text.js';
import { BudgetManager } from './budgetManager.js';
import { toProviderError } from './providerErrors.js';

export interface ArticleRequest {
  ticker?: string; // absent = general market news
  limit: number;
  since?: Date;
}

/**
 * News Provider contract.
 */
export interface NewsProvider {
  readonly name: string;
  fetchArticles(request: ArticleRequest, opts?: { signal?: AbortSignal }): Promise<RawArticle[]>;
}

/**
 * Raw types matching NewsAPI /v2/everything responses
 */
const RawArticleSchema = z.object({
  source: z.object({ id: z.string().nullable().optional(), name: z.string().nullable().optional() }),
  title: z.string().nullable(),
  description: z.string().nullable().optional(),
  content: z.string().nullable().optional(),
  url: z.string(),
  publishedAt: z.string(),
});

const RawResponseSchema = z.discriminatedUnion('status', [
  z.object({
    status: z.literal('ok'),
    totalResults: z.number().optional(),
    articles: z.array(RawArticleSchema),
  }),
  z.object({
    status: z.literal('error'),
    code: z.string().optional(),
    message: z.string().optional(),
  }),
]);

export type RawNewsResponse = z.infer<typeof RawResponseSchema>;
export type RawNewsArticle = z.infer<typeof RawArticleSchema>;

/** Stable document id derived from the article URL. */
export function providerIdFor(url: string): string {
  return `newsapi_${createHash('sha1').update(url).digest('hex').slice(0, 20)}`;
}

/**
 * Build the NewsAPI search expression: quoted company names and aliases, plus the
 * bare symbol next to market vocabulary.
 */
export function buildQuery(ticker?: string): string {
  if (!ticker) return GENERAL_MARKET_QUERY;
  const company = findCompany(ticker);
  if (!company) return `${ticker} AND (stock OR shares OR earnings)`;
  const names = [company.name, ...company.aliases].map((n) => `"${n}"`).join(' OR ');
  return `(${names}) OR (${ticker} AND (stock OR shares OR earnings))`;
}

export interface NewsApiClientOptions {
  apiKey?: string;
  baseURL?: string;
  timeoutMs?: number;
  budget?: BudgetManager;
}

/**
 * NewsApiClient for NewsAPI (newsapi.org) /v2/everything.
 * A local request budget turns configured caps into a rate-limit signal before any call goes out.
 */
export class NewsApiClient implements NewsProvider {
  readonly name = 'newsapi';
  private axios: ReturnType<typeof axios.create>;
  private readonly apiKey: string;
  private readonly budget: BudgetManager;
  private readonly log = logger.child({ provider: 'newsapi' });

  constructor(opts: NewsApiClientOptions = {}) {
    const cfg = getConfig();
    this.apiKey = opts.apiKey ?? cfg.newsApiKey;
    if (!this.apiKey) {
      throw new Error('NEWS_API_KEY is required to initialize NewsApiClient');
    }
    this.budget = opts.budget ?? new BudgetManager(cfg.rateLimits);
    this.axios = axios.create({
      baseURL: opts.baseURL ?? cfg.newsApiBaseUrl,
      timeout: opts.timeoutMs ?? cfg.providerTimeoutMs,
    });
  }

  async fetchArticles(request: ArticleRequest, opts: { signal?: AbortSignal } = {}): Promise<RawArticle[]> {
    if (this.budget.shouldThrottle()) {
      throw new RateLimitedError(this.name, 'Local NewsAPI request budget exhausted');
    }

    const params = {
      q: buildQuery(request.ticker),
      language: 'en',
      sortBy: 'publishedAt',
      pageSize: Math.min(100, Math.max(1, request.limit)),
      ...(request.since ? { from: request.since.toISOString() } : {}),
    };

    // Build request with safe logging (do not log apiKey)
    this.log.debug({ params }, 'GET everything');
    let data: unknown;
    try {
      this.budget.recordRequest();
      const response = await this.axios.get<unknown>('everything', {
        params,
        headers: { 'X-Api-Key': this.apiKey },
        signal: opts.signal,
      });
      data = response.data;
    } catch (err) {
      if (axios.isAxiosError(err)) {
        const body = RawResponseSchema.safeParse(err.response?.data);
        if (body.success && body.data.status === 'error' && body.data.code === 'rateLimited') {
          throw new RateLimitedError(this.name, body.data.message ?? 'NewsAPI rate limit reached');
        }
      }
      throw toProviderError(this.name, err);
    }

    const parsed = RawResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new UnreachableError(this.name, 'Unexpected NewsAPI payload', { cause: parsed.error });
    }
    if (parsed.data.status === 'error') {
      if (parsed.data.code === 'rateLimited') {
        throw new RateLimitedError(this.name, parsed.data.message ?? 'NewsAPI rate limit reached');
      }
      throw new UnreachableError(this.name, `${parsed.data.code ?? 'error'}: ${parsed.data.message ?? ''}`);
    }

    const articles = parsed.data.articles
      .map((raw) => mapNewsApiArticle(raw, request.ticker))
      .filter((a): a is RawArticle => a !== null);
    this.log.debug({ ticker: request.ticker ?? null, articles: articles.length }, 'Articles fetched');
    return articles;
  }
}

/**
 * Map a NewsAPI article to our RawArticle shape. Removed or untitled articles are dropped.
 */
export function mapNewsApiArticle(raw: RawNewsArticle, ticker?: string): RawArticle | null {
  const title = cleanArticleText(raw.title);
  if (!title || title === '[Removed]') return null;
  const description = cleanArticleText(raw.description);
  const content = cleanArticleText(raw.content);
  let summary = description;
  if (content) summary = content.startsWith(description) ? content : `${description}\n\n${content}`.trim();
  return {
    providerId: providerIdFor(raw.url),
    publishedAt: new Date(raw.publishedAt).toISOString(),
    source: raw.source.name ?? raw.source.id ?? 'Unknown',
    url: raw.url,
    title,
    summary,
    tickers: ticker ? [ticker] : [],
  };
}

export default NewsApiClient;
