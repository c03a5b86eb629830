/**
 * Centralized configuration loader for Market Pulse.
 * Reads environment variables, parses types, and exposes a typed config object.
 *
 * Environment variables (see .env.example):
 * - TRANSPORT=stdio|http (default: stdio)
 * - PORT (default: 3000 for http transport), HOST (default: 0.0.0.0)
 * - ALLOWED_HOSTS, ALLOWED_ORIGINS (comma lists, optional)
 * - LOG_LEVEL (default: info)
 * - PG_URI (optional; price rows are kept in memory when absent)
 * - MONGO_URI, MONGO_DB, NEWS_COLLECTION (optional; news is kept in memory when absent)
 * - NEWS_API_KEY, NEWS_API_BASE_URL
 * - QUOTE_API_BASE_URL
 * - PROVIDER_TIMEOUT_MS (default: 10000)
 * - PRICE_MIN_HISTORY_DAYS (default: 60), PRICE_MAX_STALENESS_DAYS (default: 4)
 * - NEWS_STALENESS_HOURS (default: 6), NEWS_LOOKBACK_DAYS (default: 7)
 * - NEWS_SUFFICIENT_COUNT (default: 5), NEWS_FETCH_PAGE_SIZE (default: 50)
 * - RESPONSE_CACHE_TTL_SECONDS (default: 300), RESPONSE_CACHE_MAX_ENTRIES (default: 500)
 * - RATE_LIMIT_DAILY_REQUESTS, RATE_LIMIT_PER_SECOND (optional, news provider)
 */

import { config } from 'dotenv';

// Load environment variables from .env file
config();

export type Transport = 'stdio' | 'http';

export interface PriceSettings {
  minHistoryDays: number;
  maxStalenessDays: number;
}

export interface NewsSettings {
  stalenessHours: number;
  lookbackDays: number;
  sufficientCount: number;
  fetchPageSize: number;
  defaultLimit: number;
  maxLimit: number;
}

export interface AppConfig {
  transport: Transport;
  port: number;
  httpHost: string;
  allowedHosts: string[];
  allowedOrigins: string[];
  logLevel: string;
  pgUri?: string;
  mongo: {
    uri?: string;
    database: string;
    newsCollection: string;
  };
  newsApiKey: string;
  newsApiBaseUrl: string;
  quoteApiBaseUrl: string;
  providerTimeoutMs: number;
  price: PriceSettings;
  news: NewsSettings;
  responseCache: {
    ttlSeconds: number;
    maxEntries: number;
  };
  rateLimits: {
    dailyRequestsCap?: number;
    perSecondCap?: number;
  };
}

function parseNumber(value: string | undefined): number | undefined {
  if (!value || value.trim() === '') return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

function parseList(value: string | undefined): string[] {
  return (value ?? '')
    .split(',')
    .map((v) => v.trim())
    .filter(Boolean);
}

export function getConfig(): AppConfig {
  const transport: Transport = process.env.TRANSPORT === 'http' ? 'http' : 'stdio';
  const port = Number(process.env.PORT || 3000);
  const httpHost = process.env.HOST?.trim() || '0.0.0.0';
  const logLevel = process.env.LOG_LEVEL?.trim() || 'info';

  const mongo = {
    uri: process.env.MONGO_URI?.trim() || undefined,
    database: process.env.MONGO_DB?.trim() || 'market_pulse',
    newsCollection: process.env.NEWS_COLLECTION?.trim() || 'financial_news',
  };

  const price: PriceSettings = {
    minHistoryDays: parseNumber(process.env.PRICE_MIN_HISTORY_DAYS) ?? 60,
    maxStalenessDays: parseNumber(process.env.PRICE_MAX_STALENESS_DAYS) ?? 4,
  };

  const news: NewsSettings = {
    stalenessHours: parseNumber(process.env.NEWS_STALENESS_HOURS) ?? 6,
    lookbackDays: parseNumber(process.env.NEWS_LOOKBACK_DAYS) ?? 7,
    sufficientCount: parseNumber(process.env.NEWS_SUFFICIENT_COUNT) ?? 5,
    fetchPageSize: parseNumber(process.env.NEWS_FETCH_PAGE_SIZE) ?? 50,
    defaultLimit: 20,
    maxLimit: 100,
  };

  const responseCache = {
    ttlSeconds: parseNumber(process.env.RESPONSE_CACHE_TTL_SECONDS) ?? 300,
    maxEntries: parseNumber(process.env.RESPONSE_CACHE_MAX_ENTRIES) ?? 500,
  };

  const rateLimits = {
    dailyRequestsCap: parseNumber(process.env.RATE_LIMIT_DAILY_REQUESTS),
    perSecondCap: parseNumber(process.env.RATE_LIMIT_PER_SECOND),
  };

  return {
    transport,
    port,
    httpHost,
    allowedHosts: parseList(process.env.ALLOWED_HOSTS),
    allowedOrigins: parseList(process.env.ALLOWED_ORIGINS),
    logLevel,
    pgUri: process.env.PG_URI?.trim() || undefined,
    mongo,
    newsApiKey: process.env.NEWS_API_KEY || '',
    newsApiBaseUrl: process.env.NEWS_API_BASE_URL?.trim() || 'https://newsapi.org/v2/',
    quoteApiBaseUrl:
      process.env.QUOTE_API_BASE_URL?.trim() || 'https://query1.finance.yahoo.com/v8/finance/',
    providerTimeoutMs: parseNumber(process.env.PROVIDER_TIMEOUT_MS) ?? 10_000,
    price,
    news,
    responseCache,
    rateLimits,
  };
}

/**
 * Optional guard to assert required vars for specific runtime modes.
 * Only the news provider needs a key; quotes come from a public endpoint.
 */
export function assertRequiredConfig(cfg: AppConfig) {
  if (!cfg.newsApiKey) {
    throw new Error('NEWS_API_KEY environment variable is required');
  }
}
