import type { Company } from '../types.js';

/**
 * Tracked US large caps. Seeds the price store's company table and drives
 * news queries and ticker relevance.
 */
export const COMPANIES: readonly Company[] = [
  {
    ticker: 'AAPL',
    name: 'Apple',
    aliases: ['Apple Inc', 'iPhone'],
    sector: 'Technology',
    exclude: ['apple pie', 'apple cider', 'apple orchard'],
  },
  {
    ticker: 'MSFT',
    name: 'Microsoft',
    aliases: ['Azure'],
    sector: 'Technology',
    exclude: [],
  },
  {
    ticker: 'GOOGL',
    name: 'Alphabet',
    aliases: ['Google'],
    sector: 'Communication Services',
    exclude: [],
  },
  {
    ticker: 'AMZN',
    name: 'Amazon',
    aliases: ['Amazon.com', 'AWS'],
    sector: 'Consumer Discretionary',
    exclude: ['amazon rainforest', 'amazon river'],
  },
  {
    ticker: 'TSLA',
    name: 'Tesla',
    aliases: ['Elon Musk'],
    sector: 'Consumer Discretionary',
    exclude: ['nikola tesla'],
  },
  {
    ticker: 'NVDA',
    name: 'Nvidia',
    aliases: ['GeForce'],
    sector: 'Technology',
    exclude: [],
  },
  {
    ticker: 'META',
    name: 'Meta Platforms',
    aliases: ['Facebook', 'Instagram'],
    sector: 'Communication Services',
    exclude: [],
  },
  {
    ticker: 'NFLX',
    name: 'Netflix',
    aliases: [],
    sector: 'Communication Services',
    exclude: [],
  },
  {
    ticker: 'JPM',
    name: 'JPMorgan Chase',
    aliases: ['JPMorgan', 'Jamie Dimon'],
    sector: 'Financials',
    exclude: [],
  },
  {
    ticker: 'V',
    name: 'Visa',
    aliases: ['Visa Inc'],
    sector: 'Financials',
    exclude: ['travel visa', 'visa application', 'student visa', 'work visa'],
  },
];

const BY_TICKER = new Map(COMPANIES.map((c) => [c.ticker, c]));

export function findCompany(ticker: string): Company | null {
  return BY_TICKER.get(ticker) ?? null;
}

export const KNOWN_TICKERS: readonly string[] = COMPANIES.map((c) => c.ticker);

/** Query used for general market news when no ticker is given. */
export const GENERAL_MARKET_QUERY =
  '"stock market" OR "financial markets" OR earnings OR "Wall Street" OR "economic news"';
