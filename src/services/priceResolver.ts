import type { PriceSettings } from '../config.js';
import { findCompany } from '../constants/companies.js';
import { InvalidQueryError, TickerNotFoundError, UpstreamUnavailableError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import type { IndicatorSpec, PriceRecord, PriceResolution, PriceSeriesQuery, SessionWindow } from '../types.js';
import { daysBetween, normalizeDate } from '../utils/date.js';
import { isTickerSymbol, normalizeTicker } from '../utils/normalize.js';
import type { PriceStore } from '../stores/priceStore.js';
import { CacheAsideResolver, type CacheAsidePolicy } from './cacheAside.js';
import { annualizedVolatility, applyIndicators, indicatorKey, requiredRows } from './indicators.js';
import type { QuoteProvider } from './quotes.js';

const MAX_DAYS = 1000;

/** A validated price query with the history the indicators need. */
interface PriceKey {
  ticker: string;
  days: number;
  endDate?: string;
  indicators: IndicatorSpec[];
  window: SessionWindow;
  /** The window ends today. */
  latest: boolean;
}

export interface PriceResolverOptions {
  settings: PriceSettings;
  timeoutMs: number;
  now?: () => Date;
  logger?: Logger;
}

/**
 * Ascending by date. Stored rows win; fetched rows fill the gaps and, when `replaceFrom`
 * is given, replace stored rows dated on or after it.
 */
export function mergePriceRows(stored: PriceRecord[], fetched: PriceRecord[], replaceFrom?: string): PriceRecord[] {
  const byDate = new Map<string, PriceRecord>();
  for (const row of stored) byDate.set(row.date, row);
  for (const row of fetched) {
    if (!byDate.has(row.date) || (replaceFrom !== undefined && row.date >= replaceFrom)) {
      byDate.set(row.date, row);
    }
  }
  return Array.from(byDate.values()).sort((a, b) => a.date.localeCompare(b.date));
}

function newestDate(rows: PriceRecord[]): string | undefined {
  return rows.length ? rows[rows.length - 1].date : undefined;
}

export class PriceResolver {
  private readonly resolver: CacheAsideResolver<PriceKey, PriceRecord>;
  private readonly settings: PriceSettings;
  private readonly now: () => Date;
  private readonly log: Logger;

  constructor(store: PriceStore, quotes: QuoteProvider, opts: PriceResolverOptions) {
    this.settings = opts.settings;
    this.now = opts.now ?? (() => new Date());
    this.log = (opts.logger ?? rootLogger).child({ component: 'price-resolver' });

    const policy: CacheAsidePolicy<PriceKey, PriceRecord> = {
      isTerminalReadError: (err) => err instanceof TickerNotFoundError,
      fresh: (rows) => rows,
      isSufficient: (rows, key) => this.isSufficient(rows, key),
      // Only a window that reaches today can hold the newest stored session; anchored
      // windows are history.
      merge: (stored, fetched, key) => mergePriceRows(stored, fetched, key.latest ? newestDate(stored) : undefined),
    };

    this.resolver = new CacheAsideResolver<PriceKey, PriceRecord>(
      {
        read: (key) => store.readRange(key.ticker, key.window),
        write: (rows) => store.upsert(rows),
      },
      {
        name: quotes.name,
        fetch: async (key, { signal }) => {
          const minDays = Math.max(key.window.sessions, this.settings.minHistoryDays);
          const rows = await quotes.fetchHistory(key.ticker, minDays, { signal });
          return rows.filter((r) => r.date <= key.window.end);
        },
      },
      policy,
      { timeoutMs: opts.timeoutMs, logger: this.log },
    );
  }

  /**
   * Last `days` trading rows with change % and indicators, database first.
   * Throws InvalidQueryError, TickerNotFoundError, or UpstreamUnavailableError when
   * neither the store nor the provider has any rows.
   */
  async resolvePriceQuery(query: PriceSeriesQuery): Promise<PriceResolution> {
    const key = this.toKey(query);
    const result = await this.resolver.resolve(key);

    if (result.provenance === 'unavailable' || !result.records.length) {
      throw new UpstreamUnavailableError(key.ticker);
    }

    const points = applyIndicators(result.records, key.indicators).slice(-key.days);
    const last = points[points.length - 1];
    this.log.info(
      {
        ticker: key.ticker,
        days: key.days,
        provenance: result.provenance,
        decision: result.decision,
        persisted: result.persisted,
      },
      'Price query resolved',
    );

    return {
      ticker: key.ticker,
      company: findCompany(key.ticker),
      provenance: result.provenance,
      decision: result.decision,
      persisted: result.persisted,
      points,
      latestClose: last ? last.close : null,
      volatility: annualizedVolatility(points.map((p) => p.close)),
    };
  }

  private toKey(query: PriceSeriesQuery): PriceKey {
    const ticker = normalizeTicker(query.ticker);
    if (!ticker || !isTickerSymbol(ticker)) {
      throw new InvalidQueryError(`Invalid ticker: "${query.ticker}"`);
    }
    if (!Number.isInteger(query.days) || query.days < 1 || query.days > MAX_DAYS) {
      throw new InvalidQueryError(`days must be an integer between 1 and ${MAX_DAYS}`);
    }

    let endDate: string | undefined;
    if (query.endDate) {
      try {
        endDate = normalizeDate(query.endDate);
      } catch (err) {
        throw new InvalidQueryError(`Invalid endDate: "${query.endDate}"`, err);
      }
    }

    // Deduplicate by output key so "ma_20" and "sma_20" do not compute twice.
    const indicators = Array.from(new Map(query.indicators.map((s) => [indicatorKey(s), s])).values());
    // The first returned session needs its own full lookback too.
    const lookback = Math.max(1, ...indicators.map(requiredRows));
    const sessions = query.days + lookback - 1;
    const today = normalizeDate(this.now());
    const end = endDate ?? today;

    return {
      ticker,
      days: query.days,
      endDate,
      indicators,
      window: { end, sessions },
      latest: end >= today,
    };
  }

  private isSufficient(rows: PriceRecord[], key: PriceKey): boolean {
    if (rows.length < key.window.sessions) return false;
    if (key.endDate || this.settings.maxStalenessDays <= 0) return true;
    const newest = rows[rows.length - 1];
    return daysBetween(newest.date, key.window.end) <= this.settings.maxStalenessDays;
  }
}
