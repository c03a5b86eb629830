import { KNOWN_TICKERS } from '../constants/companies.js';
import { StoreError, TickerNotFoundError } from '../errors.js';
import type { NewsDocument, PriceRecord, SessionWindow } from '../types.js';
import type { NewsStore, NewsStoreQuery } from './newsStore.js';
import type { PriceStore } from './priceStore.js';

/**
 * Process-local stores with the same contracts as the database adapters.
 * Used when no database URI is configured, and as the stand-in for tests.
 */

export class MemoryPriceStore implements PriceStore {
  private readonly tickers: Set<string>;
  private readonly rows = new Map<string, Map<string, PriceRecord>>();

  constructor(opts: { tickers?: readonly string[]; rows?: PriceRecord[] } = {}) {
    this.tickers = new Set(opts.tickers ?? KNOWN_TICKERS);
    for (const row of opts.rows ?? []) {
      this.tickers.add(row.ticker);
      this.put(row);
    }
  }

  async readRange(ticker: string, window: SessionWindow): Promise<PriceRecord[]> {
    if (!this.tickers.has(ticker)) throw new TickerNotFoundError(ticker);
    const byDate = this.rows.get(ticker);
    if (!byDate) return [];
    const eligible = Array.from(byDate.values())
      .filter((r) => r.date <= window.end)
      .sort((a, b) => a.date.localeCompare(b.date));
    return eligible.slice(Math.max(0, eligible.length - window.sessions)).map((r) => ({ ...r }));
  }

  async upsert(rows: PriceRecord[]): Promise<void> {
    const newestStored = new Map<string, string>();
    for (const row of rows) {
      if (newestStored.has(row.ticker)) continue;
      if (!this.tickers.has(row.ticker)) {
        throw new StoreError('price', `Cannot store prices for untracked ticker ${row.ticker}`);
      }
      newestStored.set(row.ticker, this.newestDate(row.ticker));
    }
    for (const row of rows) {
      const existing = this.rows.get(row.ticker)?.get(row.date);
      if (existing && row.date < (newestStored.get(row.ticker) ?? '')) continue;
      this.put(row);
    }
  }

  /** Every stored row for a ticker, ascending. */
  snapshot(ticker: string): PriceRecord[] {
    return Array.from(this.rows.get(ticker)?.values() ?? []).sort((a, b) => a.date.localeCompare(b.date));
  }

  private newestDate(ticker: string): string {
    let newest = '';
    for (const date of this.rows.get(ticker)?.keys() ?? []) {
      if (date > newest) newest = date;
    }
    return newest;
  }

  private put(row: PriceRecord): void {
    let byDate = this.rows.get(row.ticker);
    if (!byDate) {
      byDate = new Map();
      this.rows.set(row.ticker, byDate);
    }
    byDate.set(row.date, { ...row });
  }
}

export class MemoryNewsStore implements NewsStore {
  private readonly docs = new Map<string, NewsDocument>();

  constructor(documents: NewsDocument[] = []) {
    for (const doc of documents) this.docs.set(doc.providerId, cloneDocument(doc));
  }

  async queryRecent(query: NewsStoreQuery): Promise<NewsDocument[]> {
    const since = query.since?.getTime() ?? Number.NEGATIVE_INFINITY;
    return Array.from(this.docs.values())
      .filter((d) => Date.parse(d.publishedAt) >= since)
      .filter((d) => !query.ticker || d.tickers.includes(query.ticker))
      .filter((d) => !query.sentiment || d.sentiment.label === query.sentiment)
      .sort((a, b) => Date.parse(b.publishedAt) - Date.parse(a.publishedAt))
      .slice(0, query.limit)
      .map(cloneDocument);
  }

  async findByProviderIds(providerIds: string[]): Promise<NewsDocument[]> {
    const found: NewsDocument[] = [];
    for (const id of providerIds) {
      const doc = this.docs.get(id);
      if (doc) found.push(cloneDocument(doc));
    }
    return found;
  }

  async upsertByProviderId(documents: NewsDocument[]): Promise<void> {
    for (const doc of documents) {
      const existing = this.docs.get(doc.providerId);
      if (!existing) {
        this.docs.set(doc.providerId, cloneDocument(doc));
        continue;
      }
      existing.tickers = Array.from(new Set([...existing.tickers, ...doc.tickers]));
    }
  }

  get(providerId: string): NewsDocument | undefined {
    const doc = this.docs.get(providerId);
    return doc ? cloneDocument(doc) : undefined;
  }

  get size(): number {
    return this.docs.size;
  }
}

function cloneDocument(doc: NewsDocument): NewsDocument {
  return { ...doc, tickers: [...doc.tickers], sentiment: { ...doc.sentiment } };
}
