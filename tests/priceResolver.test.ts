import { describe, expect, it, vi } from 'vitest';
import {
  InvalidQueryError,
  RateLimitedError,
  StoreError,
  TickerNotFoundError,
  UnreachableError,
  UpstreamUnavailableError,
} from '../src/errors.js';
import { PriceResolver, mergePriceRows } from '../src/services/priceResolver.js';
import type { QuoteProvider } from '../src/services/quotes.js';
import { MemoryPriceStore } from '../src/stores/memory.js';
import type { PriceStore } from '../src/stores/priceStore.js';
import type { PriceRecord } from '../src/types.js';
import { NOW, TODAY, priceRow, series } from './fixtures.js';

const settings = { minHistoryDays: 60, maxStalenessDays: 4 };

function makeQuotes(rows: PriceRecord[] = []) {
  return {
    name: 'fake-quotes',
    fetchHistory: vi.fn<QuoteProvider['fetchHistory']>().mockResolvedValue(rows),
  };
}

function makeResolver(store: PriceStore, quotes: QuoteProvider, timeoutMs = 1000) {
  return new PriceResolver(store, quotes, { settings, timeoutMs, now: () => NOW });
}

describe('PriceResolver.resolvePriceQuery', () => {
  it('serves complete, recent stored history without calling the provider', async () => {
    const store = new MemoryPriceStore({ rows: series('AAPL', TODAY, 30) });
    const quotes = makeQuotes();

    const result = await makeResolver(store, quotes).resolvePriceQuery({
      ticker: 'aapl',
      days: 20,
      indicators: [{ kind: 'sma', window: 5 }],
    });

    expect(quotes.fetchHistory).not.toHaveBeenCalled();
    expect(result.provenance).toBe('cached');
    expect(result.decision).toBe('serve-cached');
    expect(result.persisted).toBeNull();
    expect(result.points).toHaveLength(20);
    expect(result.points[0].date).toBe('2025-02-19');
    expect(result.points[19].date).toBe(TODAY);
    // the read reaches four sessions further back, so even the first point has its window
    expect(result.points[0].indicators.ma_5).toBe(108);
    expect(result.points[4].indicators.ma_5).toBe(112);
    expect(result.company?.name).toBe('Apple');
    expect(result.latestClose).toBe(129);
  });

  it('fetches at least the minimum history when the store is short, and writes it through', async () => {
    const store = new MemoryPriceStore({ rows: series('AAPL', TODAY, 5) });
    const quotes = makeQuotes(series('AAPL', TODAY, 60, (i) => 200 + i));

    const result = await makeResolver(store, quotes).resolvePriceQuery({ ticker: 'AAPL', days: 10, indicators: [] });

    expect(quotes.fetchHistory).toHaveBeenCalledTimes(1);
    expect(quotes.fetchHistory).toHaveBeenCalledWith('AAPL', 60, { signal: expect.any(AbortSignal) });
    expect(result.provenance).toBe('live');
    expect(result.decision).toBe('fetch-live-and-store');
    expect(result.persisted).toBe(true);
    expect(result.points).toHaveLength(10);
    // stored rows win for historical dates, the newest fetched row wins for today
    expect(result.points[8]).toMatchObject({ date: '2025-03-09', close: 103 });
    expect(result.points[9]).toMatchObject({ date: TODAY, close: 259 });

    const stored = store.snapshot('AAPL');
    expect(stored).toHaveLength(60);
    expect(stored.find((r) => r.date === '2025-03-09')?.close).toBe(103);
    expect(stored.find((r) => r.date === TODAY)?.close).toBe(259);
  });

  it('refetches when the newest stored row is too old for a latest query', async () => {
    const store = new MemoryPriceStore({ rows: series('AAPL', '2025-03-03', 30) });
    const quotes = makeQuotes(series('AAPL', TODAY, 60));

    const result = await makeResolver(store, quotes).resolvePriceQuery({ ticker: 'AAPL', days: 20, indicators: [] });

    expect(quotes.fetchHistory).toHaveBeenCalledTimes(1);
    expect(result.decision).toBe('fetch-live-and-store');
    expect(result.points[19].date).toBe(TODAY);
  });

  it('serves the same rows when the query is anchored on an end date', async () => {
    const store = new MemoryPriceStore({ rows: series('AAPL', '2025-03-03', 30) });
    const quotes = makeQuotes();

    const result = await makeResolver(store, quotes).resolvePriceQuery({
      ticker: 'AAPL',
      days: 20,
      endDate: '2025-03-03',
      indicators: [],
    });

    expect(quotes.fetchHistory).not.toHaveBeenCalled();
    expect(result.provenance).toBe('cached');
    expect(result.points[19].date).toBe('2025-03-03');
  });

  it('drops fetched rows after the requested end date', async () => {
    const store = new MemoryPriceStore();
    const quotes = makeQuotes(series('AAPL', TODAY, 60));

    const result = await makeResolver(store, quotes).resolvePriceQuery({
      ticker: 'AAPL',
      days: 5,
      endDate: '2025-03-05',
      indicators: [],
    });

    expect(result.points.map((p) => p.date)).toEqual([
      '2025-03-01',
      '2025-03-02',
      '2025-03-03',
      '2025-03-04',
      '2025-03-05',
    ]);
    expect(store.snapshot('AAPL').at(-1)?.date).toBe('2025-03-05');
  });

  it('fetches enough history for a 200-session average and never extrapolates it', async () => {
    const store = new MemoryPriceStore({ rows: series('AAPL', TODAY, 150, (i) => i + 51) });
    const quotes = makeQuotes(series('AAPL', TODAY, 200, (i) => i + 1));

    const result = await makeResolver(store, quotes).resolvePriceQuery({
      ticker: 'AAPL',
      days: 200,
      indicators: [{ kind: 'sma', window: 200 }],
    });

    const minDays = quotes.fetchHistory.mock.calls[0][1];
    expect(minDays).toBeGreaterThanOrEqual(200);
    expect(result.points).toHaveLength(200);
    expect(result.points[198].indicators.ma_200).toBeNull();
    expect(result.points[199].indicators.ma_200).toBe(100.5);
  });

  it('computes a long window for every returned session when the store has the history', async () => {
    const store = new MemoryPriceStore({ rows: series('AAPL', TODAY, 400, (i) => i) });
    const quotes = makeQuotes();

    const result = await makeResolver(store, quotes).resolvePriceQuery({
      ticker: 'AAPL',
      days: 5,
      indicators: [{ kind: 'sma', window: 200 }],
    });

    expect(quotes.fetchHistory).not.toHaveBeenCalled();
    expect(result.points.map((p) => p.indicators.ma_200)).toEqual([295.5, 296.5, 297.5, 298.5, 299.5]);
  });

  it('never rewrites stored history when backfilling an end-date window', async () => {
    const store = new MemoryPriceStore({ rows: series('AAPL', TODAY, 100, () => 100) });
    const quotes = makeQuotes(series('AAPL', TODAY, 120, () => 999));

    const result = await makeResolver(store, quotes).resolvePriceQuery({
      ticker: 'AAPL',
      days: 60,
      endDate: '2025-01-10',
      indicators: [],
    });

    expect(result.provenance).toBe('live');
    expect(result.points).toHaveLength(60);
    expect(result.points[0]).toMatchObject({ date: '2024-11-12', close: 999 });
    expect(result.points[59]).toMatchObject({ date: '2025-01-10', close: 100 });

    const stored = store.snapshot('AAPL');
    expect(stored.find((r) => r.date === '2025-01-10')?.close).toBe(100);
    expect(stored.find((r) => r.date === '2024-11-30')?.close).toBe(999);
    expect(stored.find((r) => r.date === TODAY)?.close).toBe(100);
  });

  it('labels stored rows as stale when the provider has nothing for the window', async () => {
    const store = new MemoryPriceStore({ rows: series('AAPL', TODAY, 10) });
    const quotes = makeQuotes([]);

    const result = await makeResolver(store, quotes).resolvePriceQuery({ ticker: 'AAPL', days: 20, indicators: [] });

    expect(quotes.fetchHistory).toHaveBeenCalledTimes(1);
    expect(result.provenance).toBe('cached-stale');
    expect(result.decision).toBe('fetch-live-and-store');
    expect(result.persisted).toBeNull();
    expect(result.points).toHaveLength(10);
  });

  it('raises TickerNotFoundError for unknown tickers without calling the provider', async () => {
    const quotes = makeQuotes(series('ZZZZ', TODAY, 60));

    await expect(
      makeResolver(new MemoryPriceStore(), quotes).resolvePriceQuery({ ticker: 'ZZZZ', days: 5, indicators: [] }),
    ).rejects.toBeInstanceOf(TickerNotFoundError);
    expect(quotes.fetchHistory).not.toHaveBeenCalled();
  });

  it('falls back to the provider when the store cannot be read', async () => {
    const store: PriceStore = {
      readRange: vi.fn<PriceStore['readRange']>().mockRejectedValue(new StoreError('price', 'connection refused')),
      upsert: vi.fn<PriceStore['upsert']>().mockResolvedValue(undefined),
    };
    const quotes = makeQuotes(series('AAPL', TODAY, 60));

    const result = await makeResolver(store, quotes).resolvePriceQuery({ ticker: 'AAPL', days: 10, indicators: [] });

    expect(result.decision).toBe('fetch-live-fallback-on-store-failure');
    expect(result.provenance).toBe('live');
    expect(result.persisted).toBe(true);
    expect(result.points).toHaveLength(10);
  });

  it('returns live data with persisted=false when the write-through fails', async () => {
    const store: PriceStore = {
      readRange: vi.fn<PriceStore['readRange']>().mockResolvedValue([]),
      upsert: vi.fn<PriceStore['upsert']>().mockRejectedValue(new StoreError('price', 'disk full')),
    };
    const quotes = makeQuotes(series('AAPL', TODAY, 60));

    const result = await makeResolver(store, quotes).resolvePriceQuery({ ticker: 'AAPL', days: 10, indicators: [] });

    expect(result.provenance).toBe('live');
    expect(result.persisted).toBe(false);
    expect(result.latestClose).toBe(159);
  });

  it('serves stale rows when the provider fails', async () => {
    const store = new MemoryPriceStore({ rows: series('AAPL', TODAY, 5) });
    const quotes = makeQuotes();
    quotes.fetchHistory.mockRejectedValue(new UnreachableError('fake-quotes', 'connection reset'));

    const result = await makeResolver(store, quotes).resolvePriceQuery({ ticker: 'AAPL', days: 10, indicators: [] });

    expect(result.provenance).toBe('cached-stale');
    expect(result.points).toHaveLength(5);
    expect(result.persisted).toBeNull();
  });

  it('serves stale rows when the provider times out', async () => {
    const store = new MemoryPriceStore({ rows: series('AAPL', TODAY, 5) });
    const quotes = makeQuotes();
    quotes.fetchHistory.mockImplementation(() => new Promise(() => undefined));

    const result = await makeResolver(store, quotes, 20).resolvePriceQuery({ ticker: 'AAPL', days: 10, indicators: [] });

    expect(result.provenance).toBe('cached-stale');
  });

  it('raises UpstreamUnavailableError when nothing is stored and the provider fails', async () => {
    const quotes = makeQuotes();
    quotes.fetchHistory.mockRejectedValue(new RateLimitedError('fake-quotes'));

    await expect(
      makeResolver(new MemoryPriceStore(), quotes).resolvePriceQuery({ ticker: 'AAPL', days: 10, indicators: [] }),
    ).rejects.toBeInstanceOf(UpstreamUnavailableError);
  });

  it('raises UpstreamUnavailableError when the provider has no rows either', async () => {
    await expect(
      makeResolver(new MemoryPriceStore(), makeQuotes([])).resolvePriceQuery({ ticker: 'AAPL', days: 10, indicators: [] }),
    ).rejects.toBeInstanceOf(UpstreamUnavailableError);
  });

  it('rejects invalid queries', async () => {
    const resolver = makeResolver(new MemoryPriceStore(), makeQuotes());

    await expect(resolver.resolvePriceQuery({ ticker: ' ', days: 5, indicators: [] })).rejects.toBeInstanceOf(
      InvalidQueryError,
    );
    await expect(resolver.resolvePriceQuery({ ticker: 'AAPL', days: 0, indicators: [] })).rejects.toBeInstanceOf(
      InvalidQueryError,
    );
    await expect(
      resolver.resolvePriceQuery({ ticker: 'AAPL', days: 5, endDate: 'not-a-date', indicators: [] }),
    ).rejects.toBeInstanceOf(InvalidQueryError);
  });
});

describe('mergePriceRows', () => {
  const stored = [priceRow('AAPL', '2025-03-06', 9), priceRow('AAPL', '2025-03-07', 10)];
  const fetched = [
    priceRow('AAPL', '2025-03-05', 20),
    priceRow('AAPL', '2025-03-06', 21),
    priceRow('AAPL', '2025-03-07', 22),
    priceRow('AAPL', '2025-03-10', 23),
  ];

  it('keeps stored history and replaces sessions from the newest stored date on', () => {
    expect(mergePriceRows(stored, fetched, '2025-03-07').map((r) => [r.date, r.close])).toEqual([
      ['2025-03-05', 20],
      ['2025-03-06', 9],
      ['2025-03-07', 22],
      ['2025-03-10', 23],
    ]);
  });

  it('keeps every stored row without a replacement bound', () => {
    expect(mergePriceRows(stored, fetched).map((r) => [r.date, r.close])).toEqual([
      ['2025-03-05', 20],
      ['2025-03-06', 9],
      ['2025-03-07', 10],
      ['2025-03-10', 23],
    ]);
  });
});
