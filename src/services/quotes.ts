import axios from 'axios';
import { z } from 'zod';
import { getConfig } from '../config.js';
import { TickerNotFoundError, UnreachableError } from '../errors.js';
import { logger } from '../logger.js';
import type { PriceRecord } from '../types.js';
import { normalizeDate } from '../utils/date.js';
import { toProviderError } from './providerErrors.js';

/**
 * Quote Provider contract: daily history for one ticker.
 */
export interface QuoteProvider {
  readonly name: string;
  /** At least `minDays` most recent sessions when the provider has them, ascending. */
  fetchHistory(ticker: string, minDays: number, opts?: { signal?: AbortSignal }): Promise<PriceRecord[]>;
}

const nullableNumbers = z.array(z.number().nullable());

/**
 * Subset of the Yahoo Finance v8 chart payload we rely on.
 */
const ChartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          meta: z.object({ symbol: z.string() }).passthrough(),
          timestamp: z.array(z.number()).optional(),
          indicators: z.object({
            quote: z
              .array(
                z.object({
                  open: nullableNumbers.optional(),
                  high: nullableNumbers.optional(),
                  low: nullableNumbers.optional(),
                  close: nullableNumbers.optional(),
                  volume: nullableNumbers.optional(),
                }),
              )
              .min(1),
            adjclose: z.array(z.object({ adjclose: nullableNumbers.optional() })).optional(),
          }),
        }),
      )
      .nullable(),
    error: z.object({ code: z.string(), description: z.string().nullable().optional() }).nullable().optional(),
  }),
});

export type ChartResponse = z.infer<typeof ChartResponseSchema>;

/** Chart ranges and the trading sessions they roughly cover. */
const RANGES: ReadonlyArray<[range: string, sessions: number]> = [
  ['1mo', 20],
  ['3mo', 62],
  ['6mo', 125],
  ['1y', 250],
  ['2y', 500],
  ['5y', 1255],
  ['10y', 2510],
];

export function rangeForSessions(minDays: number): string {
  const match = RANGES.find(([, sessions]) => sessions >= minDays);
  return match ? match[0] : 'max';
}

/**
 * Map a chart payload to ascending PriceRecords. Sessions without a close are skipped.
 */
export function mapChartResponse(ticker: string, payload: ChartResponse): PriceRecord[] {
  const result = payload.chart.result?.[0];
  if (!result) return [];
  const timestamps = result.timestamp ?? [];
  const quote = result.indicators.quote[0];
  const adj = result.indicators.adjclose?.[0]?.adjclose ?? [];

  const rows: PriceRecord[] = [];
  timestamps.forEach((ts, i) => {
    const close = quote.close?.[i];
    if (close == null) return;
    rows.push({
      ticker,
      date: normalizeDate(new Date(ts * 1000)),
      open: quote.open?.[i] ?? close,
      high: quote.high?.[i] ?? close,
      low: quote.low?.[i] ?? close,
      close,
      adjClose: adj[i] ?? null,
      volume: quote.volume?.[i] ?? 0,
    });
  });

  // The live session can appear twice around the close; keep the last print per date.
  const byDate = new Map(rows.map((r) => [r.date, r]));
  return Array.from(byDate.values()).sort((a, b) => a.date.localeCompare(b.date));
}

export class YahooChartClient implements QuoteProvider {
  readonly name = 'yahoo-chart';
  private axios: ReturnType<typeof axios.create>;
  private readonly log = logger.child({ provider: 'yahoo-chart' });

  constructor(baseURL = getConfig().quoteApiBaseUrl, timeoutMs = getConfig().providerTimeoutMs) {
    this.axios = axios.create({
      baseURL,
      timeout: timeoutMs,
      headers: { 'User-Agent': 'market-pulse/0.1' },
    });
  }

  async fetchHistory(ticker: string, minDays: number, opts: { signal?: AbortSignal } = {}): Promise<PriceRecord[]> {
    const range = rangeForSessions(minDays);
    const reqPath = `chart/${encodeURIComponent(ticker)}`;
    this.log.debug({ ticker, range, minDays }, 'GET %s', reqPath);

    let data: unknown;
    try {
      const response = await this.axios.get<unknown>(reqPath, {
        params: { range, interval: '1d', events: 'div,split' },
        signal: opts.signal,
      });
      data = response.data;
    } catch (err) {
      if (axios.isAxiosError(err) && err.response?.status === 404) {
        throw new TickerNotFoundError(ticker);
      }
      throw toProviderError(this.name, err);
    }

    const parsed = ChartResponseSchema.safeParse(data);
    if (!parsed.success) {
      throw new UnreachableError(this.name, `Unexpected chart payload for ${ticker}`, { cause: parsed.error });
    }
    if (parsed.data.chart.error) {
      const { code, description } = parsed.data.chart.error;
      if (code === 'Not Found') throw new TickerNotFoundError(ticker);
      throw new UnreachableError(this.name, `${code}: ${description ?? 'chart error'}`);
    }

    const rows = mapChartResponse(ticker, parsed.data);
    this.log.debug({ ticker, rows: rows.length }, 'Chart rows fetched');
    return rows;
  }
}
