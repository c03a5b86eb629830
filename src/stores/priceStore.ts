import { promises as fs } from 'node:fs';
import path from 'node:path';
import { fileURLToPath } from 'node:url';
import pg from 'pg';
import { StoreError, TickerNotFoundError } from '../errors.js';
import type { Company, PriceRecord, SessionWindow } from '../types.js';

/**
 * Structured Store contract: per (ticker, trading date) price rows.
 */
export interface PriceStore {
  /**
   * Last `window.sessions` rows dated on or before `window.end`, ascending by date.
   * Throws TickerNotFoundError for tickers outside the company table, StoreError otherwise.
   */
  readRange(ticker: string, window: SessionWindow): Promise<PriceRecord[]>;
  /**
   * Idempotent per (ticker, date). A row dated before the ticker's newest stored date is
   * history and is never updated (first write wins); rows on or after it overwrite.
   */
  upsert(rows: PriceRecord[]): Promise<void>;
}

const __dirname = path.dirname(fileURLToPath(import.meta.url));
// src/stores or dist/stores -> project root
const SCHEMA_PATH = path.resolve(__dirname, '..', '..', 'sql', 'schema.sql');

const UPSERT_CHUNK = 500;
const COLUMNS_PER_ROW = 8;

type PriceRow = {
  company: string;
  date: string | null;
  open: number | null;
  high: number | null;
  low: number | null;
  close: number | null;
  adj_close: number | null;
  volume: string | null;
};

export class PgPriceStore implements PriceStore {
  constructor(private readonly pool: pg.Pool) {}

  static fromUri(uri: string): PgPriceStore {
    return new PgPriceStore(new pg.Pool({ connectionString: uri, max: 10 }));
  }

  /**
   * Apply sql/schema.sql and make sure every tracked company exists.
   */
  async ensureSchema(companies: readonly Company[]): Promise<void> {
    const ddl = await fs.readFile(SCHEMA_PATH, 'utf-8');
    try {
      await this.pool.query(ddl);
      for (const c of companies) {
        await this.pool.query(
          `INSERT INTO companies (ticker, company_name, sector) VALUES ($1, $2, $3)
           ON CONFLICT (ticker) DO NOTHING`,
          [c.ticker, c.name, c.sector],
        );
      }
    } catch (err) {
      throw new StoreError('price', 'Failed to apply price store schema', { cause: err });
    }
  }

  async readRange(ticker: string, window: SessionWindow): Promise<PriceRecord[]> {
    let rows: PriceRow[];
    try {
      // One round trip: zero rows means unknown company, a row with null date means no prices yet.
      const result = await this.pool.query<PriceRow>(
        `SELECT c.ticker AS company,
                to_char(p.trade_date, 'YYYY-MM-DD') AS date,
                p.open, p.high, p.low, p.close, p.adj_close, p.volume
           FROM companies c
           LEFT JOIN LATERAL (
             SELECT trade_date, open, high, low, close, adj_close, volume
               FROM price_history
              WHERE ticker = c.ticker AND trade_date <= $2::date
              ORDER BY trade_date DESC
              LIMIT $3
           ) p ON true
          WHERE c.ticker = $1`,
        [ticker, window.end, window.sessions],
      );
      rows = result.rows;
    } catch (err) {
      throw new StoreError('price', `Price read failed for ${ticker}`, { cause: err });
    }

    if (!rows.length) throw new TickerNotFoundError(ticker);

    const records: PriceRecord[] = [];
    for (const row of rows) {
      if (row.date === null || row.close === null) continue;
      records.push({
        ticker,
        date: row.date,
        open: row.open ?? row.close,
        high: row.high ?? row.close,
        low: row.low ?? row.close,
        close: row.close,
        adjClose: row.adj_close,
        volume: Number(row.volume ?? 0),
      });
    }
    return records.reverse();
  }

  async upsert(rows: PriceRecord[]): Promise<void> {
    if (!rows.length) return;
    try {
      for (let i = 0; i < rows.length; i += UPSERT_CHUNK) {
        await this.upsertChunk(rows.slice(i, i + UPSERT_CHUNK));
      }
    } catch (err) {
      throw new StoreError('price', `Price upsert failed for ${rows.length} rows`, { cause: err });
    }
  }

  private async upsertChunk(rows: PriceRecord[]): Promise<void> {
    const values: unknown[] = [];
    const tuples = rows.map((row, idx) => {
      const base = idx * COLUMNS_PER_ROW + 1;
      values.push(row.ticker, row.date, row.open, row.high, row.low, row.close, row.adjClose, row.volume);
      const params = Array.from({ length: COLUMNS_PER_ROW }, (_, k) => `$${base + k}`);
      return `(${params.join(', ')})`;
    });

    // The subquery sees the table as of statement start, so rows inserted by this
    // batch do not move the ticker's newest date.
    await this.pool.query(
      `INSERT INTO price_history (ticker, trade_date, open, high, low, close, adj_close, volume)
       VALUES ${tuples.join(', ')}
       ON CONFLICT (ticker, trade_date) DO UPDATE
          SET open = EXCLUDED.open,
              high = EXCLUDED.high,
              low = EXCLUDED.low,
              close = EXCLUDED.close,
              adj_close = EXCLUDED.adj_close,
              volume = EXCLUDED.volume,
              updated_at = now()
        WHERE price_history.trade_date >= (
          SELECT max(newest.trade_date) FROM price_history newest WHERE newest.ticker = EXCLUDED.ticker
        )`,
      values,
    );
  }

  async close(): Promise<void> {
    await this.pool.end();
  }
}
