import { InvalidQueryError } from '../errors.js';
import type { IndicatorSpec, PricePoint, PriceRecord } from '../types.js';
import { round2, round4 } from '../utils/normalize.js';

const TRADING_DAYS_PER_YEAR = 252;
const MAX_WINDOW = 500;

/** Windows the query surface offers by default. */
export const DEFAULT_INDICATORS: IndicatorSpec[] = [
  { kind: 'sma', window: 5 },
  { kind: 'sma', window: 20 },
  { kind: 'sma', window: 50 },
  { kind: 'sma', window: 200 },
];

export function indicatorKey(spec: IndicatorSpec): string {
  return spec.kind === 'sma' ? `ma_${spec.window}` : `rsi_${spec.window}`;
}

/**
 * Parse "ma_50" / "MA_200" / "rsi_14" into an IndicatorSpec.
 */
export function parseIndicator(key: string): IndicatorSpec {
  const match = /^(ma|sma|rsi)_(\d{1,3})$/i.exec(key.trim());
  if (!match) {
    throw new InvalidQueryError(`Unsupported indicator "${key}". Use ma_<window> or rsi_<window>.`);
  }
  const window = Number(match[2]);
  if (window < 1 || window > MAX_WINDOW) {
    throw new InvalidQueryError(`Indicator window must be between 1 and ${MAX_WINDOW}: ${key}`);
  }
  return { kind: match[1].toLowerCase() === 'rsi' ? 'rsi' : 'sma', window };
}

/**
 * Rows needed before the first non-null value. RSI works on close-to-close
 * differences, so it needs one row more than its window.
 */
export function requiredRows(spec: IndicatorSpec): number {
  return spec.kind === 'rsi' ? spec.window + 1 : spec.window;
}

/**
 * Trailing simple moving average. Position i is null until `window` values
 * (including i) are available.
 */
export function simpleMovingAverage(values: number[], window: number): (number | null)[] {
  const out: (number | null)[] = new Array(values.length).fill(null);
  if (window < 1) return out;
  let sum = 0;
  for (let i = 0; i < values.length; i++) {
    sum += values[i];
    if (i >= window) sum -= values[i - window];
    if (i >= window - 1) out[i] = round4(sum / window);
  }
  return out;
}

/**
 * RSI over simple averages of the last `window` gains and losses.
 * 100 when there were no losses, 50 for a flat window.
 */
export function relativeStrengthIndex(closes: number[], window: number): (number | null)[] {
  const out: (number | null)[] = new Array(closes.length).fill(null);
  if (window < 1) return out;
  for (let i = window; i < closes.length; i++) {
    let gains = 0;
    let losses = 0;
    for (let j = i - window + 1; j <= i; j++) {
      const delta = closes[j] - closes[j - 1];
      if (delta > 0) gains += delta;
      else losses -= delta;
    }
    if (losses === 0) {
      out[i] = gains === 0 ? 50 : 100;
      continue;
    }
    const rs = gains / window / (losses / window);
    out[i] = round2(100 - 100 / (1 + rs));
  }
  return out;
}

export function changePercent(closes: number[]): (number | null)[] {
  return closes.map((close, i) => {
    if (i === 0) return null;
    const prev = closes[i - 1];
    if (prev === 0) return null;
    return round4(((close - prev) / prev) * 100);
  });
}

/**
 * Annualized volatility (percent) of close-to-close returns, population variance.
 */
export function annualizedVolatility(closes: number[]): number | null {
  if (closes.length < 2) return null;
  const returns: number[] = [];
  for (let i = 1; i < closes.length; i++) {
    if (closes[i - 1] !== 0) returns.push((closes[i] - closes[i - 1]) / closes[i - 1]);
  }
  if (!returns.length) return null;
  const mean = returns.reduce((a, b) => a + b, 0) / returns.length;
  const variance = returns.reduce((a, r) => a + (r - mean) * (r - mean), 0) / returns.length;
  return round4(Math.sqrt(variance) * Math.sqrt(TRADING_DAYS_PER_YEAR) * 100);
}

/**
 * Decorate ascending rows with change % and the requested indicators.
 * Indicators never extrapolate: a row without enough history gets null.
 */
export function applyIndicators(rows: PriceRecord[], specs: IndicatorSpec[]): PricePoint[] {
  const closes = rows.map((r) => r.close);
  const changes = changePercent(closes);
  const series = specs.map((spec) => ({
    key: indicatorKey(spec),
    values:
      spec.kind === 'sma'
        ? simpleMovingAverage(closes, spec.window)
        : relativeStrengthIndex(closes, spec.window),
  }));

  return rows.map((row, i) => {
    const indicators: Record<string, number | null> = {};
    for (const s of series) indicators[s.key] = s.values[i];
    return { ...row, changePct: changes[i], indicators };
  });
}
