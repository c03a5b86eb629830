/**
 * Generic normalization and string helpers.
 * These utilities are used across indicators, sentiment, and data shaping.
 */

/**
 * Clamp a numeric value to [min, max].
 */
export function clamp(value: number, min: number, max: number): number {
  if (Number.isNaN(value)) return min;
  return Math.max(min, Math.min(max, value));
}

/**
 * Round a number to 2 decimal places. Returns a number (not string).
 */
export function round2(n: number): number {
  return Math.round(n * 100) / 100;
}

export function round4(n: number): number {
  return Math.round(n * 10_000) / 10_000;
}

/**
 * Canonical ticker form used for store keys, cache keys and provider calls.
 */
export function normalizeTicker(ticker: string): string {
  return ticker.trim().toUpperCase();
}

export function isTickerSymbol(ticker: string): boolean {
  return /^[A-Z0-9^][A-Z0-9.^=-]{0,11}$/.test(ticker);
}

/**
 * Lowercase + trim for lexicon and relevance matching.
 */
export function normalizeText(text: string): string {
  return (text || '').toLowerCase().trim();
}
