import * as chrono from 'chrono-node';

const MS_PER_DAY = 24 * 60 * 60 * 1000;
const MS_PER_HOUR = 60 * 60 * 1000;

/**
 * Normalize a Date or date-like string to YYYY-MM-DD in UTC.
 */
export function normalizeDate(input: Date | string): string {
  const d = input instanceof Date ? input : new Date(input);
  if (Number.isNaN(d.getTime())) {
    throw new Error(`Invalid date: ${input}`);
  }
  const year = d.getUTCFullYear();
  const month = String(d.getUTCMonth() + 1).padStart(2, '0');
  const day = String(d.getUTCDate()).padStart(2, '0');
  return `${year}-${month}-${day}`;
}

/**
 * Parse a natural language input into YYYY-MM-DD (UTC) using chrono-node.
 * Examples: "yesterday", "last Friday", "2025-02-11"
 */
export function parseDateNL(input: string, now: Date = new Date()): string {
  if (/^\d{4}-(?:0[1-9]|1[0-2])-(?:0[1-9]|[12]\d|3[01])$/.test(input)) {
    return input;
  }
  const parsed = chrono.parseDate(input, now, { forwardDate: false });
  if (!parsed) {
    throw new Error(
      'Could not understand the date input. Try "yesterday", "last Friday", or a specific date like 2025-02-11.',
    );
  }
  return normalizeDate(parsed);
}

/**
 * Whole calendar days from `from` to `to` (both YYYY-MM-DD). Negative when `to` is earlier.
 */
export function daysBetween(from: string, to: string): number {
  const a = Date.parse(`${from}T00:00:00Z`);
  const b = Date.parse(`${to}T00:00:00Z`);
  return Math.round((b - a) / MS_PER_DAY);
}

export function addDays(date: string, days: number): string {
  const d = new Date(`${date}T00:00:00Z`);
  d.setUTCDate(d.getUTCDate() + days);
  return normalizeDate(d);
}

export function hoursBefore(now: Date, hours: number): Date {
  return new Date(now.getTime() - hours * MS_PER_HOUR);
}

export function daysBefore(now: Date, days: number): Date {
  return new Date(now.getTime() - days * MS_PER_DAY);
}
