/**
 * Client-side request budget for rate-limited providers.
 * Tracks request counts in-memory (per-process); caps that are omitted never throttle.
 */

export interface BudgetOptions {
  dailyRequestsCap?: number;
  perSecondCap?: number;
  // time provider for testing
  now?: () => number; // ms epoch
}

export interface BudgetState {
  perSecond: { cap?: number; windowStart: number; windowCount: number };
  daily: { cap?: number; dayKey?: string; dayCount: number };
}

const SECOND_WINDOW_MS = 1000;

export class BudgetManager {
  private readonly dailyRequestsCap?: number;
  private readonly perSecondCap?: number;
  private readonly now: () => number;

  private dayKey?: string;
  private dayCount = 0;

  private windowStart = 0;
  private windowCount = 0;

  constructor(opts: BudgetOptions = {}) {
    this.dailyRequestsCap = opts.dailyRequestsCap;
    this.perSecondCap = opts.perSecondCap;
    this.now = opts.now ?? (() => Date.now());
  }

  /**
   * Whether a new request should be throttled right now given per-second and daily caps.
   * Does not mutate counters (use recordRequest for that).
   */
  shouldThrottle(): boolean {
    const now = this.now();

    if (
      this.perSecondCap != null &&
      now - this.windowStart < SECOND_WINDOW_MS &&
      this.windowCount >= this.perSecondCap
    ) {
      return true;
    }

    if (this.dailyRequestsCap != null) {
      const todayCount = this.dayKey === this.formatDayKey(now) ? this.dayCount : 0;
      if (todayCount >= this.dailyRequestsCap) return true;
    }

    return false;
  }

  /**
   * Record N requests just made (default 1). Updates per-second and daily windows.
   */
  recordRequest(count = 1): void {
    const now = this.now();

    if (now - this.windowStart >= SECOND_WINDOW_MS) {
      this.windowStart = now;
      this.windowCount = 0;
    }
    this.windowCount += count;

    const todayKey = this.formatDayKey(now);
    if (this.dayKey !== todayKey) {
      this.dayKey = todayKey;
      this.dayCount = 0;
    }
    this.dayCount += count;
  }

  getState(): BudgetState {
    return {
      perSecond: {
        cap: this.perSecondCap,
        windowStart: this.windowStart,
        windowCount: this.windowCount,
      },
      daily: {
        cap: this.dailyRequestsCap,
        dayKey: this.dayKey,
        dayCount: this.dayCount,
      },
    };
  }

  private formatDayKey(ms: number): string {
    return new Date(ms).toISOString().slice(0, 10);
  }
}
