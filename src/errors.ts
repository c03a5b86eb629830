export class MarketDataError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

export class InvalidQueryError extends MarketDataError {
  constructor(
    message: string,
    public readonly details?: unknown,
  ) {
    super(message);
  }
}

/** Unknown ticker. Never retried and never forwarded to a provider. */
export class TickerNotFoundError extends MarketDataError {
  constructor(public readonly ticker: string) {
    super(`Unknown ticker: ${ticker}`);
  }
}

export class StoreError extends MarketDataError {
  constructor(
    public readonly store: 'price' | 'news',
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class ProviderError extends MarketDataError {
  constructor(
    public readonly provider: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class RateLimitedError extends ProviderError {
  constructor(
    provider: string,
    message = `${provider} rate limit reached`,
    public readonly retryAfterSeconds?: number,
  ) {
    super(provider, message);
  }
}

export class UnreachableError extends ProviderError {}

export class ProviderTimeoutError extends UnreachableError {
  constructor(
    provider: string,
    public readonly timeoutMs: number,
  ) {
    super(provider, `${provider} did not answer within ${timeoutMs}ms`);
  }
}

/** No cached rows and no live data for a price query. */
export class UpstreamUnavailableError extends MarketDataError {
  constructor(
    public readonly ticker: string,
    options?: { cause?: unknown },
  ) {
    super(`No price data available for ${ticker}: store is empty and the quote provider failed`, options);
  }
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
