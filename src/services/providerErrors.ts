import axios from 'axios';
import { ProviderError, RateLimitedError, UnreachableError } from '../errors.js';

function retryAfter(value: unknown): number | undefined {
  const n = Number(value);
  return Number.isFinite(n) && n > 0 ? n : undefined;
}

/**
 * Translate an HTTP client failure into the provider error taxonomy.
 * 429 is a rate-limit signal; everything else (network, 5xx, aborted) is unreachable.
 */
export function toProviderError(provider: string, err: unknown): ProviderError {
  if (err instanceof ProviderError) return err;
  if (axios.isAxiosError(err)) {
    const status = err.response?.status;
    if (status === 429) {
      return new RateLimitedError(provider, `${provider} answered 429`, retryAfter(err.response?.headers['retry-after']));
    }
    const detail = status ? `status=${status}` : (err.code ?? 'network error');
    return new UnreachableError(provider, `${provider} request failed: ${detail} ${err.message}`, { cause: err });
  }
  return new UnreachableError(provider, `${provider} request failed: ${String(err)}`, { cause: err });
}
