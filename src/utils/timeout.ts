import { ProviderTimeoutError } from '../errors.js';

/**
 * Run a provider call with an abort signal that fires after `timeoutMs`.
 * On expiry the call is aborted and the returned promise rejects with ProviderTimeoutError.
 */
export async function withTimeout<T>(
  provider: string,
  timeoutMs: number,
  call: (signal: AbortSignal) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const expired = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      // Reject first so the race settles on the timeout, not on the call's abort error.
      reject(new ProviderTimeoutError(provider, timeoutMs));
      controller.abort();
    }, timeoutMs);
  });

  try {
    return await Promise.race([call(controller.signal), expired]);
  } finally {
    clearTimeout(timer);
  }
}
