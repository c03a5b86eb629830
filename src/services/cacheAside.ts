import { describeError, ProviderError } from '../errors.js';
import { logger as rootLogger, type Logger } from '../logger.js';
import type { FetchDecision, Resolution } from '../types.js';
import { withTimeout } from '../utils/timeout.js';

/**
 * Database-first resolution shared by the price and news domains:
 * read the store, serve it when the policy says it is sufficient, otherwise
 * call the provider once, merge, and write the fetched records back best-effort.
 */

export interface CacheAsideStore<K, R> {
  read(key: K): Promise<R[]>;
  write(records: R[], key: K): Promise<void>;
}

export interface FetchContext<R> {
  /** Records the store returned for this key (empty when the read failed). */
  cached: R[];
  signal: AbortSignal;
}

export interface CacheAsideProvider<K, R> {
  readonly name: string;
  fetch(key: K, ctx: FetchContext<R>): Promise<R[]>;
}

export interface CacheAsidePolicy<K, R> {
  /** Store read errors that must reach the caller instead of degrading to a live fetch. */
  isTerminalReadError(err: unknown): boolean;
  /** Subset of the stored records young enough to count toward sufficiency. */
  fresh(cached: R[], key: K): R[];
  isSufficient(fresh: R[], key: K): boolean;
  merge(cached: R[], fetched: R[], key: K): R[];
}

export interface CacheAsideOptions {
  timeoutMs: number;
  logger?: Logger;
}

export interface ResolveOptions {
  /** Serve whatever the store holds and never call the provider. */
  storeOnly?: boolean;
}

export class CacheAsideResolver<K, R> {
  private readonly log: Logger;

  constructor(
    private readonly store: CacheAsideStore<K, R>,
    private readonly provider: CacheAsideProvider<K, R>,
    private readonly policy: CacheAsidePolicy<K, R>,
    private readonly options: CacheAsideOptions,
  ) {
    this.log = (options.logger ?? rootLogger).child({ component: 'cache-aside', provider: provider.name });
  }

  async resolve(key: K, opts: ResolveOptions = {}): Promise<Resolution<R>> {
    let cached: R[] = [];
    let storeFailed = false;
    try {
      cached = await this.store.read(key);
    } catch (err) {
      if (this.policy.isTerminalReadError(err)) throw err;
      storeFailed = true;
      this.log.warn({ err }, 'Store read failed, degrading to live fetch');
    }

    if (opts.storeOnly) {
      return {
        records: cached,
        provenance: storeFailed ? 'unavailable' : 'cached',
        decision: 'serve-cached',
        persisted: null,
      };
    }

    if (!storeFailed) {
      const fresh = this.policy.fresh(cached, key);
      if (this.policy.isSufficient(fresh, key)) {
        return { records: fresh, provenance: 'cached', decision: 'serve-cached', persisted: null };
      }
    }

    const decision: FetchDecision = storeFailed
      ? 'fetch-live-fallback-on-store-failure'
      : 'fetch-live-and-store';

    let fetched: R[];
    try {
      fetched = await withTimeout(this.provider.name, this.options.timeoutMs, (signal) =>
        this.provider.fetch(key, { cached, signal }),
      );
    } catch (err) {
      if (!(err instanceof ProviderError)) throw err;
      this.log.warn({ err: describeError(err), cachedRecords: cached.length }, 'Live fetch failed');
      return this.degrade(cached, decision);
    }

    // Nothing usable came back, so whatever is served did not come from the provider.
    if (!fetched.length) {
      this.log.warn({ cachedRecords: cached.length }, 'Live fetch returned no records');
      return this.degrade(cached, decision);
    }

    const records = this.policy.merge(cached, fetched, key);
    const persisted = await this.writeThrough(fetched, key);

    return { records, provenance: 'live', decision, persisted };
  }

  private degrade(cached: R[], decision: FetchDecision): Resolution<R> {
    return cached.length
      ? { records: cached, provenance: 'cached-stale', decision, persisted: null }
      : { records: [], provenance: 'unavailable', decision, persisted: null };
  }

  private async writeThrough(records: R[], key: K): Promise<boolean> {
    try {
      await this.store.write(records, key);
      return true;
    } catch (err) {
      // Advisory only; the fetched data is still returned.
      this.log.warn({ err, records: records.length }, 'Write-through failed');
      return false;
    }
  }
}
