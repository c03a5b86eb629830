import { describe, expect, it } from 'vitest';
import { TtlResponseCache } from '../src/services/responseCache.js';

function makeCache(opts: { ttlSeconds?: number; maxEntries?: number } = {}) {
  const clock = { now: 1_000 };
  const cache = new TtlResponseCache<string>({
    ttlSeconds: opts.ttlSeconds ?? 60,
    maxEntries: opts.maxEntries ?? 10,
    now: () => clock.now,
  });
  return { cache, clock };
}

describe('TtlResponseCache', () => {
  it('returns values until they expire', () => {
    const { cache, clock } = makeCache();
    cache.set('a', 'one');

    clock.now += 59_999;
    expect(cache.get('a')).toBe('one');

    clock.now += 1;
    expect(cache.get('a')).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it('evicts the oldest entry when full', () => {
    const { cache } = makeCache({ maxEntries: 2 });
    cache.set('a', 'one');
    cache.set('b', 'two');
    cache.set('c', 'three');

    expect(cache.get('a')).toBeUndefined();
    expect(cache.get('b')).toBe('two');
    expect(cache.get('c')).toBe('three');
  });

  it('invalidates every entry carrying a tag', () => {
    const { cache } = makeCache();
    cache.set('price:AAPL:20', 'x', ['price:AAPL']);
    cache.set('price:AAPL:50', 'y', ['price:AAPL']);
    cache.set('price:MSFT:20', 'z', ['price:MSFT']);

    expect(cache.invalidateTag('price:AAPL')).toBe(2);
    expect(cache.get('price:AAPL:20')).toBeUndefined();
    expect(cache.get('price:MSFT:20')).toBe('z');
  });

  it('stores nothing when the ttl is zero', () => {
    const { cache } = makeCache({ ttlSeconds: 0 });
    cache.set('a', 'one');

    expect(cache.enabled).toBe(false);
    expect(cache.get('a')).toBeUndefined();
  });

  it('tracks hits and misses', () => {
    const { cache } = makeCache();
    cache.set('a', 'one');
    cache.get('a');
    cache.get('b');
    cache.clear();

    expect(cache.stats()).toEqual({ size: 0, hits: 1, misses: 1 });
  });
});
