import { describe, it, expect, vi } from 'vitest';
import { EnrichmentCache, sanitizeFragment } from '../../src/core/enrichment-cache.js';
import type { EnrichmentFetcher, EnrichmentFragment } from '../../src/core/types.js';

const fragment: EnrichmentFragment = {
  numericScore: 9.8,
  references: ['https://nvd.example.com/CVE-TEST-0001'],
  classification: 'CWE-79',
};

function createCache(options: { ttlMs?: number; timeoutMs?: number } = {}) {
  let time = 0;
  const logger = vi.fn();
  const cache = new EnrichmentCache({ clock: () => time, logger, ...options });
  return {
    cache,
    logger,
    advance: (ms: number) => {
      time += ms;
    },
  };
}

describe('sanitizeFragment', () => {
  it('should accept well-formed fragments', () => {
    expect(sanitizeFragment(fragment)).toEqual(fragment);
    expect(sanitizeFragment({})).toEqual({});
  });

  it('should reject malformed fragments', () => {
    expect(sanitizeFragment(null)).toBeNull();
    expect(sanitizeFragment([])).toBeNull();
    expect(sanitizeFragment({ numericScore: 42 })).toBeNull();
    expect(sanitizeFragment({ references: 'https://nvd.example.com' })).toBeNull();
    expect(sanitizeFragment({ classification: 79 })).toBeNull();
  });
});

describe('EnrichmentCache', () => {
  it('should fetch once and serve fresh entries from the cache', async () => {
    const { cache } = createCache();
    const fetcher = vi.fn<EnrichmentFetcher>(async () => fragment);

    const first = await cache.fetchOrCached('CVE-TEST-0001', fetcher);
    const second = await cache.fetchOrCached('CVE-TEST-0001', fetcher);

    expect(first).toEqual({ id: 'CVE-TEST-0001', source: 'fetched', fragment });
    expect(second).toEqual({ id: 'CVE-TEST-0001', source: 'cached', fragment });
    expect(fetcher).toHaveBeenCalledTimes(1);
    expect(cache.status('CVE-TEST-0001')).toBe('fresh');
    expect(cache.size).toBe(1);
  });

  it('should refetch after the entry expires', async () => {
    const { cache, advance } = createCache({ ttlMs: 1000 });
    const fetcher = vi.fn<EnrichmentFetcher>(async () => fragment);

    await cache.fetchOrCached('CVE-TEST-0001', fetcher);
    advance(999);
    expect(cache.status('CVE-TEST-0001')).toBe('fresh');

    advance(1);
    expect(cache.status('CVE-TEST-0001')).toBe('expired');
    expect(cache.peek('CVE-TEST-0001')).toBeUndefined();
    expect(cache.status('CVE-TEST-0001')).toBe('absent');

    const lookup = await cache.fetchOrCached('CVE-TEST-0001', fetcher);
    expect(lookup.source).toBe('fetched');
    expect(fetcher).toHaveBeenCalledTimes(2);
  });

  it('should evict an expired entry even when the refetch fails', async () => {
    const { cache, advance } = createCache({ ttlMs: 1000 });

    await cache.fetchOrCached('CVE-TEST-0001', async () => fragment);
    expect(cache.size).toBe(1);

    advance(1000);
    const lookup = await cache.fetchOrCached('CVE-TEST-0001', async () => {
      throw new Error('NVD API returned 503');
    });

    expect(lookup.source).toBe('unavailable');
    expect(cache.size).toBe(0);
    expect(cache.status('CVE-TEST-0001')).toBe('stale');
  });

  it('should prune only expired entries', async () => {
    const { cache, advance } = createCache({ ttlMs: 1000 });

    await cache.fetchOrCached('CVE-TEST-0001', async () => fragment);
    advance(600);
    await cache.fetchOrCached('CVE-TEST-0002', async () => fragment);
    advance(400);

    expect(cache.prune()).toBe(1);
    expect(cache.size).toBe(1);
    expect(cache.status('CVE-TEST-0001')).toBe('absent');
    expect(cache.status('CVE-TEST-0002')).toBe('fresh');
  });

  it('should share one fetch between concurrent callers', async () => {
    const { cache } = createCache();
    let release: (value: EnrichmentFragment) => void = () => undefined;
    const fetcher = vi.fn<EnrichmentFetcher>(() => new Promise(resolve => {
      release = resolve;
    }));

    const first = cache.fetchOrCached('CVE-TEST-0001', fetcher);
    const second = cache.fetchOrCached('CVE-TEST-0001', fetcher);
    release(fragment);

    const results = await Promise.all([first, second]);
    expect(fetcher).toHaveBeenCalledTimes(1);
    expect(results[0]).toEqual(results[1]);
    expect(results[0].source).toBe('fetched');
  });

  it('should degrade to local data when the provider times out', async () => {
    const { cache, logger } = createCache({ timeoutMs: 20 });
    let aborted = false;
    const fetcher: EnrichmentFetcher = (_id, signal) => new Promise((_, reject) => {
      signal.addEventListener('abort', () => {
        aborted = true;
        reject(new Error('aborted'));
      });
    });

    const lookup = await cache.fetchOrCached('CVE-TEST-0001', fetcher);

    expect(lookup).toEqual({
      id: 'CVE-TEST-0001',
      source: 'unavailable',
      fragment: null,
      error: 'Timeout after 20ms',
    });
    expect(aborted).toBe(true);
    expect(cache.status('CVE-TEST-0001')).toBe('stale');
    expect(cache.size).toBe(0);
    expect(logger).toHaveBeenCalledWith(
      '[posture-score] CVE-TEST-0001: stale - external data unavailable (Timeout after 20ms)'
    );
  });

  it('should not cache failures', async () => {
    const { cache } = createCache();
    const fetcher = vi.fn<EnrichmentFetcher>()
      .mockRejectedValueOnce(new Error('NVD API returned 503'))
      .mockResolvedValueOnce(fragment);

    const failed = await cache.fetchOrCached('CVE-TEST-0001', fetcher);
    expect(failed.source).toBe('unavailable');
    expect(failed.error).toBe('NVD API returned 503');
    expect(cache.staleReason('CVE-TEST-0001')).toBe('NVD API returned 503');

    const recovered = await cache.fetchOrCached('CVE-TEST-0001', fetcher);
    expect(recovered.source).toBe('fetched');
    expect(cache.status('CVE-TEST-0001')).toBe('fresh');
    expect(cache.staleReason('CVE-TEST-0001')).toBeUndefined();
  });

  it('should treat malformed and empty responses as unavailable', async () => {
    const { cache } = createCache();

    const malformed = await cache.fetchOrCached('CVE-TEST-0001', async () => ({ numericScore: 42 }));
    expect(malformed.error).toBe('malformed provider response');

    const empty = await cache.fetchOrCached('CVE-TEST-0002', async () => null);
    expect(empty.error).toBe('no data from provider');
    expect(cache.size).toBe(0);
  });

  it('should bypass fresh entries on request', async () => {
    const { cache } = createCache();
    const fetcher = vi.fn<EnrichmentFetcher>(async () => fragment);

    await cache.fetchOrCached('CVE-TEST-0001', fetcher);
    const refreshed = await cache.fetchOrCached('CVE-TEST-0001', fetcher, { bypass: true });

    expect(refreshed.source).toBe('fetched');
    expect(fetcher).toHaveBeenCalledTimes(2);
  });

  it('should forget everything on clear', async () => {
    const { cache } = createCache();
    await cache.fetchOrCached('CVE-TEST-0001', async () => fragment);

    cache.clear();
    expect(cache.status('CVE-TEST-0001')).toBe('absent');
    expect(cache.size).toBe(0);
  });
});
