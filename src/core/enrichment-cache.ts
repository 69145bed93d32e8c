/**
 * Enrichment cache - time-bounded, single-flight cache of external provider lookups
 */

import { isValidCvss } from './severity.js';
import { errorMessage } from './errors.js';
import { isObject, isStringArray } from './guards.js';
import type { EnrichmentFetcher, EnrichmentFragment } from './types.js';

export const DEFAULT_CACHE_TTL_MS = 24 * 60 * 60 * 1000; // 24 hours
export const DEFAULT_FETCH_TIMEOUT_MS = 10000;

export interface EnrichmentCacheEntry {
  id: string;
  fragment: EnrichmentFragment;
  fetchedAt: number;
  ttlMs: number;
}

export type EnrichmentStatus = 'fresh' | 'expired' | 'stale' | 'absent';

export interface EnrichmentLookup {
  id: string;
  // cached: served from a fresh entry, fetched: new provider response, unavailable: local data only
  source: 'cached' | 'fetched' | 'unavailable';
  fragment: EnrichmentFragment | null;
  error?: string;
}

export interface EnrichmentCacheOptions {
  ttlMs?: number;
  timeoutMs?: number;
  clock?: () => number;
  logger?: (message: string) => void;
}

export interface FetchOptions {
  bypass?: boolean;
}

class FetchTimeoutError extends Error {
  constructor(timeoutMs: number) {
    super(`Timeout after ${timeoutMs}ms`);
    this.name = 'FetchTimeoutError';
  }
}

/**
 * Validate a provider response; anything unexpected is treated as no response
 */
export function sanitizeFragment(value: unknown): EnrichmentFragment | null {
  if (!isObject(value)) {
    return null;
  }

  const fragment: EnrichmentFragment = {};

  if (value.numericScore !== undefined && value.numericScore !== null) {
    if (!isValidCvss(value.numericScore)) {
      return null;
    }
    fragment.numericScore = value.numericScore;
  }

  if (value.references !== undefined) {
    if (!isStringArray(value.references)) {
      return null;
    }
    fragment.references = value.references;
  }

  if (value.classification !== undefined) {
    if (typeof value.classification !== 'string') {
      return null;
    }
    fragment.classification = value.classification;
  }

  return fragment;
}

export class EnrichmentCache {
  private readonly entries = new Map<string, EnrichmentCacheEntry>();
  private readonly inflight = new Map<string, Promise<EnrichmentLookup>>();
  private readonly staleReasons = new Map<string, string>();

  private readonly ttlMs: number;
  private readonly timeoutMs: number;
  private readonly clock: () => number;
  private readonly logger: (message: string) => void;

  constructor(options: EnrichmentCacheOptions = {}) {
    this.ttlMs = options.ttlMs ?? DEFAULT_CACHE_TTL_MS;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_FETCH_TIMEOUT_MS;
    this.clock = options.clock ?? Date.now;
    this.logger = options.logger ?? console.warn;
  }

  get size(): number {
    return this.entries.size;
  }

  private isFresh(entry: EnrichmentCacheEntry): boolean {
    return this.clock() - entry.fetchedAt < entry.ttlMs;
  }

  /**
   * Fresh entry for an id; an expired one is evicted on sight
   */
  private freshEntry(id: string): EnrichmentCacheEntry | undefined {
    const entry = this.entries.get(id);
    if (entry && !this.isFresh(entry)) {
      this.entries.delete(id);
      return undefined;
    }
    return entry;
  }

  /**
   * Return a fresh cached fragment, or fetch one. Never rejects: a failed,
   * timed out or malformed fetch yields source "unavailable" and is not cached.
   * Concurrent callers for the same id share a single fetch.
   */
  fetchOrCached(id: string, fetchFn: EnrichmentFetcher, options: FetchOptions = {}): Promise<EnrichmentLookup> {
    const entry = this.freshEntry(id);
    if (entry && !options.bypass) {
      return Promise.resolve({ id, source: 'cached', fragment: entry.fragment });
    }

    const pending = this.inflight.get(id);
    if (pending) {
      return pending;
    }

    const lookup = this.fetchWithTimeout(id, fetchFn).finally(() => {
      this.inflight.delete(id);
    });
    this.inflight.set(id, lookup);
    return lookup;
  }

  private async fetchWithTimeout(id: string, fetchFn: EnrichmentFetcher): Promise<EnrichmentLookup> {
    const controller = new AbortController();
    let timeoutId: ReturnType<typeof setTimeout> | undefined;

    const timeout = new Promise<never>((_, reject) => {
      timeoutId = setTimeout(() => {
        // Reject first so the race settles with the timeout, not the abort
        reject(new FetchTimeoutError(this.timeoutMs));
        controller.abort();
      }, this.timeoutMs);
    });

    try {
      const response = await Promise.race([fetchFn(id, controller.signal), timeout]);
      const fragment = sanitizeFragment(response);

      if (!fragment) {
        return this.markStale(id, response === null ? 'no data from provider' : 'malformed provider response');
      }

      this.entries.set(id, { id, fragment, fetchedAt: this.clock(), ttlMs: this.ttlMs });
      this.staleReasons.delete(id);
      return { id, source: 'fetched', fragment };
    } catch (error) {
      return this.markStale(id, errorMessage(error));
    } finally {
      clearTimeout(timeoutId);
    }
  }

  private markStale(id: string, reason: string): EnrichmentLookup {
    this.staleReasons.set(id, reason);
    this.logger(`[posture-score] ${id}: stale - external data unavailable (${reason})`);
    return { id, source: 'unavailable', fragment: null, error: reason };
  }

  // Reports an expired entry without evicting it
  status(id: string): EnrichmentStatus {
    if (this.staleReasons.has(id)) {
      return 'stale';
    }
    const entry = this.entries.get(id);
    if (!entry) {
      return 'absent';
    }
    return this.isFresh(entry) ? 'fresh' : 'expired';
  }

  staleReason(id: string): string | undefined {
    return this.staleReasons.get(id);
  }

  peek(id: string): EnrichmentCacheEntry | undefined {
    return this.freshEntry(id);
  }

  /**
   * Drop every expired entry; returns how many were removed
   */
  prune(): number {
    let removed = 0;
    for (const [id, entry] of this.entries) {
      if (!this.isFresh(entry)) {
        this.entries.delete(id);
        removed++;
      }
    }
    return removed;
  }

  clear(): void {
    this.entries.clear();
    this.staleReasons.clear();
  }
}
