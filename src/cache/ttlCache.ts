/**
 * TTL Cache
 *
 * In-process store of normalized datasets, one entry per key, each with
 * its own TTL. Concurrent misses on a key share a single loader call.
 * When a refresh fails the previous entry is served as stale; only a
 * first-ever failure surfaces, as NoDataAvailableError.
 */

import { logger } from '../core/logger.js';
import { NoDataAvailableError, isRetryableError, toError } from '../errors/index.js';
import { deepFreeze } from '../util/freeze.js';

export type Loader<V> = () => Promise<V>;

export interface CacheResult<V> {
  value: V;
  /** True when the value is a fallback after a failed refresh */
  wasStale: boolean;
  fetchedAt: Date;
}

export interface CacheEntryInfo {
  fetchedAt: Date;
  ttlMs: number;
  isFresh: boolean;
}

export interface TtlCacheOptions {
  /** Clock in epoch milliseconds; defaults to Date.now */
  now?: () => number;
  /** Extra loader attempts on a cold miss for retryable failures */
  retryAttempts?: number;
  retryDelayMs?: number;
}

class CacheEntry<V> {
  constructor(
    readonly value: V,
    readonly fetchedAt: number,
    readonly ttlMs: number
  ) {}

  isFresh(now: number): boolean {
    return now - this.fetchedAt < this.ttlMs;
  }

  toResult(wasStale: boolean): CacheResult<V> {
    return { value: this.value, wasStale, fetchedAt: new Date(this.fetchedAt) };
  }
}

export class TtlCache<V> {
  private readonly entries = new Map<string, CacheEntry<V>>();
  private readonly inFlight = new Map<string, Promise<CacheResult<V>>>();
  private readonly now: () => number;
  private readonly retryAttempts: number;
  private readonly retryDelayMs: number;
  /** Bumped by clear() so refreshes started before it are not stored */
  private generation = 0;

  constructor(options: TtlCacheOptions = {}) {
    this.now = options.now ?? Date.now;
    this.retryAttempts = options.retryAttempts ?? 0;
    this.retryDelayMs = options.retryDelayMs ?? 0;
  }

  /**
   * Returns the entry for `key`, refreshing it through `loader` when absent or expired
   *
   * @throws NoDataAvailableError if the key has never loaded successfully and the loader fails
   */
  async getOrRefresh(key: string, ttlMs: number, loader: Loader<V>): Promise<CacheResult<V>> {
    const entry = this.entries.get(key);
    if (entry?.isFresh(this.now())) {
      logger.debug({ key }, 'cache hit');
      return entry.toResult(false);
    }

    const pending = this.inFlight.get(key);
    if (pending) {
      logger.debug({ key }, 'joining in-flight refresh');
      return pending;
    }

    const refresh: Promise<CacheResult<V>> = this.refresh(key, ttlMs, loader, entry).finally(() => {
      if (this.inFlight.get(key) === refresh) this.inFlight.delete(key);
    });
    this.inFlight.set(key, refresh);
    return refresh;
  }

  /**
   * Entry metadata without triggering a load
   */
  peek(key: string): CacheEntryInfo | undefined {
    const entry = this.entries.get(key);
    if (!entry) return undefined;
    return {
      fetchedAt: new Date(entry.fetchedAt),
      ttlMs: entry.ttlMs,
      isFresh: entry.isFresh(this.now())
    };
  }

  /**
   * Drops every entry; refreshes already running still resolve for their
   * callers but are not stored
   */
  clear(): void {
    this.entries.clear();
    this.inFlight.clear();
    this.generation++;
  }

  get size(): number {
    return this.entries.size;
  }

  private async refresh(
    key: string,
    ttlMs: number,
    loader: Loader<V>,
    previous: CacheEntry<V> | undefined
  ): Promise<CacheResult<V>> {
    logger.debug({ key, cold: previous === undefined }, 'refreshing cache entry');
    const generation = this.generation;
    try {
      const value = await this.load(key, loader, previous === undefined);
      const entry = new CacheEntry(deepFreeze(structuredClone(value)), this.now(), ttlMs);
      if (generation === this.generation) this.entries.set(key, entry);
      return entry.toResult(false);
    } catch (err) {
      const error = toError(err);
      if (previous) {
        logger.warn(
          { err: error, key, fetchedAt: new Date(previous.fetchedAt).toISOString() },
          'refresh failed, serving stale entry'
        );
        return previous.toResult(true);
      }
      logger.error({ err: error, key }, 'initial load failed, no data to fall back to');
      throw new NoDataAvailableError(key, error);
    }
  }

  private async load(key: string, loader: Loader<V>, cold: boolean): Promise<V> {
    const retries = cold ? this.retryAttempts : 0;

    for (let attempt = 0; ; attempt++) {
      try {
        return await loader();
      } catch (err) {
        if (attempt >= retries || !isRetryableError(err)) throw err;
        logger.warn({ err: toError(err), key, attempt: attempt + 1, maxRetries: retries }, 'load failed, retrying');
        await new Promise(resolve => setTimeout(resolve, this.retryDelayMs));
      }
    }
  }
}
