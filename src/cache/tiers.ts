/**
 * Cache tiers. A tier only stores entries; expiry and backfill policy
 * live in ResultCache.
 */

import { CacheEntry } from '../domain/cache';
import { CacheEntryStore } from '../storage/store';

export interface CacheTier {
  readonly name: string;
  get(key: string): Promise<CacheEntry | null>;
  set(entry: CacheEntry): Promise<void>;
  delete(key: string): Promise<void>;
  clear(): Promise<void>;
}

export interface MemoryCacheTierOptions {
  maxEntries?: number;
  now?: () => number;
}

/**
 * In-process tier bounded by `maxEntries`. Map insertion order doubles as
 * access order, so the first key is always the least recently accessed.
 */
export class MemoryCacheTier implements CacheTier {
  readonly name = 'memory';
  private entries = new Map<string, CacheEntry>();
  private maxEntries: number;
  private now: () => number;

  constructor(options: MemoryCacheTierOptions = {}) {
    this.maxEntries = Math.max(1, options.maxEntries ?? 1000);
    this.now = options.now ?? Date.now;
  }

  async get(key: string): Promise<CacheEntry | null> {
    const entry = this.entries.get(key);
    if (!entry) return null;
    const touched: CacheEntry = { ...entry, lastAccessedAt: this.now() };
    this.entries.delete(key);
    this.entries.set(key, touched);
    return structuredClone(touched);
  }

  async set(entry: CacheEntry): Promise<void> {
    this.entries.delete(entry.key);
    this.entries.set(entry.key, structuredClone(entry));
    while (this.entries.size > this.maxEntries) {
      const oldest = this.entries.keys().next();
      if (oldest.done) break;
      this.entries.delete(oldest.value);
    }
  }

  async delete(key: string): Promise<void> {
    this.entries.delete(key);
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  get size(): number {
    return this.entries.size;
  }
}

/** Durable tier backed by the application store. */
export class StoreCacheTier implements CacheTier {
  readonly name = 'store';

  constructor(private store: CacheEntryStore) {}

  async get(key: string): Promise<CacheEntry | null> {
    return this.store.get(key);
  }

  async set(entry: CacheEntry): Promise<void> {
    await this.store.set(entry);
  }

  async delete(key: string): Promise<void> {
    await this.store.delete(key);
  }

  async clear(): Promise<void> {
    await this.store.clear();
  }
}
