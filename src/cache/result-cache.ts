/**
 * Result Cache: memoizes expensive external lookups across tiers.
 *
 * Tiers are ordered fastest first. Reads fall through the tiers and
 * backfill the faster ones on a hit; writes go to every tier. A tier that
 * throws is logged and skipped: a cache failure never fails the caller.
 */

import { z } from 'zod';
import { CacheEntry, isExpired } from '../domain/cache';
import { Logger, errorContext, logger as rootLogger } from '../logger';
import { CacheTier } from './tiers';

export interface CacheHit {
  value: unknown;
  /** Name of the tier that answered. */
  tier: string;
}

export interface ResultCacheOptions {
  now?: () => number;
  logger?: Logger;
}

export class ResultCache {
  private now: () => number;
  private log: Logger;

  constructor(
    private tiers: CacheTier[],
    options: ResultCacheOptions = {},
  ) {
    this.now = options.now ?? Date.now;
    this.log = (options.logger ?? rootLogger).child({ component: 'result-cache' });
  }

  async get(key: string): Promise<CacheHit | null> {
    const now = this.now();
    for (let i = 0; i < this.tiers.length; i++) {
      const tier = this.tiers[i];
      let entry: CacheEntry | null;
      try {
        entry = await tier.get(key);
      } catch (err) {
        this.log.warn('Cache tier read failed', { tier: tier.name, key, ...errorContext(err) });
        continue;
      }
      if (!entry) continue;
      if (isExpired(entry, now)) {
        await this.safely(tier, 'delete', () => tier.delete(key));
        continue;
      }
      const backfill: CacheEntry = { ...entry, lastAccessedAt: now };
      for (const faster of this.tiers.slice(0, i)) {
        await this.safely(faster, 'backfill', () => faster.set(backfill));
      }
      this.log.debug('Cache hit', { tier: tier.name, key });
      return { value: entry.value, tier: tier.name };
    }
    this.log.debug('Cache miss', { key });
    return null;
  }

  /** Write through every tier. */
  async set(key: string, value: unknown, ttlMs: number): Promise<void> {
    const now = this.now();
    const entry: CacheEntry = {
      key,
      value,
      createdAt: now,
      lastAccessedAt: now,
      expiresAt: now + ttlMs,
    };
    for (const tier of this.tiers) {
      await this.safely(tier, 'write', () => tier.set(entry));
    }
  }

  async delete(key: string): Promise<void> {
    for (const tier of this.tiers) {
      await this.safely(tier, 'delete', () => tier.delete(key));
    }
  }

  async clear(): Promise<void> {
    for (const tier of this.tiers) {
      await this.safely(tier, 'clear', () => tier.clear());
    }
  }

  /**
   * Return the cached value when present and valid under `schema`,
   * otherwise call `loader` and cache its result. Loader errors propagate
   * and nothing is cached.
   */
  async getOrLoad<T>(
    key: string,
    ttlMs: number,
    schema: z.ZodType<T, z.ZodTypeDef, unknown>,
    loader: () => Promise<T>,
  ): Promise<T> {
    const hit = await this.get(key);
    if (hit) {
      const parsed = schema.safeParse(hit.value);
      if (parsed.success) return parsed.data;
      this.log.warn('Cached value failed validation, reloading', {
        key,
        tier: hit.tier,
        issues: parsed.error.issues.map((issue) => issue.message),
      });
    }
    const value = await loader();
    await this.set(key, value, ttlMs);
    return value;
  }

  private async safely(tier: CacheTier, operation: string, fn: () => Promise<void>): Promise<void> {
    try {
      await fn();
    } catch (err) {
      this.log.warn(`Cache tier ${operation} failed`, { tier: tier.name, ...errorContext(err) });
    }
  }
}
