/**
 * Cache entry model shared by every cache tier.
 */

export interface CacheEntry {
  /** Normalized key (resource type + canonical query). */
  key: string;
  value: unknown;
  createdAt: number;
  lastAccessedAt: number;
  /** Epoch milliseconds after which the entry is treated as absent. */
  expiresAt: number;
}

export function isExpired(entry: CacheEntry, now: number): boolean {
  return now > entry.expiresAt;
}
