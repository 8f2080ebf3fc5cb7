/**
 * Cache Provider interface
 *
 * Values are stored serialized, so a caller never shares an object with the
 * cache. Backend failures reject; callers decide whether to swallow them.
 */

import type { CacheKey } from './keys.js';

export interface CacheStats {
  hits: number;
  misses: number;
  entries: number;
}

export interface CacheProvider {
  get<T>(key: CacheKey): Promise<T | null>;
  set<T>(key: CacheKey, value: T, ttlMs: number): Promise<void>;
  /** @returns true if an entry was removed */
  invalidate(key: CacheKey): Promise<boolean>;
  /** Remove every key matching a `*` glob; returns the count removed */
  invalidatePattern(pattern: string): Promise<number>;
  clear(): Promise<void>;
  stats(): CacheStats;
}
