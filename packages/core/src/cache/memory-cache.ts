/**
 * In-process cache backed by lru-cache, with a TTL per entry
 */

import { LRUCache } from 'lru-cache';
import type { CacheProvider, CacheStats } from './provider.js';
import { globToRegExp, type CacheKey } from './keys.js';
import { logger } from '../utils/logger.js';

export interface MemoryCacheOptions {
  /** Maximum number of entries before LRU eviction (default 10,000) */
  maxEntries?: number;
}

export class MemoryCache implements CacheProvider {
  private readonly entries: LRUCache<string, string>;
  private hits = 0;
  private misses = 0;

  constructor(options: MemoryCacheOptions = {}) {
    this.entries = new LRUCache<string, string>({ max: options.maxEntries ?? 10000 });
  }

  async get<T>(key: CacheKey): Promise<T | null> {
    const raw = this.entries.get(key.toString());
    if (raw === undefined) {
      this.misses++;
      return null;
    }
    this.hits++;
    const value: T = JSON.parse(raw);
    return value;
  }

  async set<T>(key: CacheKey, value: T, ttlMs: number): Promise<void> {
    const serialized = JSON.stringify(value);
    if (serialized === undefined) {
      return;
    }
    this.entries.set(key.toString(), serialized, { ttl: ttlMs });
  }

  async invalidate(key: CacheKey): Promise<boolean> {
    return this.entries.delete(key.toString());
  }

  async invalidatePattern(pattern: string): Promise<number> {
    const matcher = globToRegExp(pattern);
    const doomed = [...this.entries.keys()].filter((k) => matcher.test(k));
    for (const key of doomed) {
      this.entries.delete(key);
    }
    if (doomed.length > 0) {
      logger.debug({ pattern, count: doomed.length }, '[cache] Pattern invalidated');
    }
    return doomed.length;
  }

  async clear(): Promise<void> {
    this.entries.clear();
  }

  stats(): CacheStats {
    return { hits: this.hits, misses: this.misses, entries: this.entries.size };
  }
}
