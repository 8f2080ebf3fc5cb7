/**
 * Caching Provider
 *
 * Cache-aside decorator over a FitnessProvider, scoped to one (tenant, user).
 * Reads take a policy:
 * - use_cache: serve a hit; on a miss call the provider and store the result
 * - bypass: call the provider, leave the cache untouched
 * - refresh: drop the entry, call the provider, store the result
 *
 * Provider errors propagate. Cache backend errors are logged and the call
 * falls through to the provider.
 */

import {
  CacheKey,
  activityListPattern,
  userProviderPattern,
  logger,
  type CacheProvider,
  type CacheResource,
  type CacheResourceKind,
} from '@pierre/core';
import type { ProviderName } from '@pierre/protocol';
import { DEFAULT_PAGE_SIZE } from './clients/http-provider.js';
import type {
  Activity,
  ActivityQueryParams,
  Athlete,
  DateRange,
  FitnessProvider,
  HealthMetrics,
  ProviderDescriptor,
  RecoveryMetrics,
  SleepSession,
  Stats,
} from './types.js';

export type CachePolicy = 'use_cache' | 'bypass' | 'refresh';

export const CACHE_POLICIES: readonly CachePolicy[] = ['use_cache', 'bypass', 'refresh'];

export function isCachePolicy(value: unknown): value is CachePolicy {
  return value === 'use_cache' || value === 'bypass' || value === 'refresh';
}

export type CacheTtlConfig = Record<CacheResourceKind, number>;

export const DEFAULT_CACHE_TTLS: CacheTtlConfig = {
  athlete_profile: 6 * 60 * 60 * 1000,
  stats: 15 * 60 * 1000,
  activity_list: 60 * 1000,
  activity: 24 * 60 * 60 * 1000,
};

export class CachingProvider implements FitnessProvider {
  readonly name: ProviderName;
  readonly descriptor: ProviderDescriptor;
  private readonly ttls: CacheTtlConfig;

  constructor(
    private readonly inner: FitnessProvider,
    private readonly cache: CacheProvider,
    readonly tenantId: string,
    readonly userId: string,
    ttls: Partial<CacheTtlConfig> = {}
  ) {
    this.name = inner.name;
    this.descriptor = inner.descriptor;
    this.ttls = { ...DEFAULT_CACHE_TTLS, ...ttls };
  }

  private key(resource: CacheResource): CacheKey {
    return new CacheKey(this.tenantId, this.userId, this.name, resource);
  }

  private async readCache<T>(key: CacheKey): Promise<T | null> {
    try {
      const cached = await this.cache.get<T>(key);
      logger.debug({ key: key.toString(), hit: cached !== null }, '[cache] Lookup');
      return cached;
    } catch (err) {
      logger.warn({ err, key: key.toString() }, '[cache] Read failed, falling back to provider');
      return null;
    }
  }

  private async writeCache<T>(key: CacheKey, value: T): Promise<void> {
    try {
      await this.cache.set(key, value, this.ttls[key.resource.kind]);
    } catch (err) {
      logger.warn({ err, key: key.toString() }, '[cache] Write failed');
    }
  }

  private async getOrFetch<T>(key: CacheKey, policy: CachePolicy, fetch: () => Promise<T>): Promise<T> {
    switch (policy) {
      case 'use_cache': {
        const cached = await this.readCache<T>(key);
        if (cached !== null) {
          return cached;
        }
        const fresh = await fetch();
        await this.writeCache(key, fresh);
        return fresh;
      }
      case 'bypass':
        logger.debug({ key: key.toString() }, '[cache] Bypass requested');
        return fetch();
      case 'refresh': {
        try {
          await this.cache.invalidate(key);
        } catch (err) {
          logger.warn({ err, key: key.toString() }, '[cache] Invalidate failed');
        }
        const fresh = await fetch();
        await this.writeCache(key, fresh);
        logger.info({ key: key.toString() }, '[cache] Entry refreshed');
        return fresh;
      }
    }
  }

  async getAthlete(policy: CachePolicy = 'use_cache'): Promise<Athlete> {
    return this.getOrFetch(this.key({ kind: 'athlete_profile' }), policy, () => this.inner.getAthlete());
  }

  async getActivities(params: ActivityQueryParams = {}, policy: CachePolicy = 'use_cache'): Promise<Activity[]> {
    const perPage = Math.max(params.limit ?? DEFAULT_PAGE_SIZE, 1);
    const offset = params.offset ?? 0;
    // Only page-aligned windows have a page key
    if (offset % perPage !== 0) {
      logger.debug({ offset, perPage }, '[cache] Unaligned activity window, not cached');
      return this.inner.getActivities(params);
    }
    const page = offset / perPage + 1;
    const key = this.key({ kind: 'activity_list', page, per_page: perPage, before: params.before, after: params.after });
    return this.getOrFetch(key, policy, () => this.inner.getActivities(params));
  }

  async getActivity(id: string, policy: CachePolicy = 'use_cache'): Promise<Activity> {
    return this.getOrFetch(this.key({ kind: 'activity', activity_id: id }), policy, () => this.inner.getActivity(id));
  }

  async getStats(policy: CachePolicy = 'use_cache'): Promise<Stats> {
    return this.getOrFetch(this.key({ kind: 'stats', athlete_id: this.userId }), policy, () => this.inner.getStats());
  }

  // Range queries are not cached: their keys would be unbounded

  async getSleepSessions(range: DateRange): Promise<SleepSession[]> {
    return this.inner.getSleepSessions(range);
  }

  async getRecoveryMetrics(range: DateRange): Promise<RecoveryMetrics[]> {
    return this.inner.getRecoveryMetrics(range);
  }

  async getHealthMetrics(range: DateRange): Promise<HealthMetrics[]> {
    return this.inner.getHealthMetrics(range);
  }

  /**
   * Drop every entry of this user at this provider
   */
  async invalidateUserCache(): Promise<number> {
    const pattern = userProviderPattern(this.tenantId, this.userId, this.name);
    const count = await this.cache.invalidatePattern(pattern);
    logger.info({ pattern, count }, '[cache] User cache invalidated');
    return count;
  }

  /**
   * Drop the activity-list pages of this user at this provider
   */
  async invalidateActivityListCache(): Promise<number> {
    const pattern = activityListPattern(this.tenantId, this.userId, this.name);
    const count = await this.cache.invalidatePattern(pattern);
    logger.info({ pattern, count }, '[cache] Activity list cache invalidated');
    return count;
  }
}
