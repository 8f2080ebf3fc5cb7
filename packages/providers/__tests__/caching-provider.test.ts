import { describe, it, expect, beforeEach } from 'vitest';
import { CacheKey, MemoryCache, type CacheProvider, type CacheStats } from '@pierre/core';
import {
  CachingProvider,
  PROVIDER_DESCRIPTORS,
  summarize,
  type Activity,
  type ActivityQueryParams,
  type Athlete,
  type FitnessProvider,
  type HealthMetrics,
  type RecoveryMetrics,
  type SleepSession,
  type Stats,
} from '../src/index.js';

/**
 * In-process provider that names each athlete after the call count
 */
class CountingProvider implements FitnessProvider {
  readonly name = 'strava' as const;
  readonly descriptor = PROVIDER_DESCRIPTORS.strava;
  athleteCalls = 0;
  activityCalls: ActivityQueryParams[] = [];
  fail = false;

  async getAthlete(): Promise<Athlete> {
    this.athleteCalls++;
    if (this.fail) {
      throw new Error('upstream down');
    }
    return {
      id: '42',
      provider: 'strava',
      username: `version-${this.athleteCalls}`,
      firstname: null,
      lastname: null,
      profile_picture: null,
    };
  }

  async getActivities(params: ActivityQueryParams = {}): Promise<Activity[]> {
    this.activityCalls.push(params);
    return [
      {
        id: String(this.activityCalls.length),
        provider: 'strava',
        name: 'Run',
        sport_type: 'Run',
        start_date: '2026-03-01T07:00:00Z',
        duration_seconds: 600,
        distance_meters: 2000,
        elevation_gain_meters: null,
        average_heart_rate: null,
        calories: null,
      },
    ];
  }

  async getActivity(id: string): Promise<Activity> {
    const [activity] = await this.getActivities();
    if (!activity) {
      throw new Error('no activity');
    }
    return { ...activity, id };
  }

  async getStats(): Promise<Stats> {
    return summarize(await this.getActivities());
  }

  async getSleepSessions(): Promise<SleepSession[]> {
    return [];
  }

  async getRecoveryMetrics(): Promise<RecoveryMetrics[]> {
    return [];
  }

  async getHealthMetrics(): Promise<HealthMetrics[]> {
    return [];
  }
}

/**
 * Provider that numbers activities by their position in the full history
 */
class SlicingProvider extends CountingProvider {
  override async getActivities(params: ActivityQueryParams = {}): Promise<Activity[]> {
    const [template] = await super.getActivities(params);
    if (!template) {
      throw new Error('no activity');
    }
    const offset = params.offset ?? 0;
    return Array.from({ length: params.limit ?? 1 }, (_, i) => ({ ...template, id: String(offset + i) }));
  }
}

/**
 * Cache backend whose every operation rejects
 */
class BrokenCache implements CacheProvider {
  async get<T>(_key: CacheKey): Promise<T | null> {
    throw new Error('cache offline');
  }
  async set<T>(_key: CacheKey, _value: T, _ttlMs: number): Promise<void> {
    throw new Error('cache offline');
  }
  async invalidate(_key: CacheKey): Promise<boolean> {
    throw new Error('cache offline');
  }
  async invalidatePattern(_pattern: string): Promise<number> {
    throw new Error('cache offline');
  }
  async clear(): Promise<void> {}
  stats(): CacheStats {
    return { hits: 0, misses: 0, entries: 0 };
  }
}

describe('CachingProvider', () => {
  let inner: CountingProvider;
  let cache: MemoryCache;
  let provider: CachingProvider;

  beforeEach(() => {
    inner = new CountingProvider();
    cache = new MemoryCache();
    provider = new CachingProvider(inner, cache, 't1', 'u1');
  });

  it('should serve a second use_cache read from the cache', async () => {
    const first = await provider.getAthlete();
    const second = await provider.getAthlete();

    expect(first.username).toBe('version-1');
    expect(second).toEqual(first);
    expect(inner.athleteCalls).toBe(1);
  });

  it('should leave the cached value alone on bypass and replace it on refresh', async () => {
    const a = await provider.getAthlete('use_cache');
    const b = await provider.getAthlete('bypass');
    expect(a.username).toBe('version-1');
    expect(b.username).toBe('version-2');
    expect((await provider.getAthlete('use_cache')).username).toBe('version-1');

    const c = await provider.getAthlete('refresh');
    expect(c.username).toBe('version-3');
    expect((await provider.getAthlete('use_cache')).username).toBe('version-3');
    expect(inner.athleteCalls).toBe(3);
  });

  it('should key activity pages by page and per_page', async () => {
    await provider.getActivities({ limit: 50 });
    await provider.getActivities({ limit: 50, offset: 0 });
    await provider.getActivities({ limit: 50, offset: 50 });

    expect(inner.activityCalls).toHaveLength(2);
    const page2 = new CacheKey('t1', 'u1', 'strava', { kind: 'activity_list', page: 2, per_page: 50 });
    expect(await cache.get<Activity[]>(page2)).toHaveLength(1);
  });

  it('should not serve an aligned page for a window that starts mid-page', async () => {
    const slicing = new SlicingProvider();
    const cached = new CachingProvider(slicing, cache, 't1', 'u1');

    const first = await cached.getActivities({ limit: 50, offset: 0 });
    const shifted = await cached.getActivities({ limit: 50, offset: 10 });
    const again = await cached.getActivities({ limit: 50, offset: 10 });

    expect(first[0]?.id).toBe('0');
    expect(shifted[0]?.id).toBe('10');
    expect(again[0]?.id).toBe('10');
    expect(slicing.activityCalls).toHaveLength(3);
    expect(cache.stats().entries).toBe(1);
  });

  it('should return no cached data after the user cache is invalidated', async () => {
    await provider.getAthlete();
    await provider.getActivities();
    await provider.getActivity('a1');

    expect(await provider.invalidateUserCache()).toBe(3);
    expect((await provider.getAthlete()).username).toBe('version-2');
  });

  it('should only drop activity pages on a list invalidation', async () => {
    await provider.getAthlete();
    await provider.getActivities({ limit: 10 });
    await provider.getActivities({ limit: 10, offset: 10 });

    expect(await provider.invalidateActivityListCache()).toBe(2);
    expect(cache.stats().entries).toBe(1);
  });

  it('should propagate provider errors without caching them', async () => {
    inner.fail = true;
    await expect(provider.getAthlete()).rejects.toThrow('upstream down');
    inner.fail = false;
    expect((await provider.getAthlete()).username).toBe('version-2');
  });

  it('should fall through to the provider when the cache backend fails', async () => {
    const degraded = new CachingProvider(inner, new BrokenCache(), 't1', 'u1');

    expect((await degraded.getAthlete()).username).toBe('version-1');
    expect((await degraded.getAthlete('refresh')).username).toBe('version-2');
    expect(inner.athleteCalls).toBe(2);
  });
});
