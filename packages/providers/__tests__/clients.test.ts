import { describe, it, expect, vi, afterEach } from 'vitest';
import { ProviderError } from '@pierre/core';
import { ProviderRegistry } from '../src/index.js';

type FetchInput = string | URL | Request;

function stubFetch(status: number, body: unknown) {
  const fetchMock = vi.fn(async (_input: FetchInput, _init?: RequestInit) =>
    new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })
  );
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function calledUrl(fetchMock: ReturnType<typeof stubFetch>, index = 0): URL {
  const input = fetchMock.mock.calls[index]?.[0];
  return new URL(String(input));
}

function calledHeaders(fetchMock: ReturnType<typeof stubFetch>, index = 0): Record<string, string> {
  const headers = fetchMock.mock.calls[index]?.[1]?.headers;
  return headers && !(headers instanceof Headers) && !Array.isArray(headers) ? headers : {};
}

const registry = new ProviderRegistry();

describe('StravaProvider', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should page with per_page/page and map activities', async () => {
    const fetchMock = stubFetch(200, [
      {
        id: 101,
        name: 'Morning Run',
        sport_type: 'Run',
        start_date: '2026-03-01T07:00:00Z',
        elapsed_time: 1800,
        distance: 5000,
        total_elevation_gain: 40,
        average_heartrate: 150,
      },
    ]);

    const strava = registry.createProvider('strava', { accessToken: 'test-token' });
    const activities = await strava.getActivities({ limit: 10, offset: 20 });

    const url = calledUrl(fetchMock);
    expect(url.origin + url.pathname).toBe('https://www.strava.com/api/v3/athlete/activities');
    expect(url.searchParams.get('per_page')).toBe('10');
    expect(url.searchParams.get('page')).toBe('3');
    expect(url.searchParams.has('before')).toBe(false);
    expect(calledHeaders(fetchMock).Authorization).toBe('Bearer test-token');

    expect(activities).toEqual([
      {
        id: '101',
        provider: 'strava',
        name: 'Morning Run',
        sport_type: 'Run',
        start_date: '2026-03-01T07:00:00Z',
        duration_seconds: 1800,
        distance_meters: 5000,
        elevation_gain_meters: 40,
        average_heart_rate: 150,
        calories: null,
      },
    ]);
  });

  it.each([
    [401, 'auth_expired'],
    [404, 'not_found'],
    [429, 'rate_limited'],
    [503, 'external_service'],
  ])('should map upstream status %i to %s', async (status, kind) => {
    stubFetch(status, { message: 'error' });
    const strava = registry.createProvider('strava', { accessToken: 'test-token' });

    const error = await strava.getAthlete().catch((err: unknown) => err);
    expect(error).toBeInstanceOf(ProviderError);
    expect(error).toMatchObject({ kind, provider: 'strava', upstreamStatus: status });
  });

  it('should reject a response that does not match the expected shape', async () => {
    stubFetch(200, { unexpected: true });
    const strava = registry.createProvider('strava', { accessToken: 'test-token' });
    await expect(strava.getAthlete()).rejects.toThrow('strava returned an unexpected response');
  });

  it('should reject unsupported capabilities without calling upstream', async () => {
    const fetchMock = stubFetch(200, {});
    const strava = registry.createProvider('strava', { accessToken: 'test-token' });

    const error = await strava
      .getSleepSessions({ start: new Date('2026-03-01'), end: new Date('2026-03-07') })
      .catch((err: unknown) => err);
    expect(error).toMatchObject({ kind: 'not_supported', message: 'Strava does not support sleep data' });
    expect(fetchMock).not.toHaveBeenCalled();
  });

  it('should report network failures as external_service', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      })
    );
    const strava = registry.createProvider('strava', { accessToken: 'test-token' });
    await expect(strava.getAthlete()).rejects.toMatchObject({ kind: 'external_service', message: 'strava request failed' });
  });

  it('should sum run, ride and swim totals for stats', async () => {
    const totals = (count: number, distance: number) => ({ count, distance, elapsed_time: count * 100, elevation_gain: 10 });
    const fetchMock = vi
      .fn(async (_input: FetchInput, _init?: RequestInit) => new Response('{}'))
      .mockResolvedValueOnce(new Response(JSON.stringify({ id: 7 })))
      .mockResolvedValueOnce(
        new Response(
          JSON.stringify({ all_run_totals: totals(2, 1000), all_ride_totals: totals(1, 20000), all_swim_totals: totals(0, 0) })
        )
      );
    vi.stubGlobal('fetch', fetchMock);

    const stats = await registry.createProvider('strava', { accessToken: 'test-token' }).getStats();
    expect(new URL(String(fetchMock.mock.calls[1]?.[0])).pathname).toBe('/api/v3/athletes/7/stats');
    expect(stats).toEqual({
      total_activities: 3,
      total_distance_meters: 21000,
      total_duration_seconds: 300,
      total_elevation_gain_meters: 30,
    });
  });
});

describe('other providers', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should read whoop recovery records', async () => {
    const fetchMock = stubFetch(200, {
      records: [{ created_at: '2026-03-02T06:00:00.000Z', score: { recovery_score: 71, hrv_rmssd_milli: 55.5, resting_heart_rate: 48 } }],
    });
    const whoop = registry.createProvider('whoop', { accessToken: 'test-token' });

    const metrics = await whoop.getRecoveryMetrics({
      start: new Date('2026-03-01T00:00:00.000Z'),
      end: new Date('2026-03-03T00:00:00.000Z'),
    });

    expect(calledUrl(fetchMock).searchParams.get('start')).toBe('2026-03-01T00:00:00.000Z');
    expect(metrics).toEqual([
      { date: '2026-03-02', provider: 'whoop', recovery_score: 71, hrv_ms: 55.5, resting_heart_rate: 48 },
    ]);
  });

  it('should send coros credentials as query parameters and check the result code', async () => {
    const fetchMock = stubFetch(200, { result: '5001', message: 'token invalid' });
    const coros = registry.createProvider('coros', { accessToken: 'test-token', externalUserId: 'open-1' });

    await expect(coros.getAthlete()).rejects.toThrow('coros returned result 5001');
    const url = calledUrl(fetchMock);
    expect(url.searchParams.get('token')).toBe('test-token');
    expect(url.searchParams.get('openId')).toBe('open-1');
    expect(calledHeaders(fetchMock).Authorization).toBeUndefined();
  });

  it('should send terra developer headers and the connected user id', async () => {
    const fetchMock = stubFetch(200, { user: { user_id: 'terra-user', reference_id: 'ref-1' } });
    const terra = registry.createProvider('terra', {
      accessToken: '',
      clientId: 'dev-test',
      clientSecret: 'test-secret',
      externalUserId: 'terra-user',
    });

    const athlete = await terra.getAthlete();
    expect(athlete.id).toBe('terra-user');
    expect(calledUrl(fetchMock).searchParams.get('user_id')).toBe('terra-user');
    expect(calledHeaders(fetchMock)['dev-id']).toBe('dev-test');
    expect(calledHeaders(fetchMock)['x-api-key']).toBe('test-secret');
  });

  it('should page garmin activities newest first', async () => {
    stubFetch(200, [
      { summaryId: 'a', activityType: 'RUNNING', startTimeInSeconds: 100, durationInSeconds: 60 },
      { summaryId: 'b', activityType: 'CYCLING', startTimeInSeconds: 300, durationInSeconds: 60 },
      { summaryId: 'c', activityType: 'WALKING', startTimeInSeconds: 200, durationInSeconds: 60 },
    ]);
    const garmin = registry.createProvider('garmin', { accessToken: 'test-token' });

    const activities = await garmin.getActivities({ limit: 2, offset: 1, after: 0, before: 1000 });
    expect(activities.map((a) => a.id)).toEqual(['c', 'a']);
    expect(activities[0]?.start_date).toBe('1970-01-01T00:03:20.000Z');
  });
});
