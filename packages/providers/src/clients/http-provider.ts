/**
 * Base class for HTTP-backed provider clients
 *
 * Owns the request loop: bearer auth, query encoding, a bounded timeout,
 * response validation with zod and the mapping of upstream statuses onto
 * provider error kinds. Capabilities a subclass does not override reject
 * with `not_supported`.
 */

import { z } from 'zod';
import type { ProviderName } from '@pierre/protocol';
import { ProviderError, logger } from '@pierre/core';
import type {
  Activity,
  ActivityQueryParams,
  Athlete,
  DateRange,
  FitnessProvider,
  HealthMetrics,
  ProviderClientOptions,
  ProviderCredentials,
  ProviderDescriptor,
  RecoveryMetrics,
  SleepSession,
  Stats,
} from '../types.js';

export const DEFAULT_UPSTREAM_TIMEOUT_MS = 30_000;

/** Page size used when a caller gives none */
export const DEFAULT_PAGE_SIZE = 50;

/** Window used by APIs that need an explicit range when the caller gives none */
const DEFAULT_LOOKBACK_SECONDS = 30 * 24 * 60 * 60;

export type QueryValue = string | number | undefined;

export interface RequestOptions {
  query?: Record<string, QueryValue>;
  headers?: Record<string, string>;
}

/**
 * Map an upstream HTTP status to a provider error
 */
export function errorForStatus(provider: ProviderName, status: number): ProviderError {
  if (status === 401) {
    return new ProviderError(`${provider} rejected the access token`, provider, 'auth_expired', status);
  }
  if (status === 404) {
    return new ProviderError(`${provider} resource not found`, provider, 'not_found', status);
  }
  if (status === 429) {
    return new ProviderError(`${provider} rate limit exceeded`, provider, 'rate_limited', status);
  }
  return new ProviderError(`${provider} request failed with status ${status}`, provider, 'external_service', status);
}

export abstract class HttpFitnessProvider implements FitnessProvider {
  readonly name: ProviderName;
  protected readonly timeoutMs: number;

  constructor(
    readonly descriptor: ProviderDescriptor,
    protected readonly credentials: ProviderCredentials,
    options: ProviderClientOptions = {}
  ) {
    this.name = descriptor.name;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_UPSTREAM_TIMEOUT_MS;
  }

  protected authHeaders(): Record<string, string> {
    return { Authorization: `Bearer ${this.credentials.accessToken}` };
  }

  /**
   * GET a path under the API base URL and validate the JSON body
   */
  protected async request<S extends z.ZodTypeAny>(path: string, schema: S, options: RequestOptions = {}): Promise<z.output<S>> {
    const url = new URL(`${this.descriptor.apiBaseUrl}${path}`);
    for (const [key, value] of Object.entries(options.query ?? {})) {
      if (value !== undefined) {
        url.searchParams.set(key, String(value));
      }
    }

    const headers = { Accept: 'application/json', ...this.authHeaders(), ...options.headers };

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'GET',
        headers,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      const timedOut = err instanceof Error && err.name === 'TimeoutError';
      logger.warn({ provider: this.name, path, timedOut }, '[provider] Upstream request failed');
      throw new ProviderError(
        timedOut ? `${this.name} request timed out` : `${this.name} request failed`,
        this.name,
        'external_service'
      );
    }

    if (!response.ok) {
      logger.warn({ provider: this.name, path, status: response.status }, '[provider] Upstream returned an error');
      throw errorForStatus(this.name, response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new ProviderError(`${this.name} returned a non-JSON body`, this.name, 'external_service', response.status);
    }

    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      logger.warn({ provider: this.name, path, issues: parsed.error.issues.length }, '[provider] Unexpected response shape');
      throw new ProviderError(`${this.name} returned an unexpected response`, this.name, 'external_service', response.status);
    }
    return parsed.data;
  }

  protected notSupported(capability: string): ProviderError {
    return new ProviderError(`${this.descriptor.displayName} does not support ${capability}`, this.name, 'not_supported');
  }

  /**
   * Resolve the activity window for APIs that only take a date range
   */
  protected activityWindow(params: ActivityQueryParams, now: Date = new Date()): { after: number; before: number } {
    const before = params.before ?? Math.floor(now.getTime() / 1000);
    const after = params.after ?? before - DEFAULT_LOOKBACK_SECONDS;
    return { after, before };
  }

  /**
   * Apply offset/limit to a list the upstream returned in full
   */
  protected page<T>(items: T[], params: ActivityQueryParams): T[] {
    const offset = params.offset ?? 0;
    const limit = params.limit ?? DEFAULT_PAGE_SIZE;
    return items.slice(offset, offset + limit);
  }

  abstract getAthlete(): Promise<Athlete>;
  abstract getActivities(params?: ActivityQueryParams): Promise<Activity[]>;

  async getActivity(id: string): Promise<Activity> {
    const match = (await this.getActivities({ limit: 200 })).find((activity) => activity.id === id);
    if (!match) {
      throw new ProviderError(`${this.name} activity ${id} not found`, this.name, 'not_found');
    }
    return match;
  }

  /**
   * Totals over the most recent activities, for APIs without a stats endpoint
   */
  async getStats(): Promise<Stats> {
    const activities = await this.getActivities({ limit: 200 });
    return summarize(activities);
  }

  async getSleepSessions(_range: DateRange): Promise<SleepSession[]> {
    throw this.notSupported('sleep data');
  }

  async getRecoveryMetrics(_range: DateRange): Promise<RecoveryMetrics[]> {
    throw this.notSupported('recovery metrics');
  }

  async getHealthMetrics(_range: DateRange): Promise<HealthMetrics[]> {
    throw this.notSupported('health metrics');
  }
}

export function summarize(activities: Activity[]): Stats {
  return activities.reduce<Stats>(
    (totals, activity) => ({
      total_activities: totals.total_activities + 1,
      total_distance_meters: totals.total_distance_meters + (activity.distance_meters ?? 0),
      total_duration_seconds: totals.total_duration_seconds + activity.duration_seconds,
      total_elevation_gain_meters: totals.total_elevation_gain_meters + (activity.elevation_gain_meters ?? 0),
    }),
    { total_activities: 0, total_distance_meters: 0, total_duration_seconds: 0, total_elevation_gain_meters: 0 }
  );
}

/** YYYY-MM-DD in UTC */
export function isoDate(date: Date): string {
  return date.toISOString().slice(0, 10);
}

export function unixToIso(seconds: number): string {
  return new Date(seconds * 1000).toISOString();
}
