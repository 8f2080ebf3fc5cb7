/**
 * Terra aggregation API client
 *
 * Terra is keyed per developer (`dev-id` + `x-api-key`) and per connected
 * user (`user_id`), so it has no OAuth flow of its own.
 */

import { z } from 'zod';
import { ProviderError } from '@pierre/core';
import { HttpFitnessProvider, isoDate, type RequestOptions } from './http-provider.js';
import type { Activity, ActivityQueryParams, Athlete, DateRange, HealthMetrics, SleepSession } from '../types.js';

const dataEnvelope = <T extends z.ZodTypeAny>(item: T) => z.object({ data: z.array(item) });

const UserInfoSchema = z.object({
  user: z.object({ user_id: z.string(), provider: z.string().nullish(), reference_id: z.string().nullish() }),
});

const ActivitySchema = z.object({
  metadata: z.object({
    summary_id: z.string(),
    name: z.string().nullish(),
    type: z.union([z.string(), z.number()]).nullish(),
    start_time: z.string(),
    end_time: z.string(),
  }),
  distance_data: z.object({ summary: z.object({ distance_meters: z.number().nullish() }).nullish() }).nullish(),
  calories_data: z.object({ total_burned_calories: z.number().nullish() }).nullish(),
  heart_rate_data: z.object({ summary: z.object({ avg_hr_bpm: z.number().nullish() }).nullish() }).nullish(),
});

const SleepSchema = z.object({
  metadata: z.object({ start_time: z.string(), end_time: z.string() }),
  sleep_durations_data: z
    .object({
      asleep: z.object({ duration_asleep_state_seconds: z.number().nullish() }).nullish(),
      sleep_efficiency: z.number().nullish(),
    })
    .nullish(),
});

const DailySchema = z.object({
  metadata: z.object({ start_time: z.string() }),
  distance_data: z.object({ steps: z.number().nullish() }).nullish(),
  heart_rate_data: z.object({ summary: z.object({ resting_hr_bpm: z.number().nullish() }).nullish() }).nullish(),
});

const BodySchema = z.object({
  metadata: z.object({ start_time: z.string() }),
  measurements_data: z
    .object({ measurements: z.array(z.object({ weight_kg: z.number().nullish() })).nullish() })
    .nullish(),
});

export class TerraProvider extends HttpFitnessProvider {
  protected override authHeaders(): Record<string, string> {
    const { clientId, clientSecret } = this.credentials;
    if (!clientId || !clientSecret) {
      throw new ProviderError('terra developer credentials not configured', this.name, 'external_service');
    }
    return { 'dev-id': clientId, 'x-api-key': clientSecret };
  }

  private userQuery(extra: RequestOptions['query'] = {}): RequestOptions {
    const userId = this.credentials.externalUserId;
    if (!userId) {
      throw new ProviderError('terra user is not connected', this.name, 'auth_expired');
    }
    return { query: { user_id: userId, to_webhook: 'false', ...extra } };
  }

  private rangeQuery(range: DateRange): RequestOptions {
    return this.userQuery({ start_date: isoDate(range.start), end_date: isoDate(range.end) });
  }

  override async getAthlete(): Promise<Athlete> {
    const { user } = await this.request('/userInfo', UserInfoSchema, this.userQuery());
    return {
      id: user.user_id,
      provider: this.name,
      username: user.reference_id ?? null,
      firstname: null,
      lastname: null,
      profile_picture: null,
    };
  }

  override async getActivities(params: ActivityQueryParams = {}): Promise<Activity[]> {
    const window = this.activityWindow(params);
    const { data } = await this.request(
      '/activity',
      dataEnvelope(ActivitySchema),
      this.rangeQuery({ start: new Date(window.after * 1000), end: new Date(window.before * 1000) })
    );
    const activities = data
      .map<Activity>((entry) => ({
        id: entry.metadata.summary_id,
        provider: this.name,
        name: entry.metadata.name ?? 'Workout',
        sport_type: entry.metadata.type != null ? String(entry.metadata.type) : 'Workout',
        start_date: new Date(entry.metadata.start_time).toISOString(),
        duration_seconds: Math.round((Date.parse(entry.metadata.end_time) - Date.parse(entry.metadata.start_time)) / 1000),
        distance_meters: entry.distance_data?.summary?.distance_meters ?? null,
        elevation_gain_meters: null,
        average_heart_rate: entry.heart_rate_data?.summary?.avg_hr_bpm ?? null,
        calories: entry.calories_data?.total_burned_calories ?? null,
      }))
      .sort((a, b) => Date.parse(b.start_date) - Date.parse(a.start_date));
    return this.page(activities, params);
  }

  override async getSleepSessions(range: DateRange): Promise<SleepSession[]> {
    const { data } = await this.request('/sleep', dataEnvelope(SleepSchema), this.rangeQuery(range));
    return data.map((entry) => {
      const asleepSeconds = entry.sleep_durations_data?.asleep?.duration_asleep_state_seconds;
      return {
        id: entry.metadata.start_time,
        provider: this.name,
        start_time: entry.metadata.start_time,
        end_time: entry.metadata.end_time,
        duration_minutes:
          asleepSeconds != null
            ? Math.round(asleepSeconds / 60)
            : Math.round((Date.parse(entry.metadata.end_time) - Date.parse(entry.metadata.start_time)) / 60_000),
        efficiency: entry.sleep_durations_data?.sleep_efficiency ?? null,
      };
    });
  }

  override async getHealthMetrics(range: DateRange): Promise<HealthMetrics[]> {
    const [daily, body] = await Promise.all([
      this.request('/daily', dataEnvelope(DailySchema), this.rangeQuery(range)),
      this.request('/body', dataEnvelope(BodySchema), this.rangeQuery(range)),
    ]);

    const weights = new Map<string, number>();
    for (const entry of body.data) {
      const weight = entry.measurements_data?.measurements?.find((m) => m.weight_kg != null)?.weight_kg;
      if (weight != null) {
        weights.set(entry.metadata.start_time.slice(0, 10), weight);
      }
    }

    return daily.data.map((entry) => {
      const date = entry.metadata.start_time.slice(0, 10);
      return {
        date,
        provider: this.name,
        weight_kg: weights.get(date) ?? null,
        steps: entry.distance_data?.steps ?? null,
        resting_heart_rate: entry.heart_rate_data?.summary?.resting_hr_bpm ?? null,
      };
    });
  }
}
