/**
 * Fitbit Web API client
 */

import { z } from 'zod';
import { HttpFitnessProvider, DEFAULT_PAGE_SIZE, isoDate } from './http-provider.js';
import type { Activity, ActivityQueryParams, Athlete, DateRange, HealthMetrics, SleepSession } from '../types.js';

const ProfileSchema = z.object({
  user: z.object({
    encodedId: z.string(),
    displayName: z.string().nullish(),
    firstName: z.string().nullish(),
    lastName: z.string().nullish(),
    avatar: z.string().nullish(),
  }),
});

const ActivityLogSchema = z.object({
  logId: z.number(),
  activityName: z.string(),
  startTime: z.string(),
  /** milliseconds */
  duration: z.number(),
  /** kilometres */
  distance: z.number().nullish(),
  calories: z.number().nullish(),
  averageHeartRate: z.number().nullish(),
  elevationGain: z.number().nullish(),
});

const ActivityListSchema = z.object({ activities: z.array(ActivityLogSchema) });

const SleepSchema = z.object({
  sleep: z.array(
    z.object({
      logId: z.number(),
      startTime: z.string(),
      endTime: z.string(),
      minutesAsleep: z.number(),
      efficiency: z.number().nullish(),
    })
  ),
});

const WeightSchema = z.object({
  weight: z.array(z.object({ date: z.string(), weight: z.number() })),
});

export class FitbitProvider extends HttpFitnessProvider {
  override async getAthlete(): Promise<Athlete> {
    const { user } = await this.request('/1/user/-/profile.json', ProfileSchema);
    return {
      id: user.encodedId,
      provider: this.name,
      username: user.displayName ?? null,
      firstname: user.firstName ?? null,
      lastname: user.lastName ?? null,
      profile_picture: user.avatar ?? null,
    };
  }

  override async getActivities(params: ActivityQueryParams = {}): Promise<Activity[]> {
    // The log list needs one of beforeDate/afterDate; newest first via beforeDate
    const before = params.before !== undefined ? new Date(params.before * 1000) : new Date(Date.now() + 86_400_000);
    const { activities } = await this.request('/1/user/-/activities/list.json', ActivityListSchema, {
      query: {
        beforeDate: isoDate(before),
        sort: 'desc',
        limit: Math.min(params.limit ?? DEFAULT_PAGE_SIZE, 100),
        offset: params.offset ?? 0,
      },
    });
    const after = params.after;
    return activities
      .filter((log) => after === undefined || Date.parse(log.startTime) / 1000 > after)
      .map((log) => ({
        id: String(log.logId),
        provider: this.name,
        name: log.activityName,
        sport_type: log.activityName,
        start_date: new Date(log.startTime).toISOString(),
        duration_seconds: Math.round(log.duration / 1000),
        distance_meters: log.distance != null ? log.distance * 1000 : null,
        elevation_gain_meters: log.elevationGain ?? null,
        average_heart_rate: log.averageHeartRate ?? null,
        calories: log.calories ?? null,
      }));
  }

  override async getSleepSessions(range: DateRange): Promise<SleepSession[]> {
    const { sleep } = await this.request(
      `/1.2/user/-/sleep/date/${isoDate(range.start)}/${isoDate(range.end)}.json`,
      SleepSchema
    );
    return sleep.map((session) => ({
      id: String(session.logId),
      provider: this.name,
      start_time: session.startTime,
      end_time: session.endTime,
      duration_minutes: session.minutesAsleep,
      efficiency: session.efficiency ?? null,
    }));
  }

  override async getHealthMetrics(range: DateRange): Promise<HealthMetrics[]> {
    const { weight } = await this.request(
      `/1/user/-/body/log/weight/date/${isoDate(range.start)}/${isoDate(range.end)}.json`,
      WeightSchema
    );
    return weight.map((entry) => ({
      date: entry.date,
      provider: this.name,
      weight_kg: entry.weight,
      steps: null,
      resting_heart_rate: null,
    }));
  }
}
