/**
 * Garmin Health API client (pull endpoints keyed by upload time)
 */

import { z } from 'zod';
import { HttpFitnessProvider, unixToIso } from './http-provider.js';
import type { Activity, ActivityQueryParams, Athlete, DateRange, HealthMetrics, SleepSession } from '../types.js';

const UserIdSchema = z.object({ userId: z.string() });

const ActivitySummarySchema = z.object({
  summaryId: z.string(),
  activityName: z.string().nullish(),
  activityType: z.string(),
  startTimeInSeconds: z.number(),
  durationInSeconds: z.number(),
  distanceInMeters: z.number().nullish(),
  totalElevationGainInMeters: z.number().nullish(),
  averageHeartRateInBeatsPerMinute: z.number().nullish(),
  activeKilocalories: z.number().nullish(),
});

const SleepSummarySchema = z.object({
  summaryId: z.string(),
  startTimeInSeconds: z.number(),
  durationInSeconds: z.number(),
});

const DailySummarySchema = z.object({
  calendarDate: z.string(),
  steps: z.number().nullish(),
  restingHeartRateInBeatsPerMinute: z.number().nullish(),
});

function uploadWindow(start: number, end: number) {
  return { uploadStartTimeInSeconds: start, uploadEndTimeInSeconds: end };
}

function rangeSeconds(range: DateRange) {
  return uploadWindow(Math.floor(range.start.getTime() / 1000), Math.floor(range.end.getTime() / 1000));
}

export class GarminProvider extends HttpFitnessProvider {
  override async getAthlete(): Promise<Athlete> {
    const { userId } = await this.request('/user/id', UserIdSchema);
    return { id: userId, provider: this.name, username: null, firstname: null, lastname: null, profile_picture: null };
  }

  override async getActivities(params: ActivityQueryParams = {}): Promise<Activity[]> {
    const window = this.activityWindow(params);
    const summaries = await this.request('/activities', z.array(ActivitySummarySchema), {
      query: uploadWindow(window.after, window.before),
    });
    const activities = summaries
      .sort((a, b) => b.startTimeInSeconds - a.startTimeInSeconds)
      .map<Activity>((summary) => ({
        id: summary.summaryId,
        provider: this.name,
        name: summary.activityName ?? summary.activityType,
        sport_type: summary.activityType,
        start_date: unixToIso(summary.startTimeInSeconds),
        duration_seconds: summary.durationInSeconds,
        distance_meters: summary.distanceInMeters ?? null,
        elevation_gain_meters: summary.totalElevationGainInMeters ?? null,
        average_heart_rate: summary.averageHeartRateInBeatsPerMinute ?? null,
        calories: summary.activeKilocalories ?? null,
      }));
    return this.page(activities, params);
  }

  override async getSleepSessions(range: DateRange): Promise<SleepSession[]> {
    const sleeps = await this.request('/sleeps', z.array(SleepSummarySchema), { query: rangeSeconds(range) });
    return sleeps.map((sleep) => ({
      id: sleep.summaryId,
      provider: this.name,
      start_time: unixToIso(sleep.startTimeInSeconds),
      end_time: unixToIso(sleep.startTimeInSeconds + sleep.durationInSeconds),
      duration_minutes: Math.round(sleep.durationInSeconds / 60),
      efficiency: null,
    }));
  }

  override async getHealthMetrics(range: DateRange): Promise<HealthMetrics[]> {
    const dailies = await this.request('/dailies', z.array(DailySummarySchema), { query: rangeSeconds(range) });
    return dailies.map((daily) => ({
      date: daily.calendarDate,
      provider: this.name,
      weight_kg: null,
      steps: daily.steps ?? null,
      resting_heart_rate: daily.restingHeartRateInBeatsPerMinute ?? null,
    }));
  }
}
