/**
 * Strava API v3 client
 */

import { z } from 'zod';
import { HttpFitnessProvider, DEFAULT_PAGE_SIZE } from './http-provider.js';
import type { Activity, ActivityQueryParams, Athlete, Stats } from '../types.js';

const AthleteSchema = z.object({
  id: z.number(),
  username: z.string().nullish(),
  firstname: z.string().nullish(),
  lastname: z.string().nullish(),
  profile: z.string().nullish(),
});

const ActivitySchema = z.object({
  id: z.number(),
  name: z.string(),
  sport_type: z.string().optional(),
  type: z.string().optional(),
  start_date: z.string(),
  elapsed_time: z.number(),
  distance: z.number().nullish(),
  total_elevation_gain: z.number().nullish(),
  average_heartrate: z.number().nullish(),
  calories: z.number().nullish(),
});

const TotalsSchema = z.object({
  count: z.number(),
  distance: z.number(),
  elapsed_time: z.number(),
  elevation_gain: z.number(),
});

const StatsSchema = z.object({
  all_run_totals: TotalsSchema,
  all_ride_totals: TotalsSchema,
  all_swim_totals: TotalsSchema,
});

export class StravaProvider extends HttpFitnessProvider {
  override async getAthlete(): Promise<Athlete> {
    const athlete = await this.request('/athlete', AthleteSchema);
    return {
      id: String(athlete.id),
      provider: this.name,
      username: athlete.username ?? null,
      firstname: athlete.firstname ?? null,
      lastname: athlete.lastname ?? null,
      profile_picture: athlete.profile ?? null,
    };
  }

  override async getActivities(params: ActivityQueryParams = {}): Promise<Activity[]> {
    const perPage = Math.max(params.limit ?? DEFAULT_PAGE_SIZE, 1);
    const page = Math.floor((params.offset ?? 0) / perPage) + 1;
    const activities = await this.request('/athlete/activities', z.array(ActivitySchema), {
      query: { per_page: perPage, page, before: params.before, after: params.after },
    });
    return activities.map((activity) => this.toActivity(activity));
  }

  override async getActivity(id: string): Promise<Activity> {
    const activity = await this.request(`/activities/${encodeURIComponent(id)}`, ActivitySchema);
    return this.toActivity(activity);
  }

  override async getStats(): Promise<Stats> {
    const athlete = await this.request('/athlete', AthleteSchema);
    const stats = await this.request(`/athletes/${athlete.id}/stats`, StatsSchema);
    const totals = [stats.all_run_totals, stats.all_ride_totals, stats.all_swim_totals];
    return {
      total_activities: totals.reduce((sum, t) => sum + t.count, 0),
      total_distance_meters: totals.reduce((sum, t) => sum + t.distance, 0),
      total_duration_seconds: totals.reduce((sum, t) => sum + t.elapsed_time, 0),
      total_elevation_gain_meters: totals.reduce((sum, t) => sum + t.elevation_gain, 0),
    };
  }

  private toActivity(activity: z.infer<typeof ActivitySchema>): Activity {
    return {
      id: String(activity.id),
      provider: this.name,
      name: activity.name,
      sport_type: activity.sport_type ?? activity.type ?? 'Workout',
      start_date: activity.start_date,
      duration_seconds: activity.elapsed_time,
      distance_meters: activity.distance ?? null,
      elevation_gain_meters: activity.total_elevation_gain ?? null,
      average_heart_rate: activity.average_heartrate ?? null,
      calories: activity.calories ?? null,
    };
  }
}
