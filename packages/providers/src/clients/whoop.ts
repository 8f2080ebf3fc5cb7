/**
 * WHOOP developer API client
 */

import { z } from 'zod';
import { HttpFitnessProvider, DEFAULT_PAGE_SIZE, unixToIso } from './http-provider.js';
import type {
  Activity,
  ActivityQueryParams,
  Athlete,
  DateRange,
  HealthMetrics,
  RecoveryMetrics,
  SleepSession,
} from '../types.js';

/** Sport ids WHOOP documents; anything else is reported as a workout */
const SPORT_NAMES: Record<number, string> = {
  0: 'Run',
  1: 'Ride',
  33: 'Swim',
  44: 'Yoga',
  45: 'WeightTraining',
  52: 'Hike',
  63: 'Walk',
};

const ProfileSchema = z.object({
  user_id: z.number(),
  email: z.string().nullish(),
  first_name: z.string().nullish(),
  last_name: z.string().nullish(),
});

const WorkoutSchema = z.object({
  id: z.union([z.string(), z.number()]),
  sport_id: z.number(),
  start: z.string(),
  end: z.string(),
  score: z
    .object({
      kilojoule: z.number().nullish(),
      average_heart_rate: z.number().nullish(),
      distance_meter: z.number().nullish(),
      altitude_gain_meter: z.number().nullish(),
    })
    .nullish(),
});

const records = <T extends z.ZodTypeAny>(item: T) => z.object({ records: z.array(item) });

const SleepSchema = z.object({
  id: z.union([z.string(), z.number()]),
  start: z.string(),
  end: z.string(),
  score: z
    .object({
      sleep_efficiency_percentage: z.number().nullish(),
      stage_summary: z.object({ total_in_bed_time_milli: z.number() }).nullish(),
    })
    .nullish(),
});

const RecoverySchema = z.object({
  created_at: z.string(),
  score: z
    .object({
      recovery_score: z.number().nullish(),
      hrv_rmssd_milli: z.number().nullish(),
      resting_heart_rate: z.number().nullish(),
    })
    .nullish(),
});

const BodySchema = z.object({ weight_kilogram: z.number().nullish() });

const KJ_TO_KCAL = 0.239006;

export class WhoopProvider extends HttpFitnessProvider {
  override async getAthlete(): Promise<Athlete> {
    const profile = await this.request('/user/profile/basic', ProfileSchema);
    return {
      id: String(profile.user_id),
      provider: this.name,
      username: profile.email ?? null,
      firstname: profile.first_name ?? null,
      lastname: profile.last_name ?? null,
      profile_picture: null,
    };
  }

  override async getActivities(params: ActivityQueryParams = {}): Promise<Activity[]> {
    const { records: workouts } = await this.request('/activity/workout', records(WorkoutSchema), {
      query: {
        limit: Math.min((params.offset ?? 0) + (params.limit ?? DEFAULT_PAGE_SIZE), 25),
        start: params.after !== undefined ? unixToIso(params.after) : undefined,
        end: params.before !== undefined ? unixToIso(params.before) : undefined,
      },
    });
    return this.page(workouts.map((workout) => this.toActivity(workout)), params);
  }

  override async getActivity(id: string): Promise<Activity> {
    const workout = await this.request(`/activity/workout/${encodeURIComponent(id)}`, WorkoutSchema);
    return this.toActivity(workout);
  }

  override async getSleepSessions(range: DateRange): Promise<SleepSession[]> {
    const { records: sleeps } = await this.request('/activity/sleep', records(SleepSchema), {
      query: { start: range.start.toISOString(), end: range.end.toISOString() },
    });
    return sleeps.map((sleep) => ({
      id: String(sleep.id),
      provider: this.name,
      start_time: sleep.start,
      end_time: sleep.end,
      duration_minutes: sleep.score?.stage_summary
        ? Math.round(sleep.score.stage_summary.total_in_bed_time_milli / 60_000)
        : Math.round((Date.parse(sleep.end) - Date.parse(sleep.start)) / 60_000),
      efficiency: sleep.score?.sleep_efficiency_percentage ?? null,
    }));
  }

  override async getRecoveryMetrics(range: DateRange): Promise<RecoveryMetrics[]> {
    const { records: recoveries } = await this.request('/recovery', records(RecoverySchema), {
      query: { start: range.start.toISOString(), end: range.end.toISOString() },
    });
    return recoveries.map((recovery) => ({
      date: recovery.created_at.slice(0, 10),
      provider: this.name,
      recovery_score: recovery.score?.recovery_score ?? null,
      hrv_ms: recovery.score?.hrv_rmssd_milli ?? null,
      resting_heart_rate: recovery.score?.resting_heart_rate ?? null,
    }));
  }

  /**
   * WHOOP only exposes the current body measurement; it is reported for the end of the range
   */
  override async getHealthMetrics(range: DateRange): Promise<HealthMetrics[]> {
    const body = await this.request('/user/measurement/body', BodySchema);
    return [
      {
        date: range.end.toISOString().slice(0, 10),
        provider: this.name,
        weight_kg: body.weight_kilogram ?? null,
        steps: null,
        resting_heart_rate: null,
      },
    ];
  }

  private toActivity(workout: z.infer<typeof WorkoutSchema>): Activity {
    const kilojoule = workout.score?.kilojoule;
    return {
      id: String(workout.id),
      provider: this.name,
      name: SPORT_NAMES[workout.sport_id] ?? 'Workout',
      sport_type: SPORT_NAMES[workout.sport_id] ?? 'Workout',
      start_date: workout.start,
      duration_seconds: Math.round((Date.parse(workout.end) - Date.parse(workout.start)) / 1000),
      distance_meters: workout.score?.distance_meter ?? null,
      elevation_gain_meters: workout.score?.altitude_gain_meter ?? null,
      average_heart_rate: workout.score?.average_heart_rate ?? null,
      calories: kilojoule != null ? Math.round(kilojoule * KJ_TO_KCAL) : null,
    };
  }
}
