/**
 * COROS open API client
 *
 * COROS authenticates with `token` and `openId` query parameters instead of
 * a bearer header, and wraps every payload in `{ result, message, data }`.
 */

import { z } from 'zod';
import { ProviderError } from '@pierre/core';
import { HttpFitnessProvider, unixToIso, type RequestOptions } from './http-provider.js';
import type { Activity, ActivityQueryParams, Athlete } from '../types.js';

const SUCCESS = '0000';

/** COROS sport modes; unknown modes are reported as a workout */
const SPORT_MODES: Record<number, string> = {
  8: 'Run',
  9: 'Ride',
  10: 'Swim',
  13: 'Workout',
  15: 'TrailRun',
  16: 'Hike',
};

const EnvelopeSchema = z.object({ result: z.string(), message: z.string().nullish(), data: z.unknown() });

const UserSchema = z.object({ openId: z.string(), nick: z.string().nullish() });

const SportSchema = z.object({
  labelId: z.string(),
  mode: z.number(),
  startTime: z.number(),
  endTime: z.number(),
  distance: z.number().nullish(),
  calorie: z.number().nullish(),
  avgHr: z.number().nullish(),
});

function compactDate(seconds: number): string {
  return unixToIso(seconds).slice(0, 10).replace(/-/g, '');
}

export class CorosProvider extends HttpFitnessProvider {
  protected override authHeaders(): Record<string, string> {
    return {};
  }

  private async call<S extends z.ZodTypeAny>(path: string, data: S, options: RequestOptions = {}): Promise<z.output<S>> {
    const body = await this.request(path, EnvelopeSchema, {
      ...options,
      query: { token: this.credentials.accessToken, openId: this.credentials.externalUserId, ...options.query },
    });
    if (body.result !== SUCCESS) {
      throw new ProviderError(`coros returned result ${body.result}`, this.name, 'external_service');
    }
    const parsed = data.safeParse(body.data);
    if (!parsed.success) {
      throw new ProviderError('coros returned an unexpected response', this.name, 'external_service');
    }
    return parsed.data;
  }

  override async getAthlete(): Promise<Athlete> {
    const user = await this.call('/coros/userinfo', UserSchema);
    return { id: user.openId, provider: this.name, username: user.nick ?? null, firstname: null, lastname: null, profile_picture: null };
  }

  override async getActivities(params: ActivityQueryParams = {}): Promise<Activity[]> {
    const window = this.activityWindow(params);
    const sports = await this.call('/v2/coros/sport/list', z.array(SportSchema), {
      query: { startDate: compactDate(window.after), endDate: compactDate(window.before) },
    });
    const activities = sports
      .sort((a, b) => b.startTime - a.startTime)
      .map<Activity>((sport) => ({
        id: sport.labelId,
        provider: this.name,
        name: SPORT_MODES[sport.mode] ?? 'Workout',
        sport_type: SPORT_MODES[sport.mode] ?? 'Workout',
        start_date: unixToIso(sport.startTime),
        duration_seconds: sport.endTime - sport.startTime,
        distance_meters: sport.distance ?? null,
        elevation_gain_meters: null,
        average_heart_rate: sport.avgHr ?? null,
        calories: sport.calorie ?? null,
      }));
    return this.page(activities, params);
  }
}
