/**
 * Shared fitness records and the provider contract
 *
 * Every upstream client maps its payloads onto these records. Anything
 * beyond them stays provider-specific and is not surfaced.
 */

import type { ProviderName } from '@pierre/protocol';

export interface Athlete {
  id: string;
  provider: ProviderName;
  username: string | null;
  firstname: string | null;
  lastname: string | null;
  profile_picture: string | null;
}

export interface Activity {
  id: string;
  provider: ProviderName;
  name: string;
  sport_type: string;
  /** ISO 8601 */
  start_date: string;
  duration_seconds: number;
  distance_meters: number | null;
  elevation_gain_meters: number | null;
  average_heart_rate: number | null;
  calories: number | null;
}

export interface Stats {
  total_activities: number;
  total_distance_meters: number;
  total_duration_seconds: number;
  total_elevation_gain_meters: number;
}

export interface SleepSession {
  id: string;
  provider: ProviderName;
  start_time: string;
  end_time: string;
  duration_minutes: number;
  efficiency: number | null;
}

export interface RecoveryMetrics {
  /** YYYY-MM-DD */
  date: string;
  provider: ProviderName;
  recovery_score: number | null;
  hrv_ms: number | null;
  resting_heart_rate: number | null;
}

export interface HealthMetrics {
  date: string;
  provider: ProviderName;
  weight_kg: number | null;
  steps: number | null;
  resting_heart_rate: number | null;
}

export interface ActivityQueryParams {
  limit?: number;
  offset?: number;
  /** Unix seconds */
  before?: number;
  /** Unix seconds */
  after?: number;
}

export interface DateRange {
  start: Date;
  end: Date;
}

export type ProviderCapability = 'activities' | 'sleep' | 'recovery' | 'health';

export type ProviderCapabilities = Record<ProviderCapability, boolean>;

export const PROVIDER_CAPABILITY_BITS: Record<ProviderCapability, number> = {
  activities: 1 << 0,
  sleep: 1 << 1,
  recovery: 1 << 2,
  health: 1 << 3,
};

export interface ProviderOAuthConfig {
  authUrl: string;
  tokenUrl: string;
  revokeUrl: string | null;
  scopeSeparator: ' ' | ',';
  usePkce: boolean;
  /** Extra query parameters added to the authorization URL */
  additionalAuthParams: Record<string, string>;
  defaultScopes: string[];
  /** How client credentials travel to the token endpoint */
  tokenAuthMethod: 'client_secret_post' | 'client_secret_basic';
}

export interface ProviderDescriptor {
  name: ProviderName;
  displayName: string;
  capabilities: ProviderCapabilities;
  /** null for providers connected through a widget or webhook instead of OAuth */
  oauth: ProviderOAuthConfig | null;
  apiBaseUrl: string;
}

/**
 * What a client needs to talk to the upstream API on behalf of one user
 */
export interface ProviderCredentials {
  accessToken: string;
  /** Upstream user id for APIs that want it on every call (Coros openId, Terra user_id) */
  externalUserId?: string;
  /** Application credentials for APIs keyed per developer (Terra) */
  clientId?: string;
  clientSecret?: string;
}

export interface ProviderClientOptions {
  timeoutMs?: number;
}

export interface FitnessProvider {
  readonly name: ProviderName;
  readonly descriptor: ProviderDescriptor;
  getAthlete(): Promise<Athlete>;
  getActivities(params?: ActivityQueryParams): Promise<Activity[]>;
  getActivity(id: string): Promise<Activity>;
  getStats(): Promise<Stats>;
  getSleepSessions(range: DateRange): Promise<SleepSession[]>;
  getRecoveryMetrics(range: DateRange): Promise<RecoveryMetrics[]>;
  getHealthMetrics(range: DateRange): Promise<HealthMetrics[]>;
}

export function providerCapabilityMask(descriptor: ProviderDescriptor): number {
  let mask = 0;
  for (const [capability, supported] of Object.entries(descriptor.capabilities)) {
    if (supported && isProviderCapability(capability)) {
      mask |= PROVIDER_CAPABILITY_BITS[capability];
    }
  }
  return mask;
}

function isProviderCapability(value: string): value is ProviderCapability {
  return value === 'activities' || value === 'sleep' || value === 'recovery' || value === 'health';
}
