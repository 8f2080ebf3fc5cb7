/**
 * Provider descriptors
 *
 * Endpoints, OAuth parameters and capability flags for every upstream the
 * gateway knows about.
 */

import type { ProviderName } from '@pierre/protocol';
import type { ProviderDescriptor } from './types.js';

export const PROVIDER_DESCRIPTORS: Readonly<Record<ProviderName, ProviderDescriptor>> = {
  strava: {
    name: 'strava',
    displayName: 'Strava',
    capabilities: { activities: true, sleep: false, recovery: false, health: false },
    oauth: {
      authUrl: 'https://www.strava.com/oauth/authorize',
      tokenUrl: 'https://www.strava.com/oauth/token',
      revokeUrl: 'https://www.strava.com/oauth/deauthorize',
      scopeSeparator: ',',
      usePkce: false,
      additionalAuthParams: { approval_prompt: 'auto' },
      defaultScopes: ['read', 'activity:read_all'],
      tokenAuthMethod: 'client_secret_post',
    },
    apiBaseUrl: 'https://www.strava.com/api/v3',
  },
  fitbit: {
    name: 'fitbit',
    displayName: 'Fitbit',
    capabilities: { activities: true, sleep: true, recovery: false, health: true },
    oauth: {
      authUrl: 'https://www.fitbit.com/oauth2/authorize',
      tokenUrl: 'https://api.fitbit.com/oauth2/token',
      revokeUrl: 'https://api.fitbit.com/oauth2/revoke',
      scopeSeparator: ' ',
      usePkce: true,
      additionalAuthParams: {},
      defaultScopes: ['activity', 'heartrate', 'profile', 'sleep', 'weight'],
      tokenAuthMethod: 'client_secret_basic',
    },
    apiBaseUrl: 'https://api.fitbit.com',
  },
  garmin: {
    name: 'garmin',
    displayName: 'Garmin Connect',
    capabilities: { activities: true, sleep: true, recovery: false, health: true },
    oauth: {
      authUrl: 'https://connect.garmin.com/oauth2Confirm',
      tokenUrl: 'https://diauth.garmin.com/di-oauth2-service/oauth/token',
      revokeUrl: null,
      scopeSeparator: ' ',
      usePkce: true,
      additionalAuthParams: {},
      defaultScopes: [],
      tokenAuthMethod: 'client_secret_post',
    },
    apiBaseUrl: 'https://apis.garmin.com/wellness-api/rest',
  },
  whoop: {
    name: 'whoop',
    displayName: 'WHOOP',
    capabilities: { activities: true, sleep: true, recovery: true, health: true },
    oauth: {
      authUrl: 'https://api.prod.whoop.com/oauth/oauth2/auth',
      tokenUrl: 'https://api.prod.whoop.com/oauth/oauth2/token',
      revokeUrl: null,
      scopeSeparator: ' ',
      usePkce: false,
      additionalAuthParams: {},
      defaultScopes: ['offline', 'read:profile', 'read:workout', 'read:sleep', 'read:recovery', 'read:body_measurement'],
      tokenAuthMethod: 'client_secret_post',
    },
    apiBaseUrl: 'https://api.prod.whoop.com/developer/v1',
  },
  coros: {
    name: 'coros',
    displayName: 'COROS',
    capabilities: { activities: true, sleep: false, recovery: false, health: false },
    oauth: {
      authUrl: 'https://open.coros.com/oauth2/authorize',
      tokenUrl: 'https://open.coros.com/oauth2/accesstoken',
      revokeUrl: null,
      scopeSeparator: ',',
      usePkce: false,
      additionalAuthParams: {},
      defaultScopes: [],
      tokenAuthMethod: 'client_secret_post',
    },
    apiBaseUrl: 'https://open.coros.com',
  },
  terra: {
    name: 'terra',
    displayName: 'Terra',
    capabilities: { activities: true, sleep: true, recovery: false, health: true },
    oauth: null,
    apiBaseUrl: 'https://api.tryterra.co/v2',
  },
};
