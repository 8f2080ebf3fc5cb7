import type { FastifyInstance } from 'fastify';
import {
  PierreConfigSchema,
  ProviderError,
  TokenStore,
  TokenVault,
  createAdminToken,
  type DatabaseClient,
  type PierreConfig,
} from '@pierre/core';
import {
  PROVIDER_DESCRIPTORS,
  type Activity,
  type Athlete,
  type FitnessProvider,
  type HealthMetrics,
  type ProviderFactory,
  type RecoveryMetrics,
  type SleepSession,
  type Stats,
} from '@pierre/providers';
import type { ProviderName } from '@pierre/protocol';
import { PierreServer } from '@pierre/server';

export const TEST_MASTER_KEY = Buffer.alloc(32, 7);
export const TEST_PASSWORD = 'test-password';

export interface TestServerHandle {
  server: PierreServer;
  fastify: FastifyInstance;
  db: DatabaseClient;
  tokenStore: TokenStore;
  stop: () => Promise<void>;
}

export interface TestServerOptions {
  /** Adjust the parsed configuration before the server is built */
  configure?: (config: PierreConfig) => void;
  providerFactories?: Partial<Record<ProviderName, ProviderFactory>>;
}

/**
 * Server on an in-memory database with auto-approved sign-ups
 */
export async function startTestServer(options: TestServerOptions = {}): Promise<TestServerHandle> {
  const config = PierreConfigSchema.parse({
    database: { path: ':memory:' },
    log_level: 'warn',
    auth: { auto_approve_users: true },
  });
  options.configure?.(config);

  const server = new PierreServer({
    config,
    masterKey: TEST_MASTER_KEY,
    bootstrapAdmin: false,
    ...(options.providerFactories !== undefined && { providerFactories: options.providerFactories }),
  });
  await server.initialize();
  const db = server.getDatabase();

  return {
    server,
    fastify: server.getServer(),
    db,
    tokenStore: new TokenStore(db, new TokenVault(TEST_MASTER_KEY)),
    stop: () => server.stop(),
  };
}

export interface TestUser {
  id: string;
  email: string;
  token: string;
  csrf: string;
}

interface LoginBody {
  data: { user: { id: string }; access_token: string; csrf_token: string };
}

/**
 * Register and log in a user through the public API
 */
export async function signUp(fastify: FastifyInstance, email = 'runner@example.com'): Promise<TestUser> {
  const registered = await fastify.inject({
    method: 'POST',
    url: '/api/auth/register',
    payload: { email, password: TEST_PASSWORD },
  });
  if (registered.statusCode !== 201) {
    throw new Error(`Registration failed: ${registered.body}`);
  }
  const login = await fastify.inject({
    method: 'POST',
    url: '/api/auth/login',
    payload: { email, password: TEST_PASSWORD },
  });
  const body = login.json<LoginBody>();
  return { id: body.data.user.id, email, token: body.data.access_token, csrf: body.data.csrf_token };
}

/**
 * Create a tenant owned by the user; it becomes the user's primary tenant
 */
export async function createTenant(fastify: FastifyInstance, user: TestUser, slug = 'morning-club'): Promise<string> {
  const response = await fastify.inject({
    method: 'POST',
    url: '/api/tenants',
    headers: bearer(user),
    payload: { name: 'Morning Club', slug },
  });
  if (response.statusCode !== 201) {
    throw new Error(`Tenant creation failed: ${response.body}`);
  }
  return response.json<{ data: { id: string } }>().data.id;
}

export function bearer(user: TestUser): Record<string, string> {
  return { authorization: `Bearer ${user.token}` };
}

export async function createTestAdminToken(db: DatabaseClient, permissions: string[] = ['*'], isSuperAdmin = true) {
  return createAdminToken(db, { service_name: 'test-admin', permissions, is_super_admin: isSuperAdmin });
}

/**
 * Strava stand-in serving one athlete and one run
 */
export class FakeStrava implements FitnessProvider {
  readonly name = 'strava' as const;
  readonly descriptor = PROVIDER_DESCRIPTORS.strava;
  athleteCalls = 0;
  activityCalls = 0;

  constructor(readonly accessToken: string) {}

  async getAthlete(): Promise<Athlete> {
    this.athleteCalls++;
    return { id: '42', provider: 'strava', username: 'runner42', firstname: 'Ada', lastname: null, profile_picture: null };
  }

  async getActivities(): Promise<Activity[]> {
    this.activityCalls++;
    return [
      {
        id: '1001',
        provider: 'strava',
        name: 'Morning Run',
        sport_type: 'Run',
        start_date: '2026-03-01T07:00:00Z',
        duration_seconds: 1800,
        distance_meters: 5000,
        elevation_gain_meters: null,
        average_heart_rate: null,
        calories: null,
      },
    ];
  }

  async getActivity(): Promise<Activity> {
    throw new ProviderError('Not used in tests', 'strava', 'not_supported');
  }

  async getStats(): Promise<Stats> {
    throw new ProviderError('Not used in tests', 'strava', 'not_supported');
  }

  async getSleepSessions(): Promise<SleepSession[]> {
    throw new ProviderError('Sleep data is not available from Strava', 'strava', 'not_supported');
  }

  async getRecoveryMetrics(): Promise<RecoveryMetrics[]> {
    throw new ProviderError('Not used in tests', 'strava', 'not_supported');
  }

  async getHealthMetrics(): Promise<HealthMetrics[]> {
    throw new ProviderError('Not used in tests', 'strava', 'not_supported');
  }
}
