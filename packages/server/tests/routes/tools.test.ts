import { describe, it, expect, afterEach } from 'vitest';
import {
  FakeStrava,
  bearer,
  createTenant,
  signUp,
  startTestServer,
  type TestServerHandle,
} from '../helpers.js';

describe('REST and A2A tool routes', () => {
  let handle: TestServerHandle;

  afterEach(async () => {
    await handle.stop();
  });

  it('should list the non-admin tools for a regular user', async () => {
    handle = await startTestServer();
    const user = await signUp(handle.fastify);

    const response = await handle.fastify.inject({ method: 'GET', url: '/api/tools', headers: bearer(user) });

    const body = response.json<{ data: Array<{ name: string }>; metadata: { count: number } }>();
    expect(response.statusCode).toBe(200);
    expect(body.metadata.count).toBe(11);
    expect(body.data.map((t) => t.name)).not.toContain('admin_list_users');
  });

  it('should leave globally disabled tools out of the list', async () => {
    handle = await startTestServer({
      configure: (config) => {
        config.tools.disabled = ['get_*_metrics'];
      },
    });
    const user = await signUp(handle.fastify);

    const response = await handle.fastify.inject({ method: 'GET', url: '/api/tools', headers: bearer(user) });

    const names = response.json<{ data: Array<{ name: string }> }>().data.map((t) => t.name);
    expect(names).not.toContain('get_recovery_metrics');
    expect(names).not.toContain('get_health_metrics');
    expect(names).toContain('get_sleep_sessions');
  });

  it('should call a tool with the body as arguments', async () => {
    handle = await startTestServer();
    const user = await signUp(handle.fastify);

    const response = await handle.fastify.inject({
      method: 'POST',
      url: '/api/tools/list_providers',
      headers: bearer(user),
      payload: {},
    });

    const body = response.json<{ success: boolean; data: Array<Record<string, unknown>> }>();
    expect(response.statusCode).toBe(200);
    expect(body.success).toBe(true);
    expect(body.data).toHaveLength(6);
    expect(body.data[0]).toMatchObject({ name: 'strava', display_name: 'Strava', connected: false });
  });

  it('should answer unknown and forbidden tools the same way', async () => {
    handle = await startTestServer();
    const user = await signUp(handle.fastify);

    const unknown = await handle.fastify.inject({
      method: 'POST',
      url: '/api/tools/make_coffee',
      headers: bearer(user),
      payload: {},
    });
    const adminOnly = await handle.fastify.inject({
      method: 'POST',
      url: '/api/tools/admin_list_users',
      headers: bearer(user),
      payload: {},
    });

    expect(unknown.statusCode).toBe(404);
    expect(unknown.json()).toEqual({
      success: false,
      message: 'Unknown tool: make_coffee',
      code: 'METHOD_NOT_FOUND',
      details: [{ error_kind: 'method_not_found' }],
    });
    expect(adminOnly.statusCode).toBe(404);
    expect(adminOnly.json()).toMatchObject({ message: 'Unknown tool: admin_list_users', code: 'METHOD_NOT_FOUND' });
  });

  it('should need an active tenant for provider data', async () => {
    handle = await startTestServer();
    const user = await signUp(handle.fastify);

    const response = await handle.fastify.inject({
      method: 'POST',
      url: '/api/tools/get_athlete',
      headers: bearer(user),
      payload: { provider: 'strava' },
    });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toMatchObject({
      message: 'No active tenant. Create or join a tenant first.',
      code: 'VALIDATION_ERROR',
    });
  });

  it('should ask the user to reconnect when no token is stored', async () => {
    handle = await startTestServer();
    const user = await signUp(handle.fastify);
    await createTenant(handle.fastify, user);

    const response = await handle.fastify.inject({
      method: 'POST',
      url: '/api/tools/get_athlete',
      headers: bearer(user),
      payload: { provider: 'strava' },
    });

    expect(response.statusCode).toBe(401);
    expect(response.json()).toEqual({
      success: false,
      message: 'No valid Strava connection. Please reconnect Strava.',
      code: 'TOKEN_EXPIRED',
      details: [{ error_kind: 'auth_expired' }],
    });
  });

  it('should read through the provider and then from cache', async () => {
    const clients: FakeStrava[] = [];
    handle = await startTestServer({
      providerFactories: {
        strava: (_descriptor, credentials) => {
          const client = new FakeStrava(credentials.accessToken);
          clients.push(client);
          return client;
        },
      },
    });
    const user = await signUp(handle.fastify);
    const tenantId = await createTenant(handle.fastify, user);
    handle.tokenStore.upsert(
      { user_id: user.id, tenant_id: tenantId, provider: 'strava' },
      { access_token: 'test-access-token', refresh_token: null, token_type: 'Bearer', scope: 'read', expires_at: null }
    );

    const call = () =>
      handle.fastify.inject({
        method: 'POST',
        url: '/api/tools/get_athlete',
        headers: bearer(user),
        payload: { provider: 'strava' },
      });
    const first = await call();
    const second = await call();

    expect(first.statusCode).toBe(200);
    expect(first.json()).toEqual({
      success: true,
      data: { id: '42', provider: 'strava', username: 'runner42', firstname: 'Ada', lastname: null, profile_picture: null },
      metadata: { tool_name: 'get_athlete' },
    });
    expect(second.json()).toEqual(first.json());
    expect(clients[0]?.accessToken).toBe('test-access-token');
    expect(clients.reduce((calls, client) => calls + client.athleteCalls, 0)).toBe(1);
  });

  it('should list connections from every tenant only when no provider is named', async () => {
    handle = await startTestServer();
    const user = await signUp(handle.fastify);
    const home = await createTenant(handle.fastify, user, 'home-club');
    const away = await createTenant(handle.fastify, user, 'away-club');
    const switched = await handle.fastify.inject({
      method: 'POST',
      url: `/api/tenants/${home}/switch`,
      headers: bearer(user),
    });
    const atHome = { ...user, token: switched.json<{ data: { access_token: string } }>().data.access_token };
    const token = { access_token: 'test-access-token', refresh_token: null, token_type: 'Bearer', scope: 'read', expires_at: null };
    handle.tokenStore.upsert({ user_id: user.id, tenant_id: home, provider: 'strava' }, token);
    handle.tokenStore.upsert({ user_id: user.id, tenant_id: away, provider: 'fitbit' }, token);

    const status = (payload: Record<string, unknown>) =>
      handle.fastify.inject({ method: 'POST', url: '/api/tools/get_connection_status', headers: bearer(atHome), payload });
    const all = await status({});
    const fitbit = await status({ provider: 'fitbit' });
    const strava = await status({ provider: 'strava' });

    const listed = all.json<{ data: Array<{ provider: string; tenant_id: string; connection_type: string }> }>().data;
    expect(all.statusCode).toBe(200);
    expect(listed).toHaveLength(2);
    expect(listed).toEqual(
      expect.arrayContaining([
        expect.objectContaining({ provider: 'strava', tenant_id: home, connection_type: 'oauth' }),
        expect.objectContaining({ provider: 'fitbit', tenant_id: away, connection_type: 'oauth' }),
      ])
    );
    expect(fitbit.json<{ data: unknown }>().data).toEqual({ provider: 'fitbit', connected: false });
    expect(strava.json<{ data: unknown }>().data).toEqual({ provider: 'strava', connected: true });
  });

  it('should rate limit tool calls with Retry-After', async () => {
    handle = await startTestServer({
      configure: (config) => {
        config.rate_limits.tool_calls_per_minute = 2;
      },
    });
    const user = await signUp(handle.fastify);
    const call = () =>
      handle.fastify.inject({ method: 'POST', url: '/api/tools/list_providers', headers: bearer(user), payload: {} });

    await call();
    await call();
    const limited = await call();

    expect(limited.statusCode).toBe(429);
    expect(Number(limited.headers['retry-after'])).toBeGreaterThan(0);
    expect(limited.json()).toMatchObject({
      success: false,
      message: 'Tool call rate limit exceeded',
      code: 'RATE_LIMITED',
      details: [{ error_kind: 'rate_limited' }],
    });
  });

  it('should run A2A tasks', async () => {
    handle = await startTestServer();
    const user = await signUp(handle.fastify);

    const completed = await handle.fastify.inject({
      method: 'POST',
      url: '/a2a/tasks',
      headers: bearer(user),
      payload: { id: 'task-1', tool_name: 'list_providers' },
    });
    const failed = await handle.fastify.inject({
      method: 'POST',
      url: '/a2a/tasks',
      headers: bearer(user),
      payload: { id: 'task-2', tool_name: 'get_athlete', parameters: {} },
    });

    expect(completed.json()).toMatchObject({
      id: 'task-1',
      status: { state: 'completed' },
      artifacts: [{ name: 'list_providers' }],
      metadata: { tool_name: 'list_providers' },
    });
    expect(failed.json()).toMatchObject({
      id: 'task-2',
      status: { state: 'failed', message: 'Missing required argument: provider' },
      artifacts: [],
      metadata: { tool_name: 'get_athlete', error_kind: 'invalid_input' },
    });
  });
});
