import { describe, it, expect, vi, afterEach } from 'vitest';
import type { PierreConfig } from '@pierre/core';
import {
  FakeStrava,
  bearer,
  createTenant,
  signUp,
  startTestServer,
  type TestServerHandle,
  type TestUser,
} from '../helpers.js';

type FetchInput = string | URL | Request;

const FRONTEND_URL = 'https://app.example.com';
const DEEP_LINK = 'pierre://oauth/done';

function stubFetch(status: number, body: unknown) {
  const fetchMock = vi.fn(async (_input: FetchInput, _init?: RequestInit) =>
    new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } })
  );
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function withStrava(frontendUrl?: string) {
  return (config: PierreConfig) => {
    config.providers.strava = { client_id: 'test-client', client_secret: 'test-secret' };
    if (frontendUrl !== undefined) {
      config.server.frontend_url = frontendUrl;
    }
  };
}

describe('Upstream OAuth routes', () => {
  let handle: TestServerHandle;

  afterEach(async () => {
    vi.unstubAllGlobals();
    await handle.stop();
  });

  async function connectedUser(): Promise<TestUser> {
    const user = await signUp(handle.fastify);
    await createTenant(handle.fastify, user);
    return user;
  }

  async function issueState(user: TestUser, redirectUrl?: string): Promise<string> {
    const query = redirectUrl !== undefined ? `?redirect_url=${encodeURIComponent(redirectUrl)}` : '';
    const response = await handle.fastify.inject({
      method: 'GET',
      url: `/api/oauth/mobile/init/strava${query}`,
      headers: bearer(user),
    });
    return response.json<{ data: { state: string } }>().data.state;
  }

  function callback(query: string) {
    return handle.fastify.inject({ method: 'GET', url: `/api/oauth/callback/strava?${query}` });
  }

  describe('GET /api/oauth/auth/:provider/:userId', () => {
    it('should redirect the user to the provider', async () => {
      handle = await startTestServer({ configure: withStrava() });
      const user = await connectedUser();

      const response = await handle.fastify.inject({
        method: 'GET',
        url: `/api/oauth/auth/strava/${user.id}`,
        headers: bearer(user),
      });

      expect(response.statusCode).toBe(302);
      const location = new URL(String(response.headers.location));
      expect(`${location.origin}${location.pathname}`).toBe('https://www.strava.com/oauth/authorize');
      expect(location.searchParams.get('client_id')).toBe('test-client');
      expect(location.searchParams.get('redirect_uri')).toBe('http://localhost:8081/api/oauth/callback/strava');
      expect(location.searchParams.get('state')?.startsWith(`${user.id}:`)).toBe(true);
    });

    it('should refuse to start a flow for a different user', async () => {
      handle = await startTestServer({ configure: withStrava() });
      const user = await connectedUser();

      const response = await handle.fastify.inject({
        method: 'GET',
        url: '/api/oauth/auth/strava/someone-else',
        headers: bearer(user),
      });

      expect(response.statusCode).toBe(403);
      expect(response.json()).toMatchObject({
        success: false,
        message: 'Cannot initiate OAuth flow for a different user',
      });
    });
  });

  describe('GET /api/oauth/mobile/init/:provider', () => {
    it('should return the authorization URL with a state carrying the deep link', async () => {
      handle = await startTestServer({ configure: withStrava() });
      const user = await connectedUser();

      const response = await handle.fastify.inject({
        method: 'GET',
        url: `/api/oauth/mobile/init/strava?redirect_url=${encodeURIComponent(DEEP_LINK)}`,
        headers: bearer(user),
      });

      const body = response.json<{ data: { provider: string; authorization_url: string; state: string; expires_at: string } }>();
      expect(response.statusCode).toBe(200);
      expect(body.data.provider).toBe('strava');
      expect(new URL(body.data.authorization_url).searchParams.get('state')).toBe(body.data.state);
      expect(body.data.state.split(':')).toHaveLength(3);
      expect(Date.parse(body.data.expires_at)).toBeGreaterThan(Date.now());
    });

    it('should refuse a redirect URL with a scheme that is not allowed', async () => {
      handle = await startTestServer({ configure: withStrava() });
      const user = await connectedUser();

      const response = await handle.fastify.inject({
        method: 'GET',
        url: `/api/oauth/mobile/init/strava?redirect_url=${encodeURIComponent('http://attacker.example/cb')}`,
        headers: bearer(user),
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ message: 'mobile_redirect_url uses a scheme that is not allowed' });
    });
  });

  describe('GET /api/oauth/callback/:provider', () => {
    it('should send the user back to the deep link first', async () => {
      handle = await startTestServer({ configure: withStrava(FRONTEND_URL) });
      const user = await connectedUser();
      const state = await issueState(user, DEEP_LINK);
      stubFetch(200, { access_token: 'upstream-access', refresh_token: 'upstream-refresh', expires_in: 21600 });

      const response = await callback(`code=upstream-code&state=${encodeURIComponent(state)}`);

      expect(response.statusCode).toBe(302);
      expect(response.headers.location).toBe('pierre://oauth/done?provider=strava&success=true');
    });

    it('should fall back to the frontend without a deep link', async () => {
      handle = await startTestServer({ configure: withStrava(`${FRONTEND_URL}/`) });
      const user = await connectedUser();
      const state = await issueState(user);
      stubFetch(200, { access_token: 'upstream-access', expires_in: 21600 });

      const response = await callback(`code=upstream-code&state=${encodeURIComponent(state)}`);

      expect(response.statusCode).toBe(302);
      expect(response.headers.location).toBe('https://app.example.com/oauth-callback?provider=strava&success=true');
    });

    it('should render a page when neither a deep link nor a frontend is known', async () => {
      handle = await startTestServer({ configure: withStrava() });
      const user = await connectedUser();
      const state = await issueState(user);
      stubFetch(200, { access_token: 'upstream-access', expires_in: 21600 });

      const response = await callback(`code=upstream-code&state=${encodeURIComponent(state)}`);
      const status = await handle.fastify.inject({ method: 'GET', url: '/api/oauth/status', headers: bearer(user) });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toBe('text/html; charset=utf-8');
      expect(response.body).toContain('<h1>Strava connected</h1>');
      const providers = status.json<{ data: Array<{ provider: string; connected: boolean }> }>().data;
      expect(providers.find((p) => p.provider === 'strava')?.connected).toBe(true);
      expect(providers.find((p) => p.provider === 'fitbit')?.connected).toBe(false);
    });

    it('should redirect a provider-reported error to the frontend', async () => {
      handle = await startTestServer({ configure: withStrava(FRONTEND_URL) });

      const response = await callback('error=access_denied&state=anything');

      expect(response.statusCode).toBe(302);
      expect(response.headers.location).toBe(
        'https://app.example.com/oauth-callback?provider=strava&success=false&error=access_denied'
      );
    });

    it('should reject a second callback with the same state', async () => {
      handle = await startTestServer({ configure: withStrava() });
      const user = await connectedUser();
      const state = await issueState(user);
      const fetchMock = stubFetch(200, { access_token: 'upstream-access', expires_in: 21600 });

      const first = await callback(`code=upstream-code&state=${encodeURIComponent(state)}`);
      const second = await callback(`code=upstream-code&state=${encodeURIComponent(state)}`);

      expect(first.statusCode).toBe(200);
      expect(second.statusCode).toBe(400);
      expect(second.body).toContain('<h1>This authorization link has expired</h1>');
      expect(fetchMock).toHaveBeenCalledTimes(1);
    });

    it('should never redirect to a deep link from a state it did not issue', async () => {
      handle = await startTestServer({ configure: withStrava() });
      const user = await connectedUser();
      const forged = `${user.id}:abcd:${Buffer.from('https://attacker.example/steal', 'utf8').toString('base64url')}`;

      const response = await callback(`code=upstream-code&state=${encodeURIComponent(forged)}`);

      expect(response.statusCode).toBe(400);
      expect(response.headers.location).toBeUndefined();
      expect(response.body).toContain('<h1>This authorization link has expired</h1>');
    });

    it('should send a forged state to the frontend rather than its deep link', async () => {
      handle = await startTestServer({ configure: withStrava(FRONTEND_URL) });
      const forged = `someone:abcd:${Buffer.from('https://attacker.example/steal', 'utf8').toString('base64url')}`;

      const response = await callback(`code=upstream-code&state=${encodeURIComponent(forged)}`);

      expect(response.statusCode).toBe(302);
      expect(response.headers.location).toBe(
        'https://app.example.com/oauth-callback?provider=strava&success=false&error=invalid_state'
      );
    });

    it('should report a failed exchange to the deep link of the consumed state', async () => {
      handle = await startTestServer({ configure: withStrava(FRONTEND_URL) });
      const user = await connectedUser();
      const state = await issueState(user, DEEP_LINK);
      stubFetch(400, { error: 'invalid_grant' });

      const response = await callback(`code=upstream-code&state=${encodeURIComponent(state)}`);

      expect(response.statusCode).toBe(302);
      expect(response.headers.location).toBe('pierre://oauth/done?provider=strava&success=false&error=token_exchange_failed');
    });
  });

  describe('GET /api/oauth/status', () => {
    it('should report only connections of the active tenant', async () => {
      handle = await startTestServer({ configure: withStrava() });
      const user = await signUp(handle.fastify);
      const home = await createTenant(handle.fastify, user, 'home-club');
      const away = await createTenant(handle.fastify, user, 'away-club');
      const switched = await handle.fastify.inject({
        method: 'POST',
        url: `/api/tenants/${home}/switch`,
        headers: bearer(user),
      });
      const atHome = { ...user, token: switched.json<{ data: { access_token: string } }>().data.access_token };
      const token = { access_token: 'test-access-token', refresh_token: null, token_type: 'Bearer', scope: null, expires_at: null };
      handle.tokenStore.upsert({ user_id: user.id, tenant_id: home, provider: 'fitbit' }, token);
      handle.tokenStore.upsert({ user_id: user.id, tenant_id: away, provider: 'strava' }, token);

      const response = await handle.fastify.inject({ method: 'GET', url: '/api/oauth/status', headers: bearer(atHome) });

      const providers = response.json<{ data: Array<{ provider: string; connected: boolean }> }>().data;
      expect(providers.find((p) => p.provider === 'fitbit')?.connected).toBe(true);
      expect(providers.find((p) => p.provider === 'strava')?.connected).toBe(false);
    });
  });

  describe('token refresh during a tool call', () => {
    it('should refresh a token close to expiry, persist the new pair and serve the repeat call from cache', async () => {
      const clients: FakeStrava[] = [];
      handle = await startTestServer({
        configure: withStrava(),
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
      const key = { user_id: user.id, tenant_id: tenantId, provider: 'strava' };
      handle.tokenStore.upsert(key, {
        access_token: 'stale-access',
        refresh_token: 'stale-refresh',
        token_type: 'Bearer',
        scope: 'read',
        expires_at: new Date(Date.now() + 2 * 60 * 1000),
      });
      const fetchMock = stubFetch(200, {
        access_token: 'fresh-access',
        refresh_token: 'fresh-refresh',
        expires_in: 21600,
      });

      const call = () =>
        handle.fastify.inject({
          method: 'POST',
          url: '/api/tools/get_activities',
          headers: bearer(user),
          payload: { provider: 'strava' },
        });
      const first = await call();
      const second = await call();

      expect(first.statusCode).toBe(200);
      expect(second.json()).toEqual(first.json());
      expect(fetchMock).toHaveBeenCalledTimes(1);
      expect(String(fetchMock.mock.calls[0]?.[0])).toBe('https://www.strava.com/oauth/token');
      const form = new URLSearchParams(String(fetchMock.mock.calls[0]?.[1]?.body));
      expect(form.get('grant_type')).toBe('refresh_token');
      expect(form.get('refresh_token')).toBe('stale-refresh');

      const stored = await handle.tokenStore.fetch(key);
      expect(stored?.access_token).toBe('fresh-access');
      expect(stored?.refresh_token).toBe('fresh-refresh');
      expect(clients.map((client) => client.accessToken)).toEqual(['fresh-access', 'fresh-access']);
      expect(clients.reduce((calls, client) => calls + client.activityCalls, 0)).toBe(1);
    });
  });
});
