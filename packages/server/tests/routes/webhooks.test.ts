import { describe, it, expect, afterEach } from 'vitest';
import { FakeStrava, bearer, createTenant, signUp, startTestServer, type TestServerHandle } from '../helpers.js';

const SECRET = 'test-webhook-secret';

describe('POST /api/webhooks/:provider', () => {
  let handle: TestServerHandle;

  afterEach(async () => {
    await handle.stop();
  });

  it('should be disabled without a configured secret', async () => {
    handle = await startTestServer();

    const response = await handle.fastify.inject({
      method: 'POST',
      url: '/api/webhooks/strava',
      payload: { owner_id: 42 },
    });

    expect(response.statusCode).toBe(501);
    expect(response.json()).toMatchObject({ code: 'NOT_SUPPORTED', message: 'Webhooks are not configured' });
  });

  describe('with a secret', () => {
    const start = async () => {
      const clients: FakeStrava[] = [];
      handle = await startTestServer({
        configure: (config) => {
          config.webhooks.secret = SECRET;
        },
        providerFactories: {
          strava: (_descriptor, credentials) => {
            const client = new FakeStrava(credentials.accessToken);
            clients.push(client);
            return client;
          },
        },
      });
      return { activityCalls: () => clients.reduce((calls, client) => calls + client.activityCalls, 0) };
    };

    it('should reject a wrong secret', async () => {
      await start();

      const response = await handle.fastify.inject({
        method: 'POST',
        url: '/api/webhooks/strava',
        headers: { 'x-webhook-secret': 'not-the-secret' },
        payload: { owner_id: 42 },
      });

      expect(response.statusCode).toBe(401);
      expect(response.json()).toMatchObject({ message: 'Invalid webhook secret' });
    });

    it('should reject an unsupported provider', async () => {
      await start();

      const response = await handle.fastify.inject({
        method: 'POST',
        url: '/api/webhooks/polar',
        headers: { 'x-webhook-secret': SECRET },
        payload: { owner_id: 42 },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({ message: 'Unsupported provider: polar' });
    });

    it('should need some way to identify the user', async () => {
      await start();

      const response = await handle.fastify.inject({
        method: 'POST',
        url: '/api/webhooks/strava',
        headers: { 'x-webhook-secret': SECRET },
        payload: { event_type: 'create' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json()).toMatchObject({
        message: 'Webhook must identify a user (user_id, owner_id or external_user_id)',
      });
    });

    it("drops the user's cached activity pages", async () => {
      const { activityCalls } = await start();
      const user = await signUp(handle.fastify);
      const tenantId = await createTenant(handle.fastify, user);
      handle.tokenStore.upsert(
        { user_id: user.id, tenant_id: tenantId, provider: 'strava' },
        { access_token: 'test-access-token', refresh_token: null, token_type: 'Bearer', scope: null, expires_at: null }
      );
      const listActivities = () =>
        handle.fastify.inject({
          method: 'POST',
          url: '/api/tools/get_activities',
          headers: bearer(user),
          payload: { provider: 'strava' },
        });

      await listActivities();
      await listActivities();
      expect(activityCalls()).toBe(1);

      const webhook = await handle.fastify.inject({
        method: 'POST',
        url: '/api/webhooks/strava',
        headers: { 'x-webhook-secret': SECRET },
        payload: { user_id: user.id, event_type: 'create' },
      });
      await listActivities();

      expect(webhook.statusCode).toBe(200);
      expect(webhook.json()).toEqual({ success: true, data: { provider: 'strava', users: 1, invalidated: 1 } });
      expect(activityCalls()).toBe(2);
    });
  });
});
