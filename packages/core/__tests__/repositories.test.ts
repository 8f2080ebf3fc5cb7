/**
 * Repository tests against an in-memory SQLite database
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { closeDatabase, type DatabaseClient } from '../src/db/client.js';
import {
  createUser,
  getUserByEmail,
  verifyUserCredentials,
  approveUser,
  suspendUser,
  deleteUser,
} from '../src/db/repositories/users.js';
import { createTenant, addTenantMember, getPrimaryTenantId, listTenantsForUser } from '../src/db/repositories/tenants.js';
import { storeState, consumeState, cleanupExpiredStates, MAX_STATE_TTL_MS } from '../src/db/repositories/oauth-states.js';
import {
  insertOAuthClient,
  insertRefreshToken,
  consumeRefreshToken,
  getOAuthClientById,
} from '../src/db/repositories/oauth-clients.js';
import { upsertTokenWithConnection, listTokenRows, getProviderConnection } from '../src/db/repositories/oauth-tokens.js';
import { createAdminToken, authenticateAdminToken, revokeAdminToken } from '../src/db/repositories/admin-tokens.js';
import { setSetting, getListSetting, getBooleanSetting } from '../src/db/repositories/settings.js';
import { upsertToolOverride, listToolOverrides, deleteToolOverride } from '../src/db/repositories/tool-overrides.js';
import { insertAuditLogRows, queryAuditLog } from '../src/db/repositories/audit-log.js';
import { createTestDatabase } from './helpers.js';

describe('repositories', () => {
  let db: DatabaseClient;

  beforeEach(async () => {
    db = await createTestDatabase();
  });

  afterEach(async () => {
    await closeDatabase(db);
  });

  describe('users', () => {
    it('should store emails lower-cased and reject duplicates case-insensitively', async () => {
      const user = await createUser(db, { email: 'Runner@Example.com', password: 'test-password' });
      expect(user.email).toBe('runner@example.com');
      expect(user.status).toBe('pending');
      expect(user.approved_at).toBeNull();

      await expect(createUser(db, { email: 'RUNNER@example.com', password: 'other-password' })).rejects.toThrow(
        'Email already registered'
      );
    });

    it('should verify credentials and report inactive accounts', async () => {
      await createUser(db, { email: 'a@example.com', password: 'test-password' });

      expect(await verifyUserCredentials(db, 'a@example.com', 'wrong-password')).toEqual({
        ok: false,
        reason: 'invalid_credentials',
      });
      expect(await verifyUserCredentials(db, 'nobody@example.com', 'test-password')).toEqual({
        ok: false,
        reason: 'invalid_credentials',
      });
      expect(await verifyUserCredentials(db, 'a@example.com', 'test-password')).toEqual({
        ok: false,
        reason: 'not_active',
      });
    });

    it('should walk the status state machine', async () => {
      const admin = await createUser(db, { email: 'admin@example.com', role: 'admin', status: 'active' });
      const user = await createUser(db, { email: 'u@example.com', password: 'test-password' });

      const approved = await approveUser(db, user.id, admin.id);
      expect(approved.status).toBe('active');
      expect(approved.approved_by).toBe(admin.id);
      const approvedAt = approved.approved_at;
      expect(approvedAt).not.toBeNull();

      const suspended = await suspendUser(db, user.id);
      expect(suspended.status).toBe('suspended');
      await expect(suspendUser(db, user.id)).rejects.toThrow("Cannot suspend a user in status 'suspended'");

      // suspended -> active keeps the original approval stamp
      const reactivated = await approveUser(db, user.id, admin.id);
      expect(reactivated.status).toBe('active');
      expect(reactivated.approved_at).toBe(approvedAt);

      const check = await verifyUserCredentials(db, 'u@example.com', 'test-password');
      expect(check.ok).toBe(true);
    });

    it('should cascade user deletion to memberships and tokens', async () => {
      const owner = await createUser(db, { email: 'o@example.com', status: 'active' });
      const member = await createUser(db, { email: 'm@example.com', status: 'active' });
      const tenant = await createTenant(db, { name: 'Club', slug: 'club', owner_user_id: owner.id });
      await addTenantMember(db, tenant.id, member.id);
      upsertTokenWithConnection(
        db,
        { user_id: member.id, tenant_id: tenant.id, provider: 'strava' },
        { access_token: 'ct', refresh_token: null, token_type: 'Bearer', scope: null, expires_at: null }
      );

      expect(await deleteUser(db, member.id)).toBe(true);
      expect(await listTenantsForUser(db, member.id)).toEqual([]);
      expect(await listTokenRows(db, member.id)).toEqual([]);
      expect(await getUserByEmail(db, 'm@example.com')).toBeNull();
    });
  });

  describe('tenants', () => {
    it('should create a tenant with an owner membership', async () => {
      const owner = await createUser(db, { email: 'o@example.com', status: 'active' });
      const tenant = await createTenant(db, { name: 'Club', slug: 'club', owner_user_id: owner.id });

      const tenants = await listTenantsForUser(db, owner.id);
      expect(tenants).toHaveLength(1);
      expect(tenants[0]).toMatchObject({ id: tenant.id, member_role: 'owner' });
    });

    it('should reject invalid and taken slugs', async () => {
      const owner = await createUser(db, { email: 'o@example.com', status: 'active' });
      await expect(createTenant(db, { name: 'A', slug: 'admin', owner_user_id: owner.id })).rejects.toThrow(
        "Slug 'admin' is reserved"
      );
      await createTenant(db, { name: 'A', slug: 'ab', owner_user_id: owner.id });
      await expect(createTenant(db, { name: 'B', slug: 'ab', owner_user_id: owner.id })).rejects.toThrow(
        "Slug 'ab' is already taken"
      );
    });

    it('should resolve the primary tenant as the oldest membership', async () => {
      const owner = await createUser(db, { email: 'o@example.com', status: 'active' });
      const user = await createUser(db, { email: 'u@example.com', status: 'active' });
      const first = await createTenant(db, { name: 'First', slug: 'first', owner_user_id: owner.id });
      const second = await createTenant(db, { name: 'Second', slug: 'second', owner_user_id: owner.id });

      await addTenantMember(db, second.id, user.id, 'member', '2026-02-01T00:00:00.000Z');
      await addTenantMember(db, first.id, user.id, 'member', '2026-03-01T00:00:00.000Z');

      expect(await getPrimaryTenantId(db, user.id)).toBe(second.id);
      expect(await getPrimaryTenantId(db, 'unknown')).toBeNull();
    });
  });

  describe('authorization states', () => {
    const created = new Date('2026-05-01T12:00:00.000Z');
    const expires = new Date(created.getTime() + 60_000);

    function record(state: string, provider = 'strava') {
      return {
        state,
        provider,
        user_id: null,
        tenant_id: null,
        redirect_uri: 'https://app/cb',
        scope: null,
        pkce_code_verifier: 'verifier',
        code_challenge: null,
        code_challenge_method: null,
        created_at: created.toISOString(),
        expires_at: expires.toISOString(),
      };
    }

    it('should consume a state exactly once', async () => {
      await storeState(db, record('s1'));

      const results = await Promise.all([consumeState(db, 's1', 'strava', created), consumeState(db, 's1', 'strava', created)]);
      expect(results.filter((r) => r !== null)).toHaveLength(1);
      expect(results.find((r) => r !== null)?.pkce_code_verifier).toBe('verifier');
      expect(await consumeState(db, 's1', 'strava', created)).toBeNull();
    });

    it('should reject at exactly expires_at and accept one millisecond earlier', async () => {
      await storeState(db, record('edge'));
      await storeState(db, record('early'));

      expect(await consumeState(db, 'edge', 'strava', expires)).toBeNull();
      expect(await consumeState(db, 'early', 'strava', new Date(expires.getTime() - 1))).not.toBeNull();
    });

    it('should reject a provider mismatch and unknown states', async () => {
      await storeState(db, record('s2'));
      expect(await consumeState(db, 's2', 'fitbit', created)).toBeNull();
      expect(await consumeState(db, 'missing', 'strava', created)).toBeNull();
      // the mismatch did not burn the state
      expect(await consumeState(db, 's2', 'strava', created)).not.toBeNull();
    });

    it('should reject duplicate states', async () => {
      await storeState(db, record('dup'));
      await expect(storeState(db, record('dup'))).rejects.toThrow('State already exists');
    });

    it('should clamp lifetimes to ten minutes', async () => {
      const stored = await storeState(db, {
        ...record('long'),
        expires_at: new Date(created.getTime() + 60 * 60 * 1000).toISOString(),
      });
      expect(stored.expires_at).toBe(new Date(created.getTime() + MAX_STATE_TTL_MS).toISOString());
    });

    it('should sweep expired and used states', async () => {
      await storeState(db, record('used'));
      await storeState(db, record('live'));
      await consumeState(db, 'used', 'strava', created);

      expect(await cleanupExpiredStates(db, created)).toBe(1);
      expect(await cleanupExpiredStates(db, expires)).toBe(1);
    });
  });

  describe('oauth clients and refresh tokens', () => {
    it('should decode JSON columns and rotate refresh tokens once', async () => {
      const user = await createUser(db, { email: 'u@example.com', status: 'active' });
      await insertOAuthClient(db, {
        id: 'client-1',
        client_name: 'CLI',
        client_secret_hash: 'hash',
        redirect_uris: ['https://app/cb'],
        grant_types: ['authorization_code', 'refresh_token'],
        response_types: ['code'],
        scopes: ['read'],
        created_at: '2026-01-01T00:00:00.000Z',
      });

      const client = await getOAuthClientById(db, 'client-1');
      expect(client?.redirect_uris).toEqual(['https://app/cb']);
      expect(client?.grant_types).toEqual(['authorization_code', 'refresh_token']);

      await insertRefreshToken(db, 'refresh-1', {
        client_id: 'client-1',
        user_id: user.id,
        tenant_id: null,
        scope: 'read',
        expires_at: '2099-01-01T00:00:00.000Z',
      });

      expect(await consumeRefreshToken(db, 'refresh-1', 'other-client')).toBeNull();
      const row = await consumeRefreshToken(db, 'refresh-1', 'client-1');
      expect(row?.user_id).toBe(user.id);
      expect(await consumeRefreshToken(db, 'refresh-1', 'client-1')).toBeNull();
    });
  });

  describe('upstream tokens', () => {
    it('should keep one row per (user, tenant, provider)', async () => {
      const user = await createUser(db, { email: 'u@example.com', status: 'active' });
      const key = { user_id: user.id, tenant_id: 't1', provider: 'strava' };
      const data = { access_token: 'a1', refresh_token: 'r1', token_type: 'Bearer', scope: 'read', expires_at: null };

      const first = upsertTokenWithConnection(db, key, data);
      const second = upsertTokenWithConnection(db, key, { ...data, access_token: 'a2' });

      expect(second.id).toBe(first.id);
      const rows = await listTokenRows(db, user.id);
      expect(rows).toHaveLength(1);
      expect(rows[0]?.access_token).toBe('a2');
      expect((await getProviderConnection(db, key))?.connection_type).toBe('oauth');
    });
  });

  describe('admin tokens', () => {
    it('should authenticate by prefix lookup and stop after revocation', async () => {
      const { token, record } = await createAdminToken(db, { service_name: 'ops', is_super_admin: true });
      expect(token.startsWith('pk_admin_')).toBe(true);

      const authenticated = await authenticateAdminToken(db, token);
      expect(authenticated?.id).toBe(record.id);
      expect(authenticated?.last_used_at).not.toBeNull();

      expect(await authenticateAdminToken(db, `${token}x`)).toBeNull();
      expect(await authenticateAdminToken(db, 'not-a-token')).toBeNull();

      await revokeAdminToken(db, record.id);
      expect(await authenticateAdminToken(db, token)).toBeNull();
    });

    it('should reject expired tokens', async () => {
      const { token } = await createAdminToken(db, { service_name: 'ops', expires_at: '2026-01-01T00:00:00.000Z' });
      expect(await authenticateAdminToken(db, token, new Date('2026-01-02T00:00:00.000Z'))).toBeNull();
    });
  });

  describe('settings', () => {
    it('should read JSON and comma lists and booleans', async () => {
      expect(await getListSetting(db, 'disabled_tools')).toEqual([]);
      await setSetting(db, 'disabled_tools', '["get_stats"]');
      expect(await getListSetting(db, 'disabled_tools')).toEqual(['get_stats']);
      await setSetting(db, 'disabled_tools', 'a, b');
      expect(await getListSetting(db, 'disabled_tools')).toEqual(['a', 'b']);

      expect(await getBooleanSetting(db, 'auto_approve_users')).toBeNull();
      await setSetting(db, 'auto_approve_users', 'true');
      expect(await getBooleanSetting(db, 'auto_approve_users')).toBe(true);
    });
  });

  describe('tool overrides', () => {
    it('should upsert and delete overrides per tenant', async () => {
      const owner = await createUser(db, { email: 'o@example.com', status: 'active' });
      const tenant = await createTenant(db, { name: 'Club', slug: 'club', owner_user_id: owner.id });

      await upsertToolOverride(db, { tenant_id: tenant.id, tool_name: 'get_stats', is_enabled: false, set_by: owner.id, reason: null });
      await upsertToolOverride(db, { tenant_id: tenant.id, tool_name: 'get_stats', is_enabled: true, set_by: owner.id, reason: 'back on' });

      const overrides = await listToolOverrides(db, tenant.id);
      expect(overrides).toHaveLength(1);
      expect(overrides[0]).toMatchObject({ tool_name: 'get_stats', is_enabled: true, reason: 'back on' });

      expect(await deleteToolOverride(db, tenant.id, 'get_stats')).toBe(true);
      expect(await listToolOverrides(db, tenant.id)).toEqual([]);
    });
  });

  describe('audit log', () => {
    it('should insert batches and query newest first', async () => {
      insertAuditLogRows(db, [
        { id: 'a1', timestamp: '2026-01-01T00:00:00.000Z', event_type: 'tool_call', tool_name: 'get_athlete', user_id: 'u1', tenant_id: 't1', status_code: 200, response_time_ms: 5 },
        { id: 'a2', timestamp: '2026-01-02T00:00:00.000Z', event_type: 'tool_call', tool_name: 'get_stats', user_id: 'u1', tenant_id: 't1', status_code: 404, response_time_ms: 7, error_kind: 'not_found' },
        { id: 'a3', timestamp: '2026-01-03T00:00:00.000Z', event_type: 'tool_call', tool_name: 'get_stats', user_id: 'u2', tenant_id: 't1', status_code: 200, response_time_ms: 3 },
      ]);

      const rows = await queryAuditLog(db, { user_id: 'u1' });
      expect(rows.map((r) => r.id)).toEqual(['a2', 'a1']);
      expect(rows[0]?.error_kind).toBe('not_found');
    });
  });
});
