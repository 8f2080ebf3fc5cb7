import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  closeDatabase,
  createTenant,
  createUser,
  suspendUser,
  type AuthRequest,
  type DatabaseClient,
  type User,
} from '@pierre/core';
import { KeySetManager } from '../src/key-set.js';
import { TokenService } from '../src/token-service.js';
import { CsrfStore } from '../src/csrf.js';
import { JwtAuthProvider } from '../src/provider.js';
import { TestClock, createTestDatabase, createTestVault } from './helpers.js';

function request(overrides: Partial<AuthRequest> = {}): AuthRequest {
  return { headers: {}, cookies: {}, method: 'GET', sourceIp: '127.0.0.1', ...overrides };
}

describe('JwtAuthProvider', () => {
  let db: DatabaseClient;
  let clock: TestClock;
  let tokens: TokenService;
  let csrf: CsrfStore;
  let provider: JwtAuthProvider;
  let user: User;
  let tenantId: string;

  beforeEach(async () => {
    db = await createTestDatabase();
    clock = new TestClock();
    const keys = new KeySetManager(db, createTestVault(), { now: clock.now });
    await keys.initialize({ bootstrap: true });
    tokens = new TokenService(keys, { now: clock.now });
    csrf = new CsrfStore();
    provider = new JwtAuthProvider(db, tokens, csrf);

    user = await createUser(db, { email: 'runner@example.com', status: 'active' });
    tenantId = (await createTenant(db, { name: 'Club', slug: 'club', owner_user_id: user.id })).id;
  });

  afterEach(async () => {
    await closeDatabase(db);
  });

  it('should require credentials', async () => {
    expect(await provider.authenticate(request())).toEqual({
      success: false,
      error: { kind: 'auth_required', message: 'No credentials provided', provider: 'jwt' },
    });
  });

  it('should authenticate a bearer token and fall back to the primary tenant', async () => {
    const { token, claims } = await tokens.mint({ userId: user.id, role: 'user' });

    const result = await provider.authenticate(request({ headers: { authorization: `Bearer ${token}` } }));

    expect(result.success).toBe(true);
    expect(result.session).toEqual({
      session_id: claims.jti,
      user_id: user.id,
      tenant_id: tenantId,
      role: 'user',
      auth_method: 'bearer',
      issued_at: claims.iat,
      expires_at: claims.exp,
    });
  });

  it('should prefer the bearer header over a session cookie', async () => {
    const { token } = await tokens.mint({ userId: user.id, role: 'user', activeTenantId: tenantId });

    const result = await provider.authenticate(
      request({ headers: { authorization: `Bearer ${token}` }, cookies: { auth_token: 'stale' } })
    );

    expect(result.session?.auth_method).toBe('bearer');
  });

  it('should accept either session cookie for safe methods', async () => {
    const { token } = await tokens.mint({ userId: user.id, role: 'user' });

    const viaAuthToken = await provider.authenticate(request({ cookies: { auth_token: token } }));
    const viaSession = await provider.authenticate(request({ cookies: { pierre_session: token } }));

    expect(viaAuthToken.session?.auth_method).toBe('cookie');
    expect(viaSession.session?.auth_method).toBe('cookie');
  });

  it('should demand a CSRF token for unsafe methods on cookie auth only', async () => {
    const { token } = await tokens.mint({ userId: user.id, role: 'user' });

    const missing = await provider.authenticate(request({ method: 'POST', cookies: { auth_token: token } }));
    expect(missing.error).toEqual({ kind: 'permission_denied', message: 'Missing or invalid CSRF token', provider: 'jwt' });

    const withCsrf = await provider.authenticate(
      request({ method: 'POST', cookies: { auth_token: token }, headers: { 'x-csrf-token': csrf.issue(user.id) } })
    );
    expect(withCsrf.success).toBe(true);

    const otherUsersCsrf = await provider.authenticate(
      request({ method: 'DELETE', cookies: { auth_token: token }, headers: { 'x-csrf-token': csrf.issue('someone-else') } })
    );
    expect(otherUsersCsrf.error?.kind).toBe('permission_denied');

    const bearer = await provider.authenticate(request({ method: 'POST', headers: { authorization: `Bearer ${token}` } }));
    expect(bearer.success).toBe(true);
  });

  it('should reject users that are no longer active', async () => {
    const { token } = await tokens.mint({ userId: user.id, role: 'user' });
    await suspendUser(db, user.id);

    const result = await provider.authenticate(request({ headers: { authorization: `Bearer ${token}` } }));

    expect(result.error).toEqual({ kind: 'auth_invalid', message: 'User account is not active', provider: 'jwt' });
  });

  it('should report expired tokens as auth_expired', async () => {
    const { token } = await tokens.mint({ userId: user.id, role: 'user' });
    clock.advanceSeconds(86400);

    const result = await provider.authenticate(request({ headers: { authorization: `Bearer ${token}` } }));

    expect(result.error?.kind).toBe('auth_expired');
  });

  it('should reject an active tenant the user does not belong to', async () => {
    const other = await createUser(db, { email: 'coach@example.com', status: 'active' });
    const foreign = await createTenant(db, { name: 'Other', slug: 'other', owner_user_id: other.id });
    const { token } = await tokens.mint({ userId: user.id, role: 'user', activeTenantId: foreign.id });

    const result = await provider.authenticate(request({ headers: { authorization: `Bearer ${token}` } }));

    expect(result.error?.kind).toBe('auth_invalid');
  });

  it('should describe client-credentials tokens without a user', async () => {
    const { token } = await tokens.mintClientToken('client-1');

    const result = await provider.authenticate(request({ headers: { authorization: `Bearer ${token}` } }));

    expect(result.session).toMatchObject({ client_id: 'client-1', auth_method: 'client_credentials', role: 'user' });
    expect(result.session?.user_id).toBeUndefined();
  });
});
