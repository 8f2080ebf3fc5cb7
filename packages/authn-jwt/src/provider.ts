/**
 * JWT Authentication Provider
 *
 * Implements AuthenticationProvider SPI. Credential order:
 * 1. `Authorization: Bearer <jwt>`
 * 2. cookie `auth_token`, then `pierre_session`
 * 3. none (auth_required)
 *
 * Cookie-authenticated requests with an unsafe method need a CSRF token
 * bound to the same user. The active tenant is the token claim, else the
 * user's primary tenant. Users that are no longer active fail as invalid.
 */

import {
  AuthenticationError,
  getMembership,
  getPrimaryTenantId,
  getUserById,
  logger,
  type AuthError,
  type AuthRequest,
  type AuthResult,
  type AuthenticationProvider,
  type DatabaseClient,
  type ProviderHealth,
  type SessionContext,
} from '@pierre/core';
import type { AuthMethod, TokenClaims } from '@pierre/protocol';
import type { CsrfStore } from './csrf.js';
import type { TokenService } from './token-service.js';

export const SESSION_COOKIE_NAMES = ['auth_token', 'pierre_session'] as const;
export const CSRF_HEADER = 'x-csrf-token';

const UNSAFE_METHODS = new Set(['POST', 'PUT', 'PATCH', 'DELETE']);

export function extractBearerToken(header: string | undefined): string | undefined {
  const match = header?.match(/^Bearer\s+(\S+)$/i);
  return match?.[1];
}

export class JwtAuthProvider implements AuthenticationProvider {
  readonly id = 'jwt';

  constructor(
    private readonly db: DatabaseClient,
    private readonly tokens: TokenService,
    private readonly csrf: CsrfStore
  ) {}

  async initialize(): Promise<void> {
    logger.info('[authn-jwt] Provider initialized');
  }

  async authenticate(request: AuthRequest): Promise<AuthResult> {
    const credential = this.extractCredential(request);
    if (!credential) {
      return this.fail('auth_required', 'No credentials provided');
    }

    let claims: TokenClaims;
    try {
      claims = await this.tokens.validate(credential.token);
    } catch (err) {
      if (err instanceof AuthenticationError) {
        return this.fail(err.kind === 'auth_expired' ? 'auth_expired' : 'auth_invalid', err.message);
      }
      throw err;
    }

    if (claims.token_use === 'client') {
      return {
        success: true,
        session: {
          session_id: claims.jti ?? claims.sub,
          client_id: claims.client_id ?? claims.sub,
          role: 'user',
          auth_method: 'client_credentials',
          issued_at: claims.iat,
          expires_at: claims.exp,
        },
      };
    }

    const user = await getUserById(this.db, claims.sub);
    if (!user || user.status !== 'active') {
      return this.fail('auth_invalid', 'User account is not active');
    }

    if (credential.method === 'cookie' && UNSAFE_METHODS.has(request.method.toUpperCase())) {
      if (!this.csrf.validate(user.id, request.headers[CSRF_HEADER])) {
        logger.warn({ userId: user.id, method: request.method }, '[authn-jwt] CSRF token missing or invalid');
        return this.fail('permission_denied', 'Missing or invalid CSRF token');
      }
    }

    let tenantId = claims.active_tenant_id;
    if (tenantId && !(await getMembership(this.db, tenantId, user.id)) && user.role !== 'super_admin') {
      return this.fail('auth_invalid', 'Active tenant is no longer available to this user');
    }
    tenantId ??= (await getPrimaryTenantId(this.db, user.id)) ?? undefined;

    const session: SessionContext = {
      session_id: claims.jti ?? claims.sub,
      user_id: user.id,
      tenant_id: tenantId,
      role: user.role,
      auth_method: credential.method,
      issued_at: claims.iat,
      expires_at: claims.exp,
    };
    return { success: true, session };
  }

  async healthCheck(): Promise<ProviderHealth> {
    return {
      status: 'healthy',
      last_checked: new Date().toISOString(),
    };
  }

  private extractCredential(request: AuthRequest): { token: string; method: AuthMethod } | null {
    const bearer = extractBearerToken(request.headers['authorization']);
    if (bearer) {
      return { token: bearer, method: 'bearer' };
    }
    for (const name of SESSION_COOKIE_NAMES) {
      const cookie = request.cookies[name];
      if (cookie) {
        return { token: cookie, method: 'cookie' };
      }
    }
    return null;
  }

  private fail(kind: AuthError['kind'], message: string): AuthResult {
    logger.debug({ kind }, `[authn-jwt] Authentication failed: ${message}`);
    return { success: false, error: { kind, message, provider: this.id } };
  }
}
