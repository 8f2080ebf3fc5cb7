/**
 * OAuth 2.0 Authorization Server
 *
 * Issues internal access tokens to registered clients:
 * - authorization_code with mandatory PKCE (S256)
 * - refresh_token with rotation (the presented token is revoked atomically)
 * - client_credentials (token without a user subject)
 * - password (ROPC), delegated to the password grant
 *
 * Authorization codes are one-time records in the authorization-state store,
 * keyed by the code and bound to the client id through the `provider` column.
 */

import crypto from 'crypto';
import {
  AuthenticationError,
  OAuth2Error,
  consumeRefreshToken,
  consumeState,
  getUserById,
  insertRefreshToken,
  logger,
  storeState,
  type DatabaseClient,
  type OAuthClient,
  type User,
} from '@pierre/core';
import { passwordGrant, type TokenResponse, type TokenService } from '@pierre/authn-jwt';
import type { ClientRegistry } from './client-registry.js';

/** Authorization codes live one minute */
export const AUTHORIZATION_CODE_TTL_MS = 60 * 1000;

/**
 * RFC 8414 authorization server metadata
 */
export interface AuthorizationServerMetadata {
  issuer: string;
  authorization_endpoint: string;
  token_endpoint: string;
  registration_endpoint: string;
  jwks_uri: string;
  grant_types_supported: string[];
  response_types_supported: string[];
  token_endpoint_auth_methods_supported: string[];
  code_challenge_methods_supported: string[];
}

export interface AuthorizeRequest {
  response_type?: string;
  client_id?: string;
  redirect_uri?: string;
  scope?: string;
  state?: string;
  code_challenge?: string;
  code_challenge_method?: string;
}

/** Logged-in user at the authorization endpoint */
export interface AuthorizeSession {
  userId: string;
  tenantId?: string;
}

export type AuthorizeOutcome =
  | { kind: 'login_required'; loginUrl: string }
  | { kind: 'redirect'; location: string };

/**
 * Form fields of POST /oauth2/token
 */
export interface TokenRequest {
  grant_type?: string;
  code?: string;
  redirect_uri?: string;
  code_verifier?: string;
  refresh_token?: string;
  client_id?: string;
  client_secret?: string;
  username?: string;
  password?: string;
  scope?: string;
}

export interface RefreshRequest {
  refresh_token?: string;
  client_id?: string;
  client_secret?: string;
}

export type ValidateAndRefreshResult =
  | { status: 'valid'; expires_in: number }
  | ({ status: 'refreshed' } & TokenResponse)
  | { status: 'invalid'; reason: string; requires_full_reauth: true };

export interface AuthorizationServerOptions {
  /** Public origin, used as issuer and for endpoint URLs */
  baseUrl: string;
  /** Where unauthenticated users are sent; defaults to the base URL */
  loginBaseUrl?: string;
  refreshTokenLifetimeSeconds: number;
  now?: () => Date;
}

const PKCE_METHOD = 'S256';

/** RFC 7636 §4.1: 43..128 characters of the unreserved set */
const CODE_VERIFIER_PATTERN = /^[A-Za-z0-9\-._~]{43,128}$/;

export function computeCodeChallenge(verifier: string): string {
  return crypto.createHash('sha256').update(verifier).digest('base64url');
}

function safeEqual(a: string, b: string): boolean {
  const left = Buffer.from(a);
  const right = Buffer.from(b);
  return left.length === right.length && crypto.timingSafeEqual(left, right);
}

export class AuthorizationServer {
  private readonly baseUrl: string;
  private readonly loginBaseUrl: string;
  private readonly refreshTokenLifetimeMs: number;
  private readonly now: () => Date;

  constructor(
    private readonly db: DatabaseClient,
    private readonly clients: ClientRegistry,
    private readonly tokens: TokenService,
    options: AuthorizationServerOptions
  ) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.loginBaseUrl = (options.loginBaseUrl ?? options.baseUrl).replace(/\/+$/, '');
    this.refreshTokenLifetimeMs = options.refreshTokenLifetimeSeconds * 1000;
    this.now = options.now ?? (() => new Date());
  }

  metadata(): AuthorizationServerMetadata {
    return {
      issuer: this.baseUrl,
      authorization_endpoint: `${this.baseUrl}/oauth2/authorize`,
      token_endpoint: `${this.baseUrl}/oauth2/token`,
      registration_endpoint: `${this.baseUrl}/oauth2/register`,
      jwks_uri: `${this.baseUrl}/.well-known/jwks.json`,
      grant_types_supported: ['authorization_code', 'client_credentials', 'refresh_token'],
      response_types_supported: ['code'],
      token_endpoint_auth_methods_supported: ['client_secret_post'],
      code_challenge_methods_supported: [PKCE_METHOD],
    };
  }

  /**
   * Authorization endpoint
   *
   * Client and redirect URI problems are thrown (answered directly, never
   * redirected); every later problem is reported to the redirect URI.
   *
   * @throws OAuth2Error invalid_request / invalid_client
   */
  async authorize(request: AuthorizeRequest, session: AuthorizeSession | null): Promise<AuthorizeOutcome> {
    if (!request.client_id) {
      throw new OAuth2Error('invalid_request', 'client_id is required');
    }
    const client = await this.clients.getClient(request.client_id);
    if (!client) {
      throw new OAuth2Error('invalid_client', 'Unknown client', 400);
    }
    if (!request.redirect_uri || !client.redirect_uris.includes(request.redirect_uri)) {
      throw new OAuth2Error('invalid_request', 'redirect_uri does not match a registered URI');
    }

    if (!session) {
      return { kind: 'login_required', loginUrl: this.loginUrl(request) };
    }

    const redirectUri = request.redirect_uri;
    if (request.response_type !== 'code') {
      return this.redirectError(redirectUri, 'unsupported_response_type', 'response_type must be code', request.state);
    }
    if (!client.grant_types.includes('authorization_code')) {
      return this.redirectError(redirectUri, 'unauthorized_client', 'Client may not use the authorization code grant', request.state);
    }
    if (!request.code_challenge) {
      return this.redirectError(redirectUri, 'invalid_request', 'code_challenge is required', request.state);
    }
    if (request.code_challenge_method !== PKCE_METHOD) {
      return this.redirectError(redirectUri, 'invalid_request', 'code_challenge_method must be S256', request.state);
    }

    const code = crypto.randomBytes(16).toString('hex');
    const now = this.now();
    await storeState(this.db, {
      state: code,
      provider: client.id,
      user_id: session.userId,
      tenant_id: session.tenantId ?? null,
      redirect_uri: redirectUri,
      scope: request.scope ?? null,
      code_challenge: request.code_challenge,
      code_challenge_method: PKCE_METHOD,
      created_at: now.toISOString(),
      expires_at: new Date(now.getTime() + AUTHORIZATION_CODE_TTL_MS).toISOString(),
    });

    logger.info({ clientId: client.id, userId: session.userId }, '[oauth2] Authorization code issued');

    const location = new URL(redirectUri);
    location.searchParams.set('code', code);
    if (request.state !== undefined) {
      location.searchParams.set('state', request.state);
    }
    return { kind: 'redirect', location: location.toString() };
  }

  /**
   * Token endpoint
   *
   * @throws OAuth2Error with the RFC 6749 §5.2 code
   */
  async token(request: TokenRequest): Promise<TokenResponse> {
    switch (request.grant_type) {
      case 'authorization_code':
        return this.authorizationCodeGrant(request);
      case 'refresh_token':
        return this.refreshTokenGrant(request);
      case 'client_credentials':
        return this.clientCredentialsGrant(request);
      case 'password':
        return passwordGrant(this.db, this.tokens, request);
      case undefined:
      case '':
        throw new OAuth2Error('invalid_request', 'grant_type is required');
      default:
        throw new OAuth2Error('unsupported_grant_type', `Unsupported grant type: ${request.grant_type}`);
    }
  }

  /**
   * Check a bearer token and, when it no longer validates and a refresh
   * token is supplied, roll it.
   */
  async validateAndRefresh(accessToken: string | undefined, refresh: RefreshRequest = {}): Promise<ValidateAndRefreshResult> {
    try {
      const claims = await this.tokens.validate(accessToken);
      const nowSeconds = Math.floor(this.now().getTime() / 1000);
      return { status: 'valid', expires_in: Math.max(0, claims.exp - nowSeconds) };
    } catch (err) {
      if (!(err instanceof AuthenticationError)) {
        throw err;
      }
      if (!refresh.refresh_token) {
        return {
          status: 'invalid',
          reason: err.kind === 'auth_expired' ? 'token_expired' : 'token_invalid',
          requires_full_reauth: true,
        };
      }
    }

    try {
      const response = await this.token({ grant_type: 'refresh_token', ...refresh });
      return { status: 'refreshed', ...response };
    } catch (err) {
      if (!(err instanceof OAuth2Error)) {
        throw err;
      }
      logger.info({ error: err.error }, '[oauth2] Refresh during validation failed');
      return { status: 'invalid', reason: 'refresh_failed', requires_full_reauth: true };
    }
  }

  // ===== Grants =====

  private async authorizationCodeGrant(request: TokenRequest): Promise<TokenResponse> {
    const client = await this.clients.authenticate(request.client_id, request.client_secret);
    this.requireGrant(client, 'authorization_code');
    if (!request.code) {
      throw new OAuth2Error('invalid_request', 'code is required');
    }

    // Consumed before any other check so a code never survives a failed attempt
    const record = await consumeState(this.db, request.code, client.id, this.now());
    if (!record || !record.user_id) {
      throw new OAuth2Error('invalid_grant', 'Invalid or expired authorization code');
    }
    if (record.redirect_uri !== request.redirect_uri) {
      throw new OAuth2Error('invalid_grant', 'redirect_uri does not match the authorization request');
    }
    if (record.code_challenge) {
      const verifier = request.code_verifier;
      if (!verifier || !CODE_VERIFIER_PATTERN.test(verifier) || !safeEqual(computeCodeChallenge(verifier), record.code_challenge)) {
        logger.warn({ clientId: client.id }, '[oauth2] PKCE verification failed');
        throw new OAuth2Error('invalid_grant', 'PKCE verification failed');
      }
    }

    const user = await this.activeUser(record.user_id);
    return this.issue(client, user, record.tenant_id, record.scope);
  }

  private async refreshTokenGrant(request: TokenRequest): Promise<TokenResponse> {
    const client = await this.clients.authenticate(request.client_id, request.client_secret);
    this.requireGrant(client, 'refresh_token');
    if (!request.refresh_token) {
      throw new OAuth2Error('invalid_request', 'refresh_token is required');
    }

    const row = await consumeRefreshToken(this.db, request.refresh_token, client.id, this.now());
    if (!row) {
      throw new OAuth2Error('invalid_grant', 'Invalid or expired refresh token');
    }

    const user = await this.activeUser(row.user_id);
    logger.info({ clientId: client.id, userId: user.id }, '[oauth2] Refresh token rotated');
    return this.issue(client, user, row.tenant_id, row.scope);
  }

  private async clientCredentialsGrant(request: TokenRequest): Promise<TokenResponse> {
    const client = await this.clients.authenticate(request.client_id, request.client_secret);
    this.requireGrant(client, 'client_credentials');

    const minted = await this.tokens.mintClientToken(client.id);
    logger.info({ clientId: client.id }, '[oauth2] Client credentials token issued');
    return {
      access_token: minted.token,
      token_type: 'Bearer',
      expires_in: minted.expiresIn,
      ...(request.scope ? { scope: request.scope } : {}),
    };
  }

  // ===== Helpers =====

  private requireGrant(client: OAuthClient, grant: OAuthClient['grant_types'][number]): void {
    if (!client.grant_types.includes(grant)) {
      throw new OAuth2Error('unauthorized_client', `Client may not use the ${grant} grant`);
    }
  }

  private async activeUser(userId: string): Promise<User> {
    const user = await getUserById(this.db, userId);
    if (!user || user.status !== 'active') {
      throw new OAuth2Error('invalid_grant', 'User is not active');
    }
    return user;
  }

  private async issue(client: OAuthClient, user: User, tenantId: string | null, scope: string | null): Promise<TokenResponse> {
    const minted = await this.tokens.mint({ userId: user.id, role: user.role, activeTenantId: tenantId });
    const response: TokenResponse = {
      access_token: minted.token,
      token_type: 'Bearer',
      expires_in: minted.expiresIn,
      ...(scope ? { scope } : {}),
    };

    if (client.grant_types.includes('refresh_token')) {
      const refreshToken = crypto.randomBytes(32).toString('base64url');
      await insertRefreshToken(this.db, refreshToken, {
        client_id: client.id,
        user_id: user.id,
        tenant_id: tenantId,
        scope,
        expires_at: new Date(this.now().getTime() + this.refreshTokenLifetimeMs).toISOString(),
      });
      response.refresh_token = refreshToken;
    }
    return response;
  }

  private loginUrl(request: AuthorizeRequest): string {
    const authorize = new URL(`${this.baseUrl}/oauth2/authorize`);
    for (const [key, value] of Object.entries(request)) {
      if (typeof value === 'string') {
        authorize.searchParams.set(key, value);
      }
    }
    const login = new URL(`${this.loginBaseUrl}/login`);
    login.searchParams.set('redirect', authorize.toString());
    return login.toString();
  }

  private redirectError(redirectUri: string, error: string, description: string, state: string | undefined): AuthorizeOutcome {
    const location = new URL(redirectUri);
    location.searchParams.set('error', error);
    location.searchParams.set('error_description', description);
    if (state !== undefined) {
      location.searchParams.set('state', state);
    }
    return { kind: 'redirect', location: location.toString() };
  }
}
