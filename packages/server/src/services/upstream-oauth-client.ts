/**
 * Upstream OAuth Client
 *
 * Connects users to fitness providers: authorization URL construction,
 * code-for-token exchange, transparent refresh and disconnection, using
 * RFC 6749 and RFC 7636 (PKCE) where the provider wants it.
 *
 * The state string is `{user}:{random}` or, for mobile flows,
 * `{user}:{random}:{base64url(deep link)}`. It is only a lookup key; the
 * verifier and the tenant live in the stored state record.
 */

import crypto from 'crypto';
import { z } from 'zod';
import {
  AuthenticationError,
  ProviderError,
  ValidationError,
  consumeState,
  cleanupExpiredStates as coreCleanupExpiredStates,
  getPrimaryTenantId,
  getTenantCredentials,
  getUserById,
  isApprovedRedirectUri,
  logger,
  redactId,
  storeState,
  tenantSecretAad,
  userProviderPattern,
  type CacheProvider,
  type DatabaseClient,
  type OAuthStateRecord,
  type PierreConfig,
  type StoredToken,
  type TokenKey,
  type TokenStore,
  type TokenVault,
} from '@pierre/core';
import type { ProviderName } from '@pierre/protocol';
import type { ProviderDescriptor, ProviderOAuthConfig, ProviderRegistry } from '@pierre/providers';
import type { NotificationBus } from './notification-bus.js';

/** States are valid for ten minutes */
export const STATE_TTL_MS = 10 * 60 * 1000;

/** Tokens expiring within this window are refreshed before use */
export const REFRESH_BUFFER_MS = 5 * 60 * 1000;

/** Parameters an operator cannot override through additional auth params */
const RESERVED_AUTH_PARAMS = new Set([
  'client_id',
  'response_type',
  'redirect_uri',
  'state',
  'code_challenge',
  'code_challenge_method',
  'scope',
]);

const UpstreamTokenSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().nullish(),
  token_type: z.string().nullish(),
  expires_in: z.coerce.number().nullish(),
  /** Unix seconds (Strava) */
  expires_at: z.coerce.number().nullish(),
  scope: z.string().nullish(),
  athlete: z.object({ id: z.union([z.number(), z.string()]) }).nullish(),
  openId: z.string().nullish(),
  user_id: z.union([z.number(), z.string()]).nullish(),
});

type UpstreamToken = z.infer<typeof UpstreamTokenSchema>;

/** Application credentials used against one provider for one tenant */
export interface ResolvedCredentials {
  clientId: string;
  clientSecret: string;
  redirectUri: string;
  scopes: string[];
  source: 'tenant' | 'config';
}

export interface AuthorizationUrlOptions {
  /** Mobile deep link to return to after the callback */
  mobileRedirectUrl?: string;
}

export interface AuthorizationUrl {
  authorizationUrl: string;
  state: string;
  expiresAt: string;
}

export interface CallbackResult {
  user_id: string;
  tenant_id: string;
  provider: ProviderName;
  expires_at: string | null;
  scopes: string[];
  mobile_redirect_url?: string;
}

/**
 * A callback that failed after its state was consumed. Carries the deep link
 * recorded with that state, the only one a failure may redirect to.
 */
export class CallbackError extends Error {
  constructor(
    readonly failure: unknown,
    readonly mobileRedirectUrl: string | null
  ) {
    super(failure instanceof Error ? failure.message : 'OAuth callback failed');
    this.name = 'CallbackError';
  }
}

export interface UpstreamOAuthClientOptions {
  db: DatabaseClient;
  vault: TokenVault;
  tokenStore: TokenStore;
  registry: ProviderRegistry;
  cache: CacheProvider;
  bus: NotificationBus;
  /** Public origin for the default callback URL */
  baseUrl: string;
  /** Process-wide application credentials */
  providers: PierreConfig['providers'];
  timeoutMs: number;
  now?: () => Date;
}

export class UpstreamOAuthClient {
  private readonly db: DatabaseClient;
  private readonly vault: TokenVault;
  private readonly tokenStore: TokenStore;
  private readonly registry: ProviderRegistry;
  private readonly cache: CacheProvider;
  private readonly bus: NotificationBus;
  private readonly baseUrl: string;
  private readonly providers: PierreConfig['providers'];
  private readonly timeoutMs: number;
  private readonly now: () => Date;

  constructor(options: UpstreamOAuthClientOptions) {
    this.db = options.db;
    this.vault = options.vault;
    this.tokenStore = options.tokenStore;
    this.registry = options.registry;
    this.cache = options.cache;
    this.bus = options.bus;
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.providers = options.providers;
    this.timeoutMs = options.timeoutMs;
    this.now = options.now ?? (() => new Date());
  }

  callbackUrl(provider: string): string {
    return `${this.baseUrl}/api/oauth/callback/${provider}`;
  }

  /**
   * Tenant credentials first, then the process configuration
   *
   * @throws ValidationError when neither has a client id for the provider
   */
  async resolveCredentials(tenantId: string, provider: ProviderName): Promise<ResolvedCredentials> {
    const descriptor = this.registry.getDescriptor(provider);
    const defaultScopes = descriptor.oauth?.defaultScopes ?? [];

    const row = await getTenantCredentials(this.db, tenantId, provider);
    if (row) {
      return {
        clientId: row.client_id,
        clientSecret: this.vault.decrypt('tenant_secret', row.client_secret, tenantSecretAad(tenantId, provider)),
        redirectUri: row.redirect_uri ?? this.callbackUrl(provider),
        scopes: parseScopes(row.scopes, defaultScopes),
        source: 'tenant',
      };
    }

    const configured = this.providers[provider];
    if (configured) {
      return {
        clientId: configured.client_id,
        clientSecret: configured.client_secret,
        redirectUri: configured.redirect_uri ?? this.callbackUrl(provider),
        scopes: configured.scopes && configured.scopes.length > 0 ? configured.scopes : defaultScopes,
        source: 'config',
      };
    }

    throw new ValidationError(`${provider} client_id not configured`);
  }

  /**
   * Build the provider's authorization URL and persist the state record
   *
   * @throws ValidationError for an unknown provider, a provider without an
   *   OAuth flow, missing credentials or a deep link with a refused scheme
   */
  async buildAuthorizationUrl(
    userId: string,
    tenantId: string,
    providerName: string,
    options: AuthorizationUrlOptions = {}
  ): Promise<AuthorizationUrl> {
    const descriptor = this.registry.getDescriptor(providerName);
    const oauth = requireOAuth(descriptor);
    const credentials = await this.resolveCredentials(tenantId, descriptor.name);

    let state = `${userId}:${crypto.randomBytes(16).toString('hex')}`;
    if (options.mobileRedirectUrl !== undefined) {
      if (!isApprovedRedirectUri(options.mobileRedirectUrl)) {
        throw new ValidationError('mobile_redirect_url uses a scheme that is not allowed');
      }
      state += `:${Buffer.from(options.mobileRedirectUrl, 'utf8').toString('base64url')}`;
    }

    let codeVerifier: string | null = null;
    let codeChallenge: string | null = null;
    if (oauth.usePkce) {
      codeVerifier = crypto.randomBytes(64).toString('base64url');
      codeChallenge = crypto.createHash('sha256').update(codeVerifier).digest('base64url');
    }

    const now = this.now();
    const expiresAt = new Date(now.getTime() + STATE_TTL_MS).toISOString();
    await storeState(this.db, {
      state,
      provider: descriptor.name,
      user_id: userId,
      tenant_id: tenantId,
      redirect_uri: credentials.redirectUri,
      scope: credentials.scopes.join(oauth.scopeSeparator),
      pkce_code_verifier: codeVerifier,
      code_challenge: codeChallenge,
      code_challenge_method: codeChallenge ? 'S256' : null,
      created_at: now.toISOString(),
      expires_at: expiresAt,
    });

    const url = new URL(oauth.authUrl);
    url.searchParams.set('client_id', credentials.clientId);
    url.searchParams.set('response_type', 'code');
    url.searchParams.set('redirect_uri', credentials.redirectUri);
    url.searchParams.set('state', state);
    if (credentials.scopes.length > 0) {
      url.searchParams.set('scope', credentials.scopes.join(oauth.scopeSeparator));
    }
    if (codeChallenge) {
      url.searchParams.set('code_challenge', codeChallenge);
      url.searchParams.set('code_challenge_method', 'S256');
    }
    for (const [key, value] of Object.entries(oauth.additionalAuthParams)) {
      if (RESERVED_AUTH_PARAMS.has(key.toLowerCase())) {
        logger.warn({ provider: descriptor.name, param: key }, '[oauth-client] Blocked reserved auth parameter');
        continue;
      }
      url.searchParams.set(key, value);
    }

    logger.info(
      { provider: descriptor.name, userId, state: redactId(state), pkce: oauth.usePkce },
      '[oauth-client] Authorization URL generated'
    );
    return { authorizationUrl: url.toString(), state, expiresAt };
  }

  /**
   * Finish the provider's code flow
   *
   * @throws AuthenticationError when the state is unknown, used, expired or
   *   issued for another provider (one message for all)
   * @throws CallbackError wrapping any later failure: a vanished user
   *   (AuthenticationError), no tenant (ValidationError) or a failed token
   *   exchange (ProviderError)
   */
  async handleCallback(code: string, state: string, providerName: string): Promise<CallbackResult> {
    const descriptor = this.registry.getDescriptor(providerName);
    const oauth = requireOAuth(descriptor);

    const record = await consumeState(this.db, state, descriptor.name, this.now());
    if (!record || !record.user_id) {
      throw new AuthenticationError('Invalid or expired OAuth state');
    }

    const mobileRedirectUrl = deepLinkOf(record.state);
    try {
      return await this.completeCallback(code, record, record.user_id, descriptor, oauth, mobileRedirectUrl);
    } catch (err) {
      throw new CallbackError(err, mobileRedirectUrl);
    }
  }

  private async completeCallback(
    code: string,
    record: OAuthStateRecord,
    userId: string,
    descriptor: ProviderDescriptor,
    oauth: ProviderOAuthConfig,
    mobileRedirectUrl: string | null
  ): Promise<CallbackResult> {
    const user = await getUserById(this.db, userId);
    if (!user) {
      throw new AuthenticationError('Invalid or expired OAuth state');
    }
    const tenantId = record.tenant_id ?? (await getPrimaryTenantId(this.db, user.id));
    if (!tenantId) {
      throw new ValidationError('User has no tenant', { reason: 'tenant_missing' });
    }

    const credentials = await this.resolveCredentials(tenantId, descriptor.name);
    const params = new URLSearchParams({
      grant_type: 'authorization_code',
      code,
      redirect_uri: record.redirect_uri,
    });
    if (record.pkce_code_verifier) {
      params.set('code_verifier', record.pkce_code_verifier);
    }
    const upstream = await this.postToken(descriptor.name, oauth, credentials, params, 'Token exchange');

    const token = this.toStoredToken(upstream, null);
    const key: TokenKey = { user_id: user.id, tenant_id: tenantId, provider: descriptor.name };
    this.tokenStore.upsert(key, token);
    const externalUserId = externalUserIdOf(upstream);
    await this.tokenStore.registerProviderConnection(
      key,
      'oauth',
      externalUserId !== null ? { external_user_id: externalUserId } : undefined
    );

    await this.cache.invalidatePattern(userProviderPattern(tenantId, user.id, descriptor.name));

    this.bus.publish({
      type: 'oauth_completed',
      provider: descriptor.name,
      success: true,
      message: `${descriptor.displayName} connected`,
      user_id: user.id,
    });
    logger.info({ provider: descriptor.name, userId: user.id, tenantId }, '[oauth-client] Provider connected');

    return {
      user_id: user.id,
      tenant_id: tenantId,
      provider: descriptor.name,
      expires_at: token.expires_at ? token.expires_at.toISOString() : null,
      scopes: token.scope ? token.scope.split(/[\s,]+/).filter((s) => s.length > 0) : [],
      ...(mobileRedirectUrl !== null ? { mobile_redirect_url: mobileRedirectUrl } : {}),
    };
  }

  /**
   * Stored access token, refreshed first when it expires within five minutes
   *
   * @returns null when there is no usable token and the user must reconnect
   */
  async getValidToken(userId: string, tenantId: string, providerName: ProviderName): Promise<StoredToken | null> {
    const key: TokenKey = { user_id: userId, tenant_id: tenantId, provider: providerName };
    const stored = await this.tokenStore.fetch(key);
    if (!stored) {
      return null;
    }

    const now = this.now().getTime();
    if (!stored.expires_at || stored.expires_at.getTime() - now > REFRESH_BUFFER_MS) {
      return stored;
    }

    if (!stored.refresh_token) {
      logger.info({ provider: providerName, userId }, '[oauth-client] Token expiring without a refresh token');
      return stored.expires_at.getTime() > now ? stored : null;
    }

    const descriptor = this.registry.getDescriptor(providerName);
    const oauth = requireOAuth(descriptor);
    const credentials = await this.resolveCredentials(tenantId, providerName);
    const params = new URLSearchParams({ grant_type: 'refresh_token', refresh_token: stored.refresh_token });

    let upstream: UpstreamToken;
    try {
      upstream = await this.postToken(providerName, oauth, credentials, params, 'Token refresh');
    } catch (err) {
      if (err instanceof ProviderError && err.upstreamStatus !== undefined && err.upstreamStatus < 500) {
        this.tokenStore.delete(key);
        await this.cache.invalidatePattern(userProviderPattern(tenantId, userId, providerName));
        logger.warn({ provider: providerName, userId, status: err.upstreamStatus }, '[oauth-client] Refresh rejected, token dropped');
      } else {
        logger.warn({ err, provider: providerName, userId }, '[oauth-client] Refresh failed, token kept');
      }
      return null;
    }

    const refreshed = this.toStoredToken(upstream, stored.refresh_token);
    if (!(await this.tokenStore.update(key, refreshed))) {
      logger.warn({ provider: providerName, userId }, '[oauth-client] Token disconnected during refresh');
      return null;
    }
    logger.info({ provider: providerName, userId }, '[oauth-client] Token refreshed');
    return refreshed;
  }

  /**
   * Revoke upstream (best-effort), delete the token and connection and wipe
   * the user's cache entries for the provider.
   *
   * @returns true if the user was connected
   */
  async disconnect(userId: string, tenantId: string, providerName: string): Promise<boolean> {
    const descriptor = this.registry.getDescriptor(providerName);
    const key: TokenKey = { user_id: userId, tenant_id: tenantId, provider: descriptor.name };

    const stored = await this.tokenStore.fetch(key);
    if (stored && descriptor.oauth?.revokeUrl) {
      await this.revoke(descriptor, descriptor.oauth, tenantId, stored);
    }

    const hadToken = this.tokenStore.delete(key);
    const hadConnection = await this.tokenStore.removeProviderConnection(key);
    const evicted = await this.cache.invalidatePattern(userProviderPattern(tenantId, userId, descriptor.name));
    logger.info({ provider: descriptor.name, userId, evicted }, '[oauth-client] Provider disconnected');
    return hadToken || hadConnection;
  }

  /**
   * Sweep expired and used states. Called periodically.
   */
  async cleanupExpiredStates(): Promise<number> {
    return coreCleanupExpiredStates(this.db, this.now());
  }

  // ===== Upstream HTTP =====

  private async postToken(
    provider: ProviderName,
    oauth: ProviderOAuthConfig,
    credentials: ResolvedCredentials,
    params: URLSearchParams,
    operation: string
  ): Promise<UpstreamToken> {
    const headers: Record<string, string> = {
      'Content-Type': 'application/x-www-form-urlencoded',
      Accept: 'application/json',
    };
    if (oauth.tokenAuthMethod === 'client_secret_basic') {
      const basic = Buffer.from(`${credentials.clientId}:${credentials.clientSecret}`, 'utf8').toString('base64');
      headers.Authorization = `Basic ${basic}`;
    } else {
      params.set('client_id', credentials.clientId);
      params.set('client_secret', credentials.clientSecret);
    }

    let response: Response;
    try {
      response = await fetch(oauth.tokenUrl, {
        method: 'POST',
        headers,
        body: params.toString(),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err) {
      logger.warn({ err, provider }, `[oauth-client] ${operation} request failed`);
      throw new ProviderError(`${operation} failed`, provider, 'external_service');
    }

    if (!response.ok) {
      logger.warn({ provider, status: response.status }, `[oauth-client] ${operation} rejected`);
      throw new ProviderError(`${operation} failed`, provider, 'external_service', response.status);
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch {
      throw new ProviderError(`${operation} failed`, provider, 'external_service', response.status);
    }
    const parsed = UpstreamTokenSchema.safeParse(body);
    if (!parsed.success) {
      logger.warn({ provider }, `[oauth-client] ${operation} returned an unexpected body`);
      throw new ProviderError(`${operation} failed`, provider, 'external_service', 502);
    }
    return parsed.data;
  }

  private async revoke(
    descriptor: ProviderDescriptor,
    oauth: ProviderOAuthConfig,
    tenantId: string,
    stored: StoredToken
  ): Promise<void> {
    if (!oauth.revokeUrl) {
      return;
    }
    try {
      const credentials = await this.resolveCredentials(tenantId, descriptor.name);
      const params = new URLSearchParams({ token: stored.access_token });
      params.set('client_id', credentials.clientId);
      params.set('client_secret', credentials.clientSecret);
      const response = await fetch(oauth.revokeUrl, {
        method: 'POST',
        headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
        body: params.toString(),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
      if (!response.ok) {
        logger.info({ provider: descriptor.name, status: response.status }, '[oauth-client] Revocation returned an error');
      }
    } catch (err) {
      logger.warn({ err, provider: descriptor.name }, '[oauth-client] Revocation failed');
    }
  }

  private toStoredToken(upstream: UpstreamToken, previousRefreshToken: string | null): StoredToken {
    let expiresAt: Date | null = null;
    if (upstream.expires_in !== null && upstream.expires_in !== undefined) {
      expiresAt = new Date(this.now().getTime() + upstream.expires_in * 1000);
    } else if (upstream.expires_at !== null && upstream.expires_at !== undefined) {
      expiresAt = new Date(upstream.expires_at * 1000);
    }
    return {
      access_token: upstream.access_token,
      // Some providers rotate refresh tokens, others omit them on refresh
      refresh_token: upstream.refresh_token ?? previousRefreshToken,
      token_type: upstream.token_type ?? 'Bearer',
      scope: upstream.scope ?? null,
      expires_at: expiresAt,
    };
  }
}

function requireOAuth(descriptor: ProviderDescriptor): ProviderOAuthConfig {
  if (!descriptor.oauth) {
    throw new ValidationError(`${descriptor.displayName} does not use an OAuth code flow`);
  }
  return descriptor.oauth;
}

function parseScopes(raw: string, fallback: string[]): string[] {
  const parsed: unknown = JSON.parse(raw);
  const scopes = Array.isArray(parsed) ? parsed.filter((s): s is string => typeof s === 'string') : [];
  return scopes.length > 0 ? scopes : fallback;
}

function externalUserIdOf(upstream: UpstreamToken): string | null {
  const id = upstream.athlete?.id ?? upstream.openId ?? upstream.user_id;
  return id === null || id === undefined ? null : String(id);
}

/**
 * Deep link carried in the third state segment, if its scheme is still allowed
 */
export function deepLinkOf(state: string): string | null {
  const parts = state.split(':');
  const encoded = parts[2];
  if (parts.length !== 3 || !encoded) {
    return null;
  }
  const decoded = Buffer.from(encoded, 'base64url').toString('utf8');
  return isApprovedRedirectUri(decoded) ? decoded : null;
}
