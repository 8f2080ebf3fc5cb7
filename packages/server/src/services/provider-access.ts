/**
 * Provider Access
 *
 * Resolves a cached, authenticated provider client for one (user, tenant,
 * provider). The access token comes from the upstream OAuth client, which
 * refreshes it when it is about to expire.
 */

import {
  ProviderError,
  ValidationError,
  getProviderConnection,
  logger,
  type CacheProvider,
  type DatabaseClient,
} from '@pierre/core';
import {
  CachingProvider,
  type CacheTtlConfig,
  type ProviderCredentials,
  type ProviderRegistry,
} from '@pierre/providers';
import type { UpstreamOAuthClient } from './upstream-oauth-client.js';

export class ProviderAccess {
  constructor(
    private readonly db: DatabaseClient,
    private readonly registry: ProviderRegistry,
    private readonly oauth: UpstreamOAuthClient,
    private readonly cache: CacheProvider,
    private readonly ttls: Partial<CacheTtlConfig> = {}
  ) {}

  /**
   * @throws ProviderError (auth_expired) when the user has to reconnect
   */
  async forUser(userId: string, tenantId: string, providerName: string): Promise<CachingProvider> {
    const descriptor = this.registry.getDescriptor(providerName);
    const token = await this.oauth.getValidToken(userId, tenantId, descriptor.name);
    if (!token) {
      throw new ProviderError(
        `No valid ${descriptor.displayName} connection. Please reconnect ${descriptor.displayName}.`,
        descriptor.name,
        'auth_expired'
      );
    }

    const credentials: ProviderCredentials = { accessToken: token.access_token };
    const connection = await getProviderConnection(this.db, { user_id: userId, tenant_id: tenantId, provider: descriptor.name });
    const externalUserId = connection?.metadata ? readExternalUserId(connection.metadata) : null;
    if (externalUserId) {
      credentials.externalUserId = externalUserId;
    }

    if (!descriptor.oauth) {
      // Widget-connected providers authenticate with the application keys
      try {
        const app = await this.oauth.resolveCredentials(tenantId, descriptor.name);
        credentials.clientId = app.clientId;
        credentials.clientSecret = app.clientSecret;
      } catch (err) {
        if (!(err instanceof ValidationError)) {
          throw err;
        }
        logger.warn({ provider: descriptor.name }, '[provider-access] No application credentials configured');
      }
    }

    const inner = this.registry.createProvider(descriptor.name, credentials);
    return new CachingProvider(inner, this.cache, tenantId, userId, this.ttls);
  }
}

function readExternalUserId(metadata: string): string | null {
  try {
    const parsed: unknown = JSON.parse(metadata);
    if (typeof parsed === 'object' && parsed !== null && 'external_user_id' in parsed) {
      const id = parsed.external_user_id;
      return typeof id === 'string' ? id : null;
    }
  } catch (err) {
    logger.warn({ err }, '[provider-access] Connection metadata is not JSON');
  }
  return null;
}
