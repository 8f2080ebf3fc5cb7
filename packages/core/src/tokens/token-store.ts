/**
 * Token Store
 *
 * Owns upstream OAuth tokens keyed by (user, tenant, provider). Values are
 * sealed with the token vault before they reach the database and opened on
 * the way out; nothing else reads user_oauth_tokens directly.
 */

import type { DatabaseClient } from '../db/client.js';
import type { ConnectionType, ProviderConnection } from '../schema/index.js';
import {
  upsertTokenWithConnection,
  updateTokenRow,
  getTokenRow,
  deleteTokenWithConnection,
  upsertProviderConnection,
  deleteProviderConnection,
  getProviderConnection,
  listProviderConnections,
  findConnectionsByExternalUser,
  type TokenKey,
} from '../db/repositories/oauth-tokens.js';
import { TokenVault, userTokenAad } from '../crypto/token-vault.js';
import { logger } from '../utils/logger.js';

/**
 * Decrypted upstream token
 */
export interface StoredToken {
  access_token: string;
  refresh_token: string | null;
  token_type: string;
  scope: string | null;
  expires_at: Date | null;
}

export class TokenStore {
  constructor(
    private readonly db: DatabaseClient,
    private readonly vault: TokenVault
  ) {}

  private seal(key: TokenKey, token: StoredToken) {
    const aad = userTokenAad(key.tenant_id, key.user_id, key.provider);
    return {
      access_token: this.vault.encrypt('user_token', token.access_token, aad),
      refresh_token: token.refresh_token ? this.vault.encrypt('user_token', token.refresh_token, aad) : null,
      token_type: token.token_type,
      scope: token.scope,
      expires_at: token.expires_at ? token.expires_at.toISOString() : null,
    };
  }

  /**
   * Insert or replace the token and record the provider connection
   */
  upsert(key: TokenKey, token: StoredToken, connectionType: ConnectionType = 'oauth'): void {
    upsertTokenWithConnection(this.db, key, this.seal(key, token), connectionType);
    logger.debug({ userId: key.user_id, tenantId: key.tenant_id, provider: key.provider }, '[token-store] Token stored');
  }

  /**
   * Replace the fields of an existing token (after a refresh)
   *
   * @returns false if the row was deleted in the meantime
   */
  async update(key: TokenKey, token: StoredToken): Promise<boolean> {
    const row = await updateTokenRow(this.db, key, this.seal(key, token));
    return row !== null;
  }

  async fetch(key: TokenKey): Promise<StoredToken | null> {
    const row = await getTokenRow(this.db, key);
    if (!row) {
      return null;
    }
    const aad = userTokenAad(key.tenant_id, key.user_id, key.provider);
    return {
      access_token: this.vault.decrypt('user_token', row.access_token, aad),
      refresh_token: row.refresh_token ? this.vault.decrypt('user_token', row.refresh_token, aad) : null,
      token_type: row.token_type,
      scope: row.scope,
      expires_at: row.expires_at ? new Date(row.expires_at) : null,
    };
  }

  /**
   * Delete the token and its provider connection
   *
   * @returns true if a token existed
   */
  delete(key: TokenKey): boolean {
    const existed = deleteTokenWithConnection(this.db, key);
    logger.debug({ userId: key.user_id, tenantId: key.tenant_id, provider: key.provider, existed }, '[token-store] Token deleted');
    return existed;
  }

  async registerProviderConnection(
    key: TokenKey,
    connectionType: ConnectionType,
    metadata?: Record<string, unknown>
  ): Promise<ProviderConnection> {
    return upsertProviderConnection(this.db, key, connectionType, metadata);
  }

  async removeProviderConnection(key: TokenKey): Promise<boolean> {
    return deleteProviderConnection(this.db, key);
  }

  async isConnected(key: TokenKey): Promise<boolean> {
    return (await getProviderConnection(this.db, key)) !== null;
  }

  /**
   * Connections of a user. Without a tenant this is the cross-tenant view.
   */
  async listConnections(userId: string, tenantId?: string): Promise<ProviderConnection[]> {
    return listProviderConnections(this.db, userId, tenantId);
  }

  async findByExternalUser(provider: string, externalUserId: string): Promise<ProviderConnection[]> {
    return findConnectionsByExternalUser(this.db, provider, externalUserId);
  }
}
