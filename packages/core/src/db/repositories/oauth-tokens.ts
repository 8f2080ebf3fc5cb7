/**
 * Upstream OAuth Tokens & Provider Connections Repository
 *
 * Raw row access for user_oauth_tokens and provider_connections. Token
 * columns hold vault ciphertext; encryption happens in TokenStore.
 */

import { eq, and, sql } from 'drizzle-orm';
import { v4 as uuidv4 } from 'uuid';
import type { DatabaseClient } from '../client.js';
import {
  user_oauth_tokens,
  provider_connections,
  type ConnectionType,
  type ProviderConnection,
  type UserOAuthTokenRow,
} from '../../schema/index.js';
import { DatabaseError } from '../../utils/errors.js';

export interface TokenKey {
  user_id: string;
  tenant_id: string;
  provider: string;
}

export interface TokenRowData {
  access_token: string;
  refresh_token: string | null;
  token_type: string;
  scope: string | null;
  expires_at: string | null;
}

function keyCondition(key: TokenKey) {
  return and(
    eq(user_oauth_tokens.user_id, key.user_id),
    eq(user_oauth_tokens.tenant_id, key.tenant_id),
    eq(user_oauth_tokens.provider, key.provider)
  );
}

/**
 * Insert or replace the token row and mirror a provider connection, in one
 * transaction. The unique (user, tenant, provider) index guarantees at most
 * one row per key.
 */
export function upsertTokenWithConnection(
  db: DatabaseClient,
  key: TokenKey,
  data: TokenRowData,
  connectionType: ConnectionType = 'oauth'
): UserOAuthTokenRow {
  const now = new Date().toISOString();

  return db.transaction((tx) => {
    const row = tx
      .insert(user_oauth_tokens)
      .values({ id: uuidv4(), ...key, ...data, created_at: now, updated_at: now })
      .onConflictDoUpdate({
        target: [user_oauth_tokens.user_id, user_oauth_tokens.tenant_id, user_oauth_tokens.provider],
        set: { ...data, updated_at: now },
      })
      .returning()
      .get();
    if (!row) {
      throw new DatabaseError('Token upsert returned no row');
    }

    tx.insert(provider_connections)
      .values({ ...key, connection_type: connectionType, metadata: null, connected_at: now })
      .onConflictDoUpdate({
        target: [provider_connections.user_id, provider_connections.tenant_id, provider_connections.provider],
        set: { connection_type: connectionType },
      })
      .run();

    return row;
  });
}

/**
 * Update token fields after a refresh. Returns null if the row disappeared
 * (e.g. a concurrent disconnect).
 */
export async function updateTokenRow(
  db: DatabaseClient,
  key: TokenKey,
  data: TokenRowData
): Promise<UserOAuthTokenRow | null> {
  const [row] = await db
    .update(user_oauth_tokens)
    .set({ ...data, updated_at: new Date().toISOString() })
    .where(keyCondition(key))
    .returning();
  return row ?? null;
}

export async function getTokenRow(db: DatabaseClient, key: TokenKey): Promise<UserOAuthTokenRow | null> {
  const [row] = await db.select().from(user_oauth_tokens).where(keyCondition(key)).limit(1);
  return row ?? null;
}

/**
 * All token rows of a user, across tenants unless one is given
 */
export async function listTokenRows(db: DatabaseClient, userId: string, tenantId?: string): Promise<UserOAuthTokenRow[]> {
  const condition = tenantId
    ? and(eq(user_oauth_tokens.user_id, userId), eq(user_oauth_tokens.tenant_id, tenantId))
    : eq(user_oauth_tokens.user_id, userId);
  return db.select().from(user_oauth_tokens).where(condition);
}

/**
 * Delete the token row and its provider connection in one transaction
 *
 * @returns true if a token row existed
 */
export function deleteTokenWithConnection(db: DatabaseClient, key: TokenKey): boolean {
  return db.transaction((tx) => {
    const deleted = tx.delete(user_oauth_tokens).where(keyCondition(key)).returning({ id: user_oauth_tokens.id }).all();
    tx.delete(provider_connections)
      .where(
        and(
          eq(provider_connections.user_id, key.user_id),
          eq(provider_connections.tenant_id, key.tenant_id),
          eq(provider_connections.provider, key.provider)
        )
      )
      .run();
    return deleted.length > 0;
  });
}

// ===== Provider connections =====

export async function upsertProviderConnection(
  db: DatabaseClient,
  key: TokenKey,
  connectionType: ConnectionType,
  metadata?: Record<string, unknown>
): Promise<ProviderConnection> {
  const row: ProviderConnection = {
    ...key,
    connection_type: connectionType,
    metadata: metadata ? JSON.stringify(metadata) : null,
    connected_at: new Date().toISOString(),
  };
  await db
    .insert(provider_connections)
    .values(row)
    .onConflictDoUpdate({
      target: [provider_connections.user_id, provider_connections.tenant_id, provider_connections.provider],
      set: { connection_type: row.connection_type, metadata: row.metadata },
    });
  return row;
}

export async function deleteProviderConnection(db: DatabaseClient, key: TokenKey): Promise<boolean> {
  const deleted = await db
    .delete(provider_connections)
    .where(
      and(
        eq(provider_connections.user_id, key.user_id),
        eq(provider_connections.tenant_id, key.tenant_id),
        eq(provider_connections.provider, key.provider)
      )
    )
    .returning({ provider: provider_connections.provider });
  return deleted.length > 0;
}

export async function getProviderConnection(db: DatabaseClient, key: TokenKey): Promise<ProviderConnection | null> {
  const [row] = await db
    .select()
    .from(provider_connections)
    .where(
      and(
        eq(provider_connections.user_id, key.user_id),
        eq(provider_connections.tenant_id, key.tenant_id),
        eq(provider_connections.provider, key.provider)
      )
    )
    .limit(1);
  return row ?? null;
}

/**
 * Connections of a user, across tenants unless one is given
 */
export async function listProviderConnections(
  db: DatabaseClient,
  userId: string,
  tenantId?: string
): Promise<ProviderConnection[]> {
  const condition = tenantId
    ? and(eq(provider_connections.user_id, userId), eq(provider_connections.tenant_id, tenantId))
    : eq(provider_connections.user_id, userId);
  return db.select().from(provider_connections).where(condition);
}

/**
 * Connections whose provider-side account id matches, for webhook routing
 */
export async function findConnectionsByExternalUser(
  db: DatabaseClient,
  provider: string,
  externalUserId: string
): Promise<ProviderConnection[]> {
  return db
    .select()
    .from(provider_connections)
    .where(
      and(
        eq(provider_connections.provider, provider),
        sql`json_extract(${provider_connections.metadata}, '$.external_user_id') = ${externalUserId}`
      )
    );
}
