/**
 * OAuth Clients Repository
 *
 * Clients registered with the authorization server (RFC 7591) and the
 * rotating refresh tokens issued to them.
 */

import { eq, and, gt, lte, or } from 'drizzle-orm';
import crypto from 'crypto';
import type { DatabaseClient } from '../client.js';
import {
  oauth_clients,
  oauth2_refresh_tokens,
  type GrantType,
  type OAuthClientRow,
  type RefreshTokenRow,
} from '../../schema/index.js';
import { logger } from '../../utils/logger.js';

/**
 * OAuth client with JSON columns decoded
 */
export interface OAuthClient {
  id: string;
  client_name: string | null;
  client_secret_hash: string;
  redirect_uris: string[];
  grant_types: GrantType[];
  response_types: string[];
  scopes: string[];
  created_at: string;
}

function parseStringArray(raw: string): string[] {
  const parsed: unknown = JSON.parse(raw);
  return Array.isArray(parsed) ? parsed.filter((v): v is string => typeof v === 'string') : [];
}

function isGrantType(value: string): value is GrantType {
  return (
    value === 'authorization_code' ||
    value === 'refresh_token' ||
    value === 'client_credentials' ||
    value === 'password'
  );
}

function decodeClient(row: OAuthClientRow): OAuthClient {
  return {
    ...row,
    redirect_uris: parseStringArray(row.redirect_uris),
    grant_types: parseStringArray(row.grant_types).filter(isGrantType),
    response_types: parseStringArray(row.response_types),
    scopes: parseStringArray(row.scopes),
  };
}

export async function insertOAuthClient(db: DatabaseClient, client: OAuthClient): Promise<OAuthClient> {
  await db.insert(oauth_clients).values({
    ...client,
    redirect_uris: JSON.stringify(client.redirect_uris),
    grant_types: JSON.stringify(client.grant_types),
    response_types: JSON.stringify(client.response_types),
    scopes: JSON.stringify(client.scopes),
  });
  logger.info({ clientId: client.id }, '[db:oauth-clients] Client registered');
  return client;
}

export async function getOAuthClientById(db: DatabaseClient, clientId: string): Promise<OAuthClient | null> {
  const [row] = await db.select().from(oauth_clients).where(eq(oauth_clients.id, clientId)).limit(1);
  return row ? decodeClient(row) : null;
}

export async function deleteOAuthClient(db: DatabaseClient, clientId: string): Promise<boolean> {
  const deleted = await db.delete(oauth_clients).where(eq(oauth_clients.id, clientId)).returning({ id: oauth_clients.id });
  return deleted.length > 0;
}

// ===== Refresh tokens =====

export function hashRefreshToken(token: string): string {
  return crypto.createHash('sha256').update(token).digest('hex');
}

export interface RefreshTokenGrant {
  client_id: string;
  user_id: string;
  tenant_id: string | null;
  scope: string | null;
  expires_at: string;
}

export async function insertRefreshToken(
  db: DatabaseClient,
  token: string,
  grant: RefreshTokenGrant
): Promise<void> {
  await db.insert(oauth2_refresh_tokens).values({
    token_hash: hashRefreshToken(token),
    ...grant,
    created_at: new Date().toISOString(),
    revoked: false,
  });
}

/**
 * Atomically revoke and return a live refresh token bound to the client.
 * A second call with the same token returns null.
 */
export async function consumeRefreshToken(
  db: DatabaseClient,
  token: string,
  clientId: string,
  now: Date = new Date()
): Promise<RefreshTokenRow | null> {
  const [row] = await db
    .update(oauth2_refresh_tokens)
    .set({ revoked: true })
    .where(
      and(
        eq(oauth2_refresh_tokens.token_hash, hashRefreshToken(token)),
        eq(oauth2_refresh_tokens.client_id, clientId),
        eq(oauth2_refresh_tokens.revoked, false),
        gt(oauth2_refresh_tokens.expires_at, now.toISOString())
      )
    )
    .returning();
  return row ?? null;
}

export async function revokeRefreshTokensForUser(db: DatabaseClient, userId: string): Promise<void> {
  await db
    .update(oauth2_refresh_tokens)
    .set({ revoked: true })
    .where(eq(oauth2_refresh_tokens.user_id, userId));
}

export async function cleanupRefreshTokens(db: DatabaseClient, now: Date = new Date()): Promise<number> {
  const deleted = await db
    .delete(oauth2_refresh_tokens)
    .where(or(lte(oauth2_refresh_tokens.expires_at, now.toISOString()), eq(oauth2_refresh_tokens.revoked, true)))
    .returning({ token_hash: oauth2_refresh_tokens.token_hash });
  return deleted.length;
}
