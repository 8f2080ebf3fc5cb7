/**
 * Admin Token Repository
 *
 * Service tokens for the admin API. Tokens look like `pk_admin_<48 chars>`;
 * the first 8 characters after the prefix are stored in clear for lookup and
 * the whole token is verified against an Argon2id hash.
 */

import { eq, and } from 'drizzle-orm';
import crypto from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import type { DatabaseClient } from '../client.js';
import { admin_tokens, type AdminTokenRow } from '../../schema/index.js';
import { hashSecret, verifySecret, dummyVerify } from '../../auth/password-policy.js';
import { logger } from '../../utils/logger.js';

export const ADMIN_TOKEN_PREFIX = 'pk_admin_';
const LOOKUP_PREFIX_LENGTH = 8;

export interface AdminToken {
  id: string;
  service_name: string;
  token_prefix: string;
  permissions: string[];
  is_super_admin: boolean;
  created_at: string;
  expires_at: string | null;
  last_used_at: string | null;
  is_active: boolean;
}

function decode(row: AdminTokenRow): AdminToken {
  const parsed: unknown = JSON.parse(row.permissions);
  const { token_hash: _hash, ...rest } = row;
  return {
    ...rest,
    permissions: Array.isArray(parsed) ? parsed.filter((p): p is string => typeof p === 'string') : [],
  };
}

export function generateAdminToken(): string {
  return ADMIN_TOKEN_PREFIX + crypto.randomBytes(36).toString('base64url');
}

function lookupPrefix(token: string): string {
  return token.slice(ADMIN_TOKEN_PREFIX.length, ADMIN_TOKEN_PREFIX.length + LOOKUP_PREFIX_LENGTH);
}

/**
 * Create a service token
 *
 * @returns The stored record and the plaintext token (shown once)
 */
export async function createAdminToken(
  db: DatabaseClient,
  input: { service_name: string; permissions?: string[]; is_super_admin?: boolean; expires_at?: string | null }
): Promise<{ token: string; record: AdminToken }> {
  const token = generateAdminToken();
  const row: AdminTokenRow = {
    id: uuidv4(),
    service_name: input.service_name,
    token_prefix: lookupPrefix(token),
    token_hash: await hashSecret(token),
    permissions: JSON.stringify(input.permissions ?? []),
    is_super_admin: input.is_super_admin ?? false,
    created_at: new Date().toISOString(),
    expires_at: input.expires_at ?? null,
    last_used_at: null,
    is_active: true,
  };
  await db.insert(admin_tokens).values(row);
  logger.info({ tokenId: row.id, service: row.service_name }, '[db:admin-tokens] Admin token created');
  return { token, record: decode(row) };
}

/**
 * Authenticate a plaintext service token
 *
 * @returns The token record, or null for unknown, inactive or expired tokens
 */
export async function authenticateAdminToken(
  db: DatabaseClient,
  token: string,
  now: Date = new Date()
): Promise<AdminToken | null> {
  if (!token.startsWith(ADMIN_TOKEN_PREFIX)) {
    return null;
  }

  const candidates = await db
    .select()
    .from(admin_tokens)
    .where(and(eq(admin_tokens.token_prefix, lookupPrefix(token)), eq(admin_tokens.is_active, true)));

  if (candidates.length === 0) {
    await dummyVerify(token);
    return null;
  }

  for (const row of candidates) {
    let match = false;
    try {
      match = await verifySecret(row.token_hash, token);
    } catch (err) {
      logger.error({ err, tokenId: row.id }, '[db:admin-tokens] Stored hash is malformed');
    }
    if (!match) {
      continue;
    }
    if (row.expires_at !== null && row.expires_at <= now.toISOString()) {
      return null;
    }
    await db.update(admin_tokens).set({ last_used_at: now.toISOString() }).where(eq(admin_tokens.id, row.id));
    return decode({ ...row, last_used_at: now.toISOString() });
  }
  return null;
}

export async function listAdminTokens(db: DatabaseClient): Promise<AdminToken[]> {
  const rows = await db.select().from(admin_tokens);
  return rows.map(decode);
}

export async function revokeAdminToken(db: DatabaseClient, tokenId: string): Promise<boolean> {
  const updated = await db
    .update(admin_tokens)
    .set({ is_active: false })
    .where(eq(admin_tokens.id, tokenId))
    .returning({ id: admin_tokens.id });
  if (updated.length > 0) {
    logger.info({ tokenId }, '[db:admin-tokens] Admin token revoked');
  }
  return updated.length > 0;
}

/**
 * First-boot bootstrap: create a super-admin token when none exists
 *
 * @returns The plaintext token when one was created, else null
 */
export async function bootstrapAdminToken(db: DatabaseClient): Promise<string | null> {
  const [existing] = await db.select({ id: admin_tokens.id }).from(admin_tokens).limit(1);
  if (existing) {
    return null;
  }
  const { token } = await createAdminToken(db, {
    service_name: 'bootstrap',
    permissions: ['*'],
    is_super_admin: true,
  });
  return token;
}
