/**
 * Tenant OAuth Credentials Repository
 *
 * Per-tenant upstream OAuth application credentials. client_secret holds
 * vault ciphertext; the caller seals and opens it.
 */

import { eq, and } from 'drizzle-orm';
import type { DatabaseClient } from '../client.js';
import { tenant_oauth_credentials, type TenantOAuthCredentialRow } from '../../schema/index.js';
import { logger } from '../../utils/logger.js';

export interface TenantCredentialInput {
  tenant_id: string;
  provider: string;
  client_id: string;
  /** Vault ciphertext */
  client_secret: string;
  redirect_uri: string | null;
  scopes: string[];
  configured_by: string;
}

export async function upsertTenantCredentials(
  db: DatabaseClient,
  input: TenantCredentialInput
): Promise<void> {
  const now = new Date().toISOString();
  const values = { ...input, scopes: JSON.stringify(input.scopes) };
  await db
    .insert(tenant_oauth_credentials)
    .values({ ...values, created_at: now, updated_at: now })
    .onConflictDoUpdate({
      target: [tenant_oauth_credentials.tenant_id, tenant_oauth_credentials.provider],
      set: {
        client_id: values.client_id,
        client_secret: values.client_secret,
        redirect_uri: values.redirect_uri,
        scopes: values.scopes,
        configured_by: values.configured_by,
        updated_at: now,
      },
    });
  logger.info(
    { tenantId: input.tenant_id, provider: input.provider },
    '[db:tenant-credentials] Credentials configured'
  );
}

export async function getTenantCredentials(
  db: DatabaseClient,
  tenantId: string,
  provider: string
): Promise<TenantOAuthCredentialRow | null> {
  const [row] = await db
    .select()
    .from(tenant_oauth_credentials)
    .where(and(eq(tenant_oauth_credentials.tenant_id, tenantId), eq(tenant_oauth_credentials.provider, provider)))
    .limit(1);
  return row ?? null;
}

export async function deleteTenantCredentials(db: DatabaseClient, tenantId: string, provider: string): Promise<boolean> {
  const deleted = await db
    .delete(tenant_oauth_credentials)
    .where(and(eq(tenant_oauth_credentials.tenant_id, tenantId), eq(tenant_oauth_credentials.provider, provider)))
    .returning({ provider: tenant_oauth_credentials.provider });
  return deleted.length > 0;
}
