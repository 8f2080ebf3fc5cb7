/**
 * Tenants Repository
 *
 * Tenants and their memberships. tenant_users is the source of truth for
 * membership; the oldest membership is a user's primary tenant.
 */

import { eq, and, asc } from 'drizzle-orm';
import { v4 as uuidv4 } from 'uuid';
import type { DatabaseClient } from '../client.js';
import {
  tenants,
  tenant_users,
  type Tenant,
  type TenantRole,
  type TenantUser,
} from '../../schema/index.js';
import { validateSlug } from '../../validation/slug.js';
import { ValidationError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface CreateTenantInput {
  name: string;
  slug: string;
  owner_user_id: string;
  domain?: string;
  plan?: string;
}

/**
 * Create a tenant and its owner membership in one transaction
 *
 * @throws ValidationError for an invalid or taken slug
 */
export async function createTenant(db: DatabaseClient, input: CreateTenantInput): Promise<Tenant> {
  const slugCheck = validateSlug(input.slug);
  if (!slugCheck.valid) {
    throw new ValidationError(slugCheck.error);
  }

  const existing = await getTenantBySlug(db, input.slug);
  if (existing) {
    throw new ValidationError(`Slug '${input.slug}' is already taken`);
  }

  const now = new Date().toISOString();
  const tenant: Tenant = {
    id: uuidv4(),
    name: input.name,
    slug: input.slug,
    domain: input.domain ?? null,
    plan: input.plan ?? 'starter',
    owner_user_id: input.owner_user_id,
    created_at: now,
    updated_at: now,
  };

  db.transaction((tx) => {
    tx.insert(tenants).values(tenant).run();
    tx.insert(tenant_users)
      .values({ tenant_id: tenant.id, user_id: input.owner_user_id, role: 'owner', joined_at: now })
      .run();
  });

  logger.info({ tenantId: tenant.id, slug: tenant.slug }, '[db:tenants] Tenant created');
  return tenant;
}

export async function getTenantById(db: DatabaseClient, tenantId: string): Promise<Tenant | null> {
  const [tenant] = await db.select().from(tenants).where(eq(tenants.id, tenantId)).limit(1);
  return tenant ?? null;
}

export async function getTenantBySlug(db: DatabaseClient, slug: string): Promise<Tenant | null> {
  const [tenant] = await db.select().from(tenants).where(eq(tenants.slug, slug)).limit(1);
  return tenant ?? null;
}

/**
 * Add (or re-role) a member
 */
export async function addTenantMember(
  db: DatabaseClient,
  tenantId: string,
  userId: string,
  role: TenantRole = 'member',
  joinedAt: string = new Date().toISOString()
): Promise<TenantUser> {
  const membership: TenantUser = { tenant_id: tenantId, user_id: userId, role, joined_at: joinedAt };
  await db
    .insert(tenant_users)
    .values(membership)
    .onConflictDoUpdate({ target: [tenant_users.tenant_id, tenant_users.user_id], set: { role } });
  return membership;
}

export async function getMembership(
  db: DatabaseClient,
  tenantId: string,
  userId: string
): Promise<TenantUser | null> {
  const [row] = await db
    .select()
    .from(tenant_users)
    .where(and(eq(tenant_users.tenant_id, tenantId), eq(tenant_users.user_id, userId)))
    .limit(1);
  return row ?? null;
}

/**
 * Tenants a user belongs to, oldest membership first
 */
export async function listTenantsForUser(
  db: DatabaseClient,
  userId: string
): Promise<Array<Tenant & { member_role: TenantRole; joined_at: string }>> {
  const rows = await db
    .select({ tenant: tenants, role: tenant_users.role, joined_at: tenant_users.joined_at })
    .from(tenant_users)
    .innerJoin(tenants, eq(tenants.id, tenant_users.tenant_id))
    .where(eq(tenant_users.user_id, userId))
    .orderBy(asc(tenant_users.joined_at));

  return rows.map((r) => ({ ...r.tenant, member_role: r.role, joined_at: r.joined_at }));
}

/**
 * The user's primary tenant: the oldest membership
 */
export async function getPrimaryTenantId(db: DatabaseClient, userId: string): Promise<string | null> {
  const [row] = await db
    .select({ tenant_id: tenant_users.tenant_id })
    .from(tenant_users)
    .where(eq(tenant_users.user_id, userId))
    .orderBy(asc(tenant_users.joined_at))
    .limit(1);
  return row?.tenant_id ?? null;
}

export async function listTenantMembers(db: DatabaseClient, tenantId: string): Promise<TenantUser[]> {
  return db
    .select()
    .from(tenant_users)
    .where(eq(tenant_users.tenant_id, tenantId))
    .orderBy(asc(tenant_users.joined_at));
}
