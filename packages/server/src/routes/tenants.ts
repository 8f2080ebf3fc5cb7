/**
 * Tenant Routes
 *
 * Tenant creation and listing, active-tenant switching (re-mints the token),
 * tool overrides and per-tenant upstream OAuth credentials.
 */

import type { FastifyInstance, preHandlerAsyncHookHandler } from 'fastify';
import { z } from 'zod';
import {
  AuthorizationError,
  NotFoundError,
  createTenant,
  deleteTenantCredentials,
  getMembership,
  getTenantById,
  getTenantCredentials,
  listTenantsForUser,
  tenantSecretAad,
  upsertTenantCredentials,
  type DatabaseClient,
  type TokenVault,
} from '@pierre/core';
import type { CsrfStore, TokenService } from '@pierre/authn-jwt';
import type { TenantToolSelectionService } from '@pierre/authz-tenant';
import type { ProviderRegistry } from '@pierre/providers';
import { requireUser, sendError, type UserSession } from './helpers.js';
import { wrapSuccess } from './reply-envelope.js';
import { AUTH_COOKIE } from './auth.js';

export interface TenantRoutesConfig {
  db: DatabaseClient;
  vault: TokenVault;
  tokens: TokenService;
  csrf: CsrfStore;
  registry: ProviderRegistry;
  toolSelection: TenantToolSelectionService;
  authenticate: preHandlerAsyncHookHandler;
  secureCookies: boolean;
}

const createTenantSchema = z.object({
  name: z.string().min(1).max(255),
  slug: z.string().max(128),
  domain: z.string().max(255).optional(),
});

const tenantParams = z.object({ tenantId: z.string().min(1) });
const toolParams = tenantParams.extend({ toolName: z.string().min(1) });
const providerParams = tenantParams.extend({ provider: z.string().min(1) });

const overrideSchema = z.object({
  enabled: z.boolean(),
  reason: z.string().max(500).optional(),
});

const credentialsSchema = z.object({
  client_id: z.string().min(1).max(512),
  client_secret: z.string().min(1).max(1024),
  redirect_uri: z.string().url().optional(),
  scopes: z.array(z.string().min(1)).max(50).optional(),
});

export async function registerTenantRoutes(fastify: FastifyInstance, config: TenantRoutesConfig): Promise<void> {
  const { db, vault, tokens, csrf, registry, toolSelection, authenticate } = config;

  async function requireMember(session: UserSession, tenantId: string) {
    const tenant = await getTenantById(db, tenantId);
    if (!tenant) {
      throw new NotFoundError(`Tenant not found: ${tenantId}`);
    }
    const membership = await getMembership(db, tenantId, session.user_id);
    if (!membership && session.role !== 'super_admin') {
      // Non-members get the same answer as for a missing tenant
      throw new NotFoundError(`Tenant not found: ${tenantId}`);
    }
    return { tenant, membership };
  }

  async function requireTenantAdmin(session: UserSession, tenantId: string) {
    const { tenant, membership } = await requireMember(session, tenantId);
    if (session.role !== 'super_admin' && membership?.role === 'member') {
      throw new AuthorizationError('Only tenant owners and admins can manage this tenant');
    }
    return tenant;
  }

  // ==========================================================================
  // POST /api/tenants
  // ==========================================================================
  fastify.post('/api/tenants', { preHandler: authenticate }, async (request, reply) => {
    try {
      const session = requireUser(request);
      const body = createTenantSchema.parse(request.body);
      const tenant = await createTenant(db, {
        name: body.name,
        slug: body.slug,
        owner_user_id: session.user_id,
        ...(body.domain !== undefined && { domain: body.domain }),
      });
      return reply.status(201).send(wrapSuccess(tenant));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // ==========================================================================
  // GET /api/tenants
  // ==========================================================================
  fastify.get('/api/tenants', { preHandler: authenticate }, async (request, reply) => {
    try {
      const session = requireUser(request);
      const tenants = await listTenantsForUser(db, session.user_id);
      return reply.send(
        wrapSuccess(
          tenants.map((t) => ({
            id: t.id,
            name: t.name,
            slug: t.slug,
            plan: t.plan,
            role: t.member_role,
            joined_at: t.joined_at,
            active: t.id === session.tenant_id,
          }))
        )
      );
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // ==========================================================================
  // POST /api/tenants/:tenantId/switch - re-mint with a new active tenant
  // ==========================================================================
  fastify.post('/api/tenants/:tenantId/switch', { preHandler: authenticate }, async (request, reply) => {
    try {
      const session = requireUser(request);
      const { tenantId } = tenantParams.parse(request.params);
      await requireMember(session, tenantId);

      const minted = await tokens.mint({ userId: session.user_id, role: session.role, activeTenantId: tenantId });
      if (session.auth_method === 'cookie') {
        reply.setCookie(AUTH_COOKIE, minted.token, {
          path: '/',
          httpOnly: true,
          sameSite: 'strict',
          secure: config.secureCookies,
          maxAge: minted.expiresIn,
        });
      }

      request.log.info({ userId: session.user_id, tenantId }, '[tenants] Active tenant switched');
      return reply.send(
        wrapSuccess({
          access_token: minted.token,
          token_type: 'Bearer',
          expires_in: minted.expiresIn,
          active_tenant_id: tenantId,
          csrf_token: csrf.issue(session.user_id),
        })
      );
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // ==========================================================================
  // Tool overrides
  // ==========================================================================
  fastify.get('/api/tenants/:tenantId/tools', { preHandler: authenticate }, async (request, reply) => {
    try {
      const session = requireUser(request);
      const { tenantId } = tenantParams.parse(request.params);
      await requireMember(session, tenantId);
      return reply.send(wrapSuccess(await toolSelection.effectiveTools(tenantId)));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  fastify.put('/api/tenants/:tenantId/tools/:toolName', { preHandler: authenticate }, async (request, reply) => {
    try {
      const session = requireUser(request);
      const { tenantId, toolName } = toolParams.parse(request.params);
      const body = overrideSchema.parse(request.body);
      await requireMember(session, tenantId);
      const override = await toolSelection.setOverride(
        { user_id: session.user_id, role: session.role },
        tenantId,
        toolName,
        body.enabled,
        body.reason ?? null
      );
      return reply.send(wrapSuccess(override));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  fastify.delete('/api/tenants/:tenantId/tools/:toolName', { preHandler: authenticate }, async (request, reply) => {
    try {
      const session = requireUser(request);
      const { tenantId, toolName } = toolParams.parse(request.params);
      await requireMember(session, tenantId);
      const removed = await toolSelection.removeOverride({ user_id: session.user_id, role: session.role }, tenantId, toolName);
      if (!removed) {
        throw new NotFoundError(`No override for ${toolName}`);
      }
      return reply.send(wrapSuccess({ tool_name: toolName, removed: true }));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // ==========================================================================
  // Per-tenant upstream OAuth credentials
  // ==========================================================================
  fastify.get('/api/tenants/:tenantId/oauth-credentials/:provider', { preHandler: authenticate }, async (request, reply) => {
    try {
      const session = requireUser(request);
      const params = providerParams.parse(request.params);
      const provider = registry.getDescriptor(params.provider).name;
      await requireTenantAdmin(session, params.tenantId);

      const row = await getTenantCredentials(db, params.tenantId, provider);
      if (!row) {
        throw new NotFoundError(`No ${provider} credentials configured for this tenant`);
      }
      const scopes: unknown = JSON.parse(row.scopes);
      return reply.send(
        wrapSuccess({
          provider,
          client_id: row.client_id,
          redirect_uri: row.redirect_uri,
          scopes: Array.isArray(scopes) ? scopes : [],
          configured_by: row.configured_by,
          updated_at: row.updated_at,
        })
      );
    } catch (err) {
      return sendError(reply, err);
    }
  });

  fastify.put('/api/tenants/:tenantId/oauth-credentials/:provider', { preHandler: authenticate }, async (request, reply) => {
    try {
      const session = requireUser(request);
      const params = providerParams.parse(request.params);
      const provider = registry.getDescriptor(params.provider).name;
      const body = credentialsSchema.parse(request.body);
      await requireTenantAdmin(session, params.tenantId);

      await upsertTenantCredentials(db, {
        tenant_id: params.tenantId,
        provider,
        client_id: body.client_id,
        client_secret: vault.encrypt('tenant_secret', body.client_secret, tenantSecretAad(params.tenantId, provider)),
        redirect_uri: body.redirect_uri ?? null,
        scopes: body.scopes ?? [],
        configured_by: session.user_id,
      });
      return reply.send(wrapSuccess({ provider, configured: true }));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  fastify.delete('/api/tenants/:tenantId/oauth-credentials/:provider', { preHandler: authenticate }, async (request, reply) => {
    try {
      const session = requireUser(request);
      const params = providerParams.parse(request.params);
      const provider = registry.getDescriptor(params.provider).name;
      await requireTenantAdmin(session, params.tenantId);

      if (!(await deleteTenantCredentials(db, params.tenantId, provider))) {
        throw new NotFoundError(`No ${provider} credentials configured for this tenant`);
      }
      return reply.send(wrapSuccess({ provider, removed: true }));
    } catch (err) {
      return sendError(reply, err);
    }
  });
}
