/**
 * Admin API Routes
 *
 * Gated by an admin service token (`Authorization: Bearer pk_admin_...` or
 * `X-Admin-Token`). Each route names the permission it needs; super-admin
 * tokens and the `*` permission pass every check.
 *
 * - users: list, approve, suspend, delete
 * - service tokens: list, create (super-admin only), revoke
 * - system settings: auto-approve, globally disabled tools
 * - audit log query
 * - signing keys: list, rotate
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import {
  AuthorizationError,
  NotFoundError,
  SETTING_AUTO_APPROVE_USERS,
  SETTING_DISABLED_TOOLS,
  USER_STATUSES,
  approveUser,
  createAdminToken,
  deleteUser,
  getBooleanSetting,
  getListSetting,
  listAdminTokens,
  listUsers,
  logger,
  revokeAdminToken,
  setSetting,
  suspendUser,
  userPattern,
  type AdminToken,
  type AuditProvider,
  type CacheProvider,
  type DatabaseClient,
} from '@pierre/core';
import { authenticateAdmin, hasAdminPermission, type KeySetManager } from '@pierre/authn-jwt';
import { v4 as uuidv4 } from 'uuid';
import { toPublicUser } from '../services/user-view.js';
import { flattenHeaders, getSourceIp, sendError } from './helpers.js';
import { ErrorCodes, wrapError, wrapSuccess } from './reply-envelope.js';

declare module 'fastify' {
  interface FastifyRequest {
    /** Set by the admin preHandler */
    adminToken: AdminToken | null;
  }
}

export const AdminPermissions = {
  USERS: 'users:manage',
  TOKENS: 'tokens:manage',
  SETTINGS: 'settings:manage',
  AUDIT: 'audit:read',
  KEYS: 'keys:manage',
} as const;

export type AdminPermission = (typeof AdminPermissions)[keyof typeof AdminPermissions];

export interface AdminRoutesConfig {
  db: DatabaseClient;
  cache: CacheProvider;
  audit: AuditProvider;
  keys: KeySetManager;
  /** Config fallback when the auto-approve setting is unset */
  autoApproveUsers: boolean;
  /** Tools disabled through configuration (read-only here) */
  configuredDisabledTools: string[];
  trustProxy: boolean;
}

const userParams = z.object({ userId: z.string().min(1) });
const tokenParams = z.object({ tokenId: z.string().min(1) });

const listUsersQuery = z.object({
  status: z.enum(USER_STATUSES).optional(),
});

const createTokenSchema = z.object({
  service_name: z.string().min(1).max(128),
  permissions: z.array(z.string().min(1).max(64)).max(32).default([]),
  is_super_admin: z.boolean().default(false),
  expires_at: z.string().datetime().nullable().optional(),
});

const autoApproveSchema = z.object({ enabled: z.boolean() });

const disabledToolsSchema = z.object({
  tools: z.array(z.string().min(1).max(128)).max(256),
});

const auditQuerySchema = z.object({
  user_id: z.string().optional(),
  tenant_id: z.string().optional(),
  tool_name: z.string().optional(),
  start_time: z.string().datetime().optional(),
  end_time: z.string().datetime().optional(),
  limit: z.coerce.number().int().min(1).max(1000).default(100),
});

function requireAdmin(request: FastifyRequest, permission: AdminPermission): AdminToken {
  const token = request.adminToken;
  if (!token || !hasAdminPermission(token, permission)) {
    throw new AuthorizationError(`Admin permission required: ${permission}`);
  }
  return token;
}

/**
 * Register the /admin routes
 */
export async function registerAdminRoutes(fastify: FastifyInstance, config: AdminRoutesConfig): Promise<void> {
  const { db, cache, audit, keys } = config;

  const authenticate = async (request: FastifyRequest, reply: FastifyReply): Promise<void> => {
    const result = await authenticateAdmin(db, flattenHeaders(request));
    if (!result.authenticated) {
      request.log.warn({ ip: getSourceIp(request, config.trustProxy) }, '[admin] Rejected admin request');
      await reply
        .status(401)
        .header('WWW-Authenticate', 'Bearer realm="pierre-admin"')
        .send(wrapError(ErrorCodes.UNAUTHORIZED, result.error.message, [{ error_kind: result.error.kind }]));
      return;
    }
    request.adminToken = result.token;
  };

  const actor = (token: AdminToken) => `admin:${token.service_name}`;

  // ==========================================================================
  // USERS
  // ==========================================================================

  fastify.get('/admin/users', { preHandler: authenticate }, async (request, reply) => {
    try {
      requireAdmin(request, AdminPermissions.USERS);
      const query = listUsersQuery.parse(request.query);
      const users = await listUsers(db, query.status ? { status: query.status } : {});
      return reply.send(wrapSuccess(users.map(toPublicUser), { count: users.length }));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  fastify.post('/admin/users/:userId/approve', { preHandler: authenticate }, async (request, reply) => {
    try {
      const token = requireAdmin(request, AdminPermissions.USERS);
      const { userId } = userParams.parse(request.params);
      const user = await approveUser(db, userId, actor(token));
      return reply.send(wrapSuccess(toPublicUser(user)));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  fastify.post('/admin/users/:userId/suspend', { preHandler: authenticate }, async (request, reply) => {
    try {
      requireAdmin(request, AdminPermissions.USERS);
      const { userId } = userParams.parse(request.params);
      const user = await suspendUser(db, userId);
      return reply.send(wrapSuccess(toPublicUser(user)));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  fastify.delete('/admin/users/:userId', { preHandler: authenticate }, async (request, reply) => {
    try {
      const token = requireAdmin(request, AdminPermissions.USERS);
      const { userId } = userParams.parse(request.params);
      if (!(await deleteUser(db, userId))) {
        throw new NotFoundError(`User not found: ${userId}`);
      }
      const evicted = await cache.invalidatePattern(userPattern('*', userId));
      logger.info({ userId, evicted, actor: actor(token) }, '[admin] User deleted');
      await audit.emit({
        event_id: uuidv4(),
        timestamp: new Date().toISOString(),
        event_type: 'admin_action',
        tool_name: 'delete_user',
        user_id: userId,
        status_code: 200,
        response_time_ms: 0,
      });
      return reply.send(wrapSuccess({ user_id: userId, deleted: true }));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // ==========================================================================
  // SERVICE TOKENS
  // ==========================================================================

  fastify.get('/admin/tokens', { preHandler: authenticate }, async (request, reply) => {
    try {
      requireAdmin(request, AdminPermissions.TOKENS);
      return reply.send(wrapSuccess(await listAdminTokens(db)));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  fastify.post('/admin/tokens', { preHandler: authenticate }, async (request, reply) => {
    try {
      const caller = requireAdmin(request, AdminPermissions.TOKENS);
      if (!caller.is_super_admin) {
        throw new AuthorizationError('Only super-admin tokens can create service tokens');
      }
      const body = createTokenSchema.parse(request.body);
      const { token, record } = await createAdminToken(db, {
        service_name: body.service_name,
        permissions: body.permissions,
        is_super_admin: body.is_super_admin,
        expires_at: body.expires_at ?? null,
      });
      logger.info({ tokenId: record.id, actor: actor(caller) }, '[admin] Service token created');
      return reply.status(201).send(wrapSuccess({ token, record }));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  fastify.delete('/admin/tokens/:tokenId', { preHandler: authenticate }, async (request, reply) => {
    try {
      const caller = requireAdmin(request, AdminPermissions.TOKENS);
      const { tokenId } = tokenParams.parse(request.params);
      if (tokenId === caller.id) {
        throw new AuthorizationError('A token cannot revoke itself');
      }
      if (!(await revokeAdminToken(db, tokenId))) {
        throw new NotFoundError(`Admin token not found: ${tokenId}`);
      }
      return reply.send(wrapSuccess({ id: tokenId, revoked: true }));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // ==========================================================================
  // SETTINGS
  // ==========================================================================

  fastify.get('/admin/settings', { preHandler: authenticate }, async (request, reply) => {
    try {
      requireAdmin(request, AdminPermissions.SETTINGS);
      const autoApprove = await getBooleanSetting(db, SETTING_AUTO_APPROVE_USERS);
      return reply.send(
        wrapSuccess({
          auto_approve_users: autoApprove ?? config.autoApproveUsers,
          auto_approve_source: autoApprove === null ? 'config' : 'setting',
          disabled_tools: await getListSetting(db, SETTING_DISABLED_TOOLS),
          configured_disabled_tools: config.configuredDisabledTools,
        })
      );
    } catch (err) {
      return sendError(reply, err);
    }
  });

  fastify.put('/admin/settings/auto-approve', { preHandler: authenticate }, async (request, reply) => {
    try {
      const token = requireAdmin(request, AdminPermissions.SETTINGS);
      const { enabled } = autoApproveSchema.parse(request.body);
      await setSetting(db, SETTING_AUTO_APPROVE_USERS, String(enabled));
      logger.info({ enabled, actor: actor(token) }, '[admin] Auto-approve updated');
      return reply.send(wrapSuccess({ auto_approve_users: enabled }));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  fastify.put('/admin/settings/disabled-tools', { preHandler: authenticate }, async (request, reply) => {
    try {
      const token = requireAdmin(request, AdminPermissions.SETTINGS);
      const { tools } = disabledToolsSchema.parse(request.body);
      await setSetting(db, SETTING_DISABLED_TOOLS, JSON.stringify(tools));
      logger.info({ tools, actor: actor(token) }, '[admin] Disabled tools updated');
      return reply.send(wrapSuccess({ disabled_tools: tools }));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // ==========================================================================
  // AUDIT
  // ==========================================================================

  fastify.get('/admin/audit', { preHandler: authenticate }, async (request, reply) => {
    try {
      requireAdmin(request, AdminPermissions.AUDIT);
      if (!audit.query) {
        return reply.status(501).send(wrapError(ErrorCodes.NOT_SUPPORTED, 'Audit provider does not support queries'));
      }
      const filters = auditQuerySchema.parse(request.query);
      await audit.flush();
      const events = await audit.query(filters);
      return reply.send(wrapSuccess(events, { count: events.length }));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // ==========================================================================
  // SIGNING KEYS
  // ==========================================================================

  fastify.get('/admin/keys', { preHandler: authenticate }, async (request, reply) => {
    try {
      requireAdmin(request, AdminPermissions.KEYS);
      return reply.send(
        wrapSuccess(
          keys.listKeys().map((key) => ({
            kid: key.kid,
            created_at: key.createdAt,
            is_signing: key.isSigning,
            retired_at: key.retiredAt,
          }))
        )
      );
    } catch (err) {
      return sendError(reply, err);
    }
  });

  fastify.post('/admin/keys/rotate', { preHandler: authenticate }, async (request, reply) => {
    try {
      const token = requireAdmin(request, AdminPermissions.KEYS);
      const key = await keys.rotate();
      logger.info({ kid: key.kid, actor: actor(token) }, '[admin] Signing key rotated');
      return reply.send(wrapSuccess({ kid: key.kid, created_at: key.createdAt }));
    } catch (err) {
      return sendError(reply, err);
    }
  });
}
