/**
 * User Auth Routes
 *
 * - POST /api/auth/register - create an account (pending unless auto-approve is on)
 * - POST /api/auth/login    - password login; sets the auth_token cookie and issues a CSRF token
 * - POST /api/auth/logout   - clear the cookie and wipe the user's cached provider data
 * - POST /api/auth/refresh  - re-mint the current token
 * - GET  /api/auth/me       - current user with tenant memberships
 */

import type { FastifyInstance, FastifyReply, preHandlerAsyncHookHandler } from 'fastify';
import { z } from 'zod';
import {
  AuthenticationError,
  AuthorizationError,
  NotFoundError,
  SETTING_AUTO_APPROVE_USERS,
  ValidationError,
  createUser,
  getBooleanSetting,
  getPrimaryTenantId,
  getUserById,
  listTenantsForUser,
  touchLastActive,
  userPattern,
  validatePassword,
  verifyUserCredentials,
  type CacheProvider,
  type DatabaseClient,
  type User,
} from '@pierre/core';
import { CSRF_HEADER, extractBearerToken, type CsrfStore, type MintedToken, type TokenService } from '@pierre/authn-jwt';
import type { RateLimiter } from '../services/rate-limiter.js';
import { toPublicUser } from '../services/user-view.js';
import { enforceRateLimit, getSourceIp, requireUser, sendError } from './helpers.js';
import { wrapSuccess } from './reply-envelope.js';

export const AUTH_COOKIE = 'auth_token';

export interface AuthRoutesConfig {
  db: DatabaseClient;
  tokens: TokenService;
  csrf: CsrfStore;
  cache: CacheProvider;
  rateLimiter: RateLimiter;
  authenticate: preHandlerAsyncHookHandler;
  /** Config default; the auto_approve_users setting wins when present */
  autoApproveUsers: boolean;
  loginPerMinute: number;
  secureCookies: boolean;
  trustProxy: boolean;
}

const registerSchema = z.object({
  email: z.string().email().max(320),
  password: z.string().min(1).max(1024),
  display_name: z.string().min(1).max(255).optional(),
});

const loginSchema = z.object({
  email: z.string().min(1).max(320),
  password: z.string().min(1).max(1024),
});

export async function registerAuthRoutes(fastify: FastifyInstance, config: AuthRoutesConfig): Promise<void> {
  const { db, tokens, csrf, cache, rateLimiter, authenticate } = config;

  const setAuthCookie = (reply: FastifyReply, minted: MintedToken) => {
    reply.setCookie(AUTH_COOKIE, minted.token, {
      path: '/',
      httpOnly: true,
      sameSite: 'strict',
      secure: config.secureCookies,
      maxAge: minted.expiresIn,
    });
  };

  const loginPayload = (user: User, minted: MintedToken, csrfToken: string) => ({
    user: toPublicUser(user),
    access_token: minted.token,
    token_type: 'Bearer' as const,
    expires_in: minted.expiresIn,
    active_tenant_id: minted.claims.active_tenant_id ?? null,
    csrf_token: csrfToken,
  });

  // ==========================================================================
  // POST /api/auth/register
  // ==========================================================================
  fastify.post('/api/auth/register', { bodyLimit: 4096 }, async (request, reply) => {
    try {
      enforceRateLimit(rateLimiter, 'register', getSourceIp(request, config.trustProxy), config.loginPerMinute);
      const body = registerSchema.parse(request.body);

      const policy = validatePassword(body.password);
      if (!policy.valid) {
        throw new ValidationError(policy.errors.join('; '));
      }

      const autoApprove = (await getBooleanSetting(db, SETTING_AUTO_APPROVE_USERS)) ?? config.autoApproveUsers;
      const user = await createUser(db, {
        email: body.email,
        password: body.password,
        ...(body.display_name !== undefined && { display_name: body.display_name }),
        status: autoApprove ? 'active' : 'pending',
      });

      return reply.status(201).send(
        wrapSuccess({
          user: toPublicUser(user),
          message: autoApprove ? 'Account created' : 'Account created and awaiting administrator approval',
        })
      );
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // ==========================================================================
  // POST /api/auth/login
  // ==========================================================================
  fastify.post('/api/auth/login', { bodyLimit: 4096 }, async (request, reply) => {
    try {
      enforceRateLimit(rateLimiter, 'login', getSourceIp(request, config.trustProxy), config.loginPerMinute);
      const body = loginSchema.parse(request.body);

      const check = await verifyUserCredentials(db, body.email, body.password);
      if (!check.ok) {
        if (check.reason === 'not_active') {
          throw new AuthorizationError('Account is not active');
        }
        throw new AuthenticationError('Invalid email or password');
      }

      const user = check.user;
      const minted = await tokens.mint({
        userId: user.id,
        role: user.role,
        activeTenantId: await getPrimaryTenantId(db, user.id),
      });
      await touchLastActive(db, user.id);

      setAuthCookie(reply, minted);
      request.log.info({ userId: user.id }, '[auth] User logged in');
      return reply.send(wrapSuccess(loginPayload(user, minted, csrf.issue(user.id))));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // ==========================================================================
  // POST /api/auth/logout
  // ==========================================================================
  fastify.post('/api/auth/logout', { preHandler: authenticate }, async (request, reply) => {
    try {
      const session = requireUser(request);
      const evicted = await cache.invalidatePattern(userPattern('*', session.user_id));

      const csrfToken = request.headers[CSRF_HEADER];
      if (typeof csrfToken === 'string') {
        csrf.revoke(csrfToken);
      }
      reply.clearCookie(AUTH_COOKIE, { path: '/' });

      request.log.info({ userId: session.user_id, evicted }, '[auth] User logged out');
      return reply.send(wrapSuccess({ logged_out: true }));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // ==========================================================================
  // POST /api/auth/refresh
  // ==========================================================================
  fastify.post('/api/auth/refresh', { preHandler: authenticate }, async (request, reply) => {
    try {
      const session = requireUser(request);
      const presented = extractBearerToken(request.headers.authorization) ?? request.cookies[AUTH_COOKIE];
      if (!presented) {
        throw new AuthenticationError('No access token provided', 'auth_required');
      }
      const minted = await tokens.refresh(presented);
      const user = await getUserById(db, session.user_id);
      if (!user) {
        throw new NotFoundError('User not found');
      }

      if (session.auth_method === 'cookie') {
        setAuthCookie(reply, minted);
      }
      return reply.send(wrapSuccess(loginPayload(user, minted, csrf.issue(user.id))));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // ==========================================================================
  // GET /api/auth/me
  // ==========================================================================
  fastify.get('/api/auth/me', { preHandler: authenticate }, async (request, reply) => {
    try {
      const session = requireUser(request);
      const user = await getUserById(db, session.user_id);
      if (!user) {
        throw new NotFoundError('User not found');
      }
      const tenants = await listTenantsForUser(db, user.id);
      return reply.send(
        wrapSuccess({
          user: toPublicUser(user),
          active_tenant_id: session.tenant_id ?? null,
          tenants: tenants.map((t) => ({ id: t.id, name: t.name, slug: t.slug, role: t.member_role })),
        })
      );
    } catch (err) {
      return sendError(reply, err);
    }
  });
}
