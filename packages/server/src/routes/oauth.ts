/**
 * Upstream OAuth Routes
 *
 * Connecting users to fitness providers: authorization, callback, status,
 * and disconnect.
 *
 * The callback answers in this order: the mobile deep link recorded with the
 * consumed state, then the configured frontend, then a static page on this
 * origin. A state that was never consumed never picks the redirect target.
 */

import type { FastifyInstance, FastifyReply, preHandlerAsyncHookHandler } from 'fastify';
import { z } from 'zod';
import { AuthorizationError, ValidationError, type TokenStore } from '@pierre/core';
import type { ProviderRegistry } from '@pierre/providers';
import type { RateLimiter } from '../services/rate-limiter.js';
import { CallbackError, type UpstreamOAuthClient } from '../services/upstream-oauth-client.js';
import { enforceRateLimit, getSourceIp, requireUser, sendError } from './helpers.js';
import {
  callbackFailureReason,
  callbackFailureStatus,
  renderCallbackFailure,
  renderCallbackSuccess,
  type CallbackFailureReason,
} from './oauth-pages.js';
import { wrapSuccess } from './reply-envelope.js';

/** Callbacks per minute per IP */
export const CALLBACK_RATE_LIMIT = 10;

export interface OAuthRoutesConfig {
  oauth: UpstreamOAuthClient;
  registry: ProviderRegistry;
  tokenStore: TokenStore;
  rateLimiter: RateLimiter;
  authenticate: preHandlerAsyncHookHandler;
  /** Web app origin for post-callback redirects */
  frontendUrl: string | undefined;
  trustProxy: boolean;
}

const providerParams = z.object({ provider: z.string().min(1) });
const initiateParams = providerParams.extend({ userId: z.string().min(1) });

const mobileInitQuery = z.object({
  redirect_url: z.string().min(1).max(2048).optional(),
});

const callbackQuery = z.object({
  code: z.string().optional(),
  state: z.string().optional(),
  error: z.string().optional(),
});

function requireTenantId(tenantId: string | undefined): string {
  if (!tenantId) {
    throw new ValidationError('No active tenant. Create or join a tenant first.');
  }
  return tenantId;
}

function withQuery(base: string, params: Record<string, string>): string {
  const query = new URLSearchParams(params).toString();
  return `${base}${base.includes('?') ? '&' : '?'}${query}`;
}

export async function registerOAuthRoutes(fastify: FastifyInstance, config: OAuthRoutesConfig): Promise<void> {
  const { oauth, registry, tokenStore, rateLimiter, authenticate } = config;
  const frontendUrl = config.frontendUrl?.replace(/\/+$/, '');

  // ==========================================================================
  // GET /api/oauth/auth/:provider/:userId - browser redirect to the provider
  // ==========================================================================
  fastify.get('/api/oauth/auth/:provider/:userId', { preHandler: authenticate }, async (request, reply) => {
    try {
      const session = requireUser(request);
      const params = initiateParams.parse(request.params);
      if (params.userId !== session.user_id) {
        request.log.warn(
          { userId: session.user_id, requested: params.userId },
          '[oauth] Refused to start a flow for a different user'
        );
        throw new AuthorizationError('Cannot initiate OAuth flow for a different user');
      }

      const result = await oauth.buildAuthorizationUrl(session.user_id, requireTenantId(session.tenant_id), params.provider);
      request.log.info({ provider: params.provider, userId: session.user_id }, '[oauth] Authorization URL issued');
      return reply.redirect(result.authorizationUrl);
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // ==========================================================================
  // GET /api/oauth/mobile/init/:provider - authorization URL as JSON
  // ==========================================================================
  fastify.get('/api/oauth/mobile/init/:provider', { preHandler: authenticate }, async (request, reply) => {
    try {
      const session = requireUser(request);
      const { provider } = providerParams.parse(request.params);
      const query = mobileInitQuery.parse(request.query);

      const result = await oauth.buildAuthorizationUrl(
        session.user_id,
        requireTenantId(session.tenant_id),
        provider,
        query.redirect_url !== undefined ? { mobileRedirectUrl: query.redirect_url } : {}
      );
      return reply.send(
        wrapSuccess({
          provider,
          authorization_url: result.authorizationUrl,
          state: result.state,
          expires_at: result.expiresAt,
        })
      );
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // ==========================================================================
  // GET /api/oauth/callback/:provider - provider callback (no auth required)
  // ==========================================================================
  fastify.get('/api/oauth/callback/:provider', async (request, reply) => {
    try {
      enforceRateLimit(rateLimiter, 'callback', getSourceIp(request, config.trustProxy), CALLBACK_RATE_LIMIT);
    } catch (err) {
      return sendError(reply, err);
    }

    const { provider } = providerParams.parse(request.params);
    const parsedQuery = callbackQuery.safeParse(request.query);
    const query: z.infer<typeof callbackQuery> = parsedQuery.success ? parsedQuery.data : {};
    const displayName = registry.isSupported(provider) ? registry.getDescriptor(provider).displayName : provider;

    const fail = (reason: CallbackFailureReason, status: number, deepLink: string | null = null): FastifyReply => {
      const params = { provider, success: 'false', error: reason };
      if (deepLink) {
        return reply.redirect(withQuery(deepLink.replace(/\/+$/, ''), params));
      }
      if (frontendUrl) {
        return reply.redirect(withQuery(`${frontendUrl}/oauth-callback`, params));
      }
      return reply.status(status).type('text/html; charset=utf-8').send(renderCallbackFailure(displayName, reason));
    };

    if (query.error !== undefined) {
      request.log.info({ provider, error: query.error }, '[oauth] Provider reported an authorization error');
      return fail('access_denied', 400);
    }
    if (!query.code || !query.state || !registry.isSupported(provider)) {
      return fail('invalid_state', 400);
    }

    try {
      const result = await oauth.handleCallback(query.code, query.state, provider);
      request.log.info({ provider, userId: result.user_id }, '[oauth] Provider connected');

      const params = { provider, success: 'true' };
      if (result.mobile_redirect_url) {
        return reply.redirect(withQuery(result.mobile_redirect_url.replace(/\/+$/, ''), params));
      }
      if (frontendUrl) {
        return reply.redirect(withQuery(`${frontendUrl}/oauth-callback`, params));
      }
      return reply.type('text/html; charset=utf-8').send(renderCallbackSuccess(displayName));
    } catch (err) {
      const failure = err instanceof CallbackError ? err.failure : err;
      request.log.warn({ err: failure, provider }, '[oauth] Callback failed');
      return fail(
        callbackFailureReason(failure),
        callbackFailureStatus(failure),
        err instanceof CallbackError ? err.mobileRedirectUrl : null
      );
    }
  });

  // ==========================================================================
  // GET /api/oauth/status - connections of the active tenant
  // ==========================================================================
  fastify.get('/api/oauth/status', { preHandler: authenticate }, async (request, reply) => {
    try {
      const session = requireUser(request);
      const connections = session.tenant_id ? await tokenStore.listConnections(session.user_id, session.tenant_id) : [];
      const byProvider = new Map(connections.map((c) => [c.provider, c]));
      return reply.send(
        wrapSuccess(
          registry.oauthProviders().map((descriptor) => {
            const connection = byProvider.get(descriptor.name);
            return {
              provider: descriptor.name,
              connected: connection !== undefined,
              connected_at: connection?.connected_at ?? null,
            };
          })
        )
      );
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // ==========================================================================
  // GET /api/providers - every provider, with capability flags
  // ==========================================================================
  fastify.get('/api/providers', { preHandler: authenticate }, async (request, reply) => {
    try {
      const session = requireUser(request);
      const connections = session.tenant_id ? await tokenStore.listConnections(session.user_id, session.tenant_id) : [];
      const connected = new Set(connections.map((c) => c.provider));
      return reply.send(
        wrapSuccess(
          registry.listProviders().map((descriptor) => ({
            name: descriptor.name,
            display_name: descriptor.displayName,
            capabilities: descriptor.capabilities,
            oauth: descriptor.oauth !== null,
            connected: connected.has(descriptor.name),
          }))
        )
      );
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // ==========================================================================
  // DELETE /api/oauth/providers/:provider/disconnect
  // ==========================================================================
  fastify.delete('/api/oauth/providers/:provider/disconnect', { preHandler: authenticate }, async (request, reply) => {
    try {
      const session = requireUser(request);
      const { provider } = providerParams.parse(request.params);
      const disconnected = await oauth.disconnect(session.user_id, requireTenantId(session.tenant_id), provider);
      return reply.send(wrapSuccess({ provider, disconnected }));
    } catch (err) {
      return sendError(reply, err);
    }
  });
}
