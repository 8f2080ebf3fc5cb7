/**
 * Authorization Server Routes
 *
 * RFC 8414 metadata, JWKS, RFC 7591 registration, the authorization and
 * token endpoints, validate-and-refresh, and the password grant at
 * /oauth/token. OAuth endpoints answer errors as RFC 6749 JSON.
 */

import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import { z } from 'zod';
import { OAuth2Error, type AuthenticationProvider, type DatabaseClient } from '@pierre/core';
import { extractBearerToken, passwordGrant, type KeySetManager, type TokenService } from '@pierre/authn-jwt';
import type { AuthorizationServer, AuthorizeSession } from '../services/authorization-server.js';
import type { ClientRegistry } from '../services/client-registry.js';
import type { RateLimiter } from '../services/rate-limiter.js';
import { enforceRateLimit, getSourceIp, sendError, toAuthRequest } from './helpers.js';

export interface OAuth2RoutesConfig {
  db: DatabaseClient;
  authServer: AuthorizationServer;
  clients: ClientRegistry;
  keys: KeySetManager;
  tokens: TokenService;
  authn: AuthenticationProvider;
  rateLimiter: RateLimiter;
  limits: { authorize: number; token: number; register: number };
  trustProxy: boolean;
}

const optionalParam = z.string().optional();

const AuthorizeQuerySchema = z.object({
  response_type: optionalParam,
  client_id: optionalParam,
  redirect_uri: optionalParam,
  scope: optionalParam,
  state: optionalParam,
  code_challenge: optionalParam,
  code_challenge_method: optionalParam,
});

const TokenFormSchema = z.object({
  grant_type: optionalParam,
  code: optionalParam,
  redirect_uri: optionalParam,
  code_verifier: optionalParam,
  refresh_token: optionalParam,
  client_id: optionalParam,
  client_secret: optionalParam,
  username: optionalParam,
  password: optionalParam,
  scope: optionalParam,
});

const RefreshBodySchema = z
  .object({
    refresh_token: optionalParam,
    client_id: optionalParam,
    client_secret: optionalParam,
  })
  .default({});

/** Form values must be single strings; a repeated parameter is malformed */
function parseForm<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    throw new OAuth2Error('invalid_request', 'Malformed request parameters');
  }
  return parsed.data;
}

export async function registerOAuth2Routes(fastify: FastifyInstance, config: OAuth2RoutesConfig): Promise<void> {
  const { db, authServer, clients, keys, tokens, authn, rateLimiter, limits, trustProxy } = config;

  const sourceIp = (request: FastifyRequest) => getSourceIp(request, trustProxy);

  // ==========================================================================
  // Discovery
  // ==========================================================================
  fastify.get('/.well-known/oauth-authorization-server', async (_request, reply) => {
    return reply.header('Cache-Control', 'public, max-age=3600').send(authServer.metadata());
  });

  const jwksHandler = async (request: FastifyRequest, reply: FastifyReply) => {
    const etag = keys.jwksEtag();
    reply.header('Cache-Control', 'public, max-age=3600').header('ETag', etag);
    if (request.headers['if-none-match'] === etag) {
      return reply.status(304).send();
    }
    return reply.send(keys.publicJwks());
  };
  fastify.get('/.well-known/jwks.json', jwksHandler);
  fastify.get('/oauth2/jwks', jwksHandler);

  // ==========================================================================
  // POST /oauth2/register - RFC 7591 dynamic client registration
  // ==========================================================================
  fastify.post('/oauth2/register', async (request, reply) => {
    try {
      enforceRateLimit(rateLimiter, 'register', sourceIp(request), limits.register);
      const registration = await clients.register(request.body);
      request.log.info({ clientId: registration.client_id }, '[oauth2] Client registered');
      return reply.status(201).send(registration);
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // ==========================================================================
  // GET /oauth2/authorize - authorization code with PKCE
  // ==========================================================================
  fastify.get('/oauth2/authorize', async (request, reply) => {
    try {
      enforceRateLimit(rateLimiter, 'authorize', sourceIp(request), limits.authorize);
      const query = parseForm(AuthorizeQuerySchema, request.query);

      const auth = await authn.authenticate(toAuthRequest(request, trustProxy));
      const session: AuthorizeSession | null =
        auth.success && auth.session?.user_id
          ? { userId: auth.session.user_id, ...(auth.session.tenant_id ? { tenantId: auth.session.tenant_id } : {}) }
          : null;

      const outcome = await authServer.authorize(query, session);
      return reply.redirect(outcome.kind === 'login_required' ? outcome.loginUrl : outcome.location);
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // ==========================================================================
  // POST /oauth2/token - RFC 6749 token endpoint (form-urlencoded)
  // ==========================================================================
  fastify.post('/oauth2/token', async (request, reply) => {
    try {
      enforceRateLimit(rateLimiter, 'token', sourceIp(request), limits.token);
      const form = parseForm(TokenFormSchema, request.body);
      const response = await authServer.token(form);
      return reply.header('Pragma', 'no-cache').send(response);
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // ==========================================================================
  // POST /oauth2/validate-and-refresh
  // ==========================================================================
  fastify.post('/oauth2/validate-and-refresh', async (request, reply) => {
    try {
      enforceRateLimit(rateLimiter, 'token', sourceIp(request), limits.token);
      const body = parseForm(RefreshBodySchema, request.body);
      const result = await authServer.validateAndRefresh(extractBearerToken(request.headers.authorization), body);
      return reply.send(result);
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // ==========================================================================
  // POST /oauth/token - resource owner password credentials
  // ==========================================================================
  fastify.post('/oauth/token', async (request, reply) => {
    try {
      enforceRateLimit(rateLimiter, 'token', sourceIp(request), limits.token);
      const form = parseForm(TokenFormSchema, request.body);
      if (form.grant_type !== 'password') {
        throw new OAuth2Error(
          form.grant_type ? 'unsupported_grant_type' : 'invalid_request',
          form.grant_type ? `Unsupported grant type: ${form.grant_type}` : 'Missing grant_type'
        );
      }
      const response = await passwordGrant(db, tokens, {
        username: form.username,
        password: form.password,
        scope: form.scope,
      });
      return reply.header('Pragma', 'no-cache').send(response);
    } catch (err) {
      return sendError(reply, err);
    }
  });
}
