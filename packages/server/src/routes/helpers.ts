/**
 * Route helpers shared by every route plugin: source IP, error replies,
 * session authentication and rate limiting.
 */

import type { FastifyReply, FastifyRequest, preHandlerAsyncHookHandler } from 'fastify';
import { ZodError } from 'zod';
import {
  AuthenticationError,
  OAuth2Error,
  PierreError,
  RateLimitError,
  type AuthRequest,
  type AuthenticationProvider,
  type SessionContext,
} from '@pierre/core';
import { restCodeFor } from '../services/protocol-converter.js';
import { RATE_LIMIT_WINDOW_MS, type RateLimiter } from '../services/rate-limiter.js';
import { ErrorCodes, wrapError } from './reply-envelope.js';

declare module 'fastify' {
  interface FastifyRequest {
    /** Set by the authenticate preHandler */
    auth: SessionContext | null;
  }
}

/**
 * Authenticated session with a user subject
 */
export interface UserSession extends SessionContext {
  user_id: string;
}

/**
 * Client address. X-Forwarded-For is honoured only when trustProxy is set.
 */
export function getSourceIp(request: FastifyRequest, trustProxy: boolean): string {
  if (trustProxy) {
    const forwardedHeader = request.headers['x-forwarded-for'];
    const forwardedFor = (Array.isArray(forwardedHeader) ? forwardedHeader[0] : forwardedHeader) || request.ip || '0.0.0.0';
    return forwardedFor.split(',')[0]?.trim() || '0.0.0.0';
  }
  return request.ip ?? '0.0.0.0';
}

export function flattenHeaders(request: FastifyRequest): Record<string, string | undefined> {
  const headers: Record<string, string | undefined> = {};
  for (const [key, value] of Object.entries(request.headers)) {
    headers[key.toLowerCase()] = Array.isArray(value) ? value[0] : value;
  }
  return headers;
}

export function toAuthRequest(request: FastifyRequest, trustProxy: boolean): AuthRequest {
  return {
    headers: flattenHeaders(request),
    cookies: { ...request.cookies },
    method: request.method,
    sourceIp: getSourceIp(request, trustProxy),
  };
}

/**
 * Reply with the error in the shape its type calls for: RFC 6749 JSON for
 * OAuth2Error, the REST envelope for everything else.
 */
export function sendError(reply: FastifyReply, err: unknown): FastifyReply {
  if (err instanceof OAuth2Error) {
    return reply.status(err.statusCode).send(err.toJSON());
  }
  if (err instanceof ZodError) {
    const details = err.issues.map((issue) => ({ path: issue.path.join('.'), message: issue.message }));
    return reply.status(400).send(wrapError(ErrorCodes.VALIDATION_ERROR, 'Validation failed', details));
  }
  if (err instanceof PierreError) {
    if (err instanceof RateLimitError) {
      reply.header('Retry-After', String(err.retryAfterSeconds));
    }
    return reply
      .status(err.statusCode)
      .send(wrapError(restCodeFor(err.kind), err.message, [{ error_kind: err.kind, ...err.details }]));
  }
  reply.log.error({ err }, '[server] Unhandled route error');
  return reply
    .status(500)
    .send(wrapError(ErrorCodes.INTERNAL_ERROR, 'Internal server error', [{ error_kind: 'internal' }]));
}

/**
 * preHandler resolving the caller through the authentication provider.
 * Failures answer 401 (403 for a CSRF failure).
 */
export function createAuthenticate(authn: AuthenticationProvider, trustProxy: boolean): preHandlerAsyncHookHandler {
  return async function authenticate(request, reply) {
    const result = await authn.authenticate(toAuthRequest(request, trustProxy));
    if (!result.success || !result.session) {
      const kind = result.error?.kind ?? 'auth_required';
      const status = kind === 'permission_denied' ? 403 : 401;
      if (status === 401) {
        reply.header('WWW-Authenticate', 'Bearer realm="pierre"');
      }
      await reply
        .status(status)
        .send(wrapError(restCodeFor(kind), result.error?.message ?? 'Authentication required', [{ error_kind: kind }]));
      return;
    }
    request.auth = result.session;
  };
}

/**
 * Session of the current request, which must belong to a user
 *
 * @throws AuthenticationError for anonymous and client-credentials callers
 */
export function requireUser(request: FastifyRequest): UserSession {
  const session = request.auth;
  if (!session?.user_id) {
    throw new AuthenticationError('User authentication required', 'auth_required');
  }
  return { ...session, user_id: session.user_id };
}

/**
 * Count one attempt in a per-minute bucket
 *
 * @throws RateLimitError once the bucket is full
 */
export function enforceRateLimit(limiter: RateLimiter, bucket: string, key: string, limit: number): void {
  const status = limiter.consume(`${bucket}:${key}`, limit, RATE_LIMIT_WINDOW_MS);
  if (!status.allowed) {
    throw new RateLimitError(`Too many ${bucket} requests`, status.retryAfterSeconds);
  }
}
