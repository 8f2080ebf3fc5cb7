/**
 * Provider webhook ingest
 *
 * `POST /api/webhooks/:provider` with the shared secret in `X-Webhook-Secret`.
 * A webhook only says that a user's data changed upstream; the gateway drops
 * the cached activity-list pages for that user so the next read refetches.
 *
 * The user is addressed either directly (`user_id`, optionally `tenant_id`)
 * or by the provider-side account id (`owner_id` / `external_user_id`) that
 * was recorded when the connection was made.
 */

import crypto from 'crypto';
import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import {
  AuthenticationError,
  PierreError,
  ValidationError,
  activityListPattern,
  logger,
  type CacheProvider,
  type TokenStore,
} from '@pierre/core';
import type { ProviderRegistry } from '@pierre/providers';
import { sendError } from './helpers.js';
import { wrapSuccess } from './reply-envelope.js';

export const WEBHOOK_SECRET_HEADER = 'x-webhook-secret';

export interface WebhookRoutesConfig {
  cache: CacheProvider;
  tokenStore: TokenStore;
  registry: ProviderRegistry;
  /** Unset disables the endpoint */
  secret: string | undefined;
}

const providerParams = z.object({ provider: z.string().min(1) });

const webhookBody = z
  .object({
    user_id: z.string().min(1).optional(),
    tenant_id: z.string().min(1).optional(),
    owner_id: z.union([z.string().min(1), z.number().int()]).optional(),
    external_user_id: z.union([z.string().min(1), z.number().int()]).optional(),
    event_type: z.string().max(64).optional(),
  })
  .passthrough();

function secretMatches(expected: string, presented: string | undefined): boolean {
  if (!presented) {
    return false;
  }
  const left = crypto.createHash('sha256').update(expected).digest();
  const right = crypto.createHash('sha256').update(presented).digest();
  return crypto.timingSafeEqual(left, right);
}

export async function registerWebhookRoutes(fastify: FastifyInstance, config: WebhookRoutesConfig): Promise<void> {
  const { cache, tokenStore, registry, secret } = config;

  fastify.post('/api/webhooks/:provider', async (request, reply) => {
    try {
      if (!secret) {
        throw new PierreError('Webhooks are not configured', 'not_supported', 'not_supported', 501);
      }
      const header = request.headers[WEBHOOK_SECRET_HEADER];
      if (!secretMatches(secret, Array.isArray(header) ? header[0] : header)) {
        throw new AuthenticationError('Invalid webhook secret');
      }

      const { provider } = providerParams.parse(request.params);
      if (!registry.isSupported(provider)) {
        throw new ValidationError(`Unsupported provider: ${provider}`);
      }
      const body = webhookBody.parse(request.body ?? {});

      const targets = await resolveTargets(tokenStore, provider, body);
      let evicted = 0;
      for (const { tenant_id, user_id } of targets) {
        evicted += await cache.invalidatePattern(activityListPattern(tenant_id, user_id, provider));
      }

      logger.info(
        { provider, event: body.event_type, users: targets.length, evicted },
        '[webhooks] Activity cache invalidated'
      );
      return reply.send(wrapSuccess({ provider, users: targets.length, invalidated: evicted }));
    } catch (err) {
      return sendError(reply, err);
    }
  });
}

async function resolveTargets(
  tokenStore: TokenStore,
  provider: string,
  body: z.infer<typeof webhookBody>
): Promise<Array<{ tenant_id: string; user_id: string }>> {
  if (body.user_id !== undefined) {
    if (body.tenant_id !== undefined) {
      return [{ tenant_id: body.tenant_id, user_id: body.user_id }];
    }
    const connections = await tokenStore.listConnections(body.user_id);
    return connections.filter((c) => c.provider === provider);
  }

  const externalId = body.external_user_id ?? body.owner_id;
  if (externalId === undefined) {
    throw new ValidationError('Webhook must identify a user (user_id, owner_id or external_user_id)');
  }
  return tokenStore.findByExternalUser(provider, String(externalId));
}
