/**
 * Dynamic Client Registry (RFC 7591)
 *
 * Every registration creates a new client, even for identical metadata. The
 * secret is returned once and only its Argon2id hash is stored.
 */

import crypto from 'crypto';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import {
  GRANT_TYPES,
  OAuth2Error,
  dummyVerify,
  getOAuthClientById,
  hashSecret,
  insertOAuthClient,
  isApprovedRedirectUri,
  logger,
  verifySecret,
  type DatabaseClient,
  type OAuthClient,
} from '@pierre/core';

const RegistrationSchema = z.object({
  client_name: z.string().min(1).max(255).optional(),
  redirect_uris: z.array(z.string().min(1).max(2048)).min(1).max(10),
  grant_types: z.array(z.enum(GRANT_TYPES)).min(1).default(['authorization_code', 'refresh_token']),
  response_types: z.array(z.literal('code')).min(1).default(['code']),
  scope: z.string().max(1000).optional(),
});

export type RegistrationRequest = z.input<typeof RegistrationSchema>;

/**
 * RFC 7591 §3.2.1 response
 */
export interface RegistrationResponse {
  client_id: string;
  client_secret: string;
  client_id_issued_at: number;
  client_secret_expires_at: 0;
  client_name?: string;
  redirect_uris: string[];
  grant_types: string[];
  response_types: string[];
  scope?: string;
  token_endpoint_auth_method: 'client_secret_post';
}

export class ClientRegistry {
  constructor(private readonly db: DatabaseClient) {}

  /**
   * @throws OAuth2Error invalid_client_metadata / invalid_redirect_uri
   */
  async register(body: unknown): Promise<RegistrationResponse> {
    const parsed = RegistrationSchema.safeParse(body);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue ? issue.path.join('.') : 'body';
      throw new OAuth2Error('invalid_client_metadata', `Invalid client metadata: ${field}`);
    }
    const request = parsed.data;

    const rejected = request.redirect_uris.find((uri) => !isApprovedRedirectUri(uri));
    if (rejected !== undefined) {
      throw new OAuth2Error('invalid_redirect_uri', 'Redirect URIs must use https, a loopback http address, pierre:// or exp://');
    }

    const clientSecret = crypto.randomBytes(32).toString('base64url');
    const now = new Date();
    const client: OAuthClient = {
      id: uuidv4(),
      client_name: request.client_name ?? null,
      client_secret_hash: await hashSecret(clientSecret),
      redirect_uris: request.redirect_uris,
      grant_types: [...new Set(request.grant_types)],
      response_types: [...new Set(request.response_types)],
      scopes: request.scope ? request.scope.split(' ').filter((s) => s.length > 0) : [],
      created_at: now.toISOString(),
    };
    await insertOAuthClient(this.db, client);

    return {
      client_id: client.id,
      client_secret: clientSecret,
      client_id_issued_at: Math.floor(now.getTime() / 1000),
      client_secret_expires_at: 0,
      ...(client.client_name !== null && { client_name: client.client_name }),
      redirect_uris: client.redirect_uris,
      grant_types: client.grant_types,
      response_types: client.response_types,
      ...(request.scope ? { scope: request.scope } : {}),
      token_endpoint_auth_method: 'client_secret_post',
    };
  }

  async getClient(clientId: string): Promise<OAuthClient | null> {
    return getOAuthClientById(this.db, clientId);
  }

  /**
   * @throws OAuth2Error invalid_client for an unknown client or wrong secret
   */
  async authenticate(clientId: string | undefined, clientSecret: string | undefined): Promise<OAuthClient> {
    if (!clientId || !clientSecret) {
      throw new OAuth2Error('invalid_client', 'Client authentication failed');
    }

    const client = await getOAuthClientById(this.db, clientId);
    if (!client) {
      await dummyVerify(clientSecret);
      throw new OAuth2Error('invalid_client', 'Client authentication failed');
    }

    if (!(await verifySecret(client.client_secret_hash, clientSecret))) {
      logger.warn({ clientId }, '[oauth2] Client secret mismatch');
      throw new OAuth2Error('invalid_client', 'Client authentication failed');
    }
    return client;
  }
}
