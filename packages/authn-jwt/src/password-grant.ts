/**
 * Resource Owner Password Credentials grant (RFC 6749 §4.3)
 *
 * Thin wrapper over the user repository and the token service. Argon2
 * verification runs on the libuv pool; an unknown email still costs one
 * verification.
 */

import {
  OAuth2Error,
  getPrimaryTenantId,
  logger,
  touchLastActive,
  verifyUserCredentials,
  type CredentialCheck,
  type DatabaseClient,
} from '@pierre/core';
import type { TokenService } from './token-service.js';

/** RFC 6749 §5.1 token response */
export interface TokenResponse {
  access_token: string;
  token_type: 'Bearer';
  expires_in: number;
  refresh_token?: string;
  scope?: string;
}

export interface PasswordGrantRequest {
  username?: string;
  password?: string;
  scope?: string;
}

/**
 * @throws OAuth2Error invalid_request | invalid_grant | unauthorized_client | server_error
 */
export async function passwordGrant(
  db: DatabaseClient,
  tokens: TokenService,
  request: PasswordGrantRequest
): Promise<TokenResponse> {
  const { username, password, scope } = request;
  if (!username || !password) {
    throw new OAuth2Error('invalid_request', 'username and password are required');
  }

  let check: CredentialCheck;
  try {
    check = await verifyUserCredentials(db, username, password);
  } catch (err) {
    logger.error({ err }, '[authn-jwt] Password verification failed');
    throw new OAuth2Error('server_error', 'Password verification failed');
  }

  if (!check.ok) {
    if (check.reason === 'not_active') {
      throw new OAuth2Error('unauthorized_client', 'User account is not active');
    }
    throw new OAuth2Error('invalid_grant', 'Invalid username or password');
  }

  const user = check.user;
  const minted = await tokens.mint({
    userId: user.id,
    role: user.role,
    activeTenantId: await getPrimaryTenantId(db, user.id),
  });
  await touchLastActive(db, user.id);

  logger.info({ userId: user.id }, '[authn-jwt] Password grant issued a token');
  return {
    access_token: minted.token,
    token_type: 'Bearer',
    expires_in: minted.expiresIn,
    ...(scope ? { scope } : {}),
  };
}
