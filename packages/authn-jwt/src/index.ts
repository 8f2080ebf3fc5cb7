/**
 * @pierre/authn-jwt
 *
 * RS256 key set and token service, password grant, CSRF store, the JWT
 * authentication provider and admin service-token authentication.
 */

export {
  KeySetManager,
  SIGNING_ALGORITHM,
  DEFAULT_KEY_RETENTION_SECONDS,
  type SigningKey,
  type PublicJwks,
  type KeySetOptions,
} from './key-set.js';
export {
  TokenService,
  DEFAULT_TOKEN_LIFETIME_SECONDS,
  type TokenSubject,
  type MintedToken,
  type TokenServiceOptions,
} from './token-service.js';
export { passwordGrant, type PasswordGrantRequest, type TokenResponse } from './password-grant.js';
export { CsrfStore, CSRF_TOKEN_TTL_MS, type CsrfStoreOptions } from './csrf.js';
export { JwtAuthProvider, SESSION_COOKIE_NAMES, CSRF_HEADER, extractBearerToken } from './provider.js';
export { authenticateAdmin, hasAdminPermission, type AdminAuthResult } from './admin.js';
