/**
 * Token Service
 *
 * Mints and validates RS256 access tokens:
 * `{ sub, active_tenant_id?, role, iat, exp, jti }` with `kid` in the header.
 * Client-credentials tokens additionally carry `token_use: "client"` and
 * `client_id`.
 *
 * Validation order: decode the header, resolve the kid against the key set,
 * verify the signature, check `exp`.
 */

import { SignJWT, decodeProtectedHeader, errors, jwtVerify, type JWTPayload } from 'jose';
import { v4 as uuidv4 } from 'uuid';
import { z } from 'zod';
import { AuthenticationError, logger } from '@pierre/core';
import type { TokenClaims, UserRole } from '@pierre/protocol';
import { SIGNING_ALGORITHM, type KeySetManager } from './key-set.js';

/** 24 hours */
export const DEFAULT_TOKEN_LIFETIME_SECONDS = 24 * 60 * 60;

const TokenClaimsSchema = z.object({
  sub: z.string().min(1),
  role: z.enum(['user', 'admin', 'super_admin']),
  iat: z.number().int(),
  exp: z.number().int(),
  jti: z.string().optional(),
  active_tenant_id: z.string().optional(),
  token_use: z.literal('client').optional(),
  client_id: z.string().optional(),
});

export interface TokenSubject {
  userId: string;
  role: UserRole;
  activeTenantId?: string | null;
}

export interface MintedToken {
  token: string;
  claims: TokenClaims;
  /** Seconds until expiry, as reported in `expires_in` */
  expiresIn: number;
}

export interface TokenServiceOptions {
  lifetimeSeconds?: number;
  /** When set, minted tokens carry `iss` and validation requires it */
  issuer?: string;
  now?: () => Date;
}

export class TokenService {
  readonly lifetimeSeconds: number;
  private readonly issuer: string | undefined;
  private readonly now: () => Date;

  constructor(
    private readonly keys: KeySetManager,
    options: TokenServiceOptions = {}
  ) {
    this.lifetimeSeconds = options.lifetimeSeconds ?? DEFAULT_TOKEN_LIFETIME_SECONDS;
    this.issuer = options.issuer;
    this.now = options.now ?? (() => new Date());
  }

  async mint(subject: TokenSubject): Promise<MintedToken> {
    const extra: JWTPayload = subject.activeTenantId ? { active_tenant_id: subject.activeTenantId } : {};
    return this.sign(subject.userId, subject.role, extra);
  }

  /**
   * Token for a client acting on its own behalf (no user subject)
   */
  async mintClientToken(clientId: string): Promise<MintedToken> {
    return this.sign(clientId, 'user', { token_use: 'client', client_id: clientId });
  }

  /**
   * @throws AuthenticationError with kind auth_required, auth_invalid or auth_expired
   */
  async validate(token: string | undefined): Promise<TokenClaims> {
    if (!token) {
      throw new AuthenticationError('No access token provided', 'auth_required');
    }

    let kid: string | undefined;
    let alg: string | undefined;
    try {
      ({ kid, alg } = decodeProtectedHeader(token));
    } catch {
      throw new AuthenticationError('Malformed access token');
    }
    if (alg !== SIGNING_ALGORITHM || !kid) {
      throw new AuthenticationError('Access token is not signed with a known key');
    }

    const key = this.keys.verificationKey(kid);
    if (!key) {
      throw new AuthenticationError('Access token is not signed with a known key');
    }

    let payload: JWTPayload;
    try {
      ({ payload } = await jwtVerify(token, key, {
        algorithms: [SIGNING_ALGORITHM],
        currentDate: this.now(),
        issuer: this.issuer,
      }));
    } catch (err) {
      if (err instanceof errors.JWTExpired) {
        throw new AuthenticationError('Access token expired', 'auth_expired');
      }
      logger.debug({ err, kid }, '[authn-jwt] Token verification failed');
      throw new AuthenticationError('Invalid access token');
    }

    const claims = TokenClaimsSchema.safeParse(payload);
    if (!claims.success) {
      throw new AuthenticationError('Access token claims are malformed');
    }
    return claims.data;
  }

  /**
   * Validate a token and issue a new one for the same subject and active tenant
   */
  async refresh(token: string): Promise<MintedToken> {
    const claims = await this.validate(token);
    if (claims.token_use === 'client') {
      return this.mintClientToken(claims.client_id ?? claims.sub);
    }
    return this.mint({ userId: claims.sub, role: claims.role, activeTenantId: claims.active_tenant_id });
  }

  private async sign(sub: string, role: UserRole, extra: JWTPayload): Promise<MintedToken> {
    const key = this.keys.currentSigningKey();
    const iat = Math.floor(this.now().getTime() / 1000);
    const exp = iat + this.lifetimeSeconds;
    const jti = uuidv4();

    const builder = new SignJWT({ ...extra, role })
      .setProtectedHeader({ alg: SIGNING_ALGORITHM, kid: key.kid, typ: 'JWT' })
      .setSubject(sub)
      .setIssuedAt(iat)
      .setExpirationTime(exp)
      .setJti(jti);
    if (this.issuer) {
      builder.setIssuer(this.issuer);
    }
    const token = await builder.sign(key.privateKey);

    const claims = TokenClaimsSchema.parse({ ...extra, sub, role, iat, exp, jti });
    return { token, claims, expiresIn: this.lifetimeSeconds };
  }
}
