/**
 * Key Set Manager
 *
 * RSA key pairs used to sign and verify access tokens. Exactly one key signs;
 * retired keys stay available for verification until they have been retired
 * for the retention window (the maximum token lifetime), then the next
 * rotation deletes them.
 *
 * Private halves are sealed with the token vault (scope `signing_key`,
 * associated data = kid) before they reach the database.
 *
 * Rotations run one at a time. Readers never wait: they see the snapshot
 * that was current when they asked, and a rotation swaps in a new snapshot
 * only after the database write committed.
 */

import crypto from 'crypto';
import {
  exportJWK,
  exportPKCS8,
  exportSPKI,
  generateKeyPair,
  importPKCS8,
  importSPKI,
  type JWK,
  type KeyLike,
} from 'jose';
import { v4 as uuidv4 } from 'uuid';
import {
  KeyMissingError,
  deleteSigningKeys,
  listSigningKeys,
  logger,
  promoteSigningKey,
  type DatabaseClient,
  type SigningKeyRow,
  type TokenVault,
} from '@pierre/core';

export const SIGNING_ALGORITHM = 'RS256';

/** Retired keys are kept this long by default (24 h, the default token lifetime) */
export const DEFAULT_KEY_RETENTION_SECONDS = 24 * 60 * 60;

const DEFAULT_MODULUS_LENGTH = 2048;

export interface SigningKey {
  kid: string;
  privateKey: KeyLike;
  publicKey: KeyLike;
  publicJwk: JWK;
  createdAt: string;
  isSigning: boolean;
  retiredAt: string | null;
}

export interface PublicJwks {
  keys: JWK[];
}

interface KeySetSnapshot {
  signing: SigningKey | null;
  byKid: ReadonlyMap<string, SigningKey>;
  jwks: PublicJwks;
  etag: string;
}

export interface KeySetOptions {
  /** Seconds a retired key stays verifiable */
  retentionSeconds?: number;
  modulusLength?: number;
  now?: () => Date;
}

function buildSnapshot(keys: SigningKey[]): KeySetSnapshot {
  // Signing key first, then newest first
  const ordered = [...keys].sort((a, b) => {
    if (a.isSigning !== b.isSigning) {
      return a.isSigning ? -1 : 1;
    }
    return b.createdAt.localeCompare(a.createdAt);
  });

  const jwks: PublicJwks = {
    keys: ordered.map((key) => ({ ...key.publicJwk, kid: key.kid, alg: SIGNING_ALGORITHM, use: 'sig' })),
  };
  const digest = crypto.createHash('sha256').update(JSON.stringify(jwks)).digest('base64url');

  return {
    signing: ordered.find((key) => key.isSigning) ?? null,
    byKid: new Map(ordered.map((key) => [key.kid, key])),
    jwks,
    etag: `"${digest}"`,
  };
}

export class KeySetManager {
  private snapshot: KeySetSnapshot = buildSnapshot([]);
  private rotation: Promise<unknown> = Promise.resolve();
  private readonly retentionSeconds: number;
  private readonly modulusLength: number;
  private readonly now: () => Date;

  constructor(
    private readonly db: DatabaseClient,
    private readonly vault: TokenVault,
    options: KeySetOptions = {}
  ) {
    this.retentionSeconds = options.retentionSeconds ?? DEFAULT_KEY_RETENTION_SECONDS;
    this.modulusLength = options.modulusLength ?? DEFAULT_MODULUS_LENGTH;
    this.now = options.now ?? (() => new Date());
  }

  /**
   * Load persisted keys. With `bootstrap`, an empty key set gets its first
   * signing key; without it, a key set with no signing key is fatal.
   *
   * @throws KeyMissingError
   */
  async initialize(options: { bootstrap: boolean }): Promise<void> {
    const rows = await listSigningKeys(this.db);
    const keys = await Promise.all(rows.map((row) => this.decodeRow(row)));
    this.snapshot = buildSnapshot(keys);

    if (this.snapshot.signing) {
      logger.info({ kid: this.snapshot.signing.kid, keys: keys.length }, '[authn-jwt] Key set loaded');
      return;
    }
    if (!options.bootstrap) {
      throw new KeyMissingError('No signing key in the key set and bootstrap is disabled');
    }
    logger.info('[authn-jwt] Key set is empty, generating the first signing key');
    await this.rotate();
  }

  /**
   * @throws KeyMissingError before initialize() or when no key signs
   */
  currentSigningKey(): SigningKey {
    const signing = this.snapshot.signing;
    if (!signing) {
      throw new KeyMissingError();
    }
    return signing;
  }

  /** Public key for a kid, or null when the kid is unknown or was pruned */
  verificationKey(kid: string): KeyLike | null {
    return this.snapshot.byKid.get(kid)?.publicKey ?? null;
  }

  publicJwks(): PublicJwks {
    return this.snapshot.jwks;
  }

  /** Strong ETag of the current JWKS document */
  jwksEtag(): string {
    return this.snapshot.etag;
  }

  listKeys(): SigningKey[] {
    return [...this.snapshot.byKid.values()];
  }

  /**
   * Generate a new signing key, demote the current one to verify-only and
   * delete keys retired for at least the retention window.
   */
  async rotate(): Promise<SigningKey> {
    const run = this.rotation.then(() => this.performRotation());
    this.rotation = run.catch((err: unknown) => {
      logger.error({ err }, '[authn-jwt] Key rotation failed');
    });
    return run;
  }

  private async performRotation(): Promise<SigningKey> {
    const { publicKey, privateKey } = await generateKeyPair(SIGNING_ALGORITHM, {
      modulusLength: this.modulusLength,
      extractable: true,
    });
    const kid = uuidv4();
    const publicPem = await exportSPKI(publicKey);
    const privatePem = await exportPKCS8(privateKey);
    const now = this.now().toISOString();

    promoteSigningKey(
      this.db,
      {
        kid,
        public_key_pem: publicPem,
        private_key_encrypted: this.vault.encrypt('signing_key', privatePem, kid),
        created_at: now,
      },
      now
    );

    const cutoff = new Date(this.now().getTime() - this.retentionSeconds * 1000).toISOString();
    const previous = [...this.snapshot.byKid.values()].map((key) =>
      key.isSigning ? { ...key, isSigning: false, retiredAt: now } : key
    );
    const expired = previous.filter((key) => key.retiredAt !== null && key.retiredAt <= cutoff);
    await deleteSigningKeys(
      this.db,
      expired.map((key) => key.kid)
    );

    const created: SigningKey = {
      kid,
      privateKey,
      publicKey,
      publicJwk: await exportJWK(publicKey),
      createdAt: now,
      isSigning: true,
      retiredAt: null,
    };
    const kept = previous.filter((key) => !expired.includes(key));
    this.snapshot = buildSnapshot([created, ...kept]);

    logger.info({ kid, retained: kept.length, pruned: expired.length }, '[authn-jwt] Signing key rotated');
    return created;
  }

  private async decodeRow(row: SigningKeyRow): Promise<SigningKey> {
    const privatePem = this.vault.decrypt('signing_key', row.private_key_encrypted, row.kid);
    const publicKey = await importSPKI(row.public_key_pem, SIGNING_ALGORITHM, { extractable: true });
    return {
      kid: row.kid,
      privateKey: await importPKCS8(privatePem, SIGNING_ALGORITHM),
      publicKey,
      publicJwk: await exportJWK(publicKey),
      createdAt: row.created_at,
      isSigning: row.is_signing,
      retiredAt: row.retired_at,
    };
  }
}
