/**
 * Token Vault
 *
 * AES-256-GCM encryption at rest for upstream tokens, tenant client secrets
 * and signing-key private halves.
 *
 * - Key derivation: HKDF-SHA256(master_key, salt='', info='pierre-token-vault-v1:<scope>')
 * - 12-byte IV, 16-byte tag appended to the ciphertext
 * - Associated data binds a ciphertext to its row (e.g. tenant|user|provider),
 *   so a value copied into another row fails to decrypt
 *
 * Sealed format: `v1.<iv base64url>.<ciphertext+tag base64url>`
 */

import crypto from 'crypto';
import { InternalError } from '../utils/errors.js';

const HKDF_INFO_PREFIX = 'pierre-token-vault-v1';
const FORMAT_VERSION = 'v1';
const TAG_LENGTH = 16;

export type VaultScope = 'user_token' | 'tenant_secret' | 'signing_key';

export class TokenVault {
  private masterKey: Buffer;

  constructor(masterKey: Buffer) {
    if (masterKey.length !== 32) {
      throw new Error('Master key must be 32 bytes');
    }
    this.masterKey = masterKey;
  }

  private deriveKey(scope: VaultScope): Buffer {
    return Buffer.from(crypto.hkdfSync('sha256', this.masterKey, Buffer.alloc(0), `${HKDF_INFO_PREFIX}:${scope}`, 32));
  }

  encrypt(scope: VaultScope, plaintext: string, aad: string): string {
    const key = this.deriveKey(scope);
    const iv = crypto.randomBytes(12);
    const cipher = crypto.createCipheriv('aes-256-gcm', key, iv);
    cipher.setAAD(Buffer.from(aad, 'utf8'));

    const encrypted = Buffer.concat([cipher.update(plaintext, 'utf8'), cipher.final(), cipher.getAuthTag()]);
    key.fill(0);

    return `${FORMAT_VERSION}.${iv.toString('base64url')}.${encrypted.toString('base64url')}`;
  }

  /**
   * @throws InternalError for a malformed value or an authentication failure
   */
  decrypt(scope: VaultScope, sealed: string, aad: string): string {
    const parts = sealed.split('.');
    const [version, ivPart, bodyPart] = parts;
    if (parts.length !== 3 || version !== FORMAT_VERSION || !ivPart || !bodyPart) {
      throw new InternalError('Malformed vault ciphertext');
    }

    const iv = Buffer.from(ivPart, 'base64url');
    const body = Buffer.from(bodyPart, 'base64url');
    if (iv.length !== 12 || body.length < TAG_LENGTH) {
      throw new InternalError('Malformed vault ciphertext');
    }

    const key = this.deriveKey(scope);
    try {
      const decipher = crypto.createDecipheriv('aes-256-gcm', key, iv);
      decipher.setAAD(Buffer.from(aad, 'utf8'));
      decipher.setAuthTag(body.subarray(body.length - TAG_LENGTH));
      const plaintext = Buffer.concat([decipher.update(body.subarray(0, body.length - TAG_LENGTH)), decipher.final()]);
      return plaintext.toString('utf8');
    } catch (err) {
      throw new InternalError('Vault decryption failed', {
        reason: err instanceof Error ? err.message : String(err),
      });
    } finally {
      key.fill(0);
    }
  }
}

/** AAD for a user's upstream token */
export function userTokenAad(tenantId: string, userId: string, provider: string): string {
  return `${tenantId}|${userId}|${provider}`;
}

/** AAD for a tenant's upstream client secret */
export function tenantSecretAad(tenantId: string, provider: string): string {
  return `${tenantId}|${provider}`;
}
