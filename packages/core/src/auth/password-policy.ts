/**
 * Password Policy Module
 *
 * Centralized password validation and hashing using Argon2id. The same
 * parameters hash OAuth client secrets and admin service tokens.
 */

import argon2 from 'argon2';
import crypto from 'crypto';

/**
 * Password length constraints
 */
export const MIN_PASSWORD_LENGTH = 8;
export const MAX_PASSWORD_LENGTH = 128;

/**
 * Argon2id parameters (OWASP minimum)
 */
export const ARGON2_OPTIONS = {
  type: argon2.argon2id,
  memoryCost: 19456, // 19MB
  timeCost: 2,
  parallelism: 1,
};

/**
 * Password validation result
 */
export interface PasswordValidationResult {
  valid: boolean;
  errors: string[];
}

/**
 * Validate password against policy requirements
 *
 * Requirements:
 * - Minimum 8 characters
 * - Maximum 128 characters
 * - Cannot be all whitespace
 */
export function validatePassword(password: string): PasswordValidationResult {
  const errors: string[] = [];

  if (!password || password.length < MIN_PASSWORD_LENGTH) {
    errors.push(`Password must be at least ${MIN_PASSWORD_LENGTH} characters`);
  }

  if (password && password.length > MAX_PASSWORD_LENGTH) {
    errors.push(`Password must be at most ${MAX_PASSWORD_LENGTH} characters`);
  }

  if (password && password.trim().length === 0) {
    errors.push('Password cannot be all whitespace');
  }

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Hash a secret (password, client secret, service token) using Argon2id.
 * argon2 runs on the libuv thread pool, off the event loop.
 */
export async function hashSecret(secret: string): Promise<string> {
  return await argon2.hash(secret, ARGON2_OPTIONS);
}

/**
 * Verify a secret against an Argon2id hash
 *
 * @returns false for a mismatch; throws when the hash itself is malformed
 */
export async function verifySecret(hash: string, secret: string): Promise<boolean> {
  return await argon2.verify(hash, secret);
}

let dummyHash: Promise<string> | undefined;

/**
 * Run one verification against a throwaway hash so that "unknown account"
 * takes as long as "wrong password".
 */
export async function dummyVerify(secret: string): Promise<void> {
  dummyHash ??= hashSecret(crypto.randomBytes(16).toString('hex'));
  await argon2.verify(await dummyHash, secret);
}
