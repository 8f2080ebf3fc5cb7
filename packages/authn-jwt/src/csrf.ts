/**
 * CSRF token store
 *
 * Tokens are issued at login and bound to one user. Cookie-authenticated
 * requests with an unsafe method must echo one in `X-CSRF-Token`.
 */

import crypto from 'crypto';
import { LRUCache } from 'lru-cache';

/** 30 minutes */
export const CSRF_TOKEN_TTL_MS = 30 * 60 * 1000;

interface CsrfEntry {
  userId: string;
  expiresAt: number;
}

export interface CsrfStoreOptions {
  maxEntries?: number;
  ttlMs?: number;
  now?: () => number;
}

export class CsrfStore {
  private readonly tokens: LRUCache<string, CsrfEntry>;
  private readonly ttlMs: number;
  private readonly now: () => number;

  constructor(options: CsrfStoreOptions = {}) {
    this.ttlMs = options.ttlMs ?? CSRF_TOKEN_TTL_MS;
    this.now = options.now ?? Date.now;
    this.tokens = new LRUCache<string, CsrfEntry>({ max: options.maxEntries ?? 10000 });
  }

  issue(userId: string): string {
    const token = crypto.randomBytes(32).toString('base64url');
    this.tokens.set(token, { userId, expiresAt: this.now() + this.ttlMs });
    return token;
  }

  /**
   * True when the token exists, has not expired and belongs to the user
   */
  validate(userId: string, token: string | undefined): boolean {
    if (!token) {
      return false;
    }
    const entry = this.tokens.get(token);
    if (!entry) {
      return false;
    }
    if (entry.expiresAt <= this.now()) {
      this.tokens.delete(token);
      return false;
    }
    const expected = Buffer.from(entry.userId, 'utf8');
    const actual = Buffer.from(userId, 'utf8');
    return expected.length === actual.length && crypto.timingSafeEqual(expected, actual);
  }

  revoke(token: string): void {
    this.tokens.delete(token);
  }
}
