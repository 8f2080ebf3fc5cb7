/**
 * Signing Keys Repository
 *
 * Persistence for the RS256 key set. Exactly one row has is_signing = 1.
 */

import { eq, inArray } from 'drizzle-orm';
import type { DatabaseClient } from '../client.js';
import { signing_keys, type SigningKeyRow } from '../../schema/index.js';

export async function listSigningKeys(db: DatabaseClient): Promise<SigningKeyRow[]> {
  return db.select().from(signing_keys);
}

/**
 * Insert a new signing key and demote every other key to verify-only,
 * stamping retired_at on keys that were signing until now.
 */
export function promoteSigningKey(db: DatabaseClient, key: Omit<SigningKeyRow, 'is_signing' | 'retired_at'>, now: string): void {
  db.transaction((tx) => {
    tx.update(signing_keys)
      .set({ is_signing: false, retired_at: now })
      .where(eq(signing_keys.is_signing, true))
      .run();
    tx.insert(signing_keys)
      .values({ ...key, is_signing: true, retired_at: null })
      .run();
  });
}

export async function deleteSigningKeys(db: DatabaseClient, kids: string[]): Promise<void> {
  if (kids.length === 0) {
    return;
  }
  await db.delete(signing_keys).where(inArray(signing_keys.kid, kids));
}
