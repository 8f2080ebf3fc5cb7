/**
 * Authorization-State Repository
 *
 * One-time OAuth `state` records for outbound provider flows and the
 * authorization codes our own server issues. Records carry the PKCE verifier
 * (outbound) or challenge (inbound) server-side; the state string is only a
 * lookup key.
 *
 * Lifecycle: [issued] --consume--> [used], [issued] --ttl--> [expired].
 * Both are terminal.
 */

import { eq, and, gt, lte, or } from 'drizzle-orm';
import type { DatabaseClient } from '../client.js';
import {
  oauth_client_states,
  type OAuthStateRecord,
  type NewOAuthStateRecord,
} from '../../schema/index.js';
import { ValidationError } from '../../utils/errors.js';
import { logger, redactId } from '../../utils/logger.js';

/** Upper bound on any state's lifetime */
export const MAX_STATE_TTL_MS = 10 * 60 * 1000;

/**
 * Store a new state record
 *
 * The caller supplies the state value. Lifetimes longer than ten minutes are
 * clamped.
 *
 * @throws ValidationError if the state value already exists
 */
export async function storeState(db: DatabaseClient, record: NewOAuthStateRecord): Promise<OAuthStateRecord> {
  const createdAt = record.created_at;
  const maxExpiry = new Date(new Date(createdAt).getTime() + MAX_STATE_TTL_MS).toISOString();
  const expiresAt = record.expires_at > maxExpiry ? maxExpiry : record.expires_at;

  const inserted = await db
    .insert(oauth_client_states)
    .values({ ...record, expires_at: expiresAt, used: false })
    .onConflictDoNothing({ target: oauth_client_states.state })
    .returning();

  const [row] = inserted;
  if (!row) {
    throw new ValidationError('State already exists');
  }

  logger.debug(
    { state: redactId(record.state), provider: record.provider },
    '[db:oauth-states] State stored'
  );
  return row;
}

/**
 * Consume a state (atomic claim)
 *
 * A single `UPDATE ... SET used = 1 WHERE ... used = 0 AND expires_at > now
 * RETURNING *`. Returns null for every failure cause (unknown, used,
 * expired, provider mismatch) so callers cannot tell them apart.
 *
 * @param now Comparison instant; a record is rejected at exactly expires_at
 */
export async function consumeState(
  db: DatabaseClient,
  state: string,
  expectedProvider: string,
  now: Date = new Date()
): Promise<OAuthStateRecord | null> {
  const [row] = await db
    .update(oauth_client_states)
    .set({ used: true })
    .where(
      and(
        eq(oauth_client_states.state, state),
        eq(oauth_client_states.provider, expectedProvider),
        eq(oauth_client_states.used, false),
        gt(oauth_client_states.expires_at, now.toISOString())
      )
    )
    .returning();

  if (!row) {
    logger.debug({ state: redactId(state), provider: expectedProvider }, '[db:oauth-states] State rejected');
    return null;
  }

  logger.debug({ state: redactId(state), provider: expectedProvider }, '[db:oauth-states] State consumed');
  return row;
}

/**
 * Sweep expired and used states
 *
 * @returns Count of deleted rows
 */
export async function cleanupExpiredStates(db: DatabaseClient, now: Date = new Date()): Promise<number> {
  const deleted = await db
    .delete(oauth_client_states)
    .where(or(lte(oauth_client_states.expires_at, now.toISOString()), eq(oauth_client_states.used, true)))
    .returning({ state: oauth_client_states.state });

  if (deleted.length > 0) {
    logger.info({ count: deleted.length }, '[db:oauth-states] Cleaned up expired states');
  }
  return deleted.length;
}

/**
 * Delete all states bound to a user
 */
export async function deleteStatesForUser(db: DatabaseClient, userId: string): Promise<void> {
  await db.delete(oauth_client_states).where(eq(oauth_client_states.user_id, userId));
}
