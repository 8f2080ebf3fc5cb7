/**
 * Users Repository
 *
 * Account lifecycle: registration, lookup, approval state machine
 * (pending → active → suspended → active) and deletion.
 */

import { eq, desc } from 'drizzle-orm';
import { v4 as uuidv4 } from 'uuid';
import type { DatabaseClient } from '../client.js';
import { users, type User, type UserRole, type UserStatus, type UserTier } from '../../schema/index.js';
import { hashSecret, verifySecret, dummyVerify } from '../../auth/password-policy.js';
import { ValidationError, NotFoundError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

export interface CreateUserInput {
  email: string;
  /** Omit for accounts that authenticate through an external identity provider */
  password?: string;
  display_name?: string;
  role?: UserRole;
  tier?: UserTier;
  status?: UserStatus;
  firebase_uid?: string;
  auth_provider?: string;
}

export function normalizeEmail(email: string): string {
  return email.trim().toLowerCase();
}

/**
 * Create a user. Emails are unique case-insensitively.
 *
 * @throws ValidationError if the email is already registered
 */
export async function createUser(db: DatabaseClient, input: CreateUserInput): Promise<User> {
  const email = normalizeEmail(input.email);
  const existing = await getUserByEmail(db, email);
  if (existing) {
    throw new ValidationError('Email already registered');
  }

  const now = new Date().toISOString();
  const role = input.role ?? 'user';
  const status = input.status ?? 'pending';
  const user: User = {
    id: uuidv4(),
    email,
    password_hash: input.password !== undefined ? await hashSecret(input.password) : null,
    display_name: input.display_name ?? null,
    tier: input.tier ?? 'starter',
    role,
    status,
    is_admin: role !== 'user',
    firebase_uid: input.firebase_uid ?? null,
    auth_provider: input.auth_provider ?? (input.password !== undefined ? 'email' : 'external'),
    created_at: now,
    last_active: now,
    approved_at: status === 'active' ? now : null,
    approved_by: null,
  };

  await db.insert(users).values(user);
  logger.info({ userId: user.id, status }, '[db:users] User created');
  return user;
}

export async function getUserById(db: DatabaseClient, userId: string): Promise<User | null> {
  const [user] = await db.select().from(users).where(eq(users.id, userId)).limit(1);
  return user ?? null;
}

export async function getUserByEmail(db: DatabaseClient, email: string): Promise<User | null> {
  const [user] = await db
    .select()
    .from(users)
    .where(eq(users.email, normalizeEmail(email)))
    .limit(1);
  return user ?? null;
}

export async function listUsers(
  db: DatabaseClient,
  filters: { status?: UserStatus } = {}
): Promise<User[]> {
  const query = db.select().from(users);
  const rows = filters.status
    ? await query.where(eq(users.status, filters.status)).orderBy(desc(users.created_at))
    : await query.orderBy(desc(users.created_at));
  return rows;
}

export type CredentialCheck =
  | { ok: true; user: User }
  | { ok: false; reason: 'invalid_credentials' | 'not_active' };

/**
 * Verify email + password.
 *
 * Always performs exactly one Argon2 verification so response time does not
 * reveal whether the account exists.
 */
export async function verifyUserCredentials(
  db: DatabaseClient,
  email: string,
  password: string
): Promise<CredentialCheck> {
  const user = await getUserByEmail(db, email);

  if (!user || !user.password_hash) {
    await dummyVerify(password);
    return { ok: false, reason: 'invalid_credentials' };
  }

  const valid = await verifySecret(user.password_hash, password);
  if (!valid) {
    return { ok: false, reason: 'invalid_credentials' };
  }

  if (user.status !== 'active') {
    return { ok: false, reason: 'not_active' };
  }

  return { ok: true, user };
}

/**
 * Approve a user (pending → active, suspended → active).
 * approved_at is stamped only on the pending → active transition.
 */
export async function approveUser(db: DatabaseClient, userId: string, approvedBy: string | null): Promise<User> {
  const user = await getUserById(db, userId);
  if (!user) {
    throw new NotFoundError(`User not found: ${userId}`);
  }
  if (user.status === 'active') {
    return user;
  }

  const now = new Date().toISOString();
  const patch =
    user.status === 'pending'
      ? { status: 'active' as const, approved_at: now, approved_by: approvedBy }
      : { status: 'active' as const };

  const [updated] = await db.update(users).set(patch).where(eq(users.id, userId)).returning();
  if (!updated) {
    throw new NotFoundError(`User not found: ${userId}`);
  }
  logger.info({ userId, from: user.status }, '[db:users] User approved');
  return updated;
}

/**
 * Suspend an active user
 */
export async function suspendUser(db: DatabaseClient, userId: string): Promise<User> {
  const user = await getUserById(db, userId);
  if (!user) {
    throw new NotFoundError(`User not found: ${userId}`);
  }
  if (user.status !== 'active') {
    throw new ValidationError(`Cannot suspend a user in status '${user.status}'`);
  }

  const [updated] = await db
    .update(users)
    .set({ status: 'suspended' })
    .where(eq(users.id, userId))
    .returning();
  if (!updated) {
    throw new NotFoundError(`User not found: ${userId}`);
  }
  logger.info({ userId }, '[db:users] User suspended');
  return updated;
}

/**
 * Delete a user. Memberships, tokens, connections and refresh tokens go with
 * it through ON DELETE CASCADE.
 *
 * @returns true if a row was deleted
 */
export async function deleteUser(db: DatabaseClient, userId: string): Promise<boolean> {
  const deleted = await db.delete(users).where(eq(users.id, userId)).returning({ id: users.id });
  if (deleted.length > 0) {
    logger.info({ userId }, '[db:users] User deleted');
  }
  return deleted.length > 0;
}

export async function touchLastActive(db: DatabaseClient, userId: string): Promise<void> {
  await db
    .update(users)
    .set({ last_active: new Date().toISOString() })
    .where(eq(users.id, userId));
}

export async function countUsers(db: DatabaseClient): Promise<number> {
  const rows = await db.select({ id: users.id }).from(users);
  return rows.length;
}
