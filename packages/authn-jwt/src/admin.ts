/**
 * Admin service-token authentication
 *
 * Gates the /admin API. Accepts `Authorization: Bearer pk_admin_...` or
 * `X-Admin-Token`.
 */

import {
  ADMIN_TOKEN_PREFIX,
  authenticateAdminToken,
  logger,
  type AdminToken,
  type DatabaseClient,
} from '@pierre/core';
import { extractBearerToken } from './provider.js';

export type AdminAuthResult =
  | { authenticated: true; token: AdminToken }
  | { authenticated: false; error: { kind: 'auth_required' | 'auth_invalid'; message: string } };

export async function authenticateAdmin(
  db: DatabaseClient,
  headers: Record<string, string | undefined>,
  now: Date = new Date()
): Promise<AdminAuthResult> {
  const presented = headers['x-admin-token'] ?? extractBearerToken(headers['authorization']);
  if (!presented) {
    return { authenticated: false, error: { kind: 'auth_required', message: 'Missing admin token' } };
  }
  if (!presented.startsWith(ADMIN_TOKEN_PREFIX)) {
    return { authenticated: false, error: { kind: 'auth_invalid', message: 'Invalid admin token format' } };
  }

  const token = await authenticateAdminToken(db, presented, now);
  if (!token) {
    logger.warn('[admin-auth] Invalid admin token attempt');
    return { authenticated: false, error: { kind: 'auth_invalid', message: 'Invalid admin token' } };
  }
  return { authenticated: true, token };
}

/**
 * Whether a service token may perform an action (`*` grants everything)
 */
export function hasAdminPermission(token: AdminToken, permission: string): boolean {
  return token.is_super_admin || token.permissions.includes('*') || token.permissions.includes(permission);
}
