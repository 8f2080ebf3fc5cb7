/**
 * System Settings Repository (key/value)
 */

import { eq } from 'drizzle-orm';
import type { DatabaseClient } from '../client.js';
import { system_settings } from '../../schema/index.js';

export const SETTING_AUTO_APPROVE_USERS = 'auto_approve_users';
export const SETTING_DISABLED_TOOLS = 'disabled_tools';

export async function getSetting(db: DatabaseClient, key: string): Promise<string | null> {
  const [row] = await db.select().from(system_settings).where(eq(system_settings.key, key)).limit(1);
  return row?.value ?? null;
}

export async function setSetting(db: DatabaseClient, key: string, value: string): Promise<void> {
  const now = new Date().toISOString();
  await db
    .insert(system_settings)
    .values({ key, value, updated_at: now })
    .onConflictDoUpdate({ target: system_settings.key, set: { value, updated_at: now } });
}

export async function deleteSetting(db: DatabaseClient, key: string): Promise<void> {
  await db.delete(system_settings).where(eq(system_settings.key, key));
}

/**
 * Boolean setting; null when unset so callers can fall back to config
 */
export async function getBooleanSetting(db: DatabaseClient, key: string): Promise<boolean | null> {
  const value = await getSetting(db, key);
  if (value === null) {
    return null;
  }
  return value === 'true' || value === '1';
}

/**
 * String-list setting stored as a JSON array or a comma list
 */
export async function getListSetting(db: DatabaseClient, key: string): Promise<string[]> {
  const value = await getSetting(db, key);
  if (!value) {
    return [];
  }
  if (value.trim().startsWith('[')) {
    const parsed: unknown = JSON.parse(value);
    return Array.isArray(parsed) ? parsed.filter((v): v is string => typeof v === 'string') : [];
  }
  return value
    .split(',')
    .map((s) => s.trim())
    .filter((s) => s.length > 0);
}
