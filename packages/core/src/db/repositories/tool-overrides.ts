/**
 * Tool Overrides Repository
 *
 * Per-tenant enable/disable overrides on the static tool catalogue.
 */

import { eq, and, asc } from 'drizzle-orm';
import type { DatabaseClient } from '../client.js';
import { tool_overrides, type ToolOverride } from '../../schema/index.js';

export async function upsertToolOverride(
  db: DatabaseClient,
  input: { tenant_id: string; tool_name: string; is_enabled: boolean; set_by: string | null; reason: string | null }
): Promise<ToolOverride> {
  const row: ToolOverride = { ...input, updated_at: new Date().toISOString() };
  await db
    .insert(tool_overrides)
    .values(row)
    .onConflictDoUpdate({
      target: [tool_overrides.tenant_id, tool_overrides.tool_name],
      set: { is_enabled: row.is_enabled, set_by: row.set_by, reason: row.reason, updated_at: row.updated_at },
    });
  return row;
}

export async function deleteToolOverride(db: DatabaseClient, tenantId: string, toolName: string): Promise<boolean> {
  const deleted = await db
    .delete(tool_overrides)
    .where(and(eq(tool_overrides.tenant_id, tenantId), eq(tool_overrides.tool_name, toolName)))
    .returning({ tool_name: tool_overrides.tool_name });
  return deleted.length > 0;
}

export async function listToolOverrides(db: DatabaseClient, tenantId: string): Promise<ToolOverride[]> {
  return db
    .select()
    .from(tool_overrides)
    .where(eq(tool_overrides.tenant_id, tenantId))
    .orderBy(asc(tool_overrides.tool_name));
}
