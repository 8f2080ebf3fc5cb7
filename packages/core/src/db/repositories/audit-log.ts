/**
 * Audit Log Repository
 */

import { and, desc, eq, gte, lte, type SQL } from 'drizzle-orm';
import type { DatabaseClient } from '../client.js';
import { audit_log, type AuditLogRow, type NewAuditLogRow } from '../../schema/index.js';

/**
 * Insert a batch of audit rows in one transaction
 */
export function insertAuditLogRows(db: DatabaseClient, rows: NewAuditLogRow[]): void {
  if (rows.length === 0) {
    return;
  }
  db.transaction((tx) => {
    for (const row of rows) {
      tx.insert(audit_log).values(row).run();
    }
  });
}

export interface AuditLogFilters {
  user_id?: string;
  tenant_id?: string;
  tool_name?: string;
  start_time?: string;
  end_time?: string;
  limit?: number;
}

/**
 * Query audit rows, newest first
 */
export async function queryAuditLog(db: DatabaseClient, filters: AuditLogFilters = {}): Promise<AuditLogRow[]> {
  const conditions: SQL[] = [];
  if (filters.user_id) conditions.push(eq(audit_log.user_id, filters.user_id));
  if (filters.tenant_id) conditions.push(eq(audit_log.tenant_id, filters.tenant_id));
  if (filters.tool_name) conditions.push(eq(audit_log.tool_name, filters.tool_name));
  if (filters.start_time) conditions.push(gte(audit_log.timestamp, filters.start_time));
  if (filters.end_time) conditions.push(lte(audit_log.timestamp, filters.end_time));

  return db
    .select()
    .from(audit_log)
    .where(conditions.length > 0 ? and(...conditions) : undefined)
    .orderBy(desc(audit_log.timestamp))
    .limit(Math.min(filters.limit ?? 100, 1000));
}
