/**
 * @pierre/audit-db
 *
 * Database Audit Provider
 *
 * Events are queued in the core AuditBuffer and written to `audit_log` in one
 * transaction per flush. A write failure is logged and the batch stays queued
 * for the next tick; it never reaches the request that produced the event.
 */

import {
  AuditBuffer,
  insertAuditLogRows,
  logger,
  queryAuditLog,
  type AuditBufferConfig,
  type AuditBufferStats,
  type AuditLogRow,
  type AuditProvider,
  type AuditQueryFilters,
  type DatabaseClient,
  type NewAuditLogRow,
  type ProviderHealth,
} from '@pierre/core';
import type { AuditEvent, AuditEventType, ProtocolKind } from '@pierre/protocol';

const DEFAULT_BUFFER_CONFIG: AuditBufferConfig = { size: 10000, flush_interval_ms: 5000 };

const EVENT_TYPES: readonly AuditEventType[] = ['tool_call', 'oauth', 'auth', 'admin_action'];
const PROTOCOLS: readonly ProtocolKind[] = ['mcp', 'jsonrpc', 'rest', 'a2a'];

function toRow(event: AuditEvent): NewAuditLogRow {
  return {
    id: event.event_id,
    timestamp: event.timestamp,
    event_type: event.event_type,
    tool_name: event.tool_name,
    user_id: event.user_id ?? null,
    tenant_id: event.tenant_id ?? null,
    status_code: event.status_code,
    response_time_ms: Math.round(event.response_time_ms),
    error_kind: event.error_kind ?? null,
    source_ip: event.source_ip ?? null,
    protocol: event.protocol ?? null,
  };
}

function fromRow(row: AuditLogRow): AuditEvent {
  const eventType = EVENT_TYPES.find((t) => t === row.event_type) ?? 'tool_call';
  const protocol = PROTOCOLS.find((p) => p === row.protocol);
  return {
    event_id: row.id,
    timestamp: row.timestamp,
    event_type: eventType,
    tool_name: row.tool_name,
    status_code: row.status_code,
    response_time_ms: row.response_time_ms,
    ...(row.user_id !== null ? { user_id: row.user_id } : {}),
    ...(row.tenant_id !== null ? { tenant_id: row.tenant_id } : {}),
    ...(row.error_kind !== null ? { error_kind: row.error_kind } : {}),
    ...(row.source_ip !== null ? { source_ip: row.source_ip } : {}),
    ...(protocol ? { protocol } : {}),
  };
}

export class DatabaseAuditProvider implements AuditProvider {
  readonly id = 'database';
  private readonly buffer: AuditBuffer;

  constructor(
    private readonly db: DatabaseClient,
    config: Partial<AuditBufferConfig> = {}
  ) {
    this.buffer = new AuditBuffer({ ...DEFAULT_BUFFER_CONFIG, ...config }, async (events) => {
      insertAuditLogRows(this.db, events.map(toRow));
    });
  }

  async initialize(): Promise<void> {
    this.buffer.start();
    logger.info('[audit:db] Provider initialized');
  }

  async emit(event: AuditEvent): Promise<void> {
    this.buffer.add(event);
  }

  /**
   * Write everything queued so far. Failures are logged, not thrown.
   */
  async flush(): Promise<void> {
    try {
      await this.buffer.flush();
    } catch (err) {
      logger.error({ err }, '[audit:db] Flush failed, events kept for retry');
    }
  }

  async query(filters: AuditQueryFilters): Promise<AuditEvent[]> {
    await this.flush();
    const rows = await queryAuditLog(this.db, filters);
    return rows.map(fromRow);
  }

  getStats(): AuditBufferStats {
    return this.buffer.getStats();
  }

  async healthCheck(): Promise<ProviderHealth> {
    const stats = this.buffer.getStats();
    return {
      status: stats.failed_flushes > 0 && stats.current_size > 0 ? 'degraded' : 'healthy',
      message: `${stats.current_size} events buffered, ${stats.total_dropped} dropped`,
      last_checked: new Date().toISOString(),
    };
  }

  async shutdown(): Promise<void> {
    this.buffer.stop();
    await this.flush();
    logger.info('[audit:db] Shutdown complete');
  }
}
