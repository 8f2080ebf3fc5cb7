import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import {
  closeDatabase,
  initializeDatabase,
  queryAuditLog,
  runMigrations,
  type DatabaseClient,
} from '@pierre/core';
import type { AuditEvent } from '@pierre/protocol';
import { DatabaseAuditProvider } from '../src/index.js';

function event(id: string, timestamp: string, overrides: Partial<AuditEvent> = {}): AuditEvent {
  return {
    event_id: id,
    timestamp,
    event_type: 'tool_call',
    tool_name: 'get_activities',
    user_id: 'user-1',
    tenant_id: 'tenant-1',
    status_code: 200,
    response_time_ms: 12.6,
    protocol: 'mcp',
    ...overrides,
  };
}

describe('DatabaseAuditProvider', () => {
  let db: DatabaseClient;
  let provider: DatabaseAuditProvider;

  beforeEach(async () => {
    db = await initializeDatabase({ sqliteFilePath: ':memory:' });
    await runMigrations(db);
    provider = new DatabaseAuditProvider(db, { flush_interval_ms: 60_000 });
    await provider.initialize();
  });

  afterEach(async () => {
    await provider.shutdown();
    await closeDatabase(db);
  });

  it('should hold events until flushed', async () => {
    await provider.emit(event('e1', '2026-01-01T00:00:00.000Z'));

    expect(await queryAuditLog(db)).toHaveLength(0);
    await provider.flush();

    const [row] = await queryAuditLog(db);
    expect(row).toEqual({
      id: 'e1',
      timestamp: '2026-01-01T00:00:00.000Z',
      event_type: 'tool_call',
      tool_name: 'get_activities',
      user_id: 'user-1',
      tenant_id: 'tenant-1',
      status_code: 200,
      response_time_ms: 13,
      error_kind: null,
      source_ip: null,
      protocol: 'mcp',
    });
  });

  it('should answer queries newest first with pending events included', async () => {
    await provider.emit(event('e1', '2026-01-01T00:00:00.000Z'));
    await provider.emit(
      event('e2', '2026-01-01T00:00:05.000Z', { status_code: 404, error_kind: 'method_not_found', user_id: undefined })
    );

    const events = await provider.query({});

    expect(events.map((e) => e.event_id)).toEqual(['e2', 'e1']);
    expect(events[0]).toEqual({
      event_id: 'e2',
      timestamp: '2026-01-01T00:00:05.000Z',
      event_type: 'tool_call',
      tool_name: 'get_activities',
      tenant_id: 'tenant-1',
      status_code: 404,
      response_time_ms: 13,
      error_kind: 'method_not_found',
      protocol: 'mcp',
    });
  });

  it('should keep events and stay quiet when the write fails', async () => {
    await provider.emit(event('e1', '2026-01-01T00:00:00.000Z'));
    await closeDatabase(db);

    await expect(provider.flush()).resolves.toBeUndefined();

    const stats = provider.getStats();
    expect(stats.failed_flushes).toBe(1);
    expect(stats.current_size).toBe(1);
    expect((await provider.healthCheck()).status).toBe('degraded');
  });
});
