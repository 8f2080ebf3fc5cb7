/**
 * Audit buffer tests
 *
 * Bounded queue, overflow, flush and re-queue on failure.
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { AuditBuffer } from '../src/audit/buffer.js';
import type { AuditEvent } from '@pierre/protocol';

function createEvent(id: string): AuditEvent {
  return {
    event_id: id,
    timestamp: '2026-01-01T00:00:00.000Z',
    event_type: 'tool_call',
    tool_name: 'get_athlete',
    user_id: 'user-1',
    tenant_id: 'tenant-1',
    status_code: 200,
    response_time_ms: 12,
  };
}

describe('AuditBuffer', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('should buffer events and flush them in order', async () => {
    const flushed: AuditEvent[] = [];
    const buffer = new AuditBuffer({ size: 100, flush_interval_ms: 1000 }, async (events) => {
      flushed.push(...events);
    });

    buffer.add(createEvent('e1'));
    buffer.add(createEvent('e2'));
    await buffer.flush();

    expect(flushed.map((e) => e.event_id)).toEqual(['e1', 'e2']);
    expect(buffer.getStats()).toMatchObject({ total_received: 2, total_flushed: 2, current_size: 0 });
  });

  it('should drop the oldest event on overflow', async () => {
    const flushed: AuditEvent[] = [];
    const buffer = new AuditBuffer({ size: 2, flush_interval_ms: 1000 }, async (events) => {
      flushed.push(...events);
    });

    buffer.add(createEvent('e1'));
    buffer.add(createEvent('e2'));
    buffer.add(createEvent('e3'));
    await buffer.flush();

    expect(flushed.map((e) => e.event_id)).toEqual(['e2', 'e3']);
    expect(buffer.getStats().total_dropped).toBe(1);
  });

  it('should re-queue events when the flush callback fails', async () => {
    let fail = true;
    const flushed: AuditEvent[] = [];
    const buffer = new AuditBuffer({ size: 10, flush_interval_ms: 1000 }, async (events) => {
      if (fail) {
        throw new Error('disk full');
      }
      flushed.push(...events);
    });

    buffer.add(createEvent('e1'));
    await expect(buffer.flush()).rejects.toThrow('Failed to flush audit events: disk full');
    expect(buffer.getStats()).toMatchObject({ current_size: 1, failed_flushes: 1 });

    fail = false;
    buffer.add(createEvent('e2'));
    await buffer.flush();
    expect(flushed.map((e) => e.event_id)).toEqual(['e1', 'e2']);
  });

  it('should flush on the timer once started', async () => {
    vi.useFakeTimers();
    const callback = vi.fn(async (_events: AuditEvent[]) => {});
    const buffer = new AuditBuffer({ size: 10, flush_interval_ms: 500 }, callback);

    buffer.start();
    buffer.add(createEvent('e1'));
    await vi.advanceTimersByTimeAsync(500);

    expect(callback).toHaveBeenCalledTimes(1);
    await buffer.shutdown();
  });

  it('should skip the callback when empty', async () => {
    const callback = vi.fn(async (_events: AuditEvent[]) => {});
    const buffer = new AuditBuffer({ size: 10, flush_interval_ms: 500 }, callback);
    await buffer.flush();
    expect(callback).not.toHaveBeenCalled();
  });
});
