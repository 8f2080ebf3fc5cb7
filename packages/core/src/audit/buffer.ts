/**
 * Audit Buffer
 *
 * Bounded in-memory queue of audit events, drained on a timer into a flush
 * callback. When full, the oldest event is dropped. A failed flush puts the
 * batch back at the head of the queue (still bounded) for the next tick.
 */

import type { AuditEvent } from '@pierre/protocol';
import { logger } from '../utils/logger.js';
import { PierreError } from '../utils/errors.js';

export interface AuditBufferConfig {
  /** Maximum queued events (default: 10,000) */
  size: number;
  /** Flush interval in milliseconds (default: 5000ms) */
  flush_interval_ms: number;
}

export interface AuditBufferStats {
  total_received: number;
  total_flushed: number;
  total_dropped: number;
  current_size: number;
  buffer_capacity: number;
  failed_flushes: number;
}

export type FlushCallback = (events: AuditEvent[]) => Promise<void>;

export class AuditBuffer {
  private buffer: AuditEvent[] = [];
  private readonly config: AuditBufferConfig;
  private readonly flushCallback: FlushCallback;
  private flushTimer?: NodeJS.Timeout;
  private flushing: Promise<void> | null = null;

  private stats: AuditBufferStats = {
    total_received: 0,
    total_flushed: 0,
    total_dropped: 0,
    current_size: 0,
    buffer_capacity: 0,
    failed_flushes: 0,
  };

  constructor(config: AuditBufferConfig, flushCallback: FlushCallback) {
    this.config = config;
    this.flushCallback = flushCallback;
    this.stats.buffer_capacity = config.size;
  }

  /**
   * Start automatic flush timer
   */
  start(): void {
    if (this.flushTimer) {
      return;
    }

    this.flushTimer = setInterval(() => {
      this.flush().catch((err: unknown) => {
        logger.error({ err }, '[audit-buffer] Auto-flush error');
      });
    }, this.config.flush_interval_ms);
    this.flushTimer.unref();

    logger.debug({ intervalMs: this.config.flush_interval_ms }, '[audit-buffer] Auto-flush started');
  }

  stop(): void {
    if (this.flushTimer) {
      clearInterval(this.flushTimer);
      this.flushTimer = undefined;
    }
  }

  add(event: AuditEvent): void {
    this.stats.total_received++;
    if (this.buffer.length >= this.config.size) {
      this.buffer.shift();
      this.stats.total_dropped++;
      logger.warn('[audit-buffer] Buffer overflow - oldest event dropped');
    }
    this.buffer.push(event);
    this.stats.current_size = this.buffer.length;
  }

  /**
   * Flush buffered events. Concurrent callers share one in-flight flush.
   *
   * @throws PierreError when the callback fails; events are re-queued
   */
  async flush(): Promise<void> {
    if (this.flushing) {
      return this.flushing;
    }
    if (this.buffer.length === 0) {
      return;
    }

    this.flushing = this.drain();
    try {
      await this.flushing;
    } finally {
      this.flushing = null;
    }
  }

  private async drain(): Promise<void> {
    const events = this.buffer.splice(0, this.buffer.length);
    this.stats.current_size = 0;

    try {
      await this.flushCallback(events);
      this.stats.total_flushed += events.length;
      logger.debug({ count: events.length }, '[audit-buffer] Flushed events');
    } catch (error) {
      this.stats.failed_flushes++;
      const requeued = [...events, ...this.buffer];
      const overflow = Math.max(0, requeued.length - this.config.size);
      this.buffer = requeued.slice(overflow);
      this.stats.total_dropped += overflow;
      this.stats.current_size = this.buffer.length;

      throw new PierreError(
        `Failed to flush audit events: ${error instanceof Error ? error.message : String(error)}`,
        'audit_flush_error',
        'database'
      );
    }
  }

  getStats(): AuditBufferStats {
    return { ...this.stats };
  }

  /**
   * Stop the timer and make a final flush attempt
   */
  async shutdown(): Promise<void> {
    this.stop();
    await this.flush();
    logger.info('[audit-buffer] Shutdown complete');
  }
}
