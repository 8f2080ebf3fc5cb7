/**
 * Notification Bus
 *
 * Typed publish/subscribe over EventEmitter, one channel per event kind.
 * Delivery is best-effort: with no subscriber the event is dropped, and a
 * listener that throws is logged without affecting the others.
 */

import { EventEmitter } from 'events';
import { logger } from '@pierre/core';
import type { NotificationEvent } from '@pierre/protocol';

export type NotificationKind = NotificationEvent['type'];

export type NotificationOf<K extends NotificationKind> = Extract<NotificationEvent, { type: K }>;

export type NotificationListener<K extends NotificationKind> = (event: NotificationOf<K>) => void;

export class NotificationBus {
  private readonly emitter = new EventEmitter();

  constructor() {
    // One listener per open WebSocket
    this.emitter.setMaxListeners(0);
  }

  /**
   * @returns the number of listeners that received the event
   */
  publish(event: NotificationEvent): number {
    const listeners = this.emitter.listeners(event.type);
    if (listeners.length === 0) {
      logger.debug({ type: event.type, userId: event.user_id }, '[notifications] No subscribers, event dropped');
      return 0;
    }

    let delivered = 0;
    for (const listener of listeners) {
      try {
        listener(event);
        delivered++;
      } catch (err) {
        logger.warn({ err, type: event.type }, '[notifications] Listener failed');
      }
    }
    return delivered;
  }

  /**
   * @returns an unsubscribe function
   */
  subscribe<K extends NotificationKind>(kind: K, listener: NotificationListener<K>): () => void {
    const handler = (event: NotificationOf<K>) => listener(event);
    this.emitter.on(kind, handler);
    return () => {
      this.emitter.off(kind, handler);
    };
  }

  /**
   * Subscribe to every kind, filtered to one user (WebSocket sessions)
   */
  subscribeUser(userId: string, listener: (event: NotificationEvent) => void): () => void {
    const unsubscribers = (['oauth_completed', 'progress'] as const).map((kind) =>
      this.subscribe(kind, (event) => {
        if (event.user_id === userId) {
          listener(event);
        }
      })
    );
    return () => unsubscribers.forEach((unsubscribe) => unsubscribe());
  }

  subscriberCount(kind: NotificationKind): number {
    return this.emitter.listenerCount(kind);
  }
}
