/**
 * Progress and cancellation for in-flight tool calls
 *
 * Each call gets a CancellationToken registered under its user and progress
 * token (the request id) for as long as it runs. MCP `notifications/cancelled`
 * and WebSocket disconnects cancel through the manager; handlers check the
 * token at suspension points and pass `signal` to anything abortable.
 */

import { CancelledError, logger } from '@pierre/core';
import type { NotificationBus } from './notification-bus.js';

export class CancellationToken {
  private readonly controller = new AbortController();

  get signal(): AbortSignal {
    return this.controller.signal;
  }

  cancel(reason = 'Operation cancelled'): void {
    if (!this.controller.signal.aborted) {
      this.controller.abort(new CancelledError(reason));
    }
  }

  isCancelled(): boolean {
    return this.controller.signal.aborted;
  }

  /**
   * @throws CancelledError once cancelled
   */
  throwIfCancelled(): void {
    if (this.isCancelled()) {
      const reason: unknown = this.controller.signal.reason;
      throw reason instanceof CancelledError ? reason : new CancelledError();
    }
  }
}

export class ProgressReporter {
  constructor(
    private readonly bus: NotificationBus,
    readonly progressToken: string,
    private readonly userId: string,
    private readonly cancellation: CancellationToken
  ) {}

  /**
   * Publish a progress notification. Skipped once the call is cancelled.
   */
  report(current: number, total?: number, message?: string): void {
    if (this.cancellation.isCancelled()) {
      return;
    }
    this.bus.publish({
      type: 'progress',
      token: this.progressToken,
      current,
      ...(total !== undefined && { total }),
      ...(message !== undefined && { message }),
      user_id: this.userId,
    });
  }
}

interface ActiveCall {
  progressToken: string;
  token: CancellationToken;
  userId: string;
}

/**
 * Running calls, keyed per user: two users sending the same progress token
 * (or request id) never address each other's calls.
 */
export class ProgressManager {
  private readonly active = new Map<string, ActiveCall>();

  private static key(progressToken: string, userId: string): string {
    return `${userId}:${progressToken}`;
  }

  register(progressToken: string, userId: string, token: CancellationToken = new CancellationToken()): CancellationToken {
    const key = ProgressManager.key(progressToken, userId);
    if (this.active.has(key)) {
      logger.warn({ progressToken, userId }, '[progress] Progress token reused while still active');
    }
    this.active.set(key, { progressToken, token, userId });
    return token;
  }

  /**
   * Cancel a running call of this user
   *
   * @returns false if no such call is running
   */
  cancel(progressToken: string, userId: string, reason?: string): boolean {
    const call = this.active.get(ProgressManager.key(progressToken, userId));
    if (!call) {
      return false;
    }
    call.token.cancel(reason);
    logger.info({ progressToken, userId }, '[progress] Call cancelled');
    return true;
  }

  /**
   * Cancel every running call of a user (connection closed)
   */
  cancelAllForUser(userId: string): number {
    let count = 0;
    for (const call of this.active.values()) {
      if (call.userId === userId && !call.token.isCancelled()) {
        call.token.cancel('Connection closed');
        count++;
      }
    }
    return count;
  }

  /**
   * Forget a finished call. With `token`, the entry is only removed while it
   * still belongs to that call, so a call that reused the progress token
   * stays registered.
   */
  cleanup(progressToken: string, userId: string, token?: CancellationToken): void {
    const key = ProgressManager.key(progressToken, userId);
    if (token === undefined || this.active.get(key)?.token === token) {
      this.active.delete(key);
    }
  }

  activeTokens(userId?: string): string[] {
    return [...this.active.values()]
      .filter((call) => userId === undefined || call.userId === userId)
      .map((call) => call.progressToken);
  }

  isCancelled(progressToken: string, userId: string): boolean {
    return this.active.get(ProgressManager.key(progressToken, userId))?.token.isCancelled() ?? false;
  }
}
