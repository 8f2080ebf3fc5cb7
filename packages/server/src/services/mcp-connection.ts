/**
 * One MCP session over WebSocket
 *
 * Requests are JSON-RPC text frames answered on the same socket. The
 * session also forwards the user's notification-bus events as
 * `notifications/oauth_completed` and `notifications/progress`. Closing
 * the socket unsubscribes and cancels the calls it started.
 */

import { logger } from '@pierre/core';
import { JsonRpcErrorCodes, type JsonRpcNotification, type JsonRpcResponse, type NotificationEvent } from '@pierre/protocol';
import type { McpCallContext, McpRequestHandler } from './mcp-handler.js';
import type { NotificationBus } from './notification-bus.js';

/** The part of a WebSocket the session writes to */
export interface McpSocket {
  send(data: string): void;
}

export function toJsonRpcNotification(event: NotificationEvent): JsonRpcNotification {
  if (event.type === 'oauth_completed') {
    return {
      jsonrpc: '2.0',
      method: 'notifications/oauth_completed',
      params: { provider: event.provider, success: event.success, message: event.message },
    };
  }
  return {
    jsonrpc: '2.0',
    method: 'notifications/progress',
    params: {
      progressToken: event.token,
      progress: event.current,
      ...(event.total !== undefined && { total: event.total }),
      ...(event.message !== undefined && { message: event.message }),
    },
  };
}

export class McpConnection {
  private readonly ctx: McpCallContext;
  private readonly unsubscribe: () => void;
  private closed = false;

  constructor(
    private readonly socket: McpSocket,
    private readonly handler: McpRequestHandler,
    bus: NotificationBus,
    ctx: Omit<McpCallContext, 'inflight'>
  ) {
    this.ctx = { ...ctx, inflight: new Set() };
    this.unsubscribe = bus.subscribeUser(ctx.session.user_id, (event) => this.write(toJsonRpcNotification(event)));
  }

  /**
   * Handle one text frame. Responses are written to the socket.
   */
  async receive(raw: string): Promise<void> {
    let message: unknown;
    try {
      message = JSON.parse(raw);
    } catch {
      this.write({ jsonrpc: '2.0', id: null, error: { code: JsonRpcErrorCodes.PARSE_ERROR, message: 'Parse error' } });
      return;
    }

    const response = await this.handler.handle(message, this.ctx);
    if (response) {
      this.write(response);
    }
  }

  close(): void {
    if (this.closed) {
      return;
    }
    this.closed = true;
    this.unsubscribe();
    const cancelled = this.handler.cancelInflight(this.ctx);
    logger.debug({ userId: this.ctx.session.user_id, cancelled }, '[ws] Connection closed');
  }

  get inflightCount(): number {
    return this.ctx.inflight?.size ?? 0;
  }

  private write(message: JsonRpcResponse | JsonRpcNotification): void {
    if (this.closed) {
      return;
    }
    this.socket.send(JSON.stringify(message));
  }
}
