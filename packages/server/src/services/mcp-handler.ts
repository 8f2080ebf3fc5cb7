/**
 * MCP JSON-RPC handler
 *
 * Shared by `POST /mcp` and the `/ws` connection. Methods:
 * - `initialize`, `ping`, `tools/list`, `tools/call`
 * - `notifications/initialized`, `notifications/cancelled` (no response)
 * - any other method is treated as a plain JSON-RPC tool call whose method is
 *   the tool name, so unknown and hidden names share one error shape
 */

import { z } from 'zod';
import { logger } from '@pierre/core';
import {
  JsonRpcErrorCodes,
  MCP_PROTOCOL_VERSION,
  type JsonRpcId,
  type JsonRpcResponse,
  type ProtocolKind,
} from '@pierre/protocol';
import type { ProgressManager } from './progress.js';
import { ProtocolConverter } from './protocol-converter.js';
import type { ToolDispatcher } from './tool-dispatcher.js';
import type { UserSession } from '../routes/helpers.js';

export const SERVER_NAME = 'pierre';
export const SERVER_VERSION = '0.1.0';

const JsonRpcMessageSchema = z.object({
  jsonrpc: z.literal('2.0'),
  id: z.union([z.string(), z.number(), z.null()]).optional(),
  method: z.string().min(1),
  params: z.record(z.unknown()).optional(),
});

const ToolCallParamsSchema = z.object({
  name: z.string().min(1),
  arguments: z.record(z.unknown()).default({}),
  _meta: z
    .object({
      progressToken: z.union([z.string(), z.number()]).optional(),
    })
    .optional(),
});

const CancelledParamsSchema = z.object({
  requestId: z.union([z.string(), z.number()]),
  reason: z.string().optional(),
});

export interface McpCallContext {
  session: UserSession;
  sourceIp?: string;
  /** Progress tokens of calls started on this connection, for cancel-on-close */
  inflight?: Set<string>;
}

function rpcError(id: JsonRpcId, code: number, message: string): JsonRpcResponse {
  return { jsonrpc: '2.0', id, error: { code, message } };
}

export class McpRequestHandler {
  /** `${userId}:${requestId}` → progress token of the running call */
  private readonly requests = new Map<string, string>();

  constructor(
    private readonly dispatcher: ToolDispatcher,
    private readonly progress: ProgressManager
  ) {}

  /**
   * @returns the response, or null for a notification
   */
  async handle(message: unknown, ctx: McpCallContext): Promise<JsonRpcResponse | null> {
    const parsed = JsonRpcMessageSchema.safeParse(message);
    if (!parsed.success) {
      return rpcError(null, JsonRpcErrorCodes.INVALID_REQUEST, 'Invalid JSON-RPC request');
    }
    const { id, method, params = {} } = parsed.data;

    if (id === undefined) {
      this.handleNotification(method, params, ctx);
      return null;
    }

    switch (method) {
      case 'initialize':
        return {
          jsonrpc: '2.0',
          id,
          result: {
            protocolVersion: MCP_PROTOCOL_VERSION,
            capabilities: { tools: { listChanged: false } },
            serverInfo: { name: SERVER_NAME, version: SERVER_VERSION },
          },
        };

      case 'ping':
        return { jsonrpc: '2.0', id, result: {} };

      case 'tools/list':
        return { jsonrpc: '2.0', id, result: { tools: await this.dispatcher.listTools(ctx.session) } };

      case 'tools/call': {
        const call = ToolCallParamsSchema.safeParse(params);
        if (!call.success) {
          return rpcError(id, JsonRpcErrorCodes.INVALID_PARAMS, 'tools/call requires a tool name and an arguments object');
        }
        const progressToken = call.data._meta?.progressToken;
        const response = await this.runTool(
          id,
          call.data.name,
          call.data.arguments,
          progressToken !== undefined ? String(progressToken) : undefined,
          'mcp',
          ctx
        );
        return ProtocolConverter.toMcpCallResponse(id, response);
      }

      default: {
        const response = await this.runTool(id, method, params, undefined, 'jsonrpc', ctx);
        return ProtocolConverter.toJsonRpc(id, response);
      }
    }
  }

  /**
   * Cancel the calls a connection started (the connection is closing)
   */
  cancelInflight(ctx: McpCallContext): number {
    let cancelled = 0;
    for (const token of ctx.inflight ?? []) {
      if (this.progress.cancel(token, ctx.session.user_id, 'Connection closed')) {
        cancelled++;
      }
    }
    return cancelled;
  }

  private async runTool(
    id: JsonRpcId,
    toolName: string,
    parameters: Record<string, unknown>,
    progressToken: string | undefined,
    protocol: ProtocolKind,
    ctx: McpCallContext
  ) {
    const { session } = ctx;
    // Cancellation addresses the call by request id; progress uses the client's token when given
    const token = progressToken ?? `${session.user_id}:${String(id)}`;
    const requestKey = `${session.user_id}:${String(id)}`;

    this.requests.set(requestKey, token);
    ctx.inflight?.add(token);
    try {
      return await this.dispatcher.dispatch(
        {
          tool_name: toolName,
          parameters,
          user_id: session.user_id,
          protocol,
          ...(session.tenant_id !== undefined && { tenant_id: session.tenant_id }),
          ...(progressToken !== undefined ? { progress_token: progressToken } : {}),
        },
        session,
        { ...(ctx.sourceIp !== undefined && { sourceIp: ctx.sourceIp }), cancellationKey: token }
      );
    } finally {
      this.requests.delete(requestKey);
      ctx.inflight?.delete(token);
    }
  }

  private handleNotification(method: string, params: Record<string, unknown>, ctx: McpCallContext): void {
    if (method === 'notifications/cancelled') {
      const cancel = CancelledParamsSchema.safeParse(params);
      if (!cancel.success) {
        logger.debug('[mcp] Ignoring malformed cancellation');
        return;
      }
      const token = this.requests.get(`${ctx.session.user_id}:${String(cancel.data.requestId)}`);
      const cancelled = token !== undefined && this.progress.cancel(token, ctx.session.user_id, cancel.data.reason);
      logger.debug({ requestId: cancel.data.requestId, cancelled }, '[mcp] Cancellation received');
      return;
    }
    if (method !== 'notifications/initialized') {
      logger.debug({ method }, '[mcp] Ignoring unknown notification');
    }
  }
}
