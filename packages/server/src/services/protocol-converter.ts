/**
 * Protocol Converter
 *
 * Renders a UniversalResponse in the shape of the protocol the call arrived
 * on: MCP tool result, JSON-RPC response, REST envelope or A2A task. Error
 * kinds map to JSON-RPC codes and REST error codes here and nowhere else.
 */

import type { ErrorCode, ErrorEnvelope, SuccessEnvelope } from '@pierre/contracts';
import { statusForKind, type ErrorKind } from '@pierre/core';
import {
  JsonRpcErrorCodes,
  type A2ATask,
  type JsonRpcId,
  type JsonRpcResponse,
  type McpToolResult,
  type UniversalResponse,
} from '@pierre/protocol';
import { ErrorCodes, wrapError, wrapSuccess } from '../routes/reply-envelope.js';
import { responseErrorKind } from './tool-dispatcher.js';

const JSON_RPC_CODES: Record<ErrorKind, number> = {
  method_not_found: JsonRpcErrorCodes.METHOD_NOT_FOUND,
  invalid_input: JsonRpcErrorCodes.INVALID_PARAMS,
  invalid_format: JsonRpcErrorCodes.INVALID_PARAMS,
  internal: JsonRpcErrorCodes.INTERNAL_ERROR,
  database: JsonRpcErrorCodes.INTERNAL_ERROR,
  key_missing: JsonRpcErrorCodes.INTERNAL_ERROR,
  auth_required: JsonRpcErrorCodes.AUTH_REQUIRED,
  auth_invalid: JsonRpcErrorCodes.AUTH_INVALID,
  auth_expired: JsonRpcErrorCodes.AUTH_EXPIRED,
  permission_denied: JsonRpcErrorCodes.PERMISSION_DENIED,
  rate_limited: JsonRpcErrorCodes.RATE_LIMITED,
  operation_cancelled: JsonRpcErrorCodes.OPERATION_CANCELLED,
  not_found: JsonRpcErrorCodes.NOT_FOUND,
  not_supported: JsonRpcErrorCodes.NOT_SUPPORTED,
  external_service: JsonRpcErrorCodes.EXTERNAL_SERVICE,
};

const REST_CODES: Record<ErrorKind, ErrorCode> = {
  invalid_input: ErrorCodes.VALIDATION_ERROR,
  invalid_format: ErrorCodes.INVALID_FORMAT,
  not_found: ErrorCodes.NOT_FOUND,
  method_not_found: ErrorCodes.METHOD_NOT_FOUND,
  auth_required: ErrorCodes.UNAUTHORIZED,
  auth_invalid: ErrorCodes.UNAUTHORIZED,
  auth_expired: ErrorCodes.TOKEN_EXPIRED,
  permission_denied: ErrorCodes.FORBIDDEN,
  rate_limited: ErrorCodes.RATE_LIMITED,
  operation_cancelled: ErrorCodes.OPERATION_CANCELLED,
  not_supported: ErrorCodes.NOT_SUPPORTED,
  external_service: ErrorCodes.UPSTREAM_ERROR,
  database: ErrorCodes.INTERNAL_ERROR,
  internal: ErrorCodes.INTERNAL_ERROR,
  key_missing: ErrorCodes.INTERNAL_ERROR,
};

/** Kinds reported as JSON-RPC errors by MCP `tools/call` rather than as tool results */
const MCP_PROTOCOL_ERROR_KINDS: ReadonlySet<ErrorKind> = new Set(['method_not_found', 'invalid_input', 'invalid_format']);

export function jsonRpcCodeFor(kind: ErrorKind): number {
  return JSON_RPC_CODES[kind];
}

export function restCodeFor(kind: ErrorKind): ErrorCode {
  return REST_CODES[kind];
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export interface RestReply {
  statusCode: number;
  body: SuccessEnvelope<unknown> | ErrorEnvelope;
}

export class ProtocolConverter {
  /**
   * MCP `tools/call` result
   */
  static toMcp(response: UniversalResponse): McpToolResult {
    if (!response.success) {
      const message = response.error ?? 'Tool call failed';
      return {
        content: [{ type: 'text', text: message }],
        structuredContent: { error: message, error_kind: responseErrorKind(response) ?? 'internal' },
        isError: true,
      };
    }
    const result = response.result ?? null;
    return {
      content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
      structuredContent: isPlainObject(result) ? result : { result },
      isError: false,
    };
  }

  /**
   * JSON-RPC response for a tool call: the result object on success, an
   * error object carrying the kind otherwise
   */
  static toJsonRpc(id: JsonRpcId, response: UniversalResponse): JsonRpcResponse {
    const kind = responseErrorKind(response);
    if (response.success || !kind) {
      return { jsonrpc: '2.0', id, result: response.result ?? null };
    }
    return ProtocolConverter.jsonRpcError(id, kind, response.error ?? 'Tool call failed', response.metadata);
  }

  /**
   * MCP wraps tool failures in an `isError` result; only request-level
   * failures (unknown tool, bad arguments) are JSON-RPC errors.
   */
  static toMcpCallResponse(id: JsonRpcId, response: UniversalResponse): JsonRpcResponse {
    const kind = responseErrorKind(response);
    if (kind && MCP_PROTOCOL_ERROR_KINDS.has(kind)) {
      return ProtocolConverter.jsonRpcError(id, kind, response.error ?? 'Tool call failed');
    }
    return { jsonrpc: '2.0', id, result: ProtocolConverter.toMcp(response) };
  }

  static jsonRpcError(id: JsonRpcId, kind: ErrorKind, message: string, data?: Record<string, unknown>): JsonRpcResponse {
    return {
      jsonrpc: '2.0',
      id,
      error: { code: jsonRpcCodeFor(kind), message, data: { ...data, error_kind: kind } },
    };
  }

  static toRest(response: UniversalResponse): RestReply {
    const kind = responseErrorKind(response);
    if (response.success || !kind) {
      return { statusCode: 200, body: wrapSuccess(response.result ?? null, response.metadata) };
    }
    const details: Record<string, unknown> = { error_kind: kind };
    const retryAfter = response.metadata?.retry_after;
    if (typeof retryAfter === 'number') {
      details.retry_after = retryAfter;
    }
    return {
      statusCode: statusForKind(kind),
      body: wrapError(restCodeFor(kind), response.error ?? 'Tool call failed', [details]),
    };
  }

  static toA2A(taskId: string, toolName: string, response: UniversalResponse, now: Date = new Date()): A2ATask {
    const kind = responseErrorKind(response);
    if (response.success || !kind) {
      return {
        id: taskId,
        status: { state: 'completed', timestamp: now.toISOString() },
        artifacts: [{ name: toolName, parts: [{ type: 'data', data: response.result ?? null }] }],
        metadata: { tool_name: toolName },
      };
    }
    return {
      id: taskId,
      status: {
        state: kind === 'operation_cancelled' ? 'canceled' : 'failed',
        message: response.error ?? 'Tool call failed',
        timestamp: now.toISOString(),
      },
      artifacts: [],
      metadata: { tool_name: toolName, error_kind: kind },
    };
  }
}
