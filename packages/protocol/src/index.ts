/**
 * @pierre/protocol
 *
 * Type-only package defining the wire contracts between Pierre and its callers:
 * JSON-RPC 2.0 envelopes, MCP tool results, A2A task payloads, the canonical
 * universal request/response pair and the audit event shape.
 * Zero runtime dependencies apart from a few constants.
 */

/**
 * API version constant
 */
export const API_VERSION = 'v1';

/**
 * MCP protocol revision advertised during `initialize`
 */
export const MCP_PROTOCOL_VERSION = '2025-06-18';

/**
 * Wire protocol a tool call arrived on. Selects the converter output shape.
 */
export type ProtocolKind = 'mcp' | 'jsonrpc' | 'rest' | 'a2a';

/**
 * Platform role carried in internal tokens
 */
export type UserRole = 'user' | 'admin' | 'super_admin';

/**
 * Upstream fitness providers known to the gateway
 */
export const PROVIDER_NAMES = ['strava', 'fitbit', 'garmin', 'whoop', 'coros', 'terra'] as const;

export type ProviderName = (typeof PROVIDER_NAMES)[number];

export function isProviderName(value: string): value is ProviderName {
  return PROVIDER_NAMES.some((name) => name === value);
}

/**
 * How the caller was authenticated
 */
export type AuthMethod = 'bearer' | 'cookie' | 'client_credentials' | 'admin_token';

/**
 * Claims of the internal RS256 access token
 */
export interface TokenClaims {
  /** Subject: user id, or client id for client-credentials tokens */
  sub: string;
  active_tenant_id?: string;
  role: UserRole;
  /** Unix seconds */
  iat: number;
  /** Unix seconds */
  exp: number;
  jti?: string;
  /** Present only on client-credentials tokens */
  token_use?: 'client';
  client_id?: string;
}

// ===== JSON-RPC 2.0 =====

export type JsonRpcId = string | number | null;

export interface JsonRpcRequest {
  jsonrpc: '2.0';
  id?: JsonRpcId;
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcErrorObject {
  code: number;
  message: string;
  data?: unknown;
}

export interface JsonRpcSuccess {
  jsonrpc: '2.0';
  id: JsonRpcId;
  result: unknown;
}

export interface JsonRpcFailure {
  jsonrpc: '2.0';
  id: JsonRpcId;
  error: JsonRpcErrorObject;
}

export type JsonRpcResponse = JsonRpcSuccess | JsonRpcFailure;

export interface JsonRpcNotification {
  jsonrpc: '2.0';
  method: string;
  params?: Record<string, unknown>;
}

/**
 * JSON-RPC error codes. The -320xx range is server-defined.
 */
export const JsonRpcErrorCodes = {
  PARSE_ERROR: -32700,
  INVALID_REQUEST: -32600,
  METHOD_NOT_FOUND: -32601,
  INVALID_PARAMS: -32602,
  INTERNAL_ERROR: -32603,
  AUTH_REQUIRED: -32001,
  AUTH_INVALID: -32002,
  AUTH_EXPIRED: -32003,
  PERMISSION_DENIED: -32004,
  RATE_LIMITED: -32005,
  OPERATION_CANCELLED: -32006,
  NOT_FOUND: -32007,
  NOT_SUPPORTED: -32008,
  EXTERNAL_SERVICE: -32009,
} as const;

export type JsonRpcErrorCode = (typeof JsonRpcErrorCodes)[keyof typeof JsonRpcErrorCodes];

// ===== MCP =====

export interface McpTextContent {
  type: 'text';
  text: string;
}

/**
 * Result of MCP `tools/call`
 */
export interface McpToolResult {
  content: McpTextContent[];
  structuredContent?: unknown;
  isError: boolean;
}

/**
 * Tool descriptor as listed by `tools/list` and `GET /api/tools`
 */
export interface ToolDescriptor {
  name: string;
  description: string;
  inputSchema: Record<string, unknown>;
}

// ===== A2A =====

export type A2ATaskState = 'completed' | 'failed' | 'canceled';

export interface A2ADataPart {
  type: 'data';
  data: unknown;
}

export interface A2ATextPart {
  type: 'text';
  text: string;
}

/**
 * A2A task payload emitted for a finished tool call
 */
export interface A2ATask {
  id: string;
  status: {
    state: A2ATaskState;
    message?: string;
    timestamp: string;
  };
  artifacts: Array<{
    name: string;
    parts: Array<A2ADataPart | A2ATextPart>;
  }>;
  metadata?: Record<string, unknown>;
}

// ===== Canonical tool call =====

/**
 * Canonical tool invocation built by every protocol front-end
 */
export interface UniversalRequest {
  tool_name: string;
  parameters: Record<string, unknown>;
  user_id: string;
  protocol: ProtocolKind;
  tenant_id?: string;
  /** Request id used to correlate progress notifications and cancellation */
  progress_token?: string;
}

/**
 * Canonical tool result rendered by the protocol converter
 */
export interface UniversalResponse {
  success: boolean;
  result?: unknown;
  error?: string;
  metadata?: Record<string, unknown>;
}

// ===== Notifications =====

export interface OAuthCompletedEvent {
  type: 'oauth_completed';
  provider: string;
  success: boolean;
  message: string;
  user_id: string;
}

export interface ProgressEvent {
  type: 'progress';
  token: string;
  current: number;
  total?: number;
  message?: string;
  user_id: string;
}

export type NotificationEvent = OAuthCompletedEvent | ProgressEvent;

// ===== Audit =====

export type AuditEventType = 'tool_call' | 'oauth' | 'auth' | 'admin_action';

/**
 * Audit event (one row of the audit log)
 */
export interface AuditEvent {
  event_id: string;
  /** ISO 8601 */
  timestamp: string;
  event_type: AuditEventType;
  /** Tool id, or the OAuth/auth route name (e.g. "oauth2.token") */
  tool_name: string;
  user_id?: string;
  tenant_id?: string;
  status_code: number;
  response_time_ms: number;
  error_kind?: string;
  source_ip?: string;
  protocol?: ProtocolKind;
}
