/**
 * Tool Dispatcher
 *
 * Runs one canonical tool call:
 * 1. resolve the tool (unknown → method_not_found)
 * 2. authorize against the tenant's effective tool list and the caller's
 *    role (denied → the same method_not_found, so hidden tools stay hidden)
 * 3. validate arguments against the tool schema
 * 4. apply the per-user rate limit
 * 5. run the handler under a cancellation token registered for the call
 * 6. audit the outcome
 *
 * Handler failures never escape: they come back as
 * `{ success: false, error, metadata.error_kind }`.
 */

import { v4 as uuidv4 } from 'uuid';
import {
  MethodNotFoundError,
  PierreError,
  RateLimitError,
  ValidationError,
  errorKindOf,
  getToolCatalog,
  getToolEntry,
  hasCapability,
  isToolId,
  logger,
  statusForKind,
  toToolDescriptor,
  validateToolArguments,
  type AuditProvider,
  type AuthorizationProvider,
  type ErrorKind,
  type SessionContext,
  type ToolId,
} from '@pierre/core';
import type { ToolDescriptor, UniversalRequest, UniversalResponse } from '@pierre/protocol';
import type { NotificationBus } from './notification-bus.js';
import { ProgressReporter, type ProgressManager } from './progress.js';
import { RATE_LIMIT_WINDOW_MS, type RateLimiter } from './rate-limiter.js';
import type { ToolHandler } from './tool-handlers.js';

export interface ToolDispatcherOptions {
  authz: AuthorizationProvider;
  audit: AuditProvider;
  handlers: Record<ToolId, ToolHandler>;
  progress: ProgressManager;
  bus: NotificationBus;
  rateLimiter: RateLimiter;
  toolCallsPerMinute: number;
}

export interface DispatchOptions {
  sourceIp?: string;
  /** Key to register the call's cancellation token under when the request carries no progress token */
  cancellationKey?: string;
}

/**
 * Error kind of a failed response, if any
 */
export function responseErrorKind(response: UniversalResponse): ErrorKind | undefined {
  const kind = response.metadata?.error_kind;
  return typeof kind === 'string' && !response.success ? toErrorKind(kind) : undefined;
}

const ERROR_KINDS: readonly ErrorKind[] = [
  'auth_required',
  'auth_invalid',
  'auth_expired',
  'permission_denied',
  'invalid_input',
  'invalid_format',
  'not_found',
  'database',
  'internal',
  'rate_limited',
  'operation_cancelled',
  'method_not_found',
  'not_supported',
  'external_service',
  'key_missing',
];

function toErrorKind(value: string): ErrorKind {
  return ERROR_KINDS.find((kind) => kind === value) ?? 'internal';
}

export class ToolDispatcher {
  private readonly descriptors: ToolDescriptor[];

  constructor(private readonly options: ToolDispatcherOptions) {
    this.descriptors = [...getToolCatalog().values()].map(toToolDescriptor);
  }

  /**
   * Tools the session may call, in catalogue order
   */
  async listTools(session: SessionContext): Promise<ToolDescriptor[]> {
    return this.options.authz.listAuthorizedTools(session, this.descriptors);
  }

  async dispatch(request: UniversalRequest, session: SessionContext, dispatchOptions: DispatchOptions = {}): Promise<UniversalResponse> {
    const startedAt = Date.now();
    const response = await this.run(request, session, dispatchOptions.cancellationKey);
    await this.audit(request, response, Date.now() - startedAt, dispatchOptions.sourceIp);
    return response;
  }

  private async run(request: UniversalRequest, session: SessionContext, cancellationKey?: string): Promise<UniversalResponse> {
    const { tool_name: toolName, parameters, user_id: userId } = request;
    const { authz, handlers, progress, bus, rateLimiter, toolCallsPerMinute } = this.options;

    if (!isToolId(toolName)) {
      return failure(toolName, new MethodNotFoundError(`Unknown tool: ${toolName}`));
    }

    const decision = await authz.authorize(
      { ...session, tenant_id: request.tenant_id },
      { tool_name: toolName, tool_arguments: parameters }
    );
    if (decision.decision === 'deny') {
      logger.debug({ tool: toolName, userId, policy: decision.policy_id, reason: decision.reason }, '[dispatcher] Tool denied');
      return failure(toolName, new MethodNotFoundError(`Unknown tool: ${toolName}`));
    }

    const entry = getToolEntry(toolName);
    const validation = validateToolArguments(parameters, entry.input_schema);
    if (!validation.valid) {
      return failure(toolName, new ValidationError(validation.error ?? 'Invalid arguments'));
    }

    const limit = rateLimiter.consume(`tool:${userId}`, toolCallsPerMinute, RATE_LIMIT_WINDOW_MS);
    if (!limit.allowed) {
      return failure(toolName, new RateLimitError('Tool call rate limit exceeded', limit.retryAfterSeconds));
    }

    const progressToken = request.progress_token ?? cancellationKey ?? uuidv4();
    const cancellation = progress.register(progressToken, userId);
    const reporter =
      request.progress_token !== undefined && hasCapability(entry, 'supports_progress')
        ? new ProgressReporter(bus, progressToken, userId, cancellation)
        : null;

    try {
      cancellation.throwIfCancelled();
      const result = await handlers[toolName](parameters, {
        userId,
        tenantId: request.tenant_id,
        role: session.role,
        cancellation,
        progress: reporter,
      });
      cancellation.throwIfCancelled();
      return { success: true, result, metadata: { tool_name: toolName } };
    } catch (err) {
      if (!(err instanceof PierreError)) {
        logger.error({ err, tool: toolName, userId }, '[dispatcher] Tool handler failed');
      }
      return failure(toolName, err);
    } finally {
      progress.cleanup(progressToken, userId, cancellation);
    }
  }

  private async audit(request: UniversalRequest, response: UniversalResponse, elapsedMs: number, sourceIp?: string): Promise<void> {
    const errorKind = responseErrorKind(response);
    await this.options.audit.emit({
      event_id: uuidv4(),
      timestamp: new Date().toISOString(),
      event_type: 'tool_call',
      tool_name: request.tool_name,
      user_id: request.user_id,
      tenant_id: request.tenant_id,
      status_code: errorKind ? statusForKind(errorKind) : 200,
      response_time_ms: elapsedMs,
      error_kind: errorKind,
      source_ip: sourceIp,
      protocol: request.protocol,
    });
  }
}

function failure(toolName: string, err: unknown): UniversalResponse {
  const kind = errorKindOf(err);
  const message = err instanceof PierreError ? err.message : 'Internal server error';
  return {
    success: false,
    error: message,
    metadata: {
      tool_name: toolName,
      error_kind: kind,
      ...(err instanceof RateLimitError ? { retry_after: err.retryAfterSeconds } : {}),
    },
  };
}
