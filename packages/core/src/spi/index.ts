/**
 * Service Provider Interface (SPI) definitions
 *
 * Interfaces that the authentication, authorization and audit packages
 * implement. The server only talks to these.
 */

import type { AuditEvent, AuthMethod, ToolDescriptor, UserRole } from '@pierre/protocol';
import type { ErrorKind } from '../utils/errors.js';

// ===== Authentication SPI =====

/**
 * Authentication Provider Interface
 *
 * Implementation: JwtAuthProvider (@pierre/authn-jwt)
 */
export interface AuthenticationProvider extends ProviderLifecycle {
  /** Unique provider identifier (e.g., "jwt") */
  readonly id: string;

  /**
   * Resolve the caller. A request without credentials yields
   * `{ success: false, error.kind: 'auth_required' }`.
   */
  authenticate(request: AuthRequest): Promise<AuthResult>;
}

/**
 * Authentication request context
 */
export interface AuthRequest {
  /** Lower-cased header names */
  headers: Record<string, string | undefined>;
  /** Parsed cookies */
  cookies: Record<string, string | undefined>;
  /** HTTP method; unsafe methods trigger CSRF checks on cookie auth */
  method: string;
  /** Source IP address */
  sourceIp: string;
}

export interface AuthResult {
  success: boolean;
  session?: SessionContext;
  error?: AuthError;
}

/**
 * Authentication error details (logged, never exposed verbatim)
 */
export interface AuthError {
  kind: Extract<ErrorKind, 'auth_required' | 'auth_invalid' | 'auth_expired' | 'permission_denied'>;
  message: string;
  provider: string;
}

/**
 * Session context (created by AuthN, consumed by AuthZ and handlers)
 */
export interface SessionContext {
  /** Token id (jti) or a generated id */
  session_id: string;
  /** Absent for client-credentials tokens */
  user_id?: string;
  /** Active tenant: token claim, else the user's primary tenant */
  tenant_id?: string;
  role: UserRole;
  auth_method: AuthMethod;
  /** Set for client-credentials tokens */
  client_id?: string;
  /** Unix timestamp (seconds) */
  issued_at: number;
  /** Unix timestamp (seconds) */
  expires_at: number;
}

// ===== Authorization SPI =====

/**
 * Authorization Provider Interface
 *
 * Implementation: TenantToolSelectionService (@pierre/authz-tenant)
 */
export interface AuthorizationProvider extends ProviderLifecycle {
  readonly id: string;

  /** Check if the session may invoke the given tool */
  authorize(session: SessionContext, request: AuthzRequest): Promise<AuthzDecision>;

  /** Subset of allTools the session may use */
  listAuthorizedTools(session: SessionContext, allTools: ToolDescriptor[]): Promise<ToolDescriptor[]>;
}

export interface AuthzRequest {
  tool_name: string;
  tool_arguments: Record<string, unknown>;
}

export interface AuthzDecision {
  decision: 'permit' | 'deny';
  /** Human-readable reason (logged only) */
  reason: string;
  policy_id?: string;
}

// ===== Audit SPI =====

/**
 * Audit Provider Interface
 *
 * Implementation: DatabaseAuditProvider (@pierre/audit-db)
 */
export interface AuditProvider extends ProviderLifecycle {
  readonly id: string;

  /** Record one event; never throws on storage failure */
  emit(event: AuditEvent): Promise<void>;

  /** Flush any buffered events */
  flush(): Promise<void>;

  query?(filters: AuditQueryFilters): Promise<AuditEvent[]>;
}

export interface AuditQueryFilters {
  start_time?: string;
  end_time?: string;
  user_id?: string;
  tenant_id?: string;
  tool_name?: string;
  limit?: number;
}

// ===== Common Provider Types =====

export interface ProviderHealth {
  status: 'healthy' | 'degraded' | 'unhealthy';
  message?: string;
  last_checked: string;
}

/**
 * Provider lifecycle interface
 */
export interface ProviderLifecycle {
  initialize(): Promise<void>;
  healthCheck(): Promise<ProviderHealth>;
  shutdown?(): Promise<void>;
}
