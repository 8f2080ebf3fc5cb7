/**
 * Custom error classes
 *
 * All Pierre errors extend PierreError. `kind` is the closed classification the
 * protocol converter and HTTP layer map to wire shapes; `code` is the stable
 * machine string sent to REST callers.
 */

export type ErrorKind =
  | 'auth_required'
  | 'auth_invalid'
  | 'auth_expired'
  | 'permission_denied'
  | 'invalid_input'
  | 'invalid_format'
  | 'not_found'
  | 'database'
  | 'internal'
  | 'rate_limited'
  | 'operation_cancelled'
  | 'method_not_found'
  | 'not_supported'
  | 'external_service'
  | 'key_missing';

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  auth_required: 401,
  auth_invalid: 401,
  auth_expired: 401,
  permission_denied: 403,
  invalid_input: 400,
  invalid_format: 400,
  not_found: 404,
  method_not_found: 404,
  rate_limited: 429,
  operation_cancelled: 499,
  not_supported: 501,
  external_service: 502,
  database: 500,
  internal: 500,
  key_missing: 500,
};

/**
 * HTTP status for an error kind
 */
export function statusForKind(kind: ErrorKind): number {
  return STATUS_BY_KIND[kind];
}

export class PierreError extends Error {
  constructor(
    message: string,
    public code: string,
    public kind: ErrorKind = 'internal',
    public statusCode: number = statusForKind(kind),
    public details?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'PierreError';
  }
}

export class AuthenticationError extends PierreError {
  constructor(
    message: string,
    kind: 'auth_required' | 'auth_invalid' | 'auth_expired' = 'auth_invalid',
    details?: Record<string, unknown>
  ) {
    super(message, 'authentication_failed', kind, 401, details);
    this.name = 'AuthenticationError';
  }
}

export class AuthorizationError extends PierreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'access_denied', 'permission_denied', 403, details);
    this.name = 'AuthorizationError';
  }
}

export class ValidationError extends PierreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'validation_failed', 'invalid_input', 400, details);
    this.name = 'ValidationError';
  }
}

export class InvalidFormatError extends PierreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'invalid_format', 'invalid_format', 400, details);
    this.name = 'InvalidFormatError';
  }
}

export class NotFoundError extends PierreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'not_found', 'not_found', 404, details);
    this.name = 'NotFoundError';
  }
}

export class MethodNotFoundError extends PierreError {
  constructor(message: string) {
    super(message, 'method_not_found', 'method_not_found', 404);
    this.name = 'MethodNotFoundError';
  }
}

export class RateLimitError extends PierreError {
  constructor(
    message: string,
    public retryAfterSeconds: number
  ) {
    super(message, 'rate_limited', 'rate_limited', 429, { retry_after: retryAfterSeconds });
    this.name = 'RateLimitError';
  }
}

export class CancelledError extends PierreError {
  constructor(message = 'Operation cancelled') {
    super(message, 'operation_cancelled', 'operation_cancelled', 499);
    this.name = 'CancelledError';
  }
}

export class DatabaseError extends PierreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'database_error', 'database', 500, details);
    this.name = 'DatabaseError';
  }
}

export class InternalError extends PierreError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'internal_error', 'internal', 500, details);
    this.name = 'InternalError';
  }
}

export class KeyMissingError extends PierreError {
  constructor(message = 'No signing key available') {
    super(message, 'key_missing', 'key_missing', 500);
    this.name = 'KeyMissingError';
  }
}

/**
 * Upstream provider failure. `kind` distinguishes unsupported capabilities,
 * expired upstream credentials and plain upstream faults.
 */
export class ProviderError extends PierreError {
  constructor(
    message: string,
    public provider: string,
    kind: 'not_supported' | 'external_service' | 'auth_expired' | 'not_found' | 'rate_limited' = 'external_service',
    public upstreamStatus?: number
  ) {
    super(message, 'provider_error', kind, statusForKind(kind), {
      provider,
      ...(upstreamStatus !== undefined && { upstream_status: upstreamStatus }),
    });
    this.name = 'ProviderError';
  }
}

/**
 * RFC 6749 §5.2 error codes
 */
export type OAuth2ErrorCode =
  | 'invalid_request'
  | 'invalid_client'
  | 'invalid_grant'
  | 'unauthorized_client'
  | 'unsupported_grant_type'
  | 'unsupported_response_type'
  | 'invalid_scope'
  | 'access_denied'
  | 'server_error'
  | 'temporarily_unavailable'
  | 'invalid_redirect_uri'
  | 'invalid_client_metadata';

/**
 * Error answered as `{ error, error_description }` by the authorization server
 */
export class OAuth2Error extends Error {
  constructor(
    public error: OAuth2ErrorCode,
    public description: string,
    public statusCode: number = error === 'invalid_client' ? 401 : error === 'server_error' ? 500 : 400
  ) {
    super(description);
    this.name = 'OAuth2Error';
  }

  toJSON(): { error: OAuth2ErrorCode; error_description: string } {
    return { error: this.error, error_description: this.description };
  }
}

/**
 * Classify any thrown value. Non-Pierre errors are internal.
 */
export function errorKindOf(err: unknown): ErrorKind {
  return err instanceof PierreError ? err.kind : 'internal';
}
