/**
 * Configuration schema (Zod)
 *
 * Validates the merged YAML + environment configuration. Every section has
 * defaults so an empty file (or no file) yields a working development setup.
 */

import { z } from 'zod';
import { PROVIDER_NAMES } from '@pierre/protocol';

const booleanish = z.preprocess(
  (value) => (typeof value === 'string' ? ['true', '1', 'yes'].includes(value.trim().toLowerCase()) : value),
  z.boolean()
);

const stringList = z.preprocess(
  (value) =>
    typeof value === 'string'
      ? value
          .split(',')
          .map((item) => item.trim())
          .filter((item) => item.length > 0)
      : value,
  z.array(z.string())
);

// ===== Server =====

const ServerConfigSchema = z
  .object({
    host: z.string().default('0.0.0.0'),
    port: z.coerce.number().int().min(0).max(65535).default(8081),
    /** Public origin; callback and metadata URLs are built from it */
    base_url: z.string().url().default('http://localhost:8081'),
    /** Web app origin for post-OAuth redirects */
    frontend_url: z.string().url().optional(),
    cors_origins: stringList.default([]),
    body_limit_bytes: z.coerce.number().int().min(1024).default(1024 * 1024),
    /** Take the client address from X-Forwarded-For (only behind a trusted proxy) */
    trust_proxy: booleanish.default(false),
  })
  .default({});

// ===== Database =====

const DatabaseConfigSchema = z
  .object({
    /** SQLite file path or ':memory:'; defaults to {data_dir}/pierre.db */
    path: z.string().optional(),
  })
  .default({});

// ===== Authentication =====

const AuthConfigSchema = z
  .object({
    token_lifetime_seconds: z.coerce.number().int().min(60).max(30 * 86400).default(86400),
    /** Retired signing keys are kept this long; defaults to the token lifetime */
    key_retention_seconds: z.coerce.number().int().min(60).optional(),
    refresh_token_lifetime_seconds: z.coerce.number().int().min(60).default(30 * 86400),
    auto_approve_users: booleanish.default(false),
  })
  .default({});

// ===== Upstream providers =====

const ProviderCredentialsSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  redirect_uri: z.string().url().optional(),
  scopes: stringList.optional(),
});

const ProvidersConfigSchema = z
  .record(z.enum(PROVIDER_NAMES), ProviderCredentialsSchema)
  .default({});

// ===== Tools =====

const ToolsConfigSchema = z
  .object({
    /** Process-wide disabled list; wins over every tenant override */
    disabled: stringList.default([]),
  })
  .default({});

// ===== Rate limits =====

const RateLimitConfigSchema = z
  .object({
    authorize_per_minute: z.coerce.number().int().min(1).default(60),
    token_per_minute: z.coerce.number().int().min(1).default(30),
    register_per_minute: z.coerce.number().int().min(1).default(10),
    tool_calls_per_minute: z.coerce.number().int().min(1).default(120),
  })
  .default({});

// ===== Upstream HTTP =====

const UpstreamConfigSchema = z
  .object({
    timeout_ms: z.coerce.number().int().min(100).max(120000).default(30000),
  })
  .default({});

// ===== Audit buffer =====

const AuditConfigSchema = z
  .object({
    buffer_size: z.coerce.number().int().min(10).default(10000),
    flush_interval_ms: z.coerce.number().int().min(100).default(5000),
  })
  .default({});

// ===== Cache =====

const CacheConfigSchema = z
  .object({
    max_entries: z.coerce.number().int().min(1).default(10000),
  })
  .default({});

// ===== Webhooks =====

const WebhookConfigSchema = z
  .object({
    secret: z.string().min(8).optional(),
  })
  .default({});

// ===== Root Configuration Schema =====

export const PierreConfigSchema = z.object({
  server: ServerConfigSchema,
  data_dir: z.string().default('./data'),
  database: DatabaseConfigSchema,
  log_level: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  auth: AuthConfigSchema,
  providers: ProvidersConfigSchema,
  tools: ToolsConfigSchema,
  rate_limits: RateLimitConfigSchema,
  upstream: UpstreamConfigSchema,
  audit: AuditConfigSchema,
  cache: CacheConfigSchema,
  webhooks: WebhookConfigSchema,
});

export type PierreConfig = z.infer<typeof PierreConfigSchema>;
export type ProviderCredentialsConfig = z.infer<typeof ProviderCredentialsSchema>;

// ===== Credential field patterns =====

export const CREDENTIAL_FIELD_PATTERNS = ['password', 'secret', 'token', 'credential', 'passphrase'] as const;

/**
 * Check if a config key is likely a credential field
 */
export function isCredentialField(key: string): boolean {
  const lowerKey = key.toLowerCase();
  return CREDENTIAL_FIELD_PATTERNS.some((pattern) => lowerKey.includes(pattern));
}
