/**
 * Pierre - Database Schema
 *
 * Drizzle ORM schema definitions (SQLite dialect).
 *
 * Design constraints:
 * - JSON columns stored as TEXT with JSON serialization
 * - UUIDs stored as TEXT (36 chars with hyphens)
 * - Timestamps as ISO 8601 strings (lexicographically ordered, compared as text)
 * - Enum types as constrained TEXT columns
 *
 * The DDL applied at runtime lives in packages/core/drizzle/*.sql and must be
 * kept in step with these definitions.
 */

import { sqliteTable, text, integer, index, uniqueIndex, primaryKey } from 'drizzle-orm/sqlite-core';

export const USER_ROLES = ['user', 'admin', 'super_admin'] as const;
export const USER_STATUSES = ['pending', 'active', 'suspended'] as const;
export const USER_TIERS = ['starter', 'professional', 'enterprise'] as const;
export const TENANT_ROLES = ['owner', 'admin', 'member'] as const;
export const CONNECTION_TYPES = ['oauth', 'synthetic', 'manual'] as const;
export const GRANT_TYPES = ['authorization_code', 'refresh_token', 'client_credentials', 'password'] as const;

export type UserRole = (typeof USER_ROLES)[number];
export type UserStatus = (typeof USER_STATUSES)[number];
export type UserTier = (typeof USER_TIERS)[number];
export type TenantRole = (typeof TENANT_ROLES)[number];
export type ConnectionType = (typeof CONNECTION_TYPES)[number];
export type GrantType = (typeof GRANT_TYPES)[number];

/**
 * users table
 *
 * Email is stored lower-cased so the unique index is case-insensitive.
 * A NULL password_hash marks an account that signs in through an external
 * identity provider only.
 */
export const users = sqliteTable(
  'users',
  {
    id: text('id').primaryKey().notNull(), // UUIDv4
    email: text('email').notNull(),
    password_hash: text('password_hash'), // Argon2id, NULL = external auth only
    display_name: text('display_name'),
    tier: text('tier', { enum: USER_TIERS }).notNull().default('starter'),
    role: text('role', { enum: USER_ROLES }).notNull().default('user'),
    status: text('status', { enum: USER_STATUSES }).notNull().default('pending'),
    is_admin: integer('is_admin', { mode: 'boolean' }).notNull().default(false),
    firebase_uid: text('firebase_uid'),
    auth_provider: text('auth_provider').notNull().default('email'),
    created_at: text('created_at').notNull(),
    last_active: text('last_active').notNull(),
    approved_at: text('approved_at'),
    approved_by: text('approved_by'),
  },
  (table) => ({
    emailIdx: uniqueIndex('unique_users_email').on(table.email),
    statusIdx: index('idx_users_status').on(table.status),
  })
);

/**
 * tenants table
 */
export const tenants = sqliteTable(
  'tenants',
  {
    id: text('id').primaryKey().notNull(),
    name: text('name').notNull(),
    slug: text('slug').notNull(),
    domain: text('domain'),
    plan: text('plan').notNull().default('starter'),
    owner_user_id: text('owner_user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    created_at: text('created_at').notNull(),
    updated_at: text('updated_at').notNull(),
  },
  (table) => ({
    slugIdx: uniqueIndex('unique_tenants_slug').on(table.slug),
    ownerIdx: index('idx_tenants_owner').on(table.owner_user_id),
  })
);

/**
 * tenant_users table
 *
 * Source of truth for membership. The oldest membership (joined_at) is the
 * user's primary tenant.
 */
export const tenant_users = sqliteTable(
  'tenant_users',
  {
    tenant_id: text('tenant_id')
      .notNull()
      .references(() => tenants.id, { onDelete: 'cascade' }),
    user_id: text('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    role: text('role', { enum: TENANT_ROLES }).notNull().default('member'),
    joined_at: text('joined_at').notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.tenant_id, table.user_id] }),
    userIdx: index('idx_tenant_users_user').on(table.user_id),
  })
);

/**
 * oauth_clients table
 *
 * Clients registered with our authorization server (RFC 7591).
 */
export const oauth_clients = sqliteTable('oauth_clients', {
  id: text('id').primaryKey().notNull(), // client_id
  client_name: text('client_name'),
  client_secret_hash: text('client_secret_hash').notNull(), // Argon2id
  redirect_uris: text('redirect_uris').notNull().default('[]'), // JSON string[]
  grant_types: text('grant_types').notNull().default('[]'), // JSON GrantType[]
  response_types: text('response_types').notNull().default('["code"]'), // JSON string[]
  scopes: text('scopes').notNull().default('[]'), // JSON string[]
  created_at: text('created_at').notNull(),
});

/**
 * oauth_client_states table
 *
 * One-time authorization states. `provider` is either an upstream provider tag
 * (outbound flows) or one of our client ids (authorization codes we issue).
 */
export const oauth_client_states = sqliteTable(
  'oauth_client_states',
  {
    state: text('state').primaryKey().notNull(),
    provider: text('provider').notNull(),
    user_id: text('user_id'),
    tenant_id: text('tenant_id'),
    redirect_uri: text('redirect_uri').notNull(),
    scope: text('scope'),
    pkce_code_verifier: text('pkce_code_verifier'),
    code_challenge: text('code_challenge'),
    code_challenge_method: text('code_challenge_method'),
    created_at: text('created_at').notNull(),
    expires_at: text('expires_at').notNull(),
    used: integer('used', { mode: 'boolean' }).notNull().default(false),
  },
  (table) => ({
    expiresIdx: index('idx_oauth_client_states_expires_at').on(table.expires_at),
  })
);

/**
 * oauth2_refresh_tokens table
 *
 * Rotating refresh tokens issued by our authorization server. Only the
 * SHA-256 of the token is stored.
 */
export const oauth2_refresh_tokens = sqliteTable(
  'oauth2_refresh_tokens',
  {
    token_hash: text('token_hash').primaryKey().notNull(),
    client_id: text('client_id')
      .notNull()
      .references(() => oauth_clients.id, { onDelete: 'cascade' }),
    user_id: text('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    tenant_id: text('tenant_id'),
    scope: text('scope'),
    created_at: text('created_at').notNull(),
    expires_at: text('expires_at').notNull(),
    revoked: integer('revoked', { mode: 'boolean' }).notNull().default(false),
  },
  (table) => ({
    userIdx: index('idx_oauth2_refresh_tokens_user').on(table.user_id),
    expiresIdx: index('idx_oauth2_refresh_tokens_expires_at').on(table.expires_at),
  })
);

/**
 * user_oauth_tokens table
 *
 * Upstream provider tokens, encrypted at rest by the token vault.
 */
export const user_oauth_tokens = sqliteTable(
  'user_oauth_tokens',
  {
    id: text('id').primaryKey().notNull(),
    user_id: text('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    tenant_id: text('tenant_id').notNull(),
    provider: text('provider').notNull(),
    access_token: text('access_token').notNull(), // vault ciphertext
    refresh_token: text('refresh_token'), // vault ciphertext
    token_type: text('token_type').notNull().default('Bearer'),
    scope: text('scope'),
    expires_at: text('expires_at'),
    created_at: text('created_at').notNull(),
    updated_at: text('updated_at').notNull(),
  },
  (table) => ({
    userIdx: index('idx_user_oauth_tokens_user').on(table.user_id),
    uniqueKey: uniqueIndex('unique_user_oauth_tokens_key').on(table.user_id, table.tenant_id, table.provider),
    tenantUserProviderIdx: index('idx_user_oauth_tokens_tenant_user_provider').on(
      table.tenant_id,
      table.user_id,
      table.provider
    ),
  })
);

/**
 * tenant_oauth_credentials table
 *
 * Per-tenant upstream OAuth application credentials. client_secret is vault
 * ciphertext.
 */
export const tenant_oauth_credentials = sqliteTable(
  'tenant_oauth_credentials',
  {
    tenant_id: text('tenant_id')
      .notNull()
      .references(() => tenants.id, { onDelete: 'cascade' }),
    provider: text('provider').notNull(),
    client_id: text('client_id').notNull(),
    client_secret: text('client_secret').notNull(),
    redirect_uri: text('redirect_uri'),
    scopes: text('scopes').notNull().default('[]'), // JSON string[]
    configured_by: text('configured_by').notNull(),
    created_at: text('created_at').notNull(),
    updated_at: text('updated_at').notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.tenant_id, table.provider] }),
  })
);

/**
 * provider_connections table
 *
 * Single source of truth for "is user X connected to provider Y".
 */
export const provider_connections = sqliteTable(
  'provider_connections',
  {
    user_id: text('user_id')
      .notNull()
      .references(() => users.id, { onDelete: 'cascade' }),
    tenant_id: text('tenant_id').notNull(),
    provider: text('provider').notNull(),
    connection_type: text('connection_type', { enum: CONNECTION_TYPES }).notNull(),
    metadata: text('metadata'), // JSON object serialized to TEXT
    connected_at: text('connected_at').notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.user_id, table.tenant_id, table.provider] }),
    userIdx: index('idx_provider_connections_user').on(table.user_id),
  })
);

/**
 * admin_tokens table
 *
 * Service tokens for the admin API. Only an Argon2id hash is stored; the
 * 8-character prefix allows O(1) lookup before the hash verification.
 */
export const admin_tokens = sqliteTable(
  'admin_tokens',
  {
    id: text('id').primaryKey().notNull(),
    service_name: text('service_name').notNull(),
    token_prefix: text('token_prefix').notNull(),
    token_hash: text('token_hash').notNull(),
    permissions: text('permissions').notNull().default('[]'), // JSON string[]
    is_super_admin: integer('is_super_admin', { mode: 'boolean' }).notNull().default(false),
    created_at: text('created_at').notNull(),
    expires_at: text('expires_at'),
    last_used_at: text('last_used_at'),
    is_active: integer('is_active', { mode: 'boolean' }).notNull().default(true),
  },
  (table) => ({
    prefixIdx: index('idx_admin_tokens_prefix').on(table.token_prefix),
  })
);

/**
 * system_settings table (key/value)
 */
export const system_settings = sqliteTable('system_settings', {
  key: text('key').primaryKey().notNull(),
  value: text('value').notNull(),
  updated_at: text('updated_at').notNull(),
});

/**
 * tool_overrides table
 *
 * The only mutable part of the tool catalogue.
 */
export const tool_overrides = sqliteTable(
  'tool_overrides',
  {
    tenant_id: text('tenant_id')
      .notNull()
      .references(() => tenants.id, { onDelete: 'cascade' }),
    tool_name: text('tool_name').notNull(),
    is_enabled: integer('is_enabled', { mode: 'boolean' }).notNull(),
    set_by: text('set_by'),
    reason: text('reason'),
    updated_at: text('updated_at').notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.tenant_id, table.tool_name] }),
  })
);

/**
 * audit_log table
 */
export const audit_log = sqliteTable(
  'audit_log',
  {
    id: text('id').primaryKey().notNull(),
    timestamp: text('timestamp').notNull(),
    event_type: text('event_type').notNull(),
    tool_name: text('tool_name').notNull(),
    user_id: text('user_id'),
    tenant_id: text('tenant_id'),
    status_code: integer('status_code').notNull(),
    response_time_ms: integer('response_time_ms').notNull(),
    error_kind: text('error_kind'),
    source_ip: text('source_ip'),
    protocol: text('protocol'),
  },
  (table) => ({
    timestampIdx: index('idx_audit_log_timestamp').on(table.timestamp),
    userIdx: index('idx_audit_log_user').on(table.user_id),
  })
);

/**
 * signing_keys table
 *
 * RS256 key set. The private half is vault ciphertext bound to the kid.
 */
export const signing_keys = sqliteTable('signing_keys', {
  kid: text('kid').primaryKey().notNull(),
  public_key_pem: text('public_key_pem').notNull(),
  private_key_encrypted: text('private_key_encrypted').notNull(),
  created_at: text('created_at').notNull(),
  is_signing: integer('is_signing', { mode: 'boolean' }).notNull().default(false),
  retired_at: text('retired_at'),
});

// ===== Inferred types =====

export type User = typeof users.$inferSelect;
export type NewUser = typeof users.$inferInsert;
export type Tenant = typeof tenants.$inferSelect;
export type NewTenant = typeof tenants.$inferInsert;
export type TenantUser = typeof tenant_users.$inferSelect;
export type OAuthClientRow = typeof oauth_clients.$inferSelect;
export type NewOAuthClientRow = typeof oauth_clients.$inferInsert;
export type OAuthStateRecord = typeof oauth_client_states.$inferSelect;
export type NewOAuthStateRecord = typeof oauth_client_states.$inferInsert;
export type RefreshTokenRow = typeof oauth2_refresh_tokens.$inferSelect;
export type NewRefreshTokenRow = typeof oauth2_refresh_tokens.$inferInsert;
export type UserOAuthTokenRow = typeof user_oauth_tokens.$inferSelect;
export type TenantOAuthCredentialRow = typeof tenant_oauth_credentials.$inferSelect;
export type ProviderConnection = typeof provider_connections.$inferSelect;
export type AdminTokenRow = typeof admin_tokens.$inferSelect;
export type SystemSetting = typeof system_settings.$inferSelect;
export type ToolOverride = typeof tool_overrides.$inferSelect;
export type AuditLogRow = typeof audit_log.$inferSelect;
export type NewAuditLogRow = typeof audit_log.$inferInsert;
export type SigningKeyRow = typeof signing_keys.$inferSelect;
