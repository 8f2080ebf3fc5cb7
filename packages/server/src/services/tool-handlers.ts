/**
 * Tool Handlers
 *
 * One handler per catalogue tool. Arguments have already been validated
 * against the tool's schema by the dispatcher; handlers only narrow them.
 */

import {
  InvalidFormatError,
  NotFoundError,
  ValidationError,
  approveUser,
  deleteUser,
  listUsers,
  logger,
  suspendUser,
  userPattern,
  USER_STATUSES,
  type CacheProvider,
  type DatabaseClient,
  type ToolId,
  type TokenStore,
  type UserStatus,
} from '@pierre/core';
import type { TenantToolSelectionService } from '@pierre/authz-tenant';
import type { ProviderRegistry, DateRange } from '@pierre/providers';
import { isCachePolicy, type CachePolicy } from '@pierre/providers';
import type { UserRole } from '@pierre/protocol';
import type { CancellationToken, ProgressReporter } from './progress.js';
import type { ProviderAccess } from './provider-access.js';
import type { UpstreamOAuthClient } from './upstream-oauth-client.js';
import { toPublicUser } from './user-view.js';

export interface ToolContext {
  userId: string;
  /** Active tenant of the caller */
  tenantId: string | undefined;
  role: UserRole;
  cancellation: CancellationToken;
  /** Present when the caller asked for progress notifications */
  progress: ProgressReporter | null;
}

export type ToolArguments = Record<string, unknown>;

export type ToolHandler = (args: ToolArguments, ctx: ToolContext) => Promise<unknown>;

export interface ToolServices {
  db: DatabaseClient;
  registry: ProviderRegistry;
  oauth: UpstreamOAuthClient;
  providers: ProviderAccess;
  tokenStore: TokenStore;
  toolSelection: TenantToolSelectionService;
  cache: CacheProvider;
}

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

// ===== Argument narrowing =====

function requireString(args: ToolArguments, name: string): string {
  const value = args[name];
  if (typeof value !== 'string' || value.length === 0) {
    throw new ValidationError(`Missing required argument: ${name}`);
  }
  return value;
}

function optionalString(args: ToolArguments, name: string): string | undefined {
  const value = args[name];
  return typeof value === 'string' ? value : undefined;
}

function optionalNumber(args: ToolArguments, name: string): number | undefined {
  const value = args[name];
  return typeof value === 'number' ? value : undefined;
}

function cachePolicy(args: ToolArguments): CachePolicy {
  const value = args.cache_policy;
  return isCachePolicy(value) ? value : 'use_cache';
}

function requireTenant(ctx: ToolContext): string {
  if (!ctx.tenantId) {
    throw new ValidationError('No active tenant. Create or join a tenant first.');
  }
  return ctx.tenantId;
}

function parseDate(value: string, name: string): Date {
  const date = new Date(`${value}T00:00:00.000Z`);
  if (!DATE_PATTERN.test(value) || Number.isNaN(date.getTime()) || date.toISOString().slice(0, 10) !== value) {
    throw new InvalidFormatError(`${name} must be a date in YYYY-MM-DD format`);
  }
  return date;
}

function dateRange(args: ToolArguments): DateRange {
  const start = parseDate(requireString(args, 'start_date'), 'start_date');
  const end = parseDate(requireString(args, 'end_date'), 'end_date');
  if (end < start) {
    throw new ValidationError('end_date must not be before start_date');
  }
  return { start, end };
}

function isUserStatus(value: string): value is UserStatus {
  return USER_STATUSES.some((status) => status === value);
}

// ===== Handlers =====

export function createToolHandlers(services: ToolServices): Record<ToolId, ToolHandler> {
  const { db, registry, oauth, providers, tokenStore, toolSelection, cache } = services;

  const providerFor = async (args: ToolArguments, ctx: ToolContext) => {
    const provider = await providers.forUser(ctx.userId, requireTenant(ctx), requireString(args, 'provider'));
    ctx.cancellation.throwIfCancelled();
    return provider;
  };

  return {
    get_athlete: async (args, ctx) => (await providerFor(args, ctx)).getAthlete(cachePolicy(args)),

    get_activities: async (args, ctx) => {
      ctx.progress?.report(0, 2, 'Resolving provider connection');
      const provider = await providerFor(args, ctx);
      ctx.progress?.report(1, 2, 'Fetching activities');
      const activities = await provider.getActivities(
        {
          limit: optionalNumber(args, 'limit'),
          offset: optionalNumber(args, 'offset'),
          before: optionalNumber(args, 'before'),
          after: optionalNumber(args, 'after'),
        },
        cachePolicy(args)
      );
      ctx.cancellation.throwIfCancelled();
      ctx.progress?.report(2, 2, `Fetched ${activities.length} activities`);
      return { provider: provider.name, count: activities.length, activities };
    },

    get_activity: async (args, ctx) =>
      (await providerFor(args, ctx)).getActivity(requireString(args, 'activity_id'), cachePolicy(args)),

    get_stats: async (args, ctx) => (await providerFor(args, ctx)).getStats(cachePolicy(args)),

    get_sleep_sessions: async (args, ctx) => {
      const range = dateRange(args);
      return (await providerFor(args, ctx)).getSleepSessions(range);
    },

    get_recovery_metrics: async (args, ctx) => {
      const range = dateRange(args);
      return (await providerFor(args, ctx)).getRecoveryMetrics(range);
    },

    get_health_metrics: async (args, ctx) => {
      const range = dateRange(args);
      return (await providerFor(args, ctx)).getHealthMetrics(range);
    },

    list_providers: async (_args, ctx) => {
      const connected = new Set(
        ctx.tenantId ? (await tokenStore.listConnections(ctx.userId, ctx.tenantId)).map((c) => c.provider) : []
      );
      return registry.listProviders().map((descriptor) => ({
        name: descriptor.name,
        display_name: descriptor.displayName,
        capabilities: descriptor.capabilities,
        oauth: descriptor.oauth !== null,
        connected: connected.has(descriptor.name),
      }));
    },

    get_connection_status: async (args, ctx) => {
      const provider = optionalString(args, 'provider');
      if (provider !== undefined) {
        const descriptor = registry.getDescriptor(provider);
        const tenantId = requireTenant(ctx);
        return {
          provider: descriptor.name,
          connected: await tokenStore.isConnected({ user_id: ctx.userId, tenant_id: tenantId, provider: descriptor.name }),
        };
      }
      // Without a provider: every tenant the user has connected under
      const connections = await tokenStore.listConnections(ctx.userId);
      return connections.map((connection) => ({
        provider: connection.provider,
        tenant_id: connection.tenant_id,
        connection_type: connection.connection_type,
        connected_at: connection.connected_at,
      }));
    },

    connect_provider: async (args, ctx) => {
      const mobileRedirectUrl = optionalString(args, 'mobile_redirect_url');
      const result = await oauth.buildAuthorizationUrl(
        ctx.userId,
        requireTenant(ctx),
        requireString(args, 'provider'),
        mobileRedirectUrl !== undefined ? { mobileRedirectUrl } : {}
      );
      return {
        provider: requireString(args, 'provider'),
        authorization_url: result.authorizationUrl,
        expires_at: result.expiresAt,
      };
    },

    disconnect_provider: async (args, ctx) => {
      const provider = requireString(args, 'provider');
      const disconnected = await oauth.disconnect(ctx.userId, requireTenant(ctx), provider);
      return { provider, disconnected };
    },

    admin_list_users: async (args) => {
      const status = optionalString(args, 'status');
      const users = await listUsers(db, status !== undefined && isUserStatus(status) ? { status } : {});
      return users.map(toPublicUser);
    },

    admin_approve_user: async (args, ctx) => toPublicUser(await approveUser(db, requireString(args, 'user_id'), ctx.userId)),

    admin_suspend_user: async (args, ctx) => {
      const userId = requireString(args, 'user_id');
      if (userId === ctx.userId) {
        throw new ValidationError('Cannot suspend your own account');
      }
      return toPublicUser(await suspendUser(db, userId));
    },

    admin_delete_user: async (args, ctx) => {
      const userId = requireString(args, 'user_id');
      if (userId === ctx.userId) {
        throw new ValidationError('Cannot delete your own account');
      }
      if (!(await deleteUser(db, userId))) {
        throw new NotFoundError(`User not found: ${userId}`);
      }
      const evicted = await cache.invalidatePattern(userPattern('*', userId));
      logger.info({ userId, evicted, actor: ctx.userId }, '[tools] User deleted');
      return { user_id: userId, deleted: true };
    },

    admin_set_tool_override: async (args, ctx) => {
      const enabled = args.enabled;
      if (typeof enabled !== 'boolean') {
        throw new ValidationError('Missing required argument: enabled');
      }
      return toolSelection.setOverride(
        { user_id: ctx.userId, role: ctx.role },
        requireTenant(ctx),
        requireString(args, 'tool_name'),
        enabled,
        optionalString(args, 'reason') ?? null
      );
    },
  };
}
