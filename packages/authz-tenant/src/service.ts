/**
 * Tenant Tool-Selection Service
 *
 * Decides which catalogue tools a tenant can use. Precedence, first match wins:
 * 1. global disabled list: configured patterns plus the `disabled_tools`
 *    system setting (a `*` glob disables a family, e.g. `admin_*`)
 * 2. the tenant's override row
 * 3. the catalogue default (enabled)
 *
 * On top of availability, `admin_only` tools are denied to the `user` role.
 * Implements the AuthorizationProvider SPI.
 */

import {
  AuthorizationError,
  SETTING_DISABLED_TOOLS,
  TOOL_IDS,
  ValidationError,
  deleteToolOverride,
  getListSetting,
  getMembership,
  getToolEntry,
  globToRegExp,
  hasCapability,
  isToolId,
  listToolOverrides,
  logger,
  upsertToolOverride,
  type AuthorizationProvider,
  type AuthzDecision,
  type AuthzRequest,
  type DatabaseClient,
  type ProviderHealth,
  type SessionContext,
  type ToolId,
  type ToolOverride,
} from '@pierre/core';
import type { ToolDescriptor, UserRole } from '@pierre/protocol';

export type ToolSelectionSource = 'global_disabled' | 'tenant_override' | 'default';

export interface EffectiveTool {
  name: ToolId;
  enabled: boolean;
  source: ToolSelectionSource;
  reason: string | null;
}

export interface TenantToolSelectionOptions {
  /** Process-wide disabled tool names or globs (PIERRE_DISABLED_TOOLS) */
  disabledTools?: string[];
}

/** Actor changing overrides: a user id with its system role */
export interface OverrideActor {
  user_id: string;
  role: UserRole;
}

export function isRoleAllowed(tool: ToolId, role: UserRole): boolean {
  return role !== 'user' || !hasCapability(getToolEntry(tool), 'admin_only');
}

export class TenantToolSelectionService implements AuthorizationProvider {
  readonly id = 'tenant_tools';
  private readonly configured: RegExp[];

  constructor(
    private readonly db: DatabaseClient,
    options: TenantToolSelectionOptions = {}
  ) {
    this.configured = (options.disabledTools ?? []).map(globToRegExp);
  }

  async initialize(): Promise<void> {
    logger.info({ disabled: this.configured.length }, '[authz-tenant] Provider initialized');
  }

  async healthCheck(): Promise<ProviderHealth> {
    return { status: 'healthy', last_checked: new Date().toISOString() };
  }

  /**
   * Every catalogue tool with its availability for the tenant. Without a
   * tenant only the global list applies.
   */
  async effectiveTools(tenantId: string | undefined): Promise<EffectiveTool[]> {
    const disabled = [...this.configured, ...(await getListSetting(this.db, SETTING_DISABLED_TOOLS)).map(globToRegExp)];
    const overrides = new Map<string, ToolOverride>(
      tenantId ? (await listToolOverrides(this.db, tenantId)).map((o) => [o.tool_name, o]) : []
    );

    return TOOL_IDS.map((name): EffectiveTool => {
      if (disabled.some((pattern) => pattern.test(name))) {
        return { name, enabled: false, source: 'global_disabled', reason: 'Disabled by server configuration' };
      }
      const override = overrides.get(name);
      if (override) {
        return { name, enabled: override.is_enabled, source: 'tenant_override', reason: override.reason };
      }
      return { name, enabled: true, source: 'default', reason: null };
    });
  }

  async isToolEnabled(tenantId: string | undefined, toolName: string): Promise<boolean> {
    const tools = await this.effectiveTools(tenantId);
    return tools.some((tool) => tool.name === toolName && tool.enabled);
  }

  /**
   * @throws ValidationError for an unknown tool
   * @throws AuthorizationError unless the actor administers the tenant
   */
  async setOverride(
    actor: OverrideActor,
    tenantId: string,
    toolName: string,
    enabled: boolean,
    reason: string | null = null
  ): Promise<ToolOverride> {
    if (!isToolId(toolName)) {
      throw new ValidationError(`Unknown tool: ${toolName}`);
    }
    await this.requireTenantAdmin(actor, tenantId);

    const override = await upsertToolOverride(this.db, {
      tenant_id: tenantId,
      tool_name: toolName,
      is_enabled: enabled,
      set_by: actor.user_id,
      reason,
    });
    logger.info({ tenantId, tool: toolName, enabled, actor: actor.user_id }, '[authz-tenant] Tool override set');
    return override;
  }

  /**
   * @returns false when the tenant had no override for the tool
   */
  async removeOverride(actor: OverrideActor, tenantId: string, toolName: string): Promise<boolean> {
    await this.requireTenantAdmin(actor, tenantId);
    const removed = await deleteToolOverride(this.db, tenantId, toolName);
    if (removed) {
      logger.info({ tenantId, tool: toolName, actor: actor.user_id }, '[authz-tenant] Tool override removed');
    }
    return removed;
  }

  async authorize(session: SessionContext, request: AuthzRequest): Promise<AuthzDecision> {
    const { tool_name } = request;
    if (!isToolId(tool_name)) {
      return { decision: 'deny', reason: `Unknown tool: ${tool_name}`, policy_id: 'catalogue' };
    }
    if (!isRoleAllowed(tool_name, session.role)) {
      return { decision: 'deny', reason: `Role ${session.role} may not call ${tool_name}`, policy_id: 'role' };
    }
    if (!(await this.isToolEnabled(session.tenant_id, tool_name))) {
      return { decision: 'deny', reason: `Tool ${tool_name} is disabled for this tenant`, policy_id: 'tenant_selection' };
    }
    return { decision: 'permit', reason: 'Tool enabled for tenant', policy_id: 'tenant_selection' };
  }

  async listAuthorizedTools(session: SessionContext, allTools: ToolDescriptor[]): Promise<ToolDescriptor[]> {
    const enabled = new Set<string>(
      (await this.effectiveTools(session.tenant_id))
        .filter((tool) => tool.enabled && isRoleAllowed(tool.name, session.role))
        .map((tool) => tool.name)
    );
    return allTools.filter((tool) => enabled.has(tool.name));
  }

  private async requireTenantAdmin(actor: OverrideActor, tenantId: string): Promise<void> {
    if (actor.role === 'super_admin') {
      return;
    }
    const membership = await getMembership(this.db, tenantId, actor.user_id);
    if (!membership || membership.role === 'member') {
      throw new AuthorizationError('Only tenant owners and admins can change tool availability');
    }
  }
}
