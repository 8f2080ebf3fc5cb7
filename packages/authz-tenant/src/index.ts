/**
 * @pierre/authz-tenant
 *
 * Tenant Tool-Selection Service: which catalogue tools a session may call.
 */

export {
  TenantToolSelectionService,
  isRoleAllowed,
  type EffectiveTool,
  type ToolSelectionSource,
  type TenantToolSelectionOptions,
  type OverrideActor,
} from './service.js';
