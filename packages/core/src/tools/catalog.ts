/**
 * Tool Catalogue
 *
 * Static list of every tool the gateway exposes. Descriptions, capability
 * flags and parameter schemas live in catalog/tools.json and are validated at
 * load; the set of ids is fixed here so an unknown name can never reach a
 * handler.
 */

import fs from 'fs';
import path from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import type { ToolDescriptor } from '@pierre/protocol';
import type { SchemaProperty, ToolInputSchema } from '../validation/tool-arguments.js';
import { InternalError } from '../utils/errors.js';

export const TOOL_IDS = [
  'get_athlete',
  'get_activities',
  'get_activity',
  'get_stats',
  'get_sleep_sessions',
  'get_recovery_metrics',
  'get_health_metrics',
  'list_providers',
  'get_connection_status',
  'connect_provider',
  'disconnect_provider',
  'admin_list_users',
  'admin_approve_user',
  'admin_suspend_user',
  'admin_delete_user',
  'admin_set_tool_override',
] as const;

export type ToolId = (typeof TOOL_IDS)[number];

export function isToolId(name: string): name is ToolId {
  return TOOL_IDS.some((id) => id === name);
}

export const TOOL_CAPABILITIES = [
  'read_fitness',
  'write_fitness',
  'admin_only',
  'requires_oauth',
  'supports_progress',
] as const;

export type ToolCapability = (typeof TOOL_CAPABILITIES)[number];

/** Bit per capability, for compact masks in logs and listings */
export const CAPABILITY_BITS: Record<ToolCapability, number> = {
  read_fitness: 1 << 0,
  write_fitness: 1 << 1,
  admin_only: 1 << 2,
  requires_oauth: 1 << 3,
  supports_progress: 1 << 4,
};

export interface ToolCatalogEntry {
  id: ToolId;
  description: string;
  capabilities: ToolCapability[];
  input_schema: ToolInputSchema;
}

const SchemaPropertySchema: z.ZodType<SchemaProperty> = z.lazy(() =>
  z.object({
    type: z.union([z.string(), z.array(z.string())]),
    description: z.string().optional(),
    enum: z.array(z.unknown()).optional(),
    items: SchemaPropertySchema.optional(),
    properties: z.record(SchemaPropertySchema).optional(),
    minLength: z.number().optional(),
    maxLength: z.number().optional(),
    minimum: z.number().optional(),
    maximum: z.number().optional(),
    default: z.unknown().optional(),
  })
);

const CatalogFileSchema = z.object({
  tools: z.array(
    z.object({
      name: z.enum(TOOL_IDS),
      description: z.string().min(1),
      capabilities: z.array(z.enum(TOOL_CAPABILITIES)),
      input_schema: z.object({
        type: z.literal('object'),
        properties: z.record(SchemaPropertySchema).optional(),
        required: z.array(z.string()).optional(),
        additionalProperties: z.boolean().optional(),
      }),
    })
  ),
});

const CATALOG_PATH = path.resolve(path.dirname(fileURLToPath(import.meta.url)), '../../catalog/tools.json');

let cached: ReadonlyMap<ToolId, ToolCatalogEntry> | undefined;

/**
 * Load (once) and return the catalogue, keyed by tool id
 *
 * @throws InternalError if the catalogue file is invalid or incomplete
 */
export function getToolCatalog(): ReadonlyMap<ToolId, ToolCatalogEntry> {
  if (cached) {
    return cached;
  }

  const raw: unknown = JSON.parse(fs.readFileSync(CATALOG_PATH, 'utf-8'));
  const parsed = CatalogFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new InternalError('Tool catalogue is invalid', { issues: parsed.error.issues.map((i) => i.message) });
  }

  const entries = new Map<ToolId, ToolCatalogEntry>();
  for (const tool of parsed.data.tools) {
    entries.set(tool.name, {
      id: tool.name,
      description: tool.description,
      capabilities: tool.capabilities,
      input_schema: tool.input_schema,
    });
  }

  const missing = TOOL_IDS.filter((id) => !entries.has(id));
  if (missing.length > 0) {
    throw new InternalError(`Tool catalogue is missing entries: ${missing.join(', ')}`);
  }

  cached = entries;
  return entries;
}

export function getToolEntry(id: ToolId): ToolCatalogEntry {
  const entry = getToolCatalog().get(id);
  if (!entry) {
    throw new InternalError(`Tool catalogue has no entry for ${id}`);
  }
  return entry;
}

export function hasCapability(entry: ToolCatalogEntry, capability: ToolCapability): boolean {
  return entry.capabilities.includes(capability);
}

export function capabilityMask(entry: ToolCatalogEntry): number {
  return entry.capabilities.reduce((mask, capability) => mask | CAPABILITY_BITS[capability], 0);
}

export function toToolDescriptor(entry: ToolCatalogEntry): ToolDescriptor {
  return {
    name: entry.id,
    description: entry.description,
    inputSchema: entry.input_schema,
  };
}
