/**
 * Configuration loader with secrets resolution
 *
 * Sources, lowest precedence first:
 * 1. Schema defaults
 * 2. Optional YAML file, with ${ENV:VAR} and ${file:path} references resolved
 * 3. Environment variables (HOST, PORT, BASE_URL, PIERRE_<PROVIDER>_CLIENT_ID, ...)
 */

import fs from 'fs/promises';
import path from 'path';
import yaml from 'yaml';
import { PROVIDER_NAMES } from '@pierre/protocol';
import { PierreConfigSchema, isCredentialField, type PierreConfig } from './schema.js';
import { logger } from '../utils/logger.js';
import { PierreError } from '../utils/errors.js';

export type { PierreConfig, ProviderCredentialsConfig } from './schema.js';
export { PierreConfigSchema } from './schema.js';

const MAX_CONFIG_BYTES = 1024 * 1024;

export interface ConfigLoadOptions {
  /** YAML file; omitted means environment and defaults only */
  configPath?: string;
  /** Environment to read (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Literal secrets in the YAML file: warn (default) or refuse to start */
  enforcement?: 'warn' | 'block';
}

type RawConfig = Record<string, unknown>;

function isRecord(value: unknown): value is RawConfig {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

/**
 * Environment variable → config path
 */
const ENV_MAPPINGS: ReadonlyArray<readonly [string, readonly string[]]> = [
  ['HOST', ['server', 'host']],
  ['PORT', ['server', 'port']],
  ['BASE_URL', ['server', 'base_url']],
  ['FRONTEND_URL', ['server', 'frontend_url']],
  ['CORS_ORIGINS', ['server', 'cors_origins']],
  ['TRUST_PROXY', ['server', 'trust_proxy']],
  ['DATA_DIR', ['data_dir']],
  ['DATABASE_PATH', ['database', 'path']],
  ['LOG_LEVEL', ['log_level']],
  ['JWT_TOKEN_LIFETIME_SECONDS', ['auth', 'token_lifetime_seconds']],
  ['AUTO_APPROVE_USERS', ['auth', 'auto_approve_users']],
  ['PIERRE_DISABLED_TOOLS', ['tools', 'disabled']],
  ['OAUTH_AUTHORIZE_RPM', ['rate_limits', 'authorize_per_minute']],
  ['OAUTH_TOKEN_RPM', ['rate_limits', 'token_per_minute']],
  ['OAUTH_REGISTER_RPM', ['rate_limits', 'register_per_minute']],
  ['TOOL_CALLS_PER_MINUTE', ['rate_limits', 'tool_calls_per_minute']],
  ['UPSTREAM_TIMEOUT_MS', ['upstream', 'timeout_ms']],
  ['PIERRE_WEBHOOK_SECRET', ['webhooks', 'secret']],
];

/**
 * Load and validate configuration
 *
 * @throws PierreError if the file is unreadable, too large, or invalid
 */
export async function loadConfig(options: ConfigLoadOptions = {}): Promise<PierreConfig> {
  const { configPath, env = process.env, enforcement = 'warn' } = options;

  try {
    let raw: RawConfig = {};
    if (configPath) {
      logger.info(`[config] Loading configuration from ${configPath}`);
      const stats = await fs.stat(configPath);
      if (stats.size > MAX_CONFIG_BYTES) {
        throw new PierreError(`Config file ${configPath} exceeds 1MB size limit`, 'config_too_large');
      }

      const parsed: unknown = yaml.parse(await fs.readFile(configPath, 'utf-8'), {
        maxAliasCount: 50,
        schema: 'core',
        uniqueKeys: true,
      });
      const resolved = await resolveSecrets(parsed ?? {}, env, enforcement, path.dirname(path.resolve(configPath)));
      if (!isRecord(resolved)) {
        throw new PierreError('Config file must contain a mapping at the top level', 'configuration_error');
      }
      raw = resolved;
    }

    applyEnvironment(raw, env);

    const result = PierreConfigSchema.safeParse(raw);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
      throw new PierreError(`Invalid configuration: ${issues.join('; ')}`, 'configuration_error', 'invalid_input', 500, {
        issues,
      });
    }

    logger.info('[config] Configuration loaded successfully');
    return result.data;
  } catch (error) {
    if (error instanceof PierreError) {
      throw error;
    }
    if (error instanceof Error) {
      throw new PierreError(`Failed to load config: ${error.message}`, 'configuration_error');
    }
    throw error;
  }
}

/**
 * Effective SQLite path: explicit database.path, else {data_dir}/pierre.db
 */
export function resolveDatabasePath(config: PierreConfig): string {
  return config.database.path ?? path.join(config.data_dir, 'pierre.db');
}

function setPath(target: RawConfig, keys: readonly string[], value: unknown): void {
  let cursor = target;
  for (const [index, key] of keys.entries()) {
    if (index === keys.length - 1) {
      cursor[key] = value;
      return;
    }
    const next = cursor[key];
    if (isRecord(next)) {
      cursor = next;
    } else {
      const created: RawConfig = {};
      cursor[key] = created;
      cursor = created;
    }
  }
}

function applyEnvironment(raw: RawConfig, env: NodeJS.ProcessEnv): void {
  for (const [name, keys] of ENV_MAPPINGS) {
    const value = env[name];
    if (value !== undefined && value !== '') {
      setPath(raw, keys, value);
    }
  }

  for (const provider of PROVIDER_NAMES) {
    const prefix = `PIERRE_${provider.toUpperCase()}_`;
    const clientId = env[`${prefix}CLIENT_ID`];
    const clientSecret = env[`${prefix}CLIENT_SECRET`];
    if (!clientId || !clientSecret) {
      continue;
    }
    setPath(raw, ['providers', provider, 'client_id'], clientId);
    setPath(raw, ['providers', provider, 'client_secret'], clientSecret);
    const redirectUri = env[`${prefix}REDIRECT_URI`];
    if (redirectUri) {
      setPath(raw, ['providers', provider, 'redirect_uri'], redirectUri);
    }
  }
}

/**
 * Resolve ${ENV:VAR} and ${file:path} references. Credential-looking keys
 * holding literal strings are reported per the enforcement mode.
 */
async function resolveSecrets(
  value: unknown,
  env: NodeJS.ProcessEnv,
  enforcement: 'warn' | 'block',
  baseDir: string
): Promise<unknown> {
  if (typeof value === 'string') {
    const envMatch = /^\$\{ENV:([A-Z_][A-Z0-9_]*)\}$/.exec(value);
    if (envMatch?.[1]) {
      const resolved = env[envMatch[1]];
      if (resolved === undefined) {
        throw new PierreError(`Environment variable ${envMatch[1]} not found`, 'config_resolution_error');
      }
      return resolved;
    }

    const fileMatch = /^\$\{file:(.+)\}$/.exec(value);
    if (fileMatch?.[1]) {
      return resolveFileReference(fileMatch[1], baseDir);
    }
    return value;
  }

  if (Array.isArray(value)) {
    return Promise.all(value.map((item) => resolveSecrets(item, env, enforcement, baseDir)));
  }

  if (isRecord(value)) {
    const resolved: RawConfig = {};
    for (const [key, child] of Object.entries(value)) {
      if (typeof child === 'string' && isCredentialField(key) && !child.startsWith('${')) {
        const message = `Credential field '${key}' contains literal value - use \${ENV:VAR} or \${file:path}`;
        if (enforcement === 'block') {
          throw new PierreError(message, 'literal_secret_detected');
        }
        logger.warn(`[config] ${message}`);
      }
      resolved[key] = await resolveSecrets(child, env, enforcement, baseDir);
    }
    return resolved;
  }

  return value;
}

/**
 * Resolve ${file:path}; relative paths are contained in the config directory
 */
async function resolveFileReference(filePath: string, baseDir: string): Promise<string> {
  const absolutePath = path.isAbsolute(filePath) ? filePath : path.resolve(baseDir, filePath);
  const realPath = await fs.realpath(absolutePath);

  if (!path.isAbsolute(filePath)) {
    const realBase = await fs.realpath(baseDir);
    if (!realPath.startsWith(realBase + path.sep)) {
      throw new PierreError(`Secret file path escapes allowed directory: ${filePath}`, 'path_traversal_blocked');
    }
  }

  const stats = await fs.stat(realPath);
  if (stats.size > MAX_CONFIG_BYTES) {
    throw new PierreError(`Secret file ${realPath} exceeds 1MB`, 'file_too_large');
  }
  if ((stats.mode & 0o077) !== 0) {
    logger.warn(`[config] Secret file ${realPath} is readable by group or others`);
  }
  return (await fs.readFile(realPath, 'utf-8')).trim();
}
