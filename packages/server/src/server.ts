import Fastify, { type FastifyInstance } from 'fastify';
import fastifyCors from '@fastify/cors';
import fastifyCookie from '@fastify/cookie';
import fastifyFormbody from '@fastify/formbody';
import {
  MasterKeyManager,
  MemoryCache,
  TokenStore,
  TokenVault,
  bootstrapAdminToken,
  cleanupRefreshTokens,
  closeDatabase,
  initializeDatabase,
  logger,
  resolveDatabasePath,
  runMigrations,
  type DatabaseClient,
  type PierreConfig,
} from '@pierre/core';
import { CsrfStore, JwtAuthProvider, KeySetManager, TokenService } from '@pierre/authn-jwt';
import { TenantToolSelectionService } from '@pierre/authz-tenant';
import { DatabaseAuditProvider } from '@pierre/audit-db';
import { ProviderRegistry, type ProviderRegistryOptions } from '@pierre/providers';
import { AuthorizationServer } from './services/authorization-server.js';
import { ClientRegistry } from './services/client-registry.js';
import { McpRequestHandler } from './services/mcp-handler.js';
import { NotificationBus } from './services/notification-bus.js';
import { ProgressManager } from './services/progress.js';
import { ProviderAccess } from './services/provider-access.js';
import { RateLimiter } from './services/rate-limiter.js';
import { createToolHandlers } from './services/tool-handlers.js';
import { ToolDispatcher } from './services/tool-dispatcher.js';
import { UpstreamOAuthClient } from './services/upstream-oauth-client.js';
import { registerAdminRoutes } from './routes/admin.js';
import { registerAuthRoutes } from './routes/auth.js';
import { createAuthenticate } from './routes/helpers.js';
import { registerMcpRoutes } from './routes/mcp.js';
import { registerOAuthRoutes } from './routes/oauth.js';
import { registerOAuth2Routes } from './routes/oauth2.js';
import { registerTenantRoutes } from './routes/tenants.js';
import { registerToolRoutes } from './routes/tools.js';
import { registerWebhookRoutes } from './routes/webhooks.js';

/**
 * Pierre gateway server
 *
 * One Fastify instance serving:
 * - the OAuth 2.0 authorization server (/oauth2/*, /.well-known/*)
 * - user, tenant and upstream-connection APIs (/api/*)
 * - tool calls over MCP (/mcp, /ws), REST (/api/tools) and A2A (/a2a/tasks)
 * - the admin API (/admin/*)
 *
 * CORS is deny-by-default; allowed origins come from `server.cors_origins`.
 */

/** Sweep interval for expired states, refresh tokens and rate-limit windows */
export const CLEANUP_INTERVAL_MS = 60_000;

export interface ServerOptions {
  config: PierreConfig;
  /** Vault key; loaded from PIERRE_MASTER_KEY or the data directory when omitted */
  masterKey?: Buffer;
  /** Upstream client factories (tests replace them) */
  providerFactories?: ProviderRegistryOptions['factories'];
  /** Print a first-boot admin token to stdout */
  bootstrapAdmin?: boolean;
}

interface Services {
  db: DatabaseClient;
  audit: DatabaseAuditProvider;
  oauth: UpstreamOAuthClient;
  rateLimiter: RateLimiter;
}

export class PierreServer {
  private fastify: FastifyInstance | null = null;
  private services: Services | null = null;
  private cleanupTimer: NodeJS.Timeout | null = null;
  private readonly config: PierreConfig;

  constructor(private readonly options: ServerOptions) {
    this.config = options.config;
  }

  /**
   * Open the database, build the services and register every route
   */
  async initialize(): Promise<void> {
    const { config } = this;
    logger.info('[server] Initializing Pierre gateway...');

    const fastify = Fastify({
      logger: {
        level: config.log_level,
      },
      bodyLimit: config.server.body_limit_bytes,
    });
    this.fastify = fastify;

    await fastify.register(fastifyCors, {
      origin: config.server.cors_origins.length > 0 ? config.server.cors_origins : false,
      credentials: config.server.cors_origins.length > 0,
    });
    await fastify.register(fastifyCookie);
    await fastify.register(fastifyFormbody);

    fastify.decorateRequest('auth', null);
    fastify.decorateRequest('adminToken', null);

    fastify.addHook('onSend', async (_request, reply, payload) => {
      reply.header('X-Content-Type-Options', 'nosniff');
      reply.header('X-Frame-Options', 'DENY');
      if (!reply.hasHeader('Cache-Control')) {
        reply.header('Cache-Control', 'no-store');
      }
      return payload;
    });

    // ==========================================================================
    // PERSISTENCE & CRYPTO
    // ==========================================================================
    const dbPath = resolveDatabasePath(config);
    logger.info({ dbPath }, '[server] Opening database');
    const db = await initializeDatabase({ sqliteFilePath: dbPath, enableWAL: true });
    await runMigrations(db);

    const masterKey = this.options.masterKey ?? new MasterKeyManager(config.data_dir).loadMasterKey();
    const vault = new TokenVault(masterKey);

    // ==========================================================================
    // AUTHENTICATION
    // ==========================================================================
    const keys = new KeySetManager(db, vault, {
      retentionSeconds: config.auth.key_retention_seconds ?? config.auth.token_lifetime_seconds,
    });
    await keys.initialize({ bootstrap: true });
    const tokens = new TokenService(keys, { lifetimeSeconds: config.auth.token_lifetime_seconds });
    const csrf = new CsrfStore();
    const authn = new JwtAuthProvider(db, tokens, csrf);
    await authn.initialize();
    const authenticate = createAuthenticate(authn, config.server.trust_proxy);

    // ==========================================================================
    // AUTHORIZATION, AUDIT, CACHE
    // ==========================================================================
    const toolSelection = new TenantToolSelectionService(db, { disabledTools: config.tools.disabled });
    await toolSelection.initialize();

    const audit = new DatabaseAuditProvider(db, {
      size: config.audit.buffer_size,
      flush_interval_ms: config.audit.flush_interval_ms,
    });
    await audit.initialize();

    const cache = new MemoryCache({ maxEntries: config.cache.max_entries });

    // ==========================================================================
    // PROVIDERS & TOOLS
    // ==========================================================================
    const registry = new ProviderRegistry({
      timeoutMs: config.upstream.timeout_ms,
      ...(this.options.providerFactories !== undefined && { factories: this.options.providerFactories }),
    });
    const tokenStore = new TokenStore(db, vault);
    const bus = new NotificationBus();
    const progress = new ProgressManager();
    const rateLimiter = new RateLimiter();

    const oauth = new UpstreamOAuthClient({
      db,
      vault,
      tokenStore,
      registry,
      cache,
      bus,
      baseUrl: config.server.base_url,
      providers: config.providers,
      timeoutMs: config.upstream.timeout_ms,
    });
    const providerAccess = new ProviderAccess(db, registry, oauth, cache);

    const dispatcher = new ToolDispatcher({
      authz: toolSelection,
      audit,
      handlers: createToolHandlers({
        db,
        registry,
        oauth,
        providers: providerAccess,
        tokenStore,
        toolSelection,
        cache,
      }),
      progress,
      bus,
      rateLimiter,
      toolCallsPerMinute: config.rate_limits.tool_calls_per_minute,
    });
    const mcpHandler = new McpRequestHandler(dispatcher, progress);

    const clients = new ClientRegistry(db);
    const loginBaseUrl = config.server.frontend_url;
    const authServer = new AuthorizationServer(db, clients, tokens, {
      baseUrl: config.server.base_url,
      ...(loginBaseUrl !== undefined && { loginBaseUrl }),
      refreshTokenLifetimeSeconds: config.auth.refresh_token_lifetime_seconds,
    });

    this.services = { db, audit, oauth, rateLimiter };

    if (this.options.bootstrapAdmin ?? true) {
      await this.bootstrapAdmin(db);
    }

    // ==========================================================================
    // ROUTES
    // ==========================================================================
    const trustProxy = config.server.trust_proxy;
    const secureCookies = config.server.base_url.startsWith('https://');

    fastify.get('/health', async () => {
      return { status: 'ok' };
    });

    await registerOAuth2Routes(fastify, {
      db,
      authServer,
      clients,
      keys,
      tokens,
      authn,
      rateLimiter,
      limits: {
        authorize: config.rate_limits.authorize_per_minute,
        token: config.rate_limits.token_per_minute,
        register: config.rate_limits.register_per_minute,
      },
      trustProxy,
    });
    await registerAuthRoutes(fastify, {
      db,
      tokens,
      csrf,
      cache,
      rateLimiter,
      authenticate,
      autoApproveUsers: config.auth.auto_approve_users,
      loginPerMinute: config.rate_limits.authorize_per_minute,
      secureCookies,
      trustProxy,
    });
    await registerTenantRoutes(fastify, {
      db,
      vault,
      tokens,
      csrf,
      registry,
      toolSelection,
      authenticate,
      secureCookies,
    });
    await registerOAuthRoutes(fastify, {
      oauth,
      registry,
      tokenStore,
      rateLimiter,
      authenticate,
      frontendUrl: config.server.frontend_url,
      trustProxy,
    });
    await registerToolRoutes(fastify, { dispatcher, authenticate, trustProxy });
    await registerMcpRoutes(fastify, {
      handler: mcpHandler,
      bus,
      authn,
      authenticate,
      trustProxy,
      maxPayloadBytes: config.server.body_limit_bytes,
    });
    await registerWebhookRoutes(fastify, { cache, tokenStore, registry, secret: config.webhooks.secret });
    await registerAdminRoutes(fastify, {
      db,
      cache,
      audit,
      keys,
      autoApproveUsers: config.auth.auto_approve_users,
      configuredDisabledTools: config.tools.disabled,
      trustProxy,
    });

    logger.info('[server] Initialization complete');
  }

  /**
   * Start listening and schedule periodic cleanup
   */
  async start(): Promise<void> {
    const fastify = this.getServer();
    await fastify.listen({ host: this.config.server.host, port: this.config.server.port });
    logger.info({ host: this.config.server.host, port: this.config.server.port }, '[server] Listening');

    this.cleanupTimer = setInterval(() => {
      this.runCleanup().catch((err: unknown) => {
        logger.error({ err }, '[server] Periodic cleanup failed');
      });
    }, CLEANUP_INTERVAL_MS);
    this.cleanupTimer.unref();
  }

  /**
   * Sweep expired authorization states, refresh tokens and rate-limit windows
   */
  async runCleanup(now: Date = new Date()): Promise<{ states: number; refreshTokens: number }> {
    const services = this.requireServices();
    const states = await services.oauth.cleanupExpiredStates();
    const refreshTokens = await cleanupRefreshTokens(services.db, now);
    services.rateLimiter.cleanup();
    if (states > 0 || refreshTokens > 0) {
      logger.debug({ states, refreshTokens }, '[server] Cleanup swept expired rows');
    }
    return { states, refreshTokens };
  }

  /**
   * Stop accepting requests, flush the audit buffer and close the database
   */
  async stop(): Promise<void> {
    logger.info('[server] Shutting down...');
    if (this.cleanupTimer) {
      clearInterval(this.cleanupTimer);
      this.cleanupTimer = null;
    }
    if (this.fastify) {
      await this.fastify.close();
      this.fastify = null;
    }
    if (this.services) {
      await this.services.audit.shutdown();
      await closeDatabase(this.services.db);
      this.services = null;
    }
    logger.info('[server] Shutdown complete');
  }

  /**
   * Fastify instance (for inject() in tests)
   */
  getServer(): FastifyInstance {
    if (!this.fastify) {
      throw new Error('Server not initialized - call initialize() first');
    }
    return this.fastify;
  }

  getDatabase(): DatabaseClient {
    return this.requireServices().db;
  }

  private requireServices(): Services {
    if (!this.services) {
      throw new Error('Server not initialized - call initialize() first');
    }
    return this.services;
  }

  /**
   * First boot: create a super-admin service token and show it once
   */
  private async bootstrapAdmin(db: DatabaseClient): Promise<void> {
    const token = await bootstrapAdminToken(db);
    if (!token) {
      logger.debug('[server] Admin token already exists');
      return;
    }
    /* eslint-disable no-console */
    console.log('');
    console.log('======================================================================');
    console.log('           FIRST BOOT - ADMIN TOKEN (shown only once!)');
    console.log('======================================================================');
    console.log(`  Admin Token: ${token}`);
    console.log('');
    console.log('  Send it as "Authorization: Bearer <token>" to /admin/* endpoints.');
    console.log('======================================================================');
    console.log('');
    /* eslint-enable no-console */
  }
}
