/**
 * Pierre gateway server - Main exports
 */

export { PierreServer, CLEANUP_INTERVAL_MS } from './server.js';
export type { ServerOptions } from './server.js';

export { AuthorizationServer, computeCodeChallenge } from './services/authorization-server.js';
export { ClientRegistry } from './services/client-registry.js';
export { CallbackError, UpstreamOAuthClient, deepLinkOf } from './services/upstream-oauth-client.js';
export { ToolDispatcher } from './services/tool-dispatcher.js';
export { ProtocolConverter } from './services/protocol-converter.js';
export { McpRequestHandler, SERVER_NAME, SERVER_VERSION } from './services/mcp-handler.js';
export { McpConnection, toJsonRpcNotification } from './services/mcp-connection.js';
export { NotificationBus } from './services/notification-bus.js';
export { CancellationToken, ProgressManager, ProgressReporter } from './services/progress.js';
export { RateLimiter } from './services/rate-limiter.js';
