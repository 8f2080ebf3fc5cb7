/**
 * MCP Routes
 *
 * - POST /mcp - one JSON-RPC message per request (202 for notifications)
 * - GET  /ws  - WebSocket MCP session with server-pushed notifications
 */

import type { IncomingMessage } from 'http';
import type { Duplex } from 'stream';
import type { FastifyInstance, preHandlerAsyncHookHandler } from 'fastify';
import { WebSocketServer, type RawData, type WebSocket } from 'ws';
import { logger, type AuthenticationProvider } from '@pierre/core';
import type { McpRequestHandler } from '../services/mcp-handler.js';
import { McpConnection } from '../services/mcp-connection.js';
import type { NotificationBus } from '../services/notification-bus.js';
import { getSourceIp, requireUser, sendError, type UserSession } from './helpers.js';

export const WS_PATH = '/ws';

export interface McpRoutesConfig {
  handler: McpRequestHandler;
  bus: NotificationBus;
  authn: AuthenticationProvider;
  authenticate: preHandlerAsyncHookHandler;
  trustProxy: boolean;
  maxPayloadBytes: number;
}

function frameText(data: RawData): string {
  if (Buffer.isBuffer(data)) {
    return data.toString('utf8');
  }
  if (Array.isArray(data)) {
    return Buffer.concat(data).toString('utf8');
  }
  return Buffer.from(data).toString('utf8');
}

function rejectUpgrade(socket: Duplex, status: number, reason: string): void {
  socket.write(`HTTP/1.1 ${status} ${reason}\r\nConnection: close\r\nContent-Length: 0\r\n\r\n`);
  socket.destroy();
}

function upgradeSourceIp(request: IncomingMessage, trustProxy: boolean): string {
  const forwarded = request.headers['x-forwarded-for'];
  const first = (Array.isArray(forwarded) ? forwarded[0] : forwarded)?.split(',')[0]?.trim();
  return trustProxy && first ? first : request.socket.remoteAddress ?? '0.0.0.0';
}

export async function registerMcpRoutes(fastify: FastifyInstance, config: McpRoutesConfig): Promise<void> {
  const { handler, bus, authn, authenticate, trustProxy } = config;

  // ==========================================================================
  // POST /mcp
  // ==========================================================================
  fastify.post('/mcp', { preHandler: authenticate }, async (request, reply) => {
    try {
      const session = requireUser(request);
      const response = await handler.handle(request.body, { session, sourceIp: getSourceIp(request, trustProxy) });
      if (!response) {
        return reply.status(202).send();
      }
      return reply.send(response);
    } catch (err) {
      return sendError(reply, err);
    }
  });

  // ==========================================================================
  // GET /ws
  // ==========================================================================
  fastify.get(WS_PATH, async (_request, reply) => {
    return reply.status(426).header('Upgrade', 'websocket').send({ error: 'upgrade_required' });
  });

  const wss = new WebSocketServer({ noServer: true, maxPayload: config.maxPayloadBytes });

  const authenticateUpgrade = async (request: IncomingMessage): Promise<UserSession | null> => {
    const headers: Record<string, string | undefined> = {};
    for (const [key, value] of Object.entries(request.headers)) {
      headers[key.toLowerCase()] = Array.isArray(value) ? value[0] : value;
    }
    const result = await authn.authenticate({
      headers,
      cookies: headers['cookie'] ? fastify.parseCookie(headers['cookie']) : {},
      method: 'GET',
      sourceIp: upgradeSourceIp(request, trustProxy),
    });
    const userId = result.session?.user_id;
    return result.success && result.session && userId ? { ...result.session, user_id: userId } : null;
  };

  const accept = (ws: WebSocket, session: UserSession, sourceIp: string) => {
    const connection = new McpConnection(ws, handler, bus, { session, sourceIp });
    logger.info({ userId: session.user_id }, '[ws] Connection opened');

    ws.on('message', (data) => {
      connection.receive(frameText(data)).catch((err: unknown) => {
        logger.error({ err, userId: session.user_id }, '[ws] Failed to handle message');
      });
    });
    ws.on('close', () => connection.close());
    ws.on('error', (err) => {
      logger.warn({ err, userId: session.user_id }, '[ws] Socket error');
      connection.close();
    });
  };

  fastify.server.on('upgrade', (request: IncomingMessage, socket: Duplex, head: Buffer) => {
    const pathname = new URL(request.url ?? '/', 'http://localhost').pathname;
    if (pathname !== WS_PATH) {
      rejectUpgrade(socket, 404, 'Not Found');
      return;
    }

    authenticateUpgrade(request)
      .then((session) => {
        if (!session) {
          rejectUpgrade(socket, 401, 'Unauthorized');
          return;
        }
        wss.handleUpgrade(request, socket, head, (ws) => accept(ws, session, upgradeSourceIp(request, trustProxy)));
      })
      .catch((err: unknown) => {
        logger.error({ err }, '[ws] Upgrade failed');
        rejectUpgrade(socket, 500, 'Internal Server Error');
      });
  });

  fastify.addHook('onClose', async () => {
    for (const client of wss.clients) {
      client.terminate();
    }
    await new Promise<void>((resolve) => wss.close(() => resolve()));
  });
}
