/**
 * REST and A2A tool routes
 *
 * - GET  /api/tools        - tools the caller may use in the active tenant
 * - POST /api/tools/:tool  - call a tool; the body is its argument object
 * - POST /a2a/tasks        - call a tool as an A2A task
 */

import type { FastifyInstance, preHandlerAsyncHookHandler } from 'fastify';
import { z } from 'zod';
import { v4 as uuidv4 } from 'uuid';
import type { ProtocolKind } from '@pierre/protocol';
import { ProtocolConverter } from '../services/protocol-converter.js';
import type { ToolDispatcher } from '../services/tool-dispatcher.js';
import { getSourceIp, requireUser, sendError } from './helpers.js';
import { wrapSuccess } from './reply-envelope.js';

export interface ToolRoutesConfig {
  dispatcher: ToolDispatcher;
  authenticate: preHandlerAsyncHookHandler;
  trustProxy: boolean;
}

const toolParams = z.object({ tool: z.string().min(1).max(128) });
const toolArguments = z.record(z.unknown()).default({});

const a2aTaskSchema = z.object({
  id: z.string().min(1).max(128).optional(),
  tool_name: z.string().min(1).max(128),
  parameters: z.record(z.unknown()).default({}),
});

export async function registerToolRoutes(fastify: FastifyInstance, config: ToolRoutesConfig): Promise<void> {
  const { dispatcher, authenticate, trustProxy } = config;

  fastify.get('/api/tools', { preHandler: authenticate }, async (request, reply) => {
    try {
      const session = requireUser(request);
      const tools = await dispatcher.listTools(session);
      return reply.send(wrapSuccess(tools, { count: tools.length }));
    } catch (err) {
      return sendError(reply, err);
    }
  });

  fastify.post('/api/tools/:tool', { preHandler: authenticate }, async (request, reply) => {
    try {
      const session = requireUser(request);
      const { tool } = toolParams.parse(request.params);
      const parameters = toolArguments.parse(request.body ?? undefined);

      const response = await dispatcher.dispatch(
        {
          tool_name: tool,
          parameters,
          user_id: session.user_id,
          protocol: 'rest' satisfies ProtocolKind,
          ...(session.tenant_id !== undefined && { tenant_id: session.tenant_id }),
        },
        session,
        { sourceIp: getSourceIp(request, trustProxy) }
      );

      const rest = ProtocolConverter.toRest(response);
      const retryAfter = response.metadata?.retry_after;
      if (typeof retryAfter === 'number') {
        reply.header('Retry-After', String(retryAfter));
      }
      return reply.status(rest.statusCode).send(rest.body);
    } catch (err) {
      return sendError(reply, err);
    }
  });

  fastify.post('/a2a/tasks', { preHandler: authenticate }, async (request, reply) => {
    try {
      const session = requireUser(request);
      const task = a2aTaskSchema.parse(request.body);
      const taskId = task.id ?? uuidv4();

      const response = await dispatcher.dispatch(
        {
          tool_name: task.tool_name,
          parameters: task.parameters,
          user_id: session.user_id,
          protocol: 'a2a',
          ...(session.tenant_id !== undefined && { tenant_id: session.tenant_id }),
        },
        session,
        { sourceIp: getSourceIp(request, trustProxy), cancellationKey: `a2a:${taskId}` }
      );
      return reply.send(ProtocolConverter.toA2A(taskId, task.tool_name, response));
    } catch (err) {
      return sendError(reply, err);
    }
  });
}
