import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { bearer, signUp, startTestServer, type TestServerHandle, type TestUser } from '../helpers.js';

describe('POST /mcp', () => {
  let handle: TestServerHandle;
  let user: TestUser;

  beforeEach(async () => {
    handle = await startTestServer();
    user = await signUp(handle.fastify);
  });

  afterEach(async () => {
    await handle.stop();
  });

  const rpc = (payload: Record<string, unknown>, headers: Record<string, string> = bearer(user)) =>
    handle.fastify.inject({ method: 'POST', url: '/mcp', headers, payload });

  it('should require authentication', async () => {
    const response = await rpc({ jsonrpc: '2.0', id: 1, method: 'ping' }, {});

    expect(response.statusCode).toBe(401);
  });

  it('should initialize a session', async () => {
    const response = await rpc({ jsonrpc: '2.0', id: 1, method: 'initialize', params: {} });

    expect(response.json()).toMatchObject({
      jsonrpc: '2.0',
      id: 1,
      result: { serverInfo: { name: 'pierre' }, capabilities: { tools: { listChanged: false } } },
    });
  });

  it('should accept notifications with 202', async () => {
    const response = await rpc({ jsonrpc: '2.0', method: 'notifications/initialized' });

    expect(response.statusCode).toBe(202);
    expect(response.body).toBe('');
  });

  it('should list tools with their input schemas', async () => {
    const response = await rpc({ jsonrpc: '2.0', id: 2, method: 'tools/list' });

    const tools = response.json<{ result: { tools: Array<{ name: string; inputSchema: { type: string } }> } }>().result.tools;
    expect(tools).toHaveLength(11);
    expect(tools.find((t) => t.name === 'get_activities')?.inputSchema.type).toBe('object');
  });

  it('should call a tool', async () => {
    const response = await rpc({
      jsonrpc: '2.0',
      id: 3,
      method: 'tools/call',
      params: { name: 'get_connection_status', arguments: {} },
    });

    expect(response.json()).toEqual({
      jsonrpc: '2.0',
      id: 3,
      result: { content: [{ type: 'text', text: '[]' }], structuredContent: { result: [] }, isError: false },
    });
  });

  it('should report argument errors as invalid params', async () => {
    const response = await rpc({
      jsonrpc: '2.0',
      id: 4,
      method: 'tools/call',
      params: { name: 'get_activities', arguments: { provider: 'strava', limit: 500 } },
    });

    expect(response.json()).toMatchObject({ id: 4, error: { code: -32602, data: { error_kind: 'invalid_input' } } });
  });
});
