import { describe, it, expect } from 'vitest';
import { McpConnection, toJsonRpcNotification } from '../../src/services/mcp-connection.js';
import { McpRequestHandler } from '../../src/services/mcp-handler.js';
import { blockingHandler, createDispatcherHarness, testSession } from './fakes.js';

class FakeSocket {
  readonly sent: unknown[] = [];

  send(data: string): void {
    this.sent.push(JSON.parse(data));
  }
}

function open(options: Parameters<typeof createDispatcherHarness>[0] = {}) {
  const harness = createDispatcherHarness(options);
  const socket = new FakeSocket();
  const handler = new McpRequestHandler(harness.dispatcher, harness.progress);
  const connection = new McpConnection(socket, handler, harness.bus, { session: testSession() });
  return { ...harness, socket, connection };
}

describe('toJsonRpcNotification', () => {
  it('should render OAuth completion', () => {
    expect(
      toJsonRpcNotification({ type: 'oauth_completed', provider: 'strava', success: true, message: 'Connected', user_id: 'user-1' })
    ).toEqual({
      jsonrpc: '2.0',
      method: 'notifications/oauth_completed',
      params: { provider: 'strava', success: true, message: 'Connected' },
    });
  });

  it('should render progress without the optional fields it lacks', () => {
    expect(toJsonRpcNotification({ type: 'progress', token: 'p-1', current: 3, user_id: 'user-1' })).toEqual({
      jsonrpc: '2.0',
      method: 'notifications/progress',
      params: { progressToken: 'p-1', progress: 3 },
    });
  });
});

describe('McpConnection', () => {
  it('should answer a parse error for malformed frames', async () => {
    const { socket, connection } = open();

    await connection.receive('{not json');

    expect(socket.sent).toEqual([{ jsonrpc: '2.0', id: null, error: { code: -32700, message: 'Parse error' } }]);
  });

  it('should write responses but nothing for notifications', async () => {
    const { socket, connection } = open();

    await connection.receive(JSON.stringify({ jsonrpc: '2.0', id: 1, method: 'ping' }));
    await connection.receive(JSON.stringify({ jsonrpc: '2.0', method: 'notifications/initialized' }));

    expect(socket.sent).toEqual([{ jsonrpc: '2.0', id: 1, result: {} }]);
  });

  it("forwards only its own user's events", () => {
    const { socket, bus } = open();

    bus.publish({ type: 'oauth_completed', provider: 'fitbit', success: false, message: 'Denied', user_id: 'user-2' });
    bus.publish({ type: 'progress', token: 'p-9', current: 1, total: 4, user_id: 'user-1' });

    expect(socket.sent).toEqual([
      { jsonrpc: '2.0', method: 'notifications/progress', params: { progressToken: 'p-9', progress: 1, total: 4 } },
    ]);
  });

  it('should unsubscribe and cancel its calls on close', async () => {
    const blocking = blockingHandler();
    const { socket, bus, connection } = open({ handlers: { get_activities: blocking.handler } });

    const pending = connection.receive(
      JSON.stringify({
        jsonrpc: '2.0',
        id: 2,
        method: 'tools/call',
        params: { name: 'get_activities', arguments: { provider: 'strava' } },
      })
    );
    await blocking.started;
    expect(connection.inflightCount).toBe(1);

    connection.close();
    await pending;

    expect(bus.subscriberCount('progress')).toBe(0);
    expect(bus.subscriberCount('oauth_completed')).toBe(0);
    expect(connection.inflightCount).toBe(0);
    // The cancelled call's response is not written to a closed socket
    expect(socket.sent).toEqual([]);
  });
});
