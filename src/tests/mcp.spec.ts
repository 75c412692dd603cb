import { describe, it, expect } from 'vitest';
import { StdioToolClient, PROTOCOL_VERSION } from '../mcp/client.js';
import { encodeMessage, parseMessage } from '../mcp/jsonrpc.js';
import { JsonRpcError } from '../errors.js';
import { fakeServer, initialize, flush } from './fakes.js';

describe('StdioToolClient', () => {
  it('performs the initialize handshake', async () => {
    const { transport, received } = fakeServer({ initialize });
    const client = new StdioToolClient(transport);

    await client.initialize();
    await flush();

    expect(client.serverName).toBe('mcp-clickhouse');
    expect(received[0]).toMatchObject({
      jsonrpc: '2.0',
      id: 1,
      method: 'initialize',
      params: { protocolVersion: PROTOCOL_VERSION, capabilities: {}, clientInfo: { name: 'consensus-chat', version: '0.1.0' } }
    });
    expect(received[1]).toEqual({ jsonrpc: '2.0', method: 'notifications/initialized' });
  });

  it('skips non-protocol lines on stdout', async () => {
    const { transport, fromServer } = fakeServer({ initialize });
    fromServer.write('Starting ClickHouse MCP server...\n');
    const client = new StdioToolClient(transport);

    await expect(client.initialize()).resolves.toBeUndefined();
  });

  it('lists tools across pages', async () => {
    const { transport } = fakeServer({
      'tools/list': params => params?.cursor === 'page-2'
        ? { result: { tools: [{ name: 'run_select_query', description: 'Run SQL', inputSchema: { type: 'object' } }] } }
        : { result: { tools: [{ name: 'list_databases' }], nextCursor: 'page-2' } }
    });
    const client = new StdioToolClient(transport);

    await expect(client.listTools()).resolves.toEqual([
      { name: 'list_databases', description: '', input_schema: {} },
      { name: 'run_select_query', description: 'Run SQL', input_schema: { type: 'object' } }
    ]);
  });

  it('calls a tool and reports isError', async () => {
    const { transport, received } = fakeServer({
      'tools/call': params => params?.name === 'list_databases'
        ? { result: { content: [{ type: 'text', text: 'default\ngoteth_mainnet' }] } }
        : { result: { content: [{ type: 'text', text: 'boom' }], isError: true } }
    });
    const client = new StdioToolClient(transport);

    await expect(client.callTool('list_databases', {})).resolves.toEqual({
      content: [{ type: 'text', text: 'default\ngoteth_mainnet' }],
      isError: false
    });
    await expect(client.callTool('run_select_query', { query: 'SELECT 1' })).resolves.toEqual({
      content: [{ type: 'text', text: 'boom' }],
      isError: true
    });
    expect(received[1]).toMatchObject({ method: 'tools/call', params: { name: 'run_select_query', arguments: { query: 'SELECT 1' } } });
  });

  it('rejects with JsonRpcError on an error response', async () => {
    const { transport } = fakeServer({
      'tools/call': () => ({ error: { code: -32602, message: 'Unknown tool: nope' } })
    });
    const client = new StdioToolClient(transport);

    const err = await client.callTool('nope', {}).catch(e => e);
    expect(err).toBeInstanceOf(JsonRpcError);
    expect(err.code).toBe(-32602);
    expect(err.message).toBe('tools/call: Unknown tool: nope');
  });

  it('rejects a result with an unexpected shape', async () => {
    const { transport } = fakeServer({ 'tools/list': () => ({ result: { items: [] } }) });
    const client = new StdioToolClient(transport);

    await expect(client.listTools()).rejects.toThrow(/^tools\/list: unexpected result shape \(tools: /);
  });

  it('answers server pings and refuses other server requests', async () => {
    const { transport, received, fromServer } = fakeServer({});
    new StdioToolClient(transport);

    fromServer.write(encodeMessage({ jsonrpc: '2.0', id: 'srv-1', method: 'ping' }));
    fromServer.write(encodeMessage({ jsonrpc: '2.0', id: 'srv-2', method: 'sampling/createMessage', params: {} }));
    await flush();
    await flush();

    expect(received).toEqual([
      { jsonrpc: '2.0', id: 'srv-1', result: {} },
      { jsonrpc: '2.0', id: 'srv-2', error: { code: -32601, message: 'Method not found: sampling/createMessage' } }
    ]);
  });

  it('fails pending requests when the server goes away', async () => {
    const { transport, fromServer } = fakeServer({ 'tools/list': () => undefined });
    const client = new StdioToolClient(transport);

    const pending = client.listTools();
    await flush();
    fromServer.end();

    await expect(pending).rejects.toThrow('tool server closed the connection');
    await expect(client.callTool('list_databases', {})).rejects.toThrow('tool server closed the connection');
  });

  it('closes the transport and refuses further requests', async () => {
    const { transport } = fakeServer({});
    const client = new StdioToolClient(transport);

    await client.close();

    expect(transport.close).toHaveBeenCalledTimes(1);
    await expect(client.listTools()).rejects.toThrow('tool client closed');
  });
});

describe('parseMessage', () => {
  it('ignores lines that are not JSON-RPC 2.0', () => {
    expect(parseMessage('INFO clickhouse connected')).toBeNull();
    expect(parseMessage('{"id": 1, "result": {}}')).toBeNull();
    expect(parseMessage('{"jsonrpc": "2.0", "result": {}}')).toBeNull();
    expect(parseMessage('{not json')).toBeNull();
  });

  it('classifies requests, notifications and responses', () => {
    expect(parseMessage('{"jsonrpc":"2.0","id":7,"method":"ping"}'))
      .toEqual({ kind: 'request', message: { jsonrpc: '2.0', id: 7, method: 'ping', params: undefined } });
    expect(parseMessage('{"jsonrpc":"2.0","method":"notifications/message","params":{"level":"info"}}'))
      .toEqual({ kind: 'notification', message: { jsonrpc: '2.0', method: 'notifications/message', params: { level: 'info' } } });
    expect(parseMessage('{"jsonrpc":"2.0","id":3,"error":{"code":-32600,"message":"bad"}}'))
      .toEqual({ kind: 'response', message: { jsonrpc: '2.0', id: 3, result: undefined, error: { code: -32600, message: 'bad' } } });
  });

  it('encodes one message per line', () => {
    expect(encodeMessage({ jsonrpc: '2.0', id: 1, method: 'tools/list' })).toBe('{"jsonrpc":"2.0","id":1,"method":"tools/list"}\n');
  });
});
