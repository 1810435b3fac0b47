import { promises as fs } from 'fs';
import { registry } from '../core/registry';
import { resetRateLimits } from '../core/policy/applier';
import { handleRpcRequest } from '../transports/stdio';
import { RuntimeFixture, setupRuntime } from './runtime_fixture';

describe('stdio JSON-RPC handler', () => {
  let fixture: RuntimeFixture;

  beforeEach(async () => {
    resetRateLimits();
    fixture = await setupRuntime();
  });

  afterEach(async () => {
    await fs.rm(fixture.dir, { recursive: true, force: true });
  });

  it('answers initialize with the server identity', async () => {
    const response = await handleRpcRequest(registry, { jsonrpc: '2.0', id: 1, method: 'initialize' });

    expect(response).toEqual({
      jsonrpc: '2.0',
      id: 1,
      result: {
        protocolVersion: '2024-11-05',
        capabilities: { tools: {} },
        serverInfo: { name: 'display-profiles', version: '1.0.0' }
      }
    });
  });

  it('lists tools with their input schemas', async () => {
    const response = await handleRpcRequest(registry, { jsonrpc: '2.0', id: 'list', method: 'tools/list' });

    expect(response.result).toEqual({
      tools: expect.arrayContaining([
        {
          name: 'profile.delete',
          description: 'Delete a saved profile.',
          inputSchema: {
            type: 'object',
            properties: { name: { type: 'string', description: 'Profile name' } },
            required: ['name']
          }
        }
      ])
    });
  });

  it('calls a tool and wraps the envelope as text content', async () => {
    const response = await handleRpcRequest(registry, {
      jsonrpc: '2.0',
      id: 2,
      method: 'tools/call',
      params: { name: 'profile.list', arguments: {} }
    });

    expect(response.error).toBeUndefined();
    expect(response.result).toEqual({
      content: [{ type: 'text', text: expect.any(String) }],
      isError: false
    });
  });

  it('flags a failed tool result', async () => {
    const response = await handleRpcRequest(registry, {
      jsonrpc: '2.0',
      id: 3,
      method: 'tools/call',
      params: { tool: 'profile.get', arguments: { name: 'Nope' } }
    });

    expect(response.result).toMatchObject({ isError: true });
  });

  it('turns a thrown library error into a -32000 error with its code', async () => {
    const response = await handleRpcRequest(registry, {
      jsonrpc: '2.0',
      id: 4,
      method: 'tools/call',
      params: { name: 'display.rotate' }
    });

    expect(response.error).toEqual({
      code: -32000,
      message: 'Unknown tool: "display.rotate"',
      data: { errorCode: 'UNKNOWN_TOOL', details: { toolName: 'display.rotate' } }
    });
  });

  it('rejects a call without a tool name', async () => {
    const response = await handleRpcRequest(registry, { jsonrpc: '2.0', id: 5, method: 'tools/call', params: {} });

    expect(response.error?.code).toBe(-32600);
  });

  it('rejects unknown methods', async () => {
    const response = await handleRpcRequest(registry, { jsonrpc: '2.0', id: 6, method: 'resources/list' });

    expect(response.error).toEqual({ code: -32601, message: 'Unknown method: "resources/list"' });
  });

  it('answers ping with the tool count', async () => {
    const response = await handleRpcRequest(registry, { jsonrpc: '2.0', id: 7, method: 'ping' });

    expect(response.result).toEqual({ pong: true, tools: 13 });
  });
});
