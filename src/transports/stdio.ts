/**
 * transports/stdio.ts
 *
 * JSON-RPC 2.0 over stdin/stdout. The UI shell spawns the server as a
 * child process and talks to it over pipes.
 *
 * Protocol:
 *   Client sends:  { "jsonrpc": "2.0", "id": N, "method": "tools/list" | "tools/call", "params": {...} }
 *   Server sends:  { "jsonrpc": "2.0", "id": N, "result": {...} }
 *                  or { "jsonrpc": "2.0", "id": N, "error": { "code": N, "message": "..." } }
 *
 * Input is newline-delimited JSON (one complete JSON object per line).
 */

import * as readline from 'readline';
import { ToolRegistry } from '../core/registry';
import { generateCorrelationId } from '../core/types';
import { DisplayProfilesError, errorMessage } from '../core/errors';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('transports/stdio');

export interface JsonRpcRequest {
  jsonrpc: string;
  id: number | string;
  method: string;
  params?: Record<string, unknown>;
}

export interface JsonRpcResponse {
  jsonrpc: '2.0';
  id: number | string | null;
  result?: unknown;
  error?: { code: number; message: string; data?: unknown };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function toRequest(value: unknown): JsonRpcRequest | null {
  if (!isRecord(value)) return null;
  const { jsonrpc, id, method, params } = value;
  if (typeof method !== 'string') return null;
  if (typeof id !== 'number' && typeof id !== 'string') return null;
  return {
    jsonrpc: typeof jsonrpc === 'string' ? jsonrpc : '2.0',
    id,
    method,
    params: isRecord(params) ? params : undefined
  };
}

/**
 * Handle one parsed request. Exported so the protocol can be exercised
 * without wiring up real pipes.
 */
export async function handleRpcRequest(registry: ToolRegistry, request: JsonRpcRequest): Promise<JsonRpcResponse> {
  const { id, method, params } = request;

  try {
    switch (method) {
      case 'initialize':
        return {
          jsonrpc: '2.0',
          id,
          result: {
            protocolVersion: '2024-11-05',
            capabilities: { tools: {} },
            serverInfo: { name: 'display-profiles', version: '1.0.0' }
          }
        };

      case 'tools/list':
        return {
          jsonrpc: '2.0',
          id,
          result: {
            tools: registry.list().map(t => ({
              name: t.name,
              description: t.description,
              inputSchema: t.parameters
            }))
          }
        };

      case 'tools/call': {
        const toolName = params?.name ?? params?.tool;
        if (typeof toolName !== 'string' || toolName.length === 0) {
          return { jsonrpc: '2.0', id, error: { code: -32600, message: 'Provide "name" (or "tool") and optional "arguments"' } };
        }
        const rawArgs = params?.arguments;
        const rawCorrelationId = params?.correlationId;
        const toolArgs = isRecord(rawArgs) ? rawArgs : {};
        const correlationId = typeof rawCorrelationId === 'string' ? rawCorrelationId : generateCorrelationId();

        const result = await registry.invoke({
          tool: toolName,
          args: toolArgs,
          meta: { timestamp: Date.now(), correlationId }
        });

        return {
          jsonrpc: '2.0',
          id,
          result: {
            content: [{ type: 'text', text: JSON.stringify(result, null, 2) }],
            isError: !result.success
          }
        };
      }

      case 'ping':
        return { jsonrpc: '2.0', id, result: { pong: true, tools: registry.list().length } };

      default:
        return { jsonrpc: '2.0', id, error: { code: -32601, message: `Unknown method: "${method}"` } };
    }
  } catch (e) {
    const known = e instanceof DisplayProfilesError;
    log.error({ method, error: errorMessage(e) }, 'Stdio handler error');

    return {
      jsonrpc: '2.0',
      id,
      error: {
        code: known ? -32000 : -32603,
        message: errorMessage(e),
        data: known ? { errorCode: e.code, details: e.details } : undefined
      }
    };
  }
}

function sendResponse(response: JsonRpcResponse): void {
  process.stdout.write(JSON.stringify(response) + '\n');
}

export function startStdioTransport(registry: ToolRegistry): readline.Interface {
  log.info('Stdio transport started: listening on stdin');

  const rl = readline.createInterface({
    input: process.stdin,
    terminal: false
  });

  rl.on('line', (line: string) => {
    const trimmed = line.trim();
    if (!trimmed) return;

    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (e) {
      log.warn({ error: errorMessage(e) }, 'Failed to parse JSON-RPC request');
      sendResponse({ jsonrpc: '2.0', id: null, error: { code: -32700, message: 'Parse error' } });
      return;
    }

    const request = toRequest(parsed);
    if (!request) {
      sendResponse({ jsonrpc: '2.0', id: null, error: { code: -32600, message: 'Invalid request' } });
      return;
    }

    handleRpcRequest(registry, request)
      .then(sendResponse)
      .catch((e: unknown) => {
        log.error({ error: errorMessage(e) }, 'Critical error in stdio line handler');
      });
  });

  rl.on('close', () => {
    log.info('Stdin closed: shutting down stdio transport');
    process.exit(0);
  });

  return rl;
}
