/**
 * transports/http.ts
 *
 * HTTP transport. Each request is synchronous: receive → dispatch → respond.
 *
 * Routes:
 *   GET  /tools/list    → Returns all registered tool schemas
 *   POST /tools/call    → Executes a single tool invocation
 *   GET  /health        → Liveness check
 */

import express, { Request, Response, NextFunction } from 'express';
import { ToolRegistry } from '../core/registry';
import { generateCorrelationId } from '../core/types';
import { DisplayProfilesError, errorMessage } from '../core/errors';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('transports/http');

/** Applying a profile can take several seconds per display on real hardware. */
const REQUEST_TIMEOUT_MS = 110_000;

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** The parts of an express request and response a tool call touches. */
export interface CallRequest {
  body: unknown;
  headers: NodeJS.Dict<string | string[]>;
}

export interface CallResponse {
  status(code: number): CallResponse;
  json(body: unknown): unknown;
}

/** HTTP status for an error code a tool call raised. */
export function statusFor(code: string): number {
  switch (code) {
    case 'UNKNOWN_TOOL':
    case 'PROFILE_NOT_FOUND':
      return 404;
    case 'ACTION_IN_PROGRESS':
    case 'PROFILE_EXISTS':
      return 409;
    case 'RATE_LIMIT_EXCEEDED':
      return 429;
    default:
      return 400;
  }
}

export async function handleCall(registry: ToolRegistry, req: CallRequest, res: CallResponse): Promise<void> {
  const body: unknown = req.body;
  const header = req.headers['x-correlation-id'];
  const correlationId = typeof header === 'string' ? header : generateCorrelationId();

  if (!isRecord(body)) {
    res.status(400).json({ error: 'Request body must be a JSON object' });
    return;
  }

  const toolName = body.name ?? body.tool;
  if (typeof toolName !== 'string' || toolName.length === 0) {
    res.status(400).json({ error: 'Provide "name" (or "tool") and optional "arguments"' });
    return;
  }
  const args = isRecord(body.arguments) ? body.arguments : {};

  try {
    const result = await registry.invoke({
      tool: toolName,
      args,
      meta: { timestamp: Date.now(), correlationId }
    });

    res.json({
      object: 'tool_call_result',
      type: result.success ? 'success' : 'failure',
      tool: toolName,
      result,
      correlationId
    });
  } catch (e) {
    const known = e instanceof DisplayProfilesError;
    log.error({ correlationId, error: errorMessage(e) }, 'Tool call failed');

    res.status(known ? statusFor(e.code) : 500).json({
      object: 'tool_call_result',
      type: 'error',
      error: {
        code: known ? e.code : 'INTERNAL_ERROR',
        message: errorMessage(e),
        details: known ? e.details : undefined
      },
      correlationId
    });
  }
}

export function createHttpTransport(registry: ToolRegistry): express.Application {
  const app = express();
  app.use(express.json());

  app.use((req: Request, res: Response, next: NextFunction) => {
    req.setTimeout(REQUEST_TIMEOUT_MS);
    res.setTimeout(REQUEST_TIMEOUT_MS, () => {
      log.warn({ path: req.path }, 'Request timeout');
      if (!res.headersSent) {
        res.status(503).json({
          error: 'Request timeout',
          message: 'The request took too long to complete'
        });
      }
    });
    next();
  });

  // -----------------------------------------------------------------------
  // GET /tools/list
  // -----------------------------------------------------------------------
  app.get('/tools/list', (_req: Request, res: Response) => {
    res.json({
      object: 'list',
      data: registry.list().map(t => ({ type: 'function', function: t }))
    });
  });

  // -----------------------------------------------------------------------
  // POST /tools/call
  // -----------------------------------------------------------------------
  app.post('/tools/call', (req: Request, res: Response, next: NextFunction) => {
    handleCall(registry, req, res).catch(next);
  });

  // -----------------------------------------------------------------------
  // GET /health
  // -----------------------------------------------------------------------
  app.get('/health', (_req: Request, res: Response) => {
    res.json({ status: 'ok', tools: registry.list().length });
  });

  // -----------------------------------------------------------------------
  // Error handler
  // -----------------------------------------------------------------------
  app.use((err: Error, req: Request, res: Response, _next: NextFunction) => {
    log.error({ error: err.message, path: req.path, method: req.method }, 'Unhandled error in HTTP transport');

    if (!res.headersSent) {
      res.status(500).json({ error: 'Internal server error', message: err.message });
    }
  });

  return app;
}
