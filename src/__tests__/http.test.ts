import { promises as fs } from 'fs';
import { registry } from '../core/registry';
import { resetRateLimits } from '../core/policy/applier';
import { CallRequest, CallResponse, handleCall, statusFor } from '../transports/http';
import { RuntimeFixture, setupRuntime } from './runtime_fixture';

class FakeResponse implements CallResponse {
  statusCode = 200;
  body: unknown;

  status(code: number): FakeResponse {
    this.statusCode = code;
    return this;
  }

  json(body: unknown): FakeResponse {
    this.body = body;
    return this;
  }
}

function request(body: unknown, correlationId?: string): CallRequest {
  return { body, headers: correlationId ? { 'x-correlation-id': correlationId } : {} };
}

async function post(body: unknown, correlationId?: string): Promise<FakeResponse> {
  const res = new FakeResponse();
  await handleCall(registry, request(body, correlationId), res);
  return res;
}

describe('HTTP transport', () => {
  describe('statusFor', () => {
    it('maps error codes to HTTP statuses', () => {
      expect(statusFor('UNKNOWN_TOOL')).toBe(404);
      expect(statusFor('PROFILE_NOT_FOUND')).toBe(404);
      expect(statusFor('ACTION_IN_PROGRESS')).toBe(409);
      expect(statusFor('PROFILE_EXISTS')).toBe(409);
      expect(statusFor('RATE_LIMIT_EXCEEDED')).toBe(429);
      expect(statusFor('VALIDATION_ERROR')).toBe(400);
    });
  });

  describe('POST /tools/call', () => {
    let fixture: RuntimeFixture;

    beforeEach(async () => {
      resetRateLimits();
      fixture = await setupRuntime();
    });

    afterEach(async () => {
      await fs.rm(fixture.dir, { recursive: true, force: true });
    });

    it('rejects a body that is not a JSON object', async () => {
      for (const body of [undefined, 'profile.list', ['profile.list']]) {
        const res = await post(body);
        expect(res.statusCode).toBe(400);
        expect(res.body).toEqual({ error: 'Request body must be a JSON object' });
      }
    });

    it('rejects a call without a tool name', async () => {
      const res = await post({ arguments: {} });

      expect(res.statusCode).toBe(400);
      expect(res.body).toEqual({ error: 'Provide "name" (or "tool") and optional "arguments"' });
    });

    it('accepts "tool" in place of "name" and echoes the correlation id', async () => {
      const res = await post({ tool: 'profile.list' }, 'req-1');

      expect(res.statusCode).toBe(200);
      expect(res.body).toEqual({
        object: 'tool_call_result',
        type: 'success',
        tool: 'profile.list',
        result: expect.objectContaining({ success: true, data: { profiles: [] } }),
        correlationId: 'req-1'
      });
    });

    it('treats non-object arguments as none', async () => {
      const res = await post({ name: 'display.enumerate', arguments: 'all' });

      expect(res.statusCode).toBe(200);
      expect(res.body).toMatchObject({ type: 'success', tool: 'display.enumerate' });
    });

    it('reports a failed tool inside a 200 envelope', async () => {
      const res = await post({ name: 'profile.get', arguments: { name: 'Nope' } });

      expect(res.statusCode).toBe(200);
      expect(res.body).toMatchObject({
        type: 'failure',
        result: { success: false, error: { code: 'PROFILE_NOT_FOUND' } }
      });
    });

    it('answers an unknown tool with 404', async () => {
      const res = await post({ name: 'display.rotate' }, 'req-2');

      expect(res.statusCode).toBe(404);
      expect(res.body).toEqual({
        object: 'tool_call_result',
        type: 'error',
        error: { code: 'UNKNOWN_TOOL', message: 'Unknown tool: "display.rotate"', details: { toolName: 'display.rotate' } },
        correlationId: 'req-2'
      });
    });

    it('answers arguments the policy rejects with 400', async () => {
      const res = await post({ name: 'profile.delete', arguments: {} });

      expect(res.statusCode).toBe(400);
      expect(res.body).toMatchObject({ type: 'error', error: { code: 'VALIDATION_ERROR' } });
    });
  });
});
