import { ActionGate } from '../core/action_gate';
import { applyPolicy, resetRateLimits } from '../core/policy/applier';
import { PolicyLoader } from '../core/policy/loader';
import { ActionInProgressError } from '../core/errors';
import { ToolInvocation, ToolPolicy, ToolResult } from '../core/types';
import { promises as fs } from 'fs';
import * as os from 'os';
import * as path from 'path';

function invocation(tool: string, args: Record<string, unknown> = {}): ToolInvocation {
  return { tool, args, meta: { timestamp: Date.now() } };
}

const ok = async (): Promise<ToolResult> => ({ success: true, durationMs: 0 });

describe('ActionGate', () => {
  it('rejects a second action while one is running, then frees up', async () => {
    const gate = new ActionGate();
    let release: () => void = () => undefined;
    const first = gate.run('profile.apply', () => new Promise<string>(resolve => {
      release = () => resolve('done');
    }));

    expect(gate.current).toBe('profile.apply');
    await expect(gate.run('profile.save', async () => 'never')).rejects.toThrow(ActionInProgressError);

    release();
    await expect(first).resolves.toBe('done');
    expect(gate.current).toBeNull();
    await expect(gate.run('profile.save', async () => 'saved')).resolves.toBe('saved');
  });

  it('releases the gate when the action throws', async () => {
    const gate = new ActionGate();

    await expect(gate.run('profile.apply', async () => {
      throw new Error('boom');
    })).rejects.toThrow('boom');
    expect(gate.current).toBeNull();
  });

  it('resolves whenIdle once the running action settles', async () => {
    const gate = new ActionGate();
    let fail: () => void = () => undefined;
    const running = gate.run('profile.apply', () => new Promise<void>((_, reject) => {
      fail = () => reject(new Error('driver hung up'));
    }));
    const idle = gate.whenIdle();

    fail();
    await expect(running).rejects.toThrow('driver hung up');
    await expect(idle).resolves.toBeUndefined();
  });
});

describe('applyPolicy', () => {
  beforeEach(() => resetRateLimits());

  it('runs the tool directly when no policy is configured', async () => {
    const result = await applyPolicy(invocation('display.enumerate'), undefined, new ActionGate(), ok);

    expect(result.success).toBe(true);
  });

  it('validates arguments against the policy schema', async () => {
    const policy: ToolPolicy = {
      toolName: 'profile.get',
      inputValidation: { type: 'object', properties: { name: { type: 'string' } }, required: ['name'] }
    };

    await expect(applyPolicy(invocation('profile.get', {}), policy, new ActionGate(), ok)).rejects.toMatchObject({
      code: 'VALIDATION_ERROR',
      message: 'Invalid arguments for tool "profile.get"'
    });
    await expect(applyPolicy(invocation('profile.get', { name: 'Desk' }), policy, new ActionGate(), ok))
      .resolves.toMatchObject({ success: true });
  });

  it('enforces the rate limit over a one-second window', async () => {
    const policy: ToolPolicy = { toolName: 'display.detect', rateLimits: { maxCallsPerSecond: 1, burstAllowance: 1 } };
    const gate = new ActionGate();

    await applyPolicy(invocation('display.detect'), policy, gate, ok);
    await applyPolicy(invocation('display.detect'), policy, gate, ok);
    await expect(applyPolicy(invocation('display.detect'), policy, gate, ok)).rejects.toMatchObject({
      code: 'RATE_LIMIT_EXCEEDED'
    });
  });

  it('routes exclusive tools through the gate', async () => {
    const policy: ToolPolicy = { toolName: 'profile.apply', exclusive: true };
    const gate = new ActionGate();
    const seen: Array<string | null> = [];

    await applyPolicy(invocation('profile.apply'), policy, gate, async () => {
      seen.push(gate.current);
      return { success: true, durationMs: 0 };
    });

    expect(seen).toEqual(['profile.apply']);
  });
});

describe('PolicyLoader', () => {
  it('loads policy files and skips ones without a tool name', async () => {
    const dir = await fs.mkdtemp(path.join(os.tmpdir(), 'display-policies-'));
    await fs.writeFile(path.join(dir, 'profile.apply.json'), JSON.stringify({ toolName: 'profile.apply', exclusive: true }));
    await fs.writeFile(path.join(dir, 'broken.json'), '{');
    await fs.writeFile(path.join(dir, 'anonymous.json'), JSON.stringify({ exclusive: true }));

    const loader = new PolicyLoader(dir);
    loader.load();

    expect(loader.listToolNames()).toEqual(['profile.apply']);
    expect(loader.get('profile.apply')).toEqual({ toolName: 'profile.apply', exclusive: true });
    await fs.rm(dir, { recursive: true, force: true });
  });

  it('ships an exclusive policy for every tool that changes hardware or the store', () => {
    const loader = new PolicyLoader(path.resolve(__dirname, '..', '..', 'config', 'policies'));
    loader.load();

    for (const tool of ['profile.save', 'profile.apply', 'display.detect', 'profile.import']) {
      expect(loader.get(tool)?.exclusive).toBe(true);
    }
  });
});
