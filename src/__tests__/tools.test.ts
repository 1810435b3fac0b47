import { promises as fs } from 'fs';
import * as path from 'path';
import { registry } from '../core/registry';
import { resetRateLimits } from '../core/policy/applier';
import { D1, D2 } from './helpers';
import { RuntimeFixture, call, setupRuntime } from './runtime_fixture';

describe('tool surface', () => {
  let fixture: RuntimeFixture;

  beforeEach(async () => {
    resetRateLimits();
    fixture = await setupRuntime();
  });

  afterEach(async () => {
    await fs.rm(fixture.dir, { recursive: true, force: true });
  });

  it('registers every display and profile tool', () => {
    expect(registry.listToolNames().sort()).toEqual([
      'display.detect',
      'display.enumerate',
      'profile.apply',
      'profile.delete',
      'profile.export',
      'profile.get',
      'profile.import',
      'profile.list',
      'profile.move',
      'profile.plan',
      'profile.rename',
      'profile.save',
      'profile.validate'
    ]);
  });

  it('enumerates the live displays', async () => {
    const result = await call('display.enumerate');

    expect(result.success).toBe(true);
    expect(result.data).toEqual({
      displays: [
        expect.objectContaining({ identity: { devicePath: D1, ordinal: 0 }, isPrimary: true }),
        expect.objectContaining({ identity: { devicePath: D2, ordinal: 1 }, isPrimary: false })
      ]
    });
  });

  it('saves and lists profiles', async () => {
    expect((await call('profile.save', { name: 'Dual' })).success).toBe(true);
    expect((await call('profile.save', { name: 'Single', enabledOverrides: { [D2]: false } })).success).toBe(true);

    const list = await call('profile.list');

    expect(list.data).toEqual({
      profiles: [
        { name: 'Dual', displays: 2, enabled: 2, updatedAt: expect.any(String) },
        { name: 'Single', displays: 2, enabled: 1, updatedAt: expect.any(String) }
      ]
    });
  });

  it('rejects arguments the policy schema does not allow', async () => {
    await expect(call('profile.save', { name: 'Dual', colour: 'blue' })).rejects.toMatchObject({
      code: 'VALIDATION_ERROR'
    });
    await expect(call('profile.move', { fromIndex: -1, toIndex: 0 })).rejects.toMatchObject({
      code: 'VALIDATION_ERROR'
    });
  });

  it('reports an unknown profile in the result envelope', async () => {
    const result = await call('profile.apply', { name: 'Nope' });

    expect(result.success).toBe(false);
    expect(result.error).toEqual({
      code: 'PROFILE_NOT_FOUND',
      message: 'Profile not found: "Nope"',
      details: { name: 'Nope' }
    });
  });

  it('rejects an unknown tool', async () => {
    await expect(call('display.rotate')).rejects.toMatchObject({ code: 'UNKNOWN_TOOL' });
  });

  it('plans and applies a profile', async () => {
    await call('profile.save', { name: 'Single', enabledOverrides: { [D2]: false } });

    const plan = await call('profile.plan', { name: 'Single' });
    expect(plan.data).toEqual({
      plan: expect.objectContaining({
        operations: [{ kind: 'disable', identity: { devicePath: D2, ordinal: 1 } }]
      })
    });

    const applied = await call('profile.apply', { name: 'Single' });
    expect(applied.success).toBe(true);
    expect(applied.error).toBeUndefined();
    expect(fixture.backend.snapshot()[1].attached).toBe(false);
  });

  it('reports window handling with the apply unless it is turned off', async () => {
    await call('profile.save', { name: 'Single', enabledOverrides: { [D2]: false } });
    await call('profile.save', { name: 'Dual' });

    const single = await call('profile.apply', { name: 'Single' });
    expect(single.data).toMatchObject({ windows: { saved: 0, moved: 0, restored: 0 } });

    const dual = await call('profile.apply', { name: 'Dual', manageWindows: false });
    expect(dual.success).toBe(true);
    expect(dual.data).toEqual({
      operations: [expect.objectContaining({ kind: 'enable' })],
      report: expect.objectContaining({ profileName: 'Dual', failed: 0 }),
      windows: undefined
    });
  });

  it('marks a partially applied profile as failed and lists the failed steps', async () => {
    await call('profile.save', { name: 'Single', enabledOverrides: { [D2]: false } });
    fixture.backend.failNext(D2, 1);

    const result = await call('profile.apply', { name: 'Single' });

    expect(result.success).toBe(false);
    expect(result.error).toEqual({
      code: 'PARTIAL_APPLY',
      message: '1 of 1 operations failed',
      details: { failed: [0] }
    });
  });

  it('renames and fetches a profile', async () => {
    await call('profile.save', { name: 'Wide' });
    await call('profile.rename', { from: 'Wide', to: 'Wide desk' });

    const stored = await call('profile.get', { name: 'Wide desk' });

    expect(stored.data).toEqual({ profile: expect.objectContaining({ name: 'Wide desk' }) });
    expect((await call('profile.get', { name: 'Wide' })).error?.code).toBe('PROFILE_NOT_FOUND');
  });

  it('validates an inline profile', async () => {
    const result = await call('profile.validate', {
      profile: {
        name: 'Two primaries',
        createdAt: '2026-01-01T00:00:00.000Z',
        updatedAt: '2026-01-01T00:00:00.000Z',
        displays: [
          {
            identity: { devicePath: D1, ordinal: 0 }, enabled: true, resolution: { width: 1920, height: 1080 },
            refreshHz: 60, position: { x: 0, y: 0 }, isPrimary: true
          },
          {
            identity: { devicePath: D2, ordinal: 1 }, enabled: true, resolution: { width: 1920, height: 1080 },
            refreshHz: 60, position: { x: 1920, y: 0 }, isPrimary: true
          }
        ]
      }
    });

    expect(result.success).toBe(false);
    expect(result.error?.code).toBe('VALIDATION_ERROR');
    expect(result.error?.details?.kind).toBe('multiple-primary');
  });

  it('moves, exports, imports and deletes profiles', async () => {
    await call('profile.save', { name: 'A' });
    await call('profile.save', { name: 'B' });

    expect((await call('profile.move', { fromIndex: 0, toIndex: 1 })).data).toEqual({ order: ['B', 'A'] });

    const file = path.join(fixture.dir, 'backup.json');
    expect((await call('profile.export', { path: file })).data).toEqual({ path: file, count: 2 });

    expect((await call('profile.delete', { name: 'A' })).data).toEqual({ deleted: 'A' });
    expect((await call('profile.import', { path: file })).data).toEqual({ imported: ['B', 'A'] });
    expect((await call('profile.list')).data).toEqual({
      profiles: [
        expect.objectContaining({ name: 'B' }),
        expect.objectContaining({ name: 'A' })
      ]
    });
  });

  it('rate-limits display detection', async () => {
    expect((await call('display.detect')).data).toEqual({ attached: true, displays: expect.any(Array) });
    await expect(call('display.detect')).rejects.toMatchObject({ code: 'RATE_LIMIT_EXCEEDED' });
  });
});
