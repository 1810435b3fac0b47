import { enumerate, toDisplayState } from '../display/enumerator';
import { DisplayBackend, RawDisplayDevice } from '../display/backend';
import { EnumerationError } from '../core/errors';
import { D1, D2 } from './helpers';

function raw(overrides: Partial<RawDisplayDevice> = {}): RawDisplayDevice {
  return {
    devicePath: D1,
    ordinal: 0,
    attached: true,
    primary: true,
    width: 2560,
    height: 1440,
    refreshHz: 60,
    x: 0,
    y: 0,
    ...overrides
  };
}

function backendOf(devices: RawDisplayDevice[] | (() => Promise<RawDisplayDevice[]>)): DisplayBackend {
  return {
    name: 'fixed',
    enumerateDisplays: typeof devices === 'function' ? devices : async () => devices,
    setDisplayState: async () => ({ ok: true })
  };
}

describe('toDisplayState', () => {
  it('maps a raw device onto a display state', () => {
    expect(toDisplayState(raw({ description: 'Panel', orientation: 1 }), 0)).toEqual({
      identity: { devicePath: D1, ordinal: 0 },
      enabled: true,
      resolution: { width: 2560, height: 1440 },
      refreshHz: 60,
      position: { x: 0, y: 0 },
      isPrimary: true,
      description: 'Panel',
      orientation: 1
    });
  });

  it('never reports a detached display as primary', () => {
    const state = toDisplayState(raw({ attached: false, width: 0, height: 0, refreshHz: 0 }), 0);

    expect(state.enabled).toBe(false);
    expect(state.isPrimary).toBe(false);
  });

  it('names the malformed field', () => {
    expect(() => toDisplayState(raw({ refreshHz: '60' }), 3)).toThrow('Malformed display record at index 3: bad "refreshHz"');
    expect(() => toDisplayState(raw({ devicePath: '' }), 0)).toThrow('bad "devicePath"');
    expect(() => toDisplayState(raw({ x: 1.5 }), 0)).toThrow('bad "x"');
  });

  it('rejects an attached display without a resolution', () => {
    expect(() => toDisplayState(raw({ width: 0 }), 0)).toThrow('bad "resolution"');
  });
});

describe('enumerate', () => {
  it('returns every display sorted by ordinal, enabled or not', async () => {
    const backend = backendOf([
      raw({ devicePath: D2, ordinal: 1, attached: false, primary: false }),
      raw()
    ]);

    const states = await enumerate(backend);

    expect(states.map(s => [s.identity.devicePath, s.enabled])).toEqual([[D1, true], [D2, false]]);
  });

  it('fails the whole call on one malformed record', async () => {
    const backend = backendOf([raw(), raw({ devicePath: D2, ordinal: 1, width: null })]);

    await expect(enumerate(backend)).rejects.toThrow(EnumerationError);
  });

  it('rejects duplicate device paths', async () => {
    const backend = backendOf([raw(), raw({ ordinal: 1, primary: false })]);

    await expect(enumerate(backend)).rejects.toThrow(`Duplicate device path "${D1}" in one enumeration`);
  });

  it('wraps backend failures in EnumerationError', async () => {
    const backend = backendOf(async () => {
      throw new Error('access denied');
    });

    await expect(enumerate(backend)).rejects.toMatchObject({
      code: 'ENUMERATION_ERROR',
      message: 'Display enumeration failed: access denied'
    });
  });
});
