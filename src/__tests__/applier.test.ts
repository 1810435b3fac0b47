import { ConfigurationApplier } from '../display/applier';
import { enumerate } from '../display/enumerator';
import { reconcile } from '../display/reconciler';
import { SimulatedDisplayBackend, SimulatedDevice } from '../display/simulated_backend';
import { Profile, ReconciliationPlan } from '../core/types';
import { D1, D2, display, profile } from './helpers';

const D5 = '\\\\.\\DISPLAY5';

function device(devicePath: string, overrides: Partial<SimulatedDevice> = {}): SimulatedDevice {
  return {
    devicePath,
    attached: true,
    primary: false,
    width: 1920,
    height: 1080,
    refreshHz: 60,
    x: 0,
    y: 0,
    ...overrides
  };
}

async function planFor(backend: SimulatedDisplayBackend, target: Profile, autoDisableExtras = false): Promise<ReconciliationPlan> {
  return reconcile(await enumerate(backend), target, autoDisableExtras);
}

describe('ConfigurationApplier', () => {
  let backend: SimulatedDisplayBackend;
  let applier: ConfigurationApplier;

  const dual = (): SimulatedDevice[] => [
    device(D1, { primary: true, width: 2560, height: 1440, refreshHz: 59 }),
    device(D2, { x: 2560 })
  ];

  beforeEach(() => {
    backend = new SimulatedDisplayBackend(dual());
    applier = new ConfigurationApplier(backend, { retryDelayMs: 0 });
  });

  it('applies the single-monitor profile and leaves the primary untouched', async () => {
    const single = profile('Single', [
      display(D1, 0, { resolution: { width: 2560, height: 1440 }, refreshHz: 59, isPrimary: true })
    ]);

    const report = await applier.apply(await planFor(backend, single, true));

    expect(report.succeeded).toBe(1);
    expect(report.failed).toBe(0);
    expect(report.steps[0]).toMatchObject({
      index: 0,
      resolvedIdentity: { devicePath: D2, ordinal: 1 },
      outcome: { status: 'succeeded' },
      attempts: 1
    });

    const after = await enumerate(backend);
    expect(after.map(d => [d.identity.devicePath, d.enabled])).toEqual([[D1, true], [D2, false]]);
    expect(after[0]).toMatchObject({
      resolution: { width: 2560, height: 1440 },
      refreshHz: 59,
      position: { x: 0, y: 0 },
      isPrimary: true
    });
  });

  it('converges, and a second plan against the result is empty', async () => {
    const target = profile('Stacked', [
      display(D1, 0, { resolution: { width: 2560, height: 1440 }, refreshHz: 59 }),
      display(D2, 1, { position: { x: 0, y: 1440 }, isPrimary: true })
    ]);

    const first = await applier.apply(await planFor(backend, target));
    expect(first.failed).toBe(0);
    expect(first.steps.map(s => s.operation.kind)).toEqual(['reposition', 'setPrimary']);

    const second = await planFor(backend, target);
    expect(second.operations).toEqual([]);
    const report = await applier.apply(second);
    expect(report.steps).toEqual([]);
    expect(report.failed).toBe(0);
  });

  it('continues past a failed step and retries it once', async () => {
    backend.failNext(D2, 1);
    const target = profile('Fast', [
      display(D1, 0, { resolution: { width: 2560, height: 1440 }, refreshHz: 59, isPrimary: true }),
      display(D2, 1, { position: { x: 2560, y: 0 }, refreshHz: 75 })
    ]);

    const report = await applier.apply(await planFor(backend, target));

    expect(report.steps).toHaveLength(1);
    expect(report.steps[0].outcome).toEqual({ status: 'succeeded' });
    expect(report.steps[0].attempts).toBe(2);
    expect(backend.snapshot()[1].refreshHz).toBe(75);
  });

  it('reports a step that fails twice with the OS reason', async () => {
    backend.failNext(D2, 2, 'BADMODE', 'the graphics mode is not supported');
    const target = profile('Fast', [
      display(D1, 0, { resolution: { width: 2560, height: 1440 }, refreshHz: 59, isPrimary: true }),
      display(D2, 1, { position: { x: 2560, y: 0 }, refreshHz: 75 })
    ]);

    const report = await applier.apply(await planFor(backend, target));

    expect(report.failed).toBe(1);
    expect(report.steps[0].outcome).toEqual({
      status: 'failed',
      code: 'BADMODE',
      reason: 'the graphics mode is not supported'
    });
    expect(report.steps[0].attempts).toBe(2);
  });

  it('does not retry a failed disable', async () => {
    backend.failNext(D2, 1);
    const single = profile('Single', [
      display(D1, 0, { resolution: { width: 2560, height: 1440 }, refreshHz: 59, isPrimary: true })
    ]);

    const report = await applier.apply(await planFor(backend, single, true));

    expect(report.steps[0].outcome.status).toBe('failed');
    expect(report.steps[0].attempts).toBe(1);
    expect(backend.requests).toHaveLength(1);
  });

  it('fails a reposition whose resolution the driver does not list, without calling the OS', async () => {
    backend = new SimulatedDisplayBackend([
      device(D1, { primary: true }),
      device(D2, { x: 1920, modes: [{ resolution: { width: 1920, height: 1080 }, refreshHz: 60 }] })
    ]);
    applier = new ConfigurationApplier(backend, { retryDelayMs: 0 });
    const target = profile('Big', [
      display(D1, 0, { isPrimary: true }),
      display(D2, 1, { position: { x: 1920, y: 0 }, resolution: { width: 2560, height: 1440 } })
    ]);

    const report = await applier.apply(await planFor(backend, target));

    expect(report.steps[0].outcome).toEqual({
      status: 'failed',
      code: 'UNSUPPORTED_MODE',
      reason: 'unsupported mode 2560x1440@60Hz'
    });
    expect(backend.requests).toEqual([]);
  });

  it('snaps the refresh rate to the nearest one the driver offers', async () => {
    backend = new SimulatedDisplayBackend([
      device(D1, { primary: true }),
      device(D2, {
        x: 1920,
        refreshHz: 144,
        modes: [
          { resolution: { width: 1920, height: 1080 }, refreshHz: 60 },
          { resolution: { width: 1920, height: 1080 }, refreshHz: 144 }
        ]
      })
    ]);
    applier = new ConfigurationApplier(backend, { retryDelayMs: 0 });
    const target = profile('Office', [
      display(D1, 0, { isPrimary: true }),
      display(D2, 1, { position: { x: 1920, y: 0 }, refreshHz: 59 })
    ]);

    const report = await applier.apply(await planFor(backend, target));

    expect(report.succeeded).toBe(1);
    expect(backend.requests[0].refreshHz).toBe(60);
  });

  it('requests the rotation with a portrait mode the driver lists in landscape', async () => {
    backend = new SimulatedDisplayBackend([
      device(D1, { primary: true }),
      device(D2, { x: 1920, modes: [{ resolution: { width: 1920, height: 1080 }, refreshHz: 60 }] })
    ]);
    applier = new ConfigurationApplier(backend, { retryDelayMs: 0 });
    const target = profile('Portrait', [
      display(D1, 0, { isPrimary: true }),
      display(D2, 1, { position: { x: 1920, y: 0 }, resolution: { width: 1080, height: 1920 }, orientation: 1 })
    ]);

    const report = await applier.apply(await planFor(backend, target));

    expect(report.failed).toBe(0);
    expect(backend.requests).toEqual([{
      devicePath: D2,
      enabled: true,
      width: 1080,
      height: 1920,
      refreshHz: 60,
      x: 1920,
      y: 0,
      isPrimary: false,
      orientation: 1
    }]);
    const after = await enumerate(backend);
    expect(after[1]).toMatchObject({ resolution: { width: 1080, height: 1920 }, orientation: 1 });
    expect((await planFor(backend, target)).operations).toEqual([]);
  });

  it('converges on a profile that only flips a display upside down', async () => {
    const target = profile('Flipped', [
      display(D1, 0, { resolution: { width: 2560, height: 1440 }, refreshHz: 59, isPrimary: true }),
      display(D2, 1, { position: { x: 2560, y: 0 }, orientation: 2 })
    ]);

    const report = await applier.apply(await planFor(backend, target));

    expect(report.steps.map(s => [s.operation.kind, s.outcome.status])).toEqual([['reposition', 'succeeded']]);
    expect(backend.snapshot()[1].orientation).toBe(2);
    expect((await planFor(backend, target)).operations).toEqual([]);
  });

  it('follows a display that re-enumerates under a new path after enable', async () => {
    backend = new SimulatedDisplayBackend([
      device(D1, { primary: true }),
      device(D2, { attached: false })
    ]);
    backend.renameOnAttach(D2, D5);
    applier = new ConfigurationApplier(backend, { retryDelayMs: 0 });
    const target = profile('Second primary', [
      display(D1, 0),
      display(D2, 1, { position: { x: 1920, y: 0 }, isPrimary: true })
    ]);

    const report = await applier.apply(await planFor(backend, target));

    expect(report.steps.map(s => [s.operation.kind, s.outcome.status])).toEqual([
      ['enable', 'succeeded'],
      ['setPrimary', 'succeeded']
    ]);
    expect(report.steps[1].resolvedIdentity).toEqual({ devicePath: D5, ordinal: 1 });
    expect(report.warnings.map(w => w.kind)).toEqual(['identity-drift']);
    expect(backend.detections).toBe(1);

    const after = backend.snapshot();
    expect(after.map(d => [d.devicePath, d.attached, d.primary])).toEqual([
      [D1, true, false],
      [D5, true, true]
    ]);
  });

  it('skips setPrimary when enabling that display failed, and runs it after a successful retry', async () => {
    backend = new SimulatedDisplayBackend([
      device(D1, { primary: true }),
      device(D2, { attached: false })
    ]);
    applier = new ConfigurationApplier(backend, { retryDelayMs: 0 });
    const target = profile('Second primary', [
      display(D1, 0),
      display(D2, 1, { position: { x: 1920, y: 0 }, isPrimary: true })
    ]);

    backend.failNext(D2, 2);
    const failed = await applier.apply(await planFor(backend, target));
    expect(failed.steps.map(s => s.outcome.status)).toEqual(['failed', 'skipped']);
    expect(failed.steps[1]).toMatchObject({
      outcome: { status: 'skipped', reason: `enable of ${D2} did not succeed` },
      attempts: 0
    });

    backend.failNext(D2, 1);
    const recovered = await applier.apply(await planFor(backend, target));
    expect(recovered.steps.map(s => [s.outcome.status, s.attempts])).toEqual([
      ['succeeded', 2],
      ['succeeded', 1]
    ]);
    expect(backend.snapshot()[1].primary).toBe(true);
  });

  it('records a failed step when re-enumeration breaks mid-apply', async () => {
    backend = new SimulatedDisplayBackend([
      device(D1, { primary: true }),
      device(D2, { attached: false })
    ]);
    applier = new ConfigurationApplier(backend, { retryDelayMs: 0 });
    const target = profile('Second primary', [
      display(D1, 0),
      display(D2, 1, { position: { x: 1920, y: 0 }, isPrimary: true })
    ]);
    const plan = await planFor(backend, target);

    // Enable lands, then the OS stops answering.
    const original = backend.setDisplayState.bind(backend);
    jest.spyOn(backend, 'setDisplayState').mockImplementation(async request => {
      const result = await original(request);
      backend.failEnumeration(new Error('device busy'));
      return result;
    });

    const report = await applier.apply(plan);

    expect(report.steps[1].outcome).toEqual({
      status: 'failed',
      code: 'ENUMERATION_ERROR',
      reason: 'Display enumeration failed: device busy'
    });
  });
});
