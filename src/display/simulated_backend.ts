/**
 * display/simulated_backend.ts
 *
 * In-process model of a display subsystem. Used on hosts without the
 * Windows display API (dev machines, CI) and as the hardware stand-in in
 * tests. It behaves like a picky driver: it rejects modes it doesn't
 * list, refuses to detach the primary display, can fail a device on
 * demand and can rename a device when it is re-attached. It also keeps a
 * list of application windows, each on whichever attached monitor holds
 * its top-left corner.
 */

import { DisplayMode, Orientation, Position, WindowPlacement, WindowShowState } from '../core/types';
import { scopedLogger } from '../core/logger';
import {
  DisplayBackend,
  RawDisplayDevice,
  SetDisplayStateRequest,
  SetDisplayStateResult,
  WindowController
} from './backend';

const log = scopedLogger('display/simulated_backend');

export interface SimulatedDevice {
  devicePath: string;
  description?: string;
  attached: boolean;
  primary: boolean;
  width: number;
  height: number;
  refreshHz: number;
  x: number;
  y: number;
  orientation?: Orientation;
  /** Modes the "driver" accepts. Empty = accept anything. */
  modes?: DisplayMode[];
}

export interface SimulatedWindow {
  handle: number;
  title: string;
  processName: string;
  x: number;
  y: number;
  width: number;
  height: number;
  state: WindowShowState;
}

interface InjectedFailure {
  remaining: number;
  code: string;
  reason: string;
}

export const DEFAULT_SIMULATED_DEVICES: readonly SimulatedDevice[] = [
  {
    devicePath: '\\\\.\\DISPLAY1',
    description: 'Simulated Display Adapter',
    attached: true,
    primary: true,
    width: 2560,
    height: 1440,
    refreshHz: 60,
    x: 0,
    y: 0
  },
  {
    devicePath: '\\\\.\\DISPLAY2',
    description: 'Simulated Display Adapter',
    attached: true,
    primary: false,
    width: 1920,
    height: 1080,
    refreshHz: 60,
    x: 2560,
    y: 0
  }
];

function contains(device: SimulatedDevice, x: number, y: number): boolean {
  return x >= device.x && x < device.x + device.width && y >= device.y && y < device.y + device.height;
}

export class SimulatedWindowController implements WindowController {
  private windows: SimulatedWindow[];

  constructor(private readonly devices: () => readonly SimulatedDevice[], windows: readonly SimulatedWindow[]) {
    this.windows = windows.map(w => ({ ...w }));
  }

  /** Attached monitor holding the window's corner, else the primary. */
  private monitorOf(window: SimulatedWindow): SimulatedDevice | undefined {
    const attached = this.devices().filter(d => d.attached);
    return attached.find(d => contains(d, window.x, window.y)) ?? attached.find(d => d.primary);
  }

  async listWindows(): Promise<WindowPlacement[]> {
    return this.windows.map(w => {
      const monitor = this.monitorOf(w);
      return {
        handle: w.handle,
        title: w.title,
        processName: w.processName,
        x: w.x,
        y: w.y,
        width: w.width,
        height: w.height,
        state: w.state,
        monitor: monitor ? { x: monitor.x, y: monitor.y } : { x: 0, y: 0 }
      };
    });
  }

  async moveWindowsToPrimary(monitor: Position): Promise<number> {
    const primary = this.devices().find(d => d.attached && d.primary);
    if (!primary) return 0;

    let moved = 0;
    this.windows = this.windows.map(w => {
      const on = this.monitorOf(w);
      if (!on || on.x !== monitor.x || on.y !== monitor.y) return w;
      moved++;
      const step = (w.handle % 10) * 30;
      return {
        ...w,
        x: Math.min(primary.x + 50 + step, primary.x + primary.width - w.width - 10),
        y: Math.min(primary.y + 50 + step, primary.y + primary.height - w.height - 10)
      };
    });
    return moved;
  }

  async restoreWindow(saved: WindowPlacement): Promise<boolean> {
    let index = this.windows.findIndex(w => w.handle === saved.handle);
    if (index < 0) index = this.windows.findIndex(w => w.title === saved.title && w.processName === saved.processName);
    if (index < 0) return false;
    if (!this.devices().some(d => d.attached && d.x === saved.monitor.x && d.y === saved.monitor.y)) return false;

    this.windows[index] = {
      ...this.windows[index],
      x: saved.x,
      y: saved.y,
      width: saved.width,
      height: saved.height,
      state: saved.state
    };
    return true;
  }

  /** Current window table, for assertions. */
  snapshot(): SimulatedWindow[] {
    return this.windows.map(w => ({ ...w }));
  }
}

export class SimulatedDisplayBackend implements DisplayBackend {
  readonly name = 'simulated';
  readonly windows: SimulatedWindowController;

  private devices: SimulatedDevice[];
  private readonly failures = new Map<string, InjectedFailure>();
  private readonly renames = new Map<string, string>();
  private enumerationFailure: Error | null = null;

  /** Every request that reached setDisplayState, accepted or not. */
  readonly requests: SetDisplayStateRequest[] = [];
  enumerations = 0;
  detections = 0;

  constructor(devices: readonly SimulatedDevice[] = DEFAULT_SIMULATED_DEVICES, windows: readonly SimulatedWindow[] = []) {
    this.devices = devices.map(d => ({ ...d, modes: d.modes?.map(m => ({ ...m, resolution: { ...m.resolution } })) }));
    this.windows = new SimulatedWindowController(() => this.devices, windows);
  }

  // -----------------------------------------------------------------------
  // Fault injection
  // -----------------------------------------------------------------------

  /** The next `times` requests for `devicePath` are rejected with `code`. */
  failNext(devicePath: string, times = 1, code = 'FAILED', reason = 'driver rejected the configuration'): void {
    this.failures.set(devicePath, { remaining: times, code, reason });
  }

  /** When `devicePath` is next attached it re-enumerates as `newPath`. */
  renameOnAttach(devicePath: string, newPath: string): void {
    this.renames.set(devicePath, newPath);
  }

  /** Makes enumerateDisplays() reject until cleared with `null`. */
  failEnumeration(error: Error | null): void {
    this.enumerationFailure = error;
  }

  // -----------------------------------------------------------------------
  // DisplayBackend
  // -----------------------------------------------------------------------

  async enumerateDisplays(): Promise<RawDisplayDevice[]> {
    this.enumerations++;
    if (this.enumerationFailure) throw this.enumerationFailure;

    return this.devices.map((d, ordinal) => ({
      devicePath: d.devicePath,
      ordinal,
      description: d.description,
      attached: d.attached,
      primary: d.primary,
      width: d.width,
      height: d.height,
      refreshHz: d.refreshHz,
      x: d.x,
      y: d.y,
      orientation: d.orientation
    }));
  }

  async setDisplayState(request: SetDisplayStateRequest): Promise<SetDisplayStateResult> {
    this.requests.push({ ...request });

    const index = this.devices.findIndex(d => d.devicePath === request.devicePath);
    if (index < 0) {
      return { ok: false, code: 'BADPARAM', reason: `no such device ${request.devicePath}` };
    }
    const device = this.devices[index];

    const failure = this.failures.get(request.devicePath);
    if (failure && failure.remaining > 0) {
      failure.remaining--;
      if (failure.remaining === 0) this.failures.delete(request.devicePath);
      return { ok: false, code: failure.code, reason: failure.reason };
    }

    if (!request.enabled) {
      if (!device.attached) return { ok: true };
      if (device.primary) {
        return { ok: false, code: 'FAILED', reason: 'the primary display cannot be detached' };
      }
      this.devices[index] = { ...device, attached: false, primary: false };
      log.debug({ devicePath: device.devicePath }, 'Simulated detach');
      return { ok: true };
    }

    // Modes are listed landscape; a portrait request only fits when the
    // rotation comes with it.
    const orientation = request.orientation ?? device.orientation ?? 0;
    const turned = orientation === 1 || orientation === 3;
    const listedWidth = turned ? request.height : request.width;
    const listedHeight = turned ? request.width : request.height;
    if (device.modes && device.modes.length > 0 && !device.modes.some(m =>
      m.resolution.width === listedWidth &&
      m.resolution.height === listedHeight &&
      m.refreshHz === request.refreshHz)) {
      return { ok: false, code: 'BADMODE', reason: `${request.width}x${request.height}@${request.refreshHz}Hz is not supported` };
    }

    const wasAttached = device.attached;
    const updated: SimulatedDevice = {
      ...device,
      attached: true,
      primary: request.isPrimary || device.primary,
      width: request.width,
      height: request.height,
      refreshHz: request.refreshHz,
      x: request.x,
      y: request.y,
      orientation: request.orientation ?? device.orientation
    };

    const renamed = this.renames.get(device.devicePath);
    if (!wasAttached && renamed) {
      this.renames.delete(device.devicePath);
      updated.devicePath = renamed;
      log.debug({ from: device.devicePath, to: renamed }, 'Simulated re-enumeration under a new path');
    }

    this.devices[index] = updated;
    if (request.isPrimary) {
      this.devices = this.devices.map((d, i) => (i === index ? d : { ...d, primary: false }));
    }
    return { ok: true };
  }

  async listModes(devicePath: string): Promise<DisplayMode[]> {
    const device = this.devices.find(d => d.devicePath === devicePath);
    if (!device) throw new Error(`no such device ${devicePath}`);
    return (device.modes ?? []).map(m => ({ resolution: { ...m.resolution }, refreshHz: m.refreshHz }));
  }

  async detectDisplays(): Promise<boolean> {
    this.detections++;
    return true;
  }

  /** Current device table, for assertions. */
  snapshot(): SimulatedDevice[] {
    return this.devices.map(d => ({ ...d }));
  }
}
