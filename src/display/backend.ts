/**
 * display/backend.ts
 *
 * The boundary to the OS display-configuration interface. The engine only
 * ever talks to a DisplayBackend; the Windows binding and the in-process
 * simulator both implement it.
 */

import { DisplayMode, DisplayState, Position, WindowPlacement } from '../core/types';

/**
 * One device as the OS reports it, before the enumerator checks it.
 * Fields are `unknown` where the OS binding hands back loosely typed data.
 */
export interface RawDisplayDevice {
  devicePath: unknown;
  ordinal: unknown;
  description?: unknown;
  attached: unknown;                       // part of the desktop right now
  primary: unknown;
  width: unknown;
  height: unknown;
  refreshHz: unknown;
  x: unknown;
  y: unknown;
  orientation?: unknown;
}

export interface SetDisplayStateRequest {
  devicePath: string;
  enabled: boolean;
  width: number;
  height: number;
  refreshHz: number;
  x: number;
  y: number;
  isPrimary: boolean;
  orientation?: DisplayState['orientation'];
}

export type SetDisplayStateResult =
  | { ok: true }
  | { ok: false; code: string; reason: string };

/** Application-window side of the OS, used around an Apply. */
export interface WindowController {
  /** Visible top-level user windows with their placement. */
  listWindows(): Promise<WindowPlacement[]>;

  /** Moves every window on the monitor at `monitor` onto the primary display. Returns how many moved. */
  moveWindowsToPrimary(monitor: Position): Promise<number>;

  /**
   * Puts a window back. False when neither its handle nor its
   * title/process can be found, or its monitor is not there.
   */
  restoreWindow(saved: WindowPlacement): Promise<boolean>;
}

export interface DisplayBackend {
  readonly name: string;

  /** Every display device the OS knows about, attached or not. */
  enumerateDisplays(): Promise<RawDisplayDevice[]>;

  /** Apply one device's full state. A rejection is a result, not a throw. */
  setDisplayState(request: SetDisplayStateRequest): Promise<SetDisplayStateResult>;

  /** Modes the driver accepts for a device. Optional: not every OS lists them. */
  listModes?(devicePath: string): Promise<DisplayMode[]>;

  /** Ask the OS to attach physically connected but detached monitors. */
  detectDisplays?(): Promise<boolean>;

  /** Absent when the backend cannot see application windows. */
  readonly windows?: WindowController;
}

/** Full request that puts `state` on the wire unchanged. */
export function requestFromState(state: DisplayState): SetDisplayStateRequest {
  return {
    devicePath: state.identity.devicePath,
    enabled: state.enabled,
    width: state.resolution.width,
    height: state.resolution.height,
    refreshHz: state.refreshHz,
    x: state.position.x,
    y: state.position.y,
    isPrimary: state.isPrimary,
    orientation: state.orientation
  };
}
