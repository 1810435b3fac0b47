/**
 * display/powershell_backend.ts
 *
 * Windows binding for the DisplayBackend contract. Every call runs
 * PowerShell with an inline C# P/Invoke shim over user32:
 *
 *   EnumDisplayDevices / EnumDisplaySettings   → enumerateDisplays, listModes
 *   ChangeDisplaySettingsEx                    → setDisplayState
 *     (CDS_UPDATEREGISTRY | CDS_NORESET, then a null commit; width/height 0
 *      detaches a device; CDS_SET_PRIMARY moves the primary flag)
 *   SetDisplayConfig(SDC_APPLY | SDC_TOPOLOGY_EXTEND) → detectDisplays
 *
 * Window placement lives in powershell_windows.ts.
 */

import { DisplayMode } from '../core/types';
import { ExecutionError } from '../core/errors';
import { scopedLogger } from '../core/logger';
import {
  DisplayBackend,
  RawDisplayDevice,
  SetDisplayStateRequest,
  SetDisplayStateResult
} from './backend';
import { int, isRecord, parseJsonArray, quote, runPowerShell } from './powershell';
import { PowerShellWindowController } from './powershell_windows';

const log = scopedLogger('display/powershell_backend');

/** ChangeDisplaySettingsEx return values. */
export const DISP_CHANGE_CODES: Record<number, string> = {
  1: 'RESTART',
  [-1]: 'FAILED',
  [-2]: 'BADMODE',
  [-3]: 'NOTUPDATED',
  [-4]: 'BADFLAGS',
  [-5]: 'BADPARAM',
  [-6]: 'BADDUALVIEW'
};

const DISP_CHANGE_REASONS: Record<string, string> = {
  RESTART: 'the change requires a restart',
  FAILED: 'the display driver failed the requested mode',
  BADMODE: 'the graphics mode is not supported',
  NOTUPDATED: 'unable to write settings to the registry',
  BADFLAGS: 'an invalid set of flags was passed in',
  BADPARAM: 'an invalid parameter was passed in',
  BADDUALVIEW: 'the settings change was unsuccessful because the system is DualView capable'
};

const NATIVE_SHIM = `
Add-Type -TypeDefinition @'
using System;
using System.Collections.Generic;
using System.Runtime.InteropServices;

public class DisplayNative {
  [StructLayout(LayoutKind.Sequential, CharSet = CharSet.Unicode)]
  public struct DISPLAY_DEVICE {
    public int cb;
    [MarshalAs(UnmanagedType.ByValTStr, SizeConst = 32)] public string DeviceName;
    [MarshalAs(UnmanagedType.ByValTStr, SizeConst = 128)] public string DeviceString;
    public int StateFlags;
    [MarshalAs(UnmanagedType.ByValTStr, SizeConst = 128)] public string DeviceID;
    [MarshalAs(UnmanagedType.ByValTStr, SizeConst = 128)] public string DeviceKey;
  }

  [StructLayout(LayoutKind.Sequential, CharSet = CharSet.Unicode)]
  public struct DEVMODE {
    [MarshalAs(UnmanagedType.ByValTStr, SizeConst = 32)] public string dmDeviceName;
    public short dmSpecVersion; public short dmDriverVersion; public short dmSize; public short dmDriverExtra;
    public int dmFields; public int dmPositionX; public int dmPositionY;
    public int dmDisplayOrientation; public int dmDisplayFixedOutput;
    public short dmColor; public short dmDuplex; public short dmYResolution; public short dmTTOption; public short dmCollate;
    [MarshalAs(UnmanagedType.ByValTStr, SizeConst = 32)] public string dmFormName;
    public short dmLogPixels; public int dmBitsPerPel; public int dmPelsWidth; public int dmPelsHeight;
    public int dmDisplayFlags; public int dmDisplayFrequency;
    public int dmICMMethod; public int dmICMIntent; public int dmMediaType; public int dmDitherType;
    public int dmReserved1; public int dmReserved2; public int dmPanningWidth; public int dmPanningHeight;
  }

  public class Device {
    public string DevicePath { get; set; }
    public int Ordinal { get; set; }
    public string Description { get; set; }
    public bool Attached { get; set; }
    public bool Primary { get; set; }
    public int Width { get; set; }
    public int Height { get; set; }
    public int RefreshHz { get; set; }
    public int X { get; set; }
    public int Y { get; set; }
    public int Orientation { get; set; }
  }

  public class Mode {
    public int Width { get; set; }
    public int Height { get; set; }
    public int RefreshHz { get; set; }
  }

  [DllImport("user32.dll", CharSet = CharSet.Unicode)]
  static extern bool EnumDisplayDevices(string lpDevice, uint iDevNum, ref DISPLAY_DEVICE lpDisplayDevice, uint dwFlags);
  [DllImport("user32.dll", CharSet = CharSet.Unicode)]
  static extern bool EnumDisplaySettings(string deviceName, int modeNum, ref DEVMODE devMode);
  [DllImport("user32.dll", CharSet = CharSet.Unicode)]
  static extern int ChangeDisplaySettingsEx(string deviceName, ref DEVMODE devMode, IntPtr hwnd, uint flags, IntPtr lParam);
  [DllImport("user32.dll", CharSet = CharSet.Unicode, EntryPoint = "ChangeDisplaySettingsExW")]
  static extern int CommitDisplaySettings(IntPtr deviceName, IntPtr devMode, IntPtr hwnd, uint flags, IntPtr lParam);
  [DllImport("user32.dll")]
  static extern int SetDisplayConfig(uint numPathArrayElements, IntPtr pathArray, uint numModeInfoArrayElements, IntPtr modeInfoArray, uint flags);

  const int ENUM_CURRENT_SETTINGS = -1;
  const int ENUM_REGISTRY_SETTINGS = -2;
  const int ATTACHED_TO_DESKTOP = 0x1;
  const int PRIMARY_DEVICE = 0x4;
  const int MIRRORING_DRIVER = 0x8;
  const int DM_POSITION = 0x20;
  const int DM_DISPLAYORIENTATION = 0x80;
  const int DM_PELSWIDTH = 0x80000;
  const int DM_PELSHEIGHT = 0x100000;
  const int DM_DISPLAYFREQUENCY = 0x400000;
  const uint CDS_UPDATEREGISTRY = 0x1;
  const uint CDS_SET_PRIMARY = 0x10;
  const uint CDS_NORESET = 0x10000000;
  const uint SDC_TOPOLOGY_EXTEND = 0x4;
  const uint SDC_APPLY = 0x80;

  static DEVMODE NewDevMode() {
    DEVMODE dm = new DEVMODE();
    dm.dmSize = (short)Marshal.SizeOf(typeof(DEVMODE));
    return dm;
  }

  static DEVMODE CurrentOrRegistry(string name) {
    DEVMODE dm = NewDevMode();
    if (!EnumDisplaySettings(name, ENUM_CURRENT_SETTINGS, ref dm)) {
      dm = NewDevMode();
      EnumDisplaySettings(name, ENUM_REGISTRY_SETTINGS, ref dm);
    }
    return dm;
  }

  public static List<Device> Enumerate() {
    List<Device> result = new List<Device>();
    DISPLAY_DEVICE dd = new DISPLAY_DEVICE();
    dd.cb = Marshal.SizeOf(typeof(DISPLAY_DEVICE));
    for (uint i = 0; EnumDisplayDevices(null, i, ref dd, 0); i++) {
      if ((dd.StateFlags & MIRRORING_DRIVER) == 0) {
        bool attached = (dd.StateFlags & ATTACHED_TO_DESKTOP) != 0;
        DEVMODE dm = CurrentOrRegistry(dd.DeviceName);
        Device d = new Device();
        d.DevicePath = dd.DeviceName;
        d.Ordinal = (int)i;
        d.Description = dd.DeviceString;
        d.Attached = attached;
        d.Primary = (dd.StateFlags & PRIMARY_DEVICE) != 0;
        d.Width = dm.dmPelsWidth;
        d.Height = dm.dmPelsHeight;
        d.RefreshHz = dm.dmDisplayFrequency;
        d.X = dm.dmPositionX;
        d.Y = dm.dmPositionY;
        d.Orientation = dm.dmDisplayOrientation;
        result.Add(d);
      }
      dd = new DISPLAY_DEVICE();
      dd.cb = Marshal.SizeOf(typeof(DISPLAY_DEVICE));
    }
    return result;
  }

  public static List<Mode> ListModes(string name) {
    List<Mode> result = new List<Mode>();
    HashSet<string> seen = new HashSet<string>();
    DEVMODE dm = NewDevMode();
    for (int i = 0; EnumDisplaySettings(name, i, ref dm); i++) {
      string key = dm.dmPelsWidth + "x" + dm.dmPelsHeight + "@" + dm.dmDisplayFrequency;
      if (seen.Add(key)) {
        Mode m = new Mode();
        m.Width = dm.dmPelsWidth;
        m.Height = dm.dmPelsHeight;
        m.RefreshHz = dm.dmDisplayFrequency;
        result.Add(m);
      }
      dm = NewDevMode();
    }
    return result;
  }

  public static int Apply(string name, bool enabled, int width, int height, int hz, int x, int y, bool primary, int orientation) {
    DEVMODE dm = CurrentOrRegistry(name);
    uint flags = CDS_UPDATEREGISTRY | CDS_NORESET;
    if (enabled) {
      dm.dmPelsWidth = width;
      dm.dmPelsHeight = height;
      dm.dmDisplayFrequency = hz;
      dm.dmPositionX = x;
      dm.dmPositionY = y;
      dm.dmFields = DM_PELSWIDTH | DM_PELSHEIGHT | DM_DISPLAYFREQUENCY | DM_POSITION;
      if (orientation >= 0) {
        dm.dmDisplayOrientation = orientation;
        dm.dmFields |= DM_DISPLAYORIENTATION;
      }
      if (primary) flags |= CDS_SET_PRIMARY;
    } else {
      dm.dmPelsWidth = 0;
      dm.dmPelsHeight = 0;
      dm.dmPositionX = 0;
      dm.dmPositionY = 0;
      dm.dmFields = DM_PELSWIDTH | DM_PELSHEIGHT | DM_POSITION;
    }
    int code = ChangeDisplaySettingsEx(name, ref dm, IntPtr.Zero, flags, IntPtr.Zero);
    if (code != 0) return code;
    return CommitDisplaySettings(IntPtr.Zero, IntPtr.Zero, IntPtr.Zero, 0, IntPtr.Zero);
  }

  public static bool Detect() {
    return SetDisplayConfig(0, IntPtr.Zero, 0, IntPtr.Zero, SDC_APPLY | SDC_TOPOLOGY_EXTEND) == 0;
  }
}
'@;
`;

const SOURCE = 'powershell_backend';

export interface PowerShellBackendOptions {
  /** Unset = wait as long as the OS call takes. */
  timeoutMs?: number;
}

export class PowerShellDisplayBackend implements DisplayBackend {
  readonly name = 'powershell';
  readonly windows: PowerShellWindowController;

  constructor(private readonly options: PowerShellBackendOptions = {}) {
    this.windows = new PowerShellWindowController(options);
  }

  private ps(script: string): string {
    return runPowerShell(SOURCE, NATIVE_SHIM + script, this.options.timeoutMs);
  }

  async enumerateDisplays(): Promise<RawDisplayDevice[]> {
    const raw = this.ps('ConvertTo-Json -InputObject @([DisplayNative]::Enumerate()) -Depth 3 -Compress;');

    return parseJsonArray(SOURCE, raw, 'enumeration').map((entry): RawDisplayDevice => {
      const d = isRecord(entry) ? entry : {};
      return {
        devicePath: d.DevicePath,
        ordinal: d.Ordinal,
        description: d.Description,
        attached: d.Attached,
        primary: d.Primary,
        width: d.Width,
        height: d.Height,
        refreshHz: d.RefreshHz,
        x: d.X,
        y: d.Y,
        orientation: d.Orientation
      };
    });
  }

  async listModes(devicePath: string): Promise<DisplayMode[]> {
    const raw = this.ps(`ConvertTo-Json -InputObject @([DisplayNative]::ListModes(${quote(devicePath)})) -Depth 3 -Compress;`);

    const modes: DisplayMode[] = [];
    for (const entry of parseJsonArray(SOURCE, raw, 'mode list')) {
      if (!isRecord(entry)) continue;
      const { Width, Height, RefreshHz } = entry;
      if (typeof Width === 'number' && typeof Height === 'number' && typeof RefreshHz === 'number') {
        modes.push({ resolution: { width: Width, height: Height }, refreshHz: RefreshHz });
      }
    }
    return modes;
  }

  async setDisplayState(request: SetDisplayStateRequest): Promise<SetDisplayStateResult> {
    const args = [
      quote(request.devicePath),
      request.enabled ? '$true' : '$false',
      int(SOURCE, request.width, 'width'),
      int(SOURCE, request.height, 'height'),
      int(SOURCE, request.refreshHz, 'refreshHz'),
      int(SOURCE, request.x, 'x'),
      int(SOURCE, request.y, 'y'),
      request.isPrimary ? '$true' : '$false',
      int(SOURCE, request.orientation ?? -1, 'orientation')
    ].join(', ');

    const raw = this.ps(`[DisplayNative]::Apply(${args});`);
    const code = Number.parseInt(raw, 10);

    if (code === 0) return { ok: true };
    if (Number.isNaN(code)) {
      throw new ExecutionError(SOURCE, `Unexpected apply output: "${raw}"`, { devicePath: request.devicePath });
    }

    const name = DISP_CHANGE_CODES[code] ?? `DISP_CHANGE_${code}`;
    log.warn({ devicePath: request.devicePath, code, name }, 'ChangeDisplaySettingsEx rejected the request');
    return { ok: false, code: name, reason: DISP_CHANGE_REASONS[name] ?? `ChangeDisplaySettingsEx returned ${code}` };
  }

  async detectDisplays(): Promise<boolean> {
    return this.ps('[DisplayNative]::Detect();').toLowerCase() === 'true';
  }
}
