/**
 * display/powershell_windows.ts
 *
 * Window placement on Windows, through PowerShell and a C# shim over
 * EnumWindows, Get/SetWindowPlacement and MonitorFromWindow. Only visible,
 * titled, non-tool windows count; shell surfaces are skipped.
 */

import { Position, WindowPlacement, WindowShowState } from '../core/types';
import { scopedLogger } from '../core/logger';
import { WindowController } from './backend';
import { int, isRecord, parseJsonArray, quote, runPowerShell } from './powershell';

const log = scopedLogger('display/powershell_windows');

const SOURCE = 'powershell_windows';

const WINDOW_SHIM = `
Add-Type -TypeDefinition @'
using System;
using System.Collections.Generic;
using System.Diagnostics;
using System.Runtime.InteropServices;
using System.Text;

public class WindowNative {
  [StructLayout(LayoutKind.Sequential)] public struct RECT { public int Left, Top, Right, Bottom; }
  [StructLayout(LayoutKind.Sequential)] public struct POINT { public int X, Y; }

  [StructLayout(LayoutKind.Sequential)]
  public struct WINDOWPLACEMENT {
    public int length; public int flags; public int showCmd;
    public POINT ptMinPosition; public POINT ptMaxPosition; public RECT rcNormalPosition;
  }

  [StructLayout(LayoutKind.Sequential)]
  public struct MONITORINFO { public int cbSize; public RECT rcMonitor; public RECT rcWork; public int dwFlags; }

  public class Window {
    public long Handle { get; set; }
    public string Title { get; set; }
    public string ProcessName { get; set; }
    public int X { get; set; }
    public int Y { get; set; }
    public int Width { get; set; }
    public int Height { get; set; }
    public int ShowCmd { get; set; }
    public int MonitorX { get; set; }
    public int MonitorY { get; set; }
  }

  delegate bool EnumWindowsProc(IntPtr hwnd, IntPtr lParam);

  [DllImport("user32.dll")] static extern bool EnumWindows(EnumWindowsProc cb, IntPtr lParam);
  [DllImport("user32.dll")] static extern bool IsWindow(IntPtr hwnd);
  [DllImport("user32.dll")] static extern bool IsWindowVisible(IntPtr hwnd);
  [DllImport("user32.dll")] static extern int GetWindowLong(IntPtr hwnd, int index);
  [DllImport("user32.dll", CharSet = CharSet.Unicode)] static extern int GetWindowText(IntPtr hwnd, StringBuilder text, int max);
  [DllImport("user32.dll")] static extern int GetWindowTextLength(IntPtr hwnd);
  [DllImport("user32.dll")] static extern uint GetWindowThreadProcessId(IntPtr hwnd, out uint pid);
  [DllImport("user32.dll")] static extern bool GetWindowPlacement(IntPtr hwnd, ref WINDOWPLACEMENT wp);
  [DllImport("user32.dll")] static extern bool SetWindowPlacement(IntPtr hwnd, ref WINDOWPLACEMENT wp);
  [DllImport("user32.dll")] static extern IntPtr MonitorFromWindow(IntPtr hwnd, uint flags);
  [DllImport("user32.dll")] static extern IntPtr MonitorFromPoint(POINT pt, uint flags);
  [DllImport("user32.dll")] static extern bool GetMonitorInfo(IntPtr monitor, ref MONITORINFO mi);

  const int GWL_EXSTYLE = -20;
  const int WS_EX_TOOLWINDOW = 0x80;
  const int WS_EX_APPWINDOW = 0x40000;
  const uint MONITOR_DEFAULTTONULL = 0;
  const uint MONITOR_DEFAULTTOPRIMARY = 1;
  const uint MONITOR_DEFAULTTONEAREST = 2;

  static readonly string[] SkipTitles = {
    "Program Manager", "Windows Input Experience", "Microsoft Text Input Application", "Settings"
  };
  static readonly string[] SkipProcesses = {
    "TextInputHost", "ShellExperienceHost", "SearchHost", "StartMenuExperienceHost"
  };

  static string TitleOf(IntPtr hwnd) {
    int length = GetWindowTextLength(hwnd);
    if (length <= 0) return "";
    StringBuilder sb = new StringBuilder(length + 1);
    GetWindowText(hwnd, sb, length + 1);
    return sb.ToString();
  }

  static string ProcessOf(IntPtr hwnd) {
    uint pid;
    GetWindowThreadProcessId(hwnd, out pid);
    try { return Process.GetProcessById((int)pid).ProcessName; } catch (ArgumentException) { return ""; }
  }

  static bool IsUserWindow(IntPtr hwnd) {
    if (!IsWindowVisible(hwnd)) return false;
    int ex = GetWindowLong(hwnd, GWL_EXSTYLE);
    if ((ex & WS_EX_TOOLWINDOW) != 0 && (ex & WS_EX_APPWINDOW) == 0) return false;
    string title = TitleOf(hwnd);
    if (title.Length == 0 || Array.IndexOf(SkipTitles, title) >= 0) return false;
    return Array.IndexOf(SkipProcesses, ProcessOf(hwnd)) < 0;
  }

  static List<IntPtr> UserWindows() {
    List<IntPtr> result = new List<IntPtr>();
    EnumWindows((hwnd, _) => { if (IsUserWindow(hwnd)) result.Add(hwnd); return true; }, IntPtr.Zero);
    return result;
  }

  static MONITORINFO InfoOf(IntPtr monitor) {
    MONITORINFO mi = new MONITORINFO();
    mi.cbSize = Marshal.SizeOf(typeof(MONITORINFO));
    GetMonitorInfo(monitor, ref mi);
    return mi;
  }

  static WINDOWPLACEMENT PlacementOf(IntPtr hwnd) {
    WINDOWPLACEMENT wp = new WINDOWPLACEMENT();
    wp.length = Marshal.SizeOf(typeof(WINDOWPLACEMENT));
    GetWindowPlacement(hwnd, ref wp);
    return wp;
  }

  public static List<Window> List() {
    List<Window> result = new List<Window>();
    foreach (IntPtr hwnd in UserWindows()) {
      WINDOWPLACEMENT wp = PlacementOf(hwnd);
      MONITORINFO mi = InfoOf(MonitorFromWindow(hwnd, MONITOR_DEFAULTTONEAREST));
      Window w = new Window();
      w.Handle = hwnd.ToInt64();
      w.Title = TitleOf(hwnd);
      w.ProcessName = ProcessOf(hwnd);
      w.X = wp.rcNormalPosition.Left;
      w.Y = wp.rcNormalPosition.Top;
      w.Width = wp.rcNormalPosition.Right - wp.rcNormalPosition.Left;
      w.Height = wp.rcNormalPosition.Bottom - wp.rcNormalPosition.Top;
      w.ShowCmd = wp.showCmd;
      w.MonitorX = mi.rcMonitor.Left;
      w.MonitorY = mi.rcMonitor.Top;
      result.Add(w);
    }
    return result;
  }

  public static int MoveToPrimary(int monitorX, int monitorY) {
    POINT origin = new POINT();
    RECT work = InfoOf(MonitorFromPoint(origin, MONITOR_DEFAULTTOPRIMARY)).rcWork;
    int moved = 0;
    foreach (IntPtr hwnd in UserWindows()) {
      MONITORINFO mi = InfoOf(MonitorFromWindow(hwnd, MONITOR_DEFAULTTONEAREST));
      if (mi.rcMonitor.Left != monitorX || mi.rcMonitor.Top != monitorY) continue;
      WINDOWPLACEMENT wp = PlacementOf(hwnd);
      int width = wp.rcNormalPosition.Right - wp.rcNormalPosition.Left;
      int height = wp.rcNormalPosition.Bottom - wp.rcNormalPosition.Top;
      int step = (int)(hwnd.ToInt64() % 10) * 30;
      int x = Math.Min(work.Left + 50 + step, work.Right - width - 10);
      int y = Math.Min(work.Top + 50 + step, work.Bottom - height - 10);
      wp.rcNormalPosition.Left = x;
      wp.rcNormalPosition.Top = y;
      wp.rcNormalPosition.Right = x + width;
      wp.rcNormalPosition.Bottom = y + height;
      if (SetWindowPlacement(hwnd, ref wp)) moved++;
    }
    return moved;
  }

  public static bool Restore(long handle, string title, string process, int x, int y, int width, int height, int showCmd, int monitorX, int monitorY) {
    IntPtr hwnd = new IntPtr(handle);
    if (!IsWindow(hwnd)) {
      hwnd = IntPtr.Zero;
      foreach (IntPtr candidate in UserWindows()) {
        if (TitleOf(candidate) == title && ProcessOf(candidate) == process) { hwnd = candidate; break; }
      }
      if (hwnd == IntPtr.Zero) return false;
    }
    POINT corner = new POINT(); corner.X = monitorX; corner.Y = monitorY;
    IntPtr monitor = MonitorFromPoint(corner, MONITOR_DEFAULTTONULL);
    if (monitor == IntPtr.Zero) return false;
    MONITORINFO mi = InfoOf(monitor);
    if (mi.rcMonitor.Left != monitorX || mi.rcMonitor.Top != monitorY) return false;
    WINDOWPLACEMENT wp = PlacementOf(hwnd);
    wp.showCmd = showCmd;
    wp.rcNormalPosition.Left = x;
    wp.rcNormalPosition.Top = y;
    wp.rcNormalPosition.Right = x + width;
    wp.rcNormalPosition.Bottom = y + height;
    return SetWindowPlacement(hwnd, ref wp);
  }
}
'@;
`;

/** WINDOWPLACEMENT.showCmd values. */
const SHOW_STATES: Record<number, WindowShowState> = {
  1: 'normal',
  2: 'minimized',
  3: 'maximized'
};

const SHOW_COMMANDS: Record<WindowShowState, number> = {
  normal: 1,
  minimized: 2,
  maximized: 3
};

function toPlacement(entry: unknown): WindowPlacement | null {
  if (!isRecord(entry)) return null;
  const { Handle, Title, ProcessName, X, Y, Width, Height, ShowCmd, MonitorX, MonitorY } = entry;
  if (
    typeof Handle !== 'number' || typeof Title !== 'string' || typeof ProcessName !== 'string' ||
    typeof X !== 'number' || typeof Y !== 'number' || typeof Width !== 'number' || typeof Height !== 'number' ||
    typeof ShowCmd !== 'number' || typeof MonitorX !== 'number' || typeof MonitorY !== 'number'
  ) {
    return null;
  }
  return {
    handle: Handle,
    title: Title,
    processName: ProcessName,
    x: X,
    y: Y,
    width: Width,
    height: Height,
    state: SHOW_STATES[ShowCmd] ?? 'normal',
    monitor: { x: MonitorX, y: MonitorY }
  };
}

export class PowerShellWindowController implements WindowController {
  constructor(private readonly options: { timeoutMs?: number } = {}) {}

  private ps(script: string): string {
    return runPowerShell(SOURCE, WINDOW_SHIM + script, this.options.timeoutMs);
  }

  async listWindows(): Promise<WindowPlacement[]> {
    const raw = this.ps('ConvertTo-Json -InputObject @([WindowNative]::List()) -Depth 3 -Compress;');

    const windows: WindowPlacement[] = [];
    for (const entry of parseJsonArray(SOURCE, raw, 'window list')) {
      const placement = toPlacement(entry);
      if (placement) windows.push(placement);
      else log.debug({ entry }, 'Skipping malformed window entry');
    }
    return windows;
  }

  async moveWindowsToPrimary(monitor: Position): Promise<number> {
    const raw = this.ps(`[WindowNative]::MoveToPrimary(${int(SOURCE, monitor.x, 'x')}, ${int(SOURCE, monitor.y, 'y')});`);
    const moved = Number.parseInt(raw, 10);
    return Number.isNaN(moved) ? 0 : moved;
  }

  async restoreWindow(saved: WindowPlacement): Promise<boolean> {
    const args = [
      int(SOURCE, saved.handle, 'handle'),
      quote(saved.title),
      quote(saved.processName),
      int(SOURCE, saved.x, 'x'),
      int(SOURCE, saved.y, 'y'),
      int(SOURCE, saved.width, 'width'),
      int(SOURCE, saved.height, 'height'),
      String(SHOW_COMMANDS[saved.state]),
      int(SOURCE, saved.monitor.x, 'monitor.x'),
      int(SOURCE, saved.monitor.y, 'monitor.y')
    ].join(', ');

    return this.ps(`[WindowNative]::Restore(${args});`).toLowerCase() === 'true';
  }
}
