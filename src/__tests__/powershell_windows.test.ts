import { execSync } from 'child_process';
import { PowerShellWindowController } from '../display/powershell_windows';
import { ExecutionError } from '../core/errors';

jest.mock('child_process');

describe('PowerShellWindowController', () => {
  const mockExecSync = jest.mocked(execSync);
  let windows: PowerShellWindowController;

  function lastScript(): string {
    const command = mockExecSync.mock.calls[mockExecSync.mock.calls.length - 1][0];
    const encoded = command.split(' -EncodedCommand ')[1];
    return Buffer.from(encoded, 'base64').toString('utf16le');
  }

  beforeEach(() => {
    jest.resetAllMocks();
    windows = new PowerShellWindowController();
  });

  it('lists windows with their monitor and show state', async () => {
    mockExecSync.mockReturnValue(JSON.stringify([
      { Handle: 4242, Title: 'Editor', ProcessName: 'code', X: 2700, Y: 100, Width: 800, Height: 600, ShowCmd: 3, MonitorX: 2560, MonitorY: 0 },
      { Handle: 17, Title: 'Broken' }
    ]));

    expect(await windows.listWindows()).toEqual([{
      handle: 4242,
      title: 'Editor',
      processName: 'code',
      x: 2700,
      y: 100,
      width: 800,
      height: 600,
      state: 'maximized',
      monitor: { x: 2560, y: 0 }
    }]);
    expect(lastScript()).toContain('public class WindowNative');
    expect(lastScript()).toContain('ConvertTo-Json -InputObject @([WindowNative]::List()) -Depth 3 -Compress;');
  });

  it('moves the windows of one monitor and counts them', async () => {
    mockExecSync.mockReturnValue('3');

    expect(await windows.moveWindowsToPrimary({ x: -1920, y: 0 })).toBe(3);
    expect(lastScript()).toContain('[WindowNative]::MoveToPrimary(-1920, 0);');
  });

  it('restores a placement with quoted title and process', async () => {
    mockExecSync.mockReturnValueOnce('True').mockReturnValueOnce('False');
    const saved = {
      handle: 99, title: "Bob's notes", processName: 'notepad', x: 10, y: 20, width: 300, height: 200,
      state: 'minimized' as const, monitor: { x: 0, y: 0 }
    };

    expect(await windows.restoreWindow(saved)).toBe(true);
    expect(lastScript()).toContain("[WindowNative]::Restore(99, 'Bob''s notes', 'notepad', 10, 20, 300, 200, 2, 0, 0);");
    expect(await windows.restoreWindow(saved)).toBe(false);
  });

  it('raises the PowerShell error text', async () => {
    mockExecSync.mockImplementation(() => {
      throw Object.assign(new Error('Command failed'), { stderr: 'Add-Type: compilation failed' });
    });

    await expect(windows.listWindows()).rejects.toThrow(ExecutionError);
    await expect(windows.listWindows()).rejects.toThrow('Add-Type: compilation failed');
  });
});
