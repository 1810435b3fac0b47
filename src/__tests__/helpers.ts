import { DisplayState, Profile } from '../core/types';

export const D1 = '\\\\.\\DISPLAY1';
export const D2 = '\\\\.\\DISPLAY2';
export const D3 = '\\\\.\\DISPLAY3';

export function display(
  devicePath: string,
  ordinal: number,
  overrides: Partial<Omit<DisplayState, 'identity'>> = {}
): DisplayState {
  return {
    identity: { devicePath, ordinal },
    enabled: true,
    resolution: { width: 1920, height: 1080 },
    refreshHz: 60,
    position: { x: 0, y: 0 },
    isPrimary: false,
    ...overrides
  };
}

export function profile(name: string, displays: DisplayState[]): Profile {
  return {
    name,
    displays,
    createdAt: '2026-01-01T00:00:00.000Z',
    updatedAt: '2026-01-01T00:00:00.000Z'
  };
}
