import { pickBestMode } from '../display/modes';
import { DisplayMode } from '../core/types';

function mode(width: number, height: number, refreshHz: number): DisplayMode {
  return { resolution: { width, height }, refreshHz };
}

describe('pickBestMode', () => {
  const fhd = { width: 1920, height: 1080 };

  it('returns the exact mode when the driver lists it', () => {
    expect(pickBestMode([mode(1920, 1080, 60), mode(1920, 1080, 144)], fhd, 144)).toEqual({
      mode: mode(1920, 1080, 144),
      exact: true
    });
  });

  it('snaps to the nearest refresh rate', () => {
    expect(pickBestMode([mode(1920, 1080, 60), mode(1920, 1080, 120)], fhd, 59)).toEqual({
      mode: mode(1920, 1080, 60),
      exact: false
    });
  });

  it('accepts a mode listed in the other orientation and requests the target one', () => {
    expect(pickBestMode([mode(1080, 1920, 60)], fhd, 60)).toEqual({
      mode: mode(1920, 1080, 60),
      exact: true
    });
  });

  it('prefers the listing in the requested orientation', () => {
    const choice = pickBestMode([mode(1080, 1920, 60), mode(1920, 1080, 75)], fhd, 60);

    expect(choice?.mode.refreshHz).toBe(75);
  });

  it('returns undefined when no mode has the resolution', () => {
    expect(pickBestMode([mode(1280, 720, 60)], fhd, 60)).toBeUndefined();
    expect(pickBestMode([], fhd, 60)).toBeUndefined();
  });
});
