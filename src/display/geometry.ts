/**
 * display/geometry.ts
 *
 * Rectangle helpers over extended-desktop coordinates.
 */

import { DisplayState, Position, Resolution } from '../core/types';

export interface Rect {
  left: number;
  top: number;
  right: number;                           // exclusive
  bottom: number;                          // exclusive
}

export function rectOf(position: Position, resolution: Resolution): Rect {
  return {
    left: position.x,
    top: position.y,
    right: position.x + resolution.width,
    bottom: position.y + resolution.height
  };
}

/** Touching edges do not count: adjacent monitors share a border, they don't overlap. */
export function overlaps(a: Rect, b: Rect): boolean {
  return a.left < b.right && b.left < a.right && a.top < b.bottom && b.top < a.bottom;
}

export function samePosition(a: Position, b: Position): boolean {
  return a.x === b.x && a.y === b.y;
}

export function sameResolution(a: Resolution, b: Resolution): boolean {
  return a.width === b.width && a.height === b.height;
}

/** Same resolution, or the same panel turned 90°. */
export function sameOrRotatedResolution(a: Resolution, b: Resolution): boolean {
  return sameResolution(a, b) || (a.width === b.height && a.height === b.width);
}

/** A target without an orientation accepts whatever rotation the panel has. */
export function sameOrientation(have: DisplayState, want: DisplayState): boolean {
  return want.orientation === undefined || (have.orientation ?? 0) === want.orientation;
}

export function sameGeometry(have: DisplayState, want: DisplayState): boolean {
  return sameResolution(have.resolution, want.resolution) &&
    have.refreshHz === want.refreshHz &&
    samePosition(have.position, want.position) &&
    sameOrientation(have, want);
}

/**
 * How far apart two resolutions are, in pixels of width plus height. A
 * panel turned 90° counts as the same size.
 */
export function resolutionDistance(a: Resolution, b: Resolution): number {
  const straight = Math.abs(a.width - b.width) + Math.abs(a.height - b.height);
  const rotated = Math.abs(a.width - b.height) + Math.abs(a.height - b.width);
  return Math.min(straight, rotated);
}

export function formatMode(resolution: Resolution, refreshHz: number): string {
  return `${resolution.width}x${resolution.height}@${refreshHz}Hz`;
}
