/**
 * display/modes.ts
 *
 * Picks the driver mode to request for a target resolution/refresh.
 * The resolution must be available as-is or rotated (portrait panels list
 * their modes in landscape); the refresh rate snaps to the nearest one the
 * driver offers, which absorbs 59/60 Hz reporting differences.
 */

import { DisplayMode, Resolution } from '../core/types';
import { sameOrRotatedResolution, sameResolution } from './geometry';

export interface ModeChoice {
  mode: DisplayMode;
  exact: boolean;                          // resolution and refresh both as requested
}

/**
 * Returns undefined when no mode has the requested resolution: callers
 * must report that as a failure rather than pick some other size.
 */
export function pickBestMode(
  modes: readonly DisplayMode[],
  resolution: Resolution,
  refreshHz: number
): ModeChoice | undefined {
  let best: { mode: DisplayMode; score: number } | undefined;

  for (const mode of modes) {
    if (!sameOrRotatedResolution(mode.resolution, resolution)) continue;

    // Exact orientation beats a rotated listing; then the closest refresh wins.
    let score = sameResolution(mode.resolution, resolution) ? 1000 : 900;
    score += mode.refreshHz === refreshHz ? 100 : Math.max(0, 50 - Math.abs(mode.refreshHz - refreshHz));

    if (!best || score > best.score) {
      best = { mode, score };
    }
  }

  if (!best) return undefined;

  // A rotated listing is requested in the target's orientation.
  const chosen: DisplayMode = { resolution: { ...resolution }, refreshHz: best.mode.refreshHz };
  return { mode: chosen, exact: chosen.refreshHz === refreshHz };
}
