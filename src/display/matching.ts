/**
 * display/matching.ts
 *
 * Pairs target displays (from a profile) with live displays (from an
 * enumeration) when device paths drift. Shared by the reconciler and the
 * applier so both resolve identities the same way.
 *
 * Stages, each run over every still-unmatched target in profile order
 * before the next stage starts:
 *   1. identity : same device path
 *   2. ordinal  : same adapter index
 *   3. mode     : closest resolution (a 90° turn counts as the same
 *                 size), then closest refresh rate; ties go to the
 *                 display enumerated first
 *
 * Stage 3 takes any remaining display, so a target is only unmatched
 * once every live display is spoken for. There is no stage 4.
 */

import { DisplayMatch, DisplayState, MatchStage } from '../core/types';
import { resolutionDistance } from './geometry';

export interface MatchOutcome {
  matches: DisplayMatch[];                 // profile order
  unmatchedTargets: DisplayState[];        // profile order
  unmatchedLive: DisplayState[];           // live order
}

type Finder = (target: DisplayState, candidates: readonly DisplayState[]) => number;

function byIdentity(target: DisplayState, candidates: readonly DisplayState[]): number {
  return candidates.findIndex(c => c.identity.devicePath === target.identity.devicePath);
}

function byOrdinal(target: DisplayState, candidates: readonly DisplayState[]): number {
  return candidates.findIndex(c => c.identity.ordinal === target.identity.ordinal);
}

function byMode(target: DisplayState, candidates: readonly DisplayState[]): number {
  let bestIndex = -1;
  let bestPixels = Number.POSITIVE_INFINITY;
  let bestHz = Number.POSITIVE_INFINITY;
  candidates.forEach((candidate, index) => {
    const pixels = resolutionDistance(candidate.resolution, target.resolution);
    const hz = Math.abs(candidate.refreshHz - target.refreshHz);
    // Strict comparisons keep the earlier display on a tie.
    if (pixels < bestPixels || (pixels === bestPixels && hz < bestHz)) {
      bestIndex = index;
      bestPixels = pixels;
      bestHz = hz;
    }
  });
  return bestIndex;
}

const STAGES: ReadonlyArray<[MatchStage, Finder]> = [
  ['identity', byIdentity],
  ['ordinal', byOrdinal],
  ['mode', byMode]
];

export function matchDisplays(live: readonly DisplayState[], targets: readonly DisplayState[]): MatchOutcome {
  const slots: Array<DisplayMatch | undefined> = targets.map(() => undefined);
  const taken = new Set<number>();

  for (const [stage, find] of STAGES) {
    targets.forEach((target, targetIndex) => {
      if (slots[targetIndex]) return;

      const pool = live.map((display, liveIndex) => ({ display, liveIndex })).filter(c => !taken.has(c.liveIndex));
      const found = find(target, pool.map(c => c.display));
      if (found < 0) return;

      const { display, liveIndex } = pool[found];
      taken.add(liveIndex);
      slots[targetIndex] = { target, live: display, via: stage };
    });
  }

  const matches: DisplayMatch[] = [];
  const unmatchedTargets: DisplayState[] = [];
  targets.forEach((target, index) => {
    const slot = slots[index];
    if (slot) matches.push(slot);
    else unmatchedTargets.push(target);
  });

  return {
    matches,
    unmatchedTargets,
    unmatchedLive: live.filter((_, index) => !taken.has(index))
  };
}

/**
 * Resolves one display against a fresh enumeration: exact path first, then
 * the ordinal and mode fallbacks. Used mid-apply when a path disappears.
 */
export function resolveDisplay(
  target: DisplayState,
  candidates: readonly DisplayState[]
): { display: DisplayState; via: MatchStage } | undefined {
  for (const [stage, find] of STAGES) {
    const found = find(target, candidates);
    if (found >= 0) return { display: candidates[found], via: stage };
  }
  return undefined;
}
