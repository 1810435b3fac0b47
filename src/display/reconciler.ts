/**
 * display/reconciler.ts
 *
 * Diffs live display state against a profile and returns the ordered
 * plan that moves the hardware toward it. Pure: no OS access, no state.
 *
 * Plan order:
 *   1. disable     : shrink the desktop first so nothing moves onto a
 *                    monitor that is about to go away
 *   2. enable      : profile order, with the profile's saved geometry
 *   3. reposition  : already-enabled displays whose geometry or rotation
 *                    changes
 *   4. setPrimary
 * Within a group, profile order; extras follow in enumeration order.
 */

import {
  DisplayState,
  Operation,
  PlanWarning,
  Profile,
  ReconciliationPlan,
  DisableOperation,
  EnableOperation,
  RepositionOperation,
  SetPrimaryOperation
} from '../core/types';
import { InvalidPlanError } from '../core/errors';
import { scopedLogger } from '../core/logger';
import { matchDisplays } from './matching';
import { overlaps, rectOf, sameGeometry } from './geometry';

const log = scopedLogger('display/reconciler');

interface FinalState {
  devicePath: string;
  state: Pick<DisplayState, 'position' | 'resolution'>;
}

function overlapWarnings(finals: FinalState[]): PlanWarning[] {
  const warnings: PlanWarning[] = [];
  for (let i = 0; i < finals.length; i++) {
    for (let j = i + 1; j < finals.length; j++) {
      const a = finals[i];
      const b = finals[j];
      if (overlaps(rectOf(a.state.position, a.state.resolution), rectOf(b.state.position, b.state.resolution))) {
        warnings.push({
          kind: 'overlapping-geometry',
          message: `${a.devicePath} and ${b.devicePath} overlap after this plan`,
          devicePath: a.devicePath
        });
      }
    }
  }
  return warnings;
}

export function reconcile(
  live: readonly DisplayState[],
  target: Profile,
  autoDisableExtras: boolean
): ReconciliationPlan {
  const { matches, unmatchedTargets, unmatchedLive } = matchDisplays(live, target.displays);
  const warnings: PlanWarning[] = [];

  const disables: DisableOperation[] = [];
  const enables: EnableOperation[] = [];
  const repositions: RepositionOperation[] = [];
  const primaries: SetPrimaryOperation[] = [];

  for (const match of matches) {
    if (match.via !== 'identity') {
      warnings.push({
        kind: 'identity-drift',
        message: `${match.target.identity.devicePath} not found; using ${match.live.identity.devicePath} (matched by ${match.via})`,
        devicePath: match.target.identity.devicePath
      });
    }
  }

  for (const missing of unmatchedTargets) {
    warnings.push({
      kind: 'target-not-found',
      message: `${missing.identity.devicePath} is not connected; no operation planned for it`,
      devicePath: missing.identity.devicePath
    });
  }

  for (const { target: want, live: have } of matches) {
    const identity = { ...have.identity };

    if (!want.enabled) {
      if (have.enabled) {
        disables.push({ kind: 'disable', identity });
        if (have.isPrimary) {
          warnings.push({
            kind: 'disables-primary',
            message: `${identity.devicePath} is the primary display; the OS may refuse to disable it`,
            devicePath: identity.devicePath
          });
        }
      }
      continue;
    }

    if (!have.enabled) {
      enables.push({
        kind: 'enable',
        identity,
        resolution: { ...want.resolution },
        refreshHz: want.refreshHz,
        position: { ...want.position },
        orientation: want.orientation
      });
    } else if (!sameGeometry(have, want)) {
      repositions.push({
        kind: 'reposition',
        identity,
        position: { ...want.position },
        resolution: { ...want.resolution },
        refreshHz: want.refreshHz,
        orientation: want.orientation
      });
    }

    if (want.isPrimary && !(have.enabled && have.isPrimary)) {
      primaries.push({ kind: 'setPrimary', identity });
    }
  }

  if (autoDisableExtras) {
    for (const extra of unmatchedLive) {
      if (!extra.enabled) continue;
      if (extra.isPrimary) {
        warnings.push({
          kind: 'primary-extra-kept',
          message: `${extra.identity.devicePath} is not in the profile but is the primary display; left enabled`,
          devicePath: extra.identity.devicePath
        });
        continue;
      }
      disables.push({ kind: 'disable', identity: { ...extra.identity } });
    }
  }

  const disabledPaths = new Set(disables.map(op => op.identity.devicePath));
  const liveEnabled = live.filter(d => d.enabled);
  if (liveEnabled.length > 0 && liveEnabled.every(d => disabledPaths.has(d.identity.devicePath))) {
    throw new InvalidPlanError(
      `Applying "${target.name}" would disable every active display`,
      { profileName: target.name, disabled: Array.from(disabledPaths) }
    );
  }

  const targetByPath = new Map<string, DisplayState>();
  for (const op of [...enables, ...repositions]) {
    const want = matches.find(m => m.live.identity.devicePath === op.identity.devicePath);
    if (want) targetByPath.set(op.identity.devicePath, want.target);
  }
  const finals: FinalState[] = [];
  for (const display of live) {
    const path = display.identity.devicePath;
    if (disabledPaths.has(path)) continue;
    const planned = targetByPath.get(path);
    if (planned) finals.push({ devicePath: path, state: planned });
    else if (display.enabled) finals.push({ devicePath: path, state: display });
  }
  warnings.push(...overlapWarnings(finals));

  const operations: Operation[] = [...disables, ...enables, ...repositions, ...primaries];

  log.info({
    profile: target.name,
    autoDisableExtras,
    operations: operations.map(op => `${op.kind}:${op.identity.devicePath}`),
    warnings: warnings.length
  }, 'Plan computed');

  return {
    profileName: target.name,
    autoDisableExtras,
    operations,
    warnings,
    matches,
    live: live.map(d => ({ ...d }))
  };
}
