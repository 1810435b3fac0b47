/**
 * profiles/controller.ts
 *
 * The pipeline the shell drives:
 *
 *   Save  → enumerate → build profile → validate → store
 *   Apply → load + validate → enumerate → reconcile → apply → report
 *
 * When the backend can see application windows, Apply also parks the
 * windows of monitors it turns off on the primary display, and puts
 * cached windows back on monitors it turns on.
 *
 * Holds no hardware state between calls; each call starts from a fresh
 * enumeration. Serialising Save/Apply is the caller's job (the registry
 * does it through the action gate).
 */

import { ApplyReport, DisplayState, Position, Profile, ReconciliationPlan, WindowReport } from '../core/types';
import { ProfileNotFoundError, ValidationError, errorMessage } from '../core/errors';
import { scopedLogger } from '../core/logger';
import { DisplayBackend } from '../display/backend';
import { enumerate } from '../display/enumerator';
import { reconcile } from '../display/reconciler';
import { ConfigurationApplier, ApplierOptions } from '../display/applier';
import { ProfileStore } from './store';
import { WindowCache } from './window_cache';
import { validateProfile } from './validation';

const log = scopedLogger('profiles/controller');

export interface CaptureOptions {
  /** devicePath → enabled. Lets the shell save a profile that turns some monitors off. */
  enabledOverrides?: Record<string, boolean>;
  now?: Date;
}

export interface ApplyOutcome {
  plan: ReconciliationPlan;
  report: ApplyReport;
  /** Present when window management ran. */
  windows?: WindowReport;
}

export interface ControllerOptions extends ApplierOptions {
  autoDisableExtras?: boolean;
  /** Default for applyProfile; true when unset. */
  manageWindows?: boolean;
  /** Where placements go while their monitor is off. Without one, windows are left alone. */
  windowCache?: WindowCache;
}

const originKey = (p: Position): string => `${p.x},${p.y}`;

function enabledOrigins(displays: readonly DisplayState[]): Set<string> {
  return new Set(displays.filter(d => d.enabled).map(d => originKey(d.position)));
}

export class DisplayProfileController {
  private readonly applier: ConfigurationApplier;

  constructor(
    readonly backend: DisplayBackend,
    readonly store: ProfileStore,
    private readonly options: ControllerOptions = {}
  ) {
    this.applier = new ConfigurationApplier(backend, options);
  }

  async enumerate(): Promise<DisplayState[]> {
    return enumerate(this.backend);
  }

  /** Asks the OS to attach connected-but-detached monitors, then re-enumerates. */
  async detectDisplays(): Promise<{ attached: boolean; displays: DisplayState[] }> {
    const attached = this.backend.detectDisplays ? await this.backend.detectDisplays() : false;
    return { attached, displays: await this.enumerate() };
  }

  /**
   * Snapshots the live arrangement under `name`. Saving over an existing
   * profile keeps its createdAt and its place in the list.
   */
  async captureProfile(name: string, options: CaptureOptions = {}): Promise<Profile> {
    const live = await this.enumerate();
    const overrides = options.enabledOverrides ?? {};

    for (const devicePath of Object.keys(overrides)) {
      if (!live.some(d => d.identity.devicePath === devicePath)) {
        throw new ValidationError('schema', `Override names unknown display ${devicePath}`, { devicePath });
      }
    }

    // Detached devices only belong in a profile when the caller says so.
    const displays = live
      .filter(d => d.identity.devicePath in overrides || d.enabled)
      .map((d): DisplayState => {
        const enabled = overrides[d.identity.devicePath] ?? d.enabled;
        return { ...d, enabled, isPrimary: enabled && d.isPrimary };
      });

    const now = (options.now ?? new Date()).toISOString();
    let createdAt = now;
    try {
      createdAt = (await this.store.get(name)).createdAt;
    } catch (e) {
      if (!(e instanceof ProfileNotFoundError)) throw e;
    }

    const profile: Profile = { name, displays, createdAt, updatedAt: now };
    validateProfile(profile);

    log.info({ profile: name, displays: displays.length, overwrite: createdAt !== now }, 'Capturing current layout');
    return this.store.save(profile);
  }

  /** Dry run: the plan Apply would execute right now. */
  async planProfile(name: string, autoDisableExtras?: boolean): Promise<ReconciliationPlan> {
    const profile = await this.store.get(name);
    validateProfile(profile);
    const live = await this.enumerate();
    return reconcile(live, profile, autoDisableExtras ?? this.options.autoDisableExtras ?? false);
  }

  async applyProfile(name: string, autoDisableExtras?: boolean, manageWindows?: boolean): Promise<ApplyOutcome> {
    const plan = await this.planProfile(name, autoDisableExtras);
    const cache = this.options.windowCache;
    if (!(manageWindows ?? this.options.manageWindows ?? true) || !cache || !this.backend.windows) {
      return { plan, report: await this.applier.apply(plan) };
    }

    const windows: WindowReport = { saved: 0, moved: 0, restored: 0 };
    await this.parkWindows(plan, cache, windows);
    const report = await this.applier.apply(plan);
    if (report.failed === 0) {
      await this.restoreWindows(plan, cache, windows);
    }
    return { plan, report, windows };
  }

  // -----------------------------------------------------------------------
  // Windows
  // -----------------------------------------------------------------------

  /** Saves every placement, then empties the monitors the plan disables. */
  private async parkWindows(plan: ReconciliationPlan, cache: WindowCache, report: WindowReport): Promise<void> {
    const controller = this.backend.windows;
    const disabled = new Set(plan.operations.filter(op => op.kind === 'disable').map(op => op.identity.devicePath));
    const leaving = plan.live.filter(d => d.enabled && disabled.has(d.identity.devicePath)).map(d => d.position);
    if (!controller || leaving.length === 0) return;

    try {
      const placements = await controller.listWindows();
      await cache.save(placements);
      report.saved = placements.length;
      for (const origin of leaving) {
        report.moved += await controller.moveWindowsToPrimary(origin);
      }
      log.info({ profile: plan.profileName, saved: report.saved, moved: report.moved }, 'Windows moved off departing monitors');
    } catch (e) {
      report.error = errorMessage(e);
      log.warn({ profile: plan.profileName, error: report.error }, 'Could not move windows before apply');
    }
  }

  /** Puts cached windows back on monitors that were off before this Apply. */
  private async restoreWindows(plan: ReconciliationPlan, cache: WindowCache, report: WindowReport): Promise<void> {
    const controller = this.backend.windows;
    if (!controller) return;

    try {
      const before = enabledOrigins(plan.live);
      const arrived = [...enabledOrigins(await this.enumerate())].filter(key => !before.has(key));
      if (arrived.length === 0) return;

      const returning = (await cache.load()).filter(w => arrived.includes(originKey(w.monitor)));
      for (const placement of returning) {
        if (await controller.restoreWindow(placement)) report.restored++;
      }
      log.info({ profile: plan.profileName, restored: report.restored, of: returning.length }, 'Windows restored');
    } catch (e) {
      report.error = errorMessage(e);
      log.warn({ profile: plan.profileName, error: report.error }, 'Could not restore windows after apply');
    }
  }
}
