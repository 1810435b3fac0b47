/**
 * display/applier.ts
 *
 * Executes a ReconciliationPlan against a DisplayBackend, strictly in plan
 * order and one step at a time.
 *
 *   - After an enable or disable, the next step re-enumerates first: the OS
 *     may have re-assigned device paths. A missing path is re-resolved with
 *     the same fallbacks the reconciler uses.
 *   - A rejected step is recorded as failed and the plan continues.
 *   - Once the plan has run, failed enable/reposition steps get exactly one
 *     more attempt. Disable and setPrimary failures are left as they are.
 *   - Nothing is rolled back.
 */

import {
  ApplyReport,
  DisplayIdentity,
  DisplayMode,
  DisplayState,
  Operation,
  PlanWarning,
  ReconciliationPlan,
  Resolution,
  StepReport
} from '../core/types';
import { ApplyStepFailure, errorCode, errorMessage } from '../core/errors';
import { scopedLogger } from '../core/logger';
import { DisplayBackend, SetDisplayStateRequest, requestFromState } from './backend';
import { enumerate } from './enumerator';
import { resolveDisplay } from './matching';
import { pickBestMode } from './modes';
import { formatMode } from './geometry';

const log = scopedLogger('display/applier');

export interface ApplierOptions {
  /** Pause before the retry pass; drivers often report busy right after a topology change. */
  retryDelayMs?: number;
}

const DEFAULT_RETRY_DELAY_MS = 500;

/** Mutable bookkeeping for one apply() call. Never outlives it. */
interface ApplyRun {
  plan: ReconciliationPlan;
  current: DisplayState[];
  needsRefresh: boolean;
  detected: boolean;
  aliases: Map<string, DisplayIdentity>;   // planned path → where the display is now
  expected: Map<string, DisplayMode>;      // planned path → mode it should have now
  warnings: PlanWarning[];
}

function isRetryable(op: Operation): boolean {
  return op.kind === 'enable' || op.kind === 'reposition';
}

export class ConfigurationApplier {
  private readonly retryDelayMs: number;

  constructor(private readonly backend: DisplayBackend, options: ApplierOptions = {}) {
    this.retryDelayMs = options.retryDelayMs ?? DEFAULT_RETRY_DELAY_MS;
  }

  async apply(plan: ReconciliationPlan): Promise<ApplyReport> {
    const startTime = Date.now();
    const run: ApplyRun = {
      plan,
      current: plan.live.map(d => ({ ...d })),
      needsRefresh: false,
      detected: false,
      aliases: new Map(),
      expected: new Map(),
      warnings: [...plan.warnings]
    };

    log.info({ profile: plan.profileName, steps: plan.operations.length }, 'Applying plan');

    const steps: StepReport[] = [];
    const blockedByEnable = new Set<number>();

    for (const [index, op] of plan.operations.entries()) {
      if (op.kind === 'setPrimary' && this.enableDidNotSucceed(steps, op.identity.devicePath)) {
        blockedByEnable.add(index);
        steps.push({
          index,
          operation: op,
          resolvedIdentity: op.identity,
          outcome: { status: 'skipped', reason: `enable of ${op.identity.devicePath} did not succeed` },
          attempts: 0
        });
        continue;
      }
      steps.push(await this.runStep(run, index, op, 0));
    }

    await this.retryPass(run, steps, blockedByEnable);

    const report: ApplyReport = {
      profileName: plan.profileName,
      steps,
      warnings: run.warnings,
      succeeded: steps.filter(s => s.outcome.status === 'succeeded').length,
      failed: steps.filter(s => s.outcome.status === 'failed').length,
      skipped: steps.filter(s => s.outcome.status === 'skipped').length,
      startedAt: new Date(startTime).toISOString(),
      durationMs: Date.now() - startTime
    };

    log.info({
      profile: plan.profileName,
      succeeded: report.succeeded,
      failed: report.failed,
      skipped: report.skipped,
      durationMs: report.durationMs
    }, 'Plan applied');

    return report;
  }

  // -----------------------------------------------------------------------
  // Retry
  // -----------------------------------------------------------------------

  private async retryPass(run: ApplyRun, steps: StepReport[], blockedByEnable: Set<number>): Promise<void> {
    const retryable = steps.filter(s => s.outcome.status === 'failed' && isRetryable(s.operation));
    if (retryable.length === 0) return;

    log.info({ count: retryable.length, delayMs: this.retryDelayMs }, 'Retrying failed steps once');
    await new Promise(resolve => setTimeout(resolve, this.retryDelayMs));
    run.needsRefresh = true;

    for (const step of retryable) {
      steps[step.index] = await this.runStep(run, step.index, step.operation, step.attempts);
    }

    for (const index of blockedByEnable) {
      const step = steps[index];
      if (this.enableDidNotSucceed(steps, step.operation.identity.devicePath)) continue;
      steps[index] = await this.runStep(run, index, step.operation, step.attempts);
    }
  }

  private enableDidNotSucceed(steps: readonly StepReport[], devicePath: string): boolean {
    return steps.some(s =>
      s.operation.kind === 'enable' &&
      s.operation.identity.devicePath === devicePath &&
      s.outcome.status !== 'succeeded'
    );
  }

  // -----------------------------------------------------------------------
  // One step
  // -----------------------------------------------------------------------

  private async runStep(run: ApplyRun, index: number, op: Operation, previousAttempts: number): Promise<StepReport> {
    const plannedPath = op.identity.devicePath;

    if (run.needsRefresh) {
      try {
        run.current = await enumerate(this.backend);
        run.needsRefresh = false;
      } catch (e) {
        log.error({ step: index, error: errorMessage(e) }, 'Re-enumeration failed before step');
        return {
          index,
          operation: op,
          resolvedIdentity: op.identity,
          outcome: { status: 'failed', code: errorCode(e, 'ENUMERATION_ERROR'), reason: errorMessage(e) },
          attempts: previousAttempts + 1
        };
      }
    }

    const display = this.resolve(run, op);
    if (!display) {
      log.warn({ step: index, devicePath: plannedPath }, 'Display no longer present: step skipped');
      return {
        index,
        operation: op,
        resolvedIdentity: run.aliases.get(plannedPath) ?? op.identity,
        outcome: { status: 'skipped', reason: `${plannedPath} is no longer present` },
        attempts: previousAttempts
      };
    }

    try {
      await this.execute(run, op, display);
      log.info({ step: index, kind: op.kind, devicePath: display.identity.devicePath }, 'Step succeeded');
      return {
        index,
        operation: op,
        resolvedIdentity: { ...display.identity },
        outcome: { status: 'succeeded' },
        attempts: previousAttempts + 1
      };
    } catch (e) {
      const failure = e instanceof ApplyStepFailure
        ? e
        : new ApplyStepFailure(display.identity, errorMessage(e), 'OS_CALL_FAILED');
      log.warn({ step: index, kind: op.kind, devicePath: display.identity.devicePath, code: failure.code, reason: failure.reason }, 'Step failed');
      return {
        index,
        operation: op,
        resolvedIdentity: { ...display.identity },
        outcome: { status: 'failed', code: failure.code, reason: failure.reason },
        attempts: previousAttempts + 1
      };
    } finally {
      if (op.kind === 'enable' || op.kind === 'disable') {
        run.needsRefresh = true;
      }
    }
  }

  /**
   * Finds where the step's display is now: its last known path, or a
   * fallback match among devices the plan doesn't already account for.
   */
  private resolve(run: ApplyRun, op: Operation): DisplayState | undefined {
    const plannedPath = op.identity.devicePath;
    const known = run.aliases.get(plannedPath) ?? op.identity;

    const direct = run.current.find(d => d.identity.devicePath === known.devicePath);
    if (direct) return direct;

    const otherPlanned = new Set(run.plan.live.map(d => d.identity.devicePath).filter(p => p !== plannedPath));
    const otherAliases = new Set(
      Array.from(run.aliases.entries()).filter(([from]) => from !== plannedPath).map(([, to]) => to.devicePath)
    );
    const candidates = run.current.filter(d =>
      !otherPlanned.has(d.identity.devicePath) && !otherAliases.has(d.identity.devicePath)
    );

    const found = resolveDisplay(this.expectedStateFor(run, op, known), candidates);
    if (!found) return undefined;

    run.aliases.set(plannedPath, { ...found.display.identity });
    run.warnings.push({
      kind: 'identity-drift',
      message: `${plannedPath} re-enumerated as ${found.display.identity.devicePath} (matched by ${found.via})`,
      devicePath: plannedPath
    });
    log.warn({ from: plannedPath, to: found.display.identity.devicePath, via: found.via }, 'Display identity drifted mid-apply');
    return found.display;
  }

  /** What the display should look like right now, for the fallback stages. */
  private expectedStateFor(run: ApplyRun, op: Operation, known: DisplayIdentity): DisplayState {
    const plannedPath = op.identity.devicePath;
    const base = run.plan.live.find(d => d.identity.devicePath === plannedPath);
    const mode: DisplayMode | undefined =
      op.kind === 'enable' || op.kind === 'reposition'
        ? { resolution: op.resolution, refreshHz: op.refreshHz }
        : run.expected.get(plannedPath);

    return {
      identity: { ...known },
      enabled: base?.enabled ?? true,
      resolution: { ...(mode?.resolution ?? base?.resolution ?? { width: 0, height: 0 }) },
      refreshHz: mode?.refreshHz ?? base?.refreshHz ?? 0,
      position: { ...(base?.position ?? { x: 0, y: 0 }) },
      isPrimary: base?.isPrimary ?? false
    };
  }

  private async execute(run: ApplyRun, op: Operation, display: DisplayState): Promise<void> {
    const identity = display.identity;
    let request: SetDisplayStateRequest;

    switch (op.kind) {
      case 'disable': {
        if (!display.enabled) return; // already detached
        request = { ...requestFromState(display), enabled: false, isPrimary: false };
        break;
      }

      case 'enable': {
        if (!run.detected && this.backend.detectDisplays) {
          run.detected = true;
          const attached = await this.backend.detectDisplays();
          log.debug({ attached }, 'Display detection requested before first enable');
        }
        const mode = await this.chooseMode(identity, op.resolution, op.refreshHz);
        request = {
          ...requestFromState(display),
          enabled: true,
          width: mode.resolution.width,
          height: mode.resolution.height,
          refreshHz: mode.refreshHz,
          x: op.position.x,
          y: op.position.y,
          isPrimary: false,
          orientation: op.orientation ?? display.orientation
        };
        break;
      }

      case 'reposition': {
        if (!display.enabled) throw new ApplyStepFailure(identity, 'display is not enabled', 'NOT_ENABLED');
        const mode = await this.chooseMode(identity, op.resolution, op.refreshHz);
        request = {
          ...requestFromState(display),
          width: mode.resolution.width,
          height: mode.resolution.height,
          refreshHz: mode.refreshHz,
          x: op.position.x,
          y: op.position.y,
          orientation: op.orientation ?? display.orientation
        };
        break;
      }

      case 'setPrimary': {
        if (!display.enabled) throw new ApplyStepFailure(identity, 'display is not enabled', 'NOT_ENABLED');
        request = { ...requestFromState(display), isPrimary: true };
        break;
      }

      default: {
        const unknown: never = op;
        throw new ApplyStepFailure(identity, `unknown operation ${JSON.stringify(unknown)}`, 'UNKNOWN_OPERATION');
      }
    }

    const result = await this.backend.setDisplayState(request);
    if (!result.ok) {
      throw new ApplyStepFailure(identity, result.reason, result.code);
    }

    this.recordLanded(run, op, request);
  }

  /**
   * Snaps to a mode the driver lists. Backends that can't (or list
   * nothing) get the request as planned and the OS decides.
   */
  private async chooseMode(identity: DisplayIdentity, resolution: Resolution, refreshHz: number): Promise<DisplayMode> {
    const requested: DisplayMode = { resolution: { ...resolution }, refreshHz };
    if (!this.backend.listModes) return requested;

    let modes: DisplayMode[];
    try {
      modes = await this.backend.listModes(identity.devicePath);
    } catch (e) {
      log.warn({ devicePath: identity.devicePath, error: errorMessage(e) }, 'Mode list unavailable: requesting planned mode');
      return requested;
    }
    if (modes.length === 0) return requested;

    const choice = pickBestMode(modes, resolution, refreshHz);
    if (!choice) {
      throw new ApplyStepFailure(identity, `unsupported mode ${formatMode(resolution, refreshHz)}`, 'UNSUPPORTED_MODE');
    }
    if (!choice.exact) {
      log.info({
        devicePath: identity.devicePath,
        requested: formatMode(resolution, refreshHz),
        chosen: formatMode(choice.mode.resolution, choice.mode.refreshHz)
      }, 'Snapped to nearest supported refresh rate');
    }
    return choice.mode;
  }

  /** Keeps the local view in step with what the OS just accepted. */
  private recordLanded(run: ApplyRun, op: Operation, request: SetDisplayStateRequest): void {
    run.current = run.current.map(d => {
      if (d.identity.devicePath !== request.devicePath) {
        return request.isPrimary ? { ...d, isPrimary: false } : d;
      }
      return {
        ...d,
        enabled: request.enabled,
        resolution: { width: request.width, height: request.height },
        refreshHz: request.refreshHz,
        position: { x: request.x, y: request.y },
        isPrimary: request.isPrimary,
        orientation: request.orientation ?? d.orientation
      };
    });

    if (request.enabled) {
      run.expected.set(op.identity.devicePath, {
        resolution: { width: request.width, height: request.height },
        refreshHz: request.refreshHz
      });
    }
  }
}
