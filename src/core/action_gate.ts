/**
 * core/action_gate.ts
 *
 * One exclusive action (Save, Apply, detect) at a time against the
 * display subsystem. A second one arriving while the first is in flight
 * is rejected, not queued.
 */

import { ActionInProgressError } from './errors';
import { scopedLogger } from './logger';

const log = scopedLogger('core/action_gate');

export class ActionGate {
  private running: string | null = null;
  private pending: Promise<unknown> | null = null;

  /** Name of the action currently holding the gate, if any. */
  get current(): string | null {
    return this.running;
  }

  async run<T>(action: string, fn: () => Promise<T>): Promise<T> {
    if (this.running !== null) {
      log.warn({ requested: action, running: this.running }, 'Rejected concurrent exclusive action');
      throw new ActionInProgressError(action, this.running);
    }

    this.running = action;
    log.debug({ action }, 'Exclusive action started');
    try {
      const task = fn();
      this.pending = task;
      return await task;
    } finally {
      this.running = null;
      this.pending = null;
      log.debug({ action }, 'Exclusive action finished');
    }
  }

  /** Resolves once the in-flight action (if any) has settled, whatever its outcome. */
  whenIdle(): Promise<void> {
    if (!this.pending) return Promise.resolve();
    return this.pending.then(() => undefined, () => undefined);
  }
}

export const actionGate = new ActionGate();
