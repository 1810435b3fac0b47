/**
 * profiles/window_cache.ts
 *
 * Window placements saved before an Apply turns monitors off, so a later
 * Apply that brings them back can put the windows where they were.
 *
 *     { "positions": [WindowPlacement, ...] }
 */

import { promises as fs } from 'fs';
import * as path from 'path';
import { WindowPlacement, WindowShowState } from '../core/types';
import { StoreError, errorMessage } from '../core/errors';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('profiles/window_cache');

const SHOW_STATES: readonly WindowShowState[] = ['normal', 'minimized', 'maximized'];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function isInt(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

function toPlacement(entry: unknown): WindowPlacement | undefined {
  if (!isRecord(entry)) return undefined;
  const { handle, title, processName, x, y, width, height, state, monitor } = entry;
  if (!isInt(handle) || typeof title !== 'string' || typeof processName !== 'string') return undefined;
  if (!isInt(x) || !isInt(y) || !isInt(width) || !isInt(height)) return undefined;
  const showState = SHOW_STATES.find(s => s === state);
  if (!showState || !isRecord(monitor) || !isInt(monitor.x) || !isInt(monitor.y)) return undefined;
  return { handle, title, processName, x, y, width, height, state: showState, monitor: { x: monitor.x, y: monitor.y } };
}

export class WindowCache {
  constructor(readonly filePath: string) {}

  /** Missing file reads as empty. Unusable entries are dropped. */
  async load(): Promise<WindowPlacement[]> {
    let raw: string;
    try {
      raw = await fs.readFile(this.filePath, 'utf-8');
    } catch (e) {
      if (isRecord(e) && e.code === 'ENOENT') return [];
      throw new StoreError(`Cannot read window cache: ${errorMessage(e)}`, this.filePath);
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (e) {
      throw new StoreError(`Window cache is not valid JSON: ${errorMessage(e)}`, this.filePath);
    }

    const entries = isRecord(parsed) ? parsed.positions : undefined;
    if (!Array.isArray(entries)) {
      throw new StoreError('Window cache has no "positions" array', this.filePath);
    }

    const placements: WindowPlacement[] = [];
    entries.forEach((entry, index) => {
      const placement = toPlacement(entry);
      if (placement) placements.push(placement);
      else log.warn({ file: this.filePath, index }, 'Invalid window entry in cache: skipped');
    });
    return placements;
  }

  /** Replaces the cache. */
  async save(placements: readonly WindowPlacement[]): Promise<void> {
    try {
      await fs.mkdir(path.dirname(this.filePath), { recursive: true });
      const tmp = `${this.filePath}.tmp`;
      await fs.writeFile(tmp, JSON.stringify({ positions: placements }, null, 2) + '\n', 'utf-8');
      await fs.rename(tmp, this.filePath);
    } catch (e) {
      throw new StoreError(`Cannot write window cache: ${errorMessage(e)}`, this.filePath);
    }
    log.debug({ file: this.filePath, count: placements.length }, 'Window placements saved');
  }
}
