/**
 * display/enumerator.ts
 *
 * Turns the backend's raw device list into checked DisplayState records.
 * Read-only. Any malformed record fails the whole call: Save and Apply
 * must never run on partial data.
 */

import { DisplayState, Orientation } from '../core/types';
import { EnumerationError, errorMessage } from '../core/errors';
import { scopedLogger } from '../core/logger';
import { DisplayBackend, RawDisplayDevice } from './backend';

const log = scopedLogger('display/enumerator');

function isInteger(value: unknown): value is number {
  return typeof value === 'number' && Number.isInteger(value);
}

function isOrientation(value: unknown): value is Orientation {
  return value === 0 || value === 1 || value === 2 || value === 3;
}

function malformed(index: number, field: string, raw: RawDisplayDevice): EnumerationError {
  return new EnumerationError(`Malformed display record at index ${index}: bad "${field}"`, {
    index,
    field,
    raw: { ...raw }
  });
}

export function toDisplayState(raw: RawDisplayDevice, index: number): DisplayState {
  if (typeof raw.devicePath !== 'string' || raw.devicePath.length === 0) throw malformed(index, 'devicePath', raw);
  if (!isInteger(raw.ordinal) || raw.ordinal < 0) throw malformed(index, 'ordinal', raw);
  if (typeof raw.attached !== 'boolean') throw malformed(index, 'attached', raw);
  if (typeof raw.primary !== 'boolean') throw malformed(index, 'primary', raw);

  if (!isInteger(raw.width)) throw malformed(index, 'width', raw);
  if (!isInteger(raw.height)) throw malformed(index, 'height', raw);
  if (!isInteger(raw.refreshHz)) throw malformed(index, 'refreshHz', raw);
  if (!isInteger(raw.x)) throw malformed(index, 'x', raw);
  if (!isInteger(raw.y)) throw malformed(index, 'y', raw);

  // Detached devices may report an empty mode; attached ones may not.
  if (raw.width < 0 || raw.height < 0 || raw.refreshHz < 0 ||
      (raw.attached && (raw.width === 0 || raw.height === 0))) {
    throw malformed(index, 'resolution', raw);
  }

  const state: DisplayState = {
    identity: { devicePath: raw.devicePath, ordinal: raw.ordinal },
    enabled: raw.attached,
    resolution: { width: raw.width, height: raw.height },
    refreshHz: raw.refreshHz,
    position: { x: raw.x, y: raw.y },
    isPrimary: raw.attached && raw.primary
  };
  if (typeof raw.description === 'string' && raw.description.length > 0) {
    state.description = raw.description;
  }
  if (isOrientation(raw.orientation)) {
    state.orientation = raw.orientation;
  }
  return state;
}

/**
 * Enumerates every display the backend knows about, enabled or not,
 * ordered by ordinal.
 */
export async function enumerate(backend: DisplayBackend): Promise<DisplayState[]> {
  let raw: RawDisplayDevice[];
  try {
    raw = await backend.enumerateDisplays();
  } catch (e) {
    if (e instanceof EnumerationError) throw e;
    throw new EnumerationError(`Display enumeration failed: ${errorMessage(e)}`, { backend: backend.name });
  }

  if (!Array.isArray(raw)) {
    throw new EnumerationError('Display enumeration returned no device list', { backend: backend.name });
  }

  const states = raw.map((device, index) => toDisplayState(device, index));

  const seen = new Set<string>();
  for (const state of states) {
    if (seen.has(state.identity.devicePath)) {
      throw new EnumerationError(`Duplicate device path "${state.identity.devicePath}" in one enumeration`, {
        devicePath: state.identity.devicePath
      });
    }
    seen.add(state.identity.devicePath);
  }

  states.sort((a, b) => a.identity.ordinal - b.identity.ordinal);

  log.debug({
    backend: backend.name,
    total: states.length,
    enabled: states.filter(s => s.enabled).length
  }, 'Displays enumerated');

  return states;
}
