/**
 * profiles/validation.ts
 *
 * Structural (JSON schema via ajv) and semantic checks on a profile.
 * Runs at Save, when the store loads or imports a file, and before Apply,
 * so a hand-edited or corrupted profile never reaches the engine.
 */

import Ajv from 'ajv';
import { Profile } from '../core/types';
import { ValidationError } from '../core/errors';

const ajv = new Ajv({ allErrors: true });

const integer = { type: 'integer' } as const;
const nonNegative = { type: 'integer', minimum: 0 } as const;

export const DISPLAY_STATE_SCHEMA = {
  type: 'object',
  required: ['identity', 'enabled', 'resolution', 'refreshHz', 'position', 'isPrimary'],
  properties: {
    identity: {
      type: 'object',
      required: ['devicePath', 'ordinal'],
      properties: {
        devicePath: { type: 'string', minLength: 1 },
        ordinal: nonNegative
      }
    },
    enabled: { type: 'boolean' },
    resolution: {
      type: 'object',
      required: ['width', 'height'],
      properties: { width: nonNegative, height: nonNegative }
    },
    refreshHz: nonNegative,
    position: {
      type: 'object',
      required: ['x', 'y'],
      properties: { x: integer, y: integer }
    },
    isPrimary: { type: 'boolean' },
    description: { type: 'string' },
    orientation: { enum: [0, 1, 2, 3] }
  }
} as const;

export const PROFILE_SCHEMA = {
  type: 'object',
  required: ['name', 'displays', 'createdAt', 'updatedAt'],
  properties: {
    name: { type: 'string' },
    displays: { type: 'array', items: DISPLAY_STATE_SCHEMA },
    createdAt: { type: 'string' },
    updatedAt: { type: 'string' }
  }
} as const;

const checkShape = ajv.compile<Profile>(PROFILE_SCHEMA);

/**
 * Throws ValidationError (with its kind) unless `value` is a well-formed
 * profile: non-empty name, one entry per device path, at most one primary,
 * and a real mode on every enabled display.
 */
export function validateProfile(value: unknown): asserts value is Profile {
  if (!checkShape(value)) {
    throw new ValidationError('schema', 'Profile does not match the expected shape', {
      violations: (checkShape.errors ?? []).map(e => `${e.instancePath || '/'} ${e.message ?? ''}`.trim())
    });
  }

  const profile = value;

  if (profile.name.trim().length === 0) {
    throw new ValidationError('empty-name', 'Profile name must not be empty');
  }

  const seen = new Set<string>();
  for (const display of profile.displays) {
    const path = display.identity.devicePath;
    if (seen.has(path)) {
      throw new ValidationError('duplicate-identity', `Profile "${profile.name}" lists ${path} more than once`, {
        profile: profile.name,
        devicePath: path
      });
    }
    seen.add(path);
  }

  const primaries = profile.displays.filter(d => d.isPrimary);
  if (primaries.length > 1) {
    throw new ValidationError('multiple-primary', `Profile "${profile.name}" marks ${primaries.length} displays as primary`, {
      profile: profile.name,
      devicePaths: primaries.map(d => d.identity.devicePath)
    });
  }

  for (const display of profile.displays) {
    if (!display.enabled) continue;
    const { width, height } = display.resolution;
    if (width <= 0 || height <= 0 || display.refreshHz <= 0) {
      throw new ValidationError('invalid-mode', `Enabled display ${display.identity.devicePath} has no usable mode`, {
        profile: profile.name,
        devicePath: display.identity.devicePath,
        mode: `${width}x${height}@${display.refreshHz}Hz`
      });
    }
  }
}
