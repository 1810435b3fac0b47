/**
 * tools/args.ts
 *
 * Argument readers for tool handlers. Policies validate shapes up front
 * when configured; these keep the handlers honest when they aren't.
 */

import { ValidationError } from '../core/errors';

function bad(name: string, expected: string): ValidationError {
  return new ValidationError('schema', `Argument "${name}" must be ${expected}`, { argument: name });
}

export function requireString(args: Record<string, unknown>, name: string): string {
  const value = args[name];
  if (typeof value !== 'string' || value.length === 0) throw bad(name, 'a non-empty string');
  return value;
}

export function optionalBoolean(args: Record<string, unknown>, name: string): boolean | undefined {
  const value = args[name];
  if (value === undefined) return undefined;
  if (typeof value !== 'boolean') throw bad(name, 'a boolean');
  return value;
}

export function requireInteger(args: Record<string, unknown>, name: string): number {
  const value = args[name];
  if (typeof value !== 'number' || !Number.isInteger(value)) throw bad(name, 'an integer');
  return value;
}

export function optionalBooleanMap(args: Record<string, unknown>, name: string): Record<string, boolean> | undefined {
  const value = args[name];
  if (value === undefined) return undefined;
  if (typeof value !== 'object' || value === null || Array.isArray(value)) throw bad(name, 'an object');

  const result: Record<string, boolean> = {};
  for (const [key, entry] of Object.entries(value)) {
    if (typeof entry !== 'boolean') throw bad(`${name}.${key}`, 'a boolean');
    result[key] = entry;
  }
  return result;
}
