/**
 * display/powershell.ts
 *
 * Runs a PowerShell script and returns its trimmed stdout. Shared by the
 * display and window bindings, each of which prepends its own C# shim.
 */

import { execSync } from 'child_process';
import { ExecutionError, errorMessage } from '../core/errors';

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Single-quoted PowerShell string literal. */
export function quote(value: string): string {
  return `'${value.replace(/'/g, "''")}'`;
}

export function int(source: string, value: number, field: string): string {
  if (!Number.isInteger(value)) {
    throw new ExecutionError(source, `"${field}" must be an integer`, { field, value });
  }
  return String(value);
}

export function runPowerShell(source: string, script: string, timeoutMs?: number): string {
  try {
    // Encode script as Base64 UTF-16LE for PowerShell -EncodedCommand
    const encoded = Buffer.from(script, 'utf16le').toString('base64');

    return execSync(
      `powershell -NoProfile -ExecutionPolicy Bypass -EncodedCommand ${encoded}`,
      { encoding: 'utf-8', timeout: timeoutMs, stdio: ['pipe', 'pipe', 'pipe'] }
    ).trim();
  } catch (e) {
    const stderr: unknown = isRecord(e) ? e.stderr : undefined;
    const detail = typeof stderr === 'string' || Buffer.isBuffer(stderr) ? stderr.toString().trim() : '';
    throw new ExecutionError(source, detail || errorMessage(e));
  }
}

/** ConvertTo-Json writes a lone element as an object, not a one-item array. */
export function parseJsonArray(source: string, raw: string, what: string): unknown[] {
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw || '[]');
  } catch (e) {
    throw new ExecutionError(source, `Unparsable ${what} output: ${errorMessage(e)}`, { raw });
  }
  if (Array.isArray(parsed)) return parsed;
  if (isRecord(parsed)) return [parsed];
  throw new ExecutionError(source, `Unexpected ${what} output`, { raw });
}
