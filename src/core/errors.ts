/**
 * core/errors.ts
 *
 * Typed error hierarchy. Every throw site uses one of these.
 * The `code` property is what shows up in ToolError.code and in the
 * failed outcome of an ApplyReport step.
 */

import { DisplayIdentity } from './types';

export class DisplayProfilesError extends Error {
  readonly code: string;
  readonly details?: Record<string, unknown>;

  constructor(message: string, code: string, details?: Record<string, unknown>) {
    super(message);
    this.code = code;
    this.details = details;
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype); // fix instanceof in TS
  }
}

// ---------------------------------------------------------------------------
// Engine errors
// ---------------------------------------------------------------------------

/** The OS display query failed, is unavailable, or returned malformed data. Fatal to Save/Apply. */
export class EnumerationError extends DisplayProfilesError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'ENUMERATION_ERROR', details);
  }
}

export type ValidationErrorKind =
  | 'schema'
  | 'empty-name'
  | 'duplicate-identity'
  | 'multiple-primary'
  | 'invalid-mode';

/** Bad profile data or bad tool arguments. Rejected before the engine sees them. */
export class ValidationError extends DisplayProfilesError {
  readonly kind: ValidationErrorKind;

  constructor(kind: ValidationErrorKind, message: string, details?: Record<string, unknown>) {
    super(message, 'VALIDATION_ERROR', { kind, ...details });
    this.kind = kind;
  }
}

/** Reconciliation would produce an unsafe topology (e.g. zero active displays). */
export class InvalidPlanError extends DisplayProfilesError {
  constructor(message: string, details?: Record<string, unknown>) {
    super(message, 'INVALID_PLAN', details);
  }
}

/** One operation was rejected by the OS. Recorded per step; never aborts the plan. */
export class ApplyStepFailure extends DisplayProfilesError {
  readonly identity: DisplayIdentity;
  readonly reason: string;

  constructor(identity: DisplayIdentity, reason: string, code = 'APPLY_STEP_FAILED') {
    super(`${identity.devicePath}: ${reason}`, code, { identity, reason });
    this.identity = identity;
    this.reason = reason;
  }
}

// ---------------------------------------------------------------------------
// Profile store errors
// ---------------------------------------------------------------------------

export class ProfileNotFoundError extends DisplayProfilesError {
  constructor(name: string) {
    super(`Profile not found: "${name}"`, 'PROFILE_NOT_FOUND', { name });
  }
}

export class ProfileExistsError extends DisplayProfilesError {
  constructor(name: string) {
    super(`Profile already exists: "${name}"`, 'PROFILE_EXISTS', { name });
  }
}

/** The profiles file could not be read, parsed or written. */
export class StoreError extends DisplayProfilesError {
  constructor(message: string, path: string) {
    super(message, 'STORE_ERROR', { path });
  }
}

// ---------------------------------------------------------------------------
// Registry / dispatch errors
// ---------------------------------------------------------------------------

/** The shell requested a tool name that doesn't exist in the registry. */
export class UnknownToolError extends DisplayProfilesError {
  constructor(toolName: string) {
    super(`Unknown tool: "${toolName}"`, 'UNKNOWN_TOOL', { toolName });
  }
}

/** A PowerShell / OS call failed outside of a plan step. */
export class ExecutionError extends DisplayProfilesError {
  constructor(source: string, message: string, details?: Record<string, unknown>) {
    super(message, 'EXECUTION_ERROR', { source, ...details });
  }
}

/** Tool was called more frequently than its policy allows. */
export class RateLimitError extends DisplayProfilesError {
  constructor(toolName: string) {
    super(`Rate limit exceeded for tool "${toolName}"`, 'RATE_LIMIT_EXCEEDED', { toolName });
  }
}

/** Another Save/Apply is still touching the display hardware. */
export class ActionInProgressError extends DisplayProfilesError {
  constructor(requested: string, running: string) {
    super(
      `Cannot run "${requested}" while "${running}" is in progress`,
      'ACTION_IN_PROGRESS',
      { requested, running }
    );
  }
}

/** The runtime (backend, store, controller) was used before initRuntime(). */
export class RuntimeNotInitializedError extends DisplayProfilesError {
  constructor() {
    super('Runtime not initialized. Call initRuntime() first.', 'RUNTIME_NOT_INITIALIZED');
  }
}

/** Reads the code off anything thrown; non-library errors map to `fallback`. */
export function errorCode(e: unknown, fallback = 'UNKNOWN_ERROR'): string {
  return e instanceof DisplayProfilesError ? e.code : fallback;
}

export function errorMessage(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}
