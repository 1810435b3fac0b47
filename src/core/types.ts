/**
 * core/types.ts
 *
 * Single source of truth for every shared type in the project.
 * All modules import from here. Nothing defines its own DTOs.
 */

// ---------------------------------------------------------------------------
// Utility: Correlation ID generation
// ---------------------------------------------------------------------------

export function generateCorrelationId(): string {
  return `req_${Date.now()}_${Math.random().toString(36).slice(2, 11)}`;
}

// ---------------------------------------------------------------------------
// Display geometry
// ---------------------------------------------------------------------------

export interface Resolution {
  width: number;
  height: number;
}

export interface Position {
  x: number;                               // top-left, extended-desktop coordinates
  y: number;
}

/**
 * Best-effort key for a physical display. `devicePath` is what the OS calls
 * the device (e.g. "\\.\DISPLAY1"); `ordinal` is its index in the enumeration.
 * Both may change when a monitor re-enumerates.
 */
export interface DisplayIdentity {
  devicePath: string;
  ordinal: number;
}

/** Rotation index as the OS reports it: 0 = landscape, 1 = 90°, 2 = 180°, 3 = 270°. */
export type Orientation = 0 | 1 | 2 | 3;

export interface DisplayState {
  identity: DisplayIdentity;
  enabled: boolean;
  resolution: Resolution;
  refreshHz: number;
  position: Position;
  isPrimary: boolean;
  description?: string;                    // adapter string, informational only
  orientation?: Orientation;
}

export interface DisplayMode {
  resolution: Resolution;
  refreshHz: number;
}

// ---------------------------------------------------------------------------
// Profiles
// ---------------------------------------------------------------------------

export interface Profile {
  name: string;
  displays: DisplayState[];                // declared order matters: it drives plan order
  createdAt: string;                       // ISO-8601
  updatedAt: string;                       // ISO-8601
}

// ---------------------------------------------------------------------------
// Reconciliation
// ---------------------------------------------------------------------------

export interface EnableOperation {
  kind: 'enable';
  identity: DisplayIdentity;
  resolution: Resolution;
  refreshHz: number;
  position: Position;
  orientation?: Orientation;               // unset = leave the panel's rotation as it is
}

export interface DisableOperation {
  kind: 'disable';
  identity: DisplayIdentity;
}

/** Geometry change for a display that is already enabled (resize and/or move). */
export interface RepositionOperation {
  kind: 'reposition';
  identity: DisplayIdentity;
  position: Position;
  resolution: Resolution;
  refreshHz: number;
  orientation?: Orientation;
}

export interface SetPrimaryOperation {
  kind: 'setPrimary';
  identity: DisplayIdentity;
}

export type Operation =
  | EnableOperation
  | DisableOperation
  | RepositionOperation
  | SetPrimaryOperation;

export type OperationKind = Operation['kind'];

export type MatchStage = 'identity' | 'ordinal' | 'mode';

export interface DisplayMatch {
  target: DisplayState;
  live: DisplayState;
  via: MatchStage;
}

export type PlanWarningKind =
  | 'target-not-found'
  | 'overlapping-geometry'
  | 'primary-extra-kept'
  | 'disables-primary'
  | 'identity-drift';

export interface PlanWarning {
  kind: PlanWarningKind;
  message: string;
  devicePath?: string;
}

export interface ReconciliationPlan {
  profileName: string;
  autoDisableExtras: boolean;
  operations: Operation[];                 // total order; later steps assume earlier ones landed
  warnings: PlanWarning[];
  matches: DisplayMatch[];
  live: DisplayState[];                    // the snapshot the plan was computed from
}

// ---------------------------------------------------------------------------
// Apply report
// ---------------------------------------------------------------------------

export type StepOutcome =
  | { status: 'succeeded' }
  | { status: 'failed'; code: string; reason: string }
  | { status: 'skipped'; reason: string };

export interface StepReport {
  index: number;                           // position in plan.operations
  operation: Operation;
  resolvedIdentity: DisplayIdentity;       // differs from operation.identity after drift
  outcome: StepOutcome;
  attempts: number;
}

export interface ApplyReport {
  profileName: string;
  steps: StepReport[];
  warnings: PlanWarning[];
  succeeded: number;
  failed: number;
  skipped: number;
  startedAt: string;
  durationMs: number;
}

// ---------------------------------------------------------------------------
// Windows
// ---------------------------------------------------------------------------

export type WindowShowState = 'normal' | 'minimized' | 'maximized';

/** Where an application window sat, for putting it back later. */
export interface WindowPlacement {
  handle: number;                          // HWND; stale after the app restarts
  title: string;
  processName: string;                     // fallback key with title when the handle is stale
  x: number;                               // restored (non-maximized) bounds
  y: number;
  width: number;
  height: number;
  state: WindowShowState;
  monitor: Position;                       // top-left of the monitor it was on
}

export interface WindowReport {
  saved: number;                           // placements written to the cache before Apply
  moved: number;                           // windows taken off monitors that went away
  restored: number;                        // windows put back on monitors that came back
  error?: string;                          // set when window handling gave up; Apply itself is unaffected
}

// ---------------------------------------------------------------------------
// Tool schema (what we expose to the shell)
// ---------------------------------------------------------------------------

export interface ToolParameter {
  type: string;
  properties?: Record<string, ToolParameter>;
  required?: string[];
  items?: ToolParameter;
  description?: string;
  enum?: string[];
  default?: unknown;
}

export interface ToolSchema {
  name: string;
  description: string;
  parameters: {
    type: 'object';
    properties: Record<string, ToolParameter>;
    required?: string[];
  };
}

// ---------------------------------------------------------------------------
// Session & Transport
// ---------------------------------------------------------------------------

export type TransportMode = 'stdio' | 'http';

export type BackendKind = 'powershell' | 'simulated';

export type LogLevel = 'trace' | 'debug' | 'info' | 'warn' | 'error' | 'fatal' | 'silent';

export interface SessionConfig {
  transportMode: TransportMode;
  port?: number;                           // HTTP only
  logLevel?: LogLevel;
  backend?: BackendKind;                   // default: powershell on win32, simulated elsewhere
  profilesPath?: string;                   // profiles JSON file
  autoDisableExtras?: boolean;             // default for profile.apply when the caller omits it
  retryDelayMs?: number;                   // pause before the applier's single retry pass (default: 500)
  osCallTimeoutMs?: number;                // unset = no timeout beyond what the OS enforces
  manageWindows?: boolean;                 // move windows off monitors Apply disables (default: true)
  windowCachePath?: string;                // default: window_cache.json beside the profiles file
}

// ---------------------------------------------------------------------------
// Invocation
// ---------------------------------------------------------------------------

export interface ToolInvocation {
  tool: string;                            // e.g. "profile.apply"
  args: Record<string, unknown>;
  meta: CallMeta;
}

export interface CallMeta {
  timestamp: number;                       // Date.now() when the call was received
  correlationId?: string;
}

// ---------------------------------------------------------------------------
// Tool module contract
// ---------------------------------------------------------------------------

export interface ToolModule {
  /** Unique registry key. */
  name: string;

  /** All schemas this module exposes (display.enumerate, display.detect, …). */
  tools: ToolSchema[];

  /**
   * The single dispatcher. The registry calls this with the resolved schema
   * name so the module can fan out internally.
   */
  execute(toolName: string, args: Record<string, unknown>): Promise<ToolResult>;
}

// ---------------------------------------------------------------------------
// Result envelope returned by execute()
// ---------------------------------------------------------------------------

export interface ToolResult {
  success: boolean;
  data?: unknown;
  error?: ToolError;
  durationMs: number;
}

export interface ToolError {
  code: string;                            // maps to our error taxonomy (see errors.ts)
  message: string;
  details?: Record<string, unknown>;
}

// ---------------------------------------------------------------------------
// Tool policies (config/policies/*.json)
// ---------------------------------------------------------------------------

export interface RateLimitPolicy {
  maxCallsPerSecond: number;
  burstAllowance: number;
}

export interface ToolPolicy {
  toolName: string;

  /** JSON Schema the call's arguments must satisfy. */
  inputValidation?: Record<string, unknown>;

  rateLimits?: RateLimitPolicy;

  /** Touches the display hardware: at most one exclusive call in flight per process. */
  exclusive?: boolean;
}
