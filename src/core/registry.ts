/**
 * core/registry.ts
 *
 * Central singleton. Responsibilities:
 *   - Holds every registered ToolModule.
 *   - Exposes list() for tools/list responses.
 *   - Resolves a tool name to its module.
 *   - Dispatches invocations through the policy applier.
 *
 * Tool modules register themselves by calling registry.register().
 * The server imports tools/index at startup, which triggers registration.
 */

import {
  ToolModule,
  ToolInvocation,
  ToolResult,
  ToolSchema,
  SessionConfig
} from './types';
import { UnknownToolError, DisplayProfilesError, errorCode, errorMessage } from './errors';
import { PolicyLoader } from './policy/loader';
import { applyPolicy } from './policy/applier';
import { ActionGate, actionGate } from './action_gate';
import { scopedLogger } from './logger';

const log = scopedLogger('core/registry');

export class ToolRegistry {
  /** The one and only instance. */
  private static instance: ToolRegistry | null = null;

  /** module name → ToolModule */
  private readonly modules = new Map<string, ToolModule>();

  /** tool schema name → { module, schema } */
  private readonly toolIndex = new Map<string, { module: ToolModule; schema: ToolSchema }>();

  private policyLoader: PolicyLoader | null = null;
  private sessionConfig: SessionConfig | null = null;
  private gate: ActionGate = actionGate;

  private constructor() {}

  static getInstance(): ToolRegistry {
    if (!ToolRegistry.instance) {
      ToolRegistry.instance = new ToolRegistry();
    }
    return ToolRegistry.instance;
  }

  /** Must be called once after construction, before any dispatch. */
  init(sessionConfig: SessionConfig, policyLoader: PolicyLoader, gate?: ActionGate): void {
    if (this.sessionConfig) {
      log.warn('Registry already initialized: ignoring duplicate init call');
      return;
    }
    this.sessionConfig = sessionConfig;
    this.policyLoader = policyLoader;
    if (gate) this.gate = gate;
    log.info('Registry initialized successfully');
  }

  get config(): SessionConfig | null {
    return this.sessionConfig;
  }

  // -----------------------------------------------------------------------
  // Registration
  // -----------------------------------------------------------------------

  /**
   * Register a tool module. Called by each tool file on import.
   * Indexes every schema the module exposes for fast dispatch.
   */
  register(mod: ToolModule): void {
    if (this.modules.has(mod.name)) {
      log.warn({ module: mod.name }, 'Module already registered: overwriting');
    }

    this.modules.set(mod.name, mod);

    for (const schema of mod.tools) {
      this.toolIndex.set(schema.name, { module: mod, schema });
    }

    log.debug({ module: mod.name, tools: mod.tools.map(t => t.name) }, 'Tool module registered');
  }

  // -----------------------------------------------------------------------
  // Listing (for tools/list)
  // -----------------------------------------------------------------------

  list(): ToolSchema[] {
    const schemas: ToolSchema[] = [];
    for (const mod of this.modules.values()) {
      schemas.push(...mod.tools);
    }
    return schemas;
  }

  listToolNames(): string[] {
    return Array.from(this.toolIndex.keys());
  }

  // -----------------------------------------------------------------------
  // Resolution
  // -----------------------------------------------------------------------

  /**
   * Look up which module handles a given tool name.
   * Throws UnknownToolError if not found.
   */
  resolve(toolName: string): { module: ToolModule; schema: ToolSchema } {
    const entry = this.toolIndex.get(toolName);
    if (!entry) throw new UnknownToolError(toolName);
    return entry;
  }

  // -----------------------------------------------------------------------
  // Dispatch
  // -----------------------------------------------------------------------

  /**
   * The main dispatch entry point. Called by the transports.
   *
   * Policy errors (rate limit, bad arguments, action in progress) are
   * thrown; errors raised inside the tool come back as a failed envelope.
   */
  async invoke(invocation: ToolInvocation): Promise<ToolResult> {
    if (!this.policyLoader) {
      throw new Error('ToolRegistry not initialized. Call init() before using the registry.');
    }
    const toolName = invocation.tool;
    const { module: mod } = this.resolve(toolName); // throws if unknown

    const policy = this.policyLoader.get(toolName);

    log.info({ tool: toolName, hasPolicy: !!policy, correlationId: invocation.meta.correlationId }, 'Dispatching tool invocation');

    const executeFn = async (_name: string, args: Record<string, unknown>): Promise<ToolResult> => {
      const start = Date.now();
      try {
        const result = await mod.execute(toolName, args);
        result.durationMs = Date.now() - start;
        return result;
      } catch (e) {
        log.warn({ tool: toolName, code: errorCode(e, 'EXECUTION_ERROR'), error: errorMessage(e) }, 'Tool failed');
        return {
          success: false,
          error: {
            code: errorCode(e, 'EXECUTION_ERROR'),
            message: errorMessage(e),
            details: e instanceof DisplayProfilesError ? e.details : undefined
          },
          durationMs: Date.now() - start
        };
      }
    };

    return applyPolicy(invocation, policy, this.gate, executeFn);
  }
}

export const registry = ToolRegistry.getInstance();
