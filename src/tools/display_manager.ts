/**
 * tools/display_manager.ts
 *
 * Read-side display tools: what the OS reports right now, and a nudge to
 * attach monitors that are plugged in but detached.
 */

import { ToolModule, ToolResult } from '../core/types';
import { registry } from '../core/registry';
import { ExecutionError } from '../core/errors';
import { getRuntime } from '../core/runtime';
import { scopedLogger } from '../core/logger';

const log = scopedLogger('tools/display_manager');

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

async function handleEnumerate(_args: Record<string, unknown>): Promise<ToolResult> {
  const displays = await getRuntime().controller.enumerate();
  return { success: true, data: { displays }, durationMs: 0 };
}

async function handleDetect(_args: Record<string, unknown>): Promise<ToolResult> {
  const { attached, displays } = await getRuntime().controller.detectDisplays();
  return { success: true, data: { attached, displays }, durationMs: 0 };
}

// ---------------------------------------------------------------------------
// Module definition
// ---------------------------------------------------------------------------

const displayManager: ToolModule = {
  name: 'display_manager',

  tools: [
    {
      name: 'display.enumerate',
      description: 'List every display the OS knows about, enabled or not, with resolution, refresh rate, position and primary flag.',
      parameters: { type: 'object', properties: {} }
    },
    {
      name: 'display.detect',
      description: 'Ask the OS to attach physically connected but detached monitors (extend topology), then list displays.',
      parameters: { type: 'object', properties: {} }
    }
  ],

  async execute(toolName: string, args: Record<string, unknown>): Promise<ToolResult> {
    log.debug({ toolName }, 'Executing');

    switch (toolName) {
      case 'display.enumerate': return handleEnumerate(args);
      case 'display.detect':    return handleDetect(args);
      default:
        throw new ExecutionError('display_manager', `Unknown tool: ${toolName}`);
    }
  }
};

// Self-register
registry.register(displayManager);

export default displayManager;
