/**
 * tools/profile_manager.ts
 *
 * Profile tools: the Save / Apply / manage calls the shell makes.
 * profile.save, profile.apply and profile.import change hardware or the
 * store and are marked exclusive in config/policies/.
 */

import { ToolModule, ToolResult } from '../core/types';
import { registry } from '../core/registry';
import { ExecutionError } from '../core/errors';
import { getRuntime } from '../core/runtime';
import { scopedLogger } from '../core/logger';
import { validateProfile } from '../profiles/validation';
import { optionalBoolean, optionalBooleanMap, requireInteger, requireString } from './args';

const log = scopedLogger('tools/profile_manager');

// ---------------------------------------------------------------------------
// Handlers
// ---------------------------------------------------------------------------

async function handleList(_args: Record<string, unknown>): Promise<ToolResult> {
  const profiles = await getRuntime().controller.store.loadAll();
  return {
    success: true,
    data: {
      profiles: profiles.map(p => ({
        name: p.name,
        displays: p.displays.length,
        enabled: p.displays.filter(d => d.enabled).length,
        updatedAt: p.updatedAt
      }))
    },
    durationMs: 0
  };
}

async function handleGet(args: Record<string, unknown>): Promise<ToolResult> {
  const profile = await getRuntime().controller.store.get(requireString(args, 'name'));
  return { success: true, data: { profile }, durationMs: 0 };
}

async function handleSave(args: Record<string, unknown>): Promise<ToolResult> {
  const profile = await getRuntime().controller.captureProfile(requireString(args, 'name'), {
    enabledOverrides: optionalBooleanMap(args, 'enabledOverrides')
  });
  return { success: true, data: { profile }, durationMs: 0 };
}

async function handleDelete(args: Record<string, unknown>): Promise<ToolResult> {
  const name = requireString(args, 'name');
  await getRuntime().controller.store.delete(name);
  return { success: true, data: { deleted: name }, durationMs: 0 };
}

async function handleRename(args: Record<string, unknown>): Promise<ToolResult> {
  const profile = await getRuntime().controller.store.rename(requireString(args, 'from'), requireString(args, 'to'));
  return { success: true, data: { profile }, durationMs: 0 };
}

async function handleMove(args: Record<string, unknown>): Promise<ToolResult> {
  const order = await getRuntime().controller.store.move(requireInteger(args, 'fromIndex'), requireInteger(args, 'toIndex'));
  return { success: true, data: { order }, durationMs: 0 };
}

async function handleValidate(args: Record<string, unknown>): Promise<ToolResult> {
  const candidate = args.profile !== undefined
    ? args.profile
    : await getRuntime().controller.store.get(requireString(args, 'name'));
  validateProfile(candidate);
  return { success: true, data: { valid: true, name: candidate.name }, durationMs: 0 };
}

async function handlePlan(args: Record<string, unknown>): Promise<ToolResult> {
  const plan = await getRuntime().controller.planProfile(
    requireString(args, 'name'),
    optionalBoolean(args, 'autoDisableExtras')
  );
  return { success: true, data: { plan }, durationMs: 0 };
}

async function handleApply(args: Record<string, unknown>): Promise<ToolResult> {
  const { plan, report, windows } = await getRuntime().controller.applyProfile(
    requireString(args, 'name'),
    optionalBoolean(args, 'autoDisableExtras'),
    optionalBoolean(args, 'manageWindows')
  );

  // Partial application is still a completed Apply; the report says what landed.
  return {
    success: report.failed === 0,
    data: { operations: plan.operations, report, windows },
    error: report.failed === 0 ? undefined : {
      code: 'PARTIAL_APPLY',
      message: `${report.failed} of ${report.steps.length} operations failed`,
      details: { failed: report.steps.filter(s => s.outcome.status === 'failed').map(s => s.index) }
    },
    durationMs: 0
  };
}

async function handleExport(args: Record<string, unknown>): Promise<ToolResult> {
  const file = requireString(args, 'path');
  const count = await getRuntime().controller.store.exportTo(file);
  return { success: true, data: { path: file, count }, durationMs: 0 };
}

async function handleImport(args: Record<string, unknown>): Promise<ToolResult> {
  const imported = await getRuntime().controller.store.importFrom(requireString(args, 'path'));
  return { success: true, data: { imported }, durationMs: 0 };
}

// ---------------------------------------------------------------------------
// Module definition
// ---------------------------------------------------------------------------

const nameParam = { type: 'string', description: 'Profile name' };
const extrasParam = {
  type: 'boolean',
  description: 'Disable enabled monitors the profile does not mention (default from session config)'
};

const profileManager: ToolModule = {
  name: 'profile_manager',

  tools: [
    {
      name: 'profile.list',
      description: 'List saved profiles in user order.',
      parameters: { type: 'object', properties: {} }
    },
    {
      name: 'profile.get',
      description: 'Return one saved profile with every display entry.',
      parameters: { type: 'object', properties: { name: nameParam }, required: ['name'] }
    },
    {
      name: 'profile.save',
      description: 'Snapshot the current monitor arrangement under a name. Saving over an existing profile keeps its creation time.',
      parameters: {
        type: 'object',
        properties: {
          name: nameParam,
          enabledOverrides: {
            type: 'object',
            description: 'Map of device path → enabled, to save some monitors as disabled (or include detached ones)'
          }
        },
        required: ['name']
      }
    },
    {
      name: 'profile.delete',
      description: 'Delete a saved profile.',
      parameters: { type: 'object', properties: { name: nameParam }, required: ['name'] }
    },
    {
      name: 'profile.rename',
      description: 'Rename a saved profile, keeping its place in the list.',
      parameters: {
        type: 'object',
        properties: {
          from: { type: 'string', description: 'Current name' },
          to:   { type: 'string', description: 'New name' }
        },
        required: ['from', 'to']
      }
    },
    {
      name: 'profile.move',
      description: 'Swap two profiles in the list by position.',
      parameters: {
        type: 'object',
        properties: {
          fromIndex: { type: 'number', description: 'Zero-based position of the profile to move' },
          toIndex:   { type: 'number', description: 'Zero-based position to swap with' }
        },
        required: ['fromIndex', 'toIndex']
      }
    },
    {
      name: 'profile.validate',
      description: 'Check a saved profile (by name) or an inline profile object.',
      parameters: {
        type: 'object',
        properties: {
          name: nameParam,
          profile: { type: 'object', description: 'Profile object to check instead of a saved one' }
        }
      }
    },
    {
      name: 'profile.plan',
      description: 'Compute, without applying, the operations that would bring the displays to a profile.',
      parameters: {
        type: 'object',
        properties: { name: nameParam, autoDisableExtras: extrasParam },
        required: ['name']
      }
    },
    {
      name: 'profile.apply',
      description: 'Apply a saved profile and report the outcome of every operation.',
      parameters: {
        type: 'object',
        properties: {
          name: nameParam,
          autoDisableExtras: extrasParam,
          manageWindows: {
            type: 'boolean',
            description: 'Move windows off monitors being disabled and restore them when those monitors return (default from session config)'
          }
        },
        required: ['name']
      }
    },
    {
      name: 'profile.export',
      description: 'Write all profiles to a JSON file.',
      parameters: {
        type: 'object',
        properties: { path: { type: 'string', description: 'Destination file' } },
        required: ['path']
      }
    },
    {
      name: 'profile.import',
      description: 'Merge profiles from a JSON file; profiles with the same name are replaced.',
      parameters: {
        type: 'object',
        properties: { path: { type: 'string', description: 'Source file' } },
        required: ['path']
      }
    }
  ],

  async execute(toolName: string, args: Record<string, unknown>): Promise<ToolResult> {
    log.debug({ toolName, args }, 'Executing');

    switch (toolName) {
      case 'profile.list':     return handleList(args);
      case 'profile.get':      return handleGet(args);
      case 'profile.save':     return handleSave(args);
      case 'profile.delete':   return handleDelete(args);
      case 'profile.rename':   return handleRename(args);
      case 'profile.move':     return handleMove(args);
      case 'profile.validate': return handleValidate(args);
      case 'profile.plan':     return handlePlan(args);
      case 'profile.apply':    return handleApply(args);
      case 'profile.export':   return handleExport(args);
      case 'profile.import':   return handleImport(args);
      default:
        throw new ExecutionError('profile_manager', `Unknown tool: ${toolName}`);
    }
  }
};

// Self-register
registry.register(profileManager);

export default profileManager;
