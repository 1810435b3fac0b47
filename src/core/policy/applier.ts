/**
 * core/policy/applier.ts
 *
 * The execution wrapper between the registry and a tool module's
 * execute(). Reads the policy for a given tool and applies it in order:
 *
 *   1. Rate limit check
 *   2. Input validation (the policy's JSON schema, if any)
 *   3. Exclusive gate (tools that touch the display hardware)
 *       └─ execute()
 *
 * Stateful only for rate limiting (per-tool call counters).
 */

import Ajv, { ValidateFunction } from 'ajv';
import { ToolPolicy, ToolInvocation, ToolResult } from '../types';
import { RateLimitError, ValidationError } from '../errors';
import { ActionGate } from '../action_gate';
import { scopedLogger } from '../logger';

const log = scopedLogger('core/policy/applier');
const ajv = new Ajv({ allErrors: true });
const compiled = new Map<string, ValidateFunction>();

// ---------------------------------------------------------------------------
// Rate limit state (in-memory, per tool)
// ---------------------------------------------------------------------------

const rateLimitStates = new Map<string, number[]>(); // sliding window of call timestamps

function checkRateLimit(policy: ToolPolicy): void {
  if (!policy.rateLimits) return;

  const { maxCallsPerSecond, burstAllowance } = policy.rateLimits;
  const now = Date.now();
  const windowStart = now - 1000; // 1-second sliding window
  const maxTotal = maxCallsPerSecond + burstAllowance;

  const timestamps = (rateLimitStates.get(policy.toolName) ?? []).filter(ts => ts > windowStart);

  if (timestamps.length >= maxTotal) {
    rateLimitStates.set(policy.toolName, timestamps);
    throw new RateLimitError(policy.toolName);
  }

  timestamps.push(now);
  rateLimitStates.set(policy.toolName, timestamps);
}

export function resetRateLimits(): void {
  rateLimitStates.clear();
}

// ---------------------------------------------------------------------------
// Input validation
// ---------------------------------------------------------------------------

function validateInput(policy: ToolPolicy, args: Record<string, unknown>): void {
  if (!policy.inputValidation) return;

  let validate = compiled.get(policy.toolName);
  if (!validate) {
    validate = ajv.compile(policy.inputValidation);
    compiled.set(policy.toolName, validate);
  }

  if (!validate(args)) {
    throw new ValidationError('schema', `Invalid arguments for tool "${policy.toolName}"`, {
      toolName: policy.toolName,
      violations: validate.errors ?? []
    });
  }
}

// ---------------------------------------------------------------------------
// Main public API
// ---------------------------------------------------------------------------

export type PolicyExecuteFn = (toolName: string, args: Record<string, unknown>) => Promise<ToolResult>;

/**
 * Wrap a raw tool execute function with its policy.
 *
 * @param policy   The policy for this tool (undefined if none configured)
 * @param gate     Serialises exclusive tools
 */
export async function applyPolicy(
  invocation: ToolInvocation,
  policy: ToolPolicy | undefined,
  gate: ActionGate,
  executeFn: PolicyExecuteFn
): Promise<ToolResult> {
  const toolName = invocation.tool;
  const startTime = Date.now();

  if (!policy) {
    log.debug({ tool: toolName }, 'No policy configured: executing without policies');
    const result = await executeFn(toolName, invocation.args);
    result.durationMs = Date.now() - startTime;
    return result;
  }

  checkRateLimit(policy);
  validateInput(policy, invocation.args);

  const result = policy.exclusive
    ? await gate.run(toolName, () => executeFn(toolName, invocation.args))
    : await executeFn(toolName, invocation.args);

  result.durationMs = Date.now() - startTime;
  return result;
}
