/**
 * core/policy/loader.ts
 *
 * Reads every .json file from the config/policies/ directory at startup
 * and builds a lookup map: toolName → ToolPolicy.
 *
 * Invalid files are logged and skipped.
 */

import * as fs from 'fs';
import * as path from 'path';
import { ToolPolicy } from '../types';
import { errorMessage } from '../errors';
import { scopedLogger } from '../logger';

const log = scopedLogger('core/policy/loader');

function isToolPolicy(value: unknown): value is ToolPolicy {
  if (typeof value !== 'object' || value === null) return false;
  const toolName: unknown = Reflect.get(value, 'toolName');
  return typeof toolName === 'string' && toolName.length > 0;
}

export class PolicyLoader {
  private readonly policies = new Map<string, ToolPolicy>();
  private readonly policyDir: string;

  constructor(policyDir?: string) {
    // Default to config/policies/ relative to the project root (where package.json lives)
    this.policyDir = policyDir ?? path.resolve(process.cwd(), 'config', 'policies');
  }

  /**
   * Scan the policy directory and load all .json files.
   * Call once at server startup.
   */
  load(): void {
    if (!fs.existsSync(this.policyDir)) {
      log.warn({ dir: this.policyDir }, 'Policy directory does not exist: no policies loaded');
      return;
    }

    const files = fs.readdirSync(this.policyDir).filter(f => f.endsWith('.json')).sort();
    log.info({ dir: this.policyDir, count: files.length }, 'Loading tool policies');

    for (const file of files) {
      const filePath = path.join(this.policyDir, file);
      try {
        const parsed: unknown = JSON.parse(fs.readFileSync(filePath, 'utf-8'));

        if (!isToolPolicy(parsed)) {
          log.warn({ file }, 'Policy file missing toolName: skipped');
          continue;
        }

        this.policies.set(parsed.toolName, parsed);
        log.debug({ file, toolName: parsed.toolName }, 'Policy loaded');
      } catch (e) {
        log.error({ file, error: errorMessage(e) }, 'Failed to parse policy file: skipped');
      }
    }

    log.info({ total: this.policies.size }, 'Tool policies loaded');
  }

  /** Get the policy for a specific tool. Returns undefined if none configured. */
  get(toolName: string): ToolPolicy | undefined {
    return this.policies.get(toolName);
  }

  listToolNames(): string[] {
    return Array.from(this.policies.keys());
  }
}
