/**
 * core/config.ts
 *
 * Session configuration, lowest to highest precedence:
 *   defaults → config/session.json → environment (.env) → CLI flags
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { BackendKind, LogLevel, SessionConfig, TransportMode } from './types';

export interface CliOverrides {
  transport?: TransportMode;
  port?: number;
  backend?: BackendKind;
  profilesPath?: string;
}

const TRANSPORTS: readonly TransportMode[] = ['stdio', 'http'];
const BACKENDS: readonly BackendKind[] = ['powershell', 'simulated'];
const LOG_LEVELS: readonly LogLevel[] = ['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent'];

function oneOf<T extends string>(allowed: readonly T[], value: unknown): T | undefined {
  return allowed.find(a => a === value);
}

function positiveInt(value: unknown): number | undefined {
  const n = typeof value === 'string' ? Number.parseInt(value, 10) : value;
  return typeof n === 'number' && Number.isInteger(n) && n >= 0 ? n : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function parseCli(argv: readonly string[]): CliOverrides {
  const overrides: CliOverrides = {};

  for (let i = 0; i < argv.length; i++) {
    const value = argv[i + 1];
    if (value === undefined) break;

    switch (argv[i]) {
      case '--transport':
        overrides.transport = oneOf(TRANSPORTS, value);
        i++;
        break;
      case '--port':
        overrides.port = positiveInt(value);
        i++;
        break;
      case '--backend':
        overrides.backend = oneOf(BACKENDS, value);
        i++;
        break;
      case '--profiles':
        overrides.profilesPath = value;
        i++;
        break;
    }
  }

  return overrides;
}

/** `<APPDATA or home>/DisplayProfiles/profiles.json` */
export function defaultProfilesPath(env: NodeJS.ProcessEnv = process.env): string {
  const base = env.APPDATA ?? os.homedir();
  return path.join(base, 'DisplayProfiles', 'profiles.json');
}

function readFileConfig(configPath: string): Record<string, unknown> {
  if (!fs.existsSync(configPath)) return {};
  try {
    const parsed: unknown = JSON.parse(fs.readFileSync(configPath, 'utf-8'));
    return isRecord(parsed) ? parsed : {};
  } catch {
    // Malformed config: start with defaults
    return {};
  }
}

export function loadSessionConfig(
  cli: CliOverrides,
  env: NodeJS.ProcessEnv = process.env,
  configPath = path.resolve(process.cwd(), 'config', 'session.json')
): SessionConfig {
  const file = readFileConfig(configPath);
  const platformBackend: BackendKind = process.platform === 'win32' ? 'powershell' : 'simulated';

  return {
    transportMode: cli.transport ?? oneOf(TRANSPORTS, file.transportMode) ?? 'stdio',
    port: cli.port ?? positiveInt(env.DISPLAY_PROFILES_PORT) ?? positiveInt(file.port) ?? 3000,
    logLevel: oneOf(LOG_LEVELS, env.DISPLAY_PROFILES_LOG_LEVEL) ?? oneOf(LOG_LEVELS, file.logLevel) ?? 'info',
    backend: cli.backend ?? oneOf(BACKENDS, env.DISPLAY_PROFILES_BACKEND) ?? oneOf(BACKENDS, file.backend) ?? platformBackend,
    profilesPath: cli.profilesPath ??
      env.DISPLAY_PROFILES_PATH ??
      (typeof file.profilesPath === 'string' ? file.profilesPath : undefined) ??
      defaultProfilesPath(env),
    autoDisableExtras: typeof file.autoDisableExtras === 'boolean' ? file.autoDisableExtras : false,
    retryDelayMs: positiveInt(file.retryDelayMs) ?? 500,
    osCallTimeoutMs: positiveInt(file.osCallTimeoutMs),
    manageWindows: typeof file.manageWindows === 'boolean' ? file.manageWindows : true,
    windowCachePath: typeof file.windowCachePath === 'string' ? file.windowCachePath : undefined
  };
}
