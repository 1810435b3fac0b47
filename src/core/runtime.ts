/**
 * core/runtime.ts
 *
 * The services tool modules call into. Built once at startup from the
 * session config (or handed in directly by tests).
 */

import * as path from 'path';
import { SessionConfig } from './types';
import { RuntimeNotInitializedError } from './errors';
import { scopedLogger } from './logger';
import { defaultProfilesPath } from './config';
import { DisplayBackend } from '../display/backend';
import { PowerShellDisplayBackend } from '../display/powershell_backend';
import { SimulatedDisplayBackend } from '../display/simulated_backend';
import { ProfileStore } from '../profiles/store';
import { DisplayProfileController } from '../profiles/controller';
import { WindowCache } from '../profiles/window_cache';

const log = scopedLogger('core/runtime');

export interface Runtime {
  config: SessionConfig;
  controller: DisplayProfileController;
}

let current: Runtime | null = null;

export function createBackend(config: SessionConfig): DisplayBackend {
  switch (config.backend) {
    case 'simulated':
      return new SimulatedDisplayBackend();
    case 'powershell':
    case undefined:
      return new PowerShellDisplayBackend({ timeoutMs: config.osCallTimeoutMs });
  }
}

export function initRuntime(config: SessionConfig, backend: DisplayBackend = createBackend(config)): Runtime {
  const store = new ProfileStore(config.profilesPath ?? defaultProfilesPath());
  const windowCache = new WindowCache(config.windowCachePath ?? path.join(path.dirname(store.filePath), 'window_cache.json'));
  const controller = new DisplayProfileController(backend, store, {
    retryDelayMs: config.retryDelayMs,
    autoDisableExtras: config.autoDisableExtras,
    manageWindows: config.manageWindows,
    windowCache
  });

  current = { config, controller };
  log.info(
    { backend: backend.name, profilesPath: store.filePath, windowCachePath: windowCache.filePath, windows: Boolean(backend.windows) },
    'Runtime initialised'
  );
  return current;
}

export function getRuntime(): Runtime {
  if (!current) throw new RuntimeNotInitializedError();
  return current;
}
