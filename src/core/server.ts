/**
 * core/server.ts
 *
 * The single entry point. Orchestrates startup in order:
 *   1. Load environment variables from .env
 *   2. Parse CLI args and load the session config
 *   3. Initialise the logger
 *   4. Load tool policies from config/policies/
 *   5. Build the runtime (display backend, profile store, controller)
 *   6. Import all tool modules (triggers self-registration)
 *   7. Initialise the registry with the policy loader
 *   8. Start the selected transport
 *
 * Everything that logs is imported after step 3 so it picks up the
 * configured level.
 */

import * as path from 'path';
import * as fs from 'fs';
import type { Server } from 'http';
import * as dotenv from 'dotenv';
import { loadSessionConfig, parseCli } from './config';
import { initLogger, scopedLogger } from './logger';
import { errorMessage } from './errors';

const envPath = path.resolve(process.cwd(), '.env');
dotenv.config(fs.existsSync(envPath) ? { path: envPath } : undefined);

const SHUTDOWN_TIMEOUT_MS = 5000;

let serverInstance: Server | null = null;
let shuttingDown = false;

async function gracefulShutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;

  const log = scopedLogger('core/server');
  const { actionGate } = await import('./action_gate');
  log.info({ signal, running: actionGate.current }, 'Received shutdown signal, starting graceful shutdown');

  serverInstance?.close(() => {
    log.info('Server stopped accepting new connections');
  });

  // Never cut an Apply off between two OS calls if it can finish in time.
  let timer: NodeJS.Timeout | undefined;
  const timedOut = await Promise.race([
    actionGate.whenIdle().then(() => false),
    new Promise<boolean>(resolve => {
      timer = setTimeout(() => resolve(true), SHUTDOWN_TIMEOUT_MS);
    })
  ]);
  clearTimeout(timer);

  if (timedOut) {
    log.warn({ running: actionGate.current }, 'Shutdown timeout reached, forcing exit');
  } else {
    log.info('Graceful shutdown complete');
  }
  process.exit(0);
}

async function main(): Promise<void> {
  const sessionConfig = loadSessionConfig(parseCli(process.argv.slice(2)));

  initLogger(sessionConfig);
  const log = scopedLogger('core/server');
  log.info(
    { transport: sessionConfig.transportMode, port: sessionConfig.port, backend: sessionConfig.backend },
    'Display profiles server starting'
  );

  const { PolicyLoader } = await import('./policy/loader');
  const policyLoader = new PolicyLoader();
  policyLoader.load();

  const { initRuntime } = await import('./runtime');
  initRuntime(sessionConfig);

  await import('../tools/index');

  const { registry } = await import('./registry');
  registry.init(sessionConfig, policyLoader);
  log.info({ toolCount: registry.list().length }, 'Tool registry initialised');

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      gracefulShutdown(signal).catch((e: unknown) => {
        log.error({ signal, error: errorMessage(e) }, 'Shutdown failed');
        process.exit(1);
      });
    });
  }

  switch (sessionConfig.transportMode) {
    case 'stdio': {
      const { startStdioTransport } = await import('../transports/stdio');
      startStdioTransport(registry);
      break;
    }

    case 'http': {
      const { createHttpTransport } = await import('../transports/http');
      const app = createHttpTransport(registry);
      const port = sessionConfig.port ?? 3000;
      serverInstance = app.listen(port, () => {
        log.info({ port }, 'HTTP server listening');
      });
      serverInstance.setTimeout(120_000);
      serverInstance.keepAliveTimeout = 65_000;
      break;
    }
  }
}

// ---------------------------------------------------------------------------
// Run
// ---------------------------------------------------------------------------

main().catch((e: unknown) => {
  scopedLogger('core/server').fatal({ error: errorMessage(e) }, 'Fatal error during startup');
  process.exit(1);
});
