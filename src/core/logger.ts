/**
 * core/logger.ts
 *
 * Singleton pino logger. Every module does:
 *     const log = scopedLogger('display/applier');
 *
 * Child loggers are scoped with a `module` field so logs can be
 * filtered per-module. Output goes to stderr: stdout belongs to the
 * stdio transport.
 */

import pino from 'pino';
import { SessionConfig } from './types';

let instance: pino.Logger | null = null;

export function initLogger(config: Pick<SessionConfig, 'logLevel'>): pino.Logger {
  instance = pino({ level: config.logLevel ?? 'info' }, pino.destination(2));
  return instance;
}

export function getLogger(): pino.Logger {
  if (!instance) {
    // Fallback for early imports before initLogger is called
    instance = pino({ level: process.env.DISPLAY_PROFILES_LOG_LEVEL ?? 'info' }, pino.destination(2));
  }
  return instance;
}

/**
 * Returns a child logger scoped to a specific module.
 * Usage:  const log = scopedLogger('profiles/store');
 */
export function scopedLogger(moduleName: string): pino.Logger {
  return getLogger().child({ module: moduleName });
}
