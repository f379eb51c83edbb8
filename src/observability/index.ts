/**
 * Observability defaults
 *
 * Every module accepts an injected Logger and Metrics; these are the
 * fallbacks used when the caller supplies none.
 */

import type { Logger, Metrics } from '../types/index.js';

export type { Logger, Metrics };

/**
 * Console logger tagged with the emitting module
 *
 * Output format: `[LEVEL] [module] message {"meta":"json"}`
 */
export function createConsoleLogger(module: string): Logger {
  const format = (meta?: Record<string, unknown>): string => (meta ? JSON.stringify(meta) : '');
  return {
    info: (msg, meta) => console.log(`[INFO] [${module}] ${msg}`, format(meta)),
    warn: (msg, meta) => console.warn(`[WARN] [${module}] ${msg}`, format(meta)),
    error: (msg, meta) => console.error(`[ERROR] [${module}] ${msg}`, format(meta)),
    debug: (msg, meta) => console.debug(`[DEBUG] [${module}] ${msg}`, format(meta)),
  };
}

/**
 * Logger that discards everything
 */
export const silentLogger: Logger = {
  info: () => {},
  warn: () => {},
  error: () => {},
  debug: () => {},
};

/**
 * Default no-op metrics implementation
 */
export const defaultMetrics: Metrics = {
  increment: () => {},
  gauge: () => {},
  timing: () => {},
};
