/**
 * @fileoverview Debug Logging Utilities
 *
 * Provides opt-in debug logging. When debug mode is enabled, all debug calls
 * forward to the console. When disabled, they are silently dropped.
 *
 * Debug mode is resolved in this order:
 *   1. An explicit {@link setDebugMode} call (also made by `initEngine` when
 *      the config sets `debug`).
 *   2. The environment variable `<PREFIX>_DEBUG_MODE=true`, read once.
 *
 * The prefix is configurable via {@link _setDebugPrefix} (set by
 * {@link config.ts#initEngine}) so multiple engines in one process can be
 * told apart in the environment.
 *
 * @example
 * // Enable debug mode for a run:
 * //   JOBSWIPE_DEBUG_MODE=true node app.js
 *
 * // Or programmatically:
 * import { setDebugMode } from 'jobswipe-sync/utils';
 * setDebugMode(true);
 */

// =============================================================================
// Internal State
// =============================================================================

/** Cached result of the environment check (avoids repeated reads). */
let debugEnabled: boolean | null = null;

/** Configurable prefix for the environment variable (default: `'jobswipe'`). */
let debugPrefix = 'jobswipe';

// =============================================================================
// Internal Helpers
// =============================================================================

/**
 * Set the prefix used for the debug environment variable.
 *
 * Called internally by {@link config.ts#initEngine}. Resets the cached flag
 * so the next check reads the variable for the new prefix.
 *
 * @param prefix - Application-specific prefix (e.g., `'myapp'`).
 * @internal
 */
export function _setDebugPrefix(prefix: string) {
  if (prefix !== debugPrefix) {
    debugPrefix = prefix;
    debugEnabled = null;
  }
}

function readEnvFlag(): boolean {
  if (typeof process === 'undefined' || !process.env) return false;
  return process.env[`${debugPrefix.toUpperCase()}_DEBUG_MODE`] === 'true';
}

// =============================================================================
// Public API
// =============================================================================

/**
 * Check whether debug mode is currently enabled.
 *
 * @returns `true` if debug logging is active.
 */
export function isDebugMode(): boolean {
  if (debugEnabled !== null) return debugEnabled;
  debugEnabled = readEnvFlag();
  return debugEnabled;
}

/**
 * Enable or disable debug mode at runtime.
 *
 * @param enabled - `true` to enable debug logging, `false` to disable.
 */
export function setDebugMode(enabled: boolean) {
  debugEnabled = enabled;
}

/**
 * Log a debug message at the `console.log` level.
 *
 * No-op when debug mode is disabled.
 */
export function debugLog(...args: unknown[]) {
  if (isDebugMode()) console.log(...args);
}

/**
 * Log a debug message at the `console.warn` level.
 *
 * No-op when debug mode is disabled.
 */
export function debugWarn(...args: unknown[]) {
  if (isDebugMode()) console.warn(...args);
}

/**
 * Log a debug message at the `console.error` level.
 *
 * No-op when debug mode is disabled.
 */
export function debugError(...args: unknown[]) {
  if (isDebugMode()) console.error(...args);
}

/**
 * Unified debug logging function with configurable severity level.
 *
 * @param level - Console severity: `'log'`, `'warn'`, or `'error'`.
 * @param args  - Arguments forwarded to the corresponding `console` method.
 *
 * @example
 * debug('log', '[SYNC] Starting drain...');
 * debug('error', '[SYNC] Drain failed:', error);
 */
export function debug(level: 'log' | 'warn' | 'error', ...args: unknown[]): void {
  if (!isDebugMode()) return;
  switch (level) {
    case 'log':
      console.log(...args);
      break;
    case 'warn':
      console.warn(...args);
      break;
    case 'error':
      console.error(...args);
      break;
  }
}
