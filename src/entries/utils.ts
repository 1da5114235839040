/**
 * @fileoverview Utils subpath barrel — `jobswipe-sync/utils`
 *
 * Re-exports general-purpose utility functions, debug tooling, error helpers
 * and the unified diagnostics API. These helpers are framework-agnostic and
 * can be used anywhere in the application.
 */

// =============================================================================
//  General Utilities
// =============================================================================
// - `generateId` — UUID v4 for action ids.
// - `now` — current ISO 8601 timestamp string.
// - `sleep` — promise timer.
// - `createKeyedMutex` — one async lock per key.

export { generateId, now, sleep, createKeyedMutex } from '../utils';
export type { KeyedMutex } from '../utils';

// =============================================================================
//  Debug Utilities
// =============================================================================
// - `debug` — conditional logger that only outputs when debug mode is active.
// - `isDebugMode` / `setDebugMode` — read or override the debug flag.

export { debug, debugLog, debugWarn, debugError, isDebugMode, setDebugMode } from '../debug';

// =============================================================================
//  Error Helpers
// =============================================================================

export {
  errorFromResponse,
  parseRetryAfter,
  isTransientError,
  extractErrorMessage,
  toFriendlyMessage
} from '../errors';

// =============================================================================
//  Diagnostics
// =============================================================================
// - `getDiagnostics` — JSON snapshot of an engine's state.
// - Sub-category functions for lightweight access to specific sections.

export {
  getDiagnostics,
  getQueueDiagnostics,
  getCacheDiagnostics,
  getNetworkDiagnostics,
  getErrorDiagnostics
} from '../diagnostics';
export type { DiagnosticsSnapshot } from '../diagnostics';
