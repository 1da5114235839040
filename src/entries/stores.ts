/**
 * @fileoverview Stores subpath barrel — `jobswipe-sync/stores`
 *
 * Re-exports the Svelte-compatible reactive stores. Each engine owns its own
 * instances (see `EngineContext`); these factories are for hosts that wire
 * components by hand.
 *
 * All stores follow the Svelte store contract (subscribe/unsubscribe) and can
 * be used with the `$store` auto-subscription syntax in `.svelte` files.
 */

// =============================================================================
//  Sync Status Store
// =============================================================================
// Idle / syncing / error / offline, the pending action count, the last error
// and the time of the last completed drain.

export { createSyncStatusStore } from '../stores/sync';
export type { SyncStatusStore, SyncState, SyncError } from '../stores/sync';

// =============================================================================
//  Connectivity Store
// =============================================================================
// `'online' | 'offline'`, fed by the host and an optional health probe.

export { createConnectivityMonitor } from '../stores/network';
export type { ConnectivityMonitor, ConnectivityMonitorOptions } from '../stores/network';

// =============================================================================
//  Undo Slot
// =============================================================================

export { createUndoBuffer } from '../undo';
export type { UndoBuffer, UndoBufferOptions } from '../undo';
