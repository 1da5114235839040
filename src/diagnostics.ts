/**
 * @fileoverview Unified Diagnostics Module
 *
 * Provides a single entry point for inspecting the internal state of a sync
 * engine. {@link getDiagnostics} returns a JSON-serializable snapshot of the
 * pending queue, the local cache, connectivity, the sync status store, the
 * undo slot and the resolved configuration.
 *
 * Each call returns a **point-in-time snapshot**; the data is not reactive.
 * For a live dashboard, poll `getDiagnostics()` or call it from
 * `coordinator.onSyncComplete`.
 *
 * Sub-category functions (`getQueueDiagnostics`, `getCacheDiagnostics`, ...)
 * are exported for lightweight access to one section.
 *
 * **Dependency direction:** this module only reads from an
 * {@link EngineContext}; nothing in the engine imports it.
 */

import { get } from 'svelte/store';
import type { LocalCache } from './cache';
import type { EngineContext } from './config';
import type { PersistentActionQueue } from './queue';
import type { ConnectivityMonitor } from './stores/network';
import type { SyncError, SyncStatusStore } from './stores/sync';
import type { ActionType, ConnectivityStatus, SyncStatus } from './types';

// =============================================================================
// Types
// =============================================================================

/**
 * Diagnostics snapshot returned by {@link getDiagnostics}.
 */
export interface DiagnosticsSnapshot {
  /** ISO 8601 timestamp of when this snapshot was captured */
  timestamp: string;

  /** Engine prefix (e.g., `"jobswipe"`) */
  prefix: string;

  sync: {
    status: SyncStatus;
    pendingCount: number;
    /** Last completed drain as shown by the status store */
    lastSyncTime: string | null;
    /** Last completed drain as persisted (`last_sync_at`) */
    lastSyncAt: string | null;
    syncMessage: string | null;
    drainRunning: boolean;
  };

  queue: {
    pendingActions: number;
    pendingJobIds: string[];
    byActionType: Partial<Record<ActionType, number>>;
    oldestPendingTimestamp: string | null;
    headActionId: string | null;
  };

  cache: {
    entries: number;
    byDomain: Record<string, number>;
    /** Entries past their TTL that no read has purged yet */
    expired: number;
  };

  network: {
    status: ConnectivityStatus;
  };

  engine: {
    signedIn: boolean;
    recentlyModifiedCount: number;
    undoAvailable: boolean;
    undoExpiresAt: string | null;
  };

  errors: {
    lastError: string | null;
    lastErrorDetails: string | null;
    recentErrors: SyncError[];
  };

  config: {
    baseUrl: string;
    databaseName: string;
    retries: number;
    requestTimeoutMs: number;
    undoWindowMs: number;
    feedTtlMs: number;
    readModelTtlMs: number;
  };
}

// =============================================================================
// Main Diagnostics
// =============================================================================

/**
 * Capture a full diagnostics snapshot.
 *
 * The async reads (queue, cache, persisted sync time, session) run in
 * parallel.
 *
 * @example
 * ```ts
 * const snapshot = await getDiagnostics(engine);
 * console.log(JSON.stringify(snapshot, null, 2));
 * ```
 */
export async function getDiagnostics(engine: EngineContext): Promise<DiagnosticsSnapshot> {
  const { config, coordinator, undo } = engine;
  const syncState = get(engine.status);

  const [queue, cache, lastSyncAt, session] = await Promise.all([
    getQueueDiagnostics(engine.queue),
    getCacheDiagnostics(engine.cache, config.now()),
    coordinator.getLastSyncAt(),
    engine.credentials.getSession()
  ]);

  const undoSlot = undo.peek();

  return {
    timestamp: new Date(config.now()).toISOString(),
    prefix: config.prefix,

    sync: {
      status: syncState.status,
      pendingCount: syncState.pendingCount,
      lastSyncTime: syncState.lastSyncTime,
      lastSyncAt,
      syncMessage: syncState.syncMessage,
      drainRunning: coordinator.isRunning
    },

    queue,
    cache,
    network: getNetworkDiagnostics(engine.connectivity),

    engine: {
      signedIn: session !== null,
      recentlyModifiedCount: engine.recentlyModified.size,
      undoAvailable: undoSlot !== null,
      undoExpiresAt: undoSlot ? new Date(undoSlot.expiresAt).toISOString() : null
    },

    errors: getErrorDiagnostics(engine.status),

    config: {
      baseUrl: config.baseUrl,
      databaseName: config.database.name,
      retries: config.retry.retries,
      requestTimeoutMs: config.requestTimeoutMs,
      undoWindowMs: config.undoWindowMs,
      feedTtlMs: config.feedTtlMs,
      readModelTtlMs: config.readModelTtlMs
    }
  };
}

// =============================================================================
// Sub-category Diagnostics
// =============================================================================

/**
 * Get pending queue diagnostics (async, reads IndexedDB).
 */
export async function getQueueDiagnostics(
  queue: PersistentActionQueue
): Promise<DiagnosticsSnapshot['queue']> {
  const pending = await queue.listAll();

  const byActionType: Partial<Record<ActionType, number>> = {};
  const jobIds = new Set<string>();
  let oldestTimestamp: string | null = null;

  for (const action of pending) {
    byActionType[action.kind.type] = (byActionType[action.kind.type] ?? 0) + 1;
    jobIds.add(action.kind.jobId);
    if (!oldestTimestamp || action.createdAt < oldestTimestamp) {
      oldestTimestamp = action.createdAt;
    }
  }

  return {
    pendingActions: pending.length,
    pendingJobIds: Array.from(jobIds),
    byActionType,
    oldestPendingTimestamp: oldestTimestamp,
    headActionId: pending[0]?.id ?? null
  };
}

/**
 * Get local cache diagnostics (async, reads IndexedDB). Does not purge.
 */
export async function getCacheDiagnostics(
  cache: LocalCache,
  nowMs: number = Date.now()
): Promise<DiagnosticsSnapshot['cache']> {
  const entries = await cache.listAll();
  const byDomain: Record<string, number> = {};
  let expired = 0;

  for (const entry of entries) {
    byDomain[entry.domain] = (byDomain[entry.domain] ?? 0) + 1;
    if (entry.expiresAt !== null && entry.expiresAt <= nowMs) expired++;
  }

  return { entries: entries.length, byDomain, expired };
}

/**
 * Get network connectivity diagnostics (synchronous).
 */
export function getNetworkDiagnostics(connectivity: ConnectivityMonitor) {
  return {
    status: connectivity.currentStatus()
  };
}

/**
 * Get error state diagnostics (synchronous).
 *
 * @returns Latest error info and recent error history
 */
export function getErrorDiagnostics(status: SyncStatusStore) {
  const syncState = get(status);
  return {
    lastError: syncState.lastError,
    lastErrorDetails: syncState.lastErrorDetails,
    recentErrors: syncState.syncErrors
  };
}
