import { writable, type Readable } from 'svelte/store';
import type { ActionType, SyncStatus } from '../types';

// Detailed failure of a single queued action, for debugging
export interface SyncError {
  actionId: string;
  actionType: ActionType;
  message: string;
  timestamp: string;
}

export interface SyncState {
  status: SyncStatus;
  pendingCount: number;
  lastError: string | null; // Friendly error message
  lastErrorDetails: string | null; // Raw technical error
  syncErrors: SyncError[]; // Detailed errors for debugging
  lastSyncTime: string | null;
  syncMessage: string | null; // Human-readable status message
}

export interface SyncStatusStore extends Readable<SyncState> {
  setStatus(status: SyncStatus): void;
  setPendingCount(count: number): void;
  setError(friendly: string | null, raw?: string | null): void;
  addSyncError(error: SyncError): void;
  clearSyncErrors(): void;
  setLastSyncTime(time: string | null): void;
  setSyncMessage(message: string | null): void;
  reset(): void;
}

export interface SyncStatusStoreOptions {
  /** Minimum time to show 'syncing' to prevent flickering. Defaults to 500 ms. */
  minSyncingMs?: number;
}

// Max errors to keep in history
const MAX_ERROR_HISTORY = 10;

function initialState(): SyncState {
  return {
    status: 'idle',
    pendingCount: 0,
    lastError: null,
    lastErrorDetails: null,
    syncErrors: [],
    lastSyncTime: null,
    syncMessage: null
  };
}

export function createSyncStatusStore(options: SyncStatusStoreOptions = {}): SyncStatusStore {
  const minSyncingMs = options.minSyncingMs ?? 500;
  const { subscribe, set, update } = writable<SyncState>(initialState());

  let currentStatus: SyncStatus = 'idle';
  let syncingStartTime: number | null = null;
  let pendingStatusChange: { status: SyncStatus; timeout: ReturnType<typeof setTimeout> } | null =
    null;

  function applyStatus(status: SyncStatus) {
    currentStatus = status;
    update((state) => ({
      ...state,
      status,
      lastError: status === 'idle' ? null : state.lastError
    }));
  }

  return {
    subscribe,
    setStatus: (status: SyncStatus) => {
      // Ignore redundant status updates to prevent unnecessary re-renders
      if (status === currentStatus && status !== 'syncing') {
        return;
      }

      if (pendingStatusChange) {
        clearTimeout(pendingStatusChange.timeout);
        pendingStatusChange = null;
      }

      if (status === 'syncing') {
        // Starting sync - record the time and clear previous errors
        syncingStartTime = Date.now();
        currentStatus = status;
        update((state) => ({ ...state, status, lastError: null, syncErrors: [] }));
        return;
      }

      const remaining =
        syncingStartTime !== null ? minSyncingMs - (Date.now() - syncingStartTime) : 0;
      if (remaining > 0) {
        pendingStatusChange = {
          status,
          timeout: setTimeout(() => {
            syncingStartTime = null;
            pendingStatusChange = null;
            applyStatus(status);
          }, remaining)
        };
      } else {
        syncingStartTime = null;
        applyStatus(status);
      }
    },
    setPendingCount: (count: number) => update((state) => ({ ...state, pendingCount: count })),
    setError: (friendly: string | null, raw?: string | null) =>
      update((state) => ({
        ...state,
        lastError: friendly,
        lastErrorDetails: raw ?? null
      })),
    addSyncError: (error: SyncError) =>
      update((state) => ({
        ...state,
        syncErrors: [...state.syncErrors, error].slice(-MAX_ERROR_HISTORY)
      })),
    clearSyncErrors: () => update((state) => ({ ...state, syncErrors: [] })),
    setLastSyncTime: (time: string | null) =>
      update((state) => ({ ...state, lastSyncTime: time })),
    setSyncMessage: (message: string | null) =>
      update((state) => ({ ...state, syncMessage: message })),
    reset: () => {
      if (pendingStatusChange) {
        clearTimeout(pendingStatusChange.timeout);
        pendingStatusChange = null;
      }
      syncingStartTime = null;
      currentStatus = 'idle';
      set(initialState());
    }
  };
}
