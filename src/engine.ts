/**
 * @fileoverview Sync Coordinator
 *
 * Owns the path of every user action from the swipe handler to the server:
 *
 *   performAction ──► immediate send ──► success: card removed, undo slot
 *        │                    │
 *        │                    └── transient failure: enqueue, soft message
 *        └── queue non-empty / offline: enqueue behind older actions, drain
 *
 *   reconnect / startup / manual ──► drain: head-to-tail, one at a time
 *
 * Ordering guarantees:
 * - A new action never overtakes a queued one: if anything is pending, the
 *   new action goes to the back of the queue and a drain is triggered.
 * - The drain sends the head, removes exactly that id once the server
 *   confirmed it (persisted before the next send), and stops at the first
 *   failure, leaving that action and everything behind it untouched.
 * - Drains are serialized by a lock; a trigger that arrives while a drain is
 *   running returns `{ skipped: true }` instead of queueing a second drain.
 *   The lock is released only by the pass that holds it; one held longer
 *   than `syncLockTimeoutMs` is logged as slow, never taken over.
 *
 * Error policy (after the API client's own retries):
 * - `ValidationError` - hard error on immediate send, never queued.
 * - `AuthError`       - rethrown; the client already cleared the session.
 * - `NetworkError`, `ServerError`, `RateLimitedError` - queued; during a
 *   drain they halt it until the next trigger.
 *
 * Undo is local: it restores the card in the cached feed whether the action is
 * still queued or already sent, and never compensates on the server.
 */

import type Dexie from 'dexie';
import type { JobSwipeApi } from './api/endpoints';
import type { ReadModels, RecentlyModifiedTracker, RemovedCard } from './data';
import { LAST_SYNC_AT_KEY, getMeta, setMeta } from './database';
import { debugError, debugLog, debugWarn } from './debug';
import {
  ApiError,
  NetworkError,
  extractErrorMessage,
  isTransientError,
  toFriendlyMessage
} from './errors';
import type { PersistentActionQueue } from './queue';
import type { ConnectivityMonitor } from './stores/network';
import type { SyncStatusStore } from './stores/sync';
import type { UndoBuffer } from './undo';
import { createKeyedMutex, generateId } from './utils';
import type { ActionKind, DrainTrigger, QueuedAction } from './types';

// =============================================================================
// Types
// =============================================================================

/** Why an action went to the queue instead of the server. */
export type QueueReason = 'offline' | 'behind_pending' | 'transient_failure';

export type ActionOutcome =
  | { status: 'sent'; action: QueuedAction }
  | { status: 'queued'; action: QueuedAction; reason: QueueReason };

export type DrainResult =
  | { skipped: true; reason: 'running' | 'stopped' | 'offline' }
  | {
      skipped: false;
      trigger: DrainTrigger;
      /** Actions confirmed and removed during this pass. */
      sent: number;
      remaining: number;
      /** Queue fully drained; `last_sync_at` was written. */
      completed: boolean;
      /** The failure that halted the pass, if any. */
      error: Error | null;
    };

export type CompletedDrain = Extract<DrainResult, { skipped: false }>;

export interface SyncCoordinator {
  performAction(kind: ActionKind): Promise<ActionOutcome>;
  drain(trigger: DrainTrigger): Promise<DrainResult>;
  /** Register with the connectivity monitor and run the startup drain. */
  start(): Promise<DrainResult>;
  /** Stop reacting to reconnects; waits for a running drain to finish. */
  stop(): Promise<void>;
  undo(): Promise<QueuedAction | null>;
  listPending(): Promise<QueuedAction[]>;
  getLastSyncAt(): Promise<string | null>;
  /**
   * Drop the head if it is `actionId`. For an action the server keeps
   * rejecting; the drain itself never discards anything.
   */
  discardHead(actionId: string): Promise<boolean>;
  onSyncComplete(callback: (result: CompletedDrain) => void): () => void;
  /** Resolves once any drain started in the background has finished. */
  whenIdle(): Promise<void>;
  readonly isRunning: boolean;
}

export interface SyncCoordinatorConfig {
  db: Dexie;
  api: JobSwipeApi;
  queue: PersistentActionQueue;
  readModels: ReadModels;
  undo: UndoBuffer;
  connectivity: ConnectivityMonitor;
  status: SyncStatusStore;
  recentlyModified: RecentlyModifiedTracker;
  undoWindowMs?: number;
  syncLockTimeoutMs?: number;
  /** Epoch-ms clock. */
  now?: () => number;
}

export const DEFAULT_UNDO_WINDOW_MS = 3000;
export const DEFAULT_SYNC_LOCK_TIMEOUT_MS = 60_000;

const OFFLINE_MESSAGE = "Saved offline. Will sync when you're back online.";

// =============================================================================
// Factory
// =============================================================================

export function createSyncCoordinator(config: SyncCoordinatorConfig): SyncCoordinator {
  const { db, api, queue, readModels, undo, connectivity, status, recentlyModified } = config;
  const undoWindowMs = config.undoWindowMs ?? DEFAULT_UNDO_WINDOW_MS;
  const syncLockTimeoutMs = config.syncLockTimeoutMs ?? DEFAULT_SYNC_LOCK_TIMEOUT_MS;
  const clock = config.now ?? Date.now;

  const syncCompleteCallbacks: Set<(result: CompletedDrain) => void> = new Set();
  const connectivityUnsubscribers: Array<() => void> = [];
  let started = false;
  let stopped = false;
  let backgroundDrain: Promise<void> = Promise.resolve();
  const actionLock = createKeyedMutex();
  // Card removed by the action in the undo slot; replaced with the slot
  let lastRemoval: { actionId: string; removed: RemovedCard } | null = null;

  // Pending count is always live, whether or not the coordinator is started
  queue.onCountChange((count) => status.setPendingCount(count));

  // ---------------------------------------------------------------------------
  // Drain lock
  // ---------------------------------------------------------------------------

  let lockToken: object | null = null;
  let lockAcquiredAt: number | null = null;
  let activeDrain: Promise<DrainResult> | null = null;

  let slowDrainWarned = false;

  /**
   * The lock is never taken from a live pass: its head may be mid-send, and a
   * second pass would peek and send the same head again. A pass that holds the
   * lock past `syncLockTimeoutMs` is only reported.
   */
  function acquireSyncLock(): object | null {
    if (lockToken !== null) {
      if (
        !slowDrainWarned &&
        lockAcquiredAt !== null &&
        clock() - lockAcquiredAt > syncLockTimeoutMs
      ) {
        slowDrainWarned = true;
        debugWarn(
          `[SYNC] Drain still running after ${Math.round((clock() - lockAcquiredAt) / 1000)}s; waiting for it`
        );
      }
      return null;
    }
    const token = {};
    lockToken = token;
    lockAcquiredAt = clock();
    slowDrainWarned = false;
    return token;
  }

  function releaseSyncLock(token: object): void {
    if (lockToken !== token) return;
    lockToken = null;
    lockAcquiredAt = null;
  }

  // ---------------------------------------------------------------------------
  // Dispatch
  // ---------------------------------------------------------------------------

  /** Send one action. Every `ActionKind` needs a case here. */
  async function dispatch(kind: ActionKind): Promise<void> {
    switch (kind.type) {
      case 'swipe':
        await api.swipeJob(kind.jobId, kind.direction);
        return;
      case 'save_job':
        await api.setJobSaved(kind.jobId, kind.saved);
        return;
      default: {
        const unreachable: never = kind;
        throw new Error(`Unhandled action kind: ${JSON.stringify(unreachable)}`);
      }
    }
  }

  function triggerDrain(trigger: DrainTrigger): void {
    backgroundDrain = backgroundDrain.then(async () => {
      try {
        await drain(trigger);
      } catch (e) {
        debugError(`[SYNC] Background drain (${trigger}) failed:`, e);
      }
    });
  }

  // ---------------------------------------------------------------------------
  // Immediate send
  // ---------------------------------------------------------------------------

  async function enqueueAction(
    action: QueuedAction,
    reason: QueueReason
  ): Promise<ActionOutcome> {
    const stored = await queue.enqueue(action.kind, action.id);
    status.setSyncMessage(OFFLINE_MESSAGE);
    debugLog(`[SYNC] Queued ${action.kind.type} ${action.id} (${reason})`);
    return { status: 'queued', action: stored, reason };
  }

  /**
   * Actions are handled one at a time so a later swipe cannot be sent while an
   * earlier one is still deciding between "sent" and "queued".
   */
  function performAction(kind: ActionKind): Promise<ActionOutcome> {
    // Before any await: an in-flight feed fetch must not bring the card back
    recentlyModified.mark(kind.jobId);
    return actionLock.run('perform', () => handleAction(kind));
  }

  async function handleAction(kind: ActionKind): Promise<ActionOutcome> {
    const action: QueuedAction = {
      id: generateId(),
      kind,
      createdAt: new Date(clock()).toISOString()
    };
    let outcome: ActionOutcome;
    if ((await queue.count()) > 0) {
      outcome = await enqueueAction(action, 'behind_pending');
      if (connectivity.currentStatus() === 'online') triggerDrain('after-send');
    } else if (connectivity.currentStatus() === 'offline') {
      outcome = await enqueueAction(action, 'offline');
    } else {
      try {
        await dispatch(kind);
        outcome = { status: 'sent', action };
        debugLog(`[SYNC] Sent ${kind.type} ${action.id} for job ${kind.jobId}`);
      } catch (e) {
        // Validation and auth failures will never succeed on blind replay
        if (!isTransientError(e)) {
          debugWarn(`[SYNC] ${kind.type} for job ${kind.jobId} rejected:`, extractErrorMessage(e));
          throw e;
        }
        if (e instanceof NetworkError && !e.timedOut) connectivity.report('offline');
        outcome = await enqueueAction(action, 'transient_failure');
      }
    }

    const removed = kind.type === 'swipe' ? await readModels.removeJobFromFeed(kind.jobId) : null;
    undo.record(action, undoWindowMs);
    lastRemoval = removed ? { actionId: action.id, removed } : null;
    return outcome;
  }

  // ---------------------------------------------------------------------------
  // Drain
  // ---------------------------------------------------------------------------

  async function runDrain(trigger: DrainTrigger, token: object): Promise<DrainResult> {
    debugLog(`[SYNC] Drain started (${trigger})`);
    status.setStatus('syncing');
    status.setSyncMessage('Syncing changes...');

    let sent = 0;
    let error: Error | null = null;
    let failed: QueuedAction | null = null;

    try {
      while (!stopped) {
        const head = await queue.peekOldest();
        if (!head) break;

        debugLog(`[SYNC] Processing: ${head.kind.type} ${head.id} for job ${head.kind.jobId}`);
        try {
          await dispatch(head.kind);
        } catch (e) {
          error = e instanceof Error ? e : new Error(extractErrorMessage(e));
          failed = head;
          break;
        }

        // Persist the removal before touching the next action
        if (!(await queue.removeOldest(head.id))) break;
        sent++;
        debugLog(`[SYNC] Success: ${head.kind.type} ${head.id}`);
      }

      const remaining = await queue.count();
      const completed = error === null && remaining === 0;
      const result: CompletedDrain = { skipped: false, trigger, sent, remaining, completed, error };

      if (completed) {
        const lastSyncAt = new Date(clock()).toISOString();
        await setMeta(db, LAST_SYNC_AT_KEY, lastSyncAt);
        if (sent > 0) await readModels.invalidateApplications();
        status.setLastSyncTime(lastSyncAt);
        status.setError(null);
        status.setStatus('idle');
        status.setSyncMessage(sent > 0 ? 'Everything is synced!' : null);
        debugLog(`[SYNC] Drain complete: ${sent} sent`);
      } else if (error && failed) {
        const friendly = toFriendlyMessage(error);
        status.addSyncError({
          actionId: failed.id,
          actionType: failed.kind.type,
          message: extractErrorMessage(error),
          timestamp: new Date(clock()).toISOString()
        });
        status.setError(friendly, extractErrorMessage(error));
        if (error instanceof NetworkError && !error.timedOut) connectivity.report('offline');
        status.setStatus(connectivity.currentStatus() === 'offline' ? 'offline' : 'error');
        status.setSyncMessage(
          error instanceof ApiError && error.retryable ? OFFLINE_MESSAGE : friendly
        );
        debugWarn(`[SYNC] Drain halted at ${failed.id} after ${sent} sent, ${remaining} remaining:`, error.message);
      } else {
        status.setStatus('idle');
        debugLog(`[SYNC] Drain stopped early: ${sent} sent, ${remaining} remaining`);
      }

      if (completed || sent > 0) notifySyncComplete(result);
      return result;
    } finally {
      releaseSyncLock(token);
    }
  }

  async function drain(trigger: DrainTrigger): Promise<DrainResult> {
    if (stopped) return { skipped: true, reason: 'stopped' };
    if (connectivity.currentStatus() === 'offline') {
      status.setStatus('offline');
      return { skipped: true, reason: 'offline' };
    }

    const token = acquireSyncLock();
    if (!token) {
      debugLog(`[SYNC] Drain (${trigger}) skipped - drain already in progress`);
      return { skipped: true, reason: 'running' };
    }

    const pass = runDrain(trigger, token);
    activeDrain = pass;
    try {
      return await pass;
    } finally {
      if (activeDrain === pass) activeDrain = null;
    }
  }

  function notifySyncComplete(result: CompletedDrain): void {
    debugLog(`[SYNC] Notifying ${syncCompleteCallbacks.size} sync-complete callbacks`);
    for (const callback of syncCompleteCallbacks) {
      try {
        callback(result);
      } catch (e) {
        debugError('[SYNC] Sync-complete callback error:', e);
      }
    }
  }

  // ---------------------------------------------------------------------------
  // Lifecycle
  // ---------------------------------------------------------------------------

  async function start(): Promise<DrainResult> {
    stopped = false;
    if (!started) {
      started = true;
      connectivityUnsubscribers.push(
        connectivity.onReconnect(async () => {
          await drain('reconnect');
        }),
        connectivity.onDisconnect(() => {
          status.setStatus('offline');
        })
      );
    }
    status.setPendingCount(await queue.count());
    const lastSyncAt = await getMeta(db, LAST_SYNC_AT_KEY);
    if (lastSyncAt) status.setLastSyncTime(lastSyncAt);
    return drain('startup');
  }

  async function stop(): Promise<void> {
    stopped = true;
    started = false;
    for (const unsubscribe of connectivityUnsubscribers.splice(0)) unsubscribe();
    if (activeDrain) await activeDrain;
    await backgroundDrain;
  }

  async function undoLast(): Promise<QueuedAction | null> {
    const removal = lastRemoval;
    lastRemoval = null;
    const action = undo.tryUndo();
    if (!action) return null;
    if (removal && removal.actionId === action.id) {
      await readModels.restoreJobToFeed(removal.removed);
    }
    return action;
  }

  return {
    performAction,
    drain,
    start,
    stop,
    undo: undoLast,
    listPending: () => queue.listAll(),
    getLastSyncAt: () => getMeta(db, LAST_SYNC_AT_KEY),
    discardHead: async (actionId) => {
      const removed = await queue.removeOldest(actionId);
      if (removed) debugWarn(`[SYNC] Discarded queued action ${actionId}`);
      return removed;
    },
    onSyncComplete(callback) {
      syncCompleteCallbacks.add(callback);
      return () => syncCompleteCallbacks.delete(callback);
    },
    whenIdle: async () => {
      await backgroundDrain;
      if (activeDrain) await activeDrain;
    },
    get isRunning() {
      return lockToken !== null;
    }
  };
}
