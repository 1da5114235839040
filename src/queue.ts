/**
 * @fileoverview Persistent Action Queue
 *
 * Durable FIFO of user actions that could not be delivered yet, stored in the
 * `offlineQueue` Dexie table. Order is the table's auto-increment `seq`, never
 * the `createdAt` timestamp, so two actions issued in the same millisecond
 * still replay in the order they were issued.
 *
 * The queue stores **intents** (swipe right on job X, save job Y) and never
 * coalesces or reorders them: a later "skip" after an earlier "apply" for the
 * same job are both replayed, in that order. Whether that makes sense for the
 * server is the server's call.
 *
 * Only the sync coordinator mutates the queue. Everyone else observes it
 * through {@link PersistentActionQueue.listAll} and the count hook.
 *
 * ## Data Integrity
 *
 * - `enqueue` resolves only after the row is committed, so an action the UI
 *   was told about survives a crash.
 * - `removeOldest` checks the head and deletes it inside one `rw`
 *   transaction; a stale caller holding an old head id removes nothing.
 * - Rows are validated when read back. A row that no longer parses as a known
 *   action (older app version, manual tampering) can never be dispatched, so
 *   it is discarded with a warning instead of blocking the queue forever.
 */

import type Dexie from 'dexie';
import { actionKindSchema, queuedActionSchema } from './api/schemas';
import { debugLog, debugWarn } from './debug';
import { generateId, now } from './utils';
import type { ActionKind, QueuedAction, QueuedActionRow } from './types';

// =============================================================================
// Types
// =============================================================================

export interface PersistentActionQueue {
  /** Append an action. Resolves once it is persisted. */
  enqueue(kind: ActionKind, id?: string): Promise<QueuedAction>;
  peekOldest(): Promise<QueuedAction | null>;
  /** Remove the head only if its id is `matchingId`. */
  removeOldest(matchingId: string): Promise<boolean>;
  /** Every pending action, oldest first. */
  listAll(): Promise<QueuedAction[]>;
  count(): Promise<number>;
  /** Job ids referenced by at least one pending action. */
  getPendingJobIds(): Promise<Set<string>>;
  clear(): Promise<void>;
  onCountChange(listener: (count: number) => void): () => void;
}

// =============================================================================
// Factory
// =============================================================================

export function createActionQueue(db: Dexie): PersistentActionQueue {
  const countListeners: Set<(count: number) => void> = new Set();

  const table = () => db.table<QueuedActionRow, number>('offlineQueue');

  function parseRow(row: QueuedActionRow): QueuedAction | null {
    const result = queuedActionSchema.safeParse({
      id: row.id,
      kind: row.kind,
      createdAt: row.createdAt
    });
    return result.success ? result.data : null;
  }

  async function discard(row: QueuedActionRow): Promise<void> {
    debugWarn('[QUEUE] Discarding unreadable queued action:', { seq: row.seq, id: row.id });
    if (row.seq !== undefined) {
      await table().delete(row.seq);
    }
  }

  async function notifyCount(): Promise<void> {
    if (countListeners.size === 0) return;
    const count = await table().count();
    for (const listener of countListeners) listener(count);
  }

  async function enqueue(kind: ActionKind, id: string = generateId()): Promise<QueuedAction> {
    const action: QueuedAction = {
      id,
      kind: actionKindSchema.parse(kind),
      createdAt: now()
    };
    const row: QueuedActionRow = { ...action };
    await table().add(row);
    debugLog(`[QUEUE] Enqueued ${action.kind.type} ${action.id} for job ${action.kind.jobId}`);
    await notifyCount();
    return action;
  }

  async function peekOldest(): Promise<QueuedAction | null> {
    // Loop so unreadable heads are dropped until a valid one (or nothing) remains
    for (;;) {
      const row = await table().toCollection().first();
      if (!row) return null;
      const action = parseRow(row);
      if (action) return action;
      await discard(row);
      await notifyCount();
    }
  }

  async function removeOldest(matchingId: string): Promise<boolean> {
    const removed = await db.transaction('rw', table(), async () => {
      const head = await table().toCollection().first();
      if (!head || head.id !== matchingId || head.seq === undefined) return false;
      await table().delete(head.seq);
      return true;
    });
    if (removed) {
      debugLog(`[QUEUE] Removed ${matchingId}`);
      await notifyCount();
    } else {
      debugWarn(`[QUEUE] ${matchingId} is no longer the head; nothing removed`);
    }
    return removed;
  }

  async function listAll(): Promise<QueuedAction[]> {
    const rows = await table().toArray();
    const actions: QueuedAction[] = [];
    let discarded = 0;
    for (const row of rows) {
      const action = parseRow(row);
      if (action) {
        actions.push(action);
      } else {
        await discard(row);
        discarded++;
      }
    }
    if (discarded > 0) await notifyCount();
    return actions;
  }

  async function getPendingJobIds(): Promise<Set<string>> {
    const pending = await listAll();
    return new Set(pending.map((action) => action.kind.jobId));
  }

  async function clear(): Promise<void> {
    await table().clear();
    await notifyCount();
  }

  function onCountChange(listener: (count: number) => void): () => void {
    countListeners.add(listener);
    return () => countListeners.delete(listener);
  }

  return {
    enqueue,
    peekOldest,
    removeOldest,
    listAll,
    count: () => table().count(),
    getPendingJobIds,
    clear,
    onCountChange
  };
}
