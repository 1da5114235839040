/**
 * @fileoverview Undo Buffer
 *
 * Single-slot holder for the most recent user action, backing the "Undo"
 * snackbar. Recording a new action replaces the previous slot without side
 * effects on it. The slot expires after its window; expiry is applied by a
 * timer and again lazily on every read, so a stalled timer never lets an
 * expired action through.
 *
 * Undo is local only: it hands the action back so the caller can restore the
 * card. It never retracts a request the server has already applied.
 */

import { writable, type Readable } from 'svelte/store';
import { debugLog } from './debug';
import { unrefTimer } from './utils';
import type { QueuedAction, UndoSlot } from './types';

export interface UndoBuffer extends Readable<UndoSlot | null> {
  record(action: QueuedAction, windowMs: number): void;
  /** Return and clear the action if still inside its window. */
  tryUndo(): QueuedAction | null;
  peek(): UndoSlot | null;
  clear(): void;
  destroy(): void;
}

export interface UndoBufferOptions {
  /** Epoch-ms clock. */
  now?: () => number;
  /** Clear the slot with a timer when it expires. Defaults to `true`. */
  expireWithTimer?: boolean;
}

export function createUndoBuffer(options: UndoBufferOptions = {}): UndoBuffer {
  const clock = options.now ?? Date.now;
  const expireWithTimer = options.expireWithTimer ?? true;
  const { subscribe, set } = writable<UndoSlot | null>(null);

  let slot: UndoSlot | null = null;
  let expiryTimer: ReturnType<typeof setTimeout> | null = null;

  function cancelTimer() {
    if (expiryTimer !== null) {
      clearTimeout(expiryTimer);
      expiryTimer = null;
    }
  }

  function setSlot(next: UndoSlot | null) {
    slot = next;
    set(next);
  }

  function clear() {
    cancelTimer();
    if (slot !== null) setSlot(null);
  }

  /** Lazily drop an expired slot. */
  function current(): UndoSlot | null {
    if (slot !== null && clock() >= slot.expiresAt) {
      debugLog(`[UNDO] Window closed for ${slot.action.id}`);
      clear();
    }
    return slot;
  }

  return {
    subscribe,

    record(action, windowMs) {
      cancelTimer();
      const next: UndoSlot = { action, expiresAt: clock() + windowMs };
      setSlot(next);
      if (expireWithTimer) {
        expiryTimer = setTimeout(() => {
          expiryTimer = null;
          if (slot === next) setSlot(null);
        }, windowMs);
        // A pending snackbar must not keep a Node host alive
        unrefTimer(expiryTimer);
      }
    },

    tryUndo() {
      const live = current();
      if (!live) return null;
      clear();
      debugLog(`[UNDO] Undoing ${live.action.kind.type} on job ${live.action.kind.jobId}`);
      return live.action;
    },

    peek: current,
    clear,
    destroy: clear
  };
}
