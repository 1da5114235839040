/**
 * Intent-Based Action Types
 *
 * Queued actions record what the user *did* (swiped right on a job, saved a
 * job) rather than a snapshot of server state. The queue replays these
 * intents against the REST API in the order they were issued.
 *
 * `ActionKind` is a closed union: adding a new action requires a new member
 * here, a schema in `api/schemas.ts`, and a case in the coordinator's
 * dispatch switch (the compiler flags the missing case).
 */

export type SwipeDirection = 'left' | 'right';

/** Swipe on a job card: `right` applies, `left` skips. */
export interface SwipeActionKind {
  type: 'swipe';
  jobId: string;
  direction: SwipeDirection;
}

/** Bookmark or un-bookmark a job. */
export interface SaveJobActionKind {
  type: 'save_job';
  jobId: string;
  saved: boolean;
}

export type ActionKind = SwipeActionKind | SaveJobActionKind;

export type ActionType = ActionKind['type'];

/**
 * A user action awaiting (or having completed) transmission.
 *
 * - `id` is generated at enqueue time and survives reloads.
 * - `createdAt` is informational; FIFO order comes from the storage
 *   insertion sequence, not from this timestamp.
 */
export interface QueuedAction {
  id: string;
  kind: ActionKind;
  createdAt: string; // ISO timestamp
}

/** Row shape of the `offlineQueue` table. `seq` is the auto-increment key. */
export interface QueuedActionRow extends QueuedAction {
  seq?: number;
}

// ============================================================
// CACHE TYPES
// ============================================================

/**
 * A cached read-model value.
 * `expiresAt` is `null` for entries written without a TTL.
 */
export interface CacheEntry<T = unknown> {
  key: string;
  domain: string;
  value: T;
  storedAt: number; // epoch ms
  expiresAt: number | null; // epoch ms
}

// ============================================================
// AUTH TYPES
// ============================================================

export interface AuthSession {
  accessToken: string;
  /** `null` when the server issued no refresh token; a 401 then ends the session. */
  refreshToken: string | null;
}

// ============================================================
// UNDO TYPES
// ============================================================

export interface UndoSlot {
  action: QueuedAction;
  expiresAt: number; // epoch ms
}

// ============================================================
// STATUS TYPES
// ============================================================

export type SyncStatus = 'idle' | 'syncing' | 'error' | 'offline';

export type ConnectivityStatus = 'online' | 'offline';

/** What started a drain. Only used for logging and diagnostics. */
export type DrainTrigger = 'startup' | 'reconnect' | 'manual' | 'after-send';

// ============================================================
// READ MODELS
// ============================================================

export interface JobCard {
  id: string;
  title: string;
  company: string;
  location: string | null;
  snippet: string | null;
  score: number;
  apply_url: string | null;
}

export interface Application {
  id: string;
  job_id: string;
  status: string;
  attempt_count: number;
  last_error: string | null;
  assigned_worker: string | null;
  created_at: string;
  updated_at: string;
}

export interface ApplicationAuditEntry {
  id: string;
  step: string;
  payload: Record<string, unknown>;
  artifacts: Record<string, unknown>;
  timestamp: string;
}
