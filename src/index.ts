/**
 * @fileoverview Main entry point — `jobswipe-sync`
 *
 * Primary barrel export. Re-exports the **full** public API surface:
 *
 * - **Engine Configuration & Lifecycle** — build an engine from one config
 *   object and own its lifetime.
 * - **Sync Coordinator** — perform actions, drain the offline queue, undo.
 * - **API Client** — the resilient transport and the typed JobSwipe endpoints.
 * - **Local State** — the persistent action queue, the TTL cache, read models.
 * - **Authentication** — encrypted session storage and the credential provider.
 * - **Reactive Stores** — connectivity, sync status, undo slot.
 * - **Errors, Diagnostics & Types**.
 *
 * For smaller imports, prefer the subpath entry points
 * (`jobswipe-sync/stores`, `jobswipe-sync/utils`).
 */

// =============================================================================
//  Engine Configuration
// =============================================================================
// `initEngine` opens the database and wires every component; the returned
// `EngineContext` is owned by the caller and released with `dispose()`.

export { initEngine, resolveConfig, loadConfigFromEnv } from './config';
export type { SyncEngineConfig, ResolvedSyncEngineConfig, EngineContext } from './config';

// =============================================================================
//  Database Access
// =============================================================================

export { createDatabase, deleteDatabase, resetDatabase, LAST_SYNC_AT_KEY } from './database';
export type { DatabaseConfig } from './database';

// =============================================================================
//  Sync Coordinator
// =============================================================================

export { createSyncCoordinator } from './engine';
export type {
  SyncCoordinator,
  SyncCoordinatorConfig,
  ActionOutcome,
  QueueReason,
  DrainResult,
  CompletedDrain
} from './engine';

// =============================================================================
//  API Client
// =============================================================================

export { createApiClient, backoffDelay, DEFAULT_RETRY_POLICY } from './api/client';
export type { ApiClient, ApiClientOptions, ApiRequest, ApiResponse, RetryPolicy } from './api/client';
export { createJobSwipeApi, DEFAULT_FEED_PAGE_SIZE } from './api/endpoints';
export type { JobSwipeApi, JobFeedPage, JobFeedParams, LoginCredentials } from './api/endpoints';

// =============================================================================
//  Local State
// =============================================================================

export { createActionQueue } from './queue';
export type { PersistentActionQueue } from './queue';
export { createLocalCache, cacheKey } from './cache';
export type { LocalCache, CacheSchema } from './cache';
export { createReadModels, createRecentlyModifiedTracker, CACHE_DOMAINS } from './data';
export type { FetchGuard, ReadModels, RecentlyModifiedTracker, RemovedCard } from './data';
export { createUndoBuffer } from './undo';
export type { UndoBuffer } from './undo';

// =============================================================================
//  Authentication
// =============================================================================

export { createEncryptedSessionStore, createMemorySessionStore } from './auth/session';
export type { SessionStore } from './auth/session';
export { createCredentialProvider } from './auth/credentials';
export type { CredentialProvider } from './auth/credentials';

// =============================================================================
//  Reactive Stores
// =============================================================================

export { createConnectivityMonitor } from './stores/network';
export type { ConnectivityMonitor } from './stores/network';
export { createSyncStatusStore } from './stores/sync';
export type { SyncStatusStore, SyncState, SyncError } from './stores/sync';

// =============================================================================
//  Errors
// =============================================================================

export {
  ApiError,
  NetworkError,
  AuthError,
  ValidationError,
  ServerError,
  RateLimitedError,
  isTransientError,
  extractErrorMessage,
  toFriendlyMessage
} from './errors';
export type { ApiErrorKind } from './errors';

// =============================================================================
//  Diagnostics
// =============================================================================

export { getDiagnostics } from './diagnostics';
export type { DiagnosticsSnapshot } from './diagnostics';

// =============================================================================
//  Debug
// =============================================================================

export { debug, isDebugMode, setDebugMode } from './debug';

// =============================================================================
//  Types
// =============================================================================

export type {
  ActionKind,
  ActionType,
  SwipeActionKind,
  SaveJobActionKind,
  SwipeDirection,
  QueuedAction,
  CacheEntry,
  AuthSession,
  UndoSlot,
  SyncStatus,
  ConnectivityStatus,
  DrainTrigger,
  JobCard,
  Application,
  ApplicationAuditEntry
} from './types';
