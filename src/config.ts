/**
 * @fileoverview Engine Configuration and Initialization
 *
 * Composition root for the sync engine. {@link initEngine} takes a single
 * {@link SyncEngineConfig}, opens the database and builds every component
 * (connectivity monitor, status store, queue, cache, credentials, API
 * client, read models, undo buffer, sync coordinator) wired to each other.
 *
 * Nothing here is module-level state: the returned {@link EngineContext} is
 * owned by the caller, and two engines (two accounts, two tests) can live
 * side by side. The only process-wide setting is the debug logger, whose
 * prefix and flag `initEngine` forwards to {@link debug.ts}.
 *
 * Configuration can also be read from the environment with
 * {@link loadConfigFromEnv}, which validates `<PREFIX>_*` variables with zod.
 */

import type Dexie from 'dexie';
import { z } from 'zod';
import { createApiClient, DEFAULT_REQUEST_TIMEOUT_MS, DEFAULT_RETRY_POLICY } from './api/client';
import type { ApiClient, RetryPolicy } from './api/client';
import { createJobSwipeApi } from './api/endpoints';
import type { JobSwipeApi, LoginCredentials } from './api/endpoints';
import type { TokenResponse } from './api/schemas';
import { createCredentialProvider } from './auth/credentials';
import type { CredentialProvider } from './auth/credentials';
import { createEncryptedSessionStore, createMemorySessionStore } from './auth/session';
import { createLocalCache } from './cache';
import type { LocalCache } from './cache';
import {
  createReadModels,
  createRecentlyModifiedTracker,
  DEFAULT_FEED_TTL_MS,
  DEFAULT_READ_MODEL_TTL_MS
} from './data';
import type { ReadModels, RecentlyModifiedTracker } from './data';
import { createDatabase, deleteMeta, LAST_SYNC_AT_KEY } from './database';
import type { DatabaseConfig } from './database';
import { _setDebugPrefix, debugLog, debugWarn, setDebugMode } from './debug';
import {
  createSyncCoordinator,
  DEFAULT_SYNC_LOCK_TIMEOUT_MS,
  DEFAULT_UNDO_WINDOW_MS
} from './engine';
import type { DrainResult, SyncCoordinator } from './engine';
import { createActionQueue } from './queue';
import type { PersistentActionQueue } from './queue';
import { createConnectivityMonitor } from './stores/network';
import type { ConnectivityMonitor } from './stores/network';
import { createSyncStatusStore } from './stores/sync';
import type { SyncStatusStore } from './stores/sync';
import type { ConnectivityStatus } from './types';
import { createUndoBuffer } from './undo';
import type { UndoBuffer } from './undo';
import { sleep as defaultSleep } from './utils';

// =============================================================================
// Configuration Interfaces
// =============================================================================

/**
 * Top-level configuration passed to {@link initEngine}.
 *
 * Only `baseUrl` is required. Every duration is in milliseconds.
 *
 * @example
 * const engine = await initEngine({
 *   baseUrl: 'https://api.example.com',
 *   sessionSecret: 'test-secret',
 *   database: { name: 'jobswipe-db' }
 * });
 */
export interface SyncEngineConfig {
  /** App prefix for the debug environment variable and the default DB name. Default `'jobswipe'`. */
  prefix?: string;
  /** Backend origin, e.g. `https://api.example.com`. */
  baseUrl: string;
  /** Database name and, off the browser, the IndexedDB implementation. Default name `<prefix>-db`. */
  database?: Partial<DatabaseConfig>;
  /**
   * Secret the stored session is encrypted with. Without one the session
   * lives in memory only and is lost on restart.
   */
  sessionSecret?: string;
  /** Transport. Defaults to the global `fetch`. */
  fetch?: typeof fetch;
  /** Default `{ retries: 3, baseDelayMs: 1000, maxDelayMs: 30000 }`. */
  retry?: Partial<RetryPolicy>;
  /** Per-attempt timeout. Default 30 s. */
  requestTimeoutMs?: number;
  /** TTL of cached feed pages. Default 1 h. */
  feedTtlMs?: number;
  /** TTL of cached applications and audit trails. Default 5 min. */
  readModelTtlMs?: number;
  /** How long an action can be undone. Default 3 s. */
  undoWindowMs?: number;
  /** Age after which a running drain is logged as slow. Default 60 s. */
  syncLockTimeoutMs?: number;
  /** How long a just-acted-on job is kept out of fresh feed pages. Default 2 s. */
  recentlyModifiedTtlMs?: number;
  /** Poll `GET /health` at this interval once started. `0` (default) disables polling. */
  probeIntervalMs?: number;
  /** Connectivity assumed before the first observation. Default `'online'`. */
  initialConnectivity?: ConnectivityStatus;
  /** Minimum time the status store shows `'syncing'`. Default 500 ms. */
  minSyncingMs?: number;
  /** Force debug logging on or off. Unset leaves the environment flag in charge. */
  debug?: boolean;
  /** Epoch-ms clock. */
  now?: () => number;
  /** Backoff sleep. */
  sleep?: (ms: number) => Promise<void>;
}

/** {@link SyncEngineConfig} with every default filled in. */
export interface ResolvedSyncEngineConfig {
  prefix: string;
  baseUrl: string;
  database: DatabaseConfig;
  sessionSecret: string | null;
  fetch: typeof fetch | undefined;
  retry: RetryPolicy;
  requestTimeoutMs: number;
  feedTtlMs: number;
  readModelTtlMs: number;
  undoWindowMs: number;
  syncLockTimeoutMs: number;
  recentlyModifiedTtlMs: number;
  probeIntervalMs: number;
  initialConnectivity: ConnectivityStatus;
  minSyncingMs: number;
  debug: boolean | null;
  now: () => number;
  sleep: (ms: number) => Promise<void>;
}

export const DEFAULT_PREFIX = 'jobswipe';
export const DEFAULT_RECENTLY_MODIFIED_TTL_MS = 2000;
export const DEFAULT_MIN_SYNCING_MS = 500;

// =============================================================================
// Resolution
// =============================================================================

function nonNegative(name: string, value: number | undefined, fallback: number): number {
  if (value === undefined) return fallback;
  if (!Number.isFinite(value) || value < 0) {
    throw new Error(`Invalid engine config: ${name} must be a non-negative number (got ${value})`);
  }
  return value;
}

/**
 * Fill in defaults and check ranges.
 *
 * @throws {Error} If `baseUrl` is missing or a duration is negative.
 */
export function resolveConfig(config: SyncEngineConfig): ResolvedSyncEngineConfig {
  const prefix = config.prefix || DEFAULT_PREFIX;
  const baseUrl = config.baseUrl.trim();
  if (!baseUrl) {
    throw new Error('Invalid engine config: baseUrl is required');
  }

  const retry: RetryPolicy = {
    retries: nonNegative('retry.retries', config.retry?.retries, DEFAULT_RETRY_POLICY.retries),
    baseDelayMs: nonNegative(
      'retry.baseDelayMs',
      config.retry?.baseDelayMs,
      DEFAULT_RETRY_POLICY.baseDelayMs
    ),
    maxDelayMs: nonNegative(
      'retry.maxDelayMs',
      config.retry?.maxDelayMs,
      DEFAULT_RETRY_POLICY.maxDelayMs
    )
  };

  return {
    prefix,
    baseUrl,
    database: {
      name: config.database?.name || `${prefix}-db`,
      indexedDB: config.database?.indexedDB,
      IDBKeyRange: config.database?.IDBKeyRange
    },
    sessionSecret: config.sessionSecret || null,
    fetch: config.fetch,
    retry,
    requestTimeoutMs: nonNegative(
      'requestTimeoutMs',
      config.requestTimeoutMs,
      DEFAULT_REQUEST_TIMEOUT_MS
    ),
    feedTtlMs: nonNegative('feedTtlMs', config.feedTtlMs, DEFAULT_FEED_TTL_MS),
    readModelTtlMs: nonNegative('readModelTtlMs', config.readModelTtlMs, DEFAULT_READ_MODEL_TTL_MS),
    undoWindowMs: nonNegative('undoWindowMs', config.undoWindowMs, DEFAULT_UNDO_WINDOW_MS),
    syncLockTimeoutMs: nonNegative(
      'syncLockTimeoutMs',
      config.syncLockTimeoutMs,
      DEFAULT_SYNC_LOCK_TIMEOUT_MS
    ),
    recentlyModifiedTtlMs: nonNegative(
      'recentlyModifiedTtlMs',
      config.recentlyModifiedTtlMs,
      DEFAULT_RECENTLY_MODIFIED_TTL_MS
    ),
    probeIntervalMs: nonNegative('probeIntervalMs', config.probeIntervalMs, 0),
    initialConnectivity: config.initialConnectivity ?? 'online',
    minSyncingMs: nonNegative('minSyncingMs', config.minSyncingMs, DEFAULT_MIN_SYNCING_MS),
    debug: config.debug ?? null,
    now: config.now ?? Date.now,
    sleep: config.sleep ?? defaultSleep
  };
}

// =============================================================================
// Environment
// =============================================================================

const durationVar = z.coerce.number().int().nonnegative().optional();

/** Variables read by {@link loadConfigFromEnv}, without the `<PREFIX>_` part. */
const envSchema = z.object({
  BASE_URL: z.string().url(),
  DB_NAME: z.string().min(1).optional(),
  SESSION_SECRET: z.string().min(1).optional(),
  RETRIES: durationVar,
  RETRY_BASE_DELAY_MS: durationVar,
  RETRY_MAX_DELAY_MS: durationVar,
  REQUEST_TIMEOUT_MS: durationVar,
  FEED_TTL_MS: durationVar,
  READ_MODEL_TTL_MS: durationVar,
  UNDO_WINDOW_MS: durationVar,
  SYNC_LOCK_TIMEOUT_MS: durationVar,
  RECENTLY_MODIFIED_TTL_MS: durationVar,
  PROBE_INTERVAL_MS: durationVar,
  DEBUG_MODE: z
    .enum(['true', 'false'])
    .transform((value) => value === 'true')
    .optional()
});

/**
 * Build a {@link SyncEngineConfig} from `<PREFIX>_*` environment variables
 * (`JOBSWIPE_BASE_URL`, `JOBSWIPE_RETRIES`, ...). Empty values count as unset.
 *
 * The result has no IndexedDB implementation; off the browser, add
 * `database.indexedDB` and `database.IDBKeyRange` before calling
 * {@link initEngine}.
 *
 * @throws {Error} Listing every invalid variable.
 */
export function loadConfigFromEnv(
  env: Record<string, string | undefined> = process.env,
  prefix: string = DEFAULT_PREFIX
): SyncEngineConfig {
  const varPrefix = `${prefix.toUpperCase()}_`;
  const input: Record<string, string> = {};
  for (const name of Object.keys(envSchema.shape)) {
    const value = env[varPrefix + name];
    if (value !== undefined && value !== '') input[name] = value;
  }

  const parsed = envSchema.safeParse(input);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${varPrefix}${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${problems}`);
  }

  const vars = parsed.data;
  return {
    prefix,
    baseUrl: vars.BASE_URL,
    database: vars.DB_NAME ? { name: vars.DB_NAME } : undefined,
    sessionSecret: vars.SESSION_SECRET,
    retry: {
      retries: vars.RETRIES,
      baseDelayMs: vars.RETRY_BASE_DELAY_MS,
      maxDelayMs: vars.RETRY_MAX_DELAY_MS
    },
    requestTimeoutMs: vars.REQUEST_TIMEOUT_MS,
    feedTtlMs: vars.FEED_TTL_MS,
    readModelTtlMs: vars.READ_MODEL_TTL_MS,
    undoWindowMs: vars.UNDO_WINDOW_MS,
    syncLockTimeoutMs: vars.SYNC_LOCK_TIMEOUT_MS,
    recentlyModifiedTtlMs: vars.RECENTLY_MODIFIED_TTL_MS,
    probeIntervalMs: vars.PROBE_INTERVAL_MS,
    debug: vars.DEBUG_MODE
  };
}

// =============================================================================
// Engine Context
// =============================================================================

/**
 * Everything {@link initEngine} built. The caller owns it and must call
 * {@link EngineContext.dispose} when done.
 */
export interface EngineContext {
  readonly config: ResolvedSyncEngineConfig;
  readonly db: Dexie;
  readonly connectivity: ConnectivityMonitor;
  readonly status: SyncStatusStore;
  readonly queue: PersistentActionQueue;
  readonly cache: LocalCache;
  readonly credentials: CredentialProvider;
  readonly client: ApiClient;
  readonly api: JobSwipeApi;
  readonly readModels: ReadModels;
  readonly recentlyModified: RecentlyModifiedTracker;
  readonly undo: UndoBuffer;
  readonly coordinator: SyncCoordinator;
  /** Start reacting to reconnects, start the probe, run the startup drain. */
  start(): Promise<DrainResult>;
  login(credentials: LoginCredentials): Promise<TokenResponse>;
  /**
   * Forget the session and every piece of per-account state: pending
   * actions, cached read models, the undo slot and `last_sync_at`.
   */
  logout(): Promise<void>;
  /** Stop the coordinator and the probe, then close the database. */
  dispose(): Promise<void>;
}

/**
 * Initialize the sync engine with the provided configuration.
 *
 * Opens (and if needed rebuilds) the database, then wires the components.
 * Does not contact the server; call {@link EngineContext.start} for that.
 *
 * @example
 * import { IDBFactory, IDBKeyRange } from 'fake-indexeddb';
 *
 * const engine = await initEngine({
 *   baseUrl: 'https://api.example.com',
 *   database: { name: 'jobswipe-db', indexedDB: new IDBFactory(), IDBKeyRange }
 * });
 * await engine.start();
 * await engine.coordinator.performAction({ type: 'swipe', jobId: 'j1', direction: 'right' });
 */
export async function initEngine(input: SyncEngineConfig): Promise<EngineContext> {
  const config = resolveConfig(input);

  _setDebugPrefix(config.prefix);
  if (config.debug !== null) setDebugMode(config.debug);

  const db = await createDatabase(config.database);

  if (!config.sessionSecret) {
    debugWarn('[AUTH] No sessionSecret configured - session will not survive a restart');
  }
  const sessionStore = config.sessionSecret
    ? createEncryptedSessionStore(db, config.sessionSecret)
    : createMemorySessionStore();
  const credentials = createCredentialProvider(sessionStore);

  const client = createApiClient({
    baseUrl: config.baseUrl,
    credentials,
    fetch: config.fetch,
    retry: config.retry,
    timeoutMs: config.requestTimeoutMs,
    sleep: config.sleep,
    now: config.now
  });
  const api = createJobSwipeApi(client, credentials);

  const connectivity = createConnectivityMonitor({
    initialStatus: config.initialConnectivity,
    probe: () => api.checkHealth()
  });
  const status = createSyncStatusStore({ minSyncingMs: config.minSyncingMs });
  const queue = createActionQueue(db);
  const cache = createLocalCache(db, { now: config.now });
  const recentlyModified = createRecentlyModifiedTracker(config.recentlyModifiedTtlMs, config.now);
  const readModels = createReadModels({
    api,
    cache,
    queue,
    recentlyModified,
    feedTtlMs: config.feedTtlMs,
    readModelTtlMs: config.readModelTtlMs
  });
  const undo = createUndoBuffer({ now: config.now });

  const coordinator = createSyncCoordinator({
    db,
    api,
    queue,
    readModels,
    undo,
    connectivity,
    status,
    recentlyModified,
    undoWindowMs: config.undoWindowMs,
    syncLockTimeoutMs: config.syncLockTimeoutMs,
    now: config.now
  });

  let disposed = false;

  debugLog(`[SYNC] Engine initialized (db: ${config.database.name}, api: ${config.baseUrl})`);

  return {
    config,
    db,
    connectivity,
    status,
    queue,
    cache,
    credentials,
    client,
    api,
    readModels,
    recentlyModified,
    undo,
    coordinator,

    async start() {
      if (disposed) throw new Error('Engine has been disposed');
      if (config.probeIntervalMs > 0) connectivity.startProbe(config.probeIntervalMs);
      return coordinator.start();
    },

    login: (credentialsInput) => api.login(credentialsInput),

    async logout() {
      await api.logout();
      await coordinator.whenIdle();
      await queue.clear();
      await readModels.clear();
      await deleteMeta(db, LAST_SYNC_AT_KEY);
      undo.clear();
      recentlyModified.clear();
      status.reset();
      debugLog('[AUTH] Signed out, local state cleared');
    },

    async dispose() {
      if (disposed) return;
      disposed = true;
      await coordinator.stop();
      connectivity.destroy();
      undo.destroy();
      status.reset();
      db.close();
      debugLog('[SYNC] Engine disposed');
    }
  };
}
