/**
 * @fileoverview IndexedDB Database Management via Dexie
 *
 * Creates the Dexie (IndexedDB) database that backs every durable piece of
 * engine state. Each engine owns its own instance; nothing here is a
 * module-level singleton, so tests and multiple accounts can open isolated
 * databases side by side.
 *
 * Tables (logical collection names in parentheses):
 *   - `offlineQueue` (`offline_queue`) — pending user actions, FIFO by `seq`
 *   - `cache` (`cache_<domain>`)       — read-model entries with TTL
 *   - `meta`                            — small key/value records such as
 *                                         `last_sync_at`
 *   - `authSession` (`auth_session`)    — the encrypted token pair
 *
 * Recovery strategy:
 *   If the database opens with object stores missing, it is deleted and
 *   recreated. Rows of `offlineQueue`, when that store survived, are carried
 *   over in order; everything else is refetched or re-entered. Any other
 *   open failure (blocked upgrade, a newer schema, an I/O error) is rethrown
 *   with the data left in place, so the host can retry.
 *
 * Hosts without a global `indexedDB` (Node) pass an `IDBFactory` and
 * `IDBKeyRange` implementation in {@link DatabaseConfig}.
 */

import Dexie, { type DexieOptions } from 'dexie';
import { debugError, debugWarn } from './debug';
import type { QueuedActionRow } from './types';

// =============================================================================
// Configuration Interfaces
// =============================================================================

/**
 * Database creation configuration passed to {@link createDatabase}.
 */
export interface DatabaseConfig {
  /** IndexedDB database name (should be unique per app and account). */
  name: string;
  /** IndexedDB implementation to use instead of the global one. */
  indexedDB?: DexieOptions['indexedDB'];
  /** `IDBKeyRange` matching `indexedDB`. Required whenever `indexedDB` is given. */
  IDBKeyRange?: DexieOptions['IDBKeyRange'];
}

// =============================================================================
// Schema
// =============================================================================

/** Current schema version. Bump together with {@link STORES}. */
export const SCHEMA_VERSION = 1;

/**
 * Dexie index declarations for every engine table.
 *
 * - `offlineQueue` — `++seq` gives strict insertion order; `&id` keeps the
 *   action id unique and addressable.
 * - `cache` — `domain` supports per-domain invalidation, `expiresAt` supports
 *   the explicit purge.
 */
export const STORES: Record<string, string> = {
  offlineQueue: '++seq, &id, createdAt',
  cache: 'key, domain, expiresAt',
  meta: 'key',
  authSession: 'id'
};

/** Meta key holding the ISO timestamp of the last fully completed drain. */
export const LAST_SYNC_AT_KEY = 'last_sync_at';

export interface MetaRecord {
  key: string;
  value: string;
}

// =============================================================================
// Database Creation
// =============================================================================

/**
 * Create and open the engine database.
 *
 * Opens eagerly so version upgrades run immediately (not lazily on first
 * table access). After opening, verifies that the actual object stores match
 * the declared schema; if they don't, the database is rebuilt with the
 * queued actions carried over. A failed open is rethrown untouched.
 *
 * @returns The opened Dexie instance.
 */
export async function createDatabase(config: DatabaseConfig): Promise<Dexie> {
  const db = buildDexie(config);

  try {
    await db.open();
  } catch (e) {
    debugError('[DB] Failed to open database:', e);
    db.close();
    throw e;
  }

  const idb = db.backendDB();
  const actualStores = Array.from(idb.objectStoreNames);
  const missing = Object.keys(STORES).filter((s) => !actualStores.includes(s));
  if (missing.length === 0) return db;

  debugError(
    `[DB] Object store mismatch after open! Missing: ${missing.join(', ')}. ` +
      `DB version: ${idb.version}, Dexie version: ${db.verno}. Deleting and recreating...`
  );
  const queued = missing.includes('offlineQueue')
    ? []
    : await db.table<QueuedActionRow, number>('offlineQueue').toArray();
  db.close();
  await deleteDatabase(config);

  const rebuilt = buildDexie(config);
  await rebuilt.open();
  if (queued.length > 0) {
    await rebuilt.table<QueuedActionRow, number>('offlineQueue').bulkAdd(queued);
    debugWarn(`[DB] Carried ${queued.length} queued actions into the rebuilt database`);
  }
  return rebuilt;
}

/**
 * Build a Dexie instance with the version declaration (does NOT open it).
 */
function buildDexie(config: DatabaseConfig): Dexie {
  const db =
    config.indexedDB && config.IDBKeyRange
      ? new Dexie(config.name, { indexedDB: config.indexedDB, IDBKeyRange: config.IDBKeyRange })
      : new Dexie(config.name);
  db.version(SCHEMA_VERSION).stores(STORES);
  return db;
}

/**
 * Delete the database named in `config` through the configured factory.
 */
export async function deleteDatabase(config: DatabaseConfig): Promise<void> {
  await buildDexie(config).delete();
}

// =============================================================================
// Meta Records
// =============================================================================

export async function getMeta(db: Dexie, key: string): Promise<string | null> {
  const record = await db.table<MetaRecord, string>('meta').get(key);
  return record?.value ?? null;
}

export async function setMeta(db: Dexie, key: string, value: string): Promise<void> {
  const record: MetaRecord = { key, value };
  await db.table<MetaRecord, string>('meta').put(record);
}

export async function deleteMeta(db: Dexie, key: string): Promise<void> {
  await db.table<MetaRecord, string>('meta').delete(key);
}

// =============================================================================
// Recovery
// =============================================================================

/**
 * Close and delete the engine database.
 *
 * Nuclear recovery option for a corrupted store. After calling this the app
 * should build a fresh engine via `initEngine`.
 *
 * @returns The name of the deleted database.
 */
export async function resetDatabase(db: Dexie, config: DatabaseConfig): Promise<string> {
  db.close();
  await deleteDatabase(config);
  return config.name;
}
