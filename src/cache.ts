/**
 * @fileoverview Local Read Cache
 *
 * TTL cache for server read models (job feed pages, applications, audit
 * trails), stored in the `cache` Dexie table. Keys have the form
 * `<domain>:<id>`; all entries sharing a domain form the logical collection
 * `cache_<domain>` and can be invalidated together.
 *
 * An entry read at or after its `expiresAt` is a miss and is deleted in the
 * same transaction. Entries written without a TTL never expire.
 *
 * Writes to one key are serialized through a keyed mutex so the feed loader
 * and the sync path cannot interleave a read-modify-write on the same entry.
 */

import type Dexie from 'dexie';
import type { z } from 'zod';
import { debugLog, debugWarn } from './debug';
import { createKeyedMutex } from './utils';
import type { CacheEntry } from './types';

/** Validates a cached value on the way out. */
export type CacheSchema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

export interface LocalCache {
  get(key: string): Promise<unknown>;
  get<T>(key: string, schema: CacheSchema<T>): Promise<T | undefined>;
  set(key: string, value: unknown, ttlMs?: number): Promise<void>;
  invalidate(key: string): Promise<void>;
  /**
   * Read-modify-write under the key lock. Returning `undefined` from `fn`
   * deletes the entry.
   */
  update<T>(
    key: string,
    schema: CacheSchema<T>,
    fn: (current: T | undefined) => T | undefined,
    ttlMs?: number
  ): Promise<T | undefined>;
  /**
   * Run `fn` while holding the write lock for `key`. `fn` must not call
   * `set`, `update` or `invalidate` for the same key (it would wait on itself).
   */
  withKeyLock<R>(key: string, fn: () => Promise<R>): Promise<R>;
  invalidateDomain(domain: string): Promise<number>;
  /** Raw stored entries, expired ones included. */
  listAll(): Promise<CacheEntry[]>;
  purgeExpired(): Promise<number>;
  clear(): Promise<void>;
}

export interface LocalCacheOptions {
  /** Epoch-ms clock. */
  now?: () => number;
}

export function cacheKey(domain: string, id: string): string {
  return `${domain}:${id}`;
}

/** Domain part of a `<domain>:<id>` key (the whole key when it has no `:`). */
export function domainOf(key: string): string {
  const separator = key.indexOf(':');
  return separator === -1 ? key : key.slice(0, separator);
}

export function createLocalCache(db: Dexie, options: LocalCacheOptions = {}): LocalCache {
  const clock = options.now ?? Date.now;
  const locks = createKeyedMutex();
  const table = () => db.table<CacheEntry, string>('cache');

  function isExpired(entry: CacheEntry): boolean {
    return entry.expiresAt !== null && clock() >= entry.expiresAt;
  }

  async function readEntry(key: string): Promise<CacheEntry | undefined> {
    return db.transaction('rw', table(), async () => {
      const entry = await table().get(key);
      if (!entry) return undefined;
      if (isExpired(entry)) {
        await table().delete(key);
        debugLog(`[CACHE] Expired: ${key}`);
        return undefined;
      }
      return entry;
    });
  }

  async function writeEntry(key: string, value: unknown, ttlMs?: number): Promise<void> {
    const storedAt = clock();
    const entry: CacheEntry = {
      key,
      domain: domainOf(key),
      value,
      storedAt,
      expiresAt: ttlMs === undefined ? null : storedAt + ttlMs
    };
    await table().put(entry);
  }

  function get(key: string): Promise<unknown>;
  function get<T>(key: string, schema: CacheSchema<T>): Promise<T | undefined>;
  async function get<T>(key: string, schema?: CacheSchema<T>): Promise<unknown> {
    const entry = await readEntry(key);
    if (!entry) return undefined;
    if (!schema) return entry.value;

    const parsed = schema.safeParse(entry.value);
    if (parsed.success) return parsed.data;
    // Shape changed between app versions; drop it and refetch
    debugWarn(`[CACHE] Discarding unreadable entry ${key}:`, parsed.error.message);
    await table().delete(key);
    return undefined;
  }

  async function update<T>(
    key: string,
    schema: CacheSchema<T>,
    fn: (current: T | undefined) => T | undefined,
    ttlMs?: number
  ): Promise<T | undefined> {
    return locks.run(key, async () => {
      const next = fn(await get(key, schema));
      if (next === undefined) {
        await table().delete(key);
      } else {
        await writeEntry(key, next, ttlMs);
      }
      return next;
    });
  }

  return {
    get,
    set: (key, value, ttlMs) => locks.run(key, () => writeEntry(key, value, ttlMs)),
    invalidate: (key) => locks.run(key, () => table().delete(key)),
    update,
    withKeyLock: (key, fn) => locks.run(key, fn),
    invalidateDomain: async (domain) => {
      const removed = await table().where('domain').equals(domain).delete();
      debugLog(`[CACHE] Invalidated ${removed} entries in cache_${domain}`);
      return removed;
    },
    listAll: () => table().toArray(),
    purgeExpired: () => table().where('expiresAt').belowOrEqual(clock()).delete(),
    clear: () => table().clear()
  };
}
